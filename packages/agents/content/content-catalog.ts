// Learning content: resources, glossary concepts and per-role context notes

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { ContextSources, Role } from '../types/context.js';
import { ConfigError, errorMessage, formatZodError } from '../utils/errors.js';

export const SKILL_LEVELS = ['beginner', 'intermediate', 'advanced'] as const;

export type SkillLevel = typeof SKILL_LEVELS[number];

const roleSchema = z.enum(['analyst', 'data_scientist', 'production']);

const resourceSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  level: z.enum(SKILL_LEVELS),
  topics: z.array(z.string()),
  roles: z.array(roleSchema).min(1),
  minutes: z.number().int().positive(),
  summary: z.string(),
});

const contentSchema = z.object({
  resources: z.array(resourceSchema),
  concepts: z.record(z.string()),
  roleNotes: z.object({
    analyst: z.array(z.string()).default([]),
    data_scientist: z.array(z.string()).default([]),
    production: z.array(z.string()).default([]),
  }),
  history: z.array(z.string()).default([]),
});

export type LearningResource = z.infer<typeof resourceSchema>;
export type ContentData = z.input<typeof contentSchema>;

export interface RecommendOptions {
  role: Role;
  level?: SkillLevel;
  topic?: string;
  limit?: number;
}

function levelRank(level: SkillLevel): number {
  return SKILL_LEVELS.indexOf(level);
}

export class ContentCatalog {
  private readonly resources: LearningResource[];
  private readonly concepts: Map<string, string>;
  private readonly notes: Readonly<Record<Role, readonly string[]>>;
  private readonly history: readonly string[];

  constructor(data: ContentData) {
    const parsed = contentSchema.safeParse(data);
    if (!parsed.success) {
      throw new ConfigError(`Invalid learning content: ${formatZodError(parsed.error)}`);
    }
    this.resources = [...parsed.data.resources].sort(
      (a, b) => levelRank(a.level) - levelRank(b.level) || a.id.localeCompare(b.id),
    );
    this.concepts = new Map(
      Object.entries(parsed.data.concepts).map(([term, text]) => [term.toLowerCase(), text]),
    );
    this.notes = parsed.data.roleNotes;
    this.history = parsed.data.history;
  }

  static async load(path: string): Promise<ContentCatalog> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf8'));
    } catch (err) {
      throw new ConfigError(`Cannot read learning content ${path}: ${errorMessage(err)}`, { path });
    }
    const parsed = contentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid learning content ${path}: ${formatZodError(parsed.error)}`, { path });
    }
    return new ContentCatalog(parsed.data);
  }

  recommend(options: RecommendOptions): LearningResource[] {
    const topic = options.topic?.toLowerCase();
    return this.resources
      .filter((r) => r.roles.includes(options.role))
      .filter((r) => options.level === undefined || r.level === options.level)
      .filter((r) => topic === undefined || r.topics.some((t) => t.toLowerCase() === topic))
      .slice(0, options.limit ?? 3);
  }

  /** Resources for a role from `from` upwards, easiest first. */
  learningPath(role: Role, from: SkillLevel = 'beginner'): LearningResource[] {
    return this.resources.filter((r) => r.roles.includes(role) && levelRank(r.level) >= levelRank(from));
  }

  explain(term: string): string | undefined {
    return this.concepts.get(term.toLowerCase());
  }

  /** Glossary terms mentioned in free text, in glossary order. */
  findConcepts(text: string): string[] {
    const lower = text.toLowerCase();
    return [...this.concepts.keys()].filter((term) => {
      const escaped = term.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
      return new RegExp(`\\b${escaped}\\b`).test(lower);
    });
  }

  roleNotes(role: Role): readonly string[] {
    return this.notes[role];
  }

  /** Role notes feed the explanatory tier; background notes the historical one. */
  contextSources(): ContextSources {
    return { explanations: this.notes, history: this.history };
  }
}
