// Learning navigator: role-aware content recommendations and concept explanations

import type { AgentCapability, AgentOutput, CallerContext, LearningAction } from '../types/agents.js';
import type { PermissionLevel } from '../types/permissions.js';
import { BaseAgent, assertNever } from './base-agent.js';
import { learningParamsSchema } from './params.js';
import { SKILL_LEVELS, type SkillLevel } from '../content/content-catalog.js';

const CAPABILITIES: readonly AgentCapability<LearningAction>[] = [
  {
    name: 'recommend_content',
    description: 'Recommend learning resources for the caller role',
    requiredPermission: 'READ_ONLY',
    tools: ['content_catalog'],
    dataAccess: ['learning_content'],
    estimatedSeconds: 0.5,
  },
  {
    name: 'explain_concepts',
    description: 'Explain glossary concepts named in the question',
    requiredPermission: 'READ_ONLY',
    tools: ['content_catalog'],
    dataAccess: ['learning_content'],
    estimatedSeconds: 0.5,
  },
  {
    name: 'guide_learning_path',
    description: 'Ordered learning path from the caller skill level upwards',
    requiredPermission: 'READ_EXECUTE',
    tools: ['content_catalog'],
    dataAccess: ['learning_content'],
    estimatedSeconds: 1,
  },
];

function hintedLevel(hints: Readonly<Record<string, unknown>>): SkillLevel | undefined {
  const level = hints.skill_level;
  return SKILL_LEVELS.find((l) => l === level);
}

export class LearningNavigator extends BaseAgent<LearningAction> {
  readonly agentType = 'learning_navigator';
  readonly ceiling: PermissionLevel = 'READ_EXECUTE';

  listCapabilities(): readonly AgentCapability<LearningAction>[] {
    return CAPABILITIES;
  }

  protected async perform(
    action: LearningAction,
    parameters: Readonly<Record<string, unknown>>,
    caller: CallerContext,
  ): Promise<AgentOutput> {
    const params = learningParamsSchema.parse(parameters);
    const level = params.skill_level ?? hintedLevel(caller.contextHints);
    const { content } = this.deps;

    switch (action) {
      case 'recommend_content': {
        const resources = content.recommend({ role: caller.role, level, topic: params.topic, limit: params.limit });
        const insights = resources.length === 0
          ? ['No learning resources match this request']
          : resources.map((r) => `Recommended: ${r.title} (${r.level}, ${r.minutes} min)`);
        return { data: { resources }, insights };
      }
      case 'explain_concepts': {
        const terms = params.concepts ?? content.findConcepts(caller.query);
        const explanations: Record<string, string> = {};
        for (const term of terms) {
          const text = content.explain(term);
          if (text !== undefined) explanations[term.toLowerCase()] = text;
        }
        const entries = Object.entries(explanations);
        const insights = entries.length === 0
          ? ['No glossary terms recognised in the question']
          : entries.map(([term, text]) => `${term}: ${text}`);
        return { data: { explanations }, insights };
      }
      case 'guide_learning_path': {
        const path = content.learningPath(caller.role, level);
        const minutes = path.reduce((sum, r) => sum + r.minutes, 0);
        return {
          data: { role: caller.role, startLevel: level ?? 'beginner', steps: path, totalMinutes: minutes },
          insights: [
            `${path.length}-step learning path for ${caller.role} (${minutes} min)`,
            ...path.slice(0, 3).map((r, i) => `Step ${i + 1}: ${r.title}`),
          ],
        };
      }
      default:
        return assertNever(action);
    }
  }
}
