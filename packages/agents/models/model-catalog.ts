// Model catalog: which models exist, what they predict and what they need

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { ModelDescriptor } from '../types/models.js';
import { ConfigError, errorMessage, formatZodError } from '../utils/errors.js';

export const CATALOG_FILE = 'catalog.json';

const descriptorSchema = z.object({
  id: z.string().min(1),
  task: z.enum(['margin', 'win_probability']),
  artifact: z.string().min(1),
  requiredFeatures: z.array(z.string().min(1)).min(1),
  historicalAccuracy: z.number().min(0).max(1),
  accuracyHistory: z.array(z.number().min(0).max(1)).optional(),
  version: z.string().min(1),
  description: z.string().default(''),
});

const catalogSchema = z.object({ models: z.array(descriptorSchema) });

export function parseModelCatalog(raw: unknown, source = 'catalog'): ModelDescriptor[] {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid model catalog ${source}: ${formatZodError(parsed.error)}`);
  }
  const seen = new Set<string>();
  for (const model of parsed.data.models) {
    if (seen.has(model.id)) {
      throw new ConfigError(`Model '${model.id}' is declared twice in ${source}`);
    }
    seen.add(model.id);
  }
  return parsed.data.models;
}

export async function loadModelCatalog(modelDir: string): Promise<ModelDescriptor[]> {
  const path = join(modelDir, CATALOG_FILE);
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Cannot read model catalog ${path}: ${errorMessage(err)}`, { path });
  }
  return parseModelCatalog(raw, path);
}
