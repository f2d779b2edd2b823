// Loads JSON model artifacts from a directory and turns them into scoring handles

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { FeatureMap, ModelDescriptor, ModelHandle, ModelLoader } from '../types/models.js';
import { ModelLoadFailureError, ModelNotFoundError, errorMessage, formatZodError } from '../utils/errors.js';

const coefficientsSchema = z.record(z.number().finite());

const stumpSchema = z.object({
  feature: z.string().min(1),
  threshold: z.number().finite(),
  left: z.number().finite(),    // feature <= threshold
  right: z.number().finite(),
});

const artifactSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('linear'),
    modelId: z.string(),
    version: z.string(),
    intercept: z.number().finite(),
    coefficients: coefficientsSchema,
  }),
  z.object({
    kind: z.literal('logistic'),
    modelId: z.string(),
    version: z.string(),
    intercept: z.number().finite(),
    coefficients: coefficientsSchema,
  }),
  z.object({
    kind: z.literal('stump_ensemble'),
    modelId: z.string(),
    version: z.string(),
    base: z.number().finite(),
    learningRate: z.number().positive(),
    output: z.enum(['raw', 'sigmoid']),
    stumps: z.array(stumpSchema).min(1),
  }),
]);

export type ModelArtifact = z.infer<typeof artifactSchema>;

export function sigmoid(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

function linearScore(intercept: number, coefficients: Record<string, number>, features: FeatureMap): number {
  let total = intercept;
  for (const [name, weight] of Object.entries(coefficients)) {
    total += weight * (features[name] ?? 0);
  }
  return total;
}

function featuresRead(artifact: ModelArtifact): string[] {
  switch (artifact.kind) {
    case 'linear':
    case 'logistic':
      return Object.keys(artifact.coefficients);
    case 'stump_ensemble':
      return [...new Set(artifact.stumps.map((s) => s.feature))];
  }
}

/** Build a scoring function for a validated artifact. */
export function compileArtifact(artifact: ModelArtifact): (features: FeatureMap) => number {
  switch (artifact.kind) {
    case 'linear':
      return (features) => linearScore(artifact.intercept, artifact.coefficients, features);
    case 'logistic':
      return (features) => sigmoid(linearScore(artifact.intercept, artifact.coefficients, features));
    case 'stump_ensemble': {
      const { base, learningRate, stumps, output } = artifact;
      return (features) => {
        let total = base;
        for (const stump of stumps) {
          const value = features[stump.feature] ?? 0;
          total += learningRate * (value <= stump.threshold ? stump.left : stump.right);
        }
        return output === 'sigmoid' ? sigmoid(total) : total;
      };
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class JsonModelLoader implements ModelLoader {
  constructor(private readonly modelDir: string) {}

  async load(descriptor: ModelDescriptor): Promise<ModelHandle> {
    const path = join(this.modelDir, descriptor.artifact);
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        throw new ModelNotFoundError(descriptor.id, `no artifact at ${path}`);
      }
      throw new ModelLoadFailureError(descriptor.id, errorMessage(err), err);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ModelLoadFailureError(descriptor.id, `artifact is not valid JSON (${errorMessage(err)})`, err);
    }

    const parsed = artifactSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ModelLoadFailureError(descriptor.id, formatZodError(parsed.error));
    }
    const artifact = parsed.data;
    if (artifact.modelId !== descriptor.id) {
      throw new ModelLoadFailureError(descriptor.id, `artifact belongs to '${artifact.modelId}'`);
    }
    const undeclared = featuresRead(artifact).filter((f) => !descriptor.requiredFeatures.includes(f));
    if (undeclared.length > 0) {
      throw new ModelLoadFailureError(
        descriptor.id,
        `artifact reads undeclared features: ${undeclared.join(', ')}`,
      );
    }

    const score = compileArtifact(artifact);
    return {
      modelId: descriptor.id,
      version: artifact.version,
      predict: score,
    };
  }
}
