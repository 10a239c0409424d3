import fs from 'fs';
import path from 'path';
import { z } from 'zod';

import type { FeatureVector } from './features';

export const DEFAULT_MODEL_PATH = path.resolve(
  __dirname,
  '..',
  '..',
  'models',
  'pc_weights.json',
);

export const ModelFileSchema = z.object({
  version: z.literal(1),
  bias: z.number().default(0),
  weights: z.record(z.string(), z.number()),
});

export type ModelFile = z.infer<typeof ModelFileSchema>;

export class ModelLoadError extends Error {
  constructor(
    message: string,
    readonly modelPath: string,
  ) {
    super(message);
    this.name = 'ModelLoadError';
  }
}

/**
 * Linear move-ordering model for the perfect-clear search.
 *
 * Loaded for one solve and disposed afterwards; a disposed model refuses to
 * evaluate.
 */
export class ScoringModel {
  private weights: Record<string, number>;
  private bias: number;
  private disposed = false;

  constructor(config: ModelFile) {
    this.weights = { ...config.weights };
    this.bias = config.bias;
  }

  evaluate(features: FeatureVector): number {
    if (this.disposed) {
      throw new Error('Scoring model used after dispose');
    }
    let value = this.bias;
    for (const [name, featureValue] of Object.entries(features.values)) {
      const weight = this.weights[name] ?? 0;
      value += weight * featureValue;
    }
    return value;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  getWeights(): Record<string, number> {
    return { ...this.weights };
  }

  dispose(): void {
    this.weights = {};
    this.bias = 0;
    this.disposed = true;
  }
}

export type ScoringModelLoader = () => ScoringModel;

export function loadScoringModel(modelPath: string): ScoringModel {
  let raw: string;
  try {
    raw = fs.readFileSync(modelPath, 'utf-8');
  } catch (error) {
    throw new ModelLoadError(
      `Failed to read model from ${modelPath}: ${describe(error)}`,
      modelPath,
    );
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ModelLoadError(`Model ${modelPath} is not JSON: ${describe(error)}`, modelPath);
  }
  const result = ModelFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ModelLoadError(
      `Model ${modelPath} is malformed: ${result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
        .join('; ')}`,
      modelPath,
    );
  }
  return new ScoringModel(result.data);
}

export function createModelLoader(modelPath: string = DEFAULT_MODEL_PATH): ScoringModelLoader {
  return () => loadScoringModel(modelPath);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
