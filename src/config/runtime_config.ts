import path from 'path';
import { z } from 'zod';

import { DEFAULT_HEAP_BYTES } from '../host/linear_memory';
import { DEFAULT_OUTPUT_CAPACITY } from '../protocol/result_buffer';
import { DEFAULT_SEARCH_OPTIONS } from '../solver/perfect_clear_search';
import { DEFAULT_MODEL_PATH } from '../solver/scoring_model';

export const RuntimeEnvSchema = z.object({
  /** HTTP server port */
  PORT: z.coerce.number().int().min(1).max(65535).default(5173),

  /** Scoring model weights; relative paths resolve against the working directory */
  PC_MODEL_PATH: z.string().min(1).optional(),

  PC_SEARCH_NODE_LIMIT: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_SEARCH_OPTIONS.nodeLimit),

  /** Bytes in the static output region, terminator included */
  PC_OUTPUT_CAPACITY: z.coerce.number().int().min(64).default(DEFAULT_OUTPUT_CAPACITY),

  PC_HEAP_BYTES: z.coerce.number().int().min(0).default(DEFAULT_HEAP_BYTES),
});

export interface RuntimeConfig {
  port: number;
  modelPath: string;
  nodeLimit: number;
  outputCapacity: number;
  heapBytes: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid environment configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadRuntimeConfig(
  env: Record<string, string | undefined> = process.env,
): RuntimeConfig {
  const result = RuntimeEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`),
    );
  }
  const data = result.data;
  return {
    port: data.PORT,
    modelPath: data.PC_MODEL_PATH ? path.resolve(data.PC_MODEL_PATH) : DEFAULT_MODEL_PATH,
    nodeLimit: data.PC_SEARCH_NODE_LIMIT,
    outputCapacity: data.PC_OUTPUT_CAPACITY,
    heapBytes: data.PC_HEAP_BYTES,
  };
}
