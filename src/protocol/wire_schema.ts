import { z } from 'zod';

export const WireRecordSchema = z.object({
  piece: z.enum(['I', 'O', 'T', 'S', 'Z', 'L', 'J']),
  rotate: z.enum(['Spawn', 'Right', 'Reverse', 'Left']),
  x: z.number().int(),
  y: z.number().int(),
});

export const SolutionSchema = z.object({
  patternSize: z.number().int().nonnegative(),
  placements: z.array(WireRecordSchema),
});

export const ResultPayloadSchema = z.discriminatedUnion('success', [
  z.object({
    success: z.literal(true),
    solutions: z.array(SolutionSchema),
    solutionCount: z.number().int().nonnegative(),
  }),
  z.object({
    success: z.literal(false),
    error: z.string(),
  }),
]);

export type ResultPayload = z.infer<typeof ResultPayloadSchema>;

export class PayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PayloadError';
  }
}

export function parsePayload(text: string): ResultPayload {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new PayloadError(
      `Payload is not JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  const result = ResultPayloadSchema.safeParse(raw);
  if (!result.success) {
    throw new PayloadError(
      `Payload is malformed: ${result.error.issues
        .map((issue) => `${issue.path.join('.') || 'root'} ${issue.message}`)
        .join('; ')}`,
    );
  }
  return result.data;
}
