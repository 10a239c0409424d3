import type { Placement } from '../core/types';

export type SolverErrorName = 'NoPcFound' | 'SearchLimitReached' | 'HeightOutOfRange';

export type BoundaryError =
  | { kind: 'NoValidPieces' }
  | { kind: 'InsufficientPieces' }
  | { kind: 'ModelUnavailable' }
  | { kind: 'SolverFailure'; name: SolverErrorName }
  | { kind: 'BufferOverflow' };

export type SolveOutcome =
  | { ok: true; placements: readonly Placement[] }
  | { ok: false; error: BoundaryError };

/**
 * Name written to the `error` field of a failure payload.
 */
export function errorName(error: BoundaryError): string {
  switch (error.kind) {
    case 'NoValidPieces':
    case 'InsufficientPieces':
    case 'ModelUnavailable':
    case 'BufferOverflow':
      return error.kind;
    case 'SolverFailure':
      return error.name;
    default: {
      const unreachable: never = error;
      return unreachable;
    }
  }
}

export class MemoryAccessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MemoryAccessError';
  }
}

export class ReentrantCallError extends Error {
  constructor(entryPoint: string) {
    super(`${entryPoint} called while another call is still running`);
    this.name = 'ReentrantCallError';
  }
}
