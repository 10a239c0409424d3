import { ENGINE_CONFIG } from '../config/engine_config';
import { SRS_KICKS } from '../core/pieces';
import { Board, GameState, PieceKind, PieceQueue } from '../core/types';
import type { BoundaryError } from './errors';

export type BuildResult =
  | { ok: true; state: GameState }
  | { ok: false; error: BoundaryError };

/**
 * Distribute a decoded queue over the solver's piece slots.
 *
 * The solver looks at hold, then current, then preview, and only falls
 * through to the randomizer lookahead when the preview is exhausted, so the
 * slot order below decides which pieces it can see.
 */
export function buildGameState(
  board: Board,
  queue: PieceQueue,
  previewCapacity: number = ENGINE_CONFIG.previewCapacity,
): BuildResult {
  if (queue.length === 0) {
    return { ok: false, error: { kind: 'NoValidPieces' } };
  }
  const [hold, current] = queue;
  if (hold === undefined || current === undefined) {
    return { ok: false, error: { kind: 'InsufficientPieces' } };
  }
  const previewEnd = Math.min(queue.length, 2 + previewCapacity);
  return {
    ok: true,
    state: {
      hold,
      current,
      preview: queue.slice(2, previewEnd),
      randomizer: {
        kind: 'seven-bag',
        lookahead: queue.slice(previewEnd),
      },
      rotationSystem: SRS_KICKS,
      board: board.clone(),
    },
  };
}

export function pieceSequence(state: GameState): PieceKind[] {
  return [state.current, ...state.preview, ...state.randomizer.lookahead];
}

export function countPieces(state: GameState): number {
  return pieceSequence(state).length + (state.hold === null ? 0 : 1);
}
