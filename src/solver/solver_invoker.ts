import { CELLS_PER_PIECE, ENGINE_CONFIG } from '../config/engine_config';
import type { GameState } from '../core/types';
import type { SolveOutcome } from '../protocol/errors';
import type { PerfectClearSolver } from './perfect_clear_search';
import type { ScoringModel, ScoringModelLoader } from './scoring_model';

export interface SolverBounds {
  /** Board height as sent by the host; also the lowest PC height tried */
  height: number;
  queueLength: number;
}

export interface SolverDependencies {
  solver: PerfectClearSolver;
  loadModel: ScoringModelLoader;
}

// A full clear of height*width cells never needs more than one piece per four cells.
export function placementBound(
  queueLength: number,
  height: number,
  width: number = ENGINE_CONFIG.boardWidth,
): number {
  return Math.min(queueLength, Math.floor((height * width) / CELLS_PER_PIECE));
}

export function invokeSolver(
  state: GameState,
  bounds: SolverBounds,
  dependencies: SolverDependencies,
): SolveOutcome {
  let model: ScoringModel;
  try {
    model = dependencies.loadModel();
  } catch (error) {
    // eslint-disable-next-line no-console
    console.warn('Scoring model unavailable:', error instanceof Error ? error.message : error);
    return { ok: false, error: { kind: 'ModelUnavailable' } };
  }

  try {
    const result = dependencies.solver.findPerfectClear({
      state,
      model,
      minHeight: bounds.height,
      maxPlacements: placementBound(bounds.queueLength, bounds.height),
    });
    if (!result.ok) {
      return { ok: false, error: { kind: 'SolverFailure', name: result.error } };
    }
    if (result.placements.length === 0) {
      return { ok: false, error: { kind: 'SolverFailure', name: 'NoPcFound' } };
    }
    return { ok: true, placements: result.placements };
  } finally {
    model.dispose();
  }
}
