/**
 * Perfect-clear search
 *
 * Depth-first search over reachable placements with hold. Candidate heights
 * start at the requested minimum and grow while the pieces still cover the
 * empty cells. Children are ordered by the scoring model; failed positions
 * are memoised per (height, queue index, hold, rows).
 */

import { CELLS_PER_PIECE, MAX_PC_HEIGHT } from '../config/engine_config';
import { getAbsoluteCells } from '../core/pieces';
import { Board, GameState, KickTable, PieceKind, Placement } from '../core/types';
import type { SolverErrorName } from '../protocol/errors';
import { countPieces, pieceSequence } from '../protocol/game_state_builder';
import { computeFeatures } from './features';
import { generatePlacements } from './move_generator';
import type { ScoringModel } from './scoring_model';

export interface SolverRequest {
  state: GameState;
  model: ScoringModel;
  /** Lowest perfect-clear height to try */
  minHeight: number;
  maxPlacements: number;
}

export type SolverResult =
  | { ok: true; placements: Placement[] }
  | { ok: false; error: SolverErrorName };

export interface PerfectClearSolver {
  findPerfectClear(request: SolverRequest): SolverResult;
}

export interface SearchOptions {
  /** Positions expanded before the search gives up */
  nodeLimit: number;
}

export const DEFAULT_SEARCH_OPTIONS: SearchOptions = {
  nodeLimit: 200_000,
};

interface PieceChoice {
  kind: PieceKind;
  index: number;
  hold: PieceKind | null;
}

interface Child {
  placement: Placement;
  board: Board;
  height: number;
  index: number;
  hold: PieceKind | null;
  evaluation: number;
}

export class PerfectClearSearch implements PerfectClearSolver {
  private readonly options: SearchOptions;

  constructor(options: Partial<SearchOptions> = {}) {
    this.options = { ...DEFAULT_SEARCH_OPTIONS, ...options };
  }

  findPerfectClear(request: SolverRequest): SolverResult {
    const { state, model, minHeight, maxPlacements } = request;
    if (minHeight > MAX_PC_HEIGHT) {
      return { ok: false, error: 'HeightOutOfRange' };
    }
    const board = state.board;
    const limit = Math.min(maxPlacements, countPieces(state));
    const filled = board.filledCount();
    const run = new SearchRun(
      model,
      state.rotationSystem,
      pieceSequence(state),
      limit,
      this.options.nodeLimit,
    );

    for (
      let height = Math.max(minHeight, board.stackHeight(), 1);
      height <= MAX_PC_HEIGHT;
      height += 1
    ) {
      const empty = height * board.width - filled;
      if (empty <= 0 || empty % CELLS_PER_PIECE !== 0) {
        continue;
      }
      if (empty / CELLS_PER_PIECE > limit) {
        break;
      }
      const path: Placement[] = [];
      if (run.search(board.clone(), height, 0, state.hold, path)) {
        return { ok: true, placements: path };
      }
      if (run.exhausted) {
        return { ok: false, error: 'SearchLimitReached' };
      }
    }
    return { ok: false, error: 'NoPcFound' };
  }
}

class SearchRun {
  exhausted = false;
  private nodes = 0;
  private readonly failed = new Set<string>();

  constructor(
    private readonly model: ScoringModel,
    private readonly kicks: KickTable,
    private readonly sequence: readonly PieceKind[],
    private readonly limit: number,
    private readonly nodeLimit: number,
  ) {}

  search(
    board: Board,
    height: number,
    index: number,
    hold: PieceKind | null,
    path: Placement[],
  ): boolean {
    if (path.length >= this.limit) {
      return false;
    }
    const key = `${height}|${index}|${hold ?? '-'}|${board.rows.subarray(0, height).join(',')}`;
    if (this.failed.has(key)) {
      return false;
    }
    this.nodes += 1;
    if (this.nodes > this.nodeLimit) {
      this.exhausted = true;
      return false;
    }

    for (const child of this.expand(board, height, index, hold, path.length)) {
      path.push(child.placement);
      if (
        child.board.isEmpty() ||
        this.search(child.board, child.height, child.index, child.hold, path)
      ) {
        return true;
      }
      path.pop();
      if (this.exhausted) {
        return false;
      }
    }

    this.failed.add(key);
    return false;
  }

  private expand(
    board: Board,
    height: number,
    index: number,
    hold: PieceKind | null,
    placed: number,
  ): Child[] {
    const children: Child[] = [];
    for (const choice of this.choices(index, hold)) {
      const remainingPieces =
        this.sequence.length - choice.index + (choice.hold === null ? 0 : 1);
      const budget = Math.min(remainingPieces, this.limit - placed - 1);
      for (const placement of generatePlacements(board, choice.kind, height, this.kicks)) {
        const next = board.clone();
        next.lockCells(getAbsoluteCells(placement.kind, placement.facing, placement.position));
        const cleared = next.clearLines();
        const nextHeight = height - cleared;
        const empty = nextHeight * next.width - next.filledCount();
        if (empty / CELLS_PER_PIECE > budget) {
          continue;
        }
        if (next.emptyRegionSizes(nextHeight).some((size) => size % CELLS_PER_PIECE !== 0)) {
          continue;
        }
        children.push({
          placement,
          board: next,
          height: nextHeight,
          index: choice.index,
          hold: choice.hold,
          evaluation: this.model.evaluate(computeFeatures(next, nextHeight, cleared)),
        });
      }
    }
    return children.sort((a, b) => b.evaluation - a.evaluation);
  }

  private choices(index: number, hold: PieceKind | null): PieceChoice[] {
    const current = this.sequence[index];
    if (current === undefined) {
      return hold === null ? [] : [{ kind: hold, index, hold: null }];
    }
    const choices: PieceChoice[] = [{ kind: current, index: index + 1, hold }];
    if (hold !== null) {
      if (hold !== current) {
        choices.push({ kind: hold, index: index + 1, hold: current });
      }
      return choices;
    }
    const next = this.sequence[index + 1];
    if (next !== undefined && next !== current) {
      choices.push({ kind: next, index: index + 2, hold: current });
    }
    return choices;
  }
}
