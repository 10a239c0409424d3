/**
 * Perfect-clear search tests
 *
 * Every solution is replayed on the input board: each placement must sit on
 * empty cells of the board as it stands at that point, and the final board
 * must be empty.
 */

import { describe, expect, it } from 'vitest';

import { BitBoard } from '../../core/board';
import { getAbsoluteCells, SRS_KICKS } from '../../core/pieces';
import type { Placement } from '../../core/types';
import { decodeField } from '../../protocol/field_decoder';
import { buildGameState } from '../../protocol/game_state_builder';
import { decodeQueue } from '../../protocol/queue_decoder';
import { generatePlacements } from '../move_generator';
import { PerfectClearSearch, SolverResult } from '../perfect_clear_search';
import { loadScoringModel, DEFAULT_MODEL_PATH } from '../scoring_model';

function solve(
  field: string,
  pieces: string,
  height: number,
  search = new PerfectClearSearch(),
): { board: BitBoard; result: SolverResult } {
  const board = decodeField(Buffer.from(field, 'latin1'), height);
  const built = buildGameState(board, decodeQueue(Buffer.from(pieces, 'latin1')));
  if (!built.ok) {
    throw new Error(`unexpected build failure: ${built.error.kind}`);
  }
  const model = loadScoringModel(DEFAULT_MODEL_PATH);
  const result = search.findPerfectClear({
    state: built.state,
    model,
    minHeight: height,
    maxPlacements: Math.min(pieces.length, Math.floor((height * 10) / 4)),
  });
  model.dispose();
  return { board, result };
}

function replay(board: BitBoard, placements: readonly Placement[]): BitBoard {
  const next = board.clone();
  for (const placement of placements) {
    const cells = getAbsoluteCells(placement.kind, placement.facing, placement.position);
    for (const cell of cells) {
      expect(next.isOccupied(cell.x, cell.y)).toBe(false);
    }
    next.lockCells(cells);
    next.clearLines();
  }
  return next;
}

describe('PerfectClearSearch', () => {
  it('drops an I into a four-wide gap', () => {
    const { result } = solve('XXXXXX____', 'II', 1);
    expect(result).toEqual({
      ok: true,
      placements: [{ kind: 'I', facing: 'up', position: { x: 6, y: 0 } }],
    });
  });

  it('rotates an I into a one-wide well', () => {
    const { result } = solve('XXXXXXXXX_'.repeat(4), 'IO', 4);
    expect(result).toEqual({
      ok: true,
      placements: [{ kind: 'I', facing: 'right', position: { x: 9, y: 0 } }],
    });
  });

  it('plays the current piece when the held one does not fit', () => {
    const { result } = solve('XXXXXXXX__'.repeat(2), 'IO', 2);
    expect(result).toEqual({
      ok: true,
      placements: [{ kind: 'O', facing: 'up', position: { x: 8, y: 0 } }],
    });
  });

  it('clears a row with two pieces', () => {
    const { board, result } = solve('XX________', 'III', 1);
    if (!result.ok) {
      throw new Error(`expected a solution, got ${result.error}`);
    }
    expect(result.placements).toHaveLength(2);
    expect(result.placements.map((placement) => placement.position.x).sort()).toEqual([2, 6]);
    expect(replay(board, result.placements).isEmpty()).toBe(true);
  });

  it('fills a two-row board with five O pieces', () => {
    const { board, result } = solve('_'.repeat(20), 'OOOOO', 2);
    if (!result.ok) {
      throw new Error(`expected a solution, got ${result.error}`);
    }
    expect(result.placements).toHaveLength(5);
    expect(replay(board, result.placements).isEmpty()).toBe(true);
  });

  it('replays over a full bottom row that clears with the first lock', () => {
    const field = '_'.repeat(30) + 'X'.repeat(10);
    const { board, result } = solve(field, 'I'.repeat(12), 4);
    if (!result.ok) {
      throw new Error(`expected a solution, got ${result.error}`);
    }
    expect(result.placements.length).toBeLessThanOrEqual(10);
    expect(board.filledCount()).toBe(10);
    expect(replay(board, result.placements).isEmpty()).toBe(true);

    expect(solve(field, 'IIIIIIII', 4).result).toEqual({ ok: false, error: 'NoPcFound' });
  });

  it('reports NoPcFound when the queue cannot cover the board', () => {
    const { result } = solve('_'.repeat(40), 'LJOSZTI', 4);
    expect(result).toEqual({ ok: false, error: 'NoPcFound' });
  });

  it('reports SearchLimitReached when the node budget runs out', () => {
    const { result } = solve('XX________', 'III', 1, new PerfectClearSearch({ nodeLimit: 1 }));
    expect(result).toEqual({ ok: false, error: 'SearchLimitReached' });
  });

  it('reports HeightOutOfRange above the tallest supported clear', () => {
    const { result } = solve('', 'IO', 21);
    expect(result).toEqual({ ok: false, error: 'HeightOutOfRange' });
  });
});

describe('generatePlacements', () => {
  it('lists every resting O on an empty floor once', () => {
    const board = new BitBoard({ width: 10, height: 2 });
    const placements = generatePlacements(board, 'O', 2, SRS_KICKS);
    expect(placements.map((placement) => placement.position)).toEqual(
      [0, 1, 2, 3, 4, 5, 6, 7, 8].map((x) => ({ x, y: 0 })),
    );
    expect(placements.every((placement) => placement.facing === 'up')).toBe(true);
  });

  it('keeps only placements below the ceiling', () => {
    const board = new BitBoard({ width: 10, height: 1 });
    const placements = generatePlacements(board, 'I', 1, SRS_KICKS);
    expect(placements).toHaveLength(7);
    expect(placements.every((placement) => placement.facing === 'up')).toBe(true);
  });

  it('returns nothing when the spawn position is blocked', () => {
    const board = new BitBoard({ width: 10, height: 2 });
    board.fill(4, 2);
    expect(generatePlacements(board, 'T', 2, SRS_KICKS)).toEqual([]);
  });
});
