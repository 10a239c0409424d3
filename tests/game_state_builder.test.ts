import { describe, expect, it } from 'vitest';

import { BitBoard } from '../src/core/board';
import { SRS_KICKS } from '../src/core/pieces';
import type { PieceKind } from '../src/core/types';
import {
  buildGameState,
  countPieces,
  pieceSequence,
} from '../src/protocol/game_state_builder';

function emptyBoard(height = 4): BitBoard {
  return new BitBoard({ width: 10, height });
}

describe('buildGameState', () => {
  it('assigns hold, current and preview in queue order', () => {
    const queue: PieceKind[] = ['L', 'J', 'O', 'S', 'Z', 'T', 'I'];
    const result = buildGameState(emptyBoard(), queue);
    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.state.hold).toBe('L');
    expect(result.state.current).toBe('J');
    expect(result.state.preview).toEqual(['O', 'S', 'Z', 'T', 'I']);
    expect(result.state.randomizer).toEqual({ kind: 'seven-bag', lookahead: [] });
    expect(result.state.rotationSystem).toBe(SRS_KICKS);
  });

  it('spills pieces past the preview window into the bag lookahead', () => {
    const queue: PieceKind[] = ['I', 'O', 'T', 'S', 'Z', 'L', 'J', 'I', 'O', 'T', 'S', 'Z'];
    const result = buildGameState(emptyBoard(), queue);
    if (!result.ok) {
      throw new Error('expected a game state');
    }
    expect(result.state.preview).toEqual(['T', 'S', 'Z', 'L', 'J', 'I', 'O']);
    expect(result.state.randomizer.lookahead).toEqual(['T', 'S', 'Z']);
    expect(pieceSequence(result.state)).toEqual(queue.slice(1));
    expect(countPieces(result.state)).toBe(12);
  });

  it('leaves the preview empty for exactly two pieces', () => {
    const result = buildGameState(emptyBoard(), ['I', 'O']);
    if (!result.ok) {
      throw new Error('expected a game state');
    }
    expect(result.state.preview).toEqual([]);
    expect(countPieces(result.state)).toBe(2);
  });

  it('rejects an empty queue', () => {
    expect(buildGameState(emptyBoard(), [])).toEqual({
      ok: false,
      error: { kind: 'NoValidPieces' },
    });
  });

  it('rejects a single piece', () => {
    expect(buildGameState(emptyBoard(), ['T'])).toEqual({
      ok: false,
      error: { kind: 'InsufficientPieces' },
    });
  });

  it('copies the board', () => {
    const board = emptyBoard();
    const result = buildGameState(board, ['I', 'O']);
    board.fill(0, 0);
    if (!result.ok) {
      throw new Error('expected a game state');
    }
    expect(result.state.board.isEmpty()).toBe(true);
  });
});
