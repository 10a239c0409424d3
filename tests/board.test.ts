import { describe, expect, it } from 'vitest';

import { BitBoard, STANDARD_BOARD } from '../src/core/board';
import { getAbsoluteCells, parsePieceCode, rotate } from '../src/core/pieces';

function fillRow(board: BitBoard, y: number, except: number[] = []): void {
  for (let x = 0; x < board.width; x += 1) {
    if (!except.includes(x)) {
      board.fill(x, y);
    }
  }
}

describe('BitBoard', () => {
  it('clears full lines and drops the rows above', () => {
    const board = new BitBoard(STANDARD_BOARD);
    fillRow(board, 0);
    fillRow(board, 1);
    board.fill(5, 2);
    expect(board.clearLines()).toBe(2);
    expect(board.isOccupied(5, 0)).toBe(true);
    expect(board.filledCount()).toBe(1);
    expect(board.stackHeight()).toBe(1);
  });

  it('treats cells outside the board as occupied', () => {
    const board = new BitBoard({ width: 10, height: 4 });
    expect(board.isOccupied(-1, 0)).toBe(true);
    expect(board.isOccupied(10, 0)).toBe(true);
    expect(board.isOccupied(0, -1)).toBe(true);
    expect(board.isOccupied(0, 0)).toBe(false);
  });

  it('never sets padding bits', () => {
    const board = new BitBoard({ width: 10, height: 1 });
    fillRow(board, 0);
    expect(board.rows[0]).toBe(0x3ff);
  });

  it('measures empty regions below a ceiling', () => {
    const board = new BitBoard({ width: 10, height: 2 });
    fillRow(board, 0, [0, 1, 2, 6]);
    fillRow(board, 1, [0, 1, 2, 6]);
    expect(board.emptyRegionSizes(2).sort((a, b) => a - b)).toEqual([2, 6]);
  });

  it('clones independently', () => {
    const board = new BitBoard({ width: 10, height: 4 });
    const copy = board.clone();
    copy.fill(0, 0);
    expect(board.isEmpty()).toBe(true);
    expect(copy.isEmpty()).toBe(false);
  });
});

describe('pieces', () => {
  it('places canonical cells from the lower-left corner', () => {
    expect(getAbsoluteCells('I', 'right', { x: 9, y: 0 })).toEqual([
      { x: 9, y: 3 },
      { x: 9, y: 2 },
      { x: 9, y: 1 },
      { x: 9, y: 0 },
    ]);
    expect(getAbsoluteCells('O', 'up', { x: 8, y: 0 })).toEqual([
      { x: 8, y: 1 },
      { x: 9, y: 1 },
      { x: 8, y: 0 },
      { x: 9, y: 0 },
    ]);
  });

  it('parses piece letters in either case', () => {
    expect(parsePieceCode('t'.charCodeAt(0))).toBe('T');
    expect(parsePieceCode('J'.charCodeAt(0))).toBe('J');
    expect(parsePieceCode('q'.charCodeAt(0))).toBeNull();
  });

  it('rotates through the four facings', () => {
    expect(rotate('up', 1)).toBe('right');
    expect(rotate('up', -1)).toBe('left');
    expect(rotate('left', 1)).toBe('up');
  });
});
