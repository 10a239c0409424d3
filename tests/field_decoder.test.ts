import { describe, expect, it } from 'vitest';

import { BitBoard } from '../src/core/board';
import { decodeField, encodeField, isFilledCode } from '../src/protocol/field_decoder';

function bytes(text: string): Uint8Array {
  return Buffer.from(text, 'latin1');
}

describe('decodeField', () => {
  it('reads the top row first and packs column 0 into the high bit', () => {
    const board = decodeField(bytes('XXXXXX____'), 1);
    expect(board.rows[0]).toBe(0b1111110000);
    expect(board.isOccupied(0, 0)).toBe(true);
    expect(board.isOccupied(6, 0)).toBe(false);
  });

  it('places the first row of a two-row field above the second', () => {
    const board = decodeField(bytes('X_________' + '_________X'), 2);
    expect(board.isOccupied(0, 1)).toBe(true);
    expect(board.isOccupied(9, 0)).toBe(true);
    expect(board.filledCount()).toBe(2);
  });

  it('accepts lowercase x and treats every other byte as empty', () => {
    const board = decodeField(bytes('xX_.#0 OIz'), 1);
    expect(board.isOccupied(0, 0)).toBe(true);
    expect(board.isOccupied(1, 0)).toBe(true);
    expect(board.filledCount()).toBe(2);
  });

  it('tolerates a trailing partial row', () => {
    const board = decodeField(bytes('X'), 2);
    expect(board.isOccupied(0, 1)).toBe(true);
    expect(board.filledCount()).toBe(1);
  });

  it('keeps writing into row 0 when the field is longer than height * width', () => {
    const board = decodeField(bytes('__________' + 'X'), 1);
    expect(board.isOccupied(0, 0)).toBe(true);
    expect(board.filledCount()).toBe(1);
  });

  it('drops rows above the engine maximum height', () => {
    const board = decodeField(bytes('X'.repeat(300)), 30);
    expect(board.filledCount()).toBe(240);
    expect(board.stackHeight()).toBe(24);
  });

  it('writes nothing for height 0', () => {
    const board = decodeField(bytes('XXXX'), 0);
    expect(board.isEmpty()).toBe(true);
  });

  it('resets a reused target board', () => {
    const target = new BitBoard({ width: 10, height: 1 });
    target.fill(9, 0);
    decodeField(bytes('X'), 1, target);
    expect(target.isOccupied(9, 0)).toBe(false);
    expect(target.isOccupied(0, 0)).toBe(true);
  });

  it('renders rows above the engine maximum as empty', () => {
    const text = encodeField(decodeField(bytes('X'.repeat(300)), 30), 30);
    expect(text.slice(0, 60)).toBe('_'.repeat(60));
    expect(text.slice(60)).toBe('X'.repeat(240));
  });

  it('round-trips through encodeField', () => {
    const field = 'X_X_X_X_X_' + '__XXXX____';
    expect(encodeField(decodeField(bytes(field), 2), 2)).toBe(field);
  });
});

describe('isFilledCode', () => {
  it('matches only X and x', () => {
    expect(isFilledCode(0x58)).toBe(true);
    expect(isFilledCode(0x78)).toBe(true);
    expect(isFilledCode(0x5f)).toBe(false);
  });
});
