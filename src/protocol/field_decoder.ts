import { ENGINE_CONFIG } from '../config/engine_config';
import { BitBoard } from '../core/board';

const FILLED_UPPER = 0x58; // 'X'
const FILLED_LOWER = 0x78; // 'x'

export function isFilledCode(code: number): boolean {
  return code === FILLED_UPPER || code === FILLED_LOWER;
}

/**
 * Decode a field string, top row first, into a bitboard.
 *
 * Bytes past `height * width` keep writing into row 0; rows outside the
 * engine's storage are dropped.
 */
export function decodeField(
  bytes: Uint8Array,
  height: number,
  target: BitBoard = new BitBoard({ width: ENGINE_CONFIG.boardWidth, height }),
): BitBoard {
  target.reset();
  let x = 0;
  let y = height - 1;
  for (const code of bytes) {
    if (isFilledCode(code) && y >= 0 && y < ENGINE_CONFIG.maxBoardHeight) {
      target.fill(x, y);
    }
    x += 1;
    if (x >= target.width) {
      x = 0;
      if (y > 0) {
        y -= 1;
      }
    }
  }
  return target;
}

/** Inverse of decodeField; rows the engine does not store come out empty. */
export function encodeField(board: BitBoard, height: number): string {
  let text = '';
  for (let y = height - 1; y >= 0; y -= 1) {
    for (let x = 0; x < board.width; x += 1) {
      text += board.isInside(x, y) && board.isOccupied(x, y) ? 'X' : '_';
    }
  }
  return text;
}
