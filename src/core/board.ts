import { ENGINE_CONFIG } from '../config/engine_config';
import { Board, Point } from './types';

export interface BoardDimensions {
  width: number;
  height: number;
}

// Column 0 sits on the highest usable bit of a row, column width-1 on bit 0.
export class BitBoard implements Board {
  public readonly width: number;
  public readonly height: number;
  public readonly rows: Uint16Array;
  private readonly rowMask: number;

  constructor(dimensions: BoardDimensions = STANDARD_BOARD) {
    this.width = dimensions.width;
    this.height = Math.max(
      0,
      Math.min(dimensions.height, ENGINE_CONFIG.maxBoardHeight),
    );
    this.rows = new Uint16Array(ENGINE_CONFIG.maxBoardHeight);
    this.rowMask = (1 << this.width) - 1;
  }

  clone(): BitBoard {
    const copy = new BitBoard({ width: this.width, height: this.height });
    copy.rows.set(this.rows);
    return copy;
  }

  columnBit(x: number): number {
    return 1 << (this.width - 1 - x);
  }

  isInside(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.rows.length;
  }

  isOccupied(x: number, y: number): boolean {
    if (!this.isInside(x, y)) {
      return true;
    }
    return ((this.rows[y] ?? 0) & this.columnBit(x)) !== 0;
  }

  fill(x: number, y: number): void {
    if (!this.isInside(x, y)) {
      throw new Error(`Coordinates (${x}, ${y}) are outside of the board`);
    }
    this.rows[y] = (this.rows[y] ?? 0) | this.columnBit(x);
  }

  reset(): void {
    this.rows.fill(0);
  }

  lockCells(cells: readonly Point[]): void {
    for (const { x, y } of cells) {
      if (!this.isInside(x, y)) {
        throw new Error(`Lock outside board: (${x}, ${y})`);
      }
      this.fill(x, y);
    }
  }

  clearLines(): number {
    let write = 0;
    for (let read = 0; read < this.rows.length; read += 1) {
      const row = this.rows[read] ?? 0;
      if (row !== this.rowMask) {
        this.rows[write] = row;
        write += 1;
      }
    }
    const cleared = this.rows.length - write;
    this.rows.fill(0, write);
    return cleared;
  }

  filledCount(): number {
    let count = 0;
    for (const row of this.rows) {
      let bits = row;
      while (bits !== 0) {
        bits &= bits - 1;
        count += 1;
      }
    }
    return count;
  }

  stackHeight(): number {
    for (let y = this.rows.length - 1; y >= 0; y -= 1) {
      if ((this.rows[y] ?? 0) !== 0) {
        return y + 1;
      }
    }
    return 0;
  }

  isEmpty(): boolean {
    return this.rows.every((row) => row === 0);
  }

  /**
   * Sizes of the 4-connected empty regions below `height`.
   */
  emptyRegionSizes(height: number): number[] {
    const limit = Math.min(height, this.rows.length);
    const visited = new Uint8Array(limit * this.width);
    const sizes: number[] = [];
    for (let y = 0; y < limit; y += 1) {
      for (let x = 0; x < this.width; x += 1) {
        if (visited[y * this.width + x] || this.isOccupied(x, y)) {
          continue;
        }
        let size = 0;
        const stack: Point[] = [{ x, y }];
        visited[y * this.width + x] = 1;
        for (let cell = stack.pop(); cell; cell = stack.pop()) {
          size += 1;
          for (const [dx, dy] of NEIGHBOURS) {
            const nx = cell.x + dx;
            const ny = cell.y + dy;
            if (nx < 0 || nx >= this.width || ny < 0 || ny >= limit) {
              continue;
            }
            const index = ny * this.width + nx;
            if (visited[index] || this.isOccupied(nx, ny)) {
              continue;
            }
            visited[index] = 1;
            stack.push({ x: nx, y: ny });
          }
        }
        sizes.push(size);
      }
    }
    return sizes;
  }
}

const NEIGHBOURS: readonly (readonly [number, number])[] = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1],
];

export const STANDARD_BOARD: BoardDimensions = {
  width: ENGINE_CONFIG.boardWidth,
  height: ENGINE_CONFIG.maxBoardHeight,
};
