import type { Board } from '../core/types';

export interface FeatureVector {
  readonly values: Record<string, number>;
}

export interface ColumnMetrics {
  heights: number[];
  holes: number;
  wellDepth: number;
}

/**
 * Board features below the perfect-clear ceiling, normalised by its area.
 */
export function computeFeatures(
  board: Board,
  ceiling: number,
  linesCleared: number,
): FeatureVector {
  const area = board.width * ceiling || 1;
  const metrics = analyzeColumns(board, ceiling);
  const maxHeight = metrics.heights.length > 0 ? Math.max(...metrics.heights) : 0;

  const values: Record<string, number> = {
    bias: 1,
    lines_cleared: linesCleared / 4,
    holes: metrics.holes / area,
    bumpiness: computeBumpiness(metrics.heights) / area,
    wells: metrics.wellDepth / area,
    max_height: maxHeight / (ceiling || 1),
    row_transitions: countRowTransitions(board, ceiling) / area,
    occupancy: board.filledCount() / area,
    perfect_clear: board.isEmpty() ? 1 : 0,
  };

  return { values };
}

export function analyzeColumns(board: Board, ceiling: number): ColumnMetrics {
  const heights = new Array<number>(board.width).fill(0);
  let holes = 0;
  let wellDepth = 0;

  for (let x = 0; x < board.width; x += 1) {
    let seenBlock = false;
    for (let y = ceiling - 1; y >= 0; y -= 1) {
      if (board.isOccupied(x, y)) {
        if (!seenBlock) {
          heights[x] = y + 1;
          seenBlock = true;
        }
      } else if (seenBlock) {
        holes += 1;
      }
    }
  }

  for (let x = 0; x < board.width; x += 1) {
    const current = heights[x] ?? 0;
    const left = x === 0 ? ceiling : heights[x - 1] ?? ceiling;
    const right = x === board.width - 1 ? ceiling : heights[x + 1] ?? ceiling;
    if (current < left && current < right) {
      wellDepth += Math.min(left, right) - current;
    }
  }

  return { heights, holes, wellDepth };
}

function computeBumpiness(heights: number[]): number {
  let bumpiness = 0;
  for (let x = 1; x < heights.length; x += 1) {
    bumpiness += Math.abs((heights[x] ?? 0) - (heights[x - 1] ?? 0));
  }
  return bumpiness;
}

function countRowTransitions(board: Board, ceiling: number): number {
  let transitions = 0;
  for (let y = 0; y < ceiling; y += 1) {
    // walls count as filled
    let previous = true;
    for (let x = 0; x < board.width; x += 1) {
      const filled = board.isOccupied(x, y);
      if (filled !== previous) {
        transitions += 1;
      }
      previous = filled;
    }
    if (!previous) {
      transitions += 1;
    }
  }
  return transitions;
}
