/**
 * Reachable placements
 *
 * Breadth-first search over shift, soft drop and SRS rotations, starting
 * from the spawn position just above the perfect-clear ceiling. A placement
 * is kept when the piece rests on something and every cell sits below the
 * ceiling. Facings that cover the same cells collapse into one placement.
 */

import { ENGINE_CONFIG } from '../config/engine_config';
import { FACINGS, getCanonicalShape, rotate } from '../core/pieces';
import { Board, Facing, KickTable, PieceKind, Placement } from '../core/types';

interface PieceState {
  facing: Facing;
  x: number;
  y: number;
}

const NO_KICK: readonly (readonly [number, number])[] = [[0, 0]];

function stateKey(state: PieceState): number {
  return (FACINGS.indexOf(state.facing) * 64 + (state.x + 16)) * 64 + (state.y + 16);
}

function canPlace(board: Board, kind: PieceKind, state: PieceState): boolean {
  const { cells } = getCanonicalShape(kind, state.facing);
  return cells.every((cell) => !board.isOccupied(state.x + cell.x, state.y + cell.y));
}

function topRow(kind: PieceKind, state: PieceState): number {
  const { cells } = getCanonicalShape(kind, state.facing);
  return state.y + Math.max(...cells.map((cell) => cell.y));
}

function footprintKey(kind: PieceKind, state: PieceState): string {
  const { cells } = getCanonicalShape(kind, state.facing);
  return cells
    .map((cell) => `${state.x + cell.x},${state.y + cell.y}`)
    .sort()
    .join(';');
}

function rotateState(
  board: Board,
  kind: PieceKind,
  state: PieceState,
  delta: number,
  kicks: KickTable,
): PieceState | null {
  const target = rotate(state.facing, delta);
  const from = getCanonicalShape(kind, state.facing).boxOffset;
  const to = getCanonicalShape(kind, target).boxOffset;
  const boxX = state.x - from.x;
  const boxY = state.y - from.y;
  const kickList = kicks[kind][state.facing]?.[target] ?? NO_KICK;
  for (const [dx, dy] of kickList) {
    const candidate: PieceState = {
      facing: target,
      x: boxX + dx + to.x,
      y: boxY + dy + to.y,
    };
    if (canPlace(board, kind, candidate)) {
      return candidate;
    }
  }
  return null;
}

function spawnState(kind: PieceKind, ceiling: number): PieceState {
  const offset = getCanonicalShape(kind, 'up').boxOffset;
  return { facing: 'up', x: ENGINE_CONFIG.spawnColumn + offset.x, y: ceiling };
}

export function generatePlacements(
  board: Board,
  kind: PieceKind,
  ceiling: number,
  kicks: KickTable,
): Placement[] {
  const start = spawnState(kind, ceiling);
  if (!canPlace(board, kind, start)) {
    return [];
  }

  const visited = new Set<number>([stateKey(start)]);
  const queue: PieceState[] = [start];
  const resting = new Map<string, PieceState>();

  for (let head = 0; head < queue.length; head += 1) {
    const state = queue[head];
    if (!state) {
      break;
    }
    const below: PieceState = { ...state, y: state.y - 1 };
    if (!canPlace(board, kind, below) && topRow(kind, state) < ceiling) {
      const key = footprintKey(kind, state);
      const existing = resting.get(key);
      if (!existing || FACINGS.indexOf(state.facing) < FACINGS.indexOf(existing.facing)) {
        resting.set(key, state);
      }
    }

    const moves: (PieceState | null)[] = [
      { ...state, x: state.x - 1 },
      { ...state, x: state.x + 1 },
      below,
      rotateState(board, kind, state, 1, kicks),
      rotateState(board, kind, state, -1, kicks),
    ];
    for (const next of moves) {
      if (!next || visited.has(stateKey(next)) || !canPlace(board, kind, next)) {
        continue;
      }
      visited.add(stateKey(next));
      queue.push(next);
    }
  }

  return [...resting.values()]
    .sort(
      (a, b) =>
        FACINGS.indexOf(a.facing) - FACINGS.indexOf(b.facing) || a.y - b.y || a.x - b.x,
    )
    .map((state) => ({
      kind,
      facing: state.facing,
      position: { x: state.x, y: state.y },
    }));
}
