import { Placement, PieceKind } from '../core/types';
import { rotationName, SfinderRotation, toRotationCenter } from './coordinate_transform';

export interface WireRecord {
  readonly piece: PieceKind;
  readonly rotate: SfinderRotation;
  readonly x: number;
  readonly y: number;
}

export function encodePlacement(placement: Placement): WireRecord {
  const center = toRotationCenter(placement.kind, placement.facing, placement.position);
  return {
    piece: placement.kind,
    rotate: rotationName(placement.facing),
    x: center.x,
    y: center.y,
  };
}

// Key order is part of the wire format.
export function formatRecord(record: WireRecord): string {
  return JSON.stringify({
    piece: record.piece,
    rotate: record.rotate,
    x: record.x,
    y: record.y,
  });
}
