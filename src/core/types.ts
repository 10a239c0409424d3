export type PieceKind = 'I' | 'O' | 'T' | 'S' | 'Z' | 'L' | 'J';

export type Facing = 'up' | 'right' | 'down' | 'left';

export interface Point {
  x: number;
  y: number;
}

export type PieceQueue = readonly PieceKind[];

export interface Placement {
  readonly kind: PieceKind;
  readonly facing: Facing;
  /** Lower-left corner of the occupied cells' bounding box */
  readonly position: Readonly<Point>;
}

export type KickList = readonly (readonly [number, number])[];

export type KickTable = Readonly<
  Record<PieceKind, Readonly<Partial<Record<Facing, Partial<Record<Facing, KickList>>>>>>
>;

export interface RandomizerContext {
  readonly kind: 'seven-bag';
  /** Queue overflow consulted once hold, current and preview are used up */
  readonly lookahead: readonly PieceKind[];
}

export interface GameState {
  readonly hold: PieceKind | null;
  readonly current: PieceKind;
  readonly preview: readonly PieceKind[];
  readonly randomizer: RandomizerContext;
  readonly rotationSystem: KickTable;
  readonly board: Board;
}

// Implemented by BitBoard in ./board
export interface Board {
  readonly width: number;
  readonly height: number;
  readonly rows: Uint16Array;
  clone(): Board;
  isOccupied(x: number, y: number): boolean;
  fill(x: number, y: number): void;
  lockCells(cells: readonly Point[]): void;
  clearLines(): number;
  filledCount(): number;
  stackHeight(): number;
  isEmpty(): boolean;
  emptyRegionSizes(height: number): number[];
}
