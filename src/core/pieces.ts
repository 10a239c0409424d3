import { Facing, KickList, KickTable, PieceKind, Point } from './types';

type ShapeMatrix = readonly (readonly [number, number])[];

type FacingMap = Record<Facing, ShapeMatrix>;

type PieceShapeMap = Record<PieceKind, FacingMap>;

export const FACINGS: readonly Facing[] = ['up', 'right', 'down', 'left'];

export const PIECE_KINDS: readonly PieceKind[] = ['I', 'O', 'T', 'S', 'Z', 'L', 'J'];

const PIECE_CODES: Readonly<Record<string, PieceKind>> = {
  I: 'I',
  O: 'O',
  T: 'T',
  S: 'S',
  Z: 'Z',
  L: 'L',
  J: 'J',
};

export function parsePieceCode(code: number): PieceKind | null {
  return PIECE_CODES[String.fromCharCode(code).toUpperCase()] ?? null;
}

// Shapes are drawn top row first inside a BOX_SIZE square, as in the guideline charts.
const BOX_SIZE: Record<PieceKind, number> = {
  I: 4,
  O: 3,
  T: 3,
  S: 3,
  Z: 3,
  L: 3,
  J: 3,
};

export const PIECE_SHAPES: PieceShapeMap = {
  I: {
    up: [
      [0, 1],
      [1, 1],
      [2, 1],
      [3, 1],
    ],
    right: [
      [2, 0],
      [2, 1],
      [2, 2],
      [2, 3],
    ],
    down: [
      [0, 2],
      [1, 2],
      [2, 2],
      [3, 2],
    ],
    left: [
      [1, 0],
      [1, 1],
      [1, 2],
      [1, 3],
    ],
  },
  O: {
    up: [
      [1, 0],
      [2, 0],
      [1, 1],
      [2, 1],
    ],
    right: [
      [1, 0],
      [2, 0],
      [1, 1],
      [2, 1],
    ],
    down: [
      [1, 0],
      [2, 0],
      [1, 1],
      [2, 1],
    ],
    left: [
      [1, 0],
      [2, 0],
      [1, 1],
      [2, 1],
    ],
  },
  T: {
    up: [
      [1, 0],
      [0, 1],
      [1, 1],
      [2, 1],
    ],
    right: [
      [1, 0],
      [1, 1],
      [2, 1],
      [1, 2],
    ],
    down: [
      [0, 1],
      [1, 1],
      [2, 1],
      [1, 2],
    ],
    left: [
      [1, 0],
      [0, 1],
      [1, 1],
      [1, 2],
    ],
  },
  S: {
    up: [
      [1, 0],
      [2, 0],
      [0, 1],
      [1, 1],
    ],
    right: [
      [1, 0],
      [1, 1],
      [2, 1],
      [2, 2],
    ],
    down: [
      [1, 1],
      [2, 1],
      [0, 2],
      [1, 2],
    ],
    left: [
      [0, 0],
      [0, 1],
      [1, 1],
      [1, 2],
    ],
  },
  Z: {
    up: [
      [0, 0],
      [1, 0],
      [1, 1],
      [2, 1],
    ],
    right: [
      [2, 0],
      [1, 1],
      [2, 1],
      [1, 2],
    ],
    down: [
      [0, 1],
      [1, 1],
      [1, 2],
      [2, 2],
    ],
    left: [
      [1, 0],
      [0, 1],
      [1, 1],
      [0, 2],
    ],
  },
  J: {
    up: [
      [0, 0],
      [0, 1],
      [1, 1],
      [2, 1],
    ],
    right: [
      [1, 0],
      [2, 0],
      [1, 1],
      [1, 2],
    ],
    down: [
      [0, 1],
      [1, 1],
      [2, 1],
      [2, 2],
    ],
    left: [
      [1, 0],
      [1, 1],
      [0, 2],
      [1, 2],
    ],
  },
  L: {
    up: [
      [2, 0],
      [0, 1],
      [1, 1],
      [2, 1],
    ],
    right: [
      [1, 0],
      [1, 1],
      [1, 2],
      [2, 2],
    ],
    down: [
      [0, 1],
      [1, 1],
      [2, 1],
      [0, 2],
    ],
    left: [
      [0, 0],
      [1, 0],
      [1, 1],
      [1, 2],
    ],
  },
};

// Offsets are y-up: a positive dy moves the piece towards the top of the board.
function standardKickTable(): Partial<Record<Facing, Partial<Record<Facing, KickList>>>> {
  return {
    up: {
      right: [
        [0, 0],
        [-1, 0],
        [-1, 1],
        [0, -2],
        [-1, -2],
      ],
      left: [
        [0, 0],
        [1, 0],
        [1, 1],
        [0, -2],
        [1, -2],
      ],
    },
    right: {
      up: [
        [0, 0],
        [1, 0],
        [1, -1],
        [0, 2],
        [1, 2],
      ],
      down: [
        [0, 0],
        [1, 0],
        [1, -1],
        [0, 2],
        [1, 2],
      ],
    },
    down: {
      right: [
        [0, 0],
        [-1, 0],
        [-1, 1],
        [0, -2],
        [-1, -2],
      ],
      left: [
        [0, 0],
        [1, 0],
        [1, 1],
        [0, -2],
        [1, -2],
      ],
    },
    left: {
      up: [
        [0, 0],
        [-1, 0],
        [-1, -1],
        [0, 2],
        [-1, 2],
      ],
      down: [
        [0, 0],
        [-1, 0],
        [-1, -1],
        [0, 2],
        [-1, 2],
      ],
    },
  };
}

export const SRS_KICKS: KickTable = {
  I: {
    up: {
      right: [
        [0, 0],
        [-2, 0],
        [1, 0],
        [-2, -1],
        [1, 2],
      ],
      left: [
        [0, 0],
        [-1, 0],
        [2, 0],
        [-1, 2],
        [2, -1],
      ],
    },
    right: {
      up: [
        [0, 0],
        [2, 0],
        [-1, 0],
        [2, 1],
        [-1, -2],
      ],
      down: [
        [0, 0],
        [-1, 0],
        [2, 0],
        [-1, 2],
        [2, -1],
      ],
    },
    down: {
      right: [
        [0, 0],
        [1, 0],
        [-2, 0],
        [1, -2],
        [-2, 1],
      ],
      left: [
        [0, 0],
        [2, 0],
        [-1, 0],
        [2, 1],
        [-1, -2],
      ],
    },
    left: {
      up: [
        [0, 0],
        [1, 0],
        [-2, 0],
        [1, -2],
        [-2, 1],
      ],
      down: [
        [0, 0],
        [-2, 0],
        [1, 0],
        [-2, -1],
        [1, 2],
      ],
    },
  },
  O: {
    up: { right: [[0, 0]], left: [[0, 0]] },
    right: { up: [[0, 0]], down: [[0, 0]] },
    down: { right: [[0, 0]], left: [[0, 0]] },
    left: { up: [[0, 0]], down: [[0, 0]] },
  },
  J: standardKickTable(),
  L: standardKickTable(),
  S: standardKickTable(),
  Z: standardKickTable(),
  T: standardKickTable(),
};

export interface CanonicalShape {
  /** Cells relative to the lower-left corner of their bounding box, y-up */
  readonly cells: readonly Point[];
  /** Position of that corner inside the rotation box, y-up */
  readonly boxOffset: Point;
}

function buildCanonicalShape(kind: PieceKind, facing: Facing): CanonicalShape {
  const size = BOX_SIZE[kind];
  const flipped = PIECE_SHAPES[kind][facing].map(([dx, dy]) => ({
    x: dx,
    y: size - 1 - dy,
  }));
  const minX = Math.min(...flipped.map((cell) => cell.x));
  const minY = Math.min(...flipped.map((cell) => cell.y));
  return {
    cells: flipped.map((cell) => ({ x: cell.x - minX, y: cell.y - minY })),
    boxOffset: { x: minX, y: minY },
  };
}

function buildFacingShapes(kind: PieceKind): Record<Facing, CanonicalShape> {
  return {
    up: buildCanonicalShape(kind, 'up'),
    right: buildCanonicalShape(kind, 'right'),
    down: buildCanonicalShape(kind, 'down'),
    left: buildCanonicalShape(kind, 'left'),
  };
}

const CANONICAL_SHAPES: Record<PieceKind, Record<Facing, CanonicalShape>> = {
  I: buildFacingShapes('I'),
  O: buildFacingShapes('O'),
  T: buildFacingShapes('T'),
  S: buildFacingShapes('S'),
  Z: buildFacingShapes('Z'),
  L: buildFacingShapes('L'),
  J: buildFacingShapes('J'),
};

export function getCanonicalShape(kind: PieceKind, facing: Facing): CanonicalShape {
  return CANONICAL_SHAPES[kind][facing];
}

export function getAbsoluteCells(
  kind: PieceKind,
  facing: Facing,
  position: Readonly<Point>,
): Point[] {
  return CANONICAL_SHAPES[kind][facing].cells.map((cell) => ({
    x: position.x + cell.x,
    y: position.y + cell.y,
  }));
}

export function rotate(facing: Facing, delta: number): Facing {
  const index = FACINGS.indexOf(facing);
  const next = FACINGS[((index + delta) % 4 + 4) % 4];
  return next ?? facing;
}
