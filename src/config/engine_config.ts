/**
 * Engine constants
 *
 * Dimensions and capacities owned by the rules engine. The boundary code reads
 * them from here instead of repeating the numbers.
 */

export interface EngineConfig {
  /** Columns per row */
  boardWidth: number;

  /** Rows the bitboard can store */
  maxBoardHeight: number;

  /** Rows kept free above the tallest perfect clear for spawning */
  spawnRows: number;

  /** Explicit preview slots after hold and current */
  previewCapacity: number;

  /** Pieces accepted from one queue string */
  queueCapacity: number;

  /** Box column a piece spawns in */
  spawnColumn: number;
}

export const ENGINE_CONFIG: EngineConfig = {
  boardWidth: 10,
  maxBoardHeight: 24,
  spawnRows: 4,
  previewCapacity: 7,
  queueCapacity: 16,
  spawnColumn: 3,
};

/** Tallest perfect clear the engine can search */
export const MAX_PC_HEIGHT = ENGINE_CONFIG.maxBoardHeight - ENGINE_CONFIG.spawnRows;

export const CELLS_PER_PIECE = 4;
