/**
 * Solver module
 *
 * The host-facing entry points over one linear memory. Inputs arrive as
 * (pointer, length) pairs into the heap; `findPath` answers with a pointer to
 * the static output region, which stays valid until the next `findPath`.
 *
 * Calls never overlap: an entry point invoked while another is running
 * throws ReentrantCallError before touching memory.
 */

import type { RuntimeConfig } from '../config/runtime_config';
import { BitBoard, STANDARD_BOARD } from '../core/board';
import type { GameState } from '../core/types';
import { ReentrantCallError, SolveOutcome } from '../protocol/errors';
import { decodeField } from '../protocol/field_decoder';
import { buildGameState } from '../protocol/game_state_builder';
import { decodeQueue } from '../protocol/queue_decoder';
import { ResultBuffer, scanLength } from '../protocol/result_buffer';
import { PerfectClearSearch, PerfectClearSolver } from '../solver/perfect_clear_search';
import { createModelLoader, ScoringModelLoader } from '../solver/scoring_model';
import { invokeSolver } from '../solver/solver_invoker';
import { LinearMemory, MemoryLayout } from './linear_memory';

export interface SolverModuleOptions extends MemoryLayout {
  solver: PerfectClearSolver;
  loadModel: ScoringModelLoader;
}

type PrepareResult =
  | { ok: true; state: GameState; height: number; queueLength: number }
  | { ok: false; outcome: SolveOutcome };

export function normalizeHeight(height: number): number {
  if (!Number.isFinite(height) || height <= 0) {
    return 0;
  }
  return Math.floor(height);
}

export class SolverModule {
  readonly memory: LinearMemory;
  private readonly output: ResultBuffer;
  // decode target reused by every call; buildGameState hands the solver a copy
  private readonly fieldBoard = new BitBoard(STANDARD_BOARD);
  private readonly solver: PerfectClearSolver;
  private readonly loadModel: ScoringModelLoader;
  private busy = false;

  constructor(options: Partial<SolverModuleOptions> = {}) {
    this.memory = new LinearMemory({
      outputCapacity: options.outputCapacity,
      heapBytes: options.heapBytes,
    });
    this.output = new ResultBuffer(this.memory.outputRegion());
    this.solver = options.solver ?? new PerfectClearSearch();
    this.loadModel = options.loadModel ?? createModelLoader();
  }

  findPath(
    fieldPtr: number,
    fieldLen: number,
    piecesPtr: number,
    piecesLen: number,
    height: number,
  ): number {
    return this.exclusive('findPath', () => {
      const outcome = this.solve(fieldPtr, fieldLen, piecesPtr, piecesLen, height);
      this.output.writeOutcome(outcome);
      return this.memory.outputPointer;
    });
  }

  checkPCPossible(
    fieldPtr: number,
    fieldLen: number,
    piecesPtr: number,
    piecesLen: number,
    height: number,
  ): 0 | 1 {
    return this.exclusive('checkPCPossible', () =>
      this.solve(fieldPtr, fieldLen, piecesPtr, piecesLen, height).ok ? 1 : 0,
    );
  }

  getResultLength(pointer: number): number {
    return this.exclusive('getResultLength', () =>
      scanLength(this.memory.bytes, pointer, this.memory.outputCapacity),
    );
  }

  alloc(length: number): number | null {
    return this.exclusive('alloc', () => this.memory.alloc(length));
  }

  dealloc(pointer: number, length: number): void {
    this.exclusive('dealloc', () => this.memory.dealloc(pointer, length));
  }

  private solve(
    fieldPtr: number,
    fieldLen: number,
    piecesPtr: number,
    piecesLen: number,
    height: number,
  ): SolveOutcome {
    const prepared = this.prepare(fieldPtr, fieldLen, piecesPtr, piecesLen, height);
    if (!prepared.ok) {
      return prepared.outcome;
    }
    return invokeSolver(
      prepared.state,
      { height: prepared.height, queueLength: prepared.queueLength },
      { solver: this.solver, loadModel: this.loadModel },
    );
  }

  private prepare(
    fieldPtr: number,
    fieldLen: number,
    piecesPtr: number,
    piecesLen: number,
    rawHeight: number,
  ): PrepareResult {
    const height = normalizeHeight(rawHeight);
    const field = this.memory.read(fieldPtr, fieldLen);
    const pieces = this.memory.read(piecesPtr, piecesLen);

    const board = decodeField(field, height, this.fieldBoard);
    const queue = decodeQueue(pieces);
    const built = buildGameState(board, queue);
    if (!built.ok) {
      return { ok: false, outcome: built };
    }
    return { ok: true, state: built.state, height, queueLength: queue.length };
  }

  private exclusive<T>(entryPoint: string, call: () => T): T {
    if (this.busy) {
      throw new ReentrantCallError(entryPoint);
    }
    this.busy = true;
    try {
      return call();
    } finally {
      this.busy = false;
    }
  }
}

export function createSolverModule(config: RuntimeConfig): SolverModule {
  return new SolverModule({
    outputCapacity: config.outputCapacity,
    heapBytes: config.heapBytes,
    solver: new PerfectClearSearch({ nodeLimit: config.nodeLimit }),
    loadModel: createModelLoader(config.modelPath),
  });
}
