import { NULL_POINTER } from './linear_memory';
import type { SolverModule } from './solver_module';

interface Region {
  pointer: number;
  length: number;
}

/**
 * String-level wrapper around a SolverModule.
 *
 * Each call copies its inputs into the module's heap, runs one entry point,
 * copies the payload out of the output region and frees the inputs again.
 */
export class SolverClient {
  constructor(private readonly module: SolverModule) {}

  findPath(field: string, pieces: string, height: number): string {
    return this.withInputs(field, pieces, (fieldRegion, piecesRegion) => {
      const pointer = this.module.findPath(
        fieldRegion.pointer,
        fieldRegion.length,
        piecesRegion.pointer,
        piecesRegion.length,
        height,
      );
      const length = this.module.getResultLength(pointer);
      return Buffer.from(this.module.memory.read(pointer, length)).toString('latin1');
    });
  }

  checkPCPossible(field: string, pieces: string, height: number): boolean {
    return this.withInputs(
      field,
      pieces,
      (fieldRegion, piecesRegion) =>
        this.module.checkPCPossible(
          fieldRegion.pointer,
          fieldRegion.length,
          piecesRegion.pointer,
          piecesRegion.length,
          height,
        ) === 1,
    );
  }

  private withInputs<T>(
    field: string,
    pieces: string,
    call: (fieldRegion: Region, piecesRegion: Region) => T,
  ): T {
    const fieldRegion = this.copyIn(field);
    try {
      const piecesRegion = this.copyIn(pieces);
      try {
        return call(fieldRegion, piecesRegion);
      } finally {
        this.release(piecesRegion);
      }
    } finally {
      this.release(fieldRegion);
    }
  }

  private copyIn(text: string): Region {
    const bytes = Buffer.from(text, 'latin1');
    if (bytes.length === 0) {
      return { pointer: NULL_POINTER, length: 0 };
    }
    const pointer = this.module.alloc(bytes.length);
    if (pointer === null) {
      throw new RangeError(`Solver heap cannot hold an input of ${bytes.length} bytes`);
    }
    this.module.memory.write(pointer, bytes);
    return { pointer, length: bytes.length };
  }

  private release(region: Region): void {
    if (region.pointer !== NULL_POINTER) {
      this.module.dealloc(region.pointer, region.length);
    }
  }
}
