/**
 * Linear memory
 *
 * One flat byte array shared by the host and the solver module:
 *
 *   [0, 8)                      reserved, pointer 0 is null
 *   [8, 8 + outputCapacity)     static output region
 *   [heapStart, size)           heap served by alloc/dealloc
 *
 * The heap is a first-fit free list of 8-byte aligned blocks. Freed blocks
 * merge with free neighbours.
 */

import { MemoryAccessError } from '../protocol/errors';
import { DEFAULT_OUTPUT_CAPACITY } from '../protocol/result_buffer';

export const NULL_POINTER = 0;
export const RESERVED_BYTES = 8;
export const ALIGNMENT = 8;
export const DEFAULT_HEAP_BYTES = 65536;

export interface MemoryLayout {
  outputCapacity: number;
  heapBytes: number;
}

export const DEFAULT_MEMORY_LAYOUT: MemoryLayout = {
  outputCapacity: DEFAULT_OUTPUT_CAPACITY,
  heapBytes: DEFAULT_HEAP_BYTES,
};

interface Block {
  start: number;
  size: number;
}

interface Allocation {
  requested: number;
  size: number;
}

function alignUp(value: number): number {
  return Math.ceil(value / ALIGNMENT) * ALIGNMENT;
}

export class LinearMemory {
  readonly bytes: Uint8Array;
  readonly outputPointer = RESERVED_BYTES;
  readonly outputCapacity: number;
  readonly heapStart: number;

  private free: Block[];
  private readonly live = new Map<number, Allocation>();

  constructor(layout: Partial<MemoryLayout> = {}) {
    const outputCapacity = layout.outputCapacity ?? DEFAULT_MEMORY_LAYOUT.outputCapacity;
    const heapBytes = layout.heapBytes ?? DEFAULT_MEMORY_LAYOUT.heapBytes;
    if (!Number.isInteger(outputCapacity) || outputCapacity <= 0) {
      throw new RangeError(`Invalid output capacity: ${outputCapacity}`);
    }
    if (!Number.isInteger(heapBytes) || heapBytes < 0) {
      throw new RangeError(`Invalid heap size: ${heapBytes}`);
    }
    this.outputCapacity = outputCapacity;
    this.heapStart = alignUp(RESERVED_BYTES + outputCapacity);
    const heapSize = Math.floor(heapBytes / ALIGNMENT) * ALIGNMENT;
    this.bytes = new Uint8Array(this.heapStart + heapSize);
    this.free = heapSize > 0 ? [{ start: this.heapStart, size: heapSize }] : [];
  }

  get size(): number {
    return this.bytes.length;
  }

  /** Bytes currently handed out, rounded to the alignment */
  get allocatedBytes(): number {
    let total = 0;
    for (const allocation of this.live.values()) {
      total += allocation.size;
    }
    return total;
  }

  outputRegion(): Uint8Array {
    return this.bytes.subarray(this.outputPointer, this.outputPointer + this.outputCapacity);
  }

  alloc(length: number): number | null {
    if (!Number.isInteger(length) || length <= 0) {
      return null;
    }
    const size = alignUp(length);
    const index = this.free.findIndex((block) => block.size >= size);
    const block = this.free[index];
    if (!block) {
      return null;
    }
    const pointer = block.start;
    if (block.size === size) {
      this.free.splice(index, 1);
    } else {
      this.free[index] = { start: block.start + size, size: block.size - size };
    }
    this.live.set(pointer, { requested: length, size });
    return pointer;
  }

  dealloc(pointer: number, length: number): void {
    const allocation = this.live.get(pointer);
    if (!allocation) {
      throw new MemoryAccessError(`dealloc of ${pointer}: not a live allocation`);
    }
    if (allocation.requested !== length) {
      throw new MemoryAccessError(
        `dealloc of ${pointer}: length ${length} does not match allocation of ${allocation.requested}`,
      );
    }
    this.live.delete(pointer);
    this.release({ start: pointer, size: allocation.size });
  }

  read(pointer: number, length: number): Uint8Array {
    this.checkRange(pointer, length);
    return this.bytes.subarray(pointer, pointer + length);
  }

  write(pointer: number, data: Uint8Array): void {
    this.checkRange(pointer, data.length);
    this.bytes.set(data, pointer);
  }

  private checkRange(pointer: number, length: number): void {
    if (
      !Number.isInteger(pointer) ||
      !Number.isInteger(length) ||
      pointer < 0 ||
      length < 0 ||
      pointer + length > this.bytes.length
    ) {
      throw new MemoryAccessError(
        `Access of ${length} bytes at ${pointer} is outside memory of ${this.bytes.length} bytes`,
      );
    }
  }

  private release(block: Block): void {
    let index = this.free.findIndex((candidate) => candidate.start > block.start);
    if (index < 0) {
      index = this.free.length;
    }
    this.free.splice(index, 0, block);

    const next = this.free[index + 1];
    if (next && block.start + block.size === next.start) {
      block.size += next.size;
      this.free.splice(index + 1, 1);
    }
    const previous = this.free[index - 1];
    if (previous && previous.start + previous.size === block.start) {
      previous.size += block.size;
      this.free.splice(index, 1);
    }
  }
}
