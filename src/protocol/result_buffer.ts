import type { Placement } from '../core/types';
import { BoundaryError, errorName, SolveOutcome } from './errors';
import { encodePlacement, formatRecord } from './placement_encoder';

export const DEFAULT_OUTPUT_CAPACITY = 8192;

const TERMINATOR = 0;

export function failurePayload(error: BoundaryError): string {
  return `{"success":false,"error":${JSON.stringify(errorName(error))}}`;
}

const OVERFLOW_PAYLOAD = failurePayload({ kind: 'BufferOverflow' });

/**
 * Fixed-capacity, null-terminated output region for one response payload.
 *
 * Every write checks that the payload plus its terminator still fits. When a
 * write does not fit, whatever was serialized so far is discarded and the
 * region holds the BufferOverflow payload instead.
 */
export class ResultBuffer {
  private readonly bytes: Uint8Array;
  private position = 0;

  constructor(bytes: Uint8Array) {
    if (bytes.length < OVERFLOW_PAYLOAD.length + 1) {
      throw new RangeError(
        `Output region of ${bytes.length} bytes cannot hold the overflow payload`,
      );
    }
    this.bytes = bytes;
    this.terminate();
  }

  get capacity(): number {
    return this.bytes.length;
  }

  get length(): number {
    return this.position;
  }

  writeOutcome(outcome: SolveOutcome): void {
    if (outcome.ok) {
      this.writeSolution(outcome.placements);
    } else {
      this.writeFailure(outcome.error);
    }
  }

  writeSolution(placements: readonly Placement[]): void {
    this.position = 0;
    const written =
      this.write(
        `{"success":true,"solutions":[{"patternSize":${placements.length},"placements":[`,
      ) &&
      placements.every((placement, index) =>
        this.write(`${index > 0 ? ',' : ''}${formatRecord(encodePlacement(placement))}`),
      ) &&
      this.write(']}],"solutionCount":1}');
    if (!written) {
      this.writeOverflow();
      return;
    }
    this.terminate();
  }

  writeFailure(error: BoundaryError): void {
    this.position = 0;
    if (!this.write(failurePayload(error))) {
      this.writeOverflow();
      return;
    }
    this.terminate();
  }

  toString(): string {
    return String.fromCharCode(...this.bytes.subarray(0, this.position));
  }

  private writeOverflow(): void {
    this.position = 0;
    this.write(OVERFLOW_PAYLOAD);
    this.terminate();
  }

  private write(text: string): boolean {
    if (this.position + text.length + 1 > this.bytes.length) {
      return false;
    }
    for (let i = 0; i < text.length; i += 1) {
      const code = text.charCodeAt(i);
      // wire format is ASCII only
      this.bytes[this.position + i] = code < 0x80 ? code : 0x3f;
    }
    this.position += text.length;
    return true;
  }

  private terminate(): void {
    this.bytes[this.position] = TERMINATOR;
  }
}

/**
 * Count the bytes before the terminator, never looking at more than
 * `capacity` bytes or past the end of `memory`.
 */
export function scanLength(memory: Uint8Array, pointer: number, capacity: number): number {
  if (!Number.isInteger(pointer) || pointer < 0 || pointer >= memory.length) {
    return 0;
  }
  const limit = Math.min(capacity, memory.length - pointer);
  let length = 0;
  while (length < limit && memory[pointer + length] !== TERMINATOR) {
    length += 1;
  }
  return length;
}
