import { ENGINE_CONFIG } from '../config/engine_config';
import { parsePieceCode } from '../core/pieces';
import { PieceKind, PieceQueue } from '../core/types';

export function decodeQueue(
  bytes: Uint8Array,
  capacity: number = ENGINE_CONFIG.queueCapacity,
): PieceQueue {
  const queue: PieceKind[] = [];
  for (const code of bytes) {
    if (queue.length >= capacity) {
      break;
    }
    const kind = parsePieceCode(code);
    if (kind) {
      queue.push(kind);
    }
  }
  return queue;
}
