import { ENGINE_CONFIG } from '../config/engine_config';
import { normalizeHeight } from '../host/solver_module';
import { decodeField, encodeField } from '../protocol/field_decoder';

export function renderField(field: string, height: number): string {
  const rows = normalizeHeight(height);
  const text = encodeField(decodeField(Buffer.from(field, 'latin1'), rows), rows);
  const lines: string[] = [];
  for (let start = 0; start < text.length; start += ENGINE_CONFIG.boardWidth) {
    lines.push(`|${text.slice(start, start + ENGINE_CONFIG.boardWidth)}|`);
  }
  lines.push(`+${'-'.repeat(ENGINE_CONFIG.boardWidth)}+`);
  return lines.join('\n');
}
