import { ENGINE_CONFIG } from '../config/engine_config';

export interface CliOptions {
  field: string;
  pieces: string;
  height: number;
  check: boolean;
  render: boolean;
}

export function parseOptions(args: readonly string[]): CliOptions {
  const getString = (flag: string, fallback: string): string => {
    const index = args.indexOf(flag);
    if (index >= 0 && index + 1 < args.length) {
      return args[index + 1] ?? fallback;
    }
    return fallback;
  };
  const getNumber = (flag: string, fallback: number): number => {
    const index = args.indexOf(flag);
    if (index >= 0 && index + 1 < args.length) {
      const value = Number(args[index + 1]);
      if (!Number.isNaN(value)) {
        return value;
      }
    }
    return fallback;
  };
  const hasFlag = (flag: string): boolean => args.includes(flag);

  const field = getString('--field', '');
  // a bare field string implies its own height
  const impliedHeight = Math.ceil(field.length / ENGINE_CONFIG.boardWidth);
  return {
    field,
    pieces: getString('--pieces', ''),
    height: getNumber('--height', impliedHeight),
    check: hasFlag('--check'),
    render: hasFlag('--render'),
  };
}
