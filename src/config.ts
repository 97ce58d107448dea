/**
 * Command-line and environment configuration for the fenprobe CLI.
 * Flags override FENPROBE_* environment variables, which override defaults.
 */

import { parseArgs } from 'node:util';
import { isPieceSymbol } from './board';
import { ConfigError } from './errors';
import { splitCandidates } from './resolve-executable';

export const DEFAULT_MATERIAL = 'rnbqkbnrppppppppPPPPPPPPRNBQKBNR';
export const DEFAULT_EXECUTABLES = 'stockfish,./stockfish';
export const DEFAULT_MOVETIME_SECONDS = 1.0;
export const DEFAULT_COUNT = 1000;
export const DEFAULT_HIGHLIGHT_THRESHOLD = 20;

const MAX_PAWNS = 48; // ranks 2-7
const MAX_PIECES = 64;

export interface SearchConfig {
  readonly material: string;
  /** Executable candidates, tried in order. */
  readonly executables: readonly string[];
  /** Undefined when only a depth limit was asked for. */
  readonly movetimeMs: number | undefined;
  readonly depth: number | undefined;
  readonly count: number;
  readonly highlight: boolean;
  readonly highlightThreshold: number;
  readonly seed: number | undefined;
  readonly debug: boolean;
  readonly help: boolean;
}

export const USAGE = `Usage: fenprobe [options]

Find interesting positions using a UCI chess engine.

Options:
  -m, --material <pieces>        material to place randomly on the board
                                 (default: ${DEFAULT_MATERIAL})
  -e, --executable <paths>       path to the engine executable; may be a
                                 comma-separated list (default: ${DEFAULT_EXECUTABLES})
      --movetime <seconds>       move time for position evaluation (default: ${DEFAULT_MOVETIME_SECONDS})
      --depth <plies>            search depth for position evaluation
  -n, --count <n>                number of positions to report (default: ${DEFAULT_COUNT})
      --highlight-threshold <cp> highlight threshold in centipawns (default: ${DEFAULT_HIGHLIGHT_THRESHOLD})
      --no-highlight             do not highlight lines with small absolute centipawn value
      --seed <n>                 seed for reproducible positions
      --debug                    log engine traffic to stderr
  -h, --help                     show this help
`;

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

interface NumberRule {
  integer?: boolean;
  min?: number;
  exclusiveMin?: boolean;
}

function parseNumber(name: string, raw: string, rule: NumberRule = {}): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got '${raw}'`);
  }
  if (rule.integer && !Number.isSafeInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got '${raw}'`);
  }
  if (rule.min !== undefined) {
    const tooSmall = rule.exclusiveMin ? value <= rule.min : value < rule.min;
    if (tooSmall) {
      throw new ConfigError(`${name} must be ${rule.exclusiveMin ? 'greater than' : 'at least'} ${rule.min}, got '${raw}'`);
    }
  }
  return value;
}

function validateMaterial(material: string): string {
  if (material.length === 0) {
    throw new ConfigError('material must name at least one piece');
  }
  let pawns = 0;
  for (const c of material) {
    if (!isPieceSymbol(c)) {
      throw new ConfigError(`material may only contain piece letters PNBRQKpnbrqk, got '${c}'`);
    }
    if (c === 'P' || c === 'p') pawns++;
  }
  if (material.length > MAX_PIECES) {
    throw new ConfigError(`material has ${material.length} pieces; at most ${MAX_PIECES} fit on the board`);
  }
  if (pawns > MAX_PAWNS) {
    throw new ConfigError(`material has ${pawns} pawns; at most ${MAX_PAWNS} fit on ranks 2-7`);
  }
  return material;
}

const FLAGS = {
  material: { type: 'string', short: 'm' },
  executable: { type: 'string', short: 'e' },
  movetime: { type: 'string' },
  depth: { type: 'string' },
  count: { type: 'string', short: 'n' },
  'highlight-threshold': { type: 'string' },
  'no-highlight': { type: 'boolean' },
  seed: { type: 'string' },
  debug: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: FLAGS, strict: true, allowPositionals: false }).values;
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err), err);
  }
}

export function resolveConfig(argv: readonly string[], env: NodeJS.ProcessEnv = {}): SearchConfig {
  const values = parseFlags(argv);

  const material = validateMaterial(values.material ?? env.FENPROBE_MATERIAL ?? DEFAULT_MATERIAL);

  const executables = splitCandidates(values.executable ?? env.FENPROBE_EXECUTABLE ?? DEFAULT_EXECUTABLES);
  if (executables.length === 0) {
    throw new ConfigError('executable list is empty');
  }

  const depthRaw = values.depth ?? env.FENPROBE_DEPTH;
  const depth = depthRaw === undefined
    ? undefined
    : parseNumber('depth', depthRaw, { integer: true, min: 1 });

  // A depth limit on its own replaces the default time budget
  const movetimeRaw = values.movetime ?? env.FENPROBE_MOVETIME;
  let movetimeMs: number | undefined;
  if (movetimeRaw !== undefined) {
    movetimeMs = Math.round(parseNumber('movetime', movetimeRaw, { min: 0, exclusiveMin: true }) * 1000);
    // engines read `go movetime 0` as no limit at all
    if (movetimeMs < 1) {
      throw new ConfigError(`movetime must be at least 0.001, got '${movetimeRaw}'`);
    }
  } else if (depth === undefined) {
    movetimeMs = Math.round(DEFAULT_MOVETIME_SECONDS * 1000);
  }

  const countRaw = values.count ?? env.FENPROBE_COUNT;
  const count = countRaw === undefined
    ? DEFAULT_COUNT
    : parseNumber('count', countRaw, { integer: true, min: 1 });

  const thresholdRaw = values['highlight-threshold'] ?? env.FENPROBE_HIGHLIGHT_THRESHOLD;
  const highlightThreshold = thresholdRaw === undefined
    ? DEFAULT_HIGHLIGHT_THRESHOLD
    : parseNumber('highlight-threshold', thresholdRaw, { integer: true, min: 0 });

  const seedRaw = values.seed ?? env.FENPROBE_SEED;
  const seed = seedRaw === undefined
    ? undefined
    : parseNumber('seed', seedRaw, { integer: true });

  return Object.freeze({
    material,
    executables: Object.freeze(executables),
    movetimeMs,
    depth,
    count,
    highlight: !(values['no-highlight'] ?? isTruthy(env.FENPROBE_NO_HIGHLIGHT)),
    highlightThreshold,
    seed,
    debug: values.debug ?? isTruthy(env.FENPROBE_DEBUG),
    help: values.help ?? false,
  });
}
