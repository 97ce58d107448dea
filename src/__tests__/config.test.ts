import { describe, it, expect } from 'vitest';
import {
  DEFAULT_COUNT,
  DEFAULT_HIGHLIGHT_THRESHOLD,
  DEFAULT_MATERIAL,
  resolveConfig,
} from '../config';
import { ConfigError } from '../errors';

function configError(argv: string[], env: NodeJS.ProcessEnv = {}): ConfigError {
  try {
    resolveConfig(argv, env);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('Expected a ConfigError');
}

// ===== DEFAULTS & FLAGS ====================================================

describe('resolveConfig', () => {
  it('falls back to the defaults', () => {
    expect(resolveConfig([])).toEqual({
      material: DEFAULT_MATERIAL,
      executables: ['stockfish', './stockfish'],
      movetimeMs: 1000,
      depth: undefined,
      count: DEFAULT_COUNT,
      highlight: true,
      highlightThreshold: DEFAULT_HIGHLIGHT_THRESHOLD,
      seed: undefined,
      debug: false,
      help: false,
    });
  });

  it('reads every flag', () => {
    const config = resolveConfig([
      '-m', 'KQk',
      '-e', '/opt/engines/sf,sf',
      '--movetime', '0.25',
      '--depth', '12',
      '-n', '5',
      '--highlight-threshold', '50',
      '--no-highlight',
      '--seed', '7',
      '--debug',
    ]);

    expect(config).toEqual({
      material: 'KQk',
      executables: ['/opt/engines/sf', 'sf'],
      movetimeMs: 250,
      depth: 12,
      count: 5,
      highlight: false,
      highlightThreshold: 50,
      seed: 7,
      debug: true,
      help: false,
    });
  });

  it('drops the default move time when only a depth is given', () => {
    const config = resolveConfig(['--depth', '10']);
    expect(config.depth).toBe(10);
    expect(config.movetimeMs).toBeUndefined();
  });

  it('rounds the move time to whole milliseconds', () => {
    expect(resolveConfig(['--movetime', '1.0004']).movetimeMs).toBe(1000);
    expect(resolveConfig(['--movetime', '2.5']).movetimeMs).toBe(2500);
  });

  it('accepts a one-millisecond move time', () => {
    expect(resolveConfig(['--movetime', '0.001']).movetimeMs).toBe(1);
  });

  it('accepts integers written with an exponent', () => {
    expect(resolveConfig(['--depth', '2e1']).depth).toBe(20);
  });

  it('recognizes -h and --help', () => {
    expect(resolveConfig(['-h']).help).toBe(true);
    expect(resolveConfig(['--help']).help).toBe(true);
  });

  it('returns a frozen object', () => {
    const config = resolveConfig([]);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.executables)).toBe(true);
  });
});

// ===== ENVIRONMENT =========================================================

describe('environment', () => {
  it('reads FENPROBE_* variables', () => {
    const config = resolveConfig([], {
      FENPROBE_MATERIAL: 'Kk',
      FENPROBE_EXECUTABLE: ' /opt/sf , sf ',
      FENPROBE_MOVETIME: '2',
      FENPROBE_COUNT: '3',
      FENPROBE_HIGHLIGHT_THRESHOLD: '0',
      FENPROBE_NO_HIGHLIGHT: 'yes',
      FENPROBE_SEED: '-4',
      FENPROBE_DEBUG: 'TRUE',
    });

    expect(config.material).toBe('Kk');
    expect(config.executables).toEqual(['/opt/sf', 'sf']);
    expect(config.movetimeMs).toBe(2000);
    expect(config.count).toBe(3);
    expect(config.highlightThreshold).toBe(0);
    expect(config.highlight).toBe(false);
    expect(config.seed).toBe(-4);
    expect(config.debug).toBe(true);
  });

  it('treats other values of boolean variables as false', () => {
    const config = resolveConfig([], { FENPROBE_NO_HIGHLIGHT: '0', FENPROBE_DEBUG: 'nope' });
    expect(config.highlight).toBe(true);
    expect(config.debug).toBe(false);
  });

  it('lets flags override the environment', () => {
    const config = resolveConfig(['-n', '9', '--depth', '6'], { FENPROBE_COUNT: '3', FENPROBE_DEPTH: '20' });
    expect(config.count).toBe(9);
    expect(config.depth).toBe(6);
  });

  it('uses an explicit move time alongside a depth from the environment', () => {
    const config = resolveConfig(['--movetime', '3'], { FENPROBE_DEPTH: '20' });
    expect(config.depth).toBe(20);
    expect(config.movetimeMs).toBe(3000);
  });
});

// ===== ERRORS ==============================================================

describe('invalid input', () => {
  it.each([
    [['--depth', '0'], "depth must be at least 1, got '0'"],
    [['--depth', '2.5'], "depth must be an integer, got '2.5'"],
    [['--movetime', '0'], "movetime must be greater than 0, got '0'"],
    [['--movetime', 'soon'], "movetime must be a number, got 'soon'"],
    [['--movetime', '0.0004'], "movetime must be at least 0.001, got '0.0004'"],
    [['--depth', '1e21'], "depth must be an integer, got '1e21'"],
    [['--seed', '9007199254740993'], "seed must be an integer, got '9007199254740993'"],
    [['-n', 'abc'], "count must be a number, got 'abc'"],
    [['-n', '1.5'], "count must be an integer, got '1.5'"],
    [['--highlight-threshold=-1'], "highlight-threshold must be at least 0, got '-1'"],
    [['--seed', '0.5'], "seed must be an integer, got '0.5'"],
    [['-m', 'Kx'], "material may only contain piece letters PNBRQKpnbrqk, got 'x'"],
    [['-m', ''], 'material must name at least one piece'],
    [['-m', 'P'.repeat(49)], 'material has 49 pawns; at most 48 fit on ranks 2-7'],
    [['-m', 'Q'.repeat(65)], 'material has 65 pieces; at most 64 fit on the board'],
    [['-e', ' , '], 'executable list is empty'],
  ])('rejects %j', (argv, message) => {
    expect(configError(argv).message).toBe(message);
  });

  it('rejects bad environment values the same way', () => {
    expect(configError([], { FENPROBE_COUNT: '0' }).message).toBe("count must be at least 1, got '0'");
  });

  it('wraps unknown flags', () => {
    const error = configError(['--bogus']);
    expect(error.cause).toBeInstanceOf(Error);
  });

  it('rejects positional arguments', () => {
    expect(configError(['stockfish'])).toBeInstanceOf(ConfigError);
  });
});
