import { resolveConfig, USAGE } from './config';
import type { SearchConfig } from './config';
import { withEngineSession } from './engine-session';
import { ConfigError } from './errors';
import { formatHit } from './format';
import { resolveExecutable } from './resolve-executable';
import { mulberry32 } from './rng';
import { searchPositions } from './search';
import type { SpawnEngine } from './types';

export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface ProgramIO {
  env: NodeJS.ProcessEnv;
  stdout: OutputStream;
  stderr: OutputStream;
  cwd?: string;
  /** Aborting ends the search after the current position. */
  signal?: AbortSignal;
  spawnEngine?: SpawnEngine;
}

/**
 * Run the position search with the given command-line arguments.
 * Resolves with the process exit code; fatal engine errors reject.
 */
export async function runProgram(argv: readonly string[], io: ProgramIO): Promise<number> {
  let config: SearchConfig;
  try {
    config = resolveConfig(argv, io.env);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    io.stderr.write(`fenprobe: ${err.message}\nTry 'fenprobe --help' for more information.\n`);
    return 2;
  }

  if (config.help) {
    io.stdout.write(USAGE);
    return 0;
  }

  const executable = await resolveExecutable(config.executables, io.env, io.cwd);
  if (executable === null) {
    io.stderr.write(
      `Could not find an engine executable (tried: ${config.executables.join(', ')}).\n` +
      'Please specify path to the engine executable using the --executable command line argument.\n',
    );
    return 1;
  }

  const highlight = config.highlight && io.stdout.isTTY === true;
  const random = config.seed === undefined ? Math.random : mulberry32(config.seed);

  await withEngineSession(
    {
      executable,
      spawnEngine: io.spawnEngine,
      debug: config.debug,
      onRestart: (exit) => {
        if (config.debug) {
          io.stderr.write(`[fenprobe] engine restarted after ${exit.signal ?? `exit code ${String(exit.code)}`}\n`);
        }
      },
    },
    async (session) => {
      const hits = searchPositions(session, {
        material: config.material,
        count: config.count,
        depth: config.depth,
        movetime: config.movetimeMs,
        random,
        signal: io.signal,
      });
      for await (const hit of hits) {
        io.stdout.write(`${formatHit(hit, { highlight, threshold: config.highlightThreshold })}\n`);
      }
    },
  );
  return 0;
}
