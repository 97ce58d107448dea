/**
 * UCI engine process wrapper.
 * Owns one engine process and mediates every exchange with it: handshake,
 * position loading with check readback, evaluation, crash restart, shutdown.
 *
 * Reads block until the engine answers; there is no timeout. A hung engine
 * hangs the caller. Calls must not overlap.
 */

import { spawn } from 'node:child_process';
import { performance } from 'node:perf_hooks';
import { EngineError } from './errors';
import { LineReader } from './line-reader';
import { parseBestMove, parseDepth, parseScore } from './score';
import type {
  EngineExit,
  EngineProcess,
  EngineSessionOptions,
  EngineSessionState,
  EvaluateOptions,
  EvaluationResult,
  PositionStatus,
  Score,
  SpawnEngine,
} from './types';

// Detached: Ctrl-C reaches the whole foreground process group, and the
// engine has to outlive it so the session can still send `quit`.
// The engine exits on its own when its stdin closes.
const spawnEngineProcess: SpawnEngine = (executable, args) =>
  spawn(executable, [...args], { stdio: ['pipe', 'pipe', 'inherit'], detached: true });

/** A running engine: the process, its line reader, and its eventual exit. */
interface EngineHandle {
  process: EngineProcess;
  reader: LineReader;
  exited: Promise<EngineExit>;
}

export class EngineSession {
  // Configuration
  private readonly executable: string;
  private readonly args: readonly string[];
  private readonly spawnEngine: SpawnEngine;
  private readonly debugEnabled: boolean;

  // Callbacks
  private readonly onRestart: ((exit: EngineExit) => void) | null;

  // Engine state
  private state: EngineSessionState = 'unstarted';
  private engine: EngineHandle | null = null;
  private hasPosition = false; // last submitPosition() was accepted
  private restartCount = 0;

  constructor(options: EngineSessionOptions) {
    this.executable = options.executable;
    this.args = options.args ?? [];
    this.spawnEngine = options.spawnEngine ?? spawnEngineProcess;
    this.debugEnabled = options.debug ?? false;
    this.onRestart = options.onRestart ?? null;
  }

  // stdout carries results, so diagnostics go to stderr
  private log(...args: unknown[]): void {
    if (this.debugEnabled) console.error('[EngineSession]', ...args);
  }

  /**
   * Launch the engine and complete the UCI handshake (uci -> uciok).
   * May be called again after stop().
   */
  async start(): Promise<void> {
    if (this.state !== 'unstarted' && this.state !== 'stopped') {
      throw new EngineError('ENGINE_ALREADY_STARTED', `Cannot start engine in state '${this.state}'`);
    }
    this.hasPosition = false;
    await this.launch();
    this.state = 'ready';
  }

  /**
   * Send `quit` and wait for the process to exit.
   * Valid from any started state; a no-op once stopped.
   */
  async stop(): Promise<EngineExit | null> {
    if (this.state === 'unstarted') {
      throw new EngineError('ENGINE_NOT_STARTED', 'Cannot stop an engine that was never started');
    }
    if (this.state === 'stopped') return null;

    const engine = this.engine;
    let exit: EngineExit | null = null;
    if (engine) {
      if (isAlive(engine.process)) this.send('quit');
      exit = await this.reap(engine);
    }
    this.hasPosition = false;
    this.state = 'stopped';
    this.log('STATE: stopped', exit);
    return exit;
  }

  /**
   * Load a position and report whether the side to move is in check.
   *
   * The engine may crash on malformed positions. That is reported as 'fault'
   * after the dead process has been reaped and a fresh one started; the
   * session stays usable. Any other deviation from the protocol throws.
   */
  async submitPosition(fen: string): Promise<PositionStatus> {
    const engine = this.requireReady();
    this.state = 'awaiting-response';
    this.hasPosition = false;

    this.send('ucinewgame');
    this.send(`position fen ${fen}`);

    if (!(await this.synchronize(engine))) {
      await this.restart(engine);
      return 'fault';
    }

    const { fen: echoed, inCheck } = await this.readDiagnostics(engine);
    if (echoed !== fen) {
      throw this.fail(new EngineError('POSITION_MISMATCH', `FEN was not correctly set: sent '${fen}', engine has '${echoed}'`));
    }

    this.hasPosition = true;
    this.state = 'ready';
    return inCheck ? 'mover-in-check' : 'mover-not-in-check';
  }

  /**
   * Search the position loaded by the last successful submitPosition().
   * The score is taken from the last info line before `bestmove`.
   */
  async evaluate(options: EvaluateOptions = {}): Promise<EvaluationResult> {
    const engine = this.requireReady();
    if (!this.hasPosition) {
      throw new EngineError('ENGINE_NO_POSITION', 'evaluate() requires a position accepted by submitPosition()');
    }
    this.state = 'awaiting-response';

    const parts = ['go'];
    if (options.depth !== undefined) parts.push('depth', String(options.depth));
    if (options.movetime !== undefined) parts.push('movetime', String(options.movetime));

    const startedAt = performance.now();
    this.send(parts.join(' '));

    let info: string | null = null;
    let bestMoveLine: string | null = null;
    while (bestMoveLine === null) {
      const line = await engine.reader.next();
      if (line === null) {
        throw this.fail(new EngineError('ENGINE_EXITED', 'Engine exited during evaluation'));
      }
      // "info string ..." is free-form diagnostics, never a score line
      if (line.startsWith('info') && !line.startsWith('info string')) {
        info = line;
      } else if (line.startsWith('bestmove')) {
        bestMoveLine = line;
      }
    }
    const durationMs = performance.now() - startedAt;

    if (info === null) {
      throw this.fail(new EngineError('ENGINE_PROTOCOL', 'No info lines found before bestmove'));
    }

    let score: Score;
    try {
      score = parseScore(info);
    } catch (err) {
      throw this.fail(err);
    }

    this.state = 'ready';
    return {
      score,
      depth: parseDepth(info),
      bestMove: parseBestMove(bestMoveLine),
      durationMs,
    };
  }

  getState(): EngineSessionState {
    return this.state;
  }

  /** Number of crash restarts since construction. */
  getRestartCount(): number {
    return this.restartCount;
  }

  // --- process lifecycle ---------------------------------------------------

  private async launch(): Promise<void> {
    this.log('STATE: launching', this.executable, this.args);
    const child = this.spawnEngine(this.executable, this.args);
    const reader = new LineReader(child.stdout);

    const exited = new Promise<EngineExit>((resolve) => {
      child.once('exit', (code, signal) => {
        this.log('STATE: engine exited', { code, signal });
        resolve({ code, signal });
      });
      child.on('error', (error) => {
        // Only a failed spawn ends the process; 'exit' never follows it
        if (child.pid !== undefined) {
          this.log('ENGINE PROCESS ERROR:', error);
          return;
        }
        this.log('SPAWN ERROR:', error);
        reader.close();
        resolve({ code: null, signal: null, error });
      });
    });

    // A dead engine's stdin fails with EPIPE. The liveness probe reports the
    // crash, so the write error is only logged.
    child.stdin.on('error', (error) => {
      this.log('STDIN ERROR:', error.message);
    });

    const engine: EngineHandle = { process: child, reader, exited };
    this.engine = engine;

    this.send('uci');
    for (;;) {
      const line = await reader.next();
      if (line === null) {
        const exit = await this.reap(engine);
        throw new EngineError(
          'ENGINE_START_FAILED',
          `Engine '${this.executable}' exited before completing the UCI handshake (${describeExit(exit)})`,
          exit.error,
        );
      }
      if (line === 'uciok') break;
    }
    this.log('STATE: uciok received');
  }

  /** Wait for the process to exit and release it. */
  private async reap(engine: EngineHandle): Promise<EngineExit> {
    const exit = await engine.exited;
    engine.reader.close();
    if (this.engine === engine) this.engine = null;
    return exit;
  }

  /** Replace a crashed engine with a fresh one. */
  private async restart(engine: EngineHandle): Promise<void> {
    this.state = 'faulted';
    const exit = await this.reap(engine);
    this.log('STATE: engine crashed, restarting', exit);
    await this.launch();
    this.restartCount++;
    this.state = 'ready';
    this.onRestart?.(exit);
  }

  // --- protocol ------------------------------------------------------------

  /**
   * Send a UCI command to the engine.
   */
  private send(command: string): void {
    if (!this.engine) {
      throw new EngineError('ENGINE_NOT_STARTED', `No engine process to send '${command}' to`);
    }
    this.log('>>> SEND:', command);
    this.engine.process.stdin.write(`${command}\n`);
  }

  /**
   * isready -> readyok round trip. Resolves false if the engine died first:
   * a crashing engine exits without printing anything.
   */
  private async synchronize(engine: EngineHandle): Promise<boolean> {
    this.send('isready');
    for (;;) {
      if (!isAlive(engine.process)) return false;
      const line = await engine.reader.next();
      if (line === null) return false;
      if (line === 'readyok') return true;
      this.log('<<< RECV:', line);
    }
  }

  /** Send `d` and pick the echoed FEN and the checkers out of the dump. */
  private async readDiagnostics(engine: EngineHandle): Promise<{ fen: string; inCheck: boolean }> {
    this.send('d');
    let fen: string | null = null;
    for (;;) {
      const line = await engine.reader.next();
      if (line === null) {
        throw this.fail(new EngineError('ENGINE_EXITED', 'Engine exited while printing the position'));
      }
      if (line.startsWith('Fen: ')) {
        if (fen !== null) {
          throw this.fail(new EngineError('ENGINE_PROTOCOL', 'Duplicate Fen: line in position dump'));
        }
        fen = line.slice('Fen: '.length);
      } else if (line.startsWith('Checkers:')) {
        if (fen === null) {
          throw this.fail(new EngineError('ENGINE_PROTOCOL', 'Position dump has no Fen: line'));
        }
        // bare "Checkers:" means no piece gives check
        return { fen, inCheck: line !== 'Checkers:' };
      }
    }
  }

  private requireReady(): EngineHandle {
    if (this.state === 'unstarted') {
      throw new EngineError('ENGINE_NOT_STARTED', 'Engine has not been started');
    }
    if (this.state !== 'ready' || !this.engine) {
      throw new EngineError('ENGINE_NOT_READY', `Engine is not ready (state '${this.state}')`);
    }
    return this.engine;
  }

  /** Mark the session unusable and hand back the error to throw. */
  private fail(error: unknown): unknown {
    this.state = 'faulted';
    this.hasPosition = false;
    this.log('STATE: faulted', error);
    return error;
  }
}

function isAlive(child: EngineProcess): boolean {
  return child.exitCode === null && child.signalCode === null;
}

function describeExit(exit: EngineExit): string {
  if (exit.error) return exit.error.message;
  if (exit.signal) return `signal ${exit.signal}`;
  return `exit code ${String(exit.code)}`;
}

/**
 * Run `fn` with a started session and always stop it afterwards.
 */
export async function withEngineSession<T>(
  options: EngineSessionOptions,
  fn: (session: EngineSession) => Promise<T>,
): Promise<T> {
  const session = new EngineSession(options);
  await session.start();

  let result: T;
  try {
    result = await fn(session);
  } catch (error) {
    try {
      await session.stop();
    } catch (stopError) {
      throw new AggregateError([error, stopError], 'Engine session failed and could not be stopped');
    }
    throw error;
  }
  await session.stop();
  return result;
}
