/**
 * Types shared by the board model and the UCI engine session.
 */

import type { Readable, Writable } from 'node:stream';

/** Uppercase is white, lowercase is black. */
export type PieceSymbol =
  | 'P' | 'N' | 'B' | 'R' | 'Q' | 'K'
  | 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/** A board cell: a piece, or null when empty. */
export type Cell = PieceSymbol | null;

/** Side to move, as written in a FEN string. */
export type Side = 'w' | 'b';

export type EngineSessionState =
  | 'unstarted'
  | 'ready'
  | 'awaiting-response' // a request is outstanding
  | 'faulted' // process died, or the protocol broke
  | 'stopped';

/** Outcome of loading a position into the engine. */
export type PositionStatus =
  | 'fault' // engine crashed on this position (and was restarted)
  | 'mover-in-check'
  | 'mover-not-in-check';

/** Engine score, from the side-to-move's perspective. */
export type Score =
  | { kind: 'cp'; value: number } // centipawns
  | { kind: 'mate'; value: number }; // mate in N moves, negative when being mated

export interface EvaluationResult {
  score: Score;
  depth: number | null; // depth of the info line the score came from
  bestMove: string | null; // null for "bestmove (none)"
  durationMs: number;
}

export interface EvaluateOptions {
  /** Search depth (plies). Sent as `go depth N`. */
  depth?: number;
  /** Search time budget in milliseconds. Sent as `go movetime M`. */
  movetime?: number;
}

/** How an engine process ended. */
export interface EngineExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be spawned at all. */
  error?: Error;
}

/**
 * The slice of a child process the session talks to.
 * `child_process.spawn()` results satisfy it; tests supply an in-process fake.
 */
export interface EngineProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnEngine = (executable: string, args: readonly string[]) => EngineProcess;

/** Configuration options for the EngineSession constructor. */
export interface EngineSessionOptions {
  /** Path to the UCI engine executable. */
  executable: string;

  /**
   * Extra command-line arguments for the engine.
   * @default []
   */
  args?: readonly string[];

  /**
   * Launches the engine process. Override to run the engine some other way.
   * @default child_process.spawn with piped stdin/stdout and inherited stderr
   */
  spawnEngine?: SpawnEngine;

  /**
   * Log protocol traffic to stderr.
   * @default false
   */
  debug?: boolean;

  /** Called after a crashed engine has been replaced by a fresh one. */
  onRestart?: (exit: EngineExit) => void;
}
