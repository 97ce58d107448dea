import { Board } from './board';
import type { EngineSession } from './engine-session';
import type { EvaluationResult, PositionStatus, Side } from './types';

export interface SearchOptions {
  /** Pieces to scatter on an empty board for every attempt, e.g. 'KQkr'. */
  material: string;
  /** Stop after this many evaluated positions. */
  count: number;
  depth?: number;
  /** Milliseconds per evaluation. */
  movetime?: number;
  random?: () => number;
  /** Checked before every attempt. */
  signal?: AbortSignal;
  /** Called for every scattered position the engine turned down. */
  onReject?: (rejection: SearchRejection) => void;
}

export interface SearchRejection {
  fen: string;
  mover: Side;
  status: Exclude<PositionStatus, 'mover-not-in-check'>;
}

export interface SearchHit {
  /** 1-based. */
  index: number;
  /** The evaluated position, white to move. */
  fen: string;
  evaluation: EvaluationResult;
  /** Attempts it took to find this position, including the successful one. */
  attempts: number;
}

/**
 * Scatter random positions and evaluate the ones that are playable with
 * either side to move.
 */
export async function* searchPositions(
  session: EngineSession,
  options: SearchOptions,
): AsyncGenerator<SearchHit> {
  const board = new Board();
  const random = options.random ?? Math.random;
  let found = 0;
  let attempts = 0;

  while (found < options.count && !options.signal?.aborted) {
    attempts++;
    board.resetEmpty();
    board.scatter(options.material, random);

    // Black to move first: if that has the mover in check, then with white to
    // move white could capture the king.
    if (!(await accept(session, board, 'b', options.onReject))) continue;
    if (!(await accept(session, board, 'w', options.onReject))) continue;

    const evaluation = await session.evaluate({ depth: options.depth, movetime: options.movetime });
    found++;
    yield { index: found, fen: board.toFen('w'), evaluation, attempts };
    attempts = 0;
  }
}

async function accept(
  session: EngineSession,
  board: Board,
  mover: Side,
  onReject: SearchOptions['onReject'],
): Promise<boolean> {
  const fen = board.toFen(mover);
  const status = await session.submitPosition(fen);
  if (status === 'mover-not-in-check') return true;
  onReject?.({ fen, mover, status });
  return false;
}
