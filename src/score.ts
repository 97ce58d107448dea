import { EngineError } from './errors';
import type { Score } from './types';

/**
 * Read the score from a UCI info line: the two tokens after `score`,
 * e.g. `score cp -35` or `score mate 3`.
 */
export function parseScore(infoLine: string): Score {
  const tokens = infoLine.trim().split(/\s+/);
  const idx = tokens.indexOf('score');
  if (idx === -1) {
    throw new EngineError('MALFORMED_SCORE', `No score in info line: ${infoLine}`);
  }

  const kind = tokens[idx + 1];
  const raw = tokens[idx + 2];
  if (raw === undefined || !/^[+-]?\d+$/.test(raw)) {
    throw new EngineError('MALFORMED_SCORE', `Bad score value in info line: ${infoLine}`);
  }

  const value = parseInt(raw, 10);
  if (kind === 'cp') return { kind: 'cp', value };
  if (kind === 'mate') return { kind: 'mate', value };
  throw new EngineError('MALFORMED_SCORE', `Unknown score kind '${kind ?? ''}' in info line: ${infoLine}`);
}

/** Depth token of an info line, or null if it has none. */
export function parseDepth(infoLine: string): number | null {
  const match = infoLine.match(/\bdepth\s+(\d+)/);
  return match?.[1] !== undefined ? parseInt(match[1], 10) : null;
}

/** Move token of a `bestmove` line; null for "(none)" and friends. */
export function parseBestMove(line: string): string | null {
  const match = line.match(/^bestmove\s+(\S+)/);
  const move = match?.[1];
  // Stockfish emits "bestmove (none)" for checkmate/stalemate
  if (move === undefined || move === '(none)' || move === 'null' || move === '0000') {
    return null;
  }
  return move;
}
