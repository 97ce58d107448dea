import type { SearchHit } from './search';
import type { Score } from './types';

const HIGHLIGHT_ON = '\u001b[1m\u001b[33m'; // bright yellow
const HIGHLIGHT_OFF = '\u001b[0m';

export interface FormatOptions {
  highlight: boolean;
  /** Centipawn scores with a smaller magnitude are highlighted. */
  threshold: number;
}

/** e.g. "cp -35" or "mate 4". */
export function formatScore(score: Score): string {
  return `${score.kind} ${score.value}`;
}

/** Near-equal positions are the interesting ones. */
export function shouldHighlight(score: Score, threshold: number): boolean {
  return score.kind === 'cp' && Math.abs(score.value) < threshold;
}

export function formatHit(hit: SearchHit, options: FormatOptions): string {
  const { score, durationMs } = hit.evaluation;
  const line =
    `${String(hit.index).padStart(6)} ` +
    `evaluation ${formatScore(score).padEnd(20)} ` +
    `duration ${(durationMs / 1000).toFixed(3).padStart(10)} ` +
    `fen ${hit.fen} `;

  if (options.highlight && shouldHighlight(score, options.threshold)) {
    return `${HIGHLIGHT_ON}${line}${HIGHLIGHT_OFF}`;
  }
  return line;
}
