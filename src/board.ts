/**
 * 8x8 board for generating test positions.
 * Cells are rank-major: index 0 is a8 (top-left as printed), index 63 is h1.
 * No legality is enforced; the engine decides what it accepts.
 */

import { BoardError } from './errors';
import { pick } from './rng';
import type { Cell, PieceSymbol, Side } from './types';

const SQUARES = 64;

// Pawns never stand on the back ranks.
const PAWN_MIN_INDEX = 8;
const PAWN_MAX_INDEX = 56;

const INITIAL_LAYOUT =
  'rnbqkbnr' +
  'pppppppp' +
  '........'.repeat(4) +
  'PPPPPPPP' +
  'RNBQKBNR';

const PIECE_SYMBOLS: ReadonlySet<string> = new Set('PNBRQKpnbrqk');

export function isPieceSymbol(value: string): value is PieceSymbol {
  return PIECE_SYMBOLS.has(value);
}

export function isSide(value: string): value is Side {
  return value === 'w' || value === 'b';
}

function isPawn(piece: PieceSymbol): boolean {
  return piece === 'P' || piece === 'p';
}

export class Board {
  private cells: Cell[] = new Array<Cell>(SQUARES).fill(null);

  /** Remove all pieces from the board. */
  resetEmpty(): void {
    this.cells = new Array<Cell>(SQUARES).fill(null);
  }

  /** Set up the standard initial arrangement. */
  resetInitial(): void {
    this.cells = Array.from(INITIAL_LAYOUT, (c) => (isPieceSymbol(c) ? c : null));
  }

  get(index: number): Cell {
    if (!Number.isInteger(index) || index < 0 || index >= SQUARES) {
      throw new RangeError(`Square index out of range: ${index}`);
    }
    return this.cells[index] ?? null;
  }

  pieceCount(): number {
    return this.cells.filter((c) => c !== null).length;
  }

  /**
   * Place each piece of `pieces` on a random empty square, in order.
   * Pawns only land on ranks 2-7. All-or-nothing: if any piece cannot be
   * placed, the board is left untouched.
   */
  scatter(pieces: string, random: () => number = Math.random): void {
    const symbols: PieceSymbol[] = [];
    for (const c of pieces) {
      if (!isPieceSymbol(c)) {
        throw new BoardError('INVALID_PIECE', `Not a piece symbol: '${c}'`);
      }
      symbols.push(c);
    }

    const next = [...this.cells];
    const empty = new Set<number>();
    next.forEach((cell, i) => {
      if (cell === null) empty.add(i);
    });

    for (const [n, piece] of symbols.entries()) {
      const candidates = [...empty].filter(
        (i) => !isPawn(piece) || (i >= PAWN_MIN_INDEX && i < PAWN_MAX_INDEX),
      );
      if (candidates.length === 0) {
        throw new BoardError(
          'NO_EMPTY_SQUARE',
          `No empty square left for '${piece}' (piece ${n + 1} of ${symbols.length})`,
        );
      }
      const index = pick(random, candidates);
      if (index === undefined) {
        throw new RangeError('Random source must return values in [0, 1)');
      }
      next[index] = piece;
      empty.delete(index);
    }

    this.cells = next;
  }

  /**
   * Serialize as FEN with the given side to move.
   * Castling is never available, there is no en-passant square, and the
   * clocks are fixed at "0 1".
   */
  toFen(mover: Side): string {
    if (!isSide(mover)) {
      throw new BoardError('INVALID_SIDE', `Side to move must be 'w' or 'b', got '${String(mover)}'`);
    }

    const ranks: string[] = [];
    for (let y = 0; y < 8; y++) {
      let rank = '';
      let run = 0;
      for (let x = 0; x < 8; x++) {
        const cell = this.cells[y * 8 + x] ?? null;
        if (cell === null) {
          run++;
          continue;
        }
        if (run > 0) rank += String(run);
        run = 0;
        rank += cell;
      }
      if (run > 0) rank += String(run);
      ranks.push(rank);
    }
    return `${ranks.join('/')} ${mover} - - 0 1`;
  }

  /** Eight lines of eight characters, '.' for empty squares. */
  render(): string {
    const lines: string[] = [];
    for (let y = 0; y < 8; y++) {
      lines.push(this.cells.slice(y * 8, y * 8 + 8).map((c) => c ?? '.').join(''));
    }
    return lines.join('\n');
  }
}
