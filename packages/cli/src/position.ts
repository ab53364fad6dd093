/**
 * Position arguments: a FEN plus moves given in SAN or UCI notation
 */

import { Chess, type Move } from 'chess.js';

import { InputError } from './errors/cli-errors.js';

export const START_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

const UCI_MOVE = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/;
const MOVE_NUMBER = /^\d+\.+/;

/**
 * Base position, the moves played on it, and the board after them
 */
export interface ResolvedPosition {
  fen: string;
  /** Moves in UCI notation */
  moves: string[];
  board: Chess;
}

/**
 * Split a move list such as "1. e4 e5 2.Nf3" or "e2e4,e7e5" into moves
 */
export function parseMoveList(text: string): string[] {
  return text
    .split(/[\s,]+/)
    .map((token) => token.replace(MOVE_NUMBER, ''))
    .filter((token) => token.length > 0);
}

/**
 * Play `move` (SAN or UCI) on `board` and return it in UCI notation
 *
 * @throws InputError if the move is not legal in the position
 */
export function toUciMove(board: Chess, move: string): string {
  const uci = UCI_MOVE.exec(move);
  let played: Move;
  try {
    if (uci?.[1] !== undefined && uci[2] !== undefined) {
      played = uci[3]
        ? board.move({ from: uci[1], to: uci[2], promotion: uci[3] })
        : board.move({ from: uci[1], to: uci[2] });
    } else {
      played = board.move(move);
    }
  } catch {
    throw new InputError(
      `Illegal move '${move}' in position ${board.fen()}`,
      'Give moves in SAN (Nf3) or UCI (g1f3) notation',
    );
  }
  return `${played.from}${played.to}${played.promotion ?? ''}`;
}

/**
 * Load `fen` (the standard start position when omitted) and play `moves`
 *
 * @throws InputError for an invalid FEN or an illegal move
 */
export function resolvePosition(
  fen: string | undefined,
  moves: readonly string[],
): ResolvedPosition {
  const base = fen?.trim() || START_FEN;
  let board: Chess;
  try {
    board = new Chess(base);
  } catch (error) {
    throw new InputError(
      `Invalid FEN '${base}': ${error instanceof Error ? error.message : String(error)}`,
      'Quote the FEN so the shell passes it as one argument',
    );
  }

  const played = moves.map((move) => toUciMove(board, move));
  return { fen: base, moves: played, board };
}
