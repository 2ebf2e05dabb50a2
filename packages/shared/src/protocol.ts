/**
 * @fileoverview Line protocol spoken between the match server and its clients.
 *
 * Every message is one line of text terminated by `\n`, except the board,
 * which spans several lines. Clients answer move prompts with a bare cell
 * index (`4`), `MOVE <index>`, or `QUIT`.
 */

import type { GameSymbol } from './types.js';

// ============ Server → Client ============

/** Sent as soon as a client is accepted. */
export const WELCOME_MESSAGE = 'Welcome! Waiting for opponent...';

/** Sent to the player whose turn it is. */
export const MOVE_PROMPT = 'Your move (0-8) or QUIT:';

/** Sent to the player who is waiting for the other one to move. */
export const WAIT_PROMPT = 'Waiting for opponent...';

export const DRAW_MESSAGE = "Game over! It's a draw.";
export const WIN_MESSAGE = 'You win!';
export const LOSE_MESSAGE = 'You lose!';

export const OPPONENT_TIMEOUT_MESSAGE = 'OPPONENT_TIMEOUT - you win';
export const OPPONENT_QUIT_MESSAGE = 'OPPONENT_QUIT - you win';
export const OPPONENT_DISCONNECTED_MESSAGE = 'OPPONENT_DISCONNECTED - you win';

export function gameStartMessage(symbol: GameSymbol): string {
  return `Game start! You are ${symbol}`;
}

/**
 * Recoverable rule violation, e.g. `ERROR: CellOccupied: Cell 4 is already occupied`.
 */
export function moveErrorMessage(kind: string, detail: string): string {
  return `ERROR: ${kind}: ${detail}`;
}

export function playerNotRecognizedMessage(detail: string): string {
  return `ERROR: Player not recognized: ${detail}`;
}

export function invalidMessage(detail: string): string {
  return `INVALID_MESSAGE: ${detail}`;
}

export function invalidFormatMessage(text: string): string {
  return `Invalid move format: ${text}`;
}

export function gameOverMessage(detail: string): string {
  return `GAME OVER: ${detail}`;
}

export function serverErrorMessage(detail: string): string {
  return `Server error: ${detail}`;
}

/**
 * Append the line terminator used on the wire.
 */
export function toWireLine(text: string): string {
  return `${text}\n`;
}

/**
 * Check whether a server line ends the game for the client receiving it.
 */
export function isTerminalMessage(line: string): boolean {
  return (
    line === DRAW_MESSAGE ||
    line === WIN_MESSAGE ||
    line === LOSE_MESSAGE ||
    line === OPPONENT_TIMEOUT_MESSAGE ||
    line === OPPONENT_QUIT_MESSAGE ||
    line === OPPONENT_DISCONNECTED_MESSAGE ||
    line.startsWith('GAME OVER: ') ||
    line.startsWith('Server error: ') ||
    line.startsWith('ERROR: Player not recognized: ')
  );
}

// ============ Client → Server ============

export const QUIT_COMMAND = 'QUIT';

export function moveCommand(cell: number): string {
  return `MOVE ${cell}`;
}
