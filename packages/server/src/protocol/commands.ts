/**
 * @fileoverview Parsing of player replies to a move prompt.
 */

import { QUIT_COMMAND } from '@ttt-match/shared';

/**
 * What a player's reply asks for.
 * - quit: leave the game (`QUIT`, any case)
 * - move: play the given cell token (`4` or `MOVE 4`)
 * - malformed_move: a `MOVE` command without exactly one numeric argument
 * - unrecognized: free text that is neither a move nor QUIT
 */
export type PlayerCommand =
  | { readonly type: 'quit' }
  | { readonly type: 'move'; readonly cell: string }
  | { readonly type: 'malformed_move'; readonly text: string }
  | { readonly type: 'unrecognized'; readonly text: string };

const DIGITS = /^\d+$/;

/**
 * Classify a trimmed reply.
 */
export function parsePlayerCommand(text: string): PlayerCommand {
  const upper = text.toUpperCase();

  if (upper === QUIT_COMMAND) {
    return { type: 'quit' };
  }

  if (upper.startsWith('MOVE ')) {
    const parts = text.split(/\s+/);
    const cell = parts[1];
    if (parts.length !== 2 || cell === undefined || !DIGITS.test(cell)) {
      return { type: 'malformed_move', text };
    }
    return { type: 'move', cell };
  }

  if (DIGITS.test(text)) {
    return { type: 'move', cell: text };
  }

  return { type: 'unrecognized', text };
}
