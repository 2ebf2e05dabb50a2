/**
 * @fileoverview Main entry point for the shared package.
 * Re-exports protocol messages, board rendering, and core types.
 */

// Board
export { type Cell, freeCellsFromRows, parseBoardRow, renderBoard } from './board.js';
// Protocol
export {
  DRAW_MESSAGE,
  gameOverMessage,
  gameStartMessage,
  invalidFormatMessage,
  invalidMessage,
  isTerminalMessage,
  LOSE_MESSAGE,
  MOVE_PROMPT,
  moveCommand,
  moveErrorMessage,
  OPPONENT_DISCONNECTED_MESSAGE,
  OPPONENT_QUIT_MESSAGE,
  OPPONENT_TIMEOUT_MESSAGE,
  playerNotRecognizedMessage,
  QUIT_COMMAND,
  serverErrorMessage,
  toWireLine,
  WAIT_PROMPT,
  WELCOME_MESSAGE,
  WIN_MESSAGE,
} from './protocol.js';
// Types
export type { Endpoint, GameSymbol, Winner } from './types.js';
export {
  BOARD_CELL_COUNT,
  DRAW,
  formatEndpoint,
  UNKNOWN_ENDPOINT,
} from './types.js';
