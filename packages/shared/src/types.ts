/**
 * @fileoverview Core types shared between the match server and its clients.
 */

/**
 * Remote identity of a connected client.
 */
export interface Endpoint {
  readonly host: string;
  readonly port: number;
}

/**
 * Identity used when the remote address of a socket cannot be resolved,
 * e.g. because the socket was already torn down.
 */
export const UNKNOWN_ENDPOINT: Endpoint = { host: 'unknown', port: 0 };

/**
 * Mark placed on the board by a player.
 * - X: first player to be paired, moves first
 * - O: second player to be paired
 */
export type GameSymbol = 'X' | 'O';

/**
 * Marker reported as the winner when the board fills without a line.
 */
export const DRAW = 'Draw';

/**
 * Terminal value of a game: nobody yet, a symbol, or a draw.
 */
export type Winner = GameSymbol | typeof DRAW | null;

/** Number of cells on the board (indices 0-8). */
export const BOARD_CELL_COUNT = 9;

/**
 * Format an endpoint as `host:port` for logs.
 */
export function formatEndpoint(endpoint: Endpoint): string {
  return `${endpoint.host}:${endpoint.port}`;
}
