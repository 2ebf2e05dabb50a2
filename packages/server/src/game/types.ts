/**
 * @fileoverview Contract between the game session and a rule engine.
 * The session only drives the engine through this interface.
 */

import type { GameSymbol, Winner } from '@ttt-match/shared';

// ============ Move Results ============

/**
 * Why a move was refused.
 * - OutOfRange: cell index outside 0-8
 * - CellOccupied: the cell already holds a symbol
 * - NotYourTurn: the mover does not own the turn
 * - InvalidMove: the move token is not a cell index
 * - PlayerNotRecognized: the mover is not part of this game
 * - GameOver: the game already has a winner or is drawn
 */
export type MoveErrorKind =
  | 'OutOfRange'
  | 'CellOccupied'
  | 'NotYourTurn'
  | 'InvalidMove'
  | 'PlayerNotRecognized'
  | 'GameOver';

export interface MoveError {
  readonly kind: MoveErrorKind;
  readonly message: string;
}

export type MoveResult = { readonly ok: true } | { readonly ok: false; readonly error: MoveError };

/**
 * Rule violations a player can recover from by sending another move.
 */
export const RECOVERABLE_MOVE_ERRORS: ReadonlySet<MoveErrorKind> = new Set<MoveErrorKind>([
  'OutOfRange',
  'CellOccupied',
  'NotYourTurn',
  'InvalidMove',
]);

// ============ Engine ============

/**
 * Rule engine for one pairing of two players.
 * Owns the board, turn order, symbol assignment and win detection.
 */
export interface GameEngine<TPlayer> {
  /** Player whose move is expected next */
  readonly turn: TPlayer;
  /** Symbol assigned to each player */
  readonly symbols: ReadonlyMap<TPlayer, GameSymbol>;
  /** Result after the latest move */
  readonly winner: Winner;
  /** Multi-line text rendering of the board */
  renderBoard(): string;
  /**
   * Apply `move` for `player`. On success the board changes, `winner` is
   * updated and the turn passes to the other player.
   */
  makeMove(player: TPlayer, move: string): MoveResult;
}

export type GameEngineFactory<TPlayer> = (first: TPlayer, second: TPlayer) => GameEngine<TPlayer>;
