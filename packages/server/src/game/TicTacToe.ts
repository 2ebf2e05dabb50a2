/**
 * @fileoverview Tic-tac-toe rules: the default game engine for sessions.
 */

import {
  BOARD_CELL_COUNT,
  type Cell,
  DRAW,
  type GameSymbol,
  renderBoard,
  type Winner,
} from '@ttt-match/shared';
import type { GameEngine, MoveErrorKind, MoveResult } from './types.js';

const WINNING_LINES: ReadonlyArray<readonly [number, number, number]> = [
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],
  [0, 4, 8],
  [2, 4, 6],
];

function refuse(kind: MoveErrorKind, message: string): MoveResult {
  return { ok: false, error: { kind, message } };
}

/**
 * Find the symbol that completes a line, 'Draw' for a full board, or null.
 */
export function findWinner(cells: readonly Cell[]): Winner {
  for (const [a, b, c] of WINNING_LINES) {
    const mark = cells[a];
    if (mark && mark === cells[b] && mark === cells[c]) {
      return mark;
    }
  }
  return cells.every((cell) => cell !== null) ? DRAW : null;
}

/**
 * Game of tic-tac-toe between two players. The first player is X and
 * moves first.
 */
export class TicTacToe<TPlayer> implements GameEngine<TPlayer> {
  private readonly cells: Cell[] = Array.from({ length: BOARD_CELL_COUNT }, () => null);
  private readonly _symbols: Map<TPlayer, GameSymbol>;
  private _turn: TPlayer;
  private _winner: Winner = null;

  constructor(
    private readonly first: TPlayer,
    private readonly second: TPlayer
  ) {
    if (first === second) {
      throw new Error('A game needs two distinct players');
    }
    this._symbols = new Map<TPlayer, GameSymbol>([
      [first, 'X'],
      [second, 'O'],
    ]);
    this._turn = first;
  }

  get turn(): TPlayer {
    return this._turn;
  }

  get symbols(): ReadonlyMap<TPlayer, GameSymbol> {
    return this._symbols;
  }

  get winner(): Winner {
    return this._winner;
  }

  /** Current cells, null for empty */
  get board(): readonly Cell[] {
    return this.cells;
  }

  renderBoard(): string {
    return renderBoard(this.cells);
  }

  makeMove(player: TPlayer, move: string): MoveResult {
    const symbol = this._symbols.get(player);
    if (symbol === undefined) {
      return refuse('PlayerNotRecognized', 'Player is not part of this game');
    }
    if (this._winner !== null) {
      return refuse('GameOver', 'Game is already over');
    }
    if (player !== this._turn) {
      return refuse('NotYourTurn', `It is ${this.symbolOfTurn()}'s turn`);
    }
    if (!/^\d+$/.test(move)) {
      return refuse('InvalidMove', `Move must be a cell number, got '${move}'`);
    }

    const index = Number(move);
    if (index >= BOARD_CELL_COUNT) {
      return refuse('OutOfRange', `Cell ${index} is out of range (0-8)`);
    }
    if (this.cells[index] !== null) {
      return refuse('CellOccupied', `Cell ${index} is already occupied`);
    }

    this.cells[index] = symbol;
    this._winner = findWinner(this.cells);
    this._turn = player === this.first ? this.second : this.first;
    return { ok: true };
  }

  private symbolOfTurn(): GameSymbol {
    return this._turn === this.first ? 'X' : 'O';
  }
}

/**
 * Engine factory used by sessions unless another is supplied.
 */
export function createTicTacToe<TPlayer>(first: TPlayer, second: TPlayer): TicTacToe<TPlayer> {
  return new TicTacToe(first, second);
}
