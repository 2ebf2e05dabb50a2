import { DRAW } from '@ttt-match/shared';
import { beforeEach, describe, expect, it } from 'vitest';
import { createTicTacToe, findWinner, TicTacToe } from '../src/game/TicTacToe.js';

describe('TicTacToe', () => {
  let game: TicTacToe<string>;

  beforeEach(() => {
    game = createTicTacToe('alice', 'bob');
  });

  /** Play alternating moves, starting with the first player */
  function play(...cells: number[]): void {
    cells.forEach((cell, index) => {
      const result = game.makeMove(index % 2 === 0 ? 'alice' : 'bob', String(cell));
      expect(result).toEqual({ ok: true });
    });
  }

  describe('setup', () => {
    it('should give X to the first player and let them start', () => {
      expect(game.symbols.get('alice')).toBe('X');
      expect(game.symbols.get('bob')).toBe('O');
      expect(game.turn).toBe('alice');
      expect(game.winner).toBeNull();
    });

    it('should reject the same player twice', () => {
      expect(() => new TicTacToe('alice', 'alice')).toThrow('A game needs two distinct players');
    });

    it('should render an empty board with cell numbers', () => {
      expect(game.renderBoard()).toBe(' 0 | 1 | 2\n---+---+---\n 3 | 4 | 5\n---+---+---\n 6 | 7 | 8');
    });
  });

  describe('makeMove', () => {
    it('should place the mark and pass the turn', () => {
      play(4);

      expect(game.board[4]).toBe('X');
      expect(game.turn).toBe('bob');
      expect(game.renderBoard()).toBe(
        ' 0 | 1 | 2\n---+---+---\n 3 | X | 5\n---+---+---\n 6 | 7 | 8'
      );
    });

    it('should refuse a player outside the game', () => {
      expect(game.makeMove('mallory', '4')).toEqual({
        ok: false,
        error: { kind: 'PlayerNotRecognized', message: 'Player is not part of this game' },
      });
    });

    it('should refuse a move out of turn', () => {
      expect(game.makeMove('bob', '4')).toEqual({
        ok: false,
        error: { kind: 'NotYourTurn', message: "It is X's turn" },
      });
    });

    it('should refuse a move that is not a number', () => {
      expect(game.makeMove('alice', 'four')).toEqual({
        ok: false,
        error: { kind: 'InvalidMove', message: "Move must be a cell number, got 'four'" },
      });
    });

    it('should refuse a cell past the board', () => {
      expect(game.makeMove('alice', '9')).toEqual({
        ok: false,
        error: { kind: 'OutOfRange', message: 'Cell 9 is out of range (0-8)' },
      });
    });

    it('should refuse an occupied cell and keep the turn', () => {
      play(4);

      expect(game.makeMove('bob', '4')).toEqual({
        ok: false,
        error: { kind: 'CellOccupied', message: 'Cell 4 is already occupied' },
      });
      expect(game.turn).toBe('bob');
    });

    it('should check the turn before the move text', () => {
      expect(game.makeMove('bob', 'nonsense')).toEqual({
        ok: false,
        error: { kind: 'NotYourTurn', message: "It is X's turn" },
      });
    });
  });

  describe('game end', () => {
    it('should declare the player completing a row the winner', () => {
      play(0, 3, 1, 4, 2);

      expect(game.winner).toBe('X');
    });

    it('should declare the player completing a diagonal the winner', () => {
      play(0, 2, 1, 4, 8, 6);

      expect(game.winner).toBe('O');
    });

    it('should refuse moves once the game is won', () => {
      play(0, 3, 1, 4, 2);

      expect(game.makeMove('bob', '5')).toEqual({
        ok: false,
        error: { kind: 'GameOver', message: 'Game is already over' },
      });
    });

    it('should declare a draw on a full board without a line', () => {
      play(0, 1, 2, 4, 3, 5, 7, 6, 8);

      expect(game.winner).toBe(DRAW);
    });
  });

  describe('findWinner', () => {
    it('should prefer a completed line over a full board', () => {
      expect(findWinner(['X', 'X', 'X', 'O', 'O', 'X', 'O', 'X', 'O'])).toBe('X');
    });

    it('should report an unfinished game as null', () => {
      expect(findWinner(['X', null, null, null, 'O', null, null, null, null])).toBeNull();
    });
  });
});
