import { describe, expect, it } from 'vitest';
import {
  gameOverMessage,
  gameStartMessage,
  isTerminalMessage,
  moveCommand,
  moveErrorMessage,
  OPPONENT_QUIT_MESSAGE,
  toWireLine,
  WAIT_PROMPT,
  WIN_MESSAGE,
} from '../src/protocol.js';
import { formatEndpoint, UNKNOWN_ENDPOINT } from '../src/types.js';

describe('protocol messages', () => {
  it('should format the game start line', () => {
    expect(gameStartMessage('O')).toBe('Game start! You are O');
  });

  it('should format rule violations with their kind', () => {
    expect(moveErrorMessage('CellOccupied', 'Cell 4 is already occupied')).toBe(
      'ERROR: CellOccupied: Cell 4 is already occupied'
    );
  });

  it('should terminate wire lines with a newline', () => {
    expect(toWireLine(WAIT_PROMPT)).toBe('Waiting for opponent...\n');
  });

  it('should format move commands', () => {
    expect(moveCommand(7)).toBe('MOVE 7');
  });
});

describe('isTerminalMessage', () => {
  it('should recognise game-ending lines', () => {
    expect(isTerminalMessage(WIN_MESSAGE)).toBe(true);
    expect(isTerminalMessage(OPPONENT_QUIT_MESSAGE)).toBe(true);
    expect(isTerminalMessage(gameOverMessage('Game is already over'))).toBe(true);
    expect(isTerminalMessage('Server error: boom')).toBe(true);
  });

  it('should not treat prompts or recoverable errors as terminal', () => {
    expect(isTerminalMessage(WAIT_PROMPT)).toBe(false);
    expect(isTerminalMessage(moveErrorMessage('NotYourTurn', 'It is not your turn'))).toBe(false);
    expect(isTerminalMessage('INVALID_MESSAGE: Malformed MOVE: MOVE x')).toBe(false);
  });
});

describe('endpoints', () => {
  it('should format as host:port', () => {
    expect(formatEndpoint({ host: '127.0.0.1', port: 5001 })).toBe('127.0.0.1:5001');
    expect(formatEndpoint(UNKNOWN_ENDPOINT)).toBe('unknown:0');
  });
});
