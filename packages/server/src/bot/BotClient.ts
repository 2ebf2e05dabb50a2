/**
 * @fileoverview Bot client that connects to the match server and plays automatically.
 * Answers every move prompt with a random free cell read from the last board.
 */

import { connect, type Socket } from 'node:net';
import { createInterface, type Interface } from 'node:readline';
import {
  freeCellsFromRows,
  isTerminalMessage,
  MOVE_PROMPT,
  moveCommand,
  parseBoardRow,
  QUIT_COMMAND,
  toWireLine,
} from '@ttt-match/shared';
import { logger } from '../utils/logger.js';

/**
 * Configuration for the bot client.
 */
export interface BotConfig {
  host: string;
  port: number;
  /** Delay before answering a prompt, in milliseconds */
  thinkTimeMs: number;
  /** Source of randomness in [0, 1) */
  random: () => number;
}

const DEFAULT_CONFIG: BotConfig = {
  host: '127.0.0.1',
  port: 5000,
  thinkTimeMs: 500,
  random: Math.random,
};

/**
 * Pick a random free cell from rendered board rows.
 * @returns the cell index, or null when no cell is free
 */
export function chooseMove(rows: readonly string[], random: () => number): number | null {
  const free = freeCellsFromRows(rows);
  if (free.length === 0) {
    return null;
  }
  const pick = Math.min(free.length - 1, Math.floor(random() * free.length));
  return free[pick] ?? null;
}

/**
 * Automated player for the line protocol.
 */
export class BotClient {
  private socket: Socket | null = null;
  private lines: Interface | null = null;
  private boardRows: string[] = [];
  private thinkTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly config: BotConfig;

  constructor(config: Partial<BotConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Connect to the match server.
   */
  connect(): void {
    const { host, port } = this.config;
    logger.info('Bot connecting', { host, port });

    const socket = connect({ host, port }, () => {
      logger.info('Bot connected to server');
    });
    this.socket = socket;

    this.lines = createInterface({ input: socket });
    this.lines.on('line', (line: string) => this.handleLine(line));

    socket.on('close', () => {
      logger.info('Bot disconnected');
      this.cleanup();
    });

    socket.on('error', (error: Error) => {
      logger.error('Bot socket error', { error: error.message });
    });
  }

  /**
   * Leave the game and disconnect.
   */
  disconnect(): void {
    if (this.socket && !this.socket.destroyed) {
      this.socket.write(toWireLine(QUIT_COMMAND));
      this.socket.end();
    }
    this.cleanup();
  }

  /**
   * React to one line from the server.
   * @returns the reply written to the server, if any
   */
  handleLine(line: string): string | null {
    if (parseBoardRow(line)) {
      // Keep only the rows of the latest board
      this.boardRows = [...this.boardRows, line].slice(-3);
      return null;
    }

    if (isTerminalMessage(line)) {
      logger.info('Game finished', { result: line });
      this.disconnectQuietly();
      return null;
    }

    if (line.trim() !== MOVE_PROMPT) {
      logger.debug('Server says', { line });
      return null;
    }

    const cell = chooseMove(this.boardRows, this.config.random);
    if (cell === null) {
      logger.warn('Prompted to move on a full board');
      return null;
    }

    const reply = moveCommand(cell);
    this.thinkTimer = setTimeout(() => {
      this.thinkTimer = null;
      this.socket?.write(toWireLine(reply));
    }, this.config.thinkTimeMs);
    return reply;
  }

  private disconnectQuietly(): void {
    this.socket?.end();
    this.cleanup();
  }

  private cleanup(): void {
    if (this.thinkTimer) {
      clearTimeout(this.thinkTimer);
      this.thinkTimer = null;
    }
    this.lines?.close();
    this.lines = null;
    this.boardRows = [];
  }
}
