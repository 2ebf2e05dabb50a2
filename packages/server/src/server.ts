import { type AddressInfo, createServer, type Server } from 'node:net';
import { formatEndpoint, toWireLine, WELCOME_MESSAGE } from '@ttt-match/shared';
import type { GameEngineFactory } from './game/types.js';
import { MatchmakingQueue } from './matchmaking/MatchmakingQueue.js';
import {
  GameSession,
  type PlayerConnection,
  type SessionResult,
} from './session/GameSession.js';
import { describeFailure } from './transport/failures.js';
import { LineConnection, type PeerSocket } from './transport/LineConnection.js';
import { describeError, logger } from './utils/logger.js';

export interface MatchServerConfig {
  host: string;
  port: number;
  moveTimeoutSeconds: number;
  bufferSize: number;
  /** Engine factory for new sessions, tic-tac-toe by default */
  createEngine?: GameEngineFactory<PlayerConnection> | undefined;
}

/**
 * Accepts TCP clients, queues them for an opponent, and runs one
 * GameSession per pair.
 */
export class MatchServer {
  private readonly server: Server;
  private readonly queue: MatchmakingQueue<LineConnection>;
  private readonly sessions = new Map<GameSession, Promise<SessionResult>>();

  constructor(private readonly config: MatchServerConfig) {
    this.queue = new MatchmakingQueue((p1, p2) => this.startSession(p1, p2));
    this.server = createServer((socket) => {
      this.acceptConnection(socket).catch((error: unknown) => {
        logger.error('Failed to accept connection', describeError(error));
      });
    });
    this.server.on('error', (error: Error) => {
      logger.error('Server error', { error: error.message });
    });
  }

  /** Clients waiting for an opponent */
  get waitingCount(): number {
    return this.queue.size;
  }

  get activeSessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Start listening.
   * @returns the bound address
   */
  start(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error): void => reject(error);
      this.server.once('error', onError);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off('error', onError);
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server is not listening on a TCP port'));
          return;
        }
        logger.info('Server started', { host: address.address, port: address.port });
        resolve(address);
      });
    });
  }

  /**
   * Greet a new client and put it in the matchmaking queue.
   */
  async acceptConnection(socket: PeerSocket): Promise<void> {
    const connection = new LineConnection(socket, { bufferSize: this.config.bufferSize });
    logger.info('Client connected', { endpoint: formatEndpoint(connection.endpoint) });

    const welcomed = await connection.send(toWireLine(WELCOME_MESSAGE));
    if (!welcomed.ok) {
      logger.warn('Could not welcome client', describeFailure(welcomed.failure));
      connection.close();
      return;
    }

    if (!connection.isPeerConnected) {
      logger.info('Client left before being queued', {
        endpoint: formatEndpoint(connection.endpoint),
      });
      connection.close();
      return;
    }

    this.queue.offer(connection);
    connection.onDisconnect(() => {
      if (this.queue.withdraw(connection)) {
        logger.info('Waiting client disconnected', {
          endpoint: formatEndpoint(connection.endpoint),
        });
        connection.close();
      }
    });
  }

  /**
   * Resolves once every session running now has ended.
   */
  async sessionsSettled(): Promise<SessionResult[]> {
    return Promise.all(this.sessions.values());
  }

  /**
   * Stop accepting clients and drop the ones still waiting. Sessions in
   * progress are not drained.
   */
  close(): void {
    for (const connection of this.queue.waiting()) {
      this.queue.withdraw(connection);
      connection.close();
    }
    this.server.close();
    logger.info('Server closed');
  }

  private startSession(p1: LineConnection, p2: LineConnection): void {
    let session: GameSession;
    try {
      session = new GameSession(p1, p2, {
        moveTimeoutSeconds: this.config.moveTimeoutSeconds,
        createEngine: this.config.createEngine,
      });
    } catch (error) {
      logger.error('Could not create game session', describeError(error));
      p1.close();
      p2.close();
      return;
    }

    const finished = session
      .run()
      .catch((error: unknown): SessionResult => {
        logger.error('Game session failed', describeError(error));
        return { reason: 'server_error', winner: null };
      })
      .finally(() => {
        this.sessions.delete(session);
      });

    this.sessions.set(session, finished);
  }
}
