/**
 * @fileoverview Protocol state machine driving one paired game to the end.
 *
 * Phases: starting → awaiting_move → terminated.
 *
 * Each awaiting_move iteration broadcasts the board, prompts the player who
 * owns the turn, waits for the reply and applies it through the engine.
 * Transport and player failures arrive as values and are turned into wire
 * notices here; only unexpected exceptions are caught, at `run()`.
 */

import {
  DRAW,
  DRAW_MESSAGE,
  type Endpoint,
  formatEndpoint,
  type GameSymbol,
  gameOverMessage,
  gameStartMessage,
  invalidFormatMessage,
  invalidMessage,
  LOSE_MESSAGE,
  MOVE_PROMPT,
  moveErrorMessage,
  OPPONENT_DISCONNECTED_MESSAGE,
  OPPONENT_QUIT_MESSAGE,
  OPPONENT_TIMEOUT_MESSAGE,
  playerNotRecognizedMessage,
  serverErrorMessage,
  toWireLine,
  WAIT_PROMPT,
  WIN_MESSAGE,
} from '@ttt-match/shared';
import { createTicTacToe } from '../game/TicTacToe.js';
import {
  type GameEngine,
  type GameEngineFactory,
  type MoveError,
  RECOVERABLE_MOVE_ERRORS,
} from '../game/types.js';
import { parsePlayerCommand } from '../protocol/commands.js';
import {
  describeFailure,
  type SessionFailure,
  type TransportResult,
} from '../transport/failures.js';
import { describeError, logger } from '../utils/logger.js';

// ============ Types ============

/**
 * What the session needs from a player's connection.
 */
export interface PlayerConnection {
  readonly endpoint: Endpoint;
  send(text: string): Promise<TransportResult<void>>;
  receive(timeoutSeconds: number): Promise<TransportResult<string>>;
  close(): void;
}

export type SessionPhase = 'starting' | 'awaiting_move' | 'terminated';

/**
 * Why a session ended.
 */
export type SessionEndReason =
  | 'start_failed'
  | 'win'
  | 'draw'
  | 'game_over'
  | 'opponent_timeout'
  | 'opponent_quit'
  | 'opponent_disconnected'
  | 'player_not_recognized'
  | 'server_error';

export interface SessionResult {
  readonly reason: SessionEndReason;
  /** Player credited with the win, if any */
  readonly winner: Endpoint | null;
}

export interface GameSessionOptions {
  /** Seconds the current player has to answer a move prompt */
  moveTimeoutSeconds: number;
  /** Engine factory, tic-tac-toe by default */
  createEngine?: GameEngineFactory<PlayerConnection> | undefined;
}

interface PlayerFailure {
  readonly player: PlayerConnection;
  readonly failure: SessionFailure;
}

type TurnStep =
  | { readonly next: 'continue' }
  | { readonly next: 'end'; readonly result: SessionResult };

const CONTINUE: TurnStep = { next: 'continue' };

function end(reason: SessionEndReason, winner: Endpoint | null = null): TurnStep {
  return { next: 'end', result: { reason, winner } };
}

/** Notice sent to the remaining player for each terminal failure. */
const SURVIVOR_NOTICES = {
  timeout_waiting_for_player: {
    message: OPPONENT_TIMEOUT_MESSAGE,
    reason: 'opponent_timeout',
  },
  player_quit: { message: OPPONENT_QUIT_MESSAGE, reason: 'opponent_quit' },
  peer_disconnected: {
    message: OPPONENT_DISCONNECTED_MESSAGE,
    reason: 'opponent_disconnected',
  },
} as const satisfies Record<
  Exclude<SessionFailure['kind'], 'invalid_message'>,
  { message: string; reason: SessionEndReason }
>;

// ============ Session ============

export class GameSession {
  private readonly engine: GameEngine<PlayerConnection>;
  private readonly moveTimeoutSeconds: number;
  private _phase: SessionPhase = 'starting';

  constructor(
    private readonly p1: PlayerConnection,
    private readonly p2: PlayerConnection,
    options: GameSessionOptions
  ) {
    const createEngine: GameEngineFactory<PlayerConnection> =
      options.createEngine ?? createTicTacToe;
    this.engine = createEngine(p1, p2);
    this.moveTimeoutSeconds = options.moveTimeoutSeconds;
  }

  get phase(): SessionPhase {
    return this._phase;
  }

  /**
   * Play the game until it ends, then close both connections.
   * Never rejects.
   */
  async run(): Promise<SessionResult> {
    logger.info('Game session started', {
      p1: formatEndpoint(this.p1.endpoint),
      p2: formatEndpoint(this.p2.endpoint),
    });

    let result: SessionResult;
    try {
      result = (await this.start()) ?? (await this.playUntilEnd());
    } catch (error) {
      result = await this.abortWithServerError(error);
    }

    this._phase = 'terminated';
    this.closeConnections();

    logger.info('Game session ended', {
      reason: result.reason,
      winner: result.winner ? formatEndpoint(result.winner) : null,
    });
    return result;
  }

  // ============ Phases ============

  /**
   * Greet both players with their symbol.
   * @returns a result if the session cannot start, null otherwise
   */
  private async start(): Promise<SessionResult | null> {
    for (const player of [this.p1, this.p2]) {
      const sent = await this.sendLine(player, gameStartMessage(this.symbolOf(player)));
      if (!sent.ok) {
        logger.warn('Player disconnected during start', describeFailure(sent.failure));
        return { reason: 'start_failed', winner: null };
      }
    }
    this._phase = 'awaiting_move';
    return null;
  }

  private async playUntilEnd(): Promise<SessionResult> {
    for (;;) {
      const step = await this.playTurn();
      if (step.next === 'end') {
        return step.result;
      }
    }
  }

  private async playTurn(): Promise<TurnStep> {
    const unseen = await this.broadcast(this.engine.renderBoard());
    if (unseen) return this.handleFailure(unseen.player, unseen.failure);

    const current = this.engine.turn;
    const other = this.opponentOf(current);

    const prompted = await this.sendLine(current, MOVE_PROMPT);
    if (!prompted.ok) return this.handleFailure(current, prompted.failure);
    const told = await this.sendLine(other, WAIT_PROMPT);
    if (!told.ok) return this.handleFailure(other, told.failure);

    const reply = await current.receive(this.moveTimeoutSeconds);
    if (!reply.ok) return this.handleFailure(current, reply.failure);

    const command = parsePlayerCommand(reply.value);
    switch (command.type) {
      case 'quit':
        return this.handleFailure(current, {
          kind: 'player_quit',
          endpoint: current.endpoint,
          message: 'Player quit',
        });
      case 'malformed_move':
        return this.handleFailure(current, {
          kind: 'invalid_message',
          endpoint: current.endpoint,
          message: `Malformed MOVE: ${command.text}`,
        });
      case 'unrecognized': {
        const noticed = await this.sendLine(current, invalidFormatMessage(command.text));
        return noticed.ok ? CONTINUE : this.handleFailure(current, noticed.failure);
      }
      case 'move':
        return this.applyMove(current, command.cell);
    }
  }

  private async applyMove(current: PlayerConnection, cell: string): Promise<TurnStep> {
    const outcome = this.engine.makeMove(current, cell);
    if (!outcome.ok) {
      return this.handleMoveError(current, outcome.error);
    }

    const unseen = await this.broadcast(this.engine.renderBoard());
    if (unseen) return this.handleFailure(unseen.player, unseen.failure);

    const { winner } = this.engine;
    if (winner === null) {
      return CONTINUE;
    }

    if (winner === DRAW) {
      await this.notifyBoth(DRAW_MESSAGE);
      return end('draw');
    }

    let winningPlayer: Endpoint | null = null;
    for (const player of [this.p1, this.p2]) {
      const won = this.symbolOf(player) === winner;
      if (won) winningPlayer = player.endpoint;
      await this.notify(player, won ? WIN_MESSAGE : LOSE_MESSAGE);
    }
    return end('win', winningPlayer);
  }

  private async handleMoveError(current: PlayerConnection, error: MoveError): Promise<TurnStep> {
    if (RECOVERABLE_MOVE_ERRORS.has(error.kind)) {
      logger.debug('Move refused', {
        player: formatEndpoint(current.endpoint),
        kind: error.kind,
        detail: error.message,
      });
      const reported = await this.sendLine(current, moveErrorMessage(error.kind, error.message));
      return reported.ok ? CONTINUE : this.handleFailure(current, reported.failure);
    }

    if (error.kind === 'PlayerNotRecognized') {
      logger.error('Engine did not recognise the current player', {
        player: formatEndpoint(current.endpoint),
        detail: error.message,
      });
      await this.notify(current, playerNotRecognizedMessage(error.message));
      return end('player_not_recognized');
    }

    const finalBoard = this.engine.renderBoard();
    for (const player of [this.p1, this.p2]) {
      await this.notify(player, finalBoard);
      await this.notify(player, gameOverMessage(error.message));
    }
    return end('game_over');
  }

  // ============ Failure Handling ============

  /**
   * React to a failure of `player`, the connection it was observed on.
   */
  private async handleFailure(
    player: PlayerConnection,
    failure: SessionFailure
  ): Promise<TurnStep> {
    if (failure.kind === 'invalid_message') {
      logger.info('Invalid message from player', describeFailure(failure));
      await this.notify(player, invalidMessage(failure.message));
      return CONTINUE;
    }

    logger.info('Player failure ends session', describeFailure(failure));
    const survivor = this.opponentOf(player);
    const notice = SURVIVOR_NOTICES[failure.kind];
    await this.notify(survivor, notice.message);
    return end(notice.reason, survivor.endpoint);
  }

  private async abortWithServerError(error: unknown): Promise<SessionResult> {
    logger.error('Unexpected server error in game session', {
      p1: formatEndpoint(this.p1.endpoint),
      p2: formatEndpoint(this.p2.endpoint),
      ...describeError(error),
    });
    const detail = error instanceof Error ? error.message : String(error);
    await this.notifyBoth(serverErrorMessage(detail));
    return { reason: 'server_error', winner: null };
  }

  private closeConnections(): void {
    for (const player of [this.p1, this.p2]) {
      try {
        player.close();
      } catch (error) {
        logger.warn('Failed to close player connection', {
          player: formatEndpoint(player.endpoint),
          ...describeError(error),
        });
      }
    }
  }

  // ============ Helpers ============

  private opponentOf(player: PlayerConnection): PlayerConnection {
    return player === this.p1 ? this.p2 : this.p1;
  }

  private symbolOf(player: PlayerConnection): GameSymbol {
    const symbol = this.engine.symbols.get(player);
    if (symbol === undefined) {
      throw new Error(`No symbol assigned to ${formatEndpoint(player.endpoint)}`);
    }
    return symbol;
  }

  private sendLine(player: PlayerConnection, text: string): Promise<TransportResult<void>> {
    return player.send(toWireLine(text));
  }

  /**
   * Send to p1 then p2, stopping at the first failure.
   * @returns the player the text could not reach, or null
   */
  private async broadcast(text: string): Promise<PlayerFailure | null> {
    for (const player of [this.p1, this.p2]) {
      const sent = await this.sendLine(player, text);
      if (!sent.ok) {
        return { player, failure: sent.failure };
      }
    }
    return null;
  }

  /**
   * Best-effort send: a failure is logged and discarded.
   */
  private async notify(player: PlayerConnection, text: string): Promise<void> {
    const sent = await this.sendLine(player, text);
    if (!sent.ok) {
      logger.debug('Notice not delivered', { notice: text, ...describeFailure(sent.failure) });
    }
  }

  private async notifyBoth(text: string): Promise<void> {
    await this.notify(this.p1, text);
    await this.notify(this.p2, text);
  }
}
