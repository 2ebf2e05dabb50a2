/**
 * @fileoverview Failure signals raised by players and transports during a session.
 *
 * Failures are returned as values rather than thrown, so every call site in
 * the session loop decides explicitly how to react to them.
 */

import { type Endpoint, formatEndpoint } from '@ttt-match/shared';

/**
 * Kind of player-side failure.
 * - peer_disconnected: the socket closed or a read/write failed
 * - player_quit: the player sent QUIT
 * - timeout_waiting_for_player: no reply before the move deadline
 * - invalid_message: a MOVE command that could not be parsed
 */
export type FailureKind =
  | 'peer_disconnected'
  | 'player_quit'
  | 'timeout_waiting_for_player'
  | 'invalid_message';

export interface SessionFailure {
  readonly kind: FailureKind;
  /** Remote identity of the offending player */
  readonly endpoint: Endpoint;
  /** Human-readable cause */
  readonly message: string;
}

export type TransportResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly failure: SessionFailure };

export function succeed<T>(value: T): TransportResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  kind: FailureKind,
  endpoint: Endpoint,
  message: string
): TransportResult<T> {
  return { ok: false, failure: { kind, endpoint, message } };
}

/**
 * Fields for logging a failure.
 */
export function describeFailure(failure: SessionFailure): Record<string, unknown> {
  return {
    kind: failure.kind,
    player: formatEndpoint(failure.endpoint),
    cause: failure.message,
  };
}
