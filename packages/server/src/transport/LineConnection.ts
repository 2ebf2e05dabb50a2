import type { Duplex } from 'node:stream';
import { type Endpoint, formatEndpoint, UNKNOWN_ENDPOINT } from '@ttt-match/shared';
import { logger } from '../utils/logger.js';
import { fail, succeed, type TransportResult } from './failures.js';

/**
 * Byte stream with a remote address. `net.Socket` satisfies this; tests
 * use an in-process Duplex.
 */
export type PeerSocket = Duplex & {
  readonly remoteAddress?: string | undefined;
  readonly remotePort?: number | undefined;
};

export interface LineConnectionOptions {
  /** Longest run of bytes without a newline delivered as one message */
  bufferSize: number;
  /** Unread messages held before the socket stops reading */
  maxQueuedMessages: number;
}

export const DEFAULT_LINE_CONNECTION_OPTIONS: LineConnectionOptions = {
  bufferSize: 1024,
  maxQueuedMessages: 16,
};

interface PendingReceive {
  deliver(result: TransportResult<string>): void;
}

/**
 * Resolve the remote identity of a socket, falling back to UNKNOWN_ENDPOINT.
 */
export function resolveEndpoint(socket: PeerSocket): Endpoint {
  const { remoteAddress, remotePort } = socket;
  if (remoteAddress === undefined || remotePort === undefined) {
    return UNKNOWN_ENDPOINT;
  }
  return { host: remoteAddress, port: remotePort };
}

/**
 * A client connection speaking the newline-terminated text protocol.
 *
 * Incoming bytes are split into lines as they arrive and queued; `receive`
 * takes the oldest queued line or waits for the next one until its deadline.
 * Neither `send` nor `receive` rejects: failures come back as values.
 */
export class LineConnection {
  readonly endpoint: Endpoint;
  private readonly options: LineConnectionOptions;
  private readonly lines: string[] = [];
  private partial = '';
  private pending: PendingReceive | null = null;
  private peerGone = false;
  private readError: Error | null = null;
  private closed = false;
  private disconnectListeners: Array<() => void> = [];

  constructor(
    private readonly socket: PeerSocket,
    options: Partial<LineConnectionOptions> = {}
  ) {
    this.options = { ...DEFAULT_LINE_CONNECTION_OPTIONS, ...options };
    this.endpoint = resolveEndpoint(socket);

    socket.setEncoding('utf8');
    socket.on('data', (chunk: string | Buffer) => this.handleData(chunk.toString()));
    socket.on('end', () => this.handlePeerGone(null));
    socket.on('close', () => this.handlePeerGone(null));
    socket.on('error', (error: Error) => this.handlePeerGone(error));
  }

  /** Whether the peer is still there and the connection has not been closed */
  get isPeerConnected(): boolean {
    return !this.peerGone && !this.closed;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Messages received but not yet read */
  get queuedCount(): number {
    return this.lines.length;
  }

  /** Whether a receive deadline is currently armed */
  get deadlineActive(): boolean {
    return this.pending !== null;
  }

  /**
   * Write the whole text to the peer.
   * Resolves once the socket has accepted the write.
   */
  send(text: string): Promise<TransportResult<void>> {
    if (this.closed || this.socket.destroyed || !this.socket.writable) {
      return Promise.resolve(
        fail('peer_disconnected', this.endpoint, 'send failed: connection is closed')
      );
    }

    return new Promise((resolve) => {
      this.socket.write(text, (error?: Error | null) => {
        if (error) {
          resolve(fail('peer_disconnected', this.endpoint, `send failed: ${error.message}`));
          return;
        }
        resolve(succeed(undefined));
      });
    });
  }

  /**
   * Wait up to `timeoutSeconds` for the next message, returned trimmed.
   * The deadline is disarmed on every exit path.
   */
  receive(timeoutSeconds: number): Promise<TransportResult<string>> {
    if (this.pending) {
      throw new Error(`Receive already pending on ${formatEndpoint(this.endpoint)}`);
    }

    const queued = this.lines.shift();
    if (this.lines.length < this.options.maxQueuedMessages) {
      this.resumeReading();
    }
    if (queued !== undefined) {
      return Promise.resolve(succeed(queued.trim()));
    }

    const gone = this.disconnectFailure();
    if (gone) {
      return Promise.resolve(gone);
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.pending = null;
        resolve(
          fail(
            'timeout_waiting_for_player',
            this.endpoint,
            `Timed out after ${timeoutSeconds} seconds`
          )
        );
      }, timeoutSeconds * 1000);

      this.pending = {
        deliver: (result) => {
          clearTimeout(timer);
          this.pending = null;
          resolve(result);
        },
      };
    });
  }

  /**
   * Register a callback for when the peer goes away. Runs immediately if
   * that already happened.
   */
  onDisconnect(listener: () => void): void {
    if (this.peerGone) {
      listener();
      return;
    }
    this.disconnectListeners.push(listener);
  }

  /**
   * Close the connection. Safe to call more than once.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.disconnectListeners = [];
    this.pending?.deliver(
      fail('peer_disconnected', this.endpoint, 'recv failed: connection closed locally')
    );

    try {
      if (this.socket.destroyed) {
        return;
      }
      this.socket.end(() => this.socket.destroy());
    } catch (error) {
      logger.warn('Failed to close socket', {
        endpoint: formatEndpoint(this.endpoint),
        error: error instanceof Error ? error.message : String(error),
      });
      this.socket.destroy();
    }
  }

  private handleData(chunk: string): void {
    this.partial += chunk;

    let newline = this.partial.indexOf('\n');
    while (newline !== -1) {
      const line = this.partial.slice(0, newline);
      const rest = this.splitOversized(line);
      if (rest.length > 0 || line.length === 0) {
        this.lines.push(rest);
      }
      this.partial = this.partial.slice(newline + 1);
      newline = this.partial.indexOf('\n');
    }

    this.partial = this.splitOversized(this.partial);

    this.flushToPending();

    // Further input waits in the socket until the queue drains
    if (this.lines.length >= this.options.maxQueuedMessages && !this.pending) {
      this.socket.pause();
    }
  }

  /**
   * Queue `bufferSize`-byte units from the front of `text` while it is
   * longer than that, and return what remains.
   */
  private splitOversized(text: string): string {
    let rest = text;
    while (Buffer.byteLength(rest) > this.options.bufferSize) {
      const unit = takeBytes(rest, this.options.bufferSize);
      this.lines.push(unit);
      rest = rest.slice(unit.length);
    }
    return rest;
  }

  private resumeReading(): void {
    if (this.socket.isPaused() && !this.peerGone && !this.closed) {
      this.socket.resume();
    }
  }

  private handlePeerGone(error: Error | null): void {
    if (error && !this.readError) {
      this.readError = error;
    }
    if (this.peerGone) {
      return;
    }
    this.peerGone = true;

    if (this.partial.length > 0) {
      this.lines.push(this.partial);
      this.partial = '';
    }
    this.flushToPending();

    const gone = this.disconnectFailure();
    if (gone) {
      this.pending?.deliver(gone);
    }

    const listeners = this.disconnectListeners;
    this.disconnectListeners = [];
    for (const listener of listeners) {
      listener();
    }
  }

  private flushToPending(): void {
    if (!this.pending) return;
    const next = this.lines.shift();
    if (next !== undefined) {
      this.pending.deliver(succeed(next.trim()));
    }
  }

  private disconnectFailure(): TransportResult<string> | null {
    if (this.lines.length > 0) {
      return null;
    }
    if (this.readError) {
      return fail('peer_disconnected', this.endpoint, `recv failed: ${this.readError.message}`);
    }
    if (this.peerGone) {
      return fail('peer_disconnected', this.endpoint, 'client closed connection');
    }
    if (this.closed) {
      return fail('peer_disconnected', this.endpoint, 'recv failed: connection closed locally');
    }
    return null;
  }
}

/**
 * Longest prefix of `text` whose UTF-8 encoding fits in `maxBytes`.
 */
function takeBytes(text: string, maxBytes: number): string {
  let bytes = 0;
  let end = 0;
  for (const char of text) {
    const size = Buffer.byteLength(char);
    if (bytes + size > maxBytes) break;
    bytes += size;
    end += char.length;
  }
  // A single character wider than the buffer still has to make progress
  return text.slice(0, Math.max(end, 1));
}
