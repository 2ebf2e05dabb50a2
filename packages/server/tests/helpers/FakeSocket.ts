/**
 * @fileoverview In-process stand-in for a client's TCP socket.
 */

import { Duplex } from 'node:stream';

/**
 * Duplex that records what the server writes and lets a test play the
 * client side: `clientSend` feeds bytes to the server, `clientClose` ends
 * the stream like an orderly TCP close.
 *
 * @example
 * ```typescript
 * const socket = new FakeSocket('127.0.0.1', 50001);
 * const connection = new LineConnection(socket);
 * socket.clientSend('MOVE 4\n');
 * await connection.receive(1); // { ok: true, value: 'MOVE 4' }
 * ```
 */
export class FakeSocket extends Duplex {
  private readonly written: string[] = [];
  /** When set, every write fails with this error */
  failWritesWith: Error | null = null;

  constructor(
    readonly remoteAddress: string | undefined,
    readonly remotePort: number | undefined
  ) {
    // Like a net.Socket accepted by net.Server: the write side ends with the read side
    super({ allowHalfOpen: false });
  }

  override _read(): void {}

  override _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    if (this.failWritesWith) {
      callback(this.failWritesWith);
      return;
    }
    this.written.push(chunk.toString());
    callback();
  }

  /** Deliver bytes from the client to the server */
  clientSend(text: string): void {
    this.push(text);
  }

  /** Close the client side */
  clientClose(): void {
    this.push(null);
  }

  /** Everything the server wrote, joined */
  get output(): string {
    return this.written.join('');
  }

  /** Server output split into lines, without the trailing empty line */
  get outputLines(): string[] {
    const lines = this.output.split('\n');
    if (lines[lines.length - 1] === '') {
      lines.pop();
    }
    return lines;
  }
}

let nextPort = 40000;

/**
 * Create a fake client socket with a unique loopback endpoint.
 */
export function createFakeSocket(): FakeSocket {
  nextPort += 1;
  return new FakeSocket('127.0.0.1', nextPort);
}
