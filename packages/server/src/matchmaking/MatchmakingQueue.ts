/**
 * @fileoverview FIFO holding area for clients waiting for an opponent.
 *
 * `offer` appends and drains pairs in one synchronous step. Nothing in it
 * awaits, so no other connection can be queued or paired while it runs.
 */

export type PairHandler<T> = (first: T, second: T) => void;

export class MatchmakingQueue<T extends object> {
  private readonly entries: T[] = [];
  private readonly paired = new WeakSet<T>();

  constructor(private readonly onPair: PairHandler<T>) {}

  /** Number of clients currently waiting */
  get size(): number {
    return this.entries.length;
  }

  /** Snapshot of the waiting clients, oldest first */
  waiting(): readonly T[] {
    return [...this.entries];
  }

  /**
   * Add a client. Whenever two or more are waiting, the two oldest are
   * removed and handed to `onPair` in arrival order.
   * @returns false if the client is already waiting or was paired before
   */
  offer(entry: T): boolean {
    if (this.paired.has(entry) || this.entries.includes(entry)) {
      return false;
    }

    this.entries.push(entry);

    while (this.entries.length >= 2) {
      const [first, second] = this.entries.splice(0, 2);
      if (first === undefined || second === undefined) {
        break;
      }
      this.paired.add(first);
      this.paired.add(second);
      this.onPair(first, second);
    }

    return true;
  }

  /**
   * Remove a client that is still waiting.
   * @returns whether the client was waiting
   */
  withdraw(entry: T): boolean {
    const index = this.entries.indexOf(entry);
    if (index === -1) {
      return false;
    }
    this.entries.splice(index, 1);
    return true;
  }
}
