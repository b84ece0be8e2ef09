import { systemClock, type Clock } from '@streamgate/utils';

/**
 * Sliding-window limiter for outbound control frames
 *
 * At most `limit` acquisitions inside any `windowMs` window. Callers are
 * served strictly in arrival order; a caller that has to wait blocks the
 * ones behind it.
 */
export class ControlRateLimiter {
  /** Timestamps of acquisitions still inside the window, oldest first */
  private readonly sent: number[] = [];

  /** Tail of the FIFO chain of pending acquisitions */
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly limit: number,
    private readonly windowMs = 1_000,
    private readonly clock: Clock = systemClock
  ) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Control rate limit must be a positive integer, got ${limit}`);
    }
  }

  /**
   * Resolve once a send slot is free and claim it
   */
  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.waitForSlot());
    this.tail = turn;
    return turn;
  }

  private async waitForSlot(): Promise<void> {
    this.prune(this.clock.now());

    while (this.sent.length >= this.limit) {
      const oldest = this.sent[0] ?? this.clock.now();
      await this.clock.sleep(Math.max(0, oldest + this.windowMs - this.clock.now()));
      this.prune(this.clock.now());
    }

    this.sent.push(this.clock.now());
  }

  private prune(now: number): void {
    while (this.sent.length > 0 && now - (this.sent[0] ?? now) >= this.windowMs) {
      this.sent.shift();
    }
  }
}
