import { createLogger, systemClock, type Clock, type Logger } from '@streamgate/utils';
import { HeartbeatTimeoutError, TransportClosedError, toErrorMessage } from '../errors';

export interface HeartbeatMonitorOptions {
  /** Probe cadence */
  intervalMs: number;
  /** Max time without a pong, or without any inbound traffic */
  timeoutMs: number;
  /** Send one liveness probe */
  probe: () => Promise<void>;
  /** Called once when the connection is judged dead; the monitor stops itself first */
  onStall: (error: HeartbeatTimeoutError) => void;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Liveness checker for one connection
 *
 * Each tick first checks for a stall (an unanswered probe older than the
 * timeout, or inbound silence longer than the timeout), then sends a probe.
 */
export class HeartbeatMonitor {
  private cancelTick: (() => void) | null = null;
  private lastActivityAt = 0;
  /** Send time of the oldest probe not yet answered */
  private probeSentAt: number | null = null;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(private readonly options: HeartbeatMonitorOptions) {
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? createLogger('stream:heartbeat');
  }

  start(): void {
    this.stop();
    this.lastActivityAt = this.clock.now();
    this.probeSentAt = null;
    this.arm();
  }

  stop(): void {
    if (this.cancelTick) {
      this.cancelTick();
      this.cancelTick = null;
    }
  }

  /** Any inbound frame */
  recordActivity(): void {
    this.lastActivityAt = this.clock.now();
  }

  /** Reply to a probe */
  recordPong(): void {
    this.probeSentAt = null;
    this.lastActivityAt = this.clock.now();
  }

  private arm(): void {
    this.cancelTick = this.clock.schedule(() => this.tick(), this.options.intervalMs);
  }

  private tick(): void {
    this.cancelTick = null;
    const now = this.clock.now();
    const { timeoutMs } = this.options;

    if (this.probeSentAt !== null && now - this.probeSentAt >= timeoutMs) {
      this.stall(`no pong for ${now - this.probeSentAt}ms`);
      return;
    }
    if (now - this.lastActivityAt >= timeoutMs) {
      this.stall(`no inbound traffic for ${now - this.lastActivityAt}ms`);
      return;
    }

    if (this.probeSentAt === null) {
      this.probeSentAt = now;
    }
    this.arm();
    this.options.probe().catch((error: unknown) => {
      if (error instanceof TransportClosedError) {
        // Already gone; the read loop reports the loss
        this.log.debug({ err: error.message }, 'Heartbeat probe on closed transport');
        this.stop();
        return;
      }
      this.log.warn({ err: toErrorMessage(error) }, 'Heartbeat probe failed');
    });
  }

  private stall(reason: string): void {
    this.stop();
    this.log.warn({ reason }, 'Connection stalled');
    this.options.onStall(new HeartbeatTimeoutError(reason));
  }
}
