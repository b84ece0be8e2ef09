import type { FeedHandler, FeedMessage } from '@streamgate/schemas';
import { createLogger, systemClock, type Clock, type Logger } from '@streamgate/utils';
import type { AckFrame, AuthFrame, ClassifiedFrame, DataFrame, FeedAdapter } from '../adapter/feed-adapter';
import { toErrorMessage } from '../errors';
import type { SnapshotStore } from '../snapshot/snapshot-store';
import type { SubscriptionRegistry } from '../subscription/subscription-registry';

/**
 * Non-data frames handed back to the connection manager
 */
export interface DispatchHooks {
  onAck(frame: AckFrame): void;
  onAuth(frame: AuthFrame): void;
  onPong(): void;
  /** Server ping; `reply` is the frame to answer with, if any */
  onPing(reply: string | null): void;
  onCredentialExpired(message?: string): void;
}

export interface DispatchStats {
  frames: number;
  delivered: number;
  /** Undecodable or unroutable frames, and deltas without a snapshot */
  dropped: number;
  handlerErrors: number;
}

/**
 * Decodes inbound frames, normalizes deltas into snapshots and calls
 * topic handlers
 *
 * A frame never throws out of dispatch(); everything malformed is logged
 * and dropped so the read loop keeps running.
 */
export class InboundDispatcher {
  private readonly stats: DispatchStats = { frames: 0, delivered: 0, dropped: 0, handlerErrors: 0 };
  private readonly log: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly adapter: FeedAdapter,
    private readonly registry: SubscriptionRegistry,
    private readonly snapshots: SnapshotStore,
    private readonly hooks: DispatchHooks,
    options: { logger?: Logger; clock?: Clock } = {}
  ) {
    this.log = options.logger ?? createLogger('stream:dispatch');
    this.clock = options.clock ?? systemClock;
  }

  dispatch(raw: string): void {
    this.stats.frames++;

    let frame: ClassifiedFrame;
    try {
      frame = this.adapter.classifyFrame(this.adapter.decode(raw));
    } catch (error) {
      this.stats.dropped++;
      this.log.debug({ err: toErrorMessage(error), frame: raw.slice(0, 200) }, 'Dropping undecodable frame');
      return;
    }

    switch (frame.kind) {
      case 'data':
        this.route(frame);
        return;
      case 'ack':
        this.hooks.onAck(frame);
        return;
      case 'auth':
        this.hooks.onAuth(frame);
        return;
      case 'pong':
        this.hooks.onPong();
        return;
      case 'ping':
        this.hooks.onPing(frame.reply);
        return;
      case 'credential-expired':
        this.hooks.onCredentialExpired(frame.message);
        return;
      case 'ignore':
        this.log.trace({ reason: frame.reason }, 'Ignoring frame');
        return;
    }
  }

  getStats(): DispatchStats {
    return { ...this.stats };
  }

  private route(frame: DataFrame): void {
    const entry = frame.topicKey !== undefined
      ? this.registry.get(frame.topicKey)
      : this.registry.findByChannel(frame.channel);

    if (!entry) {
      this.stats.dropped++;
      this.log.debug({ channel: frame.channel, topicKey: frame.topicKey }, 'No handler for frame, dropping');
      return;
    }

    let data: unknown;
    switch (frame.update) {
      case 'snapshot':
        data = this.snapshots.replace(entry.key, frame.payload);
        break;
      case 'delta':
        data = this.snapshots.merge(entry.key, frame.payload, (current, delta) =>
          this.adapter.applyDelta(current, delta, frame)
        );
        if (data === undefined) {
          this.stats.dropped++;
          this.log.debug({ topicKey: entry.key }, 'Delta before snapshot, dropping');
          return;
        }
        break;
      case 'event':
        data = frame.payload;
        break;
    }

    this.deliver(entry.handler, {
      topicKey: entry.key,
      channel: frame.channel,
      type: frame.update === 'event' ? 'event' : 'snapshot',
      data,
      receivedAt: this.clock.now(),
    });
  }

  /**
   * Run a handler without awaiting it; failures are logged
   */
  private deliver(handler: FeedHandler, message: FeedMessage): void {
    this.stats.delivered++;
    const fail = (error: unknown) => {
      this.stats.handlerErrors++;
      this.log.error({ topicKey: message.topicKey, err: toErrorMessage(error) }, 'Topic handler failed');
    };

    try {
      const result = handler(message);
      if (result instanceof Promise) {
        result.catch(fail);
      }
    } catch (error) {
      fail(error);
    }
  }
}
