import { EventEmitter } from 'events';
import {
  StreamManagerConfigSchema,
  type ConnectionState,
  type ControlOp,
  type FeedHandler,
  type StreamManagerConfig,
  type StreamManagerConfigInput,
  type StreamManagerEvents,
  type Topic,
} from '@streamgate/schemas';
import { createLogger, systemClock, type Clock, type Logger } from '@streamgate/utils';
import type { AckFrame, AuthFrame, FeedAdapter } from '../adapter/feed-adapter';
import { CredentialKeeper } from '../credentials/credential-keeper';
import type { SessionCredential, SessionCredentialProvider } from '../credentials/session-credential';
import { InboundDispatcher, type DispatchStats } from '../dispatch/inbound-dispatcher';
import {
  AuthenticationError,
  CredentialError,
  ManagerStoppedError,
  ProtocolError,
  TransportClosedError,
  isPermanentError,
  toErrorMessage,
} from '../errors';
import { HeartbeatMonitor } from '../heartbeat/heartbeat-monitor';
import { ControlRateLimiter } from '../rate-limit/control-rate-limiter';
import { SnapshotStore } from '../snapshot/snapshot-store';
import { SubscriptionRegistry, type SubscriptionEntry } from '../subscription/subscription-registry';
import type { Transport, TransportConnection } from '../transport/transport';
import { WsTransport } from '../transport/ws-transport';

export interface StreamConnectionManagerOptions {
  adapter: FeedAdapter;
  /** Defaults to a `ws` transport */
  transport?: Transport;
  /** Required when the adapter places a session credential */
  credentials?: SessionCredentialProvider;
  config?: StreamManagerConfigInput;
  clock?: Clock;
  logger?: Logger;
}

export interface SubscribeResult {
  topicKey: string;
  /**
   * sent: the control frame went out on a ready connection.
   * queued: no connection became ready within the bounded wait; the
   * topic is sent on the next successful connection.
   */
  status: 'sent' | 'queued';
}

/** Legal lifecycle transitions */
const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  disconnected: ['connecting', 'stopped'],
  connecting: ['authenticating', 'ready', 'disconnected', 'stopped'],
  authenticating: ['ready', 'disconnected', 'stopped'],
  ready: ['disconnected', 'stopped'],
  stopped: [],
};

interface PendingControl {
  op: ControlOp;
  keys: string[];
}

interface AuthWaiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

interface ReadyWaiter {
  resolve: (ready: boolean) => void;
  reject: (error: Error) => void;
  cancel: () => void;
}

/** Everything tied to one live transport */
interface LiveConnection {
  connection: TransportConnection;
  readLoop: Promise<void>;
  heartbeat: HeartbeatMonitor;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

/**
 * Streaming connection manager
 *
 * Owns one duplex connection at a time and drives
 * connect → authenticate → replay → read loop, reconnecting with
 * exponential backoff after any loss until explicitly stopped.
 *
 * The subscription registry outlives every connection; it is replayed in
 * bounded batches after each successful connect. Venue specifics come from
 * the FeedAdapter.
 */
export class StreamConnectionManager extends EventEmitter<StreamManagerEvents> {
  private readonly adapter: FeedAdapter;
  private readonly transport: Transport;
  private readonly config: StreamManagerConfig;
  private readonly clock: Clock;
  private readonly log: Logger;

  private readonly registry = new SubscriptionRegistry();
  private readonly snapshots = new SnapshotStore();
  private readonly limiter: ControlRateLimiter;
  private readonly dispatcher: InboundDispatcher;
  private readonly keeper: CredentialKeeper | null;

  private state: ConnectionState = 'disconnected';

  /** Bumped on every connect attempt and every detach; stale work compares against it */
  private generation = 0;

  /** The current transport, set only between open and detach */
  private live: LiveConnection | null = null;

  /** Single-flight connect attempt */
  private connectPromise: Promise<void> | null = null;

  /** Single-flight reconnect loop */
  private reconnectPromise: Promise<void> | null = null;

  /** Chain of transports being closed; awaited before opening the next one */
  private releasing: Promise<void> = Promise.resolve();

  private stopRequested = false;
  private stopPromise: Promise<void> | null = null;
  private readonly stopController = new AbortController();

  private authWaiter: AuthWaiter | null = null;
  private readonly readyWaiters = new Set<ReadyWaiter>();
  private readonly pendingAcks = new Map<string, PendingControl>();
  private nextRequestId = 1;

  constructor(options: StreamConnectionManagerOptions) {
    super();
    this.adapter = options.adapter;
    this.transport = options.transport ?? new WsTransport({ logger: options.logger });
    this.config = StreamManagerConfigSchema.parse(options.config ?? {});
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? createLogger('stream:manager')).child({ venue: this.adapter.venue });
    this.limiter = new ControlRateLimiter(this.adapter.controlRateLimit, 1_000, this.clock);

    if (this.adapter.session !== 'none' && !options.credentials) {
      throw new CredentialError(`${this.adapter.venue} feed requires a session credential provider`, {
        permanent: true,
      });
    }

    this.keeper = options.credentials
      ? new CredentialKeeper(options.credentials, {
          renewIntervalMs: this.config.credentialRenewIntervalMs,
          clock: this.clock,
          logger: this.log,
          onRotated: (next, previous) => this.handleRotation(next, previous),
          onRenewalFailed: (error) => this.emitError(error),
        })
      : null;

    this.dispatcher = new InboundDispatcher(
      this.adapter,
      this.registry,
      this.snapshots,
      {
        onAck: (frame) => this.handleAck(frame),
        onAuth: (frame) => this.handleAuth(frame),
        onPong: () => this.live?.heartbeat.recordPong(),
        onPing: (reply) => this.answerPing(reply),
        onCredentialExpired: (message) => this.handleCredentialExpired(message),
      },
      { logger: this.log, clock: this.clock }
    );
  }

  // ============================================
  // Public API
  // ============================================

  /**
   * Connect and wait for Ready. No-op when already Ready.
   *
   * A failed attempt rejects and leaves a background reconnect loop
   * running unless the failure is permanent.
   */
  async connect(): Promise<void> {
    if (this.stopRequested) {
      throw new ManagerStoppedError();
    }
    if (this.state === 'ready') {
      return;
    }

    try {
      await this.attempt();
    } catch (error) {
      if (this.stopRequested || error instanceof ManagerStoppedError) {
        throw error;
      }
      if (isPermanentError(error)) {
        await this.fail(error);
      } else {
        this.scheduleReconnect();
      }
      throw error;
    }
  }

  /**
   * Stop for good: cancel heartbeat, renewal, read and reconnect work,
   * close the transport, revoke the session credential. Idempotent.
   */
  disconnect(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.shutdown('disconnect requested', true);
    }
    return this.stopPromise;
  }

  /**
   * Register a topic handler and send the subscription when connected
   *
   * Re-subscribing a key replaces its handler. Once this resolves the topic
   * is replayed on every future connection until unsubscribed.
   */
  async subscribe(topic: Topic, handler: FeedHandler): Promise<SubscribeResult> {
    if (this.stopRequested) {
      throw new ManagerStoppedError();
    }

    const resolved = this.adapter.resolveTopic(topic);
    const previous = this.registry.get(resolved.key);
    const isNew = this.registry.upsert({
      ...resolved,
      topic,
      handler,
    });

    this.log.info({ topicKey: resolved.key, isNew }, isNew ? 'Subscribing' : 'Replacing topic handler');

    const live = this.live;
    if (this.state === 'ready' && live) {
      if (previous && previous.wire === resolved.wire && (previous.active || this.isAwaitingAck(resolved.key))) {
        this.registry.markActive([resolved.key], previous.active);
        return { topicKey: resolved.key, status: 'sent' };
      }
      const entry = this.registry.get(resolved.key);
      const generation = this.generation;
      try {
        if (entry) {
          await this.sendControl('subscribe', [entry], live.connection);
        }
        return { topicKey: resolved.key, status: 'sent' };
      } catch (error) {
        if (!(error instanceof TransportClosedError)) throw error;
        // Still registered: the next connection replays it
        this.log.debug({ topicKey: resolved.key, err: error.message }, 'Connection lost while subscribing');
        this.handleConnectionLoss(generation, error.message);
      }
    }

    this.ensureConnecting();
    const ready = await this.waitForReady(this.config.readyTimeoutMs);
    return { topicKey: resolved.key, status: ready ? 'sent' : 'queued' };
  }

  /**
   * Remove a topic. Resolves false when it was not subscribed.
   */
  async unsubscribe(topic: Topic): Promise<boolean> {
    const resolved = this.adapter.resolveTopic(topic);
    const entry = this.registry.get(resolved.key);
    if (!entry) {
      this.log.debug({ topicKey: resolved.key }, 'Unsubscribe for unknown topic ignored');
      return false;
    }

    this.registry.remove(entry.key);
    this.snapshots.discard(entry.key);
    this.log.info({ topicKey: entry.key }, 'Unsubscribed');

    const live = this.live;
    if (this.state === 'ready' && live) {
      try {
        await this.sendControl('unsubscribe', [entry], live.connection);
      } catch (error) {
        if (!(error instanceof TransportClosedError)) throw error;
        // Nothing to undo: the topic is no longer replayed
        this.log.debug({ topicKey: entry.key, err: error.message }, 'Connection lost while unsubscribing');
      }
    }
    return true;
  }

  getState(): ConnectionState {
    return this.state;
  }

  isReady(): boolean {
    return this.state === 'ready';
  }

  /** Subscribed topic keys in replay order */
  getSubscriptions(): string[] {
    return this.registry.list().map((entry) => entry.key);
  }

  /** Copy of the merged state for a delta-style topic */
  getSnapshot(topicKey: string): unknown {
    return this.snapshots.get(topicKey);
  }

  getDispatchStats(): DispatchStats {
    return this.dispatcher.getStats();
  }

  // ============================================
  // Connection lifecycle
  // ============================================

  private setState(next: ConnectionState): boolean {
    const previous = this.state;
    if (previous === next) return true;
    if (!TRANSITIONS[previous].includes(next)) {
      this.log.debug({ from: previous, to: next }, 'Ignoring illegal state transition');
      return false;
    }
    this.state = next;
    this.log.debug({ from: previous, to: next }, 'State changed');
    this.emit('state', next, previous);
    return true;
  }

  private attempt(): Promise<void> {
    if (this.state === 'ready') {
      return Promise.resolve();
    }
    if (!this.connectPromise) {
      this.connectPromise = this.establish().finally(() => {
        this.connectPromise = null;
      });
    }
    return this.connectPromise;
  }

  private ensureConnecting(): void {
    if (this.connectPromise || this.reconnectPromise || this.state !== 'disconnected') {
      return;
    }
    this.connect().catch((error: unknown) => {
      this.log.warn({ err: toErrorMessage(error) }, 'Connect triggered by subscribe failed');
    });
  }

  private async establish(): Promise<void> {
    await this.releasing;
    this.assertActive(this.generation);

    const generation = ++this.generation;
    this.setState('connecting');

    try {
      let credential: SessionCredential | undefined;
      if (this.keeper && this.adapter.session !== 'none') {
        credential = await this.keeper.current();
        this.assertActive(generation);
      }

      const url = this.adapter.buildConnectUrl(credential);
      this.log.info({ url: this.redact(url, credential) }, 'Connecting');
      const connection = await this.transport.open(url, { timeoutMs: this.config.connectTimeoutMs });

      if (this.stopRequested || generation !== this.generation) {
        await connection.close(1000, 'superseded');
        this.assertActive(generation);
      }

      const heartbeat = new HeartbeatMonitor({
        intervalMs: this.config.heartbeat.intervalMs,
        timeoutMs: this.config.heartbeat.timeoutMs,
        clock: this.clock,
        logger: this.log,
        probe: () => {
          const frame = this.adapter.buildPingFrame();
          return frame === null ? connection.ping() : connection.send(frame);
        },
        onStall: (error) => this.handleConnectionLoss(generation, error.message),
      });
      connection.onPong(() => {
        if (generation === this.generation) heartbeat.recordPong();
      });

      this.live = { connection, heartbeat, readLoop: this.runReadLoop(connection, generation) };

      const authFrame = this.adapter.buildAuthFrame(this.clock.now(), credential);
      if (authFrame !== null) {
        this.setState('authenticating');
        await this.authenticate(connection, authFrame);
        this.assertActive(generation);
        this.log.info({}, 'Authenticated');
        this.emit('authenticated');
      }

      this.setState('ready');
      heartbeat.start();
      if (this.adapter.session !== 'none') {
        this.keeper?.startRenewal();
      }
      this.log.info({ subscriptions: this.registry.size }, 'Connection ready');
      this.emit('connected');

      await this.replay(connection, generation);
      if (generation === this.generation) {
        this.settleReadyWaiters(true);
      }
    } catch (error) {
      if (generation === this.generation) {
        this.release(this.detach(`connect failed: ${toErrorMessage(error)}`));
        await this.releasing;
      }
      if (error instanceof AuthenticationError) {
        this.keeper?.invalidate();
        this.log.error({ err: error.message, permanent: error.permanent }, 'Authentication failed');
        this.emitError(error);
      }
      throw error;
    }
  }

  private async authenticate(connection: TransportConnection, frame: string): Promise<void> {
    const outcome = new Promise<void>((resolve, reject) => {
      const cancel = this.clock.schedule(() => {
        this.authWaiter = null;
        reject(new AuthenticationError(`No authentication response within ${this.config.authTimeoutMs}ms`));
      }, this.config.authTimeoutMs);
      this.authWaiter = {
        resolve: () => {
          cancel();
          resolve();
        },
        reject: (error) => {
          cancel();
          reject(error);
        },
      };
    });

    try {
      await this.limiter.acquire();
      await connection.send(frame);
    } catch (error) {
      this.settleAuth(error instanceof Error ? error : new Error(String(error)));
    }
    await outcome;
  }

  private settleAuth(error?: Error): void {
    const waiter = this.authWaiter;
    this.authWaiter = null;
    if (!waiter) return;
    if (error) {
      waiter.reject(error);
    } else {
      waiter.resolve();
    }
  }

  private assertActive(generation: number): void {
    if (this.stopRequested) {
      throw new ManagerStoppedError();
    }
    if (generation !== this.generation) {
      throw new TransportClosedError('Connection attempt superseded');
    }
  }

  private async runReadLoop(connection: TransportConnection, generation: number): Promise<void> {
    let reason = 'connection closed by server';
    try {
      for await (const raw of connection.frames()) {
        if (generation !== this.generation) return;
        this.live?.heartbeat.recordActivity();
        this.dispatcher.dispatch(raw);
      }
    } catch (error) {
      reason = `read failed: ${toErrorMessage(error)}`;
    }
    this.handleConnectionLoss(generation, reason);
  }

  /**
   * Any loss of the current connection: read loop end, heartbeat stall,
   * expired or rotated credential
   */
  private handleConnectionLoss(generation: number, reason: string): void {
    if (generation !== this.generation || this.stopRequested) {
      return;
    }

    if (this.state !== 'ready') {
      // establish() is still running; failing its auth wait makes it clean up
      this.settleAuth(new TransportClosedError(reason));
      return;
    }

    this.log.warn({ reason }, 'Connection lost');
    this.release(this.detach(reason));
    this.scheduleReconnect();
  }

  /**
   * Synchronously drop everything tied to the current connection.
   * Returns the connection for release().
   */
  private detach(reason: string): LiveConnection | null {
    this.generation++;
    const live = this.live;
    this.live = null;

    live?.heartbeat.stop();
    this.keeper?.stopRenewal();
    this.settleAuth(new TransportClosedError(reason));
    this.pendingAcks.clear();
    this.snapshots.clear();
    this.registry.markAllInactive();

    const wasUp = live !== null || this.state !== 'disconnected';
    if (this.state !== 'stopped') {
      this.setState('disconnected');
    }
    if (wasUp) {
      this.emit('disconnected', reason);
    }
    return live;
  }

  /** Close the transport and wait for its read loop, in the background chain */
  private release(live: LiveConnection | null): void {
    if (!live) return;
    this.releasing = this.releasing.then(async () => {
      try {
        await live.connection.close();
      } catch (error) {
        this.log.warn({ err: toErrorMessage(error) }, 'Error closing transport');
      }
      await live.readLoop;
    });
  }

  private scheduleReconnect(): void {
    if (this.stopRequested || this.reconnectPromise) {
      return;
    }
    this.reconnectPromise = this.reconnectLoop()
      .catch((error: unknown) => {
        this.log.error({ err: toErrorMessage(error) }, 'Reconnect loop failed');
      })
      .finally(() => {
        this.reconnectPromise = null;
        if (!this.stopRequested && this.state === 'disconnected' && !this.connectPromise) {
          this.scheduleReconnect();
        }
      });
  }

  /**
   * Unbounded retries with capped exponential backoff. The stop flag is
   * checked before and after every sleep.
   */
  private async reconnectLoop(): Promise<void> {
    let delay = this.config.initialBackoffMs;
    let attempt = 0;

    while (!this.stopRequested && this.state !== 'ready') {
      attempt++;
      this.log.info({ attempt, delay }, 'Reconnecting');
      this.emit('reconnecting', attempt, delay);

      await this.clock.sleep(delay, this.stopController.signal);
      if (this.stopRequested) return;
      if (this.getState() === 'ready') return;

      try {
        await this.attempt();
        this.log.info({ attempt }, 'Reconnected');
      } catch (error) {
        if (this.stopRequested || error instanceof ManagerStoppedError) return;
        if (isPermanentError(error)) {
          await this.fail(error);
          return;
        }
        this.log.warn({ attempt, err: toErrorMessage(error) }, 'Reconnect attempt failed');
        delay = Math.min(delay * this.config.backoffMultiplier, this.config.maxBackoffMs);
      }
    }
  }

  /**
   * Permanent failure: report and stop
   */
  private async fail(error: unknown): Promise<void> {
    const failure = error instanceof Error ? error : new Error(String(error));
    this.log.error({ err: failure.message }, 'Permanent failure, stopping');
    if (!(failure instanceof AuthenticationError)) {
      // auth failures were already reported by establish()
      this.emitError(failure);
    }
    if (!this.stopPromise) {
      this.stopPromise = this.shutdown(`permanent failure: ${failure.message}`, false);
    }
    await this.stopPromise;
  }

  private async shutdown(reason: string, awaitReconnect: boolean): Promise<void> {
    this.stopRequested = true;
    this.stopController.abort();
    this.log.info({ reason }, 'Stopping');

    this.settleReadyWaiters(new ManagerStoppedError());
    this.release(this.detach(reason));
    await this.releasing;

    const tasks: Array<Promise<void>> = [];
    if (awaitReconnect && this.reconnectPromise) tasks.push(this.reconnectPromise);
    if (this.connectPromise) tasks.push(this.connectPromise);
    const results = await Promise.allSettled(tasks);
    for (const result of results) {
      if (result.status === 'rejected' && !(result.reason instanceof ManagerStoppedError)) {
        this.log.debug({ err: toErrorMessage(result.reason) }, 'Pending connect ended during stop');
      }
    }

    await this.keeper?.revoke();
    this.setState('stopped');
    this.log.info({}, 'Stopped');
  }

  // ============================================
  // Subscriptions on the wire
  // ============================================

  private async replay(connection: TransportConnection, generation: number): Promise<void> {
    const entries = this.registry.list();
    if (entries.length === 0) return;

    if (!this.adapter.supportsControlFrames) {
      this.registry.markActive(entries.map((entry) => entry.key));
      return;
    }

    const batches = chunk(entries, Math.min(this.config.replayBatchSize, this.adapter.maxTopicsPerFrame));
    try {
      for (const [index, batch] of batches.entries()) {
        if (index > 0) {
          await this.clock.sleep(this.config.replayPacingMs, this.stopController.signal);
        }
        this.assertActive(generation);
        await this.sendControl('subscribe', batch, connection);
      }
      this.log.info({ topics: entries.length, batches: batches.length }, 'Subscriptions replayed');
    } catch (error) {
      if (error instanceof TransportClosedError || error instanceof ManagerStoppedError) {
        this.log.debug({ err: error.message }, 'Replay interrupted by connection loss');
        return;
      }
      throw error;
    }
  }

  private async sendControl(op: ControlOp, entries: SubscriptionEntry[], connection: TransportConnection): Promise<void> {
    if (!this.adapter.supportsControlFrames) {
      if (op === 'subscribe') this.registry.markActive(entries.map((entry) => entry.key));
      return;
    }

    for (const batch of chunk(entries, this.adapter.maxTopicsPerFrame)) {
      const id = this.nextRequestId++;
      const frame = this.adapter.buildControlFrame(op, batch.map((entry) => entry.wire), id);
      await this.limiter.acquire();
      if (this.live?.connection !== connection) {
        throw new TransportClosedError('Connection replaced before control frame was sent');
      }
      this.pendingAcks.set(String(id), { op, keys: batch.map((entry) => entry.key) });
      await connection.send(frame);
      this.log.debug({ op, id, topics: batch.length }, 'Control frame sent');
    }
  }

  // ============================================
  // Dispatcher hooks
  // ============================================

  private isAwaitingAck(key: string): boolean {
    for (const pending of this.pendingAcks.values()) {
      if (pending.op === 'subscribe' && pending.keys.includes(key)) return true;
    }
    return false;
  }

  /**
   * Remove and return the request an ack answers, matched by request id or,
   * for venues that echo the subscription instead, by topic key
   */
  private takePendingAck(frame: AckFrame): PendingControl | undefined {
    if (frame.requestId !== undefined) {
      const id = String(frame.requestId);
      const pending = this.pendingAcks.get(id);
      this.pendingAcks.delete(id);
      return pending;
    }

    const keys = frame.topicKeys ?? [];
    for (const [id, pending] of this.pendingAcks) {
      if ((frame.op === undefined || pending.op === frame.op) && pending.keys.some((key) => keys.includes(key))) {
        this.pendingAcks.delete(id);
        return { op: pending.op, keys };
      }
    }
    return undefined;
  }

  private handleAck(frame: AckFrame): void {
    const pending = this.takePendingAck(frame);

    const keys = pending?.keys ?? frame.topicKeys ?? [];
    const op = pending?.op ?? frame.op ?? 'subscribe';
    if (keys.length === 0) {
      this.log.debug({ requestId: frame.requestId }, 'Unmatched acknowledgement');
      return;
    }

    if (frame.success) {
      if (op === 'subscribe') this.registry.markActive(keys);
      this.log.debug({ op, keys }, 'Control request acknowledged');
      return;
    }

    if (op === 'subscribe') this.registry.markActive(keys, false);
    this.log.error({ op, keys, message: frame.message }, 'Control request rejected');
    this.emitError(new ProtocolError(`${op} rejected for ${keys.join(', ')}: ${frame.message ?? 'no reason given'}`));
  }

  private handleAuth(frame: AuthFrame): void {
    if (frame.success) {
      this.settleAuth();
      return;
    }
    this.settleAuth(
      new AuthenticationError(`Authentication rejected: ${frame.message ?? 'no reason given'}`, {
        permanent: frame.permanent,
      })
    );
  }

  private answerPing(reply: string | null): void {
    const live = this.live;
    if (reply === null || !live) return;
    live.connection.send(reply).catch((error: unknown) => {
      this.log.debug({ err: toErrorMessage(error) }, 'Failed to answer server ping');
    });
  }

  private handleCredentialExpired(message?: string): void {
    this.log.warn({ message }, 'Session credential expired');
    this.keeper?.invalidate();
    this.handleConnectionLoss(this.generation, 'session credential expired');
  }

  private handleRotation(next: SessionCredential, previous: SessionCredential): void {
    this.log.info({ expiresAt: next.expiresAt }, 'Session credential rotated');
    this.emit('credentialRotated');
    if (next.value !== previous.value && this.adapter.session === 'url' && this.state === 'ready') {
      this.handleConnectionLoss(this.generation, 'session credential rotated');
    }
  }

  // ============================================
  // Helpers
  // ============================================

  /**
   * Wait until Ready. Resolves false on timeout, rejects when stopped.
   */
  private waitForReady(timeoutMs: number): Promise<boolean> {
    if (this.state === 'ready' && !this.connectPromise) {
      return Promise.resolve(true);
    }
    if (this.stopRequested) {
      return Promise.reject(new ManagerStoppedError());
    }
    return new Promise((resolve, reject) => {
      const waiter: ReadyWaiter = {
        resolve,
        reject,
        cancel: this.clock.schedule(() => {
          this.readyWaiters.delete(waiter);
          resolve(false);
        }, timeoutMs),
      };
      this.readyWaiters.add(waiter);
    });
  }

  private settleReadyWaiters(outcome: true | Error): void {
    for (const waiter of this.readyWaiters) {
      waiter.cancel();
      if (outcome === true) {
        waiter.resolve(true);
      } else {
        waiter.reject(outcome);
      }
    }
    this.readyWaiters.clear();
  }

  private emitError(error: Error): void {
    // Only emit if there are listeners (prevents unhandled error crash)
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }

  private redact(url: string, credential?: SessionCredential): string {
    return credential ? url.replace(credential.value, '***') : url;
  }
}
