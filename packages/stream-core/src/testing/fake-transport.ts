/**
 * In-process stand-ins for the transport, clock and credential side channel
 */
import { ControlRequestSchema, AuthRequestSchema } from '@streamgate/schemas';
import type { Clock } from '@streamgate/utils';
import type { SessionCredential, SessionCredentialProvider } from '../credentials/session-credential';
import { TransportClosedError } from '../errors';
import { FrameQueue } from '../transport/frame-queue';
import type { Transport, TransportConnection } from '../transport/transport';

export type Responder = (frame: string, connection: FakeConnection) => void;

/**
 * In-process connection; the test plays the server side
 */
export class FakeConnection implements TransportConnection {
  readonly sent: string[] = [];
  pings = 0;
  closed = false;
  private open = true;
  private readonly queue = new FrameQueue();
  private readonly pongListeners: Array<() => void> = [];

  constructor(
    readonly url: string,
    private readonly responder: Responder | undefined,
    private readonly autoPong: boolean
  ) {}

  isOpen(): boolean {
    return this.open;
  }

  async send(frame: string): Promise<void> {
    if (!this.open) throw new TransportClosedError();
    this.sent.push(frame);
    this.responder?.(frame, this);
  }

  async ping(): Promise<void> {
    if (!this.open) throw new TransportClosedError();
    this.pings++;
    if (this.autoPong) this.pong();
  }

  frames(): AsyncIterable<string> {
    return this.queue;
  }

  onPong(listener: () => void): void {
    this.pongListeners.push(listener);
  }

  async close(): Promise<void> {
    this.open = false;
    this.closed = true;
    this.queue.end();
  }

  // Server side

  push(frame: unknown): void {
    this.queue.push(typeof frame === 'string' ? frame : JSON.stringify(frame));
  }

  pong(): void {
    for (const listener of this.pongListeners) listener();
  }

  /** Drop the connection from the server side */
  drop(error?: Error): void {
    this.open = false;
    this.queue.end(error);
  }

  /** Sent frames parsed as JSON */
  sentJson(): unknown[] {
    return this.sent.map((frame): unknown => JSON.parse(frame));
  }

  /** Args of every subscribe frame, in send order */
  subscribedArgs(): string[][] {
    return this.controlArgs('subscribe');
  }

  controlArgs(op: 'subscribe' | 'unsubscribe'): string[][] {
    const out: string[][] = [];
    for (const frame of this.sentJson()) {
      const parsed = ControlRequestSchema.safeParse(frame);
      if (parsed.success && parsed.data.op === op) out.push(parsed.data.args);
    }
    return out;
  }
}

export class FakeTransport implements Transport {
  readonly connections: FakeConnection[] = [];
  readonly urls: string[] = [];
  /** Errors thrown by the next open() calls, in order */
  readonly failures: Error[] = [];
  responder: Responder | undefined = acknowledgeAll;
  autoPong = true;

  async open(url: string): Promise<TransportConnection> {
    this.urls.push(url);
    const failure = this.failures.shift();
    if (failure) throw failure;
    const connection = new FakeConnection(url, this.responder, this.autoPong);
    this.connections.push(connection);
    return connection;
  }

  get current(): FakeConnection {
    const connection = this.connections[this.connections.length - 1];
    if (!connection) throw new Error('No connection opened yet');
    return connection;
  }
}

/**
 * Server that accepts every control and auth request
 */
export const acknowledgeAll: Responder = (frame, connection) => {
  const decoded: unknown = JSON.parse(frame);
  const control = ControlRequestSchema.safeParse(decoded);
  if (control.success) {
    connection.push({ id: control.data.id, success: true });
    return;
  }
  if (AuthRequestSchema.safeParse(decoded).success) {
    connection.push({ op: 'auth', success: true });
  }
};

interface VirtualTimer {
  at: number;
  seq: number;
  callback: () => void;
}

/**
 * Clock that only moves when told to. sleep() and advance() move time
 * instantly, firing scheduled callbacks in deadline order on the way.
 */
export class VirtualClock implements Clock {
  current = 0;
  private timers: VirtualTimer[] = [];
  private seq = 0;

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.advance(ms);
  }

  schedule(callback: () => void, ms: number): () => void {
    const timer: VirtualTimer = { at: this.current + Math.max(0, ms), seq: this.seq++, callback };
    this.timers.push(timer);
    return () => {
      this.timers = this.timers.filter((other) => other !== timer);
    };
  }

  advance(ms: number): void {
    const target = this.current + Math.max(0, ms);
    for (;;) {
      const due = this.timers
        .filter((timer) => timer.at <= target)
        .sort((a, b) => a.at - b.at || a.seq - b.seq)[0];
      if (due === undefined) break;
      this.timers = this.timers.filter((timer) => timer !== due);
      this.current = due.at;
      due.callback();
    }
    this.current = target;
  }

  /** Callbacks still waiting to fire */
  get pendingTimers(): number {
    return this.timers.length;
  }
}

/**
 * Credential provider issuing `key-1`, `key-2`, ...
 */
export class FakeCredentialProvider implements SessionCredentialProvider {
  acquired = 0;
  renewed = 0;
  readonly revoked: string[] = [];
  /** Number of upcoming renew() calls that fail */
  renewFailures = 0;
  acquireError: Error | null = null;

  async acquire(): Promise<SessionCredential> {
    if (this.acquireError) throw this.acquireError;
    this.acquired++;
    const now = Date.now();
    return { value: `key-${this.acquired}`, issuedAt: now, expiresAt: now + 60 * 60 * 1000 };
  }

  async renew(credential: SessionCredential): Promise<SessionCredential> {
    this.renewed++;
    if (this.renewFailures > 0) {
      this.renewFailures--;
      throw new Error('credential does not exist');
    }
    const now = Date.now();
    return { ...credential, issuedAt: now, expiresAt: now + 60 * 60 * 1000 };
  }

  async revoke(credential: SessionCredential): Promise<void> {
    this.revoked.push(credential.value);
  }
}
