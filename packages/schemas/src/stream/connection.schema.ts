import { z } from 'zod';

/**
 * Connection lifecycle states
 *
 * disconnected → connecting → (authenticating) → ready → disconnected
 * stopped is terminal and only reached through an explicit shutdown
 * or a permanent rejection.
 */
export const ConnectionStateSchema = z.enum([
  'disconnected',
  'connecting',
  'authenticating',
  'ready',
  'stopped',
]);

export type ConnectionState = z.infer<typeof ConnectionStateSchema>;

/**
 * Message delivered to a topic handler.
 * Delta feeds are always presented with snapshot semantics.
 */
export interface FeedMessage<T = unknown> {
  /** Normalized topic key the handler was registered under */
  topicKey: string;
  /** Venue-side topic / stream name */
  channel: string;
  /** 'snapshot' for merged state views, 'event' for standalone payloads */
  type: 'snapshot' | 'event';
  data: T;
  /** Local receive time (ms) */
  receivedAt: number;
}

/**
 * Topic handler. A returned promise is not awaited by the read loop.
 */
export type FeedHandler<T = unknown> = (message: FeedMessage<T>) => void | Promise<void>;

/**
 * Event map for the typed EventEmitter on the connection manager
 *
 * - state - every guarded transition (next, previous)
 * - connected - connection reached Ready
 * - disconnected - connection lost or closed, includes reason
 * - reconnecting - before each backoff sleep, includes attempt number and delay
 * - authenticated - auth frame accepted
 * - credentialRotated - a new session credential replaced the previous one
 * - error - surfaced errors (authentication, rejected subscriptions, fatal stop)
 */
export type StreamManagerEvents = {
  'state': [next: ConnectionState, previous: ConnectionState];
  'connected': [];
  'disconnected': [reason: string];
  'reconnecting': [attempt: number, delay: number];
  'authenticated': [];
  'credentialRotated': [];
  'error': [error: Error];
};
