import type { ControlOp, LevelOrder, Topic } from '@streamgate/schemas';
import type { SessionCredential } from '../credentials/session-credential';

/**
 * Venue-side identity of a topic
 */
export interface ResolvedTopic {
  /** Normalized local key */
  key: string;
  /** Channel name that inbound data frames carry */
  channel: string;
  /** Token placed in control frames */
  wire: string;
  /**
   * Data frames on the channel name their topic key, so several topics
   * may use it. Otherwise the channel belongs to exactly one topic.
   */
  sharedChannel?: boolean;
}

export interface AckFrame {
  kind: 'ack';
  requestId?: string | number;
  /** For venues whose acks echo the subscription instead of a request id */
  topicKeys?: string[];
  op?: ControlOp;
  success: boolean;
  message?: string;
}

export interface AuthFrame {
  kind: 'auth';
  success: boolean;
  message?: string;
  /** The venue will reject this key on every retry */
  permanent?: boolean;
}

export interface DataFrame {
  kind: 'data';
  channel: string;
  /** Set when the adapter can name the local key directly */
  topicKey?: string;
  update: 'snapshot' | 'delta' | 'event';
  payload: unknown;
  /** Price-level list fields of the payload, with their sort order */
  levels?: Record<string, LevelOrder>;
}

/**
 * Result of classifying one decoded inbound frame
 */
export type ClassifiedFrame =
  | AckFrame
  | AuthFrame
  | DataFrame
  | { kind: 'pong' }
  | { kind: 'ping'; reply: string | null }
  | { kind: 'credential-expired'; message?: string }
  | { kind: 'ignore'; reason?: string };

/**
 * Where a session credential goes
 *
 * - none: the feed needs no session credential
 * - url: embedded in the connection URL (rotation forces a reconnect)
 * - frame: passed to the auth frame
 */
export type SessionPlacement = 'none' | 'url' | 'frame';

/**
 * Per-venue capability set driving the generic connection manager
 */
export interface FeedAdapter {
  readonly venue: string;
  /** Control frames allowed per second */
  readonly controlRateLimit: number;
  /** Upper bound on topics in one control frame */
  readonly maxTopicsPerFrame: number;
  /** False for read-only feeds where subscriptions are local routing only */
  readonly supportsControlFrames: boolean;
  readonly session: SessionPlacement;

  /** Validate and map a topic; throws TopicValidationError on a bad shape */
  resolveTopic(topic: Topic): ResolvedTopic;

  buildConnectUrl(credential?: SessionCredential): string;

  /** Auth frame to send after connect, or null when the feed needs none */
  buildAuthFrame(now: number, credential?: SessionCredential): string | null;

  buildControlFrame(op: ControlOp, wires: string[], id: number): string;

  /** Application ping frame, or null to use transport-level pings */
  buildPingFrame(): string | null;

  /** Decode raw text; throws when the frame is not in the venue's format */
  decode(raw: string): unknown;

  classifyFrame(decoded: unknown): ClassifiedFrame;

  /** Merge one delta payload into the stored state */
  applyDelta(current: unknown, delta: unknown, frame: DataFrame): unknown;
}
