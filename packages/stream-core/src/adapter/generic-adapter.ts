import {
  AuthResponseSchema,
  CombinedStreamFrameSchema,
  ControlResponseSchema,
  LivenessFrameSchema,
  type AuthRequest,
  type ControlOp,
  type ControlRequest,
  type LevelOrder,
  type Topic,
} from '@streamgate/schemas';
import type { SessionCredential } from '../credentials/session-credential';
import { topicKey } from '../subscription/topic-key';
import { BaseFeedAdapter } from './base-feed-adapter';
import type { ClassifiedFrame, ResolvedTopic, SessionPlacement } from './feed-adapter';

export interface GenericFeedAdapterOptions {
  url: string;
  venue?: string;
  controlRateLimit?: number;
  maxTopicsPerFrame?: number;
  session?: SessionPlacement;
  /** Send `{"op":"ping"}` frames instead of transport pings */
  applicationPing?: boolean;
  /** Auth frame arguments; the feed is unauthenticated when omitted */
  authArgs?: (now: number, credential?: SessionCredential) => Array<string | number>;
  /** Price-level fields in delta payloads */
  levelFields?: Record<string, LevelOrder>;
}

/**
 * Adapter for feeds speaking the plain op/args/id control protocol with
 * combined-stream `{stream, data}` data frames
 */
export class GenericFeedAdapter extends BaseFeedAdapter {
  readonly venue: string;
  readonly controlRateLimit: number;
  readonly maxTopicsPerFrame: number;
  readonly supportsControlFrames = true;
  readonly session: SessionPlacement;

  constructor(private readonly options: GenericFeedAdapterOptions) {
    super();
    this.venue = options.venue ?? 'generic';
    this.controlRateLimit = options.controlRateLimit ?? 10;
    this.maxTopicsPerFrame = options.maxTopicsPerFrame ?? 200;
    this.session = options.session ?? 'none';
  }

  /**
   * `btcusdt@trade`, `btcusdt@kline_1m`, or the bare kind for account-wide topics
   */
  protected mapTopic(topic: Topic): ResolvedTopic {
    const values = Object.keys(topic.params ?? {})
      .sort()
      .map((name) => topic.params?.[name] ?? '');
    const kind = [topic.kind.toLowerCase(), ...values].join('_');
    const wire = topic.symbol === undefined ? kind : `${topic.symbol.toLowerCase()}@${kind}`;
    return { key: topicKey(topic), channel: wire, wire };
  }

  buildConnectUrl(credential?: SessionCredential): string {
    if (this.session === 'url' && credential) {
      return `${this.options.url.replace(/\/+$/, '')}/${credential.value}`;
    }
    return this.options.url;
  }

  buildAuthFrame(now: number, credential?: SessionCredential): string | null {
    if (!this.options.authArgs) return null;
    const frame: AuthRequest = { op: 'auth', args: this.options.authArgs(now, credential) };
    return JSON.stringify(frame);
  }

  buildControlFrame(op: ControlOp, wires: string[], id: number): string {
    const frame: ControlRequest = { op, args: wires, id };
    return JSON.stringify(frame);
  }

  buildPingFrame(): string | null {
    return this.options.applicationPing ? JSON.stringify({ op: 'ping' }) : null;
  }

  classifyFrame(decoded: unknown): ClassifiedFrame {
    const data = CombinedStreamFrameSchema.safeParse(decoded);
    if (data.success) {
      return {
        kind: 'data',
        channel: data.data.stream,
        update: data.data.type ?? 'event',
        payload: data.data.data,
        levels: this.options.levelFields,
      };
    }

    const auth = AuthResponseSchema.safeParse(decoded);
    if (auth.success) {
      return { kind: 'auth', success: auth.data.success, message: auth.data.message };
    }

    const ack = ControlResponseSchema.safeParse(decoded);
    if (ack.success) {
      return { kind: 'ack', requestId: ack.data.id, success: ack.data.success, message: ack.data.message };
    }

    const liveness = LivenessFrameSchema.safeParse(decoded);
    if (liveness.success) {
      return liveness.data.op === 'pong'
        ? { kind: 'pong' }
        : { kind: 'ping', reply: JSON.stringify({ op: 'pong' }) };
    }

    return { kind: 'ignore', reason: 'unrecognised frame' };
  }
}
