import type { ControlOp, Topic } from '@streamgate/schemas';
import {
  BaseFeedAdapter,
  CredentialError,
  ProtocolError,
  type ClassifiedFrame,
  type ResolvedTopic,
  type SessionCredential,
} from '@streamgate/stream-core';
import { BinanceCombinedFrameSchema, BinanceUserEventSchema } from './frames';
import { BINANCE_USER_LINES, type BinanceLineConfig, type BinanceUserLine } from './lines';

/**
 * Binance User Data Stream Adapter
 *
 * Private account events (orders, balances, positions) for one listen key.
 * The listen key is part of the URL, so the feed has no control frames:
 * every event on the socket belongs to the single `userdata` topic.
 *
 * When the key lapses the server sends `{"e":"listenKeyExpired"}` and stops
 * delivering; the manager then fetches a fresh key and reconnects.
 */

/** Local key of the one topic this feed carries */
export const USER_DATA_TOPIC_KEY = 'userdata';

export class BinanceUserDataAdapter extends BaseFeedAdapter {
  readonly venue = 'binance';
  readonly controlRateLimit = 10;
  readonly maxTopicsPerFrame = 1;
  readonly supportsControlFrames = false;
  readonly session = 'url' as const;

  readonly line: BinanceLineConfig;

  constructor(line: BinanceUserLine | BinanceLineConfig = 'um') {
    super();
    this.line = typeof line === 'string' ? BINANCE_USER_LINES[line] : line;
  }

  protected mapTopic(topic: Topic): ResolvedTopic {
    if (topic.kind.toLowerCase() !== USER_DATA_TOPIC_KEY || topic.symbol !== undefined || topic.params !== undefined) {
      throw this.invalid(topic, `the user data stream only carries '${USER_DATA_TOPIC_KEY}'`);
    }
    return { key: USER_DATA_TOPIC_KEY, channel: USER_DATA_TOPIC_KEY, wire: USER_DATA_TOPIC_KEY };
  }

  buildConnectUrl(credential?: SessionCredential): string {
    if (!credential) {
      throw new CredentialError('Binance user data stream needs a listen key');
    }
    return `${this.line.wsPrefix.replace(/\/+$/, '')}/${credential.value}`;
  }

  buildControlFrame(op: ControlOp, _wires: string[], _id: number): string {
    throw new ProtocolError(`Binance user data stream does not accept ${op} frames`);
  }

  classifyFrame(decoded: unknown): ClassifiedFrame {
    // Portfolio margin lines may wrap events like the combined market stream
    const wrapped = BinanceCombinedFrameSchema.safeParse(decoded);
    const body = wrapped.success ? wrapped.data.data : decoded;

    const event = BinanceUserEventSchema.safeParse(body);
    if (!event.success) {
      return { kind: 'ignore', reason: 'not a user data event' };
    }

    if (event.data.e === 'listenKeyExpired') {
      return { kind: 'credential-expired', message: 'listen key expired' };
    }

    return {
      kind: 'data',
      channel: USER_DATA_TOPIC_KEY,
      topicKey: USER_DATA_TOPIC_KEY,
      update: 'event',
      payload: event.data,
    };
  }
}
