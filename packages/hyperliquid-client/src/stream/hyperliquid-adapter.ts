import type { ControlOp, Topic } from '@streamgate/schemas';
import {
  BaseFeedAdapter,
  ProtocolError,
  topicKey,
  type ClassifiedFrame,
  type ResolvedTopic,
} from '@streamgate/stream-core';
import {
  CandlePayloadSchema,
  CoinPayloadSchema,
  HyperliquidFrameSchema,
  HyperliquidSubscriptionResponseSchema,
  HyperliquidSubscriptionSchema,
  TradesPayloadSchema,
  UserPayloadSchema,
  type HyperliquidSubscription,
} from './frames';

/**
 * Hyperliquid Stream Adapter
 *
 * One subscription per request:
 *   {"method":"subscribe","subscription":{"type":"l2Book","coin":"BTC"}}
 * acknowledged by echoing it back on the `subscriptionResponse` channel.
 * Requests carry no id, so acks and data frames are matched to topics by
 * the subscription fields they carry (coin, user, interval).
 *
 * Liveness is `{"method":"ping"}` answered on the `pong` channel; the server
 * drops sockets that stay silent for a minute.
 *
 * Reference: https://hyperliquid.gitbook.io/hyperliquid-docs/for-developers/api/websocket
 */

// ============================================
// Configuration
// ============================================

const MAINNET_URL = 'wss://api.hyperliquid.xyz/ws';
const TESTNET_URL = 'wss://api.hyperliquid-testnet.xyz/ws';

/** How a data frame names the topic it belongs to */
type Routing = 'coin' | 'trades' | 'candle' | 'user' | 'channel';

interface FeedSpec {
  /** Subscription `type` */
  type: string;
  scope: 'none' | 'coin' | 'user';
  /** Channel the data frames arrive on */
  channel: string;
  routing: Routing;
  /** Required params besides coin and user */
  params?: string[];
  /** Each frame carries the full state */
  snapshot?: boolean;
}

const FEEDS: FeedSpec[] = [
  { type: 'allMids', scope: 'none', channel: 'allMids', routing: 'channel' },
  { type: 'l2Book', scope: 'coin', channel: 'l2Book', routing: 'coin', snapshot: true },
  { type: 'trades', scope: 'coin', channel: 'trades', routing: 'trades' },
  { type: 'bbo', scope: 'coin', channel: 'bbo', routing: 'coin' },
  { type: 'candle', scope: 'coin', channel: 'candle', routing: 'candle', params: ['interval'] },
  { type: 'activeAssetCtx', scope: 'coin', channel: 'activeAssetCtx', routing: 'coin' },
  { type: 'userEvents', scope: 'user', channel: 'user', routing: 'channel' },
  { type: 'orderUpdates', scope: 'user', channel: 'orderUpdates', routing: 'channel' },
  { type: 'notification', scope: 'user', channel: 'notification', routing: 'channel' },
  { type: 'userFills', scope: 'user', channel: 'userFills', routing: 'user' },
  { type: 'userFundings', scope: 'user', channel: 'userFundings', routing: 'user' },
  { type: 'userNonFundingLedgerUpdates', scope: 'user', channel: 'userNonFundingLedgerUpdates', routing: 'user' },
  { type: 'webData2', scope: 'user', channel: 'webData2', routing: 'user' },
];

const FEEDS_BY_KIND = new Map(FEEDS.map((feed) => [feed.type.toLowerCase(), feed]));
const FEEDS_BY_CHANNEL = new Map<string, FeedSpec>(FEEDS.map((feed) => [feed.channel, feed]));
const activeAssetCtx = FEEDS_BY_KIND.get('activeassetctx');
if (activeAssetCtx) {
  // Spot assets report their context on a sibling channel
  FEEDS_BY_CHANNEL.set('activeSpotAssetCtx', activeAssetCtx);
}

/** Text frame the server sends right after the handshake */
const GREETING = 'Websocket connection established.';

/**
 * Local key of a subscription object, equal to the key of the topic it was built from
 */
export function subscriptionKey(subscription: HyperliquidSubscription): string {
  const { type, coin, ...rest } = subscription;
  const params: Record<string, string> = {};
  for (const [name, value] of Object.entries(rest)) {
    if (value !== null) params[name] = String(value);
  }
  return topicKey({
    kind: type,
    symbol: coin,
    params: Object.keys(params).length > 0 ? params : undefined,
  });
}

export interface HyperliquidFeedAdapterOptions {
  testnet?: boolean;
  /** Override the socket URL */
  url?: string;
}

export class HyperliquidFeedAdapter extends BaseFeedAdapter {
  readonly venue = 'hyperliquid';
  readonly controlRateLimit = 20;
  readonly maxTopicsPerFrame = 1;
  readonly supportsControlFrames = true;
  readonly session = 'none' as const;

  private readonly url: string;

  constructor(options: HyperliquidFeedAdapterOptions = {}) {
    super();
    this.url = options.url ?? (options.testnet ? TESTNET_URL : MAINNET_URL);
  }

  /**
   * - l2Book / trades / bbo / activeAssetCtx: `{ kind, symbol: 'BTC' }`
   * - candle: `{ kind, symbol, params: { interval } }`
   * - allMids: `{ kind }`
   * - user feeds: `{ kind, params: { user: '0x...' } }`
   */
  protected mapTopic(topic: Topic): ResolvedTopic {
    const feed = FEEDS_BY_KIND.get(topic.kind.toLowerCase());
    if (!feed) {
      throw this.invalid(topic, `unknown subscription type '${topic.kind}'`);
    }
    const params = { ...topic.params };

    const subscription: HyperliquidSubscription = { type: feed.type };
    if (feed.scope === 'coin') {
      if (topic.symbol === undefined) throw this.invalid(topic, `${feed.type} needs a coin`);
      subscription.coin = topic.symbol;
    } else if (topic.symbol !== undefined) {
      throw this.invalid(topic, `${feed.type} takes no coin`);
    }

    if (feed.scope === 'user') {
      const user = params['user'];
      if (user === undefined) throw this.invalid(topic, `${feed.type} needs a user address`);
      subscription['user'] = user.toLowerCase();
      delete params['user'];
    }

    for (const name of feed.params ?? []) {
      const value = params[name];
      if (value === undefined) throw this.invalid(topic, `${feed.type} needs ${name}`);
      subscription[name] = value;
      delete params[name];
    }

    const unknown = Object.keys(params);
    if (unknown.length > 0) {
      throw this.invalid(topic, `unexpected params ${unknown.join(', ')}`);
    }

    const resolved: ResolvedTopic = {
      key: subscriptionKey(subscription),
      channel: feed.channel,
      wire: JSON.stringify(subscription),
    };
    // Channel-routed feeds carry no scoping field: one subscription per channel
    if (feed.routing !== 'channel') resolved.sharedChannel = true;
    return resolved;
  }

  buildConnectUrl(): string {
    return this.url;
  }

  /** Wires are subscription objects already in JSON form */
  buildControlFrame(op: ControlOp, wires: string[], _id: number): string {
    const [wire] = wires;
    if (wire === undefined || wires.length > 1) {
      throw new ProtocolError(`Hyperliquid takes one subscription per request, got ${wires.length}`);
    }
    return `{"method":"${op}","subscription":${wire}}`;
  }

  buildPingFrame(): string {
    return JSON.stringify({ method: 'ping' });
  }

  decode(raw: string): unknown {
    return raw === GREETING ? raw : JSON.parse(raw);
  }

  classifyFrame(decoded: unknown): ClassifiedFrame {
    if (typeof decoded === 'string') {
      return { kind: 'ignore', reason: 'server notice' };
    }

    const frame = HyperliquidFrameSchema.safeParse(decoded);
    if (!frame.success) {
      return { kind: 'ignore', reason: 'unrecognised frame' };
    }
    const { channel, data } = frame.data;

    if (channel === 'pong') {
      return { kind: 'pong' };
    }

    if (channel === 'subscriptionResponse') {
      const response = HyperliquidSubscriptionResponseSchema.safeParse(data);
      if (!response.success) {
        return { kind: 'ignore', reason: 'malformed subscription response' };
      }
      return {
        kind: 'ack',
        op: response.data.method,
        topicKeys: [subscriptionKey(response.data.subscription)],
        success: true,
      };
    }

    if (channel === 'error') {
      return this.classifyError(data);
    }

    const feed = FEEDS_BY_CHANNEL.get(channel);
    if (!feed) {
      return { kind: 'ignore', reason: `unknown channel '${channel}'` };
    }

    return {
      kind: 'data',
      channel: feed.channel,
      topicKey: this.routeKey(feed, data),
      update: feed.snapshot ? 'snapshot' : 'event',
      payload: data,
    };
  }

  /**
   * Key of the topic a data payload belongs to; undefined routes by channel
   */
  private routeKey(feed: FeedSpec, data: unknown): string | undefined {
    switch (feed.routing) {
      case 'coin': {
        const payload = CoinPayloadSchema.safeParse(data);
        return payload.success ? subscriptionKey({ type: feed.type, coin: payload.data.coin }) : undefined;
      }
      case 'trades': {
        const payload = TradesPayloadSchema.safeParse(data);
        return payload.success ? subscriptionKey({ type: feed.type, coin: payload.data[0].coin }) : undefined;
      }
      case 'candle': {
        const payload = CandlePayloadSchema.safeParse(data);
        return payload.success
          ? subscriptionKey({ type: feed.type, coin: payload.data.s, interval: payload.data.i })
          : undefined;
      }
      case 'user': {
        const payload = UserPayloadSchema.safeParse(data);
        return payload.success
          ? subscriptionKey({ type: feed.type, user: payload.data.user.toLowerCase() })
          : undefined;
      }
      case 'channel':
        return undefined;
    }
  }

  /**
   * `{"channel":"error","data":"Invalid subscription {\"type\":...}"}`: the
   * rejected subscription is embedded in the message when the server echoes it
   */
  private classifyError(data: unknown): ClassifiedFrame {
    const message = typeof data === 'string' ? data : JSON.stringify(data);
    const start = message.indexOf('{');
    if (start >= 0) {
      const subscription = HyperliquidSubscriptionSchema.safeParse(parseJson(message.slice(start)));
      if (subscription.success) {
        return {
          kind: 'ack',
          op: 'subscribe',
          topicKeys: [subscriptionKey(subscription.data)],
          success: false,
          message,
        };
      }
    }
    return { kind: 'ignore', reason: `venue error: ${message}` };
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
