import type { ControlOp, LevelOrder, Topic } from '@streamgate/schemas';
import {
  AuthenticationError,
  BaseFeedAdapter,
  topicKey,
  type ClassifiedFrame,
  type ResolvedTopic,
} from '@streamgate/stream-core';
import { BybitAuth } from './auth';
import { BybitDataFrameSchema, BybitOpResponseSchema } from './frames';

/**
 * Bybit V5 Stream Adapter
 *
 * One adapter per socket: a public socket per product category
 * (`/v5/public/linear`) or the single private socket (`/v5/private`).
 *
 * Requests are op frames: `{"op":"subscribe","req_id":"1","args":["orderbook.50.BTCUSDT"]}`.
 * Data frames name their topic and, for order books and tickers, whether
 * they carry a full snapshot or a delta to apply to it.
 *
 * Liveness is an application ping `{"op":"ping"}`; public sockets answer
 * with `ret_msg: "pong"`, the private socket with `op: "pong"`.
 *
 * Reference: https://bybit-exchange.github.io/docs/v5/ws/connect
 */

// ============================================
// Configuration
// ============================================

export type BybitCategory = 'spot' | 'linear' | 'inverse' | 'option';

const MAINNET_BASE = 'wss://stream.bybit.com/v5';
const TESTNET_BASE = 'wss://stream-testnet.bybit.com/v5';

/** Private topics; each may be narrowed with a `category` param (`order.spot`) */
const PRIVATE_TOPICS = new Set(['position', 'execution', 'execution.fast', 'order', 'wallet', 'greeks', 'dcp']);

const KLINE_INTERVALS = new Set(['1', '3', '5', '15', '30', '60', '120', '240', '360', '720', 'D', 'W', 'M']);
const ORDERBOOK_DEPTHS = new Set(['1', '25', '50', '100', '200', '500', '1000']);

/** Alternate spellings of public kinds, keyed to the kind they mean */
const KIND_ALIASES: Record<string, string> = { trade: 'publictrade', ticker: 'tickers' };

/** Bids best-first descending, asks best-first ascending */
const ORDERBOOK_LEVELS: Record<string, LevelOrder> = { b: 'desc', a: 'asc' };

/** Default validity window of the auth signature */
const AUTH_EXPIRES_MS = 30_000;

/** Rejections that will repeat with the same key */
const PERMANENT_AUTH_FAILURE = /invalid api.?key|api.?key.*(invalid|expired|not exist)/i;

export interface BybitFeedAdapterOptions {
  /** Public product category; ignored for the private socket */
  category?: BybitCategory;
  /** Connect to the authenticated private socket */
  private?: boolean;
  testnet?: boolean;
  /** Override the `wss://.../v5` base */
  baseUrl?: string;
  apiKey?: string;
  apiSecret?: string;
  /** Signature validity window */
  authExpiresMs?: number;
}

export class BybitFeedAdapter extends BaseFeedAdapter {
  readonly venue = 'bybit';
  readonly controlRateLimit = 10;
  /** Spot rejects more than 10 args per request */
  readonly maxTopicsPerFrame = 10;
  readonly supportsControlFrames = true;
  readonly session = 'none' as const;

  readonly isPrivate: boolean;
  private readonly category: BybitCategory;
  private readonly url: string;
  private readonly auth: BybitAuth | null;
  private readonly authExpiresMs: number;

  constructor(options: BybitFeedAdapterOptions = {}) {
    super();
    this.isPrivate = options.private ?? false;
    this.category = options.category ?? 'linear';
    this.authExpiresMs = options.authExpiresMs ?? AUTH_EXPIRES_MS;

    const base = (options.baseUrl ?? (options.testnet ? TESTNET_BASE : MAINNET_BASE)).replace(/\/+$/, '');
    this.url = this.isPrivate ? `${base}/private` : `${base}/public/${this.category}`;

    if (this.isPrivate) {
      if (!options.apiKey || !options.apiSecret) {
        throw new AuthenticationError('Bybit private stream needs apiKey and apiSecret', { permanent: true });
      }
      this.auth = new BybitAuth(options.apiKey, options.apiSecret);
    } else {
      this.auth = null;
    }
  }

  /**
   * Public:
   * - orderbook { depth } -> `orderbook.50.BTCUSDT`
   * - trade -> `publicTrade.BTCUSDT`
   * - ticker -> `tickers.BTCUSDT`
   * - kline { interval } -> `kline.5.BTCUSDT`
   * - liquidation -> `allLiquidation.BTCUSDT`
   *
   * Private (no symbol): position, execution, execution.fast, order, wallet,
   * greeks, dcp; optional { category } -> `order.spot`
   */
  protected mapTopic(topic: Topic): ResolvedTopic {
    const wire = this.isPrivate ? this.privateWire(topic) : this.publicWire(topic);
    const kind = topic.kind.toLowerCase();
    return { key: topicKey({ ...topic, kind: KIND_ALIASES[kind] ?? kind }), channel: wire, wire };
  }

  private publicWire(topic: Topic): string {
    const kind = topic.kind.toLowerCase();
    if (PRIVATE_TOPICS.has(kind)) {
      throw this.invalid(topic, 'private topics need the private socket');
    }
    if (topic.symbol === undefined) {
      throw this.invalid(topic, 'public topics need a symbol');
    }
    const symbol = topic.symbol.toUpperCase();
    const params = topic.params ?? {};

    switch (kind) {
      case 'orderbook': {
        const depth = params['depth'];
        if (depth === undefined || !ORDERBOOK_DEPTHS.has(depth)) {
          throw this.invalid(topic, `orderbook needs a depth, one of ${[...ORDERBOOK_DEPTHS].join(', ')}`);
        }
        return `orderbook.${depth}.${symbol}`;
      }
      case 'trade':
      case 'publictrade':
        return `publicTrade.${symbol}`;
      case 'ticker':
      case 'tickers':
        return `tickers.${symbol}`;
      case 'kline': {
        const interval = params['interval'];
        if (interval === undefined || !KLINE_INTERVALS.has(interval)) {
          throw this.invalid(topic, `kline needs an interval, one of ${[...KLINE_INTERVALS].join(', ')}`);
        }
        return `kline.${interval}.${symbol}`;
      }
      case 'liquidation':
        return `allLiquidation.${symbol}`;
      default:
        throw this.invalid(topic, `unknown topic kind '${topic.kind}'`);
    }
  }

  private privateWire(topic: Topic): string {
    const kind = topic.kind.toLowerCase();
    if (!PRIVATE_TOPICS.has(kind)) {
      throw this.invalid(topic, 'the private socket only carries account topics');
    }
    if (topic.symbol !== undefined) {
      throw this.invalid(topic, 'account topics take no symbol');
    }
    const category = topic.params?.['category'];
    return category === undefined ? kind : `${kind}.${category}`;
  }

  buildConnectUrl(): string {
    return this.url;
  }

  buildAuthFrame(now: number): string | null {
    if (!this.auth) return null;
    return JSON.stringify({ op: 'auth', args: this.auth.authArgs(now + this.authExpiresMs) });
  }

  buildControlFrame(op: ControlOp, wires: string[], id: number): string {
    return JSON.stringify({ op, req_id: String(id), args: wires });
  }

  buildPingFrame(): string {
    return JSON.stringify({ op: 'ping' });
  }

  classifyFrame(decoded: unknown): ClassifiedFrame {
    const data = BybitDataFrameSchema.safeParse(decoded);
    if (data.success) {
      const { topic, type } = data.data;
      const isOrderbook = topic.startsWith('orderbook.');
      const isTicker = topic.startsWith('tickers.');
      if ((isOrderbook || isTicker) && (type === 'snapshot' || type === 'delta')) {
        return {
          kind: 'data',
          channel: topic,
          update: type,
          payload: data.data.data,
          levels: isOrderbook ? ORDERBOOK_LEVELS : undefined,
        };
      }
      return { kind: 'data', channel: topic, update: 'event', payload: data.data.data };
    }

    const response = BybitOpResponseSchema.safeParse(decoded);
    if (!response.success) {
      return { kind: 'ignore', reason: 'unrecognised frame' };
    }
    const { op, success, ret_msg: message, req_id: requestId } = response.data;

    if (op === 'pong' || message === 'pong') {
      return { kind: 'pong' };
    }
    if (op === 'ping') {
      return { kind: 'ping', reply: JSON.stringify({ op: 'pong' }) };
    }
    if (op === 'auth') {
      const ok = success === true;
      return {
        kind: 'auth',
        success: ok,
        message,
        permanent: !ok && message !== undefined && PERMANENT_AUTH_FAILURE.test(message),
      };
    }
    if (op === 'subscribe' || op === 'unsubscribe') {
      return {
        kind: 'ack',
        requestId: requestId || undefined,
        op,
        success: success === true,
        message: message || undefined,
      };
    }
    return { kind: 'ignore', reason: `unhandled op '${op}'` };
  }
}
