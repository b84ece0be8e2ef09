import type { ControlOp, Topic } from '@streamgate/schemas';
import { BaseFeedAdapter, topicKey, type ClassifiedFrame, type ResolvedTopic } from '@streamgate/stream-core';
import {
  BinanceCombinedFrameSchema,
  BinanceControlErrorSchema,
  BinanceControlResponseSchema,
} from './frames';

/**
 * Binance Market Stream Adapter
 *
 * Public market data over the combined-stream endpoint, so every data frame
 * arrives as `{"stream":"btcusdt@trade","data":{...}}` and routes by stream name.
 *
 * Subscriptions are managed with control frames on the open socket:
 *   {"method":"SUBSCRIBE","params":["btcusdt@trade"],"id":1}
 *   {"result":null,"id":1}
 *
 * Liveness: the server pings every few minutes and `ws` answers automatically;
 * the client probes with transport-level pings.
 *
 * Reference: https://developers.binance.com/docs/binance-spot-api-docs/web-socket-streams
 */

// ============================================
// Configuration
// ============================================

export type BinanceMarket = 'spot' | 'um' | 'cm';

const MARKET_STREAM_BASES: Record<BinanceMarket, string> = {
  spot: 'wss://stream.binance.com:9443',
  um: 'wss://fstream.binance.com',
  cm: 'wss://dstream.binance.com',
};

/** Spot caps incoming control messages at 5/s; futures at 10/s */
const SPOT_CONTROL_RATE = 5;
const FUTURES_CONTROL_RATE = 10;

const KLINE_INTERVALS = new Set([
  '1s', '1m', '3m', '5m', '15m', '30m', '1h', '2h', '4h', '6h', '8h', '12h', '1d', '3d', '1w', '1M',
]);
const DEPTH_LEVELS = new Set(['5', '10', '20']);
const DEPTH_SPEEDS = new Set(['100ms', '250ms', '500ms', '1000ms']);

/** Topic kinds that map straight onto a stream suffix */
const SIMPLE_STREAMS: Record<string, string> = {
  trade: 'trade',
  aggtrade: 'aggTrade',
  bookticker: 'bookTicker',
  miniticker: 'miniTicker',
  ticker: 'ticker',
};

export interface BinanceMarketAdapterOptions {
  /** Product line; ignored when `baseUrl` is set */
  market?: BinanceMarket;
  /** Stream host override (e.g. testnet), without the `/stream` path */
  baseUrl?: string;
}

export class BinanceMarketAdapter extends BaseFeedAdapter {
  readonly venue = 'binance';
  readonly controlRateLimit: number;
  /** Binance accepts large param lists; keep frames modest */
  readonly maxTopicsPerFrame = 200;
  readonly supportsControlFrames = true;
  readonly session = 'none' as const;

  private readonly baseUrl: string;

  constructor(options: BinanceMarketAdapterOptions = {}) {
    super();
    this.baseUrl = (options.baseUrl ?? MARKET_STREAM_BASES[options.market ?? 'spot']).replace(/\/+$/, '');
    this.controlRateLimit = this.baseUrl.includes('stream.binance.com') ? SPOT_CONTROL_RATE : FUTURES_CONTROL_RATE;
  }

  /**
   * Map a topic onto a stream name:
   * - trade / aggTrade / bookTicker / miniTicker / ticker -> `btcusdt@aggTrade`
   * - kline { interval } -> `btcusdt@kline_1m`
   * - depth { levels, speed? } -> `btcusdt@depth20@100ms`
   * - markPrice { speed? } -> `btcusdt@markPrice@1s` (futures)
   */
  protected mapTopic(topic: Topic): ResolvedTopic {
    if (topic.symbol === undefined) {
      throw this.invalid(topic, 'market streams need a symbol');
    }
    const symbol = topic.symbol.toLowerCase();
    const kind = topic.kind.toLowerCase();
    const params = topic.params ?? {};

    let stream: string;
    const simple = SIMPLE_STREAMS[kind];
    if (simple !== undefined) {
      stream = simple;
    } else if (kind === 'kline') {
      const interval = params['interval'];
      if (interval === undefined || !KLINE_INTERVALS.has(interval)) {
        throw this.invalid(topic, `kline needs an interval, one of ${[...KLINE_INTERVALS].join(', ')}`);
      }
      stream = `kline_${interval}`;
    } else if (kind === 'depth') {
      const levels = params['levels'];
      if (levels === undefined || !DEPTH_LEVELS.has(levels)) {
        throw this.invalid(topic, 'depth needs levels of 5, 10 or 20');
      }
      const speed = params['speed'];
      if (speed !== undefined && !DEPTH_SPEEDS.has(speed)) {
        throw this.invalid(topic, `depth speed must be one of ${[...DEPTH_SPEEDS].join(', ')}`);
      }
      stream = speed === undefined ? `depth${levels}` : `depth${levels}@${speed}`;
    } else if (kind === 'markprice') {
      const speed = params['speed'];
      if (speed !== undefined && speed !== '1s') {
        throw this.invalid(topic, 'markPrice speed must be 1s');
      }
      stream = speed === undefined ? 'markPrice' : 'markPrice@1s';
    } else {
      throw this.invalid(topic, `unknown stream kind '${topic.kind}'`);
    }

    const wire = `${symbol}@${stream}`;
    return { key: topicKey(topic), channel: wire, wire };
  }

  buildConnectUrl(): string {
    return `${this.baseUrl}/stream`;
  }

  buildControlFrame(op: ControlOp, wires: string[], id: number): string {
    return JSON.stringify({
      method: op === 'subscribe' ? 'SUBSCRIBE' : 'UNSUBSCRIBE',
      params: wires,
      id,
    });
  }

  classifyFrame(decoded: unknown): ClassifiedFrame {
    const data = BinanceCombinedFrameSchema.safeParse(decoded);
    if (data.success) {
      const { stream } = data.data;
      // Partial book depth carries the whole top-N book on every frame
      const isDepth = /@depth\d+/.test(stream);
      return {
        kind: 'data',
        channel: stream,
        update: isDepth ? 'snapshot' : 'event',
        payload: data.data.data,
      };
    }

    const error = BinanceControlErrorSchema.safeParse(decoded);
    if (error.success) {
      return {
        kind: 'ack',
        requestId: error.data.id ?? undefined,
        success: false,
        message: `${error.data.error.msg} (code ${error.data.error.code})`,
      };
    }

    const ack = BinanceControlResponseSchema.safeParse(decoded);
    if (ack.success) {
      return { kind: 'ack', requestId: ack.data.id, success: true };
    }

    return { kind: 'ignore', reason: 'unrecognised frame' };
  }
}
