import {
  BinanceMarketAdapter,
  BinanceUserDataAdapter,
  LISTEN_KEY_KEEPALIVE_MS,
  ListenKeyProvider,
} from '@streamgate/binance-client';
import { BybitFeedAdapter } from '@streamgate/bybit-client';
import { HyperliquidFeedAdapter } from '@streamgate/hyperliquid-client';
import type { EnvConfig, StreamManagerConfigInput } from '@streamgate/schemas';
import { GenericFeedAdapter, type FeedAdapter, type SessionCredentialProvider } from '@streamgate/stream-core';
import type { Logger } from '@streamgate/utils';

export interface FeedSetup {
  adapter: FeedAdapter;
  credentials?: SessionCredentialProvider;
}

/**
 * Build the adapter (and credential side channel, where the feed needs one)
 * for the configured venue
 */
export function createFeed(config: EnvConfig, logger: Logger): FeedSetup {
  switch (config.STREAM_VENUE) {
    case 'binance':
      return { adapter: new BinanceMarketAdapter({ baseUrl: config.STREAM_WS_URL }) };

    case 'binance-user': {
      const apiKey = requireValue(config.BINANCE_API_KEY, 'BINANCE_API_KEY', config.STREAM_VENUE);
      return {
        adapter: new BinanceUserDataAdapter(config.BINANCE_LINE),
        credentials: new ListenKeyProvider({
          apiKey,
          line: config.BINANCE_LINE,
          logger: logger.child({ component: 'listen-key' }),
        }),
      };
    }

    case 'bybit':
      return {
        adapter: new BybitFeedAdapter({
          category: config.BYBIT_MARKET,
          private: config.BYBIT_API_KEY !== undefined,
          testnet: config.BYBIT_TESTNET,
          baseUrl: config.STREAM_WS_URL,
          apiKey: config.BYBIT_API_KEY,
          apiSecret: config.BYBIT_API_SECRET,
        }),
      };

    case 'hyperliquid':
      return { adapter: new HyperliquidFeedAdapter({ url: config.STREAM_WS_URL }) };

    case 'generic':
      return {
        adapter: new GenericFeedAdapter({ url: requireValue(config.STREAM_WS_URL, 'STREAM_WS_URL', config.STREAM_VENUE) }),
      };
  }
}

/**
 * Manager tuning taken from the environment
 */
export function createManagerConfig(config: EnvConfig): StreamManagerConfigInput {
  return {
    maxBackoffMs: config.STREAM_MAX_BACKOFF_MS,
    heartbeat: {
      intervalMs: config.STREAM_PING_INTERVAL_MS,
      timeoutMs: config.STREAM_PING_TIMEOUT_MS,
    },
    // Listen keys lapse after 60 minutes without a keepalive
    ...(config.STREAM_VENUE === 'binance-user' ? { credentialRenewIntervalMs: LISTEN_KEY_KEEPALIVE_MS } : {}),
  };
}

function requireValue(value: string | undefined, name: string, venue: string): string {
  if (value === undefined) {
    throw new Error(`${name} is required for the ${venue} venue`);
  }
  return value;
}
