/**
 * Binance product lines that issue user-data listen keys
 */
export type BinanceUserLine = 'um' | 'cm' | 'pm' | 'pmpro';

export interface BinanceLineConfig {
  /** REST base for the listen key endpoints */
  restBase: string;
  /** Listen key endpoint (POST create, PUT keepalive, DELETE close) */
  listenKeyPath: string;
  /** User stream prefix; the listen key is appended as a path segment */
  wsPrefix: string;
}

export const BINANCE_USER_LINES: Record<BinanceUserLine, BinanceLineConfig> = {
  // USD-M futures
  um: {
    restBase: 'https://fapi.binance.com',
    listenKeyPath: '/fapi/v1/listenKey',
    wsPrefix: 'wss://fstream.binance.com/ws',
  },
  // COIN-M futures
  cm: {
    restBase: 'https://dapi.binance.com',
    listenKeyPath: '/dapi/v1/listenKey',
    wsPrefix: 'wss://dstream.binance.com/ws',
  },
  // Portfolio margin
  pm: {
    restBase: 'https://papi.binance.com',
    listenKeyPath: '/papi/v1/listenKey',
    wsPrefix: 'wss://fstream.binance.com/pm/ws',
  },
  // Portfolio margin pro
  pmpro: {
    restBase: 'https://papi.binance.com',
    listenKeyPath: '/papi/v1/listenKey',
    wsPrefix: 'wss://fstream.binance.com/pm-classic/ws',
  },
};

/** Listen keys expire 60 minutes after creation or the last keepalive */
export const LISTEN_KEY_VALIDITY_MS = 60 * 60 * 1000;

/** Keepalive cadence, comfortably inside the validity window */
export const LISTEN_KEY_KEEPALIVE_MS = 25 * 60 * 1000;
