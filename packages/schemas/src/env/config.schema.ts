import { z } from 'zod';

/**
 * Venue the tap process connects to
 * - binance: public market streams
 * - binance-user: private user-data stream (listenKey)
 * - bybit: V5 public or private streams
 * - hyperliquid: public and per-user channels
 * - generic: plain op/args/id protocol at STREAM_WS_URL
 */
export const VenueSchema = z.enum(['binance', 'binance-user', 'bybit', 'hyperliquid', 'generic']);

export type Venue = z.infer<typeof VenueSchema>;

const intFromEnv = (fallback: string) =>
  z.string().transform((val) => parseInt(val, 10)).pipe(z.number().int().positive()).default(fallback);

const booleanFromEnv = z
  .enum(['true', 'false'])
  .transform((val) => val === 'true')
  .default('false');

/**
 * Environment configuration schema
 * Validates all environment variables the tap process reads on startup
 */
export const EnvConfigSchema = z
  .object({
    // Node environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Feed selection
    STREAM_VENUE: VenueSchema,
    /** Comma-separated topic specs, e.g. 'trade:BTCUSDT,kline:ETHUSDT:interval=1m' */
    STREAM_TOPICS: z.string().default(''),
    /** Endpoint override (required for the generic venue) */
    STREAM_WS_URL: z.string().url().optional(),

    // Binance user-data stream
    BINANCE_API_KEY: z.string().min(1).optional(),
    BINANCE_LINE: z.enum(['um', 'cm', 'pm', 'pmpro']).default('um'),

    // Bybit
    BYBIT_API_KEY: z.string().min(1).optional(),
    BYBIT_API_SECRET: z.string().min(1).optional(),
    BYBIT_MARKET: z.enum(['linear', 'spot', 'inverse', 'option']).default('linear'),
    BYBIT_TESTNET: booleanFromEnv,

    // Connection tuning
    STREAM_PING_INTERVAL_MS: intFromEnv('15000'),
    STREAM_PING_TIMEOUT_MS: z.string().transform((val) => parseInt(val, 10)).pipe(z.number().int().positive()).optional(),
    STREAM_MAX_BACKOFF_MS: intFromEnv('30000'),
  })
  .superRefine((env, ctx) => {
    if (env.STREAM_VENUE === 'binance-user' && !env.BINANCE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['BINANCE_API_KEY'],
        message: 'BINANCE_API_KEY is required for the binance-user venue',
      });
    }
    if (env.STREAM_VENUE === 'bybit' && Boolean(env.BYBIT_API_KEY) !== Boolean(env.BYBIT_API_SECRET)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['BYBIT_API_SECRET'],
        message: 'BYBIT_API_KEY and BYBIT_API_SECRET must be set together',
      });
    }
    if (env.STREAM_VENUE === 'generic' && !env.STREAM_WS_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['STREAM_WS_URL'],
        message: 'STREAM_WS_URL is required for the generic venue',
      });
    }
  });

/**
 * Validated environment configuration type
 */
export type EnvConfig = z.infer<typeof EnvConfigSchema>;
