import { describe, it, expect } from 'vitest';
import { EnvConfigSchema } from './config.schema';

describe('EnvConfigSchema', () => {
  it('applies defaults and converts numbers and booleans', () => {
    const config = EnvConfigSchema.parse({
      STREAM_VENUE: 'bybit',
      BYBIT_TESTNET: 'true',
      STREAM_PING_INTERVAL_MS: '20000',
    });
    expect(config.NODE_ENV).toBe('development');
    expect(config.BYBIT_TESTNET).toBe(true);
    expect(config.STREAM_PING_INTERVAL_MS).toBe(20_000);
    expect(config.STREAM_PING_TIMEOUT_MS).toBeUndefined();
    expect(config.BINANCE_LINE).toBe('um');
  });

  it('requires venue-specific settings', () => {
    const issues = (vars: Record<string, string>) => {
      const result = EnvConfigSchema.safeParse(vars);
      return result.success ? [] : result.error.issues.map((issue) => issue.path.join('.'));
    };

    expect(issues({ STREAM_VENUE: 'binance-user' })).toEqual(['BINANCE_API_KEY']);
    expect(issues({ STREAM_VENUE: 'bybit', BYBIT_API_KEY: 'test-key' })).toEqual(['BYBIT_API_SECRET']);
    expect(issues({ STREAM_VENUE: 'generic' })).toEqual(['STREAM_WS_URL']);
    expect(issues({ STREAM_VENUE: 'kraken' })).toEqual(['STREAM_VENUE']);
  });

  it('rejects a non-positive interval', () => {
    expect(EnvConfigSchema.safeParse({ STREAM_VENUE: 'binance', STREAM_PING_INTERVAL_MS: '0' }).success).toBe(false);
  });
});
