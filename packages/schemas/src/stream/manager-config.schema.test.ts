import { describe, it, expect } from 'vitest';
import { StreamManagerConfigSchema } from './manager-config.schema';

describe('StreamManagerConfigSchema', () => {
  it('fills every default', () => {
    expect(StreamManagerConfigSchema.parse({})).toEqual({
      initialBackoffMs: 1_000,
      maxBackoffMs: 30_000,
      backoffMultiplier: 2,
      connectTimeoutMs: 10_000,
      authTimeoutMs: 10_000,
      readyTimeoutMs: 20_000,
      replayBatchSize: 200,
      replayPacingMs: 200,
      heartbeat: { intervalMs: 15_000, timeoutMs: 30_000 },
      credentialRenewIntervalMs: 25 * 60 * 1000,
    });
  });

  it('derives the heartbeat timeout from the interval', () => {
    expect(StreamManagerConfigSchema.parse({ heartbeat: { intervalMs: 180_000 } }).heartbeat).toEqual({
      intervalMs: 180_000,
      timeoutMs: 360_000,
    });
    expect(
      StreamManagerConfigSchema.parse({ heartbeat: { intervalMs: 180_000, timeoutMs: 600_000 } }).heartbeat
    ).toEqual({ intervalMs: 180_000, timeoutMs: 600_000 });
  });

  it('rejects a multiplier below one', () => {
    expect(StreamManagerConfigSchema.safeParse({ backoffMultiplier: 0.5 }).success).toBe(false);
  });
});
