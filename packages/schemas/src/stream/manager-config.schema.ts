import { z } from 'zod';

/**
 * Heartbeat tuning. Private feeds usually tolerate far longer intervals
 * than public ones (e.g. 180s vs 15s).
 */
export const HeartbeatConfigSchema = z
  .object({
    /** Probe cadence */
    intervalMs: z.number().int().positive().default(15_000),
    /** Max silence (no pong / no traffic) before the connection is declared dead; defaults to 2x interval */
    timeoutMs: z.number().int().positive().optional(),
  })
  .transform((hb) => ({
    intervalMs: hb.intervalMs,
    timeoutMs: hb.timeoutMs ?? hb.intervalMs * 2,
  }));

/**
 * Connection manager configuration with defaults
 */
export const StreamManagerConfigSchema = z.object({
  /** First reconnect delay */
  initialBackoffMs: z.number().int().positive().default(1_000),
  /** Cap for exponential backoff */
  maxBackoffMs: z.number().int().positive().default(30_000),
  backoffMultiplier: z.number().min(1).default(2),
  /** Transport open timeout */
  connectTimeoutMs: z.number().int().positive().default(10_000),
  /** Wait for auth-success after sending the auth frame */
  authTimeoutMs: z.number().int().positive().default(10_000),
  /** Bounded wait used by subscribe() when the connection is not ready */
  readyTimeoutMs: z.number().int().positive().default(20_000),
  /** Upper bound on topics per replayed subscribe frame */
  replayBatchSize: z.number().int().positive().default(200),
  /** Pause between replay batches */
  replayPacingMs: z.number().int().nonnegative().default(200),
  heartbeat: HeartbeatConfigSchema.default({}),
  /** Session credential renewal cadence (must be shorter than credential validity) */
  credentialRenewIntervalMs: z.number().int().positive().default(25 * 60 * 1000),
});

export type StreamManagerConfigInput = z.input<typeof StreamManagerConfigSchema>;
export type StreamManagerConfig = z.output<typeof StreamManagerConfigSchema>;
export type HeartbeatConfig = z.output<typeof HeartbeatConfigSchema>;
