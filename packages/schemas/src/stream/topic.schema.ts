import { z } from 'zod';

/**
 * A subscribable feed, described independently of any venue's wire format.
 *
 * Examples:
 * - `{ kind: 'depth', symbol: 'BTCUSDT', params: { levels: '20' } }`
 * - `{ kind: 'kline', symbol: 'ethusdt', params: { interval: '1m' } }`
 * - `{ kind: 'wallet' }` (account-wide, no symbol)
 */
export const TopicSchema = z.object({
  /** Feed kind understood by the venue adapter (e.g. 'trade', 'orderbook', 'userFills') */
  kind: z.string().min(1),
  /** Instrument the feed is scoped to; omitted for account-wide feeds */
  symbol: z.string().min(1).optional(),
  /** Extra feed parameters (interval, depth, user address) */
  params: z.record(z.string().min(1)).optional(),
});

export type Topic = z.infer<typeof TopicSchema>;

/**
 * Parse a compact topic spec such as `kline:BTCUSDT:interval=1m` or `wallet`.
 *
 * Format: `<kind>[:<symbol>][:<name>=<value>]...`
 */
export function parseTopicSpec(spec: string): Topic {
  const [kind, ...rest] = spec.trim().split(':');
  const params: Record<string, string> = {};
  let symbol: string | undefined;

  for (const part of rest) {
    const eq = part.indexOf('=');
    if (eq > 0) {
      params[part.slice(0, eq)] = part.slice(eq + 1);
    } else if (part.length > 0 && symbol === undefined) {
      symbol = part;
    }
  }

  return TopicSchema.parse({
    kind,
    symbol,
    params: Object.keys(params).length > 0 ? params : undefined,
  });
}
