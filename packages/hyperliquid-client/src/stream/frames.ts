import { z } from 'zod';

// ============================================
// Hyperliquid WebSocket frame schemas
// ============================================

/**
 * Subscription object as sent in `{"method":"subscribe","subscription":{...}}`
 *
 * `type` names the feed; `coin`, `interval` and `user` scope it. Echoed
 * subscriptions may carry unset options as null.
 */
export const HyperliquidSubscriptionSchema = z
  .object({
    type: z.string().min(1),
    coin: z.string().min(1).optional(),
  })
  .catchall(z.union([z.string(), z.number(), z.boolean(), z.null()]));

/**
 * Every server frame: `{"channel":"l2Book","data":{...}}`
 */
export const HyperliquidFrameSchema = z.object({
  channel: z.string().min(1),
  data: z.unknown(),
});

/**
 * `{"channel":"subscriptionResponse","data":{"method":"subscribe","subscription":{...}}}`
 */
export const HyperliquidSubscriptionResponseSchema = z.object({
  method: z.enum(['subscribe', 'unsubscribe']),
  subscription: HyperliquidSubscriptionSchema,
});

/** Coin-scoped payload (l2Book, bbo, activeAssetCtx) */
export const CoinPayloadSchema = z.object({ coin: z.string().min(1) }).passthrough();

/** User-scoped payload (userFills, userFundings, webData2, ...) */
export const UserPayloadSchema = z.object({ user: z.string().min(1) }).passthrough();

/** Candle payload: symbol `s` and interval `i` */
export const CandlePayloadSchema = z.object({ s: z.string().min(1), i: z.string().min(1) }).passthrough();

/** Trades arrive as a non-empty array of fills for one coin */
export const TradesPayloadSchema = z.array(CoinPayloadSchema).min(1);

export type HyperliquidSubscription = z.infer<typeof HyperliquidSubscriptionSchema>;
