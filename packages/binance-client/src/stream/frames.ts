import { z } from 'zod';

// ============================================
// Binance WebSocket frame schemas
// ============================================

/**
 * Combined stream wrapper: all market frames from the /stream endpoint
 * arrive in this shape
 */
export const BinanceCombinedFrameSchema = z.object({
  stream: z.string().min(1),
  data: z.unknown(),
});

/**
 * Subscription response: `{"result":null,"id":1}`
 */
export const BinanceControlResponseSchema = z.object({
  result: z.unknown(),
  id: z.union([z.number(), z.string()]),
});

/**
 * Error response: `{"error":{"code":2,"msg":"Invalid request"},"id":1}`
 */
export const BinanceControlErrorSchema = z.object({
  error: z.object({
    code: z.number(),
    msg: z.string(),
  }),
  id: z.union([z.number(), z.string()]).nullable().optional(),
});

/**
 * Any user-data event; `e` names the event type
 */
export const BinanceUserEventSchema = z
  .object({
    e: z.string().min(1),
    E: z.number().optional(),
  })
  .passthrough();

/**
 * REST error body: `{"code":-1125,"msg":"This listenKey does not exist."}`
 */
export const BinanceApiErrorBodySchema = z.object({
  code: z.number(),
  msg: z.string(),
});

export const ListenKeyResponseSchema = z.object({
  listenKey: z.string().min(1),
});

export type BinanceUserEvent = z.infer<typeof BinanceUserEventSchema>;
