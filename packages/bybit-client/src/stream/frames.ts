import { z } from 'zod';

// ============================================
// Bybit V5 WebSocket frame schemas
// ============================================

/**
 * Topic data: `{"topic":"orderbook.50.BTCUSDT","type":"delta","ts":1,"data":{...}}`
 *
 * Private topics carry no `type` and deliver `data` as an array.
 */
export const BybitDataFrameSchema = z.object({
  topic: z.string().min(1),
  type: z.string().optional(),
  ts: z.number().optional(),
  data: z.unknown(),
});

/**
 * Response to an op request (subscribe, unsubscribe, auth, ping)
 *
 * `{"success":true,"ret_msg":"","conn_id":"abc","req_id":"1","op":"subscribe"}`
 */
export const BybitOpResponseSchema = z.object({
  op: z.string().min(1),
  success: z.boolean().optional(),
  ret_msg: z.string().optional(),
  req_id: z.string().optional(),
  conn_id: z.string().optional(),
});

export type BybitDataFrame = z.infer<typeof BybitDataFrameSchema>;
export type BybitOpResponse = z.infer<typeof BybitOpResponseSchema>;
