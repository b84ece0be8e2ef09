import { z } from 'zod';

/**
 * Generic control request sent over the feed connection.
 * Venues rename the fields; adapters translate to their own shape.
 */
export const ControlRequestSchema = z.object({
  op: z.enum(['subscribe', 'unsubscribe']),
  args: z.array(z.string().min(1)).min(1),
  id: z.union([z.number().int(), z.string()]),
});

/**
 * Acknowledgement for a control request
 */
export const ControlResponseSchema = z.object({
  id: z.union([z.number().int(), z.string()]),
  success: z.boolean(),
  message: z.string().optional(),
});

/**
 * Combined-stream data frame: `{ "stream": <topic>, "data": <payload> }`.
 * `type` marks incremental feeds; absent means a standalone event.
 */
export const CombinedStreamFrameSchema = z.object({
  stream: z.string().min(1),
  data: z.unknown(),
  type: z.enum(['snapshot', 'delta', 'event']).optional(),
});

/**
 * Authentication request and its response
 */
export const AuthRequestSchema = z.object({
  op: z.literal('auth'),
  args: z.array(z.union([z.string(), z.number()])),
});

export const AuthResponseSchema = z.object({
  op: z.literal('auth'),
  success: z.boolean(),
  message: z.string().optional(),
});

/**
 * Application-level liveness frames
 */
export const LivenessFrameSchema = z.object({
  op: z.enum(['ping', 'pong']),
});

export type ControlOp = z.infer<typeof ControlRequestSchema>['op'];
export type ControlRequest = z.infer<typeof ControlRequestSchema>;
export type ControlResponse = z.infer<typeof ControlResponseSchema>;
export type CombinedStreamFrame = z.infer<typeof CombinedStreamFrameSchema>;
export type AuthRequest = z.infer<typeof AuthRequestSchema>;
export type AuthResponse = z.infer<typeof AuthResponseSchema>;
