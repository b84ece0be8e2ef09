import { z } from 'zod';

/**
 * Price level as venues send it: `[price, size, ...extra]`.
 * Prices and sizes usually arrive as decimal strings.
 */
export const PriceLevelSchema = z
  .tuple([z.union([z.string(), z.number()]), z.union([z.string(), z.number()])])
  .rest(z.union([z.string(), z.number()]));

/**
 * Ordering kept for a list-of-levels field after a merge
 * - desc: bids (best price first)
 * - asc: asks (best price first)
 * - none: keep insertion order, unseen levels appended
 */
export const LevelOrderSchema = z.enum(['asc', 'desc', 'none']);

// Export inferred TypeScript types
export type PriceLevel = z.infer<typeof PriceLevelSchema>;
export type LevelOrder = z.infer<typeof LevelOrderSchema>;
