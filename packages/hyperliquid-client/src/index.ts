/**
 * @streamgate/hyperliquid-client
 *
 * Hyperliquid market and user stream adapter
 */

export * from './stream/hyperliquid-adapter';
export * from './stream/frames';
