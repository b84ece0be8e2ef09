/**
 * @streamgate/binance-client
 *
 * Binance market and user data stream adapters, plus listen key management
 */

// Stream adapters
export * from './stream/market-adapter';
export * from './stream/user-data-adapter';
export * from './stream/lines';
export * from './stream/frames';

// REST
export * from './rest/client';
export * from './rest/listen-key-provider';
