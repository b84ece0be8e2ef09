/**
 * @streamgate/bybit-client
 *
 * Bybit V5 public and private stream adapter
 */

export * from './stream/bybit-adapter';
export * from './stream/auth';
export * from './stream/frames';
