/**
 * @streamgate/schemas
 *
 * Single source of truth for all Zod schemas and TypeScript types
 * Used across the stream core, venue clients, and apps
 */

// Market data schemas
export * from './market/orderbook.schema';

// Stream schemas
export * from './stream/topic.schema';
export * from './stream/wire.schema';
export * from './stream/connection.schema';
export * from './stream/manager-config.schema';

// Environment and configuration schemas
export * from './env/config.schema';
