/**
 * @streamgate/stream-core
 *
 * Venue-agnostic streaming connection manager and its building blocks
 */

// Errors
export * from './errors';

// Transport
export * from './transport/transport';
export * from './transport/frame-queue';
export * from './transport/ws-transport';

// Building blocks
export * from './rate-limit/control-rate-limiter';
export * from './heartbeat/heartbeat-monitor';
export * from './subscription/topic-key';
export * from './subscription/subscription-registry';
export * from './snapshot/snapshot-store';
export * from './credentials/session-credential';
export * from './credentials/credential-keeper';
export * from './dispatch/inbound-dispatcher';

// Adapters
export * from './adapter/feed-adapter';
export * from './adapter/base-feed-adapter';
export * from './adapter/generic-adapter';

// Manager
export * from './connection/connection-manager';
