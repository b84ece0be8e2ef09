/**
 * Error taxonomy for the streaming client
 *
 * - transient: network drop, timeout, stale connection (retried by the reconnect loop)
 * - authentication: credential rejected (reported, then retried with a fresh credential)
 * - protocol: malformed or unroutable frame (dropped, connection stays up)
 * - usage: invalid topic shape (returned locally, no network)
 * - fatal: explicit stop or permanent rejection (manager goes to stopped)
 */
export type StreamErrorCategory = 'transient' | 'authentication' | 'protocol' | 'usage' | 'fatal';

export class StreamError extends Error {
  readonly category: StreamErrorCategory;

  constructor(message: string, category: StreamErrorCategory, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StreamError';
    this.category = category;
  }
}

export class TransportClosedError extends StreamError {
  constructor(message = 'Transport is closed') {
    super(message, 'transient');
    this.name = 'TransportClosedError';
  }
}

export class ConnectTimeoutError extends StreamError {
  constructor(url: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms opening ${url}`, 'transient');
    this.name = 'ConnectTimeoutError';
  }
}

export class HeartbeatTimeoutError extends StreamError {
  constructor(reason: string) {
    super(`Heartbeat timeout: ${reason}`, 'transient');
    this.name = 'HeartbeatTimeoutError';
  }
}

export class AuthenticationError extends StreamError {
  /** Confirmed permanent rejection (e.g. invalid API key); stops the manager */
  readonly permanent: boolean;

  constructor(message: string, options: { permanent?: boolean; cause?: unknown } = {}) {
    super(message, options.permanent ? 'fatal' : 'authentication', { cause: options.cause });
    this.name = 'AuthenticationError';
    this.permanent = options.permanent ?? false;
  }
}

export class CredentialError extends StreamError {
  readonly permanent: boolean;

  constructor(message: string, options: { permanent?: boolean; cause?: unknown } = {}) {
    super(message, options.permanent ? 'fatal' : 'authentication', { cause: options.cause });
    this.name = 'CredentialError';
    this.permanent = options.permanent ?? false;
  }
}

export class ProtocolError extends StreamError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'protocol', options);
    this.name = 'ProtocolError';
  }
}

export class TopicValidationError extends StreamError {
  constructor(message: string) {
    super(message, 'usage');
    this.name = 'TopicValidationError';
  }
}

export class ManagerStoppedError extends StreamError {
  constructor(message = 'Stream manager is stopped') {
    super(message, 'fatal');
    this.name = 'ManagerStoppedError';
  }
}

/**
 * True when the error means retrying cannot help
 */
export function isPermanentError(error: unknown): boolean {
  return error instanceof StreamError && error.category === 'fatal';
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
