import {
  CredentialError,
  toErrorMessage,
  type SessionCredential,
  type SessionCredentialProvider,
} from '@streamgate/stream-core';
import { createLogger, systemClock, type Clock, type Logger } from '@streamgate/utils';
import { ListenKeyResponseSchema } from '../stream/frames';
import {
  BINANCE_USER_LINES,
  LISTEN_KEY_VALIDITY_MS,
  type BinanceLineConfig,
  type BinanceUserLine,
} from '../stream/lines';
import { BinanceApiError, BinanceRestClient } from './client';

/** API key malformed or rejected; retrying with the same key cannot succeed */
const PERMANENT_KEY_ERRORS = new Set([-2014, -2015]);

export interface ListenKeyProviderOptions {
  apiKey: string;
  line?: BinanceUserLine | BinanceLineConfig;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Issues Binance listen keys for the user data stream
 *
 * - acquire: POST creates a key (or returns the account's live one)
 * - renew: PUT extends it by 60 minutes; -1125 means it is gone
 * - revoke: DELETE closes it
 *
 * Futures accounts hold one listen key and DELETE takes no key argument, so
 * only the most recently issued key is ever closed.
 */
export class ListenKeyProvider implements SessionCredentialProvider {
  private readonly client: BinanceRestClient;
  private readonly path: string;
  private readonly clock: Clock;
  private readonly log: Logger;
  /** Last key this provider created or kept alive */
  private latest: string | null = null;

  constructor(options: ListenKeyProviderOptions) {
    const line = typeof options.line === 'object' ? options.line : BINANCE_USER_LINES[options.line ?? 'um'];
    this.log = options.logger ?? createLogger('binance:listen-key');
    this.client = new BinanceRestClient({ baseUrl: line.restBase, apiKey: options.apiKey, logger: this.log });
    this.path = line.listenKeyPath;
    this.clock = options.clock ?? systemClock;
  }

  async acquire(): Promise<SessionCredential> {
    const body = await this.call('POST', 'create');
    const parsed = ListenKeyResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CredentialError('Binance listen key response missing listenKey');
    }
    this.log.info('Listen key created');
    return this.issue(parsed.data.listenKey);
  }

  async renew(credential: SessionCredential): Promise<SessionCredential> {
    const body = await this.call('PUT', 'keepalive');
    // Futures lines echo the key; keep ours when the body is empty
    const parsed = ListenKeyResponseSchema.safeParse(body);
    const value = parsed.success ? parsed.data.listenKey : credential.value;
    this.log.debug('Listen key kept alive');
    return this.issue(value);
  }

  async revoke(credential: SessionCredential): Promise<void> {
    if (credential.value !== this.latest) {
      this.log.debug('Listen key already replaced, not closing');
      return;
    }
    await this.call('DELETE', 'close');
    this.latest = null;
    this.log.info('Listen key closed');
  }

  private issue(value: string): SessionCredential {
    this.latest = value;
    const now = this.clock.now();
    return { value, issuedAt: now, expiresAt: now + LISTEN_KEY_VALIDITY_MS };
  }

  private async call(method: 'POST' | 'PUT' | 'DELETE', action: string): Promise<unknown> {
    try {
      return await this.client.request(method, this.path);
    } catch (error) {
      const permanent =
        error instanceof BinanceApiError &&
        (error.status === 401 || (error.code !== undefined && PERMANENT_KEY_ERRORS.has(error.code)));
      throw new CredentialError(`Listen key ${action} failed: ${toErrorMessage(error)}`, {
        permanent,
        cause: error,
      });
    }
  }
}
