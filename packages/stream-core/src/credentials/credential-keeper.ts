import { createLogger, systemClock, type Clock, type Logger } from '@streamgate/utils';
import { CredentialError, toErrorMessage } from '../errors';
import type { SessionCredential, SessionCredentialProvider } from './session-credential';

export interface CredentialKeeperOptions {
  /** Renewal cadence; must be shorter than credential validity */
  renewIntervalMs: number;
  /** Called when a different credential value becomes current */
  onRotated?: (next: SessionCredential, previous: SessionCredential) => void;
  /** Called when a scheduled renewal fails outright */
  onRenewalFailed?: (error: Error) => void;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Holds the one current session credential
 *
 * Acquisition and refresh are single-flight, so concurrent callers share
 * one provider call. Swapping the current value never touches in-flight
 * dispatch; callers read the credential only when building a connection.
 */
export class CredentialKeeper {
  private credential: SessionCredential | null = null;
  private inflight: Promise<SessionCredential> | null = null;
  private cancelRenewal: (() => void) | null = null;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(
    private readonly provider: SessionCredentialProvider,
    private readonly options: CredentialKeeperOptions
  ) {
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? createLogger('stream:credentials');
  }

  /**
   * Current credential, acquiring one when absent and refreshing one that
   * has gone a full renewal interval without renewal
   */
  async current(): Promise<SessionCredential> {
    if (this.inflight) {
      return this.inflight;
    }
    if (this.credential === null) {
      return this.track(this.acquire());
    }
    if (this.clock.now() - this.credential.issuedAt >= this.options.renewIntervalMs) {
      return this.refresh();
    }
    return this.credential;
  }

  /**
   * Renew the current credential, falling back to exactly one acquire
   * when renewal fails
   */
  refresh(): Promise<SessionCredential> {
    if (this.inflight) {
      return this.inflight;
    }
    return this.track(this.renewOrReplace());
  }

  /**
   * Forget the current credential (e.g. after the venue rejected it);
   * the next current() acquires a fresh one
   */
  invalidate(): void {
    if (this.credential) {
      this.log.info({}, 'Session credential invalidated');
    }
    this.credential = null;
  }

  startRenewal(): void {
    this.stopRenewal();
    this.cancelRenewal = this.clock.schedule(() => {
      this.startRenewal();
      this.refresh().catch((error: unknown) => {
        const failure = error instanceof Error ? error : new Error(String(error));
        this.log.error({ err: failure.message }, 'Scheduled credential renewal failed');
        this.options.onRenewalFailed?.(failure);
      });
    }, this.options.renewIntervalMs);
  }

  stopRenewal(): void {
    if (this.cancelRenewal) {
      this.cancelRenewal();
      this.cancelRenewal = null;
    }
  }

  /**
   * Stop renewing and revoke the current credential. Revocation failures
   * are logged, not thrown.
   */
  async revoke(): Promise<void> {
    this.stopRenewal();
    const credential = this.credential;
    this.credential = null;
    if (credential) {
      await this.revokeQuietly(credential);
    }
  }

  private track(work: Promise<SessionCredential>): Promise<SessionCredential> {
    const flight = work.finally(() => {
      this.inflight = null;
    });
    this.inflight = flight;
    return flight;
  }

  private async acquire(): Promise<SessionCredential> {
    try {
      const credential = await this.provider.acquire();
      this.credential = credential;
      this.log.info({ expiresAt: credential.expiresAt }, 'Session credential acquired');
      return credential;
    } catch (error) {
      if (error instanceof CredentialError) throw error;
      throw new CredentialError(`Failed to acquire session credential: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  private async renewOrReplace(): Promise<SessionCredential> {
    const previous = this.credential;
    if (previous === null) {
      return this.acquire();
    }

    let next: SessionCredential;
    try {
      next = await this.provider.renew(previous);
      this.credential = next;
      this.log.debug({ expiresAt: next.expiresAt }, 'Session credential renewed');
    } catch (error) {
      this.log.warn({ err: toErrorMessage(error) }, 'Credential renewal failed, acquiring a new one');
      this.credential = null;
      next = await this.acquire();
    }

    if (next.value !== previous.value) {
      await this.revokeQuietly(previous);
      this.options.onRotated?.(next, previous);
    }
    return next;
  }

  private async revokeQuietly(credential: SessionCredential): Promise<void> {
    try {
      await this.provider.revoke(credential);
    } catch (error) {
      this.log.warn({ err: toErrorMessage(error) }, 'Failed to revoke session credential');
    }
  }
}
