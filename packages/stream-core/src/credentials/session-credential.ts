/**
 * Short-lived token that opens a private feed (e.g. a listen key)
 */
export interface SessionCredential {
  value: string;
  /** When the credential was created or last renewed (ms) */
  issuedAt: number;
  /** When the venue stops honouring it unless renewed (ms) */
  expiresAt: number;
}

/**
 * Side channel that issues session credentials
 *
 * Implemented per venue over its REST API; the streaming client only
 * consumes this contract.
 */
export interface SessionCredentialProvider {
  /** Create a new credential */
  acquire(): Promise<SessionCredential>;
  /** Extend validity; rejects when the credential already expired */
  renew(credential: SessionCredential): Promise<SessionCredential>;
  /** Best-effort cleanup */
  revoke(credential: SessionCredential): Promise<void>;
}
