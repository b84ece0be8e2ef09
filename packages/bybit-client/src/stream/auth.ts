import { createHmac } from 'node:crypto';

/**
 * Bybit WebSocket authentication
 *
 * The private stream expects `{"op":"auth","args":[apiKey, expires, signature]}`
 * where the signature is hex HMAC-SHA256 of `GET/realtime{expires}`.
 *
 * Reference: https://bybit-exchange.github.io/docs/v5/ws/connect#authentication
 */
export class BybitAuth {
  constructor(
    private readonly apiKey: string,
    private readonly apiSecret: string
  ) {}

  /**
   * Sign a payload with HMAC-SHA256
   *
   * @returns Hex-encoded signature
   */
  sign(payload: string): string {
    return createHmac('sha256', this.apiSecret).update(payload).digest('hex');
  }

  /**
   * Auth frame arguments valid until `expires` (ms since epoch)
   */
  authArgs(expires: number): [string, number, string] {
    return [this.apiKey, expires, this.sign(`GET/realtime${expires}`)];
  }
}
