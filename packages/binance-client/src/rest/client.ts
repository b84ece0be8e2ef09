import { createLogger, type Logger } from '@streamgate/utils';
import { BinanceApiErrorBodySchema } from '../stream/frames';

/**
 * Error returned by the Binance REST API
 *
 * `code` is Binance's numeric error code when the body carried one
 * (e.g. -1125 for an unknown listen key, -2015 for a rejected API key).
 */
export class BinanceApiError extends Error {
  readonly status: number;
  readonly code: number | undefined;

  constructor(status: number, statusText: string, code?: number, msg?: string) {
    super(
      code !== undefined
        ? `Binance API error: ${status} ${statusText} (code ${code}: ${msg ?? ''})`
        : `Binance API error: ${status} ${statusText}`
    );
    this.name = 'BinanceApiError';
    this.status = status;
    this.code = code;
  }
}

export type BinanceHttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Minimal Binance REST client for API-key endpoints
 *
 * Listen key management only needs the `X-MBX-APIKEY` header; no request
 * signing is involved.
 *
 * Reference: https://developers.binance.com/docs/derivatives/usds-margined-futures/user-data-streams
 */
export class BinanceRestClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly log: Logger;

  constructor(options: { baseUrl: string; apiKey: string; logger?: Logger }) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.log = options.logger ?? createLogger('binance:rest');
  }

  /**
   * Make a request to the Binance API
   *
   * @param path - API path with query string (e.g., "/fapi/v1/listenKey")
   * @returns Parsed JSON body, or an empty object for an empty body
   */
  async request(method: BinanceHttpMethod, path: string): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;

    this.log.debug({ method, path: path.split('?')[0] }, 'Making Binance API request');

    const response = await fetch(url, {
      method,
      headers: { 'X-MBX-APIKEY': this.apiKey },
    });

    const text = await response.text();

    if (!response.ok) {
      this.log.error(
        { status: response.status, statusText: response.statusText, error: text },
        'Binance API request failed'
      );
      const body = BinanceApiErrorBodySchema.safeParse(safeJson(text));
      throw body.success
        ? new BinanceApiError(response.status, response.statusText, body.data.code, body.data.msg)
        : new BinanceApiError(response.status, response.statusText);
    }

    return text.length > 0 ? safeJson(text) : {};
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
