import WebSocket from 'ws';
import { createLogger, type Logger } from '@streamgate/utils';
import { ConnectTimeoutError, TransportClosedError, toErrorMessage } from '../errors';
import { FrameQueue } from './frame-queue';
import type { Transport, TransportConnection, TransportOpenOptions } from './transport';

/** Max wait for the close handshake before terminating the socket */
const CLOSE_GRACE_MS = 2_000;

/** Exchanges cap frames well below this; bounds memory on a hostile peer */
const MAX_PAYLOAD_BYTES = 8 * 1024 * 1024;

/**
 * TransportConnection over a `ws` WebSocket
 */
class WsConnection implements TransportConnection {
  readonly url: string;
  private readonly socket: WebSocket;
  private readonly queue = new FrameQueue();
  private readonly pongListeners: Array<() => void> = [];
  private readonly closed: Promise<void>;

  constructor(url: string, socket: WebSocket, private readonly log: Logger) {
    this.url = url;
    this.socket = socket;

    this.closed = new Promise((resolve) => {
      socket.once('close', (code, reason) => {
        this.log.debug({ url, code, reason: reason.toString() }, 'WebSocket closed');
        this.queue.end();
        resolve();
      });
    });

    socket.on('message', (data: WebSocket.RawData) => {
      this.queue.push(toBuffer(data).toString('utf8'));
    });

    socket.on('pong', () => {
      for (const listener of this.pongListeners) {
        listener();
      }
    });

    socket.on('error', (error) => {
      this.log.warn({ url, err: error.message }, 'WebSocket error');
      this.queue.end(error);
    });
  }

  isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(frame: string): Promise<void> {
    if (!this.isOpen()) {
      return Promise.reject(new TransportClosedError());
    }
    return new Promise((resolve, reject) => {
      this.socket.send(frame, (error) => {
        if (error) {
          reject(new TransportClosedError(error.message));
        } else {
          resolve();
        }
      });
    });
  }

  ping(payload?: string): Promise<void> {
    if (!this.isOpen()) {
      return Promise.reject(new TransportClosedError());
    }
    return new Promise((resolve, reject) => {
      this.socket.ping(payload, undefined, (error) => {
        if (error) {
          reject(new TransportClosedError(error.message));
        } else {
          resolve();
        }
      });
    });
  }

  frames(): AsyncIterable<string> {
    return this.queue;
  }

  onPong(listener: () => void): void {
    this.pongListeners.push(listener);
  }

  async close(code = 1000, reason = ''): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) {
      this.queue.end();
      return;
    }

    if (this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.terminate();
    } else if (this.socket.readyState === WebSocket.OPEN) {
      this.socket.close(code, reason);
    }

    let graceTimer: NodeJS.Timeout | undefined;
    const grace = new Promise<'timeout'>((resolve) => {
      graceTimer = setTimeout(() => resolve('timeout'), CLOSE_GRACE_MS);
    });

    const outcome = await Promise.race([this.closed.then(() => 'closed' as const), grace]);
    clearTimeout(graceTimer);

    if (outcome === 'timeout') {
      this.log.warn({ url: this.url }, 'Close handshake timed out, terminating socket');
      this.socket.terminate();
      await this.closed;
    }
  }
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * Transport backed by the `ws` library
 */
export class WsTransport implements Transport {
  private readonly log: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.log = options.logger ?? createLogger('stream:transport');
  }

  open(url: string, options: TransportOpenOptions): Promise<TransportConnection> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(url, { maxPayload: MAX_PAYLOAD_BYTES });
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        socket.terminate();
        reject(new ConnectTimeoutError(url, options.timeoutMs));
      }, options.timeoutMs);

      const fail = (error: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.removeAllListeners();
        socket.on('error', (late) => this.log.debug({ url, err: late.message }, 'Error after failed open'));
        socket.terminate();
        reject(new TransportClosedError(`Failed to open ${url}: ${toErrorMessage(error)}`));
      };

      socket.once('error', fail);
      socket.once('unexpected-response', (_request, response) => {
        fail(new Error(`Unexpected server response: ${response.statusCode ?? 'unknown'}`));
      });

      socket.once('open', () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.removeListener('error', fail);
        socket.removeAllListeners('unexpected-response');
        this.log.debug({ url }, 'WebSocket opened');
        resolve(new WsConnection(url, socket, this.log));
      });
    });
  }
}
