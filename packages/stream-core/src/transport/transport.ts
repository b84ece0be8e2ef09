/**
 * Duplex message transport contract
 *
 * The connection manager owns exactly one TransportConnection at a time
 * and never touches it after calling close().
 */
export interface TransportConnection {
  readonly url: string;

  /** True while frames can be sent */
  isOpen(): boolean;

  /** Send one text frame; rejects with TransportClosedError once closed */
  send(frame: string): Promise<void>;

  /** Send a protocol-level ping frame; rejects with TransportClosedError once closed */
  ping(payload?: string): Promise<void>;

  /**
   * Inbound text frames. Ends when the connection closes;
   * throws if the connection failed with an error.
   */
  frames(): AsyncIterable<string>;

  /** Register a listener for protocol-level pong frames */
  onPong(listener: () => void): void;

  /** Close and wait for the close handshake (or give up and terminate) */
  close(code?: number, reason?: string): Promise<void>;
}

export interface TransportOpenOptions {
  timeoutMs: number;
}

export interface Transport {
  open(url: string, options: TransportOpenOptions): Promise<TransportConnection>;
}
