/**
 * Transport capability consumed by the session client.
 *
 * The client only needs an ordered, reliable byte stream with per-read
 * deadlines, plus a way to open a fresh stream or a fresh connection.
 * How the connection is established (QUIC, TLS, interface selection) is
 * the dialer's business.
 */

import { ApplicationCloseError, TimeoutError } from '@gwlink/utils/errors';

export interface TransportStream {
  /** Resolves with the number of bytes written */
  write(data: Buffer): Promise<number>;
  /**
   * Read up to maxBytes. An empty buffer is a zero-length read, not end of
   * stream; end of stream rejects with EndOfStreamError.
   */
  read(maxBytes: number): Promise<Buffer>;
  /** Absolute deadline (epoch ms) for pending and future reads; null clears it */
  setReadDeadline(deadline: number | null): void;
  close(): Promise<void>;
}

export interface TransportConnection {
  openStream(): Promise<TransportStream>;
  close(): Promise<void>;
  readonly closed: boolean;
}

export interface DialOptions {
  signal?: AbortSignal;
}

export interface TransportDialer {
  dial(options?: DialOptions): Promise<TransportConnection>;
}

export class EndOfStreamError extends Error {
  constructor() {
    super('End of stream');
    this.name = 'EndOfStreamError';
  }
}

export type ReadFailure = 'eof' | 'timeout' | 'application-close' | 'other';

const APPLICATION_CLOSE_TEXT = 'Application error';

export function isEndOfStream(err: unknown): boolean {
  return err instanceof EndOfStreamError;
}

export function isTimeout(err: unknown): boolean {
  return err instanceof TimeoutError;
}

/**
 * Application-level close from the peer. Some transports only surface it
 * as text ("Application error 0x0"), so the message is checked too.
 */
export function isApplicationClose(err: unknown): boolean {
  if (err instanceof ApplicationCloseError) return true;
  return err instanceof Error && err.message.includes(APPLICATION_CLOSE_TEXT);
}

export function classifyReadError(err: unknown): ReadFailure {
  if (isEndOfStream(err)) return 'eof';
  if (isTimeout(err)) return 'timeout';
  if (isApplicationClose(err)) return 'application-close';
  return 'other';
}
