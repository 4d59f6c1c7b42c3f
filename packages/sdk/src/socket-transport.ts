/**
 * TCP/TLS implementation of the transport capability.
 *
 * Each stream is its own socket. Incoming data is queued so reads can be
 * pulled at the caller's pace with explicit deadlines; the socket is
 * paused while the queue is above the high-water mark.
 */

import net from 'node:net';
import tls from 'node:tls';
import { ConnectionError, TimeoutError } from '@gwlink/utils/errors';
import { DEFAULT_ENDPOINT } from '@gwlink/config';
import { createLogger, type LogSettings, type Logger } from '@gwlink/utils/logger';
import {
  EndOfStreamError,
  type DialOptions,
  type TransportConnection,
  type TransportDialer,
  type TransportStream,
} from './transport.js';

export interface SocketTransportOptions {
  host: string;
  port: number;
  /** Wrap sockets in TLS (default: true) */
  tls?: boolean;
  /** SNI name; defaults to host unless host is an IP address */
  servername?: string;
  /** Verify the gateway certificate (default: false) */
  rejectUnauthorized?: boolean;
  connectTimeoutMs?: number;
  /** Pause the socket when this many bytes are queued (default: 1 MiB) */
  highWaterMark?: number;
  log?: LogSettings;
}

const DEFAULT_HIGH_WATER_MARK = 1024 * 1024;

interface PendingRead {
  maxBytes: number;
  resolve: (data: Buffer) => void;
  reject: (err: Error) => void;
}

export class SocketStream implements TransportStream {
  private readonly socket: net.Socket;
  private readonly highWaterMark: number;
  private queue: Buffer[] = [];
  private queuedBytes = 0;
  private ended = false;
  private failure?: Error;
  private pending?: PendingRead;
  private deadline: number | null = null;
  private deadlineTimer?: NodeJS.Timeout;

  constructor(socket: net.Socket, highWaterMark: number = DEFAULT_HIGH_WATER_MARK) {
    this.socket = socket;
    this.highWaterMark = highWaterMark;

    socket.on('data', (chunk: Buffer) => {
      this.queue.push(chunk);
      this.queuedBytes += chunk.length;
      if (this.queuedBytes > this.highWaterMark) {
        socket.pause();
      }
      this.flushPending();
    });
    socket.on('end', () => this.markEnded());
    socket.on('close', () => this.markEnded());
    socket.on('error', (err) => {
      this.failure = err;
      this.flushPending();
    });
  }

  get bufferedBytes(): number {
    return this.queuedBytes;
  }

  write(data: Buffer): Promise<number> {
    if (this.socket.destroyed || this.socket.writableEnded) {
      return Promise.reject(new ConnectionError('stream is closed'));
    }
    return new Promise((resolve, reject) => {
      this.socket.write(data, (err) => {
        if (err) reject(err);
        else resolve(data.length);
      });
    });
  }

  read(maxBytes: number): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(new Error('Concurrent read on stream'));
    }
    return new Promise((resolve, reject) => {
      this.pending = { maxBytes, resolve, reject };
      this.flushPending();
      if (this.pending) this.armDeadline();
    });
  }

  setReadDeadline(deadline: number | null): void {
    this.deadline = deadline;
    if (this.pending) this.armDeadline();
  }

  close(): Promise<void> {
    this.clearDeadline();
    if (this.socket.destroyed) return Promise.resolve();
    return new Promise((resolve) => {
      this.socket.once('close', () => resolve());
      this.socket.destroy();
    });
  }

  private markEnded(): void {
    this.ended = true;
    this.flushPending();
  }

  private take(maxBytes: number): Buffer {
    const parts: Buffer[] = [];
    let remaining = maxBytes;
    while (remaining > 0 && this.queue.length > 0) {
      const head = this.queue[0];
      if (head.length <= remaining) {
        parts.push(head);
        remaining -= head.length;
        this.queue.shift();
      } else {
        parts.push(head.subarray(0, remaining));
        this.queue[0] = head.subarray(remaining);
        remaining = 0;
      }
    }
    const data = Buffer.concat(parts);
    this.queuedBytes -= data.length;
    if (this.queuedBytes <= this.highWaterMark && this.socket.isPaused()) {
      this.socket.resume();
    }
    return data;
  }

  private flushPending(): void {
    const pending = this.pending;
    if (!pending) return;

    if (this.queuedBytes > 0) {
      this.settle();
      pending.resolve(this.take(pending.maxBytes));
    } else if (this.failure) {
      this.settle();
      pending.reject(this.failure);
    } else if (this.ended) {
      this.settle();
      pending.reject(new EndOfStreamError());
    }
  }

  private settle(): void {
    this.pending = undefined;
    this.clearDeadline();
  }

  private armDeadline(): void {
    this.clearDeadline();
    if (this.deadline === null) return;
    const waitMs = Math.max(0, this.deadline - Date.now());
    this.deadlineTimer = setTimeout(() => {
      const pending = this.pending;
      if (!pending) return;
      this.pending = undefined;
      this.deadlineTimer = undefined;
      pending.reject(new TimeoutError('read', waitMs));
    }, waitMs);
  }

  private clearDeadline(): void {
    if (this.deadlineTimer) {
      clearTimeout(this.deadlineTimer);
      this.deadlineTimer = undefined;
    }
  }
}

/**
 * A logical connection to the gateway. The socket opened while dialing
 * backs the first stream; later streams dial their own sockets.
 */
export class SocketConnection implements TransportConnection {
  private readonly dialer: SocketDialer;
  private spare?: net.Socket;
  private readonly streams = new Set<SocketStream>();
  private _closed = false;

  constructor(dialer: SocketDialer, firstSocket: net.Socket) {
    this.dialer = dialer;
    this.spare = firstSocket;
  }

  get closed(): boolean {
    return this._closed;
  }

  async openStream(): Promise<TransportStream> {
    if (this._closed) {
      throw new ConnectionError('connection is closed');
    }
    let socket = this.spare;
    this.spare = undefined;
    if (!socket || socket.destroyed) {
      socket = await this.dialer.connectSocket();
    }
    const stream = new SocketStream(socket, this.dialer.highWaterMark);
    this.streams.add(stream);
    socket.once('close', () => this.streams.delete(stream));
    return stream;
  }

  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;
    this.spare?.destroy();
    this.spare = undefined;
    await Promise.all([...this.streams].map((stream) => stream.close()));
    this.streams.clear();
  }
}

export class SocketDialer implements TransportDialer {
  private readonly options: SocketTransportOptions;
  private readonly log: Logger;

  constructor(options: SocketTransportOptions) {
    this.options = options;
    this.log = createLogger('transport', options.log);
  }

  get highWaterMark(): number {
    return this.options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
  }

  async dial(options: DialOptions = {}): Promise<TransportConnection> {
    const socket = await this.connectSocket(options.signal);
    return new SocketConnection(this, socket);
  }

  connectSocket(signal?: AbortSignal): Promise<net.Socket> {
    const { host, port } = this.options;
    const useTls = this.options.tls ?? true;
    const timeoutMs = this.options.connectTimeoutMs ?? DEFAULT_ENDPOINT.connectTimeoutMs;

    if (signal?.aborted) {
      return Promise.reject(new ConnectionError(`dial to ${host}:${port} aborted`));
    }

    return new Promise((resolve, reject) => {
      let settled = false;
      const socket = useTls
        ? tls.connect({
          host,
          port,
          servername: this.options.servername ?? (net.isIP(host) === 0 ? host : undefined),
          rejectUnauthorized: this.options.rejectUnauthorized ?? false,
        })
        : net.createConnection({ host, port });

      const cleanup = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };
      const fail = (err: Error): void => {
        if (settled) return;
        settled = true;
        cleanup();
        socket.destroy();
        this.log.warn('Dial failed', { host, port, error: err.message });
        reject(err);
      };
      // Stays attached after connect; streams add their own handlers
      const onError = (err: Error): void => {
        if (settled) {
          this.log.debug('Socket error', { host, port, error: err.message });
          return;
        }
        fail(new ConnectionError(`${host}:${port}: ${err.message}`));
      };
      const onAbort = (): void => fail(new ConnectionError(`dial to ${host}:${port} aborted`));
      const onConnect = (): void => {
        if (settled) return;
        settled = true;
        cleanup();
        socket.setNoDelay(true);
        this.log.debug('Socket connected', { host, port, tls: useTls });
        resolve(socket);
      };

      const timer = setTimeout(() => fail(new TimeoutError(`connect ${host}:${port}`, timeoutMs)), timeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });
      socket.on('error', onError);
      socket.once(useTls ? 'secureConnect' : 'connect', onConnect);
    });
  }
}

export function createSocketTransport(options: SocketTransportOptions): SocketDialer {
  return new SocketDialer(options);
}
