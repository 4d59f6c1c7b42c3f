/**
 * SessionClient - gateway session over one transport connection
 * @gwlink/sdk
 *
 * Connects, performs the init handshake, and runs request/response
 * exchanges. Every public operation holds the client's mutex for its whole
 * duration, so one instance never has two exchanges in flight.
 */

import { randomUUID } from 'node:crypto';
import {
  ConfigError,
  ConnectionError,
  GatewayError,
  HandshakeError,
  IncompleteResponseError,
  OverflowError,
  ProtocolError,
  toError,
} from '@gwlink/utils/errors';
import { createLogger, type Logger, type LogSettings } from '@gwlink/utils/logger';
import { Mutex } from '@gwlink/utils/lock';
import { RetryPolicy, systemClock, type Clock } from '@gwlink/utils/retry';
import {
  DEFAULT_REQUEST_OPTIONS,
  resolveRequestOptions,
  resolveSessionConfig,
  type RequestOptions,
  type RequestOptionsInput,
  type SessionConfig,
  type SessionConfigInput,
} from '@gwlink/config';
import {
  AuthResult,
  Command,
  DataProtoType,
  ProtoType,
  commandName,
  decodeResponse,
  encodeInitBinary,
  encodeInitJson,
  encodeRequest,
  HEADER_SIZE,
  peekFrame,
  resultName,
  type ResponseHeader,
  type ResponseMessage,
} from '@gwlink/protocol';
import { deriveKey, encryptBody, tryDecryptBody, unixSeconds } from './crypto.js';
import { extractResponse, type ExtractedResponse } from './extractor.js';
import {
  ReassemblyEngine,
  READ_CHUNK_SIZE,
  type CollectResult,
  type CompletionReason,
  type RecoveryOutcome,
} from './reassembly.js';
import { isApplicationClose, isEndOfStream, type TransportConnection, type TransportDialer, type TransportStream } from './transport.js';

export type SessionState = 'DISCONNECTED' | 'CONNECTED' | 'EXCHANGING';

export interface SessionClientConfig {
  /** Opens transport connections to the gateway */
  dialer: TransportDialer;
  /** Session identity and connection retry policy */
  session: SessionConfigInput;
  /** Time source for deadlines, backoff and key timestamps */
  clock?: Clock;
  /** Logging settings; unset fields fall back to GWLINK_LOG_* */
  log?: LogSettings;
  /** Request id generator (default: randomUUID) */
  requestId?: () => string;
}

export interface HandshakeOptions {
  useEncryption?: boolean;
  readTimeoutMs?: number;
}

export interface HandshakeResult {
  requestId: string;
  header: ResponseHeader;
  /** INIT_ACK body, decrypted when the handshake was encrypted */
  body: Buffer;
  sentBytes: number;
  receivedBytes: number;
}

export interface ExchangeResult extends ExtractedResponse {
  requestId: string;
  sentBytes: number;
  receivedBytes: number;
  readCount: number;
  /** Write attempts, including the first */
  attempts: number;
  linkClosed: boolean;
  reason: CompletionReason;
  /** Set when retries ran out after part of the response had arrived */
  error?: Error;
}

export interface TrafficStats {
  sentBytes: number;
  receivedBytes: number;
}

/** Bound on a handshake reply; INIT_ACK bodies are tiny */
const MAX_HANDSHAKE_BYTES = 1024 * 1024;
const ESCAPED_CRLF = '\\r\\n';

/**
 * Turn a caller payload into request body bytes. String payloads may carry
 * literal "\r\n" escape sequences that stand for CRLF.
 */
export function encodePayload(payload: string | Buffer, unescapeCrlf: boolean): Buffer {
  if (Buffer.isBuffer(payload)) return payload;
  const text = unescapeCrlf ? payload.split(ESCAPED_CRLF).join('\r\n') : payload;
  return Buffer.from(text, 'utf-8');
}

export class SessionClient {
  private readonly dialer: TransportDialer;
  private readonly session: SessionConfig;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly engine: ReassemblyEngine;
  private readonly nextRequestId: () => string;
  private readonly mutex = new Mutex();

  private connection?: TransportConnection;
  private stream?: TransportStream;
  private _state: SessionState = 'DISCONNECTED';
  private traffic: TrafficStats = { sentBytes: 0, receivedBytes: 0 };

  onStateChange?: (state: SessionState) => void;

  constructor(config: SessionClientConfig) {
    this.dialer = config.dialer;
    this.session = resolveSessionConfig(config.session);
    this.clock = config.clock ?? systemClock;
    this.log = createLogger('session', config.log);
    this.engine = new ReassemblyEngine({ clock: this.clock, log: config.log });
    this.nextRequestId = config.requestId ?? randomUUID;
  }

  get state(): SessionState {
    return this._state;
  }

  get sessionConfig(): Readonly<SessionConfig> {
    return this.session;
  }

  /** Bytes written and read over the client's lifetime */
  get stats(): TrafficStats {
    return { ...this.traffic };
  }

  /**
   * Dial the gateway and open a stream. Replaces any existing connection.
   */
  connect(signal?: AbortSignal): Promise<void> {
    return this.mutex.runExclusive(() => this.connectLocked(signal));
  }

  /**
   * Announce the session to the gateway. Plain handshakes send a JSON
   * body; encrypted ones send the binary body encrypted with the shared
   * init key and expect an INIT_ACK encrypted with the per-request key.
   */
  handshake(options: HandshakeOptions = {}): Promise<HandshakeResult> {
    return this.mutex.runExclusive(() => this.handshakeLocked(options));
  }

  /**
   * Send one TRAN request and collect its response.
   */
  async exchange(payload: string | Buffer, options: RequestOptionsInput = {}): Promise<ExchangeResult> {
    const opts = resolveRequestOptions(options);
    return this.mutex.runExclusive(async () => {
      await this.ensureStream();
      this.setState('EXCHANGING');
      try {
        return await this.exchangeLocked(payload, opts);
      } finally {
        this.setState(this.connection && !this.connection.closed ? 'CONNECTED' : 'DISCONNECTED');
      }
    });
  }

  close(): Promise<void> {
    return this.mutex.runExclusive(() => this.teardown());
  }

  // ===== Connection management =====

  private setState(state: SessionState): void {
    if (this._state === state) return;
    this._state = state;
    this.onStateChange?.(state);
  }

  /**
   * A reconnect in the middle of an exchange keeps the EXCHANGING state
   * instead of reporting DISCONNECTED and CONNECTED.
   */
  private async connectLocked(signal?: AbortSignal, midExchange = false): Promise<void> {
    await this.teardown(!midExchange);
    try {
      const connection = await this.dialer.dial({ signal });
      try {
        this.stream = await connection.openStream();
      } catch (err) {
        await connection.close();
        throw err;
      }
      this.connection = connection;
    } catch (err) {
      this.setState('DISCONNECTED');
      if (err instanceof ConnectionError) throw err;
      throw new ConnectionError(toError(err).message);
    }
    this.log.info('Connected', { serverId: this.session.serverId, serverName: this.session.serverName });
    this.setState(midExchange ? 'EXCHANGING' : 'CONNECTED');
  }

  private async ensureStream(): Promise<TransportStream> {
    if (!this.connection) {
      throw new ConnectionError('not connected');
    }
    if (this.connection.closed) {
      this.log.info('Connection closed by peer, reconnecting');
      await this.connectLocked();
    }
    if (!this.stream) {
      await this.openStream();
    }
    return this.requireStream();
  }

  private requireStream(): TransportStream {
    if (!this.stream) {
      throw new ConnectionError('no open stream');
    }
    return this.stream;
  }

  private async openStream(): Promise<TransportStream> {
    if (!this.connection || this.connection.closed) {
      throw new ConnectionError('connection is closed');
    }
    try {
      this.stream = await this.connection.openStream();
    } catch (err) {
      throw new ConnectionError(`open stream failed: ${toError(err).message}`);
    }
    return this.stream;
  }

  private async closeStream(): Promise<void> {
    const stream = this.stream;
    this.stream = undefined;
    if (!stream) return;
    try {
      await stream.close();
    } catch (err) {
      this.log.debug('Stream close failed', { error: toError(err).message });
    }
  }

  private async teardown(notify = true): Promise<void> {
    await this.closeStream();
    const connection = this.connection;
    this.connection = undefined;
    if (connection) {
      try {
        await connection.close();
      } catch (err) {
        this.log.debug('Connection close failed', { error: toError(err).message });
      }
    }
    if (notify) this.setState('DISCONNECTED');
  }

  private async write(stream: TransportStream, data: Buffer): Promise<number> {
    const written = await stream.write(data);
    this.traffic.sentBytes += written;
    return written;
  }

  // ===== Handshake =====

  private async handshakeLocked(options: HandshakeOptions): Promise<HandshakeResult> {
    const stream = await this.ensureStream();
    const useEncryption = options.useEncryption ?? false;
    const readTimeoutMs = options.readTimeoutMs ?? DEFAULT_REQUEST_OPTIONS.readTimeoutMs;
    const requestId = this.nextRequestId();
    const timestamp = unixSeconds(this.clock.now());
    const responseKey = deriveKey(requestId, timestamp);

    const identity = {
      serverId: this.session.serverId,
      serverName: this.session.appName ?? this.session.serverName,
      sessionId: this.session.sessionId,
      requestId,
    };

    let request: Buffer;
    if (useEncryption) {
      if (!this.session.initKey) {
        throw new ConfigError('session config', ['initKey: required for an encrypted handshake']);
      }
      const body = encodeInitBinary({ ...identity, timestamp });
      request = encodeRequest({
        command: Command.INIT,
        protoType: ProtoType.HTTP,
        body: encryptBody(this.session.initKey, body),
      });
    } else {
      request = encodeRequest({
        command: Command.INIT,
        protoType: DataProtoType.JSON,
        body: encodeInitJson(identity),
      });
    }

    let sentBytes: number;
    try {
      sentBytes = await this.write(stream, request);
    } catch (err) {
      throw new ConnectionError(`init write failed: ${toError(err).message}`);
    }

    const { message, receivedBytes } = await this.readSingleFrame(stream, readTimeoutMs);
    const { command, result } = message.header;

    if (command !== Command.INIT_ACK) {
      throw new HandshakeError(command, result, `unexpected ${commandName(command)}`);
    }
    if (result !== AuthResult.SUCCESS) {
      throw new HandshakeError(command, result, resultName(result));
    }

    const body = useEncryption && message.body.length > 0
      ? tryDecryptBody(responseKey, message.body) ?? message.body
      : message.body;

    this.log.info('Handshake accepted', { requestId, encrypted: useEncryption });
    return { requestId, header: message.header, body, sentBytes, receivedBytes };
  }

  /**
   * Read until one complete response frame sits at the start of the buffer.
   */
  private async readSingleFrame(
    stream: TransportStream,
    readTimeoutMs: number,
  ): Promise<{ message: ResponseMessage; receivedBytes: number }> {
    const chunks: Buffer[] = [];
    let total = 0;

    for (;;) {
      stream.setReadDeadline(this.clock.now() + readTimeoutMs);
      let chunk: Buffer;
      try {
        chunk = await stream.read(READ_CHUNK_SIZE);
      } catch (err) {
        if (isEndOfStream(err)) {
          throw new IncompleteResponseError('handshake', Buffer.concat(chunks, total));
        }
        if (err instanceof GatewayError) throw err;
        throw new ConnectionError(`init read failed: ${toError(err).message}`);
      }
      if (chunk.length === 0) continue;

      chunks.push(Buffer.from(chunk));
      total += chunk.length;
      this.traffic.receivedBytes += chunk.length;
      const buffered = Buffer.concat(chunks, total);

      const peek = peekFrame(buffered, 0);
      if (peek.status === 'complete') {
        return { message: decodeResponse(buffered, 0), receivedBytes: total };
      }
      if (peek.status === 'invalid' && total >= HEADER_SIZE) {
        // Surfaces the precise header error
        decodeResponse(buffered, 0);
      }
      if (total > MAX_HANDSHAKE_BYTES) {
        throw new ProtocolError(`Handshake reply exceeds ${MAX_HANDSHAKE_BYTES} bytes`);
      }
    }
  }

  // ===== Exchange =====

  private async exchangeLocked(payload: string | Buffer, opts: RequestOptions): Promise<ExchangeResult> {
    const requestId = this.nextRequestId();
    const key = opts.useEncryption ? deriveKey(requestId, unixSeconds(this.clock.now())) : undefined;
    const body = encodePayload(payload, opts.unescapeCrlf);
    const request = encodeRequest({
      command: Command.TRAN,
      protoType: ProtoType.HTTP,
      body: key === undefined ? body : encryptBody(key, body),
    });

    const policy = new RetryPolicy(
      { maxAttempts: opts.maxRetries, delayMs: this.session.retryDelayMs, intervalMs: this.session.retryIntervalMs },
      this.clock,
    );
    let attempts = 1;
    let sentBytes = 0;

    const send = async (): Promise<void> => {
      sentBytes += await this.write(this.requireStream(), request);
    };

    // Close, optionally reconnect, back off, reopen and resend
    const recover = async (cause: Error): Promise<RecoveryOutcome> => {
      let lastError = cause;
      for (;;) {
        await this.closeStream();
        if (!policy.canRetry(attempts)) {
          this.log.warn('Retries exhausted', { requestId, attempts, error: lastError.message });
          return { recovered: false, error: lastError };
        }
        const reconnect = isApplicationClose(lastError) || !this.connection || this.connection.closed;
        await policy.wait(attempts);
        attempts++;
        this.log.info('Retrying request', { requestId, attempt: attempts, reconnect });
        try {
          if (reconnect) await this.connectLocked(undefined, true);
          else await this.openStream();
          await send();
          return { recovered: true };
        } catch (err) {
          lastError = toError(err);
        }
      }
    };

    try {
      await send();
    } catch (err) {
      const outcome = await recover(toError(err));
      if (!outcome.recovered) throw outcome.error;
    }

    let collected: CollectResult;
    try {
      collected = await this.engine.collect(
        { stream: () => this.requireStream(), recover },
        opts,
      );
    } catch (err) {
      if (err instanceof OverflowError) await this.closeStream();
      throw err;
    }
    this.traffic.receivedBytes += collected.raw.length;

    if (collected.error && collected.raw.length === 0) {
      throw collected.error;
    }

    const segments = this.engine.segment(collected.raw, key);
    const extracted = extractResponse(collected.raw, segments.pure, opts);
    const linkClosed = segments.linkClosed || collected.reason === 'link-close';

    if (linkClosed || collected.reason === 'eof') {
      await this.closeStream();
    }

    this.log.debug('Exchange complete', {
      requestId,
      reason: collected.reason,
      raw: collected.raw.length,
      pure: extracted.pureData.length,
      md5: extracted.md5,
    });

    const result: ExchangeResult = {
      ...extracted,
      requestId,
      sentBytes,
      receivedBytes: collected.raw.length,
      readCount: collected.readCount,
      attempts,
      linkClosed,
      reason: collected.reason,
    };
    if (collected.error) result.error = collected.error;
    return result;
  }
}
