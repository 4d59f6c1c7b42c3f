/**
 * Response reassembly.
 *
 * The gateway streams a response as any number of frames over reads of
 * arbitrary size, often without announcing the total length. Collection
 * keeps reading until a LINK_CLOSE frame, end of stream, or a period of
 * silence; segmentation then walks the accumulated bytes frame by frame,
 * resynchronizing on the magic tag when framing is lost.
 */

import { OverflowError, toError } from '@gwlink/utils/errors';
import { createLogger, type Logger, type LogSettings } from '@gwlink/utils/logger';
import { systemClock, type Clock } from '@gwlink/utils/retry';
import {
  Command,
  HEADER_SIZE,
  commandName,
  findTag,
  peekFrame,
  type ResponseMessage,
} from '@gwlink/protocol';
import { tryDecryptBody, type CipherKey } from './crypto.js';
import { classifyReadError, type TransportStream } from './transport.js';

export const READ_CHUNK_SIZE = 64 * 1024;
export const EMPTY_READ_LIMIT = 3;
/** Bytes scanned past an unparsable offset when resynchronizing */
export const RESYNC_WINDOW = 100;

const HTTP_MARKER = Buffer.from('HTTP/', 'latin1');

export type RecoveryOutcome = { recovered: true } | { recovered: false; error: Error };

/**
 * Where the engine reads from. After a successful recovery the channel
 * hands out a fresh stream on which the request has already been resent.
 */
export interface ReadChannel {
  stream(): TransportStream;
  recover(err: Error): Promise<RecoveryOutcome>;
}

export interface ReassemblyOptions {
  /** Deadline for the first read and the idle threshold */
  readTimeoutMs: number;
  /** Deadline for every read after the first */
  continuedReadTimeoutMs: number;
  maxDownloadSize: number;
  /** Keep reading after a self-contained frame */
  requireContinue: boolean;
}

export type CompletionReason = 'link-close' | 'frame-complete' | 'idle' | 'eof' | 'timeout' | 'failed';

export interface CollectResult {
  raw: Buffer;
  readCount: number;
  /** Streams re-opened after read failures */
  recoveries: number;
  reason: CompletionReason;
  /**
   * Set when reading stopped because recovery was exhausted. raw then holds
   * the latest attempt that received bytes, possibly one before the resend.
   */
  error?: Error;
}

export interface SegmentResult {
  pure: Buffer;
  frames: ResponseMessage[];
  linkClosed: boolean;
  /** Bytes skipped while resynchronizing */
  skipped: number;
}

export interface ReassemblyEngineConfig {
  clock?: Clock;
  log?: LogSettings;
}

export class ReassemblyEngine {
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(config: ReassemblyEngineConfig = {}) {
    this.clock = config.clock ?? systemClock;
    this.log = createLogger('reassembly', config.log);
  }

  /**
   * Read one response off the channel. Throws OverflowError when the
   * response grows past maxDownloadSize; other read failures end up in
   * the result once recovery gives up.
   */
  async collect(channel: ReadChannel, options: ReassemblyOptions): Promise<CollectResult> {
    let chunks: Buffer[] = [];
    let total = 0;
    let readCount = 0;
    let recoveries = 0;
    let emptyReads = 0;
    let lastReadAt = this.clock.now();
    let deadlineMs = options.readTimeoutMs;
    // Bytes of the last attempt that received any, kept until a resend yields data
    let previousAttempt: Buffer | undefined;

    const idleExceeded = (): boolean => this.clock.now() - lastReadAt > options.readTimeoutMs;
    const finish = (reason: CompletionReason, error?: Error): CollectResult => {
      const raw = total === 0 && previousAttempt ? previousAttempt : Buffer.concat(chunks, total);
      const result: CollectResult = { raw, readCount, recoveries, reason };
      if (error) result.error = error;
      this.log.debug('Collection finished', { reason, bytes: raw.length, reads: readCount });
      return result;
    };

    for (;;) {
      const stream = channel.stream();
      stream.setReadDeadline(this.clock.now() + deadlineMs);

      let chunk: Buffer;
      try {
        chunk = await stream.read(READ_CHUNK_SIZE);
      } catch (err) {
        const failure = classifyReadError(err);
        if (failure === 'eof') {
          return finish('eof');
        }
        if (failure === 'timeout') {
          if (idleExceeded()) return finish('timeout');
          deadlineMs = options.continuedReadTimeoutMs;
          continue;
        }

        const error = toError(err);
        this.log.warn('Read failed', { error: error.message, received: total });
        const outcome = await channel.recover(error);
        if (!outcome.recovered) {
          return finish('failed', outcome.error);
        }
        // The request was resent; the gateway starts the response over
        recoveries++;
        if (total > 0) previousAttempt = Buffer.concat(chunks, total);
        chunks = [];
        total = 0;
        emptyReads = 0;
        lastReadAt = this.clock.now();
        deadlineMs = options.readTimeoutMs;
        continue;
      }

      if (chunk.length === 0) {
        emptyReads++;
        if (emptyReads >= EMPTY_READ_LIMIT && idleExceeded()) {
          return finish('idle');
        }
        continue;
      }

      emptyReads = 0;
      lastReadAt = this.clock.now();
      readCount++;
      chunks.push(Buffer.from(chunk));
      total += chunk.length;
      deadlineMs = options.continuedReadTimeoutMs;

      if (total > options.maxDownloadSize) {
        throw new OverflowError(options.maxDownloadSize, total);
      }

      // Only this chunk is probed: a cheap early exit when reads happen to
      // line up with frames. segment() reconciles the whole buffer.
      const peek = peekFrame(chunk, 0);
      if (peek.status !== 'invalid') {
        if (peek.header.command === Command.LINK_CLOSE) {
          return finish('link-close');
        }
        if (peek.status === 'complete' && !options.requireContinue) {
          return finish('frame-complete');
        }
      }
    }
  }

  /**
   * Split accumulated bytes into frames and concatenate their bodies.
   * Never throws: unusable regions degrade to verbatim copies.
   */
  segment(raw: Buffer, key?: CipherKey): SegmentResult {
    const parts: Buffer[] = [];
    const frames: ResponseMessage[] = [];
    let linkClosed = false;
    let skipped = 0;
    let offset = 0;

    const bodyOf = (body: Buffer): Buffer => {
      if (key === undefined || body.length === 0) return body;
      return tryDecryptBody(key, body) ?? body;
    };

    while (offset < raw.length) {
      if (raw.length - offset < HEADER_SIZE) {
        parts.push(raw.subarray(offset));
        break;
      }

      const peek = peekFrame(raw, offset);

      if (peek.status === 'complete') {
        const body = raw.subarray(offset + HEADER_SIZE, offset + peek.frameLength);
        frames.push({ header: peek.header, body: Buffer.from(body) });
        if (peek.header.command === Command.LINK_CLOSE) {
          linkClosed = true;
          break;
        }
        parts.push(bodyOf(body));
        offset += peek.frameLength;
        continue;
      }

      if (peek.status === 'incomplete') {
        this.log.debug('Truncated final frame', {
          command: commandName(peek.header.command),
          expected: peek.header.dataLen,
          available: raw.length - offset - HEADER_SIZE,
        });
        parts.push(bodyOf(raw.subarray(offset + HEADER_SIZE)));
        break;
      }

      const windowEnd = offset + RESYNC_WINDOW;
      const next = findTag(raw, offset + 1, windowEnd);
      if (next !== -1) {
        skipped += next - offset;
        offset = next;
        continue;
      }

      const window = raw.subarray(offset, Math.min(raw.length, windowEnd + HTTP_MARKER.length - 1));
      const httpAt = window.indexOf(HTTP_MARKER);
      if (httpAt !== -1) {
        const http = offset + httpAt;
        skipped += http - offset;
        parts.push(raw.subarray(http));
        break;
      }

      parts.push(raw.subarray(offset));
      break;
    }

    return { pure: Buffer.concat(parts), frames, linkClosed, skipped };
  }
}
