/**
 * In-process transport doubles for session and reassembly tests.
 *
 * A stream plays back a script of read outcomes. Time only moves through
 * the ManualClock, so deadlines and backoff are deterministic.
 */

import { TimeoutError } from '@gwlink/utils/errors';
import type { Clock } from '@gwlink/utils/retry';
import {
  EndOfStreamError,
  type DialOptions,
  type TransportConnection,
  type TransportDialer,
  type TransportStream,
} from '../transport.js';

export class ManualClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(public current = 1_700_000_000_000) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

export type ReadStep =
  | { kind: 'data'; data: Buffer; advanceMs?: number }
  | { kind: 'empty'; advanceMs?: number }
  /** Moves the clock to the current deadline and rejects with TimeoutError */
  | { kind: 'timeout' }
  | { kind: 'error'; error: Error }
  | { kind: 'eof' };

export const data = (bytes: Buffer | string, advanceMs?: number): ReadStep => ({
  kind: 'data',
  data: Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes, 'latin1'),
  advanceMs,
});
export const empty = (advanceMs?: number): ReadStep => ({ kind: 'empty', advanceMs });
export const timeout = (): ReadStep => ({ kind: 'timeout' });
export const fail = (error: Error): ReadStep => ({ kind: 'error', error });
export const eof = (): ReadStep => ({ kind: 'eof' });

export class FakeStream implements TransportStream {
  readonly writes: Buffer[] = [];
  readonly deadlines: Array<number | null> = [];
  closed = false;
  writeError?: Error;
  private readonly steps: ReadStep[];
  private deadline: number | null = null;

  constructor(steps: ReadStep[], private readonly clock: ManualClock) {
    this.steps = [...steps];
  }

  get written(): Buffer {
    return Buffer.concat(this.writes);
  }

  async write(bytes: Buffer): Promise<number> {
    if (this.writeError) throw this.writeError;
    this.writes.push(Buffer.from(bytes));
    return bytes.length;
  }

  async read(maxBytes: number): Promise<Buffer> {
    const step = this.steps.shift();
    if (!step) throw new EndOfStreamError();
    switch (step.kind) {
      case 'data':
        if (step.advanceMs) this.clock.advance(step.advanceMs);
        return step.data.subarray(0, maxBytes);
      case 'empty':
        if (step.advanceMs) this.clock.advance(step.advanceMs);
        return Buffer.alloc(0);
      case 'timeout': {
        const waitMs = this.deadline === null ? 0 : Math.max(0, this.deadline - this.clock.now());
        this.clock.advance(waitMs);
        throw new TimeoutError('read', waitMs);
      }
      case 'error':
        throw step.error;
      case 'eof':
        throw new EndOfStreamError();
    }
  }

  setReadDeadline(deadline: number | null): void {
    this.deadline = deadline;
    this.deadlines.push(deadline);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeConnection implements TransportConnection {
  readonly streams: FakeStream[] = [];
  closed = false;

  constructor(private readonly dialer: FakeDialer) {}

  async openStream(): Promise<TransportStream> {
    const stream = new FakeStream(this.dialer.nextScript(), this.dialer.clock);
    this.streams.push(stream);
    this.dialer.streams.push(stream);
    return stream;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Hands each opened stream the next script in the queue, across
 * connections. Dial failures are consumed before any dial succeeds.
 */
export class FakeDialer implements TransportDialer {
  readonly connections: FakeConnection[] = [];
  readonly streams: FakeStream[] = [];
  dialCount = 0;
  private readonly scripts: ReadStep[][];
  private readonly dialFailures: Error[];

  constructor(
    scripts: ReadStep[][],
    readonly clock: ManualClock = new ManualClock(),
    dialFailures: Error[] = [],
  ) {
    this.scripts = [...scripts];
    this.dialFailures = [...dialFailures];
  }

  nextScript(): ReadStep[] {
    return this.scripts.shift() ?? [];
  }

  async dial(_options?: DialOptions): Promise<TransportConnection> {
    this.dialCount++;
    const failure = this.dialFailures.shift();
    if (failure) throw failure;
    const connection = new FakeConnection(this);
    this.connections.push(connection);
    return connection;
  }
}
