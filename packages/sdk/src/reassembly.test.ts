import { describe, it, expect, vi } from 'vitest';
import { OverflowError } from '@gwlink/utils/errors';
import { Command, encodeResponse } from '@gwlink/protocol';
import { deriveKey, encryptBody } from './crypto.js';
import { ReassemblyEngine, type ReadChannel, type RecoveryOutcome, type ReassemblyOptions } from './reassembly.js';
import type { TransportStream } from './transport.js';
import { FakeStream, ManualClock, data, empty, eof, fail, timeout } from './__fixtures__/fake-transport.js';

const frame = (command: number, body: string | Buffer = ''): Buffer =>
  encodeResponse({ command, body: Buffer.isBuffer(body) ? body : Buffer.from(body, 'latin1') });

const options: ReassemblyOptions = {
  readTimeoutMs: 1000,
  continuedReadTimeoutMs: 200,
  maxDownloadSize: 1024 * 1024,
  requireContinue: true,
};

function channelFor(stream: TransportStream, recover?: (err: Error) => Promise<RecoveryOutcome>): ReadChannel {
  return {
    stream: () => stream,
    recover: recover ?? (async (err) => ({ recovered: false, error: err })),
  };
}

describe('ReassemblyEngine.collect', () => {
  it('stops at LINK_CLOSE', async () => {
    const clock = new ManualClock();
    const engine = new ReassemblyEngine({ clock });
    const stream = new FakeStream([data(frame(Command.TRAN, 'hello')), data(frame(Command.LINK_CLOSE))], clock);

    const result = await engine.collect(channelFor(stream), options);

    expect(result.reason).toBe('link-close');
    expect(result.readCount).toBe(2);
    expect(result.raw).toEqual(Buffer.concat([frame(Command.TRAN, 'hello'), frame(Command.LINK_CLOSE)]));
  });

  it('stops after one self-contained frame when continuation is not required', async () => {
    const clock = new ManualClock();
    const engine = new ReassemblyEngine({ clock });
    const stream = new FakeStream([data(frame(Command.TRAN, 'hello')), data('never read')], clock);

    const result = await engine.collect(channelFor(stream), { ...options, requireContinue: false });

    expect(result.reason).toBe('frame-complete');
    expect(result.readCount).toBe(1);
  });

  it('treats end of stream as completion', async () => {
    const clock = new ManualClock();
    const engine = new ReassemblyEngine({ clock });
    const stream = new FakeStream([data(frame(Command.TRAN, 'abc')), eof()], clock);

    const result = await engine.collect(channelFor(stream), options);

    expect(result.reason).toBe('eof');
    expect(result.raw).toEqual(frame(Command.TRAN, 'abc'));
  });

  it('completes once empty reads outlast the idle threshold', async () => {
    const clock = new ManualClock();
    const engine = new ReassemblyEngine({ clock });
    const stream = new FakeStream([data('abc'), empty(400), empty(400), empty(400), data('late')], clock);

    const result = await engine.collect(channelFor(stream), options);

    expect(result.reason).toBe('idle');
    expect(result.raw.toString()).toBe('abc');
  });

  it('keeps reading through empty reads inside the idle threshold', async () => {
    const clock = new ManualClock();
    const engine = new ReassemblyEngine({ clock });
    const stream = new FakeStream([data('abc'), empty(100), empty(100), empty(100), data('def'), eof()], clock);

    const result = await engine.collect(channelFor(stream), options);

    expect(result.reason).toBe('eof');
    expect(result.raw.toString()).toBe('abcdef');
  });

  it('switches to the continued deadline after the first read attempt times out', async () => {
    const clock = new ManualClock();
    const start = clock.now();
    const engine = new ReassemblyEngine({ clock });
    const stream = new FakeStream([timeout(), timeout()], clock);

    const result = await engine.collect(channelFor(stream), options);

    expect(result.reason).toBe('timeout');
    expect(result.readCount).toBe(0);
    expect(stream.deadlines).toEqual([start + 1000, start + 1200]);
  });

  it('uses the continued deadline once data arrived', async () => {
    const clock = new ManualClock();
    const start = clock.now();
    const engine = new ReassemblyEngine({ clock });
    const stream = new FakeStream([data('abc'), data('def'), eof()], clock);

    await engine.collect(channelFor(stream), options);

    expect(stream.deadlines).toEqual([start + 1000, start + 200, start + 200]);
  });

  it('restarts collection on the recovered stream', async () => {
    const clock = new ManualClock();
    const engine = new ReassemblyEngine({ clock });
    const first = new FakeStream([data('partial'), fail(new Error('stream reset'))], clock);
    const second = new FakeStream([data(frame(Command.TRAN, 'full')), eof()], clock);
    let current: TransportStream = first;
    const recover = vi.fn(async (): Promise<RecoveryOutcome> => {
      current = second;
      return { recovered: true };
    });

    const result = await engine.collect({ stream: () => current, recover }, options);

    expect(recover).toHaveBeenCalledTimes(1);
    expect(result.recoveries).toBe(1);
    expect(result.reason).toBe('eof');
    expect(result.raw).toEqual(frame(Command.TRAN, 'full'));
  });

  it('reports failure when recovery gives up', async () => {
    const clock = new ManualClock();
    const engine = new ReassemblyEngine({ clock });
    const error = new Error('stream reset');
    const stream = new FakeStream([data('partial'), fail(error)], clock);

    const result = await engine.collect(channelFor(stream), options);

    expect(result.reason).toBe('failed');
    expect(result.error).toBe(error);
    expect(result.raw.toString()).toBe('partial');
  });

  it('keeps the earlier attempt when the resend fails before any data', async () => {
    const clock = new ManualClock();
    const engine = new ReassemblyEngine({ clock });
    const again = new Error('stream reset again');
    const first = new FakeStream([data('partial'), fail(new Error('stream reset'))], clock);
    const second = new FakeStream([fail(again)], clock);
    let current: TransportStream = first;
    const recover = vi.fn(async (err: Error): Promise<RecoveryOutcome> => {
      if (current === second) return { recovered: false, error: err };
      current = second;
      return { recovered: true };
    });

    const result = await engine.collect({ stream: () => current, recover }, options);

    expect(recover).toHaveBeenCalledTimes(2);
    expect(result.recoveries).toBe(1);
    expect(result.reason).toBe('failed');
    expect(result.error).toBe(again);
    expect(result.raw.toString()).toBe('partial');
  });

  it('keeps the earlier attempt when the resend ends empty', async () => {
    const clock = new ManualClock();
    const engine = new ReassemblyEngine({ clock });
    const first = new FakeStream([data('partial'), fail(new Error('stream reset'))], clock);
    const second = new FakeStream([eof()], clock);
    let current: TransportStream = first;
    const recover = async (): Promise<RecoveryOutcome> => {
      current = second;
      return { recovered: true };
    };

    const result = await engine.collect({ stream: () => current, recover }, options);

    expect(result.reason).toBe('eof');
    expect(result.error).toBeUndefined();
    expect(result.raw.toString()).toBe('partial');
  });

  it('throws once the download limit is exceeded', async () => {
    const clock = new ManualClock();
    const engine = new ReassemblyEngine({ clock });
    const stream = new FakeStream([data('x'.repeat(11))], clock);

    await expect(engine.collect(channelFor(stream), { ...options, maxDownloadSize: 10 }))
      .rejects.toThrow(OverflowError);
  });
});

describe('ReassemblyEngine.segment', () => {
  const engine = new ReassemblyEngine();

  it('concatenates frame bodies and stops at LINK_CLOSE', () => {
    const raw = Buffer.concat([
      frame(Command.TRAN, 'hel'),
      frame(Command.TRAN, 'lo'),
      frame(Command.LINK_CLOSE),
      frame(Command.TRAN, 'ignored'),
    ]);

    const result = engine.segment(raw);

    expect(result.pure.toString()).toBe('hello');
    expect(result.linkClosed).toBe(true);
    expect(result.frames).toHaveLength(3);
  });

  it('resynchronizes on the next tag after garbage', () => {
    const raw = Buffer.concat([Buffer.alloc(50, 0x41), frame(Command.TRAN, 'hello')]);

    const result = engine.segment(raw);

    expect(result.pure.toString()).toBe('hello');
    expect(result.skipped).toBe(50);
  });

  it('copies everything verbatim when no tag is near', () => {
    const raw = Buffer.concat([Buffer.alloc(150, 0x41), frame(Command.TRAN, 'hello')]);

    const result = engine.segment(raw);

    expect(result.pure).toEqual(raw);
    expect(result.frames).toHaveLength(0);
  });

  it('falls back to an HTTP status line', () => {
    const result = engine.segment(Buffer.from('xxxHTTP/1.1 200 OK\r\n\r\nhi', 'latin1'));

    expect(result.pure.toString()).toBe('HTTP/1.1 200 OK\r\n\r\nhi');
    expect(result.skipped).toBe(3);
  });

  it('appends a tail shorter than a header', () => {
    const raw = Buffer.concat([frame(Command.TRAN, 'ab'), Buffer.from('xyz')]);
    expect(engine.segment(raw).pure.toString()).toBe('abxyz');
  });

  it('keeps the available bytes of a truncated final frame', () => {
    const raw = frame(Command.TRAN, 'hello world').subarray(0, 25);
    expect(engine.segment(raw).pure.toString()).toBe('hello');
  });

  it('decrypts frame bodies with the request key', () => {
    const key = deriveKey('req-1', 1_700_000_000);
    const raw = frame(Command.TRAN, encryptBody(key, Buffer.from('0123456789abcdef')));

    expect(engine.segment(raw, key).pure.toString()).toBe('0123456789abcdef');
  });

  it('keeps a body that does not decrypt', () => {
    const key = deriveKey('req-1', 1_700_000_000);
    expect(engine.segment(frame(Command.TRAN, 'odd length'), key).pure.toString()).toBe('odd length');
  });
});
