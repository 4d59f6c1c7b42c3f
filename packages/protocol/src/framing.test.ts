import { describe, it, expect } from 'vitest';
import { ProtocolError } from '@gwlink/utils/errors';
import {
  encodeRequestHeader,
  decodeRequestHeader,
  encodeResponseHeader,
  decodeResponseHeader,
  encodeRequest,
  encodeResponse,
  decodeResponse,
  peekFrame,
  findTag,
} from './framing.js';
import { Command, HEAD_TAG, HEADER_SIZE, ProtoType, type ResponseHeader } from './types.js';

const responseHeader: ResponseHeader = {
  tag: HEAD_TAG,
  version: 1,
  command: Command.TRAN_ACK,
  result: 8002,
  option: 3,
  reserve: 0,
  dataLen: 5,
  originLen: 4,
};

describe('header codec', () => {
  describe('request header', () => {
    it('should lay out fields big-endian', () => {
      const buf = encodeRequestHeader({
        tag: HEAD_TAG,
        version: 1,
        command: Command.TRAN,
        protoType: ProtoType.HTTP,
        option: 0,
        reserve: 0,
        dataLen: 5,
        crc: 0,
      });
      expect(buf.length).toBe(HEADER_SIZE);
      expect(buf.toString('hex')).toBe('454d4d3a' + '0001' + '0006' + '02' + '00' + '0000' + '00000005' + '00000000');
    });

    it('should round-trip', () => {
      const header = {
        tag: HEAD_TAG,
        version: 1,
        command: 65535,
        protoType: 255,
        option: 1,
        reserve: 2,
        dataLen: 0xffffffff,
        crc: 7,
      };
      expect(decodeRequestHeader(encodeRequestHeader(header))).toEqual(header);
    });

    it('should reject out-of-range values', () => {
      expect(() => encodeRequestHeader({
        tag: HEAD_TAG, version: 1, command: 70000, protoType: 0, option: 0, reserve: 0, dataLen: 0, crc: 0,
      })).toThrow(RangeError);
    });
  });

  describe('response header', () => {
    it('should round-trip at an offset', () => {
      const buf = Buffer.concat([Buffer.from('xyz'), encodeResponseHeader(responseHeader)]);
      expect(decodeResponseHeader(buf, 3)).toEqual(responseHeader);
    });

    it('should fail on fewer than 20 bytes', () => {
      const buf = encodeResponseHeader(responseHeader).subarray(0, 19);
      expect(() => decodeResponseHeader(buf)).toThrow(ProtocolError);
      expect(() => decodeResponseHeader(buf)).toThrow('Header too short: 19 < 20 bytes');
    });

    it('should fail on a bad tag', () => {
      const buf = encodeResponseHeader(responseHeader);
      buf.write('XMM:', 0, 'latin1');
      expect(() => decodeResponseHeader(buf)).toThrow('Bad header tag: 0x584d4d3a');
    });
  });
});

describe('encodeRequest', () => {
  it('should compute DataLen from the body', () => {
    const wire = encodeRequest({ command: Command.TRAN, protoType: ProtoType.HTTP, body: Buffer.from('hello') });
    expect(wire.length).toBe(25);
    const header = decodeRequestHeader(wire);
    expect(header.dataLen).toBe(5);
    expect(header.crc).toBe(0);
    expect(wire.subarray(HEADER_SIZE).toString()).toBe('hello');
  });

  it('should allow an empty body', () => {
    const wire = encodeRequest({ command: Command.HEART_BEAT, protoType: ProtoType.TCP });
    expect(wire.length).toBe(HEADER_SIZE);
    expect(decodeRequestHeader(wire).dataLen).toBe(0);
  });
});

describe('peekFrame', () => {
  const frame = encodeResponse({ command: Command.TRAN_ACK, result: 8002, body: Buffer.from('abcdef') });

  it('should report a complete frame with its length', () => {
    const peek = peekFrame(frame);
    expect(peek.status).toBe('complete');
    if (peek.status === 'complete') {
      expect(peek.frameLength).toBe(26);
      expect(peek.header.result).toBe(8002);
    }
  });

  it('should report a truncated body as incomplete', () => {
    const peek = peekFrame(frame.subarray(0, 23));
    expect(peek.status).toBe('incomplete');
  });

  it('should report short or untagged input as invalid', () => {
    expect(peekFrame(frame.subarray(0, 10)).status).toBe('invalid');
    expect(peekFrame(Buffer.concat([Buffer.from('x'), frame])).status).toBe('invalid');
  });
});

describe('decodeResponse', () => {
  it('should copy the body', () => {
    const wire = encodeResponse({ command: Command.TRAN_ACK, body: Buffer.from('data') });
    const message = decodeResponse(wire);
    wire.fill(0);
    expect(message.body.toString()).toBe('data');
    expect(message.header.originLen).toBe(4);
  });

  it('should throw on a truncated frame', () => {
    const wire = encodeResponse({ command: Command.TRAN_ACK, body: Buffer.from('data') });
    expect(() => decodeResponse(wire.subarray(0, 22))).toThrow('Truncated response frame: need 24 bytes, have 22');
  });
});

describe('findTag', () => {
  const buf = Buffer.concat([Buffer.alloc(10, 0x41), Buffer.from('EMM:')]);

  it('should find a tag inside the window', () => {
    expect(findTag(buf, 1, 101)).toBe(10);
  });

  it('should ignore a tag past the window', () => {
    expect(findTag(buf, 1, 10)).toBe(-1);
  });
});
