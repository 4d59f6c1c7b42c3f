/**
 * Header encoding/decoding for the gateway protocol.
 * @gwlink/protocol
 *
 * Request header (20 bytes, big-endian):
 * - 4 bytes: tag "EMM:"
 * - 2 bytes: version
 * - 2 bytes: command
 * - 1 byte:  protocol type
 * - 1 byte:  option
 * - 2 bytes: reserved
 * - 4 bytes: body length
 * - 4 bytes: crc (reserved, 0)
 *
 * Response header differs after the command: 2 bytes result, 1 byte
 * option, 1 byte reserved, 4 bytes body length, 4 bytes origin length.
 */

import { ProtocolError } from '@gwlink/utils/errors';
import {
  HEAD_TAG,
  HEADER_SIZE,
  PROTO_VERSION,
  type RequestHeader,
  type ResponseHeader,
  type ResponseMessage,
} from './types.js';

function assertHeaderAvailable(buf: Buffer, offset: number): void {
  if (offset < 0 || buf.length - offset < HEADER_SIZE) {
    throw new ProtocolError(`Header too short: ${Math.max(0, buf.length - offset)} < ${HEADER_SIZE} bytes`);
  }
}

function assertTag(tag: number): void {
  if (tag !== HEAD_TAG) {
    throw new ProtocolError(`Bad header tag: 0x${tag.toString(16).padStart(8, '0')}`);
  }
}

/**
 * Encode a request header. Out-of-range field values raise a RangeError
 * from Buffer's checked writers.
 */
export function encodeRequestHeader(header: RequestHeader): Buffer {
  const buf = Buffer.alloc(HEADER_SIZE);
  buf.writeUInt32BE(header.tag, 0);
  buf.writeUInt16BE(header.version, 4);
  buf.writeUInt16BE(header.command, 6);
  buf.writeUInt8(header.protoType, 8);
  buf.writeUInt8(header.option, 9);
  buf.writeUInt16BE(header.reserve, 10);
  buf.writeUInt32BE(header.dataLen, 12);
  buf.writeUInt32BE(header.crc, 16);
  return buf;
}

export function decodeRequestHeader(buf: Buffer, offset = 0): RequestHeader {
  assertHeaderAvailable(buf, offset);
  const tag = buf.readUInt32BE(offset);
  assertTag(tag);
  return {
    tag,
    version: buf.readUInt16BE(offset + 4),
    command: buf.readUInt16BE(offset + 6),
    protoType: buf.readUInt8(offset + 8),
    option: buf.readUInt8(offset + 9),
    reserve: buf.readUInt16BE(offset + 10),
    dataLen: buf.readUInt32BE(offset + 12),
    crc: buf.readUInt32BE(offset + 16),
  };
}

export function encodeResponseHeader(header: ResponseHeader): Buffer {
  const buf = Buffer.alloc(HEADER_SIZE);
  buf.writeUInt32BE(header.tag, 0);
  buf.writeUInt16BE(header.version, 4);
  buf.writeUInt16BE(header.command, 6);
  buf.writeUInt16BE(header.result, 8);
  buf.writeUInt8(header.option, 10);
  buf.writeUInt8(header.reserve, 11);
  buf.writeUInt32BE(header.dataLen, 12);
  buf.writeUInt32BE(header.originLen, 16);
  return buf;
}

export function decodeResponseHeader(buf: Buffer, offset = 0): ResponseHeader {
  assertHeaderAvailable(buf, offset);
  const tag = buf.readUInt32BE(offset);
  assertTag(tag);
  return {
    tag,
    version: buf.readUInt16BE(offset + 4),
    command: buf.readUInt16BE(offset + 6),
    result: buf.readUInt16BE(offset + 8),
    option: buf.readUInt8(offset + 10),
    reserve: buf.readUInt8(offset + 11),
    dataLen: buf.readUInt32BE(offset + 12),
    originLen: buf.readUInt32BE(offset + 16),
  };
}

export interface RequestFrame {
  command: number;
  protoType: number;
  body?: Buffer;
  option?: number;
}

/**
 * Encode a complete request: header with DataLen taken from the body,
 * followed by the body.
 */
export function encodeRequest(frame: RequestFrame): Buffer {
  const body = frame.body ?? Buffer.alloc(0);
  const header = encodeRequestHeader({
    tag: HEAD_TAG,
    version: PROTO_VERSION,
    command: frame.command,
    protoType: frame.protoType,
    option: frame.option ?? 0,
    reserve: 0,
    dataLen: body.length,
    crc: 0,
  });
  return Buffer.concat([header, body]);
}

export interface ResponseFrame {
  command: number;
  result?: number;
  body?: Buffer;
  option?: number;
  /** Length of the body before encryption; defaults to the body length */
  originLen?: number;
}

/**
 * Encode a complete response. The client never sends these; gateway peers
 * and tests do.
 */
export function encodeResponse(frame: ResponseFrame): Buffer {
  const body = frame.body ?? Buffer.alloc(0);
  const header = encodeResponseHeader({
    tag: HEAD_TAG,
    version: PROTO_VERSION,
    command: frame.command,
    result: frame.result ?? 0,
    option: frame.option ?? 0,
    reserve: 0,
    dataLen: body.length,
    originLen: frame.originLen ?? body.length,
  });
  return Buffer.concat([header, body]);
}

export type FramePeek =
  | { status: 'invalid' }
  | { status: 'incomplete'; header: ResponseHeader }
  | { status: 'complete'; header: ResponseHeader; frameLength: number };

/**
 * Probe for a response frame at `offset` without throwing. A valid header
 * whose body has not fully arrived is incomplete, not invalid.
 */
export function peekFrame(buf: Buffer, offset = 0): FramePeek {
  if (offset < 0 || buf.length - offset < HEADER_SIZE) return { status: 'invalid' };
  if (buf.readUInt32BE(offset) !== HEAD_TAG) return { status: 'invalid' };

  const header = decodeResponseHeader(buf, offset);
  const frameLength = HEADER_SIZE + header.dataLen;
  if (buf.length - offset < frameLength) {
    return { status: 'incomplete', header };
  }
  return { status: 'complete', header, frameLength };
}

/**
 * Decode one complete response frame at `offset`. The body is a copy.
 */
export function decodeResponse(buf: Buffer, offset = 0): ResponseMessage {
  const peek = peekFrame(buf, offset);
  if (peek.status === 'invalid') {
    // Re-run the strict decoder for a precise error
    decodeResponseHeader(buf, offset);
    throw new ProtocolError('Invalid response frame');
  }
  if (peek.status === 'incomplete') {
    throw new ProtocolError(
      `Truncated response frame: need ${HEADER_SIZE + peek.header.dataLen} bytes, have ${buf.length - offset}`,
    );
  }
  const bodyStart = offset + HEADER_SIZE;
  return {
    header: peek.header,
    body: Buffer.from(buf.subarray(bodyStart, offset + peek.frameLength)),
  };
}

const TAG_BYTES = Buffer.from('EMM:', 'latin1');

/**
 * Index of the next header tag starting in [from, to), or -1.
 */
export function findTag(buf: Buffer, from: number, to: number = buf.length): number {
  const end = Math.min(buf.length, to + TAG_BYTES.length - 1);
  if (from >= end) return -1;
  const idx = buf.subarray(from, end).indexOf(TAG_BYTES);
  return idx === -1 ? -1 : from + idx;
}
