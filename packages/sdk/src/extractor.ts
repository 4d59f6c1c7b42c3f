/**
 * Interpretation of a reassembled payload: embedded HTTP detection and
 * parsing, chunked transfer decoding, and the content checksum.
 */

import { ProtocolError } from '@gwlink/utils/errors';
import { HEADER_SIZE, HEAD_TAG, PROTO_VERSION, isKnownCommand } from '@gwlink/protocol';
import { md5Hex } from './crypto.js';

export interface HttpInfo {
  statusCode: number;
  headers: Record<string, string>;
  body: Buffer;
  isHttp: true;
}

export interface ExtractedResponse {
  rawData: Buffer;
  pureData: Buffer;
  httpInfo?: HttpInfo;
  /** Lower-case hex MD5 of content() */
  md5: string;
}

export interface ExtractOptions {
  detectHttp: boolean;
  stripInlineFrames: boolean;
}

const HTTP_MARKER = 'HTTP/';
/** Detection looks only at the start of very large payloads */
const SNIFF_BYTES = 64 * 1024;
const MARKER_WINDOW = 100;

const COMMON_HEADERS = [
  'Content-Type:',
  'Content-Length:',
  'Server:',
  'Date:',
  'Last-Modified:',
  'ETag:',
  'Cache-Control:',
  'Access-Control-Allow-Origin:',
];

const STATUS_LINE = /HTTP\/\d\.\d\s+\d{3}\s+/i;
const STATUS_CODE = /HTTP\/\d\.\d\s+(\d+)\s+/;

export function isHttpResponse(data: Buffer): boolean {
  if (data.length < 10) return false;
  const text = data.subarray(0, SNIFF_BYTES).toString('latin1');

  if (text.startsWith(HTTP_MARKER)) return true;

  const markerAt = text.indexOf(HTTP_MARKER);
  if (markerAt > 0 && markerAt < MARKER_WINDOW) {
    const prefix = text.slice(0, markerAt).trim();
    if (prefix.length === 0 || prefix.includes('\n')) return true;
  }

  const headerCount = COMMON_HEADERS.filter((name) => text.includes(name)).length;
  if (headerCount < 2) return false;

  return STATUS_LINE.test(text)
    || text.includes('\r\n\r\n')
    || text.includes('\n\n')
    || headerCount >= 3;
}

function findHeader(headers: Record<string, string>, name: string): string | undefined {
  const wanted = name.toLowerCase();
  const key = Object.keys(headers).find((k) => k.toLowerCase() === wanted);
  return key === undefined ? undefined : headers[key];
}

export function contentLength(headers: Record<string, string>): number {
  const value = findHeader(headers, 'Content-Length');
  if (value === undefined || !/^\d+$/.test(value)) return -1;
  return Number(value);
}

/**
 * Parse an HTTP response embedded in the payload. Returns undefined when
 * no header/body separator exists.
 */
export function parseHttpResponse(data: Buffer): HttpInfo | undefined {
  let message = data;
  const markerAt = message.indexOf(HTTP_MARKER, 0, 'latin1');
  if (markerAt > 0) {
    message = message.subarray(markerAt);
  }

  let headerText: string;
  let body: Buffer;
  const crlfSplit = message.indexOf('\r\n\r\n', 0, 'latin1');
  if (crlfSplit !== -1) {
    headerText = message.subarray(0, crlfSplit).toString('utf-8');
    body = message.subarray(crlfSplit + 4);
  } else {
    const lfSplit = message.indexOf('\n\n', 0, 'latin1');
    if (lfSplit === -1) return undefined;
    headerText = message.subarray(0, lfSplit).toString('utf-8').replace(/\r?\n/g, '\r\n');
    body = message.subarray(lfSplit + 2);
  }
  const rawBody = body;

  const lines = headerText.split('\r\n');
  const statusMatch = STATUS_CODE.exec(lines[0] ?? '');
  const statusCode = statusMatch ? Number(statusMatch[1]) : 0;

  const headers: Record<string, string> = {};
  for (const line of lines.slice(1)) {
    const colon = line.indexOf(':');
    if (colon === -1) continue;
    headers[line.slice(0, colon).trim()] = line.slice(colon + 1).trim();
  }

  const encoding = findHeader(headers, 'Transfer-Encoding');
  if (encoding !== undefined && encoding.toLowerCase() === 'chunked') {
    try {
      body = decodeChunked(body);
    } catch (err) {
      if (!(err instanceof ProtocolError)) throw err;
      // Keep the undecoded body
    }
  }

  if (body.length === 0 && contentLength(headers) > 0) {
    body = rawBody;
  }

  return { statusCode, headers, body: Buffer.from(body), isHttp: true };
}

function lineEnd(data: Buffer, from: number): { end: number; next: number } | undefined {
  const crlf = data.indexOf('\r\n', from, 'latin1');
  if (crlf !== -1) return { end: crlf, next: crlf + 2 };
  const lf = data.indexOf('\n', from, 'latin1');
  if (lf !== -1) return { end: lf, next: lf + 1 };
  return undefined;
}

/**
 * Decode an HTTP/1.1 chunked body. Truncated chunks are clamped to the
 * bytes available.
 */
export function decodeChunked(body: Buffer): Buffer {
  const parts: Buffer[] = [];
  let offset = 0;

  while (offset < body.length) {
    const line = lineEnd(body, offset);
    if (!line) {
      throw new ProtocolError('Invalid chunked encoding: missing chunk size line terminator');
    }

    let sizeText = body.toString('latin1', offset, line.end).trim();
    const ext = sizeText.indexOf(';');
    if (ext !== -1) sizeText = sizeText.slice(0, ext).trim();
    if (!/^[0-9a-fA-F]+$/.test(sizeText)) {
      throw new ProtocolError(`Invalid chunk size: "${sizeText}"`);
    }

    const size = parseInt(sizeText, 16);
    if (size === 0) break;

    const start = line.next;
    const end = start + size;
    if (end > body.length) {
      parts.push(body.subarray(start));
      break;
    }
    parts.push(body.subarray(start, end));

    if (body[end] === 0x0d && body[end + 1] === 0x0a) {
      offset = end + 2;
    } else if (body[end] === 0x0a) {
      offset = end + 1;
    } else {
      offset = end;
    }
  }

  return Buffer.concat(parts);
}

function isInlineHeader(data: Buffer, at: number): boolean {
  if (data.length - at < HEADER_SIZE) return false;
  return data.readUInt32BE(at) === HEAD_TAG
    && data.readUInt16BE(at + 4) === PROTO_VERSION
    && isKnownCommand(data.readUInt16BE(at + 6));
}

/**
 * Remove 20-byte protocol headers left inline in extracted content.
 */
export function stripInlineFrames(content: Buffer): Buffer {
  const parts: Buffer[] = [];
  let cursor = 0;
  let search = 0;

  for (;;) {
    const at = content.indexOf('EMM:', search, 'latin1');
    if (at === -1) break;
    if (isInlineHeader(content, at)) {
      parts.push(content.subarray(cursor, at));
      cursor = at + HEADER_SIZE;
      search = cursor;
    } else {
      search = at + 1;
    }
  }

  if (cursor === 0) return content;
  parts.push(content.subarray(cursor));
  return Buffer.concat(parts);
}

/**
 * The bytes a response stands for: the HTTP body when one was parsed,
 * otherwise the pure payload.
 */
export function responseContent(response: Pick<ExtractedResponse, 'pureData' | 'httpInfo'>): Buffer {
  return response.httpInfo ? response.httpInfo.body : response.pureData;
}

export function extractResponse(raw: Buffer, pure: Buffer, options: ExtractOptions): ExtractedResponse {
  const pureData = options.stripInlineFrames ? stripInlineFrames(pure) : pure;
  let httpInfo: HttpInfo | undefined;

  if (options.detectHttp && pureData.length > 0 && isHttpResponse(pureData)) {
    httpInfo = parseHttpResponse(pureData);
    if (httpInfo && httpInfo.statusCode === 200 && httpInfo.body.length === 0) {
      const expected = contentLength(httpInfo.headers);
      if (expected > 0 && pureData.length >= expected) {
        httpInfo.body = Buffer.from(pureData);
      }
    }
  }

  const response: ExtractedResponse = { rawData: raw, pureData, md5: '' };
  if (httpInfo) response.httpInfo = httpInfo;
  response.md5 = md5Hex(responseContent(response));
  return response;
}
