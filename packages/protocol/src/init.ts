/**
 * Init (handshake) request bodies.
 *
 * JSON form, sent unencrypted with ProtoType = DataProtoType.JSON:
 *   {"serverid":7,"protocolType":2,"appname":"web","requestId":"...","sessionId":"si:..."}
 *
 * Binary form, encrypted before sending:
 *   u32 serverId | serverName\0 | sessionId\0 | requestId\0 | i64 timestamp (unix seconds)
 */

import { ProtocolError } from '@gwlink/utils/errors';
import { ProtoType } from './types.js';

export const SESSION_ID_PREFIX = 'si:';

export interface InitInfo {
  serverId: number;
  /** Application name announced to the gateway */
  serverName: string;
  /** Raw session id; the "si:" prefix is added on the wire when missing */
  sessionId: string;
  requestId: string;
  /** Protocol the tunnel carries; defaults to HTTP */
  protocolType?: number;
}

export interface BinaryInitInfo extends InitInfo {
  /** Unix seconds */
  timestamp: number | bigint;
}

export function prefixSessionId(sessionId: string): string {
  return sessionId.startsWith(SESSION_ID_PREFIX) ? sessionId : `${SESSION_ID_PREFIX}${sessionId}`;
}

export function encodeInitJson(info: InitInfo): Buffer {
  const body = {
    serverid: info.serverId,
    protocolType: info.protocolType ?? ProtoType.HTTP,
    appname: info.serverName,
    requestId: info.requestId,
    sessionId: prefixSessionId(info.sessionId),
  };
  return Buffer.from(JSON.stringify(body), 'utf-8');
}

function cString(value: string, field: string): Buffer {
  if (value.includes('\0')) {
    throw new ProtocolError(`Init field ${field} contains a NUL byte`);
  }
  return Buffer.from(`${value}\0`, 'utf-8');
}

export function encodeInitBinary(info: BinaryInitInfo): Buffer {
  const serverId = Buffer.alloc(4);
  serverId.writeUInt32BE(info.serverId, 0);
  const timestamp = Buffer.alloc(8);
  timestamp.writeBigInt64BE(BigInt(info.timestamp), 0);

  return Buffer.concat([
    serverId,
    cString(info.serverName, 'serverName'),
    cString(prefixSessionId(info.sessionId), 'sessionId'),
    cString(info.requestId, 'requestId'),
    timestamp,
  ]);
}

export interface DecodedBinaryInit {
  serverId: number;
  serverName: string;
  sessionId: string;
  requestId: string;
  timestamp: bigint;
}

/**
 * Decode a binary init body. Tolerates trailing zero padding left by
 * block encryption.
 */
export function decodeInitBinary(body: Buffer): DecodedBinaryInit {
  if (body.length < 4) {
    throw new ProtocolError(`Init body too short: ${body.length} bytes`);
  }
  const serverId = body.readUInt32BE(0);
  let offset = 4;

  const readCString = (field: string): string => {
    const end = body.indexOf(0, offset);
    if (end === -1) throw new ProtocolError(`Init body missing terminator for ${field}`);
    const value = body.toString('utf-8', offset, end);
    offset = end + 1;
    return value;
  };

  const serverName = readCString('serverName');
  const sessionId = readCString('sessionId');
  const requestId = readCString('requestId');
  if (body.length - offset < 8) {
    throw new ProtocolError('Init body missing timestamp');
  }
  const timestamp = body.readBigInt64BE(offset);
  return { serverId, serverName, sessionId, requestId, timestamp };
}
