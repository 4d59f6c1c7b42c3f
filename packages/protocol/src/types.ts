/**
 * Gateway wire protocol types and constants
 * @gwlink/protocol
 *
 * Every message starts with a fixed 20-byte big-endian header whose first
 * four bytes spell "EMM:". Requests and responses share the first eight
 * bytes and the DataLen field; the remaining fields differ by direction.
 */

/** "EMM:" read as a big-endian u32 */
export const HEAD_TAG = 0x454d4d3a;
export const PROTO_VERSION = 1;
export const HEADER_SIZE = 20;

export const Command = {
  HEART_BEAT: 1,
  INIT: 2,
  INIT_ACK: 3,
  AUTH: 4,
  AUTH_ACK: 5,
  TRAN: 6,
  TRAN_ACK: 7,
  LINK_CLOSE: 200,
  LINK_CLOSE_ACK: 201,
  LINK_HEART_BEAT: 202,
  LINK_HEART_BEAT_ACK: 203,
} as const;

export type CommandName = keyof typeof Command;

export const ProtoType = {
  TCP: 1,
  HTTP: 2,
  HTTPS: 3,
  RTSP: 4,
  SIP: 5,
  RTP: 6,
  RTCP: 7,
  H263: 8,
  UDP: 0x20,
  TEST: 0x30,
} as const;

/** Encoding of an init request body, carried in the ProtoType byte */
export const DataProtoType = {
  BINARY: 0,
  JSON: 1,
} as const;

export const AuthResult = {
  TUNNEL_FORBIDDEN: 8001,
  SUCCESS: 8002,
  SESSION_NOT_EXIST: 8003,
  OVER_FLOW_LIMIT: 8004,
  USER_FORBIDDEN: 8007,
  DEVICE_FORBIDDEN: 8008,
  CONN_FAILED: 8020,
  UNKNOWN: 8099,
} as const;

export type AuthResultName = keyof typeof AuthResult;

export interface RequestHeader {
  tag: number;
  version: number;
  command: number;
  protoType: number;
  option: number;
  reserve: number;
  dataLen: number;
  /** Reserved; always written as 0 */
  crc: number;
}

export interface ResponseHeader {
  tag: number;
  version: number;
  command: number;
  result: number;
  option: number;
  reserve: number;
  dataLen: number;
  originLen: number;
}

export interface ResponseMessage {
  header: ResponseHeader;
  body: Buffer;
}

const COMMAND_NAMES = new Map<number, string>(
  Object.entries(Command).map(([name, code]) => [code, name]),
);

const RESULT_NAMES = new Map<number, string>(
  Object.entries(AuthResult).map(([name, code]) => [code, name]),
);

export function isKnownCommand(command: number): boolean {
  return COMMAND_NAMES.has(command);
}

/** Human-readable command name for logs, e.g. "INIT_ACK" or "CMD_42". */
export function commandName(command: number): string {
  return COMMAND_NAMES.get(command) ?? `CMD_${command}`;
}

export function resultName(result: number): string {
  return RESULT_NAMES.get(result) ?? `RESULT_${result}`;
}
