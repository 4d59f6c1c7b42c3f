/**
 * Protocol constant tests
 *
 * These values are fixed by the gateway; any change here breaks the wire.
 */

import { describe, it, expect } from 'vitest';
import {
  HEAD_TAG,
  HEADER_SIZE,
  PROTO_VERSION,
  Command,
  ProtoType,
  DataProtoType,
  AuthResult,
  commandName,
  resultName,
  isKnownCommand,
} from './types.js';

describe('Protocol constants', () => {
  it('should spell EMM: in the tag', () => {
    expect(HEAD_TAG).toBe(1162693946);
    const buf = Buffer.alloc(4);
    buf.writeUInt32BE(HEAD_TAG, 0);
    expect(buf.toString('latin1')).toBe('EMM:');
  });

  it('should use a 20-byte header at version 1', () => {
    expect(HEADER_SIZE).toBe(20);
    expect(PROTO_VERSION).toBe(1);
  });

  it('should match the gateway command codes', () => {
    expect(Command.INIT).toBe(2);
    expect(Command.INIT_ACK).toBe(3);
    expect(Command.TRAN).toBe(6);
    expect(Command.TRAN_ACK).toBe(7);
    expect(Command.LINK_CLOSE).toBe(200);
    expect(Command.LINK_HEART_BEAT_ACK).toBe(203);
  });

  it('should match protocol and data types', () => {
    expect(ProtoType.HTTP).toBe(2);
    expect(ProtoType.UDP).toBe(0x20);
    expect(ProtoType.TEST).toBe(0x30);
    expect(DataProtoType.BINARY).toBe(0);
    expect(DataProtoType.JSON).toBe(1);
  });

  it('should match auth result codes', () => {
    expect(AuthResult.SUCCESS).toBe(8002);
    expect(AuthResult.TUNNEL_FORBIDDEN).toBe(8001);
    expect(AuthResult.UNKNOWN).toBe(8099);
  });

  describe('names', () => {
    it('should name known commands and results', () => {
      expect(commandName(3)).toBe('INIT_ACK');
      expect(resultName(8004)).toBe('OVER_FLOW_LIMIT');
    });

    it('should fall back for unknown codes', () => {
      expect(commandName(42)).toBe('CMD_42');
      expect(resultName(1)).toBe('RESULT_1');
      expect(isKnownCommand(42)).toBe(false);
      expect(isKnownCommand(200)).toBe(true);
    });
  });
});
