/**
 * Body encryption for the gateway protocol.
 *
 * AES-CBC with an all-zero IV. Plaintext is zero-padded to the block size;
 * decryption strips a PKCS#7-looking tail instead. The two do not mirror
 * each other: a zero-padded plaintext decrypts with its zero bytes intact,
 * and an unpadded plaintext whose last byte is 1..16 loses that many
 * bytes. Gateways in the field rely on exactly this behaviour.
 */

import { createCipheriv, createDecipheriv, createHash } from 'node:crypto';
import { CryptoError } from '@gwlink/utils/errors';

export const BLOCK_SIZE = 16;
const ZERO_IV = Buffer.alloc(BLOCK_SIZE);
const KEY_SALT = ':#EMM:';
const KEY_SUFFIX = ':@2023*leagsoft';

export type CipherKey = string | Buffer;

export function md5Hex(data: string | Buffer): string {
  return createHash('md5').update(data).digest('hex');
}

/**
 * Per-request key: lower-case hex MD5 of "<id>:#EMM:<timestamp>:@2023*leagsoft".
 * The 32 hex characters are used as an AES-256 key.
 */
export function deriveKey(requestId: string, timestamp: number | bigint): string {
  return md5Hex(`${requestId}${KEY_SALT}${timestamp.toString()}${KEY_SUFFIX}`);
}

/** Unix seconds, as used for key derivation */
export function unixSeconds(nowMs: number = Date.now()): number {
  return Math.floor(nowMs / 1000);
}

function normalizeKey(key: CipherKey): Buffer {
  const bytes = typeof key === 'string' ? Buffer.from(key, 'utf-8') : key;
  if (bytes.length === 16 || bytes.length === 24 || bytes.length === 32) {
    return bytes;
  }
  return createHash('md5').update(bytes).digest();
}

function algorithmFor(key: Buffer): string {
  return `aes-${key.length * 8}-cbc`;
}

export function zeroPad(data: Buffer): Buffer {
  const remainder = data.length % BLOCK_SIZE;
  if (remainder === 0) return data;
  return Buffer.concat([data, Buffer.alloc(BLOCK_SIZE - remainder)]);
}

export function encryptBody(key: CipherKey, plaintext: Buffer): Buffer {
  if (plaintext.length === 0) return Buffer.alloc(0);
  const keyBytes = normalizeKey(key);
  const cipher = createCipheriv(algorithmFor(keyBytes), keyBytes, ZERO_IV);
  cipher.setAutoPadding(false);
  return Buffer.concat([cipher.update(zeroPad(plaintext)), cipher.final()]);
}

export function decryptBody(key: CipherKey, ciphertext: Buffer): Buffer {
  if (ciphertext.length === 0 || ciphertext.length % BLOCK_SIZE !== 0) {
    throw new CryptoError(`Ciphertext length ${ciphertext.length} is not a positive multiple of ${BLOCK_SIZE}`);
  }
  const keyBytes = normalizeKey(key);
  const decipher = createDecipheriv(algorithmFor(keyBytes), keyBytes, ZERO_IV);
  decipher.setAutoPadding(false);
  const plain = Buffer.concat([decipher.update(ciphertext), decipher.final()]);

  const pad = plain[plain.length - 1];
  if (pad >= 1 && pad <= BLOCK_SIZE) {
    return plain.subarray(0, plain.length - pad);
  }
  return plain;
}

/**
 * Decrypt, or undefined when the ciphertext is unusable.
 */
export function tryDecryptBody(key: CipherKey, ciphertext: Buffer): Buffer | undefined {
  try {
    return decryptBody(key, ciphertext);
  } catch (err) {
    if (err instanceof CryptoError) return undefined;
    throw err;
  }
}
