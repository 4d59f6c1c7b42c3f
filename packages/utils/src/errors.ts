/**
 * Error types for the gateway client.
 *
 * Single source of truth for typed error classes shared by the codec,
 * the session client and the config loader.
 */

export class GatewayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GatewayError';
  }
}

export class ConnectionError extends GatewayError {
  constructor(message: string) {
    super(`Connection error: ${message}`);
    this.name = 'ConnectionError';
  }
}

/**
 * Malformed framing: short header, bad magic tag, bad chunk size line.
 */
export class ProtocolError extends GatewayError {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/**
 * The gateway answered the init request with something other than a
 * successful INIT_ACK.
 */
export class HandshakeError extends ProtocolError {
  readonly command: number;
  readonly result: number;

  constructor(command: number, result: number, detail?: string) {
    super(`Handshake rejected: command=${command} result=${result}${detail ? ` (${detail})` : ''}`);
    this.name = 'HandshakeError';
    this.command = command;
    this.result = result;
  }
}

export class CryptoError extends GatewayError {
  constructor(message: string) {
    super(message);
    this.name = 'CryptoError';
  }
}

export class TimeoutError extends GatewayError {
  constructor(operation: string, timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms: ${operation}`);
    this.name = 'TimeoutError';
  }
}

export class OverflowError extends GatewayError {
  readonly limit: number;
  readonly received: number;

  constructor(limit: number, received: number) {
    super(`Response exceeds download limit: ${received} > ${limit} bytes`);
    this.name = 'OverflowError';
    this.limit = limit;
    this.received = received;
  }
}

/**
 * The peer closed the connection at application level. The only recovery
 * is a fresh dial.
 */
export class ApplicationCloseError extends GatewayError {
  readonly code: number;

  constructor(code = 0, reason?: string) {
    super(`Application error 0x${code.toString(16)}${reason ? `: ${reason}` : ''}`);
    this.name = 'ApplicationCloseError';
    this.code = code;
  }
}

/**
 * The stream ended before a complete response arrived. Carries whatever
 * bytes had been read so far.
 */
export class IncompleteResponseError extends GatewayError {
  readonly received: Buffer;

  constructor(operation: string, received: Buffer) {
    super(`Incomplete response for ${operation}: got ${received.length} bytes`);
    this.name = 'IncompleteResponseError';
    this.received = received;
  }
}

export class ConfigError extends GatewayError {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid configuration in ${source}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Coerce an unknown thrown value into an Error.
 */
export function toError(err: unknown): Error {
  if (err instanceof Error) return err;
  return new Error(String(err));
}
