/**
 * Error types for the gateway SDK.
 *
 * Re-exports error classes from @gwlink/utils, which is the single
 * source of truth. This module exists so SDK consumers can import errors
 * from either '@gwlink/sdk' or '@gwlink/sdk/errors'.
 */

export {
  GatewayError,
  ConnectionError,
  ProtocolError,
  HandshakeError,
  CryptoError,
  TimeoutError,
  OverflowError,
  ApplicationCloseError,
  IncompleteResponseError,
  ConfigError,
} from '@gwlink/utils/errors';
