/**
 * @gwlink/sdk
 *
 * Client for reaching services behind a secure access gateway over its
 * framed tunnel protocol.
 *
 * ## One-shot request
 *
 * ```typescript
 * import { sendGatewayRequest } from '@gwlink/sdk';
 *
 * const result = await sendGatewayRequest({
 *   endpoint: { host: 'gateway.example.test', port: 443 },
 *   session: { serverId: 7, serverName: 'portal', sessionId: 'abc' },
 *   payload: 'GET / HTTP/1.1\\r\\nHost: portal\\r\\n\\r\\n',
 * });
 * console.log(result.response);
 * ```
 *
 * ## Long-lived session
 *
 * ```typescript
 * import { SessionClient, createSocketTransport } from '@gwlink/sdk';
 *
 * const client = new SessionClient({
 *   dialer: createSocketTransport({ host: 'gateway.example.test', port: 443 }),
 *   session: { serverId: 7, serverName: 'portal', sessionId: 'abc' },
 * });
 * await client.connect();
 * await client.handshake();
 * const first = await client.exchange(payload);
 * ```
 */

// Session client
export {
  SessionClient,
  encodePayload,
  type SessionState,
  type SessionClientConfig,
  type HandshakeOptions,
  type HandshakeResult,
  type ExchangeResult,
  type TrafficStats,
} from './client.js';

// One-shot request
export {
  sendGatewayRequest,
  requestOptionsFromConfig,
  type GatewayRequestOptions,
  type GatewayRequestResult,
} from './request.js';

// Response handling
export {
  ReassemblyEngine,
  READ_CHUNK_SIZE,
  EMPTY_READ_LIMIT,
  RESYNC_WINDOW,
  type ReadChannel,
  type RecoveryOutcome,
  type ReassemblyOptions,
  type CompletionReason,
  type CollectResult,
  type SegmentResult,
} from './reassembly.js';
export {
  extractResponse,
  isHttpResponse,
  parseHttpResponse,
  decodeChunked,
  stripInlineFrames,
  responseContent,
  contentLength,
  type HttpInfo,
  type ExtractedResponse,
  type ExtractOptions,
} from './extractor.js';
export { FileResponseSink, type FileSinkOptions, type SavedResponse } from './sink.js';

// Body encryption
export {
  deriveKey,
  encryptBody,
  decryptBody,
  tryDecryptBody,
  md5Hex,
  unixSeconds,
  BLOCK_SIZE,
  type CipherKey,
} from './crypto.js';

// Transport
export {
  EndOfStreamError,
  classifyReadError,
  isApplicationClose,
  isEndOfStream,
  isTimeout,
  type ReadFailure,
  type TransportStream,
  type TransportConnection,
  type TransportDialer,
  type DialOptions,
} from './transport.js';
export {
  SocketDialer,
  SocketConnection,
  SocketStream,
  createSocketTransport,
  type SocketTransportOptions,
} from './socket-transport.js';

// Error types
export * from './errors.js';
