/**
 * One-shot gateway request: connect, handshake, exchange, close.
 */

import { ConfigError, toError } from '@gwlink/utils/errors';
import { createLogger, type LogSettings } from '@gwlink/utils/logger';
import { RetryPolicy, systemClock, type Clock } from '@gwlink/utils/retry';
import {
  resolveEndpointConfig,
  resolveRequestOptions,
  resolveSessionConfig,
  type EndpointConfigInput,
  type GatewayConfig,
  type RequestOptionsInput,
  type SessionConfigInput,
} from '@gwlink/config';
import { SessionClient, type ExchangeResult } from './client.js';
import { responseContent } from './extractor.js';
import { SocketDialer } from './socket-transport.js';
import type { TransportDialer } from './transport.js';

export interface GatewayRequestOptions {
  /** Where to dial; ignored when a dialer is given */
  endpoint?: EndpointConfigInput;
  dialer?: TransportDialer;
  session: SessionConfigInput;
  request?: RequestOptionsInput;
  payload: string | Buffer;
  /** Substring the response text must contain */
  expect?: string;
  signal?: AbortSignal;
  clock?: Clock;
  log?: LogSettings;
  requestId?: () => string;
}

export interface GatewayRequestResult {
  /** The request went through; says nothing about the assertion */
  success: boolean;
  /** Response content decoded as UTF-8 */
  response: string;
  responseBytes: Buffer;
  /** The full exchange result, when the request got that far */
  extracted?: ExchangeResult;
  error?: Error;
  elapsedMs: number;
  /** True when no assertion was given */
  assertionPassed: boolean;
  /** Handshake and exchange together */
  sentBytes: number;
  receivedBytes: number;
}

/**
 * Request options for a loaded gateway config file.
 */
export function requestOptionsFromConfig(
  config: GatewayConfig,
  payload: string | Buffer,
  overrides: Partial<Omit<GatewayRequestOptions, 'payload'>> = {},
): GatewayRequestOptions {
  return {
    endpoint: config.endpoint,
    session: config.session,
    request: config.request,
    log: config.log,
    ...overrides,
    payload,
  };
}

function resolveDialer(options: GatewayRequestOptions): TransportDialer {
  if (options.dialer) return options.dialer;
  if (!options.endpoint) {
    throw new ConfigError('request', ['endpoint: required when no dialer is given']);
  }
  const endpoint = resolveEndpointConfig(options.endpoint);
  return new SocketDialer({ ...endpoint, log: options.log });
}

export async function sendGatewayRequest(options: GatewayRequestOptions): Promise<GatewayRequestResult> {
  const clock = options.clock ?? systemClock;
  const log = createLogger('request', options.log);
  const startedAt = clock.now();
  const result: GatewayRequestResult = {
    success: false,
    response: '',
    responseBytes: Buffer.alloc(0),
    elapsedMs: 0,
    assertionPassed: false,
    sentBytes: 0,
    receivedBytes: 0,
  };

  let client: SessionClient | undefined;
  try {
    if (options.payload.length === 0) {
      throw new ConfigError('request', ['payload: must not be empty']);
    }
    const session = resolveSessionConfig(options.session);
    const request = resolveRequestOptions(options.request);
    const dialer = resolveDialer(options);

    client = new SessionClient({
      dialer,
      session,
      clock,
      log: options.log,
      requestId: options.requestId,
    });

    const connectPolicy = new RetryPolicy(
      { maxAttempts: session.maxRetries, delayMs: session.retryDelayMs, intervalMs: session.retryIntervalMs },
      clock,
    );
    for (let attempt = 1; ; attempt++) {
      try {
        await client.connect(options.signal);
        break;
      } catch (err) {
        if (options.signal?.aborted || !connectPolicy.canRetry(attempt)) throw err;
        log.warn('Connect failed, retrying', { attempt, error: toError(err).message });
        await connectPolicy.waitInterval();
      }
    }

    await client.handshake({ useEncryption: request.useEncryption, readTimeoutMs: request.readTimeoutMs });
    const exchange = await client.exchange(options.payload, request);

    result.extracted = exchange;
    result.responseBytes = responseContent(exchange);
    result.response = result.responseBytes.toString('utf-8');
    result.success = exchange.error === undefined;
    if (exchange.error) result.error = exchange.error;
    result.assertionPassed = options.expect ? result.response.includes(options.expect) : true;
  } catch (err) {
    result.error = toError(err);
    log.error('Request failed', { error: result.error.message });
  } finally {
    if (client) {
      const stats = client.stats;
      result.sentBytes = stats.sentBytes;
      result.receivedBytes = stats.receivedBytes;
      await client.close();
    }
    result.elapsedMs = clock.now() - startedAt;
  }

  return result;
}
