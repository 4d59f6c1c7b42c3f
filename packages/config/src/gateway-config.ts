/**
 * Gateway Configuration
 * Loads gateway.json, applies GWLINK_* environment overrides and validates
 * the result.
 *
 * gateway.json can be placed in:
 * - Project root: ./gateway.json
 * - Client dir: ./.gwlink/gateway.json
 */

import fs from 'node:fs';
import path from 'node:path';
import { ConfigError, toError } from '@gwlink/utils/errors';
import {
  EndpointConfigSchema,
  GatewayConfigSchema,
  RequestOptionsSchema,
  SessionConfigSchema,
  type EndpointConfig,
  type EndpointConfigInput,
  type GatewayConfig,
  type RequestOptions,
  type RequestOptionsInput,
  type SessionConfig,
  type SessionConfigInput,
} from './schemas.js';

// Read back from the schemas so the defaults live in one place
export const DEFAULT_REQUEST_OPTIONS: Readonly<RequestOptions> = Object.freeze(RequestOptionsSchema.parse({}));

export const DEFAULT_SESSION_RETRY: Readonly<Pick<SessionConfig, 'maxRetries' | 'retryDelayMs' | 'retryIntervalMs'>> =
  Object.freeze(SessionConfigSchema.pick({ maxRetries: true, retryDelayMs: true, retryIntervalMs: true }).parse({}));

export const DEFAULT_ENDPOINT: Readonly<Pick<EndpointConfig, 'tls' | 'rejectUnauthorized' | 'connectTimeoutMs'>> =
  Object.freeze(EndpointConfigSchema.pick({ tls: true, rejectUnauthorized: true, connectTimeoutMs: true }).parse({}));

type Env = Record<string, string | undefined>;
type Section = 'endpoint' | 'session' | 'request';

interface EnvOverride {
  variable: string;
  section: Section;
  key: string;
  kind: 'string' | 'number' | 'boolean';
}

const ENV_OVERRIDES: EnvOverride[] = [
  { variable: 'GWLINK_HOST', section: 'endpoint', key: 'host', kind: 'string' },
  { variable: 'GWLINK_PORT', section: 'endpoint', key: 'port', kind: 'number' },
  { variable: 'GWLINK_TLS', section: 'endpoint', key: 'tls', kind: 'boolean' },
  { variable: 'GWLINK_SERVER_ID', section: 'session', key: 'serverId', kind: 'number' },
  { variable: 'GWLINK_SERVER_NAME', section: 'session', key: 'serverName', kind: 'string' },
  { variable: 'GWLINK_SESSION_ID', section: 'session', key: 'sessionId', kind: 'string' },
  { variable: 'GWLINK_USE_ENCRYPTION', section: 'request', key: 'useEncryption', kind: 'boolean' },
  { variable: 'GWLINK_READ_TIMEOUT_MS', section: 'request', key: 'readTimeoutMs', kind: 'number' },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function convert(raw: string, kind: EnvOverride['kind']): string | number | boolean {
  switch (kind) {
    case 'number':
      return Number(raw);
    case 'boolean':
      return raw === '1' || raw.toLowerCase() === 'true';
    default:
      return raw;
  }
}

/**
 * Overlay GWLINK_* variables onto a raw (unvalidated) config object.
 */
export function applyEnvOverrides(raw: Record<string, unknown>, env: Env = process.env): Record<string, unknown> {
  const result: Record<string, unknown> = { ...raw };
  for (const override of ENV_OVERRIDES) {
    const value = env[override.variable];
    if (value === undefined || value === '') continue;
    const existing = result[override.section];
    const section: Record<string, unknown> = isRecord(existing) ? { ...existing } : {};
    section[override.key] = convert(value, override.kind);
    result[override.section] = section;
  }
  return result;
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string[] {
  return issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

/**
 * Validate a raw config object. Throws ConfigError listing every issue.
 */
export function parseGatewayConfig(raw: unknown, source = 'config'): GatewayConfig {
  const parsed = GatewayConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(source, formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

/**
 * Fill per-exchange options with defaults and validate them.
 */
export function resolveRequestOptions(options: RequestOptionsInput = {}): RequestOptions {
  const parsed = RequestOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigError('request options', formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

export function resolveEndpointConfig(endpoint: EndpointConfigInput): EndpointConfig {
  const parsed = EndpointConfigSchema.safeParse(endpoint);
  if (!parsed.success) {
    throw new ConfigError('endpoint config', formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

/**
 * Fill session retry defaults and validate identity fields.
 */
export function resolveSessionConfig(session: SessionConfigInput): SessionConfig {
  const parsed = SessionConfigSchema.safeParse(session);
  if (!parsed.success) {
    throw new ConfigError('session config', formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

/**
 * Possible locations for gateway.json (in order of precedence)
 */
export function getGatewayConfigPaths(projectRoot: string): string[] {
  return [
    path.join(projectRoot, '.gwlink', 'gateway.json'),
    path.join(projectRoot, 'gateway.json'),
  ];
}

export function findGatewayConfig(projectRoot: string): string | null {
  return getGatewayConfigPaths(projectRoot).find((candidate) => fs.existsSync(candidate)) ?? null;
}

/**
 * Load and validate a gateway config file, with environment overrides.
 */
export function loadGatewayConfig(configPath: string, env: Env = process.env): GatewayConfig {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(configPath, [`cannot read file: ${toError(err).message}`]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(configPath, [`invalid JSON: ${toError(err).message}`]);
  }
  if (!isRecord(raw)) {
    throw new ConfigError(configPath, ['top-level value must be an object']);
  }

  return parseGatewayConfig(applyEnvOverrides(raw, env), configPath);
}
