import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const withId = <T extends object>(schema: T, id: string) => ({ ...schema, $id: id });

export const LogLevelSchema = z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']);

export const LogConfigSchema = z.object({
  level: LogLevelSchema.optional(),
  json: z.boolean().optional(),
  file: z.string().min(1).optional(),
});

// Gateway endpoint and socket dial settings
export const EndpointConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  /** Wrap the socket in TLS */
  tls: z.boolean().default(true),
  /** SNI name; defaults to host */
  servername: z.string().optional(),
  /** The gateway commonly presents self-signed certificates */
  rejectUnauthorized: z.boolean().default(false),
  connectTimeoutMs: z.number().int().positive().default(30_000),
});

// Per-connection identity and connection-level retry policy
export const SessionConfigSchema = z.object({
  serverId: z.number().int().nonnegative().max(0xffffffff),
  serverName: z.string().min(1),
  sessionId: z.string().min(1),
  appName: z.string().optional(),
  maxRetries: z.number().int().positive().default(10),
  retryDelayMs: z.number().int().nonnegative().default(500),
  retryIntervalMs: z.number().int().nonnegative().default(2_000),
  /** Shared key for encrypted init bodies; required by the encrypted handshake */
  initKey: z.string().min(1).optional(),
});

// Per-exchange options
export const RequestOptionsSchema = z.object({
  useEncryption: z.boolean().default(false),
  /** Total attempts for one exchange, including the first */
  maxRetries: z.number().int().positive().default(2),
  readTimeoutMs: z.number().int().positive().default(30_000),
  /** Deadline for each read after the first */
  continuedReadTimeoutMs: z.number().int().positive().default(5_000),
  detectHttp: z.boolean().default(true),
  maxDownloadSize: z.number().int().positive().default(4 * 1024 * 1024 * 1024),
  /** Keep reading after a complete frame until the stream goes idle */
  requireContinue: z.boolean().default(true),
  stripInlineFrames: z.boolean().default(true),
  /** Turn literal "\r\n" escape sequences in string payloads into CRLF */
  unescapeCrlf: z.boolean().default(true),
});

export const GatewayConfigSchema = z.object({
  endpoint: EndpointConfigSchema,
  session: SessionConfigSchema,
  request: RequestOptionsSchema.default({}),
  log: LogConfigSchema.default({}),
});

export type LogConfig = z.infer<typeof LogConfigSchema>;
export type EndpointConfig = z.infer<typeof EndpointConfigSchema>;
export type EndpointConfigInput = z.input<typeof EndpointConfigSchema>;
export type SessionConfig = z.infer<typeof SessionConfigSchema>;
export type SessionConfigInput = z.input<typeof SessionConfigSchema>;
export type RequestOptions = z.infer<typeof RequestOptionsSchema>;
export type RequestOptionsInput = z.input<typeof RequestOptionsSchema>;
export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type GatewayConfigInput = z.input<typeof GatewayConfigSchema>;

export const jsonSchemas = {
  endpoint: withId(zodToJsonSchema(EndpointConfigSchema, { target: 'jsonSchema7' }), 'GatewayEndpointConfig'),
  session: withId(zodToJsonSchema(SessionConfigSchema, { target: 'jsonSchema7' }), 'GatewaySessionConfig'),
  request: withId(zodToJsonSchema(RequestOptionsSchema, { target: 'jsonSchema7' }), 'GatewayRequestOptions'),
  gateway: withId(zodToJsonSchema(GatewayConfigSchema, { target: 'jsonSchema7' }), 'GatewayConfig'),
};
