import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export const SERVER_NAME = 'diffusion-mcp-server';
export const SERVER_VERSION = '1.0.0';

export type Transport = 'stdio' | 'http' | 'https';

export interface SessionSettings {
  idleTimeoutMs: number;
  sweepIntervalMs: number;
  toolTimeoutMs: number;
}

export interface HttpSettings {
  host: string;
  port: number;
  corsOrigin: string;
  hsts: string | null;
  tls: { keyPath: string; certPath: string } | null;
}

export interface ServerConfig {
  transport: Transport;
  logLevel: LogLevel;
  sessions: SessionSettings;
  http: HttpSettings;
}

type Env = Record<string, string | undefined>;

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : typeof value === 'string' ? value.trim() : value;

const optionalString = z.preprocess(blankToUndefined, z.string().optional());

const intInRange = (name: string, min: number, max: number, fallback: number) =>
  z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: `Invalid ${name}` })
      .int(`Invalid ${name}`)
      .min(min, `${name} must be at least ${min}`)
      .max(max, `${name} must be at most ${max}`)
      .default(fallback)
  );

const envSchema = z.object({
  MCP_TRANSPORT: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z
      .enum(['', 'stdio', 'http', 'https', 'tls'], {
        errorMap: (_issue, ctx) => ({ message: `Unknown MCP_TRANSPORT: ${String(ctx.data)} (use stdio|http|https)` }),
      })
      .default('stdio')
  ),
  MCP_HOST: optionalString,
  MCP_PORT: z.preprocess(blankToUndefined, z.string().optional()),
  MCP_CORS_ORIGIN: optionalString,
  MCP_HSTS: optionalString,
  MCP_TLS_KEY: optionalString,
  MCP_TLS_CERT: optionalString,
  MCP_SESSION_IDLE_TIMEOUT_MS: intInRange('MCP_SESSION_IDLE_TIMEOUT_MS', 1_000, 24 * 60 * 60 * 1000, 5 * 60 * 1000),
  MCP_SESSION_SWEEP_INTERVAL_MS: intInRange('MCP_SESSION_SWEEP_INTERVAL_MS', 1_000, 60_000, 30_000),
  MCP_TOOL_TIMEOUT_MS: intInRange('MCP_TOOL_TIMEOUT_MS', 100, 5 * 60 * 1000, 10_000),
  MCP_LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() ? value.trim().toLowerCase() : undefined),
    z.enum(LOG_LEVELS).default('info')
  ),
});

function parsePort(raw: string | undefined): number {
  const value = raw ?? '7443';
  const port = /^\d+$/.test(value) ? Number(value) : Number.NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`Invalid port: ${value}`);
  }
  return port;
}

function normalizeTransport(value: '' | 'stdio' | 'http' | 'https' | 'tls'): Transport {
  if (value === 'https' || value === 'tls') return 'https';
  if (value === 'http') return 'http';
  return 'stdio';
}

/**
 * Read the server configuration from environment variables.
 *
 * @throws ConfigurationError naming the first invalid setting
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues[0]?.message ?? 'Invalid configuration');
  }
  const values = parsed.data;
  const transport = normalizeTransport(values.MCP_TRANSPORT);

  let tls: HttpSettings['tls'] = null;
  if (transport === 'https') {
    if (!values.MCP_TLS_KEY) throw new ConfigurationError('MCP_TLS_KEY must be specified for https transport');
    if (!values.MCP_TLS_CERT) throw new ConfigurationError('MCP_TLS_CERT must be specified for https transport');
    tls = { keyPath: values.MCP_TLS_KEY, certPath: values.MCP_TLS_CERT };
  }

  return {
    transport,
    logLevel: values.MCP_LOG_LEVEL,
    sessions: {
      idleTimeoutMs: values.MCP_SESSION_IDLE_TIMEOUT_MS,
      sweepIntervalMs: values.MCP_SESSION_SWEEP_INTERVAL_MS,
      toolTimeoutMs: values.MCP_TOOL_TIMEOUT_MS,
    },
    http: {
      host: values.MCP_HOST ?? 'localhost',
      port: transport === 'stdio' ? parsePort(undefined) : parsePort(values.MCP_PORT),
      corsOrigin: values.MCP_CORS_ORIGIN ?? '*',
      hsts: values.MCP_HSTS ?? null,
      tls,
    },
  };
}

export const HELP_TEXT = `Diffusion MCP Server

Configuration via environment variables:

  MCP_TRANSPORT                 stdio (default) | http | https
  MCP_HOST                      HTTP bind host (default: localhost)
  MCP_PORT                      HTTP port (default: 7443)
  MCP_CORS_ORIGIN               allowed CORS origin (default: *)
  MCP_HSTS                      Strict-Transport-Security header value (optional)
  MCP_TLS_KEY / MCP_TLS_CERT    PEM key and certificate paths (required for https)
  MCP_SESSION_IDLE_TIMEOUT_MS   idle Diffusion session eviction (default: 300000)
  MCP_SESSION_SWEEP_INTERVAL_MS idle/liveness sweep period (default: 30000)
  MCP_TOOL_TIMEOUT_MS           timeout for each Diffusion operation (default: 10000)
  MCP_LOG_LEVEL                 debug | info (default) | warn | error

Examples:
  # Default (stdio)
  diffusion-mcp-server

  # HTTPS on all interfaces
  MCP_TRANSPORT=https MCP_HOST=0.0.0.0 MCP_PORT=7443 \\
    MCP_TLS_KEY=/path/key.pem MCP_TLS_CERT=/path/cert.pem \\
    diffusion-mcp-server
`;
