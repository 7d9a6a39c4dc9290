import { randomUUID } from 'crypto';
import { readFileSync } from 'fs';
import http from 'http';
import https from 'https';
import express from 'express';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { SERVER_VERSION, type HttpSettings } from './config.js';
import { errorMessage, type StructuredLogger } from './logger.js';
import type { SessionManager } from './session-manager.js';

export const MCP_ENDPOINT = '/mcp';

interface HeaderTarget {
  setHeader(name: string, value: string): unknown;
}

export function applySecurityHeaders(res: HeaderTarget, hsts: string | null, secure: boolean): void {
  res.setHeader('X-Content-Type-Options', 'nosniff');
  res.setHeader('X-Frame-Options', 'DENY');
  res.setHeader('Referrer-Policy', 'no-referrer');
  res.setHeader('Permissions-Policy', 'geolocation=()');
  res.setHeader('X-XSS-Protection', '0');
  if (hsts && secure) res.setHeader('Strict-Transport-Security', hsts);
}

/**
 * Set the CORS headers for one request.
 *
 * @returns true when the request is a preflight that has been answered
 */
export function applyCors(res: HeaderTarget, allowedOrigin: string, requestOrigin: string | undefined, method: string): boolean {
  if (allowedOrigin === '*') {
    res.setHeader('Access-Control-Allow-Origin', '*');
  } else if (requestOrigin === allowedOrigin) {
    res.setHeader('Access-Control-Allow-Origin', requestOrigin);
    res.setHeader('Vary', 'Origin');
  }
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, Mcp-Session-Id');
  res.setHeader('Access-Control-Expose-Headers', 'Mcp-Session-Id');
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
  res.setHeader('Access-Control-Max-Age', '3600');
  return method.toUpperCase() === 'OPTIONS';
}

function sessionIdHeader(req: express.Request): string | undefined {
  const value = req.headers['mcp-session-id'];
  return typeof value === 'string' ? value : undefined;
}

function isInitializeMethod(body: unknown): boolean {
  return typeof body === 'object' && body !== null && 'method' in body && body.method === 'initialize';
}

type AsyncHandler = (req: express.Request, res: express.Response) => Promise<void>;

/** Forward async handler failures to the express error handler. */
function route(handler: AsyncHandler): express.RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export interface HttpAppOptions {
  settings: HttpSettings;
  sessions: SessionManager;
  logger: StructuredLogger;
  /** Creates one MCP server per MCP session. */
  newServer: () => McpServer;
}

export interface HttpApp {
  app: express.Express;
  /** Closes every open MCP transport. */
  closeTransports(): Promise<void>;
}

export function createHttpApp({ settings, sessions, logger, newServer }: HttpAppOptions): HttpApp {
  const app = express();
  const transports = new Map<string, StreamableHTTPServerTransport>();

  app.use((req, res, next) => {
    applySecurityHeaders(res, settings.hsts, req.secure);
    if (applyCors(res, settings.corsOrigin, req.headers.origin, req.method)) {
      res.status(204).end();
      return;
    }
    next();
  });
  app.use(express.json({ limit: '4mb' }));

  app.get('/status', (_req, res) => {
    res.json({
      ok: true,
      transport: 'http+streamable',
      endpoint: MCP_ENDPOINT,
      version: SERVER_VERSION,
      sessions: sessions.size,
    });
  });

  app.post(
    MCP_ENDPOINT,
    route(async (req, res) => {
      const sessionId = sessionIdHeader(req);
      const existing = sessionId ? transports.get(sessionId) : undefined;
      if (existing) {
        await existing.handleRequest(req, res, req.body);
        return;
      }

      if (!isInitializeMethod(req.body)) {
        res.status(400).json({
          jsonrpc: '2.0',
          error: {
            code: -32000,
            message: sessionId
              ? 'Bad Request: Unknown or expired MCP session. Initialize a new session.'
              : 'Bad Request: Server not initialized. Call initialize first.',
          },
          id: null,
        });
        return;
      }

      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (sid) => {
          transports.set(sid, transport);
          logger.info('mcp_session_opened', { sessionId: sid });
        },
      });
      const server = newServer();

      transport.onclose = () => {
        const sid = transport.sessionId;
        if (!sid) return;
        transports.delete(sid);
        logger.info('mcp_session_closed', { sessionId: sid });
        // The Diffusion session belongs to the MCP session that opened it.
        sessions.disconnect(sid).catch((error: unknown) => {
          logger.warn('mcp_session_cleanup_failed', { sessionId: sid, error: errorMessage(error) });
        });
      };

      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    })
  );

  const handleSessionRequest = route(async (req, res) => {
    const sessionId = sessionIdHeader(req);
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).json({ error: 'No active session. Send POST /mcp first.' });
      return;
    }
    await transport.handleRequest(req, res);
  });

  app.get(MCP_ENDPOINT, handleSessionRequest);
  app.delete(MCP_ENDPOINT, handleSessionRequest);

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error('http_request_failed', { error: errorMessage(error) });
    if (!res.headersSent) {
      res.status(500).json({ jsonrpc: '2.0', error: { code: -32603, message: 'Internal server error' }, id: null });
    }
  });

  return {
    app,
    async closeTransports() {
      const open = [...transports.values()];
      transports.clear();
      await Promise.allSettled(open.map((transport) => transport.close()));
    },
  };
}

export interface RunningHttpServer {
  close(): Promise<void>;
}

export async function startHttpServer(options: HttpAppOptions): Promise<RunningHttpServer> {
  const { settings, logger } = options;
  const { app, closeTransports } = createHttpApp(options);

  const listener = settings.tls
    ? https.createServer({ key: readFileSync(settings.tls.keyPath), cert: readFileSync(settings.tls.certPath) }, app)
    : http.createServer(app);

  await new Promise<void>((resolve, reject) => {
    listener.once('error', reject);
    listener.listen(settings.port, settings.host, () => {
      listener.off('error', reject);
      resolve();
    });
  });

  const scheme = settings.tls ? 'https' : 'http';
  logger.info('http_server_started', { url: `${scheme}://${settings.host}:${settings.port}${MCP_ENDPOINT}` });

  return {
    async close() {
      await closeTransports();
      await new Promise<void>((resolve, reject) => listener.close((error) => (error ? reject(error) : resolve())));
    },
  };
}
