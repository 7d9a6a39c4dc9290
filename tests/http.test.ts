import type { AddressInfo } from 'net';
import type { Server } from 'http';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { applyCors, applySecurityHeaders, createHttpApp, type HttpApp } from '../src/http.js';
import { SERVER_VERSION } from '../src/config.js';
import { createServer } from '../src/server.js';
import { GuideLibrary } from '../src/tools/context.js';
import { connectFake, createToolHarness, type ToolHarness } from './fakes.js';

function headerRecorder() {
  const headers = new Map<string, string>();
  return {
    headers,
    setHeader(name: string, value: string) {
      headers.set(name, value);
    },
  };
}

describe('security headers', () => {
  it('sets the fixed headers', () => {
    const res = headerRecorder();

    applySecurityHeaders(res, null, false);

    expect(Object.fromEntries(res.headers)).toEqual({
      'X-Content-Type-Options': 'nosniff',
      'X-Frame-Options': 'DENY',
      'Referrer-Policy': 'no-referrer',
      'Permissions-Policy': 'geolocation=()',
      'X-XSS-Protection': '0',
    });
  });

  it('adds HSTS only on secure requests', () => {
    const plain = headerRecorder();
    const secure = headerRecorder();

    applySecurityHeaders(plain, 'max-age=31536000', false);
    applySecurityHeaders(secure, 'max-age=31536000', true);

    expect(plain.headers.has('Strict-Transport-Security')).toBe(false);
    expect(secure.headers.get('Strict-Transport-Security')).toBe('max-age=31536000');
  });
});

describe('CORS', () => {
  it('allows any origin with a wildcard', () => {
    const res = headerRecorder();

    const preflight = applyCors(res, '*', 'https://app.example.com', 'POST');

    expect(preflight).toBe(false);
    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
    expect(res.headers.get('Access-Control-Expose-Headers')).toBe('Mcp-Session-Id');
    expect(res.headers.get('Access-Control-Allow-Methods')).toBe('GET, POST, DELETE, OPTIONS');
  });

  it('echoes a matching origin', () => {
    const res = headerRecorder();

    applyCors(res, 'https://app.example.com', 'https://app.example.com', 'GET');

    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('https://app.example.com');
    expect(res.headers.get('Vary')).toBe('Origin');
  });

  it('leaves out the origin header for other origins', () => {
    const res = headerRecorder();

    applyCors(res, 'https://app.example.com', 'https://other.example.com', 'GET');

    expect(res.headers.has('Access-Control-Allow-Origin')).toBe(false);
  });

  it('answers preflight requests', () => {
    const res = headerRecorder();

    expect(applyCors(res, '*', undefined, 'options')).toBe(true);
    expect(res.headers.get('Access-Control-Max-Age')).toBe('3600');
  });
});

describe('HTTP app', () => {
  let harness: ToolHarness;
  let http: HttpApp;
  let listener: Server;
  let baseUrl: string;

  beforeEach(async () => {
    harness = createToolHarness();
    http = createHttpApp({
      settings: { host: '127.0.0.1', port: 0, corsOrigin: '*', hsts: null, tls: null },
      sessions: harness.sessions,
      logger: harness.ctx.logger,
      newServer: () => createServer({ tools: harness.ctx, guides: new GuideLibrary() }),
    });
    listener = await new Promise<Server>((resolve) => {
      const server = http.app.listen(0, '127.0.0.1', () => resolve(server));
    });
    const address: AddressInfo | string | null = listener.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await http.closeTransports();
    await new Promise<void>((resolve, reject) => listener.close((error) => (error ? reject(error) : resolve())));
    await harness.sessions.shutdown();
  });

  function post(body: unknown, headers: Record<string, string> = {}) {
    return fetch(`${baseUrl}/mcp`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json, text/event-stream', ...headers },
      body: JSON.stringify(body),
    });
  }

  it('reports the number of backing sessions', async () => {
    await connectFake(harness, 'caller-1');
    await connectFake(harness, 'caller-2');

    const res = await fetch(`${baseUrl}/status`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      ok: true,
      transport: 'http+streamable',
      endpoint: '/mcp',
      version: SERVER_VERSION,
      sessions: 2,
    });
  });

  it('refuses a request before initialize', async () => {
    const res = await post({ jsonrpc: '2.0', id: 1, method: 'tools/list' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Bad Request: Server not initialized. Call initialize first.' },
      id: null,
    });
  });

  it('refuses an unknown MCP session id', async () => {
    const res = await post({ jsonrpc: '2.0', id: 1, method: 'tools/list' }, { 'Mcp-Session-Id': 'no-such-session' });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: { code: -32000, message: 'Bad Request: Unknown or expired MCP session. Initialize a new session.' },
    });
  });

  it('disconnects the backing session when the MCP session is deleted', async () => {
    const initialized = await post({
      jsonrpc: '2.0',
      id: 1,
      method: 'initialize',
      params: { protocolVersion: '2025-03-26', capabilities: {}, clientInfo: { name: 'test-client', version: '0.0.0' } },
    });
    await initialized.text();
    const sessionId = initialized.headers.get('mcp-session-id');
    expect(initialized.status).toBe(200);
    expect(sessionId).toEqual(expect.any(String));
    if (sessionId === null) return;

    const backing = await connectFake(harness, sessionId);
    expect(harness.sessions.callerIds()).toEqual([sessionId]);

    const deleted = await fetch(`${baseUrl}/mcp`, { method: 'DELETE', headers: { 'Mcp-Session-Id': sessionId } });
    await deleted.text();

    expect(deleted.status).toBe(200);
    await vi.waitFor(() => expect(harness.sessions.size).toBe(0));
    expect(backing.closeCount).toBe(1);
  });
});
