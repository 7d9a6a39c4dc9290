import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

describe('loadConfig', () => {
  it('defaults to stdio', () => {
    expect(loadConfig({})).toEqual({
      transport: 'stdio',
      logLevel: 'info',
      sessions: { idleTimeoutMs: 300_000, sweepIntervalMs: 30_000, toolTimeoutMs: 10_000 },
      http: { host: 'localhost', port: 7443, corsOrigin: '*', hsts: null, tls: null },
    });
  });

  it('reads the http settings', () => {
    const config = loadConfig({
      MCP_TRANSPORT: ' HTTP ',
      MCP_HOST: '0.0.0.0',
      MCP_PORT: '8080',
      MCP_CORS_ORIGIN: 'https://app.example.com',
      MCP_LOG_LEVEL: 'DEBUG',
    });

    expect(config.transport).toBe('http');
    expect(config.logLevel).toBe('debug');
    expect(config.http).toEqual({ host: '0.0.0.0', port: 8080, corsOrigin: 'https://app.example.com', hsts: null, tls: null });
  });

  it('accepts tls as another name for https', () => {
    const config = loadConfig({ MCP_TRANSPORT: 'tls', MCP_TLS_KEY: '/keys/key.pem', MCP_TLS_CERT: '/keys/cert.pem' });

    expect(config.transport).toBe('https');
    expect(config.http.tls).toEqual({ keyPath: '/keys/key.pem', certPath: '/keys/cert.pem' });
  });

  it('requires a key and certificate for https', () => {
    expect(() => loadConfig({ MCP_TRANSPORT: 'https' })).toThrow('MCP_TLS_KEY must be specified for https transport');
    expect(() => loadConfig({ MCP_TRANSPORT: 'https', MCP_TLS_KEY: '/keys/key.pem' })).toThrow(
      'MCP_TLS_CERT must be specified for https transport'
    );
  });

  it('rejects an unknown transport', () => {
    expect(() => loadConfig({ MCP_TRANSPORT: 'ftp' })).toThrow('Unknown MCP_TRANSPORT: ftp (use stdio|http|https)');
  });

  it('rejects an invalid port', () => {
    expect(() => loadConfig({ MCP_TRANSPORT: 'http', MCP_PORT: 'abc' })).toThrow('Invalid port: abc');
    expect(() => loadConfig({ MCP_TRANSPORT: 'http', MCP_PORT: '70000' })).toThrow('Invalid port: 70000');
  });

  it('checks the session timings', () => {
    expect(() => loadConfig({ MCP_SESSION_SWEEP_INTERVAL_MS: '500' })).toThrow(
      'MCP_SESSION_SWEEP_INTERVAL_MS must be at least 1000'
    );
    expect(loadConfig({ MCP_SESSION_IDLE_TIMEOUT_MS: '60000' }).sessions.idleTimeoutMs).toBe(60_000);
  });

  it('throws ConfigurationError for a bad log level', () => {
    expect(() => loadConfig({ MCP_LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
  });
});
