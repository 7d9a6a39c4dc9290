import { describe, it, expect } from 'vitest';
import { connectionOptions, toPlain } from '../src/diffusion/client.js';
import { ToolArgumentError } from '../src/errors.js';

const credentials = { principal: 'admin', password: 'test-secret' };

describe('connectionOptions', () => {
  it('reads host, port, security and path from the URL', () => {
    expect(connectionOptions({ ...credentials, url: 'wss://diffusion.example.com:8443/gateway' })).toEqual({
      host: 'diffusion.example.com',
      port: 8443,
      secure: true,
      path: '/gateway',
      principal: 'admin',
      credentials: 'test-secret',
    });
  });

  it('uses the default port for the scheme', () => {
    expect(connectionOptions({ ...credentials, url: 'ws://localhost' })).toEqual({
      host: 'localhost',
      port: 80,
      secure: false,
      principal: 'admin',
      credentials: 'test-secret',
    });
    expect(connectionOptions({ ...credentials, url: 'https://example.com' })).toMatchObject({ port: 443, secure: true });
  });

  it('passes session properties on', () => {
    const options = connectionOptions({ ...credentials, url: 'ws://localhost:8080', properties: { $Region: 'EU' } });

    expect(options.properties).toEqual({ $Region: 'EU' });
  });

  it('rejects bad URLs', () => {
    expect(() => connectionOptions({ ...credentials, url: 'not a url' })).toThrow(new ToolArgumentError('Invalid URL: not a url'));
    expect(() => connectionOptions({ ...credentials, url: 'ftp://example.com' })).toThrow(
      'Unsupported URL scheme ftp: (use ws, wss, http or https)'
    );
  });
});

describe('toPlain', () => {
  it('turns sets and maps into arrays and objects', () => {
    const value = {
      anonymous: new Set(['CLIENT']),
      roles: new Map([['ADMIN', { includes: new Set(['OPERATOR']) }]]),
      limit: 3,
    };

    expect(toPlain(value)).toEqual({ anonymous: ['CLIENT'], roles: { ADMIN: { includes: ['OPERATOR'] } }, limit: 3 });
  });
});
