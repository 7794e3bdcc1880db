import { describe, it, expect } from 'vitest';
import { buildCorsHeaders } from './cors.js';

describe('buildCorsHeaders', () => {
  const origins = ['http://localhost:3000', 'http://localhost:3001'];

  it('should allow a listed origin', () => {
    expect(buildCorsHeaders({ origin: 'http://localhost:3000', preflight: false }, origins)).toEqual({
      'Access-Control-Allow-Origin': 'http://localhost:3000',
      'Access-Control-Allow-Credentials': 'true',
      Vary: 'Origin',
    });
  });

  it('should answer a preflight with methods and requested headers', () => {
    const headers = buildCorsHeaders(
      { origin: 'http://localhost:3001', preflight: true, requestHeaders: 'content-type' },
      origins
    );

    expect(headers['Access-Control-Allow-Methods']).toBe('GET, POST, OPTIONS');
    expect(headers['Access-Control-Allow-Headers']).toBe('content-type');
    expect(headers['Access-Control-Max-Age']).toBe('600');
  });

  it('should add nothing for an unlisted origin', () => {
    expect(buildCorsHeaders({ origin: 'https://evil.example', preflight: true }, origins)).toEqual({});
  });

  it('should add nothing without an origin', () => {
    expect(buildCorsHeaders({ preflight: false }, origins)).toEqual({});
  });
});
