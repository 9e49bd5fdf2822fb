import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildServer } from '../../src/api/server.js';
import { TokenService } from '../../src/services/tokenService.js';
import { decodeToken } from '../../src/tokens/encoding.js';
import { FailingRandomSource, SequenceRandomSource } from '../utils/random.js';

let app: Awaited<ReturnType<typeof buildServer>>;

async function issue(payload?: object) {
  return app.inject({ method: 'POST', url: '/v1/tokens', payload });
}

async function verify(token: string, remove?: boolean) {
  return app.inject({ method: 'POST', url: '/v1/tokens/verify', payload: { token, remove } });
}

describe('Token API', () => {
  beforeEach(async () => {
    app = await buildServer({ service: new TokenService({ entropyBytes: 16, maxTokens: 3 }) });
  });

  afterEach(async () => {
    await app.close();
  });

  it('issues a token with the configured entropy', async () => {
    const res = await issue();
    expect(res.statusCode).toBe(201);
    const body = res.json();
    expect(body.size).toBe(1);
    expect(body.token).toMatch(/^[A-Za-z0-9_-]+$/);
    expect(decodeToken(body.token).length).toBe(16);
  });

  it('honors a per-request entropy override', async () => {
    const res = await issue({ entropyBytes: 8 });
    expect(res.statusCode).toBe(201);
    expect(decodeToken(res.json().token).length).toBe(8);
  });

  it('returns 400 on an invalid entropy override', async () => {
    const res = await issue({ entropyBytes: 0 });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
  });

  it('returns 400 on unknown body fields', async () => {
    const res = await issue({ entropy: 8 });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
  });

  it('verifies a token once by default', async () => {
    const { token } = (await issue()).json();

    const peek = await verify(token, false);
    expect(peek.statusCode).toBe(200);
    expect(peek.json()).toEqual({ valid: true, size: 1 });

    expect((await verify(token)).json()).toEqual({ valid: true, size: 0 });
    expect((await verify(token)).json()).toEqual({ valid: false, size: 0 });
  });

  it('returns 400 when the token is missing', async () => {
    const res = await app.inject({ method: 'POST', url: '/v1/tokens/verify', payload: {} });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
  });

  it('rejects malformed JSON bodies', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/v1/tokens/verify',
      headers: { 'content-type': 'application/json' },
      payload: '{ not json',
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('BAD_REQUEST');
  });

  it('evicts the oldest token once capacity is reached', async () => {
    const tokens: string[] = [];
    for (let i = 0; i < 4; i++) {
      tokens.push((await issue()).json().token);
    }
    const stats = await app.inject({ method: 'GET', url: '/v1/tokens/stats' });
    expect(stats.json()).toEqual({ size: 3, empty: false, entropyBytes: 16, maxTokens: 3 });
    expect((await verify(tokens[0])).json().valid).toBe(false);
    expect((await verify(tokens[3])).json()).toEqual({ valid: true, size: 2 });
  });

  it('clears the registry', async () => {
    const { token } = (await issue()).json();
    await issue();
    const res = await app.inject({ method: 'DELETE', url: '/v1/tokens' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ cleared: 2 });
    expect((await verify(token)).json()).toEqual({ valid: false, size: 0 });
  });

  it('reports registry state on the health endpoint', async () => {
    await issue();
    const res = await app.inject({ method: 'GET', url: '/healthz' });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.status).toBe('ok');
    expect(body).toHaveProperty('build.version');
    expect(body.registry).toEqual({ size: 1, empty: false, entropyBytes: 16, maxTokens: 3 });
  });
});

describe('Token API with a fixed random source', () => {
  it('returns the encoded bytes of the source', async () => {
    const service = new TokenService({
      entropyBytes: 3,
      maxTokens: 2,
      random: new SequenceRandomSource(),
    });
    const server = await buildServer({ service });
    try {
      const res = await server.inject({ method: 'POST', url: '/v1/tokens' });
      expect(res.json()).toEqual({ token: 'AQEB', size: 1 });
    } finally {
      await server.close();
    }
  });

  it('maps random source failures to 503 without exposing the cause', async () => {
    const service = new TokenService({
      entropyBytes: 8,
      maxTokens: 2,
      random: new FailingRandomSource(),
    });
    const server = await buildServer({ service });
    try {
      const res = await server.inject({ method: 'POST', url: '/v1/tokens' });
      expect(res.statusCode).toBe(503);
      expect(res.json()).toEqual({
        error: { code: 'ENTROPY_SOURCE_FAILURE', message: 'Token generation unavailable' },
      });
    } finally {
      await server.close();
    }
  });
});
