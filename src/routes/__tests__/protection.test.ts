import { afterAll, afterEach, beforeAll, describe, expect, it } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { env } from '../../env.js';
import { buildApp } from '../../app.js';
import { createRuntime } from '../../services/runtime.js';
import { RateLimiter, turnRateLimiter } from '../../security/route-guards.js';
import { ScriptedEngine, reply } from '../../testing/scripted-engine.js';

describe.sequential('Protected Route Guards', () => {
  const engine = new ScriptedEngine();
  let app: FastifyInstance;

  const originalAuth = env.AUTH_ENFORCEMENT_ENABLED;
  const originalRate = env.RATE_LIMITING_ENABLED;
  const originalWindow = env.RATE_LIMIT_WINDOW_MS;
  const originalTurnLimit = env.RATE_LIMIT_TURNS_PER_WINDOW;

  beforeAll(async () => {
    app = await buildApp(createRuntime({ engine, systemPrompt: 'You are a test assistant.' }));
    await app.ready();
  });

  afterAll(async () => {
    env.AUTH_ENFORCEMENT_ENABLED = originalAuth;
    env.RATE_LIMITING_ENABLED = originalRate;
    env.RATE_LIMIT_WINDOW_MS = originalWindow;
    env.RATE_LIMIT_TURNS_PER_WINDOW = originalTurnLimit;
    await app.close();
  });

  afterEach(() => {
    env.AUTH_ENFORCEMENT_ENABLED = false;
    env.RATE_LIMITING_ENABLED = false;
    env.RATE_LIMIT_WINDOW_MS = 60000;
    env.RATE_LIMIT_TURNS_PER_WINDOW = 20;
    turnRateLimiter.reset();
  });

  it('returns 401 on /v1/chat when auth enforcement is enabled and no token is provided', async () => {
    env.AUTH_ENFORCEMENT_ENABLED = true;

    const response = await app.inject({
      method: 'POST',
      url: '/v1/chat',
      payload: { message: 'hello' },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ error: 'unauthorized', message: 'Missing API token', statusCode: 401 });
  });

  it('returns 401 on /v1/metrics when auth enforcement is enabled and no token is provided', async () => {
    env.AUTH_ENFORCEMENT_ENABLED = true;

    const response = await app.inject({ method: 'GET', url: '/v1/metrics' });

    expect(response.statusCode).toBe(401);
  });

  it('accepts a bearer token when auth enforcement is enabled', async () => {
    env.AUTH_ENFORCEMENT_ENABLED = true;
    engine.enqueue(reply('Who is it for?'));

    const response = await app.inject({
      method: 'POST',
      url: '/v1/chat',
      headers: { authorization: 'Bearer test-secret' },
      payload: { message: 'hello', session_id: 'auth-session' },
    });

    expect(response.statusCode).toBe(200);
  });

  it('returns 429 on /v1/chat/stream when the turn rate limit is exceeded', async () => {
    env.RATE_LIMITING_ENABLED = true;
    env.RATE_LIMIT_TURNS_PER_WINDOW = 1;
    engine.enqueue(reply('Who is it for?'));

    const first = await app.inject({
      method: 'POST',
      url: '/v1/chat/stream',
      headers: { 'x-api-token': 'test-secret' },
      payload: { message: 'hello', session_id: 'rate-session' },
    });
    const second = await app.inject({
      method: 'POST',
      url: '/v1/chat/stream',
      headers: { 'x-api-token': 'test-secret' },
      payload: { message: 'hello again', session_id: 'rate-session' },
    });

    expect(first.statusCode).toBe(200);
    expect(second.statusCode).toBe(429);
    expect(second.headers['retry-after']).toBe('60');
    expect(second.json()).toEqual({
      error: 'rate_limited',
      message: 'Too many requests. Please try again later.',
      statusCode: 429,
      retry_after_seconds: 60,
    });
  });

  it('keeps rate limit buckets per client', async () => {
    env.RATE_LIMITING_ENABLED = true;
    env.RATE_LIMIT_TURNS_PER_WINDOW = 1;
    engine.enqueue(reply('One?'), reply('Two?'));

    const first = await app.inject({
      method: 'POST',
      url: '/v1/chat',
      headers: { 'x-api-token': 'client-one' },
      payload: { message: 'hello' },
    });
    const second = await app.inject({
      method: 'POST',
      url: '/v1/chat',
      headers: { 'x-api-token': 'client-two' },
      payload: { message: 'hello' },
    });

    expect(first.statusCode).toBe(200);
    expect(second.statusCode).toBe(200);
  });
});

describe('RateLimiter', () => {
  it('opens a new window once the previous one expires', () => {
    let now = 0;
    const limiter = new RateLimiter({ windowMs: () => 1000, maxRequests: () => 2, now: () => now });

    expect(limiter.hit('k')).toBeNull();
    expect(limiter.hit('k')).toBeNull();
    now = 400;
    expect(limiter.hit('k')).toBe(1);

    now = 1000;
    expect(limiter.hit('k')).toBeNull();
  });

  it('rounds the wait up to whole seconds', () => {
    let now = 0;
    const limiter = new RateLimiter({ windowMs: () => 5000, maxRequests: () => 1, now: () => now });

    limiter.hit('k');
    now = 1500;

    expect(limiter.hit('k')).toBe(4);
  });
});
