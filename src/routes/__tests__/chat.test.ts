import { describe, it, expect, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../app.js';
import { formatSseEvent } from '../chat.js';
import { createRuntime } from '../../services/runtime.js';
import { ProtocolClassification } from '../../services/orchestrator/protocol-monitor.js';
import type { TurnEvent } from '../../services/orchestrator/types.js';
import { ErrorCode } from '../../utils/errors.js';
import { ScriptedEngine, failWith, reply, requestTools, type ScriptStep } from '../../testing/scripted-engine.js';

describe('Chat routes', () => {
  let app: FastifyInstance | undefined;

  async function start(steps: ScriptStep[]) {
    const runtime = createRuntime({ engine: new ScriptedEngine(steps), systemPrompt: 'You are a test assistant.' });
    const server = await buildApp(runtime);
    await server.ready();
    app = server;
    return { app: server, runtime };
  }

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  describe('POST /v1/chat/stream', () => {
    it('streams turn events as server-sent events', async () => {
      const { app } = await start([reply('Hello world')]);

      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat/stream',
        payload: { message: 'hi', session_id: 's1' },
      });

      const expected: TurnEvent[] = [
        { type: 'state', state: 'GENERATING_FIRST' },
        { type: 'state', state: 'DIRECT' },
        { type: 'state', state: 'STREAMING' },
        { type: 'text', fragment: 'Hello ' },
        { type: 'text', fragment: 'world' },
        { type: 'state', state: 'COMPLETE' },
        {
          type: 'done',
          sessionId: 's1',
          turnIndex: 0,
          classification: ProtocolClassification.COMPLIANT,
          toolInvocationCount: 0,
        },
      ];

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/event-stream');
      expect(response.headers['x-session-id']).toBe('s1');
      expect(response.body).toBe(expected.map(formatSseEvent).join(''));
    });

    it('keeps CORS headers on the event stream', async () => {
      const { app } = await start([reply('Hello')]);

      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat/stream',
        headers: { origin: 'http://localhost:3000' },
        payload: { message: 'hi', session_id: 's1' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['access-control-allow-origin']).toBe('http://localhost:3000');
      expect(response.headers['access-control-allow-credentials']).toBe('true');
      expect(response.headers['content-type']).toBe('text/event-stream');
    });

    it('streams a failed event when the engine fails', async () => {
      const { app } = await start([failWith('upstream down')]);

      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat/stream',
        payload: { message: 'hi', session_id: 's1' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.body.endsWith(formatSseEvent({
        type: 'failed',
        sessionId: 's1',
        code: ErrorCode.COMPLETION_FAILED,
        reason: 'scripted completion failed: upstream down',
        partialOutput: false,
      }))).toBe(true);
    });

    it('rejects an empty message', async () => {
      const { app } = await start([]);

      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat/stream',
        payload: { message: '' },
      });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.error).toBe('validation_error');
      expect(body.details[0]).toEqual({ path: 'message', message: 'Message must not be empty' });
    });

    it('rejects a whitespace-only message', async () => {
      const { app } = await start([]);

      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat/stream',
        payload: { message: '   ' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().details).toEqual([{ path: 'message', message: 'Message must not be blank' }]);
    });

    it('rejects an over-long message', async () => {
      const { app } = await start([]);

      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat/stream',
        payload: { message: 'a'.repeat(10001) },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().details).toEqual([{ path: 'message', message: 'Message must be at most 10000 characters' }]);
    });
  });

  describe('POST /v1/chat', () => {
    it('returns the whole response with the tool calls made', async () => {
      const { app } = await start([
        requestTools([{ id: 'call-1', name: 'analyze_product', arguments: { product_description: 'A CRM' } }]),
        reply('Here is what I found.'),
      ]);

      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat',
        payload: { message: 'Analyze my CRM', session_id: 's1' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        session_id: 's1',
        response: 'Here is what I found.',
        tool_calls: [{ id: 'call-1', name: 'analyze_product', arguments: { product_description: 'A CRM' } }],
      });
    });

    it('generates a session id when none is given', async () => {
      const { app, runtime } = await start([reply('Hi!')]);

      const response = await app.inject({ method: 'POST', url: '/v1/chat', payload: { message: 'hi' } });

      const sessionId: unknown = response.json().session_id;
      expect(sessionId).toMatch(/^[0-9a-f-]{36}$/);
      expect(typeof sessionId === 'string' && runtime.sessions.has(sessionId)).toBe(true);
    });

    it('returns 502 when the engine fails', async () => {
      const { app } = await start([failWith('upstream down')]);

      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat',
        payload: { message: 'hi', session_id: 's1' },
      });

      expect(response.statusCode).toBe(502);
      expect(response.json()).toEqual({
        error: 'completion_failed',
        message: 'scripted completion failed: upstream down',
        statusCode: 502,
        session_id: 's1',
      });
    });

    it('rejects a missing message', async () => {
      const { app } = await start([]);

      const response = await app.inject({ method: 'POST', url: '/v1/chat', payload: {} });

      expect(response.statusCode).toBe(400);
      expect(response.json().details).toEqual([{ path: 'message', message: 'Required' }]);
    });
  });

  describe('GET /v1/health', () => {
    it('reports service status', async () => {
      const { app } = await start([]);

      const response = await app.inject({ method: 'GET', url: '/v1/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        status: 'ok',
        service: 'turn-orchestrator',
        version: '1.0.0',
        provider: 'scripted',
      });
    });

    it('redirects the legacy path', async () => {
      const { app } = await start([]);

      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(301);
      expect(response.headers.location).toBe('/v1/health');
    });
  });
});
