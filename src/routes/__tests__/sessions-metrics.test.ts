import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../app.js';
import { createRuntime } from '../../services/runtime.js';
import { ScriptedEngine, reply, requestTools, type ScriptStep } from '../../testing/scripted-engine.js';

describe('Session and metrics routes', () => {
  let app: FastifyInstance | undefined;
  const tempDirs: string[] = [];

  async function start(steps: ScriptStep[], metricsExportDir = os.tmpdir()) {
    const runtime = createRuntime({
      engine: new ScriptedEngine(steps),
      systemPrompt: 'You are a test assistant.',
      metricsExportDir,
    });
    const server = await buildApp(runtime);
    await server.ready();
    app = server;
    return { app: server, runtime };
  }

  afterEach(async () => {
    await app?.close();
    app = undefined;
    await Promise.all(tempDirs.splice(0).map(dir => fs.rm(dir, { recursive: true, force: true })));
  });

  describe('GET /v1/sessions/:sessionId', () => {
    it('summarizes a session after a turn', async () => {
      const { app } = await start([reply('Who is it for?')]);
      await app.inject({ method: 'POST', url: '/v1/chat', payload: { message: 'hi', session_id: 's1' } });

      const response = await app.inject({ method: 'GET', url: '/v1/sessions/s1' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ session_id: 's1', message_count: 3, turn_count: 1 });
    });

    it('returns 404 for an unknown session', async () => {
      const { app } = await start([]);

      const response = await app.inject({ method: 'GET', url: '/v1/sessions/nope' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: 'not_found', message: 'Session not found', statusCode: 404 });
    });
  });

  describe('DELETE /v1/sessions/:sessionId', () => {
    it('deletes the session and its metrics', async () => {
      const { app } = await start([reply('Who is it for?')]);
      await app.inject({ method: 'POST', url: '/v1/chat', payload: { message: 'hi', session_id: 's1' } });

      const deleted = await app.inject({ method: 'DELETE', url: '/v1/sessions/s1' });
      expect(deleted.statusCode).toBe(200);
      expect(deleted.json()).toEqual({ status: 'deleted', session_id: 's1' });

      expect((await app.inject({ method: 'GET', url: '/v1/sessions/s1' })).statusCode).toBe(404);
      expect((await app.inject({ method: 'GET', url: '/v1/metrics/sessions/s1' })).statusCode).toBe(404);
      expect((await app.inject({ method: 'DELETE', url: '/v1/sessions/s1' })).statusCode).toBe(404);
    });
  });

  describe('metrics', () => {
    it('reports per-session metrics and totals', async () => {
      const { app } = await start([
        requestTools([{ id: 'call-1', name: 'analyze_product', arguments: { product_description: 'A CRM' } }]),
        reply('Here is your analysis.'),
      ]);
      await app.inject({ method: 'POST', url: '/v1/chat', payload: { message: 'Analyze my CRM', session_id: 's1' } });

      const all = await app.inject({ method: 'GET', url: '/v1/metrics' });
      expect(all.statusCode).toBe(200);
      expect(all.json().summary).toEqual({
        totalSessions: 1,
        totalTurns: 1,
        totalToolCalls: 1,
        protocolViolations: 1,
        failedTurns: 0,
      });

      const single = await app.inject({ method: 'GET', url: '/v1/metrics/sessions/s1' });
      expect(single.statusCode).toBe(200);
      expect(single.json()).toMatchObject({
        sessionId: 's1',
        turnCount: 1,
        toolInvocationCount: 1,
        violationCount: 1,
        toolsUsed: ['analyze_product'],
      });
    });

    it('exports a metrics snapshot to disk', async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'metrics-route-'));
      tempDirs.push(dir);
      const { app } = await start([reply('Who is it for?')], dir);
      await app.inject({ method: 'POST', url: '/v1/chat', payload: { message: 'hi', session_id: 's1' } });

      const response = await app.inject({ method: 'POST', url: '/v1/metrics/export' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.status).toBe('exported');
      expect(path.dirname(body.path)).toBe(dir);

      const snapshot: unknown = JSON.parse(await fs.readFile(body.path, 'utf8'));
      expect(snapshot).toMatchObject({ summary: { totalSessions: 1, totalTurns: 1 } });
    });
  });
});
