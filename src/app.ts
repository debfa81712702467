// HTTP application
// Registers the routes against a runtime; the entry point only adds listen()

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { env } from './env.js';
import { chatRoutes } from './routes/chat.js';
import { metricsRoutes } from './routes/metrics.js';
import { sessionRoutes } from './routes/sessions.js';
import type { Runtime } from './services/runtime.js';
import { AppError, formatErrorResponse, toAppError } from './utils/errors.js';

export const SERVICE_NAME = 'turn-orchestrator';
export const SERVICE_VERSION = '1.0.0';

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger'];
  corsOrigins?: string[];
}

export async function buildApp(runtime: Runtime, options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const server = Fastify({ logger: options.logger ?? false });

  await server.register(cors, {
    origin: options.corsOrigins ?? env.CORS_ORIGINS,
    credentials: true,
  });

  server.setErrorHandler((error, request, reply) => {
    const appError = error instanceof AppError
      ? error
      : error.validation
        ? AppError.badRequest(error.message)
        : toAppError(error);

    if (appError.statusCode >= 500) {
      request.log.error({ err: error }, 'Request failed');
    }
    return reply.code(appError.statusCode).send(formatErrorResponse(appError));
  });

  // Main health endpoint with /v1 prefix
  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      provider: runtime.engine.name,
      timestamp: new Date().toISOString(),
    };
  });

  // Legacy redirect
  server.get('/health', async (request, reply) => {
    return reply.code(301).redirect('/v1/health');
  });

  await server.register(chatRoutes, { prefix: '/v1', runtime });
  await server.register(sessionRoutes, { prefix: '/v1', runtime });
  await server.register(metricsRoutes, { prefix: '/v1', runtime });

  return server;
}
