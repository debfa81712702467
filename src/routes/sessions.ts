// Session routes
import type { FastifyPluginAsync } from 'fastify';
import { requireAuthIfEnabled } from '../security/route-guards.js';
import type { Runtime } from '../services/runtime.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';

export interface SessionRouteOptions {
  runtime: Runtime;
}

interface SessionParams {
  Params: {
    sessionId: string;
  };
}

export const sessionRoutes: FastifyPluginAsync<SessionRouteOptions> = async (server, options) => {
  const { sessions, monitor } = options.runtime;

  // GET /v1/sessions/:sessionId - Session summary
  server.get<SessionParams>('/sessions/:sessionId', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return reply;
    }

    const session = sessions.get(request.params.sessionId);
    if (!session) {
      const error = AppError.notFound('Session not found');
      return reply.code(error.statusCode).send(formatErrorResponse(error));
    }

    return {
      session_id: session.id,
      message_count: session.messages.length,
      turn_count: session.turnCount,
      created_at: session.createdAt.toISOString(),
      last_active_at: session.lastActiveAt.toISOString(),
    };
  });

  // DELETE /v1/sessions/:sessionId - Clear history and metrics
  server.delete<SessionParams>('/sessions/:sessionId', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return reply;
    }

    const { sessionId } = request.params;
    const deleted = await sessions.delete(sessionId, () => monitor.forget(sessionId));
    if (!deleted) {
      const error = AppError.notFound('Session not found');
      return reply.code(error.statusCode).send(formatErrorResponse(error));
    }

    return { status: 'deleted', session_id: sessionId };
  });
};
