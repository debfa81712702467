// Protocol metrics routes
import type { FastifyPluginAsync } from 'fastify';
import { requireAuthIfEnabled } from '../security/route-guards.js';
import type { Runtime } from '../services/runtime.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';

export interface MetricsRouteOptions {
  runtime: Runtime;
}

interface SessionParams {
  Params: {
    sessionId: string;
  };
}

export const metricsRoutes: FastifyPluginAsync<MetricsRouteOptions> = async (server, options) => {
  const { monitor, metricsExportDir } = options.runtime;

  // GET /v1/metrics - All sessions plus totals
  server.get('/metrics', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return reply;
    }
    return {
      sessions: monitor.getAllMetrics(),
      summary: monitor.summary(),
    };
  });

  // GET /v1/metrics/sessions/:sessionId
  server.get<SessionParams>('/metrics/sessions/:sessionId', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return reply;
    }

    const metrics = monitor.getSessionMetrics(request.params.sessionId);
    if (!metrics) {
      const error = AppError.notFound('No metrics recorded for this session');
      return reply.code(error.statusCode).send(formatErrorResponse(error));
    }
    return metrics;
  });

  // POST /v1/metrics/export - Write a snapshot to METRICS_EXPORT_DIR
  server.post('/metrics/export', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return reply;
    }

    const outputPath = await monitor.exportMetricsToFile(metricsExportDir);
    return { status: 'exported', path: outputPath };
  });
};
