// Chat routes
// Streaming (SSE) and non-streaming turn submission

import crypto from 'crypto';
import type { ServerResponse } from 'http';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import { z } from 'zod';
import { env } from '../env.js';
import { enforceRateLimitIfEnabled, requireAuthIfEnabled } from '../security/route-guards.js';
import type { TurnEvent } from '../services/orchestrator/types.js';
import type { Runtime } from '../services/runtime.js';
import { AppError, ErrorCode, errorMessage, formatErrorResponse } from '../utils/errors.js';

export interface ChatRouteOptions {
  runtime: Runtime;
}

export function chatRequestSchema(maxLength: number = env.MAX_MESSAGE_LENGTH) {
  return z.object({
    message: z
      .string()
      .min(1, 'Message must not be empty')
      .max(maxLength, `Message must be at most ${maxLength} characters`)
      .refine(message => message.trim().length > 0, 'Message must not be blank'),
    session_id: z.string().min(1).max(128).optional(),
  });
}

export type ChatRequest = z.infer<ReturnType<typeof chatRequestSchema>>;

function parseChatRequest(body: unknown): ChatRequest | AppError {
  const parsed = chatRequestSchema().safeParse(body);
  if (parsed.success) {
    return parsed.data;
  }
  const details = parsed.error.errors.map(issue => ({ path: issue.path.join('.'), message: issue.message }));
  return AppError.validationError('Invalid request body', details);
}

export function formatSseEvent(event: TurnEvent): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}

/** Resolves false once the client is gone; waits for `drain` when the socket buffer is full. */
async function writeSse(raw: ServerResponse, chunk: string): Promise<boolean> {
  if (raw.writableEnded || raw.destroyed) {
    return false;
  }
  if (raw.write(chunk)) {
    return true;
  }
  await new Promise<void>(resolve => {
    const settle = () => {
      raw.off('drain', settle);
      raw.off('close', settle);
      resolve();
    };
    raw.once('drain', settle);
    raw.once('close', settle);
  });
  return !raw.destroyed;
}

/** Aborts when the client disconnects before the response is finished. */
function abortOnDisconnect(reply: FastifyReply): AbortController {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableEnded) {
      controller.abort();
    }
  });
  return controller;
}

function statusForFailure(code: ErrorCode): number {
  return code === ErrorCode.COMPLETION_FAILED ? 502 : 500;
}

export const chatRoutes: FastifyPluginAsync<ChatRouteOptions> = async (server, options) => {
  const { orchestrator } = options.runtime;

  // POST /v1/chat/stream - Run one turn, streaming events as SSE
  server.post('/chat/stream', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return reply;
    }
    if (!enforceRateLimitIfEnabled(request, reply, 'chat')) {
      return reply;
    }

    const body = parseChatRequest(request.body);
    if (body instanceof AppError) {
      return reply.code(body.statusCode).send(formatErrorResponse(body, true));
    }

    const sessionId = body.session_id ?? crypto.randomUUID();
    const controller = abortOnDisconnect(reply);

    // Headers set through the reply (CORS) are not sent once it is hijacked
    const replyHeaders: Record<string, number | string | string[] | undefined> = reply.getHeaders();
    reply.hijack();
    reply.raw.writeHead(200, {
      ...replyHeaders,
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
      'X-Session-Id': sessionId,
    });

    try {
      for await (const event of orchestrator.submitTurn(sessionId, body.message, { signal: controller.signal })) {
        if (!(await writeSse(reply.raw, formatSseEvent(event)))) {
          controller.abort();
          break;
        }
      }
    } catch (error) {
      request.log.error({ err: errorMessage(error), sessionId }, 'SSE stream failed');
      controller.abort();
    } finally {
      if (!reply.raw.writableEnded) {
        reply.raw.end();
      }
    }
  });

  // POST /v1/chat - Run one turn and return the whole response
  server.post('/chat', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return reply;
    }
    if (!enforceRateLimitIfEnabled(request, reply, 'chat')) {
      return reply;
    }

    const body = parseChatRequest(request.body);
    if (body instanceof AppError) {
      return reply.code(body.statusCode).send(formatErrorResponse(body, true));
    }

    const sessionId = body.session_id ?? crypto.randomUUID();
    const controller = abortOnDisconnect(reply);
    const summary = await orchestrator.collectTurn(sessionId, body.message, { signal: controller.signal });

    if (summary.outcome?.type === 'failed') {
      const error = new AppError(summary.outcome.code, summary.outcome.reason, statusForFailure(summary.outcome.code));
      return reply.code(error.statusCode).send({ ...formatErrorResponse(error), session_id: sessionId });
    }
    if (!summary.outcome) {
      const error = AppError.cancelled();
      return reply.code(error.statusCode).send(formatErrorResponse(error));
    }

    return {
      session_id: sessionId,
      response: summary.response,
      tool_calls: summary.toolCalls,
    };
  });
};
