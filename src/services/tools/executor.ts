// Tool Executor
// Runs tool invocation requests behind a failure boundary: unknown tools,
// invalid arguments, exceptions and timeouts all come back as error results.

import type { ToolRequestBlock } from '../../providers/types.js';
import { AppError, errorMessage } from '../../utils/errors.js';
import { Semaphore } from '../../utils/concurrency.js';
import { createLogger } from '../../utils/logger.js';
import { findLastUserText } from '../history/history-manager.js';
import type { Session } from '../history/types.js';
import type { ToolRegistry } from './registry.js';
import type { ToolDefinition, ToolResult } from './types.js';

const log = createLogger('tool-executor');

export interface ToolExecutorOptions {
  timeoutMs?: number;
  maxConcurrency?: number;
}

class ToolTimeoutError extends Error {
  constructor(toolName: string, timeoutMs: number) {
    super(`Tool "${toolName}" timed out after ${timeoutMs}ms`);
    this.name = 'ToolTimeoutError';
  }
}

function isMissing(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

export class ToolExecutor {
  private readonly timeoutMs: number;
  private readonly maxConcurrency: number;

  constructor(
    private readonly registry: ToolRegistry,
    options: ToolExecutorOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.maxConcurrency = options.maxConcurrency ?? 4;
  }

  async execute(request: ToolRequestBlock, session: Session, signal?: AbortSignal): Promise<ToolResult> {
    const startTime = Date.now();
    const base = { toolCallId: request.id, toolName: request.name };
    const fail = (error: string): ToolResult => ({
      ...base,
      success: false,
      error,
      durationMs: Date.now() - startTime,
    });

    const tool = this.registry.resolve(request.name);
    if (!tool) {
      log.warn({ sessionId: session.id, tool: request.name }, 'Unknown tool requested');
      return fail(`Tool "${request.name}" not found`);
    }

    const args = this.recoverArguments(tool, request.arguments, session);
    const schema = this.registry.argumentSchema(tool.name);
    let validated: Record<string, unknown> = args;
    if (schema) {
      const parsed = schema.safeParse(args);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map(issue => `${issue.path.join('.') || '(arguments)'}: ${issue.message}`)
          .join('; ');
        log.warn({ sessionId: session.id, tool: tool.name, issues }, 'Tool arguments rejected');
        return fail(`Invalid arguments for ${tool.name}: ${issues}`);
      }
      validated = parsed.data;
    }

    try {
      const output = await this.runWithTimeout(tool, validated, session.id, signal);
      const content = this.formatResult(output);
      log.info(
        { sessionId: session.id, tool: tool.name, durationMs: Date.now() - startTime },
        'Tool executed',
      );
      return { ...base, success: true, content, durationMs: Date.now() - startTime };
    } catch (error) {
      const message = errorMessage(error);
      log.error({ sessionId: session.id, tool: tool.name, err: message }, 'Tool failed');
      return fail(message);
    }
  }

  /**
   * Executes every request, at most `maxConcurrency` at a time, and returns
   * the results in request order. Once `signal` aborts no further request is
   * started and the batch rejects; results of tools still running are dropped.
   */
  async executeAll(
    requests: readonly ToolRequestBlock[],
    session: Session,
    signal?: AbortSignal,
  ): Promise<ToolResult[]> {
    const semaphore = new Semaphore(this.maxConcurrency);

    const results = await Promise.all(requests.map(async (request) => {
      const release = await semaphore.acquire();
      try {
        if (signal?.aborted) {
          return undefined;
        }
        return await this.execute(request, session, signal);
      } finally {
        release();
      }
    }));

    if (signal?.aborted) {
      throw AppError.cancelled();
    }

    return results.filter((result): result is ToolResult => result !== undefined);
  }

  private recoverArguments(
    tool: ToolDefinition,
    args: Record<string, unknown>,
    session: Session,
  ): Record<string, unknown> {
    const field = tool.fallbackArgument;
    if (!field || !isMissing(args[field])) {
      return args;
    }

    const missingRequired = tool.parameters.some(p => p.required && isMissing(args[p.name]));
    if (Object.keys(args).length > 0 && !missingRequired) {
      return args;
    }

    const text = findLastUserText(session.messages);
    if (!text) {
      return args;
    }

    log.warn(
      { sessionId: session.id, tool: tool.name, field },
      'Tool called with incomplete arguments, filled from latest user message',
    );
    return { ...args, [field]: text };
  }

  private async runWithTimeout(
    tool: ToolDefinition,
    args: Record<string, unknown>,
    sessionId: string,
    parentSignal?: AbortSignal,
  ): Promise<unknown> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    parentSignal?.addEventListener('abort', onAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new ToolTimeoutError(tool.name, this.timeoutMs));
        controller.abort();
      }, this.timeoutMs);
    });

    try {
      const execution = Promise.resolve().then(() =>
        tool.execute(args, { sessionId, signal: controller.signal }),
      );
      return await Promise.race([execution, timeout]);
    } finally {
      clearTimeout(timer);
      parentSignal?.removeEventListener('abort', onAbort);
    }
  }

  private formatResult(result: unknown): string {
    if (result === null || result === undefined) {
      return '';
    }

    if (typeof result === 'string') {
      return result;
    }

    if (typeof result === 'object') {
      return JSON.stringify(result, null, 2);
    }

    return String(result);
  }
}
