// Scripted completion engine
// Replays queued responses in order; used by the test suites in place of a real API

import type {
  ChatMessage,
  CompletionEngine,
  CompletionOptions,
  CompletionResponse,
  ContentBlock,
  MessageContent,
  ToolSchema,
} from '../providers/types.js';

export type ScriptStep =
  | { kind: 'respond'; content: MessageContent; gate?: Promise<void> }
  | { kind: 'fail'; error: Error }
  | { kind: 'hang' };

export interface ScriptedToolRequest {
  id: string;
  name: string;
  arguments?: Record<string, unknown>;
}

export function reply(text: string, gate?: Promise<void>): ScriptStep {
  return { kind: 'respond', content: { kind: 'text', text }, gate };
}

export function requestTools(requests: ScriptedToolRequest[], text?: string): ScriptStep {
  const blocks: ContentBlock[] = text ? [{ type: 'text', text }] : [];
  for (const request of requests) {
    blocks.push({ type: 'tool_request', id: request.id, name: request.name, arguments: request.arguments ?? {} });
  }
  return { kind: 'respond', content: { kind: 'blocks', blocks } };
}

export function failWith(message: string): ScriptStep {
  return { kind: 'fail', error: new Error(message) };
}

/** Never answers; rejects once the call's signal aborts. */
export function hang(): ScriptStep {
  return { kind: 'hang' };
}

export class ScriptedEngine implements CompletionEngine {
  readonly name = 'scripted';
  readonly calls: ChatMessage[][] = [];
  readonly toolSchemas: ToolSchema[][] = [];
  private readonly steps: ScriptStep[];

  constructor(steps: ScriptStep[] = []) {
    this.steps = [...steps];
  }

  enqueue(...steps: ScriptStep[]): void {
    this.steps.push(...steps);
  }

  get remaining(): number {
    return this.steps.length;
  }

  async complete(
    messages: readonly ChatMessage[],
    tools: readonly ToolSchema[],
    options: CompletionOptions = {},
  ): Promise<CompletionResponse> {
    this.calls.push([...messages]);
    this.toolSchemas.push([...tools]);

    const step = this.steps.shift();
    if (!step) {
      throw new Error('Scripted engine has no response left');
    }

    switch (step.kind) {
      case 'respond':
        if (step.gate) await step.gate;
        return { content: step.content, stopReason: 'end_turn' };
      case 'fail':
        throw step.error;
      case 'hang':
        return new Promise<CompletionResponse>((_, reject) => {
          const signal = options.signal;
          if (signal?.aborted) {
            reject(new Error('Request aborted'));
            return;
          }
          signal?.addEventListener('abort', () => reject(new Error('Request aborted')), { once: true });
        });
    }
  }
}
