// OpenAI Provider
// Completion engine for the OpenAI chat completions API and compatible endpoints

import OpenAI from 'openai';
import { CompletionEngineError, errorMessage } from '../utils/errors.js';
import { extractText } from '../services/orchestrator/normalizer.js';
import {
  isRecord,
  type ChatMessage,
  type CompletionEngine,
  type CompletionOptions,
  type CompletionResponse,
  type ContentBlock,
  type MessageContent,
  type ToolSchema,
} from './types.js';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o';

export interface OpenAIEngineConfig {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  baseURL?: string;
}

/** The part of a chat completion message the engine reads. */
export interface OpenAIAssistantMessage {
  content: string | null;
  tool_calls?: Array<{ id: string; function: { name: string; arguments: string } }>;
}

function assistantMessage(content: MessageContent): OpenAI.Chat.ChatCompletionAssistantMessageParam {
  if (content.kind === 'text') {
    return { role: 'assistant', content: content.text };
  }

  const toolCalls: OpenAI.Chat.ChatCompletionMessageToolCall[] = [];
  for (const block of content.blocks) {
    if (block.type === 'tool_request') {
      toolCalls.push({
        id: block.id,
        type: 'function',
        function: { name: block.name, arguments: JSON.stringify(block.arguments) },
      });
    }
  }

  const text = extractText(content);
  return {
    role: 'assistant',
    content: text || null,
    ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
  };
}

export function toOpenAIMessages(messages: readonly ChatMessage[]): OpenAI.Chat.ChatCompletionMessageParam[] {
  return messages.map((message): OpenAI.Chat.ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: extractText(message.content) };
      case 'user':
        return { role: 'user', content: extractText(message.content) };
      case 'assistant':
        return assistantMessage(message.content);
      case 'tool':
        if (!message.toolCallId) {
          throw new CompletionEngineError('Tool result message has no correlation id');
        }
        return { role: 'tool', tool_call_id: message.toolCallId, content: extractText(message.content) };
    }
  });
}

export function toOpenAITools(tools: readonly ToolSchema[]): OpenAI.Chat.ChatCompletionTool[] {
  return tools.map(tool => ({
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: {
        type: 'object',
        properties: tool.parameters.properties,
        required: tool.parameters.required,
      },
    },
  }));
}

function parseArguments(id: string, raw: string): Record<string, unknown> {
  if (!raw.trim()) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CompletionEngineError(`Tool request ${id} has malformed arguments: ${errorMessage(error)}`, error);
  }
  if (!isRecord(parsed)) {
    throw new CompletionEngineError(`Tool request ${id} arguments are not an object`);
  }
  return parsed;
}

export function fromOpenAIMessage(message: OpenAIAssistantMessage): MessageContent {
  const blocks: ContentBlock[] = [];
  if (message.content) {
    blocks.push({ type: 'text', text: message.content });
  }
  for (const call of message.tool_calls ?? []) {
    blocks.push({
      type: 'tool_request',
      id: call.id,
      name: call.function.name,
      arguments: parseArguments(call.id, call.function.arguments),
    });
  }
  return { kind: 'blocks', blocks };
}

export class OpenAIEngine implements CompletionEngine {
  readonly name = 'openai';
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(config: OpenAIEngineConfig) {
    if (!config.apiKey) {
      throw new Error('OPENAI_API_KEY not configured');
    }
    this.client = new OpenAI({
      apiKey: config.apiKey,
      ...(config.baseURL ? { baseURL: config.baseURL } : {}),
    });
    this.model = config.model || DEFAULT_OPENAI_MODEL;
    this.maxTokens = config.maxTokens ?? 8192;
  }

  async complete(
    messages: readonly ChatMessage[],
    tools: readonly ToolSchema[],
    options: CompletionOptions = {},
  ): Promise<CompletionResponse> {
    let response: OpenAI.Chat.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.model,
          max_tokens: options.maxTokens ?? this.maxTokens,
          messages: toOpenAIMessages(messages),
          ...(tools.length > 0 ? { tools: toOpenAITools(tools) } : {}),
        },
        { signal: options.signal },
      );
    } catch (error) {
      throw new CompletionEngineError(`OpenAI API error: ${errorMessage(error)}`, error);
    }

    const choice = response.choices[0];
    if (!choice) {
      throw new CompletionEngineError('OpenAI API returned no choices');
    }

    return {
      content: fromOpenAIMessage(choice.message),
      stopReason: choice.finish_reason,
      usage: response.usage
        ? { inputTokens: response.usage.prompt_tokens, outputTokens: response.usage.completion_tokens }
        : undefined,
    };
  }
}
