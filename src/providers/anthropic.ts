// Anthropic Provider
// Completion engine backed by the Anthropic Messages API

import Anthropic from '@anthropic-ai/sdk';
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

type BlockParam = Exclude<Anthropic.MessageParam['content'], string>[number];

export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';

export interface AnthropicEngineConfig {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  baseURL?: string;
}

export interface AnthropicRequest {
  system?: string;
  messages: Anthropic.MessageParam[];
}

function assistantBlocks(content: MessageContent): BlockParam[] {
  if (content.kind === 'text') {
    return content.text ? [{ type: 'text', text: content.text }] : [];
  }

  const blocks: BlockParam[] = [];
  for (const block of content.blocks) {
    if (block.type === 'text') {
      if (block.text) blocks.push({ type: 'text', text: block.text });
    } else {
      blocks.push({ type: 'tool_use', id: block.id, name: block.name, input: block.arguments });
    }
  }
  return blocks;
}

/**
 * Converts history into a Messages API request. System messages become the
 * top-level `system` prompt, tool results become `tool_result` blocks on the
 * user side, and consecutive same-role messages are merged.
 */
export function toAnthropicRequest(messages: readonly ChatMessage[]): AnthropicRequest {
  const system: string[] = [];
  const converted: Anthropic.MessageParam[] = [];

  const push = (role: 'user' | 'assistant', blocks: BlockParam[]) => {
    if (blocks.length === 0) return;
    const previous = converted[converted.length - 1];
    if (previous && previous.role === role && Array.isArray(previous.content)) {
      previous.content.push(...blocks);
      return;
    }
    converted.push({ role, content: blocks });
  };

  for (const message of messages) {
    switch (message.role) {
      case 'system': {
        const text = extractText(message.content);
        if (text) system.push(text);
        break;
      }
      case 'user': {
        const text = extractText(message.content);
        push('user', text ? [{ type: 'text', text }] : []);
        break;
      }
      case 'assistant':
        push('assistant', assistantBlocks(message.content));
        break;
      case 'tool':
        if (!message.toolCallId) {
          throw new CompletionEngineError('Tool result message has no correlation id');
        }
        push('user', [{
          type: 'tool_result',
          tool_use_id: message.toolCallId,
          content: extractText(message.content),
          is_error: message.isError ?? false,
        }]);
        break;
    }
  }

  return {
    ...(system.length > 0 ? { system: system.join('\n\n') } : {}),
    messages: converted,
  };
}

export function toAnthropicTools(tools: readonly ToolSchema[]): Anthropic.Tool[] {
  return tools.map(tool => ({
    name: tool.name,
    description: tool.description,
    input_schema: {
      type: 'object',
      properties: tool.parameters.properties,
      required: tool.parameters.required,
    },
  }));
}

export function fromAnthropicContent(content: readonly Anthropic.ContentBlock[]): MessageContent {
  const blocks: ContentBlock[] = [];

  for (const block of content) {
    if (block.type === 'text') {
      blocks.push({ type: 'text', text: block.text });
    } else if (block.type === 'tool_use') {
      if (!isRecord(block.input)) {
        throw new CompletionEngineError(`Tool request ${block.id} has non-object input`);
      }
      blocks.push({ type: 'tool_request', id: block.id, name: block.name, arguments: block.input });
    }
  }

  return { kind: 'blocks', blocks };
}

export class AnthropicEngine implements CompletionEngine {
  readonly name = 'anthropic';
  private readonly client: Anthropic;
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(config: AnthropicEngineConfig) {
    if (!config.apiKey) {
      throw new Error('ANTHROPIC_API_KEY not configured');
    }
    this.client = new Anthropic({
      apiKey: config.apiKey,
      ...(config.baseURL ? { baseURL: config.baseURL } : {}),
    });
    this.model = config.model || DEFAULT_ANTHROPIC_MODEL;
    this.maxTokens = config.maxTokens ?? 8192;
  }

  async complete(
    messages: readonly ChatMessage[],
    tools: readonly ToolSchema[],
    options: CompletionOptions = {},
  ): Promise<CompletionResponse> {
    const request = toAnthropicRequest(messages);

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: options.maxTokens ?? this.maxTokens,
          ...request,
          ...(tools.length > 0 ? { tools: toAnthropicTools(tools) } : {}),
        },
        { signal: options.signal },
      );
    } catch (error) {
      throw new CompletionEngineError(`Anthropic API error: ${errorMessage(error)}`, error);
    }

    return {
      content: fromAnthropicContent(response.content),
      stopReason: response.stop_reason ?? undefined,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }
}
