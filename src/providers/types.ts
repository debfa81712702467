// Completion engine interface
// Common message model that every engine adapter translates to and from

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ToolRequestBlock {
  type: 'tool_request';
  id: string; // correlation identifier, unique within one response
  name: string;
  arguments: Record<string, unknown>;
}

export type ContentBlock = TextBlock | ToolRequestBlock;

/**
 * Engine output is either plain text or an ordered list of typed blocks.
 * Code that renders content must switch on `kind`; never stringify blocks.
 */
export type MessageContent =
  | { kind: 'text'; text: string }
  | { kind: 'blocks'; blocks: ContentBlock[] };

export interface ChatMessage {
  role: MessageRole;
  content: MessageContent;
  toolCallId?: string; // For tool result messages
  toolName?: string; // Tool name for tool messages
  isError?: boolean; // Tool result carries an error description
}

export interface JsonSchemaProperty {
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  description: string;
  enum?: string[];
  default?: unknown;
}

export interface ToolSchema {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

export interface CompletionUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface CompletionOptions {
  signal?: AbortSignal;
  maxTokens?: number;
}

export interface CompletionResponse {
  content: MessageContent;
  stopReason?: string;
  usage?: CompletionUsage;
}

export interface CompletionEngine {
  readonly name: string;
  complete(
    messages: readonly ChatMessage[],
    tools: readonly ToolSchema[],
    options?: CompletionOptions,
  ): Promise<CompletionResponse>;
}

export function textContent(text: string): MessageContent {
  return { kind: 'text', text };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
