// Tool system types and interfaces
// A tool is a named capability with an argument schema and an executor

export interface ToolParameter {
  name: string;
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  description: string;
  required: boolean;
  enum?: string[]; // For enum types
  default?: unknown;
}

export interface ToolContext {
  sessionId: string;
  signal: AbortSignal; // aborted on timeout or when the turn is cancelled
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameter[];
  /**
   * Parameter that may be filled from the session's latest user message when
   * the engine sends empty or incomplete arguments. Best effort only; tools
   * that need exact input leave this unset and fail on missing fields.
   */
  fallbackArgument?: string;
  execute: (args: Record<string, unknown>, context: ToolContext) => Promise<unknown> | unknown;
}

interface ToolResultBase {
  toolCallId: string;
  toolName: string;
  durationMs: number;
}

export type ToolResult =
  | (ToolResultBase & { success: true; content: string })
  | (ToolResultBase & { success: false; error: string });
