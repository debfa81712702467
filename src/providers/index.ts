// Engine Registry
// Builds the completion engine selected by configuration

import { env, isProviderConfigured } from '../env.js';
import { AppError } from '../utils/errors.js';
import { AnthropicEngine } from './anthropic.js';
import { OpenAIEngine } from './openai.js';
import type { CompletionEngine } from './types.js';

export const SUPPORTED_PROVIDERS = ['anthropic', 'openai'] as const;

export function createCompletionEngine(name: string = env.COMPLETION_PROVIDER): CompletionEngine {
  if (!isProviderConfigured(name)) {
    const known = SUPPORTED_PROVIDERS.some(provider => provider === name);
    throw AppError.configuration(
      known
        ? `Completion provider "${name}" has no API key configured`
        : `Unknown completion provider "${name}" (expected one of: ${SUPPORTED_PROVIDERS.join(', ')})`,
    );
  }

  switch (name) {
    case 'openai':
      return new OpenAIEngine({
        apiKey: env.OPENAI_API_KEY,
        model: env.MODEL || undefined,
        maxTokens: env.MAX_TOKENS,
        baseURL: env.OPENAI_BASE_URL || undefined,
      });
    default:
      return new AnthropicEngine({
        apiKey: env.ANTHROPIC_API_KEY,
        model: env.MODEL || undefined,
        maxTokens: env.MAX_TOKENS,
      });
  }
}

export { AnthropicEngine } from './anthropic.js';
export { OpenAIEngine } from './openai.js';
export type {
  ChatMessage,
  CompletionEngine,
  CompletionOptions,
  CompletionResponse,
  ContentBlock,
  MessageContent,
  ToolSchema,
} from './types.js';
