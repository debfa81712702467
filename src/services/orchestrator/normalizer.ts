// Response Normalizer
// Flattens engine output into display text

import type { MessageContent, ToolRequestBlock } from '../../providers/types.js';

/**
 * Returns the displayable text of a response. Plain strings come back
 * unchanged; block lists yield the concatenation of their text blocks in
 * order, skipping tool requests.
 */
export function extractText(content: MessageContent | string): string {
  if (typeof content === 'string') {
    return content;
  }

  switch (content.kind) {
    case 'text':
      return content.text;
    case 'blocks': {
      let text = '';
      for (const block of content.blocks) {
        if (block.type === 'text') {
          text += block.text;
        }
      }
      return text;
    }
    default: {
      const unreachable: never = content;
      throw new Error(`Unknown content kind: ${JSON.stringify(unreachable)}`);
    }
  }
}

export function toolRequestsOf(content: MessageContent): ToolRequestBlock[] {
  if (content.kind === 'text') return [];
  return content.blocks.filter((block): block is ToolRequestBlock => block.type === 'tool_request');
}

export function hasToolRequests(content: MessageContent): boolean {
  return toolRequestsOf(content).length > 0;
}

// Word-granular fragments; joining them reproduces the input exactly
export function splitFragments(text: string): string[] {
  return text.match(/\S+\s*|\s+/g) ?? [];
}
