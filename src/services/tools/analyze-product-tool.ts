// Product Analysis Tool
// Pulls positioning signals out of a free-text product description

import type { ToolDefinition } from './types.js';

export interface ProductAnalysis {
  summary: string;
  word_count: number;
  audience_mentions: string[];
  differentiator_mentions: string[];
  proof_mentions: string[];
  missing: string[];
}

const AUDIENCE_TERMS = ['teams', 'developers', 'marketers', 'founders', 'startups', 'enterprises', 'agencies', 'smb', 'customers', 'users'];
const DIFFERENTIATOR_TERMS = ['only', 'first', 'unlike', 'faster', 'cheaper', 'automated', 'unique', 'instead of'];
const PROOF_TERMS = ['customers', 'case study', 'testimonial', 'revenue', 'arr', 'users', 'growth', 'retention'];

function mentions(text: string, terms: string[]): string[] {
  return terms.filter(term => new RegExp(`\\b${term}\\b`, 'i').test(text));
}

export function analyzeProduct(description: string, targetMarket?: string): ProductAnalysis {
  const text = description.trim();
  const words = text.split(/\s+/).filter(Boolean);
  const audience = mentions(`${text} ${targetMarket ?? ''}`, AUDIENCE_TERMS);
  const differentiators = mentions(text, DIFFERENTIATOR_TERMS);
  const proof = mentions(text, PROOF_TERMS);

  const missing: string[] = [];
  if (audience.length === 0) missing.push('target customer');
  if (differentiators.length === 0) missing.push('key differentiator');
  if (proof.length === 0) missing.push('customer proof');

  const firstSentence = text.split(/(?<=[.!?])\s+/)[0] ?? '';

  return {
    summary: firstSentence.length > 200 ? `${firstSentence.slice(0, 197)}...` : firstSentence,
    word_count: words.length,
    audience_mentions: audience,
    differentiator_mentions: differentiators,
    proof_mentions: proof,
    missing,
  };
}

export const analyzeProductTool: ToolDefinition = {
  name: 'analyze_product',
  description: 'Analyze a product description and report which positioning signals (audience, differentiators, proof) it already contains and which are missing.',
  parameters: [
    {
      name: 'product_description',
      type: 'string',
      description: 'What the product is and does, in the user\'s words',
      required: true,
    },
    {
      name: 'target_market',
      type: 'string',
      description: 'Optional known target market or segment',
      required: false,
    },
  ],
  fallbackArgument: 'product_description',
  execute: (args) => {
    const description = typeof args.product_description === 'string' ? args.product_description : '';
    if (!description.trim()) {
      throw new Error('product_description is required');
    }
    const targetMarket = typeof args.target_market === 'string' ? args.target_market : undefined;
    return analyzeProduct(description, targetMarket);
  },
};
