// Positioning Readiness Tool
// Scores how ready a product is for positioning work from five yes/no signals

import type { ToolDefinition } from './types.js';

export interface ReadinessScore {
  score: number; // 0-10
  strengths: string[];
  gaps: string[];
  next_action: string;
}

export interface ReadinessSignals {
  has_target_customer: boolean;
  has_competitive_alternative: boolean;
  has_key_differentiator: boolean;
  has_customer_proof: boolean;
  has_clear_category: boolean;
}

// Ordered by priority; the first gap decides the next action
const CHECKS: Array<{ key: keyof ReadinessSignals; label: string; action: string }> = [
  {
    key: 'has_target_customer',
    label: 'Target Customer Definition',
    action: 'Define your target customer segment first',
  },
  {
    key: 'has_competitive_alternative',
    label: 'Competitive Alternative Identified',
    action: 'Identify what customers use before finding you',
  },
  {
    key: 'has_key_differentiator',
    label: 'Key Differentiator Articulated',
    action: "Articulate what you have that alternatives don't",
  },
  {
    key: 'has_customer_proof',
    label: 'Customer Proof Available',
    action: 'Collect customer testimonials and use cases',
  },
  {
    key: 'has_clear_category',
    label: 'Market Category Defined',
    action: 'Define your market category',
  },
];

export function scorePositioningReadiness(signals: ReadinessSignals): ReadinessScore {
  const strengths = CHECKS.filter(check => signals[check.key]).map(check => check.label);
  const gaps = CHECKS.filter(check => !signals[check.key]).map(check => check.label);
  const firstGap = CHECKS.find(check => !signals[check.key]);

  return {
    score: strengths.length * 2,
    strengths,
    gaps,
    next_action: firstGap ? firstGap.action : "You're ready to create positioning!",
  };
}

export const positioningReadinessTool: ToolDefinition = {
  name: 'calculate_positioning_readiness',
  description: 'Calculate how ready a product is for positioning work. Use this when the user wants to know whether they can start on positioning or which gaps to fill first.',
  parameters: [
    {
      name: 'has_target_customer',
      type: 'boolean',
      description: 'Do they know their ideal customer?',
      required: true,
    },
    {
      name: 'has_competitive_alternative',
      type: 'boolean',
      description: 'Do they know what customers use instead?',
      required: true,
    },
    {
      name: 'has_key_differentiator',
      type: 'boolean',
      description: 'Do they have a unique capability?',
      required: true,
    },
    {
      name: 'has_customer_proof',
      type: 'boolean',
      description: 'Do they have customer evidence or testimonials?',
      required: true,
    },
    {
      name: 'has_clear_category',
      type: 'boolean',
      description: 'Do they know their market category?',
      required: true,
    },
  ],
  execute: (args) => scorePositioningReadiness({
    has_target_customer: args.has_target_customer === true,
    has_competitive_alternative: args.has_competitive_alternative === true,
    has_key_differentiator: args.has_key_differentiator === true,
    has_customer_proof: args.has_customer_proof === true,
    has_clear_category: args.has_clear_category === true,
  }),
};
