// Orchestrator Types

import type { ErrorCode } from '../../utils/errors.js';
import type { ProtocolClassification } from './protocol-monitor.js';

export type TurnState =
  | 'AWAITING_INPUT'
  | 'GENERATING_FIRST'
  | 'DIRECT'
  | 'TOOLS_REQUESTED'
  | 'EXECUTING_TOOLS'
  | 'GENERATING_FOLLOWUP'
  | 'STREAMING'
  | 'COMPLETE'
  | 'FAILED';

export type TurnEvent =
  | { type: 'state'; state: TurnState }
  | { type: 'tool_call'; id: string; name: string; arguments: Record<string, unknown> }
  | { type: 'tool_result'; id: string; name: string; success: boolean }
  | { type: 'text'; fragment: string }
  | {
      type: 'done';
      sessionId: string;
      turnIndex: number;
      classification: ProtocolClassification;
      toolInvocationCount: number;
    }
  | {
      type: 'failed';
      sessionId: string;
      code: ErrorCode;
      reason: string;
      partialOutput: boolean; // text fragments of this turn were already emitted
    };

export interface SubmitTurnOptions {
  signal?: AbortSignal;
}

export interface TurnSummary {
  sessionId: string;
  response: string;
  toolCalls: Array<{ id: string; name: string; arguments: Record<string, unknown> }>;
  outcome: Extract<TurnEvent, { type: 'done' } | { type: 'failed' }> | null;
}
