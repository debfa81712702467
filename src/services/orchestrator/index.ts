// Orchestrator Module - Main exports

export { TurnOrchestrator } from './orchestrator.js';
export type { TurnOrchestratorDeps } from './orchestrator.js';
export { ProtocolMonitor, ProtocolClassification, classify, detectQuestion, isViolation } from './protocol-monitor.js';
export type {
  MetricsSnapshot,
  MetricsSummary,
  SessionMetrics,
  TurnOutcome,
  TurnRecord,
} from './protocol-monitor.js';
export { extractText, splitFragments, toolRequestsOf, hasToolRequests } from './normalizer.js';
export type { SubmitTurnOptions, TurnEvent, TurnState, TurnSummary } from './types.js';
