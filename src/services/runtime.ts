// Runtime wiring
// Builds the services one server process shares from configuration

import { env } from '../env.js';
import { createCompletionEngine } from '../providers/index.js';
import type { CompletionEngine } from '../providers/types.js';
import { HistoryManager } from './history/history-manager.js';
import { DEFAULT_SYSTEM_PROMPT, SessionStore } from './history/session-store.js';
import { TurnOrchestrator } from './orchestrator/orchestrator.js';
import { ProtocolMonitor } from './orchestrator/protocol-monitor.js';
import { ToolExecutor, initializeTools } from './tools/index.js';
import type { ToolRegistry } from './tools/registry.js';
import type { ToolDefinition } from './tools/types.js';

export interface Runtime {
  engine: CompletionEngine;
  sessions: SessionStore;
  history: HistoryManager;
  registry: ToolRegistry;
  executor: ToolExecutor;
  monitor: ProtocolMonitor;
  orchestrator: TurnOrchestrator;
  metricsExportDir: string;
}

export interface RuntimeOverrides {
  engine?: CompletionEngine;
  tools?: readonly ToolDefinition[];
  systemPrompt?: string;
  maxHistoryLength?: number;
  toolTimeoutMs?: number;
  maxConcurrentTools?: number;
  streamBufferSize?: number;
  metricsExportDir?: string;
}

/**
 * Configuration errors (history bound, unknown or unconfigured provider)
 * surface here, before the server starts listening.
 */
export function createRuntime(overrides: RuntimeOverrides = {}): Runtime {
  const history = new HistoryManager(overrides.maxHistoryLength ?? env.MAX_HISTORY_LENGTH);
  const engine = overrides.engine ?? createCompletionEngine(env.COMPLETION_PROVIDER);
  const sessions = new SessionStore(overrides.systemPrompt ?? (env.SYSTEM_PROMPT || DEFAULT_SYSTEM_PROMPT));
  const registry = initializeTools(undefined, overrides.tools);
  const executor = new ToolExecutor(registry, {
    timeoutMs: overrides.toolTimeoutMs ?? env.TOOL_TIMEOUT_MS,
    maxConcurrency: overrides.maxConcurrentTools ?? env.MAX_CONCURRENT_TOOLS,
  });
  const monitor = new ProtocolMonitor();

  const orchestrator = new TurnOrchestrator({
    engine,
    sessions,
    history,
    registry,
    executor,
    monitor,
    streamBufferSize: overrides.streamBufferSize ?? env.STREAM_BUFFER_SIZE,
  });

  return {
    engine,
    sessions,
    history,
    registry,
    executor,
    monitor,
    orchestrator,
    metricsExportDir: overrides.metricsExportDir ?? env.METRICS_EXPORT_DIR,
  };
}
