// Turn Orchestrator
// Drives one user turn through the completion engine and the tools:
//
//   AWAITING_INPUT -> GENERATING_FIRST -> DIRECT ------------------------------> STREAMING -> COMPLETE
//                                      \-> TOOLS_REQUESTED -> EXECUTING_TOOLS
//                                            -> GENERATING_FOLLOWUP -----------/
//
// Any engine failure moves the turn to FAILED. A turn is atomic with respect
// to session history: on failure or cancellation the history is restored to
// the checkpoint taken before the user message was appended.

import {
  textContent,
  type ChatMessage,
  type CompletionEngine,
  type CompletionResponse,
  type ToolRequestBlock,
} from '../../providers/types.js';
import { BoundedChannel } from '../../utils/channel.js';
import { AppError, CompletionEngineError, ErrorCode, errorMessage, toAppError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { HistoryManager } from '../history/history-manager.js';
import type { SessionStore } from '../history/session-store.js';
import type { HistoryCheckpoint, Session } from '../history/types.js';
import type { ToolExecutor } from '../tools/executor.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolResult } from '../tools/types.js';
import { extractText, splitFragments, toolRequestsOf } from './normalizer.js';
import {
  detectQuestion,
  type ProtocolClassification,
  type ProtocolMonitor,
  type TurnOutcome,
  type TurnRecord,
} from './protocol-monitor.js';
import type { SubmitTurnOptions, TurnEvent, TurnState, TurnSummary } from './types.js';

const log = createLogger('orchestrator');

export interface TurnOrchestratorDeps {
  engine: CompletionEngine;
  sessions: SessionStore;
  history: HistoryManager;
  registry: ToolRegistry;
  executor: ToolExecutor;
  monitor: ProtocolMonitor;
  streamBufferSize?: number;
}

interface TurnProgress {
  state: TurnState;
  toolNames: string[];
  askedQuestion: boolean;
  clarifyingQuestion: string | null;
  emittedText: boolean;
}

function toolResultMessage(result: ToolResult): ChatMessage {
  return {
    role: 'tool',
    toolCallId: result.toolCallId,
    toolName: result.toolName,
    isError: !result.success,
    content: textContent(result.success ? result.content : `Error: ${result.error}`),
  };
}

/** Correlation identifiers must be present and unique within one response. */
function assertValidRequests(requests: readonly ToolRequestBlock[]): void {
  const seen = new Set<string>();
  for (const request of requests) {
    if (!request.id.trim()) {
      throw new CompletionEngineError(`Tool request for "${request.name}" has no correlation id`);
    }
    if (!request.name.trim()) {
      throw new CompletionEngineError(`Tool request ${request.id} has no tool name`);
    }
    if (seen.has(request.id)) {
      throw new CompletionEngineError(`Duplicate tool request id "${request.id}"`);
    }
    seen.add(request.id);
  }
}

export class TurnOrchestrator {
  private readonly engine: CompletionEngine;
  private readonly sessions: SessionStore;
  private readonly history: HistoryManager;
  private readonly registry: ToolRegistry;
  private readonly executor: ToolExecutor;
  private readonly monitor: ProtocolMonitor;
  private readonly streamBufferSize: number;

  constructor(deps: TurnOrchestratorDeps) {
    this.engine = deps.engine;
    this.sessions = deps.sessions;
    this.history = deps.history;
    this.registry = deps.registry;
    this.executor = deps.executor;
    this.monitor = deps.monitor;
    this.streamBufferSize = deps.streamBufferSize ?? 16;
  }

  /**
   * Starts a turn and returns its event stream. The stream ends with exactly
   * one `done` or `failed` event, unless the caller cancels it by aborting
   * `options.signal` or by leaving a `for await` loop early.
   */
  submitTurn(sessionId: string, userText: string, options: SubmitTurnOptions = {}): AsyncIterable<TurnEvent> {
    const channel = new BoundedChannel<TurnEvent>(this.streamBufferSize);
    const controller = new AbortController();
    const abort = () => controller.abort();

    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', abort, { once: true });
    }
    channel.onCancel(abort);

    void this.sessions
      .withSessionLock(sessionId, session => this.runTurn(session, userText, channel, controller.signal))
      .catch((error: unknown) => {
        log.error({ sessionId, err: errorMessage(error) }, 'Turn crashed outside its failure boundary');
      })
      .finally(() => {
        options.signal?.removeEventListener('abort', abort);
        channel.close();
      });

    return channel;
  }

  /** Runs a turn to its end and gathers the streamed output. */
  async collectTurn(sessionId: string, userText: string, options: SubmitTurnOptions = {}): Promise<TurnSummary> {
    const summary: TurnSummary = { sessionId, response: '', toolCalls: [], outcome: null };

    for await (const event of this.submitTurn(sessionId, userText, options)) {
      switch (event.type) {
        case 'text':
          summary.response += event.fragment;
          break;
        case 'tool_call':
          summary.toolCalls.push({ id: event.id, name: event.name, arguments: event.arguments });
          break;
        case 'done':
        case 'failed':
          summary.outcome = event;
          break;
        default:
          break;
      }
    }

    return summary;
  }

  /**
   * The turn body. Runs under the session lock; never rejects, because every
   * failure is reported on the channel and recorded with the monitor.
   */
  async runTurn(
    session: Session,
    userText: string,
    channel: BoundedChannel<TurnEvent>,
    signal: AbortSignal,
  ): Promise<TurnRecord> {
    const startedAt = Date.now();
    const turnIndex = session.turnCount;
    const checkpoint = this.history.checkpoint(session);
    const progress: TurnProgress = {
      state: 'AWAITING_INPUT',
      toolNames: [],
      askedQuestion: false,
      clarifyingQuestion: null,
      emittedText: false,
    };

    const emit = async (event: TurnEvent): Promise<void> => {
      if (signal.aborted || !(await channel.send(event))) {
        throw AppError.cancelled();
      }
      if (event.type === 'text') {
        progress.emittedText = true;
      }
    };

    const enter = async (state: TurnState): Promise<void> => {
      log.debug({ sessionId: session.id, from: progress.state, to: state }, 'Turn state');
      progress.state = state;
      await emit({ type: 'state', state });
    };

    try {
      let finalText: string;
      this.history.append(session, { role: 'user', content: textContent(userText) });
      this.history.truncate(session);

      await enter('GENERATING_FIRST');
      const first = await this.complete(session, signal);
      const requests = toolRequestsOf(first.content);

      const question = detectQuestion(extractText(first.content));
      progress.askedQuestion = question.asked;
      progress.clarifyingQuestion = question.question;

      if (requests.length === 0) {
        await enter('DIRECT');
        finalText = extractText(first.content);
        this.history.append(session, { role: 'assistant', content: textContent(finalText) });
      } else {
        assertValidRequests(requests);
        await enter('TOOLS_REQUESTED');
        // Requests go into history before execution so their ids persist
        this.history.append(session, { role: 'assistant', content: first.content });
        for (const request of requests) {
          progress.toolNames.push(request.name);
          await emit({ type: 'tool_call', id: request.id, name: request.name, arguments: request.arguments });
        }

        await enter('EXECUTING_TOOLS');
        const results = await this.executor.executeAll(requests, session, signal);
        if (signal.aborted) {
          throw AppError.cancelled();
        }

        for (const result of results) {
          this.history.append(session, toolResultMessage(result));
        }
        for (const result of results) {
          await emit({ type: 'tool_result', id: result.toolCallId, name: result.toolName, success: result.success });
        }

        await enter('GENERATING_FOLLOWUP');
        const followUp = await this.complete(session, signal);
        const ignored = toolRequestsOf(followUp.content);
        if (ignored.length > 0) {
          log.warn(
            { sessionId: session.id, tools: ignored.map(r => r.name) },
            'Follow-up response requested more tools; only one tool round runs per turn',
          );
        }
        finalText = extractText(followUp.content);
        this.history.append(session, { role: 'assistant', content: textContent(finalText) });
      }

      await enter('STREAMING');
      for (const fragment of splitFragments(finalText)) {
        await emit({ type: 'text', fragment });
      }
    } catch (error) {
      return this.failTurn(session, turnIndex, startedAt, checkpoint, progress, channel, error);
    }

    // Past this point the turn is committed; a consumer that stops listening
    // now only misses the end-of-turn signal.
    session.turnCount += 1;
    const classification = this.monitor.classify(turnIndex, progress.askedQuestion, progress.toolNames.length);
    const record = this.recordTurn(session, turnIndex, startedAt, progress, 'completed', classification, null);

    progress.state = 'COMPLETE';
    await channel.send({ type: 'state', state: 'COMPLETE' });
    await channel.send({
      type: 'done',
      sessionId: session.id,
      turnIndex,
      classification,
      toolInvocationCount: progress.toolNames.length,
    });

    return record;
  }

  private async complete(session: Session, signal: AbortSignal): Promise<CompletionResponse> {
    if (signal.aborted) {
      throw AppError.cancelled();
    }

    try {
      return await this.engine.complete([...session.messages], this.registry.toToolSchema(), { signal });
    } catch (error) {
      if (signal.aborted) {
        throw AppError.cancelled();
      }
      if (error instanceof CompletionEngineError) {
        throw error;
      }
      throw new CompletionEngineError(`${this.engine.name} completion failed: ${errorMessage(error)}`, error);
    }
  }

  private async failTurn(
    session: Session,
    turnIndex: number,
    startedAt: number,
    checkpoint: HistoryCheckpoint,
    progress: TurnProgress,
    channel: BoundedChannel<TurnEvent>,
    error: unknown,
  ): Promise<TurnRecord> {
    this.history.restore(session, checkpoint);

    const appError = toAppError(error);
    const cancelled = appError.code === ErrorCode.TURN_CANCELLED;
    const failedIn = progress.state;
    progress.state = 'FAILED';

    if (cancelled) {
      log.info({ sessionId: session.id, state: failedIn }, 'Turn cancelled, history rolled back');
    } else {
      log.error(
        { sessionId: session.id, state: failedIn, code: appError.code, err: appError.message },
        'Turn failed, history rolled back',
      );
    }

    const record = this.recordTurn(
      session,
      turnIndex,
      startedAt,
      progress,
      cancelled ? 'cancelled' : 'failed',
      null,
      appError.message,
    );

    if (!cancelled) {
      await channel.send({ type: 'state', state: 'FAILED' });
      await channel.send({
        type: 'failed',
        sessionId: session.id,
        code: appError.code,
        reason: appError.message,
        partialOutput: progress.emittedText,
      });
    }

    return record;
  }

  private recordTurn(
    session: Session,
    turnIndex: number,
    startedAt: number,
    progress: TurnProgress,
    outcome: TurnOutcome,
    classification: ProtocolClassification | null,
    error: string | null,
  ): TurnRecord {
    const completed = outcome === 'completed';
    return this.monitor.record({
      sessionId: session.id,
      turnIndex,
      timestamp: new Date().toISOString(),
      toolInvocationCount: completed ? progress.toolNames.length : 0,
      toolNames: completed ? progress.toolNames : [],
      askedQuestion: progress.askedQuestion,
      clarifyingQuestion: progress.clarifyingQuestion,
      classification,
      latencyMs: Date.now() - startedAt,
      outcome,
      error,
    });
  }
}
