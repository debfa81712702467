// Protocol Monitor
// Classifies each turn against the "ask a clarifying question, then wait"
// protocol and keeps per-session metrics for the process lifetime.
// Classification is advisory: it never changes how a turn runs.

import * as fs from 'fs/promises';
import * as path from 'path';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('protocol-monitor');

export enum ProtocolClassification {
  COMPLIANT = 'compliant',
  VIOLATED = 'violated',
  PARTIAL = 'partial',
}

export type TurnOutcome = 'completed' | 'failed' | 'cancelled';

export interface TurnRecord {
  readonly sessionId: string;
  readonly turnIndex: number;
  readonly timestamp: string;
  readonly toolInvocationCount: number;
  readonly toolNames: readonly string[];
  readonly askedQuestion: boolean;
  readonly clarifyingQuestion: string | null;
  readonly classification: ProtocolClassification | null; // null unless completed
  readonly latencyMs: number;
  readonly outcome: TurnOutcome;
  readonly error: string | null;
}

export interface SessionMetrics {
  sessionId: string;
  turnCount: number;
  toolInvocationCount: number;
  violationCount: number;
  averageLatencyMs: number;
  failedTurnCount: number;
  cancelledTurnCount: number;
  toolsUsed: string[];
  startedAt: string;
  lastTurnAt: string;
}

export interface MetricsSummary {
  totalSessions: number;
  totalTurns: number;
  totalToolCalls: number;
  protocolViolations: number;
  failedTurns: number;
}

export interface MetricsSnapshot {
  generatedAt: string;
  sessions: Record<string, SessionMetrics>;
  records: TurnRecord[];
  summary: MetricsSummary;
}

interface SessionAccumulator {
  startedAt: string;
  lastTurnAt: string;
  turnCount: number;
  toolInvocationCount: number;
  violationCount: number;
  totalLatencyMs: number;
  failedTurnCount: number;
  cancelledTurnCount: number;
  toolsUsed: Set<string>;
}

export interface QuestionDetection {
  asked: boolean;
  question: string | null;
}

/**
 * Interrogative heuristic: any "?" counts as a question. The first line
 * containing one is reported as the clarifying question.
 */
export function detectQuestion(text: string): QuestionDetection {
  if (!text.includes('?')) {
    return { asked: false, question: null };
  }
  const line = text.split('\n').find(candidate => candidate.includes('?'));
  return { asked: true, question: line ? line.trim() : null };
}

/**
 * Only the opening turn (`turnIndex === 0`) is bound by the protocol. Tool use
 * on that turn is a violation; asking in the same breath is still only
 * PARTIAL compliance, because the agent did not wait for the answer.
 */
export function classify(
  turnIndex: number,
  askedQuestion: boolean,
  toolInvocationCount: number,
): ProtocolClassification {
  if (turnIndex > 0) {
    return ProtocolClassification.COMPLIANT;
  }
  if (toolInvocationCount > 0) {
    return askedQuestion ? ProtocolClassification.PARTIAL : ProtocolClassification.VIOLATED;
  }
  return ProtocolClassification.COMPLIANT;
}

export function isViolation(classification: ProtocolClassification | null): boolean {
  return classification === ProtocolClassification.VIOLATED
    || classification === ProtocolClassification.PARTIAL;
}

export interface ProtocolMonitorOptions {
  maxRecords?: number;
}

export class ProtocolMonitor {
  private readonly records: TurnRecord[] = [];
  private readonly sessions = new Map<string, SessionAccumulator>();
  private readonly maxRecords: number;

  constructor(options: ProtocolMonitorOptions = {}) {
    this.maxRecords = options.maxRecords ?? 5000;
  }

  classify(turnIndex: number, askedQuestion: boolean, toolInvocationCount: number): ProtocolClassification {
    return classify(turnIndex, askedQuestion, toolInvocationCount);
  }

  record(record: TurnRecord): TurnRecord {
    const frozen = Object.freeze({ ...record, toolNames: Object.freeze([...record.toolNames]) });
    this.records.push(frozen);
    if (this.records.length > this.maxRecords) {
      this.records.shift();
    }

    const session = this.accumulatorFor(record.sessionId, record.timestamp);
    session.lastTurnAt = record.timestamp;

    switch (record.outcome) {
      case 'completed':
        session.turnCount += 1;
        session.totalLatencyMs += record.latencyMs;
        session.toolInvocationCount += record.toolInvocationCount;
        for (const name of record.toolNames) session.toolsUsed.add(name);
        if (isViolation(record.classification)) session.violationCount += 1;
        break;
      case 'failed':
        session.failedTurnCount += 1;
        break;
      case 'cancelled':
        session.cancelledTurnCount += 1;
        break;
    }

    const context = {
      sessionId: record.sessionId,
      turnIndex: record.turnIndex,
      classification: record.classification,
      tools: record.toolInvocationCount,
      latencyMs: Math.round(record.latencyMs),
      outcome: record.outcome,
    };
    log.info(context, 'Turn recorded');

    if (isViolation(record.classification)) {
      log.warn(
        { ...context, toolNames: record.toolNames },
        `Protocol violation: ${record.toolInvocationCount} tool call(s) on the opening turn before a clarifying answer`,
      );
    }

    return frozen;
  }

  getSessionMetrics(sessionId: string): SessionMetrics | undefined {
    const session = this.sessions.get(sessionId);
    return session ? this.toMetrics(sessionId, session) : undefined;
  }

  getAllMetrics(): Record<string, SessionMetrics> {
    const metrics: Record<string, SessionMetrics> = {};
    for (const [sessionId, session] of this.sessions) {
      metrics[sessionId] = this.toMetrics(sessionId, session);
    }
    return metrics;
  }

  getRecords(sessionId?: string): TurnRecord[] {
    return sessionId
      ? this.records.filter(record => record.sessionId === sessionId)
      : [...this.records];
  }

  summary(): MetricsSummary {
    let totalTurns = 0;
    let totalToolCalls = 0;
    let protocolViolations = 0;
    let failedTurns = 0;
    for (const session of this.sessions.values()) {
      totalTurns += session.turnCount;
      totalToolCalls += session.toolInvocationCount;
      protocolViolations += session.violationCount;
      failedTurns += session.failedTurnCount;
    }
    return {
      totalSessions: this.sessions.size,
      totalTurns,
      totalToolCalls,
      protocolViolations,
      failedTurns,
    };
  }

  exportMetrics(): MetricsSnapshot {
    return {
      generatedAt: new Date().toISOString(),
      sessions: this.getAllMetrics(),
      records: [...this.records],
      summary: this.summary(),
    };
  }

  /** Writes the snapshot as `metrics_<timestamp>.json` in `directory`. */
  async exportMetricsToFile(directory: string): Promise<string> {
    const snapshot = this.exportMetrics();
    const stamp = snapshot.generatedAt.replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
    const outputPath = path.resolve(directory, `metrics_${stamp}.json`);

    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, JSON.stringify(snapshot, null, 2), 'utf8');

    log.info({ path: outputPath }, 'Metrics exported');
    return outputPath;
  }

  forget(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  private accumulatorFor(sessionId: string, timestamp: string): SessionAccumulator {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;

    const created: SessionAccumulator = {
      startedAt: timestamp,
      lastTurnAt: timestamp,
      turnCount: 0,
      toolInvocationCount: 0,
      violationCount: 0,
      totalLatencyMs: 0,
      failedTurnCount: 0,
      cancelledTurnCount: 0,
      toolsUsed: new Set(),
    };
    this.sessions.set(sessionId, created);
    return created;
  }

  private toMetrics(sessionId: string, session: SessionAccumulator): SessionMetrics {
    return {
      sessionId,
      turnCount: session.turnCount,
      toolInvocationCount: session.toolInvocationCount,
      violationCount: session.violationCount,
      averageLatencyMs: session.turnCount > 0 ? session.totalLatencyMs / session.turnCount : 0,
      failedTurnCount: session.failedTurnCount,
      cancelledTurnCount: session.cancelledTurnCount,
      toolsUsed: Array.from(session.toolsUsed),
      startedAt: session.startedAt,
      lastTurnAt: session.lastTurnAt,
    };
  }
}
