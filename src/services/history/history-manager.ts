// History Manager
// Owns the ordered message sequence of a session and its length bound

import { AppError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { ChatMessage } from '../../providers/types.js';
import { extractText } from '../orchestrator/normalizer.js';
import type { HistoryCheckpoint, Session } from './types.js';

const log = createLogger('history');

// One system message plus at least one conversational message
export const MIN_HISTORY_LENGTH = 2;

export function findLastUserText(messages: readonly ChatMessage[]): string | undefined {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message.role !== 'user') continue;
    const text = extractText(message.content).trim();
    if (text) return text;
  }
  return undefined;
}

export class HistoryManager {
  readonly maxLength: number;

  constructor(maxLength: number) {
    if (!Number.isInteger(maxLength) || maxLength < MIN_HISTORY_LENGTH) {
      throw AppError.configuration(
        `MAX_HISTORY_LENGTH must be an integer >= ${MIN_HISTORY_LENGTH}, got ${maxLength}`,
      );
    }
    this.maxLength = maxLength;
  }

  append(session: Session, message: ChatMessage): void {
    session.messages.push(message);
    session.lastActiveAt = new Date();
  }

  /**
   * Evicts the oldest non-system messages until the history fits in
   * `maxLength`. The system message at index 0 always survives, and so does
   * at least one non-system message. Eviction continues past the bound until
   * the first surviving conversational message is a user message, so a tool
   * result never outlives the request it answers.
   *
   * @returns number of evicted messages
   */
  truncate(session: Session, maxLength: number = this.maxLength): number {
    const messages = session.messages;
    const head = messages[0]?.role === 'system' ? 1 : 0;
    const conversational = messages.length - head;
    const keep = Math.max(1, maxLength - head);

    if (conversational <= keep) {
      return 0;
    }

    let start = head + (conversational - keep);
    while (start < messages.length - 1 && messages[start].role !== 'user') {
      start++;
    }

    session.messages = [...messages.slice(0, head), ...messages.slice(start)];
    const evicted = start - head;

    log.debug({ sessionId: session.id, evicted, length: session.messages.length }, 'History truncated');
    return evicted;
  }

  checkpoint(session: Session): HistoryCheckpoint {
    return {
      messages: [...session.messages],
      lastActiveAt: session.lastActiveAt,
    };
  }

  restore(session: Session, checkpoint: HistoryCheckpoint): void {
    session.messages = [...checkpoint.messages];
    session.lastActiveAt = checkpoint.lastActiveAt;
  }

  lastUserText(session: Session): string | undefined {
    return findLastUserText(session.messages);
  }
}
