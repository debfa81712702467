// Session and history types

import type { ChatMessage } from '../../providers/types.js';

export interface Session {
  id: string;
  messages: ChatMessage[];
  createdAt: Date;
  lastActiveAt: Date;
  turnCount: number; // completed turns; the next turn's index
}

export interface HistoryCheckpoint {
  messages: ChatMessage[];
  lastActiveAt: Date;
}
