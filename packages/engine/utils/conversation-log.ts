// Caller-owned, append-only history of answered questions

import type { IntentType } from '../types/analysis.js';

export interface ConversationEntry {
  question: string;
  answer: string;
  intent: IntentType;
  rowCount: number;
  timestamp: Date;
}

export class ConversationLog {
  private readonly entries: ConversationEntry[] = [];

  append(entry: Omit<ConversationEntry, 'timestamp'>, timestamp = new Date()): ConversationEntry {
    const stored = { ...entry, timestamp };
    this.entries.push(stored);
    return stored;
  }

  /** Newest last */
  list(): readonly ConversationEntry[] {
    return [...this.entries];
  }

  latest(n = 1): readonly ConversationEntry[] {
    return this.entries.slice(-n);
  }

  get size(): number {
    return this.entries.length;
  }
}
