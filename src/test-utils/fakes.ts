import type { ChatMessage, StoredTranscriptEntry, TranscriptRecord } from '../models/types';
import { CompletionError } from '../models/errors';
import type { CompletionErrorKind } from '../models/errors';
import type { CompletionGateway, CompletionOptions } from '../services/ai/completionGateway';
import { REQUEST_PROFILES, type RequestKind } from '../services/ai/promptBuilder';
import {
  fromStoredTranscript,
  toStoredTranscript,
  type TranscriptStore,
} from '../repositories/transcriptRepository';
import {
  parseActiveSession,
  type ActiveSession,
  type ActiveSessionStore,
} from '../repositories/activeSessionRepository';

export interface GatewayCall {
  kind: RequestKind;
  messages: ChatMessage[];
  options: CompletionOptions;
}

function kindOf(options: CompletionOptions): RequestKind {
  const kinds: RequestKind[] = ['question', 'feedback', 'evaluation'];
  const kind = kinds.find((k) => REQUEST_PROFILES[k].maxTokens === options.maxTokens);
  if (!kind) {
    throw new Error(`Unexpected response budget ${options.maxTokens}`);
  }
  return kind;
}

/**
 * Answers question requests with Q1, Q2, ..., feedback with F1, F2, ... and
 * evaluations with a fixed text. `failNext` queues a failure for the next
 * request of a kind.
 */
export class ScriptedGateway implements CompletionGateway {
  calls: GatewayCall[] = [];
  evaluationText = 'Strengths: clear reasoning. Areas for Improvement: more detail.';
  private counters: Record<RequestKind, number> = { question: 0, feedback: 0, evaluation: 0 };
  private failures: Record<RequestKind, CompletionErrorKind[]> = { question: [], feedback: [], evaluation: [] };

  failNext(kind: RequestKind, errorKind: CompletionErrorKind = 'ProviderError'): this {
    this.failures[kind].push(errorKind);
    return this;
  }

  callsOf(kind: RequestKind): GatewayCall[] {
    return this.calls.filter((call) => call.kind === kind);
  }

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    const kind = kindOf(options);
    this.calls.push({ kind, messages, options });

    const failure = this.failures[kind].shift();
    if (failure) {
      throw new CompletionError(failure, `${kind} request failed with ${failure}`);
    }

    this.counters[kind] += 1;
    switch (kind) {
      case 'question':
        return `Q${this.counters.question}`;
      case 'feedback':
        return `F${this.counters.feedback}`;
      case 'evaluation':
        return this.evaluationText;
    }
  }
}

/** Keeps records in their stored shape, the way the database would. */
export class InMemoryTranscriptStore implements TranscriptStore {
  private docs: Array<{ id: string; json: string }> = [];
  failWrites = false;

  async append(record: TranscriptRecord): Promise<string> {
    if (this.failWrites) {
      throw new Error('store unreachable');
    }
    const id = `record-${this.docs.length + 1}`;
    this.docs.push({ id, json: JSON.stringify(toStoredTranscript(record)) });
    return id;
  }

  async list(): Promise<StoredTranscriptEntry[]> {
    return this.docs.map(({ id, json }) => ({ id, record: fromStoredTranscript(JSON.parse(json)) }));
  }

  get size(): number {
    return this.docs.length;
  }
}

export class StaticTranscriptStore implements TranscriptStore {
  constructor(private entries: StoredTranscriptEntry[]) {}

  async append(): Promise<string> {
    throw new Error('read-only');
  }

  async list(): Promise<StoredTranscriptEntry[]> {
    return this.entries;
  }
}

/** Serialises sessions to JSON strings, as the Redis store does. */
export class InMemoryActiveSessionStore implements ActiveSessionStore {
  private sessions = new Map<string, string>();
  failSaves = false;

  async get(sessionId: string): Promise<ActiveSession | null> {
    const json = this.sessions.get(sessionId);
    return json ? parseActiveSession(json) : null;
  }

  async save(session: ActiveSession): Promise<void> {
    if (this.failSaves) {
      throw new Error('Session cache unavailable');
    }
    this.sessions.set(session.sessionId, JSON.stringify(session));
  }
}
