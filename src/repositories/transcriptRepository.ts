import InterviewRecord, { type IInterviewRecord } from '../models/InterviewRecord';
import type { StoredTranscriptEntry, TranscriptRecord, Turn } from '../models/types';

/**
 * Append-only sink for finished interviews. Records are never updated or
 * deleted through this interface.
 */
export interface TranscriptStore {
  /** Resolves to the store-assigned id, or null when nothing was written. */
  append(record: TranscriptRecord): Promise<string | null>;
  list(): Promise<StoredTranscriptEntry[]>;
}

export function toStoredTranscript(record: TranscriptRecord): IInterviewRecord {
  return {
    participant: record.participant,
    job_title: record.jobTitle,
    questions: record.turns.map((t) => t.question),
    answers: record.turns.map((t) => t.answer ?? ''),
    feedback: record.turns.map((t) => t.feedback ?? null),
    evaluation: record.evaluation,
    model: record.model,
    timestamp: record.timestamp,
  };
}

/** Reads a stored document, filling in anything an older writer left out. */
export function fromStoredTranscript(doc: Partial<IInterviewRecord>): TranscriptRecord {
  const questions = doc.questions ?? [];
  const answers = doc.answers ?? [];
  const feedback = doc.feedback ?? [];

  const turns = questions.map((question, i): Turn => {
    const turn: Turn = { question };
    const answer = answers[i];
    if (typeof answer === 'string') turn.answer = answer;
    const note = feedback[i];
    if (typeof note === 'string') turn.feedback = note;
    return turn;
  });

  return {
    participant: doc.participant ?? 'Anonymous',
    jobTitle: doc.job_title ?? '',
    model: doc.model ?? '',
    turns,
    evaluation: doc.evaluation ?? '',
    timestamp: doc.timestamp ?? '',
  };
}

export class MongoTranscriptStore implements TranscriptStore {
  async append(record: TranscriptRecord): Promise<string> {
    const created = await InterviewRecord.create(toStoredTranscript(record));
    return created._id.toString();
  }

  async list(): Promise<StoredTranscriptEntry[]> {
    const docs = await InterviewRecord.find().lean();
    return docs.map((doc) => ({
      id: doc._id.toString(),
      record: fromStoredTranscript(doc),
    }));
  }
}

/** Stand-in used when no database is configured. */
export class NullTranscriptStore implements TranscriptStore {
  async append(record: TranscriptRecord): Promise<null> {
    console.log(`[TranscriptStore] Database not configured. Skipping storage of "${record.jobTitle}" interview.`);
    return null;
  }

  async list(): Promise<StoredTranscriptEntry[]> {
    return [];
  }
}
