export const INTERVIEW_STYLES = ['General', 'Technical', 'BehavioralSTAR'] as const;

export type InterviewStyle = (typeof INTERVIEW_STYLES)[number];

export type InterviewPhase = 'NotStarted' | 'InProgress' | 'Completed';

export interface SessionConfig {
  jobTitle: string;
  style: InterviewStyle;
  questionCount: number;
  model: string;
  participant?: string;
}

export interface Turn {
  question: string;
  answer?: string;
  feedback?: string;
}

export interface SessionState {
  phase: InterviewPhase;
  config?: SessionConfig;
  turns: Turn[];
  evaluation?: string;
}

export interface TranscriptRecord {
  participant: string;
  jobTitle: string;
  model: string;
  turns: Turn[];
  evaluation: string;
  timestamp: string;
}

export interface ChatMessage {
  role: 'system' | 'assistant' | 'user';
  content: string;
}

export interface StoredTranscriptEntry {
  id: string;
  record: TranscriptRecord;
}
