import type { SessionConfig, SessionState, TranscriptRecord, Turn } from '../../models/types';
import { CompletionError, StoreWriteFailed, ValidationError } from '../../models/errors';
import type { CompletionGateway } from '../ai/completionGateway';
import type { TranscriptStore } from '../../repositories/transcriptRepository';
import {
  REQUEST_PROFILES,
  buildEvaluationPrompt,
  buildFeedbackPrompt,
  buildQuestionPrompt,
  validateSessionConfig,
} from '../ai/promptBuilder';

export interface StartOutcome {
  state: SessionState;
  /** True when the session was already running and nothing was requested. */
  alreadyStarted: boolean;
}

export interface SubmitOutcome {
  state: SessionState;
  completed: boolean;
  record?: TranscriptRecord;
  /** Store-assigned id of the saved transcript, null when storage is disabled. */
  recordId?: string | null;
  /** Set when the interview completed but the transcript could not be saved. */
  warning?: StoreWriteFailed;
}

export function createInitialState(): SessionState {
  return { phase: 'NotStarted', turns: [] };
}

export function getPendingTurnIndex(state: SessionState): number {
  const last = state.turns.length - 1;
  if (last >= 0 && state.turns[last].answer === undefined) {
    return last;
  }
  return -1;
}

export function countAnswered(state: SessionState): number {
  return state.turns.filter((turn) => turn.answer !== undefined).length;
}

/**
 * Drives one interview from NotStarted through question/answer/feedback turns
 * to Completed. Every operation takes the current state and returns a new
 * one; the state passed in is never modified, so a rejected call leaves the
 * caller holding exactly what it had before.
 */
export class InterviewOrchestrator {
  constructor(
    private gateway: CompletionGateway,
    private transcriptStore: TranscriptStore,
    private clock: () => Date = () => new Date()
  ) {}

  async start(state: SessionState, config: SessionConfig): Promise<StartOutcome> {
    if (state.phase !== 'NotStarted') {
      return { state, alreadyStarted: true };
    }

    validateSessionConfig(config);

    const question = await this.gateway.complete(buildQuestionPrompt(config, []), {
      model: config.model,
      ...REQUEST_PROFILES.question,
    });

    return {
      state: {
        phase: 'InProgress',
        config: { ...config },
        turns: [{ question }],
      },
      alreadyStarted: false,
    };
  }

  async submitAnswer(state: SessionState, answer: string): Promise<SubmitOutcome> {
    const config = state.config;
    const pendingIndex = getPendingTurnIndex(state);

    if (state.phase !== 'InProgress' || !config || pendingIndex < 0) {
      throw new ValidationError('There is no question waiting for an answer');
    }
    if (!answer.trim()) {
      throw new ValidationError('Please provide an answer');
    }

    const pending = state.turns[pendingIndex];
    const answered: Turn = { question: pending.question, answer };

    const feedback = await this.requestFeedback(config, pending.question, answer);
    if (feedback !== undefined) {
      answered.feedback = feedback;
    }

    const turns = [...state.turns.slice(0, pendingIndex), answered];
    const answeredCount = turns.length;

    if (answeredCount < config.questionCount) {
      const question = await this.withRollback(answer, () =>
        this.gateway.complete(buildQuestionPrompt(config, turns), {
          model: config.model,
          ...REQUEST_PROFILES.question,
        })
      );

      return {
        state: { phase: 'InProgress', config, turns: [...turns, { question }] },
        completed: false,
      };
    }

    const evaluation = await this.withRollback(answer, () =>
      this.gateway.complete(buildEvaluationPrompt(config, turns), {
        model: config.model,
        ...REQUEST_PROFILES.evaluation,
      })
    );

    const completedState: SessionState = { phase: 'Completed', config, turns, evaluation };
    const record = this.buildRecord(config, turns, evaluation);

    try {
      const recordId = await this.transcriptStore.append(record);
      return { state: completedState, completed: true, record, recordId };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`[InterviewOrchestrator] Failed to store interview session: ${reason}`);
      return {
        state: completedState,
        completed: true,
        record,
        warning: new StoreWriteFailed(`Failed to store interview session: ${reason}`, { cause: error }),
      };
    }
  }

  reset(): SessionState {
    return createInitialState();
  }

  private async requestFeedback(
    config: SessionConfig,
    question: string,
    answer: string
  ): Promise<string | undefined> {
    try {
      return await this.gateway.complete(buildFeedbackPrompt(question, answer), {
        model: config.model,
        ...REQUEST_PROFILES.feedback,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`[InterviewOrchestrator] Error getting per-question feedback: ${reason}`);
      return undefined;
    }
  }

  /**
   * Runs a request that decides whether the tentative answer is kept. On
   * failure the answer is handed back on the error so the host can offer it
   * for resubmission.
   */
  private async withRollback<T>(answer: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      if (error instanceof CompletionError) {
        throw error.withDetails({ answer });
      }
      throw error;
    }
  }

  private buildRecord(config: SessionConfig, turns: Turn[], evaluation: string): TranscriptRecord {
    return {
      participant: config.participant?.trim() || 'Anonymous',
      jobTitle: config.jobTitle,
      model: config.model,
      turns: turns.map((turn) => ({ ...turn })),
      evaluation,
      timestamp: this.clock().toISOString(),
    };
  }
}
