import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { ActiveSession, ActiveSessionStore } from '../repositories/activeSessionRepository';
import type { TranscriptStore } from '../repositories/transcriptRepository';
import type { CompletionGateway } from '../services/ai/completionGateway';
import {
  InterviewOrchestrator,
  countAnswered,
  createInitialState,
  getPendingTurnIndex,
} from '../services/interview-orchestrator/interviewOrchestrator';
import { resolveInterviewStyle, validateSessionConfig } from '../services/ai/promptBuilder';
import { interviewConfig } from '../config/services';
import { CompletionError, ValidationError } from '../models/errors';
import type { SessionConfig } from '../models/types';
import { ApiError } from '../middlewares/errorHandler';

export interface SessionControllerDeps {
  activeSessions: ActiveSessionStore;
  transcriptStore: TranscriptStore;
  createGateway: (apiKey?: string) => CompletionGateway;
}

function parseQuestionCount(value: unknown): number {
  if (value === undefined || value === null || value === '') {
    return interviewConfig.defaultQuestionCount;
  }
  return typeof value === 'number' ? value : Number(value);
}

function optionalText(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

export function parseSessionConfig(body: unknown): SessionConfig {
  const input: Record<string, unknown> = typeof body === 'object' && body !== null ? { ...body } : {};

  const config: SessionConfig = {
    jobTitle: typeof input.jobTitle === 'string' ? input.jobTitle.trim() : '',
    style: resolveInterviewStyle(input.style),
    questionCount: parseQuestionCount(input.questionCount),
    model: optionalText(input.model) ?? interviewConfig.defaultModel,
  };
  const participant = optionalText(input.participant);
  if (participant) {
    config.participant = participant;
  }

  validateSessionConfig(config);
  return config;
}

function toSessionView(session: ActiveSession) {
  const { state } = session;
  const pendingIndex = getPendingTurnIndex(state);

  return {
    sessionId: session.sessionId,
    config: session.config,
    phase: state.phase,
    turns: state.turns,
    answeredCount: countAnswered(state),
    pendingQuestion: pendingIndex >= 0 ? state.turns[pendingIndex].question : null,
    evaluation: state.evaluation ?? null,
  };
}

export class SessionController {
  constructor(private deps: SessionControllerDeps) {}

  startSession = async (req: Request, res: Response, next: NextFunction) => {
    let sessionId: string | undefined;
    try {
      const config = parseSessionConfig(req.body);
      sessionId = uuidv4();

      console.log(`\n${'='.repeat(60)}`);
      console.log(`📝 Creating new session: ${sessionId}`);
      console.log(`   Job title: ${config.jobTitle} | Style: ${config.style} | Questions: ${config.questionCount}`);
      console.log(`${'='.repeat(60)}`);

      const session: ActiveSession = {
        sessionId,
        config,
        state: createInitialState(),
        createdAt: new Date().toISOString(),
      };
      // Saved before the first request so a failed start can be retried by id.
      await this.deps.activeSessions.save(session);

      const { state } = await this.orchestratorFor(req).start(session.state, config);
      const started = { ...session, state };
      await this.deps.activeSessions.save(started);

      console.log(`✅ First question generated for session ${sessionId}`);

      res.status(201).json({
        success: true,
        data: toSessionView(started),
      });
    } catch (error) {
      console.error(`❌ Failed to start session:`, error instanceof Error ? error.message : error);
      if (error instanceof CompletionError && sessionId) {
        error.withDetails({ sessionId });
      }
      next(error);
    }
  };

  retryStart = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await this.loadSession(req.params.sessionId);

      const { state, alreadyStarted } = await this.orchestratorFor(req).start(session.state, session.config);
      const updated = { ...session, state };
      if (!alreadyStarted) {
        await this.deps.activeSessions.save(updated);
      }

      res.json({
        success: true,
        data: { ...toSessionView(updated), alreadyStarted },
      });
    } catch (error) {
      next(error);
    }
  };

  submitAnswer = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await this.loadSession(req.params.sessionId);
      const answer: unknown = req.body?.answer;

      if (typeof answer !== 'string') {
        throw new ValidationError('Answer is required');
      }

      const outcome = await this.orchestratorFor(req).submitAnswer(session.state, answer);
      const updated = { ...session, state: outcome.state };

      if (outcome.completed) {
        console.log(`✓ Interview completed for session ${session.sessionId}`);
        // The transcript is already stored; a failed cache write must not fail the request.
        try {
          await this.deps.activeSessions.save(updated);
        } catch (error) {
          console.error(`❌ Failed to cache completed session ${session.sessionId}:`, error);
        }
      } else {
        await this.deps.activeSessions.save(updated);
      }

      res.json({
        success: true,
        data: {
          ...toSessionView(updated),
          completed: outcome.completed,
          recordId: outcome.recordId ?? null,
          ...(outcome.warning
            ? { warning: { kind: outcome.warning.kind, message: outcome.warning.message } }
            : {}),
        },
      });
    } catch (error) {
      next(error);
    }
  };

  resetSession = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await this.loadSession(req.params.sessionId);
      const updated = { ...session, state: this.orchestratorFor(req).reset() };
      await this.deps.activeSessions.save(updated);

      res.json({
        success: true,
        data: toSessionView(updated),
      });
    } catch (error) {
      next(error);
    }
  };

  getSession = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await this.loadSession(req.params.sessionId);

      res.json({
        success: true,
        data: toSessionView(session),
      });
    } catch (error) {
      next(error);
    }
  };

  private orchestratorFor(req: Request): InterviewOrchestrator {
    const gateway = this.deps.createGateway(req.header('x-groq-api-key'));
    return new InterviewOrchestrator(gateway, this.deps.transcriptStore);
  }

  private async loadSession(sessionId: string): Promise<ActiveSession> {
    const session = await this.deps.activeSessions.get(sessionId);
    if (!session) {
      throw new ApiError(404, 'Session not found', { kind: 'NotFound' });
    }
    return session;
  }
}
