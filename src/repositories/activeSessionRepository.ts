import { getRedisClient } from '../config/redis';
import { redisConfig } from '../config/services';
import { INTERVIEW_STYLES } from '../models/types';
import type { InterviewPhase, SessionConfig, SessionState, Turn } from '../models/types';

/** A live interview as kept between HTTP requests. */
export interface ActiveSession {
  sessionId: string;
  config: SessionConfig;
  state: SessionState;
  createdAt: string;
}

export interface ActiveSessionStore {
  get(sessionId: string): Promise<ActiveSession | null>;
  save(session: ActiveSession): Promise<void>;
}

const PHASES: readonly InterviewPhase[] = ['NotStarted', 'InProgress', 'Completed'];

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

function isSessionConfig(value: unknown): value is SessionConfig {
  return (
    isObject(value) &&
    typeof value.jobTitle === 'string' &&
    INTERVIEW_STYLES.some((style) => style === value.style) &&
    typeof value.questionCount === 'number' &&
    typeof value.model === 'string' &&
    optionalString(value.participant)
  );
}

function isTurn(value: unknown): value is Turn {
  return (
    isObject(value) &&
    typeof value.question === 'string' &&
    optionalString(value.answer) &&
    optionalString(value.feedback)
  );
}

function isSessionState(value: unknown): value is SessionState {
  return (
    isObject(value) &&
    PHASES.some((phase) => phase === value.phase) &&
    (value.config === undefined || isSessionConfig(value.config)) &&
    Array.isArray(value.turns) &&
    value.turns.every(isTurn) &&
    optionalString(value.evaluation)
  );
}

export function parseActiveSession(json: string): ActiveSession | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    console.error('[ActiveSessionStore] Discarding unreadable session payload:', error);
    return null;
  }

  if (!isObject(parsed)) return null;

  const { sessionId, config, state, createdAt } = parsed;
  if (
    typeof sessionId === 'string' &&
    isSessionConfig(config) &&
    isSessionState(state) &&
    typeof createdAt === 'string'
  ) {
    return { sessionId, config, state, createdAt };
  }
  return null;
}

export class RedisActiveSessionStore implements ActiveSessionStore {
  private key(sessionId: string): string {
    return `interview:${sessionId}`;
  }

  async get(sessionId: string): Promise<ActiveSession | null> {
    const redis = getRedisClient();
    const json = await redis.get(this.key(sessionId));

    if (!json) return null;

    return parseActiveSession(json);
  }

  async save(session: ActiveSession): Promise<void> {
    const redis = getRedisClient();
    await redis.set(
      this.key(session.sessionId),
      JSON.stringify(session),
      { EX: redisConfig.sessionTtlSeconds }
    );
  }
}
