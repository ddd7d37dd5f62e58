import { describe, it, expect, beforeEach, vi } from 'vitest';
import * as fc from 'fast-check';
import {
  InterviewOrchestrator,
  countAnswered,
  createInitialState,
  getPendingTurnIndex,
} from './interviewOrchestrator';
import { CompletionError, ValidationError } from '../../models/errors';
import type { SessionConfig, SessionState } from '../../models/types';
import { InMemoryTranscriptStore, ScriptedGateway } from '../../test-utils/fakes';

const config: SessionConfig = {
  jobTitle: 'Backend Engineer',
  style: 'Technical',
  questionCount: 2,
  model: 'llama-3.3-70b-versatile',
};

const fixedClock = () => new Date('2026-10-19T13:13:00.000Z');

function expectInvariants(state: SessionState, questionCount: number): void {
  const questions = state.turns.length;
  const answers = state.turns.filter((t) => t.answer !== undefined).length;
  const feedback = state.turns.filter((t) => t.feedback !== undefined).length;

  expect(answers).toBeLessThanOrEqual(questions);
  expect(questions).toBeLessThanOrEqual(answers + 1);
  expect(feedback).toBeLessThanOrEqual(answers);

  const completed = state.phase === 'Completed';
  expect(state.evaluation !== undefined).toBe(completed);
  if (state.phase !== 'NotStarted') {
    expect(answers === questionCount).toBe(completed);
  }
}

describe('InterviewOrchestrator', () => {
  let gateway: ScriptedGateway;
  let store: InMemoryTranscriptStore;
  let orchestrator: InterviewOrchestrator;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    gateway = new ScriptedGateway();
    store = new InMemoryTranscriptStore();
    orchestrator = new InterviewOrchestrator(gateway, store, fixedClock);
  });

  describe('start', () => {
    it('asks the first question and moves to InProgress', async () => {
      const { state, alreadyStarted } = await orchestrator.start(createInitialState(), config);

      expect(alreadyStarted).toBe(false);
      expect(state).toEqual({ phase: 'InProgress', config, turns: [{ question: 'Q1' }] });
      expect(gateway.calls).toHaveLength(1);
      expect(gateway.calls[0].options).toEqual({ model: config.model, maxTokens: 150, temperature: 0.7 });
      expect(gateway.calls[0].messages.at(-1)?.content).toBe('Please ask me the first question.');
    });

    it('does not call the gateway again once started', async () => {
      const { state } = await orchestrator.start(createInitialState(), config);
      const again = await orchestrator.start(state, config);

      expect(again.alreadyStarted).toBe(true);
      expect(again.state).toBe(state);
      expect(gateway.calls).toHaveLength(1);
    });

    it('leaves the session NotStarted when the first question fails', async () => {
      const initial = createInitialState();
      gateway.failNext('question', 'AuthenticationFailed');

      await expect(orchestrator.start(initial, config)).rejects.toMatchObject({ kind: 'AuthenticationFailed' });
      expect(initial).toEqual({ phase: 'NotStarted', turns: [] });
    });

    it('rejects an invalid config without calling the gateway', async () => {
      await expect(orchestrator.start(createInitialState(), { ...config, jobTitle: '' })).rejects.toBeInstanceOf(
        ValidationError
      );
      await expect(orchestrator.start(createInitialState(), { ...config, questionCount: 11 })).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(gateway.calls).toHaveLength(0);
    });
  });

  describe('reset', () => {
    it('returns the same NotStarted state as a fresh session', async () => {
      await orchestrator.start(createInitialState(), config);

      expect(orchestrator.reset()).toEqual(createInitialState());
    });

    it('does not touch stored transcripts', async () => {
      let { state } = await orchestrator.start(createInitialState(), { ...config, questionCount: 1 });
      ({ state } = await orchestrator.submitAnswer(state, 'Done'));
      orchestrator.reset();

      expect(store.size).toBe(1);
    });
  });

  describe('submitAnswer', () => {
    it('runs a two-question technical interview to completion', async () => {
      const started = await orchestrator.start(createInitialState(), config);

      const first = await orchestrator.submitAnswer(started.state, "I'd use a hash map");
      expect(first.completed).toBe(false);
      expect(first.state.phase).toBe('InProgress');
      expect(first.state.turns).toEqual([
        { question: 'Q1', answer: "I'd use a hash map", feedback: 'F1' },
        { question: 'Q2' },
      ]);
      expect(countAnswered(first.state)).toBe(1);

      const second = await orchestrator.submitAnswer(first.state, "I'd shard by key");
      expect(second.completed).toBe(true);
      expect(second.state.phase).toBe('Completed');
      expect(second.state.evaluation).toBe(gateway.evaluationText);
      expect(second.recordId).toBe('record-1');
      expect(second.record).toEqual({
        participant: 'Anonymous',
        jobTitle: 'Backend Engineer',
        model: 'llama-3.3-70b-versatile',
        turns: [
          { question: 'Q1', answer: "I'd use a hash map", feedback: 'F1' },
          { question: 'Q2', answer: "I'd shard by key", feedback: 'F2' },
        ],
        evaluation: gateway.evaluationText,
        timestamp: '2026-10-19T13:13:00.000Z',
      });

      expect(gateway.calls.map((c) => c.kind)).toEqual([
        'question',
        'feedback',
        'question',
        'feedback',
        'evaluation',
      ]);
      expect(gateway.callsOf('evaluation')[0].options).toEqual({
        model: config.model,
        maxTokens: 500,
        temperature: 0.5,
      });
    });

    it('round-trips the finished transcript through the store', async () => {
      let { state } = await orchestrator.start(createInitialState(), { ...config, participant: 'Sam' });
      gateway.failNext('feedback');
      ({ state } = await orchestrator.submitAnswer(state, 'First answer'));
      const outcome = await orchestrator.submitAnswer(state, 'Second answer');

      const listed = await store.list();
      expect(listed).toHaveLength(1);
      expect(listed[0]).toEqual({ id: outcome.recordId, record: outcome.record });
      expect(listed[0].record.participant).toBe('Sam');
      expect(listed[0].record.turns[0]).toEqual({ question: 'Q1', answer: 'First answer' });
    });

    it('keeps going without feedback when the feedback request fails', async () => {
      const { state } = await orchestrator.start(createInitialState(), config);
      gateway.failNext('feedback', 'RateLimited');

      const outcome = await orchestrator.submitAnswer(state, 'An answer');

      expect(outcome.state.turns).toEqual([{ question: 'Q1', answer: 'An answer' }, { question: 'Q2' }]);
      expect(console.warn).toHaveBeenCalledWith(
        '[InterviewOrchestrator] Error getting per-question feedback: feedback request failed with RateLimited'
      );
    });

    it('rolls back the answer when the next question is rate limited', async () => {
      const { state } = await orchestrator.start(createInitialState(), config);
      const before = JSON.stringify(state);
      gateway.failNext('question', 'RateLimited');

      const attempt = orchestrator.submitAnswer(state, "I'd use a hash map");

      await expect(attempt).rejects.toBeInstanceOf(CompletionError);
      await expect(attempt).rejects.toMatchObject({
        kind: 'RateLimited',
        details: { answer: "I'd use a hash map" },
      });
      expect(JSON.stringify(state)).toBe(before);
      expect(gateway.callsOf('feedback')).toHaveLength(1);

      const retried = await orchestrator.submitAnswer(state, "I'd use a hash map");
      expect(retried.state.turns).toEqual([
        { question: 'Q1', answer: "I'd use a hash map", feedback: 'F2' },
        { question: 'Q2' },
      ]);
    });

    it('rolls back the final answer when the evaluation fails', async () => {
      let { state } = await orchestrator.start(createInitialState(), config);
      ({ state } = await orchestrator.submitAnswer(state, 'First'));
      const before = JSON.stringify(state);
      gateway.failNext('evaluation', 'ProviderError');

      await expect(orchestrator.submitAnswer(state, 'Second')).rejects.toMatchObject({
        kind: 'ProviderError',
        details: { answer: 'Second' },
      });
      expect(JSON.stringify(state)).toBe(before);
      expect(state.phase).toBe('InProgress');
      expect(store.size).toBe(0);

      const retried = await orchestrator.submitAnswer(state, 'Second');
      expect(retried.state.phase).toBe('Completed');
      expect(store.size).toBe(1);
    });

    it('completes with a warning when the transcript cannot be stored', async () => {
      let { state } = await orchestrator.start(createInitialState(), { ...config, questionCount: 1 });
      store.failWrites = true;

      const outcome = await orchestrator.submitAnswer(state, 'Only answer');
      state = outcome.state;

      expect(state.phase).toBe('Completed');
      expect(outcome.completed).toBe(true);
      expect(outcome.recordId).toBeUndefined();
      expect(outcome.warning).toMatchObject({
        kind: 'StoreWriteFailed',
        message: 'Failed to store interview session: store unreachable',
      });
    });

    it('ignores a whitespace-only answer', async () => {
      const { state } = await orchestrator.start(createInitialState(), config);

      await expect(orchestrator.submitAnswer(state, ' \n\t ')).rejects.toThrow('Please provide an answer');
      expect(countAnswered(state)).toBe(0);
      expect(gateway.calls).toHaveLength(1);
    });

    it('refuses answers before the interview starts and after it ends', async () => {
      await expect(orchestrator.submitAnswer(createInitialState(), 'Hello')).rejects.toThrow(
        'There is no question waiting for an answer'
      );

      let { state } = await orchestrator.start(createInitialState(), { ...config, questionCount: 1 });
      ({ state } = await orchestrator.submitAnswer(state, 'Done'));
      await expect(orchestrator.submitAnswer(state, 'One more')).rejects.toBeInstanceOf(ValidationError);
    });

    it('does not modify the state it was given', async () => {
      const { state } = await orchestrator.start(createInitialState(), config);
      const snapshot = structuredClone(state);

      await orchestrator.submitAnswer(state, 'An answer');

      expect(state).toEqual(snapshot);
      expect(getPendingTurnIndex(state)).toBe(0);
    });
  });

  describe('invariants', () => {
    it('hold across any sequence of answers and provider failures', async () => {
      const step = fc.record({
        answer: fc.oneof(fc.constantFrom('', '   ', '\n'), fc.string({ maxLength: 20 })),
        failFeedback: fc.boolean(),
        failNext: fc.boolean(),
      });

      await fc.assert(
        fc.asyncProperty(fc.integer({ min: 1, max: 5 }), fc.array(step, { maxLength: 12 }), async (questionCount, steps) => {
          const scripted = new ScriptedGateway();
          const machine = new InterviewOrchestrator(scripted, new InMemoryTranscriptStore(), fixedClock);
          let { state } = await machine.start(createInitialState(), { ...config, questionCount });
          expectInvariants(state, questionCount);

          for (const { answer, failFeedback, failNext } of steps) {
            if (failFeedback) scripted.failNext('feedback');
            if (failNext) {
              scripted.failNext('question', 'RateLimited');
              scripted.failNext('evaluation', 'RateLimited');
            }

            const before = JSON.stringify(state);
            const answeredBefore = countAnswered(state);
            try {
              ({ state } = await machine.submitAnswer(state, answer));
            } catch {
              expect(JSON.stringify(state)).toBe(before);
            }
            if (!answer.trim()) {
              expect(countAnswered(state)).toBe(answeredBefore);
            }
            expectInvariants(state, questionCount);
          }
        }),
        { numRuns: 100 }
      );
    });

    it('completes after exactly questionCount successful answers', async () => {
      await fc.assert(
        fc.asyncProperty(fc.integer({ min: 1, max: 10 }), async (questionCount) => {
          const machine = new InterviewOrchestrator(new ScriptedGateway(), new InMemoryTranscriptStore(), fixedClock);
          let { state } = await machine.start(createInitialState(), { ...config, questionCount });

          for (let i = 1; i <= questionCount; i++) {
            expect(state.phase).toBe('InProgress');
            ({ state } = await machine.submitAnswer(state, `Answer ${i}`));
          }

          expect(state.phase).toBe('Completed');
          expect(state.evaluation).toBeTruthy();
          expect(state.turns).toHaveLength(questionCount);
        }),
        { numRuns: 20 }
      );
    });
  });
});
