import { describe, it, expect } from 'vitest';
import {
  FEEDBACK_LEAD_IN,
  REQUEST_PROFILES,
  buildEvaluationPrompt,
  buildFeedbackPrompt,
  buildQuestionPrompt,
  resolveInterviewStyle,
  validateSessionConfig,
} from './promptBuilder';
import { ValidationError } from '../../models/errors';
import type { SessionConfig } from '../../models/types';

const technical: SessionConfig = {
  jobTitle: 'Backend Engineer',
  style: 'Technical',
  questionCount: 2,
  model: 'llama-3.3-70b-versatile',
};

describe('buildQuestionPrompt', () => {
  it('asks for the first question when nothing has been answered', () => {
    const messages = buildQuestionPrompt(technical, []);

    expect(messages).toEqual([
      {
        role: 'system',
        content:
          'You are an expert interviewer for a Backend Engineer position. ' +
          'You will conduct a mock interview with a total of 2 questions. ' +
          'Ask one concise, relevant interview question at a time. ' +
          'Do not number your questions. ' +
          "Base your next question on the candidate's previous answers. " +
          'This is a technical interview. Ask a technical question related to the job, ' +
          'testing their knowledge and problem-solving skills.',
      },
      { role: 'user', content: 'Please ask me the first question.' },
    ]);
  });

  it('replays answered turns as assistant/user pairs without feedback', () => {
    const messages = buildQuestionPrompt(technical, [
      { question: 'How would you cache lookups?', answer: "I'd use a hash map", feedback: 'Good start.' },
    ]);

    expect(messages.slice(1)).toEqual([
      { role: 'assistant', content: 'How would you cache lookups?' },
      { role: 'user', content: "I'd use a hash map" },
      { role: 'user', content: 'Please ask me the next question.' },
    ]);
    expect(messages.some((m) => m.content.includes('Good start.'))).toBe(false);
  });

  it('ignores a pending question with no answer', () => {
    const messages = buildQuestionPrompt(technical, [
      { question: 'Q1', answer: 'A1' },
      { question: 'Q2' },
    ]);

    expect(messages.map((m) => m.content).slice(1)).toEqual(['Q1', 'A1', 'Please ask me the next question.']);
  });

  it('requires STAR phrasing for behavioral interviews', () => {
    const [system] = buildQuestionPrompt({ ...technical, style: 'BehavioralSTAR' }, []);

    expect(system.content).toContain('using the STAR method');
    expect(system.content).toContain("Start your question with 'Tell me about a time when...' or 'Describe a situation where...'");
  });

  it('uses the general directive for general interviews', () => {
    const [system] = buildQuestionPrompt({ ...technical, style: 'General' }, []);

    expect(system.content.endsWith('This is a general interview. Ask a common, non-technical question.')).toBe(true);
  });

  it('rejects a blank job title before building anything', () => {
    expect(() => buildQuestionPrompt({ ...technical, jobTitle: '   ' }, [])).toThrow(ValidationError);
  });
});

describe('resolveInterviewStyle', () => {
  it('accepts canonical names and common labels', () => {
    expect(resolveInterviewStyle('Technical')).toBe('Technical');
    expect(resolveInterviewStyle('Behavioral (STAR format)')).toBe('BehavioralSTAR');
    expect(resolveInterviewStyle(' behavioral ')).toBe('BehavioralSTAR');
  });

  it('falls back to General for anything unrecognized', () => {
    expect(resolveInterviewStyle('Panel')).toBe('General');
    expect(resolveInterviewStyle(undefined)).toBe('General');
    expect(resolveInterviewStyle(42)).toBe('General');
  });
});

describe('validateSessionConfig', () => {
  it.each([0, 11, 2.5, Number.NaN])('rejects question count %s', (questionCount) => {
    expect(() => validateSessionConfig({ ...technical, questionCount })).toThrow(
      'Question count must be an integer between 1 and 10'
    );
  });

  it('accepts the bounds', () => {
    expect(() => validateSessionConfig({ ...technical, questionCount: 1 })).not.toThrow();
    expect(() => validateSessionConfig({ ...technical, questionCount: 10 })).not.toThrow();
  });

  it('rejects an empty model identifier', () => {
    expect(() => validateSessionConfig({ ...technical, model: '' })).toThrow('Model identifier is required');
  });
});

describe('buildFeedbackPrompt', () => {
  it('frames a single question and answer for the coach', () => {
    const [system, user] = buildFeedbackPrompt('Why Go?', 'Fast builds.');

    expect(system.role).toBe('system');
    expect(system.content).toContain('Provide 2-3 bullet points of constructive, concise feedback');
    expect(system.content.endsWith(`Start with '${FEEDBACK_LEAD_IN}'`)).toBe(true);
    expect(user).toEqual({ role: 'user', content: 'Question: Why Go?\n\nAnswer: Fast builds.' });
  });
});

describe('buildEvaluationPrompt', () => {
  it('lists every question and answer, leaving feedback out', () => {
    const [system, user] = buildEvaluationPrompt(technical, [
      { question: 'Q1', answer: 'A1', feedback: 'F1' },
      { question: 'Q2', answer: 'A2' },
    ]);

    expect(system.content.startsWith('You are an expert hiring manager for a Backend Engineer position.')).toBe(true);
    expect(user.content.startsWith(
      'Here is the interview transcript:\n\nQuestion 1: Q1\nAnswer 1: A1\n\nQuestion 2: Q2\nAnswer 2: A2\n\n'
    )).toBe(true);
    expect(user.content).not.toContain('F1');
    expect(user.content.indexOf('Strengths')).toBeLessThan(user.content.indexOf('Areas for Improvement'));
  });
});

describe('REQUEST_PROFILES', () => {
  it('gives each request kind its own budget and temperature', () => {
    expect(REQUEST_PROFILES).toEqual({
      question: { maxTokens: 150, temperature: 0.7 },
      feedback: { maxTokens: 200, temperature: 0.4 },
      evaluation: { maxTokens: 500, temperature: 0.5 },
    });
  });
});
