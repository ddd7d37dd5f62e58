import { INTERVIEW_STYLES } from '../../models/types';
import type { ChatMessage, InterviewStyle, SessionConfig, Turn } from '../../models/types';
import { ValidationError } from '../../models/errors';
import { interviewConfig } from '../../config/services';

export interface RequestProfile {
  maxTokens: number;
  temperature: number;
}

export type RequestKind = 'question' | 'feedback' | 'evaluation';

export const REQUEST_PROFILES: Record<RequestKind, RequestProfile> = {
  question: { maxTokens: 150, temperature: 0.7 },
  feedback: { maxTokens: 200, temperature: 0.4 },
  evaluation: { maxTokens: 500, temperature: 0.5 },
};

export const FEEDBACK_LEAD_IN = "Here's some feedback on your answer:";

const STYLE_DIRECTIVES: Record<InterviewStyle, string> = {
  General: 'This is a general interview. Ask a common, non-technical question.',
  Technical:
    'This is a technical interview. Ask a technical question related to the job, ' +
    'testing their knowledge and problem-solving skills.',
  BehavioralSTAR:
    'This is a behavioral interview. Ask a behavioral question that the user should answer ' +
    "using the STAR method. Start your question with 'Tell me about a time when...' " +
    "or 'Describe a situation where...'",
};

const STYLE_ALIASES: Record<string, InterviewStyle> = {
  general: 'General',
  technical: 'Technical',
  behavioral: 'BehavioralSTAR',
  behavioralstar: 'BehavioralSTAR',
  'behavioral (star format)': 'BehavioralSTAR',
  star: 'BehavioralSTAR',
};

/**
 * Maps a host-supplied style label onto a known style.
 * Anything unrecognized is treated as a general interview.
 */
export function resolveInterviewStyle(value: unknown): InterviewStyle {
  if (typeof value !== 'string') return 'General';
  const known = INTERVIEW_STYLES.find((style) => style === value);
  if (known) return known;
  return STYLE_ALIASES[value.trim().toLowerCase()] ?? 'General';
}

export function validateSessionConfig(config: SessionConfig): void {
  if (!config.jobTitle || !config.jobTitle.trim()) {
    throw new ValidationError('Job title is required');
  }
  const { questionCount } = config;
  if (
    !Number.isInteger(questionCount) ||
    questionCount < interviewConfig.minQuestions ||
    questionCount > interviewConfig.maxQuestions
  ) {
    throw new ValidationError(
      `Question count must be an integer between ${interviewConfig.minQuestions} and ${interviewConfig.maxQuestions}`
    );
  }
  if (!config.model || !config.model.trim()) {
    throw new ValidationError('Model identifier is required');
  }
}

function answeredTurns(turns: Turn[]): Array<{ question: string; answer: string }> {
  const pairs: Array<{ question: string; answer: string }> = [];
  for (const turn of turns) {
    if (turn.answer === undefined) break;
    pairs.push({ question: turn.question, answer: turn.answer });
  }
  return pairs;
}

export function buildQuestionPrompt(config: SessionConfig, turnsSoFar: Turn[]): ChatMessage[] {
  validateSessionConfig(config);

  const directive = STYLE_DIRECTIVES[resolveInterviewStyle(config.style)];
  const system = [
    `You are an expert interviewer for a ${config.jobTitle.trim()} position.`,
    `You will conduct a mock interview with a total of ${config.questionCount} questions.`,
    'Ask one concise, relevant interview question at a time.',
    'Do not number your questions.',
    "Base your next question on the candidate's previous answers.",
    directive,
  ].join(' ');

  const messages: ChatMessage[] = [{ role: 'system', content: system }];

  // Only question/answer pairs; feedback never enters the history.
  const history = answeredTurns(turnsSoFar);
  for (const { question, answer } of history) {
    messages.push({ role: 'assistant', content: question });
    messages.push({ role: 'user', content: answer });
  }

  messages.push({
    role: 'user',
    content: history.length === 0 ? 'Please ask me the first question.' : 'Please ask me the next question.',
  });

  return messages;
}

export function buildFeedbackPrompt(question: string, answer: string): ChatMessage[] {
  const system = [
    'You are an expert interview coach.',
    "Provide 2-3 bullet points of constructive, concise feedback on the user's answer to the interview question.",
    'Focus on what they did well and how they could improve.',
    `Start with '${FEEDBACK_LEAD_IN}'`,
  ].join(' ');

  return [
    { role: 'system', content: system },
    { role: 'user', content: `Question: ${question}\n\nAnswer: ${answer}` },
  ];
}

export function buildEvaluationPrompt(config: SessionConfig, turns: Turn[]): ChatMessage[] {
  validateSessionConfig(config);

  const system =
    `You are an expert hiring manager for a ${config.jobTitle.trim()} position. ` +
    "Your task is to provide a final, overall evaluation of the candidate's performance " +
    'based on the following interview transcript.';

  const transcript = answeredTurns(turns)
    .map(({ question, answer }, i) => `Question ${i + 1}: ${question}\nAnswer ${i + 1}: ${answer}\n\n`)
    .join('');

  const user =
    `Here is the interview transcript:\n\n${transcript}` +
    "Please provide a concise, overall evaluation of the candidate's performance. " +
    'Structure it in two sections: \n1. Strengths \n2. Areas for Improvement \n\n' +
    'Provide your final feedback in clear, constructive bullet points.';

  return [
    { role: 'system', content: system },
    { role: 'user', content: user },
  ];
}
