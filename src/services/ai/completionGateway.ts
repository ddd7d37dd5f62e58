import Groq from 'groq-sdk';
import type { ChatCompletionMessageParam } from 'groq-sdk/resources/chat/completions';
import type { ChatMessage } from '../../models/types';
import { CompletionError, ValidationError } from '../../models/errors';
import { groqConfig } from '../../config/services';

export interface CompletionOptions {
  model: string;
  maxTokens: number;
  temperature: number;
}

/**
 * A stateless text-completion provider: messages in, text out.
 * Implementations reject with {@link CompletionError} and never retry.
 */
export interface CompletionGateway {
  complete(messages: ChatMessage[], options: CompletionOptions): Promise<string>;
}

function toGroqMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

export function validateCompletionRequest(messages: ChatMessage[], options: CompletionOptions): void {
  if (messages.length === 0 || messages.every((m) => !m.content.trim())) {
    throw new ValidationError('Completion instruction must not be empty');
  }
  if (!Number.isInteger(options.maxTokens) || options.maxTokens <= 0) {
    throw new ValidationError('Response budget must be a positive integer');
  }
  if (!(options.temperature >= 0 && options.temperature <= 1)) {
    throw new ValidationError('Temperature must be between 0 and 1');
  }
}

/** Maps a groq-sdk failure onto the gateway's closed error set. */
export function toCompletionError(error: unknown): CompletionError {
  if (error instanceof CompletionError) {
    return error;
  }
  if (error instanceof Groq.AuthenticationError || error instanceof Groq.PermissionDeniedError) {
    return new CompletionError(
      'AuthenticationFailed',
      'Authentication failed: please check your Groq API key.',
      { cause: error }
    );
  }
  if (error instanceof Groq.RateLimitError) {
    return new CompletionError(
      'RateLimited',
      'Rate limit exceeded: please wait and try again.',
      { cause: error }
    );
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new CompletionError('ProviderError', `Completion request failed: ${reason}`, { cause: error });
}

export class GroqCompletionGateway implements CompletionGateway {
  private groq: Groq | null;

  constructor(apiKey: string, baseURL: string | undefined = groqConfig.baseURL) {
    this.groq = apiKey.trim()
      ? new Groq({ apiKey: apiKey.trim(), baseURL, maxRetries: 0 })
      : null;
  }

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    validateCompletionRequest(messages, options);

    if (!this.groq) {
      throw new CompletionError('EmptyCredential', 'No Groq API key was supplied.');
    }

    let content: string | null | undefined;
    try {
      const completion = await this.groq.chat.completions.create({
        messages: messages.map(toGroqMessage),
        model: options.model,
        temperature: options.temperature,
        max_tokens: options.maxTokens,
      });
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      throw toCompletionError(error);
    }

    const text = content?.trim();
    if (!text) {
      throw new CompletionError('ProviderError', 'No response from LLM');
    }
    return text;
  }
}

/** Builds a gateway for one request, preferring a caller-supplied key. */
export function createCompletionGateway(apiKey?: string): CompletionGateway {
  return new GroqCompletionGateway(apiKey || groqConfig.apiKey);
}
