import { generateText, APICallError, type ModelMessage } from 'ai';
import { createGroq } from '@ai-sdk/groq';
import Groq from 'groq-sdk';
import type { GideonConfig } from './config';
import { LanguageModelError, OperationTimeoutError, describeError } from './errors';
import type { ConversationTurn, LanguageModelService } from './types/engine';

export function toMessages(prompt: string, context: readonly ConversationTurn[]): ModelMessage[] {
  const messages: ModelMessage[] = [];
  for (const turn of context) {
    messages.push({ role: 'user', content: turn.userText });
    messages.push({ role: 'assistant', content: turn.assistantText });
  }
  messages.push({ role: 'user', content: prompt });
  return messages;
}

function isAuthStatus(status: number | undefined): boolean {
  return status === 401 || status === 403;
}

export function classifyLanguageModelError(error: unknown, signal: AbortSignal): LanguageModelError {
  if (error instanceof LanguageModelError) return error;

  if (signal.aborted) {
    const reason: unknown = signal.reason;
    if (reason instanceof OperationTimeoutError) {
      return new LanguageModelError('timeout', reason.message, error);
    }
    return new LanguageModelError('unavailable', 'Language model request cancelled', error);
  }

  if (APICallError.isInstance(error) && isAuthStatus(error.statusCode)) {
    return new LanguageModelError('auth', `Language model rejected credentials (${error.statusCode})`, error);
  }
  if (error instanceof Groq.APIError && isAuthStatus(error.status)) {
    return new LanguageModelError('auth', `Language model rejected credentials (${error.status})`, error);
  }

  return new LanguageModelError('network', `Language model request failed: ${describeError(error)}`, error);
}

/**
 * Remote language model on Groq. Retries are left to the caller so the retry
 * budget stays visible in one place.
 */
export class GroqLanguageModel implements LanguageModelService {
  private readonly provider: ReturnType<typeof createGroq> | null;
  private readonly client: Groq | null;
  private readonly settings: GideonConfig['response'];

  constructor(settings: GideonConfig['response']) {
    this.settings = settings;
    this.provider = settings.apiKey ? createGroq({ apiKey: settings.apiKey }) : null;
    this.client = settings.apiKey ? new Groq({ apiKey: settings.apiKey, maxRetries: 0 }) : null;
  }

  get hasCredential(): boolean {
    return this.provider !== null;
  }

  async generate(prompt: string, context: readonly ConversationTurn[], signal: AbortSignal): Promise<string> {
    if (!this.provider) {
      throw new LanguageModelError('unavailable', 'No GROQ_API_KEY configured');
    }

    try {
      const result = await generateText({
        model: this.provider(this.settings.model),
        system: this.settings.systemPrompt,
        messages: toMessages(prompt, context),
        maxOutputTokens: this.settings.maxOutputTokens,
        temperature: this.settings.temperature,
        maxRetries: 0,
        abortSignal: signal,
      });

      const text = result.text.trim();
      if (!text) {
        throw new LanguageModelError('invalid-response', 'Language model returned an empty reply');
      }
      return text;
    } catch (error) {
      throw classifyLanguageModelError(error, signal);
    }
  }

  async ping(signal: AbortSignal): Promise<void> {
    if (!this.client) {
      throw new LanguageModelError('unavailable', 'No GROQ_API_KEY configured');
    }

    try {
      await this.client.models.list({ signal });
    } catch (error) {
      throw classifyLanguageModelError(error, signal);
    }
  }
}
