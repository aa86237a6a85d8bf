import type { GideonConfig } from './config';
import { raceAbort, sleep, withDeadline } from './cancellation';
import { LanguageModelError, OperationTimeoutError, describeError } from './errors';
import { classify, pickReply, type FallbackCategory } from './fallback-replies';
import { ConversationMemory } from './memory/conversation-memory';
import { ResponseCache, fingerprint } from './memory/response-cache';
import type { ConversationLogStore, ConversationTurn, LanguageModelService } from './types/engine';

export type ResponseTier = 'cache' | 'remote' | 'fallback';

export interface ResponseResult {
  text: string;
  tier: ResponseTier;
  category?: FallbackCategory;
  latencyMs: number;
  remoteAttempts: number;
}

export interface RespondOptions {
  /** Defaults to the last `contextTurns` turns of ConversationMemory */
  context?: readonly ConversationTurn[];
  signal?: AbortSignal;
}

export interface ResponseEngineStats {
  requests: number;
  cacheHits: number;
  remoteReplies: number;
  fallbackReplies: number;
  remoteFailures: number;
  remoteFailureStreak: number;
  remoteBypassed: boolean;
  averageLatencyMs: number;
  cacheHitRate: number;
}

export interface ResponseEngineDeps {
  model: LanguageModelService;
  cache: ResponseCache;
  memory: ConversationMemory;
  log?: ConversationLogStore;
  random?: () => number;
  now?: () => number;
}

/**
 * Turns an utterance into a reply through three tiers: cache, remote model,
 * canned category replies. Always resolves with a string.
 */
export class ResponseEngine {
  private readonly settings: GideonConfig['response'];
  private readonly model: LanguageModelService;
  private readonly cache: ResponseCache;
  private readonly memory: ConversationMemory;
  private readonly log: ConversationLogStore | undefined;
  private readonly random: () => number;
  private readonly now: () => number;

  private bypassRemote = false;
  private failureStreak = 0;
  private counters = {
    requests: 0,
    cacheHits: 0,
    remoteReplies: 0,
    fallbackReplies: 0,
    remoteFailures: 0,
    totalLatencyMs: 0,
  };

  constructor(settings: GideonConfig['response'], deps: ResponseEngineDeps) {
    this.settings = settings;
    this.model = deps.model;
    this.cache = deps.cache;
    this.memory = deps.memory;
    this.log = deps.log;
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? Date.now;
  }

  async respond(utteranceText: string, options: RespondOptions = {}): Promise<string> {
    const result = await this.respondDetailed(utteranceText, options);
    return result.text;
  }

  async respondDetailed(utteranceText: string, options: RespondOptions = {}): Promise<ResponseResult> {
    const startedAt = this.now();
    this.counters.requests++;

    const key = fingerprint(utteranceText);
    if (!key) {
      return this.complete(utteranceText, this.fallback('unclear'), startedAt, 0, options.signal);
    }

    // Tier 1: cache
    const cached = this.cache.get(key);
    if (cached) {
      this.counters.cacheHits++;
      return this.complete(utteranceText, { text: cached.reply, tier: 'cache' }, startedAt, 0, options.signal);
    }

    // Tier 2: remote model
    let attempts = 0;
    if (this.remoteAvailable) {
      const context = options.context ?? this.memory.recent(this.settings.contextTurns);
      const remote = await this.callRemote(utteranceText, context, options.signal);
      attempts = remote.attempts;

      if (remote.text !== null) {
        this.cache.set(key, remote.text);
        this.counters.remoteReplies++;
        return this.complete(utteranceText, { text: remote.text, tier: 'remote' }, startedAt, attempts, options.signal);
      }
    }

    // Tier 3: canned reply for the input's category
    return this.complete(utteranceText, this.fallback(classify(utteranceText)), startedAt, attempts, options.signal);
  }

  get remoteAvailable(): boolean {
    return this.model.hasCredential && !this.bypassRemote;
  }

  get remoteFailureStreak(): number {
    return this.failureStreak;
  }

  get remoteBypassed(): boolean {
    return this.bypassRemote;
  }

  /** Health-driven short circuit straight to the fallback tier. */
  setRemoteBypass(bypass: boolean) {
    if (bypass === this.bypassRemote) return;
    this.bypassRemote = bypass;
    if (!bypass) {
      this.failureStreak = 0;
    }
    console.log(bypass
      ? '[ResponseEngine] ⚠️  Remote model bypassed, using fallback replies'
      : '[ResponseEngine] ✅ Remote model re-enabled');
  }

  /** Drops expired cache entries; part of the memory reclamation pass. */
  clearCaches(): number {
    return this.cache.purgeExpired();
  }

  getStats(): ResponseEngineStats {
    const { requests, cacheHits, remoteReplies, fallbackReplies, remoteFailures, totalLatencyMs } = this.counters;
    return {
      requests,
      cacheHits,
      remoteReplies,
      fallbackReplies,
      remoteFailures,
      remoteFailureStreak: this.failureStreak,
      remoteBypassed: this.bypassRemote,
      averageLatencyMs: requests === 0 ? 0 : totalLatencyMs / requests,
      cacheHitRate: this.cache.stats().hitRate,
    };
  }

  private async callRemote(
    prompt: string,
    context: readonly ConversationTurn[],
    signal: AbortSignal | undefined
  ): Promise<{ text: string | null; attempts: number }> {
    const maxAttempts = 1 + this.settings.maxRetries;
    let attempts = 0;

    while (attempts < maxAttempts) {
      if (signal?.aborted) break;
      attempts++;

      const deadline = withDeadline(signal, this.settings.requestTimeoutMs, 'Language model request');
      try {
        // A model that ignores its signal still loses to the deadline
        const text = await raceAbort(this.model.generate(prompt, context, deadline.signal), deadline.signal);
        this.failureStreak = 0;
        return { text, attempts };
      } catch (error) {
        const failure = toLanguageModelError(error);
        console.warn(`[ResponseEngine] ❌ Remote attempt ${attempts}/${maxAttempts} failed: ${describeError(error)}`);

        // Auth failures and unknown errors are not worth another round trip
        if (!failure?.retryable || signal?.aborted) break;
        if (attempts < maxAttempts && this.settings.retryBackoffMs > 0) {
          try {
            await sleep(this.settings.retryBackoffMs, signal);
          } catch {
            break;
          }
        }
      } finally {
        deadline.dispose();
      }
    }

    // Cancellation says nothing about the remote service
    if (!signal?.aborted) {
      this.counters.remoteFailures++;
      this.failureStreak++;
    }
    return { text: null, attempts };
  }

  private fallback(category: FallbackCategory): { text: string; tier: ResponseTier; category: FallbackCategory } {
    this.counters.fallbackReplies++;
    return {
      text: pickReply(category, this.random, new Date(this.now())),
      tier: 'fallback',
      category,
    };
  }

  private complete(
    userText: string,
    reply: { text: string; tier: ResponseTier; category?: FallbackCategory },
    startedAt: number,
    remoteAttempts: number,
    signal: AbortSignal | undefined
  ): ResponseResult {
    // A cancelled exchange is discarded, not remembered
    if (!signal?.aborted) {
      this.remember({ userText, assistantText: reply.text, timestamp: this.now() });
    }

    const latencyMs = Math.max(0, this.now() - startedAt);
    this.counters.totalLatencyMs += latencyMs;

    return { ...reply, latencyMs, remoteAttempts };
  }

  private remember(turn: ConversationTurn) {
    this.memory.append(turn);

    if (this.log) {
      this.log.appendTurn(turn).catch((error: unknown) => {
        console.warn(`[ResponseEngine] Conversation log write failed: ${describeError(error)}`);
      });
    }
  }
}

function toLanguageModelError(error: unknown): LanguageModelError | null {
  if (error instanceof LanguageModelError) return error;
  if (error instanceof OperationTimeoutError) return new LanguageModelError('timeout', error.message, error);
  return null;
}
