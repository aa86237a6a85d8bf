import { describe, it, expect, vi, beforeEach } from 'vitest';
import { LanguageModelError } from '../errors';
import { HealthMonitor } from '../health-monitor';
import { ConversationMemory } from '../memory/conversation-memory';
import { ResponseCache } from '../memory/response-cache';
import { ResponseEngine } from '../response-engine';
import type { GideonConfigInput } from '../config';
import type { AudioSession, ConversationLogStore } from '../types/engine';
import { FakeDevices, FakeLanguageModel, testConfig } from './helpers/fakes';

const GREETING = "Hello! I'm Gideon. How can I help you?";

function setup(input: GideonConfigInput = {}, log?: ConversationLogStore) {
  const config = testConfig(input);
  const model = new FakeLanguageModel();
  const cache = new ResponseCache({ capacity: config.response.cacheCapacity });
  const memory = new ConversationMemory(config.response.memoryCapacity);
  let clock = 1_000;
  const engine = new ResponseEngine(config.response, {
    model,
    cache,
    memory,
    log,
    random: () => 0,
    now: () => clock,
  });
  const advance = (ms: number) => {
    clock += ms;
  };
  return { config, model, cache, memory, engine, advance };
}

describe('ResponseEngine', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('answers from the remote model and caches the reply', async () => {
    const { engine, model, memory } = setup();

    const first = await engine.respondDetailed('What time is it');
    expect(first).toMatchObject({ text: 'Echo: What time is it', tier: 'remote', remoteAttempts: 1 });

    const second = await engine.respondDetailed('  what TIME is it ');
    expect(second).toMatchObject({ text: 'Echo: What time is it', tier: 'cache', remoteAttempts: 0 });
    expect(model.generate).toHaveBeenCalledTimes(1);
    expect(memory.size).toBe(2);
  });

  it('retries a timeout exactly once', async () => {
    const { engine, model } = setup();
    model.generate.mockRejectedValueOnce(new LanguageModelError('timeout', 'slow'));

    const result = await engine.respondDetailed('hi');
    expect(result).toMatchObject({ text: 'Echo: hi', tier: 'remote', remoteAttempts: 2 });
    expect(model.generate).toHaveBeenCalledTimes(2);
  });

  it('falls back after the retry also fails', async () => {
    const { engine, model } = setup();
    model.generate.mockRejectedValue(new LanguageModelError('network', 'connection reset'));

    const result = await engine.respondDetailed('hi');
    expect(result).toMatchObject({ text: GREETING, tier: 'fallback', category: 'greeting', remoteAttempts: 2 });
    expect(model.generate).toHaveBeenCalledTimes(2);
    expect(engine.remoteFailureStreak).toBe(1);
  });

  it('falls back when the model never settles', async () => {
    const { engine, model } = setup({ response: { requestTimeoutMs: 20 } });
    model.generate.mockImplementation(() => new Promise<string>(() => undefined));

    const result = await engine.respondDetailed('hi');
    expect(result).toMatchObject({ text: GREETING, tier: 'fallback', category: 'greeting', remoteAttempts: 2 });
    expect(model.generate).toHaveBeenCalledTimes(2);
    expect(engine.remoteFailureStreak).toBe(1);
  });

  it('does not retry an auth failure', async () => {
    const { engine, model } = setup();
    model.generate.mockRejectedValue(new LanguageModelError('auth', 'bad key'));

    const result = await engine.respondDetailed('thanks');
    expect(result).toMatchObject({ text: "You're welcome.", tier: 'fallback', remoteAttempts: 1 });
    expect(model.generate).toHaveBeenCalledTimes(1);
  });

  it('does not retry an unclassified error', async () => {
    const { engine, model } = setup();
    model.generate.mockRejectedValue(new Error('boom'));

    await engine.respond('hello');
    expect(model.generate).toHaveBeenCalledTimes(1);
  });

  it('skips the remote tier without a credential', async () => {
    const { engine, model } = setup();
    model.hasCredential = false;

    expect(await engine.respond('goodbye')).toBe('Goodbye.');
    expect(model.generate).not.toHaveBeenCalled();
    expect(engine.remoteFailureStreak).toBe(0);
  });

  it('answers empty input without asking the model', async () => {
    const { engine, model } = setup();
    const result = await engine.respondDetailed('   ');
    expect(result).toMatchObject({
      text: "I didn't catch that. Could you repeat it?",
      tier: 'fallback',
      category: 'unclear',
    });
    expect(model.generate).not.toHaveBeenCalled();
  });

  it('passes recent turns as context', async () => {
    const { engine, model } = setup();
    await engine.respond('hello');
    await engine.respond('how are you');

    const context = model.generate.mock.calls[1]?.[1];
    expect(context).toEqual([{ userText: 'hello', assistantText: 'Echo: hello', timestamp: 1_000 }]);
  });

  it('limits context to contextTurns', async () => {
    const { engine, model } = setup({ response: { contextTurns: 1 } });
    await engine.respond('one');
    await engine.respond('two');
    await engine.respond('three');

    expect(model.generate.mock.calls[2]?.[1].map((turn) => turn.userText)).toEqual(['two']);
  });

  it('does not remember a cancelled exchange', async () => {
    const { engine, memory, model } = setup();
    const controller = new AbortController();
    controller.abort(new Error('cancelled'));

    const result = await engine.respondDetailed('hello', { signal: controller.signal });
    expect(result.tier).toBe('fallback');
    expect(model.generate).not.toHaveBeenCalled();
    expect(memory.size).toBe(0);
    expect(engine.remoteFailureStreak).toBe(0);
  });

  it('still replies when the conversation log fails', async () => {
    const log: ConversationLogStore = { appendTurn: vi.fn(async () => Promise.reject(new Error('disk full'))) };
    const { engine, memory } = setup({}, log);

    await expect(engine.respond('hello')).resolves.toBe('Echo: hello');
    expect(memory.size).toBe(1);
    expect(log.appendTurn).toHaveBeenCalledTimes(1);
  });

  it('resets the failure streak when the bypass is lifted', async () => {
    const { engine, model } = setup({ response: { maxRetries: 0 } });
    model.generate.mockRejectedValue(new LanguageModelError('timeout', 'slow'));
    await engine.respond('first question');
    await engine.respond('second question');
    expect(engine.remoteFailureStreak).toBe(2);

    engine.setRemoteBypass(true);
    expect(engine.remoteAvailable).toBe(false);
    engine.setRemoteBypass(false);
    expect(engine.remoteFailureStreak).toBe(0);
  });

  it('reports counters and latency', async () => {
    const { engine, model, advance } = setup();
    model.generate.mockImplementationOnce(async (prompt) => {
      advance(40);
      return `Echo: ${prompt}`;
    });

    await engine.respond('hello');
    await engine.respond('hello');
    await engine.respond('');

    expect(engine.getStats()).toEqual({
      requests: 3,
      cacheHits: 1,
      remoteReplies: 1,
      fallbackReplies: 1,
      remoteFailures: 0,
      remoteFailureStreak: 0,
      remoteBypassed: false,
      averageLatencyMs: 40 / 3,
      cacheHitRate: 0.5,
    });
  });

  it('goes straight to fallback once health checks mark the model unreachable', async () => {
    const { config, engine, model, cache, memory } = setup({ response: { maxRetries: 0 } });
    model.generate.mockRejectedValue(new LanguageModelError('timeout', 'slow'));
    model.ping.mockRejectedValue(new LanguageModelError('network', 'unreachable'));

    for (const question of ['first question', 'second question', 'third question']) {
      await engine.respond(question);
    }
    expect(engine.remoteFailureStreak).toBe(3);

    const session: AudioSession = {
      enabled: false,
      deviceId: null,
      deviceName: null,
      sampleRateHz: 16000,
      energyThreshold: 300,
      noiseFloor: 0,
      lastCalibratedAt: 0,
    };
    const monitor = new HealthMonitor(config.health, {
      devices: new FakeDevices([]),
      calibrator: { getSession: () => session },
      model,
      responder: engine,
      cache,
      memory,
      voiceLoop: () => ({ state: 'IDLE', textOnly: true }),
      requestRecalibration: vi.fn(async () => undefined),
      readMemoryMb: () => 50,
    });

    const status = await monitor.probe();
    expect(status.flags.languageModelBypassed).toBe(true);
    expect(status.components['language-model'].state).toBe('DEGRADED');

    expect(await engine.respond('hello')).toBe(GREETING);
    expect(model.generate).toHaveBeenCalledTimes(3);
  });
});
