import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AudioCalibrator } from '../audio-calibrator';
import { AudioLock } from '../capture-lock';
import { ShutdownRequestedError, TranscriptionError } from '../errors';
import { ConversationMemory } from '../memory/conversation-memory';
import { ResponseCache } from '../memory/response-cache';
import { ResponseEngine } from '../response-engine';
import { VoiceLoop, canTransition, type VoiceLoopEvent, type VoiceLoopState } from '../voice-loop';
import { WakeWordMatcher } from '../wake-word-matcher';
import type { GideonConfigInput } from '../config';
import type { CaptureDevice } from '../types/engine';
import {
  BUILT_IN_MIC,
  FakeDevices,
  FakeLanguageModel,
  FakeMicrophone,
  FakeSampler,
  FakeSpeech,
  FakeTranscriber,
  OverlapProbe,
  silence,
  spokenPhrase,
  testConfig,
} from './helpers/fakes';

const EXCHANGE: VoiceLoopState[] = ['LISTENING', 'TRANSCRIBING', 'MATCHING', 'RESPONDING', 'SPEAKING', 'IDLE'];
const WAIT = { timeout: 5000, interval: 5 };

function harness(devices: CaptureDevice[] = [BUILT_IN_MIC], speech?: FakeSpeech, input: GideonConfigInput = {}) {
  const config = testConfig(input);
  const probe = new OverlapProbe();
  const microphone = new FakeMicrophone(probe);
  const output = speech ?? new FakeSpeech(probe);
  const transcriber = new FakeTranscriber();
  const lock = new AudioLock();
  const model = new FakeLanguageModel();
  let clock = 1_000;
  const now = () => clock;

  const calibrator = new AudioCalibrator(config.audio, {
    devices: new FakeDevices(devices),
    sampler: new FakeSampler(),
    lock,
    now,
  });
  const memory = new ConversationMemory();
  const responder = new ResponseEngine(config.response, {
    model,
    cache: new ResponseCache(),
    memory,
    random: () => 0,
    now,
  });
  const loop = new VoiceLoop(config.audio, {
    calibrator,
    microphone,
    transcriber,
    matcher: new WakeWordMatcher(config.wakeWord.variants, config.wakeWord.threshold),
    responder,
    speech: output,
    lock,
    now,
  });

  const states: VoiceLoopState[] = [];
  const events: VoiceLoopEvent[] = [];
  loop.subscribe((event) => {
    events.push(event);
    if (event.type === 'state') states.push(event.data.to);
  });

  const setClock = (ms: number) => {
    clock = ms;
  };
  return { config, probe, microphone, speech: output, transcriber, lock, model, memory, calibrator, loop, states, events, setClock };
}

// Small deterministic PRNG for the interleaving test
function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe('canTransition', () => {
  it.each([
    ['IDLE', 'LISTENING', true],
    ['IDLE', 'RESPONDING', true],
    ['IDLE', 'SPEAKING', false],
    ['LISTENING', 'TRANSCRIBING', true],
    ['LISTENING', 'SPEAKING', false],
    ['MATCHING', 'LISTENING', true],
    ['MATCHING', 'IDLE', false],
    ['SPEAKING', 'IDLE', true],
    ['SPEAKING', 'LISTENING', false],
    ['TRANSCRIBING', 'SHUTDOWN', true],
    ['SHUTDOWN', 'IDLE', false],
  ] as const)('%s → %s is %s', (from, to, allowed) => {
    expect(canTransition(from, to)).toBe(allowed);
  });
});

describe('VoiceLoop', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('runs a full exchange for a wake-word utterance', async () => {
    const h = harness();
    await h.calibrator.calibrate();
    h.microphone.scripts = [spokenPhrase()];
    h.transcriber.results = ['Hey Gideon, what time is it?'];

    const running = h.loop.run();
    await vi.waitFor(() => expect(h.states.slice(0, 6)).toEqual(EXCHANGE), WAIT);
    await h.loop.shutdown();
    await running;

    expect(h.model.generate).toHaveBeenCalledTimes(1);
    expect(h.model.generate.mock.calls[0]?.[0]).toBe('what time is it');
    expect(h.speech.spoken).toEqual(['Echo: what time is it']);

    const response = h.events.find((event) => event.type === 'response');
    expect(response).toMatchObject({ data: { userText: 'what time is it', source: 'voice' } });
    expect(h.loop.getStats()).toMatchObject({ successfulRecognitions: 1, wakeWordHits: 1, exchanges: 1 });
  });

  it('goes back to listening after ambient chatter', async () => {
    const h = harness();
    await h.calibrator.calibrate();
    h.microphone.scripts = [spokenPhrase(), spokenPhrase()];
    h.transcriber.results = ['the weather is lovely today', 'gideon what is the date'];

    const running = h.loop.run();
    await vi.waitFor(() => expect(h.speech.spoken).toHaveLength(1), WAIT);
    await h.loop.shutdown();
    await running;

    expect(h.states.slice(0, 6)).toEqual(['LISTENING', 'TRANSCRIBING', 'MATCHING', 'LISTENING', 'TRANSCRIBING', 'MATCHING']);
    expect(h.speech.spoken).toEqual(['Echo: what is the date']);
    expect(h.loop.getStats()).toMatchObject({ wakeWordMisses: 1, wakeWordHits: 1 });
    expect(h.model.generate).toHaveBeenCalledTimes(1);
  });

  it('leaves constant chatter for queued work at the idle edge', async () => {
    const h = harness();
    await h.calibrator.calibrate();
    h.microphone.nextScript = () => spokenPhrase();
    h.transcriber.next = () => 'just some people chatting nearby';

    const running = h.loop.run();
    await vi.waitFor(() => expect(h.loop.getStats().wakeWordMisses).toBeGreaterThanOrEqual(1), WAIT);
    h.setClock(3_000);
    const [result, session] = await Promise.all([
      h.loop.submitText('hello'),
      h.loop.requestRecalibration('command'),
    ]);
    await h.loop.shutdown();
    await running;

    expect(result).toMatchObject({ text: 'Echo: hello', tier: 'remote' });
    expect(session.lastCalibratedAt).toBe(3_000);
    expect(h.calibrator.lastRecalibrationReason).toBe('command');
    const idleAfterMiss = h.states.findIndex(
      (state, i) => state === 'IDLE' && h.states[i - 1] === 'LISTENING' && h.states[i - 2] === 'MATCHING'
    );
    expect(idleAfterMiss).toBeGreaterThan(0);
  });

  it('returns to idle when nobody speaks', async () => {
    const h = harness();
    await h.calibrator.calibrate();

    const running = h.loop.run();
    await vi.waitFor(() => expect(h.loop.getStats().recognitionTimeouts).toBeGreaterThanOrEqual(1), WAIT);
    await h.loop.shutdown();
    await running;

    expect(h.states.slice(0, 2)).toEqual(['LISTENING', 'IDLE']);
    expect(h.transcriber.calls).toBe(0);
    expect(h.speech.spoken).toEqual([]);
  });

  it('treats an empty transcript as silence', async () => {
    const h = harness();
    await h.calibrator.calibrate();
    h.microphone.scripts = [spokenPhrase()];
    h.transcriber.results = ['   '];

    const running = h.loop.run();
    await vi.waitFor(() => expect(h.transcriber.calls).toBe(1), WAIT);
    await vi.waitFor(() => expect(h.states.slice(0, 3)).toEqual(['LISTENING', 'TRANSCRIBING', 'IDLE']), WAIT);
    await h.loop.shutdown();
    await running;

    expect(h.loop.getStats()).toMatchObject({ failures: 0, failureStreak: 0 });
  });

  it('never listens without a device but still answers typed input', async () => {
    const h = harness([]);
    await h.calibrator.calibrate();
    h.model.hasCredential = false;

    await h.loop.run();
    expect(h.loop.isRunning).toBe(false);
    expect(h.microphone.starts).toBe(0);

    const result = await h.loop.submitText('thanks');
    expect(result).toMatchObject({ text: "You're welcome.", tier: 'fallback' });
    expect(h.speech.spoken).toEqual(["You're welcome."]);
    expect(h.states).toEqual(['RESPONDING', 'SPEAKING', 'IDLE']);
    expect(h.states).not.toContain('LISTENING');
  });

  it('recalibrates after repeated recognition failures', async () => {
    const h = harness();
    await h.calibrator.calibrate();
    expect(h.calibrator.getSession().lastCalibratedAt).toBe(1_000);

    h.setClock(5_000);
    h.microphone.scripts = [spokenPhrase(), spokenPhrase(), spokenPhrase()];
    h.transcriber.results = [1, 2, 3].map(() => new TranscriptionError(new Error('garbled')));

    const running = h.loop.run();
    await vi.waitFor(() => expect(h.events.some((event) => event.type === 'calibrated')).toBe(true), WAIT);
    await h.loop.shutdown();
    await running;

    const calibrated = h.events.find((event) => event.type === 'calibrated');
    expect(calibrated).toMatchObject({ data: { reason: 'failure', session: { lastCalibratedAt: 5_000 } } });
    expect(h.calibrator.getSession().lastCalibratedAt).toBe(5_000);
    expect(h.calibrator.lastRecalibrationReason).toBe('failure');
    expect(h.loop.getStats()).toMatchObject({ failures: 3, failureStreak: 0, recalibrations: 1 });
  });

  it('serves recalibration requests at the idle edge', async () => {
    const h = harness();
    await h.calibrator.calibrate();
    h.setClock(2_000);

    const running = h.loop.run();
    const session = await h.loop.requestRecalibration('command');
    await h.loop.shutdown();
    await running;

    expect(session.lastCalibratedAt).toBe(2_000);
    expect(h.calibrator.lastRecalibrationReason).toBe('command');
  });

  it('handles text submitted while listening', async () => {
    const h = harness();
    await h.calibrator.calibrate();

    const running = h.loop.run();
    await vi.waitFor(() => expect(h.states).toContain('LISTENING'), WAIT);
    const result = await h.loop.submitText('hello');
    await h.loop.shutdown();
    await running;

    expect(result).toMatchObject({ text: 'Echo: hello', tier: 'remote' });
    expect(h.speech.spoken).toEqual(['Echo: hello']);
    expect(h.events.find((event) => event.type === 'response')).toMatchObject({ data: { source: 'text' } });
    expect(h.loop.getStats().textInputs).toBe(1);
  });

  it('shuts down promptly from LISTENING', async () => {
    const h = harness();
    await h.calibrator.calibrate();
    h.microphone.scripts = ['stall'];

    const running = h.loop.run();
    await vi.waitFor(() => expect(h.loop.getState()).toBe('LISTENING'), WAIT);
    await h.loop.shutdown();
    await running;

    expect(h.loop.getState()).toBe('SHUTDOWN');
    expect(h.loop.isRunning).toBe(false);
    expect(h.microphone.active).toBe(false);
    expect(h.lock.activeHolder).toBeNull();
    await expect(h.loop.submitText('hello')).rejects.toBeInstanceOf(ShutdownRequestedError);
    await expect(h.loop.requestRecalibration('command')).rejects.toBeInstanceOf(ShutdownRequestedError);
  });

  it('shuts down while waiting on the model', async () => {
    const h = harness();
    await h.calibrator.calibrate();
    h.microphone.scripts = [spokenPhrase()];
    h.transcriber.results = ['gideon tell me a story'];
    h.model.generate.mockImplementation(() => new Promise<string>(() => undefined));

    const running = h.loop.run();
    await vi.waitFor(() => expect(h.loop.getState()).toBe('RESPONDING'), WAIT);
    await h.loop.shutdown();
    await running;

    expect(h.loop.getState()).toBe('SHUTDOWN');
    expect(h.lock.activeHolder).toBeNull();
    expect(h.speech.cancels).toBe(1);
    expect(h.speech.spoken).toEqual([]);
    expect(h.memory.size).toBe(0);
    expect(h.loop.getStats().exchanges).toBe(0);
  });

  it('shuts down while speaking', async () => {
    class StalledSpeech extends FakeSpeech {
      override speak(text: string): Promise<void> {
        this.spoken.push(text);
        return new Promise<void>(() => undefined);
      }
    }
    const speech = new StalledSpeech();
    const h = harness([BUILT_IN_MIC], speech);
    await h.calibrator.calibrate();
    h.microphone.scripts = [spokenPhrase()];
    h.transcriber.results = ['gideon tell me a story'];

    const running = h.loop.run();
    await vi.waitFor(() => expect(h.loop.getState()).toBe('SPEAKING'), WAIT);
    expect(h.lock.activeHolder).toBe('playback');
    await h.loop.shutdown();
    await running;

    expect(h.loop.getState()).toBe('SHUTDOWN');
    expect(h.lock.activeHolder).toBeNull();
    expect(speech.cancels).toBe(1);
    expect(speech.spoken).toEqual(['Echo: tell me a story']);
    // The reply was complete before playback began
    expect(h.memory.size).toBe(1);
    expect(h.states.filter((state) => state === 'IDLE')).toEqual([]);
  });

  it('rejects queued text on shutdown', async () => {
    const h = harness();
    await h.calibrator.calibrate();
    h.microphone.scripts = ['stall'];

    const running = h.loop.run();
    await vi.waitFor(() => expect(h.loop.getState()).toBe('LISTENING'), WAIT);
    const queued = h.loop.submitText('hello');
    await h.loop.shutdown();
    await running;

    await expect(queued).rejects.toBeInstanceOf(ShutdownRequestedError);
    expect(h.speech.spoken).toEqual([]);
  });

  it('reports a speech failure and returns to idle', async () => {
    class BrokenSpeech extends FakeSpeech {
      override async speak(): Promise<void> {
        throw new Error('player missing');
      }
    }
    const speech = new BrokenSpeech();
    const h = harness([BUILT_IN_MIC], speech);
    await h.calibrator.calibrate();

    const result = await h.loop.submitText('hello');
    expect(result.text).toBe('Echo: hello');
    expect(speech.cancels).toBe(1);
    expect(h.states).toEqual(['RESPONDING', 'SPEAKING', 'IDLE']);
    expect(h.events).toContainEqual({ type: 'error', data: 'Speech output failed: player missing' });
  });

  it('grows the retry delay with the failure streak', async () => {
    const h = harness([BUILT_IN_MIC], undefined, {
      audio: { retryDelayMs: 1000, maxRetryDelayMs: 2000, failuresBeforeRecalibration: 10 },
    });
    await h.calibrator.calibrate();
    expect(h.loop.retryDelayMs()).toBe(0);

    h.microphone.scripts = [spokenPhrase()];
    h.transcriber.results = [new TranscriptionError(new Error('garbled'))];

    const running = h.loop.run();
    await vi.waitFor(() => expect(h.loop.getStats().failureStreak).toBe(1), WAIT);
    expect(h.loop.retryDelayMs()).toBe(1500);

    // Shutdown cuts the back-off sleep short
    await h.loop.shutdown();
    await running;
    expect(h.loop.getState()).toBe('SHUTDOWN');
  });

  it('backs off when the microphone ends without audio', async () => {
    const h = harness([BUILT_IN_MIC], undefined, {
      audio: { retryDelayMs: 1000, failuresBeforeRecalibration: 10 },
    });
    await h.calibrator.calibrate();
    h.microphone.scripts = [[]];

    const running = h.loop.run();
    await vi.waitFor(() => expect(h.loop.getStats().failureStreak).toBe(1), WAIT);
    expect(h.loop.retryDelayMs()).toBe(1500);
    expect(h.events).toContainEqual({
      type: 'error',
      data: 'Voice loop cycle failed: Audio capture unavailable: capture ended without delivering audio',
    });

    await h.loop.shutdown();
    await running;
    expect(h.microphone.starts).toBe(1);
  });

  it('never captures and plays back at the same time', async () => {
    const random = mulberry32(20240611);
    const h = harness();
    const { loop, microphone, probe } = h;
    await h.calibrator.calibrate();

    const violations: string[] = [];
    microphone.nextScript = () => {
      if (h.lock.activeHolder !== 'capture') violations.push(`capture under ${h.lock.activeHolder ?? 'nobody'}`);
      return random() < 0.6 ? spokenPhrase() : silence();
    };
    const transcripts = ['hey gideon hello', 'gideon what is the date', 'just some chatter', ''];
    h.transcriber.next = () =>
      random() < 0.15
        ? new TranscriptionError(new Error('garbled'))
        : (transcripts[Math.floor(random() * transcripts.length)] ?? '');
    h.lock.onChange((holder) => {
      if (holder === 'playback' && microphone.active) violations.push('playback while capturing');
    });

    const running = loop.run();
    const typed = ['thanks', 'hello', 'goodbye'].map((text) => loop.submitText(text));
    await vi.waitFor(() => expect(microphone.starts).toBeGreaterThanOrEqual(40), { timeout: 8000, interval: 10 });
    await Promise.all(typed);
    await loop.shutdown();
    await running;

    expect(probe.overlaps).toBe(0);
    expect(violations).toEqual([]);
    for (const event of h.events) {
      if (event.type === 'state') expect(canTransition(event.data.from, event.data.to)).toBe(true);
    }
    expect(loop.getStats().textInputs).toBe(3);
    expect(loop.getStats().exchanges).toBeGreaterThanOrEqual(3);
  });
});
