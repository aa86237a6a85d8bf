import type { GideonConfig } from './config';
import type { AudioCalibrator } from './audio-calibrator';
import type { AudioLock, AudioResource, ReleaseFn } from './capture-lock';
import { abortReason, raceAbort, sleep, withDeadline } from './cancellation';
import { frameDurationMs } from './audio-utils';
import {
  AudioUnavailableError,
  InvalidTransitionError,
  OperationTimeoutError,
  ShutdownRequestedError,
  describeError,
  isShutdown,
} from './errors';
import type { ResponseEngine, ResponseResult } from './response-engine';
import { DEFAULT_SPEECH_START_FRAMES, SpeechDetector } from './speech-detector';
import type { WakeWordMatch, WakeWordMatcher } from './wake-word-matcher';
import type {
  AudioFrame,
  AudioSession,
  MicrophoneSource,
  SpeechOutput,
  SpeechToText,
  Utterance,
} from './types/engine';

export type VoiceLoopState =
  | 'IDLE'
  | 'LISTENING'
  | 'TRANSCRIBING'
  | 'MATCHING'
  | 'RESPONDING'
  | 'SPEAKING'
  | 'SHUTDOWN';

// SHUTDOWN is reachable from every state and is handled separately
const TRANSITIONS: Readonly<Record<VoiceLoopState, readonly VoiceLoopState[]>> = {
  IDLE: ['LISTENING', 'RESPONDING'],
  LISTENING: ['TRANSCRIBING', 'IDLE'],
  TRANSCRIBING: ['MATCHING', 'IDLE'],
  MATCHING: ['RESPONDING', 'LISTENING'],
  RESPONDING: ['SPEAKING', 'IDLE'],
  SPEAKING: ['IDLE'],
  SHUTDOWN: [],
};

export function canTransition(from: VoiceLoopState, to: VoiceLoopState): boolean {
  if (from === 'SHUTDOWN') return false;
  return to === 'SHUTDOWN' || TRANSITIONS[from].includes(to);
}

export type InputSource = 'voice' | 'text';

export type VoiceLoopEvent =
  | { type: 'state'; data: { from: VoiceLoopState; to: VoiceLoopState } }
  | { type: 'transcription'; data: Utterance }
  | { type: 'wake-word'; data: WakeWordMatch }
  | { type: 'response'; data: { userText: string; source: InputSource; result: ResponseResult } }
  | { type: 'calibrated'; data: { session: AudioSession; reason: string } }
  | { type: 'log'; data: string }
  | { type: 'error'; data: string };

export interface VoiceLoopStats {
  totalListens: number;
  successfulRecognitions: number;
  failures: number;
  failureStreak: number;
  recognitionTimeouts: number;
  wakeWordHits: number;
  wakeWordMisses: number;
  exchanges: number;
  textInputs: number;
  recalibrations: number;
  averageRecognitionMs: number;
  recognitionSuccessRate: number;
}

export interface VoiceLoopDeps {
  calibrator: Pick<AudioCalibrator, 'getSession' | 'recalibrate'>;
  microphone: MicrophoneSource;
  transcriber: SpeechToText;
  matcher: Pick<WakeWordMatcher, 'match'>;
  responder: Pick<ResponseEngine, 'respondDetailed'>;
  speech: SpeechOutput;
  lock: AudioLock;
  now?: () => number;
}

type CaptureResult = { kind: 'speech'; frames: AudioFrame[] } | { kind: 'timeout' };

interface Deferred<T> {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

interface QueuedText extends Deferred<ResponseResult> {
  text: string;
}

/**
 * Listen → transcribe → match → respond → speak, one exchange at a time.
 * `run()` is the only task that moves the state machine while audio is
 * enabled; it holds the audio lock for capture and playback in turn and never
 * both at once. Text input is queued and served at the IDLE edge.
 */
export class VoiceLoop {
  private readonly settings: GideonConfig['audio'];
  private readonly deps: VoiceLoopDeps;
  private readonly now: () => number;

  private state: VoiceLoopState = 'IDLE';
  private running: Promise<void> | null = null;
  private readonly shutdownController = new AbortController();
  private serial: Promise<void> = Promise.resolve();
  private listeners = new Set<(event: VoiceLoopEvent) => void>();

  private textQueue: QueuedText[] = [];
  private pendingRecalibration: string | null = null;
  private recalibrationWaiters: Deferred<AudioSession>[] = [];

  private recognitionMsTotal = 0;
  private stats = {
    totalListens: 0,
    successfulRecognitions: 0,
    failures: 0,
    failureStreak: 0,
    recognitionTimeouts: 0,
    wakeWordHits: 0,
    wakeWordMisses: 0,
    exchanges: 0,
    textInputs: 0,
    recalibrations: 0,
  };

  constructor(settings: GideonConfig['audio'], deps: VoiceLoopDeps) {
    this.settings = settings;
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  getState(): VoiceLoopState {
    return this.state;
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  subscribe(listener: (event: VoiceLoopEvent) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Runs the voice loop until shutdown or until the audio session is
   * disabled. Resolves normally in both cases; the caller checks getState().
   */
  run(): Promise<void> {
    if (this.running) return this.running;
    if (this.state === 'SHUTDOWN') return Promise.resolve();

    const running = this.serial
      .then(() => this.loop())
      .finally(() => {
        this.running = null;
        this.handOffQueuedText();
      });
    this.running = running;
    return running;
  }

  submitText(text: string): Promise<ResponseResult> {
    if (this.state === 'SHUTDOWN') return Promise.reject(new ShutdownRequestedError());

    if (this.running) {
      return new Promise<ResponseResult>((resolve, reject) => {
        this.textQueue.push({ text, resolve, reject });
      });
    }
    return this.enqueueSerial(() => this.handleText(text, this.shutdownController.signal));
  }

  /**
   * Recalibrates at the next IDLE edge, or right away when the loop is not
   * running. Resolves with the replacement session.
   */
  requestRecalibration(reason: string): Promise<AudioSession> {
    if (this.state === 'SHUTDOWN') return Promise.reject(new ShutdownRequestedError());

    if (!this.running) {
      return this.enqueueSerial(() => this.recalibrate(reason, this.shutdownController.signal));
    }
    return new Promise<AudioSession>((resolve, reject) => {
      this.pendingRecalibration ??= reason;
      this.recalibrationWaiters.push({ resolve, reject });
    });
  }

  async shutdown(): Promise<void> {
    if (this.state === 'SHUTDOWN') return;

    const reason = new ShutdownRequestedError();
    this.shutdownController.abort(reason);
    this.deps.microphone.stopCapture();
    this.deps.speech.cancel();
    this.deps.lock.releaseAll(reason);

    for (const queued of this.textQueue.splice(0)) queued.reject(reason);
    for (const waiter of this.recalibrationWaiters.splice(0)) waiter.reject(reason);
    this.pendingRecalibration = null;

    this.setState('SHUTDOWN');
    this.log('🛑 Voice loop shut down');

    await this.running?.catch((error: unknown) => {
      console.error(`[VoiceLoop] Loop ended with error during shutdown: ${describeError(error)}`);
    });
  }

  getStats(): VoiceLoopStats {
    const { successfulRecognitions, failures } = this.stats;
    const attempts = successfulRecognitions + failures;
    return {
      ...this.stats,
      averageRecognitionMs: successfulRecognitions === 0 ? 0 : this.recognitionMsTotal / successfulRecognitions,
      recognitionSuccessRate: attempts === 0 ? 0 : successfulRecognitions / attempts,
    };
  }

  /** Delay before the next listen after failures, growing with the streak. */
  retryDelayMs(): number {
    const streak = this.stats.failureStreak;
    if (streak === 0) return 0;
    return Math.min(this.settings.retryDelayMs * (1 + 0.5 * streak), this.settings.maxRetryDelayMs);
  }

  private async loop(): Promise<void> {
    const signal = this.shutdownController.signal;
    this.log('🎙️  Voice loop started');

    while (!signal.aborted) {
      try {
        // IDLE edge: the only place session replacement and text input happen
        await this.applyPendingRecalibration(signal);
        await this.drainTextQueue(signal);

        const session = this.deps.calibrator.getSession();
        if (!session.enabled) {
          this.log('⚠️  Audio unavailable, voice loop paused (text input only)');
          return;
        }

        await this.listenCycle(session, signal);
      } catch (error) {
        if (isShutdown(error) || signal.aborted) return;

        this.stats.failures++;
        this.stats.failureStreak++;
        this.reportError(`Voice loop cycle failed: ${describeError(error)}`);
        this.markRecalibration('audio-error');
        this.returnToIdle();
      }

      const delay = this.retryDelayMs();
      if (delay > 0) {
        try {
          await sleep(delay, signal);
        } catch {
          return;
        }
      }
    }
  }

  private async listenCycle(session: AudioSession, signal: AbortSignal): Promise<void> {
    let releaseCapture = await this.acquire('capture', signal);
    if (!releaseCapture) return;

    let afterMiss = false;
    try {
      for (;;) {
        this.transition('LISTENING');
        if (afterMiss && this.hasIdleWork()) {
          // Queued text and recalibration only run at the IDLE edge
          this.transition('IDLE');
          return;
        }
        this.stats.totalListens++;

        const capture = await this.capture(session, signal);
        if (capture.kind === 'timeout') {
          this.stats.recognitionTimeouts++;
          this.transition('IDLE');
          return;
        }

        this.transition('TRANSCRIBING');
        const utterance = await this.transcribe(capture.frames, session, signal);
        if (!utterance) {
          this.transition('IDLE');
          return;
        }

        this.transition('MATCHING');
        const match = this.deps.matcher.match(utterance.rawText);
        if (!match.matched) {
          // Ambient chatter: back to listening with no side effects
          this.stats.wakeWordMisses++;
          afterMiss = true;
          continue;
        }

        this.stats.wakeWordHits++;
        this.emit({ type: 'wake-word', data: match });
        console.log(`[VoiceLoop] 🎯 Wake word "${match.variant}" (${(match.score * 100).toFixed(0)}%)`);

        // Capture is never held across the network round trip
        releaseCapture();
        releaseCapture = null;

        const command = match.remainingText || normalizeForCommand(utterance.rawText);
        await this.exchange(command, 'voice', signal);
        return;
      }
    } finally {
      releaseCapture?.();
    }
  }

  private async capture(session: AudioSession, signal: AbortSignal): Promise<CaptureResult> {
    const { microphone } = this.deps;
    const detector = new SpeechDetector({
      energyThreshold: session.energyThreshold,
      speechStartFrames: DEFAULT_SPEECH_START_FRAMES,
      trailingSilenceMs: this.settings.trailingSilenceMs,
      listenTimeoutMs: this.settings.listenTimeoutMs,
      phraseTimeLimitMs: this.settings.phraseTimeLimitMs,
    });

    // Wall-clock bound for a source that stalls without delivering frames
    const deadline = withDeadline(
      signal,
      this.settings.listenTimeoutMs + this.settings.phraseTimeLimitMs,
      'Listening'
    );

    let received = 0;
    try {
      const iterator = microphone.startCapture(session)[Symbol.asyncIterator]();
      for (;;) {
        const step = await raceAbort(iterator.next(), deadline.signal);
        if (step.done) {
          if (received === 0) throw new AudioUnavailableError('capture ended without delivering audio');
          break;
        }
        received++;

        const verdict = detector.push(step.value, frameDurationMs(step.value, session.sampleRateHz));
        if (verdict === 'complete' || verdict === 'timeout') break;
      }
    } catch (error) {
      if (signal.aborted) throw abortReason(signal);
      if (!(error instanceof OperationTimeoutError)) throw error;
    } finally {
      deadline.dispose();
      microphone.stopCapture();
    }

    const verdict = detector.finish();
    // A phrase cut off by the wall-clock bound is still worth transcribing
    return verdict === 'complete' ? { kind: 'speech', frames: detector.frames } : { kind: 'timeout' };
  }

  private async transcribe(frames: AudioFrame[], session: AudioSession, signal: AbortSignal): Promise<Utterance | null> {
    const startedAt = this.now();
    const deadline = withDeadline(signal, this.settings.transcriptionTimeoutMs, 'Transcription');

    try {
      const utterance = await raceAbort(
        this.deps.transcriber.transcribe(frames, session, deadline.signal),
        deadline.signal
      );

      if (!utterance.rawText.trim()) {
        this.stats.recognitionTimeouts++;
        return null;
      }

      this.stats.successfulRecognitions++;
      this.stats.failureStreak = 0;
      this.recognitionMsTotal += Math.max(0, this.now() - startedAt);

      console.log(`[VoiceLoop] 💬 "${utterance.rawText}"`);
      this.emit({ type: 'transcription', data: utterance });
      return utterance;
    } catch (error) {
      if (signal.aborted) throw abortReason(signal);

      this.stats.failures++;
      this.stats.failureStreak++;
      this.reportError(`Transcription failed (${this.stats.failureStreak} in a row): ${describeError(error)}`);

      if (this.stats.failureStreak >= this.settings.failuresBeforeRecalibration) {
        this.markRecalibration('failure');
      }
      return null;
    } finally {
      deadline.dispose();
    }
  }

  /** IDLE or MATCHING → RESPONDING → SPEAKING → IDLE */
  private async exchange(userText: string, source: InputSource, signal: AbortSignal): Promise<ResponseResult> {
    this.transition('RESPONDING');
    const result = await this.deps.responder.respondDetailed(userText, { signal });
    if (signal.aborted) throw abortReason(signal);

    this.stats.exchanges++;
    console.log(`[VoiceLoop] 🤖 (${result.tier}, ${result.latencyMs}ms) ${result.text}`);
    this.emit({ type: 'response', data: { userText, source, result } });

    const releasePlayback = await this.acquire('playback', signal);
    if (!releasePlayback) {
      this.transition('IDLE');
      return result;
    }

    try {
      this.transition('SPEAKING');
      await this.speak(result.text, signal);
      this.transition('IDLE');
    } finally {
      releasePlayback();
    }
    return result;
  }

  private async speak(text: string, signal: AbortSignal): Promise<void> {
    const { speech } = this.deps;
    const deadline = withDeadline(signal, this.settings.speakTimeoutMs, 'Speech output');
    try {
      await raceAbort(speech.speak(text, deadline.signal), deadline.signal);
    } catch (error) {
      if (signal.aborted) throw abortReason(signal);
      speech.cancel();
      this.reportError(`Speech output failed: ${describeError(error)}`);
    } finally {
      deadline.dispose();
    }
  }

  private async handleText(text: string, signal: AbortSignal): Promise<ResponseResult> {
    this.stats.textInputs++;
    console.log(`[VoiceLoop] ⌨️  Text input: "${text}"`);
    try {
      return await this.exchange(text, 'text', signal);
    } catch (error) {
      if (!isShutdown(error)) this.returnToIdle();
      throw error;
    }
  }

  private async drainTextQueue(signal: AbortSignal): Promise<void> {
    while (this.textQueue.length > 0) {
      const queued = this.textQueue.shift();
      if (!queued) break;
      try {
        queued.resolve(await this.handleText(queued.text, signal));
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(describeError(error));
        queued.reject(failure);
        if (isShutdown(error) || signal.aborted) throw failure;
      }
    }
  }

  private async applyPendingRecalibration(signal: AbortSignal): Promise<void> {
    const reason = this.pendingRecalibration ?? (this.recalibrationDue() ? 'interval' : null);
    if (!reason) return;

    this.pendingRecalibration = null;
    const waiters = this.recalibrationWaiters.splice(0);
    try {
      const next = await this.recalibrate(reason, signal);
      for (const waiter of waiters) waiter.resolve(next);
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(describeError(error));
      for (const waiter of waiters) waiter.reject(failure);
      if (isShutdown(error) || signal.aborted) throw failure;
      this.reportError(`Recalibration failed: ${describeError(error)}`);
    }
  }

  private async recalibrate(reason: string, signal: AbortSignal): Promise<AudioSession> {
    const session = await this.deps.calibrator.recalibrate(reason, signal);
    this.stats.recalibrations++;
    if (reason === 'failure') this.stats.failureStreak = 0;
    this.emit({ type: 'calibrated', data: { session, reason } });
    return session;
  }

  private hasIdleWork(): boolean {
    return this.textQueue.length > 0 || this.pendingRecalibration !== null || this.recalibrationDue();
  }

  private recalibrationDue(): boolean {
    const session = this.deps.calibrator.getSession();
    return session.enabled && this.now() - session.lastCalibratedAt >= this.settings.recalibrationIntervalMs;
  }

  private markRecalibration(reason: string) {
    if (this.pendingRecalibration === null) {
      this.pendingRecalibration = reason;
      this.log(`🔄 Recalibration requested (${reason})`);
    }
  }

  private async acquire(owner: AudioResource, signal: AbortSignal): Promise<ReleaseFn | null> {
    const deadline = withDeadline(signal, this.settings.lockTimeoutMs, `Audio lock for ${owner}`);
    try {
      return await this.deps.lock.acquire(owner, deadline.signal);
    } catch (error) {
      if (signal.aborted) throw abortReason(signal);
      if (error instanceof OperationTimeoutError) {
        this.reportError(`${error.message} (held by ${this.deps.lock.activeHolder ?? 'nobody'})`);
        return null;
      }
      throw error;
    } finally {
      deadline.dispose();
    }
  }

  private enqueueSerial<T>(job: () => Promise<T>): Promise<T> {
    const result = this.serial.then(job);
    this.serial = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private handOffQueuedText() {
    for (const queued of this.textQueue.splice(0)) {
      this.enqueueSerial(() => this.handleText(queued.text, this.shutdownController.signal)).then(
        queued.resolve,
        (error: unknown) => queued.reject(error instanceof Error ? error : new Error(describeError(error)))
      );
    }
  }

  private transition(to: VoiceLoopState) {
    // Shutdown wins any race with the task still unwinding
    if (this.state === 'SHUTDOWN') throw new ShutdownRequestedError();
    if (!canTransition(this.state, to)) {
      throw new InvalidTransitionError(this.state, to);
    }
    this.setState(to);
  }

  private returnToIdle() {
    if (this.state !== 'IDLE' && this.state !== 'SHUTDOWN' && canTransition(this.state, 'IDLE')) {
      this.setState('IDLE');
    }
  }

  private setState(to: VoiceLoopState) {
    const from = this.state;
    if (from === to) return;
    this.state = to;
    this.emit({ type: 'state', data: { from, to } });
  }

  private log(message: string) {
    console.log(`[VoiceLoop] ${message}`);
    this.emit({ type: 'log', data: message });
  }

  private reportError(message: string) {
    console.error(`[VoiceLoop] ❌ ${message}`);
    this.emit({ type: 'error', data: message });
  }

  private emit(event: VoiceLoopEvent) {
    this.listeners.forEach((listener) => {
      try {
        listener(event);
      } catch (error) {
        console.error(`[VoiceLoop] Listener failed on "${event.type}": ${describeError(error)}`);
      }
    });
  }
}

function normalizeForCommand(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}
