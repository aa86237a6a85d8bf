import type { GideonConfig } from './config';
import { AudioCalibrator } from './audio-calibrator';
import { AudioLock } from './capture-lock';
import { describeError } from './errors';
import { HealthMonitor, type HealthMonitorStats, type MemoryHistory } from './health-monitor';
import { ConversationMemory } from './memory/conversation-memory';
import { ResponseCache, type ResponseCacheStats } from './memory/response-cache';
import { ResponseEngine, type ResponseEngineStats, type ResponseResult } from './response-engine';
import { VoiceLoop, type InputSource, type VoiceLoopEvent, type VoiceLoopState, type VoiceLoopStats } from './voice-loop';
import { WakeWordMatcher, type WakeWordMatch } from './wake-word-matcher';
import type {
  AudioSession,
  ConversationLogStore,
  DeviceEnumerator,
  HealthStatus,
  LanguageModelService,
  MicrophoneSource,
  NoiseSampler,
  SpeechOutput,
  SpeechToText,
  Utterance,
} from './types/engine';

export type EngineMode = 'starting' | 'voice' | 'text-only' | 'stopped';

export type EngineEvent =
  | { type: 'status'; data: VoiceLoopState }
  | { type: 'transcription'; data: Utterance }
  | { type: 'wake-word'; data: WakeWordMatch }
  | { type: 'response'; data: { userText: string; source: InputSource; result: ResponseResult } }
  | { type: 'mode'; data: EngineMode }
  | { type: 'calibrated'; data: { session: AudioSession; reason: string } }
  | { type: 'health'; data: HealthStatus }
  | { type: 'log'; data: string }
  | { type: 'error'; data: string };

export type EngineEventType = EngineEvent['type'];

export interface EngineCollaborators {
  devices: DeviceEnumerator;
  sampler: NoiseSampler;
  microphone: MicrophoneSource;
  transcriber: SpeechToText;
  speech: SpeechOutput;
  model: LanguageModelService;
  log?: ConversationLogStore;
  random?: () => number;
  now?: () => number;
  readMemoryMb?: () => number;
  collectGarbage?: () => void;
}

export interface EngineStats {
  recognitionSuccessRate: number;
  wakeWordHits: number;
  averageResponseLatencyMs: number;
  cacheHitRate: number;
  voiceLoop: VoiceLoopStats;
  responses: ResponseEngineStats;
  cache: ResponseCacheStats;
  health: HealthMonitorStats;
  memory: MemoryHistory;
  conversationTurns: number;
}

export class AssistantEngine {
  private readonly config: GideonConfig;
  private readonly lock = new AudioLock();
  private readonly calibrator: AudioCalibrator;
  private readonly cache: ResponseCache;
  private readonly memory: ConversationMemory;
  private readonly responder: ResponseEngine;
  private readonly loop: VoiceLoop;
  private readonly monitor: HealthMonitor;
  private mode: EngineMode = 'stopped';
  private started = false;
  private eventHandlers: Map<string, Set<(event: EngineEvent) => void>> = new Map();

  constructor(config: GideonConfig, collaborators: EngineCollaborators) {
    this.config = config;
    const { now } = collaborators;

    this.calibrator = new AudioCalibrator(config.audio, {
      devices: collaborators.devices,
      sampler: collaborators.sampler,
      lock: this.lock,
      now,
    });
    this.cache = new ResponseCache({
      capacity: config.response.cacheCapacity,
      ttlMs: config.response.cacheTtlMs,
      now,
    });
    this.memory = new ConversationMemory(config.response.memoryCapacity);
    this.responder = new ResponseEngine(config.response, {
      model: collaborators.model,
      cache: this.cache,
      memory: this.memory,
      log: collaborators.log,
      random: collaborators.random,
      now,
    });
    this.loop = new VoiceLoop(config.audio, {
      calibrator: this.calibrator,
      microphone: collaborators.microphone,
      transcriber: collaborators.transcriber,
      matcher: new WakeWordMatcher(config.wakeWord.variants, config.wakeWord.threshold),
      responder: this.responder,
      speech: collaborators.speech,
      lock: this.lock,
      now,
    });
    this.monitor = new HealthMonitor(config.health, {
      devices: collaborators.devices,
      calibrator: this.calibrator,
      model: collaborators.model,
      responder: this.responder,
      cache: this.cache,
      memory: this.memory,
      voiceLoop: () => ({ state: this.loop.getState(), textOnly: this.mode === 'text-only' }),
      requestRecalibration: (reason) => this.loop.requestRecalibration(reason),
      readMemoryMb: collaborators.readMemoryMb,
      collectGarbage: collaborators.collectGarbage,
      now,
    });

    this.loop.subscribe((event) => this.forward(event));
    this.monitor.onStatus((status) => this.emit({ type: 'health', data: status }));
  }

  on(type: EngineEventType | '*', handler: (event: EngineEvent) => void) {
    if (!this.eventHandlers.has(type)) {
      this.eventHandlers.set(type, new Set());
    }
    this.eventHandlers.get(type)?.add(handler);
  }

  off(type: EngineEventType | '*', handler: (event: EngineEvent) => void) {
    this.eventHandlers.get(type)?.delete(handler);
  }

  private emit(event: EngineEvent) {
    const deliver = (handler: (event: EngineEvent) => void) => {
      try {
        handler(event);
      } catch (error) {
        console.error(`[AssistantEngine] Handler for "${event.type}" failed: ${describeError(error)}`);
      }
    };
    this.eventHandlers.get(event.type)?.forEach(deliver);
    this.eventHandlers.get('*')?.forEach(deliver);
  }

  /** Calibrates, picks voice or text-only mode and starts supervision. */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    this.setMode('starting');
    this.log(`🚀 Starting (wake words: ${this.config.wakeWord.variants.join(', ')})`);

    const session = await this.calibrator.calibrate();
    this.emit({ type: 'calibrated', data: { session, reason: 'startup' } });

    this.monitor.start();
    this.monitor.probe().catch((error: unknown) => {
      this.reportError(`Initial health probe failed: ${describeError(error)}`);
    });

    this.startLoop();
  }

  async shutdown(): Promise<void> {
    if (this.loop.getState() === 'SHUTDOWN') return;
    this.log('👋 Shutting down');
    this.monitor.stop();
    await this.loop.shutdown();
    this.started = false;
    this.setMode('stopped');
  }

  recalibrate(): Promise<AudioSession> {
    return this.loop.requestRecalibration('command');
  }

  probe(): Promise<HealthStatus> {
    return this.monitor.probe();
  }

  submitText(text: string): Promise<ResponseResult> {
    return this.loop.submitText(text);
  }

  /** Hook for the memory reclamation pass; returns an unregister function. */
  registerCleanup(name: string, cleanup: () => void): () => void {
    return this.monitor.registerCleanup(name, cleanup);
  }

  getHealth(): HealthStatus | null {
    return this.monitor.getStatus();
  }

  getStatus(): VoiceLoopState {
    return this.loop.getState();
  }

  getMode(): EngineMode {
    return this.mode;
  }

  getSession(): AudioSession {
    return this.calibrator.getSession();
  }

  getStats(): EngineStats {
    const voiceLoop = this.loop.getStats();
    const responses = this.responder.getStats();
    const cache = this.cache.stats();
    return {
      recognitionSuccessRate: voiceLoop.recognitionSuccessRate,
      wakeWordHits: voiceLoop.wakeWordHits,
      averageResponseLatencyMs: responses.averageLatencyMs,
      cacheHitRate: cache.hitRate,
      voiceLoop,
      responses,
      cache,
      health: this.monitor.getStats(),
      memory: this.monitor.getMemoryHistory(),
      conversationTurns: this.memory.size,
    };
  }

  private startLoop() {
    if (this.loop.isRunning || this.loop.getState() === 'SHUTDOWN') return;

    if (!this.calibrator.getSession().enabled) {
      this.log('⚠️  No usable microphone, type your requests instead');
      this.setMode('text-only');
      return;
    }

    this.setMode('voice');
    this.loop.run().then(
      () => {
        if (this.loop.getState() !== 'SHUTDOWN') this.setMode('text-only');
      },
      (error: unknown) => {
        this.reportError(`Voice loop stopped: ${describeError(error)}`);
        if (this.loop.getState() !== 'SHUTDOWN') this.setMode('text-only');
      }
    );
  }

  private forward(event: VoiceLoopEvent) {
    switch (event.type) {
      case 'state':
        this.emit({ type: 'status', data: event.data.to });
        break;
      case 'calibrated':
        this.emit(event);
        // Text-only mode ends as soon as a recalibration finds a device
        if (this.mode === 'text-only' && event.data.session.enabled) {
          this.log('🎤 Microphone available again, resuming voice mode');
          this.startLoop();
        }
        break;
      default:
        this.emit(event);
    }
  }

  private setMode(mode: EngineMode) {
    if (this.mode === mode) return;
    this.mode = mode;
    this.emit({ type: 'mode', data: mode });
  }

  private log(message: string) {
    console.log(`[AssistantEngine] ${message}`);
    this.emit({ type: 'log', data: message });
  }

  private reportError(message: string) {
    console.error(`[AssistantEngine] ❌ ${message}`);
    this.emit({ type: 'error', data: message });
  }
}
