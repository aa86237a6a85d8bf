// Shared data model and collaborator contracts for the voice engine.

export interface AudioSession {
  readonly enabled: boolean;
  readonly deviceId: number | null;
  readonly deviceName: string | null;
  readonly sampleRateHz: number;
  readonly energyThreshold: number;
  readonly noiseFloor: number;
  readonly lastCalibratedAt: number;
}

export interface Utterance {
  readonly rawText: string;
  readonly confidence: number;
  readonly capturedAt: number;
}

export interface ConversationTurn {
  readonly userText: string;
  readonly assistantText: string;
  readonly timestamp: number;
}

export interface CachedResponse {
  readonly reply: string;
  readonly createdAt: number;
}

export type ComponentState = 'OK' | 'DEGRADED' | 'FAILED';

export interface ComponentHealth {
  readonly state: ComponentState;
  readonly lastCheckedAt: number;
  readonly detail: string;
}

export type HealthComponent = 'audio' | 'language-model' | 'memory' | 'voice-loop';

export interface HealthStatus {
  readonly checkedAt: number;
  readonly components: Readonly<Record<HealthComponent, ComponentHealth>>;
  readonly flags: {
    readonly audioUnavailable: boolean;
    readonly languageModelBypassed: boolean;
    readonly memoryCeilingExceeded: boolean;
  };
}

export interface CaptureDevice {
  index: number;
  name: string;
  sampleRate: number;
  channels: number;
  isDefault: boolean;
}

// 16-bit little-endian mono PCM
export type AudioFrame = Buffer;

export interface MicrophoneSource {
  startCapture(session: AudioSession): AsyncIterable<AudioFrame>;
  stopCapture(): void;
}

export interface DeviceEnumerator {
  listDevices(signal?: AbortSignal): Promise<CaptureDevice[]>;
}

export interface NoiseSampler {
  /** Captures `durationMs` of audio from a device and returns per-frame RMS energies. */
  sampleEnergies(
    device: CaptureDevice,
    sampleRateHz: number,
    durationMs: number,
    signal?: AbortSignal
  ): Promise<number[]>;
}

export interface SpeechToText {
  transcribe(frames: AudioFrame[], session: AudioSession, signal: AbortSignal): Promise<Utterance>;
}

export interface SpeechOutput {
  speak(text: string, signal: AbortSignal): Promise<void>;
  cancel(): void;
}

export interface LanguageModelService {
  readonly hasCredential: boolean;
  generate(prompt: string, context: readonly ConversationTurn[], signal: AbortSignal): Promise<string>;
  ping(signal: AbortSignal): Promise<void>;
}

export interface ConversationLogStore {
  appendTurn(turn: ConversationTurn): Promise<void>;
}
