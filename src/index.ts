export { AssistantEngine } from './assistant-engine';
export type { EngineCollaborators, EngineEvent, EngineEventType, EngineMode, EngineStats } from './assistant-engine';
export { AudioCalibrator, pickBestDevice, scoreDevice } from './audio-calibrator';
export type { AudioCalibratorDeps, DeviceScore } from './audio-calibrator';
export { AudioLock } from './capture-lock';
export type { AudioResource, ReleaseFn } from './capture-lock';
export { abortReason, raceAbort, sleep, withDeadline } from './cancellation';
export { configSchema, createConfig, loadConfig, DEFAULT_WAKE_VARIANTS, SUPPORTED_SAMPLE_RATES } from './config';
export type { GideonConfig, GideonConfigInput } from './config';
export { formatHealth, formatStats, runConsoleCommand } from './console-commands';
export * from './errors';
export { classify, pickReply, FALLBACK_CATEGORIES } from './fallback-replies';
export type { FallbackCategory, ReplyPools } from './fallback-replies';
export { HealthMonitor } from './health-monitor';
export type { HealthMonitorDeps, HealthMonitorStats, MemoryHistory, VoiceLoopSnapshot } from './health-monitor';
export { GroqLanguageModel } from './language-model';
export { PyAudioDeviceEnumerator } from './list-microphones';
export { ConversationLog } from './memory/conversation-log';
export { ConversationMemory } from './memory/conversation-memory';
export { ResponseCache, fingerprint } from './memory/response-cache';
export type { ResponseCacheOptions, ResponseCacheStats } from './memory/response-cache';
export { Lpcm16Microphone } from './microphone';
export { ResponseEngine } from './response-engine';
export type { ResponseEngineStats, ResponseResult, ResponseTier } from './response-engine';
export { SpeechDetector } from './speech-detector';
export { GroqTranscriber } from './transcriber';
export { ConsoleSpeech, TextToSpeech } from './tts';
export { VoiceLoop, canTransition } from './voice-loop';
export type { VoiceLoopEvent, VoiceLoopState, VoiceLoopStats } from './voice-loop';
export { WakeWordMatcher, normalizeTranscript, similarity } from './wake-word-matcher';
export type { WakeWordMatch } from './wake-word-matcher';
export type * from './types/engine';
