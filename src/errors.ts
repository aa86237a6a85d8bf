export class VoiceEngineError extends Error {
  constructor(message: string, public readonly code: string, public readonly details?: unknown) {
    super(message);
    this.name = 'VoiceEngineError';
  }
}

export class AudioUnavailableError extends VoiceEngineError {
  constructor(reason: string) {
    super(`Audio capture unavailable: ${reason}`, 'AUDIO_UNAVAILABLE', { reason });
    this.name = 'AudioUnavailableError';
  }
}

export class TranscriptionError extends VoiceEngineError {
  constructor(originalError: unknown) {
    super(
      `Speech-to-text failed: ${describeError(originalError)}`,
      'TRANSCRIPTION_FAILED',
      { originalError }
    );
    this.name = 'TranscriptionError';
  }
}

export type LanguageModelErrorKind = 'auth' | 'timeout' | 'network' | 'unavailable' | 'invalid-response';

export class LanguageModelError extends VoiceEngineError {
  constructor(public readonly kind: LanguageModelErrorKind, message: string, originalError?: unknown) {
    super(message, 'LANGUAGE_MODEL_UNAVAILABLE', { kind, originalError });
    this.name = 'LanguageModelError';
  }

  get retryable(): boolean {
    return this.kind === 'timeout' || this.kind === 'network';
  }
}

export class OperationTimeoutError extends VoiceEngineError {
  constructor(public readonly operation: string, public readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'OPERATION_TIMEOUT', { operation, timeoutMs });
    this.name = 'OperationTimeoutError';
  }
}

export class ShutdownRequestedError extends VoiceEngineError {
  constructor() {
    super('Shutdown requested', 'SHUTDOWN_REQUESTED');
    this.name = 'ShutdownRequestedError';
  }
}

export class ConfigError extends VoiceEngineError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`, 'INVALID_CONFIG', { issues });
    this.name = 'ConfigError';
  }
}

export class InvalidTransitionError extends VoiceEngineError {
  constructor(from: string, to: string) {
    super(`Invalid voice loop transition ${from} → ${to}`, 'INVALID_TRANSITION', { from, to });
    this.name = 'InvalidTransitionError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function isShutdown(error: unknown): error is ShutdownRequestedError {
  return error instanceof ShutdownRequestedError;
}
