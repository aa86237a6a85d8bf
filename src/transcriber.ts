import { experimental_transcribe as transcribe } from 'ai';
import { createGroq } from '@ai-sdk/groq';
import type { GideonConfig } from './config';
import { encodeWav } from './audio-utils';
import { abortReason } from './cancellation';
import { TranscriptionError } from './errors';
import type { AudioFrame, AudioSession, SpeechToText, Utterance } from './types/engine';

export interface GroqTranscriberOptions {
  apiKey: string;
  speech: GideonConfig['speech'];
  /** Names Whisper should expect to hear, e.g. the wake word */
  vocabulary?: readonly string[];
  now?: () => number;
}

/**
 * Whisper on Groq. Whisper reports no per-utterance confidence, so every
 * transcript carries 1.0.
 */
export class GroqTranscriber implements SpeechToText {
  private readonly groq: ReturnType<typeof createGroq>;
  private readonly speech: GideonConfig['speech'];
  private readonly prompt: string;
  private readonly now: () => number;

  constructor(options: GroqTranscriberOptions) {
    this.groq = createGroq({ apiKey: options.apiKey });
    this.speech = options.speech;
    this.now = options.now ?? Date.now;

    // "Previous transcript" style prompt biases spelling without forcing words in
    const words = [...new Set(options.vocabulary ?? [])].slice(0, 10);
    this.prompt = words.length > 0 ? `Previous context includes: ${words.join(', ')}` : '';
  }

  async transcribe(frames: AudioFrame[], session: AudioSession, signal: AbortSignal): Promise<Utterance> {
    const capturedAt = this.now();
    const audio = encodeWav(Buffer.concat(frames), session.sampleRateHz);

    try {
      const result = await transcribe({
        model: this.groq.transcription(this.speech.transcriptionModel),
        audio,
        abortSignal: signal,
        providerOptions: {
          groq: {
            language: this.speech.language,
            temperature: 0.0,
            ...(this.prompt && { prompt: this.prompt }),
          },
        },
      });

      return { rawText: result.text.trim(), confidence: 1.0, capturedAt };
    } catch (error) {
      if (signal.aborted) throw abortReason(signal);
      throw new TranscriptionError(error);
    }
  }
}
