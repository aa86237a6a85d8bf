import Groq from 'groq-sdk';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { spawn, type ChildProcess } from 'child_process';
import { tmpdir } from 'os';
import { join } from 'path';
import type { GideonConfig } from './config';
import { abortReason } from './cancellation';
import type { SpeechOutput } from './types/engine';

export function cleanForSpeech(text: string): string {
  return text
    .replace(/\*\*/g, '') // Remove markdown bold
    .replace(/\*/g, '')   // Remove markdown italics
    .replace(/`/g, '')    // Remove code backticks
    .replace(/\n+/g, '. ') // Replace newlines with periods
    .trim();
}

export class TextToSpeech implements SpeechOutput {
  private client: Groq;
  private speech: GideonConfig['speech'];
  private currentPlayer: ChildProcess | null = null;
  private isCancelled = false;

  constructor(apiKey: string, speech: GideonConfig['speech']) {
    this.client = new Groq({ apiKey, maxRetries: 0 });
    this.speech = speech;
  }

  async speak(text: string, signal: AbortSignal): Promise<void> {
    // Cancel any ongoing speech
    this.cancel();
    this.isCancelled = false;

    const cleanedText = cleanForSpeech(text);
    if (!cleanedText) return;
    if (signal.aborted) throw abortReason(signal);

    const onAbort = () => this.cancel();
    signal.addEventListener('abort', onAbort, { once: true });

    const workDir = await mkdtemp(join(tmpdir(), 'gideon-tts-'));
    try {
      const response = await this.client.audio.speech.create(
        {
          model: 'playai-tts',
          voice: this.speech.voice,
          input: cleanedText,
          response_format: 'wav',
          speed: this.speech.speed,
        },
        { signal }
      );

      if (this.isCancelled) return;

      const audioPath = join(workDir, 'response.wav');
      const arrayBuffer = await response.arrayBuffer();
      await writeFile(audioPath, Buffer.from(arrayBuffer));

      if (this.isCancelled) return;

      await this.play(audioPath);
    } finally {
      signal.removeEventListener('abort', onAbort);
      await rm(workDir, { recursive: true, force: true });
    }

    if (signal.aborted) throw abortReason(signal);
  }

  cancel() {
    this.isCancelled = true;
    if (this.currentPlayer) {
      this.currentPlayer.kill();
      this.currentPlayer = null;
    }
  }

  private play(audioPath: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const player = spawn(this.speech.playerCommand, [audioPath]);
      this.currentPlayer = player;

      player.on('close', (code) => {
        if (this.currentPlayer === player) this.currentPlayer = null;
        if (this.isCancelled || code === 0) {
          // Killed players resolve silently
          resolve();
        } else {
          reject(new Error(`Audio playback failed with code ${code}`));
        }
      });

      player.on('error', (error) => {
        if (this.currentPlayer === player) this.currentPlayer = null;
        reject(error);
      });
    });
  }
}

/** Speech output for runs without a credential: replies go to stdout. */
export class ConsoleSpeech implements SpeechOutput {
  constructor(private readonly write: (line: string) => void = (line) => console.log(line)) {}

  async speak(text: string, signal: AbortSignal): Promise<void> {
    if (signal.aborted) throw abortReason(signal);
    const cleaned = cleanForSpeech(text);
    if (cleaned) this.write(`🔊 [NO TTS] ${cleaned}`);
  }

  cancel() {}
}
