/**
 * Speech Detector
 * Energy-based voice activity detection over PCM frames. Time is counted in
 * audio duration, not wall clock, so a capture is judged by what was heard.
 */

import { frameEnergy } from './audio-utils';
import type { AudioFrame } from './types/engine';

export interface SpeechDetectorConfig {
  // RMS energy at or above which a frame counts as voiced
  energyThreshold: number;
  // Consecutive voiced frames needed to start a phrase
  speechStartFrames: number;
  trailingSilenceMs: number;
  // Give up if no phrase starts within this much audio
  listenTimeoutMs: number;
  // Hard cap on phrase length
  phraseTimeLimitMs: number;
}

export const DEFAULT_SPEECH_START_FRAMES = 2;

export type DetectorState = 'waiting' | 'speaking' | 'complete' | 'timeout';

export class SpeechDetector {
  private config: SpeechDetectorConfig;
  private state: DetectorState = 'waiting';
  private elapsedMs = 0;
  private phraseMs = 0;
  private silenceMs = 0;
  private onset: AudioFrame[] = [];
  private phrase: AudioFrame[] = [];

  constructor(config: SpeechDetectorConfig) {
    this.config = config;
  }

  get current(): DetectorState {
    return this.state;
  }

  /** Frames of the detected phrase, onset included. */
  get frames(): AudioFrame[] {
    return [...this.phrase];
  }

  push(frame: AudioFrame, durationMs: number): DetectorState {
    if (this.state === 'complete' || this.state === 'timeout') return this.state;

    this.elapsedMs += durationMs;
    const voiced = frameEnergy(frame) >= this.config.energyThreshold;

    if (this.state === 'waiting') {
      if (voiced) {
        this.onset.push(frame);
        if (this.onset.length >= this.config.speechStartFrames) {
          this.state = 'speaking';
          this.phrase = this.onset;
          this.onset = [];
          this.phraseMs = this.phrase.length * durationMs;
        }
      } else {
        this.onset = [];
      }

      if (this.state === 'waiting' && this.elapsedMs >= this.config.listenTimeoutMs) {
        this.state = 'timeout';
      }
      return this.state;
    }

    this.phrase.push(frame);
    this.phraseMs += durationMs;
    this.silenceMs = voiced ? 0 : this.silenceMs + durationMs;

    if (this.silenceMs >= this.config.trailingSilenceMs || this.phraseMs >= this.config.phraseTimeLimitMs) {
      this.state = 'complete';
    }
    return this.state;
  }

  /** The source ran dry: a started phrase completes, anything else timed out. */
  finish(): DetectorState {
    if (this.state === 'speaking') this.state = 'complete';
    else if (this.state === 'waiting') this.state = 'timeout';
    return this.state;
  }
}
