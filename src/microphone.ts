import recorder from 'node-record-lpcm16';
import { frameEnergy, splitFrames } from './audio-utils';
import { abortReason } from './cancellation';
import { AudioUnavailableError } from './errors';
import type { AudioFrame, AudioSession, CaptureDevice, MicrophoneSource, NoiseSampler } from './types/engine';

export type RecorderProgram = 'sox' | 'rec' | 'arecord';

export interface Lpcm16MicrophoneOptions {
  frameMs: number;
  recorder?: RecorderProgram;
}

type Recording = ReturnType<typeof recorder.record>;

/**
 * Maps a PyAudio device onto the recorder's `device` argument. ALSA names
 * carry their "hw:card,device" address in parentheses; other hosts take the
 * device name as is. The system default is left to the recorder.
 */
export function recorderDevice(device: { name: string; isDefault: boolean } | null): string | null {
  if (!device || device.isDefault) return null;
  const alsa = /\((hw:\d+,\d+)\)/.exec(device.name);
  return alsa?.[1] ?? device.name;
}

function chunkToBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return Buffer.from(String(chunk));
}

/**
 * Microphone capture through node-record-lpcm16 (sox/arecord), delivering
 * 16-bit mono PCM in fixed-length frames.
 */
export class Lpcm16Microphone implements MicrophoneSource, NoiseSampler {
  private readonly frameMs: number;
  private readonly program: RecorderProgram;
  private recording: Recording | null = null;
  private deviceName: string | null = null;
  private devices = new Map<number, CaptureDevice>();

  constructor(options: Lpcm16MicrophoneOptions) {
    this.frameMs = options.frameMs;
    this.program = options.recorder ?? (process.platform === 'linux' ? 'arecord' : 'sox');
  }

  startCapture(session: AudioSession): AsyncIterable<AudioFrame> {
    if (!session.enabled || session.deviceId === null) {
      throw new AudioUnavailableError('no calibrated capture device');
    }

    this.stopCapture();
    const known = this.devices.get(session.deviceId);
    const recording = this.open(session.sampleRateHz, known ? recorderDevice(known) : null);
    this.recording = recording;
    this.deviceName = session.deviceName;

    return this.frames(recording.stream(), session.sampleRateHz);
  }

  /** Safe to call mid-stream or when nothing is recording. */
  stopCapture() {
    const recording = this.recording;
    this.recording = null;
    if (recording) {
      recording.stop();
      console.log(`[Microphone] ⏹️  Capture stopped${this.deviceName ? ` on "${this.deviceName}"` : ''}`);
    }
  }

  async sampleEnergies(
    device: CaptureDevice,
    sampleRateHz: number,
    durationMs: number,
    signal?: AbortSignal
  ): Promise<number[]> {
    this.devices.set(device.index, device);
    if (signal?.aborted) throw abortReason(signal);

    const recording = this.open(sampleRateHz, recorderDevice(device));
    const energies: number[] = [];
    let capturedMs = 0;

    const onAbort = () => recording.stop();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      for await (const frame of this.frames(recording.stream(), sampleRateHz)) {
        energies.push(frameEnergy(frame));
        capturedMs += this.frameMs;
        if (capturedMs >= durationMs) break;
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      recording.stop();
    }

    if (signal?.aborted) throw abortReason(signal);
    return energies;
  }

  private open(sampleRateHz: number, device: string | null): Recording {
    return recorder.record({
      sampleRate: sampleRateHz,
      channels: 1,
      audioType: 'raw',
      recorder: this.program,
      ...(device ? { device } : {}),
    });
  }

  private async *frames(stream: AsyncIterable<unknown>, sampleRateHz: number): AsyncGenerator<AudioFrame> {
    const frameBytes = Math.floor((sampleRateHz * this.frameMs) / 1000) * 2;
    let pending: Buffer = Buffer.alloc(0);

    for await (const chunk of stream) {
      pending = Buffer.concat([pending, chunkToBuffer(chunk)]);
      const whole = pending.length - (pending.length % frameBytes);
      if (whole === 0) continue;

      for (const frame of splitFrames(pending.subarray(0, whole), sampleRateHz, this.frameMs)) {
        yield frame;
      }
      pending = pending.subarray(whole);
    }
  }
}
