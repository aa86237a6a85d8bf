import type { GideonConfig } from './config';
import type { AudioLock } from './capture-lock';
import { raceAbort, withDeadline } from './cancellation';
import { clamp, estimateSnrDb, mean } from './audio-utils';
import { describeError, isShutdown } from './errors';
import type { AudioSession, CaptureDevice, DeviceEnumerator, NoiseSampler } from './types/engine';

export interface DeviceScore {
  device: CaptureDevice;
  snrDb: number;
  score: number;
}

export interface AudioCalibratorDeps {
  devices: DeviceEnumerator;
  sampler: NoiseSampler;
  lock: AudioLock;
  now?: () => number;
}

const ENUMERATION_TIMEOUT_MS = 5000;

/**
 * Channel count, default-device flag and test-capture SNR, each capped so no
 * single factor dominates.
 */
export function scoreDevice(device: CaptureDevice, snrDb: number): number {
  const channelScore = Math.min(device.channels, 2) * 0.5;
  const defaultBonus = device.isDefault ? 1 : 0;
  const snrScore = clamp(snrDb / 20, 0, 2);
  return channelScore + defaultBonus + snrScore;
}

/** Highest score wins; ties prefer the system default, then the lower index. */
export function pickBestDevice(scores: readonly DeviceScore[]): DeviceScore | null {
  let best: DeviceScore | null = null;
  for (const candidate of scores) {
    if (!best) {
      best = candidate;
      continue;
    }
    if (candidate.score > best.score) {
      best = candidate;
    } else if (candidate.score === best.score) {
      if (candidate.device.isDefault && !best.device.isDefault) {
        best = candidate;
      } else if (candidate.device.isDefault === best.device.isDefault && candidate.device.index < best.device.index) {
        best = candidate;
      }
    }
  }
  return best;
}

export class AudioCalibrator {
  private readonly settings: GideonConfig['audio'];
  private readonly devices: DeviceEnumerator;
  private readonly sampler: NoiseSampler;
  private readonly lock: AudioLock;
  private readonly now: () => number;

  private session: AudioSession;
  private scores: DeviceScore[] = [];
  private recalibrations = 0;
  private lastReason: string | null = null;

  constructor(settings: GideonConfig['audio'], deps: AudioCalibratorDeps) {
    this.settings = settings;
    this.devices = deps.devices;
    this.sampler = deps.sampler;
    this.lock = deps.lock;
    this.now = deps.now ?? Date.now;
    this.session = this.disabledSession();
  }

  getSession(): AudioSession {
    return this.session;
  }

  get lastScores(): readonly DeviceScore[] {
    return this.scores;
  }

  get recalibrationCount(): number {
    return this.recalibrations;
  }

  get lastRecalibrationReason(): string | null {
    return this.lastReason;
  }

  async calibrate(signal?: AbortSignal): Promise<AudioSession> {
    const release = await this.lock.acquire('calibration', signal);
    try {
      const next = await this.measure(signal);
      // Replace whole, never patch fields in place
      this.session = next;
      return next;
    } finally {
      release();
    }
  }

  async recalibrate(reason: string, signal?: AbortSignal): Promise<AudioSession> {
    console.log(`[AudioCalibrator] 🔄 Recalibrating (${reason})`);
    this.recalibrations++;
    this.lastReason = reason;
    return this.calibrate(signal);
  }

  private async measure(signal: AbortSignal | undefined): Promise<AudioSession> {
    let devices: CaptureDevice[];
    const deadline = withDeadline(signal, ENUMERATION_TIMEOUT_MS, 'Device enumeration');
    try {
      devices = await raceAbort(this.devices.listDevices(deadline.signal), deadline.signal);
    } catch (error) {
      if (isShutdown(error)) throw error;
      console.error(`[AudioCalibrator] ❌ Device enumeration failed: ${describeError(error)}`);
      devices = [];
    } finally {
      deadline.dispose();
    }

    if (devices.length === 0) {
      console.warn('[AudioCalibrator] ⚠️ No capture devices found, audio disabled');
      this.scores = [];
      return this.disabledSession();
    }

    const scores: DeviceScore[] = [];
    for (const device of devices) {
      const energies = await this.sample(device, this.settings.testCaptureMs, signal);
      const snrDb = estimateSnrDb(energies);
      scores.push({ device, snrDb, score: scoreDevice(device, snrDb) });
    }
    this.scores = scores;

    const best = pickBestDevice(scores);
    if (!best) return this.disabledSession();

    const ambient = await this.sample(best.device, this.settings.ambientSampleMs, signal);
    const noiseFloor = mean(ambient);
    const energyThreshold = ambient.length === 0
      ? this.settings.fallbackEnergyThreshold
      : clamp(
          noiseFloor * this.settings.energyMultiplier,
          this.settings.minEnergyThreshold,
          this.settings.maxEnergyThreshold
        );

    const session: AudioSession = Object.freeze({
      enabled: true,
      deviceId: best.device.index,
      deviceName: best.device.name,
      sampleRateHz: this.settings.sampleRateHz,
      energyThreshold,
      noiseFloor,
      lastCalibratedAt: this.now(),
    });

    console.log(
      `[AudioCalibrator] 🎤 Using "${best.device.name}" (score ${best.score.toFixed(2)}, ` +
      `threshold ${energyThreshold.toFixed(0)}, noise ${noiseFloor.toFixed(0)})`
    );
    return session;
  }

  private async sample(device: CaptureDevice, durationMs: number, signal: AbortSignal | undefined): Promise<number[]> {
    // Sampling gets twice its window plus a second of slack before it counts as failed
    const deadline = withDeadline(signal, durationMs * 2 + 1000, `Noise sampling on ${device.name}`);
    try {
      return await raceAbort(
        this.sampler.sampleEnergies(device, this.settings.sampleRateHz, durationMs, deadline.signal),
        deadline.signal
      );
    } catch (error) {
      if (isShutdown(error)) throw error;
      console.warn(`[AudioCalibrator] ⚠️ Sampling "${device.name}" failed: ${describeError(error)}`);
      return [];
    } finally {
      deadline.dispose();
    }
  }

  private disabledSession(): AudioSession {
    return Object.freeze({
      enabled: false,
      deviceId: null,
      deviceName: null,
      sampleRateHz: this.settings.sampleRateHz,
      energyThreshold: this.settings.fallbackEnergyThreshold,
      noiseFloor: 0,
      lastCalibratedAt: this.now(),
    });
  }
}
