import type { GideonConfig } from './config';
import type { AudioCalibrator } from './audio-calibrator';
import { raceAbort, withDeadline } from './cancellation';
import { LanguageModelError, describeError } from './errors';
import type { ConversationMemory } from './memory/conversation-memory';
import type { ResponseCache } from './memory/response-cache';
import type { ResponseEngine } from './response-engine';
import type { VoiceLoopState } from './voice-loop';
import type {
  ComponentHealth,
  ComponentState,
  DeviceEnumerator,
  HealthComponent,
  HealthStatus,
  LanguageModelService,
} from './types/engine';

const ENUMERATION_TIMEOUT_MS = 5000;
// Capacities come back once usage drops this far below the ceiling
const RESTORE_RATIO = 0.7;

export interface VoiceLoopSnapshot {
  state: VoiceLoopState;
  textOnly: boolean;
}

export interface HealthMonitorDeps {
  devices: DeviceEnumerator;
  calibrator: Pick<AudioCalibrator, 'getSession'>;
  model: LanguageModelService;
  responder: Pick<ResponseEngine, 'remoteFailureStreak' | 'remoteBypassed' | 'setRemoteBypass' | 'clearCaches'>;
  cache: ResponseCache;
  memory: ConversationMemory;
  voiceLoop: () => VoiceLoopSnapshot;
  requestRecalibration: (reason: string) => Promise<unknown>;
  readMemoryMb?: () => number;
  collectGarbage?: () => void;
  now?: () => number;
}

export interface MemorySample {
  at: number;
  rssMb: number;
}

export interface MemoryHistory {
  samples: MemorySample[];
  peakMb: number;
  averageMb: number;
}

export interface HealthMonitorStats {
  probes: number;
  forcedCleanups: number;
  capacityReductions: number;
  capacityRestores: number;
  recalibrationRequests: number;
}

function residentSetMb(): number {
  return process.memoryUsage().rss / (1024 * 1024);
}

function exposedGc(): void {
  // Only present when node runs with --expose-gc
  const gc: unknown = Reflect.get(globalThis, 'gc');
  if (typeof gc === 'function') gc();
}

/**
 * Periodic probe of audio, language model, process memory and the voice
 * loop. Corrective actions stay local and reversible; probe() never throws.
 */
export class HealthMonitor {
  private readonly settings: GideonConfig['health'];
  private readonly deps: HealthMonitorDeps;
  private readonly now: () => number;
  private readonly readMemoryMb: () => number;
  private readonly collectGarbage: () => void;

  private status: HealthStatus | null = null;
  private inFlight: Promise<HealthStatus> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private listeners = new Set<(status: HealthStatus) => void>();
  private cleanups = new Map<string, () => void>();
  private history: MemorySample[] = [];

  private audioFailures = 0;
  private pingFailures = 0;
  private readonly baseCacheCapacity: number;
  private readonly baseMemoryCapacity: number;
  private counters: HealthMonitorStats = {
    probes: 0,
    forcedCleanups: 0,
    capacityReductions: 0,
    capacityRestores: 0,
    recalibrationRequests: 0,
  };

  constructor(settings: GideonConfig['health'], deps: HealthMonitorDeps) {
    this.settings = settings;
    this.deps = deps;
    this.now = deps.now ?? Date.now;
    this.readMemoryMb = deps.readMemoryMb ?? residentSetMb;
    this.collectGarbage = deps.collectGarbage ?? exposedGc;
    this.baseCacheCapacity = deps.cache.capacity;
    this.baseMemoryCapacity = deps.memory.capacity;
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.probe().catch((error: unknown) => {
        console.error(`[HealthMonitor] Probe failed: ${describeError(error)}`);
      });
    }, this.settings.probeIntervalMs);
    this.timer.unref();
    console.log(`[HealthMonitor] 🩺 Probing every ${Math.round(this.settings.probeIntervalMs / 1000)}s`);
  }

  stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Last completed probe, or null before the first one. */
  getStatus(): HealthStatus | null {
    return this.status;
  }

  onStatus(listener: (status: HealthStatus) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Runs during the reclamation pass when the memory ceiling is breached. */
  registerCleanup(name: string, cleanup: () => void): () => void {
    this.cleanups.set(name, cleanup);
    return () => this.cleanups.delete(name);
  }

  getMemoryHistory(): MemoryHistory {
    const samples = [...this.history];
    const values = samples.map((sample) => sample.rssMb);
    return {
      samples,
      peakMb: values.length === 0 ? 0 : Math.max(...values),
      averageMb: values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length,
    };
  }

  getStats(): HealthMonitorStats {
    return { ...this.counters };
  }

  /** Overlapping callers share the probe already in flight. */
  probe(): Promise<HealthStatus> {
    if (this.inFlight) return this.inFlight;

    const running = this.runProbe().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = running;
    return running;
  }

  private async runProbe(): Promise<HealthStatus> {
    this.counters.probes++;

    const [audio, languageModel] = await Promise.all([this.checkAudio(), this.checkLanguageModel()]);
    const memory = this.checkMemory();
    const voiceLoop = this.checkVoiceLoop();

    const components: Record<HealthComponent, ComponentHealth> = {
      audio,
      'language-model': languageModel,
      memory: memory.health,
      'voice-loop': voiceLoop,
    };

    // Replaced whole on every probe; readers never see a partial update
    const status: HealthStatus = Object.freeze({
      checkedAt: this.now(),
      components: Object.freeze(components),
      flags: Object.freeze({
        audioUnavailable: !this.deps.calibrator.getSession().enabled,
        languageModelBypassed: this.deps.responder.remoteBypassed,
        memoryCeilingExceeded: memory.exceeded,
      }),
    });

    this.status = status;
    this.listeners.forEach((listener) => {
      try {
        listener(status);
      } catch (error) {
        console.error(`[HealthMonitor] Status listener failed: ${describeError(error)}`);
      }
    });
    return status;
  }

  private async checkAudio(): Promise<ComponentHealth> {
    const session = this.deps.calibrator.getSession();
    let state: ComponentState = 'OK';
    let detail: string;
    let failed = false;

    const deadline = withDeadline(undefined, ENUMERATION_TIMEOUT_MS, 'Device enumeration');
    try {
      const devices = await raceAbort(this.deps.devices.listDevices(deadline.signal), deadline.signal);

      if (devices.length === 0) {
        failed = true;
        state = 'FAILED';
        detail = 'No capture devices';
      } else if (!session.enabled) {
        state = 'DEGRADED';
        detail = `Audio disabled with ${devices.length} device(s) available`;
        this.requestRecalibration('health-check-failure');
      } else if (!devices.some((device) => device.index === session.deviceId)) {
        failed = true;
        state = 'DEGRADED';
        detail = `Device ${session.deviceName ?? session.deviceId} is gone`;
      } else {
        detail = `Using ${session.deviceName ?? `device ${session.deviceId}`}`;
      }
    } catch (error) {
      failed = true;
      state = session.enabled ? 'DEGRADED' : 'FAILED';
      detail = `Device enumeration failed: ${describeError(error)}`;
    } finally {
      deadline.dispose();
    }

    if (failed) {
      this.audioFailures++;
      if (this.audioFailures >= this.settings.audioFailureThreshold) {
        this.audioFailures = 0;
        this.requestRecalibration('health-check-failure');
      }
    } else {
      this.audioFailures = 0;
    }

    return this.component(state, detail);
  }

  private async checkLanguageModel(): Promise<ComponentHealth> {
    const { model, responder } = this.deps;
    if (!model.hasCredential) {
      return this.component('FAILED', 'No GROQ_API_KEY configured, fallback replies only');
    }

    const deadline = withDeadline(undefined, this.settings.pingTimeoutMs, 'Language model ping');
    try {
      await raceAbort(model.ping(deadline.signal), deadline.signal);
      this.pingFailures = 0;
      responder.setRemoteBypass(false);
      return this.component('OK', 'Reachable');
    } catch (error) {
      this.pingFailures++;
      const streak = responder.remoteFailureStreak;

      if (error instanceof LanguageModelError && error.kind === 'auth') {
        responder.setRemoteBypass(true);
        return this.component('FAILED', error.message);
      }

      if (
        this.pingFailures >= this.settings.languageModelFailureThreshold ||
        streak >= this.settings.remoteFailureThreshold
      ) {
        responder.setRemoteBypass(true);
        return this.component(
          'DEGRADED',
          `Unreachable (${this.pingFailures} ping failure(s), ${streak} failed request(s)), using fallback replies`
        );
      }
      return this.component('DEGRADED', `Ping failed: ${describeError(error)}`);
    } finally {
      deadline.dispose();
    }
  }

  private checkMemory(): { health: ComponentHealth; exceeded: boolean } {
    const ceiling = this.settings.memoryCeilingMb;
    let rssMb = this.sampleMemory();

    if (rssMb <= ceiling) {
      if (rssMb < ceiling * RESTORE_RATIO) this.restoreCapacities();
      return { health: this.component('OK', `${rssMb.toFixed(0)}MB of ${ceiling}MB`), exceeded: false };
    }

    console.warn(`[HealthMonitor] ⚠️  Memory ${rssMb.toFixed(0)}MB over ${ceiling}MB ceiling, reclaiming`);
    this.reclaim();
    rssMb = this.sampleMemory();

    if (rssMb <= ceiling) {
      return {
        health: this.component('DEGRADED', `Reclaimed to ${rssMb.toFixed(0)}MB of ${ceiling}MB`),
        exceeded: false,
      };
    }

    this.shrinkCapacities();
    return {
      health: this.component(
        'DEGRADED',
        `${rssMb.toFixed(0)}MB over ${ceiling}MB ceiling; cache ${this.deps.cache.capacity}, memory ${this.deps.memory.capacity}`
      ),
      exceeded: true,
    };
  }

  private checkVoiceLoop(): ComponentHealth {
    const { state, textOnly } = this.deps.voiceLoop();
    if (state === 'SHUTDOWN') return this.component('FAILED', 'Shut down');
    if (textOnly) return this.component('DEGRADED', 'Audio unavailable, text input only');
    return this.component('OK', state);
  }

  private reclaim() {
    this.counters.forcedCleanups++;
    for (const [name, cleanup] of this.cleanups) {
      try {
        cleanup();
      } catch (error) {
        console.error(`[HealthMonitor] Cleanup "${name}" failed: ${describeError(error)}`);
      }
    }
    const purged = this.deps.responder.clearCaches();
    this.collectGarbage();
    console.log(`[HealthMonitor] 🧹 Reclamation pass done (${purged} expired cache entries dropped)`);
  }

  private shrinkCapacities() {
    const { cache, memory } = this.deps;
    const cacheCapacity = Math.max(this.settings.minCacheCapacity, Math.floor(cache.capacity / 2));
    const memoryCapacity = Math.max(this.settings.minMemoryCapacity, Math.floor(memory.capacity / 2));
    if (cacheCapacity === cache.capacity && memoryCapacity === memory.capacity) return;

    cache.setCapacity(cacheCapacity);
    memory.setCapacity(memoryCapacity);
    this.counters.capacityReductions++;
    console.warn(`[HealthMonitor] 📉 Capacities reduced: cache ${cacheCapacity}, memory ${memoryCapacity}`);
  }

  private restoreCapacities() {
    const { cache, memory } = this.deps;
    if (cache.capacity >= this.baseCacheCapacity && memory.capacity >= this.baseMemoryCapacity) return;

    cache.setCapacity(this.baseCacheCapacity);
    memory.setCapacity(this.baseMemoryCapacity);
    this.counters.capacityRestores++;
    console.log(`[HealthMonitor] 📈 Capacities restored: cache ${this.baseCacheCapacity}, memory ${this.baseMemoryCapacity}`);
  }

  private sampleMemory(): number {
    const rssMb = this.readMemoryMb();
    this.history.push({ at: this.now(), rssMb });
    if (this.history.length > this.settings.historySize) {
      this.history.splice(0, this.history.length - this.settings.historySize);
    }
    return rssMb;
  }

  private requestRecalibration(reason: string) {
    this.counters.recalibrationRequests++;
    console.log(`[HealthMonitor] 🔄 Requesting recalibration (${reason})`);
    this.deps.requestRecalibration(reason).catch((error: unknown) => {
      console.warn(`[HealthMonitor] Recalibration request failed: ${describeError(error)}`);
    });
  }

  private component(state: ComponentState, detail: string): ComponentHealth {
    return Object.freeze({ state, lastCheckedAt: this.now(), detail });
  }
}
