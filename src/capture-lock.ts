import { abortReason } from './cancellation';

export type AudioResource = 'capture' | 'playback' | 'calibration';

export type ReleaseFn = () => void;

interface Waiter {
  owner: AudioResource;
  grant: (release: ReleaseFn) => void;
  fail: (error: Error) => void;
}

/**
 * Single exclusive audio resource shared by microphone capture, speech output
 * and calibration. At most one holder at a time; waiters are served FIFO.
 */
export class AudioLock {
  private holder: AudioResource | null = null;
  private generation = 0;
  private waiters: Waiter[] = [];
  private listeners: Set<(holder: AudioResource | null) => void> = new Set();

  get activeHolder(): AudioResource | null {
    return this.holder;
  }

  get pending(): number {
    return this.waiters.length;
  }

  onChange(listener: (holder: AudioResource | null) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  acquire(owner: AudioResource, signal?: AbortSignal): Promise<ReleaseFn> {
    if (signal?.aborted) return Promise.reject(abortReason(signal));

    if (this.holder === null && this.waiters.length === 0) {
      return Promise.resolve(this.grant(owner));
    }

    return new Promise<ReleaseFn>((resolve, reject) => {
      const waiter: Waiter = {
        owner,
        grant: (release) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(release);
        },
        fail: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      };
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        if (signal) reject(abortReason(signal));
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Frees the lock and rejects every waiter. Releases handed out earlier become no-ops. */
  releaseAll(reason: Error) {
    const waiters = this.waiters;
    this.waiters = [];
    this.generation++;
    for (const waiter of waiters) {
      waiter.fail(reason);
    }
    if (this.holder !== null) {
      this.setHolder(null);
    }
  }

  private grant(owner: AudioResource): ReleaseFn {
    this.setHolder(owner);
    const generation = this.generation;
    let released = false;

    return () => {
      if (released || generation !== this.generation) return;
      released = true;
      this.setHolder(null);
      this.next();
    };
  }

  private next() {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.grant(this.grant(waiter.owner));
    }
  }

  private setHolder(holder: AudioResource | null) {
    this.holder = holder;
    this.listeners.forEach((listener) => listener(holder));
  }
}
