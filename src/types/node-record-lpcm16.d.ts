declare module 'node-record-lpcm16' {
  import type { Readable } from 'stream';

  export interface RecordOptions {
    sampleRate?: number;
    channels?: number;
    audioType?: string;
    recorder?: 'sox' | 'rec' | 'arecord';
    device?: string;
    threshold?: number;
    silence?: string;
    endOnSilence?: boolean;
  }

  export interface Recording {
    stream(): Readable;
    stop(): void;
    pause(): void;
    resume(): void;
    isPaused(): boolean;
  }

  export function record(options?: RecordOptions): Recording;

  const recorder: { record: typeof record };
  export default recorder;
}
