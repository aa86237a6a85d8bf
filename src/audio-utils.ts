// PCM helpers. Frames are 16-bit little-endian mono.

const BYTES_PER_SAMPLE = 2;

/** Root-mean-square amplitude of a PCM frame, in raw sample units (0..32768). */
export function frameEnergy(frame: Buffer): number {
  const samples = Math.floor(frame.length / BYTES_PER_SAMPLE);
  if (samples === 0) return 0;

  let sumSquares = 0;
  for (let i = 0; i < samples; i++) {
    const sample = frame.readInt16LE(i * BYTES_PER_SAMPLE);
    sumSquares += sample * sample;
  }
  return Math.sqrt(sumSquares / samples);
}

export function frameDurationMs(frame: Buffer, sampleRateHz: number): number {
  return (frame.length / BYTES_PER_SAMPLE / sampleRateHz) * 1000;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = Math.min(sorted.length - 1, Math.max(0, Math.round((p / 100) * (sorted.length - 1))));
  return sorted[rank] ?? 0;
}

/**
 * Signal-to-noise estimate of a short capture: loud frames (95th percentile)
 * against the quiet ones (10th percentile). Energies below 1 count as 1.
 */
export function estimateSnrDb(energies: readonly number[]): number {
  if (energies.length === 0) return 0;
  const signal = Math.max(1, percentile(energies, 95));
  const noise = Math.max(1, percentile(energies, 10));
  return 20 * Math.log10(signal / noise);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Wraps raw PCM in a 44-byte RIFF/WAVE header so speech-to-text services accept it. */
export function encodeWav(pcm: Buffer, sampleRateHz: number, channels = 1): Buffer {
  const header = Buffer.alloc(44);
  const byteRate = sampleRateHz * channels * BYTES_PER_SAMPLE;

  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRateHz, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(channels * BYTES_PER_SAMPLE, 32);
  header.writeUInt16LE(16, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}

/** Splits a PCM chunk into frames of `frameMs`; the trailing partial frame is kept. */
export function splitFrames(chunk: Buffer, sampleRateHz: number, frameMs: number): Buffer[] {
  const frameBytes = Math.max(
    BYTES_PER_SAMPLE,
    Math.floor((sampleRateHz * frameMs) / 1000) * BYTES_PER_SAMPLE
  );
  const frames: Buffer[] = [];
  for (let offset = 0; offset < chunk.length; offset += frameBytes) {
    frames.push(chunk.subarray(offset, Math.min(chunk.length, offset + frameBytes)));
  }
  return frames;
}
