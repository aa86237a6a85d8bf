import { describe, it, expect } from 'vitest';
import {
  clamp,
  encodeWav,
  estimateSnrDb,
  frameDurationMs,
  frameEnergy,
  mean,
  percentile,
  splitFrames,
} from '../audio-utils';
import { pcmFrame } from './helpers/fakes';

describe('frameEnergy', () => {
  it('is the amplitude of a constant frame', () => {
    expect(frameEnergy(pcmFrame(1000))).toBe(1000);
    expect(frameEnergy(pcmFrame(-1000))).toBe(1000);
  });

  it('is the RMS of mixed samples', () => {
    const frame = Buffer.alloc(4);
    frame.writeInt16LE(3, 0);
    frame.writeInt16LE(-4, 2);
    expect(frameEnergy(frame)).toBeCloseTo(Math.sqrt(12.5));
  });

  it('is zero for an empty frame', () => {
    expect(frameEnergy(Buffer.alloc(0))).toBe(0);
  });
});

describe('statistics', () => {
  it('computes mean and nearest-rank percentiles', () => {
    const values = [10, 9, 8, 7, 6, 5, 4, 3, 2, 1];
    expect(mean(values)).toBe(5.5);
    expect(percentile(values, 95)).toBe(10);
    expect(percentile(values, 10)).toBe(2);
    expect(percentile([], 50)).toBe(0);
  });

  it('estimates SNR from loud against quiet frames', () => {
    expect(estimateSnrDb([100, 100, 100, 100, 100, 100, 100, 100, 100, 1000])).toBeCloseTo(20);
    expect(estimateSnrDb([200, 200, 200, 200])).toBe(0);
    expect(estimateSnrDb([])).toBe(0);
  });

  it('clamps into range', () => {
    expect(clamp(5, 10, 20)).toBe(10);
    expect(clamp(25, 10, 20)).toBe(20);
    expect(clamp(15, 10, 20)).toBe(15);
  });
});

describe('framing', () => {
  it('measures frame duration', () => {
    expect(frameDurationMs(pcmFrame(0, 480), 16000)).toBeCloseTo(30);
  });

  it('splits a chunk into fixed frames and keeps the remainder', () => {
    const frames = splitFrames(Buffer.alloc(1000), 16000, 30);
    expect(frames.map((frame) => frame.length)).toEqual([960, 40]);
  });
});

describe('encodeWav', () => {
  it('writes a 44-byte PCM header', () => {
    const pcm = pcmFrame(100, 160);
    const wav = encodeWav(pcm, 16000);

    expect(wav.length).toBe(44 + 320);
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.readUInt32LE(4)).toBe(36 + 320);
    expect(wav.toString('ascii', 8, 16)).toBe('WAVEfmt ');
    expect(wav.readUInt16LE(20)).toBe(1);
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(16000);
    expect(wav.readUInt32LE(28)).toBe(32000);
    expect(wav.readUInt16LE(32)).toBe(2);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.toString('ascii', 36, 40)).toBe('data');
    expect(wav.readUInt32LE(40)).toBe(320);
    expect(wav.subarray(44).equals(pcm)).toBe(true);
  });
});
