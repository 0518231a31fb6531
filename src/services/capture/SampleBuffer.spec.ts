import { describe, it, expect } from 'vitest';
import { SampleBuffer } from './SampleBuffer';

describe('SampleBuffer', () => {
  it('should start empty at the given rate', () => {
    const buffer = new SampleBuffer(48000);
    expect(buffer.count()).toBe(0);
    expect(buffer.sampleRate).toBe(48000);
    expect(buffer.snapshot().length).toBe(0);
  });

  it('should append samples in order', () => {
    const buffer = new SampleBuffer();
    buffer.append([0.5, 0.25]);
    buffer.append(new Float32Array([0.125]));

    expect(buffer.count()).toBe(3);
    expect(Array.from(buffer.snapshot())).toEqual([0.5, 0.25, 0.125]);
  });

  it('should grow past its initial capacity without losing samples', () => {
    const buffer = new SampleBuffer();
    const block = new Float32Array(10000).fill(0.5);
    block[0] = 1;

    buffer.append(block);
    buffer.append(block);
    buffer.append(block);

    expect(buffer.count()).toBe(30000);
    expect(buffer.slice(20000, 20001)[0]).toBe(1);
    expect(buffer.slice(29999)[0]).toBe(0.5);
  });

  it('should copy ranges so later appends do not change earlier slices', () => {
    const buffer = new SampleBuffer();
    buffer.append([0, 0.5, 1]);
    const slice = buffer.slice(1);

    buffer.reset();
    buffer.append([0.75, 0.75, 0.75]);

    expect(Array.from(slice)).toEqual([0.5, 1]);
  });

  it('should clamp slice bounds to the captured range', () => {
    const buffer = new SampleBuffer();
    buffer.append([0, 0.5, 1]);

    expect(Array.from(buffer.slice(-4, 2))).toEqual([0, 0.5]);
    expect(Array.from(buffer.slice(2, 10))).toEqual([1]);
    expect(buffer.slice(5).length).toBe(0);
    expect(buffer.slice(2, 1).length).toBe(0);
  });

  it('should clear samples and adopt a new rate on reset', () => {
    const buffer = new SampleBuffer(16000);
    buffer.append([0.5]);
    buffer.reset(44100);

    expect(buffer.count()).toBe(0);
    expect(buffer.sampleRate).toBe(44100);
  });
});
