import { describe, it, expect } from 'vitest';
import { ffmpegCaptureArgs, Float32FrameDecoder, normalizeMicError } from './FfmpegRecorder';

const floats = (...values: number[]): Buffer => {
  const buffer = Buffer.alloc(values.length * 4);
  values.forEach((value, index) => buffer.writeFloatLE(value, index * 4));
  return buffer;
};

describe('Float32FrameDecoder', () => {
  it('should decode whole little-endian frames', () => {
    const decoder = new Float32FrameDecoder();

    expect(Array.from(decoder.push(floats(0.5, -0.25)))).toEqual([0.5, -0.25]);
  });

  it('should carry a partial frame into the next chunk', () => {
    const decoder = new Float32FrameDecoder();
    const bytes = floats(0.5, 0.75);

    expect(Array.from(decoder.push(bytes.subarray(0, 6)))).toEqual([0.5]);
    expect(Array.from(decoder.push(bytes.subarray(6)))).toEqual([0.75]);
  });

  it('should forget a partial frame after reset', () => {
    const decoder = new Float32FrameDecoder();
    decoder.push(floats(0.5).subarray(0, 2));
    decoder.reset();

    expect(Array.from(decoder.push(floats(-1)))).toEqual([-1]);
  });
});

describe('ffmpegCaptureArgs', () => {
  it('should capture mono float32 at the requested rate to stdout', () => {
    expect(ffmpegCaptureArgs(':1', 44100)).toEqual([
      '-hide_banner',
      '-loglevel',
      'error',
      '-f',
      'avfoundation',
      '-i',
      ':1',
      '-ac',
      '1',
      '-ar',
      '44100',
      '-f',
      'f32le',
      '-acodec',
      'pcm_f32le',
      'pipe:1'
    ]);
  });
});

describe('normalizeMicError', () => {
  it('should explain a missing microphone permission', () => {
    expect(normalizeMicError('[avfoundation] Operation not permitted')).toBe(
      'Microphone permission denied. Grant microphone access in System Settings > Privacy & Security > Microphone, then restart Murmur.'
    );
  });

  it('should point at the input device setting when the device is missing', () => {
    expect(normalizeMicError(':7: Input/output error')).toBe(
      'Microphone input device is unavailable. Verify MURMUR_FFMPEG_INPUT (ffmpeg -f avfoundation -list_devices true -i "").'
    );
  });

  it('should pass other ffmpeg errors through', () => {
    expect(normalizeMicError('  something odd\n')).toBe('Microphone capture failed: something odd');
    expect(normalizeMicError('')).toBe('Microphone capture failed. Verify ffmpeg availability and microphone permissions.');
  });
});
