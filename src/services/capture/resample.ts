export const TARGET_SAMPLE_RATE = 16000;

/**
 * Linear-interpolation resampler to 16 kHz mono.
 *
 * Lengths and source positions are computed from integer products so that rates which
 * divide evenly (44.1 kHz windows, for instance) land on exact sample counts.
 */
export const resampleTo16k = (samples: Float32Array, fromRate: number): Float32Array => {
  if (fromRate === TARGET_SAMPLE_RATE) {
    return samples;
  }

  if (samples.length === 0 || fromRate <= 0) {
    return new Float32Array(0);
  }

  const targetLength = Math.floor((samples.length * TARGET_SAMPLE_RATE) / fromRate);
  if (targetLength <= 0) {
    return new Float32Array(0);
  }

  const output = new Float32Array(targetLength);
  const lastIndex = samples.length - 1;

  for (let index = 0; index < targetLength; index += 1) {
    const sourcePosition = (index * fromRate) / TARGET_SAMPLE_RATE;
    const lower = Math.min(Math.floor(sourcePosition), lastIndex);
    const upper = Math.min(lower + 1, lastIndex);
    const fraction = sourcePosition - lower;
    output[index] = samples[lower] * (1 - fraction) + samples[upper] * fraction;
  }

  return output;
};

export const durationSeconds = (sampleCount: number, sampleRate: number): number => {
  if (sampleRate <= 0) {
    return 0;
  }

  return sampleCount / sampleRate;
};
