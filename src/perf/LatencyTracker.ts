export type LatencyKind = 'chunk' | 'job';

export interface LatencySample {
  kind: LatencyKind;
  /** Length of the audio that was transcribed. */
  audioMs: number;
  asrMs: number;
  /** Enqueue to start of work. Jobs only. */
  queueMs?: number;
  /** Clipboard, focus restore and keystrokes. Jobs only. */
  deliveryMs?: number;
  /** Release to delivered text. Jobs only. */
  endToEndMs?: number;
}

export interface PercentileSummary {
  p50: number;
  p95: number;
  max: number;
  avg: number;
}

export interface LatencySummary {
  chunks: number;
  jobs: number;
  chunkAsrMs: PercentileSummary;
  jobQueueMs: PercentileSummary;
  jobAsrMs: PercentileSummary;
  jobDeliveryMs: PercentileSummary;
  jobEndToEndMs: PercentileSummary;
  /** Total ASR time over total audio time, chunks and jobs together. Below 1 keeps up with speech. */
  realTimeFactor: number;
}

const EMPTY_SUMMARY: PercentileSummary = { p50: 0, p95: 0, max: 0, avg: 0 };

// Nearest-rank percentile over an ascending list.
const nearestRank = (sorted: number[], fraction: number): number =>
  sorted[Math.min(sorted.length - 1, Math.max(0, Math.ceil(sorted.length * fraction) - 1))];

export const summarizeValues = (values: number[]): PercentileSummary => {
  if (values.length === 0) {
    return EMPTY_SUMMARY;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const total = sorted.reduce((sum, value) => sum + value, 0);

  return {
    p50: Math.round(nearestRank(sorted, 0.5)),
    p95: Math.round(nearestRank(sorted, 0.95)),
    max: Math.round(sorted[sorted.length - 1]),
    avg: Math.round(total / sorted.length)
  };
};

const pick = (samples: LatencySample[], field: 'asrMs' | 'queueMs' | 'deliveryMs' | 'endToEndMs'): number[] =>
  samples.flatMap((sample) => {
    const value = sample[field];
    return value === undefined ? [] : [value];
  });

export class LatencyTracker {
  private samples: LatencySample[] = [];

  public reset(): void {
    this.samples = [];
  }

  public record(sample: LatencySample): void {
    this.samples.push(sample);
  }

  public summarize(): LatencySummary {
    const chunks = this.samples.filter((sample) => sample.kind === 'chunk');
    const jobs = this.samples.filter((sample) => sample.kind === 'job');
    const totalAudioMs = this.samples.reduce((sum, sample) => sum + sample.audioMs, 0);
    const totalAsrMs = this.samples.reduce((sum, sample) => sum + sample.asrMs, 0);

    return {
      chunks: chunks.length,
      jobs: jobs.length,
      chunkAsrMs: summarizeValues(pick(chunks, 'asrMs')),
      jobQueueMs: summarizeValues(pick(jobs, 'queueMs')),
      jobAsrMs: summarizeValues(pick(jobs, 'asrMs')),
      jobDeliveryMs: summarizeValues(pick(jobs, 'deliveryMs')),
      jobEndToEndMs: summarizeValues(pick(jobs, 'endToEndMs')),
      realTimeFactor: totalAudioMs > 0 ? Number((totalAsrMs / totalAudioMs).toFixed(3)) : 0
    };
  }
}
