const INITIAL_CAPACITY = 16384;

/**
 * Growable store of captured mono float samples.
 *
 * The recorder's data callback and every reader run on the same event loop, so each
 * method body is already an exclusive section; nothing here awaits.
 */
export class SampleBuffer {
  private data = new Float32Array(INITIAL_CAPACITY);
  private length = 0;
  private rate: number;

  public constructor(sampleRate = 16000) {
    this.rate = sampleRate;
  }

  public get sampleRate(): number {
    return this.rate;
  }

  public reset(sampleRate: number = this.rate): void {
    this.rate = sampleRate;
    this.length = 0;
    if (this.data.length > INITIAL_CAPACITY * 64) {
      this.data = new Float32Array(INITIAL_CAPACITY);
    }
  }

  public append(samples: ArrayLike<number>): void {
    if (samples.length === 0) {
      return;
    }

    this.ensureCapacity(this.length + samples.length);
    this.data.set(samples, this.length);
    this.length += samples.length;
  }

  public count(): number {
    return this.length;
  }

  public snapshot(): Float32Array {
    return this.data.slice(0, this.length);
  }

  /** Copies `[start, end)`, clamped to what has been captured. */
  public slice(start: number, end: number = this.length): Float32Array {
    const from = Math.max(0, Math.min(start, this.length));
    const to = Math.max(from, Math.min(end, this.length));
    return this.data.slice(from, to);
  }

  private ensureCapacity(required: number): void {
    if (required <= this.data.length) {
      return;
    }

    let capacity = this.data.length;
    while (capacity < required) {
      capacity *= 2;
    }

    const next = new Float32Array(capacity);
    next.set(this.data.subarray(0, this.length));
    this.data = next;
  }
}
