import { StructuredLogger } from '../logging/StructuredLogger';

export type JobHandler<TJob> = (job: TJob) => Promise<void>;

export interface TranscriptionQueueOptions {
  onDepthChanged?: (depth: number) => void;
  logger?: StructuredLogger;
}

/**
 * FIFO of finished recordings with a single worker: jobs run one at a time, in the
 * order they were enqueued, however long any one of them takes.
 */
export class TranscriptionQueue<TJob> {
  private readonly jobs: TJob[] = [];
  private busy = false;
  private current: Promise<void> | undefined;

  public constructor(
    private readonly handler: JobHandler<TJob>,
    private readonly options: TranscriptionQueueOptions = {}
  ) {}

  public isBusy(): boolean {
    return this.busy;
  }

  /** Jobs waiting plus the one in flight. */
  public depth(): number {
    return this.jobs.length + (this.busy ? 1 : 0);
  }

  public enqueue(job: TJob): void {
    this.jobs.push(job);

    if (!this.busy) {
      this.startNext();
    }

    this.emitDepth();
  }

  public async whenIdle(): Promise<void> {
    while (this.current) {
      await this.current;
    }
  }

  private onJobFinished(): void {
    this.startNext();
    this.emitDepth();
  }

  private startNext(): void {
    const next = this.jobs.shift();
    if (next === undefined) {
      this.busy = false;
      this.current = undefined;
      return;
    }

    this.busy = true;
    this.current = this.runJob(next);
  }

  private async runJob(job: TJob): Promise<void> {
    try {
      // Deferred so a handler that throws synchronously still finishes after `current` is set.
      await Promise.resolve().then(() => this.handler(job));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.options.logger?.error('Transcription job handler failed', { detail });
    } finally {
      this.onJobFinished();
    }
  }

  private emitDepth(): void {
    this.options.onDepthChanged?.(this.depth());
  }
}
