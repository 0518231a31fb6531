import { StructuredLogger } from '../logging/StructuredLogger';
import { LatencyTracker } from '../perf/LatencyTracker';
import { resampleTo16k } from '../services/capture/resample';
import { FocusTracker } from '../services/focus/FocusTracker';
import { JobOutcome, TranscriptionJob } from '../types';
import { InjectorService, Transcriber, TranscriptRepository } from './contracts';
import { mergeTranscription } from './mergeTranscription';

export interface JobProcessorDependencies {
  transcriber: Transcriber;
  focus: FocusTracker;
  injector: InjectorService;
  store?: TranscriptRepository;
}

export interface JobProcessorOptions {
  language?: string;
  autoSend: boolean;
  restoreSettleMs: number;
  latencyTracker?: LatencyTracker;
  logger?: StructuredLogger;
}

const sleep = async (ms: number): Promise<void> => {
  if (ms <= 0) {
    return;
  }

  await new Promise((resolve) => setTimeout(resolve, ms));
};

export class JobProcessor {
  public constructor(
    private readonly deps: JobProcessorDependencies,
    private readonly options: JobProcessorOptions
  ) {}

  public async process(job: TranscriptionJob): Promise<JobOutcome> {
    const startedAt = Date.now();
    const queueMs = Math.max(0, startedAt - job.enqueuedAt);

    let tailText: string;
    try {
      const samples16k = resampleTo16k(job.samples, job.sampleRate);
      tailText = (await this.deps.transcriber.transcribe(samples16k, this.options.language)).trim();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.options.logger?.error('Final transcription failed', { jobId: job.id, detail: reason });
      return { kind: 'transcriptionFailed', reason };
    }

    const asrMs = Date.now() - startedAt;
    const text = mergeTranscription(job.accumulatedText.trim(), tailText).trim();

    this.options.logger?.info('Final transcription complete', {
      jobId: job.id,
      tailSamples: job.samples.length,
      tailLength: tailText.length,
      accumulatedLength: job.accumulatedText.length,
      outputLength: text.length,
      queueMs,
      asrMs
    });

    if (!text) {
      return { kind: 'noSpeech' };
    }

    const savedPath = await this.persist(job.id, text);
    const outcome = await this.deliver(job, text, savedPath);
    const finishedAt = Date.now();

    this.options.latencyTracker?.record({
      kind: 'job',
      queueMs,
      audioMs: job.durationSeconds * 1000,
      asrMs,
      deliveryMs: finishedAt - startedAt - asrMs,
      endToEndMs: finishedAt - job.enqueuedAt
    });

    return outcome;
  }

  private async persist(jobId: number, text: string): Promise<string | undefined> {
    if (!this.deps.store) {
      return undefined;
    }

    try {
      const savedPath = await this.deps.store.save(text);
      this.options.logger?.info('Transcript saved', { jobId, path: savedPath });
      return savedPath;
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.options.logger?.warn('Transcript could not be saved', { jobId, detail });
      return undefined;
    }
  }

  private async deliver(job: TranscriptionJob, text: string, savedPath: string | undefined): Promise<JobOutcome> {
    const decision = await this.deps.focus.resolveDelivery(job.focus);

    try {
      await this.deps.injector.writeClipboard(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.options.logger?.error('Clipboard write failed', { jobId: job.id, detail: reason });
      return { kind: 'deliveryFailed', text, reason };
    }

    if (decision.action === 'clipboardOnly') {
      return { kind: 'clipboardOnly', text, reason: decision.reason, savedPath };
    }

    if (decision.action === 'restoreAndPaste') {
      await this.deps.focus.restore(job.focus);
      await sleep(this.options.restoreSettleMs);
    }

    try {
      await this.deps.injector.paste();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.options.logger?.warn('Paste failed; text left in clipboard', { jobId: job.id, detail });
      return { kind: 'clipboardOnly', text, reason: 'paste-failed', savedPath };
    }

    if (this.options.autoSend) {
      await this.deps.injector.send().catch((error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        this.options.logger?.warn('Send keystroke failed', { jobId: job.id, detail });
      });
    }

    return { kind: 'delivered', text, action: decision.action, savedPath };
  }
}
