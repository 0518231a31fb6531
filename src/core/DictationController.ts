import { EventEmitter } from 'node:events';
import { StructuredLogger } from '../logging/StructuredLogger';
import { LatencyTracker } from '../perf/LatencyTracker';
import { AudioRecorder } from '../services/capture/AudioRecorder';
import { durationSeconds } from '../services/capture/resample';
import { FocusTracker } from '../services/focus/FocusTracker';
import {
  AppState,
  ClipboardFallbackReason,
  DeliveryReport,
  JobOutcome,
  StopOutcome,
  TranscriptionJob,
  TranscriptRecord
} from '../types';
import { ChunkScheduler } from './ChunkScheduler';
import { InjectorService, Transcriber, TranscriptRepository } from './contracts';
import { JobProcessor } from './JobProcessor';
import { SessionState } from './SessionState';
import { TranscriptionQueue } from './TranscriptionQueue';

export interface DictationDependencies {
  recorder: AudioRecorder;
  transcriber: Transcriber;
  focus: FocusTracker;
  injector: InjectorService;
  store?: TranscriptRepository;
}

export interface DictationOptions {
  chunkDurationSeconds: number;
  overlapDurationSeconds: number;
  minRecordSeconds: number;
  language?: string;
  autoSend: boolean;
  restoreSettleMs: number;
}

export const DEFAULT_DICTATION_OPTIONS: DictationOptions = {
  chunkDurationSeconds: 5,
  overlapDurationSeconds: 1.5,
  minRecordSeconds: 0.3,
  language: 'en',
  autoSend: false,
  restoreSettleMs: 150
};

export declare interface DictationController {
  on(event: 'stateChanged', listener: (state: AppState) => void): this;
  on(event: 'liveTextUpdated', listener: (text: string, sessionId: number) => void): this;
  on(event: 'queueDepthChanged', listener: (depth: number) => void): this;
  on(event: 'jobDelivered', listener: (report: DeliveryReport) => void): this;
  on(event: 'noSpeechDetected', listener: (jobId: number) => void): this;
  on(event: 'transcriptionFailed', listener: (reason: string, jobId: number) => void): this;
  on(event: 'recordingTooShort', listener: (durationSeconds: number) => void): this;
  on(event: 'clipboardFallback', listener: (reason: ClipboardFallbackReason, text: string) => void): this;
  on(event: 'deliveryFailed', listener: (reason: string, jobId: number) => void): this;
}

/**
 * Push-to-talk edges in, delivered text out. Owns the session state, the chunk
 * scheduler and the job queue; everything else is injected.
 */
export class DictationController extends EventEmitter {
  private state: AppState = { stage: 'idle', queueDepth: 0 };
  private readonly session = new SessionState();
  private readonly latencyTracker = new LatencyTracker();
  private readonly scheduler: ChunkScheduler;
  private readonly processor: JobProcessor;
  private readonly queue: TranscriptionQueue<TranscriptionJob>;
  private startPromise: Promise<void> | undefined;
  private stopInProgress = false;

  public constructor(
    private readonly deps: DictationDependencies,
    private readonly logger?: StructuredLogger,
    private readonly options: DictationOptions = DEFAULT_DICTATION_OPTIONS
  ) {
    super();

    this.scheduler = new ChunkScheduler(this.session, this.deps.transcriber, {
      chunkDurationSeconds: this.options.chunkDurationSeconds,
      overlapDurationSeconds: this.options.overlapDurationSeconds,
      language: this.options.language,
      latencyTracker: this.latencyTracker,
      logger: this.logger,
      onLiveText: (text, sessionId) => {
        this.emit('liveTextUpdated', text, sessionId);
      }
    });

    this.processor = new JobProcessor(
      {
        transcriber: this.deps.transcriber,
        focus: this.deps.focus,
        injector: this.deps.injector,
        store: this.deps.store
      },
      {
        language: this.options.language,
        autoSend: this.options.autoSend,
        restoreSettleMs: this.options.restoreSettleMs,
        latencyTracker: this.latencyTracker,
        logger: this.logger
      }
    );

    this.queue = new TranscriptionQueue<TranscriptionJob>((job) => this.runJob(job), {
      logger: this.logger,
      onDepthChanged: (depth) => {
        this.state = { ...this.state, queueDepth: depth };
        this.emit('queueDepthChanged', depth);
      }
    });
  }

  public getState(): AppState {
    return this.state;
  }

  public isRecording(): boolean {
    return this.session.recording;
  }

  public async warmup(): Promise<void> {
    await this.deps.transcriber.warmup?.();
    this.logger?.info('Transcriber warmed and ready');
  }

  public async handlePushToTalkPressed(): Promise<void> {
    if (this.startPromise || this.session.recording || this.stopInProgress) {
      return;
    }

    this.startPromise = this.startRecording();

    try {
      await this.startPromise;
    } finally {
      this.startPromise = undefined;
    }
  }

  public async handlePushToTalkReleased(): Promise<StopOutcome> {
    if (this.startPromise) {
      await this.startPromise;
    }

    if (!this.session.recording || this.stopInProgress) {
      return { kind: 'ignored' };
    }

    this.stopInProgress = true;

    try {
      return await this.stopRecording();
    } finally {
      this.stopInProgress = false;
    }
  }

  public async recentTranscripts(limit: number): Promise<TranscriptRecord[]> {
    if (!this.deps.store || limit <= 0) {
      return [];
    }

    return this.deps.store.loadRecent(limit);
  }

  public async copyTranscript(text: string): Promise<void> {
    await this.deps.injector.writeClipboard(text);
    this.logger?.info('Transcript copied to clipboard', { length: text.length });
  }

  /** Resolves once every queued job has been delivered or dropped. */
  public async whenIdle(): Promise<void> {
    await this.scheduler.whenSettled();
    await this.queue.whenIdle();
  }

  public async shutdown(): Promise<void> {
    if (this.session.recording) {
      this.session.recording = false;
      this.scheduler.halt();
      await this.deps.recorder.stop().catch((error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.warn('Recorder stop failed during shutdown', { detail });
      });
    }

    this.scheduler.stop();
    await this.whenIdle();
    await this.deps.transcriber.shutdown?.().catch((error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Transcriber shutdown failed', { detail });
    });

    this.logger?.info('Dictation controller stopped', {
      sessions: this.session.sessionId,
      latencySummary: this.latencyTracker.summarize()
    });
  }

  private async startRecording(): Promise<void> {
    const recorder = this.deps.recorder;
    this.setState({ stage: 'starting' });

    const sessionId = this.session.begin(recorder.sampleRate);

    // Capture starts at once; the focus snapshot resolves alongside it.
    const focus = this.deps.focus.captureFocus();
    const streaming = recorder.startStreaming({
      onSamples: (samples) => {
        if (!this.session.recording || !this.session.isCurrent(sessionId)) {
          return;
        }

        this.session.buffer.append(samples);
      },
      onError: (error) => {
        if (!this.session.isCurrent(sessionId)) {
          return;
        }

        // The release still delivers whatever was captured before capture ended.
        this.logger?.warn('Recorder stopped unexpectedly', { sessionId, detail: error.message });
      }
    });

    try {
      const [snapshot] = await Promise.all([focus, streaming]);
      this.session.focus = snapshot;
    } catch (error) {
      this.session.recording = false;
      const detail = error instanceof Error ? error.message : String(error);
      this.setState({ stage: 'error', detail });
      this.logger?.error('Failed to start recording', { sessionId, detail });
      return;
    }

    this.scheduler.start();
    this.setState({ stage: 'recording' });
    this.logger?.info('Recording started', {
      sessionId,
      sampleRate: recorder.sampleRate,
      focusApp: this.session.focus.appName,
      chunkDurationSeconds: this.options.chunkDurationSeconds,
      overlapDurationSeconds: this.options.overlapDurationSeconds
    });
  }

  private async stopRecording(): Promise<StopOutcome> {
    const session = this.session;

    await this.deps.recorder.stop().catch((error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Recorder stop reported an error', { sessionId: session.sessionId, detail });
    });

    session.recording = false;
    this.scheduler.halt();

    const sampleCount = session.buffer.count();
    const duration = durationSeconds(sampleCount, session.sampleRate);

    if (sampleCount === 0) {
      this.setState({ stage: 'idle' });
      this.logger?.info('Recording stopped with no audio captured', { sessionId: session.sessionId });
      return { kind: 'captureEmpty' };
    }

    if (duration < this.options.minRecordSeconds) {
      this.setState({ stage: 'idle' });
      this.logger?.info('Recording too short', { sessionId: session.sessionId, durationSeconds: duration });
      this.emit('recordingTooShort', duration);
      return { kind: 'tooShort', durationSeconds: duration };
    }

    const tailStart = this.scheduler.tailStartSample();
    const job: TranscriptionJob = {
      id: session.sessionId,
      samples: session.buffer.slice(tailStart),
      sampleRate: session.sampleRate,
      accumulatedText: session.accumulatedText,
      focus: session.focus,
      durationSeconds: duration,
      enqueuedAt: Date.now()
    };

    this.queue.enqueue(job);
    this.setState({ stage: 'idle' });
    this.logger?.info('Transcription job queued', {
      jobId: job.id,
      durationSeconds: Number(duration.toFixed(2)),
      tailStartSample: tailStart,
      tailSamples: job.samples.length,
      chunks: this.scheduler.getChunkCount(),
      queueDepth: this.queue.depth()
    });

    return { kind: 'queued', jobId: job.id, queueDepth: this.queue.depth() };
  }

  private async runJob(job: TranscriptionJob): Promise<void> {
    const outcome = await this.processor.process(job);
    this.publishOutcome(job.id, outcome);
  }

  private publishOutcome(jobId: number, outcome: JobOutcome): void {
    switch (outcome.kind) {
      case 'delivered':
        this.emit('jobDelivered', {
          jobId,
          text: outcome.text,
          action: outcome.action,
          savedPath: outcome.savedPath
        });
        return;
      case 'clipboardOnly':
        this.emit('jobDelivered', {
          jobId,
          text: outcome.text,
          action: 'clipboardOnly',
          savedPath: outcome.savedPath
        });
        this.emit('clipboardFallback', outcome.reason, outcome.text);
        return;
      case 'noSpeech':
        this.emit('noSpeechDetected', jobId);
        return;
      case 'transcriptionFailed':
        this.emit('transcriptionFailed', outcome.reason, jobId);
        return;
      case 'deliveryFailed':
        this.emit('deliveryFailed', outcome.reason, jobId);
        return;
    }
  }

  private setState(next: Omit<AppState, 'queueDepth'>): void {
    this.state = { ...next, queueDepth: this.queue.depth() };
    this.emit('stateChanged', this.state);
    this.logger?.info('State changed', {
      stage: this.state.stage,
      detail: this.state.detail,
      queueDepth: this.state.queueDepth
    });
  }
}
