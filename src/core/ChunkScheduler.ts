import { StructuredLogger } from '../logging/StructuredLogger';
import { LatencyTracker } from '../perf/LatencyTracker';
import { resampleTo16k } from '../services/capture/resample';
import { Transcriber } from './contracts';
import { mergeTranscription } from './mergeTranscription';
import { SessionState } from './SessionState';

export interface ChunkSchedulerOptions {
  chunkDurationSeconds: number;
  overlapDurationSeconds: number;
  language?: string;
  onLiveText: (text: string, sessionId: number) => void;
  latencyTracker?: LatencyTracker;
  logger?: StructuredLogger;
}

interface ChunkTicket {
  sessionId: number;
  previousEndSample: number;
  endSample: number;
  abandoned: boolean;
}

export class ChunkScheduler {
  private timer: NodeJS.Timeout | undefined;
  private chunkBusy = false;
  private inFlight: ChunkTicket | undefined;
  private inFlightPromise: Promise<void> | undefined;
  private chunkCount = 0;

  public constructor(
    private readonly state: SessionState,
    private readonly transcriber: Transcriber,
    private readonly options: ChunkSchedulerOptions
  ) {}

  public isChunkBusy(): boolean {
    return this.chunkBusy;
  }

  public getChunkCount(): number {
    return this.chunkCount;
  }

  public overlapSamples(sampleRate: number = this.state.sampleRate): number {
    return Math.floor(this.options.overlapDurationSeconds * sampleRate);
  }

  /** First sample the final job has to transcribe itself. */
  public tailStartSample(): number {
    return Math.max(0, this.state.lastChunkEndSample - this.overlapSamples());
  }

  public start(): void {
    this.stop();
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.chunkDurationSeconds * 1000);
  }

  public stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /**
   * Stops ticking for the session that just stopped recording. A chunk still in flight
   * for that session is abandoned and its audio handed back to the final tail.
   */
  public halt(): void {
    this.stop();

    const ticket = this.inFlight;
    if (!ticket || ticket.abandoned || !this.state.isCurrent(ticket.sessionId)) {
      return;
    }

    ticket.abandoned = true;
    this.state.lastChunkEndSample = ticket.previousEndSample;
    this.options.logger?.debug('In-flight chunk abandoned at stop', {
      sessionId: ticket.sessionId,
      rewoundToSample: ticket.previousEndSample
    });
  }

  public async whenSettled(): Promise<void> {
    while (this.inFlightPromise) {
      await this.inFlightPromise;
    }
  }

  /** One scheduling step. Returns the in-flight chunk promise when a chunk was dispatched. */
  public tick(): Promise<void> | undefined {
    const state = this.state;
    if (!state.recording || this.chunkBusy) {
      return undefined;
    }

    const sampleRate = state.sampleRate;
    const totalSamples = state.buffer.count();
    if (totalSamples < this.options.chunkDurationSeconds * sampleRate) {
      return undefined;
    }

    const startSample = Math.max(0, state.lastChunkEndSample - this.overlapSamples(sampleRate));
    const window = state.buffer.slice(startSample, totalSamples);
    const ticket: ChunkTicket = {
      sessionId: state.sessionId,
      previousEndSample: state.lastChunkEndSample,
      endSample: totalSamples,
      abandoned: false
    };

    state.lastChunkEndSample = totalSamples;
    this.chunkBusy = true;
    this.inFlight = ticket;
    this.chunkCount += 1;

    const promise = this.runChunk(ticket, window, sampleRate);
    if (this.inFlight === ticket) {
      this.inFlightPromise = promise;
    }

    return promise;
  }

  private async runChunk(ticket: ChunkTicket, window: Float32Array, sampleRate: number): Promise<void> {
    const startedAt = Date.now();
    const audioMs = (window.length / sampleRate) * 1000;
    let merged = false;

    try {
      const text = (await this.transcriber.transcribe(resampleTo16k(window, sampleRate), this.options.language)).trim();
      const asrMs = Date.now() - startedAt;
      this.options.latencyTracker?.record({ kind: 'chunk', audioMs, asrMs });

      if (!this.isApplicable(ticket)) {
        this.options.logger?.debug('Discarding stale chunk result', {
          chunkSessionId: ticket.sessionId,
          activeSessionId: this.state.sessionId,
          abandoned: ticket.abandoned
        });
        return;
      }

      if (!text) {
        return;
      }

      this.state.accumulatedText = mergeTranscription(this.state.accumulatedText, text);
      this.options.logger?.info('Chunk merged', {
        sessionId: ticket.sessionId,
        sampleRangeEnd: ticket.endSample,
        chunkLength: text.length,
        accumulatedLength: this.state.accumulatedText.length,
        audioMs: Math.round(audioMs),
        asrMs
      });
      merged = true;
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.options.logger?.debug('Chunk transcription failed', { sessionId: ticket.sessionId, detail });

      // The next tick re-covers this window together with the newer audio.
      if (this.isApplicable(ticket)) {
        this.state.lastChunkEndSample = ticket.previousEndSample;
      }
    } finally {
      this.chunkBusy = false;
      if (this.inFlight === ticket) {
        this.inFlight = undefined;
        this.inFlightPromise = undefined;
      }
    }

    if (merged) {
      this.publishLiveText(ticket.sessionId);
    }
  }

  private publishLiveText(sessionId: number): void {
    try {
      this.options.onLiveText(this.state.accumulatedText, sessionId);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.options.logger?.warn('Live text listener failed', { sessionId, detail });
    }
  }

  private isApplicable(ticket: ChunkTicket): boolean {
    return !ticket.abandoned && this.state.recording && this.state.isCurrent(ticket.sessionId);
  }
}
