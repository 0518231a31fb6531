import { TranscriptionFailedError, Transcriber } from '../../core/contracts';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { AppConfig } from '../../types';
import { TARGET_SAMPLE_RATE } from '../capture/resample';
import { PersistentFramedWorker } from '../process/PersistentFramedWorker';

const WARMUP_TIMEOUT_MS = 20000;

export interface FramedRequester {
  start: () => Promise<void>;
  request: (payload: Record<string, unknown>, timeoutMs: number, binaryData?: Buffer) => Promise<unknown>;
  stop: () => Promise<void>;
}

/** Packs samples as little-endian float32, the worker's wire format. */
export const encodeSamples = (samples: Float32Array): Buffer => {
  const buffer = Buffer.allocUnsafe(samples.length * 4);
  for (let index = 0; index < samples.length; index += 1) {
    buffer.writeFloatLE(samples[index], index * 4);
  }

  return buffer;
};

export const readTranscriptText = (result: unknown): string => {
  if (typeof result === 'string') {
    return result;
  }

  if (typeof result === 'object' && result !== null && 'text' in result) {
    const text = result.text;
    return typeof text === 'string' ? text : '';
  }

  return '';
};

export class WorkerTranscriber implements Transcriber {
  private readonly worker: FramedRequester;

  public constructor(
    private readonly config: Pick<AppConfig, 'asrCommand' | 'asrArgs' | 'asrTimeoutMs'>,
    private readonly logger?: StructuredLogger,
    worker?: FramedRequester
  ) {
    this.worker =
      worker ??
      new PersistentFramedWorker({
        name: 'asr',
        command: this.config.asrCommand,
        args: this.config.asrArgs,
        env: { ...process.env },
        logger: this.logger
      });
  }

  public async warmup(): Promise<void> {
    await this.worker.start();
    await this.worker.request({ action: 'warmup' }, WARMUP_TIMEOUT_MS);
    this.logger?.info('ASR worker warmed up');
  }

  public async transcribe(samples16k: Float32Array, language?: string): Promise<string> {
    if (samples16k.length === 0) {
      return '';
    }

    const payload: Record<string, unknown> = {
      action: 'transcribe',
      sampleRate: TARGET_SAMPLE_RATE
    };
    if (language) {
      payload.language = language;
    }

    try {
      const result = await this.worker.request(payload, this.config.asrTimeoutMs, encodeSamples(samples16k));
      return readTranscriptText(result).trim();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new TranscriptionFailedError(detail, { cause: error });
    }
  }

  public async shutdown(): Promise<void> {
    await this.worker.stop();
  }
}
