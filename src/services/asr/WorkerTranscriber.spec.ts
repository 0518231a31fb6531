import { describe, it, expect } from 'vitest';
import { TranscriptionFailedError } from '../../core/contracts';
import { encodeSamples, FramedRequester, readTranscriptText, WorkerTranscriber } from './WorkerTranscriber';

interface RecordedRequest {
  payload: Record<string, unknown>;
  timeoutMs: number;
  binaryData?: Buffer;
}

class FakeWorker implements FramedRequester {
  public readonly requests: RecordedRequest[] = [];
  public started = 0;
  public stopped = 0;
  public result: unknown = { text: '' };
  public failure: Error | undefined;

  public async start(): Promise<void> {
    this.started += 1;
  }

  public async request(payload: Record<string, unknown>, timeoutMs: number, binaryData?: Buffer): Promise<unknown> {
    this.requests.push({ payload, timeoutMs, binaryData });
    if (this.failure) {
      throw this.failure;
    }

    return this.result;
  }

  public async stop(): Promise<void> {
    this.stopped += 1;
  }
}

const config = { asrCommand: 'murmur-asr-worker', asrArgs: ['--serve'], asrTimeoutMs: 30000 };

describe('encodeSamples', () => {
  it('should pack samples as little-endian float32', () => {
    const buffer = encodeSamples(new Float32Array([0.5, -1]));

    expect(buffer.length).toBe(8);
    expect(buffer.readFloatLE(0)).toBe(0.5);
    expect(buffer.readFloatLE(4)).toBe(-1);
  });
});

describe('readTranscriptText', () => {
  it('should read text from a result object or a bare string', () => {
    expect(readTranscriptText({ text: 'hello' })).toBe('hello');
    expect(readTranscriptText('hello')).toBe('hello');
  });

  it('should treat anything else as empty', () => {
    expect(readTranscriptText({ text: 3 })).toBe('');
    expect(readTranscriptText(undefined)).toBe('');
  });
});

describe('WorkerTranscriber', () => {
  it('should send a transcribe request with the samples and language', async () => {
    const worker = new FakeWorker();
    worker.result = { text: '  hello world ' };
    const transcriber = new WorkerTranscriber(config, undefined, worker);

    const text = await transcriber.transcribe(new Float32Array([0.25, 0.5]), 'en');

    expect(text).toBe('hello world');
    expect(worker.requests).toHaveLength(1);
    expect(worker.requests[0].payload).toEqual({ action: 'transcribe', sampleRate: 16000, language: 'en' });
    expect(worker.requests[0].timeoutMs).toBe(30000);
    expect(worker.requests[0].binaryData?.length).toBe(8);
  });

  it('should leave the language out for auto-detect', async () => {
    const worker = new FakeWorker();
    await new WorkerTranscriber(config, undefined, worker).transcribe(new Float32Array([0.25]));

    expect(worker.requests[0].payload).toEqual({ action: 'transcribe', sampleRate: 16000 });
  });

  it('should skip the worker for empty audio', async () => {
    const worker = new FakeWorker();
    await expect(new WorkerTranscriber(config, undefined, worker).transcribe(new Float32Array(0))).resolves.toBe('');
    expect(worker.requests).toEqual([]);
  });

  it('should wrap worker failures', async () => {
    const worker = new FakeWorker();
    worker.failure = new Error('asr worker request timed out after 30000ms');
    const transcriber = new WorkerTranscriber(config, undefined, worker);

    const failure = transcriber.transcribe(new Float32Array([0.1]));

    await expect(failure).rejects.toBeInstanceOf(TranscriptionFailedError);
    await expect(failure).rejects.toThrow('asr worker request timed out after 30000ms');
  });

  it('should start the worker and send a warmup request', async () => {
    const worker = new FakeWorker();
    await new WorkerTranscriber(config, undefined, worker).warmup();

    expect(worker.started).toBe(1);
    expect(worker.requests.map((request) => request.payload)).toEqual([{ action: 'warmup' }]);
  });

  it('should stop the worker on shutdown', async () => {
    const worker = new FakeWorker();
    await new WorkerTranscriber(config, undefined, worker).shutdown();

    expect(worker.stopped).toBe(1);
  });
});
