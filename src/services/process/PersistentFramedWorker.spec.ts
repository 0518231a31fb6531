import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { describe, it, expect, vi } from 'vitest';
import {
  encodeRequestFrame,
  PersistentFramedWorker,
  ResponseFrameReader,
  WorkerProcess,
  WorkerRequestError
} from './PersistentFramedWorker';

const responseFrame = (json: string): Buffer => {
  const body = Buffer.from(json, 'utf8');
  const header = Buffer.alloc(4);
  header.writeUInt32LE(body.length, 0);
  return Buffer.concat([header, body]);
};

describe('encodeRequestFrame', () => {
  it('should prefix JSON and binary lengths as little-endian uint32', () => {
    const frame = encodeRequestFrame({ action: 'warmup' }, Buffer.from([1, 2, 3]));
    const json = '{"action":"warmup"}';

    expect(frame.readUInt32LE(0)).toBe(json.length);
    expect(frame.readUInt32LE(4)).toBe(3);
    expect(frame.subarray(8, 8 + json.length).toString('utf8')).toBe(json);
    expect(Array.from(frame.subarray(8 + json.length))).toEqual([1, 2, 3]);
  });

  it('should write a zero binary length when there is no payload', () => {
    const frame = encodeRequestFrame({ id: '1' });

    expect(frame.readUInt32LE(4)).toBe(0);
    expect(frame.length).toBe(8 + '{"id":"1"}'.length);
  });
});

describe('ResponseFrameReader', () => {
  it('should decode a complete frame', () => {
    const reader = new ResponseFrameReader();

    expect(reader.push(responseFrame('{"id":"a","ok":true,"result":{"text":"hi"}}'))).toEqual([
      { kind: 'response', response: { id: 'a', ok: true, result: { text: 'hi' } } }
    ]);
  });

  it('should reassemble a frame split across chunks', () => {
    const reader = new ResponseFrameReader();
    const frame = responseFrame('{"id":"b","ok":true}');

    expect(reader.push(frame.subarray(0, 3))).toEqual([]);
    expect(reader.push(frame.subarray(3, 10))).toEqual([]);
    expect(reader.push(frame.subarray(10))).toEqual([{ kind: 'response', response: { id: 'b', ok: true } }]);
  });

  it('should decode several frames from one chunk', () => {
    const reader = new ResponseFrameReader();
    const results = reader.push(Buffer.concat([responseFrame('{"id":"1"}'), responseFrame('{"id":"2"}')]));

    expect(results).toEqual([
      { kind: 'response', response: { id: '1' } },
      { kind: 'response', response: { id: '2' } }
    ]);
  });

  it('should flag frames whose body is not a JSON object', () => {
    const reader = new ResponseFrameReader();

    expect(reader.push(responseFrame('not json'))).toEqual([{ kind: 'invalid', detail: 'invalid JSON', raw: 'not json' }]);
    expect(reader.push(responseFrame('[1]'))).toEqual([
      { kind: 'invalid', detail: 'response is not an object', raw: '[1]' }
    ]);
  });

  it('should drop buffered bytes after an impossible length', () => {
    const reader = new ResponseFrameReader();
    const header = Buffer.alloc(4);
    header.writeUInt32LE(0, 0);

    expect(reader.push(header)).toEqual([{ kind: 'invalid', detail: 'invalid response length 0' }]);
    expect(reader.push(responseFrame('{"id":"c"}'))).toEqual([{ kind: 'response', response: { id: 'c' } }]);
  });
});

interface SentRequest {
  payload: Record<string, unknown>;
  binary: Buffer;
}

class FakeWorkerProcess extends EventEmitter implements WorkerProcess {
  public readonly stdin = new PassThrough();
  public readonly stdout = new PassThrough();
  public readonly stderr = new PassThrough();
  public readonly signals: string[] = [];
  public exitOnSignal = true;
  private written = Buffer.alloc(0);

  public constructor() {
    super();
    this.stdin.on('data', (chunk: Buffer) => {
      this.written = Buffer.concat([this.written, chunk]);
    });
  }

  public kill(signal?: NodeJS.Signals): boolean {
    this.signals.push(signal ?? 'SIGTERM');
    if (this.exitOnSignal) {
      setImmediate(() => this.emit('close', null, signal ?? null));
    }
    return true;
  }

  public sent(): SentRequest[] {
    const requests: SentRequest[] = [];
    let offset = 0;
    while (offset + 8 <= this.written.length) {
      const jsonLength = this.written.readUInt32LE(offset);
      const binaryLength = this.written.readUInt32LE(offset + 4);
      const jsonStart = offset + 8;
      const parsed: unknown = JSON.parse(this.written.subarray(jsonStart, jsonStart + jsonLength).toString('utf8'));
      const payload: Record<string, unknown> = typeof parsed === 'object' && parsed !== null ? { ...parsed } : {};
      requests.push({
        payload,
        binary: this.written.subarray(jsonStart + jsonLength, jsonStart + jsonLength + binaryLength)
      });
      offset = jsonStart + jsonLength + binaryLength;
    }

    return requests;
  }

  public respond(response: Record<string, unknown>): void {
    this.stdout.write(responseFrame(JSON.stringify(response)));
  }
}

const setupWorker = () => {
  const children: FakeWorkerProcess[] = [];
  const worker = new PersistentFramedWorker({
    name: 'asr',
    command: 'murmur-asr-worker',
    args: [],
    spawner: () => {
      const child = new FakeWorkerProcess();
      children.push(child);
      setImmediate(() => child.emit('spawn'));
      return child;
    }
  });

  return { worker, children };
};

const nextRequest = async (child: FakeWorkerProcess, count = 1): Promise<SentRequest> => {
  await vi.waitFor(() => {
    expect(child.sent()).toHaveLength(count);
  });

  return child.sent()[count - 1];
};

describe('PersistentFramedWorker', () => {
  it('should resolve a request with the result that carries its id', async () => {
    const { worker, children } = setupWorker();

    const reply = worker.request({ action: 'transcribe' }, 1000, Buffer.from([9, 8]));
    const sent = await nextRequest(children[0]);
    children[0].respond({ id: 'someone-else', ok: true, result: 'ignored' });
    children[0].respond({ id: sent.payload.id, ok: true, result: { text: 'hello' } });

    await expect(reply).resolves.toEqual({ text: 'hello' });
    expect(sent.payload.action).toBe('transcribe');
    expect(Array.from(sent.binary)).toEqual([9, 8]);
    expect(worker.pendingCount()).toBe(0);
  });

  it('should reject a request the worker reports as failed', async () => {
    const { worker, children } = setupWorker();

    const reply = worker.request({ action: 'transcribe' }, 1000);
    const sent = await nextRequest(children[0]);
    children[0].respond({ id: sent.payload.id, ok: false, error: 'model not loaded' });

    await expect(reply).rejects.toThrow('model not loaded');
    await expect(reply).rejects.toMatchObject({ reason: 'rejected' });
  });

  it('should time out a request that gets no answer', async () => {
    const { worker } = setupWorker();

    const reply = worker.request({ action: 'warmup' }, 20);

    await expect(reply).rejects.toThrow('asr worker request timed out after 20ms');
    await expect(reply).rejects.toBeInstanceOf(WorkerRequestError);
    expect(worker.pendingCount()).toBe(0);
  });

  it('should fail pending requests when the worker exits and respawn on the next request', async () => {
    const { worker, children } = setupWorker();

    const reply = worker.request({ action: 'transcribe' }, 1000);
    await nextRequest(children[0]);
    children[0].emit('close', 1, null);

    await expect(reply).rejects.toThrow('asr worker exited (code=1, signal=none)');
    expect(worker.isRunning()).toBe(false);

    const retry = worker.request({ action: 'transcribe' }, 1000);
    const sent = await nextRequest(children[1]);
    children[1].respond({ id: sent.payload.id, ok: true, result: 'again' });

    await expect(retry).resolves.toBe('again');
    expect(children).toHaveLength(2);
  });

  it('should terminate the worker on stop', async () => {
    const { worker, children } = setupWorker();
    await worker.start();

    await worker.stop();

    expect(children[0].signals).toEqual(['SIGTERM']);
    expect(worker.isRunning()).toBe(false);
  });

  it('should kill a worker that ignores SIGTERM', async () => {
    const { worker, children } = setupWorker();
    await worker.start();
    children[0].exitOnSignal = false;

    await worker.stop(10);

    expect(children[0].signals).toEqual(['SIGTERM', 'SIGKILL']);
  });

  it('should reject start when the command cannot be spawned', async () => {
    const worker = new PersistentFramedWorker({
      name: 'asr',
      command: 'missing-worker',
      args: [],
      spawner: () => {
        const child = new FakeWorkerProcess();
        setImmediate(() => child.emit('error', new Error('spawn missing-worker ENOENT')));
        return child;
      }
    });

    await expect(worker.start()).rejects.toThrow('spawn missing-worker ENOENT');
    expect(worker.isRunning()).toBe(false);
  });
});
