import { spawn } from 'node:child_process';
import { Readable, Writable } from 'node:stream';
import { StructuredLogger } from '../../logging/StructuredLogger';

export interface WorkerResponse {
  id?: string;
  ok?: boolean;
  result?: unknown;
  error?: string;
}

/** The slice of a child process the worker talks to. */
export interface WorkerProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'error', listener: (error: Error) => void): void;
  once(event: 'spawn', listener: () => void): void;
  once(event: 'error', listener: (error: Error) => void): void;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
  off(event: 'error', listener: (error: Error) => void): void;
}

export type WorkerSpawner = (command: string, args: string[], env?: NodeJS.ProcessEnv) => WorkerProcess;

export const spawnWorkerProcess: WorkerSpawner = (command, args, env) => spawn(command, args, { env, stdio: 'pipe' });

export interface PersistentFramedWorkerOptions {
  name: string;
  command: string;
  args: string[];
  env?: NodeJS.ProcessEnv;
  logger?: StructuredLogger;
  spawner?: WorkerSpawner;
}

export type WorkerFailureReason = 'timeout' | 'exited' | 'rejected' | 'unavailable';

export class WorkerRequestError extends Error {
  public constructor(
    message: string,
    public readonly reason: WorkerFailureReason
  ) {
    super(message);
    this.name = 'WorkerRequestError';
  }
}

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (reason: Error) => void;
  timeoutHandle: NodeJS.Timeout;
}

const REQUEST_HEADER_BYTES = 8; // uint32 jsonLen + uint32 binaryLen
const RESPONSE_HEADER_BYTES = 4; // uint32 jsonLen
const MAX_RESPONSE_JSON_BYTES = 8 * 1024 * 1024;
const STDERR_TAIL_CHARS = 4000;

export const encodeRequestFrame = (payload: Record<string, unknown>, binaryData?: Buffer): Buffer => {
  const jsonBytes = Buffer.from(JSON.stringify(payload), 'utf8');
  const binaryBytes = binaryData && binaryData.length > 0 ? binaryData : Buffer.alloc(0);
  const header = Buffer.allocUnsafe(REQUEST_HEADER_BYTES);
  header.writeUInt32LE(jsonBytes.length, 0);
  header.writeUInt32LE(binaryBytes.length, 4);
  return Buffer.concat([header, jsonBytes, binaryBytes]);
};

const isWorkerResponse = (value: unknown): value is WorkerResponse =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export type FrameReadResult =
  | { kind: 'response'; response: WorkerResponse }
  | { kind: 'invalid'; detail: string; raw?: string };

/** Splits worker stdout into `uint32 jsonLen` + JSON frames. */
export class ResponseFrameReader {
  private buffer = Buffer.alloc(0);

  public push(chunk: Buffer): FrameReadResult[] {
    const safeChunk = Buffer.from(chunk);
    this.buffer = this.buffer.length === 0 ? safeChunk : Buffer.concat([this.buffer, safeChunk]);

    const results: FrameReadResult[] = [];
    while (this.buffer.length >= RESPONSE_HEADER_BYTES) {
      const jsonLength = this.buffer.readUInt32LE(0);
      if (jsonLength <= 0 || jsonLength > MAX_RESPONSE_JSON_BYTES) {
        this.buffer = Buffer.alloc(0);
        results.push({ kind: 'invalid', detail: `invalid response length ${jsonLength}` });
        return results;
      }

      const frameBytes = RESPONSE_HEADER_BYTES + jsonLength;
      if (this.buffer.length < frameBytes) {
        return results;
      }

      const raw = this.buffer.subarray(RESPONSE_HEADER_BYTES, frameBytes).toString('utf8');
      this.buffer = Buffer.from(this.buffer.subarray(frameBytes));

      try {
        const parsed: unknown = JSON.parse(raw);
        results.push(
          isWorkerResponse(parsed)
            ? { kind: 'response', response: parsed }
            : { kind: 'invalid', detail: 'response is not an object', raw }
        );
      } catch {
        results.push({ kind: 'invalid', detail: 'invalid JSON', raw });
      }
    }

    return results;
  }

  public reset(): void {
    this.buffer = Buffer.alloc(0);
  }
}

const writeFrame = (stream: Writable, frame: Buffer): Promise<void> =>
  new Promise((resolve, reject) => {
    stream.write(frame, (error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
  });

/**
 * One long-lived helper process answering framed requests by id. Writes are serialized;
 * responses may arrive in any order. A worker that exits fails everything pending and is
 * spawned again by the next request.
 */
export class PersistentFramedWorker {
  private child: WorkerProcess | undefined;
  private starting: Promise<void> | undefined;
  private stopping = false;
  private requestCounter = 0;
  private stderrTail = '';
  private writeChain: Promise<void> = Promise.resolve();
  private readonly reader = new ResponseFrameReader();
  private readonly pending = new Map<string, PendingRequest>();
  private readonly spawner: WorkerSpawner;

  public constructor(private readonly options: PersistentFramedWorkerOptions) {
    this.spawner = options.spawner ?? spawnWorkerProcess;
  }

  public isRunning(): boolean {
    return Boolean(this.child);
  }

  public pendingCount(): number {
    return this.pending.size;
  }

  public async start(): Promise<void> {
    if (this.child) {
      return;
    }

    if (!this.starting) {
      this.starting = this.launch().finally(() => {
        this.starting = undefined;
      });
    }

    await this.starting;
  }

  public async request(payload: Record<string, unknown>, timeoutMs: number, binaryData?: Buffer): Promise<unknown> {
    await this.start();

    const child = this.child;
    if (!child) {
      throw new WorkerRequestError(`${this.options.name} worker is not running`, 'unavailable');
    }

    this.requestCounter += 1;
    const requestId = `${Date.now()}-${this.requestCounter}`;
    const frame = encodeRequestFrame({ ...payload, id: requestId }, binaryData);

    return new Promise<unknown>((resolve, reject) => {
      const timeoutHandle = setTimeout(() => {
        this.fail(
          requestId,
          new WorkerRequestError(`${this.options.name} worker request timed out after ${timeoutMs}ms`, 'timeout')
        );
      }, timeoutMs);

      this.pending.set(requestId, { resolve, reject, timeoutHandle });

      this.writeChain = this.writeChain
        .then(() => writeFrame(child.stdin, frame))
        .catch((error: unknown) => {
          const detail = error instanceof Error ? error.message : String(error);
          this.fail(requestId, new WorkerRequestError(`${this.options.name} worker write failed: ${detail}`, 'unavailable'));
        });
    });
  }

  /** SIGTERM, then SIGKILL if the worker has not closed within `graceMs`. */
  public async stop(graceMs = 1500): Promise<void> {
    this.stopping = true;

    const child = this.child;
    if (!child) {
      return;
    }

    await new Promise<void>((resolve) => {
      const killTimer = setTimeout(() => {
        child.kill('SIGKILL');
        resolve();
      }, graceMs);

      child.once('close', () => {
        clearTimeout(killTimer);
        resolve();
      });

      child.kill('SIGTERM');
    });

    if (this.child === child) {
      this.child = undefined;
    }
  }

  private launch(): Promise<void> {
    this.stopping = false;

    return new Promise<void>((resolve, reject) => {
      const child = this.spawner(this.options.command, this.options.args, this.options.env);

      const onError = (error: Error): void => {
        reject(error);
      };

      child.once('error', onError);
      child.once('spawn', () => {
        child.off('error', onError);
        this.attach(child);
        resolve();
      });
    });
  }

  private attach(child: WorkerProcess): void {
    this.child = child;
    this.reader.reset();
    this.stderrTail = '';
    this.writeChain = Promise.resolve();

    child.stdout.on('data', (chunk: Buffer) => {
      this.onStdout(Buffer.from(chunk));
    });

    child.stderr.on('data', (chunk: Buffer) => {
      const text = chunk.toString();
      this.stderrTail = `${this.stderrTail}${text}`.slice(-STDERR_TAIL_CHARS);
      this.options.logger?.debug(`${this.options.name} worker stderr`, { detail: text.trim() });
    });

    child.on('error', (error) => {
      this.options.logger?.warn(`${this.options.name} worker process error`, { detail: error.message });
    });

    child.once('close', (code, signal) => {
      const context = { code, signal, stderr: this.stopping ? undefined : this.stderrTail.trim() };
      if (this.stopping) {
        this.options.logger?.info(`${this.options.name} worker stopped`, context);
      } else {
        this.options.logger?.warn(`${this.options.name} worker exited`, context);
      }

      if (this.child === child) {
        this.child = undefined;
      }

      this.failAll(
        new WorkerRequestError(
          `${this.options.name} worker exited (code=${code}, signal=${signal ?? 'none'})`,
          'exited'
        )
      );
    });

    this.options.logger?.info(`${this.options.name} worker started`, { command: this.options.command });
  }

  private onStdout(chunk: Buffer): void {
    for (const frame of this.reader.push(chunk)) {
      if (frame.kind === 'invalid') {
        this.options.logger?.warn(`${this.options.name} worker produced an invalid frame`, {
          detail: frame.detail,
          raw: frame.raw
        });
        continue;
      }

      const { id, ok, result, error } = frame.response;
      const pending = id ? this.pending.get(id) : undefined;
      if (!id || !pending) {
        this.options.logger?.debug(`${this.options.name} worker response matched no request`, { responseId: id });
        continue;
      }

      clearTimeout(pending.timeoutHandle);
      this.pending.delete(id);

      if (ok === false) {
        pending.reject(new WorkerRequestError(error ?? `${this.options.name} worker request failed`, 'rejected'));
        continue;
      }

      pending.resolve(result);
    }
  }

  private fail(requestId: string, error: Error): void {
    const pending = this.pending.get(requestId);
    if (!pending) {
      return;
    }

    clearTimeout(pending.timeoutHandle);
    this.pending.delete(requestId);
    pending.reject(error);
  }

  private failAll(error: Error): void {
    for (const requestId of Array.from(this.pending.keys())) {
      this.fail(requestId, error);
    }
  }
}
