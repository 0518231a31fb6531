import { ChildProcess, spawn } from 'node:child_process';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { AudioRecorder, RealtimeStreamOptions } from './AudioRecorder';

const START_STABILITY_DELAY_MS = 300;
const BYTES_PER_SAMPLE = 4; // f32le mono

export const normalizeMicError = (raw: string): string => {
  const detail = raw.trim();

  if (/Operation not permitted|not authorized|Permission denied/i.test(detail)) {
    return 'Microphone permission denied. Grant microphone access in System Settings > Privacy & Security > Microphone, then restart Murmur.';
  }

  if (/Input\/output error|No such file|device not found|could not find/i.test(detail)) {
    return 'Microphone input device is unavailable. Verify MURMUR_FFMPEG_INPUT (ffmpeg -f avfoundation -list_devices true -i "").';
  }

  if (detail) {
    return `Microphone capture failed: ${detail}`;
  }

  return 'Microphone capture failed. Verify ffmpeg availability and microphone permissions.';
};

export const ffmpegCaptureArgs = (inputDevice: string, sampleRate: number): string[] => [
  '-hide_banner',
  '-loglevel',
  'error',
  '-f',
  'avfoundation',
  '-i',
  inputDevice,
  '-ac',
  '1',
  '-ar',
  String(sampleRate),
  '-f',
  'f32le',
  '-acodec',
  'pcm_f32le',
  'pipe:1'
];

/** Decodes whole little-endian float32 frames and carries a partial frame to the next chunk. */
export class Float32FrameDecoder {
  private remainder = Buffer.alloc(0);

  public push(chunk: Buffer): Float32Array {
    const data = this.remainder.length === 0 ? chunk : Buffer.concat([this.remainder, chunk]);
    const wholeBytes = data.length - (data.length % BYTES_PER_SAMPLE);
    const samples = new Float32Array(wholeBytes / BYTES_PER_SAMPLE);

    for (let index = 0; index < samples.length; index += 1) {
      samples[index] = data.readFloatLE(index * BYTES_PER_SAMPLE);
    }

    this.remainder = Buffer.from(data.subarray(wholeBytes));
    return samples;
  }

  public reset(): void {
    this.remainder = Buffer.alloc(0);
  }
}

export class FfmpegRecorder implements AudioRecorder {
  private process: ChildProcess | undefined;
  private readonly decoder = new Float32FrameDecoder();
  private onSamples: RealtimeStreamOptions['onSamples'] | undefined;

  public constructor(
    private readonly inputDevice: string,
    public readonly sampleRate: number,
    private readonly logger?: StructuredLogger
  ) {}

  public isRecording(): boolean {
    return Boolean(this.process);
  }

  public async startStreaming(options: RealtimeStreamOptions): Promise<void> {
    if (this.process) {
      throw new Error('Recorder is already active');
    }

    this.onSamples = options.onSamples;
    this.decoder.reset();

    const ffmpeg = spawn('ffmpeg', ffmpegCaptureArgs(this.inputDevice, this.sampleRate), {
      stdio: ['ignore', 'pipe', 'pipe']
    });
    let stderrLog = '';
    let settled = false;

    ffmpeg.on('close', (code) => {
      if (this.process !== ffmpeg) {
        return;
      }

      // Still the active capture, so nobody asked it to stop.
      this.process = undefined;
      this.onSamples = undefined;
      options.onError?.(new Error(normalizeMicError(`${stderrLog}\nexit code=${code}`)));
    });

    ffmpeg.stderr.on('data', (chunk) => {
      stderrLog += chunk.toString();
    });

    ffmpeg.stdout.on('data', (chunk) => {
      this.handleAudioData(Buffer.from(chunk));
    });

    await new Promise<void>((resolve, reject) => {
      ffmpeg.once('error', (error) => {
        if (settled) {
          return;
        }

        settled = true;
        reject(error);
      });

      ffmpeg.once('spawn', () => {
        setTimeout(() => {
          if (settled) {
            return;
          }

          if (ffmpeg.exitCode !== null) {
            settled = true;
            reject(new Error(normalizeMicError(stderrLog)));
            return;
          }

          this.process = ffmpeg;
          settled = true;
          resolve();
        }, START_STABILITY_DELAY_MS);
      });

      ffmpeg.once('close', (code) => {
        if (settled) {
          return;
        }

        settled = true;
        reject(new Error(normalizeMicError(`${stderrLog}\nexit code=${code}`)));
      });
    });

    this.logger?.info('Recorder started', {
      inputDevice: this.inputDevice,
      sampleRate: this.sampleRate
    });
  }

  public async stop(): Promise<void> {
    const current = this.process;
    if (!current) {
      return;
    }

    // Detached first: the close handler treats an exit of the active process as a failure.
    this.process = undefined;

    await new Promise<void>((resolve, reject) => {
      current.once('close', (code) => {
        if (code === 0 || code === 255) {
          resolve();
          return;
        }

        reject(new Error(`ffmpeg exited with code ${code}`));
      });

      current.once('error', (error) => {
        reject(error);
      });

      current.kill('SIGINT');
    });

    this.decoder.reset();
    this.onSamples = undefined;

    this.logger?.info('Recorder stopped');
  }

  private handleAudioData(chunk: Buffer): void {
    if (!this.onSamples || chunk.length === 0) {
      return;
    }

    const samples = this.decoder.push(chunk);
    if (samples.length === 0) {
      return;
    }

    try {
      this.onSamples(samples, this.sampleRate);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Recorder sample callback failed', { detail });
    }
  }
}
