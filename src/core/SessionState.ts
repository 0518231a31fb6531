import { SampleBuffer } from '../services/capture/SampleBuffer';
import { FocusSnapshot } from '../types';

const emptySnapshot = (): FocusSnapshot => ({ capturedAt: 0 });

/**
 * The one mutable record of the current (or most recent) recording.
 *
 * The controller owns it; the chunk scheduler holds a reference and checks `sessionId`
 * before applying any asynchronous result.
 */
export class SessionState {
  public sessionId = 0;
  public recording = false;
  public startedAt = 0;
  public accumulatedText = '';
  public lastChunkEndSample = 0;
  public focus: FocusSnapshot = emptySnapshot();
  public readonly buffer: SampleBuffer;

  public constructor(buffer: SampleBuffer = new SampleBuffer()) {
    this.buffer = buffer;
  }

  public get sampleRate(): number {
    return this.buffer.sampleRate;
  }

  /** Supersedes the previous session. Returns the new session id. */
  public begin(sampleRate: number, now: number = Date.now()): number {
    this.sessionId += 1;
    this.recording = true;
    this.startedAt = now;
    this.accumulatedText = '';
    this.lastChunkEndSample = 0;
    this.focus = emptySnapshot();
    this.buffer.reset(sampleRate);
    return this.sessionId;
  }

  public isCurrent(sessionId: number): boolean {
    return sessionId === this.sessionId;
  }
}
