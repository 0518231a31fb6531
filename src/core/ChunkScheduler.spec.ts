import { afterEach, describe, it, expect, vi } from 'vitest';
import { ScriptedTranscriber } from '../testing/doubles';
import { ChunkScheduler } from './ChunkScheduler';
import { SessionState } from './SessionState';

const RATE = 16000;

const setup = (transcriber = new ScriptedTranscriber()) => {
  const state = new SessionState();
  state.begin(RATE);
  const liveTexts: Array<[string, number]> = [];
  const scheduler = new ChunkScheduler(state, transcriber, {
    chunkDurationSeconds: 1,
    overlapDurationSeconds: 0.25,
    language: 'en',
    onLiveText: (text, sessionId) => {
      liveTexts.push([text, sessionId]);
    }
  });

  return { state, scheduler, transcriber, liveTexts };
};

describe('ChunkScheduler', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should wait until a full chunk of audio is buffered', () => {
    const { state, scheduler, transcriber } = setup();
    state.buffer.append(new Float32Array(RATE - 1));

    expect(scheduler.tick()).toBeUndefined();
    expect(transcriber.calls).toHaveLength(0);
  });

  it('should not run while the session is not recording', () => {
    const { state, scheduler, transcriber } = setup();
    state.buffer.append(new Float32Array(RATE));
    state.recording = false;

    expect(scheduler.tick()).toBeUndefined();
    expect(transcriber.calls).toHaveLength(0);
  });

  it('should transcribe the first window from sample zero and publish merged text', async () => {
    const { state, scheduler, transcriber, liveTexts } = setup();
    transcriber.reply(' hello world ');
    state.buffer.append(new Float32Array(RATE));

    await scheduler.tick();

    expect(transcriber.calls).toHaveLength(1);
    expect(transcriber.calls[0].samples.length).toBe(RATE);
    expect(transcriber.calls[0].language).toBe('en');
    expect(state.lastChunkEndSample).toBe(RATE);
    expect(state.accumulatedText).toBe('hello world');
    expect(liveTexts).toEqual([['hello world', 1]]);
  });

  it('should start later windows one overlap before the previous boundary', async () => {
    const { state, scheduler, transcriber } = setup();
    transcriber.reply('the quick brown').reply('brown fox');
    state.buffer.append(new Float32Array(RATE));
    await scheduler.tick();

    state.buffer.append(new Float32Array(RATE));
    await scheduler.tick();

    expect(transcriber.calls[1].samples.length).toBe(2 * RATE - (RATE - 4000));
    expect(state.lastChunkEndSample).toBe(2 * RATE);
    expect(state.accumulatedText).toBe('the quick brown fox');
  });

  it('should keep the merged chunk when the live text listener throws', async () => {
    const state = new SessionState();
    state.begin(RATE);
    const transcriber = new ScriptedTranscriber();
    const scheduler = new ChunkScheduler(state, transcriber, {
      chunkDurationSeconds: 1,
      overlapDurationSeconds: 0.25,
      onLiveText: () => {
        throw new Error('listener broke');
      }
    });
    transcriber.reply('hello world');
    state.buffer.append(new Float32Array(RATE));

    await scheduler.tick();

    expect(state.lastChunkEndSample).toBe(RATE);
    expect(state.accumulatedText).toBe('hello world');
    expect(scheduler.isChunkBusy()).toBe(false);
  });

  it('should skip ticks while a chunk is in flight', async () => {
    const { state, scheduler, transcriber } = setup();
    const pending = transcriber.defer();
    state.buffer.append(new Float32Array(RATE * 2));

    const first = scheduler.tick();
    expect(scheduler.isChunkBusy()).toBe(true);
    expect(scheduler.tick()).toBeUndefined();

    pending.resolve('one');
    await first;

    expect(scheduler.isChunkBusy()).toBe(false);
    expect(transcriber.calls).toHaveLength(1);
  });

  it('should discard a result that arrives after a new session began', async () => {
    const { state, scheduler, transcriber, liveTexts } = setup();
    const pending = transcriber.defer();
    state.buffer.append(new Float32Array(RATE));
    const inFlight = scheduler.tick();

    state.begin(RATE);
    pending.resolve('stale words');
    await inFlight;

    expect(state.sessionId).toBe(2);
    expect(state.accumulatedText).toBe('');
    expect(state.lastChunkEndSample).toBe(0);
    expect(liveTexts).toEqual([]);
  });

  it('should rewind the boundary after a failed chunk so the next tick re-covers it', async () => {
    const { state, scheduler, transcriber } = setup();
    transcriber.fail('worker busy').reply('recovered');
    state.buffer.append(new Float32Array(RATE));

    await scheduler.tick();
    expect(state.lastChunkEndSample).toBe(0);
    expect(scheduler.isChunkBusy()).toBe(false);
    expect(state.accumulatedText).toBe('');

    state.buffer.append(new Float32Array(RATE / 2));
    await scheduler.tick();

    expect(transcriber.calls[1].samples.length).toBe(RATE + RATE / 2);
    expect(state.accumulatedText).toBe('recovered');
  });

  it('should hand an abandoned chunk back to the tail when halted', async () => {
    const { state, scheduler, transcriber } = setup();
    transcriber.reply('first part');
    state.buffer.append(new Float32Array(RATE));
    await scheduler.tick();

    const late = transcriber.defer();
    state.buffer.append(new Float32Array(RATE));
    const inFlight = scheduler.tick();
    expect(state.lastChunkEndSample).toBe(2 * RATE);

    state.recording = false;
    scheduler.halt();

    expect(state.lastChunkEndSample).toBe(RATE);
    expect(scheduler.tailStartSample()).toBe(RATE - 4000);

    late.resolve('late part');
    await scheduler.whenSettled();
    await inFlight;

    expect(state.accumulatedText).toBe('first part');
  });

  it('should tick on its interval until stopped', async () => {
    vi.useFakeTimers();
    const { state, scheduler, transcriber } = setup(new ScriptedTranscriber('words'));
    state.buffer.append(new Float32Array(RATE));

    scheduler.start();
    await vi.advanceTimersByTimeAsync(1000);
    expect(transcriber.calls).toHaveLength(1);

    scheduler.stop();
    state.buffer.append(new Float32Array(RATE));
    await vi.advanceTimersByTimeAsync(3000);
    expect(transcriber.calls).toHaveLength(1);
    expect(scheduler.getChunkCount()).toBe(1);
  });
});
