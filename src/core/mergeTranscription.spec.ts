import { describe, it, expect } from 'vitest';
import { mergeTranscription } from './mergeTranscription';

describe('mergeTranscription', () => {
  it('should return the new text when nothing has been accumulated', () => {
    expect(mergeTranscription('', 'hello')).toBe('hello');
  });

  it('should keep the accumulated text when the new chunk is empty', () => {
    expect(mergeTranscription('hello', '')).toBe('hello');
  });

  it('should drop the overlapping word', () => {
    expect(mergeTranscription('the quick brown', 'brown fox jumps')).toBe('the quick brown fox jumps');
  });

  it('should join disjoint text with a single space', () => {
    expect(mergeTranscription('foo bar', 'baz qux')).toBe('foo bar baz qux');
  });

  it('should replace the whole accumulated text when the overlap starts at its first word', () => {
    expect(mergeTranscription('one two', 'one two three')).toBe('one two three');
  });

  it('should only search the first five accumulated words for the overlap', () => {
    expect(mergeTranscription('a b c d e f g', 'f g h')).toBe('a b c d e f g f g h');
    expect(mergeTranscription('a b c d e f g', 'e f g h')).toBe('a b c d e f g h');
  });

  it('should take the earliest matching position', () => {
    expect(mergeTranscription('go now go home', 'go home please')).toBe('go home please');
  });

  it('should compare words case-sensitively', () => {
    expect(mergeTranscription('Hello there', 'hello again')).toBe('Hello there hello again');
  });

  it('should never lose words of the new chunk', () => {
    const next = 'brown fox jumps over';
    expect(mergeTranscription('the quick brown', next).endsWith(next)).toBe(true);
  });
});
