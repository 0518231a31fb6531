const OVERLAP_SEARCH_WORDS = 5;

const splitWords = (text: string): string[] => text.trim().split(/\s+/).filter(Boolean);

const matchesAt = (existingWords: string[], nextWords: string[], start: number, length: number): boolean => {
  for (let offset = 0; offset < length; offset += 1) {
    if (existingWords[start + offset] !== nextWords[offset]) {
      return false;
    }
  }

  return true;
};

/**
 * Stitches a newly transcribed overlapping chunk onto the accumulated text.
 *
 * Only the first five word positions of `existing` are searched for the start of the
 * overlap, and the first (position, length) pair that matches wins. This is a heuristic:
 * a short phrase legitimately repeated near a chunk edge can be collapsed.
 */
export const mergeTranscription = (existing: string, next: string): string => {
  if (!existing) {
    return next;
  }

  if (!next) {
    return existing;
  }

  const existingWords = splitWords(existing);
  const nextWords = splitWords(next);
  const searchLimit = Math.min(existingWords.length, OVERLAP_SEARCH_WORDS);

  for (let start = 0; start < searchLimit; start += 1) {
    const maxLength = Math.min(nextWords.length, existingWords.length - start);
    for (let length = 1; length <= maxLength; length += 1) {
      if (!matchesAt(existingWords, nextWords, start, length)) {
        continue;
      }

      const kept = existingWords.slice(0, start).join(' ');
      return kept ? `${kept} ${next}` : next;
    }
  }

  return `${existing} ${next}`;
};
