import type { DisplayUnit, WordInterval } from "./types";

export const MIN_HIGHLIGHT_CS = 10;

export const toCentiseconds = (sec: number): number => Math.round(sec * 100);

/**
 * Computes the highlight window of every word in a unit. A word stays active
 * until the next one starts, and no window is shorter than 0.1s.
 * When the floor runs past the next word's start, that word begins where the
 * previous window ends, so consecutive windows never gap or overlap.
 */
export const computeWordIntervals = (unit: DisplayUnit): WordInterval[] => {
  const { words } = unit;
  const intervals: WordInterval[] = [];
  let previousEndCs: number | undefined;

  words.forEach((word, index) => {
    // Integer centiseconds keep the floor comparison exact.
    const startCs = Math.max(toCentiseconds(word.start), previousEndCs ?? 0);
    const next = words[index + 1];
    let endCs = toCentiseconds(next ? next.start : word.end);

    if (endCs - startCs < MIN_HIGHLIGHT_CS) {
      endCs = startCs + MIN_HIGHLIGHT_CS;
    }

    intervals.push({ index, start: startCs / 100, end: endCs / 100 });
    previousEndCs = endCs;
  });

  return intervals;
};
