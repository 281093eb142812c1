import { ConfigError, type Diagnostic } from "./errors";
import type { DisplayUnit, GroupingMode, TranscribedWord } from "./types";

const SENTENCE_TERMINATORS = [".", "!", "?", ":", ";"];

export interface GroupingOptions {
  speakerDetection: boolean;
}

export interface SanitizedWords {
  words: TranscribedWord[];
  diagnostics: Diagnostic[];
}

const describeMalformed = (word: TranscribedWord, text: string): string | null => {
  if (!text) {
    return "empty text";
  }
  if (!Number.isFinite(word.start) || word.start < 0) {
    return `invalid start ${word.start}`;
  }
  if (!Number.isFinite(word.end) || word.end <= word.start) {
    return `end ${word.end} is not after start ${word.start}`;
  }
  return null;
};

/**
 * Trims word text and drops words that cannot be timed or displayed.
 * Each dropped word is reported as a diagnostic instead of failing the batch.
 */
export const sanitizeWords = (words: readonly TranscribedWord[], options: GroupingOptions): SanitizedWords => {
  const kept: TranscribedWord[] = [];
  const diagnostics: Diagnostic[] = [];

  words.forEach((word) => {
    const text = word.text.trim();
    const problem = describeMalformed(word, text);
    if (problem) {
      diagnostics.push({
        code: "malformed_word",
        message: `Dropped word "${word.text}" at ${word.start}s: ${problem}`,
        word,
      });
      return;
    }

    const speaker = options.speakerDetection && word.speaker ? word.speaker : undefined;
    kept.push(speaker === undefined ? { text, start: word.start, end: word.end } : { text, start: word.start, end: word.end, speaker });
  });

  return { words: kept, diagnostics };
};

export const createDisplayUnit = (words: readonly TranscribedWord[]): DisplayUnit => {
  const first = words[0];
  const last = words[words.length - 1];
  if (!first || !last) {
    throw new Error("A display unit needs at least one word");
  }

  const unit: DisplayUnit = {
    words: Object.freeze([...words]),
    start: first.start,
    end: last.end,
    text: words.map((word) => word.text).join(" "),
    ...(first.speaker === undefined ? {} : { speaker: first.speaker }),
  };
  return Object.freeze(unit);
};

export const endsSentence = (text: string): boolean => {
  const trimmed = text.trim();
  return SENTENCE_TERMINATORS.some((terminator) => trimmed.endsWith(terminator));
};

export const assertGroupingMode = (mode: GroupingMode): void => {
  if (mode.kind === "words" && (!Number.isInteger(mode.count) || mode.count < 1)) {
    throw new ConfigError(`Grouping word count must be a positive integer, got ${mode.count}`);
  }
};

const splitBySpeaker = (words: readonly TranscribedWord[]): TranscribedWord[][] => {
  const runs: TranscribedWord[][] = [];
  let current: TranscribedWord[] = [];

  words.forEach((word) => {
    const previous = current[current.length - 1];
    if (previous && previous.speaker !== word.speaker) {
      runs.push(current);
      current = [];
    }
    current.push(word);
  });

  if (current.length) {
    runs.push(current);
  }
  return runs;
};

const groupByCount = (words: readonly TranscribedWord[], count: number): DisplayUnit[] => {
  const units: DisplayUnit[] = [];
  for (let index = 0; index < words.length; index += count) {
    units.push(createDisplayUnit(words.slice(index, index + count)));
  }
  return units;
};

const groupBySentence = (words: readonly TranscribedWord[]): DisplayUnit[] => {
  const units: DisplayUnit[] = [];
  let buffer: TranscribedWord[] = [];

  words.forEach((word) => {
    buffer.push(word);
    if (endsSentence(word.text)) {
      units.push(createDisplayUnit(buffer));
      buffer = [];
    }
  });

  if (buffer.length) {
    units.push(createDisplayUnit(buffer));
  }
  return units;
};

/**
 * Partitions words into display units. Words are expected to be sanitized;
 * with speaker detection on, a speaker change always closes the current unit.
 */
export const groupWords = (
  words: readonly TranscribedWord[],
  mode: GroupingMode,
  options: GroupingOptions,
): DisplayUnit[] => {
  assertGroupingMode(mode);

  const runs = options.speakerDetection ? splitBySpeaker(words) : [words.map(({ speaker: _speaker, ...rest }) => rest)];

  return runs.flatMap((run) => (mode.kind === "words" ? groupByCount(run, mode.count) : groupBySentence(run)));
};
