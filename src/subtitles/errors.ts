import type { TranscribedWord } from "./types";

/** Fatal configuration fault. Aborts document generation for the job. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface Diagnostic {
  code: "malformed_word";
  message: string;
  word: TranscribedWord;
}
