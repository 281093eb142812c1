import { describe, expect, it } from "vitest";
import { DEFAULT_STYLE } from "../subtitles/styles";
import {
  DEFAULT_TITLE,
  isAllowedTranscriptFile,
  subtitleConfigSchema,
  toRenderConfig,
  transcriptSchema,
  validateSubtitleConfig,
} from "../utils/validators";

describe("upload validation", () => {
  it("accepts json transcripts", () => {
    expect(isAllowedTranscriptFile("words.json", "application/json")).toBe(true);
    expect(isAllowedTranscriptFile("WORDS.JSON", "application/octet-stream")).toBe(true);
  });

  it("rejects other files", () => {
    expect(isAllowedTranscriptFile("words.srt", "text/plain")).toBe(false);
    expect(isAllowedTranscriptFile("clip.json", "video/mp4")).toBe(false);
  });
});

describe("transcriptSchema", () => {
  it("accepts either text or word keys and drops empty speakers", () => {
    const parsed = transcriptSchema.parse({
      segments: [
        {
          words: [
            { word: "hi", start: 0, end: 1, speaker: null },
            { text: "yo", start: 1, end: 2, speaker: "A" },
          ],
        },
        {},
      ],
    });

    expect(parsed).toEqual({
      segments: [{ words: [{ text: "hi", start: 0, end: 1 }, { text: "yo", start: 1, end: 2, speaker: "A" }] }, { words: [] }],
    });
  });

  it("rejects words without timing", () => {
    expect(transcriptSchema.safeParse({ segments: [{ words: [{ text: "hi" }] }] }).success).toBe(false);
  });
});

describe("toRenderConfig", () => {
  it("fills in defaults for an empty config", () => {
    const config = toRenderConfig(subtitleConfigSchema.parse({}));

    expect(config).toEqual({
      grouping: { kind: "words", count: 4 },
      speakerDetection: false,
      wordHighlighting: true,
      defaultStyle: DEFAULT_STYLE,
      speakerStyles: {},
      autoSpeakerStyles: false,
      outputSrt: false,
      scriptInfo: { title: DEFAULT_TITLE, playResX: 1280, playResY: 720 },
    });
  });

  it("maps full_sentence to sentence grouping and parses colours", () => {
    const config = toRenderConfig(
      subtitleConfigSchema.parse({
        maxWords: "full_sentence",
        defaultStyle: { primaryColor: "#FF0000", highlight: { color: "&H00FF00&" } },
        playResX: 1920,
      }),
      { playResX: 640, playResY: 360 },
    );

    expect(config.grouping).toEqual({ kind: "sentence" });
    expect(config.defaultStyle?.primaryColor).toEqual({ alpha: 0, blue: 0, green: 0, red: 255 });
    expect(config.defaultStyle?.highlight).toEqual({ enabled: true, color: { alpha: 0, blue: 0, green: 255, red: 0 }, bold: true });
    expect(config.scriptInfo).toEqual({ title: DEFAULT_TITLE, playResX: 1920, playResY: 360 });
  });

  it("uses the first speaker style as default when detection is off", () => {
    const config = toRenderConfig(
      subtitleConfigSchema.parse({ speakers: [{ speakerId: "A", fontSize: 44 }, { speakerId: "B", fontSize: 20 }] }),
    );

    expect(config.defaultStyle?.fontSize).toBe(44);
    expect(Object.keys(config.speakerStyles)).toEqual(["A", "B"]);
  });

  it("keeps the built-in default when detection is on", () => {
    const config = toRenderConfig(
      subtitleConfigSchema.parse({ enableSpeakerDetection: true, speakers: [{ speakerId: "A", fontSize: 44 }] }),
    );

    expect(config.defaultStyle).toEqual(DEFAULT_STYLE);
    expect(config.speakerStyles.A.fontSize).toBe(44);
  });
});

describe("validateSubtitleConfig", () => {
  it("accepts a valid config", () => {
    expect(validateSubtitleConfig({ maxWords: 3, defaultStyle: { fontFamily: "Impact", position: "top_center" } })).toEqual({
      valid: true,
      errors: [],
      warnings: [],
    });
  });

  it("warns about very long units", () => {
    expect(validateSubtitleConfig({ maxWords: 60 })).toEqual({
      valid: true,
      errors: [],
      warnings: ["maxWords > 50 may result in very long subtitles"],
    });
  });

  it("reports schema errors with their path", () => {
    const result = validateSubtitleConfig({ defaultStyle: { primaryColor: "red" } });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["defaultStyle.primaryColor: color must look like #RRGGBB, #RRGGBBAA, &HBBGGRR or &HAABBGGRR"]);
  });

  it("rejects a zero word count and unknown style keys", () => {
    expect(validateSubtitleConfig({ maxWords: 0 }).errors[0]).toMatch(/^maxWords: /);
    expect(validateSubtitleConfig({ defaultStyle: { fontColour: "#FFFFFF" } }).valid).toBe(false);
  });

  it("rejects duplicate speaker ids", () => {
    const result = validateSubtitleConfig({ speakers: [{ speakerId: "A" }, { speakerId: "A" }] });

    expect(result.errors).toEqual(["speakers.1.speakerId: Duplicate speakerId A"]);
  });

  it("rejects speaker ids that share a style name when detection is on", () => {
    const speakers = [{ speakerId: "Ana Sol" }, { speakerId: "Ana_Sol" }];

    expect(validateSubtitleConfig({ enableSpeakerDetection: true, speakers }).errors).toEqual([
      'Speakers "Ana Sol" and "Ana_Sol" both map to style name Speaker_Ana_Sol',
    ]);
    expect(validateSubtitleConfig({ speakers }).valid).toBe(true);
  });

  it("rejects animation combined with word highlighting", () => {
    expect(validateSubtitleConfig({ defaultStyle: { animation: "bounce" } })).toEqual({
      valid: false,
      errors: ['Style Default combines the "bounce" animation with word highlighting; enable only one'],
      warnings: [],
    });
    expect(validateSubtitleConfig({ defaultStyle: { animation: "bounce" }, enableWordHighlighting: false }).valid).toBe(true);
  });
});
