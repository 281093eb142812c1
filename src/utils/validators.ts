import path from "node:path";
import { z } from "zod";
import { parseColor } from "../subtitles/colors";
import { assertRenderConfig } from "../subtitles/document";
import { ConfigError } from "../subtitles/errors";
import { DEFAULT_STYLE } from "../subtitles/styles";
import {
  ANIMATION_STYLES,
  SUBTITLE_POSITION_NAMES,
  type RenderConfig,
  type ScriptInfo,
  type StyleSpec,
} from "../subtitles/types";

export const FULL_SENTENCE = "full_sentence";
export const DEFAULT_TITLE = "Word-by-Word Subtitles";

const allowedTranscriptExtensions = new Set([".json"]);
const allowedTranscriptMimeTypes = new Set(["application/json", "text/json", "text/plain", "application/octet-stream"]);

export const isAllowedTranscriptFile = (filename: string, mimeType: string): boolean => {
  const extension = path.extname(filename).toLowerCase();
  return allowedTranscriptExtensions.has(extension) && allowedTranscriptMimeTypes.has(mimeType);
};

const colorSchema = z.string().transform((value, ctx) => {
  const color = parseColor(value);
  if (!color) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "color must look like #RRGGBB, #RRGGBBAA, &HBBGGRR or &HAABBGGRR",
    });
    return z.NEVER;
  }
  return color;
});

// Word timings are only type-checked here; the renderer drops words with bad timing itself.
const wordSchema = z
  .object({
    text: z.string().optional(),
    word: z.string().optional(),
    start: z.number(),
    end: z.number(),
    speaker: z.string().nullish(),
  })
  .transform(({ text, word, start, end, speaker }) => ({
    text: text ?? word ?? "",
    start,
    end,
    ...(speaker ? { speaker } : {}),
  }));

export const transcriptSchema = z.object({
  segments: z.array(
    z.object({
      words: z.array(wordSchema).default([]),
    }),
  ),
});

export const styleInputSchema = z
  .object({
    fontFamily: z.string().min(1).max(80).regex(/^[^,]+$/, "fontFamily must not contain commas"),
    fontSize: z.number().int().min(8).max(200),
    bold: z.boolean(),
    italic: z.boolean(),
    underline: z.boolean(),
    strikeout: z.boolean(),
    primaryColor: colorSchema,
    secondaryColor: colorSchema,
    outlineColor: colorSchema,
    shadowColor: colorSchema,
    backgroundColor: colorSchema,
    position: z.enum(SUBTITLE_POSITION_NAMES),
    marginLeft: z.number().int().min(0).max(4000),
    marginRight: z.number().int().min(0).max(4000),
    marginVertical: z.number().int().min(0).max(4000),
    outlineWidth: z.number().min(0).max(20),
    shadowDistance: z.number().min(0).max(20),
    scaleX: z.number().min(1).max(1000),
    scaleY: z.number().min(1).max(1000),
    letterSpacing: z.number().min(-100).max(100),
    rotation: z.number().min(-360).max(360),
    borderStyle: z.union([z.literal(1), z.literal(3)]),
    allCaps: z.boolean(),
    animation: z.enum(ANIMATION_STYLES),
    fadeInDuration: z.number().min(0).max(10),
    fadeOutDuration: z.number().min(0).max(10),
    highlight: z
      .object({
        enabled: z.boolean(),
        color: colorSchema,
        bold: z.boolean(),
      })
      .partial(),
  })
  .partial()
  .strict();

export const speakerStyleInputSchema = styleInputSchema.extend({
  speakerId: z.string().min(1).max(100),
});

export const subtitleConfigSchema = z
  .object({
    maxWords: z.union([z.number().int().min(1), z.literal(FULL_SENTENCE)]).optional().default(4),
    enableSpeakerDetection: z.boolean().optional().default(false),
    enableWordHighlighting: z.boolean().optional().default(true),
    autoSpeakerColors: z.boolean().optional().default(false),
    outputSrt: z.boolean().optional().default(false),
    title: z.string().max(200).optional().default(DEFAULT_TITLE),
    playResX: z.number().int().min(16).max(7680).optional(),
    playResY: z.number().int().min(16).max(4320).optional(),
    defaultStyle: styleInputSchema.optional(),
    speakers: z.array(speakerStyleInputSchema).max(50).optional().default([]),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.speakers.forEach((speaker, index) => {
      if (seen.has(speaker.speakerId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["speakers", index, "speakerId"],
          message: `Duplicate speakerId ${speaker.speakerId}`,
        });
      }
      seen.add(speaker.speakerId);
    });
  });

export const renderRequestSchema = z.object({
  transcript: transcriptSchema,
  config: subtitleConfigSchema.optional().default({}),
});

export type StyleInput = z.infer<typeof styleInputSchema>;
export type SubtitleConfigInput = z.infer<typeof subtitleConfigSchema>;

export const toStyleSpec = (input: StyleInput, base: StyleSpec = DEFAULT_STYLE): StyleSpec => {
  const { highlight, ...rest } = input;
  return {
    ...base,
    ...rest,
    highlight: {
      ...base.highlight,
      ...highlight,
    },
  };
};

export const toRenderConfig = (
  input: SubtitleConfigInput,
  frame: Pick<ScriptInfo, "playResX" | "playResY"> = { playResX: 1280, playResY: 720 },
): RenderConfig => {
  const speakerStyles: Record<string, StyleSpec> = {};
  input.speakers.forEach(({ speakerId, ...style }) => {
    speakerStyles[speakerId] = toStyleSpec(style);
  });

  // Without diarization the first speaker style stands in as the default.
  const firstSpeakerStyle = input.speakers[0] ? speakerStyles[input.speakers[0].speakerId] : undefined;
  const defaultStyle = input.defaultStyle
    ? toStyleSpec(input.defaultStyle)
    : (!input.enableSpeakerDetection ? firstSpeakerStyle : undefined) ?? DEFAULT_STYLE;

  return {
    grouping: input.maxWords === FULL_SENTENCE ? { kind: "sentence" } : { kind: "words", count: input.maxWords },
    speakerDetection: input.enableSpeakerDetection,
    wordHighlighting: input.enableWordHighlighting,
    defaultStyle,
    speakerStyles,
    autoSpeakerStyles: input.autoSpeakerColors,
    outputSrt: input.outputSrt,
    scriptInfo: {
      title: input.title,
      playResX: input.playResX ?? frame.playResX,
      playResY: input.playResY ?? frame.playResY,
    },
  };
};

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export const validateSubtitleConfig = (raw: unknown): ConfigValidationResult => {
  const parsed = subtitleConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message)),
      warnings: [],
    };
  }

  const warnings: string[] = [];
  if (typeof parsed.data.maxWords === "number" && parsed.data.maxWords > 50) {
    warnings.push("maxWords > 50 may result in very long subtitles");
  }

  try {
    assertRenderConfig(toRenderConfig(parsed.data));
  } catch (error) {
    if (error instanceof ConfigError) {
      return { valid: false, errors: [error.message], warnings };
    }
    throw error;
  }

  return { valid: true, errors: [], warnings };
};
