import { buildDialogueEvents, EVENT_FORMAT, formatDialogueLine, isHighlightingActive } from "./dialogue";
import { ConfigError, type Diagnostic } from "./errors";
import { assertGroupingMode, groupWords, sanitizeWords } from "./grouping";
import { computeWordIntervals } from "./karaoke";
import { unitsToSrt } from "./srt";
import { buildAutoSpeakerStyles, buildStyleLine, DEFAULT_STYLE, DEFAULT_STYLE_NAME, STYLE_FORMAT, styleNameFor } from "./styles";
import type { DialogueEvent, DisplayUnit, RenderConfig, StyleBlock, SubtitleDocument, TranscriptSegment } from "./types";

export interface AssembledDocument {
  document: SubtitleDocument;
  units: DisplayUnit[];
  diagnostics: Diagnostic[];
}

export interface RenderOutput {
  ass: string;
  srt?: string;
  diagnostics: Diagnostic[];
  unitCount: number;
  eventCount: number;
  styleCount: number;
}

type StyleResolver = (speakerId: string | undefined) => StyleBlock;

export const assertStyleCompatibility = (config: Pick<RenderConfig, "wordHighlighting" | "defaultStyle" | "speakerStyles">): void => {
  if (!config.wordHighlighting) {
    return;
  }

  const styles: StyleBlock[] = Object.entries(config.speakerStyles).map(([speakerId, spec]) => ({
    name: styleNameFor(speakerId),
    spec,
  }));
  if (config.defaultStyle) {
    styles.unshift({ name: DEFAULT_STYLE_NAME, spec: config.defaultStyle });
  }

  styles.forEach(({ name, spec }) => {
    if (spec.animation !== "none" && isHighlightingActive(spec, true)) {
      throw new ConfigError(`Style ${name} combines the "${spec.animation}" animation with word highlighting; enable only one`);
    }
  });
};

/** Distinct speaker ids can sanitize to the same style name; that would merge their styles. */
export const assertUniqueStyleNames = (config: Pick<RenderConfig, "speakerDetection" | "speakerStyles">): void => {
  if (!config.speakerDetection) {
    return;
  }

  const owners = new Map<string, string>();
  Object.keys(config.speakerStyles).forEach((speakerId) => {
    const name = styleNameFor(speakerId);
    const owner = owners.get(name);
    if (owner !== undefined) {
      throw new ConfigError(`Speakers "${owner}" and "${speakerId}" both map to style name ${name}`);
    }
    owners.set(name, speakerId);
  });
};

/** Every check that can reject a configuration before any word is rendered. */
export const assertRenderConfig = (config: RenderConfig): void => {
  assertGroupingMode(config.grouping);
  assertStyleCompatibility(config);
  assertUniqueStyleNames(config);
};

/** Resolves every style once per document; the returned lookup never changes. */
const createStyleResolver = (config: RenderConfig): StyleResolver => {
  const speakerBlocks = new Map<string, StyleBlock>(
    Object.entries(config.speakerStyles).map(([speakerId, spec]) => [speakerId, { name: styleNameFor(speakerId), spec }]),
  );
  const defaultBlock: StyleBlock | undefined = config.defaultStyle
    ? { name: DEFAULT_STYLE_NAME, spec: config.defaultStyle }
    : undefined;

  return (speakerId) => {
    const speakerBlock = config.speakerDetection && speakerId ? speakerBlocks.get(speakerId) : undefined;
    const block = speakerBlock ?? defaultBlock;
    if (!block) {
      throw new ConfigError(
        speakerId
          ? `No style configured for speaker "${speakerId}" and no default style is set`
          : "No default style is set for subtitles without a speaker",
      );
    }
    return block;
  };
};

export const buildDisplayUnits = (
  segments: readonly TranscriptSegment[],
  config: Pick<RenderConfig, "grouping" | "speakerDetection">,
): { units: DisplayUnit[]; diagnostics: Diagnostic[] } => {
  const units: DisplayUnit[] = [];
  const diagnostics: Diagnostic[] = [];
  const options = { speakerDetection: config.speakerDetection };

  segments.forEach((segment) => {
    const sanitized = sanitizeWords(segment.words, options);
    diagnostics.push(...sanitized.diagnostics);
    units.push(...groupWords(sanitized.words, config.grouping, options));
  });

  return { units, diagnostics };
};

export const assembleDocument = (segments: readonly TranscriptSegment[], config: RenderConfig): AssembledDocument => {
  assertRenderConfig(config);

  const resolveStyle = createStyleResolver(config);
  const { units, diagnostics } = buildDisplayUnits(segments, config);

  const styles = new Map<string, StyleBlock>();
  if (config.defaultStyle) {
    styles.set(DEFAULT_STYLE_NAME, { name: DEFAULT_STYLE_NAME, spec: config.defaultStyle });
  }

  const events: DialogueEvent[] = units.flatMap((unit) => {
    const block = resolveStyle(unit.speaker);
    if (!styles.has(block.name)) {
      styles.set(block.name, block);
    }
    return buildDialogueEvents(unit, computeWordIntervals(unit), block.spec, {
      styleName: block.name,
      highlighting: config.wordHighlighting,
      frame: config.scriptInfo,
    });
  });

  // Array.prototype.sort is stable, so per-word events of a unit keep their order.
  events.sort((a, b) => a.start - b.start);

  return {
    document: {
      scriptInfo: { ...config.scriptInfo },
      styles: [...styles.values()],
      events,
    },
    units,
    diagnostics,
  };
};

export const serializeAss = (document: SubtitleDocument): string => {
  const { scriptInfo } = document;
  const lines = [
    "[Script Info]",
    `Title: ${scriptInfo.title}`,
    "ScriptType: v4.00+",
    "WrapStyle: 0",
    "ScaledBorderAndShadow: yes",
    `PlayResX: ${scriptInfo.playResX}`,
    `PlayResY: ${scriptInfo.playResY}`,
    "YCbCr Matrix: None",
    "",
    "[V4+ Styles]",
    STYLE_FORMAT,
    ...document.styles.map((block) => buildStyleLine(block.name, block.spec)),
    "",
    "[Events]",
    EVENT_FORMAT,
    ...document.events.map(formatDialogueLine),
  ];
  return `${lines.join("\n")}\n`;
};

/**
 * Gives each diarized speaker a palette colour when no per-speaker styles were
 * configured. Speakers are numbered in order of first appearance.
 */
export const withAutoSpeakerStyles = (segments: readonly TranscriptSegment[], config: RenderConfig): RenderConfig => {
  if (!config.autoSpeakerStyles || !config.speakerDetection || Object.keys(config.speakerStyles).length > 0) {
    return config;
  }

  const speakerIds = [
    ...new Set(segments.flatMap((segment) => segment.words.map((word) => word.speaker)).filter((id): id is string => Boolean(id))),
  ];
  return {
    ...config,
    speakerStyles: buildAutoSpeakerStyles(speakerIds, config.defaultStyle ?? DEFAULT_STYLE),
  };
};

export const renderSubtitles = (segments: readonly TranscriptSegment[], config: RenderConfig): RenderOutput => {
  const effectiveConfig = withAutoSpeakerStyles(segments, config);
  const { document, units, diagnostics } = assembleDocument(segments, effectiveConfig);

  return {
    ass: serializeAss(document),
    ...(effectiveConfig.outputSrt ? { srt: unitsToSrt(units) } : {}),
    diagnostics,
    unitCount: units.length,
    eventCount: document.events.length,
    styleCount: document.styles.length,
  };
};
