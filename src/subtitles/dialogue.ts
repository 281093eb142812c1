import { buildAnimationTags } from "./animation";
import { formatColorTag } from "./colors";
import { toAssTimestamp } from "./timecode";
import type { DialogueEvent, DisplayUnit, ScriptInfo, StyleSpec, WordInterval } from "./types";

export interface DialogueOptions {
  styleName: string;
  /** Global word-highlighting switch; the style's own switch must also be on. */
  highlighting: boolean;
  frame: Pick<ScriptInfo, "playResX" | "playResY">;
}

export const EVENT_FORMAT = "Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text";

export const escapeAssText = (value: string): string => {
  return value.replace(/\{/g, "\\{").replace(/\}/g, "\\}").replace(/\n/g, "\\N");
};

const displayText = (text: string, style: StyleSpec): string => {
  return escapeAssText(style.allCaps ? text.toUpperCase() : text);
};

export const highlightWord = (text: string, style: StyleSpec): string => {
  const { highlight } = style;
  const open = `${highlight.bold ? "{\\b1}" : ""}{\\c${formatColorTag(highlight.color)}}`;
  const close = `{\\c${formatColorTag(style.primaryColor)}}${highlight.bold ? "{\\b0}" : ""}`;
  return `${open}${text}${close}`;
};

export const isHighlightingActive = (style: StyleSpec, highlighting: boolean): boolean => {
  return highlighting && style.highlight.enabled;
};

/**
 * Karaoke lines repeat the whole unit once per word, each copy timed to that
 * word's interval with only that word highlighted. Without highlighting the
 * unit is a single line spanning its own start and end.
 */
export const buildDialogueEvents = (
  unit: DisplayUnit,
  intervals: readonly WordInterval[],
  style: StyleSpec,
  options: DialogueOptions,
): DialogueEvent[] => {
  const words = unit.words.map((word) => displayText(word.text, style));

  if (!isHighlightingActive(style, options.highlighting)) {
    return [
      {
        layer: 0,
        start: unit.start,
        end: unit.end,
        style: options.styleName,
        text: `${buildAnimationTags(style, options.frame)}${words.join(" ")}`,
      },
    ];
  }

  return intervals.map((interval) => ({
    layer: 0,
    start: interval.start,
    end: interval.end,
    style: options.styleName,
    text: words.map((word, index) => (index === interval.index ? highlightWord(word, style) : word)).join(" "),
  }));
};

export const formatDialogueLine = (event: DialogueEvent): string => {
  return `Dialogue: ${event.layer},${toAssTimestamp(event.start)},${toAssTimestamp(event.end)},${event.style},,0,0,0,,${event.text}`;
};
