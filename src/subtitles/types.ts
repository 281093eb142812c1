export interface TranscribedWord {
  text: string;
  start: number;
  end: number;
  speaker?: string;
}

export interface TranscriptSegment {
  words: TranscribedWord[];
}

export interface DisplayUnit {
  readonly words: readonly TranscribedWord[];
  readonly start: number;
  readonly end: number;
  readonly text: string;
  readonly speaker?: string;
}

export interface WordInterval {
  index: number;
  start: number;
  end: number;
}

export interface AssColor {
  alpha: number;
  blue: number;
  green: number;
  red: number;
}

export const SUBTITLE_POSITION_NAMES = [
  "bottom_left",
  "bottom_center",
  "bottom_right",
  "middle_left",
  "middle_center",
  "middle_right",
  "top_left",
  "top_center",
  "top_right",
] as const;

export type SubtitlePosition = (typeof SUBTITLE_POSITION_NAMES)[number];

/** Numpad layout: 1 = bottom-left, 5 = centre, 9 = top-right. */
export const SUBTITLE_POSITIONS: Record<SubtitlePosition, number> = {
  bottom_left: 1,
  bottom_center: 2,
  bottom_right: 3,
  middle_left: 4,
  middle_center: 5,
  middle_right: 6,
  top_left: 7,
  top_center: 8,
  top_right: 9,
};

export const ANIMATION_STYLES = ["none", "fade_in", "slide_up", "scale_in", "type_writer", "bounce", "pulse"] as const;

export type AnimationStyle = (typeof ANIMATION_STYLES)[number];

/** 1 draws an outline with a drop shadow, 3 draws an opaque box behind the text. */
export type BorderStyle = 1 | 3;

export interface HighlightSpec {
  enabled: boolean;
  color: AssColor;
  bold: boolean;
}

export interface StyleSpec {
  fontFamily: string;
  fontSize: number;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  strikeout: boolean;
  primaryColor: AssColor;
  secondaryColor: AssColor;
  outlineColor: AssColor;
  shadowColor: AssColor;
  backgroundColor: AssColor;
  position: SubtitlePosition;
  marginLeft: number;
  marginRight: number;
  marginVertical: number;
  outlineWidth: number;
  shadowDistance: number;
  scaleX: number;
  scaleY: number;
  letterSpacing: number;
  rotation: number;
  borderStyle: BorderStyle;
  allCaps: boolean;
  animation: AnimationStyle;
  fadeInDuration: number;
  fadeOutDuration: number;
  highlight: HighlightSpec;
}

export type GroupingMode = { kind: "words"; count: number } | { kind: "sentence" };

export interface ScriptInfo {
  title: string;
  playResX: number;
  playResY: number;
}

export interface RenderConfig {
  grouping: GroupingMode;
  speakerDetection: boolean;
  wordHighlighting: boolean;
  defaultStyle?: StyleSpec;
  speakerStyles: Record<string, StyleSpec>;
  /** Assign palette colours to diarized speakers when speakerStyles is empty. */
  autoSpeakerStyles: boolean;
  outputSrt: boolean;
  scriptInfo: ScriptInfo;
}

export interface StyleBlock {
  name: string;
  spec: StyleSpec;
}

export interface DialogueEvent {
  layer: 0;
  start: number;
  end: number;
  style: string;
  text: string;
}

export interface SubtitleDocument {
  scriptInfo: ScriptInfo;
  styles: StyleBlock[];
  events: DialogueEvent[];
}
