import { BLACK, RED, WHITE, YELLOW, assColor, formatAssColor } from "./colors";
import { SUBTITLE_POSITIONS, type AssColor, type StyleSpec } from "./types";

export const DEFAULT_STYLE_NAME = "Default";
const ENCODING = 1;

export const DEFAULT_STYLE: StyleSpec = {
  fontFamily: "Arial",
  fontSize: 30,
  bold: false,
  italic: false,
  underline: false,
  strikeout: false,
  primaryColor: WHITE,
  secondaryColor: RED,
  outlineColor: BLACK,
  shadowColor: BLACK,
  backgroundColor: BLACK,
  position: "bottom_center",
  marginLeft: 10,
  marginRight: 10,
  marginVertical: 30,
  outlineWidth: 2,
  shadowDistance: 2,
  scaleX: 100,
  scaleY: 100,
  letterSpacing: 0,
  rotation: 0,
  borderStyle: 1,
  allCaps: false,
  animation: "none",
  fadeInDuration: 0,
  fadeOutDuration: 0,
  highlight: {
    enabled: true,
    color: YELLOW,
    bold: true,
  },
};

export const createStyleSpec = (overrides: Partial<StyleSpec> = {}): StyleSpec => ({
  ...DEFAULT_STYLE,
  ...overrides,
  highlight: {
    ...DEFAULT_STYLE.highlight,
    ...overrides.highlight,
  },
});

export const styleNameFor = (speakerId?: string): string => {
  if (!speakerId) {
    return DEFAULT_STYLE_NAME;
  }
  return `Speaker_${speakerId.replace(/[\s,]/g, "_")}`;
};

const formatNumber = (value: number): string => {
  if (!Number.isFinite(value)) {
    return "0";
  }
  return String(Number(value.toFixed(2)));
};

const flag = (value: boolean): number => (value ? 1 : 0);

const backColorFor = (spec: StyleSpec): AssColor => {
  return spec.borderStyle === 3 ? spec.backgroundColor : spec.shadowColor;
};

export const STYLE_FORMAT =
  "Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding";

export const buildStyleLine = (name: string, spec: StyleSpec): string => {
  const fields = [
    name,
    spec.fontFamily,
    String(Math.round(spec.fontSize)),
    formatAssColor(spec.primaryColor),
    formatAssColor(spec.secondaryColor),
    formatAssColor(spec.outlineColor),
    formatAssColor(backColorFor(spec)),
    flag(spec.bold),
    flag(spec.italic),
    flag(spec.underline),
    flag(spec.strikeout),
    formatNumber(spec.scaleX),
    formatNumber(spec.scaleY),
    formatNumber(spec.letterSpacing),
    formatNumber(spec.rotation),
    spec.borderStyle,
    formatNumber(Math.max(0, spec.outlineWidth)),
    formatNumber(Math.max(0, spec.shadowDistance)),
    SUBTITLE_POSITIONS[spec.position],
    Math.max(0, Math.round(spec.marginLeft)),
    Math.max(0, Math.round(spec.marginRight)),
    Math.max(0, Math.round(spec.marginVertical)),
    ENCODING,
  ];
  return `Style: ${fields.join(",")}`;
};

export const SPEAKER_PALETTE: AssColor[] = [
  assColor(255, 0, 0),
  assColor(0, 255, 0),
  assColor(0, 0, 255),
  assColor(255, 255, 0),
  assColor(255, 0, 255),
  assColor(0, 255, 255),
  assColor(255, 128, 64),
  assColor(255, 0, 128),
  assColor(128, 255, 0),
  assColor(0, 128, 255),
];

const derivedColor = (index: number): AssColor => {
  // Spread hues over the brighter half of each channel so text stays legible.
  const channel = (seed: number): number => 80 + ((index * seed) % 176);
  return assColor(channel(97), channel(57), channel(31));
};

/** Distinct primary colours for speakers found by diarization, stable for a given id order. */
export const buildAutoSpeakerStyles = (speakerIds: readonly string[], base: StyleSpec = DEFAULT_STYLE): Record<string, StyleSpec> => {
  const styles: Record<string, StyleSpec> = {};
  speakerIds.forEach((speakerId, index) => {
    styles[speakerId] = {
      ...base,
      fontSize: base.fontSize + 2,
      bold: true,
      outlineWidth: Math.max(base.outlineWidth, 3),
      primaryColor: SPEAKER_PALETTE[index] ?? derivedColor(index),
    };
  });
  return styles;
};
