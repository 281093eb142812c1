import type { AssColor } from "./types";

const hexByte = (value: number): string => {
  const clamped = Math.max(0, Math.min(255, Math.round(value)));
  return clamped.toString(16).toUpperCase().padStart(2, "0");
};

export const assColor = (red: number, green: number, blue: number, alpha = 0): AssColor => ({
  alpha,
  blue,
  green,
  red,
});

/** Style-line form: `&HAABBGGRR`. */
export const formatAssColor = (color: AssColor): string => {
  return `&H${hexByte(color.alpha)}${hexByte(color.blue)}${hexByte(color.green)}${hexByte(color.red)}`;
};

/** Override-tag form used by `\c`: `&HBBGGRR&`. */
export const formatColorTag = (color: AssColor): string => {
  return `&H${hexByte(color.blue)}${hexByte(color.green)}${hexByte(color.red)}&`;
};

export const toHexRgb = (color: AssColor): string => {
  return `#${hexByte(color.red)}${hexByte(color.green)}${hexByte(color.blue)}`;
};

/**
 * Accepts `#RRGGBB`, `#RRGGBBAA` (CSS alpha, 255 = opaque), `&HBBGGRR` and
 * `&HAABBGGRR` (ASS alpha, 0 = opaque). Returns null for anything else.
 */
export const parseColor = (value: string): AssColor | null => {
  const raw = value.trim();

  const css = raw.match(/^#([0-9a-fA-F]{6})([0-9a-fA-F]{2})?$/);
  if (css?.[1]) {
    const rgb = css[1];
    const opacity = css[2] ? parseInt(css[2], 16) : 255;
    return assColor(parseInt(rgb.slice(0, 2), 16), parseInt(rgb.slice(2, 4), 16), parseInt(rgb.slice(4, 6), 16), 255 - opacity);
  }

  const ass = raw.match(/^&H([0-9a-fA-F]{6}|[0-9a-fA-F]{8})&?$/i);
  if (ass?.[1]) {
    const digits = ass[1].padStart(8, "0");
    return {
      alpha: parseInt(digits.slice(0, 2), 16),
      blue: parseInt(digits.slice(2, 4), 16),
      green: parseInt(digits.slice(4, 6), 16),
      red: parseInt(digits.slice(6, 8), 16),
    };
  }

  return null;
};

export const WHITE = assColor(255, 255, 255);
export const BLACK = assColor(0, 0, 0);
export const YELLOW = assColor(255, 255, 0);
export const RED = assColor(255, 0, 0);
