import type { ScriptInfo, StyleSpec } from "./types";

const SLIDE_DISTANCE_PX = 50;

/**
 * Entrance-effect override tags for a subtitle line. Durations in the style are
 * seconds; ASS tags take milliseconds. No tags are emitted while both fades are 0.
 */
export const buildAnimationTags = (
  style: Pick<StyleSpec, "animation" | "fadeInDuration" | "fadeOutDuration" | "marginVertical">,
  frame: Pick<ScriptInfo, "playResX" | "playResY">,
): string => {
  if (style.animation === "none") {
    return "";
  }

  const fadeIn = Math.max(0, Math.round(style.fadeInDuration * 1000));
  const fadeOut = Math.max(0, Math.round(style.fadeOutDuration * 1000));
  if (fadeIn === 0 && fadeOut === 0) {
    return "";
  }

  const fade = `{\\fad(${fadeIn},${fadeOut})}`;

  switch (style.animation) {
    case "fade_in":
    case "type_writer":
      return fade;
    case "slide_up": {
      const x = Math.round(frame.playResX / 2);
      const y = Math.round(frame.playResY - style.marginVertical);
      return `{\\move(${x},${y + SLIDE_DISTANCE_PX},${x},${y},0,${fadeIn})}${fade}`;
    }
    case "scale_in":
      return `{\\t(0,${fadeIn},\\fscx100\\fscy100)}{\\fscx50\\fscy50}${fade}`;
    case "bounce": {
      const step = Math.floor(fadeIn / 3);
      return `{\\t(0,${step},\\fscx120\\fscy120)}{\\t(${step},${step * 2},\\fscx90\\fscy90)}{\\t(${step * 2},${fadeIn},\\fscx100\\fscy100)}${fade}`;
    }
    case "pulse": {
      const half = Math.floor(fadeIn / 2);
      return `{\\t(0,${half},\\fscx110\\fscy110)}{\\t(${half},${fadeIn},\\fscx100\\fscy100)}${fade}`;
    }
  }
};
