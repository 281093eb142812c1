import { toSrtTimestamp } from "./timecode";
import type { DisplayUnit } from "./types";

/** Unit-level plain export: one numbered cue per display unit, no per-word splits. */
export const unitsToSrt = (units: readonly DisplayUnit[]): string => {
  const lines: string[] = [];
  units.forEach((unit, index) => {
    const speakerPrefix = unit.speaker ? `[${unit.speaker}] ` : "";
    lines.push(String(index + 1));
    lines.push(`${toSrtTimestamp(unit.start)} --> ${toSrtTimestamp(unit.end)}`);
    lines.push(`${speakerPrefix}${unit.text}`);
    lines.push("");
  });
  return lines.join("\n");
};
