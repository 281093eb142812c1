import { describe, expect, it } from "vitest";
import { buildAnimationTags } from "../subtitles/animation";
import { assColor } from "../subtitles/colors";
import { buildDialogueEvents, escapeAssText, formatDialogueLine, highlightWord } from "../subtitles/dialogue";
import { createDisplayUnit } from "../subtitles/grouping";
import { computeWordIntervals } from "../subtitles/karaoke";
import { createStyleSpec, DEFAULT_STYLE } from "../subtitles/styles";
import { toAssTimestamp, toSrtTimestamp } from "../subtitles/timecode";

const frame = { playResX: 1280, playResY: 720 };

const unit = createDisplayUnit([
  { text: "NO", start: 0.12, end: 0.5 },
  { text: "NECESITO", start: 0.5, end: 0.79 },
  { text: "TU", start: 1.2, end: 1.35 },
  { text: "AYUDA", start: 1.35, end: 1.68 },
]);

describe("timestamps", () => {
  it("formats H:MM:SS.cc with unpadded hours", () => {
    expect(toAssTimestamp(0)).toBe("0:00:00.00");
    expect(toAssTimestamp(1.68)).toBe("0:00:01.68");
    expect(toAssTimestamp(3725.5)).toBe("1:02:05.50");
    expect(toAssTimestamp(36000)).toBe("10:00:00.00");
  });

  it("rounds to the nearest centisecond", () => {
    expect(toAssTimestamp(0.29)).toBe("0:00:00.29");
    expect(toAssTimestamp(59.999)).toBe("0:01:00.00");
  });

  it("formats srt timestamps with milliseconds", () => {
    expect(toSrtTimestamp(3725.5)).toBe("01:02:05,500");
    expect(toSrtTimestamp(0.79)).toBe("00:00:00,790");
  });
});

describe("highlightWord", () => {
  it("wraps the word in bold and colour switches", () => {
    expect(highlightWord("NO", DEFAULT_STYLE)).toBe("{\\b1}{\\c&H00FFFF&}NO{\\c&HFFFFFF&}{\\b0}");
  });

  it("omits the bold switches when highlight bold is off", () => {
    const style = createStyleSpec({
      primaryColor: assColor(0, 255, 0),
      highlight: { enabled: true, color: assColor(255, 0, 0), bold: false },
    });

    expect(highlightWord("hey", style)).toBe("{\\c&H0000FF&}hey{\\c&H00FF00&}");
  });
});

describe("buildDialogueEvents", () => {
  it("emits one event per word with the active word highlighted", () => {
    const events = buildDialogueEvents(unit, computeWordIntervals(unit), DEFAULT_STYLE, {
      styleName: "Default",
      highlighting: true,
      frame,
    });

    expect(events.map(formatDialogueLine)).toEqual([
      "Dialogue: 0,0:00:00.12,0:00:00.50,Default,,0,0,0,,{\\b1}{\\c&H00FFFF&}NO{\\c&HFFFFFF&}{\\b0} NECESITO TU AYUDA",
      "Dialogue: 0,0:00:00.50,0:00:01.20,Default,,0,0,0,,NO {\\b1}{\\c&H00FFFF&}NECESITO{\\c&HFFFFFF&}{\\b0} TU AYUDA",
      "Dialogue: 0,0:00:01.20,0:00:01.35,Default,,0,0,0,,NO NECESITO {\\b1}{\\c&H00FFFF&}TU{\\c&HFFFFFF&}{\\b0} AYUDA",
      "Dialogue: 0,0:00:01.35,0:00:01.68,Default,,0,0,0,,NO NECESITO TU {\\b1}{\\c&H00FFFF&}AYUDA{\\c&HFFFFFF&}{\\b0}",
    ]);
  });

  it("collapses to a single flat event when highlighting is off globally", () => {
    const events = buildDialogueEvents(unit, computeWordIntervals(unit), DEFAULT_STYLE, {
      styleName: "Default",
      highlighting: false,
      frame,
    });

    expect(events).toEqual([{ layer: 0, start: 0.12, end: 1.68, style: "Default", text: "NO NECESITO TU AYUDA" }]);
  });

  it("collapses to a single flat event when the style disables highlighting", () => {
    const style = createStyleSpec({ highlight: { enabled: false, color: DEFAULT_STYLE.highlight.color, bold: true } });
    const events = buildDialogueEvents(unit, computeWordIntervals(unit), style, {
      styleName: "Speaker_A",
      highlighting: true,
      frame,
    });

    expect(events).toHaveLength(1);
    expect(formatDialogueLine(events[0])).toBe("Dialogue: 0,0:00:00.12,0:00:01.68,Speaker_A,,0,0,0,,NO NECESITO TU AYUDA");
  });

  it("upper-cases words for all-caps styles", () => {
    const lower = createDisplayUnit([
      { text: "hola", start: 0, end: 0.4 },
      { text: "amigo", start: 0.4, end: 0.9 },
    ]);
    const style = createStyleSpec({ allCaps: true });
    const events = buildDialogueEvents(lower, computeWordIntervals(lower), style, {
      styleName: "Default",
      highlighting: true,
      frame,
    });

    expect(events.map((event) => event.text)).toEqual([
      "{\\b1}{\\c&H00FFFF&}HOLA{\\c&HFFFFFF&}{\\b0} AMIGO",
      "HOLA {\\b1}{\\c&H00FFFF&}AMIGO{\\c&HFFFFFF&}{\\b0}",
    ]);
  });

  it("prefixes entrance animation tags to flat events", () => {
    const style = createStyleSpec({ animation: "fade_in", fadeInDuration: 0.3, fadeOutDuration: 0.2 });
    const events = buildDialogueEvents(unit, computeWordIntervals(unit), style, {
      styleName: "Default",
      highlighting: false,
      frame,
    });

    expect(events[0].text).toBe("{\\fad(300,200)}NO NECESITO TU AYUDA");
  });

  it("escapes override braces and line breaks only", () => {
    expect(escapeAssText("{x}\ny")).toBe("\\{x\\}\\Ny");
    expect(escapeAssText("a\\b")).toBe("a\\b");
  });
});

describe("buildAnimationTags", () => {
  const timing = { fadeInDuration: 0.3, fadeOutDuration: 0.2, marginVertical: 30 };

  it("emits nothing without an animation or without fade time", () => {
    expect(buildAnimationTags({ ...timing, animation: "none" }, frame)).toBe("");
    expect(buildAnimationTags({ animation: "bounce", fadeInDuration: 0, fadeOutDuration: 0, marginVertical: 30 }, frame)).toBe("");
  });

  it("slides up from below the bottom margin", () => {
    expect(buildAnimationTags({ ...timing, animation: "slide_up" }, frame)).toBe(
      "{\\move(640,740,640,690,0,300)}{\\fad(300,200)}",
    );
  });

  it("splits the fade-in into three bounce steps", () => {
    expect(buildAnimationTags({ ...timing, animation: "bounce" }, frame)).toBe(
      "{\\t(0,100,\\fscx120\\fscy120)}{\\t(100,200,\\fscx90\\fscy90)}{\\t(200,300,\\fscx100\\fscy100)}{\\fad(300,200)}",
    );
  });

  it("scales in and pulses", () => {
    expect(buildAnimationTags({ ...timing, animation: "scale_in" }, frame)).toBe(
      "{\\t(0,300,\\fscx100\\fscy100)}{\\fscx50\\fscy50}{\\fad(300,200)}",
    );
    expect(buildAnimationTags({ ...timing, animation: "pulse" }, frame)).toBe(
      "{\\t(0,150,\\fscx110\\fscy110)}{\\t(150,300,\\fscx100\\fscy100)}{\\fad(300,200)}",
    );
  });
});
