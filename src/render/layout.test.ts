import { describe, expect, it } from "vitest";
import { FontDrawError } from "../core/errors.js";
import { createSnippet } from "../core/snippet.js";
import { FakeFont } from "../test-support/fakes.js";
import { computeFrameLayout, lineHeightFor } from "./layout.js";

const PARAMS = { width: 1000, height: 800, fontSize: 40, verticalSpread: 1.5 };
const SNIPPET = createSnippet(
  ["short line.", "A Big Idea here.", "another longer line of words."],
  1,
);

describe("lineHeightFor", () => {
  it("scales ascent plus descent by the spread", () => {
    expect(lineHeightFor(new FakeFont("/f/a.ttf", 40), 40, 1.5)).toBe(60);
  });

  it("measures a sample when the face has no line metrics", () => {
    expect(lineHeightFor(new FakeFont("/f/a.ttf", 40, { metrics: null }), 40, 1.5)).toBe(60);
  });

  it("switches to 1.2 x size x spread when spacing collapses", () => {
    expect(lineHeightFor(new FakeFont("/f/a.ttf", 40), 40, 0.5)).toBe(24);
  });
});

describe("computeFrameLayout", () => {
  it("centres the bold phrase box in the frame", () => {
    const layout = computeFrameLayout(SNIPPET, "Big Idea", new FakeFont("/f/a.ttf", 40), PARAMS);
    expect(layout.highlight).toEqual({ x: 452, y: 380, width: 96, height: 40 });
    expect(layout.baselineOffset).toBe(32);
    expect(layout.phrase).toBe("Big Idea");
  });

  it("stacks lines around the highlight line", () => {
    const layout = computeFrameLayout(SNIPPET, "Big Idea", new FakeFont("/f/a.ttf", 40), PARAMS);
    expect(layout.lineHeight).toBe(60);
    expect(layout.lines.map((l) => l.y)).toEqual([320, 380, 440]);
  });

  it("lines up the highlight line's prefix so the phrase starts at the box", () => {
    const layout = computeFrameLayout(SNIPPET, "Big Idea", new FakeFont("/f/a.ttf", 40), PARAMS);
    expect(layout.lines[1].x).toBe(432);
  });

  it("centres other lines", () => {
    const layout = computeFrameLayout(SNIPPET, "Big Idea", new FakeFont("/f/a.ttf", 40), PARAMS);
    expect(layout.lines[0].x).toBe(445);
    expect(layout.lines[2]).toEqual({ text: "another longer line of words.", x: 355, y: 440, width: 290 });
  });

  it("keeps wide lines off the left edge", () => {
    const wide = createSnippet(["x".repeat(120), "A Big Idea here."], 1);
    const layout = computeFrameLayout(wide, "Big Idea", new FakeFont("/f/a.ttf", 40), PARAMS);
    expect(layout.lines[0].x).toBe(20);
  });

  it("shifts every line by the jitter but leaves the box centred", () => {
    const layout = computeFrameLayout(SNIPPET, "Big Idea", new FakeFont("/f/a.ttf", 40), PARAMS, 3);
    expect(layout.lines.map((l) => l.y)).toEqual([323, 383, 443]);
    expect(layout.highlight.y).toBe(380);
  });

  it("raises FontDrawError for a zero-width bold phrase", () => {
    const font = new FakeFont("/f/a.ttf", 40, { boldCharWidth: 0 });
    expect(() => computeFrameLayout(SNIPPET, "Big Idea", font, PARAMS)).toThrow(FontDrawError);
  });

  it("passes through measurement failures", () => {
    const font = new FakeFont("/f/a.ttf", 40, { brokenWeight: "bold" });
    expect(() => computeFrameLayout(SNIPPET, "Big Idea", font, PARAMS)).toThrow("broken glyph table");
  });

  it("rejects a snippet whose highlight line lacks the phrase", () => {
    expect(() => computeFrameLayout(SNIPPET, "Missing", new FakeFont("/f/a.ttf", 40), PARAMS)).toThrow(
      'Highlight line 1 does not contain "Missing"',
    );
  });
});
