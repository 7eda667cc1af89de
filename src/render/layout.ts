import type { FontHandle, FrameLayout, PlacedLine, TextSnippet } from "../core/types.js";
import { FontDrawError } from "../core/errors.js";

// ── Frame layout ────────────────────────────────────────────────────
// One computation feeds both the background text pass and the highlight
// overlay, so the two can never disagree about where the phrase sits.

/** Lines never start closer than this to the left edge */
const MIN_INSET = 20;
/** Lines narrower than this share of the frame stay inside the central column */
const SHORT_LINE_RATIO = 0.3;
const COLUMN_INSET_RATIO = 0.15;

export interface LayoutParams {
  width: number;
  height: number;
  fontSize: number;
  verticalSpread: number;
}

export function lineHeightFor(font: FontHandle, fontSize: number, spread: number): number {
  const metrics = font.lineMetrics();
  const metricHeight = metrics ? metrics.ascent + metrics.descent : font.measure("Ay", "regular").height;
  const height = Math.floor(metricHeight * spread);
  return height <= 0.8 * fontSize ? Math.floor(1.2 * fontSize * spread) : height;
}

export function computeFrameLayout(
  snippet: TextSnippet,
  phrase: string,
  font: FontHandle,
  params: LayoutParams,
  jitter = 0,
): FrameLayout {
  const { width: W, height: H } = params;
  const highlightLine = snippet.lines[snippet.highlightLineIndex];
  const at = highlightLine.indexOf(phrase);
  if (at < 0) {
    throw new Error(`Highlight line ${snippet.highlightLineIndex} does not contain "${phrase}"`);
  }

  const lineHeight = lineHeightFor(font, params.fontSize, params.verticalSpread);

  const bold = font.measure(phrase, "bold");
  if (bold.width <= 0 || bold.height <= 0) {
    throw new FontDrawError(font.path, `zero-size bold extent for "${phrase}"`);
  }

  const hx = (W - bold.width) / 2;
  const hy = (H - bold.height) / 2;
  const blockStartY = hy - snippet.highlightLineIndex * lineHeight;
  const prefixWidth = font.measure(highlightLine.slice(0, at), "regular").width;

  const lines: PlacedLine[] = snippet.lines.map((text, i) => {
    const lineWidth = font.measure(text, "regular").width;
    let x: number;
    if (i === snippet.highlightLineIndex) {
      x = hx - prefixWidth;
    } else {
      x = Math.max(MIN_INSET, (W - lineWidth) / 2);
      if (lineWidth < SHORT_LINE_RATIO * W) x = Math.max(x, COLUMN_INSET_RATIO * W);
    }
    return { text, x, y: blockStartY + i * lineHeight + jitter, width: lineWidth };
  });

  return {
    lineHeight,
    lines,
    highlight: { x: hx, y: hy, width: bold.width, height: bold.height },
    phrase,
    baselineOffset: bold.ascent,
  };
}
