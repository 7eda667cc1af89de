import { existsSync } from "fs";
import { GlobalFonts, createCanvas } from "@napi-rs/canvas";
import type { SKRSContext2D } from "@napi-rs/canvas";
import type { FontHandle, FontWeight, LineMetrics, Result, TextExtent } from "../core/types.js";
import { err, ok } from "../core/types.js";
import { FontDrawError, FontLoadError, errorMessage } from "../core/errors.js";

// ── Font loading contract ───────────────────────────────────────────

export interface FontLoader {
  load(path: string, size: number, boldPath: string | null): Result<FontHandle, FontLoadError>;
}

// ── Canvas-backed fonts ─────────────────────────────────────────────
// Each font file is registered once under a private family alias so
// the canvas never substitutes a different face for it.

const registered = new Map<string, string | null>();
let aliasCounter = 0;

function registerFont(path: string): string | null {
  const known = registered.get(path);
  if (known !== undefined) return known;

  const alias = `mc-font-${++aliasCounter}`;
  const okay = existsSync(path) && GlobalFonts.registerFromPath(path, alias);
  const result = okay ? alias : null;
  registered.set(path, result);
  return result;
}

let scratch: SKRSContext2D | null = null;

function measureContext(): SKRSContext2D {
  scratch ??= createCanvas(8, 8).getContext("2d");
  return scratch;
}

export class CanvasFont implements FontHandle {
  readonly path: string;
  readonly boldPath: string | null;
  readonly size: number;
  private readonly family: string;
  private readonly boldFamily: string;
  private metrics: LineMetrics | null | undefined;

  constructor(path: string, size: number, family: string, bold: { path: string; family: string } | null) {
    this.path = path;
    this.size = size;
    this.family = family;
    this.boldPath = bold?.path ?? null;
    this.boldFamily = bold?.family ?? family;
  }

  css(weight: FontWeight): string {
    return `${this.size}px "${weight === "bold" ? this.boldFamily : this.family}"`;
  }

  measure(text: string, weight: FontWeight): TextExtent {
    let width: number;
    let ascent: number;
    let descent: number;
    try {
      const ctx = measureContext();
      ctx.font = this.css(weight);
      const m = ctx.measureText(text);
      width = m.width;
      ascent = m.actualBoundingBoxAscent;
      descent = m.actualBoundingBoxDescent;
    } catch (e) {
      throw new FontDrawError(this.path, `measuring "${text}" failed: ${errorMessage(e)}`, { cause: e });
    }
    if (![width, ascent, descent].every(Number.isFinite)) {
      throw new FontDrawError(this.path, `non-finite metrics for "${text}"`);
    }
    return { width, ascent, height: ascent + descent };
  }

  lineMetrics(): LineMetrics | null {
    if (this.metrics !== undefined) return this.metrics;
    let ascent: number;
    let descent: number;
    try {
      const ctx = measureContext();
      ctx.font = this.css("regular");
      const m = ctx.measureText("Ay");
      ascent = m.fontBoundingBoxAscent;
      descent = m.fontBoundingBoxDescent;
    } catch (e) {
      throw new FontDrawError(this.path, `reading line metrics failed: ${errorMessage(e)}`, { cause: e });
    }
    this.metrics =
      Number.isFinite(ascent) && Number.isFinite(descent) && ascent > 0
        ? { ascent, descent: Math.abs(descent) }
        : null;
    return this.metrics;
  }
}

export class CanvasFontLoader implements FontLoader {
  load(path: string, size: number, boldPath: string | null): Result<FontHandle, FontLoadError> {
    if (!existsSync(path)) return err(new FontLoadError(path, "file not found"));

    const family = registerFont(path);
    if (!family) return err(new FontLoadError(path, "not a readable TrueType/OpenType font"));

    const boldFamily = boldPath ? registerFont(boldPath) : null;
    const bold = boldPath && boldFamily ? { path: boldPath, family: boldFamily } : null;
    const font = new CanvasFont(path, size, family, bold);

    // A face that registers but renders nothing is as bad as a broken file
    try {
      if (font.measure("Ay", "regular").width <= 0) {
        return err(new FontLoadError(path, "font has no visible glyphs"));
      }
    } catch (e) {
      return err(new FontLoadError(path, errorMessage(e), { cause: e }));
    }

    return ok(font);
  }
}
