import type { FontHandle, FontWeight, LineMetrics, Result, TextExtent } from "../core/types.js";
import { err, ok } from "../core/types.js";
import { FontDrawError, FontLoadError } from "../core/errors.js";
import type { FontLoader } from "../fonts/canvas-font.js";

// ── Fixed-pitch font stand-in ───────────────────────────────────────
// Every glyph is `charWidth` wide (bold: `boldCharWidth`); ink ascent is
// 0.8 × size and descent 0.2 × size, so layouts are easy to compute by hand.

export interface FakeFontOptions {
  charWidth?: number;
  boldCharWidth?: number;
  boldPath?: string | null;
  metrics?: LineMetrics | null;
  /** measure() throws FontDrawError for this weight */
  brokenWeight?: FontWeight;
}

export class FakeFont implements FontHandle {
  readonly path: string;
  readonly size: number;
  readonly boldPath: string | null;
  private readonly opts: FakeFontOptions;

  constructor(path: string, size: number, opts: FakeFontOptions = {}) {
    this.path = path;
    this.size = size;
    this.boldPath = opts.boldPath ?? null;
    this.opts = opts;
  }

  css(_weight: FontWeight): string {
    return `${this.size}px sans-serif`;
  }

  measure(text: string, weight: FontWeight): TextExtent {
    if (this.opts.brokenWeight === weight) {
      throw new FontDrawError(this.path, "broken glyph table");
    }
    const per = weight === "bold" ? (this.opts.boldCharWidth ?? 12) : (this.opts.charWidth ?? 10);
    return { width: per * text.length, ascent: this.size * 0.8, height: this.size };
  }

  lineMetrics(): LineMetrics | null {
    if (this.opts.metrics !== undefined) return this.opts.metrics;
    return { ascent: this.size * 0.8, descent: this.size * 0.2 };
  }
}

// ── Loader stand-in ─────────────────────────────────────────────────

export class FakeFontLoader implements FontLoader {
  readonly calls: Array<{ path: string; size: number; boldPath: string | null }> = [];
  private readonly unloadable: ReadonlySet<string>;
  private readonly fontOptions: (path: string) => FakeFontOptions;

  constructor(
    unloadable: Iterable<string> = [],
    fontOptions: (path: string) => FakeFontOptions = () => ({}),
  ) {
    this.unloadable = new Set(unloadable);
    this.fontOptions = fontOptions;
  }

  load(path: string, size: number, boldPath: string | null): Result<FontHandle, FontLoadError> {
    this.calls.push({ path, size, boldPath });
    if (this.unloadable.has(path)) return err(new FontLoadError(path, "corrupt font"));
    return ok(new FakeFont(path, size, { boldPath, ...this.fontOptions(path) }));
  }
}
