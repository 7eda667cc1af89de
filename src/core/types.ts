import type { ProviderKind } from "../providers/provider.js";

// ── Result ──────────────────────────────────────────────────────────

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ── Colors ──────────────────────────────────────────────────────────

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

// ── Text ────────────────────────────────────────────────────────────

export interface TextSnippet {
  readonly lines: readonly string[];
  /** Index into `lines` of the one line carrying the highlight phrase */
  readonly highlightLineIndex: number;
}

export interface LineBounds {
  minLines: number;
  maxLines: number;
}

export interface CharBounds {
  minChars: number;
  maxChars: number;
}

// ── Fonts ───────────────────────────────────────────────────────────

export type FontWeight = "regular" | "bold";

export interface TextExtent {
  /** Advance width of the string */
  width: number;
  /** Ink height of the string (top of tallest glyph to bottom of lowest) */
  height: number;
  /** Distance from the baseline up to the top of the ink box */
  ascent: number;
}

export interface LineMetrics {
  ascent: number;
  descent: number;
}

export interface FontHandle {
  readonly path: string;
  /** Loaded bold variant, or null when the regular face stands in for bold */
  readonly boldPath: string | null;
  readonly size: number;
  /** CSS font shorthand for the given weight, e.g. `48px "mc-3"` */
  css(weight: FontWeight): string;
  measure(text: string, weight: FontWeight): TextExtent;
  /** Font-wide ascent/descent, or null when the face exposes none */
  lineMetrics(): LineMetrics | null;
}

// ── Frames ──────────────────────────────────────────────────────────

export type BlurMode = "none" | "gaussian" | "radial";

export interface BlurSpec {
  mode: BlurMode;
  /** Gaussian sigma in pixels; 0 disables blurring */
  radius: number;
  /** Radius of the sharp disk as a fraction of min(width, height) */
  sharpRadiusFactor: number;
}

export interface FrameColors {
  text: Rgb;
  background: Rgb;
  highlight: Rgb;
}

export interface FrameSpec {
  readonly width: number;
  readonly height: number;
  readonly fps: number;
  readonly durationSeconds: number;
  readonly fontSize: number;
  readonly colors: Readonly<FrameColors>;
  readonly blur: Readonly<BlurSpec>;
  readonly verticalSpread: number;
  /** Texture name, or null for the procedural paper background */
  readonly texture: string | null;
  /** Maximum vertical offset in pixels applied per frame (uniform ±jitter) */
  readonly jitter: number;
  readonly seed: number;
}

export interface RasterImage {
  width: number;
  height: number;
  /** Raw RGBA, 4 bytes per pixel, row-major */
  data: Buffer;
}

export type RenderedFrame = RasterImage;

// ── Layout ──────────────────────────────────────────────────────────

export interface PlacedLine {
  text: string;
  x: number;
  /** Ink top of the line, jitter included */
  y: number;
  width: number;
}

export interface HighlightBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface FrameLayout {
  lineHeight: number;
  lines: PlacedLine[];
  /** Bold phrase ink box, centred in the frame */
  highlight: HighlightBox;
  /** The phrase drawn in the overlay pass */
  phrase: string;
  /** Distance from a placed `y` down to the text baseline */
  baselineOffset: number;
}

// ── Run configuration ───────────────────────────────────────────────

export type TextSource = "procedural" | "ai";

export interface RunConfig {
  readonly frame: FrameSpec;
  readonly highlight: string;
  readonly lines: Readonly<LineBounds>;
  readonly chars: Readonly<CharBounds>;
  readonly framesPerSnippet: number;
  readonly poolSize: number;
  readonly maxFontRetries: number;
  readonly fontDir: string;
  /** File name inside fontDir to try before random selection */
  readonly preferredFont: string | null;
  readonly textureDir: string;
  readonly textSource: TextSource;
  /** Set when textSource is "ai" */
  readonly ai: AiSettings | null;
  readonly encoder: EncoderSettings;
  readonly outputDir: string;
}

export interface AiSettings {
  readonly provider: ProviderKind;
  readonly model: string;
  readonly baseUrl: string | null;
  readonly apiKey: string | null;
  readonly temperature: number;
  readonly maxTokens: number;
  /** Requests per snippet before falling back to procedural text */
  readonly attempts: number;
}

export interface EncoderSettings {
  readonly ffmpegPath: string;
  readonly preset: string;
  readonly crf: number;
}
