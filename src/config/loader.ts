import { readFile } from "fs/promises";
import { existsSync } from "fs";
import { join } from "path";
import { parse } from "yaml";
import type { BlurMode, FrameSpec, Rgb, RunConfig, TextSource } from "../core/types.js";
import { ConfigError, errorMessage } from "../core/errors.js";
import { parseColor } from "../core/colors.js";
import { PROVIDER_KINDS } from "../providers/provider.js";
import { MIN_FILLER_CLEARANCE, bundledGrammar, fillerClearance } from "../text/procedural.js";
import type {
  AiSection,
  Density,
  DensityPreset,
  FontsSection,
  MatchCutConfig,
  OutputSection,
  StyleSection,
  TextSection,
  TexturesSection,
  VideoSection,
} from "../types.js";

export const CONFIG_FILE = "matchcut.yaml";

// ── Default config (used when matchcut.yaml is absent) ──────────────

export const DEFAULT_CONFIG: MatchCutConfig = {
  video: { width: 1024, height: 1024, fps: 10, duration: 5 },
  text: {
    highlight: "Match Cut",
    source: "procedural",
    density: "medium",
    minLines: null,
    maxLines: null,
    minChars: 50,
    maxChars: 80,
    framesPerSnippet: 3,
    poolSize: 10,
  },
  style: {
    textColor: "#000000",
    backgroundColor: "#ffffff",
    highlightColor: "#ffff00",
    blur: "gaussian",
    blurRadius: 4,
    sharpRadiusFactor: 0.3,
    verticalSpread: null,
    fontSizeRatio: null,
    jitter: 5,
  },
  fonts: { dir: "fonts", preferred: null, maxRetries: 5 },
  textures: { dir: "textures", name: null },
  ai: {
    provider: "openrouter",
    model: "mistralai/mistral-large",
    baseUrl: null,
    apiKey: null,
    temperature: 0.7,
    maxTokens: 800,
    attempts: 3,
  },
  output: { dir: "output", ffmpeg: "ffmpeg", preset: "medium", crf: 23 },
  seed: null,
};

export const DENSITY_PRESETS: Record<Density, DensityPreset> = {
  low: { minLines: 10, maxLines: 12, verticalSpread: 1.5, fontSizeRatio: 0.06 },
  medium: { minLines: 12, maxLines: 16, verticalSpread: 1.3, fontSizeRatio: 0.05 },
  high: { minLines: 14, maxLines: 20, verticalSpread: 1.1, fontSizeRatio: 0.04 },
};

const DENSITIES: readonly Density[] = ["low", "medium", "high"];
const TEXT_SOURCES: readonly TextSource[] = ["procedural", "ai"];
const BLUR_MODES: readonly BlurMode[] = ["none", "gaussian", "radial"];

// ── Load config from matchcut.yaml ──────────────────────────────────

export async function loadConfig(configPath?: string): Promise<MatchCutConfig> {
  const path = configPath ?? join(process.cwd(), CONFIG_FILE);

  if (!existsSync(path)) {
    if (configPath) throw new ConfigError("file", "not found", path);
    return DEFAULT_CONFIG;
  }

  const raw = await readFile(path, "utf-8");
  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (e) {
    throw new ConfigError("file", `YAML parse error: ${errorMessage(e)}`, path);
  }

  // An empty file parses to null
  if (parsed === null || parsed === undefined) return DEFAULT_CONFIG;

  return mergeConfig(resolveEnvVars(parsed), path);
}

/** Shallow-merges each section of a parsed document over DEFAULT_CONFIG */
export function mergeConfig(doc: unknown, path: string | null = null): MatchCutConfig {
  if (!isRecord(doc)) {
    throw new ConfigError("root", `expected a mapping, got ${describeValue(doc)}`, path);
  }

  const d = DEFAULT_CONFIG;
  const video = new SectionReader("video", doc.video, path);
  const text = new SectionReader("text", doc.text, path);
  const style = new SectionReader("style", doc.style, path);
  const fonts = new SectionReader("fonts", doc.fonts, path);
  const textures = new SectionReader("textures", doc.textures, path);
  const ai = new SectionReader("ai", doc.ai, path);
  const output = new SectionReader("output", doc.output, path);

  const videoSection: VideoSection = {
    width: video.number("width", d.video.width),
    height: video.number("height", d.video.height),
    fps: video.number("fps", d.video.fps),
    duration: video.number("duration", d.video.duration),
  };

  const textSection: TextSection = {
    highlight: text.string("highlight", d.text.highlight),
    source: text.oneOf("source", TEXT_SOURCES, d.text.source),
    density: text.oneOf("density", DENSITIES, d.text.density),
    minLines: text.optionalNumber("minLines", d.text.minLines),
    maxLines: text.optionalNumber("maxLines", d.text.maxLines),
    minChars: text.number("minChars", d.text.minChars),
    maxChars: text.number("maxChars", d.text.maxChars),
    framesPerSnippet: text.number("framesPerSnippet", d.text.framesPerSnippet),
    poolSize: text.number("poolSize", d.text.poolSize),
  };

  const styleSection: StyleSection = {
    textColor: style.string("textColor", d.style.textColor),
    backgroundColor: style.string("backgroundColor", d.style.backgroundColor),
    highlightColor: style.string("highlightColor", d.style.highlightColor),
    blur: style.oneOf("blur", BLUR_MODES, d.style.blur),
    blurRadius: style.number("blurRadius", d.style.blurRadius),
    sharpRadiusFactor: style.number("sharpRadiusFactor", d.style.sharpRadiusFactor),
    verticalSpread: style.optionalNumber("verticalSpread", d.style.verticalSpread),
    fontSizeRatio: style.optionalNumber("fontSizeRatio", d.style.fontSizeRatio),
    jitter: style.number("jitter", d.style.jitter),
  };

  const fontsSection: FontsSection = {
    dir: fonts.string("dir", d.fonts.dir),
    preferred: fonts.optionalString("preferred", d.fonts.preferred),
    maxRetries: fonts.number("maxRetries", d.fonts.maxRetries),
  };

  const texturesSection: TexturesSection = {
    dir: textures.string("dir", d.textures.dir),
    name: textures.optionalString("name", d.textures.name),
  };

  const aiSection: AiSection = {
    provider: ai.oneOf("provider", PROVIDER_KINDS, d.ai.provider),
    model: ai.string("model", d.ai.model),
    baseUrl: ai.optionalString("baseUrl", d.ai.baseUrl),
    apiKey: ai.optionalString("apiKey", d.ai.apiKey),
    temperature: ai.number("temperature", d.ai.temperature),
    maxTokens: ai.number("maxTokens", d.ai.maxTokens),
    attempts: ai.number("attempts", d.ai.attempts),
  };

  const outputSection: OutputSection = {
    dir: output.string("dir", d.output.dir),
    ffmpeg: output.string("ffmpeg", d.output.ffmpeg),
    preset: output.string("preset", d.output.preset),
    crf: output.number("crf", d.output.crf),
  };

  const root = new SectionReader("", doc, path);
  return {
    video: videoSection,
    text: textSection,
    style: styleSection,
    fonts: fontsSection,
    textures: texturesSection,
    ai: aiSection,
    output: outputSection,
    seed: root.optionalNumber("seed", d.seed),
  };
}

// ── Typed field access with defaults ────────────────────────────────

class SectionReader {
  private readonly section: string;
  private readonly path: string | null;
  private readonly values: Record<string, unknown>;

  constructor(section: string, raw: unknown, path: string | null) {
    if (raw !== undefined && raw !== null && !isRecord(raw)) {
      throw new ConfigError(section, `expected a mapping, got ${describeValue(raw)}`, path);
    }
    this.section = section;
    this.path = path;
    this.values = isRecord(raw) ? raw : {};
  }

  number(key: string, fallback: number): number {
    return this.optionalNumber(key, fallback) ?? fallback;
  }

  optionalNumber(key: string, fallback: number | null): number | null {
    const value = this.values[key];
    if (value === undefined) return fallback;
    if (value === null) return null;
    if (typeof value === "number" && Number.isFinite(value)) return value;
    // ${ENV} substitutions arrive as strings
    if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
      return Number(value);
    }
    throw this.invalid(key, `expected a number, got ${describeValue(value)}`);
  }

  string(key: string, fallback: string): string {
    return this.optionalString(key, fallback) ?? fallback;
  }

  optionalString(key: string, fallback: string | null): string | null {
    const value = this.values[key];
    if (value === undefined) return fallback;
    if (value === null) return null;
    if (typeof value === "string") return value;
    if (typeof value === "number") return String(value);
    throw this.invalid(key, `expected a string, got ${describeValue(value)}`);
  }

  oneOf<T extends string>(key: string, options: readonly T[], fallback: T): T {
    const value = this.values[key];
    if (value === undefined || value === null) return fallback;
    const match = options.find((o) => o === value);
    if (match === undefined) {
      throw this.invalid(key, `expected one of ${options.join(", ")}, got ${describeValue(value)}`);
    }
    return match;
  }

  private invalid(key: string, message: string): ConfigError {
    return new ConfigError(this.section ? `${this.section}.${key}` : key, message, this.path);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) return "a list";
  if (value === null) return "null";
  return typeof value === "string" ? `"${value}"` : typeof value;
}

// ── Validate and derive the immutable run config ────────────────────

export interface BuildOptions {
  /** Seed source when the config has none */
  now?: () => number;
}

export function buildRunConfig(config: MatchCutConfig, opts: BuildOptions = {}): RunConfig {
  const { video, text, style, fonts, textures, ai, output } = config;
  const preset = DENSITY_PRESETS[text.density];

  integerIn("video.width", video.width, 256, 4096);
  integerIn("video.height", video.height, 256, 4096);
  integerIn("video.fps", video.fps, 1, 60);
  rangeIn("video.duration", video.duration, 1, 60);

  const highlight = text.highlight.trim();
  if (!highlight) throw new ConfigError("text.highlight", "must not be empty");

  integerIn("text.minChars", text.minChars, 1, 10_000);
  integerIn("text.maxChars", text.maxChars, 1, 10_000);
  if (text.maxChars - text.minChars < 15) {
    throw new ConfigError(
      "text.maxChars",
      `must be at least 15 above minChars (got ${text.minChars}-${text.maxChars})`,
    );
  }
  if (highlight.length > text.maxChars - 1) {
    throw new ConfigError(
      "text.highlight",
      `is ${highlight.length} chars, longer than maxChars - 1 (${text.maxChars - 1})`,
    );
  }
  if (fillerClearance(highlight, bundledGrammar()) < MIN_FILLER_CLEARANCE) {
    throw new ConfigError(
      "text.highlight",
      `"${highlight}" turns up in too much of the filler vocabulary to stay on one line`,
    );
  }

  const minLines = text.minLines ?? preset.minLines;
  const maxLines = text.maxLines ?? Math.max(preset.maxLines, minLines);
  integerIn("text.minLines", minLines, 1, 1000);
  integerIn("text.maxLines", maxLines, 1, 1000);
  if (minLines > maxLines) {
    throw new ConfigError("text.minLines", `${minLines} is greater than maxLines ${maxLines}`);
  }
  integerIn("text.framesPerSnippet", text.framesPerSnippet, 1, 10_000);
  integerIn("text.poolSize", text.poolSize, 1, 10_000);

  const colors = {
    text: color("style.textColor", style.textColor),
    background: color("style.backgroundColor", style.backgroundColor),
    highlight: color("style.highlightColor", style.highlightColor),
  };
  rangeIn("style.blurRadius", style.blurRadius, 0, 1000);
  rangeIn("style.sharpRadiusFactor", style.sharpRadiusFactor, 0.01, 1);
  rangeIn("style.jitter", style.jitter, 0, 1000);
  const verticalSpread = style.verticalSpread ?? preset.verticalSpread;
  if (verticalSpread <= 0) throw new ConfigError("style.verticalSpread", `must be > 0, got ${verticalSpread}`);
  const fontSizeRatio = style.fontSizeRatio ?? preset.fontSizeRatio;
  rangeIn("style.fontSizeRatio", fontSizeRatio, 0.005, 1);

  integerIn("fonts.maxRetries", fonts.maxRetries, 1, 1000);
  integerIn("output.crf", output.crf, 0, 51);

  if (text.source === "ai") {
    integerIn("ai.attempts", ai.attempts, 1, 100);
    integerIn("ai.maxTokens", ai.maxTokens, 1, 1_000_000);
    rangeIn("ai.temperature", ai.temperature, 0, 2);
    if (!ai.model.trim()) throw new ConfigError("ai.model", "must not be empty");
  }

  if (config.seed !== null) integerIn("seed", config.seed, 0, 2 ** 32 - 1);
  const seed = config.seed ?? (opts.now ?? Date.now)() % 2 ** 32;

  const frame: FrameSpec = Object.freeze({
    width: video.width,
    height: video.height,
    fps: video.fps,
    durationSeconds: video.duration,
    fontSize: Math.floor(video.height * fontSizeRatio),
    colors: Object.freeze(colors),
    blur: Object.freeze({
      mode: style.blur,
      radius: style.blurRadius,
      sharpRadiusFactor: style.sharpRadiusFactor,
    }),
    verticalSpread,
    texture: settingOrNull(textures.name, "none"),
    jitter: style.jitter,
    seed,
  });

  return Object.freeze({
    frame,
    highlight,
    lines: Object.freeze({ minLines, maxLines }),
    chars: Object.freeze({ minChars: text.minChars, maxChars: text.maxChars }),
    framesPerSnippet: text.framesPerSnippet,
    poolSize: text.poolSize,
    maxFontRetries: fonts.maxRetries,
    fontDir: fonts.dir,
    preferredFont: settingOrNull(fonts.preferred, "random"),
    textureDir: textures.dir,
    textSource: text.source,
    ai:
      text.source === "ai"
        ? Object.freeze({
            provider: ai.provider,
            model: ai.model,
            baseUrl: ai.baseUrl || null,
            // An unset ${VAR} placeholder leaves the provider to read its own env var
            apiKey: ai.apiKey && !/^\$\{[^}]+\}$/.test(ai.apiKey) ? ai.apiKey : null,
            temperature: ai.temperature,
            maxTokens: ai.maxTokens,
            attempts: ai.attempts,
          })
        : null,
    encoder: Object.freeze({ ffmpegPath: output.ffmpeg, preset: output.preset, crf: output.crf }),
    outputDir: output.dir,
  });
}

// "", null and the sentinel word all mean "not set"
function settingOrNull(value: string | null, sentinel: string): string | null {
  const trimmed = value?.trim() ?? "";
  return trimmed === "" || trimmed.toLowerCase() === sentinel ? null : trimmed;
}

function integerIn(field: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value)) throw new ConfigError(field, `must be an integer, got ${value}`);
  rangeIn(field, value, min, max);
}

function rangeIn(field: string, value: number, min: number, max: number): void {
  if (!(value >= min && value <= max)) {
    throw new ConfigError(field, `must be between ${min} and ${max}, got ${value}`);
  }
}

function color(field: string, value: string): Rgb {
  const rgb = parseColor(value);
  if (!rgb) throw new ConfigError(field, `"${value}" is not #rgb, #rrggbb or a known color name`);
  return rgb;
}

// ── Recursively resolve ${ENV_VAR} in all string values ─────────────

export function resolveEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      return env[varName] ?? `\${${varName}}`;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvVars(item, env));
  }

  if (isRecord(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = resolveEnvVars(item, env);
    }
    return result;
  }

  return value;
}
