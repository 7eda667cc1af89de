import { TypedEmitter } from "tiny-typed-emitter";
import type { FontHandle, RenderedFrame, Result, RunConfig, TextSnippet } from "../core/types.js";
import { FontExhaustionError } from "../core/errors.js";
import type { FontDrawError, FontLoadError } from "../core/errors.js";
import { RandomSource } from "../core/random.js";
import type { FontCatalog } from "../fonts/catalog.js";
import type { TextProvider } from "../text/provider.js";
import { SnippetPool } from "../text/pool.js";
import type { EncodeResult, FrameEncoder } from "./encoder.js";

// ── Seams ───────────────────────────────────────────────────────────

/** What the loop needs from FrameCompositor */
export interface FrameRenderer {
  render(
    snippet: TextSnippet,
    font: FontHandle,
    frameIndex: number,
    jitter: number,
  ): Promise<Result<RenderedFrame, FontDrawError>>;
}

export interface GeneratorEvents {
  start: (info: { totalFrames: number; seed: number; fonts: number }) => void;
  snippet: (snippet: TextSnippet, index: number) => void;
  frame: (index: number, total: number, fontPath: string) => void;
  fontFailed: (fontPath: string, error: FontLoadError | FontDrawError, frameIndex: number) => void;
  warning: (message: string) => void;
  encoded: (result: EncodeResult) => void;
}

export interface GeneratorDeps {
  config: RunConfig;
  catalog: FontCatalog;
  provider: TextProvider;
  renderer: FrameRenderer;
  encoder: FrameEncoder;
}

export interface GenerationResult {
  outputPath: string;
  frames: number;
  snippets: number;
  seed: number;
  failedFonts: string[];
  warnings: string[];
}

const JITTER_SALT = 0x6a17;

// ── Generator ───────────────────────────────────────────────────────

/**
 * Drives one run: ticks the snippet pool, renders each frame with the first
 * font that works, and hands the finished frames to the encoder.
 *
 * Every run gets a fresh pool, failed-font set and jitter source, so two
 * runs on one generator with the same seed produce the same frames.
 */
export class VideoGenerator extends TypedEmitter<GeneratorEvents> {
  private readonly deps: GeneratorDeps;

  constructor(deps: GeneratorDeps) {
    super();
    this.deps = deps;
  }

  get totalFrames(): number {
    const { fps, durationSeconds } = this.deps.config.frame;
    return Math.floor(fps * durationSeconds);
  }

  async run(outputPath: string): Promise<GenerationResult> {
    const { config, catalog, encoder } = this.deps;
    const spec = config.frame;
    const totalFrames = this.totalFrames;
    const failed = new Set<string>();
    const fallbacksUsed = new Set<string>();
    const jitterSource = new RandomSource(spec.seed).fork(JITTER_SALT);
    const warnings: string[] = [];
    const warn = (message: string) => {
      warnings.push(message);
      this.emit("warning", message);
    };

    const pool = new SnippetPool({
      provider: this.deps.provider,
      highlight: config.highlight,
      lines: config.lines,
      poolSize: config.poolSize,
      framesPerSnippet: config.framesPerSnippet,
      onGrow: (snippet, index) => this.emit("snippet", snippet, index),
      onGrowFailed: (failure) => warn(`${failure.message}; reusing earlier snippets`),
    });

    this.emit("start", { totalFrames, seed: spec.seed, fonts: catalog.fonts.length });

    const frames: RenderedFrame[] = [];
    for (let i = 0; i < totalFrames; i++) {
      const snippet = await pool.tick();
      const jitter = spec.jitter > 0 ? jitterSource.uniform(-spec.jitter, spec.jitter) : 0;

      let rendered: { frame: RenderedFrame; fontPath: string } | null = null;
      for (let attempt = 0; attempt < config.maxFontRetries && !rendered; attempt++) {
        const fontPath = this.pickFont(failed, fallbacksUsed, warn);
        if (!fontPath) break;

        const loaded = catalog.loadForSize(fontPath, spec.fontSize);
        if (!loaded.ok) {
          failed.add(fontPath);
          this.emit("fontFailed", fontPath, loaded.error, i);
          continue;
        }

        const result = await this.deps.renderer.render(snippet, loaded.value, i, jitter);
        if (result.ok) {
          rendered = { frame: result.value, fontPath };
        } else {
          failed.add(fontPath);
          this.emit("fontFailed", fontPath, result.error, i);
        }
      }

      if (!rendered) throw new FontExhaustionError(i, [...failed]);
      frames.push(rendered.frame);
      this.emit("frame", i, totalFrames, rendered.fontPath);
    }

    const encoded = await encoder.encode(frames, { outputPath, fps: spec.fps, expectedFrames: totalFrames });
    for (const message of encoded.warnings) warn(message);
    this.emit("encoded", encoded);

    return {
      outputPath: encoded.outputPath,
      frames: encoded.frames,
      snippets: pool.size,
      seed: spec.seed,
      failedFonts: [...failed],
      warnings,
    };
  }

  // Configured font first, then a random one from the catalog
  private pickFont(
    failed: ReadonlySet<string>,
    fallbacksUsed: Set<string>,
    warn: (message: string) => void,
  ): string | null {
    const { config, catalog } = this.deps;
    if (config.preferredFont) {
      const preferred = catalog.preferred(config.fontDir, config.preferredFont, failed);
      if (preferred) return preferred;
    }

    const selection = catalog.select(failed);
    if (!selection) return null;
    if (selection.fallback && !fallbacksUsed.has(selection.path)) {
      fallbacksUsed.add(selection.path);
      warn(`No usable fonts discovered, falling back to ${selection.path}`);
    }
    return selection.path;
  }
}
