import { createCanvas } from "@napi-rs/canvas";
import type { SKRSContext2D } from "@napi-rs/canvas";
import type {
  FontHandle,
  FrameLayout,
  FrameSpec,
  RasterImage,
  RenderedFrame,
  Result,
  TextSnippet,
} from "../core/types.js";
import { err, ok } from "../core/types.js";
import { FontDrawError, errorMessage } from "../core/errors.js";
import { RandomSource } from "../core/random.js";
import { rgba, toHexColor } from "../core/colors.js";
import { computeFrameLayout } from "./layout.js";
import { createPaperTexture } from "./paper.js";
import {
  applyVignette,
  blendByMask,
  cloneImage,
  finishFrame,
  gaussianBlur,
  paddedGaussianBlur,
  radialMask,
} from "./effects.js";
import type { TextureSource } from "./textures.js";

// ── Tunables ────────────────────────────────────────────────────────

const SHADOW_COLOR = { r: 0x33, g: 0x33, b: 0x33 };
const SHADOW_ALPHA = 100 / 255;
const SHADOW_OFFSET_RATIO = 0.02;
const HIGHLIGHT_PADDING_RATIO = 0.1;
const RADIAL_BLUR_BOOST = 1.5;
const RADIAL_FADE_RATIO = 0.15;

export interface CompositorOptions {
  textures?: TextureSource;
  /** Called once per texture name that could not be loaded */
  onTextureMissing?: (name: string) => void;
}

// ── Frame compositor ────────────────────────────────────────────────

export class FrameCompositor {
  readonly spec: FrameSpec;
  private readonly phrase: string;
  private readonly textures: TextureSource | null;
  private readonly onTextureMissing: (name: string) => void;
  private readonly reportedMissing = new Set<string>();
  private readonly random: RandomSource;
  private radialCache: Promise<Uint8Array> | null = null;

  constructor(spec: FrameSpec, highlight: string, opts: CompositorOptions = {}) {
    this.spec = spec;
    this.phrase = highlight;
    this.textures = opts.textures ?? null;
    this.onTextureMissing = opts.onTextureMissing ?? (() => {});
    this.random = new RandomSource(spec.seed);
  }

  /**
   * Renders one frame. Font trouble comes back as a FontDrawError value so
   * the caller can retry with another face; anything else is thrown.
   */
  async render(
    snippet: TextSnippet,
    font: FontHandle,
    frameIndex: number,
    jitter = 0,
  ): Promise<Result<RenderedFrame, FontDrawError>> {
    try {
      const layout = computeFrameLayout(snippet, this.phrase, font, this.spec, jitter);
      const background = await this.background(frameIndex);
      const base = await applyVignette(this.drawLines(background, layout, font));
      const blurred = await this.blur(base);
      const overlaid = this.drawHighlight(blurred, layout, font);
      return ok(await finishFrame(overlaid));
    } catch (e) {
      if (e instanceof FontDrawError) return err(e);
      throw e;
    }
  }

  // ── Background ────────────────────────────────────────────────────

  private async background(frameIndex: number): Promise<RasterImage> {
    const { width, height, texture, colors } = this.spec;
    if (texture && this.textures) {
      const image = await this.textures.load(texture, width, height);
      if (image) return cloneImage(image);
      if (!this.reportedMissing.has(texture)) {
        this.reportedMissing.add(texture);
        this.onTextureMissing(texture);
      }
    }
    return createPaperTexture(width, height, colors.background, this.random.fork(frameIndex));
  }

  // ── Text pass ─────────────────────────────────────────────────────

  private drawLines(background: RasterImage, layout: FrameLayout, font: FontHandle): RasterImage {
    const ctx = this.contextFor(background);
    const offset = Math.max(1, Math.floor(this.spec.fontSize * SHADOW_OFFSET_RATIO));
    const textColor = toHexColor(this.spec.colors.text);

    this.guard(font, "drawing body text", () => {
      ctx.font = font.css("regular");
      ctx.textBaseline = "alphabetic";
      for (const line of layout.lines) {
        const baseline = line.y + layout.baselineOffset;
        ctx.fillStyle = rgba(SHADOW_COLOR, SHADOW_ALPHA);
        ctx.fillText(line.text, line.x + offset, baseline + offset);
        ctx.fillStyle = textColor;
        ctx.fillText(line.text, line.x, baseline);
      }
    });

    return this.snapshot(ctx, background);
  }

  // ── Blur stage ────────────────────────────────────────────────────

  private async blur(base: RasterImage): Promise<RasterImage> {
    const { mode, radius, sharpRadiusFactor } = this.spec.blur;
    if (radius <= 0 || mode === "none") return base;

    if (mode === "gaussian") {
      return paddedGaussianBlur(base, radius, this.spec.colors.background);
    }

    const sharpCopy = cloneImage(base);
    const blurred = await gaussianBlur(base, radius * RADIAL_BLUR_BOOST);
    this.radialCache ??= radialMask({
      width: this.spec.width,
      height: this.spec.height,
      sharpRadius: Math.min(this.spec.width, this.spec.height) * sharpRadiusFactor,
      fade: RADIAL_FADE_RATIO * Math.max(this.spec.width, this.spec.height),
    }).catch((e: unknown) => {
      this.radialCache = null;
      throw e;
    });
    return blendByMask(sharpCopy, blurred, await this.radialCache);
  }

  // ── Highlight overlay ─────────────────────────────────────────────

  private drawHighlight(image: RasterImage, layout: FrameLayout, font: FontHandle): RasterImage {
    const ctx = this.contextFor(image);
    const box = layout.highlight;
    const pad = HIGHLIGHT_PADDING_RATIO * this.spec.fontSize;

    ctx.fillStyle = toHexColor(this.spec.colors.highlight);
    ctx.fillRect(box.x - pad, box.y - pad, box.width + 2 * pad, box.height + 2 * pad);

    this.guard(font, "drawing the highlight", () => {
      ctx.font = font.css("bold");
      ctx.textBaseline = "alphabetic";
      ctx.fillStyle = toHexColor(this.spec.colors.text);
      ctx.fillText(layout.phrase, box.x, box.y + layout.baselineOffset);
    });

    return this.snapshot(ctx, image);
  }

  // ── Canvas plumbing ───────────────────────────────────────────────

  private contextFor(image: RasterImage): SKRSContext2D {
    const ctx = createCanvas(image.width, image.height).getContext("2d");
    const pixels = ctx.createImageData(image.width, image.height);
    pixels.data.set(image.data);
    ctx.putImageData(pixels, 0, 0);
    return ctx;
  }

  private snapshot(ctx: SKRSContext2D, like: RasterImage): RasterImage {
    const { data } = ctx.getImageData(0, 0, like.width, like.height);
    return {
      width: like.width,
      height: like.height,
      data: Buffer.from(data.buffer, data.byteOffset, data.byteLength),
    };
  }

  private guard(font: FontHandle, what: string, draw: () => void): void {
    try {
      draw();
    } catch (e) {
      if (e instanceof FontDrawError) throw e;
      throw new FontDrawError(font.path, `${what} failed: ${errorMessage(e)}`, { cause: e });
    }
  }
}
