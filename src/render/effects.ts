import sharp from "sharp";
import type { RasterImage, Rgb } from "../core/types.js";

// ── Raw RGBA helpers ────────────────────────────────────────────────

function fromRaw(image: RasterImage, channels: 1 | 4 = 4): sharp.Sharp {
  return sharp(image.data, { raw: { width: image.width, height: image.height, channels } });
}

async function toRgba(pipeline: sharp.Sharp): Promise<RasterImage> {
  const { data, info } = await pipeline.ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  if (info.channels !== 4) {
    throw new Error(`Expected RGBA output, got ${info.channels} channels`);
  }
  return { width: info.width, height: info.height, data };
}

async function toGray(pipeline: sharp.Sharp, width: number, height: number): Promise<Uint8Array> {
  const { data, info } = await pipeline.extractChannel(0).raw().toBuffer({ resolveWithObject: true });
  if (info.channels !== 1 || info.width !== width || info.height !== height) {
    throw new Error(`Expected a ${width}x${height} single-channel mask, got ${info.width}x${info.height}x${info.channels}`);
  }
  return new Uint8Array(data.buffer, data.byteOffset, data.length);
}

export function cloneImage(image: RasterImage): RasterImage {
  return { width: image.width, height: image.height, data: Buffer.from(image.data) };
}

// sharp takes sigmas in [0.3, 1000]; integer kernels drift flat areas by a level or two
function gaussian(pipeline: sharp.Sharp, value: number): sharp.Sharp {
  return pipeline.blur({ sigma: Math.min(1000, Math.max(0.3, value)), precision: "float" });
}

// ── Vignette ────────────────────────────────────────────────────────

const vignetteCache = new Map<string, Uint8Array>();

/**
 * Edge falloff mask: 255 in the interior, easing quadratically to 0 at
 * the border over min(W, H)/4, then blurred. Cached per size.
 */
export async function vignetteMask(width: number, height: number): Promise<Uint8Array> {
  const key = `${width}x${height}`;
  const cached = vignetteCache.get(key);
  if (cached) return cached;

  const reach = Math.min(width, height) / 4;
  const raw = Buffer.alloc(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const d = Math.min(x, y, width - 1 - x, height - 1 - y);
      const t = d >= reach ? 1 : 1 - (1 - d / reach) ** 2;
      raw[y * width + x] = Math.round(255 * t);
    }
  }

  const mask = await toGray(
    gaussian(fromRaw({ width, height, data: raw }, 1), width / 30),
    width,
    height,
  );
  vignetteCache.set(key, mask);
  return mask;
}

/** Darkens RGB by up to `strength` where the mask falls off; alpha untouched */
export async function applyVignette(image: RasterImage, strength = 0.3): Promise<RasterImage> {
  const mask = await vignetteMask(image.width, image.height);
  const out = Buffer.from(image.data);
  for (let i = 0; i < mask.length; i++) {
    const factor = 1 - strength * (1 - mask[i] / 255);
    if (factor === 1) continue;
    const p = i * 4;
    out[p] = Math.round(out[p] * factor);
    out[p + 1] = Math.round(out[p + 1] * factor);
    out[p + 2] = Math.round(out[p + 2] * factor);
  }
  return { width: image.width, height: image.height, data: out };
}

// ── Gaussian blur with edge padding ─────────────────────────────────

/**
 * Pads by 3σ in the background color before blurring, then crops back,
 * so the frame edge doesn't bleed dark.
 */
export async function paddedGaussianBlur(
  image: RasterImage,
  radius: number,
  background: Rgb,
): Promise<RasterImage> {
  const pad = Math.max(1, Math.round(3 * radius));
  const padded = await toRgba(
    fromRaw(image).extend({
      top: pad,
      bottom: pad,
      left: pad,
      right: pad,
      background: { r: background.r, g: background.g, b: background.b, alpha: 1 },
    }),
  );
  const blurred = await toRgba(gaussian(fromRaw(padded), radius));
  return toRgba(
    fromRaw(blurred).extract({ left: pad, top: pad, width: image.width, height: image.height }),
  );
}

export async function gaussianBlur(image: RasterImage, radius: number): Promise<RasterImage> {
  return toRgba(gaussian(fromRaw(image), radius));
}

// ── Radial focus ────────────────────────────────────────────────────

export interface RadialMaskParams {
  width: number;
  height: number;
  sharpRadius: number;
  /** Extra distance over which the mask fades out */
  fade: number;
}

/** Blurred binary disk centred in the frame: 255 = keep sharp, 0 = fully blurred */
export async function radialMask(params: RadialMaskParams): Promise<Uint8Array> {
  const { width, height, sharpRadius } = params;
  const cx = width / 2;
  const cy = height / 2;
  const r2 = sharpRadius * sharpRadius;

  const disk = Buffer.alloc(width * height);
  for (let y = 0; y < height; y++) {
    const dy = y + 0.5 - cy;
    for (let x = 0; x < width; x++) {
      const dx = x + 0.5 - cx;
      if (dx * dx + dy * dy <= r2) disk[y * width + x] = 255;
    }
  }

  return toGray(
    gaussian(fromRaw({ width, height, data: disk }, 1), params.fade / 3.5),
    width,
    height,
  );
}

/** Per-pixel `sharp × m + blurred × (1 − m)` */
export function blendByMask(sharpImage: RasterImage, blurred: RasterImage, mask: Uint8Array): RasterImage {
  const out = Buffer.alloc(sharpImage.data.length);
  for (let i = 0; i < mask.length; i++) {
    const m = mask[i] / 255;
    const p = i * 4;
    for (let c = 0; c < 3; c++) {
      out[p + c] = Math.round(sharpImage.data[p + c] * m + blurred.data[p + c] * (1 - m));
    }
    out[p + 3] = 255;
  }
  return { width: sharpImage.width, height: sharpImage.height, data: out };
}

// ── Final polish ────────────────────────────────────────────────────

/** Contrast ×1.1 around mid-grey plus a light sharpen */
export async function finishFrame(image: RasterImage, contrast = 1.1, sharpenSigma = 0.5): Promise<RasterImage> {
  return toRgba(fromRaw(image).linear(contrast, 128 * (1 - contrast)).sharpen({ sigma: sharpenSigma }));
}
