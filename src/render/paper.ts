import type { RasterImage, Rgb } from "../core/types.js";
import type { RandomSource } from "../core/random.js";

// ── Procedural paper background ─────────────────────────────────────

export interface PaperOptions {
  /** Std-dev of the per-channel noise, as a fraction of full scale */
  noiseIntensity?: number;
  /** Largest grain dot edge in pixels */
  grainSize?: number;
  /** Share of the noise layer mixed into grain pixels */
  noiseBlend?: number;
  /** Darkening applied at the very edge, fading in over width/20 */
  edgeShadow?: number;
}

const DEFAULTS: Required<PaperOptions> = {
  noiseIntensity: 0.08,
  grainSize: 2,
  noiseBlend: 0.1,
  edgeShadow: 0.15,
};

function clampByte(v: number): number {
  return v < 0 ? 0 : v > 255 ? 255 : Math.round(v);
}

/**
 * Solid base color with noisy grain specks and a soft darkened border.
 * Noise only shows through the grain mask, which holds W·H/100 small
 * dots of brightness 200–255.
 */
export function createPaperTexture(
  width: number,
  height: number,
  base: Rgb,
  random: RandomSource,
  opts: PaperOptions = {},
): RasterImage {
  const o = { ...DEFAULTS, ...opts };
  const data = Buffer.alloc(width * height * 4);

  for (let i = 0; i < width * height; i++) {
    const p = i * 4;
    data[p] = base.r;
    data[p + 1] = base.g;
    data[p + 2] = base.b;
    data[p + 3] = 255;
  }

  // Grain mask
  const grain = new Uint8Array(width * height);
  const dots = Math.floor((width * height) / 100);
  for (let n = 0; n < dots; n++) {
    const x = random.int(0, width - 1);
    const y = random.int(0, height - 1);
    const size = random.int(1, Math.max(1, o.grainSize));
    const brightness = random.int(200, 255);
    for (let dy = 0; dy < size && y + dy < height; dy++) {
      for (let dx = 0; dx < size && x + dx < width; dx++) {
        grain[(y + dy) * width + x + dx] = brightness;
      }
    }
  }

  // Noise through the grain mask
  const channels = [base.r, base.g, base.b];
  for (let i = 0; i < grain.length; i++) {
    const m = grain[i] / 255;
    if (m === 0) continue;
    const p = i * 4;
    for (let c = 0; c < 3; c++) {
      const noise = Math.min(1, Math.max(0, random.gaussian(0.5, o.noiseIntensity))) * 255;
      const noisy = channels[c] * (1 - o.noiseBlend) + noise * o.noiseBlend;
      data[p + c] = clampByte(noisy * m + channels[c] * (1 - m));
    }
  }

  // Edge shadow
  const band = Math.floor(width / 20);
  if (band > 0 && o.edgeShadow > 0) {
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const d = Math.min(x, y, width - 1 - x, height - 1 - y);
        if (d >= band) continue;
        const factor = 1 - o.edgeShadow * (1 - d / band);
        const p = (y * width + x) * 4;
        data[p] = clampByte(data[p] * factor);
        data[p + 1] = clampByte(data[p + 1] * factor);
        data[p + 2] = clampByte(data[p + 2] * factor);
      }
    }
  }

  return { width, height, data };
}
