import { existsSync } from "fs";
import { basename, join } from "path";
import sharp from "sharp";
import type { RasterImage } from "../core/types.js";
import { errorMessage } from "../core/errors.js";

// ── Texture source ──────────────────────────────────────────────────

export interface TextureSource {
  /** Cover-fitted RGBA texture at exactly width×height, or null when unavailable */
  load(name: string, width: number, height: number): Promise<RasterImage | null>;
}

export interface TextureLibraryOptions {
  /** Called when a texture exists but cannot be decoded */
  onError?: (name: string, message: string) => void;
}

const CUSTOM_PREFIX = "custom_texture_";

/** `paper` → dir/paper.jpg; `custom_texture_x.png` or `wood.png` → dir/<name> */
export function texturePath(dir: string, name: string): string | null {
  if (!name || name === "none" || basename(name) !== name || name.includes("..")) return null;
  const file = name.startsWith(CUSTOM_PREFIX) || name.includes(".") ? name : `${name}.jpg`;
  return join(dir, file);
}

export class TextureLibrary implements TextureSource {
  private readonly dir: string;
  private readonly opts: TextureLibraryOptions;
  private readonly cache = new Map<string, RasterImage | null>();

  constructor(dir: string, opts: TextureLibraryOptions = {}) {
    this.dir = dir;
    this.opts = opts;
  }

  async load(name: string, width: number, height: number): Promise<RasterImage | null> {
    const key = `${name}@${width}x${height}`;
    if (this.cache.has(key)) return this.cache.get(key) ?? null;

    const image = await this.read(name, width, height);
    this.cache.set(key, image);
    return image;
  }

  private async read(name: string, width: number, height: number): Promise<RasterImage | null> {
    const path = texturePath(this.dir, name);
    if (!path || !existsSync(path)) return null;

    try {
      // Brightness ×1.2 then contrast ×0.9 about mid-grey, folded into one linear step
      const { data, info } = await sharp(path)
        .resize(width, height, { fit: "cover", position: "centre" })
        .linear(1.08, 12.8)
        .removeAlpha()
        .ensureAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });
      if (info.width !== width || info.height !== height || info.channels !== 4) {
        throw new Error(`decoded to ${info.width}x${info.height}x${info.channels}`);
      }
      return { width, height, data };
    } catch (e) {
      this.opts.onError?.(name, errorMessage(e));
      return null;
    }
  }
}
