import { existsSync } from "fs";
import { readdir } from "fs/promises";
import { homedir } from "os";
import { extname, join } from "path";
import type { FontHandle, Result } from "../core/types.js";
import { err, ok } from "../core/types.js";
import { FontLoadError, errorMessage } from "../core/errors.js";
import type { RandomSource } from "../core/random.js";
import { resolveBoldVariant } from "./bold.js";
import { CanvasFontLoader } from "./canvas-font.js";
import type { FontLoader } from "./canvas-font.js";

// ── Where fonts live ────────────────────────────────────────────────

const FONT_EXTENSIONS = new Set([".ttf", ".otf"]);

export const SYSTEM_FONT_DIRS = [
  "/usr/share/fonts",
  "/usr/local/share/fonts",
  join(homedir(), ".fonts"),
  join(homedir(), ".local/share/fonts"),
  "/Library/Fonts",
  "/System/Library/Fonts",
  "C:\\Windows\\Fonts",
];

/** Generic sans-serif faces tried when every discovered font has failed */
export const FALLBACK_FONTS = [
  "/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf",
  "/usr/share/fonts/dejavu-sans-fonts/DejaVuSans.ttf",
  "/usr/share/fonts/TTF/DejaVuSans.ttf",
  "/usr/share/fonts/truetype/liberation/LiberationSans-Regular.ttf",
  "/System/Library/Fonts/Supplemental/Arial Unicode.ttf",
  "/Library/Fonts/Arial.ttf",
  "C:\\Windows\\Fonts\\arial.ttf",
];

function isFontFile(name: string): boolean {
  return FONT_EXTENSIONS.has(extname(name).toLowerCase());
}

// ── Discovery ───────────────────────────────────────────────────────

export interface DiscoverOptions {
  systemDirs?: string[];
  /** Called for unreadable system directories, which are then skipped */
  onWarning?: (message: string) => void;
}

/**
 * Lists .ttf/.otf files directly inside `fontDir`. When there are none,
 * searches the system font directories recursively instead. Sorted so
 * a seeded pick is reproducible.
 */
export async function discoverFonts(fontDir: string, opts: DiscoverOptions = {}): Promise<string[]> {
  if (existsSync(fontDir)) {
    const entries = await readdir(fontDir, { withFileTypes: true });
    const local = entries
      .filter((e) => e.isFile() && isFontFile(e.name))
      .map((e) => join(fontDir, e.name));
    if (local.length > 0) return local.sort();
  }

  const found: string[] = [];
  for (const dir of opts.systemDirs ?? SYSTEM_FONT_DIRS) {
    if (!existsSync(dir)) continue;
    try {
      const names = await readdir(dir, { recursive: true });
      for (const name of names) {
        if (isFontFile(name)) found.push(join(dir, name));
      }
    } catch (e) {
      opts.onWarning?.(`Skipping font directory ${dir}: ${errorMessage(e)}`);
    }
  }
  return found.sort();
}

// ── Catalog ─────────────────────────────────────────────────────────

export interface FontSelection {
  path: string;
  /** True when the pick came from the generic fallback list */
  fallback: boolean;
}

export interface CatalogOptions {
  random: RandomSource;
  loader?: FontLoader;
  fallbackFonts?: string[];
  exists?: (path: string) => boolean;
}

export class FontCatalog {
  private readonly available: readonly string[];
  private readonly random: RandomSource;
  private readonly loader: FontLoader;
  private readonly fallbackFonts: readonly string[];
  private readonly exists: (path: string) => boolean;
  private readonly handles = new Map<string, FontHandle>();

  constructor(fonts: readonly string[], opts: CatalogOptions) {
    this.available = [...fonts];
    this.random = opts.random;
    this.loader = opts.loader ?? new CanvasFontLoader();
    this.fallbackFonts = opts.fallbackFonts ?? FALLBACK_FONTS;
    this.exists = opts.exists ?? existsSync;
  }

  static async discover(fontDir: string, opts: CatalogOptions & DiscoverOptions): Promise<FontCatalog> {
    return new FontCatalog(await discoverFonts(fontDir, opts), opts);
  }

  get fonts(): readonly string[] {
    return this.available;
  }

  /** Random font not in `excluded`, then a generic fallback, else null */
  select(excluded: ReadonlySet<string>): FontSelection | null {
    const candidates = this.available.filter((p) => !excluded.has(p));
    if (candidates.length > 0) {
      return { path: this.random.pick(candidates), fallback: false };
    }

    const fallback = this.fallbackFonts.find((p) => !excluded.has(p) && this.exists(p));
    return fallback ? { path: fallback, fallback: true } : null;
  }

  /** Resolves a configured font file name inside `fontDir`, if it is usable */
  preferred(fontDir: string, name: string, excluded: ReadonlySet<string>): string | null {
    const path = join(fontDir, name);
    return !excluded.has(path) && this.exists(path) ? path : null;
  }

  loadForSize(path: string, size: number): Result<FontHandle, FontLoadError> {
    if (!Number.isFinite(size) || size <= 0) {
      return err(new FontLoadError(path, `unsupported size ${size}`));
    }

    const key = `${path}@${size}`;
    const cached = this.handles.get(key);
    if (cached) return ok(cached);

    const result = this.loader.load(path, size, resolveBoldVariant(path, this.exists));
    if (result.ok) this.handles.set(key, result.value);
    return result;
  }
}
