import { existsSync } from "fs";
import { basename, dirname, extname, join } from "path";

// ── Bold variant lookup by filename convention ──────────────────────
// DejaVuSans.ttf → DejaVuSans-Bold.ttf, arial.ttf → arialbd.ttf,
// Roboto-Regular.ttf → Roboto-Bold.ttf. Purely a guess from the name.

const BOLD_SUFFIXES = ["bd", "-Bold", "b", "_Bold", " Bold"];

export function boldCandidates(fontPath: string): string[] {
  const dir = dirname(fontPath);
  const ext = extname(fontPath);
  const base = basename(fontPath, ext);

  const stripped = base.replace(/Regular|regular/g, "").replace(/[-_ ]+$/, "");
  const roots = stripped && stripped !== base ? [stripped, base] : [base];
  const exts = ext.toLowerCase() === ".ttf" ? [ext] : [ext, ".ttf"];

  const out: string[] = [];
  for (const root of roots) {
    for (const suffix of BOLD_SUFFIXES) {
      for (const e of exts) {
        const candidate = join(dir, `${root}${suffix}${e}`);
        if (candidate !== fontPath && !out.includes(candidate)) out.push(candidate);
      }
    }
  }
  return out;
}

export function resolveBoldVariant(
  fontPath: string,
  exists: (path: string) => boolean = existsSync,
): string | null {
  return boldCandidates(fontPath).find((p) => exists(p)) ?? null;
}
