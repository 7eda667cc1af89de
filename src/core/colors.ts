import type { Rgb } from "./types.js";

// ── Named colors → hex ──────────────────────────────────────────────

const HEX_MAP: Record<string, string> = {
  black: "#000000",
  white: "#ffffff",
  red: "#ef4444",
  green: "#22c55e",
  yellow: "#eab308",
  blue: "#3b82f6",
  magenta: "#a855f7",
  cyan: "#06b6d4",
  gray: "#9ca3af",
  grey: "#9ca3af",
  orange: "#f97316",
  pink: "#ec4899",
  cream: "#f5f0e1",
  paper: "#f2ead3",
  ink: "#1a1a1a",
  charcoal: "#333333",
  highlighter: "#fff000",
};

// ── Parse "#rgb", "#rrggbb" or a named color ────────────────────────

export function parseColor(value: string): Rgb | null {
  const raw = value.trim().toLowerCase();
  const hex = HEX_MAP[raw] ?? raw;

  const short = /^#([0-9a-f])([0-9a-f])([0-9a-f])$/.exec(hex);
  if (short) {
    return {
      r: parseInt(short[1] + short[1], 16),
      g: parseInt(short[2] + short[2], 16),
      b: parseInt(short[3] + short[3], 16),
    };
  }

  const long = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/.exec(hex);
  if (long) {
    return {
      r: parseInt(long[1], 16),
      g: parseInt(long[2], 16),
      b: parseInt(long[3], 16),
    };
  }

  return null;
}

// ── Rgb → "#rrggbb" (for canvas fill styles) ────────────────────────

export function toHexColor(color: Rgb): string {
  const part = (n: number) => Math.max(0, Math.min(255, Math.round(n))).toString(16).padStart(2, "0");
  return `#${part(color.r)}${part(color.g)}${part(color.b)}`;
}

export function rgba(color: Rgb, alpha: number): string {
  return `rgba(${color.r}, ${color.g}, ${color.b}, ${alpha})`;
}
