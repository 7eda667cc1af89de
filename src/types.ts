// ── Config types for match-cut (loaded from matchcut.yaml) ──────────

import type { BlurMode, TextSource } from "./core/types.js";
import type { ProviderKind } from "./providers/provider.js";

export type Density = "low" | "medium" | "high";

export interface VideoSection {
  width: number;
  height: number;
  fps: number;
  /** Seconds */
  duration: number;
}

export interface TextSection {
  /** Phrase that appears once per frame under the highlight */
  highlight: string;
  source: TextSource;
  density: Density;
  /** Null means "take it from the density preset" */
  minLines: number | null;
  maxLines: number | null;
  minChars: number;
  maxChars: number;
  framesPerSnippet: number;
  poolSize: number;
}

export interface StyleSection {
  textColor: string;
  backgroundColor: string;
  highlightColor: string;
  blur: BlurMode;
  blurRadius: number;
  /** Radial mode keeps min(W, H) × this sharp */
  sharpRadiusFactor: number;
  verticalSpread: number | null;
  /** Font size as a fraction of frame height */
  fontSizeRatio: number | null;
  /** Max vertical wobble per frame, in px */
  jitter: number;
}

export interface FontsSection {
  dir: string;
  /** File name inside `dir`; null or "random" picks at random */
  preferred: string | null;
  maxRetries: number;
}

export interface TexturesSection {
  dir: string;
  /** Texture name; null or "none" draws procedural paper */
  name: string | null;
}

export interface AiSection {
  provider: ProviderKind;
  model: string;
  baseUrl: string | null;
  apiKey: string | null;
  temperature: number;
  maxTokens: number;
  attempts: number;
}

export interface OutputSection {
  dir: string;
  ffmpeg: string;
  preset: string;
  crf: number;
}

export interface MatchCutConfig {
  video: VideoSection;
  text: TextSection;
  style: StyleSection;
  fonts: FontsSection;
  textures: TexturesSection;
  ai: AiSection;
  output: OutputSection;
  /** Null means a fresh seed per run */
  seed: number | null;
}

export interface DensityPreset {
  minLines: number;
  maxLines: number;
  verticalSpread: number;
  fontSizeRatio: number;
}
