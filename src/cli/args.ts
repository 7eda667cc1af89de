import type { BlurMode } from "../core/types.js";
import { ConfigError } from "../core/errors.js";
import { PROVIDER_KINDS } from "../providers/provider.js";
import type { ProviderKind } from "../providers/provider.js";
import type { Density, MatchCutConfig } from "../types.js";

// ── Command-line overrides ──────────────────────────────────────────

export interface CliOverrides {
  highlight?: string;
  seed?: number;
  width?: number;
  height?: number;
  fps?: number;
  duration?: number;
  blur?: BlurMode;
  blurRadius?: number;
  texture?: string;
  font?: string;
  density?: Density;
  ai?: boolean;
  provider?: ProviderKind;
  model?: string;
  framesPerSnippet?: number;
  poolSize?: number;
}

export interface CliArgs {
  configPath: string | null;
  outputPath: string | null;
  help: boolean;
  overrides: CliOverrides;
}

export const USAGE = `Usage: match-cut [options] [highlight phrase]

Options:
  --config <file>            Config file (default: ./matchcut.yaml)
  --out <file>               Output .mp4 (default: output/match-cut-<uuid>.mp4)
  --seed <n>                 Reproduce an earlier run
  --width <px>  --height <px>
  --fps <n>  --duration <s>
  --blur <none|gaussian|radial>
  --blur-radius <px>
  --texture <name|none>      Background texture from the textures directory
  --font <file>              Font file inside the fonts directory
  --density <low|medium|high>
  --ai                       Generate text with an LLM (falls back to procedural)
  --provider <openrouter|ollama|openai-compat>
  --model <id>
  --frames-per-snippet <n>
  --pool-size <n>
  -h, --help
`;

const BLUR_MODES: readonly BlurMode[] = ["none", "gaussian", "radial"];
const DENSITIES: readonly Density[] = ["low", "medium", "high"];

function numberArg(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new ConfigError(flag, `expected a number, got "${raw}"`);
  }
  return value;
}

function choiceArg<T extends string>(flag: string, raw: string, options: readonly T[]): T {
  const match = options.find((o) => o === raw);
  if (match === undefined) {
    throw new ConfigError(flag, `expected one of ${options.join(", ")}, got "${raw}"`);
  }
  return match;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const parsed: CliArgs = { configPath: null, outputPath: null, help: false, overrides: {} };
  const o = parsed.overrides;
  const words: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = (): string => {
      const next = argv[i + 1];
      if (next === undefined) throw new ConfigError(arg, "requires a value");
      i++;
      return next;
    };

    switch (arg) {
      case "--config": parsed.configPath = value(); break;
      case "--out": parsed.outputPath = value(); break;
      case "--seed": o.seed = numberArg(arg, value()); break;
      case "--width": o.width = numberArg(arg, value()); break;
      case "--height": o.height = numberArg(arg, value()); break;
      case "--fps": o.fps = numberArg(arg, value()); break;
      case "--duration": o.duration = numberArg(arg, value()); break;
      case "--blur": o.blur = choiceArg(arg, value(), BLUR_MODES); break;
      case "--blur-radius": o.blurRadius = numberArg(arg, value()); break;
      case "--texture": o.texture = value(); break;
      case "--font": o.font = value(); break;
      case "--density": o.density = choiceArg(arg, value(), DENSITIES); break;
      case "--ai": o.ai = true; break;
      case "--provider": o.provider = choiceArg(arg, value(), PROVIDER_KINDS); break;
      case "--model": o.model = value(); break;
      case "--frames-per-snippet": o.framesPerSnippet = numberArg(arg, value()); break;
      case "--pool-size": o.poolSize = numberArg(arg, value()); break;
      case "-h":
      case "--help": parsed.help = true; break;
      default:
        if (arg.startsWith("-")) throw new ConfigError(arg, "unknown option");
        words.push(arg);
    }
  }

  if (words.length > 0) o.highlight = words.join(" ");
  return parsed;
}

/** Layers command-line values over the loaded config */
export function applyOverrides(config: MatchCutConfig, o: CliOverrides): MatchCutConfig {
  return {
    ...config,
    video: {
      width: o.width ?? config.video.width,
      height: o.height ?? config.video.height,
      fps: o.fps ?? config.video.fps,
      duration: o.duration ?? config.video.duration,
    },
    text: {
      ...config.text,
      highlight: o.highlight ?? config.text.highlight,
      source: o.ai ? "ai" : config.text.source,
      density: o.density ?? config.text.density,
      framesPerSnippet: o.framesPerSnippet ?? config.text.framesPerSnippet,
      poolSize: o.poolSize ?? config.text.poolSize,
    },
    style: {
      ...config.style,
      blur: o.blur ?? config.style.blur,
      blurRadius: o.blurRadius ?? config.style.blurRadius,
    },
    fonts: { ...config.fonts, preferred: o.font ?? config.fonts.preferred },
    textures: { ...config.textures, name: o.texture ?? config.textures.name },
    ai: {
      ...config.ai,
      provider: o.provider ?? config.ai.provider,
      model: o.model ?? config.ai.model,
    },
    seed: o.seed ?? config.seed,
  };
}
