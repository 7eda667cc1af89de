#!/usr/bin/env node
/**
 * match-cut: renders a "text match cut" video where one highlighted phrase
 * holds still in the centre while the text and font around it change
 * every few frames.
 *
 * Usage:
 *   match-cut "Better Gaming Experience"
 *   match-cut --blur radial --density high --out clip.mp4 "Big Idea"
 *   match-cut --ai --provider ollama --model llama3 "Big Idea"
 */

import { randomUUID } from "crypto";
import { join } from "path";
import { loadConfig, buildRunConfig } from "../config/loader.js";
import { errorMessage, FontExhaustionError, EncodingError, TextGenerationFailure } from "../core/errors.js";
import { RandomSource } from "../core/random.js";
import { FontCatalog } from "../fonts/catalog.js";
import { createTextProvider } from "../text/factory.js";
import { TextureLibrary } from "../render/textures.js";
import { FrameCompositor } from "../render/compositor.js";
import { VideoEncoder } from "../engine/encoder.js";
import { VideoGenerator } from "../engine/video-generator.js";
import { applyOverrides, parseArgs, USAGE } from "./args.js";

const DIM = "\x1b[2m";
const BOLD = "\x1b[1m";
const RESET = "\x1b[0m";

// Salts so each consumer gets its own stream from the run seed
const FONT_SALT = 1;
const TEXT_SALT = 2;

function log(message: string): void {
  process.stderr.write(`${message}\n`);
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(USAGE);
    return;
  }

  const config = applyOverrides(await loadConfig(args.configPath ?? undefined), args.overrides);
  const run = buildRunConfig(config);
  const random = new RandomSource(run.frame.seed);
  const abort = new AbortController();
  process.once("SIGINT", () => abort.abort());

  log(`${BOLD}match-cut${RESET} ${DIM}"${run.highlight}" ${run.frame.width}x${run.frame.height} @ ${run.frame.fps}fps, ${run.frame.durationSeconds}s, seed ${run.frame.seed}${RESET}`);

  const catalog = await FontCatalog.discover(run.fontDir, {
    random: random.fork(FONT_SALT),
    onWarning: (message) => log(`Warning: ${message}`),
  });
  log(`Found ${catalog.fonts.length} fonts`);

  const provider = createTextProvider(run, {
    random: random.fork(TEXT_SALT),
    signal: abort.signal,
    onFallback: (failure) => log(`Warning: ${failure.message}; using procedural text`),
  });

  const compositor = new FrameCompositor(run.frame, run.highlight, {
    textures: new TextureLibrary(run.textureDir, {
      onError: (name, message) => log(`Warning: texture "${name}" could not be decoded: ${message}`),
    }),
    onTextureMissing: (name) => log(`Warning: texture "${name}" not found in ${run.textureDir}, using paper`),
  });

  const generator = new VideoGenerator({
    config: run,
    catalog,
    provider,
    renderer: compositor,
    encoder: new VideoEncoder(run.encoder),
  });

  const step = Math.max(1, Math.floor(generator.totalFrames / 10));
  generator.on("start", ({ totalFrames }) => log(`Rendering ${totalFrames} frames (${provider.name} text)`));
  generator.on("snippet", (snippet, index) =>
    log(`${DIM}  snippet ${index + 1}: ${snippet.lines.length} lines, highlight on line ${snippet.highlightLineIndex + 1}${RESET}`),
  );
  generator.on("frame", (index, total) => {
    if ((index + 1) % step === 0 || index + 1 === total) {
      log(`  ${Math.round(((index + 1) / total) * 100)}% (${index + 1}/${total})`);
    }
  });
  generator.on("fontFailed", (fontPath, error, frameIndex) =>
    log(`Warning: frame ${frameIndex}: ${error.message}, skipping ${fontPath}`),
  );
  generator.on("warning", (message) => log(`Warning: ${message}`));
  generator.on("encoded", (result) => log(`Encoded ${result.frames} frames`));

  const outputPath = args.outputPath ?? join(run.outputDir, `match-cut-${randomUUID()}.mp4`);
  const result = await generator.run(outputPath);

  if (result.failedFonts.length > 0) {
    log(`${DIM}Fonts that failed:\n${result.failedFonts.map((p) => `  ${p}`).join("\n")}${RESET}`);
  }
  log(`${BOLD}Done:${RESET} ${result.outputPath} ${DIM}(seed ${result.seed})${RESET}`);
}

main().catch((err: unknown) => {
  process.stderr.write(`Error: ${errorMessage(err)}\n`);
  if (err instanceof FontExhaustionError && err.failedFonts.length > 0) {
    process.stderr.write(`Failed fonts:\n${err.failedFonts.map((p) => `  ${p}`).join("\n")}\n`);
  } else if (err instanceof TextGenerationFailure) {
    for (const reason of err.reasons) process.stderr.write(`  ${reason}\n`);
  } else if (err instanceof EncodingError && err.stderr) {
    process.stderr.write(`${DIM}${err.stderr.trimEnd()}${RESET}\n`);
  }
  process.exit(1);
});
