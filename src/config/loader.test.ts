import { describe, expect, it, beforeEach, afterEach } from "vitest";
import { writeFile, mkdir, rm } from "fs/promises";
import { join } from "path";
import { tmpdir } from "os";
import { ConfigError } from "../core/errors.js";
import type { MatchCutConfig } from "../types.js";
import {
  DEFAULT_CONFIG,
  buildRunConfig,
  loadConfig,
  mergeConfig,
  resolveEnvVars,
} from "./loader.js";

function withConfig(patch: (config: MatchCutConfig) => MatchCutConfig): MatchCutConfig {
  return patch(DEFAULT_CONFIG);
}

describe("resolveEnvVars", () => {
  const env = { TEST_VAR: "hello", ANOTHER_VAR: "world" };

  it("replaces ${VAR} with env values", () => {
    expect(resolveEnvVars("${TEST_VAR}", env)).toBe("hello");
    expect(resolveEnvVars("prefix-${TEST_VAR}-suffix", env)).toBe("prefix-hello-suffix");
  });

  it("keeps literal ${VAR} when env var missing", () => {
    expect(resolveEnvVars("${NONEXISTENT_VAR_12345}", env)).toBe("${NONEXISTENT_VAR_12345}");
  });

  it("handles nested objects and arrays", () => {
    const input = { key: "${TEST_VAR}", nested: { deep: "${ANOTHER_VAR}" }, list: ["${TEST_VAR}", 3] };
    expect(resolveEnvVars(input, env)).toEqual({
      key: "hello",
      nested: { deep: "world" },
      list: ["hello", 3],
    });
  });

  it("passes through non-string values unchanged", () => {
    expect(resolveEnvVars(42, env)).toBe(42);
    expect(resolveEnvVars(null, env)).toBeNull();
    expect(resolveEnvVars(true, env)).toBe(true);
  });
});

describe("mergeConfig", () => {
  it("merges each section over its defaults", () => {
    const config = mergeConfig({ video: { width: 720 }, style: { blur: "radial" }, seed: 9 });
    expect(config.video).toEqual({ width: 720, height: 1024, fps: 10, duration: 5 });
    expect(config.style.blur).toBe("radial");
    expect(config.style.blurRadius).toBe(4);
    expect(config.text).toEqual(DEFAULT_CONFIG.text);
    expect(config.seed).toBe(9);
  });

  it("accepts numbers written as strings", () => {
    expect(mergeConfig({ video: { fps: "24" } }).video.fps).toBe(24);
  });

  it("rejects values of the wrong type", () => {
    expect(() => mergeConfig({ video: { fps: "fast" } })).toThrow(
      'Invalid video.fps: expected a number, got "fast"',
    );
    expect(() => mergeConfig({ style: { blur: "motion" } })).toThrow(
      'Invalid style.blur: expected one of none, gaussian, radial, got "motion"',
    );
    expect(() => mergeConfig({ video: 5 })).toThrow("Invalid video: expected a mapping, got number");
    expect(() => mergeConfig(["video"])).toThrow(ConfigError);
  });

  it("names the file in errors", () => {
    expect(() => mergeConfig({ ai: { provider: "carrier-pigeon" } }, "/etc/m.yaml")).toThrow(
      'Invalid /etc/m.yaml: ai.provider: expected one of openrouter, ollama, openai-compat, got "carrier-pigeon"',
    );
  });
});

describe("buildRunConfig", () => {
  it("derives the frame spec from defaults and the medium density preset", () => {
    const run = buildRunConfig(DEFAULT_CONFIG, { now: () => 1234 });

    expect(run.frame).toEqual({
      width: 1024,
      height: 1024,
      fps: 10,
      durationSeconds: 5,
      fontSize: 51,
      colors: {
        text: { r: 0, g: 0, b: 0 },
        background: { r: 255, g: 255, b: 255 },
        highlight: { r: 255, g: 255, b: 0 },
      },
      blur: { mode: "gaussian", radius: 4, sharpRadiusFactor: 0.3 },
      verticalSpread: 1.3,
      texture: null,
      jitter: 5,
      seed: 1234,
    });
    expect(run.lines).toEqual({ minLines: 12, maxLines: 16 });
    expect(run.chars).toEqual({ minChars: 50, maxChars: 80 });
    expect(run.highlight).toBe("Match Cut");
    expect(run.preferredFont).toBeNull();
    expect(run.ai).toBeNull();
    expect(run.encoder).toEqual({ ffmpegPath: "ffmpeg", preset: "medium", crf: 23 });
    expect(Object.isFrozen(run.frame)).toBe(true);
  });

  it("applies density presets without overriding explicit values", () => {
    const high = buildRunConfig(
      withConfig((c) => ({ ...c, text: { ...c.text, density: "high" }, seed: 1 })),
    );
    expect(high.frame.fontSize).toBe(40);
    expect(high.frame.verticalSpread).toBe(1.1);
    expect(high.lines).toEqual({ minLines: 14, maxLines: 20 });

    const explicit = buildRunConfig(
      withConfig((c) => ({
        ...c,
        text: { ...c.text, density: "low", minLines: 7, maxLines: 12 },
        style: { ...c.style, verticalSpread: 2 },
        seed: 1,
      })),
    );
    expect(explicit.lines).toEqual({ minLines: 7, maxLines: 12 });
    expect(explicit.frame.verticalSpread).toBe(2);
    expect(explicit.frame.fontSize).toBe(61);
  });

  it("stretches the preset maximum to a larger explicit minimum", () => {
    const run = buildRunConfig(withConfig((c) => ({ ...c, text: { ...c.text, minLines: 20 }, seed: 1 })));
    expect(run.lines).toEqual({ minLines: 20, maxLines: 20 });
  });

  it("keeps a configured seed and wraps a clock seed to 32 bits", () => {
    expect(buildRunConfig({ ...DEFAULT_CONFIG, seed: 42 }).frame.seed).toBe(42);
    expect(buildRunConfig(DEFAULT_CONFIG, { now: () => 2 ** 32 + 5 }).frame.seed).toBe(5);
  });

  it("treats 'none' and 'random' as unset", () => {
    const run = buildRunConfig(
      withConfig((c) => ({
        ...c,
        textures: { dir: "t", name: "none" },
        fonts: { ...c.fonts, preferred: "random" },
        seed: 1,
      })),
    );
    expect(run.frame.texture).toBeNull();
    expect(run.preferredFont).toBeNull();

    const named = buildRunConfig(
      withConfig((c) => ({ ...c, textures: { dir: "t", name: "paper" }, fonts: { ...c.fonts, preferred: "Inter.ttf" }, seed: 1 })),
    );
    expect(named.frame.texture).toBe("paper");
    expect(named.preferredFont).toBe("Inter.ttf");
  });

  it("carries AI settings only when AI text is enabled", () => {
    const run = buildRunConfig(
      withConfig((c) => ({ ...c, text: { ...c.text, source: "ai" }, ai: { ...c.ai, apiKey: "" }, seed: 1 })),
    );
    expect(run.ai).toEqual({
      provider: "openrouter",
      model: "mistralai/mistral-large",
      baseUrl: null,
      apiKey: null,
      temperature: 0.7,
      maxTokens: 800,
      attempts: 3,
    });

    const placeholder = buildRunConfig(
      withConfig((c) => ({ ...c, text: { ...c.text, source: "ai" }, ai: { ...c.ai, apiKey: "${UNSET_KEY}" }, seed: 1 })),
    );
    expect(placeholder.ai?.apiKey).toBeNull();
  });

  it.each<[string, (c: MatchCutConfig) => MatchCutConfig, string]>([
    ["width", (c) => ({ ...c, video: { ...c.video, width: 100 } }), "Invalid video.width: must be between 256 and 4096, got 100"],
    ["fps", (c) => ({ ...c, video: { ...c.video, fps: 61 } }), "Invalid video.fps: must be between 1 and 60, got 61"],
    ["fractional fps", (c) => ({ ...c, video: { ...c.video, fps: 2.5 } }), "Invalid video.fps: must be an integer, got 2.5"],
    ["duration", (c) => ({ ...c, video: { ...c.video, duration: 0 } }), "Invalid video.duration: must be between 1 and 60, got 0"],
    ["highlight", (c) => ({ ...c, text: { ...c.text, highlight: "   " } }), "Invalid text.highlight: must not be empty"],
    [
      "char band",
      (c) => ({ ...c, text: { ...c.text, minChars: 50, maxChars: 60 } }),
      "Invalid text.maxChars: must be at least 15 above minChars (got 50-60)",
    ],
    [
      "line range",
      (c) => ({ ...c, text: { ...c.text, minLines: 9, maxLines: 3 } }),
      "Invalid text.minLines: 9 is greater than maxLines 3",
    ],
    ["pool size", (c) => ({ ...c, text: { ...c.text, poolSize: 0 } }), "Invalid text.poolSize: must be between 1 and 10000, got 0"],
    ["blur radius", (c) => ({ ...c, style: { ...c.style, blurRadius: -1 } }), "Invalid style.blurRadius: must be between 0 and 1000, got -1"],
    ["spread", (c) => ({ ...c, style: { ...c.style, verticalSpread: 0 } }), "Invalid style.verticalSpread: must be > 0, got 0"],
    [
      "color",
      (c) => ({ ...c, style: { ...c.style, textColor: "puce" } }),
      'Invalid style.textColor: "puce" is not #rgb, #rrggbb or a known color name',
    ],
  ])("rejects a bad %s", (_name, patch, message) => {
    expect(() => buildRunConfig(withConfig(patch), { now: () => 1 })).toThrow(message);
  });

  it("rejects a phrase that cannot fit on a line", () => {
    const phrase = "x".repeat(80);
    expect(() =>
      buildRunConfig(withConfig((c) => ({ ...c, text: { ...c.text, highlight: phrase } })), { now: () => 1 }),
    ).toThrow("Invalid text.highlight: is 80 chars, longer than maxChars - 1 (79)");
  });

  it("rejects a phrase that filler text could not keep off other lines", () => {
    expect(() =>
      buildRunConfig(withConfig((c) => ({ ...c, text: { ...c.text, highlight: "a" } })), { now: () => 1 }),
    ).toThrow('Invalid text.highlight: "a" turns up in too much of the filler vocabulary to stay on one line');
  });
});

describe("loadConfig", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = join(tmpdir(), `match-cut-config-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(tmpDir, { recursive: true });
    process.env.MATCHCUT_TEST_FPS = "12";
  });

  afterEach(async () => {
    delete process.env.MATCHCUT_TEST_FPS;
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("loads and merges a yaml file with env placeholders", async () => {
    const path = join(tmpDir, "matchcut.yaml");
    await writeFile(
      path,
      [
        "video:",
        "  width: 720",
        "  fps: ${MATCHCUT_TEST_FPS}",
        "text:",
        "  highlight: Big Idea",
        "  density: low",
        "seed: 9",
        "",
      ].join("\n"),
    );

    const config = await loadConfig(path);

    expect(config.video).toEqual({ width: 720, height: 1024, fps: 12, duration: 5 });
    expect(config.text.highlight).toBe("Big Idea");
    expect(config.text.density).toBe("low");
    expect(config.seed).toBe(9);
  });

  it("returns DEFAULT_CONFIG for an empty file", async () => {
    const path = join(tmpDir, "empty.yaml");
    await writeFile(path, "");
    expect(await loadConfig(path)).toBe(DEFAULT_CONFIG);
  });

  it("rejects a missing explicit path", async () => {
    await expect(loadConfig(join(tmpDir, "nonexistent.yaml"))).rejects.toThrow(ConfigError);
  });

  it("reports YAML syntax errors", async () => {
    const path = join(tmpDir, "broken.yaml");
    await writeFile(path, "video: [unclosed\n");
    await expect(loadConfig(path)).rejects.toThrow("YAML parse error");
  });
});
