import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../config/loader.js";
import { applyOverrides, parseArgs } from "./args.js";

describe("parseArgs", () => {
  it("reads flags and joins the remaining words into the phrase", () => {
    const args = parseArgs([
      "--config", "my.yaml",
      "--out", "clip.mp4",
      "--fps", "24",
      "--blur", "radial",
      "--blur-radius", "6.5",
      "--ai",
      "--provider", "ollama",
      "Better", "Gaming", "Experience",
    ]);

    expect(args.configPath).toBe("my.yaml");
    expect(args.outputPath).toBe("clip.mp4");
    expect(args.help).toBe(false);
    expect(args.overrides).toEqual({
      fps: 24,
      blur: "radial",
      blurRadius: 6.5,
      ai: true,
      provider: "ollama",
      highlight: "Better Gaming Experience",
    });
  });

  it("returns empty overrides for no arguments", () => {
    expect(parseArgs([])).toEqual({ configPath: null, outputPath: null, help: false, overrides: {} });
  });

  it("recognises help", () => {
    expect(parseArgs(["-h"]).help).toBe(true);
    expect(parseArgs(["--help"]).help).toBe(true);
  });

  it("rejects bad values and unknown flags", () => {
    expect(() => parseArgs(["--fps", "fast"])).toThrow('Invalid --fps: expected a number, got "fast"');
    expect(() => parseArgs(["--density", "extreme"])).toThrow(
      'Invalid --density: expected one of low, medium, high, got "extreme"',
    );
    expect(() => parseArgs(["--width"])).toThrow("Invalid --width: requires a value");
    expect(() => parseArgs(["--colour", "red"])).toThrow("Invalid --colour: unknown option");
  });
});

describe("applyOverrides", () => {
  it("layers flags over the file config", () => {
    const config = applyOverrides(DEFAULT_CONFIG, {
      width: 640,
      highlight: "Big Idea",
      ai: true,
      font: "Inter.ttf",
      texture: "paper",
      seed: 5,
      poolSize: 4,
    });

    expect(config.video).toEqual({ width: 640, height: 1024, fps: 10, duration: 5 });
    expect(config.text.highlight).toBe("Big Idea");
    expect(config.text.source).toBe("ai");
    expect(config.text.poolSize).toBe(4);
    expect(config.fonts.preferred).toBe("Inter.ttf");
    expect(config.textures.name).toBe("paper");
    expect(config.seed).toBe(5);
    expect(config.style).toEqual(DEFAULT_CONFIG.style);
  });

  it("leaves the config alone without overrides", () => {
    expect(applyOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
  });
});
