import { describe, expect, it, vi, beforeEach } from "vitest";
import { FontDrawError } from "../core/errors.js";
import { CanvasFont } from "./canvas-font.js";

const { measureText } = vi.hoisted(() => ({ measureText: vi.fn() }));

vi.mock("@napi-rs/canvas", () => ({
  GlobalFonts: { registerFromPath: vi.fn(() => true) },
  createCanvas: vi.fn(() => ({ getContext: () => ({ font: "", measureText }) })),
}));

describe("CanvasFont", () => {
  beforeEach(() => {
    measureText.mockReset();
  });

  it("reads line metrics from the font bounding box", () => {
    measureText.mockReturnValue({ width: 30, fontBoundingBoxAscent: 15, fontBoundingBoxDescent: -4 });
    const font = new CanvasFont("/f/a.ttf", 20, "mc-font-a", null);
    expect(font.lineMetrics()).toEqual({ ascent: 15, descent: 4 });
  });

  it("reports line metric failures as FontDrawError", () => {
    measureText.mockImplementation(() => {
      throw new Error("glyph table corrupt");
    });
    const font = new CanvasFont("/f/broken.ttf", 20, "mc-font-b", null);
    expect(() => font.lineMetrics()).toThrow(FontDrawError);
    expect(() => font.lineMetrics()).toThrow(
      "Failed to draw with font /f/broken.ttf: reading line metrics failed: glyph table corrupt",
    );
  });

  it("wraps measuring failures the same way", () => {
    measureText.mockImplementation(() => {
      throw new Error("no shaper");
    });
    const font = new CanvasFont("/f/broken.ttf", 20, "mc-font-b", null);
    expect(() => font.measure("Ay", "bold")).toThrow('Failed to draw with font /f/broken.ttf: measuring "Ay" failed: no shaper');
  });
});
