export * from "./core/types.js";
export * from "./core/errors.js";
export { RandomSource } from "./core/random.js";
export { parseColor, toHexColor } from "./core/colors.js";
export { createSnippet, snippetViolations } from "./core/snippet.js";

export { FontCatalog, discoverFonts, SYSTEM_FONT_DIRS, FALLBACK_FONTS } from "./fonts/catalog.js";
export { CanvasFontLoader } from "./fonts/canvas-font.js";
export type { FontLoader } from "./fonts/canvas-font.js";
export { resolveBoldVariant } from "./fonts/bold.js";

export type { TextProvider } from "./text/provider.js";
export { FallbackTextProvider } from "./text/provider.js";
export { ProceduralTextProvider, loadGrammar } from "./text/procedural.js";
export { AiTextProvider } from "./text/ai-provider.js";
export { createTextProvider } from "./text/factory.js";
export { SnippetPool } from "./text/pool.js";

export { FrameCompositor } from "./render/compositor.js";
export { computeFrameLayout } from "./render/layout.js";
export { TextureLibrary } from "./render/textures.js";
export type { TextureSource } from "./render/textures.js";

export { VideoEncoder } from "./engine/encoder.js";
export type { EncodeRequest, EncodeResult, FrameEncoder } from "./engine/encoder.js";
export { VideoGenerator } from "./engine/video-generator.js";
export type { FrameRenderer, GenerationResult, GeneratorEvents } from "./engine/video-generator.js";

export { loadConfig, buildRunConfig, DEFAULT_CONFIG } from "./config/loader.js";
export type { MatchCutConfig } from "./types.js";
