// ── Error taxonomy ──────────────────────────────────────────────────
// Font and text failures are retried and usually travel as Result values;
// exhaustion, encoding and config errors are thrown.

export class MatchCutError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FontLoadError extends MatchCutError {
  readonly fontPath: string;

  constructor(fontPath: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to load font ${fontPath}: ${reason}`, options);
    this.fontPath = fontPath;
  }
}

export class FontDrawError extends MatchCutError {
  readonly fontPath: string;

  constructor(fontPath: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to draw with font ${fontPath}: ${reason}`, options);
    this.fontPath = fontPath;
  }
}

export class FontExhaustionError extends MatchCutError {
  readonly frameIndex: number;
  readonly failedFonts: readonly string[];

  constructor(frameIndex: number, failedFonts: readonly string[]) {
    super(
      `No usable font left for frame ${frameIndex} ` +
      `(${failedFonts.length} font${failedFonts.length === 1 ? "" : "s"} failed)`,
    );
    this.frameIndex = frameIndex;
    this.failedFonts = failedFonts;
  }
}

export class TextGenerationFailure extends MatchCutError {
  readonly provider: string;
  readonly reasons: readonly string[];

  constructor(provider: string, message: string, reasons: readonly string[] = []) {
    super(message);
    this.provider = provider;
    this.reasons = reasons;
  }
}

export class EncodingError extends MatchCutError {
  readonly outputPath: string;
  readonly exitCode: number | null;
  /** Tail of the encoder's stderr */
  readonly stderr: string;

  constructor(
    outputPath: string,
    message: string,
    details: { exitCode?: number | null; stderr?: string; cause?: unknown } = {},
  ) {
    super(message, { cause: details.cause });
    this.outputPath = outputPath;
    this.exitCode = details.exitCode ?? null;
    this.stderr = details.stderr ?? "";
  }
}

export class ConfigError extends MatchCutError {
  readonly field: string;
  readonly path: string | null;

  constructor(field: string, message: string, path: string | null = null) {
    super(path ? `Invalid ${path}: ${field}: ${message}` : `Invalid ${field}: ${message}`);
    this.field = field;
    this.path = path;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
