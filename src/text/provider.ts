import type { Result, TextSnippet } from "../core/types.js";
import type { TextGenerationFailure } from "../core/errors.js";

// ── Text provider contract ──────────────────────────────────────────

export interface TextProvider {
  /** Short label used in logs, e.g. "procedural" or "ai:ollama" */
  readonly name: string;
  generate(
    highlight: string,
    minLines: number,
    maxLines: number,
  ): Promise<Result<TextSnippet, TextGenerationFailure>>;
}

// ── Primary provider with a fallback ────────────────────────────────

export interface FallbackHooks {
  /** Called when the primary fails and the fallback is consulted */
  onFallback?: (failure: TextGenerationFailure) => void;
}

export class FallbackTextProvider implements TextProvider {
  readonly name: string;
  private readonly primary: TextProvider;
  private readonly fallback: TextProvider;
  private readonly hooks: FallbackHooks;
  private _lastSource: string | null = null;

  constructor(primary: TextProvider, fallback: TextProvider, hooks: FallbackHooks = {}) {
    this.primary = primary;
    this.fallback = fallback;
    this.hooks = hooks;
    this.name = `${primary.name}|${fallback.name}`;
  }

  /** Name of the provider that produced the most recent snippet */
  get lastSource(): string | null {
    return this._lastSource;
  }

  async generate(
    highlight: string,
    minLines: number,
    maxLines: number,
  ): Promise<Result<TextSnippet, TextGenerationFailure>> {
    const first = await this.primary.generate(highlight, minLines, maxLines);
    if (first.ok) {
      this._lastSource = this.primary.name;
      return first;
    }

    this.hooks.onFallback?.(first.error);
    const second = await this.fallback.generate(highlight, minLines, maxLines);
    this._lastSource = second.ok ? this.fallback.name : null;
    return second;
  }
}
