import type { LineBounds, TextSnippet } from "../core/types.js";
import { TextGenerationFailure } from "../core/errors.js";
import type { TextProvider } from "./provider.js";

// ── Snippet pool ────────────────────────────────────────────────────
// Bounded cache of snippets handed out round-robin, each one reused for
// `framesPerSnippet` consecutive frames. The pool grows by one snippet
// per rotation until it reaches `poolSize`, then only rotates.

export interface SnippetPoolOptions {
  provider: TextProvider;
  highlight: string;
  lines: LineBounds;
  poolSize: number;
  framesPerSnippet: number;
  /** Called with each new snippet and its slot index */
  onGrow?: (snippet: TextSnippet, index: number) => void;
  /** Called when growth fails but existing snippets keep the run going */
  onGrowFailed?: (failure: TextGenerationFailure) => void;
}

export class SnippetPool {
  private readonly opts: SnippetPoolOptions;
  private readonly snippets: TextSnippet[] = [];
  private cursor = -1;
  private used = 0;

  constructor(opts: SnippetPoolOptions) {
    if (!Number.isInteger(opts.poolSize) || opts.poolSize < 1) {
      throw new Error(`poolSize must be a positive integer, got ${opts.poolSize}`);
    }
    if (!Number.isInteger(opts.framesPerSnippet) || opts.framesPerSnippet < 1) {
      throw new Error(`framesPerSnippet must be a positive integer, got ${opts.framesPerSnippet}`);
    }
    this.opts = opts;
  }

  /** Number of snippets created so far */
  get size(): number {
    return this.snippets.length;
  }

  get cursorIndex(): number {
    return this.cursor;
  }

  current(): TextSnippet {
    if (this.cursor < 0) throw new Error("SnippetPool.current() called before the first tick()");
    return this.snippets[this.cursor];
  }

  /** Claims one frame's use of the active snippet, rotating first when its quota is spent */
  async tick(): Promise<TextSnippet> {
    if (this.cursor < 0 || this.used >= this.opts.framesPerSnippet) {
      await this.growOrRotate();
    }
    this.used++;
    return this.current();
  }

  private async growOrRotate(): Promise<void> {
    if (this.snippets.length < this.opts.poolSize) {
      const { highlight, lines, provider } = this.opts;
      const result = await provider.generate(highlight, lines.minLines, lines.maxLines);
      if (result.ok) {
        this.snippets.push(result.value);
        this.opts.onGrow?.(result.value, this.snippets.length - 1);
      } else if (this.snippets.length === 0) {
        throw new TextGenerationFailure(provider.name, "no valid text content", [
          result.error.message,
          ...result.error.reasons,
        ]);
      } else {
        this.opts.onGrowFailed?.(result.error);
      }
    }

    this.cursor = (this.cursor + 1) % this.snippets.length;
    this.used = 0;
  }
}
