import type { CharBounds, Result, TextSnippet } from "../core/types.js";
import { err, ok } from "../core/types.js";
import { TextGenerationFailure, errorMessage } from "../core/errors.js";
import { createSnippet } from "../core/snippet.js";
import { complete } from "../providers/provider.js";
import type { ProviderKind } from "../providers/provider.js";
import type { TextProvider } from "./provider.js";

// ── Options ─────────────────────────────────────────────────────────

export interface AiProviderOptions {
  provider: ProviderKind;
  model: string;
  baseUrl?: string;
  apiKey?: string;
  temperature?: number;
  maxTokens?: number;
  /** Requests made before giving up (default 3) */
  attempts?: number;
  chars: CharBounds;
  signal?: AbortSignal;
}

const SYSTEM_PROMPT =
  "You are a text generation assistant that creates natural, coherent text. " +
  "Follow formatting rules exactly and create meaningful sentences that flow naturally.";

const MIN_WORDS = 5;

// ── Prompt ──────────────────────────────────────────────────────────

export function buildPrompt(highlight: string, lineCount: number, chars: CharBounds): string {
  return [
    `Task: Generate exactly ${lineCount} lines of coherent, natural text in a single language (no more, no less).`,
    "",
    "Rules:",
    "1. Each line MUST be a complete, meaningful sentence in natural language",
    `2. One line MUST contain exactly this phrase: '${highlight}'`,
    `3. IMPORTANT: Each line MUST be ${chars.minChars}-${chars.maxChars} characters long (no short lines)`,
    "4. Create a coherent paragraph where all lines relate to each other",
    "5. The text should flow naturally with the highlighted phrase integrated seamlessly",
    "6. Every line must be substantial and meaningful, not just filler text",
    "",
    "Format:",
    "- Return ONLY the lines of text",
    "- Separate lines with single newlines",
    "- No numbering, no quotes, no extra formatting",
    "- EVERY line must be a complete sentence with proper punctuation",
  ].join("\n");
}

// ── Response cleanup ────────────────────────────────────────────────

/** Strips markdown noise, headings, bullets and numbering from a raw reply */
export function cleanResponse(content: string): string[] {
  return content
    .replace(/```/g, "")
    .replace(/\*\*/g, "")
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .filter((line) => !/^(#|-|\*|Note:|Format:)/.test(line))
    .map((line) => line.replace(/^\d+\.\s+/, ""));
}

export function isUsableLine(line: string, chars: CharBounds): boolean {
  return (
    line.length >= chars.minChars &&
    line.length <= chars.maxChars &&
    line.includes(" ") &&
    /[.?!]/.test(line) &&
    line.split(/\s+/).length >= MIN_WORDS
  );
}

/**
 * Turns a raw reply into a snippet, or explains why it can't.
 * Keeps at most `maxLines` lines, sliding the window so the highlight
 * line stays inside it.
 */
export function parseSnippet(
  content: string,
  highlight: string,
  minLines: number,
  maxLines: number,
  chars: CharBounds,
): Result<TextSnippet, string> {
  const lines = cleanResponse(content).filter((line) => isUsableLine(line, chars));

  const hits = lines.flatMap((line, i) => (line.includes(highlight) ? [i] : []));
  if (hits.length === 0) return err("no usable line contains the phrase");
  if (hits.length > 1) return err(`phrase appears on ${hits.length} lines`);
  if (lines.length < minLines) return err(`only ${lines.length} usable lines, need ${minLines}`);

  const index = hits[0];
  if (lines.length <= maxLines) return ok(createSnippet(lines, index));

  const start = Math.min(Math.max(0, index - Math.floor(maxLines / 2)), lines.length - maxLines);
  return ok(createSnippet(lines.slice(start, start + maxLines), index - start));
}

// ── AI-backed provider ──────────────────────────────────────────────

export class AiTextProvider implements TextProvider {
  readonly name: string;
  private readonly opts: AiProviderOptions;

  constructor(opts: AiProviderOptions) {
    this.opts = opts;
    this.name = `ai:${opts.provider}`;
  }

  async generate(
    highlight: string,
    minLines: number,
    maxLines: number,
  ): Promise<Result<TextSnippet, TextGenerationFailure>> {
    const attempts = Math.max(1, this.opts.attempts ?? 3);
    const reasons: string[] = [];

    for (let attempt = 1; attempt <= attempts; attempt++) {
      let content: string;
      try {
        const res = await complete(
          this.opts.provider,
          {
            model: this.opts.model,
            messages: [
              { role: "system", content: SYSTEM_PROMPT },
              { role: "user", content: buildPrompt(highlight, maxLines, this.opts.chars) },
            ],
            temperature: this.opts.temperature,
            maxTokens: this.opts.maxTokens,
          },
          { baseUrl: this.opts.baseUrl, apiKey: this.opts.apiKey, signal: this.opts.signal },
        );
        content = res.content;
      } catch (e) {
        if (this.opts.signal?.aborted) throw e;
        reasons.push(`attempt ${attempt}: ${errorMessage(e)}`);
        continue;
      }

      const parsed = parseSnippet(content, highlight, minLines, maxLines, this.opts.chars);
      if (parsed.ok) return parsed;
      reasons.push(`attempt ${attempt}: ${parsed.error}`);
    }

    return err(
      new TextGenerationFailure(
        this.name,
        `${this.name} produced no valid text after ${attempts} attempt${attempts === 1 ? "" : "s"}`,
        reasons,
      ),
    );
  }
}
