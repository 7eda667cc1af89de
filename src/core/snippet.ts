import type { CharBounds, LineBounds, TextSnippet } from "./types.js";

// ── Snippet construction ────────────────────────────────────────────

export function createSnippet(lines: readonly string[], highlightLineIndex: number): TextSnippet {
  return Object.freeze({
    lines: Object.freeze([...lines]),
    highlightLineIndex,
  });
}

// ── Invariant check shared by every text provider ───────────────────
// Returns the list of violations; empty means the snippet is usable.

export function snippetViolations(
  snippet: TextSnippet,
  phrase: string,
  lines: LineBounds,
  chars: CharBounds,
): string[] {
  const problems: string[] = [];
  const count = snippet.lines.length;

  if (count < lines.minLines || count > lines.maxLines) {
    problems.push(`expected ${lines.minLines}-${lines.maxLines} lines, got ${count}`);
  }

  if (
    !Number.isInteger(snippet.highlightLineIndex) ||
    snippet.highlightLineIndex < 0 ||
    snippet.highlightLineIndex >= count
  ) {
    problems.push(`highlight index ${snippet.highlightLineIndex} out of range`);
    return problems;
  }

  snippet.lines.forEach((line, i) => {
    const has = line.includes(phrase);
    if (i === snippet.highlightLineIndex && !has) {
      problems.push(`highlight line ${i} does not contain the phrase`);
    } else if (i !== snippet.highlightLineIndex && has) {
      problems.push(`line ${i} also contains the phrase`);
    }
    if (line.length < chars.minChars || line.length > chars.maxChars) {
      problems.push(`line ${i} is ${line.length} chars, expected ${chars.minChars}-${chars.maxChars}`);
    }
  });

  return problems;
}
