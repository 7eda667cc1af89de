import { readFileSync } from "fs";
import type { CharBounds, Result, TextSnippet } from "../core/types.js";
import { ok } from "../core/types.js";
import type { TextGenerationFailure } from "../core/errors.js";
import { createSnippet, snippetViolations } from "../core/snippet.js";
import type { RandomSource } from "../core/random.js";
import type { TextProvider } from "./provider.js";

// ── Grammar data ────────────────────────────────────────────────────

export const SLOTS = ["noun", "verb", "adj", "adv", "prep", "pronoun", "det"] as const;
export type Slot = (typeof SLOTS)[number];

export interface Grammar {
  /** General sentence templates with {slot} placeholders */
  structures: string[];
  /** Templates that splice a multi-word phrase in at {phrase} */
  phraseTemplates: string[];
  words: Record<Slot, string[]>;
  /** Trailing clauses appended to lines that come out short */
  padClauses: string[];
  /** Short fillers for when no clause fits */
  padWords: string[];
}

const DEFAULT_GRAMMAR_URL = new URL("../../data/grammar.json", import.meta.url);
let defaultGrammar: Grammar | null = null;

export function loadGrammar(source: URL | string = DEFAULT_GRAMMAR_URL): Grammar {
  const parsed: unknown = JSON.parse(readFileSync(source, "utf-8"));
  if (!isGrammar(parsed)) {
    throw new Error(`Invalid grammar file: ${String(source)}`);
  }
  return parsed;
}

/** The word lists shipped in data/grammar.json, read once */
export function bundledGrammar(): Grammar {
  defaultGrammar ??= loadGrammar();
  return defaultGrammar;
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.length > 0 && value.every((v) => typeof v === "string");
}

function isGrammar(value: unknown): value is Grammar {
  if (typeof value !== "object" || value === null) return false;
  if (!("structures" in value) || !isStringList(value.structures)) return false;
  if (!("phraseTemplates" in value) || !isStringList(value.phraseTemplates)) return false;
  if (!("padClauses" in value) || !isStringList(value.padClauses)) return false;
  if (!("padWords" in value) || !isStringList(value.padWords)) return false;
  if (!("words" in value) || typeof value.words !== "object" || value.words === null) return false;
  const words = value.words;
  return SLOTS.every((slot) => slot in words && isStringList(Reflect.get(words, slot)));
}

// ── Sentence model ──────────────────────────────────────────────────
// A sentence is a list of words plus terminal punctuation. The phrase,
// when present, is one entry even if it spans several words, so
// trimming never splits it.

interface Sentence {
  words: string[];
  /** Index of the entry carrying the phrase, or -1 */
  phraseAt: number;
  terminal: string;
}

const SLOT_RE = /\{(noun|verb|adj|adv|prep|pronoun|det|phrase)\}/g;
const MAX_LINE_ATTEMPTS = 25;

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

function sentenceText(s: Sentence): string {
  const words = [...s.words];
  words[words.length - 1] = words[words.length - 1].replace(/,+$/, "");
  if (s.phraseAt !== 0) words[0] = capitalize(words[0]);
  return words.join(" ") + s.terminal;
}

export interface ProceduralOptions {
  chars: CharBounds;
  random: RandomSource;
  grammar?: Grammar;
}

// ── Procedural provider ─────────────────────────────────────────────

export class ProceduralTextProvider implements TextProvider {
  readonly name = "procedural";
  private readonly chars: CharBounds;
  private readonly random: RandomSource;
  private readonly grammar: Grammar;

  constructor(opts: ProceduralOptions) {
    this.chars = opts.chars;
    this.random = opts.random;
    this.grammar = opts.grammar ?? bundledGrammar();
  }

  async generate(
    highlight: string,
    minLines: number,
    maxLines: number,
  ): Promise<Result<TextSnippet, TextGenerationFailure>> {
    return ok(this.generateSync(highlight, minLines, maxLines));
  }

  generateSync(highlight: string, minLines: number, maxLines: number): TextSnippet {
    const count = this.random.int(Math.max(1, minLines), Math.max(minLines, maxLines));
    const highlightIndex = this.random.int(0, count - 1);

    const lines: string[] = [];
    for (let i = 0; i < count; i++) {
      lines.push(i === highlightIndex ? this.highlightLine(highlight) : this.fillerLine(highlight));
    }

    const snippet = createSnippet(lines, highlightIndex);
    const problems = snippetViolations(snippet, highlight, { minLines, maxLines }, this.chars);
    if (problems.length > 0) {
      throw new Error(`Procedural snippet broke its invariants: ${problems.join("; ")}`);
    }
    return snippet;
  }

  // ── Lines ─────────────────────────────────────────────────────────

  private highlightLine(phrase: string): string {
    const multiWord = phrase.trim().split(/\s+/).length > 1;

    for (let attempt = 0; attempt < MAX_LINE_ATTEMPTS; attempt++) {
      let sentence: Sentence;
      if (multiWord) {
        sentence = this.fill(this.random.pick(this.grammar.phraseTemplates), phrase);
      } else {
        const structure = this.random.pick(this.grammar.structures);
        const slots = (["noun", "verb", "adj"] as const).filter((s) => structure.includes(`{${s}}`));
        sentence = this.fill(structure, phrase, this.random.pick(slots));
      }
      const line = this.fit(sentence);
      if (line !== null && line.includes(phrase)) return line;
    }

    throw new Error(`Could not build a ${this.chars.minChars}-${this.chars.maxChars} char line around "${phrase}"`);
  }

  private fillerLine(phrase: string): string {
    for (let attempt = 0; attempt < MAX_LINE_ATTEMPTS; attempt++) {
      const line = this.fit(this.fill(this.random.pick(this.grammar.structures), null));
      if (line !== null && !line.includes(phrase)) return line;
    }

    throw new Error(`Could not build a filler line free of "${phrase}"`);
  }

  // ── Template filling ──────────────────────────────────────────────

  private fill(template: string, phrase: string | null, phraseSlot?: Slot): Sentence {
    const last = template.charAt(template.length - 1);
    const terminal = ".?!".includes(last) ? last : ".";
    const body = ".?!".includes(last) ? template.slice(0, -1) : template;

    let phraseAt = -1;
    const words = body.split(" ").map((token, i) =>
      token.replace(SLOT_RE, (_match, slot: string) => {
        if (slot === "phrase") {
          phraseAt = i;
          return phrase ?? "";
        }
        if (phrase !== null && phraseAt === -1 && slot === phraseSlot) {
          phraseAt = i;
          return phrase;
        }
        return this.random.pick(this.grammar.words[slotOf(slot)]);
      }),
    );

    return { words, phraseAt, terminal };
  }

  // ── Length fitting ────────────────────────────────────────────────
  // Pads short lines with trailing clauses and trims long ones word by
  // word, never cutting into the phrase. Returns null when the band
  // cannot be met for this sentence.

  private fit(sentence: Sentence): string | null {
    const { minChars, maxChars } = this.chars;
    const s: Sentence = { ...sentence, words: [...sentence.words] };

    while (sentenceText(s).length < minChars) {
      const budget = maxChars - sentenceText(s).length - 1;
      const clause =
        this.pickFitting(this.grammar.padClauses, budget) ??
        this.pickFitting(this.grammar.padWords, budget);
      if (clause === null) return null;
      const tail = s.words.length - 1;
      s.words[tail] = s.words[tail].replace(/,+$/, "");
      s.words.push(...clause.split(" "));
    }

    while (sentenceText(s).length > maxChars) {
      if (s.words.length - 1 > s.phraseAt && s.words.length > 1) {
        s.words.pop();
      } else if (s.phraseAt > 0) {
        s.words.shift();
        s.phraseAt--;
      } else {
        return null;
      }
    }

    const text = sentenceText(s);
    return text.length >= minChars ? text : null;
  }

  private pickFitting(options: readonly string[], budget: number): string | null {
    const fitting = options.filter((o) => o.length <= budget);
    return fitting.length > 0 ? this.random.pick(fitting) : null;
  }
}

// ── Phrase clearance ────────────────────────────────────────────────

/** Below this, filler lines that avoid the phrase are too rare to find */
export const MIN_FILLER_CLEARANCE = 0.5;

/**
 * Estimated share of filler sentences free of `phrase`: the mean over
 * structures of the chance that neither the fixed words nor any slot
 * draw contain it, weighted for padding on about half the lines.
 */
export function fillerClearance(phrase: string, grammar: Grammar): number {
  const clean = (list: readonly string[]): number => list.filter((w) => !w.includes(phrase)).length / list.length;

  const perStructure = grammar.structures.map((structure) => {
    if (structure.replace(SLOT_RE, " ").includes(phrase)) return 0;
    let share = 1;
    for (const match of structure.matchAll(SLOT_RE)) {
      share *= match[1] === "phrase" ? 1 : clean(grammar.words[slotOf(match[1])]);
    }
    return share;
  });

  const mean = perStructure.reduce((sum, share) => sum + share, 0) / perStructure.length;
  return mean * (1 + clean(grammar.padClauses)) / 2;
}

function slotOf(name: string): Slot {
  const slot = SLOTS.find((s) => s === name);
  if (!slot) throw new Error(`Unknown grammar slot: ${name}`);
  return slot;
}
