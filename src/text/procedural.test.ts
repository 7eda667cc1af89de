import { describe, expect, it } from "vitest";
import { RandomSource } from "../core/random.js";
import { snippetViolations } from "../core/snippet.js";
import {
  MIN_FILLER_CLEARANCE,
  ProceduralTextProvider,
  bundledGrammar,
  fillerClearance,
  loadGrammar,
} from "./procedural.js";
import type { Grammar } from "./procedural.js";

const CHARS = { minChars: 50, maxChars: 80 };

function tinyGrammar(overrides: Partial<Grammar>): Grammar {
  const words = ["abcdefghij"];
  return {
    structures: ["{noun} {noun} {noun} {noun} {noun}."],
    phraseTemplates: ["{noun} {noun} {noun} {phrase} {noun} {noun}."],
    words: { noun: words, verb: words, adj: words, adv: words, prep: words, pronoun: words, det: words },
    padClauses: ["in truth"],
    padWords: ["so"],
    ...overrides,
  };
}

describe("loadGrammar", () => {
  it("loads the bundled word lists", () => {
    const grammar = loadGrammar();
    expect(grammar.structures.length).toBeGreaterThan(5);
    expect(grammar.words.noun).toContain("world");
    expect(grammar.padClauses).toContain("in the most unexpected way");
  });
});

describe("ProceduralTextProvider", () => {
  it("keeps a multi-word phrase on exactly one line within bounds", async () => {
    for (let seed = 1; seed <= 40; seed++) {
      const provider = new ProceduralTextProvider({ chars: CHARS, random: new RandomSource(seed) });
      const result = await provider.generate("Better Gaming Experience", 7, 12);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const snippet = result.value;
      expect(snippet.lines.length).toBeGreaterThanOrEqual(7);
      expect(snippet.lines.length).toBeLessThanOrEqual(12);
      expect(snippet.lines.filter((l) => l.includes("Better Gaming Experience"))).toHaveLength(1);
      expect(snippet.lines[snippet.highlightLineIndex]).toContain("Better Gaming Experience");
      expect(snippetViolations(snippet, "Better Gaming Experience", { minLines: 7, maxLines: 12 }, CHARS)).toEqual([]);
    }
  });

  it("places a single-word phrase into a sentence slot", () => {
    for (let seed = 1; seed <= 40; seed++) {
      const provider = new ProceduralTextProvider({ chars: CHARS, random: new RandomSource(seed) });
      const snippet = provider.generateSync("Nebula", 3, 5);
      expect(snippet.lines[snippet.highlightLineIndex]).toContain("Nebula");
      expect(snippetViolations(snippet, "Nebula", { minLines: 3, maxLines: 5 }, CHARS)).toEqual([]);
    }
  });

  it("is reproducible for a seed", () => {
    const a = new ProceduralTextProvider({ chars: CHARS, random: new RandomSource(77) });
    const b = new ProceduralTextProvider({ chars: CHARS, random: new RandomSource(77) });
    expect(a.generateSync("Match Cut", 7, 12)).toEqual(b.generateSync("Match Cut", 7, 12));
  });

  it("trims long lines without cutting into the phrase", () => {
    const provider = new ProceduralTextProvider({
      chars: { minChars: 20, maxChars: 35 },
      random: new RandomSource(1),
      grammar: tinyGrammar({}),
    });

    const snippet = provider.generateSync("Zed Zone", 2, 2);

    const filler = snippet.lines[1 - snippet.highlightLineIndex];
    expect(snippet.lines[snippet.highlightLineIndex]).toBe("Abcdefghij abcdefghij Zed Zone.");
    expect(filler).toBe("Abcdefghij abcdefghij abcdefghij.");
  });

  it("pads short lines with a trailing clause", () => {
    const provider = new ProceduralTextProvider({
      chars: { minChars: 20, maxChars: 40 },
      random: new RandomSource(1),
      grammar: tinyGrammar({
        structures: ["{noun}."],
        phraseTemplates: ["{phrase}."],
        words: { noun: ["cat"], verb: ["is"], adj: ["odd"], adv: ["so"], prep: ["in"], pronoun: ["it"], det: ["a"] },
        padClauses: ["right away today"],
      }),
    });

    const snippet = provider.generateSync("Zed Zone", 2, 2);

    expect(snippet.lines[snippet.highlightLineIndex]).toBe("Zed Zone right away today.");
    expect(snippet.lines[1 - snippet.highlightLineIndex]).toBe("Cat right away today.");
  });

  it("throws when no filler line can avoid the phrase", () => {
    const provider = new ProceduralTextProvider({
      chars: { minChars: 20, maxChars: 35 },
      random: new RandomSource(1),
      grammar: tinyGrammar({}),
    });
    expect(() => provider.generateSync("abcdefghij", 2, 2)).toThrow('Could not build a filler line free of "abcdefghij"');
  });
});

describe("fillerClearance", () => {
  const grammar = tinyGrammar({
    structures: ["{noun} {verb}.", "The {noun} sleeps."],
    words: {
      noun: ["cat", "dog"],
      verb: ["runs", "sits"],
      adj: ["x"],
      adv: ["x"],
      prep: ["x"],
      pronoun: ["x"],
      det: ["x"],
    },
    padClauses: ["and then some", "quietly"],
  });

  it("is 1 for a phrase the vocabulary never produces", () => {
    expect(fillerClearance("Match Cut", grammar)).toBe(1);
  });

  it("scales by the share of slot words that carry the phrase", () => {
    expect(fillerClearance("at", grammar)).toBe(0.5);
  });

  it("rules out structures whose fixed words carry the phrase", () => {
    expect(fillerClearance("sleeps", grammar)).toBe(0.5);
  });

  it("weighs padding clauses at half", () => {
    expect(fillerClearance("the", grammar)).toBe(0.75);
  });

  it("flags a single letter against the bundled grammar", () => {
    expect(fillerClearance("a", bundledGrammar())).toBeLessThan(MIN_FILLER_CLEARANCE);
    expect(fillerClearance("Match Cut", bundledGrammar())).toBe(1);
  });
});
