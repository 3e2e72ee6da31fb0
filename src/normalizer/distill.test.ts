import { describe, expect, it } from "vitest";

import { loadLexicon } from "../lexicon/index.js";
import { distillIdea, tokenOverlap } from "./distill.js";

const en = loadLexicon("en");
const es = loadLexicon("es");

describe("tokenOverlap", () => {
  it("counts shared meaningful tokens against the idea", () => {
    const stopwords = new Set(en.stopwords);
    expect(tokenOverlap("fresh bread and milk", "buy fresh bread", stopwords)).toBeCloseTo(2 / 3, 10);
  });

  it("is zero when the note has no meaningful tokens", () => {
    expect(tokenOverlap("bread", "the a an", new Set(en.stopwords))).toBe(0);
  });
});

describe("distillIdea", () => {
  it("strips a leading filler phrase", () => {
    expect(distillIdea("I want to learn guitar", "I want to learn guitar", en)).toBe("learn guitar");
    expect(distillIdea("quiero aprender guitarra", "quiero aprender guitarra", es)).toBe("aprender guitarra");
  });

  it("reduces a near-copy of the note to its first four meaningful words", () => {
    const note = "buy fresh bread at the corner bakery today";
    expect(distillIdea("buy fresh bread at the corner bakery", note, en)).toBe("buy fresh bread corner");
  });

  it("caps unrelated long ideas at five words", () => {
    expect(distillIdea("quantum physics lecture notes from last semester", "study", en)).toBe(
      "quantum physics lecture notes from"
    );
  });

  it("drops leftovers of a creation command", () => {
    expect(distillIdea("create a group for movies", "create a group for movies", en)).toBeNull();
    expect(distillIdea("el subgrupo de series", "crea el subgrupo de series", es)).toBeNull();
  });

  it("drops ideas that lead with a command verb", () => {
    expect(distillIdea("add milk", "add milk to the list", en)).toBeNull();
    expect(distillIdea("añade pan", "añade pan a compras", es)).toBeNull();
  });

  it("drops an idea that repeats the note, however short", () => {
    expect(distillIdea("leche", "leche", es)).toBeNull();
    expect(distillIdea("Ver  Dune mañana", "ver Dune mañana", es)).toBeNull();
  });

  it("keeps a short idea taken from a longer note", () => {
    expect(distillIdea("leche", "leche de avena", es)).toBe("leche");
  });

  it("returns null for missing or blank ideas", () => {
    expect(distillIdea(null, "anything", en)).toBeNull();
    expect(distillIdea("   ", "anything", en)).toBeNull();
  });
});
