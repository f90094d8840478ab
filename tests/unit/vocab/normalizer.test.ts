import { describe, it, expect } from "vitest";
import { charBefore, foldCase, isWordChar, normalize } from "../../../src/vocab/normalizer.js";

describe("normalize", () => {
  it("collapses whitespace runs and trims both ends", () => {
    const result = normalize("  use   github\tnow \n");

    expect(result.text).toBe("use github now");
    expect(result.indexMap).toEqual([2, 3, 4, 5, 8, 9, 10, 11, 12, 13, 14, 15, 16, 17]);
  });

  it("maps every normalized position back to the original text", () => {
    const original = "one\n\ntwo   three";
    const { text, indexMap } = normalize(original);

    expect(text).toBe("one two three");
    for (let i = 0; i < text.length; i++) {
      const char = text.charAt(i);
      const source = original.charAt(indexMap[i] ?? -1);
      expect(char === " " ? /\s/.test(source) : source === char).toBe(true);
    }
  });

  it("collapses three or more spelled-out letters", () => {
    const result = normalize("call a p i now");

    expect(result.text).toBe("call api now");
    expect(result.indexMap).toEqual([0, 1, 2, 3, 4, 5, 7, 9, 10, 11, 12, 13]);
  });

  it("collapses letters followed by punctuation", () => {
    const result = normalize("a p i!!!");

    expect(result.text).toBe("api!!!");
    expect(result.indexMap).toEqual([0, 2, 4, 5, 6, 7]);
  });

  it("leaves runs of two letters alone", () => {
    expect(normalize("a b test").text).toBe("a b test");
    expect(normalize("claude m d").text).toBe("claude m d");
  });

  it("merges a one-letter word next to a spelled run into the run", () => {
    expect(normalize("use s s h a lot").text).toBe("use ssha lot");
    expect(normalize("I a p i").text).toBe("Iapi");
  });

  it("can skip letter-spacing collapse", () => {
    expect(normalize("a p i", { collapseLetterSpacing: false }).text).toBe("a p i");
  });

  it("handles empty and whitespace-only input", () => {
    expect(normalize("")).toEqual({ text: "", indexMap: [] });
    expect(normalize(" \t\n ")).toEqual({ text: "", indexMap: [] });
  });

  it("copies surrogate pairs unit by unit", () => {
    const result = normalize("go 🚀 now");

    expect(result.text).toBe("go 🚀 now");
    expect(result.indexMap).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
  });
});

describe("foldCase", () => {
  it("lower-cases text", () => {
    expect(foldCase("GitHub API")).toBe("github api");
  });

  it("keeps characters whose lower case changes length", () => {
    const folded = foldCase("İSTANBUL");

    expect(folded).toBe("İstanbul");
    expect(folded.length).toBe("İSTANBUL".length);
  });
});

describe("word characters", () => {
  it("treats letters, digits and underscore as word characters", () => {
    expect(isWordChar("a")).toBe(true);
    expect(isWordChar("é")).toBe(true);
    expect(isWordChar("7")).toBe(true);
    expect(isWordChar("_")).toBe(true);
    expect(isWordChar(".")).toBe(false);
    expect(isWordChar(undefined)).toBe(false);
  });

  it("reads whole surrogate pairs before an index", () => {
    expect(charBefore("a🚀b", 3)).toBe("🚀");
    expect(charBefore("ab", 0)).toBeUndefined();
  });
});
