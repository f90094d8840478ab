import { describe, it, expect } from "vitest";
import { hasWordBoundaries, requiresWordBoundaries, resolveOverlaps } from "../../../src/vocab/overlap.js";
import type { Occurrence } from "../../../src/vocab/types.js";

function occurrence(start: number, end: number, canonical: string, priority = 50): Occurrence {
  return { start, end, canonical, priority, caseMode: "mixed" };
}

describe("requiresWordBoundaries", () => {
  it("exempts terms containing dot, hyphen or underscore", () => {
    expect(requiresWordBoundaries("GitHub")).toBe(true);
    expect(requiresWordBoundaries("Visual Studio")).toBe(true);
    expect(requiresWordBoundaries("CLAUDE.md")).toBe(false);
    expect(requiresWordBoundaries("git-hub")).toBe(false);
    expect(requiresWordBoundaries("snake_case")).toBe(false);
  });
});

describe("hasWordBoundaries", () => {
  it("accepts text edges and non-word neighbours", () => {
    expect(hasWordBoundaries("api", 0, 3)).toBe(true);
    expect(hasWordBoundaries("(api)", 1, 4)).toBe(true);
    expect(hasWordBoundaries("apiary", 0, 3)).toBe(false);
    expect(hasWordBoundaries("myapi", 2, 5)).toBe(false);
    expect(hasWordBoundaries("éapi", 1, 4)).toBe(false);
  });
});

describe("resolveOverlaps", () => {
  it("drops occurrences inside words", () => {
    expect(resolveOverlaps([occurrence(0, 3, "API")], "apiary")).toEqual([]);
  });

  it("keeps boundary-exempt terms inside words", () => {
    const hit = occurrence(2, 11, "CLAUDE.md");

    expect(resolveOverlaps([hit], "myclaude.mdx")).toEqual([hit]);
  });

  it("prefers the longest occurrence at the same start", () => {
    const short = occurrence(0, 6, "Claude", 56);
    const long = occurrence(0, 10, "CLAUDE.md", 60);

    expect(resolveOverlaps([short, long], "claude m d")).toEqual([long]);
  });

  it("prefers higher priority among equal lengths", () => {
    const low = occurrence(0, 3, "Git", 53);
    const high = occurrence(0, 3, "Git Tool", 103);

    expect(resolveOverlaps([low, high], "git")).toEqual([high]);
  });

  it("breaks full ties by canonical term", () => {
    const b = occurrence(0, 3, "Beta");
    const a = occurrence(0, 3, "Alpha");

    expect(resolveOverlaps([b, a], "abc")).toEqual([a]);
  });

  it("gives the earliest start first refusal", () => {
    const first = occurrence(0, 7, "GitHub", 57);
    const second = occurrence(4, 11, "Hub Pro", 107);
    const third = occurrence(12, 15, "API", 53);

    expect(resolveOverlaps([third, second, first], "git hub pro api")).toEqual([first, third]);
  });

  it("always yields sorted, disjoint spans", () => {
    let seed = 7;
    const random = (max: number): number => {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      return seed % max;
    };
    const text = "x".repeat(80);
    const occurrences: Occurrence[] = [];
    for (let i = 0; i < 200; i++) {
      const start = random(75);
      occurrences.push(occurrence(start, start + 1 + random(5), `T${random(4)}.x`, random(120)));
    }

    const spans = resolveOverlaps(occurrences, text);

    expect(spans.length).toBeGreaterThan(0);
    for (let i = 1; i < spans.length; i++) {
      const previous = spans[i - 1];
      const current = spans[i];
      expect(previous && current && previous.end <= current.start).toBe(true);
    }
  });
});
