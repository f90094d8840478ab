import { BOUNDARY_EXEMPT_CHARS } from "../config/constants.js";
import { charAt, charBefore, isWordChar } from "./normalizer.js";
import type { Occurrence, Span } from "./types.js";

/**
 * Terms with `.`, `-` or `_` ("CLAUDE.md", "git-hub") may match inside words.
 */
export function requiresWordBoundaries(canonical: string): boolean {
  return ![...BOUNDARY_EXEMPT_CHARS].some((char) => canonical.includes(char));
}

export function hasWordBoundaries(text: string, start: number, end: number): boolean {
  return !isWordChar(charBefore(text, start)) && !isWordChar(charAt(text, end));
}

function compareOccurrences(a: Occurrence, b: Occurrence): number {
  if (a.start !== b.start) return a.start - b.start;
  const lengthA = a.end - a.start;
  const lengthB = b.end - b.start;
  if (lengthA !== lengthB) return lengthB - lengthA;
  if (a.priority !== b.priority) return b.priority - a.priority;
  // Glossary iteration order must not decide the winner
  if (a.canonical < b.canonical) return -1;
  if (a.canonical > b.canonical) return 1;
  return 0;
}

/**
 * Reduce raw occurrences to disjoint spans sorted by start.
 *
 * 1. Drops occurrences that need word boundaries and lack them
 * 2. Orders by start, then longest, then highest priority
 * 3. Greedily accepts every occurrence starting at or after the last accepted end
 */
export function resolveOverlaps(occurrences: readonly Occurrence[], text: string): Span[] {
  const candidates = occurrences.filter(
    (o) => !requiresWordBoundaries(o.canonical) || hasWordBoundaries(text, o.start, o.end)
  );
  candidates.sort(compareOccurrences);

  const spans: Span[] = [];
  let lastEnd = 0;
  for (const occurrence of candidates) {
    if (occurrence.start >= lastEnd) {
      spans.push(occurrence);
      lastEnd = occurrence.end;
    }
  }
  return spans;
}
