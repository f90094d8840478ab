/**
 * Pattern index and matcher.
 *
 * Every (alias, canonical) pair of a glossary becomes one pattern in a shared
 * Aho-Corasick automaton. The index is read-only once built and may be shared
 * by any number of corrections.
 */

import {
  MULTI_WORD_PRIORITY_BASE,
  SINGLE_WORD_PRIORITY_BASE,
  TRAILING_PUNCTUATION,
} from "../config/constants.js";
import { AhoCorasickAutomaton } from "./automaton.js";
import { caseModeFor } from "./glossary.js";
import { foldCase, normalize, type NormalizeOptions } from "./normalizer.js";
import type { Glossary, Occurrence, Pattern, SkippedAlias } from "./types.js";

export interface PatternIndex {
  readonly patterns: readonly Pattern[];
  readonly skipped: readonly SkippedAlias[];
  readonly normalizeOptions: NormalizeOptions;
  readonly automaton: AhoCorasickAutomaton<Pattern>;
}

export interface BuildOptions extends NormalizeOptions {
  onSkip?: (skipped: SkippedAlias) => void;
}

/**
 * Priority of an alias: multi-word canonical terms always outrank
 * single-word ones, then longer aliases outrank shorter ones.
 */
export function patternPriority(canonical: string, normalizedAlias: string): number {
  const base = canonical.includes(" ") ? MULTI_WORD_PRIORITY_BASE : SINGLE_WORD_PRIORITY_BASE;
  return base + normalizedAlias.length;
}

/**
 * Normalize an alias the same way input text is normalized, then case-fold it.
 */
export function normalizeAlias(alias: string, options: NormalizeOptions = {}): string {
  return foldCase(normalize(alias, options).text);
}

export function buildPatternIndex(glossary: Glossary, options: BuildOptions = {}): PatternIndex {
  const { onSkip, ...normalizeOptions } = options;
  const patterns: Pattern[] = [];
  const skipped: SkippedAlias[] = [];

  const skip = (entry: SkippedAlias): void => {
    skipped.push(entry);
    onSkip?.(entry);
  };

  for (const [canonical, aliases] of glossary.canonicalMap) {
    const caseMode = caseModeFor(glossary, canonical);
    const seen = new Set<string>();

    for (const alias of aliases) {
      const text = normalizeAlias(alias, normalizeOptions);
      if (text.length === 0) {
        skip({ canonical, alias, reason: "empty" });
        continue;
      }
      if (seen.has(text)) {
        skip({ canonical, alias, reason: "duplicate" });
        continue;
      }
      seen.add(text);
      patterns.push({ text, canonical, priority: patternPriority(canonical, text), caseMode });
    }
  }

  const automaton = new AhoCorasickAutomaton(
    patterns.map((pattern) => ({ text: pattern.text, value: pattern }))
  );

  return Object.freeze({
    patterns: Object.freeze(patterns),
    skipped: Object.freeze(skipped),
    normalizeOptions: Object.freeze({ ...normalizeOptions }),
    automaton,
  });
}

export function stripTrailingPunctuation(text: string): string {
  let end = text.length;
  while (end > 0 && TRAILING_PUNCTUATION.includes(text.charAt(end - 1))) {
    end--;
  }
  return text.slice(0, end);
}

function scan(index: PatternIndex, text: string): Occurrence[] {
  return index.automaton.search(foldCase(text)).map((hit) => ({
    start: hit.start,
    end: hit.end,
    canonical: hit.value.canonical,
    priority: hit.value.priority,
    caseMode: hit.value.caseMode,
  }));
}

/**
 * Find every occurrence of every pattern in normalized text.
 *
 * Overlapping and nested hits are all returned. When nothing is found the
 * text is scanned once more without its trailing punctuation; offsets are
 * unaffected since only trailing characters are removed.
 */
export function searchPatterns(index: PatternIndex, normalizedText: string): Occurrence[] {
  const occurrences = scan(index, normalizedText);
  if (occurrences.length > 0) return occurrences;

  const stripped = stripTrailingPunctuation(normalizedText);
  if (stripped.length === normalizedText.length) return occurrences;
  return scan(index, stripped);
}
