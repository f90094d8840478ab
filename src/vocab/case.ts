import type { CaseMode } from "./types.js";

const WORD_SEPARATORS = /[\s\-_]+/;

function toCamelCase(canonical: string): string {
  const words = canonical.split(WORD_SEPARATORS).filter((w) => w.length > 0);
  return words
    .map((word, index) => {
      const first = word.charAt(0);
      const head = index === 0 ? first.toLowerCase() : first.toUpperCase();
      return head + word.slice(1);
    })
    .join("");
}

/**
 * Render a canonical term for its case mode.
 *
 * `mixed` and `exact` both emit the term as stored; `camel` lower-cases the
 * first character and joins words ("json web token" -> "jsonWebToken").
 */
export function renderCase(canonical: string, caseMode: CaseMode): string {
  switch (caseMode) {
    case "upper":
      return canonical.toUpperCase();
    case "mixed":
    case "exact":
      return canonical;
    case "camel":
      return toCamelCase(canonical);
    default:
      // Modes outside the union (untyped callers) render as stored
      caseMode satisfies never;
      return canonical;
  }
}
