/**
 * Glossary snapshots.
 *
 * A glossary is never mutated: every edit returns a new frozen value, and
 * consumers rebuild their pattern index from it.
 */

import type { CaseMode, CaseRule, Glossary } from "./types.js";

export type VocabularyRecord = Record<string, string[]>;
export type RulesRecord = Record<string, CaseRule>;

function freeze(
  canonicalMap: Map<string, readonly string[]>,
  rules: Map<string, CaseRule>
): Glossary {
  return Object.freeze({ canonicalMap, rules });
}

export function createGlossary(
  vocabulary: VocabularyRecord,
  rules: RulesRecord = {}
): Glossary {
  const canonicalMap = new Map<string, readonly string[]>();
  for (const [canonical, aliases] of Object.entries(vocabulary)) {
    canonicalMap.set(canonical, Object.freeze([...aliases]));
  }
  const ruleMap = new Map<string, CaseRule>();
  for (const [canonical, rule] of Object.entries(rules)) {
    ruleMap.set(canonical, Object.freeze({ caseMode: rule.caseMode }));
  }
  return freeze(canonicalMap, ruleMap);
}

export function emptyGlossary(): Glossary {
  return freeze(new Map(), new Map());
}

export function caseModeFor(glossary: Glossary, canonical: string): CaseMode {
  return glossary.rules.get(canonical)?.caseMode ?? "mixed";
}

/**
 * Add or replace a term. Without aliases the lower-cased canonical is used.
 */
export function withTerm(
  glossary: Glossary,
  canonical: string,
  aliases: readonly string[] = [],
  caseMode: CaseMode = "mixed"
): Glossary {
  const canonicalMap = new Map(glossary.canonicalMap);
  const rules = new Map(glossary.rules);
  canonicalMap.set(
    canonical,
    Object.freeze(aliases.length > 0 ? [...aliases] : [canonical.toLowerCase()])
  );
  rules.set(canonical, Object.freeze({ caseMode }));
  return freeze(canonicalMap, rules);
}

export function withoutTerm(glossary: Glossary, canonical: string): Glossary {
  const canonicalMap = new Map(glossary.canonicalMap);
  const rules = new Map(glossary.rules);
  canonicalMap.delete(canonical);
  rules.delete(canonical);
  return freeze(canonicalMap, rules);
}

export function glossaryToRecord(glossary: Glossary): {
  vocabulary: VocabularyRecord;
  rules: RulesRecord;
} {
  const vocabulary: VocabularyRecord = {};
  for (const [canonical, aliases] of glossary.canonicalMap) {
    vocabulary[canonical] = [...aliases];
  }
  const rules: RulesRecord = {};
  for (const [canonical, rule] of glossary.rules) {
    rules[canonical] = { caseMode: rule.caseMode };
  }
  return { vocabulary, rules };
}

// === Defaults ===

export const DEFAULT_GLOSSARY: Glossary = createGlossary(
  {
    API: ["a p i", "api"],
    GitHub: ["git hub", "github", "git-hub"],
    OAuth: ["o auth", "oauth", "o-auth"],
    TypeScript: ["type script", "typescript", "type-script"],
    "CLAUDE.md": ["claude md", "cloutmd", "cloude.md", "claude.md"],
    SSH: ["s s h", "ssh"],
    URL: ["u r l", "url"],
    SQL: ["s q l", "sql"],
    JWT: ["j w t", "jwt"],
    JSON: ["j s o n", "json"],
    HTML: ["h t m l", "html"],
    CSS: ["c s s", "css"],
    HTTP: ["h t t p", "http"],
    HTTPS: ["h t t p s", "https"],
    CLI: ["c l i", "cli"],
  },
  {
    API: { caseMode: "upper" },
    GitHub: { caseMode: "mixed" },
    OAuth: { caseMode: "mixed" },
    TypeScript: { caseMode: "mixed" },
    "CLAUDE.md": { caseMode: "exact" },
    SSH: { caseMode: "upper" },
    URL: { caseMode: "upper" },
    SQL: { caseMode: "upper" },
    JWT: { caseMode: "upper" },
    JSON: { caseMode: "upper" },
    HTML: { caseMode: "upper" },
    CSS: { caseMode: "upper" },
    HTTP: { caseMode: "upper" },
    HTTPS: { caseMode: "upper" },
    CLI: { caseMode: "upper" },
  }
);
