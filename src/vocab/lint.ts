/**
 * Glossary lint.
 *
 * Flags entries that would silently misbehave at correction time. Nothing
 * here changes the glossary.
 */

import { removeStopwords } from "stopword";
import { normalizeAlias } from "./pattern-index.js";
import type { Glossary } from "./types.js";

export type IssueSeverity = "error" | "warn";

export type IssueCode =
  | "empty-alias"
  | "no-aliases"
  | "stopword-alias"
  | "shared-alias"
  | "retrigger"
  | "orphan-rule";

export interface GlossaryIssue {
  severity: IssueSeverity;
  code: IssueCode;
  canonical: string;
  alias?: string;
  message: string;
}

/**
 * True when every word of the alias is a common English word.
 */
function isStopwordAlias(normalizedAlias: string): boolean {
  const words = normalizedAlias.split(" ").filter((w) => w.length > 0);
  return words.length > 0 && removeStopwords(words).length === 0;
}

export function lintGlossary(glossary: Glossary): GlossaryIssue[] {
  const issues: GlossaryIssue[] = [];
  const owners = new Map<string, Set<string>>();

  for (const [canonical, aliases] of glossary.canonicalMap) {
    if (aliases.length === 0) {
      issues.push({
        severity: "warn",
        code: "no-aliases",
        canonical,
        message: `"${canonical}" has no aliases and will never match`,
      });
    }

    for (const alias of aliases) {
      const normalized = normalizeAlias(alias);
      if (!normalized) {
        issues.push({
          severity: "error",
          code: "empty-alias",
          canonical,
          alias,
          message: `Empty alias for "${canonical}"`,
        });
        continue;
      }

      if (isStopwordAlias(normalized)) {
        issues.push({
          severity: "warn",
          code: "stopword-alias",
          canonical,
          alias,
          message: `Alias "${alias}" is a common word and will rewrite ordinary speech`,
        });
      }

      const owner = owners.get(normalized) ?? new Set<string>();
      owner.add(canonical);
      owners.set(normalized, owner);
    }
  }

  for (const [alias, canonicals] of owners) {
    if (canonicals.size > 1) {
      const names = [...canonicals].sort();
      issues.push({
        severity: "warn",
        code: "shared-alias",
        canonical: names[0] ?? "",
        alias,
        message: `Alias "${alias}" maps to several terms: ${names.join(", ")}`,
      });
    }
  }

  for (const canonical of glossary.canonicalMap.keys()) {
    const normalized = normalizeAlias(canonical);
    const others = [...(owners.get(normalized) ?? [])].filter((c) => c !== canonical);
    if (others.length > 0) {
      issues.push({
        severity: "warn",
        code: "retrigger",
        canonical,
        alias: normalized,
        message: `"${canonical}" is itself an alias of ${others.sort().join(", ")}; corrected text would be rewritten again`,
      });
    }
  }

  for (const canonical of glossary.rules.keys()) {
    if (!glossary.canonicalMap.has(canonical)) {
      issues.push({
        severity: "warn",
        code: "orphan-rule",
        canonical,
        message: `Case rule for "${canonical}" has no vocabulary entry`,
      });
    }
  }

  return issues;
}
