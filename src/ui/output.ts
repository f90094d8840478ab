import { COLOR_CODES } from "../config/constants.js";
import { colorize } from "./logger.js";
import { truncateMiddle } from "../utils/strings.js";
import { caseModeFor } from "../vocab/glossary.js";
import type { GlossaryIssue } from "../vocab/lint.js";
import type { CorrectionReport, Glossary } from "../vocab/types.js";

const REPORT_TEXT_LIMIT = 120;

/**
 * One line per term, sorted: `GitHub [mixed] <- git hub, github`.
 */
export function formatTermList(glossary: Glossary): string[] {
  return [...glossary.canonicalMap.keys()]
    .sort((a, b) => a.localeCompare(b))
    .map((canonical) => {
      const aliases = glossary.canonicalMap.get(canonical) ?? [];
      return `${canonical} [${caseModeFor(glossary, canonical)}] <- ${aliases.join(", ")}`;
    });
}

export function formatIssue(issue: GlossaryIssue): string {
  const label = issue.severity === "error" ? "error" : "warn ";
  const color = issue.severity === "error" ? COLOR_CODES.error : COLOR_CODES.warn;
  return `${colorize(label, color)} ${issue.code}: ${issue.message}`;
}

export function formatReport(original: string, report: CorrectionReport): string[] {
  const lines = [
    `[vocab] outcome=${report.outcome} spans=${report.spans.length} elapsed=${report.elapsedMs.toFixed(1)}ms`,
  ];
  if (report.phase) {
    lines.push(`[vocab] timed out in ${report.phase}`);
  }
  lines.push(`[vocab] input:  ${truncateMiddle(original, REPORT_TEXT_LIMIT)}`);
  for (const span of report.spans) {
    lines.push(
      `[vocab]   ${span.start}-${span.end} -> ${colorize(span.canonical, COLOR_CODES.match)} (priority ${span.priority}, ${span.caseMode})`
    );
  }
  return lines;
}
