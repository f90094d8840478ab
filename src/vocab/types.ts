export const CASE_MODES = ["upper", "mixed", "exact", "camel"] as const;

export type CaseMode = (typeof CASE_MODES)[number];

export interface CaseRule {
  caseMode: CaseMode;
}

export interface Glossary {
  readonly canonicalMap: ReadonlyMap<string, readonly string[]>;
  readonly rules: ReadonlyMap<string, CaseRule>;
}

export interface Pattern {
  text: string;           // normalized, case-folded alias
  canonical: string;
  priority: number;
  caseMode: CaseMode;
}

export interface Occurrence {
  start: number;          // normalized-text offset
  end: number;            // exclusive
  canonical: string;
  priority: number;
  caseMode: CaseMode;
}

/** An accepted occurrence. Spans of one result are disjoint and sorted by start. */
export type Span = Occurrence;

export interface NormalizedText {
  text: string;
  indexMap: number[];
}

export interface SkippedAlias {
  canonical: string;
  alias: string;
  reason: "empty" | "duplicate";
}

export type CorrectionOutcome = "empty-glossary" | "unchanged" | "corrected" | "timeout";

export type CorrectionPhase = "normalize" | "match";

export interface CorrectionReport {
  text: string;
  outcome: CorrectionOutcome;
  spans: Span[];
  elapsedMs: number;
  phase?: CorrectionPhase;  // set on timeout
}

export interface Logger {
  (message: string, ...rest: unknown[]): void;
}

export const silentLogger: Logger = () => undefined;
