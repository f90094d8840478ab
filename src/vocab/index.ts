/**
 * Vocabulary correction engine.
 *
 * Rewrites transcribed speech by replacing spoken aliases ("git hub",
 * "claude m d") with canonical written forms ("GitHub", "CLAUDE.md").
 *
 * Pure library code - no file or network access.
 */

export {
  correct,
  correctWithReport,
  correctWithSnapshot,
  applySpans,
  VocabularyCorrector,
  type CorrectOptions,
  type CorrectorSnapshot,
  type VocabularyCorrectorOptions,
} from "./corrector.js";
export {
  createGlossary,
  emptyGlossary,
  withTerm,
  withoutTerm,
  glossaryToRecord,
  caseModeFor,
  DEFAULT_GLOSSARY,
  type VocabularyRecord,
  type RulesRecord,
} from "./glossary.js";
export { normalize, foldCase, type NormalizeOptions } from "./normalizer.js";
export {
  buildPatternIndex,
  searchPatterns,
  normalizeAlias,
  patternPriority,
  type PatternIndex,
  type BuildOptions,
} from "./pattern-index.js";
export { resolveOverlaps, requiresWordBoundaries, hasWordBoundaries } from "./overlap.js";
export { renderCase } from "./case.js";
export { lintGlossary, type GlossaryIssue, type IssueCode, type IssueSeverity } from "./lint.js";
export {
  CASE_MODES,
  silentLogger,
  type Logger,
  type CaseMode,
  type CaseRule,
  type Glossary,
  type Pattern,
  type Occurrence,
  type Span,
  type NormalizedText,
  type SkippedAlias,
  type CorrectionOutcome,
  type CorrectionPhase,
  type CorrectionReport,
} from "./types.js";
