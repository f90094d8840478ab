/**
 * Vocabulary correction orchestrator.
 *
 * Runs normalize -> match -> resolve -> rewrite under a wall-clock budget.
 * Whenever a phase checkpoint is exceeded the original text is returned
 * untouched; partially rewritten text is never produced.
 */

import { performance } from "node:perf_hooks";
import { DEFAULT_BUDGET_MS } from "../config/constants.js";
import { renderCase } from "./case.js";
import { normalize } from "./normalizer.js";
import { resolveOverlaps } from "./overlap.js";
import { buildPatternIndex, searchPatterns, type BuildOptions, type PatternIndex } from "./pattern-index.js";
import {
  silentLogger,
  type CorrectionPhase,
  type CorrectionReport,
  type Glossary,
  type Logger,
  type Span,
} from "./types.js";

export interface CorrectOptions {
  budgetMs?: number;
  now?: () => number;
  log?: Logger;
}

export interface CorrectorSnapshot {
  readonly glossary: Glossary;
  readonly index: PatternIndex;
}

// === Rewriting ===

/**
 * Splice rendered canonical terms into the original text.
 * Span offsets are normalized offsets and are mapped through `indexMap`.
 */
export function applySpans(original: string, spans: readonly Span[], indexMap: readonly number[]): string {
  if (spans.length === 0) return original;

  let result = "";
  let cursor = 0;
  for (const span of spans) {
    const start = indexMap[span.start];
    const last = indexMap[span.end - 1];
    if (start === undefined || last === undefined) continue;

    result += original.slice(cursor, start);
    result += renderCase(span.canonical, span.caseMode);
    cursor = last + 1;
  }
  return result + original.slice(cursor);
}

// === Pipeline ===

export function correctWithSnapshot(
  text: string,
  snapshot: CorrectorSnapshot | undefined,
  options: CorrectOptions = {}
): CorrectionReport {
  const { now = () => performance.now(), log = silentLogger } = options;
  // NaN or a negative budget leaves no time at all
  const requested = options.budgetMs ?? DEFAULT_BUDGET_MS;
  const budgetMs = Number.isNaN(requested) || requested < 0 ? 0 : requested;
  const startedAt = now();
  const elapsed = (): number => now() - startedAt;

  if (!snapshot || snapshot.glossary.canonicalMap.size === 0) {
    return { text, outcome: "empty-glossary", spans: [], elapsedMs: elapsed() };
  }

  const timeout = (phase: CorrectionPhase): CorrectionReport => {
    const elapsedMs = elapsed();
    log(`[vocab] Timeout during ${phase} after ${elapsedMs.toFixed(1)}ms (budget ${budgetMs}ms)`);
    return { text, outcome: "timeout", spans: [], elapsedMs, phase };
  };

  // Phase 1: normalization
  const normalized = normalize(text, snapshot.index.normalizeOptions);
  if (elapsed() >= budgetMs / 4) {
    return timeout("normalize");
  }

  // Phase 2: matching and overlap resolution
  const occurrences = searchPatterns(snapshot.index, normalized.text);
  const spans = resolveOverlaps(occurrences, normalized.text);
  if (elapsed() >= (budgetMs * 3) / 4) {
    return timeout("match");
  }

  // Phase 3: rewrite against the original text
  const corrected = applySpans(text, spans, normalized.indexMap);
  const elapsedMs = elapsed();
  log(`[vocab] Completed in ${elapsedMs.toFixed(1)}ms, ${spans.length} replacement(s)`);

  return {
    text: corrected,
    outcome: corrected === text ? "unchanged" : "corrected",
    spans,
    elapsedMs,
  };
}

// === Stateless API ===

const indexCache = new WeakMap<Glossary, PatternIndex>();

function snapshotFor(glossary: Glossary): CorrectorSnapshot {
  let index = indexCache.get(glossary);
  if (!index) {
    index = buildPatternIndex(glossary);
    indexCache.set(glossary, index);
  }
  return { glossary, index };
}

export function correctWithReport(
  text: string,
  glossary: Glossary,
  options: CorrectOptions = {}
): CorrectionReport {
  return correctWithSnapshot(text, snapshotFor(glossary), options);
}

/**
 * Replace spoken aliases in `text` with their canonical terms.
 * Pattern indexes are cached per glossary value.
 */
export function correct(text: string, glossary: Glossary, budgetMs = DEFAULT_BUDGET_MS): string {
  return correctWithReport(text, glossary, { budgetMs }).text;
}

// === Reloadable corrector ===

export interface VocabularyCorrectorOptions extends Omit<BuildOptions, "onSkip"> {
  log?: Logger;
  now?: () => number;
}

/**
 * Long-lived corrector for a host pipeline.
 *
 * `load` builds a fresh index and swaps the snapshot reference; calls already
 * running keep the snapshot they started with.
 */
export class VocabularyCorrector {
  private snapshot: CorrectorSnapshot | undefined;
  private readonly log: Logger;
  private readonly now: (() => number) | undefined;
  private readonly buildOptions: Omit<BuildOptions, "onSkip">;

  constructor(options: VocabularyCorrectorOptions = {}) {
    const { log = silentLogger, now, ...buildOptions } = options;
    this.log = log;
    this.now = now;
    this.buildOptions = buildOptions;
  }

  load(glossary: Glossary): PatternIndex {
    const index = buildPatternIndex(glossary, {
      ...this.buildOptions,
      onSkip: (skipped) =>
        this.log(`[vocab] Skipped ${skipped.reason} alias "${skipped.alias}" for "${skipped.canonical}"`),
    });
    this.snapshot = Object.freeze({ glossary, index });
    this.log(
      `[vocab] Loaded ${glossary.canonicalMap.size} canonical terms, ${index.patterns.length} patterns`
    );
    return index;
  }

  get current(): CorrectorSnapshot | undefined {
    return this.snapshot;
  }

  correctWithReport(text: string, budgetMs = DEFAULT_BUDGET_MS): CorrectionReport {
    const options: CorrectOptions = { budgetMs, log: this.log };
    if (this.now) {
      options.now = this.now;
    }
    return correctWithSnapshot(text, this.snapshot, options);
  }

  correct(text: string, budgetMs = DEFAULT_BUDGET_MS): string {
    return this.correctWithReport(text, budgetMs).text;
  }
}
