export const APP_NAME = "vocab-fix";

export const DEFAULT_BUDGET_MS = 30;

// Pattern priority bases; alias length is added on top
export const MULTI_WORD_PRIORITY_BASE = 100;
export const SINGLE_WORD_PRIORITY_BASE = 50;

// "a p i" -> "api" only from this many spaced letters up
export const MIN_LETTER_RUN = 3;

export const TRAILING_PUNCTUATION = ".,!?;:'\")";

// Canonical terms containing one of these match without word boundaries
export const BOUNDARY_EXEMPT_CHARS = ".-_";

export const GLOSSARY_FILE_VERSION = "1.0";
export const GLOSSARY_FILE_NAMES = ["vocabulary.jsonc", "vocabulary.json"] as const;
export const DEFAULT_GLOSSARY_FILE_NAME = "vocabulary.json";

export const COLOR_CODES = {
  reset: "\u001B[0m",
  toHuman: "\u001B[36m", // cyan - status for operator
  match: "\u001B[33m", // yellow - replaced spans
  warn: "\u001B[35m",
  error: "\u001B[31m",
} as const;

export type ColorCode = (typeof COLOR_CODES)[keyof typeof COLOR_CODES];

export const ENABLE_COLOR =
  process.stdout.isTTY &&
  (process.env["NO_COLOR"] ?? "").toLowerCase() !== "1";
