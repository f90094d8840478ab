/**
 * Error types for vocab-fix.
 *
 * The correction engine itself never throws; these cover the glossary file
 * and the command line.
 */

export class VocabError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "VocabError";
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Glossary file and argument errors (reading, parsing, validation).
 */
export class ConfigError extends VocabError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "ConfigError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
