import process from "node:process";
import { parseArgs } from "node:util";
import { DEFAULT_BUDGET_MS } from "./constants.js";
import { isCaseMode } from "./glossary-file.js";
import { ConfigError } from "../utils/errors.js";
import type { Command, ParseResult } from "../types.js";

function parseBudget(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || Number.isNaN(parsed) || parsed < 0) {
    throw new ConfigError(
      "INVALID_BUDGET",
      `Invalid budget "${value}". Use a non-negative number of milliseconds.`
    );
  }
  return parsed;
}

function isTruthy(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

export function parseConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): ParseResult {
  const {
    values: {
      text,
      config,
      budget,
      debug,
      list,
      lint,
      add,
      alias,
      case: caseValue,
      remove,
      "no-letter-spacing": noLetterSpacing,
    },
  } = parseArgs({
    args: argv,
    options: {
      text: { type: "string", short: "t" },
      config: { type: "string", short: "c" },
      budget: {
        type: "string",
        default: env["VOCAB_BUDGET_MS"] ?? String(DEFAULT_BUDGET_MS),
      },
      debug: { type: "boolean", default: isTruthy(env["DEBUG"]) },
      list: { type: "boolean", default: false },
      lint: { type: "boolean", default: false },
      add: { type: "string" },
      alias: { type: "string", multiple: true },
      case: { type: "string", default: "mixed" },
      remove: { type: "string" },
      "no-letter-spacing": { type: "boolean", default: false },
    },
    allowPositionals: false,
  });

  const caseMode = caseValue ?? "mixed";
  if (!isCaseMode(caseMode)) {
    throw new ConfigError(
      "INVALID_CASE_MODE",
      `Unsupported case mode "${caseMode}". Use "upper", "mixed", "exact" or "camel".`
    );
  }

  let command: Command;
  if (add !== undefined) {
    command = { kind: "add", canonical: add, aliases: alias ?? [], caseMode };
  } else if (remove !== undefined) {
    command = { kind: "remove", canonical: remove };
  } else if (list) {
    command = { kind: "list" };
  } else if (lint) {
    command = { kind: "lint" };
  } else {
    command = { kind: "correct", text };
  }

  return {
    config: {
      glossaryPath: config ?? env["VOCAB_CONFIG"],
      budgetMs: parseBudget(budget ?? String(DEFAULT_BUDGET_MS)),
      debug: debug ?? false,
      collapseLetterSpacing: !(noLetterSpacing ?? false),
    },
    command,
  };
}
