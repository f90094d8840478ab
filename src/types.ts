import type { CaseMode } from "./vocab/types.js";

export interface Config {
  glossaryPath: string | undefined;
  budgetMs: number;
  debug: boolean;
  collapseLetterSpacing: boolean;
}

export type Command =
  | { kind: "correct"; text: string | undefined }
  | { kind: "list" }
  | { kind: "lint" }
  | { kind: "add"; canonical: string; aliases: string[]; caseMode: CaseMode }
  | { kind: "remove"; canonical: string };

export interface ParseResult {
  config: Config;
  command: Command;
}
