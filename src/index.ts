#!/usr/bin/env node
import "dotenv/config";
import process from "node:process";

import { parseConfig } from "./config/parser.js";
import {
  loadGlossaryFile,
  resolveGlossaryPath,
  saveGlossaryFile,
} from "./config/glossary-file.js";
import { createLoggers, type Loggers } from "./ui/logger.js";
import { formatIssue, formatReport, formatTermList } from "./ui/output.js";
import { VocabError, describeError } from "./utils/errors.js";
import {
  VocabularyCorrector,
  lintGlossary,
  withTerm,
  withoutTerm,
} from "./vocab/index.js";
import type { Config, Command } from "./types.js";

async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) return "";
  process.stdin.setEncoding("utf8");
  let data = "";
  for await (const chunk of process.stdin) {
    data += String(chunk);
  }
  return data;
}

async function run(config: Config, command: Command, loggers: Loggers): Promise<number> {
  const glossaryPath = await resolveGlossaryPath(config.glossaryPath);
  loggers.agentLog(`[agent] Glossary: ${glossaryPath}`);
  const glossary = await loadGlossaryFile(glossaryPath);

  switch (command.kind) {
    case "list": {
      for (const line of formatTermList(glossary)) {
        loggers.resultLog(line);
      }
      return 0;
    }

    case "lint": {
      const issues = lintGlossary(glossary);
      for (const issue of issues) {
        loggers.resultLog(formatIssue(issue));
      }
      loggers.agentLog(`[agent] ${issues.length} issue(s)`);
      return issues.some((issue) => issue.severity === "error") ? 1 : 0;
    }

    case "add": {
      await saveGlossaryFile(
        glossaryPath,
        withTerm(glossary, command.canonical, command.aliases, command.caseMode)
      );
      loggers.resultLog(`Added "${command.canonical}" (${command.caseMode})`);
      return 0;
    }

    case "remove": {
      if (!glossary.canonicalMap.has(command.canonical)) {
        loggers.agentWarn(`No term "${command.canonical}" in ${glossaryPath}`);
        return 1;
      }
      await saveGlossaryFile(glossaryPath, withoutTerm(glossary, command.canonical));
      loggers.resultLog(`Removed "${command.canonical}"`);
      return 0;
    }

    case "correct": {
      const input = command.text ?? (await readStdin());
      const corrector = new VocabularyCorrector({
        log: loggers.agentLog,
        collapseLetterSpacing: config.collapseLetterSpacing,
      });
      corrector.load(glossary);

      const report = corrector.correctWithReport(input, config.budgetMs);
      for (const line of formatReport(input, report)) {
        loggers.agentLog(line);
      }
      process.stdout.write(report.text.endsWith("\n") ? report.text : `${report.text}\n`);
      return 0;
    }
  }
}

async function main(): Promise<void> {
  let loggers = createLoggers(false);
  try {
    const { config, command } = parseConfig();
    loggers = createLoggers(config.debug);
    process.exitCode = await run(config, command, loggers);
  } catch (error) {
    loggers.agentError(`Error: ${describeError(error)}`);
    if (error instanceof VocabError && error.details) {
      loggers.agentLog(`[agent] ${error.code} ${JSON.stringify(error.details)}`);
    }
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
