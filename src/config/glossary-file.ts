/**
 * Glossary file persistence.
 *
 * The file is JSON, with `//` and block comments allowed:
 *
 *   {
 *     "version": "1.0",
 *     "vocabulary": { "GitHub": ["git hub", "github"] },
 *     "rules": { "GitHub": { "caseMode": "mixed" } }
 *   }
 */

import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import {
  APP_NAME,
  DEFAULT_GLOSSARY_FILE_NAME,
  GLOSSARY_FILE_NAMES,
  GLOSSARY_FILE_VERSION,
} from "./constants.js";
import { ConfigError, describeError } from "../utils/errors.js";
import { stripJsonComments } from "../utils/strings.js";
import {
  DEFAULT_GLOSSARY,
  createGlossary,
  glossaryToRecord,
  type RulesRecord,
  type VocabularyRecord,
} from "../vocab/glossary.js";
import { CASE_MODES, type CaseMode, type Glossary } from "../vocab/types.js";

const CaseModeSchema = z.enum(CASE_MODES);

export const GlossaryFileSchema = z.object({
  version: z.string().default(GLOSSARY_FILE_VERSION),
  vocabulary: z.record(z.string(), z.array(z.string())),
  rules: z.record(z.string(), z.object({ caseMode: CaseModeSchema })).default({}),
});

export type GlossaryFile = z.infer<typeof GlossaryFileSchema>;

export function isCaseMode(value: string): value is CaseMode {
  return CASE_MODES.some((mode) => mode === value);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
}

export function getConfigDirectory(): string {
  return path.join(os.homedir(), ".config", APP_NAME);
}

/**
 * Resolve the glossary file: explicit path, else vocabulary.jsonc when it
 * exists, else vocabulary.json.
 */
export async function resolveGlossaryPath(
  explicitPath?: string,
  directory = getConfigDirectory()
): Promise<string> {
  if (explicitPath) {
    return path.isAbsolute(explicitPath)
      ? explicitPath
      : path.resolve(process.cwd(), explicitPath);
  }
  for (const name of GLOSSARY_FILE_NAMES) {
    const candidate = path.join(directory, name);
    if (await fileExists(candidate)) return candidate;
  }
  return path.join(directory, DEFAULT_GLOSSARY_FILE_NAME);
}

export function parseGlossaryText(text: string, source = "<inline>"): Glossary {
  let raw: unknown;
  try {
    raw = JSON.parse(stripJsonComments(text));
  } catch (error) {
    throw new ConfigError(
      "GLOSSARY_PARSE_ERROR",
      `Failed to parse glossary ${source}: ${describeError(error)}`,
      { path: source }
    );
  }

  const parsed = GlossaryFileSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(
      "GLOSSARY_INVALID",
      `Invalid glossary ${source}: ${problems}`,
      { path: source, issues: parsed.error.issues.length }
    );
  }

  const vocabulary: VocabularyRecord = parsed.data.vocabulary;
  const rules: RulesRecord = parsed.data.rules;
  return createGlossary(vocabulary, rules);
}

export function serializeGlossary(glossary: Glossary): string {
  const { vocabulary, rules } = glossaryToRecord(glossary);
  const sortKeys = <T>(record: Record<string, T>): Record<string, T> =>
    Object.fromEntries(Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));

  const file: GlossaryFile = {
    version: GLOSSARY_FILE_VERSION,
    vocabulary: sortKeys(vocabulary),
    rules: sortKeys(rules),
  };
  return `${JSON.stringify(file, null, 2)}\n`;
}

export async function saveGlossaryFile(filePath: string, glossary: Glossary): Promise<void> {
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, serializeGlossary(glossary), "utf8");
  } catch (error) {
    throw new ConfigError(
      "GLOSSARY_WRITE_ERROR",
      `Failed to save glossary to ${filePath}: ${describeError(error)}`,
      { path: filePath }
    );
  }
}

/**
 * Load a glossary file. A missing file is created with the default glossary.
 */
export async function loadGlossaryFile(filePath: string): Promise<Glossary> {
  if (!(await fileExists(filePath))) {
    await saveGlossaryFile(filePath, DEFAULT_GLOSSARY);
    return DEFAULT_GLOSSARY;
  }

  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(
      "GLOSSARY_READ_ERROR",
      `Failed to read glossary ${filePath}: ${describeError(error)}`,
      { path: filePath }
    );
  }
  return parseGlossaryText(text, filePath);
}
