/**
 * Text normalization for vocabulary matching.
 *
 * Produces a matching-friendly copy of the input together with an index map
 * from every normalized code unit back to its offset in the original string.
 * Offsets found in normalized text must go through `indexMap` before they are
 * used on the original.
 */

import { MIN_LETTER_RUN } from "../config/constants.js";
import type { NormalizedText } from "./types.js";

export interface NormalizeOptions {
  collapseLetterSpacing?: boolean;
}

const WHITESPACE = /\s/;
const WORD_CHAR = /[\p{L}\p{N}_]/u;
const LETTER = /\p{L}/u;

export function isWordChar(char: string | undefined): boolean {
  return char !== undefined && WORD_CHAR.test(char);
}

/**
 * Code point ending right before `index`, or undefined at the start of text.
 */
export function charBefore(text: string, index: number): string | undefined {
  if (index <= 0) return undefined;
  const low = text.charCodeAt(index - 1);
  if (low >= 0xdc00 && low <= 0xdfff && index >= 2) {
    const high = text.charCodeAt(index - 2);
    if (high >= 0xd800 && high <= 0xdbff) {
      return text.slice(index - 2, index);
    }
  }
  return text[index - 1];
}

/**
 * Code point starting at `index`, or undefined at the end of text.
 */
export function charAt(text: string, index: number): string | undefined {
  const code = text.codePointAt(index);
  return code === undefined ? undefined : String.fromCodePoint(code);
}

/**
 * Lower-case text without changing its UTF-16 length.
 * Characters whose lower-case form has a different length are kept as they are.
 */
export function foldCase(text: string): string {
  let folded = "";
  for (const char of text) {
    const lower = char.toLowerCase();
    folded += lower.length === char.length ? lower : char;
  }
  return folded;
}

// === Phases ===

function collapseWhitespace(text: string): NormalizedText {
  let out = "";
  const indexMap: number[] = [];
  let pendingSpace = -1;

  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);
    if (WHITESPACE.test(char)) {
      if (pendingSpace < 0) pendingSpace = i;
      continue;
    }
    // Leading whitespace is dropped, trailing whitespace never gets flushed
    if (pendingSpace >= 0 && out.length > 0) {
      out += " ";
      indexMap.push(pendingSpace);
    }
    pendingSpace = -1;
    out += char;
    indexMap.push(i);
  }

  return { text: out, indexMap };
}

function isSingleLetter(text: string, index: number): boolean {
  const char = text.charAt(index);
  if (!LETTER.test(char)) return false;
  return !isWordChar(charBefore(text, index)) && !isWordChar(charAt(text, index + 1));
}

function collapseLetterRuns(input: NormalizedText): NormalizedText {
  const { text } = input;
  let out = "";
  const indexMap: number[] = [];

  let i = 0;
  while (i < text.length) {
    if (isSingleLetter(text, i)) {
      // Letters at i, i + 2, i + 4, ... joined by single spaces
      let count = 1;
      while (text.charAt(i + count * 2 - 1) === " " && isSingleLetter(text, i + count * 2)) {
        count++;
      }
      if (count >= MIN_LETTER_RUN) {
        for (let k = 0; k < count; k++) {
          out += text.charAt(i + k * 2);
          indexMap.push(input.indexMap[i + k * 2] ?? i + k * 2);
        }
        i += count * 2 - 1;
        continue;
      }
    }
    out += text.charAt(i);
    indexMap.push(input.indexMap[i] ?? i);
    i++;
  }

  return { text: out, indexMap };
}

// === Public API ===

/**
 * Normalize raw transcription text for matching.
 *
 * 1. Collapses whitespace runs to one space and trims both ends
 * 2. Collapses spelled-out letters ("a p i" -> "api"), unless disabled
 */
export function normalize(text: string, options: NormalizeOptions = {}): NormalizedText {
  const { collapseLetterSpacing = true } = options;
  const collapsed = collapseWhitespace(text);
  return collapseLetterSpacing ? collapseLetterRuns(collapsed) : collapsed;
}
