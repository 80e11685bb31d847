/**
 * Independent single-pass utilities: case styles, character filters,
 * escaping, case games, shuffling, reversal and hashing.
 *
 * Most of these return blank input (empty or whitespace only) untouched.
 */

import { createHash } from "node:crypto";
import { isLetter, isUpper } from "./char-class.js";

/**
 * Source of uniformly distributed numbers in `[0, 1)`, such as `Math.random`.
 */
export type RandomSource = () => number;

const WORD_BREAKS = /[\s_-]+/;
const CAMEL_HUMP = /([a-z])([A-Z])/g;

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

function splitWords(text: string): string[] {
  return text.split(WORD_BREAKS).filter((word) => word.length > 0);
}

function capitalize(word: string): string {
  const [first = "", ...rest] = word;
  return first.toUpperCase() + rest.join("").toLowerCase();
}

function joinHumps(text: string, separator: string): string {
  if (isBlank(text)) {
    return text;
  }
  return text
    .replace(CAMEL_HUMP, `$1${separator}$2`)
    .replace(/[-_ ]/g, separator)
    .toLowerCase();
}

/**
 * @example
 * ```typescript
 * toSnakeCase("helloWorld Foo-bar"); // => 'hello_world_foo_bar'
 * ```
 */
export function toSnakeCase(text: string): string {
  return joinHumps(text, "_");
}

export function toKebabCase(text: string): string {
  return joinHumps(text, "-");
}

export function toCamelCase(text: string): string {
  if (isBlank(text)) {
    return text;
  }
  const [first = "", ...rest] = splitWords(text);
  return first.toLowerCase() + rest.map(capitalize).join("");
}

export function toPascalCase(text: string): string {
  if (isBlank(text)) {
    return text;
  }
  return splitWords(text).map(capitalize).join("");
}

export function toTitleCase(text: string): string {
  if (isBlank(text)) {
    return text;
  }
  return splitWords(text).map(capitalize).join(" ");
}

function removeMatching(text: string, pattern: RegExp): string {
  return isBlank(text) ? text : text.replace(pattern, "");
}

export function removeNonAlphanumeric(text: string): string {
  return removeMatching(text, /[^a-zA-Z0-9]/g);
}

export function removeNonAscii(text: string): string {
  return removeMatching(text, /[^\x00-\x7F]/g);
}

/** Removes decimal digits of every script. */
export function removeDigits(text: string): string {
  return removeMatching(text, /\p{Nd}/gu);
}

export function removeLetters(text: string): string {
  return removeMatching(text, /[a-zA-Z]/g);
}

/** Keeps ASCII letters, ASCII digits and whitespace. */
export function removeSpecialCharacters(text: string): string {
  return removeMatching(text, /[^a-zA-Z0-9\s]/g);
}

export function swapCase(text: string): string {
  if (isBlank(text)) {
    return text;
  }
  return Array.from(text, (char) => {
    if (!isLetter(char)) {
      return char;
    }
    return isUpper(char) ? char.toLowerCase() : char.toUpperCase();
  }).join("");
}

/**
 * Alternate case by position: even positions lower, odd positions upper.
 *
 * @example
 * ```typescript
 * toSarcasm("hello"); // => 'hElLo'
 * ```
 */
export function toSarcasm(text: string): string {
  return Array.from(text, (char, index) =>
    index % 2 === 0 ? char.toLowerCase() : char.toUpperCase()
  ).join("");
}

/**
 * Fisher-Yates shuffle of the code points of `text`.
 *
 * @param random - Random source; pass a seeded generator for repeatable output
 */
export function shuffle(text: string, random: RandomSource): string {
  const chars = Array.from(text);
  for (let i = chars.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [chars[i], chars[j]] = [chars[j], chars[i]];
  }
  return chars.join("");
}

/**
 * Reverse by grapheme cluster, so combining marks and emoji sequences stay
 * attached to their base.
 */
export function reverse(text: string): string {
  return Array.from(graphemeSegmenter.segment(text), ({ segment }) => segment)
    .reverse()
    .join("");
}

/**
 * SHA-256 digest of the UTF-8 bytes, as 64 lowercase hex digits.
 */
export function toSha256(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

const JSON_ESCAPES: ReadonlyMap<string, string> = new Map([
  ['"', '\\"'],
  ["\\", "\\\\"],
  ["\b", "\\b"],
  ["\f", "\\f"],
  ["\n", "\\n"],
  ["\r", "\\r"],
  ["\t", "\\t"],
]);

/**
 * Escape for a JSON string literal. Control characters and everything above
 * U+007F are written as `\uXXXX` per UTF-16 code unit.
 */
export function escapeJson(text: string): string {
  let escaped = "";
  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    const code = text.charCodeAt(i);
    const named = JSON_ESCAPES.get(char);
    if (named !== undefined) {
      escaped += named;
    } else if (code < 0x20 || code > 0x7f) {
      escaped += `\\u${code.toString(16).toUpperCase().padStart(4, "0")}`;
    } else {
      escaped += char;
    }
  }
  return escaped;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}
