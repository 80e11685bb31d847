/**
 * Frequency analysis over characters and words.
 *
 * Tables are built fresh on every call. A `Map` keeps keys in first-seen
 * order, and ties on count always resolve to the key seen first.
 */

import { isLetterOrDigit } from "./char-class.js";

const WORD_DELIMITERS = /[ \t\n\r.,!?]+/;

/**
 * `"most"` picks the highest count, `"least"` the lowest.
 */
export type FrequencyOrder = "most" | "least";

/**
 * Count occurrences of each item, keyed in first-seen order.
 */
export function buildFrequencyTable<T>(items: Iterable<T>): Map<T, number> {
  const table = new Map<T, number>();
  for (const item of items) {
    table.set(item, (table.get(item) ?? 0) + 1);
  }
  return table;
}

/**
 * Pick the key with the extreme count. A later key replaces the current pick
 * only when its count is strictly better, which keeps the first-seen key on
 * ties.
 * @returns The chosen key, or `undefined` for an empty table
 */
export function pickByFrequency<T>(
  table: ReadonlyMap<T, number>,
  order: FrequencyOrder
): T | undefined {
  let best: { key: T; count: number } | undefined;
  for (const [key, count] of table) {
    const better =
      best === undefined ||
      (order === "most" ? count > best.count : count < best.count);
    if (better) {
      best = { key, count };
    }
  }
  return best?.key;
}

function* lettersAndDigits(text: string): Generator<string> {
  for (const char of text) {
    if (isLetterOrDigit(char)) {
      yield char;
    }
  }
}

function words(text: string): string[] {
  return text.split(WORD_DELIMITERS).filter((word) => word.length > 0);
}

function pickCharacter(text: string, order: FrequencyOrder): string {
  return pickByFrequency(buildFrequencyTable(lettersAndDigits(text)), order) ?? "";
}

function pickWord(text: string, order: FrequencyOrder): string {
  return pickByFrequency(buildFrequencyTable(words(text)), order) ?? "";
}

/**
 * Most frequent letter or digit, compared by exact code point.
 *
 * @example
 * ```typescript
 * mostFrequentCharacter("aabb");  // => 'a'
 * mostFrequentCharacter("?! ");   // => ''
 * ```
 */
export function mostFrequentCharacter(text: string): string {
  return pickCharacter(text, "most");
}

export function leastFrequentCharacter(text: string): string {
  return pickCharacter(text, "least");
}

/**
 * Most frequent word. Words are split on whitespace and `.,!?`, and compared
 * case-sensitively.
 */
export function mostFrequentWord(text: string): string {
  return pickWord(text, "most");
}

export function leastFrequentWord(text: string): string {
  return pickWord(text, "least");
}
