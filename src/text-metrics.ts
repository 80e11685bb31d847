/**
 * Text metrics: classification counts, segment counts and lengths.
 *
 * Classification counts walk the text by code point, so a character outside
 * the Basic Multilingual Plane counts once.
 */

import {
  isConsonant,
  isDigit,
  isLower,
  isPunctuation,
  isUpper,
  isVowel,
  isWhitespace,
} from "./char-class.js";

const WORD_SEPARATORS = /[ \t\n\r]+/;
const SENTENCE_DELIMITERS = /[.!?]/;

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

function countMatching(text: string, predicate: (char: string) => boolean): number {
  let count = 0;
  for (const char of text) {
    if (predicate(char)) {
      count += 1;
    }
  }
  return count;
}

function countNonEmpty(segments: string[]): number {
  return segments.filter((segment) => segment.length > 0).length;
}

/**
 * Length in UTF-16 code units, the same as `text.length`.
 */
export function getLength(text: string): number {
  return text.length;
}

export const countCharacters = getLength;

export function codePointLength(text: string): number {
  let count = 0;
  for (const _ of text) {
    count += 1;
  }
  return count;
}

/**
 * Number of user-perceived characters (extended grapheme clusters).
 *
 * @example
 * ```typescript
 * logicalLength("e\u0301"); // => 1 (e + combining acute)
 * logicalLength("\u{1F44D}\u{1F3FD}"); // => 1 (emoji + skin tone)
 * ```
 *
 * @remarks
 * Expects NFC input. Unnormalized text is segmented as given, so the count may
 * differ from its normalized form, but it never throws.
 */
export function logicalLength(text: string): number {
  let count = 0;
  for (const _ of graphemeSegmenter.segment(text)) {
    count += 1;
  }
  return count;
}

/**
 * Count words separated by runs of space, tab, LF or CR.
 */
export function countWords(text: string): number {
  return countNonEmpty(text.split(WORD_SEPARATORS));
}

/**
 * Count segments between `.`, `!` and `?`.
 *
 * Each mark is its own delimiter and adjacent marks are not collapsed, so any
 * non-empty text between two marks is a sentence, whitespace included:
 * `"Wait... really?!"` counts 2 and `"Done. "` counts 2.
 */
export function countSentences(text: string): number {
  return countNonEmpty(text.split(SENTENCE_DELIMITERS));
}

/**
 * Count paragraphs.
 *
 * A paragraph opens at the start of the text or after two or more consecutive
 * line breaks (`\r\n`, `\r`, `\n`, U+0085, U+2028, U+2029, mixed freely), and
 * counts once a non-whitespace character follows. Spaces and tabs between line
 * breaks do not interrupt the run.
 */
export function countParagraphs(text: string): number {
  let paragraphs = 0;
  let lineBreaks = 0;
  let open = true;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (
      char === "\r" ||
      char === "\n" ||
      char === "\u0085" ||
      char === "\u2028" ||
      char === "\u2029"
    ) {
      if (char === "\r" && text[i + 1] === "\n") {
        i += 1;
      }
      lineBreaks += 1;
    } else if (!isWhitespace(char)) {
      if (open) {
        paragraphs += 1;
        open = false;
      }
      lineBreaks = 0;
      continue;
    }

    if (lineBreaks >= 2) {
      open = true;
    }
  }

  return paragraphs;
}

export function countVowels(text: string): number {
  return countMatching(text, isVowel);
}

/**
 * Count letters outside `aeiouAEIOU`, in any script.
 */
export function countConsonants(text: string): number {
  return countMatching(text, isConsonant);
}

export function countDigits(text: string): number {
  return countMatching(text, isDigit);
}

export function countUppercase(text: string): number {
  return countMatching(text, isUpper);
}

export function countLowercase(text: string): number {
  return countMatching(text, isLower);
}

export function countWhitespace(text: string): number {
  return countMatching(text, isWhitespace);
}

export function countPunctuation(text: string): number {
  return countMatching(text, isPunctuation);
}
