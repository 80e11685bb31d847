/**
 * Unicode character classification.
 *
 * Each predicate takes a single code point as a string (one or two UTF-16
 * code units) and follows the Unicode Character Database general categories.
 */

const LETTER = /^\p{L}$/u;
const DECIMAL_DIGIT = /^\p{Nd}$/u;
const UPPERCASE = /^\p{Lu}$/u;
const LOWERCASE = /^\p{Ll}$/u;
const PUNCTUATION = /^\p{P}$/u;
// Separators plus the C0/C1 controls that act as whitespace
const WHITESPACE = /^[\p{Z}\t\n\v\f\r\u0085]$/u;

const VOWELS = new Set("aeiouAEIOU");

export function isLetter(char: string): boolean {
  return LETTER.test(char);
}

export function isDigit(char: string): boolean {
  return DECIMAL_DIGIT.test(char);
}

export function isLetterOrDigit(char: string): boolean {
  return isLetter(char) || isDigit(char);
}

export function isUpper(char: string): boolean {
  return UPPERCASE.test(char);
}

export function isLower(char: string): boolean {
  return LOWERCASE.test(char);
}

export function isPunctuation(char: string): boolean {
  return PUNCTUATION.test(char);
}

export function isWhitespace(char: string): boolean {
  return WHITESPACE.test(char);
}

/**
 * Vowels are the fixed ASCII set `aeiouAEIOU`; accented vowels are consonants
 * for counting purposes.
 */
export function isVowel(char: string): boolean {
  return VOWELS.has(char);
}

export function isConsonant(char: string): boolean {
  return isLetter(char) && !isVowel(char);
}
