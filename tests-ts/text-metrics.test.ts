/**
 * Tests for text metrics
 */

import { test } from "node:test";
import assert from "node:assert";
import {
  codePointLength,
  countCharacters,
  countConsonants,
  countDigits,
  countLowercase,
  countParagraphs,
  countPunctuation,
  countSentences,
  countUppercase,
  countVowels,
  countWhitespace,
  countWords,
  getLength,
  logicalLength,
} from "../src/text-metrics.js";

// ============================================================================
// Segment counts
// ============================================================================

test("countWords - empty and blank input", () => {
  assert.strictEqual(countWords(""), 0);
  assert.strictEqual(countWords("  "), 0);
});

test("countWords - collapses separator runs", () => {
  assert.strictEqual(countWords("a b  c"), 3);
  assert.strictEqual(countWords("one\ttwo\r\nthree"), 3);
});

test("countSentences - each mark is a delimiter", () => {
  assert.strictEqual(countSentences("Hello. World!"), 2);
  assert.strictEqual(countSentences("Wait... really?!"), 2);
  assert.strictEqual(countSentences("No punctuation"), 1);
  assert.strictEqual(countSentences(""), 0);
});

test("countSentences - trailing whitespace is a segment", () => {
  assert.strictEqual(countSentences("Done. "), 2);
});

test("countParagraphs - blank line separates", () => {
  assert.strictEqual(countParagraphs("a\n\nb"), 2);
  assert.strictEqual(countParagraphs("a\nb"), 1);
});

test("countParagraphs - leading breaks and whitespace are ignored", () => {
  assert.strictEqual(countParagraphs("\n\n   a"), 1);
  assert.strictEqual(countParagraphs("   "), 0);
  assert.strictEqual(countParagraphs(""), 0);
});

test("countParagraphs - trailing breaks open nothing", () => {
  assert.strictEqual(countParagraphs("a\n\n"), 1);
  assert.strictEqual(countParagraphs("a\n\n \t "), 1);
});

test("countParagraphs - mixed line endings", () => {
  assert.strictEqual(countParagraphs("a\r\n\r\nb\n\n\nc"), 3);
  assert.strictEqual(countParagraphs("a\r\nb"), 1);
  assert.strictEqual(countParagraphs("a\r\rb"), 2);
  assert.strictEqual(countParagraphs("a\r\n\nb"), 2);
});

test("countParagraphs - whitespace-only line counts as blank", () => {
  assert.strictEqual(countParagraphs("a\n  \nb"), 2);
});

test("countParagraphs - Unicode separators", () => {
  assert.strictEqual(countParagraphs("a\u2029b"), 1);
  assert.strictEqual(countParagraphs("a\u2029\u2029b"), 2);
  assert.strictEqual(countParagraphs("a\n\u2029b"), 2);
  assert.strictEqual(countParagraphs("a\u2028b"), 1);
  assert.strictEqual(countParagraphs("a\u2028\u2028b"), 2);
});

// ============================================================================
// Lengths
// ============================================================================

test("getLength - UTF-16 code units", () => {
  assert.strictEqual(getLength("🎉"), 2);
  assert.strictEqual(countCharacters("abc"), 3);
});

test("codePointLength - surrogate pairs count once", () => {
  assert.strictEqual(codePointLength("🎉"), 1);
  assert.strictEqual(codePointLength("e\u0301"), 2);
});

test("logicalLength - grapheme clusters", () => {
  assert.strictEqual(logicalLength(""), 0);
  assert.strictEqual(logicalLength("abc"), 3);
  assert.strictEqual(logicalLength("e\u0301"), 1);
  assert.strictEqual(logicalLength("\u{1F44D}\u{1F3FD}"), 1);
  assert.strictEqual(logicalLength("\u{1F1EF}\u{1F1F5}"), 1);
  assert.strictEqual(logicalLength("\u{1F468}\u200d\u{1F469}\u200d\u{1F467}"), 1);
});

test("logicalLength - unnormalized input does not throw", () => {
  assert.strictEqual(logicalLength("e\u0301\u0301x"), 2);
});

// ============================================================================
// Classification counts
// ============================================================================

test("countVowels / countConsonants", () => {
  assert.strictEqual(countVowels("Hello World"), 3);
  assert.strictEqual(countConsonants("Hello World"), 7);
  assert.strictEqual(countConsonants("café"), 3);
});

test("countDigits - any script", () => {
  assert.strictEqual(countDigits("a1b2٣"), 3);
});

test("countUppercase / countLowercase", () => {
  assert.strictEqual(countUppercase("Hello World"), 2);
  assert.strictEqual(countLowercase("Hello World"), 8);
  assert.strictEqual(countUppercase("\u{1D49C}"), 1);
});

test("countWhitespace", () => {
  assert.strictEqual(countWhitespace("a b\tc\n"), 3);
  assert.strictEqual(countWhitespace(""), 0);
});

test("countPunctuation", () => {
  assert.strictEqual(countPunctuation("Hi! (ok), yes?"), 5);
  assert.strictEqual(countPunctuation("1 + 1 = 2"), 0);
});
