/**
 * Tests for text utilities
 */

import { test } from "node:test";
import assert from "node:assert";
import {
  escapeJson,
  escapeXml,
  removeDigits,
  removeLetters,
  removeNonAlphanumeric,
  removeNonAscii,
  removeSpecialCharacters,
  reverse,
  shuffle,
  swapCase,
  toCamelCase,
  toKebabCase,
  toPascalCase,
  toSarcasm,
  toSha256,
  toSnakeCase,
  toTitleCase,
} from "../src/text-utilities.js";

// ============================================================================
// Case styles
// ============================================================================

test("toSnakeCase / toKebabCase", () => {
  assert.strictEqual(toSnakeCase("helloWorld Foo-bar"), "hello_world_foo_bar");
  assert.strictEqual(toKebabCase("helloWorld foo_bar"), "hello-world-foo-bar");
});

test("case styles - blank input is returned as is", () => {
  assert.strictEqual(toSnakeCase("  "), "  ");
  assert.strictEqual(toCamelCase(""), "");
  assert.strictEqual(toTitleCase("\t"), "\t");
});

test("toCamelCase", () => {
  assert.strictEqual(toCamelCase("Hello_big-WORLD"), "helloBigWorld");
  assert.strictEqual(toCamelCase(" leading space"), "leadingSpace");
});

test("toPascalCase / toTitleCase", () => {
  assert.strictEqual(toPascalCase("hello world"), "HelloWorld");
  assert.strictEqual(toTitleCase("hELLO wORLD"), "Hello World");
});

// ============================================================================
// Filters
// ============================================================================

test("remove filters", () => {
  assert.strictEqual(removeNonAlphanumeric("a-b c!1"), "abc1");
  assert.strictEqual(removeNonAscii("café"), "caf");
  assert.strictEqual(removeDigits("a1٣b"), "ab");
  assert.strictEqual(removeLetters("a1b2"), "12");
  assert.strictEqual(removeSpecialCharacters("hi, there!"), "hi there");
});

// ============================================================================
// Case games, shuffle, reverse
// ============================================================================

test("swapCase", () => {
  assert.strictEqual(swapCase("Hello World 1"), "hELLO wORLD 1");
});

test("toSarcasm - alternates by position", () => {
  assert.strictEqual(toSarcasm("hello"), "hElLo");
  assert.strictEqual(toSarcasm(""), "");
});

test("shuffle - uses the given random source", () => {
  assert.strictEqual(shuffle("abc", () => 0), "bca");
  assert.strictEqual(shuffle("abc", () => 0.999), "abc");
  assert.strictEqual(shuffle("", () => 0), "");
});

test("shuffle - keeps every code point", () => {
  const shuffled = shuffle("a🎉b", () => 0);
  assert.deepStrictEqual(Array.from(shuffled).sort(), Array.from("a🎉b").sort());
});

test("reverse - by grapheme cluster", () => {
  assert.strictEqual(reverse("hello 世界"), "界世 olleh");
  assert.strictEqual(reverse("ae\u0301"), "e\u0301a");
  assert.strictEqual(reverse(""), "");
});

// ============================================================================
// Digest and escaping
// ============================================================================

test("toSha256 - lowercase hex of UTF-8 bytes", () => {
  assert.strictEqual(
    toSha256("abc"),
    "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
  );
  assert.strictEqual(
    toSha256(""),
    "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"
  );
});

test("escapeJson", () => {
  assert.strictEqual(escapeJson('say "hi"\n'), 'say \\"hi\\"\\n');
  assert.strictEqual(escapeJson("\u00e9"), "\\u00E9");
  assert.strictEqual(escapeJson("\u0001"), "\\u0001");
  assert.strictEqual(escapeJson("a\\b"), "a\\\\b");
});

test("escapeXml", () => {
  assert.strictEqual(
    escapeXml(`<a href="x">Tom & 'Jerry'</a>`),
    "&lt;a href=&quot;x&quot;&gt;Tom &amp; &apos;Jerry&apos;&lt;/a&gt;"
  );
});
