import { MalformedInputError, describeError } from "./errors.js";
import { codecLogger } from "./logger.js";

const log = codecLogger("bytes");

/**
 * Byte encodings the library can read and write. There is no default: every
 * call names one.
 */
export type ByteEncoding = "ascii" | "utf-8" | "utf-16le" | "utf-16be" | "utf-32le";

const QUESTION_MARK = 0x3f;
const REPLACEMENT_CHARACTER = "\ufffd";
const MAX_CODE_POINT = 0x10ffff;

const LONE_SURROGATE =
  /[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/g;

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Replace unpaired surrogates with U+FFFD so the text has a Unicode encoding.
 */
export function toWellFormed(text: string): string {
  return text.replace(LONE_SURROGATE, REPLACEMENT_CHARACTER);
}

function encodeAscii(text: string): Uint8Array {
  const bytes: number[] = [];
  for (const char of text) {
    const code = char.codePointAt(0) ?? QUESTION_MARK;
    bytes.push(code > 0x7f ? QUESTION_MARK : code);
  }
  return Uint8Array.from(bytes);
}

function encodeUtf16(text: string, littleEndian: boolean): Uint8Array {
  const wellFormed = toWellFormed(text);
  const bytes = new Uint8Array(wellFormed.length * 2);
  const view = new DataView(bytes.buffer);
  for (let i = 0; i < wellFormed.length; i++) {
    view.setUint16(i * 2, wellFormed.charCodeAt(i), littleEndian);
  }
  return bytes;
}

function encodeUtf32(text: string): Uint8Array {
  const codePoints = Array.from(toWellFormed(text), (char) => char.codePointAt(0) ?? 0);
  const bytes = new Uint8Array(codePoints.length * 4);
  const view = new DataView(bytes.buffer);
  codePoints.forEach((codePoint, index) => {
    view.setUint32(index * 4, codePoint, true);
  });
  return bytes;
}

function decodeAscii(bytes: Uint8Array): string {
  const chars: string[] = [];
  for (const byte of bytes) {
    chars.push(String.fromCharCode(byte > 0x7f ? QUESTION_MARK : byte));
  }
  return chars.join("");
}

function decodeUtf8(bytes: Uint8Array): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch (error) {
    log("rejected invalid UTF-8 (%d bytes)", bytes.length);
    throw new MalformedInputError(
      `Invalid UTF-8 byte sequence: ${describeError(error, "decode failed")}`,
      "utf-8",
      undefined,
      error
    );
  }
}

function decodeUtf16(bytes: Uint8Array, littleEndian: boolean): string {
  const encoding = littleEndian ? "utf-16le" : "utf-16be";
  if (bytes.length % 2 !== 0) {
    log("rejected odd-length %s input (%d bytes)", encoding, bytes.length);
    throw new MalformedInputError(
      `${encoding.toUpperCase()} input must have an even number of bytes, got ${bytes.length}`,
      encoding,
      bytes.length - 1
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const chars: string[] = [];
  for (let offset = 0; offset < bytes.length; offset += 2) {
    chars.push(String.fromCharCode(view.getUint16(offset, littleEndian)));
  }
  return toWellFormed(chars.join(""));
}

function decodeUtf32(bytes: Uint8Array): string {
  if (bytes.length % 4 !== 0) {
    log("rejected utf-32le input of %d bytes", bytes.length);
    throw new MalformedInputError(
      `UTF-32LE input length must be a multiple of four bytes, got ${bytes.length}`,
      "utf-32le",
      bytes.length - (bytes.length % 4)
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const chars: string[] = [];
  for (let offset = 0; offset < bytes.length; offset += 4) {
    const value = view.getUint32(offset, true);
    const isSurrogate = value >= 0xd800 && value <= 0xdfff;
    if (value > MAX_CODE_POINT || isSurrogate) {
      log("rejected non-scalar value at byte %d", offset);
      throw new MalformedInputError(
        `UTF-32LE value 0x${value.toString(16).toUpperCase()} at byte ${offset} is not a Unicode scalar value`,
        "utf-32le",
        offset
      );
    }
    chars.push(String.fromCodePoint(value));
  }
  return chars.join("");
}

/**
 * Serialize text to bytes in the named encoding.
 *
 * ASCII writes `?` for every code point above U+007F. The Unicode encodings
 * write U+FFFD for unpaired surrogates. Neither raises.
 */
export function encodeBytes(text: string, encoding: ByteEncoding): Uint8Array {
  switch (encoding) {
    case "ascii":
      return encodeAscii(text);
    case "utf-8":
      return utf8Encoder.encode(text);
    case "utf-16le":
      return encodeUtf16(text, true);
    case "utf-16be":
      return encodeUtf16(text, false);
    case "utf-32le":
      return encodeUtf32(text);
  }
}

/**
 * Read text from bytes in the named encoding.
 *
 * @throws MalformedInputError for invalid UTF-8, UTF-16 of odd length, and
 *         UTF-32 that is truncated or holds a non-scalar value. ASCII never
 *         throws; bytes above 0x7F read as `?`.
 */
export function decodeBytes(bytes: Uint8Array, encoding: ByteEncoding): string {
  switch (encoding) {
    case "ascii":
      return decodeAscii(bytes);
    case "utf-8":
      return decodeUtf8(bytes);
    case "utf-16le":
      return decodeUtf16(bytes, true);
    case "utf-16be":
      return decodeUtf16(bytes, false);
    case "utf-32le":
      return decodeUtf32(bytes);
  }
}

/**
 * Pass text through an encoding and back. Text the encoding can represent
 * comes back unchanged; anything else is replaced per {@link encodeBytes}.
 */
export function reencode(text: string, encoding: ByteEncoding): string {
  return decodeBytes(encodeBytes(text, encoding), encoding);
}

/** ASCII round trip; code points above U+007F become `?`. */
export function toAscii(text: string): string {
  return reencode(text, "ascii");
}

export function toUtf8(text: string): string {
  return reencode(text, "utf-8");
}

/** UTF-16 little-endian round trip. */
export function toUnicode(text: string): string {
  return reencode(text, "utf-16le");
}

/** UTF-16 big-endian round trip. */
export function toUtf16(text: string): string {
  return reencode(text, "utf-16be");
}

/** UTF-32 little-endian round trip. */
export function toUtf32(text: string): string {
  return reencode(text, "utf-32le");
}
