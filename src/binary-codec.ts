import type { Codec } from "./codec.js";
import { MalformedInputError } from "./errors.js";
import { codecLogger } from "./logger.js";

const log = codecLogger("binary");

const OCTET = /^[01]{8}$/;
// ASCII "?", the replacement for anything a single byte cannot hold
const REPLACEMENT_BYTE = 0x3f;

/**
 * Space-separated 8-bit binary representation of narrow text.
 *
 * Lossy outside ASCII: code units above U+00FF are written as `?` and bytes
 * above 0x7F decode as `?`, without raising. Only ASCII input round-trips.
 *
 * @example
 * ```typescript
 * new BinaryCodec().encode("Hi");
 * // => '01001000 01101001'
 * ```
 */
export class BinaryCodec implements Codec {
  encode(text: string): string {
    const tokens: string[] = [];
    for (let i = 0; i < text.length; i++) {
      const unit = text.charCodeAt(i);
      const byte = unit > 0xff ? REPLACEMENT_BYTE : unit;
      tokens.push(byte.toString(2).padStart(8, "0"));
    }
    return tokens.join(" ");
  }

  /**
   * @throws MalformedInputError when a token is not exactly eight binary digits
   */
  decode(text: string): string {
    if (text.length === 0) {
      return "";
    }

    const tokens = text.split(" ");
    const chars: string[] = [];
    for (const [index, token] of tokens.entries()) {
      if (!OCTET.test(token)) {
        log("rejected token %d of %d", index, tokens.length);
        throw new MalformedInputError(
          `Binary token ${index} is not an 8-bit binary literal`,
          "binary",
          index
        );
      }
      const byte = parseInt(token, 2);
      chars.push(String.fromCharCode(byte > 0x7f ? REPLACEMENT_BYTE : byte));
    }
    return chars.join("");
  }
}

const binaryCodec = new BinaryCodec();

export function toBinary(text: string): string {
  return binaryCodec.encode(text);
}

export function fromBinary(binary: string): string {
  return binaryCodec.decode(binary);
}
