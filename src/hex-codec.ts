import type { Codec } from "./codec.js";
import { MalformedInputError, describeError } from "./errors.js";
import { codecLogger } from "./logger.js";

const log = codecLogger("hex");

const HEX_PAIR = /^[0-9A-Fa-f]{2}$/;

/**
 * Hexadecimal representation of the UTF-8 bytes of a string.
 *
 * @example
 * ```typescript
 * const codec = new HexCodec();
 * codec.encode("Hi é");
 * // => '486920C3A9'
 * codec.decode("486920c3a9");
 * // => 'Hi é'
 * ```
 */
export class HexCodec implements Codec {
  private readonly encoder = new TextEncoder();
  private readonly decoder = new TextDecoder("utf-8", { fatal: true });

  /**
   * Encode each UTF-8 byte as two uppercase hex digits, without separators.
   */
  encode(text: string): string {
    let hex = "";
    for (const byte of this.encoder.encode(text)) {
      hex += byte.toString(16).toUpperCase().padStart(2, "0");
    }
    return hex;
  }

  /**
   * Decode pairs of hex digits (either case) back into UTF-8 text.
   * @throws MalformedInputError on odd length, a non-hex digit, or bytes
   *         that are not valid UTF-8
   */
  decode(text: string): string {
    if (text.length % 2 !== 0) {
      log("rejected odd-length input (%d chars)", text.length);
      throw new MalformedInputError(
        `Hex input must have an even number of digits, got ${text.length}`,
        "hex",
        text.length - 1
      );
    }

    const bytes = new Uint8Array(text.length / 2);
    for (let i = 0; i < text.length; i += 2) {
      const pair = text.slice(i, i + 2);
      if (!HEX_PAIR.test(pair)) {
        log("rejected non-hex digit pair at %d", i);
        throw new MalformedInputError(
          `Invalid hex digit pair at position ${i}`,
          "hex",
          i
        );
      }
      bytes[i / 2] = parseInt(pair, 16);
    }

    try {
      return this.decoder.decode(bytes);
    } catch (error) {
      log("decoded bytes are not valid UTF-8");
      throw new MalformedInputError(
        `Hex input does not decode to UTF-8: ${describeError(error, "invalid byte sequence")}`,
        "utf-8",
        undefined,
        error
      );
    }
  }
}

const hexCodec = new HexCodec();

export function toHex(text: string): string {
  return hexCodec.encode(text);
}

export function fromHex(hex: string): string {
  return hexCodec.decode(hex);
}
