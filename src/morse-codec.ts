import type { Codec } from "./codec.js";

/**
 * International Morse code for letters and digits. This is the only authored
 * direction; {@link MORSE_DECODE} is derived from it.
 */
export const MORSE_ALPHABET: ReadonlyMap<string, string> = new Map([
  ["A", ".-"],
  ["B", "-..."],
  ["C", "-.-."],
  ["D", "-.."],
  ["E", "."],
  ["F", "..-."],
  ["G", "--."],
  ["H", "...."],
  ["I", ".."],
  ["J", ".---"],
  ["K", "-.-"],
  ["L", ".-.."],
  ["M", "--"],
  ["N", "-."],
  ["O", "---"],
  ["P", ".--."],
  ["Q", "--.-"],
  ["R", ".-."],
  ["S", "..."],
  ["T", "-"],
  ["U", "..-"],
  ["V", "...-"],
  ["W", ".--"],
  ["X", "-..-"],
  ["Y", "-.--"],
  ["Z", "--.."],
  ["1", ".----"],
  ["2", "..---"],
  ["3", "...--"],
  ["4", "....-"],
  ["5", "....."],
  ["6", "-...."],
  ["7", "--..."],
  ["8", "---.."],
  ["9", "----."],
  ["0", "-----"],
]);

export const MORSE_DECODE: ReadonlyMap<string, string> = new Map(
  Array.from(MORSE_ALPHABET, ([symbol, token]): [string, string] => [token, symbol])
);

/**
 * Options for {@link MorseCodec}
 */
export interface MorseCodecOptions {
  /**
   * String placed between tokens on encode and split on during decode.
   * Default is a single space.
   */
  separator?: string;
}

/**
 * Morse code over `A`–`Z` and `0`–`9`.
 *
 * @example
 * ```typescript
 * const codec = new MorseCodec();
 * codec.encode("sos 1");
 * // => '... --- ... .----'
 * codec.decode("... --- ... .----");
 * // => 'SOS1'
 * ```
 *
 * @remarks
 * This codec is lossy: letters are upper-cased and everything outside the
 * alphabet, whitespace included, is dropped on encode. Decoding ignores
 * unknown tokens. Input restricted to `[A-Z0-9]` round-trips exactly.
 */
export class MorseCodec implements Codec {
  private readonly separator: string;

  constructor(options: MorseCodecOptions = {}) {
    const { separator = " " } = options;
    if (separator.length === 0 || /[.-]/.test(separator)) {
      throw new RangeError("Morse separator must be non-empty and contain no dots or dashes");
    }
    this.separator = separator;
  }

  encode(text: string): string {
    const tokens: string[] = [];
    for (const char of text.toUpperCase()) {
      const token = MORSE_ALPHABET.get(char);
      if (token !== undefined) {
        tokens.push(token);
      }
    }
    return tokens.join(this.separator);
  }

  decode(text: string): string {
    const symbols: string[] = [];
    for (const token of text.split(this.separator)) {
      const symbol = MORSE_DECODE.get(token);
      if (symbol !== undefined) {
        symbols.push(symbol);
      }
    }
    return symbols.join("");
  }
}

const morseCodec = new MorseCodec();

export function toMorseCode(text: string): string {
  return morseCodec.encode(text);
}

export function fromMorseCode(morse: string): string {
  return morseCodec.decode(morse);
}
