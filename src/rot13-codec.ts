import type { Codec } from "./codec.js";

const LOWER_A = 0x61;
const LOWER_Z = 0x7a;
const UPPER_A = 0x41;
const UPPER_Z = 0x5a;

function rotate(code: number, base: number): number {
  return base + ((code - base + 13) % 26);
}

/**
 * ROT13 over ASCII letters. Encoding and decoding are the same operation.
 */
export class Rot13Codec implements Codec {
  encode(text: string): string {
    let result = "";
    for (let i = 0; i < text.length; i++) {
      const code = text.charCodeAt(i);
      if (code >= LOWER_A && code <= LOWER_Z) {
        result += String.fromCharCode(rotate(code, LOWER_A));
      } else if (code >= UPPER_A && code <= UPPER_Z) {
        result += String.fromCharCode(rotate(code, UPPER_A));
      } else {
        result += text[i];
      }
    }
    return result;
  }

  decode(text: string): string {
    return this.encode(text);
  }
}

const rot13Codec = new Rot13Codec();

export function toRot13(text: string): string {
  return rot13Codec.encode(text);
}
