import { gzipSync, inflateSync, type DeflateOptions } from "fflate";
import { decodeBytes, encodeBytes } from "./byte-encodings.js";
import type { Codec } from "./codec.js";
import { MalformedInputError, describeError } from "./errors.js";
import { codecLogger } from "./logger.js";

const log = codecLogger("compression");

type CompressionLevel = NonNullable<DeflateOptions["level"]>;

const WHITESPACE = /[ \t\r\n]/g;
const BASE64 =
  /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

// RFC 1952 member layout
const GZIP_HEADER_SIZE = 10;
const GZIP_TRAILER_SIZE = 8;
const FLAG_HCRC = 0x02;
const FLAG_EXTRA = 0x04;
const FLAG_NAME = 0x08;
const FLAG_COMMENT = 0x10;
const FLAG_RESERVED = 0xe0;

const CRC_TABLE = Uint32Array.from({ length: 256 }, (_, n) => {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  return c >>> 0;
});

function crc32(data: Uint8Array): number {
  let crc = 0xffffffff;
  for (const byte of data) {
    crc = CRC_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

function corrupt(message: string, cause?: unknown): MalformedInputError {
  return new MalformedInputError(message, "gzip", undefined, cause);
}

/**
 * Offset of the DEFLATE body in a single gzip member.
 */
function bodyOffset(member: Uint8Array): number {
  if (member.length < GZIP_HEADER_SIZE + GZIP_TRAILER_SIZE) {
    throw corrupt("Compressed payload is too short to be a gzip stream");
  }
  if (member[0] !== 0x1f || member[1] !== 0x8b || member[2] !== 8) {
    throw corrupt("Compressed payload is not a gzip stream");
  }

  const flags = member[3];
  if (flags & FLAG_RESERVED) {
    throw corrupt("Gzip header sets reserved flags");
  }

  let offset = GZIP_HEADER_SIZE;
  if (flags & FLAG_EXTRA) {
    offset += 2 + (member[offset] | (member[offset + 1] << 8));
  }
  for (const flag of [FLAG_NAME, FLAG_COMMENT]) {
    if (flags & flag) {
      const end = member.indexOf(0, offset);
      offset = end === -1 ? member.length : end + 1;
    }
  }
  if (flags & FLAG_HCRC) {
    offset += 2;
  }

  if (offset > member.length - GZIP_TRAILER_SIZE) {
    throw corrupt("Gzip header runs past the end of the payload");
  }
  return offset;
}

/**
 * Inflate one gzip member and check it against its trailer. The output
 * buffer grows with the inflated data; ISIZE is only compared, never used
 * to size anything.
 */
function gunzipVerified(member: Uint8Array): Uint8Array {
  const trailerStart = member.length - GZIP_TRAILER_SIZE;
  const body = member.subarray(bodyOffset(member), trailerStart);

  let raw: Uint8Array;
  try {
    raw = inflateSync(body);
  } catch (error) {
    throw corrupt(
      `Compressed payload is not a valid gzip stream: ${describeError(error, "decompression failed")}`,
      error
    );
  }

  const trailer = new DataView(member.buffer, member.byteOffset + trailerStart, GZIP_TRAILER_SIZE);
  if (trailer.getUint32(0, true) !== crc32(raw)) {
    throw corrupt("Gzip CRC32 does not match the decompressed data");
  }
  if (trailer.getUint32(4, true) !== raw.length % 0x100000000) {
    throw corrupt("Gzip ISIZE does not match the decompressed length");
  }
  return raw;
}

/**
 * Options for {@link CompressionCodec}
 */
export interface CompressionCodecOptions {
  /**
   * DEFLATE compression level, 0 (store) to 9 (smallest). Default is 6.
   * Any level decodes with any codec instance.
   */
  level?: CompressionLevel;
}

/**
 * Gzip + base64 representation of text.
 *
 * The text is serialized as UTF-16LE, gzipped, and written in standard padded
 * base64. Output is deterministic: the gzip header carries no timestamp.
 *
 * @example
 * ```typescript
 * const codec = new CompressionCodec({ level: 9 });
 * const payload = codec.encode("hello hello hello");
 * codec.decode(payload);
 * // => 'hello hello hello'
 * ```
 */
export class CompressionCodec implements Codec {
  private readonly level: CompressionLevel;

  constructor(options: CompressionCodecOptions = {}) {
    const { level = 6 } = options;
    this.level = level;
  }

  encode(text: string): string {
    const raw = encodeBytes(text, "utf-16le");
    const compressed = gzipSync(raw, { level: this.level, mtime: 0 });
    log("compressed %d bytes to %d (level %d)", raw.length, compressed.length, this.level);
    return Buffer.from(compressed).toString("base64");
  }

  /**
   * @throws MalformedInputError when the payload is not base64, is not an
   *         intact gzip stream (header, DEFLATE body, CRC32 and length), or
   *         does not hold whole UTF-16 code units
   */
  decode(text: string): string {
    const payload = text.replace(WHITESPACE, "");
    if (payload.length === 0) {
      return "";
    }

    if (!BASE64.test(payload)) {
      log("rejected payload that is not base64 (%d chars)", payload.length);
      throw new MalformedInputError("Compressed payload is not valid base64", "base64");
    }

    const compressed = new Uint8Array(Buffer.from(payload, "base64"));
    let raw: Uint8Array;
    try {
      raw = gunzipVerified(compressed);
    } catch (error) {
      log("rejected corrupt gzip stream (%d bytes)", compressed.length);
      throw error;
    }

    log("decompressed %d bytes to %d", compressed.length, raw.length);
    return decodeBytes(raw, "utf-16le");
  }
}

const compressionCodec = new CompressionCodec();

export function compress(text: string): string {
  return compressionCodec.encode(text);
}

export function decompress(payload: string): string {
  return compressionCodec.decode(payload);
}
