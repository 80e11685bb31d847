/**
 * Decoders that can reject their input.
 */
export type DecoderName =
  | "hex"
  | "binary"
  | "base64"
  | "gzip"
  | "utf-8"
  | "utf-16le"
  | "utf-16be"
  | "utf-32le";

/**
 * Raised when a decoder receives a representation it cannot reverse.
 *
 * The error never carries the rejected input itself, only where decoding
 * stopped.
 */
export class MalformedInputError extends Error {
  readonly codec: DecoderName;
  readonly position: number | undefined;

  constructor(
    message: string,
    codec: DecoderName,
    position?: number,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "MalformedInputError";
    this.codec = codec;
    this.position = position;
    Object.freeze(this);
  }
}

/**
 * Extract a printable message from anything a library may throw.
 */
export function describeError(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}
