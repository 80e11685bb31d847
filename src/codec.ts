/**
 * A reversible text transformation.
 *
 * Implementations guarantee `decode(encode(text)) === text` for every input
 * their encoder can represent. Lossy encoders document what they drop.
 */
export interface Codec {
  /**
   * Encode a string into the codec's representation.
   * @param text - The string to encode
   * @returns The encoded representation
   */
  encode(text: string): string;

  /**
   * Decode a representation produced by {@link Codec.encode}.
   * @param text - The representation to decode
   * @returns The decoded string
   * @throws MalformedInputError when the representation is not well formed
   */
  decode(text: string): string;
}
