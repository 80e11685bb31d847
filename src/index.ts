/**
 * textwright - Reversible text codecs and text metrics
 */

export type { Codec } from "./codec.js";
export { MalformedInputError, type DecoderName } from "./errors.js";

export { HexCodec, toHex, fromHex } from "./hex-codec.js";
export { BinaryCodec, toBinary, fromBinary } from "./binary-codec.js";
export {
  MorseCodec,
  MORSE_ALPHABET,
  MORSE_DECODE,
  toMorseCode,
  fromMorseCode,
  type MorseCodecOptions,
} from "./morse-codec.js";
export { Rot13Codec, toRot13 } from "./rot13-codec.js";
export {
  CompressionCodec,
  compress,
  decompress,
  type CompressionCodecOptions,
} from "./compression-codec.js";
export {
  encodeBytes,
  decodeBytes,
  reencode,
  toAscii,
  toUtf8,
  toUnicode,
  toUtf16,
  toUtf32,
  toWellFormed,
  type ByteEncoding,
} from "./byte-encodings.js";

export {
  isLetter,
  isDigit,
  isLetterOrDigit,
  isUpper,
  isLower,
  isPunctuation,
  isWhitespace,
  isVowel,
  isConsonant,
} from "./char-class.js";
export {
  getLength,
  countCharacters,
  codePointLength,
  logicalLength,
  countWords,
  countSentences,
  countParagraphs,
  countVowels,
  countConsonants,
  countDigits,
  countUppercase,
  countLowercase,
  countWhitespace,
  countPunctuation,
} from "./text-metrics.js";
export {
  buildFrequencyTable,
  pickByFrequency,
  mostFrequentCharacter,
  leastFrequentCharacter,
  mostFrequentWord,
  leastFrequentWord,
  type FrequencyOrder,
} from "./frequency.js";

export {
  toSnakeCase,
  toKebabCase,
  toCamelCase,
  toPascalCase,
  toTitleCase,
  removeNonAlphanumeric,
  removeNonAscii,
  removeDigits,
  removeLetters,
  removeSpecialCharacters,
  swapCase,
  toSarcasm,
  shuffle,
  reverse,
  toSha256,
  escapeJson,
  escapeXml,
  type RandomSource,
} from "./text-utilities.js";
