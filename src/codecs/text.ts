import { TextDecoder } from 'node:util';

import { UnsupportedEncodingError } from '../utils';
import { readAscii } from './binary';

/**
 * Text encodings selectable by the first byte of an ID3v2 text-bearing frame.
 * UTF16BE and UTF8 are only defined from revision 2.4 on.
 */
export const TextEncoding = {
  ISO_8859_1: 0,
  UTF16: 1,
  UTF16BE: 2,
  UTF8: 3,
} as const;

export type TextEncoding = (typeof TextEncoding)[keyof typeof TextEncoding];

export type ByteOrder = 'le' | 'be';

/**
 * Per-frame decoding state.
 * When a UTF-16 string has no BOM, the byte order of the previous string in the same
 * frame is used, or little-endian for the first one.
 */
export interface TextDecodingContext {
  byteOrder?: ByteOrder;
}

const utf8Decoder = new TextDecoder('utf-8');
const utf16leDecoder = new TextDecoder('utf-16le', { ignoreBOM: true });

export function isTextEncoding(value: number): value is TextEncoding {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

/**
 * Validate an encoding byte
 * @param value The first byte of a frame payload
 * @returns The value typed as a TextEncoding
 * @throws UnsupportedEncodingError for anything but 0..3
 */
export function toTextEncoding(value: number): TextEncoding {
  if (!isTextEncoding(value)) {
    throw new UnsupportedEncodingError(value);
  }
  return value;
}

/**
 * Width of the null terminator, in bytes
 */
export function terminatorSize(encoding: TextEncoding): 1 | 2 {
  return encoding === TextEncoding.UTF16 || encoding === TextEncoding.UTF16BE ? 2 : 1;
}

/**
 * Locate the terminator of a string starting at `offset`.
 * Double-byte terminators are only recognised on code unit boundaries: the zero high
 * byte of one character and the zero low byte of the next never end the string.
 * @returns Index of the terminator, or -1 when the string runs to the end of the data
 */
export function findTerminator(data: Uint8Array, encoding: TextEncoding, offset = 0): number {
  if (terminatorSize(encoding) === 1) {
    return data.indexOf(0, offset);
  }
  for (let i = offset; i + 1 < data.length; i += 2) {
    if (data[i] === 0 && data[i + 1] === 0) {
      return i;
    }
  }
  return -1;
}

function stripTrailingNulls(text: string): string {
  let end = text.length;
  while (end > 0 && text.codePointAt(end - 1) === 0) {
    end--;
  }
  return end === text.length ? text : text.slice(0, end);
}

function decodeUtf16BE(bytes: Uint8Array): string {
  // swap into little-endian so only the always-available utf-16le decoder is needed
  const swapped = new Uint8Array(bytes.length);
  for (let i = 0; i + 1 < bytes.length; i += 2) {
    swapped[i] = bytes[i + 1];
    swapped[i + 1] = bytes[i];
  }
  if (bytes.length % 2 === 1) {
    swapped[bytes.length - 1] = bytes[bytes.length - 1];
  }
  return utf16leDecoder.decode(swapped);
}

function decodeUtf16(bytes: Uint8Array, context: TextDecodingContext): string {
  let data = bytes;
  if (data.length >= 2 && data[0] === 0xff && data[1] === 0xfe) {
    context.byteOrder = 'le';
    data = data.subarray(2);
  } else if (data.length >= 2 && data[0] === 0xfe && data[1] === 0xff) {
    context.byteOrder = 'be';
    data = data.subarray(2);
  }
  return context.byteOrder === 'be' ? decodeUtf16BE(data) : utf16leDecoder.decode(data);
}

/**
 * Decode a byte run in one of the four ID3v2 encodings.
 * The terminator and any null padding after the text are dropped; a missing terminator
 * is fine. Malformed UTF-8 and unpaired UTF-16 surrogates decode to U+FFFD.
 * @param encoding Encoding byte as found in the frame
 * @param bytes The text bytes
 * @param context Byte order memory shared by the strings of one frame
 * @returns The text
 * @throws UnsupportedEncodingError if `encoding` is not 0..3
 */
export function decodeText(encoding: number, bytes: Uint8Array, context: TextDecodingContext = {}): string {
  switch (toTextEncoding(encoding)) {
    case TextEncoding.ISO_8859_1: {
      return stripTrailingNulls(readAscii(bytes));
    }
    case TextEncoding.UTF16: {
      return stripTrailingNulls(decodeUtf16(bytes, context));
    }
    case TextEncoding.UTF16BE: {
      // no BOM is defined for this encoding, but some writers add one
      const hasBom = bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff;
      return stripTrailingNulls(decodeUtf16BE(hasBom ? bytes.subarray(2) : bytes));
    }
    case TextEncoding.UTF8: {
      return stripTrailingNulls(utf8Decoder.decode(bytes));
    }
  }
}

/**
 * Read one terminated string
 * @param data Bytes holding the string
 * @param encoding Encoding of the string
 * @param offset Where the string starts
 * @param context Byte order memory shared by the strings of one frame
 * @returns The text and the offset right after its terminator (or the end of data)
 */
export function readTerminatedText(
  data: Uint8Array,
  encoding: number,
  offset = 0,
  context: TextDecodingContext = {},
): { text: string; next: number } {
  const textEncoding = toTextEncoding(encoding);
  const end = findTerminator(data, textEncoding, offset);
  if (end < 0) {
    return { text: decodeText(textEncoding, data.subarray(offset), context), next: data.length };
  }
  return {
    text: decodeText(textEncoding, data.subarray(offset, end), context),
    next: end + terminatorSize(textEncoding),
  };
}

/**
 * Split a byte run into its null separated strings.
 * Empty strings left by trailing terminators or padding are not reported.
 * @param encoding Encoding byte as found in the frame
 * @param bytes The text bytes
 * @param context Byte order memory shared by the strings of one frame
 * @returns The strings, in order
 */
export function decodeTextList(encoding: number, bytes: Uint8Array, context: TextDecodingContext = {}): string[] {
  const values = new Array<string>();
  let offset = 0;
  while (offset < bytes.length) {
    const { text, next } = readTerminatedText(bytes, encoding, offset, context);
    values.push(text);
    offset = next;
  }
  while (values.length > 0 && values.at(-1) === '') {
    values.pop();
  }
  return values;
}
