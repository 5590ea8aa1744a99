/**
 * Binary data reading utilities
 *
 * ID3 stores every multi-byte integer big-endian, so only big-endian readers live here,
 * together with the Latin-1 and hex formatting helpers used by the tag readers.
 */

import { TruncatedDataError } from '../utils';

function ensureAvailable(buffer: Uint8Array, offset: number, size: number, what: string): void {
  if (offset < 0 || offset + size > buffer.length) {
    throw new TruncatedDataError(`Insufficient data for reading ${what} at offset ${offset} from a buffer of size ${buffer.length}`);
  }
}

// ============================================================================
// Big-Endian Reading
// ============================================================================

/**
 * Read a 16-bit unsigned integer (big-endian) from buffer
 * @param buffer The buffer to read from
 * @param offset Offset to read from
 * @returns The uint16 value
 */
export function readUInt16BE(buffer: Uint8Array, offset: number): number {
  ensureAvailable(buffer, offset, 2, 'uint16');
  return (buffer[offset] << 8) | buffer[offset + 1];
}

/**
 * Read a 24-bit unsigned integer (big-endian) from buffer.
 * ID3v2.2 frame sizes use this width.
 * @param buffer The buffer to read from
 * @param offset Offset to read from
 * @returns The uint24 value
 */
export function readUInt24BE(buffer: Uint8Array, offset: number): number {
  ensureAvailable(buffer, offset, 3, 'uint24');
  return (buffer[offset] << 16) | (buffer[offset + 1] << 8) | buffer[offset + 2];
}

/**
 * Read a 32-bit unsigned integer (big-endian) from buffer
 * @param buffer The buffer to read from
 * @param offset Offset to read from
 * @returns The uint32 value
 */
export function readUInt32BE(buffer: Uint8Array, offset: number): number {
  ensureAvailable(buffer, offset, 4, 'uint32');
  return ((buffer[offset] << 24) | (buffer[offset + 1] << 16) | (buffer[offset + 2] << 8) | buffer[offset + 3]) >>> 0;
}

/**
 * Format a number as a hexadecimal string without 0x prefix
 *
 * @param value Number to format
 * @param minDigits Minimum number of hex digits (padded with zeros). Default: 2
 * @returns Hex string (e.g., "01", "ff")
 *
 * @example
 * toHexString(1) // "01"
 * toHexString(255) // "ff"
 * toHexString(4096, 4) // "1000"
 * toHexString(new Uint8Array([1, 2, 3])) // "01 02 03"
 */
export function toHexString(value: number | Uint8Array, minDigits = 2): string {
  if (typeof value === 'number') {
    return value.toString(16).padStart(minDigits, '0');
  }
  return [...value].map((byte) => byte.toString(16).padStart(2, '0')).join(' ');
}

/**
 * Read a Latin-1 (ISO-8859-1) string from a Uint8Array.
 * Each byte becomes the code point of the same value, so plain ASCII reads the same way.
 * @param u8 The Uint8Array to read from
 * @param offset The offset to start reading from
 * @param length The number of bytes to read, clamped to the end of the array
 * @returns The string
 */
export function readAscii(u8: Uint8Array, offset = 0, length = u8.length - offset): string {
  const end = Math.min(u8.length, offset + length);
  let result = '';
  for (let i = offset; i < end; i++) {
    // eslint-disable-next-line unicorn/prefer-code-point
    result += String.fromCharCode(u8[i]);
  }
  return result;
}

/**
 * Check whether the bytes at an offset spell the given ASCII marker
 * @param u8 The Uint8Array to check
 * @param offset Where the marker should start
 * @param marker The expected characters, e.g. "ID3"
 * @returns true if every byte matches
 */
export function hasMarker(u8: Uint8Array, offset: number, marker: string): boolean {
  if (offset < 0 || offset + marker.length > u8.length) {
    return false;
  }
  for (let i = 0; i < marker.length; i++) {
    // eslint-disable-next-line unicorn/prefer-code-point
    if (u8[offset + i] !== marker.charCodeAt(i)) {
      return false;
    }
  }
  return true;
}

