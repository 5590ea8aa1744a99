/**
 * Synchsafe integers and unsynchronisation
 *
 * Both exist to keep the MPEG frame sync pattern (11 set bits) out of tag data:
 * synchsafe integers only use the low 7 bits of every byte, and unsynchronisation
 * inserts a 0x00 after every 0xFF that could start a false sync.
 */

import { InvalidSynchsafeError, TruncatedDataError } from '../utils';
import { toHexString } from './binary';

/**
 * Decode a synchsafe integer, most significant byte first.
 * Four bytes give a 28-bit value; the 2.4 extended header CRC uses five bytes (35 bits),
 * which is why the value is accumulated by multiplication rather than bit shifts.
 * @param buffer The buffer to read from
 * @param offset Offset of the first byte
 * @param length Number of bytes, 4 unless stated otherwise
 * @returns The decoded value
 * @throws InvalidSynchsafeError if any byte has its high bit set
 */
export function decodeSynchsafe(buffer: Uint8Array, offset = 0, length = 4): number {
  if (offset < 0 || offset + length > buffer.length) {
    throw new TruncatedDataError(`Insufficient data for reading a ${length}-byte synchsafe integer at offset ${offset} from a buffer of size ${buffer.length}`);
  }
  let value = 0;
  for (let i = offset; i < offset + length; i++) {
    const byte = buffer[i];
    if (byte & 0x80) {
      throw new InvalidSynchsafeError(`Invalid synchsafe integer: ${toHexString(buffer.subarray(offset, offset + length))}`);
    }
    value = value * 0x80 + byte;
  }
  return value;
}

/**
 * Check whether the bytes at an offset form a valid synchsafe integer
 * @param buffer The buffer to check
 * @param offset Offset of the first byte
 * @param length Number of bytes
 * @returns true if all the bytes are available and none has the high bit set
 */
export function isSynchsafe(buffer: Uint8Array, offset = 0, length = 4): boolean {
  if (offset < 0 || offset + length > buffer.length) {
    return false;
  }
  for (let i = offset; i < offset + length; i++) {
    if (buffer[i] & 0x80) {
      return false;
    }
  }
  return true;
}

/**
 * Encode a value as a synchsafe integer
 * @param value Non-negative integer that fits in `7 * length` bits
 * @param length Number of output bytes
 * @returns The encoded bytes
 */
export function encodeSynchsafe(value: number, length = 4): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value >= 2 ** (7 * length)) {
    throw new RangeError(`Value ${value} cannot be stored in a ${length}-byte synchsafe integer`);
  }
  const result = new Uint8Array(length);
  let remaining = value;
  for (let i = length - 1; i >= 0; i--) {
    result[i] = remaining % 0x80;
    remaining = Math.floor(remaining / 0x80);
  }
  return result;
}

/**
 * Reverse unsynchronisation: every `0xFF 0x00` pair becomes a single `0xFF`.
 * @param data Unsynchronised bytes
 * @returns The original bytes; the input itself when there was nothing to collapse
 */
export function removeUnsynchronisation(data: Uint8Array): Uint8Array {
  let first = -1;
  for (let i = 0; i + 1 < data.length; i++) {
    if (data[i] === 0xff && data[i + 1] === 0x00) {
      first = i;
      break;
    }
  }
  if (first < 0) {
    return data;
  }

  const result = new Uint8Array(data.length);
  result.set(data.subarray(0, first + 1));
  let length = first + 1;
  for (let i = first + 2; i < data.length; i++) {
    result[length++] = data[i];
    if (data[i] === 0xff && i + 1 < data.length && data[i + 1] === 0x00) {
      i++;
    }
  }
  return result.subarray(0, length);
}

/**
 * Apply unsynchronisation: a `0x00` is inserted after every `0xFF` that is followed by
 * a byte with its top three bits set or by `0x00`, and after a trailing `0xFF`.
 * @param data Original bytes
 * @returns Unsynchronised bytes
 */
export function applyUnsynchronisation(data: Uint8Array): Uint8Array {
  const result = new Array<number>();
  for (let i = 0; i < data.length; i++) {
    const byte = data[i];
    result.push(byte);
    if (byte === 0xff) {
      const next = i + 1 < data.length ? data[i + 1] : undefined;
      if (next === undefined || next === 0x00 || (next & 0xe0) === 0xe0) {
        result.push(0x00);
      }
    }
  }
  return Uint8Array.from(result);
}
