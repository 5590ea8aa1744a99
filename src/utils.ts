import type { FileHandle } from 'node:fs/promises';
import type { ReadableStreamDefaultReader } from 'node:stream/web';

export interface ParsingError {
  isUnsupportedFormatError?: boolean;
}

/**
 * Error thrown when a reader encounters data that is not a usable ID3 tag.
 * All the more specific errors below extend it.
 */
export class UnsupportedFormatError extends Error implements ParsingError {
  readonly isUnsupportedFormatError = true;

  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedFormatError';
  }
}

export type Id3ErrorCode = 'UNSUPPORTED_REVISION' | 'INVALID_SYNCHSAFE' | 'TRUNCATED_DATA' | 'UNSUPPORTED_ENCODING' | 'MALFORMED_FRAME';

/**
 * Base class of the ID3 specific errors, each carrying a machine readable code.
 */
export abstract class Id3Error extends UnsupportedFormatError {
  abstract readonly code: Id3ErrorCode;
}

/**
 * The container tag declares a major version other than 2, 3 or 4.
 */
export class UnsupportedRevisionError extends Id3Error {
  readonly code = 'UNSUPPORTED_REVISION';

  constructor(public readonly majorVersion: number) {
    super(`Unsupported ID3v2 revision: 2.${majorVersion}`);
    this.name = 'UnsupportedRevisionError';
  }
}

/**
 * A synchsafe integer has a byte with its high bit set.
 */
export class InvalidSynchsafeError extends Id3Error {
  readonly code = 'INVALID_SYNCHSAFE';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidSynchsafeError';
  }
}

/**
 * A structure declares more bytes than are available.
 */
export class TruncatedDataError extends Id3Error {
  readonly code = 'TRUNCATED_DATA';

  constructor(message: string) {
    super(message);
    this.name = 'TruncatedDataError';
  }
}

export class UnsupportedEncodingError extends Id3Error {
  readonly code = 'UNSUPPORTED_ENCODING';

  constructor(public readonly encoding: number) {
    super(`Unsupported text encoding: 0x${encoding.toString(16).padStart(2, '0')}`);
    this.name = 'UnsupportedEncodingError';
  }
}

/**
 * A frame payload does not have the layout its identifier requires.
 */
export class MalformedFrameError extends Id3Error {
  readonly code = 'MALFORMED_FRAME';

  constructor(
    public readonly frameId: string,
    message: string,
  ) {
    super(`Malformed ${frameId} frame: ${message}`);
    this.name = 'MalformedFrameError';
  }
}

/**
 * Reads everything from a stream reader into a single buffer.
 * The reader lock is released when done.
 * @param reader The reader of a (web) ReadableStream
 * @returns All the bytes the stream produced
 */
export async function readAll(reader: ReadableStreamDefaultReader<Uint8Array>): Promise<Uint8Array> {
  const chunks = new Array<Uint8Array>();
  let total = 0;
  try {
    // eslint-disable-next-line no-constant-condition
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      if (value) {
        chunks.push(value);
        total += value.length;
      }
    }
  } catch (error) {
    // Cancel reader to release the underlying source
    await reader.cancel(error);
    throw error;
  } finally {
    reader.releaseLock();
  }

  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

/**
 * Reads a byte range from a file.
 * This function works in Node.js environment but not in browser.
 * The returned buffer is shorter than `length` when the file ends earlier.
 * @param handle An open file handle
 * @param position Offset in the file to start reading from
 * @param length Number of bytes to read
 * @returns The bytes read
 */
export async function readFileRange(handle: FileHandle, position: number, length: number): Promise<Uint8Array> {
  const buffer = new Uint8Array(Math.max(0, length));
  let filled = 0;
  while (filled < buffer.length) {
    const { bytesRead } = await handle.read(buffer, filled, buffer.length - filled, position + filled);
    if (bytesRead === 0) break;
    filled += bytesRead;
  }
  return filled === buffer.length ? buffer : buffer.subarray(0, filled);
}
