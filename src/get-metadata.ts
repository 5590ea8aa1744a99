import { withConcurrency } from '@handy-common-utils/promise-utils';
import fs from 'node:fs/promises';
import type { ReadableStream } from 'node:stream/web';

import { aggregate, AggregateOptions, DecodedId3v2Tag } from './aggregate';
import { Metadata } from './metadata';
import { ID3V1_SIZE, readId3v1 } from './parsers/id3v1';
import { ID3V2_HEADER_SIZE, peekId3v2TotalSize, readId3v2 } from './parsers/id3v2';
import { decodeFrames } from './parsers/id3v2-frames';
import { readAll, readFileRange, UnsupportedFormatError } from './utils';

export type ParseId3Options = AggregateOptions & {
  /**
   * Whether to suppress console output.
   * When false, every warning is printed with console.warn.
   * Default value is true.
   */
  quiet?: boolean;
  /**
   * Do not look for an ID3v1 tag
   */
  skipId3v1?: boolean;
  /**
   * Do not look for an ID3v2 tag
   */
  skipId3v2?: boolean;
};

/**
 * The two places in a file where tags live
 */
export interface TagRegions {
  /**
   * The first bytes of the file, covering the whole ID3v2 tag if there is one
   */
  head: Uint8Array;
  /**
   * The last bytes of the file, at least 128 of them when the file is that long
   */
  tail: Uint8Array;
  /**
   * Size of the whole file, used to tell whether the tail overlaps the ID3v2 tag
   */
  fileSize?: number;
}

/**
 * Either the complete file content or its tag regions
 */
export type Id3Source = Uint8Array | TagRegions;

/**
 * Parse the ID3 tags of an MP3 file held in memory.
 *
 * Both tag formats are read independently: a broken ID3v2 tag does not stop the ID3v1 tag
 * from being used, and the other way round. Problems that could be worked around are listed
 * in `warnings` of the result.
 * @param source The file content, or its head and tail regions
 * @param optionsInput Options for the parser
 * @returns The metadata
 * @throws UnsupportedFormatError (or one of its subclasses) if the data is too short to hold
 * a tag, or if neither tag format yields anything
 */
export function parseId3(source: Id3Source, optionsInput?: ParseId3Options): Metadata {
  const options = {
    quiet: true,
    skipId3v1: false,
    skipId3v2: false,
    ...optionsInput,
  };
  const { head, tail, fileSize } = source instanceof Uint8Array ? { head: source, tail: source, fileSize: source.length } : source;

  if (Math.max(head.length, tail.length) < ID3V2_HEADER_SIZE) {
    throw new UnsupportedFormatError('Not an ID3 tagged file: insufficient data');
  }

  const warnings = new Array<string>();
  let container: DecodedId3v2Tag | undefined;
  let containerError: UnsupportedFormatError | undefined;
  if (!options.skipId3v2) {
    try {
      const tag = readId3v2(head);
      if (tag) {
        warnings.push(...tag.warnings);
        container = {
          header: tag.header,
          ...(tag.extendedHeader ? { extendedHeader: tag.extendedHeader } : {}),
          frames: decodeFrames(tag.frames, tag.header.majorVersion, warnings),
        };
      }
    } catch (error) {
      if (!(error instanceof UnsupportedFormatError)) {
        throw error;
      }
      containerError = error;
      warnings.push(`ID3v2 tag could not be read: ${error.message}`);
    }
  }

  let legacy = options.skipId3v1 ? undefined : readId3v1(tail);
  if (legacy && container && fileSize !== undefined && fileSize - ID3V1_SIZE < container.header.totalSize) {
    warnings.push('The last 128 bytes of the file belong to the ID3v2 tag; ignored as ID3v1 tag');
    legacy = undefined;
  }

  if (!legacy && !container) {
    throw containerError ?? new UnsupportedFormatError('Not an ID3 tagged file: no ID3v1 or ID3v2 tag found');
  }

  if (!options.quiet) {
    for (const warning of warnings) {
      console.warn(`id3: ${warning}`);
    }
  }
  return aggregate(legacy, container, warnings, options);
}

/**
 * Parse the ID3 tags from a stream.
 * The whole stream is read, since the ID3v1 tag sits at its very end.
 * @param stream The input Web ReadableStream (not Node Readable).
 *               To convert a Node Readable to Web ReadableStream, use `Readable.toWeb(nodeReadable)`.
 * @param options Options for the parser
 * @returns The metadata
 */
export async function parseId3FromStream(stream: ReadableStream<Uint8Array>, options?: ParseId3Options): Promise<Metadata> {
  const bytes = await readAll(stream.getReader());
  return parseId3(bytes, options);
}

/**
 * Parse the ID3 tags of a file.
 * Only the ID3v2 tag region at the start and the last 128 bytes are read.
 * This function works in Node.js environment but not in browser.
 * @param filePath The path to the MP3 file
 * @param options Options for the parser
 * @returns The metadata
 */
export async function parseId3FromFile(filePath: string, options?: ParseId3Options): Promise<Metadata> {
  const handle = await fs.open(filePath, 'r');
  try {
    const { size: fileSize } = await handle.stat();
    let head = await readFileRange(handle, 0, Math.min(ID3V2_HEADER_SIZE, fileSize));
    const tagSize = peekId3v2TotalSize(head);
    if (tagSize !== undefined && tagSize > head.length) {
      head = await readFileRange(handle, 0, Math.min(tagSize, fileSize));
    }
    const tailStart = Math.max(0, fileSize - ID3V1_SIZE);
    const tail = await readFileRange(handle, tailStart, fileSize - tailStart);
    return parseId3({ head, tail, fileSize }, options);
  } finally {
    await handle.close();
  }
}

export type ParseId3FileResult = { filePath: string; metadata: Metadata; error?: undefined } | { filePath: string; metadata?: undefined; error: unknown };

/**
 * Parse the ID3 tags of many files, a few at a time.
 * A file that fails does not stop the others; its error is returned in its result.
 * This function works in Node.js environment but not in browser.
 * @param filePaths Paths of the MP3 files
 * @param optionsInput Options for the parser, plus how many files to read at the same time (default 4)
 * @returns One result per file, in the order of `filePaths`
 */
export async function parseId3FromFiles(
  filePaths: readonly string[],
  optionsInput?: ParseId3Options & { concurrency?: number },
): Promise<ParseId3FileResult[]> {
  const { concurrency, ...options } = { concurrency: 4, ...optionsInput };
  return withConcurrency(concurrency, filePaths, async (filePath): Promise<ParseId3FileResult> => {
    try {
      return { filePath, metadata: await parseId3FromFile(filePath, options) };
    } catch (error) {
      return { filePath, error };
    }
  });
}
