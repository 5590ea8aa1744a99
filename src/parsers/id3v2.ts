import { inflateSync } from 'node:zlib';

import { hasMarker, readAscii, readUInt16BE, readUInt24BE, readUInt32BE } from '../codecs/binary';
import { decodeSynchsafe, isSynchsafe, removeUnsynchronisation } from '../codecs/synchsafe';
import { Id3Error, InvalidSynchsafeError, MalformedFrameError, TruncatedDataError, UnsupportedRevisionError } from '../utils';

export const ID3V2_HEADER_SIZE = 10;
export const ID3V2_FOOTER_SIZE = 10;

export type Id3v2MajorVersion = 2 | 3 | 4;

export interface Id3v2HeaderFlags {
  unsynchronisation: boolean;
  /**
   * Not defined in 2.2
   */
  extendedHeader: boolean;
  experimental: boolean;
  /**
   * 2.4 only
   */
  footerPresent: boolean;
  /**
   * 2.2 only: the whole tag is compressed with a scheme that was never defined
   */
  compression: boolean;
}

export interface Id3v2Header {
  majorVersion: Id3v2MajorVersion;
  minorVersion: number;
  flags: Id3v2HeaderFlags;
  /**
   * Declared size of everything after the header, excluding the footer
   */
  size: number;
  /**
   * Header, body and footer together: the number of bytes the tag occupies at the start of the file
   */
  totalSize: number;
}

export interface Id3v2ExtendedHeader {
  /**
   * Bytes occupied by the extended header
   */
  size: number;
  /**
   * 2.3: size of the padding after the frames
   */
  paddingSize?: number;
  /**
   * CRC-32 of the frame data (2.3) or of the frames and padding (2.4)
   */
  crc?: number;
  /**
   * 2.4: this tag updates an earlier one
   */
  isUpdate?: boolean;
  /**
   * 2.4: restrictions byte as stored
   */
  restrictions?: number;
}

export interface Id3v2FrameFlags {
  tagAlterPreservation: boolean;
  fileAlterPreservation: boolean;
  readOnly: boolean;
  groupingIdentity: boolean;
  compression: boolean;
  encryption: boolean;
  /**
   * 2.4 only, 2.2 and 2.3 unsynchronise the whole tag instead
   */
  unsynchronisation: boolean;
  /**
   * 2.4 only
   */
  dataLengthIndicator: boolean;
}

export interface Id3v2Frame {
  /**
   * Identifier as stored: 3 characters in 2.2, 4 in 2.3 and 2.4
   */
  id: string;
  /**
   * Declared size of the payload
   */
  size: number;
  flags: Id3v2FrameFlags;
  /**
   * Payload with unsynchronisation and compression reversed and flag-dependent
   * prefix bytes removed; the stored payload when `readable` is false
   */
  data: Uint8Array;
  /**
   * False for encrypted frames and frames whose payload could not be unwrapped
   */
  readable: boolean;
  groupId?: number;
  encryptionMethod?: number;
}

export interface Id3v2Tag {
  header: Id3v2Header;
  extendedHeader?: Id3v2ExtendedHeader;
  /**
   * Frames in the order they are stored
   */
  frames: Id3v2Frame[];
  /**
   * Problems that were worked around, in the order they were found
   */
  warnings: string[];
}

/**
 * How frame headers are laid out in one revision of the format
 */
interface FrameLayout {
  idLength: 3 | 4;
  sizeLength: 3 | 4;
  headerSize: 6 | 10;
  idPattern: RegExp;
  readSize(data: Uint8Array, offset: number): number;
  readFlags(data: Uint8Array, offset: number): Id3v2FrameFlags;
}

const NO_FRAME_FLAGS: Id3v2FrameFlags = {
  tagAlterPreservation: false,
  fileAlterPreservation: false,
  readOnly: false,
  groupingIdentity: false,
  compression: false,
  encryption: false,
  unsynchronisation: false,
  dataLengthIndicator: false,
};

const FRAME_LAYOUTS: Record<Id3v2MajorVersion, FrameLayout> = {
  2: {
    idLength: 3,
    sizeLength: 3,
    headerSize: 6,
    idPattern: /^[A-Z0-9]{3}$/,
    readSize: readUInt24BE,
    readFlags: () => ({ ...NO_FRAME_FLAGS }),
  },
  3: {
    idLength: 4,
    sizeLength: 4,
    headerSize: 10,
    idPattern: /^[A-Z0-9]{4}$/,
    readSize: readUInt32BE,
    readFlags: (data, offset) => {
      const status = data[offset];
      const format = data[offset + 1];
      return {
        tagAlterPreservation: (status & 0x80) !== 0,
        fileAlterPreservation: (status & 0x40) !== 0,
        readOnly: (status & 0x20) !== 0,
        compression: (format & 0x80) !== 0,
        encryption: (format & 0x40) !== 0,
        groupingIdentity: (format & 0x20) !== 0,
        unsynchronisation: false,
        dataLengthIndicator: false,
      };
    },
  },
  4: {
    idLength: 4,
    sizeLength: 4,
    headerSize: 10,
    idPattern: /^[A-Z0-9]{4}$/,
    readSize: (data, offset) => decodeSynchsafe(data, offset),
    readFlags: (data, offset) => {
      const status = data[offset];
      const format = data[offset + 1];
      return {
        tagAlterPreservation: (status & 0x40) !== 0,
        fileAlterPreservation: (status & 0x20) !== 0,
        readOnly: (status & 0x10) !== 0,
        groupingIdentity: (format & 0x40) !== 0,
        compression: (format & 0x08) !== 0,
        encryption: (format & 0x04) !== 0,
        unsynchronisation: (format & 0x02) !== 0,
        dataLengthIndicator: (format & 0x01) !== 0,
      };
    },
  },
};

function isMajorVersion(value: number): value is Id3v2MajorVersion {
  return value === 2 || value === 3 || value === 4;
}

function parseHeaderFlags(majorVersion: Id3v2MajorVersion, flags: number): Id3v2HeaderFlags {
  return {
    unsynchronisation: (flags & 0x80) !== 0,
    extendedHeader: majorVersion !== 2 && (flags & 0x40) !== 0,
    experimental: majorVersion !== 2 && (flags & 0x20) !== 0,
    footerPresent: majorVersion === 4 && (flags & 0x10) !== 0,
    compression: majorVersion === 2 && (flags & 0x40) !== 0,
  };
}

const DEFINED_HEADER_FLAGS: Record<Id3v2MajorVersion, number> = { 2: 0xc0, 3: 0xe0, 4: 0xf0 };

/**
 * Parses the 10-byte tag header
 * @param head The first bytes of the file
 * @returns The header, or undefined if the data does not start with "ID3"
 * @throws TruncatedDataError if the header itself is cut short
 * @throws UnsupportedRevisionError if the major version is not 2, 3 or 4
 * @throws InvalidSynchsafeError if the size field is not a synchsafe integer
 */
export function parseId3v2Header(head: Uint8Array): Id3v2Header | undefined {
  if (!hasMarker(head, 0, 'ID3')) {
    return undefined;
  }
  if (head.length < ID3V2_HEADER_SIZE) {
    throw new TruncatedDataError(`ID3v2 header needs ${ID3V2_HEADER_SIZE} bytes but only ${head.length} are available`);
  }

  const majorVersion = head[3];
  if (!isMajorVersion(majorVersion)) {
    throw new UnsupportedRevisionError(majorVersion);
  }
  const flags = parseHeaderFlags(majorVersion, head[5]);
  const size = decodeSynchsafe(head, 6);
  return {
    majorVersion,
    minorVersion: head[4],
    flags,
    size,
    totalSize: ID3V2_HEADER_SIZE + size + (flags.footerPresent ? ID3V2_FOOTER_SIZE : 0),
  };
}

/**
 * Work out how many bytes at the start of a file belong to the ID3v2 tag, without failing.
 * Used to decide how much of a file to read before parsing.
 * @param head At least the first 10 bytes of the file
 * @returns The tag's total size, or undefined when there is no readable ID3v2 header
 */
export function peekId3v2TotalSize(head: Uint8Array): number | undefined {
  if (!hasMarker(head, 0, 'ID3') || head.length < ID3V2_HEADER_SIZE || !isMajorVersion(head[3]) || !isSynchsafe(head, 6)) {
    return undefined;
  }
  const footerPresent = head[3] === 4 && (head[5] & 0x10) !== 0;
  return ID3V2_HEADER_SIZE + decodeSynchsafe(head, 6) + (footerPresent ? ID3V2_FOOTER_SIZE : 0);
}

function parseExtendedHeaderV23(body: Uint8Array): Id3v2ExtendedHeader {
  // the size field does not count itself
  const declaredSize = readUInt32BE(body, 0);
  if (declaredSize < 6 || 4 + declaredSize > body.length) {
    throw new TruncatedDataError(`Extended header declares ${declaredSize} bytes, which does not fit in the tag`);
  }
  const flags = readUInt16BE(body, 4);
  const paddingSize = readUInt32BE(body, 6);
  const hasCrc = (flags & 0x8000) !== 0 && declaredSize >= 10;
  return {
    size: 4 + declaredSize,
    paddingSize,
    ...(hasCrc ? { crc: readUInt32BE(body, 10) } : {}),
  };
}

function parseExtendedHeaderV24(body: Uint8Array): Id3v2ExtendedHeader {
  // the size field counts the whole extended header
  const size = decodeSynchsafe(body, 0);
  if (size < 6 || size > body.length) {
    throw new TruncatedDataError(`Extended header declares ${size} bytes, which does not fit in the tag`);
  }
  const flags = body[5];
  const extendedHeader: Id3v2ExtendedHeader = { size };
  let offset = 6;
  // every flag that is set is followed by its data, prefixed with the data length
  const readFlagData = (): Uint8Array => {
    if (offset >= size || offset + 1 + body[offset] > size) {
      throw new TruncatedDataError('Extended header flag data runs past the extended header');
    }
    const length = body[offset];
    const data = body.subarray(offset + 1, offset + 1 + length);
    offset += 1 + length;
    return data;
  };
  if (flags & 0x40) {
    readFlagData();
    extendedHeader.isUpdate = true;
  }
  if (flags & 0x20) {
    const data = readFlagData();
    extendedHeader.crc = decodeSynchsafe(data, 0, data.length);
  }
  if (flags & 0x10) {
    const data = readFlagData();
    extendedHeader.restrictions = data[0];
  }
  return extendedHeader;
}

type FrameHeaderCheck = { ok: true; id: string; size: number } | { ok: false; problem: string };

function readFrameSize(layout: FrameLayout, body: Uint8Array, offset: number): number | undefined {
  try {
    return layout.readSize(body, offset);
  } catch (error) {
    if (error instanceof InvalidSynchsafeError) {
      return undefined;
    }
    throw error;
  }
}

function checkFrameHeader(layout: FrameLayout, body: Uint8Array, offset: number): FrameHeaderCheck {
  const id = readAscii(body, offset, layout.idLength);
  if (!layout.idPattern.test(id)) {
    return { ok: false, problem: `Invalid frame identifier ${JSON.stringify(id)} at offset ${offset}` };
  }
  const size = readFrameSize(layout, body, offset + layout.idLength);
  if (size === undefined) {
    return { ok: false, problem: `Frame ${id} at offset ${offset} has an invalid synchsafe size` };
  }
  const available = body.length - offset - layout.headerSize;
  if (size > available) {
    return { ok: false, problem: `Frame ${id} at offset ${offset} declares ${size} bytes but only ${available} remain` };
  }
  return { ok: true, id, size };
}

/**
 * Scan forward for something that looks like the start of a frame:
 * a valid identifier starting with a letter and a non-zero size that fits.
 * @returns Offset of the candidate, or -1 if there is none
 */
function findNextFrame(layout: FrameLayout, body: Uint8Array, from: number): number {
  for (let offset = from; offset + layout.headerSize <= body.length; offset++) {
    const first = body[offset];
    if (first < 0x41 || first > 0x5a) {
      continue;
    }
    const check = checkFrameHeader(layout, body, offset);
    if (check.ok && check.size > 0) {
      return offset;
    }
  }
  return -1;
}

function isPadding(body: Uint8Array, offset: number, length: number): boolean {
  for (let i = offset; i < offset + length; i++) {
    if (body[i] !== 0) {
      return false;
    }
  }
  return true;
}

interface UnwrappedFrameData {
  data: Uint8Array;
  readable: boolean;
  groupId?: number;
  encryptionMethod?: number;
}

/**
 * Strips the flag-dependent bytes in front of the payload and reverses
 * unsynchronisation and compression.
 */
function unwrapFrameData(
  id: string,
  payload: Uint8Array,
  flags: Id3v2FrameFlags,
  header: Id3v2Header,
  warnings: string[],
): UnwrappedFrameData {
  const result: Omit<UnwrappedFrameData, 'data' | 'readable'> = {};
  let offset = 0;
  const takeByte = (what: string): number => {
    if (offset >= payload.length) {
      throw new MalformedFrameError(id, `missing ${what}`);
    }
    return payload[offset++];
  };

  if (header.majorVersion === 3) {
    if (flags.compression) {
      // decompressed size, only informative
      if (offset + 4 > payload.length) {
        throw new MalformedFrameError(id, 'missing decompressed size');
      }
      offset += 4;
    }
    if (flags.encryption) result.encryptionMethod = takeByte('encryption method');
    if (flags.groupingIdentity) result.groupId = takeByte('group identifier');
  } else if (header.majorVersion === 4) {
    if (flags.groupingIdentity) result.groupId = takeByte('group identifier');
    if (flags.encryption) result.encryptionMethod = takeByte('encryption method');
    if (flags.dataLengthIndicator) {
      decodeSynchsafe(payload, offset);
      offset += 4;
    }
  }

  let data = payload.subarray(offset);
  if (header.majorVersion === 4 && (flags.unsynchronisation || header.flags.unsynchronisation)) {
    data = removeUnsynchronisation(data);
  }
  if (flags.encryption) {
    warnings.push(`Frame ${id} is encrypted (method ${result.encryptionMethod}); kept as raw data`);
    return { ...result, data, readable: false };
  }
  if (flags.compression) {
    try {
      data = new Uint8Array(inflateSync(data));
    } catch (error) {
      warnings.push(`Frame ${id} could not be decompressed: ${error}`);
      return { ...result, data, readable: false };
    }
  }
  return { ...result, data, readable: true };
}

/**
 * Reads frames until the body is exhausted or padding starts.
 * A bad frame is skipped with a warning and reading resumes at the next plausible frame header.
 */
function readFrames(body: Uint8Array, start: number, header: Id3v2Header, warnings: string[]): Id3v2Frame[] {
  const layout = FRAME_LAYOUTS[header.majorVersion];
  const frames = new Array<Id3v2Frame>();
  let offset = start;
  while (offset + layout.headerSize <= body.length) {
    if (isPadding(body, offset, layout.idLength)) {
      break;
    }

    const check = checkFrameHeader(layout, body, offset);
    if (!check.ok) {
      const next = findNextFrame(layout, body, offset + 1);
      warnings.push(next < 0 ? `${check.problem}; no further frames` : `${check.problem}; resuming at offset ${next}`);
      if (next < 0) break;
      offset = next;
      continue;
    }

    const { id, size } = check;
    if (size === 0) {
      warnings.push(`Frame ${id} at offset ${offset} is empty; skipped`);
      offset += layout.headerSize;
      continue;
    }

    const flags = layout.readFlags(body, offset + layout.idLength + layout.sizeLength);
    const payload = body.subarray(offset + layout.headerSize, offset + layout.headerSize + size);
    offset += layout.headerSize + size;

    try {
      frames.push({ id, size, flags, ...unwrapFrameData(id, payload, flags, header, warnings) });
    } catch (error) {
      if (!(error instanceof Id3Error)) {
        throw error;
      }
      warnings.push(`${error.message}; kept as raw data`);
      frames.push({ id, size, flags, data: payload, readable: false });
    }
  }
  return frames;
}

/**
 * Reads the ID3v2 tag at the start of the data.
 *
 * Reading goes header → extended header (if flagged) → frames → padding or end.
 * Problems inside the tag body do not fail the read; they end up in `warnings`
 * and affect as little of the tag as possible.
 * @param head The first bytes of the file, at least `header.totalSize` of them for a complete read
 * @returns The tag, or undefined if the data does not start with "ID3"
 * @throws TruncatedDataError if the 10-byte header is cut short
 * @throws UnsupportedRevisionError if the major version is not 2, 3 or 4
 * @throws InvalidSynchsafeError if the tag size is not a synchsafe integer
 */
export function readId3v2(head: Uint8Array): Id3v2Tag | undefined {
  const header = parseId3v2Header(head);
  if (!header) {
    return undefined;
  }
  const warnings = new Array<string>();
  const tag: Id3v2Tag = { header, frames: [], warnings };

  const undefinedFlags = head[5] & ~DEFINED_HEADER_FLAGS[header.majorVersion] & 0xff;
  if (undefinedFlags) {
    warnings.push(`Header has undefined flags set: 0x${undefinedFlags.toString(16).padStart(2, '0')}`);
  }

  let bodyEnd = ID3V2_HEADER_SIZE + header.size;
  if (bodyEnd > head.length) {
    warnings.push(`Tag declares ${header.size} bytes but only ${head.length - ID3V2_HEADER_SIZE} are available; reading what is there`);
    bodyEnd = head.length;
  }
  let body = head.subarray(ID3V2_HEADER_SIZE, bodyEnd);
  if (header.majorVersion < 4 && header.flags.unsynchronisation) {
    body = removeUnsynchronisation(body);
  }

  if (header.flags.compression) {
    warnings.push('ID3v2.2 tag is flagged as compressed; its frames cannot be read');
    return tag;
  }

  let start = 0;
  if (header.flags.extendedHeader) {
    try {
      tag.extendedHeader = header.majorVersion === 3 ? parseExtendedHeaderV23(body) : parseExtendedHeaderV24(body);
      start = tag.extendedHeader.size;
    } catch (error) {
      if (!(error instanceof Id3Error)) {
        throw error;
      }
      warnings.push(`Extended header could not be read: ${error.message}; frames skipped`);
      return tag;
    }
  }

  tag.frames = readFrames(body, start, header, warnings);
  return tag;
}
