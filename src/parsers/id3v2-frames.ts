import { readAscii } from '../codecs/binary';
import { decodeTextList, readTerminatedText, TextDecodingContext, TextEncoding, toTextEncoding } from '../codecs/text';
import { CommentFrame, CommonField, DecodedFrame, PictureFrame, RawFrame, TextFrame } from '../metadata';
import { Id3Error, MalformedFrameError } from '../utils';
import { Id3v2Frame, Id3v2MajorVersion } from './id3v2';
import V22_FRAME_IDS from './id3v2-frame-ids.json';

const V22_TO_V24: Record<string, string | undefined> = V22_FRAME_IDS;

/**
 * Frames that supply a common field, by their 2.3/2.4 identifier
 */
const COMMON_FIELD_FRAMES: Record<string, CommonField | undefined> = {
  TIT2: 'title',
  TPE1: 'artist',
  TALB: 'album',
  TPE2: 'albumArtist',
  TCOM: 'composer',
  TRCK: 'track',
  TPOS: 'disc',
  TDRC: 'year',
  TYER: 'year',
  TCON: 'genre',
};

const V22_IMAGE_FORMATS: Record<string, string | undefined> = {
  JPG: 'image/jpeg',
  PNG: 'image/png',
  GIF: 'image/gif',
  BMP: 'image/bmp',
};

/**
 * Map an identifier to its 2.3/2.4 spelling
 * @param id Identifier as stored in the tag
 * @param majorVersion Revision of the tag
 * @returns The 4-character identifier; unknown 2.2 identifiers are returned unchanged
 */
export function canonicalFrameId(id: string, majorVersion: Id3v2MajorVersion): string {
  return majorVersion === 2 ? (V22_TO_V24[id] ?? id) : id;
}

/**
 * What a frame decoder gets to work with
 */
interface FrameDecodingInput {
  id: string;
  canonicalId: string;
  data: Uint8Array;
  majorVersion: Id3v2MajorVersion;
  warnings: string[];
}

type FrameDecoder = (input: FrameDecodingInput) => DecodedFrame;

function readEncoding({ id, data, majorVersion, warnings }: FrameDecodingInput): TextEncoding {
  if (data.length === 0) {
    throw new MalformedFrameError(id, 'empty payload');
  }
  const encoding = toTextEncoding(data[0]);
  if (majorVersion < 4 && (encoding === TextEncoding.UTF16BE || encoding === TextEncoding.UTF8)) {
    warnings.push(`Frame ${id} uses text encoding ${encoding}, which is only defined from ID3v2.4 on; decoded anyway`);
  }
  return encoding;
}

function decodeTextFrame(input: FrameDecodingInput): TextFrame {
  const encoding = readEncoding(input);
  const values = decodeTextList(encoding, input.data.subarray(1));
  const field = COMMON_FIELD_FRAMES[input.canonicalId];
  return {
    kind: 'text',
    id: input.id,
    canonicalId: input.canonicalId,
    ...(field ? { field } : {}),
    text: values.find((value) => value.length > 0) ?? '',
    values,
  };
}

function decodeUserTextFrame(input: FrameDecodingInput): TextFrame {
  const encoding = readEncoding(input);
  const context: TextDecodingContext = {};
  const { text: description, next } = readTerminatedText(input.data, encoding, 1, context);
  const values = decodeTextList(encoding, input.data.subarray(next), context);
  return {
    kind: 'text',
    id: input.id,
    canonicalId: input.canonicalId,
    text: values.find((value) => value.length > 0) ?? '',
    values,
    description,
  };
}

/**
 * COMM and USLT: encoding, 3-byte language, terminated short description, text
 */
function decodeCommentFrame(input: FrameDecodingInput): CommentFrame {
  const encoding = readEncoding(input);
  const { id, data } = input;
  if (data.length < 4) {
    throw new MalformedFrameError(id, 'payload too short for a language code');
  }
  const context: TextDecodingContext = {};
  const { text: description, next } = readTerminatedText(data, encoding, 4, context);
  return {
    kind: 'comment',
    id,
    canonicalId: input.canonicalId,
    language: readAscii(data, 1, 3).replace(/\0+$/, ''),
    description,
    // anything after the text's own terminator is not part of it
    text: readTerminatedText(data, encoding, next, context).text,
  };
}

/**
 * APIC: encoding, terminated Latin-1 MIME type, picture type, terminated description, image.
 * PIC (2.2): encoding, 3-character image format, picture type, terminated description, image.
 * The image bytes are copied as they are.
 */
function decodePictureFrame(input: FrameDecodingInput): PictureFrame {
  const encoding = readEncoding(input);
  const { id, data } = input;

  let mimeType: string;
  let format: string | undefined;
  let offset: number;
  if (input.majorVersion === 2) {
    if (data.length < 5) {
      throw new MalformedFrameError(id, 'payload too short for an image format');
    }
    format = readAscii(data, 1, 3);
    mimeType = V22_IMAGE_FORMATS[format.toUpperCase()] ?? `image/${format.toLowerCase()}`;
    offset = 4;
  } else {
    const mime = readTerminatedText(data, TextEncoding.ISO_8859_1, 1);
    // an omitted MIME type means "image/"
    mimeType = mime.text || 'image/';
    offset = mime.next;
  }
  if (offset >= data.length) {
    throw new MalformedFrameError(id, 'missing picture type');
  }
  const pictureType = data[offset];
  const { text: description, next } = readTerminatedText(data, encoding, offset + 1);
  return {
    kind: 'picture',
    id,
    canonicalId: input.canonicalId,
    mimeType,
    ...(format === undefined ? {} : { format }),
    pictureType,
    description,
    data: data.slice(next),
  };
}

/**
 * Pick the decoder for a 2.3/2.4 identifier
 * @returns The decoder, or undefined when the frame is to be kept raw
 */
function frameDecoderFor(canonicalId: string): FrameDecoder | undefined {
  switch (canonicalId) {
    case 'TXXX': {
      return decodeUserTextFrame;
    }
    case 'COMM':
    case 'USLT': {
      return decodeCommentFrame;
    }
    case 'APIC': {
      return decodePictureFrame;
    }
    default: {
      return canonicalId.startsWith('T') ? decodeTextFrame : undefined;
    }
  }
}

/**
 * Decode one frame.
 * Unknown identifiers, unreadable payloads and frames that fail to decode all come back
 * as raw frames, so nothing is dropped; decoding failures are also added to `warnings`.
 * @param frame The frame as read from the tag
 * @param majorVersion Revision of the tag
 * @param warnings Where problems are reported
 * @returns The decoded frame
 */
export function decodeFrame(frame: Id3v2Frame, majorVersion: Id3v2MajorVersion, warnings: string[]): DecodedFrame {
  const canonicalId = canonicalFrameId(frame.id, majorVersion);
  const raw = (reason?: string): RawFrame => ({
    kind: 'raw',
    id: frame.id,
    canonicalId,
    data: frame.data,
    ...(reason === undefined ? {} : { reason }),
  });

  const decoder = frameDecoderFor(canonicalId);
  if (!decoder) {
    return raw();
  }
  if (!frame.readable) {
    return raw('payload could not be unwrapped');
  }
  try {
    return decoder({ id: frame.id, canonicalId, data: frame.data, majorVersion, warnings });
  } catch (error) {
    if (!(error instanceof Id3Error)) {
      throw error;
    }
    warnings.push(`Frame ${frame.id} could not be decoded: ${error.message}; kept as raw data`);
    return raw(error.message);
  }
}

/**
 * Decode all the frames of a tag, in order
 * @param frames Frames as read from the tag
 * @param majorVersion Revision of the tag
 * @param warnings Where problems are reported
 * @returns One decoded frame per input frame
 */
export function decodeFrames(frames: Id3v2Frame[], majorVersion: Id3v2MajorVersion, warnings: string[]): DecodedFrame[] {
  return frames.map((frame) => decodeFrame(frame, majorVersion, warnings));
}
