import { resolveGenre } from './codecs/genres';
import { COMMON_FIELDS, CommentEntry, CommonField, CommonFields, DecodedFrame, LyricsEntry, Metadata, Picture, pictureTypeName } from './metadata';
import type { Id3v1Tag } from './parsers/id3v1';
import type { Id3v2ExtendedHeader, Id3v2Header } from './parsers/id3v2';

/**
 * An ID3v2 tag with its frames decoded
 */
export interface DecodedId3v2Tag {
  header: Id3v2Header;
  extendedHeader?: Id3v2ExtendedHeader;
  frames: DecodedFrame[];
}

export interface AggregateOptions {
  /**
   * Whether picture bytes are kept.
   * When false, pictures are still listed but their `data` is empty.
   * Default value is true.
   */
  includePictureData?: boolean;
}

function normaliseFieldValue(field: CommonField, value: string): string {
  switch (field) {
    case 'year': {
      // TDRC holds a timestamp such as "2004-05-01T12:00"
      return /^\d{4}/.exec(value)?.[0] ?? value;
    }
    case 'genre': {
      return resolveGenre(value);
    }
    default: {
      return value;
    }
  }
}

function fieldsFromId3v1(tag: Id3v1Tag): CommonFields {
  const fields: CommonFields = {
    title: tag.title,
    artist: tag.artist,
    album: tag.album,
    year: tag.year,
    comment: tag.comment,
    genre: tag.genre,
    track: tag.track === undefined ? undefined : String(tag.track),
  };
  for (const field of COMMON_FIELDS) {
    if (!fields[field]) {
      delete fields[field];
    }
  }
  return fields;
}

function fieldsFromId3v2(frames: DecodedFrame[]): CommonFields {
  const fields: CommonFields = {};
  for (const frame of frames) {
    if (frame.kind === 'text' && frame.field && frame.text) {
      // TDRC (2.4) is more precise than TYER (2.3) when a tag carries both
      if (fields[frame.field] === undefined || (frame.field === 'year' && frame.canonicalId === 'TDRC')) {
        fields[frame.field] = normaliseFieldValue(frame.field, frame.text);
      }
    } else if (frame.kind === 'comment' && frame.canonicalId === 'COMM' && frame.text && fields.comment === undefined) {
      fields.comment = frame.text;
    }
  }
  return fields;
}

/**
 * Merge what was read from the two tag formats into one view.
 * ID3v2 supersedes ID3v1, so a field present in both takes the ID3v2 value.
 * Lyrics, comments and pictures only exist in ID3v2.
 * @param legacy The ID3v1 tag, if the file has one
 * @param container The decoded ID3v2 tag, if the file has one
 * @param warnings Problems found while reading either tag
 * @param options Aggregation options
 * @returns The merged metadata, frozen together with its lists, their entries and the tag
 * headers; only the byte arrays of pictures and raw frames stay writable
 */
export function aggregate(
  legacy: Id3v1Tag | undefined,
  container: DecodedId3v2Tag | undefined,
  warnings: readonly string[] = [],
  options?: AggregateOptions,
): Metadata {
  const includePictureData = options?.includePictureData ?? true;
  const frames = container?.frames ?? [];

  const lyrics = new Array<LyricsEntry>();
  const comments = new Array<CommentEntry>();
  const pictures = new Array<Picture>();
  for (const frame of frames) {
    if (frame.kind === 'comment') {
      const entry = { language: frame.language, description: frame.description, text: frame.text };
      if (frame.canonicalId === 'USLT') {
        lyrics.push(entry);
      } else {
        comments.push(entry);
      }
    } else if (frame.kind === 'picture') {
      pictures.push({
        mimeType: frame.mimeType,
        ...(frame.format === undefined ? {} : { format: frame.format }),
        pictureType: frame.pictureType,
        pictureTypeName: pictureTypeName(frame.pictureType),
        description: frame.description,
        data: includePictureData ? frame.data : new Uint8Array(0),
      });
    }
  }

  const metadata: Metadata = {
    ...(legacy ? fieldsFromId3v1(legacy) : {}),
    ...fieldsFromId3v2(frames),
    lyrics: freezeEntries(lyrics),
    comments: freezeEntries(comments),
    pictures: freezeEntries(pictures),
    frames: freezeEntries(frames),
    ...(legacy ? { id3v1: Object.freeze({ ...legacy }) } : {}),
    ...(container
      ? {
          id3v2: Object.freeze({
            header: Object.freeze({ ...container.header, flags: Object.freeze({ ...container.header.flags }) }),
            ...(container.extendedHeader ? { extendedHeader: Object.freeze({ ...container.extendedHeader }) } : {}),
          }),
        }
      : {}),
    warnings: Object.freeze([...warnings]),
  };
  return Object.freeze(metadata);
}

/**
 * Copies of the entries, each frozen, in a frozen array.
 * Byte arrays inside the entries cannot be frozen and stay writable.
 */
function freezeEntries<T extends object>(entries: readonly T[]): readonly Readonly<T>[] {
  return Object.freeze(entries.map((entry) => Object.freeze({ ...entry })));
}
