import type { Id3v1Tag } from './parsers/id3v1';
import type { Id3v2ExtendedHeader, Id3v2Header } from './parsers/id3v2';

/**
 * The common fields, in display order
 */
export const COMMON_FIELDS = ['title', 'artist', 'album', 'albumArtist', 'composer', 'track', 'disc', 'year', 'genre', 'comment'] as const;

export type CommonField = (typeof COMMON_FIELDS)[number];

export type CommonFields = { [K in CommonField]?: string };

/**
 * Picture types of attached picture frames, indexed by the picture type byte
 */
export const PICTURE_TYPES = [
  'Other',
  'File icon',
  'Other file icon',
  'Front cover',
  'Back cover',
  'Leaflet page',
  'Media',
  'Lead artist',
  'Artist',
  'Conductor',
  'Band',
  'Composer',
  'Lyricist',
  'Recording location',
  'During recording',
  'During performance',
  'Video screen capture',
  'A bright coloured fish',
  'Illustration',
  'Band logotype',
  'Publisher logotype',
] as const;

export const PictureType = {
  Other: 0,
  FileIcon: 1,
  OtherFileIcon: 2,
  FrontCover: 3,
  BackCover: 4,
  LeafletPage: 5,
  Media: 6,
  LeadArtist: 7,
  Artist: 8,
  Conductor: 9,
  Band: 10,
  Composer: 11,
  Lyricist: 12,
  RecordingLocation: 13,
  DuringRecording: 14,
  DuringPerformance: 15,
  VideoScreenCapture: 16,
  BrightColouredFish: 17,
  Illustration: 18,
  BandLogotype: 19,
  PublisherLogotype: 20,
} as const;

export type PictureType = (typeof PictureType)[keyof typeof PictureType];

/**
 * Get the human readable name of a picture type
 * @param pictureType The picture type byte
 * @returns The name, e.g. "Front cover", or "Type 42" for values outside the table
 */
export function pictureTypeName(pictureType: number): string {
  return PICTURE_TYPES[pictureType] ?? `Type ${pictureType}`;
}

interface FrameBase {
  /**
   * Identifier as stored in the tag, e.g. "TT2" or "TIT2"
   */
  id: string;
  /**
   * Identifier in its 2.3/2.4 spelling, e.g. "TIT2" for both "TT2" and "TIT2"
   */
  canonicalId: string;
}

export interface TextFrame extends FrameBase {
  kind: 'text';
  /**
   * The common field this frame supplies, if any
   */
  field?: CommonField;
  /**
   * First non-empty value
   */
  text: string;
  /**
   * All the null separated values, in order
   */
  values: string[];
  /**
   * User defined text frames (TXXX) only
   */
  description?: string;
}

/**
 * Comments (COMM) and unsynchronised lyrics (USLT) share this shape
 */
export interface CommentFrame extends FrameBase {
  kind: 'comment';
  /**
   * ISO-639-2 language code, e.g. "eng"
   */
  language: string;
  description: string;
  text: string;
}

export interface PictureFrame extends FrameBase {
  kind: 'picture';
  mimeType: string;
  /**
   * 2.2 only: the 3-character image format, e.g. "JPG"
   */
  format?: string;
  pictureType: number;
  description: string;
  data: Uint8Array;
}

/**
 * A frame kept as its bytes: unknown identifiers, and frames that failed to decode
 */
export interface RawFrame extends FrameBase {
  kind: 'raw';
  data: Uint8Array;
  /**
   * Why the frame is raw when its identifier has a decoder
   */
  reason?: string;
}

export type DecodedFrame = TextFrame | CommentFrame | PictureFrame | RawFrame;

export interface LyricsEntry {
  language: string;
  description: string;
  text: string;
}

export type CommentEntry = LyricsEntry;

export interface Picture {
  mimeType: string;
  format?: string;
  pictureType: number;
  /**
   * Human readable picture type, e.g. "Front cover"
   */
  pictureTypeName: string;
  description: string;
  data: Uint8Array;
}

/**
 * Everything read from the ID3 tags of one file.
 * Common fields come from the ID3v2 tag when it has them and from the ID3v1 tag otherwise.
 */
export interface Metadata extends Readonly<CommonFields> {
  readonly lyrics: readonly LyricsEntry[];
  readonly comments: readonly CommentEntry[];
  readonly pictures: readonly Picture[];
  /**
   * All decoded ID3v2 frames, in tag order
   */
  readonly frames: readonly DecodedFrame[];
  readonly id3v1?: Readonly<Id3v1Tag>;
  readonly id3v2?: {
    readonly header: Readonly<Id3v2Header>;
    readonly extendedHeader?: Readonly<Id3v2ExtendedHeader>;
  };
  /**
   * Problems that were worked around while parsing
   */
  readonly warnings: readonly string[];
}

/**
 * Find the first picture of a type
 * @param metadata The parsed metadata
 * @param pictureType The picture type, front cover by default
 * @returns The picture, or undefined if the tag has none of that type
 */
export function findPicture(metadata: Pick<Metadata, 'pictures'>, pictureType: number = PictureType.FrontCover): Picture | undefined {
  return metadata.pictures.find((picture) => picture.pictureType === pictureType);
}
