export * from './aggregate';
export * from './codecs/genres';
export * from './codecs/synchsafe';
export * from './codecs/text';
export * from './get-metadata';
export * from './metadata';
export * from './parsers/id3v1';
export * from './parsers/id3v2';
export * from './parsers/id3v2-frames';
export {
  Id3Error,
  InvalidSynchsafeError,
  MalformedFrameError,
  TruncatedDataError,
  UnsupportedEncodingError,
  UnsupportedFormatError,
  UnsupportedRevisionError,
} from './utils';
export type { Id3ErrorCode, ParsingError } from './utils';
