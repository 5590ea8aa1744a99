import { hasMarker, readAscii } from '../codecs/binary';
import { genreName } from '../codecs/genres';

export const ID3V1_SIZE = 128;

/**
 * ID3v1 trailer, the 128 bytes at the very end of the file.
 *
 * | Offset | Length | Field                                        |
 * | -----: | -----: | :------------------------------------------- |
 * |      0 |      3 | "TAG"                                        |
 * |      3 |     30 | title                                        |
 * |     33 |     30 | artist                                       |
 * |     63 |     30 | album                                        |
 * |     93 |      4 | year                                         |
 * |     97 |     30 | comment (v1.1: 28 bytes, 0x00, track number) |
 * |    127 |      1 | genre index                                  |
 */
export interface Id3v1Tag {
  /**
   * "1.1" when the comment field carries a track number
   */
  version: '1.0' | '1.1';
  title: string;
  artist: string;
  album: string;
  year: string;
  comment: string;
  track?: number;
  genreIndex: number;
  /**
   * Name of the genre, "Unknown" for 255 or any index outside the table
   */
  genre: string;
}

/**
 * Fixed fields are Latin-1, end at the first null and are padded with nulls or spaces.
 */
function readField(tag: Uint8Array, offset: number, length: number): string {
  const field = tag.subarray(offset, offset + length);
  const nul = field.indexOf(0);
  return readAscii(nul < 0 ? field : field.subarray(0, nul)).replace(/[\0 ]+$/, '');
}

/**
 * Reads the ID3v1 tag at the end of the data.
 * A missing tag is the normal state of many files and is reported as `undefined`.
 * @param tail The last bytes of the file; only the final 128 are looked at
 * @returns The tag, or undefined if there is none
 */
export function readId3v1(tail: Uint8Array): Id3v1Tag | undefined {
  if (tail.length < ID3V1_SIZE) {
    return undefined;
  }
  const tag = tail.subarray(tail.length - ID3V1_SIZE);
  if (!hasMarker(tag, 0, 'TAG')) {
    return undefined;
  }

  const hasTrack = tag[125] === 0 && tag[126] !== 0;
  const genreIndex = tag[127];
  return {
    version: hasTrack ? '1.1' : '1.0',
    title: readField(tag, 3, 30),
    artist: readField(tag, 33, 30),
    album: readField(tag, 63, 30),
    year: readField(tag, 93, 4),
    comment: readField(tag, 97, hasTrack ? 28 : 30),
    ...(hasTrack ? { track: tag[126] } : {}),
    genreIndex,
    genre: genreName(genreIndex),
  };
}
