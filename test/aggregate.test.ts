import { describe, expect, it } from '@jest/globals';

import { aggregate } from '../src/aggregate';
import { findPicture, PictureType } from '../src/metadata';
import { readId3v1 } from '../src/parsers/id3v1';
import { Id3v2Frame, Id3v2Header } from '../src/parsers/id3v2';
import { decodeFrames } from '../src/parsers/id3v2-frames';
import { bytes, id3v1Tag, latin1, textPayload } from './test-utils';

const header: Id3v2Header = {
  majorVersion: 3,
  minorVersion: 0,
  flags: { unsynchronisation: false, extendedHeader: false, experimental: false, footerPresent: false, compression: false },
  size: 1000,
  totalSize: 1010,
};

function container(...frames: Array<[string, Uint8Array]>) {
  const raw = frames.map(
    ([id, data]): Id3v2Frame => ({
      id,
      size: data.length,
      flags: {
        tagAlterPreservation: false,
        fileAlterPreservation: false,
        readOnly: false,
        groupingIdentity: false,
        compression: false,
        encryption: false,
        unsynchronisation: false,
        dataLengthIndicator: false,
      },
      data,
      readable: true,
    }),
  );
  return { header, frames: decodeFrames(raw, header.majorVersion, []) };
}

describe('aggregate', () => {
  it('should prefer ID3v2 values and fill the gaps from ID3v1', () => {
    const legacy = readId3v1(id3v1Tag({ title: 'Old title', artist: 'Band', year: '1999', genre: 17 }));
    const metadata = aggregate(legacy, container(['TIT2', textPayload('New title')]));
    expect(metadata.title).toBe('New title');
    expect(metadata.artist).toBe('Band');
    expect(metadata.year).toBe('1999');
    expect(metadata.genre).toBe('Rock');
    expect(metadata.id3v1).toEqual(legacy);
    expect(metadata.id3v2).toEqual({ header });
  });

  it('should leave out empty ID3v1 fields', () => {
    const metadata = aggregate(readId3v1(id3v1Tag({ title: 'Song', track: 7 })), undefined);
    expect(metadata.title).toBe('Song');
    expect(metadata.track).toBe('7');
    expect('artist' in metadata).toBe(false);
    expect('comment' in metadata).toBe(false);
    expect(metadata.genre).toBe('Unknown');
  });

  it('should take the leading year of a timestamp and prefer TDRC over TYER', () => {
    expect(aggregate(undefined, container(['TDRC', textPayload('2004-05-01T12:00')])).year).toBe('2004');
    expect(aggregate(undefined, container(['TYER', textPayload('2003')], ['TDRC', textPayload('2004')])).year).toBe('2004');
    expect(aggregate(undefined, container(['TDRC', textPayload('2004')], ['TYER', textPayload('2003')])).year).toBe('2004');
  });

  it('should resolve genre references', () => {
    expect(aggregate(undefined, container(['TCON', textPayload('(17)')])).genre).toBe('Rock');
    expect(aggregate(undefined, container(['TCON', textPayload('(4)Eurodisco')])).genre).toBe('Eurodisco');
  });

  it('should keep the first frame of each field', () => {
    const metadata = aggregate(undefined, container(['TPE1', textPayload('First')], ['TPE1', textPayload('Second')]));
    expect(metadata.artist).toBe('First');
  });

  it('should collect comments, lyrics and the extra common fields', () => {
    const metadata = aggregate(
      undefined,
      container(
        ['COMM', bytes(0, latin1('eng'), latin1('\0Great'))],
        ['USLT', bytes(0, latin1('eng'), latin1('\0Line one\nLine two'))],
        ['TPE2', textPayload('Various')],
        ['TCOM', textPayload('Composer')],
        ['TPOS', textPayload('1/2')],
        ['TRCK', textPayload('3/12')],
      ),
    );
    expect(metadata.comment).toBe('Great');
    expect(metadata.comments).toEqual([{ language: 'eng', description: '', text: 'Great' }]);
    expect(metadata.lyrics).toEqual([{ language: 'eng', description: '', text: 'Line one\nLine two' }]);
    expect(metadata.albumArtist).toBe('Various');
    expect(metadata.composer).toBe('Composer');
    expect(metadata.disc).toBe('1/2');
    expect(metadata.track).toBe('3/12');
  });

  it('should list pictures and find one by type', () => {
    const image = Uint8Array.from([0xff, 0xd8, 0xff]);
    const metadata = aggregate(
      undefined,
      container(
        ['APIC', bytes(0, latin1('image/jpeg\0'), PictureType.BackCover, 0, image)],
        ['APIC', bytes(0, latin1('image/jpeg\0'), PictureType.FrontCover, latin1('Front\0'), image)],
      ),
    );
    expect(metadata.pictures).toEqual([
      { mimeType: 'image/jpeg', pictureType: 4, pictureTypeName: 'Back cover', description: '', data: image },
      { mimeType: 'image/jpeg', pictureType: 3, pictureTypeName: 'Front cover', description: 'Front', data: image },
    ]);
    expect(findPicture(metadata)?.description).toBe('Front');
    expect(findPicture(metadata, PictureType.BackCover)?.pictureType).toBe(4);
    expect(findPicture(metadata, PictureType.Artist)).toBeUndefined();
  });

  it('should drop picture bytes on request', () => {
    const metadata = aggregate(undefined, container(['APIC', bytes(0, 0, 3, 0, [1, 2, 3])]), [], { includePictureData: false });
    expect(metadata.pictures[0].data).toEqual(new Uint8Array(0));
    expect(metadata.frames[0]).toMatchObject({ kind: 'picture', data: Uint8Array.from([1, 2, 3]) });
  });

  it('should produce an empty, frozen result without tags', () => {
    const metadata = aggregate(undefined, undefined, ['something odd']);
    expect(metadata).toEqual({ lyrics: [], comments: [], pictures: [], frames: [], warnings: ['something odd'] });
    expect(Object.isFrozen(metadata)).toBe(true);
  });

  it('should freeze the lists, their entries and the tag headers', () => {
    const legacy = readId3v1(id3v1Tag({ title: 'Song' }));
    const metadata = aggregate(
      legacy,
      container(['APIC', bytes(0, 0, 3, 0, [1, 2, 3])], ['COMM', bytes(0, latin1('eng'), latin1('\0Great'))]),
      ['something odd'],
    );
    for (const list of [metadata.lyrics, metadata.comments, metadata.pictures, metadata.frames, metadata.warnings]) {
      expect(Object.isFrozen(list)).toBe(true);
    }
    expect(Object.isFrozen(metadata.pictures[0])).toBe(true);
    expect(Object.isFrozen(metadata.comments[0])).toBe(true);
    expect(Object.isFrozen(metadata.frames[1])).toBe(true);
    expect(Object.isFrozen(metadata.id3v1)).toBe(true);
    expect(Object.isFrozen(metadata.id3v2)).toBe(true);
    expect(Object.isFrozen(metadata.id3v2?.header)).toBe(true);
    expect(Object.isFrozen(metadata.id3v2?.header.flags)).toBe(true);
    expect(Object.isFrozen(legacy)).toBe(false);
    expect(() => Reflect.apply(Array.prototype.push, metadata.pictures, [metadata.pictures[0]])).toThrow(TypeError);
    expect(metadata.pictures).toHaveLength(1);
  });
});
