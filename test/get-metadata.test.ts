import { afterAll, beforeAll, describe, expect, it, jest } from '@jest/globals';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ReadableStream } from 'node:stream/web';

import { applyUnsynchronisation } from '../src/codecs/synchsafe';
import { parseId3, parseId3FromFile, parseId3FromFiles, parseId3FromStream } from '../src/get-metadata';
import { UnsupportedFormatError, UnsupportedRevisionError } from '../src/utils';
import { bytes, frame, id3v1Tag, id3v2Tag, latin1, textPayload } from './test-utils';

const AUDIO = new Uint8Array(300).fill(0xaa);

function taggedFile(): Uint8Array {
  const tag = id3v2Tag(
    3,
    bytes(
      frame(3, 'TIT2', textPayload('Hello')),
      frame(3, 'TPE1', textPayload('The Band')),
      frame(3, 'APIC', bytes(0, latin1('image/png\0'), 3, 0, [0x89, 0x50, 0x00, 0xff])),
      new Uint8Array(32),
    ),
  );
  return bytes(tag, AUDIO, id3v1Tag({ title: 'Legacy title', album: 'Legacy album', year: '2001', track: 4, genre: 17 }));
}

describe('parseId3', () => {
  it('should merge both tags with ID3v2 taking precedence', () => {
    const metadata = parseId3(taggedFile());
    expect(metadata.title).toBe('Hello');
    expect(metadata.artist).toBe('The Band');
    expect(metadata.album).toBe('Legacy album');
    expect(metadata.year).toBe('2001');
    expect(metadata.track).toBe('4');
    expect(metadata.genre).toBe('Rock');
    expect(metadata.pictures).toHaveLength(1);
    expect(metadata.pictures[0].data).toEqual(Uint8Array.from([0x89, 0x50, 0x00, 0xff]));
    expect(metadata.id3v2?.header.majorVersion).toBe(3);
    expect(metadata.id3v1?.version).toBe('1.1');
    expect(metadata.warnings).toEqual([]);
  });

  it('should read only the tag regions when given them', () => {
    const file = taggedFile();
    const metadata = parseId3({ head: file.subarray(0, 200), tail: file.subarray(file.length - 128), fileSize: file.length });
    expect(metadata.title).toBe('Hello');
    expect(metadata.album).toBe('Legacy album');
  });

  it('should skip a tag format on request', () => {
    expect(parseId3(taggedFile(), { skipId3v1: true }).album).toBeUndefined();
    expect(parseId3(taggedFile(), { skipId3v2: true }).title).toBe('Legacy title');
  });

  it('should read ID3v1 when the ID3v2 tag is unusable', () => {
    const file = bytes(id3v2Tag(5, new Uint8Array(20)), AUDIO, id3v1Tag({ title: 'Legacy title' }));
    const metadata = parseId3(file);
    expect(metadata.title).toBe('Legacy title');
    expect(metadata.id3v2).toBeUndefined();
    expect(metadata.warnings).toEqual(['ID3v2 tag could not be read: Unsupported ID3v2 revision: 2.5']);
  });

  it('should report the ID3v2 error when there is nothing else', () => {
    const file = bytes(id3v2Tag(5, new Uint8Array(20)), AUDIO);
    expect(() => parseId3(file)).toThrow(UnsupportedRevisionError);
  });

  it('should fail when there is no tag at all', () => {
    expect(() => parseId3(AUDIO)).toThrow(UnsupportedFormatError);
    expect(() => parseId3(AUDIO)).toThrow('Not an ID3 tagged file: no ID3v1 or ID3v2 tag found');
    expect(() => parseId3(taggedFile(), { skipId3v1: true, skipId3v2: true })).toThrow('Not an ID3 tagged file: no ID3v1 or ID3v2 tag found');
  });

  it('should fail on data too short to hold a tag', () => {
    expect(() => parseId3(latin1('ID3'))).toThrow('Not an ID3 tagged file: insufficient data');
  });

  it('should ignore a TAG marker inside the ID3v2 tag', () => {
    const file = id3v2Tag(3, bytes(frame(3, 'TIT2', textPayload('Hello')), new Uint8Array(184)));
    expect(file.length).toBe(210);
    file.set(latin1('TAG'), 82);
    const metadata = parseId3(file);
    expect(metadata.title).toBe('Hello');
    expect(metadata.id3v1).toBeUndefined();
    expect(metadata.warnings).toEqual(['The last 128 bytes of the file belong to the ID3v2 tag; ignored as ID3v1 tag']);
  });

  it('should print warnings unless quiet', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    try {
      const file = id3v2Tag(3, bytes(frame(3, 'TPE1', new Uint8Array(0)), frame(3, 'TIT2', textPayload('Hello'))));
      parseId3(file);
      expect(warn).not.toHaveBeenCalled();
      parseId3(file, { quiet: false });
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith('id3: Frame TPE1 at offset 0 is empty; skipped');
    } finally {
      warn.mockRestore();
    }
  });

  it('should collapse FF 00 in an unsynchronised text payload', () => {
    const body = applyUnsynchronisation(frame(3, 'TIT2', textPayload('Aÿà')));
    expect([...body.subarray(10)]).toEqual([0x00, 0x41, 0xff, 0x00, 0xe0]);
    expect(parseId3(id3v2Tag(3, body, 0x80)).title).toBe('Aÿà');
  });

  it('should treat 2.2 and 2.3 tags alike', () => {
    const v22 = parseId3(id3v2Tag(2, bytes(frame(2, 'TT2', textPayload('Hello')), frame(2, 'TP1', textPayload('Band')))));
    const v23 = parseId3(id3v2Tag(3, bytes(frame(3, 'TIT2', textPayload('Hello')), frame(3, 'TPE1', textPayload('Band')))));
    expect([v22.title, v22.artist]).toEqual([v23.title, v23.artist]);
    expect(v22.frames.map((f) => f.canonicalId)).toEqual(['TIT2', 'TPE1']);
  });
});

describe('parseId3FromStream', () => {
  it('should read the whole stream', async () => {
    const file = taggedFile();
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(file.subarray(0, 50));
        controller.enqueue(file.subarray(50, 400));
        controller.enqueue(file.subarray(400));
        controller.close();
      },
    });
    const metadata = await parseId3FromStream(stream);
    expect(metadata.title).toBe('Hello');
    expect(metadata.album).toBe('Legacy album');
  });
});

describe('parseId3FromFile', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'id3-test-'));
    fs.writeFileSync(path.join(dir, 'tagged.mp3'), taggedFile());
    fs.writeFileSync(path.join(dir, 'plain.mp3'), AUDIO);
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should read the tags of a file', async () => {
    const metadata = await parseId3FromFile(path.join(dir, 'tagged.mp3'));
    expect(metadata.title).toBe('Hello');
    expect(metadata.artist).toBe('The Band');
    expect(metadata.album).toBe('Legacy album');
    expect(metadata.pictures[0].data).toEqual(Uint8Array.from([0x89, 0x50, 0x00, 0xff]));
  });

  it('should report each file separately', async () => {
    const results = await parseId3FromFiles([path.join(dir, 'tagged.mp3'), path.join(dir, 'plain.mp3'), path.join(dir, 'missing.mp3')], { concurrency: 2 });
    expect(results.map((r) => path.basename(r.filePath))).toEqual(['tagged.mp3', 'plain.mp3', 'missing.mp3']);
    expect(results[0].metadata?.title).toBe('Hello');
    expect(results[1].error).toBeInstanceOf(UnsupportedFormatError);
    expect(results[2].error).toHaveProperty('code', 'ENOENT');
  });
});
