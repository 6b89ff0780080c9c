import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { InvalidDocumentFormatError } from '../errors';
import { detectEncoding, discoverExportEntries, parseDocuments, readDocuments } from '../loader';
import { removeDir, tempDir, writeExport } from './helpers';

describe('parseDocuments', () => {
  it('accepts a single object', () => {
    expect(parseDocuments('a.json', '{"id":"a1"}')).toEqual([{ filePath: 'a.json', index: 0, document: { id: 'a1' } }]);
  });

  it('accepts an array of objects', () => {
    expect(parseDocuments('a.json', '[{"id":1},{"id":2}]').map((d) => d.index)).toEqual([0, 1]);
  });

  it('strips a leading byte order mark', () => {
    expect(parseDocuments('a.json', '\uFEFF{"id":"a1"}')[0]?.document).toEqual({ id: 'a1' });
  });

  it('rejects arrays holding anything but objects', () => {
    expect(() => parseDocuments('a.json', '[{"id":1}, 2]')).toThrow(
      'Invalid document format in a.json: element 1 is not an object',
    );
  });

  it('rejects scalars and malformed JSON', () => {
    expect(() => parseDocuments('a.json', '"text"')).toThrow(InvalidDocumentFormatError);
    expect(() => parseDocuments('a.json', 'null')).toThrow(InvalidDocumentFormatError);
    expect(() => parseDocuments('a.json', '{')).toThrow(InvalidDocumentFormatError);
  });
});

describe('detectEncoding', () => {
  it('recognises a UTF-16LE byte order mark', () => {
    expect(detectEncoding(Uint8Array.from([0xff, 0xfe, 0x7b, 0x00]))).toBe('utf16le');
    expect(detectEncoding(Uint8Array.from([0x7b]))).toBe('utf-8');
  });
});

describe('export tree', () => {
  let root: string;

  beforeEach(() => {
    root = tempDir();
  });

  afterEach(() => {
    removeDir(root);
  });

  it('lists directories and root-level JSON files by name', () => {
    writeExport(root, {
      'b/x.json': {},
      'a.json': {},
      'README.md': 'not a collection',
      'C/y.json': {},
    });

    expect(discoverExportEntries(root).map((e) => [e.name, e.stem, e.kind])).toEqual([
      ['C', 'C', 'directory'],
      ['a.json', 'a', 'file'],
      ['b', 'b', 'directory'],
    ]);
  });

  it('reads UTF-16LE files', () => {
    const file = path.join(root, 'wide.json');
    fs.writeFileSync(file, Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from('{"id":"w1"}', 'utf16le')]));
    expect(readDocuments(file)[0]?.document).toEqual({ id: 'w1' });
  });
});
