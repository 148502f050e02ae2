import { describe, it, expect } from 'vitest';
import { ByteWriter } from '../src/byte-writer';
import { pdfArray, pdfName, pdfNumber } from '../src/objects';

describe('ByteWriter', () => {
  it('Growth: past the initial size', () => {
    const writer = new ByteWriter(undefined, { initialSize: 4 });
    writer.writeString('abcdefgh');
    writer.writeBytes(Buffer.from([0x00, 0xff]));
    expect(writer.position).toBe(10);
    expect(writer.toBuffer()).toEqual(Buffer.from('abcdefgh\x00\xff', 'latin1'));
  });

  it('Growth: starts from a copy of existing bytes', () => {
    const existing = Buffer.from('xy');
    const writer = new ByteWriter(existing, { initialSize: 1 });
    writer.writeString('123');
    writer.patch(1, Buffer.from('Z'));
    expect(writer.toBuffer().toString()).toBe('xZ123');
    expect(existing.toString()).toBe('xy');
  });

  it('Objects: written serialized', () => {
    const writer = new ByteWriter();
    writer.writeObject(pdfArray([pdfName('A'), pdfNumber(1)]));
    expect(writer.toBuffer().toString()).toBe('[ /A 1 ]');
  });

  it('Views: bounded by the written data', () => {
    const writer = new ByteWriter(Buffer.from('hello'));
    expect(writer.view(1, 3).toString()).toBe('el');
    expect(writer.view(3, 100).toString()).toBe('lo');
    expect(writer.view().toString()).toBe('hello');
  });

  it('Patches: never extend the data', () => {
    const writer = new ByteWriter(Buffer.from('hello'));
    expect(() => writer.patch(4, Buffer.from('ab'))).toThrow(RangeError);
    expect(() => writer.patch(-1, Buffer.from('a'))).toThrow(RangeError);
    expect(writer.toBuffer().toString()).toBe('hello');
  });

  it('Output: toBuffer returns a copy', () => {
    const writer = new ByteWriter(Buffer.from('abc'));
    const copy = writer.toBuffer();
    writer.patch(0, Buffer.from('z'));
    expect(copy.toString()).toBe('abc');
  });
});
