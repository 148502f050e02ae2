/**
 * Growable byte arena holding a document while it is being updated.
 *
 * All offsets handed out are indices into the arena, so they stay valid when
 * the backing buffer is reallocated. The buffer doubles when it runs out of
 * room.
 */
import type { PDFObject } from './objects';
import { serialize } from './serializer';

export interface ByteWriterOptions {
  /** Initial capacity in bytes. Default: 65536 (64KB) */
  initialSize?: number;
}

export class ByteWriter {
  private buffer: Buffer;
  private offset = 0;

  /**
   * @param existingBytes Bytes to start with, copied into the arena
   */
  constructor(existingBytes?: Uint8Array, options: ByteWriterOptions = {}) {
    const initialSize = Math.max(1, options.initialSize ?? 65536);

    if (existingBytes) {
      this.buffer = Buffer.alloc(existingBytes.length + initialSize);
      this.buffer.set(existingBytes);
      this.offset = existingBytes.length;
    } else {
      this.buffer = Buffer.alloc(initialSize);
    }
  }

  private grow(needed: number): void {
    const requiredSize = this.offset + needed;
    if (requiredSize <= this.buffer.length) {
      return;
    }

    let newSize = this.buffer.length;
    while (newSize < requiredSize) {
      newSize *= 2;
    }

    const newBuffer = Buffer.alloc(newSize);
    this.buffer.copy(newBuffer, 0, 0, this.offset);
    this.buffer = newBuffer;
  }

  /** Number of bytes written so far, i.e. the offset of the next byte */
  get position(): number {
    return this.offset;
  }

  writeBytes(data: Uint8Array): void {
    this.grow(data.length);
    this.buffer.set(data, this.offset);
    this.offset += data.length;
  }

  /**
   * Writes a latin1 string, one byte per character
   */
  writeString(text: string): void {
    this.grow(text.length);
    this.offset += this.buffer.write(text, this.offset, text.length, 'latin1');
  }

  writeObject(obj: PDFObject): void {
    this.writeString(serialize(obj));
  }

  /**
   * Overwrites already written bytes in place, never growing the arena
   */
  patch(offset: number, data: Uint8Array): void {
    if (offset < 0 || offset + data.length > this.offset) {
      throw new RangeError(`patch [${offset}, ${offset + data.length}) is outside of the written data`);
    }
    this.buffer.set(data, offset);
  }

  /**
   * Returns a view of the written bytes; only valid until the next write
   */
  view(start: number = 0, end: number = this.offset): Buffer {
    return this.buffer.subarray(start, Math.min(end, this.offset));
  }

  /**
   * Returns a copy of everything written
   */
  toBuffer(): Buffer {
    return Buffer.from(this.buffer.subarray(0, this.offset));
  }
}
