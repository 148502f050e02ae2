/**
 * Incremental update session over a PDF document
 */
import { ByteWriter } from './byte-writer';
import { Lexer } from './lexer';
import { ObjectParser } from './object-parser';
import { freeEntry, resolveCrossReferences } from './xref';
import type { XRefEntry } from './xref';
import type { PDFObject, PDFEnd, PDFReference } from './objects';
import {
  pdfNull,
  pdfNumber,
  pdfDict,
  pdfReference
} from './objects';
import { serialize } from './serializer';
import {
  ObjectAccessError,
  SessionStateError,
  StructuralError,
  TokenError
} from './errors';
import {
  DEBUG,
  PDF_HEADER_REGEX,
  HEADER_SEARCH_WINDOW,
  MAX_OBJECT_NUMBER
} from './constants';
import type { UpdaterOptions } from './types';

/**
 * Lifecycle of a session; it only ever moves forward
 */
export type UpdaterState = 'initialized' | 'updating' | 'flushed' | 'signed';

/**
 * Callback writing exactly one PDF object into the document
 */
export type ObjectFiller<T> = (writer: ByteWriter) => T;

/**
 * Turns a parse failure into the matching exception
 */
export function faultToError(obj: PDFEnd, fallback: string): Error {
  if (obj.error?.type === 'token') {
    return new TokenError(obj.error.message);
  }
  return new StructuralError(obj.error?.message ?? fallback);
}

/**
 * Reads objects of a PDF document and appends updated versions of them,
 * finishing with a new cross-reference section and trailer.
 * Nothing already in the document is ever rewritten, except through `patch`
 * once the updates have been flushed.
 */
export class PDFUpdater {
  /** Cross-reference table, indexed by object number */
  private xref: XRefEntry[] = [];
  /** Current table size as it will be written to the trailer */
  private xrefSize = 0;
  /** Object numbers written during this session */
  private readonly updated = new Set<number>();
  private readonly document: ByteWriter;
  private readonly parser: ObjectParser;
  private currentState: UpdaterState = 'initialized';

  /** The trailer to be written, initialized with the newest one */
  readonly trailer: Map<string, PDFObject>;

  private constructor(document: Buffer, options: UpdaterOptions) {
    this.document = new ByteWriter(document, { initialSize: options.initialSize });
    this.parser = new ObjectParser(obj => this.dereference(obj));

    const resolved = resolveCrossReferences(this.document.view(), this.parser);
    this.xref = resolved.xref;
    this.xrefSize = resolved.size;
    this.trailer = resolved.trailer;
  }

  /**
   * Opens a session over a copy of the document, loading its cross-reference
   * table. The caller's buffer is never modified.
   */
  static open(document: Buffer, options: UpdaterOptions = {}): PDFUpdater {
    return new PDFUpdater(document, options);
  }

  get state(): UpdaterState {
    return this.currentState;
  }

  /** Declared size of the cross-reference table */
  get size(): number {
    return this.xrefSize;
  }

  /** Current document length in bytes */
  get length(): number {
    return this.document.position;
  }

  /**
   * Returns the whole cross-reference table as references to in-use objects
   */
  listIndirect(): PDFReference[] {
    const result: PDFReference[] = [];
    for (let n = 0; n < this.xref.length; n++) {
      if (this.xref[n].inUse) {
        result.push(pdfReference(n, this.xref[n].generation));
      }
    }
    return result;
  }

  /**
   * Extracts the claimed PDF version as a two-digit number, e.g. 17 for
   * PDF 1.7. The root's /Version wins over the header. Returns zero when
   * neither can be read.
   */
  version(root: PDFObject): number {
    if (root.kind === 'dict') {
      const version = root.entries.get('Version');
      if (version?.kind === 'name' && /^\d\.\d$/.test(version.text)) {
        return parseInt(version.text[0], 10) * 10 + parseInt(version.text[2], 10);
      }
    }

    // The header comment is always near the start
    const header = this.document.view(0, HEADER_SEARCH_WINDOW).toString('latin1');
    const match = PDF_HEADER_REGEX.exec(header);
    if (match) {
      return parseInt(match[1], 10) * 10 + parseInt(match[2], 10);
    }
    return 0;
  }

  /**
   * Retrieves an object by its number and generation. Missing, free and
   * stale objects come back as null.
   */
  get(n: number, generation: number): PDFObject {
    if (n >= this.xrefSize || n >= this.xref.length) {
      return pdfNull;
    }

    const ref = this.xref[n];
    if (!ref.inUse || ref.generation !== generation || ref.offset >= this.document.position) {
      return pdfNull;
    }

    const lexer = new Lexer(this.document.view(), ref.offset);
    const stack: PDFObject[] = [];
    for (;;) {
      const obj = this.parser.parse(lexer, stack);
      if (obj.kind === 'end') {
        throw faultToError(obj, `object ${n} ${generation} doesn't end`);
      }
      if (obj.kind !== 'indirect') {
        stack.push(obj);
      } else if (obj.n !== n || obj.generation !== generation) {
        throw new ObjectAccessError(`object mismatch: expected ${n} ${generation}, found ${obj.n} ${obj.generation}`);
      } else {
        return obj.value;
      }
    }
  }

  /**
   * Dereferences reference objects, and passes the other kinds through
   */
  dereference(obj: PDFObject): PDFObject {
    if (obj.kind !== 'reference') {
      return obj;
    }
    return this.get(obj.n, obj.generation);
  }

  /**
   * Makes a reference to the current generation of an object number
   */
  referenceTo(n: number): PDFReference {
    const generation = n < this.xref.length ? this.xref[n].generation : 0;
    return pdfReference(n, generation);
  }

  /**
   * Allocates a new object number
   */
  allocate(): number {
    this.assertWritable();
    const n = this.xrefSize;
    if (n > MAX_OBJECT_NUMBER) {
      throw new RangeError('object number overflow');
    }

    this.xrefSize++;
    while (this.xref.length < this.xrefSize) {
      this.xref.push(freeEntry());
    }
    // The slot only gets written to the new section once it's updated,
    // the list of free objects isn't fixed up
    return n;
  }

  private assertWritable(): void {
    if (this.currentState === 'flushed' || this.currentState === 'signed') {
      throw new SessionStateError('updates have already been flushed');
    }
  }

  /**
   * Appends an updated object to the end of the document. The filler must
   * write exactly one PDF object; it may read `writer.position` to learn
   * where the bytes it is about to write will land.
   * @returns Whatever the filler returned
   */
  update<T>(n: number, fill: ObjectFiller<T>): T {
    this.assertWritable();
    if (!Number.isInteger(n) || n < 0 || n >= this.xrefSize || n >= this.xref.length) {
      throw new RangeError(`object ${n} has not been allocated`);
    }

    const generation = this.xref[n].generation;
    this.currentState = 'updating';
    this.updated.add(n);
    this.xref[n] = {
      offset: this.document.position + 1,
      generation,
      inUse: true
    };

    this.document.writeString(`\n${n} ${generation} obj\n`);
    const result = fill(this.document);
    this.document.writeString('\nendobj');
    if (DEBUG) console.log(`Updated object ${n} ${generation} at offset ${this.xref[n].offset}`);
    return result;
  }

  /**
   * Convenience over `update` for an object that is already built
   */
  updateObject(n: number, obj: PDFObject): void {
    this.update(n, writer => writer.writeObject(obj));
  }

  /**
   * Writes a cross-reference section covering every updated object, followed
   * by the trailer and startxref
   */
  flushUpdates(): void {
    this.assertWritable();
    const updated = Array.from(this.updated).sort((a, b) => a - b);

    const startxref = this.document.position + 1;
    let out = '\nxref\n';

    // One subsection per run of consecutive object numbers
    let subsections = 0;
    for (let i = 0; i < updated.length;) {
      const start = updated[i];
      let stop = start + 1;
      for (i++; i < updated.length && updated[i] === stop; i++) {
        stop++;
      }

      out += `${start} ${stop - start}\n`;
      for (let n = start; n < stop; n++) {
        const ref = this.xref[n];
        out += `${ref.offset.toString().padStart(10, '0')} ` +
          `${ref.generation.toString().padStart(5, '0')} ${ref.inUse ? 'n' : 'f'} \n`;
      }
      subsections++;
    }

    // A section must contain at least one subsection
    if (updated.length === 0) {
      out += '0 0\n';
    }

    this.trailer.set('Size', pdfNumber(this.xrefSize));
    out += `trailer\n${serialize(pdfDict(this.trailer))}\nstartxref\n${startxref}\n%%EOF\n`;
    this.document.writeString(out);

    this.updated.clear();
    this.currentState = 'flushed';
    if (DEBUG) console.log(`Flushed ${updated.length} objects in ${subsections} subsections, xref at ${startxref}`);
  }

  /**
   * Overwrites bytes reserved earlier, once the layout is final
   */
  patch(offset: number, data: Uint8Array): void {
    if (this.currentState !== 'flushed') {
      throw new SessionStateError('placeholders can only be patched after flushing');
    }
    this.document.patch(offset, data);
  }

  /**
   * Returns a view of the document; only valid until the next write
   */
  view(start?: number, end?: number): Buffer {
    return this.document.view(start, end);
  }

  /**
   * Ends the session, returning the final document
   */
  finish(): Buffer {
    if (this.currentState !== 'flushed') {
      throw new SessionStateError('updates must be flushed before finishing');
    }
    this.currentState = 'signed';
    return this.document.toBuffer();
  }

  /**
   * Returns a copy of the document as it stands, in any state
   */
  toBuffer(): Buffer {
    return this.document.toBuffer();
  }
}
