/**
 * Cross-reference table loading
 *
 * Walks the chain of xref sections from the newest one (found through
 * startxref) back through each trailer's /Prev, building one flat table.
 */
import { Lexer } from './lexer';
import type { ObjectParser } from './object-parser';
import { pdfNumber, isInteger, isUint } from './objects';
import type { PDFObject } from './objects';
import { CrossReferenceError } from './errors';
import {
  DEBUG,
  STARTXREF_REGEX,
  TRAILER_SEARCH_WINDOW,
  XREF_MARKER,
  XREF_IN_USE,
  XREF_FREE,
  TRAILER_MARKER,
  MAX_GENERATION
} from './constants';

/**
 * Represents a PDF cross-reference entry
 */
export interface XRefEntry {
  /** File offset, or the number of the next free entry */
  offset: number;
  generation: number;
  inUse: boolean;
}

export interface ResolvedXRef {
  /** Entries indexed by object number, possibly longer than `size` */
  xref: XRefEntry[];
  /** Number of valid slots as declared by the trailer */
  size: number;
  /** The newest trailer, with /Prev pointing at the newest section */
  trailer: Map<string, PDFObject>;
  /** Offset of the newest section */
  startxref: number;
}

export function freeEntry(): XRefEntry {
  return { offset: 0, generation: 0, inUse: false };
}

/**
 * Finds the offset named by the last `startxref <offset> %%EOF` in the document
 */
export function findStartXRef(document: Buffer): number {
  // startxref is always near the end, there's no need to search further
  const from = Math.max(0, document.length - TRAILER_SEARCH_WINDOW);
  const haystack = document.toString('latin1', from);

  let offset: string | undefined;
  for (const match of haystack.matchAll(STARTXREF_REGEX)) {
    offset = match[1];
  }
  if (offset === undefined) {
    throw new CrossReferenceError('cannot find startxref');
  }
  return parseInt(offset, 10);
}

function isKeyword(obj: PDFObject, text: string): boolean {
  return obj.kind === 'keyword' && obj.text === text;
}

/**
 * Reads one xref section up to and including the trailer keyword.
 * Entries for numbers in `loaded` are skipped, newer sections having won.
 */
function loadXRefSection(
  document: Buffer,
  lexer: Lexer,
  parser: ObjectParser,
  xref: XRefEntry[],
  loaded: Set<number>
): void {
  const throwaway: PDFObject[] = [];
  if (!isKeyword(parser.parse(lexer, throwaway), XREF_MARKER)) {
    throw new CrossReferenceError('invalid xref table');
  }

  for (;;) {
    const first = parser.parse(lexer, throwaway);
    if (first.kind === 'end') {
      throw new CrossReferenceError('unexpected EOF while looking for the trailer');
    }
    if (isKeyword(first, TRAILER_MARKER)) {
      break;
    }

    const second = parser.parse(lexer, throwaway);
    if (!isUint(first) || !isUint(second)) {
      throw new CrossReferenceError('invalid xref section header');
    }

    const start = first.value;
    const count = second.value;
    for (let i = 0; i < count; i++) {
      const offset = parser.parse(lexer, throwaway);
      const generation = parser.parse(lexer, throwaway);
      const key = parser.parse(lexer, throwaway);
      if (!isInteger(offset) || offset.value < 0 || offset.value > document.length ||
          !isInteger(generation) || generation.value < 0 || generation.value > MAX_GENERATION ||
          key.kind !== 'keyword' || (key.text !== XREF_IN_USE && key.text !== XREF_FREE)) {
        throw new CrossReferenceError('invalid xref entry');
      }

      const n = start + i;
      if (loaded.has(n)) {
        continue;
      }
      while (xref.length <= n) {
        xref.push(freeEntry());
      }
      loaded.add(n);
      xref[n] = {
        offset: offset.value,
        generation: generation.value,
        inUse: key.text === XREF_IN_USE
      };
    }
  }
}

/**
 * Builds the cross-reference table and recovers the newest trailer
 * @param parser Parser to read sections and trailers with
 */
export function resolveCrossReferences(document: Buffer, parser: ObjectParser): ResolvedXRef {
  const startxref = findStartXRef(document);
  const xref: XRefEntry[] = [];
  const loadedSections = new Set<number>();
  const loadedEntries = new Set<number>();
  let trailer: Map<string, PDFObject> | undefined;

  let offset = startxref;
  for (;;) {
    if (loadedSections.has(offset)) {
      throw new CrossReferenceError('circular xref offsets');
    }
    if (offset >= document.length) {
      throw new CrossReferenceError('invalid xref offset');
    }

    const lexer = new Lexer(document, offset);
    loadXRefSection(document, lexer, parser, xref, loadedEntries);

    const dict = parser.parse(lexer, []);
    if (dict.kind !== 'dict') {
      throw new CrossReferenceError('invalid trailer dictionary');
    }
    if (trailer === undefined) {
      trailer = new Map(dict.entries);
    }
    loadedSections.add(offset);
    if (DEBUG) console.log(`Loaded xref section at offset ${offset}`);

    const prev = dict.entries.get('Prev');
    if (prev === undefined) {
      break;
    }
    if (!isInteger(prev) || prev.value < 0) {
      throw new CrossReferenceError('invalid Prev offset');
    }
    offset = prev.value;
  }

  // Writers chain onto the section just read
  trailer.set('Prev', pdfNumber(startxref));

  const size = trailer.get('Size');
  if (size === undefined || !isInteger(size) || size.value <= 0) {
    throw new CrossReferenceError('invalid or missing cross-reference table Size');
  }

  if (DEBUG) console.log(`Resolved ${loadedEntries.size} xref entries over ${loadedSections.size} sections, Size ${size.value}`);
  return { xref, size: size.value, trailer, startxref };
}
