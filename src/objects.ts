/**
 * Types representing PDF tokens and objects
 *
 * Every value is one member of the `PDFObject` union, told apart by `kind`.
 * Objects are never mutated once built; use `withEntry` and friends to derive
 * new ones. Byte strings (names, strings, keywords, comments) are kept as
 * latin1 JavaScript strings, one character per byte.
 */
import { MAX_OBJECT_NUMBER } from './constants';

/**
 * What went wrong when a token or object couldn't be read
 */
export interface ParseFault {
  type: 'token' | 'structure';
  message: string;
}

/**
 * End of input, or a parse failure when `error` is set
 */
export interface PDFEnd {
  readonly kind: 'end';
  readonly error?: ParseFault;
}

export interface PDFNewline {
  readonly kind: 'nl';
}

export interface PDFComment {
  readonly kind: 'comment';
  readonly text: string;
}

export interface PDFNull {
  readonly kind: 'null';
}

export interface PDFBoolean {
  readonly kind: 'bool';
  readonly value: boolean;
}

export interface PDFNumber {
  readonly kind: 'number';
  readonly value: number;
}

export interface PDFKeyword {
  readonly kind: 'keyword';
  readonly text: string;
}

/**
 * PDF Name object, stored without the leading slash
 */
export interface PDFName {
  readonly kind: 'name';
  readonly text: string;
}

export interface PDFString {
  readonly kind: 'string';
  readonly text: string;
}

/**
 * Bare container markers as produced by the lexer
 */
export interface PDFMarker {
  readonly kind: 'array-open' | 'array-close' | 'dict-open' | 'dict-close';
}

export interface PDFArray {
  readonly kind: 'array';
  readonly items: readonly PDFObject[];
}

export interface PDFDictionary {
  readonly kind: 'dict';
  readonly entries: ReadonlyMap<string, PDFObject>;
}

/**
 * PDF Stream object: a dictionary plus its raw, undecoded bytes
 */
export interface PDFStream {
  readonly kind: 'stream';
  readonly entries: ReadonlyMap<string, PDFObject>;
  readonly data: Buffer;
}

/**
 * Numbered, versioned wrapper around exactly one value
 */
export interface PDFIndirect {
  readonly kind: 'indirect';
  readonly n: number;
  readonly generation: number;
  readonly value: PDFObject;
}

/**
 * PDF object reference
 */
export interface PDFReference {
  readonly kind: 'reference';
  readonly n: number;
  readonly generation: number;
}

export type PDFObject =
  | PDFEnd
  | PDFNewline
  | PDFComment
  | PDFNull
  | PDFBoolean
  | PDFNumber
  | PDFKeyword
  | PDFName
  | PDFString
  | PDFMarker
  | PDFArray
  | PDFDictionary
  | PDFStream
  | PDFIndirect
  | PDFReference;

export type ObjectKind = PDFObject['kind'];

export type PDFEntries = ReadonlyMap<string, PDFObject>;

export const pdfEnd: PDFEnd = { kind: 'end' };
export const pdfNewline: PDFNewline = { kind: 'nl' };
export const pdfNull: PDFNull = { kind: 'null' };

export function tokenFault(message: string): PDFEnd {
  return { kind: 'end', error: { type: 'token', message } };
}

export function structureFault(message: string): PDFEnd {
  return { kind: 'end', error: { type: 'structure', message } };
}

export function pdfMarker(kind: PDFMarker['kind']): PDFMarker {
  return { kind };
}

export function pdfComment(text: string): PDFComment {
  return { kind: 'comment', text };
}

export function pdfBool(value: boolean): PDFBoolean {
  return { kind: 'bool', value };
}

export function pdfNumber(value: number): PDFNumber {
  return { kind: 'number', value };
}

export function pdfKeyword(text: string): PDFKeyword {
  return { kind: 'keyword', text };
}

export function pdfName(text: string): PDFName {
  return { kind: 'name', text };
}

export function pdfString(text: string): PDFString {
  return { kind: 'string', text };
}

/**
 * Makes a text string. Anything beyond latin1 is stored as UTF-16BE behind a
 * byte order mark, one character per byte.
 */
export function pdfTextString(text: string): PDFString {
  if (!/[^\x00-\xff]/.test(text)) return pdfString(text);

  let encoded = '\xfe\xff';
  for (let i = 0; i < text.length; i++) {
    const unit = text.charCodeAt(i);
    encoded += String.fromCharCode(unit >> 8, unit & 0xff);
  }
  return pdfString(encoded);
}

export function pdfArray(items: readonly PDFObject[] = []): PDFArray {
  return { kind: 'array', items: [...items] };
}

function isEntries(entries: PDFEntries | Record<string, PDFObject>): entries is PDFEntries {
  return entries instanceof Map;
}

/**
 * Creates a dictionary from a Map or a plain record of entries
 */
export function pdfDict(entries: PDFEntries | Record<string, PDFObject> = {}): PDFDictionary {
  const map = isEntries(entries)
    ? new Map<string, PDFObject>(entries)
    : new Map<string, PDFObject>(Object.entries(entries));
  return { kind: 'dict', entries: map };
}

export function pdfStream(entries: PDFEntries, data: Buffer): PDFStream {
  return { kind: 'stream', entries: new Map(entries), data: Buffer.from(data) };
}

export function pdfIndirect(value: PDFObject, n: number, generation: number = 0): PDFIndirect {
  return { kind: 'indirect', n, generation, value };
}

export function pdfReference(n: number, generation: number = 0): PDFReference {
  return { kind: 'reference', n, generation };
}

/**
 * Checks if the object is an integral number
 */
export function isInteger(obj: PDFObject): obj is PDFNumber {
  return obj.kind === 'number' && Number.isInteger(obj.value);
}

/**
 * Checks if the object is a non-negative integer usable as a count or offset
 */
export function isUint(obj: PDFObject): obj is PDFNumber {
  return isInteger(obj) && obj.value >= 0 && obj.value <= Number.MAX_SAFE_INTEGER;
}

/**
 * Checks if the object can serve as one half of an object id pair
 */
export function isObjectId(obj: PDFObject): obj is PDFNumber {
  return isUint(obj) && obj.value <= MAX_OBJECT_NUMBER;
}

/**
 * Reads an entry of a dictionary or stream, `undefined` when absent
 */
export function dictGet(obj: PDFDictionary | PDFStream, key: string): PDFObject | undefined {
  return obj.entries.get(key);
}

/**
 * Returns a copy of the dictionary with one entry set
 */
export function withEntry(dict: PDFDictionary, key: string, value: PDFObject): PDFDictionary {
  const entries = new Map(dict.entries);
  entries.set(key, value);
  return { kind: 'dict', entries };
}

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Makes a PDF date string for the given point in time, in local time:
 * D:YYYYMMDDHHmmSS followed by Z or the +HH'mm' offset from UTC
 */
export function pdfDate(date: Date): PDFString {
  let text = `D:${date.getFullYear().toString().padStart(4, '0')}` +
    `${pad2(date.getMonth() + 1)}${pad2(date.getDate())}` +
    `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;

  const offset = -date.getTimezoneOffset();
  if (offset === 0) {
    text += 'Z';
  } else {
    const sign = offset < 0 ? '-' : '+';
    const abs = Math.abs(offset);
    text += `${sign}${pad2(Math.floor(abs / 60))}'${pad2(abs % 60)}'`;
  }
  return pdfString(text);
}
