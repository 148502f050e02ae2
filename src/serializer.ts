/**
 * Canonical rendering of PDF objects
 *
 * Output is a latin1 string, one character per byte, so stream payloads and
 * binary strings pass through unchanged.
 */
import { WHITESPACE, DELIMITERS } from './constants';
import type { PDFObject, PDFEntries } from './objects';
import { StructuralError } from './errors';

/**
 * Formats a number in its shortest decimal form, never in exponent notation
 */
export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) {
    throw new StructuralError(`cannot serialize number ${value}`);
  }

  const text = String(value);
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) {
    return text;
  }

  // Shift the decimal point of the mantissa by the exponent
  const [, sign, whole, fraction = '', exponentText] = match;
  const exponent = parseInt(exponentText, 10);
  const digits = whole + fraction;
  const point = whole.length + exponent;

  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

function hex2(code: number): string {
  return code.toString(16).padStart(2, '0');
}

/**
 * Escapes a name, adding the leading slash
 */
export function escapeName(name: string): string {
  let escaped = '/';
  for (let i = 0; i < name.length; i++) {
    const ch = name[i];
    const code = name.charCodeAt(i) & 0xff;
    if (ch === '#' || WHITESPACE.includes(ch) || DELIMITERS.includes(ch) || code < 0x21 || code > 0x7e) {
      escaped += '#' + hex2(code);
    } else {
      escaped += ch;
    }
  }
  return escaped;
}

/**
 * Escapes a literal string, adding the parentheses
 */
export function escapeString(text: string): string {
  // A bare CR would be read back as a line feed
  return '(' + text.replace(/[\\()]/g, '\\$&').replace(/\r/g, '\\r') + ')';
}

function serializeEntries(entries: PDFEntries): string {
  // Sorted so that output is reproducible
  const keys = Array.from(entries.keys()).sort();
  let result = '<<';
  for (const key of keys) {
    const value = entries.get(key);
    if (value !== undefined) {
      result += ` ${escapeName(key)} ${serialize(value)}`;
    }
  }
  return result + ' >>';
}

/**
 * Renders an object the way it is written into a document
 */
export function serialize(obj: PDFObject): string {
  switch (obj.kind) {
    case 'nl':
      return '\n';
    case 'comment':
      return '%' + obj.text;
    case 'null':
      return 'null';
    case 'bool':
      return obj.value ? 'true' : 'false';
    case 'number':
      return formatNumber(obj.value);
    case 'keyword':
      return obj.text;
    case 'name':
      return escapeName(obj.text);
    case 'string':
      return escapeString(obj.text);
    case 'array-open':
      return '[';
    case 'array-close':
      return ']';
    case 'dict-open':
      return '<<';
    case 'dict-close':
      return '>>';
    case 'array':
      return '[ ' + obj.items.map(serialize).join(' ') + ' ]';
    case 'dict':
      return serializeEntries(obj.entries);
    case 'stream': {
      const entries = new Map(obj.entries);
      entries.set('Length', { kind: 'number', value: obj.data.length });
      return serializeEntries(entries) + '\nstream\n' + obj.data.toString('latin1') + '\nendstream';
    }
    case 'indirect':
      return `${obj.n} ${obj.generation} obj\n${serialize(obj.value)}\nendobj`;
    case 'reference':
      return `${obj.n} ${obj.generation} R`;
    case 'end':
      throw new StructuralError('unsupported token for serialization');
  }
}
