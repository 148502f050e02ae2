/**
 * PDF Lexer
 *
 * Splits a byte window into tokens. It never throws: malformed input comes
 * back as an `end` object carrying a token fault, and plain end of input as
 * an `end` object without one.
 */
import {
  WHITESPACE,
  DELIMITERS,
  DECIMAL_DIGITS,
  OCTAL_DIGITS,
  HEX_DIGITS
} from './constants';
import type { PDFObject } from './objects';
import {
  pdfEnd,
  pdfNewline,
  pdfNull,
  pdfBool,
  pdfNumber,
  pdfKeyword,
  pdfName,
  pdfString,
  pdfComment,
  pdfMarker,
  tokenFault
} from './objects';

const CR = 0x0d;
const LF = 0x0a;

function isOneOf(alphabet: string, ch: number): boolean {
  return alphabet.includes(String.fromCharCode(ch));
}

export class Lexer {
  private readonly buffer: Buffer;
  private pos: number;

  constructor(buffer: Buffer, start: number = 0) {
    this.buffer = buffer;
    this.pos = start;
  }

  /** Absolute offset of the next unread byte */
  get position(): number {
    return this.pos;
  }

  /** Number of bytes left to read */
  get remaining(): number {
    return Math.max(0, this.buffer.length - this.pos);
  }

  /**
   * Consumes `size` raw bytes, returning a copy of them
   */
  take(size: number): Buffer {
    const end = Math.min(this.pos + size, this.buffer.length);
    const bytes = Buffer.from(this.buffer.subarray(this.pos, end));
    this.pos = end;
    return bytes;
  }

  private peek(): number | undefined {
    return this.pos < this.buffer.length ? this.buffer[this.pos] : undefined;
  }

  private read(): number | undefined {
    const ch = this.peek();
    if (ch !== undefined) this.pos++;
    return ch;
  }

  /**
   * Consumes the rest of a CR, LF or CRLF sequence, telling if `ch` started one
   */
  private eatNewline(ch: number): boolean {
    if (ch === CR) {
      if (this.peek() === LF) this.pos++;
      return true;
    }
    return ch === LF;
  }

  /**
   * Reads the next token
   */
  next(): PDFObject {
    for (;;) {
      const ch = this.peek();
      if (ch === undefined) {
        return pdfEnd;
      }
      if (isOneOf('-.' + DECIMAL_DIGITS, ch)) {
        return this.parseNumber();
      }

      const word = this.parseRegular();
      switch (word) {
        case '':
          break;
        case 'null':
          return pdfNull;
        case 'true':
          return pdfBool(true);
        case 'false':
          return pdfBool(false);
        default:
          return pdfKeyword(word);
      }

      this.pos++;
      switch (String.fromCharCode(ch)) {
        case '/':
          return this.parseName();
        case '%':
          return this.parseComment();
        case '(':
          return this.parseString();
        case '[':
          return pdfMarker('array-open');
        case ']':
          return pdfMarker('array-close');
        case '<':
          if (this.peek() === 0x3c) {
            this.pos++;
            return pdfMarker('dict-open');
          }
          return this.parseHexString();
        case '>':
          if (this.peek() === 0x3e) {
            this.pos++;
            return pdfMarker('dict-close');
          }
          return tokenFault("unexpected '>'");
      }

      if (this.eatNewline(ch)) {
        return pdfNewline;
      }
      if (!isOneOf(WHITESPACE, ch)) {
        return tokenFault('unexpected input');
      }
    }
  }

  /**
   * Reads a run of regular (non-whitespace, non-delimiter) characters
   */
  private parseRegular(): string {
    const start = this.pos;
    while (this.pos < this.buffer.length && !isOneOf(WHITESPACE + DELIMITERS, this.buffer[this.pos])) {
      this.pos++;
    }
    return this.buffer.toString('latin1', start, this.pos);
  }

  private parseNumber(): PDFObject {
    let value = '';
    if (this.peek() === 0x2d) {
      value += '-';
      this.pos++;
    }

    let real = false;
    let digits = false;
    for (;;) {
      const ch = this.peek();
      if (ch === undefined) {
        break;
      } else if (isOneOf(DECIMAL_DIGITS, ch)) {
        digits = true;
      } else if (ch === 0x2e && !real) {
        real = true;
      } else {
        break;
      }
      value += String.fromCharCode(ch);
      this.pos++;
    }

    if (!digits) {
      return tokenFault('invalid number');
    }
    return pdfNumber(parseFloat(value));
  }

  private parseName(): PDFObject {
    let value = '';
    for (;;) {
      const ch = this.peek();
      if (ch === undefined || isOneOf(WHITESPACE + DELIMITERS, ch)) break;
      this.pos++;

      if (ch !== 0x23) {
        value += String.fromCharCode(ch);
        continue;
      }

      let hex = '';
      for (let i = 0; i < 2; i++) {
        const digit = this.peek();
        if (digit === undefined || !isOneOf(HEX_DIGITS, digit)) break;
        hex += String.fromCharCode(digit);
        this.pos++;
      }
      if (hex.length !== 2) {
        return tokenFault('invalid name hexa escape');
      }
      value += String.fromCharCode(parseInt(hex, 16));
    }

    if (value.length === 0) {
      return tokenFault('unexpected end of name');
    }
    return pdfName(value);
  }

  private parseComment(): PDFObject {
    const start = this.pos;
    for (;;) {
      const ch = this.peek();
      if (ch === undefined || ch === CR || ch === LF) break;
      this.pos++;
    }
    return pdfComment(this.buffer.toString('latin1', start, this.pos));
  }

  /**
   * Decodes the escape following a backslash, returning the resulting byte
   */
  private unescape(ch: number): number {
    switch (String.fromCharCode(ch)) {
      case 'n':
        return 0x0a;
      case 'r':
        return 0x0d;
      case 't':
        return 0x09;
      case 'b':
        return 0x08;
      case 'f':
        return 0x0c;
    }
    if (!isOneOf(OCTAL_DIGITS, ch)) {
      return ch;
    }

    let octal = String.fromCharCode(ch);
    while (octal.length < 3) {
      const digit = this.peek();
      if (digit === undefined || !isOneOf(OCTAL_DIGITS, digit)) break;
      octal += String.fromCharCode(digit);
      this.pos++;
    }
    // High-order overflow is ignored
    return parseInt(octal, 8) & 0xff;
  }

  private parseString(): PDFObject {
    const bytes: number[] = [];
    let parens = 1;
    for (;;) {
      let ch = this.read();
      if (ch === undefined) {
        return tokenFault('unexpected end of string');
      }

      if (this.eatNewline(ch)) {
        ch = LF;
      } else if (ch === 0x28) {
        parens++;
      } else if (ch === 0x29) {
        if (--parens === 0) break;
      } else if (ch === 0x5c) {
        const escaped = this.read();
        if (escaped === undefined) {
          return tokenFault('unexpected end of string');
        }
        if (this.eatNewline(escaped)) continue;
        ch = this.unescape(escaped);
      }
      bytes.push(ch);
    }
    return pdfString(Buffer.from(bytes).toString('latin1'));
  }

  private parseHexString(): PDFObject {
    const bytes: number[] = [];
    let nibbles = '';
    for (;;) {
      const ch = this.read();
      if (ch === undefined) {
        return tokenFault('unexpected end of hex string');
      }
      if (ch === 0x3e) break;
      if (isOneOf(WHITESPACE, ch)) continue;
      if (!isOneOf(HEX_DIGITS, ch)) {
        return tokenFault('invalid hex string');
      }

      nibbles += String.fromCharCode(ch);
      if (nibbles.length === 2) {
        bytes.push(parseInt(nibbles, 16));
        nibbles = '';
      }
    }

    // An odd trailing digit is padded with a zero nibble
    if (nibbles.length > 0) {
      bytes.push(parseInt(nibbles + '0', 16));
    }
    return pdfString(Buffer.from(bytes).toString('latin1'));
  }
}
