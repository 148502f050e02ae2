/**
 * Structural parser turning lexer tokens into composite objects
 *
 * Not a strict parser. `N G obj` and `N G R` take their id pair from the two
 * objects most recently parsed in the enclosing context, which is why every
 * call gets the caller's accumulation stack.
 */
import type { Lexer } from './lexer';
import {
  OBJ_START,
  OBJ_END,
  STREAM_START,
  STREAM_END,
  REFERENCE_SUFFIX
} from './constants';
import type { PDFObject, PDFEnd } from './objects';
import {
  pdfArray,
  pdfIndirect,
  pdfReference,
  pdfStream,
  isObjectId,
  isUint,
  structureFault
} from './objects';

/**
 * Resolves a reference found while parsing, passing other objects through
 */
export type Dereferencer = (obj: PDFObject) => PDFObject;

function isKeyword(obj: PDFObject, text: string): boolean {
  return obj.kind === 'keyword' && obj.text === text;
}

/**
 * Keeps the first fault that happened inside a container, or reports `message`
 */
function innerFault(obj: PDFEnd, message: string): PDFEnd {
  return obj.error ? obj : structureFault(message);
}

export class ObjectParser {
  private readonly dereference: Dereferencer;

  /**
   * @param dereference Used to look up a stream's /Length when it is a reference
   */
  constructor(dereference: Dereferencer) {
    this.dereference = dereference;
  }

  /**
   * Reads one object at the lexer's position
   * @param stack Objects parsed so far in the current context, may be popped
   */
  parse(lexer: Lexer, stack: PDFObject[]): PDFObject {
    for (;;) {
      const token = lexer.next();
      switch (token.kind) {
        case 'nl':
        case 'comment':
          // Not important to parsing
          continue;
        case 'array-open':
          return this.parseArray(lexer);
        case 'dict-open':
          return this.parseDictionary(lexer);
        case 'keyword':
          switch (token.text) {
            case STREAM_START:
              // Appears in the document body, may need the cross-reference table
              return this.parseStream(lexer, stack);
            case OBJ_START:
              return this.parseIndirect(lexer, stack);
            case REFERENCE_SUFFIX:
              return this.parseReference(stack);
          }
          return token;
        default:
          return token;
      }
    }
  }

  private parseArray(lexer: Lexer): PDFObject {
    const items: PDFObject[] = [];
    for (;;) {
      const obj = this.parse(lexer, items);
      if (obj.kind === 'end') {
        return innerFault(obj, "array doesn't end");
      }
      if (obj.kind === 'array-close') break;
      items.push(obj);
    }
    return pdfArray(items);
  }

  private parseDictionary(lexer: Lexer): PDFObject {
    const items: PDFObject[] = [];
    for (;;) {
      const obj = this.parse(lexer, items);
      if (obj.kind === 'end') {
        return innerFault(obj, "dictionary doesn't end");
      }
      if (obj.kind === 'dict-close') break;
      items.push(obj);
    }

    if (items.length % 2 !== 0) {
      return structureFault('unbalanced dictionary');
    }

    const entries = new Map<string, PDFObject>();
    for (let i = 0; i < items.length; i += 2) {
      const key = items[i];
      if (key.kind !== 'name') {
        return structureFault('invalid dictionary key type');
      }
      entries.set(key.text, items[i + 1]);
    }
    return { kind: 'dict', entries };
  }

  private parseStream(lexer: Lexer, stack: PDFObject[]): PDFObject {
    const dict = stack.pop();
    if (dict === undefined) {
      return structureFault('missing stream dictionary');
    }
    if (dict.kind !== 'dict') {
      return structureFault('stream not preceded by a dictionary');
    }

    const lengthEntry = dict.entries.get('Length');
    if (lengthEntry === undefined) {
      return structureFault('missing stream Length');
    }
    const length = this.dereference(lengthEntry);
    if (!isUint(length)) {
      return structureFault('stream Length not an unsigned integer');
    }

    // Expect exactly one newline
    const nl = lexer.next();
    if (nl.kind === 'end' && nl.error) {
      return nl;
    }
    if (nl.kind !== 'nl') {
      return structureFault('stream does not start with a newline');
    }

    if (lexer.remaining < length.value) {
      return structureFault('stream is longer than the document');
    }
    const data = lexer.take(length.value);

    // Skips any number of trailing newlines or comments
    const end = this.parse(lexer, stack);
    if (end.kind === 'end' && end.error) {
      return end;
    }
    if (!isKeyword(end, STREAM_END)) {
      return structureFault('improperly terminated stream');
    }
    return pdfStream(dict.entries, data);
  }

  private parseIndirect(lexer: Lexer, stack: PDFObject[]): PDFObject {
    if (stack.length < 2) {
      return structureFault('missing object ID pair');
    }
    const g = stack.pop();
    const n = stack.pop();
    if (n === undefined || g === undefined || !isObjectId(n) || !isObjectId(g)) {
      return structureFault('invalid object ID pair');
    }

    const inner: PDFObject[] = [];
    for (;;) {
      const obj = this.parse(lexer, inner);
      if (obj.kind === 'end') {
        return innerFault(obj, "object doesn't end");
      }
      if (isKeyword(obj, OBJ_END)) break;
      inner.push(obj);
    }

    if (inner.length !== 1) {
      return structureFault('indirect objects must contain exactly one object');
    }
    return pdfIndirect(inner[0], n.value, g.value);
  }

  private parseReference(stack: PDFObject[]): PDFObject {
    if (stack.length < 2) {
      return structureFault('missing reference ID pair');
    }
    const g = stack.pop();
    const n = stack.pop();
    if (n === undefined || g === undefined || !isObjectId(n) || !isObjectId(g)) {
      return structureFault('invalid reference ID pair');
    }
    return pdfReference(n.value, g.value);
  }
}
