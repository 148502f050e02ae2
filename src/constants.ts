/**
 * PDF format constants
 */

export const VERSION = '1.0.0';

// Set PDF_SIGN_DEBUG=1 for verbose debug logging
export const DEBUG = process.env.PDF_SIGN_DEBUG === '1';

// PDF Header: %PDF-{major}.{minor}, possibly behind a PostScript prologue
export const PDF_HEADER_REGEX = /(?:^|[\r\n])%(?:!PS-Adobe-\d\.\d )?PDF-(\d)\.(\d)[\r\n]/;

// startxref {offset} %%EOF, searched for near the end of the document
export const STARTXREF_REGEX = /\sstartxref\s+(\d+)\s+%%EOF/g;

// How far from either end of the document to look for the header and startxref
export const HEADER_SEARCH_WINDOW = 1024;
export const TRAILER_SEARCH_WINDOW = 1024;

// Byte classes
export const WHITESPACE = '\t\n\f\r ';
export const DELIMITERS = '()<>[]{}/%';
export const DECIMAL_DIGITS = '0123456789';
export const OCTAL_DIGITS = '01234567';
export const HEX_DIGITS = '0123456789abcdefABCDEF';

// PDF objects start with "obj" and end with "endobj"
export const OBJ_START = 'obj';
export const OBJ_END = 'endobj';

// PDF streams
export const STREAM_START = 'stream';
export const STREAM_END = 'endstream';

// PDF object reference
export const REFERENCE_SUFFIX = 'R';

// PDF xref table
export const XREF_MARKER = 'xref';
export const XREF_IN_USE = 'n';
export const XREF_FREE = 'f';

// PDF trailer
export const TRAILER_MARKER = 'trailer';

// Largest object number and generation the cross-reference table can hold
export const MAX_OBJECT_NUMBER = 0xffffffff;
export const MAX_GENERATION = 65535;

// Standard PDF object types
export const PDF_OBJECT_TYPES = {
  PAGES: 'Pages',
  PAGE: 'Page',
  SIG: 'Sig',
  WIDGET: 'Widget'
};

// Signature dictionary and field
export const SIGNATURE_FILTER = 'Adobe.PPKLite';
export const SIGNATURE_SUBFILTER = 'adbe.pkcs7.detached';

// Annotation flags
export const ANNOTATION_HIDDEN = 2;

// AcroForm SigFlags: SignaturesExist | AppendOnly
export const SIG_FLAGS = 3;

// Signing defaults
export const DEFAULT_RESERVATION = 4096;
export const DEFAULT_BYTE_RANGE_RESERVATION = 32; // fine for a gigabyte
export const MAX_RESERVATION = 16 * 1024 * 1024;
export const DEFAULT_FIELD_NAME = 'Signature1';
export const DEFAULT_MINIMUM_VERSION = 16; // PDF 1.6, needed for SHA-256
