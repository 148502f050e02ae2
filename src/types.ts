import type { PDFDictionary } from './objects';

/**
 * Update session configuration options
 */
export interface UpdaterOptions {
  /** Initial capacity of the document arena in bytes (default: 64KB) */
  initialSize?: number;
}

/**
 * Signing configuration options
 */
export interface SignOptions extends UpdaterOptions {
  /** Bytes reserved for the signature blob, written as twice as many hex digits (default: 4096) */
  reservation?: number;
  /** Width of the /ByteRange placeholder in bytes (default: 32) */
  byteRangeReservation?: number;
  /** Partial name of the signature field (default: Signature1) */
  fieldName?: string;
  /** Signing time written to the signature dictionary (default: now) */
  signingTime?: Date;
  /** Lowest PDF version, as two digits, the signature needs (default: 16) */
  minimumVersion?: number;
}

/**
 * Produces a detached signature over the given content.
 * Key material and the certificate chain belong to the implementation.
 */
export interface Signer {
  sign(content: Buffer): Buffer;
}

/**
 * A run of bytes within the document
 */
export interface ByteSpan {
  offset: number;
  length: number;
}

/**
 * Where the signature dictionary's fixed-width placeholders were written
 */
export interface SignaturePlaceholders {
  /** Blank run holding the /ByteRange array */
  byteRange: ByteSpan;
  /** The /Contents hex string, including its angle brackets */
  contents: ByteSpan;
}

/**
 * A page dictionary together with its object id
 */
export interface FirstPage {
  n: number;
  generation: number;
  dict: PDFDictionary;
}
