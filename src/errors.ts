/**
 * Error types raised while reading, updating and signing a document
 */

/**
 * Stage a failure belongs to
 */
export type ErrorStage =
  | 'token'
  | 'structure'
  | 'xref'
  | 'access'
  | 'document'
  | 'reservation'
  | 'signer'
  | 'keypair'
  | 'session';

/**
 * Base class of every error this package throws on purpose
 */
export class PDFSignError extends Error {
  readonly stage: ErrorStage;

  constructor(stage: ErrorStage, message: string) {
    super(message);
    this.name = new.target.name;
    this.stage = stage;
  }
}

/** Malformed literal, hex string, name or number */
export class TokenError extends PDFSignError {
  constructor(message: string) {
    super('token', message);
  }
}

/** Unbalanced containers, bad dictionary keys, missing id pairs, bad stream framing */
export class StructuralError extends PDFSignError {
  constructor(message: string) {
    super('structure', message);
  }
}

/** Missing startxref anchor, circular sections, invalid entries or Size */
export class CrossReferenceError extends PDFSignError {
  constructor(message: string) {
    super('xref', message);
  }
}

/** The object found at a recorded offset is not the one that was asked for */
export class ObjectAccessError extends PDFSignError {
  constructor(message: string) {
    super('access', message);
  }
}

/** The document graph doesn't have the shape signing needs */
export class DocumentShapeError extends PDFSignError {
  constructor(message: string) {
    super('document', message);
  }
}

/** A placeholder reserved before flushing turned out too small */
export class ReservationError extends PDFSignError {
  constructor(message: string) {
    super('reservation', message);
  }
}

/** Failure reported by the signature producer */
export class SignerError extends PDFSignError {
  constructor(message: string) {
    super('signer', message);
  }
}

/** Key material could not be extracted from a PKCS#12 bundle */
export class KeyPairError extends PDFSignError {
  constructor(message: string) {
    super('keypair', message);
  }
}

/** An update session was driven out of order */
export class SessionStateError extends PDFSignError {
  constructor(message: string) {
    super('session', message);
  }
}

/**
 * Turns anything caught into a message
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
