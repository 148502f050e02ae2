/**
 * Signs PDF documents through an incremental update
 *
 * The structural edits are appended first, with fixed-width placeholders for
 * /ByteRange and /Contents. Only once the new cross-reference section has
 * been flushed is the final layout known, and the placeholders are patched
 * in place.
 */
import { PDFUpdater } from './updater';
import type { ByteWriter } from './byte-writer';
import { getFirstPage } from './page-tree';
import type { PDFDictionary } from './objects';
import {
  pdfArray,
  pdfDict,
  pdfName,
  pdfNumber,
  pdfTextString,
  pdfDate,
  withEntry
} from './objects';
import { serialize } from './serializer';
import {
  DocumentShapeError,
  ReservationError,
  SignerError,
  PDFSignError,
  errorMessage
} from './errors';
import type { SignOptions, Signer, SignaturePlaceholders, ByteSpan } from './types';
import {
  DEBUG,
  DEFAULT_RESERVATION,
  DEFAULT_BYTE_RANGE_RESERVATION,
  DEFAULT_FIELD_NAME,
  DEFAULT_MINIMUM_VERSION,
  MAX_RESERVATION,
  SIGNATURE_FILTER,
  SIGNATURE_SUBFILTER,
  ANNOTATION_HIDDEN,
  SIG_FLAGS,
  PDF_OBJECT_TYPES
} from './constants';

type ResolvedSignOptions = Required<Omit<SignOptions, 'initialSize'>> & Pick<SignOptions, 'initialSize'>;

function isReservation(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_RESERVATION;
}

function resolveOptions(options: SignOptions): ResolvedSignOptions {
  const resolved = {
    initialSize: options.initialSize,
    reservation: options.reservation ?? DEFAULT_RESERVATION,
    byteRangeReservation: options.byteRangeReservation ?? DEFAULT_BYTE_RANGE_RESERVATION,
    fieldName: options.fieldName ?? DEFAULT_FIELD_NAME,
    signingTime: options.signingTime ?? new Date(),
    minimumVersion: options.minimumVersion ?? DEFAULT_MINIMUM_VERSION
  };

  if (!isReservation(resolved.reservation)) {
    throw new ReservationError(`invalid signature reservation: ${resolved.reservation}`);
  }
  if (!isReservation(resolved.byteRangeReservation)) {
    throw new ReservationError(`invalid /ByteRange reservation: ${resolved.byteRangeReservation}`);
  }
  return resolved;
}

/**
 * Writes the body of a signature dictionary, reserving room for the values
 * that can only be known after flushing
 * @returns Where the placeholders ended up in the document
 */
export function writeSignatureDictionary(
  writer: ByteWriter,
  signingTime: Date,
  reservation: number,
  byteRangeReservation: number
): SignaturePlaceholders {
  // The timestamp is important for Adobe Acrobat Reader DC
  writer.writeString(
    `<< /Type/${PDF_OBJECT_TYPES.SIG} /Filter/${SIGNATURE_FILTER}` +
    ` /SubFilter/${SIGNATURE_SUBFILTER}\n` +
    `   /M${serialize(pdfDate(signingTime))} /ByteRange `
  );

  const byteRange: ByteSpan = { offset: writer.position, length: byteRangeReservation };
  writer.writeString(' '.repeat(byteRangeReservation));
  writer.writeString('\n   /Contents <');

  // Twice the reservation in hex digits, plus both angle brackets
  const contents: ByteSpan = { offset: writer.position - 1, length: reservation * 2 + 2 };
  writer.writeString('0'.repeat(reservation * 2));
  writer.writeString('> >>');

  return { byteRange, contents };
}

/**
 * Computes the /ByteRange covering everything but the /Contents hex string
 * @param length Final document length
 */
export function computeByteRange(contents: ByteSpan, length: number): [number, number, number, number] {
  const tailOffset = contents.offset + contents.length;
  return [0, contents.offset, tailOffset, length - tailOffset];
}

/**
 * Stores the final /ByteRange into its placeholder
 */
export function fillInByteRange(updater: PDFUpdater, placeholders: SignaturePlaceholders): [number, number, number, number] {
  const range = computeByteRange(placeholders.contents, updater.length);
  const text = `[${range.join(' ')}]`;
  if (text.length > placeholders.byteRange.length) {
    throw new ReservationError('not enough space reserved for /ByteRange');
  }
  updater.patch(placeholders.byteRange.offset, Buffer.from(text, 'latin1'));
  return range;
}

/**
 * Signs everything outside the /Contents window and writes the signature,
 * hex-encoded, into it
 */
export function fillInSignature(updater: PDFUpdater, contents: ByteSpan, signer: Signer): void {
  const tailOffset = contents.offset + contents.length;
  if (contents.offset < 0 || contents.length < 2 || tailOffset > updater.length) {
    throw new ReservationError('invalid signing window');
  }

  const content = Buffer.concat([updater.view(0, contents.offset), updater.view(tailOffset)]);

  let signature: Buffer;
  try {
    signature = signer.sign(content);
  } catch (err) {
    if (err instanceof PDFSignError) throw err;
    throw new SignerError(errorMessage(err));
  }

  // The hex string's angle brackets don't count
  const available = contents.length - 2;
  if (signature.length * 2 > available) {
    throw new ReservationError(
      `not enough space reserved for the signature (${available} nibbles vs ${signature.length * 2} nibbles)`
    );
  }
  updater.patch(contents.offset + 1, Buffer.from(signature.toString('hex'), 'latin1'));
}

function formatVersion(version: number): string {
  return `${Math.floor(version / 10)}.${version % 10}`;
}

/**
 * Signs the given document, returning a new, longer buffer; the input is
 * left untouched. There must be at least one page and no existing form.
 *
 * The document must not rely on cross-reference streams from PDF 1.5, or at
 * least has to be a hybrid-reference file.
 */
export function sign(document: Buffer, signer: Signer, options: SignOptions = {}): Buffer {
  const opts = resolveOptions(options);
  const pdf = PDFUpdater.open(document, { initialSize: opts.initialSize });

  const rootRef = pdf.trailer.get('Root');
  if (rootRef?.kind !== 'reference') {
    throw new DocumentShapeError('trailer does not contain a reference to Root');
  }
  const root = pdf.dereference(rootRef);
  if (root.kind !== 'dict') {
    throw new DocumentShapeError('invalid Root dictionary reference');
  }

  // 8.6.1 Interactive Form Dictionary
  if (root.entries.has('AcroForm')) {
    throw new DocumentShapeError('the document already contains forms, they would be overwritten');
  }

  const pagesRef = root.entries.get('Pages');
  if (pagesRef?.kind !== 'reference') {
    throw new DocumentShapeError('invalid Pages reference');
  }
  const page = getFirstPage(pdf, pagesRef);
  if (page === null) {
    throw new DocumentShapeError('invalid or unsupported page tree');
  }

  // Indirectly referenced arrays aren't supported
  const annots = page.dict.entries.get('Annots');
  if (annots !== undefined && annots.kind !== 'array') {
    throw new DocumentShapeError('unexpected Annots');
  }

  // 8.7 Digital Signatures - signature dictionary
  const sigdictN = pdf.allocate();
  const placeholders = pdf.update(sigdictN, writer =>
    writeSignatureDictionary(writer, opts.signingTime, opts.reservation, opts.byteRangeReservation));

  const sigfieldN = pdf.allocate();
  const sigfieldRef = pdf.referenceTo(sigfieldN);
  pdf.updateObject(sigfieldN, pdfDict({
    // 8.6.3 Field Types - Signature Fields
    FT: pdfName(PDF_OBJECT_TYPES.SIG),
    V: pdf.referenceTo(sigdictN),
    // 8.4.5 Annotations Types - Widget Annotations, merged with the field
    Subtype: pdfName(PDF_OBJECT_TYPES.WIDGET),
    F: pdfNumber(ANNOTATION_HIDDEN),
    T: pdfTextString(opts.fieldName),
    Rect: pdfArray([pdfNumber(0), pdfNumber(0), pdfNumber(0), pdfNumber(0)])
  }));

  const annotsItems = annots === undefined ? [] : annots.items;
  pdf.updateObject(page.n, withEntry(page.dict, 'Annots', pdfArray([...annotsItems, sigfieldRef])));

  let newRoot: PDFDictionary = withEntry(root, 'AcroForm', pdfDict({
    Fields: pdfArray([sigfieldRef]),
    SigFlags: pdfNumber(SIG_FLAGS)
  }));

  // Upgrade the document version for SHA-256 etc., never downgrade it
  const version = pdf.version(root);
  if (version < opts.minimumVersion) {
    newRoot = withEntry(newRoot, 'Version', pdfName(formatVersion(opts.minimumVersion)));
  }
  pdf.updateObject(rootRef.n, newRoot);
  pdf.flushUpdates();

  // Now that the length of everything is known, store the byte ranges
  // of what is about to be signed: everything but the signature itself
  const range = fillInByteRange(pdf, placeholders);
  if (DEBUG) console.log(`Signing byte range [${range.join(' ')}] of ${pdf.length} bytes`);
  fillInSignature(pdf, placeholders.contents, signer);
  return pdf.finish();
}
