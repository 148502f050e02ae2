import { describe, it, expect } from 'vitest';
import { sign, computeByteRange } from '../src/sign';
import { PDFUpdater } from '../src/updater';
import {
  DocumentShapeError,
  ReservationError,
  SignerError,
  KeyPairError
} from '../src/errors';
import type { PDFObject } from '../src/objects';
import {
  pdfArray,
  pdfDate,
  pdfName,
  pdfNumber,
  pdfReference,
  pdfString
} from '../src/objects';
import type { Signer } from '../src/types';
import { MAX_RESERVATION } from '../src/constants';
import { SIMPLE_OBJECTS, buildDocument, simpleDocument } from './fixtures';
import type { FixtureObject } from './fixtures';

class FakeSigner implements Signer {
  readonly calls: Buffer[] = [];
  private readonly signature: Buffer;

  constructor(signature: Buffer) {
    this.signature = signature;
  }

  sign(content: Buffer): Buffer {
    this.calls.push(Buffer.from(content));
    return this.signature;
  }
}

const SIGNATURE = Buffer.from('deadbeef', 'hex');
const SIGNING_TIME = new Date(2024, 0, 2, 3, 4, 5);

function byteRange(document: Buffer): number[] {
  const match = /\/ByteRange \[(\d+) (\d+) (\d+) (\d+)\]/.exec(document.toString('latin1'));
  return match ? match.slice(1).map(value => parseInt(value, 10)) : [];
}

function entry(obj: PDFObject, key: string): PDFObject | undefined {
  return obj.kind === 'dict' ? obj.entries.get(key) : undefined;
}

function withCatalog(body: string, rest: FixtureObject[] = SIMPLE_OBJECTS.slice(1)): Buffer {
  return buildDocument([{ n: 1, body }, ...rest], { trailer: ' /Root 1 0 R' });
}

describe('sign', () => {
  const document = simpleDocument();
  const signer = new FakeSigner(SIGNATURE);
  const result = sign(document, signer, { reservation: 64, signingTime: SIGNING_TIME });
  const text = result.toString('latin1');
  const range = byteRange(result);

  it('Layout: only appends to the input', () => {
    expect(result.length).toBeGreaterThan(document.length);
    expect(result.subarray(0, document.length)).toEqual(document);
  });

  it('Layout: covers the whole document but the signature', () => {
    expect(range).toHaveLength(4);
    expect(range[0]).toBe(0);
    expect(range[2] - range[1]).toBe(64 * 2 + 2);
    expect(range[2] + range[3]).toBe(result.length);
    expect(text[range[1]]).toBe('<');
    expect(text[range[2] - 1]).toBe('>');
  });

  it('Layout: signs exactly the bytes outside the window', () => {
    expect(signer.calls).toHaveLength(1);
    expect(signer.calls[0]).toEqual(Buffer.concat([result.subarray(0, range[1]), result.subarray(range[2])]));
  });

  it('Layout: writes the signature as hex, padded with zeros', () => {
    expect(text.slice(range[1] + 1, range[2] - 1)).toBe('deadbeef' + '0'.repeat(120));
  });

  it('Layout: writes one cross-reference section for the new and changed objects', () => {
    expect(text.slice(text.lastIndexOf('\nxref\n'))).toMatch(
      /^\nxref\n1 1\n\d{10} 00000 n \n3 3\n(\d{10} 00000 n \n){3}trailer\n/
    );
  });

  it('Layout: adds the signature field, widget and form', () => {
    const pdf = PDFUpdater.open(result);
    expect(pdf.size).toBe(6);

    const root = pdf.dereference(pdf.trailer.get('Root') ?? pdfReference(0, 0));
    const acroForm = entry(root, 'AcroForm') ?? pdfString('missing');
    expect(entry(acroForm, 'Fields')).toEqual(pdfArray([pdfReference(5, 0)]));
    expect(entry(acroForm, 'SigFlags')).toEqual(pdfNumber(3));
    expect(entry(root, 'Version')).toEqual(pdfName('1.6'));

    const field = pdf.get(5, 0);
    expect(entry(field, 'FT')).toEqual(pdfName('Sig'));
    expect(entry(field, 'V')).toEqual(pdfReference(4, 0));
    expect(entry(field, 'Subtype')).toEqual(pdfName('Widget'));
    expect(entry(field, 'F')).toEqual(pdfNumber(2));
    expect(entry(field, 'T')).toEqual(pdfString('Signature1'));
    expect(entry(field, 'Rect')).toEqual(pdfArray([pdfNumber(0), pdfNumber(0), pdfNumber(0), pdfNumber(0)]));

    expect(entry(pdf.get(3, 0), 'Annots')).toEqual(pdfArray([pdfReference(5, 0)]));
  });

  it('Layout: fills in the signature dictionary', () => {
    const sigdict = PDFUpdater.open(result).get(4, 0);
    expect(entry(sigdict, 'Type')).toEqual(pdfName('Sig'));
    expect(entry(sigdict, 'Filter')).toEqual(pdfName('Adobe.PPKLite'));
    expect(entry(sigdict, 'SubFilter')).toEqual(pdfName('adbe.pkcs7.detached'));
    expect(entry(sigdict, 'M')).toEqual(pdfDate(SIGNING_TIME));
    expect(entry(sigdict, 'ByteRange')).toEqual(pdfArray(range.map(value => pdfNumber(value))));

    const contents = entry(sigdict, 'Contents');
    const bytes = contents?.kind === 'string' ? Buffer.from(contents.text, 'latin1') : Buffer.alloc(0);
    expect(bytes).toEqual(Buffer.concat([SIGNATURE, Buffer.alloc(60)]));
  });

  it('Options: 4096 bytes reserved by default', () => {
    const range = byteRange(sign(simpleDocument(), new FakeSigner(SIGNATURE)));
    expect(range[2] - range[1]).toBe(4096 * 2 + 2);
  });

  it('Options: deterministic for a fixed signing time', () => {
    const options = { reservation: 16, signingTime: SIGNING_TIME };
    const first = sign(simpleDocument(), new FakeSigner(SIGNATURE), options);
    const second = sign(simpleDocument(), new FakeSigner(SIGNATURE), options);
    expect(first).toEqual(second);
  });

  it('Version: kept at or above the minimum', () => {
    const result = sign(simpleDocument({ header: '%PDF-1.7' }), new FakeSigner(SIGNATURE), { reservation: 16 });
    const pdf = PDFUpdater.open(result);
    expect(entry(pdf.get(1, 0), 'Version')).toBeUndefined();
  });

  it('Version: bumped to a custom minimum', () => {
    const result = sign(simpleDocument({ header: '%PDF-1.7' }), new FakeSigner(SIGNATURE), {
      reservation: 16,
      minimumVersion: 20
    });
    expect(entry(PDFUpdater.open(result).get(1, 0), 'Version')).toEqual(pdfName('2.0'));
  });

  it('Field: uses the given name', () => {
    const result = sign(simpleDocument(), new FakeSigner(SIGNATURE), { reservation: 16, fieldName: 'Approval' });
    expect(entry(PDFUpdater.open(result).get(5, 0), 'T')).toEqual(pdfString('Approval'));
  });

  it('Field: names beyond latin1 are stored as UTF-16BE', () => {
    const result = sign(simpleDocument(), new FakeSigner(SIGNATURE), { reservation: 16, fieldName: 'Подпись' });
    const utf16be = Buffer.from('\ufeffПодпись', 'utf16le').swap16().toString('latin1');
    expect(entry(PDFUpdater.open(result).get(5, 0), 'T')).toEqual(pdfString(utf16be));
  });

  it('Field: appended to existing annotations', () => {
    const document = buildDocument([
      SIMPLE_OBJECTS[0],
      SIMPLE_OBJECTS[1],
      { n: 3, body: '<< /Type /Page /Parent 2 0 R /Annots [7 0 R] >>' }
    ], { trailer: ' /Root 1 0 R' });
    const result = sign(document, new FakeSigner(SIGNATURE), { reservation: 16 });
    expect(entry(PDFUpdater.open(result).get(3, 0), 'Annots'))
      .toEqual(pdfArray([pdfReference(7, 0), pdfReference(5, 0)]));
  });

  it('Failures: signature larger than the reservation', () => {
    const document = simpleDocument();
    const copy = Buffer.from(document);
    const signer = new FakeSigner(Buffer.alloc(10, 1));
    expect(() => sign(document, signer, { reservation: 4 })).toThrow(
      new ReservationError('not enough space reserved for the signature (8 nibbles vs 20 nibbles)')
    );
    expect(document).toEqual(copy);
  });

  it('Failures: ByteRange placeholder too narrow', () => {
    const signer = new FakeSigner(SIGNATURE);
    expect(() => sign(simpleDocument(), signer, { reservation: 16, byteRangeReservation: 5 }))
      .toThrow(new ReservationError('not enough space reserved for /ByteRange'));
    expect(signer.calls).toHaveLength(0);
  });

  it('Failures: invalid reservation', () => {
    expect(() => sign(simpleDocument(), new FakeSigner(SIGNATURE), { reservation: -1 }))
      .toThrow(new ReservationError('invalid signature reservation: -1'));
    expect(() => sign(simpleDocument(), new FakeSigner(SIGNATURE), { reservation: 1.5 }))
      .toThrow(ReservationError);
  });

  it('Failures: reservation above the limit', () => {
    const signer = new FakeSigner(SIGNATURE);
    expect(() => sign(simpleDocument(), signer, { reservation: MAX_RESERVATION + 1 }))
      .toThrow(new ReservationError(`invalid signature reservation: ${MAX_RESERVATION + 1}`));
    expect(() => sign(simpleDocument(), signer, { reservation: 16, byteRangeReservation: 1e9 }))
      .toThrow(new ReservationError('invalid /ByteRange reservation: 1000000000'));
    expect(signer.calls).toHaveLength(0);
  });

  it('Failures: signer errors', () => {
    const failing: Signer = {
      sign(): Buffer {
        throw new Error('boom');
      }
    };
    expect(() => sign(simpleDocument(), failing, { reservation: 16 })).toThrow(new SignerError('boom'));

    const refusing: Signer = {
      sign(): Buffer {
        throw new KeyPairError('no key');
      }
    };
    expect(() => sign(simpleDocument(), refusing, { reservation: 16 })).toThrow(KeyPairError);
  });

  it('Failures: documents that already have a form', () => {
    const document = withCatalog('<< /Type /Catalog /Pages 2 0 R /AcroForm << /Fields [] >> >>');
    const copy = Buffer.from(document);
    expect(() => sign(document, new FakeSigner(SIGNATURE)))
      .toThrow(new DocumentShapeError('the document already contains forms, they would be overwritten'));
    expect(document).toEqual(copy);
  });

  it('Failures: missing or broken Root', () => {
    expect(() => sign(buildDocument(SIMPLE_OBJECTS), new FakeSigner(SIGNATURE)))
      .toThrow(new DocumentShapeError('trailer does not contain a reference to Root'));
    expect(() => sign(buildDocument(SIMPLE_OBJECTS, { trailer: ' /Root 9 0 R' }), new FakeSigner(SIGNATURE)))
      .toThrow(new DocumentShapeError('invalid Root dictionary reference'));
  });

  it('Failures: broken page tree', () => {
    expect(() => sign(withCatalog('<< /Type /Catalog /Pages [] >>'), new FakeSigner(SIGNATURE)))
      .toThrow(new DocumentShapeError('invalid Pages reference'));
    expect(() => sign(withCatalog('<< /Type /Catalog /Pages 2 0 R >>', [
      { n: 2, body: '<< /Type /Pages /Kids [] /Count 0 >>' }
    ]), new FakeSigner(SIGNATURE))).toThrow(new DocumentShapeError('invalid or unsupported page tree'));
  });

  it('Failures: indirect Annots', () => {
    const document = withCatalog('<< /Type /Catalog /Pages 2 0 R >>', [
      SIMPLE_OBJECTS[1],
      { n: 3, body: '<< /Type /Page /Parent 2 0 R /Annots 8 0 R >>' }
    ]);
    expect(() => sign(document, new FakeSigner(SIGNATURE)))
      .toThrow(new DocumentShapeError('unexpected Annots'));
  });

  it('ByteRange: split around the window', () => {
    expect(computeByteRange({ offset: 100, length: 10 }, 150)).toEqual([0, 100, 110, 40]);
  });
});
