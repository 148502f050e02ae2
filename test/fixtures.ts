/**
 * Builds small PDF documents with correct cross-reference offsets
 */

export interface FixtureObject {
  n: number;
  generation?: number;
  body: string;
}

export interface DocumentOptions {
  /** Header line, without the newline (default: %PDF-1.4) */
  header?: string;
  /** Extra trailer entries, written as is */
  trailer?: string;
  /** Trailer /Size (default: highest object number + 1) */
  size?: number;
}

function entry(offset: number, generation: number, flag: 'n' | 'f'): string {
  return `${offset.toString().padStart(10, '0')} ${generation.toString().padStart(5, '0')} ${flag} \n`;
}

function writeObjects(prefix: string, objects: FixtureObject[]): { text: string; offsets: Map<number, number> } {
  let text = prefix;
  const offsets = new Map<number, number>();
  for (const obj of objects) {
    offsets.set(obj.n, text.length);
    text += `${obj.n} ${obj.generation ?? 0} obj\n${obj.body}\nendobj\n`;
  }
  return { text, offsets };
}

/**
 * Writes a document with a single cross-reference section starting at 0
 */
export function buildDocument(objects: FixtureObject[], options: DocumentOptions = {}): Buffer {
  const { text, offsets } = writeObjects(`${options.header ?? '%PDF-1.4'}\n`, objects);
  const size = options.size ?? Math.max(0, ...objects.map(obj => obj.n)) + 1;

  let out = text;
  const startxref = out.length;
  out += `xref\n0 ${size}\n`;
  for (let n = 0; n < size; n++) {
    const offset = offsets.get(n);
    const obj = objects.find(o => o.n === n);
    if (offset === undefined || obj === undefined) {
      out += entry(0, n === 0 ? 65535 : 0, 'f');
    } else {
      out += entry(offset, obj.generation ?? 0, 'n');
    }
  }
  out += `trailer\n<< /Size ${size}${options.trailer ?? ''} >>\nstartxref\n${startxref}\n%%EOF\n`;
  return Buffer.from(out, 'latin1');
}

/**
 * Appends an incremental update section, one subsection per object
 */
export function appendSection(
  document: Buffer,
  objects: FixtureObject[],
  prev: number,
  options: { size: number; trailer?: string }
): Buffer {
  const { text, offsets } = writeObjects(document.toString('latin1'), objects);

  let out = text;
  const startxref = out.length;
  out += 'xref\n';
  for (const obj of objects) {
    out += `${obj.n} 1\n` + entry(offsets.get(obj.n) ?? 0, obj.generation ?? 0, 'n');
  }
  out += `trailer\n<< /Size ${options.size} /Prev ${prev}${options.trailer ?? ''} >>\n` +
    `startxref\n${startxref}\n%%EOF\n`;
  return Buffer.from(out, 'latin1');
}

/** Catalog, page tree and a single page */
export const SIMPLE_OBJECTS: FixtureObject[] = [
  { n: 1, body: '<< /Type /Catalog /Pages 2 0 R >>' },
  { n: 2, body: '<< /Type /Pages /Kids [3 0 R] /Count 1 >>' },
  { n: 3, body: '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] >>' }
];

export function simpleDocument(options: DocumentOptions = {}): Buffer {
  return buildDocument(SIMPLE_OBJECTS, { trailer: ' /Root 1 0 R', ...options });
}

/**
 * Offset of the last startxref value of a document
 */
export function lastStartXRef(document: Buffer): number {
  const matches = Array.from(document.toString('latin1').matchAll(/startxref\n(\d+)\n%%EOF/g));
  const last = matches[matches.length - 1];
  return last === undefined ? -1 : parseInt(last[1], 10);
}
