import type { PDFUpdater } from './updater';
import type { PDFObject } from './objects';
import type { FirstPage } from './types';
import { DEBUG, PDF_OBJECT_TYPES } from './constants';

/**
 * Retrieves the first page of the given page (sub)tree reference
 * @param updater Session to read objects through
 * @param node Reference to a /Pages or /Page dictionary
 * @param visited Object ids already walked, guarding against circular trees
 * @returns The page, or null if the tree has an unsupported shape
 */
export function getFirstPage(
  updater: PDFUpdater,
  node: PDFObject,
  visited: Set<string> = new Set()
): FirstPage | null {
  if (node.kind !== 'reference') {
    return null;
  }

  const refKey = `${node.n}_${node.generation}`;
  if (visited.has(refKey)) {
    if (DEBUG) console.log(`Warning: Circular reference detected in page tree: ${refKey}`);
    return null;
  }
  visited.add(refKey);

  const obj = updater.dereference(node);
  if (obj.kind !== 'dict') {
    return null;
  }

  const type = obj.entries.get('Type');
  if (type?.kind !== 'name') {
    return null;
  }
  if (type.text === PDF_OBJECT_TYPES.PAGE) {
    return { n: node.n, generation: node.generation, dict: obj };
  }
  if (type.text !== PDF_OBJECT_TYPES.PAGES) {
    return null;
  }

  // Kids could technically be an indirect reference too
  const kids = obj.entries.get('Kids');
  if (kids?.kind !== 'array' || kids.items.length === 0 || kids.items[0].kind !== 'reference') {
    return null;
  }
  return getFirstPage(updater, kids.items[0], visited);
}
