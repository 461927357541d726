/**
 * Local `$ref` resolution
 */

import { CircularReferenceError, ReferenceResolutionError } from '../errors.js';
import type { SpecDocument } from '../types.js';
import { isRecord, isReference } from './spec-nodes.js';

/**
 * Decodes one JSON pointer segment (`~1` is `/`, `~0` is `~`, then percent escapes)
 */
function decodeSegment(segment: string): string {
  const unescaped = segment.replace(/~1/g, '/').replace(/~0/g, '~');
  try {
    return decodeURIComponent(unescaped);
  } catch {
    return unescaped;
  }
}

/**
 * Walks the document along a `#/a/b/c` pointer
 *
 * @throws {ReferenceResolutionError} for external pointers and missing segments
 */
export function resolvePointer(ref: string, document: SpecDocument): unknown {
  if (!ref.startsWith('#/')) {
    throw new ReferenceResolutionError(ref, 'only local "#/..." references are supported');
  }

  let node: unknown = document;
  for (const segment of ref.slice(2).split('/').map(decodeSegment)) {
    if (Array.isArray(node) && /^\d+$/.test(segment) && Number(segment) < node.length) {
      node = node[Number(segment)];
    } else if (isRecord(node) && Object.prototype.hasOwnProperty.call(node, segment)) {
      node = node[segment];
    } else {
      throw new ReferenceResolutionError(ref, `segment "${segment}" not found`);
    }
  }

  return node;
}

/**
 * Returns the node a `$ref` points to, or the node itself when it is not a
 * reference. References to references are followed until a concrete node.
 *
 * @throws {CircularReferenceError} when the chain revisits a pointer
 */
export function resolveRef(node: unknown, document: SpecDocument): unknown {
  const chain: string[] = [];
  let current = node;

  while (isReference(current)) {
    const ref = current.$ref;
    if (chain.includes(ref)) {
      throw new CircularReferenceError([...chain, ref]);
    }
    chain.push(ref);
    current = resolvePointer(ref, document);
  }

  return current;
}
