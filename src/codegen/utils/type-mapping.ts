import { resolveRef } from '../parsers/ref-resolver.js';
import { getArray, getString, isRecord } from '../parsers/spec-nodes.js';
import { toStringLiteral } from '../templates/code-writer.js';
import type { SpecDocument } from '../types.js';

const MAX_ARRAY_DEPTH = 4;

function toLiteralUnion(values: readonly unknown[]): string | undefined {
  if (values.length === 0) return undefined;

  const literals: string[] = [];
  for (const value of values) {
    if (typeof value === 'string') {
      literals.push(toStringLiteral(value));
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      literals.push(String(value));
    } else {
      return undefined;
    }
  }

  return literals.join(' | ');
}

/**
 * Get the TypeScript type text for a parameter or property schema
 *
 * Scalars map to their primitive, enums of scalars to a literal union, arrays
 * of scalars to an array of the item type, anything else to `unknown`.
 */
export function getTypeScriptType(schemaNode: unknown, document: SpecDocument, depth = 0): string {
  const schema = resolveRef(schemaNode, document);
  if (!isRecord(schema) || depth > MAX_ARRAY_DEPTH) return 'unknown';

  const literals = toLiteralUnion(getArray(schema, 'enum'));
  if (literals) return literals;

  switch (getString(schema, 'type')) {
    case 'string':
      return 'string';
    case 'number':
    case 'integer':
      return 'number';
    case 'boolean':
      return 'boolean';
    case 'array': {
      const itemType = getTypeScriptType(schema.items, document, depth + 1);
      return itemType.includes('|') ? `Array<${itemType}>` : `${itemType}[]`;
    }
    default:
      return 'unknown';
  }
}
