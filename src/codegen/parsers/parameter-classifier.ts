/**
 * Parameter Classifier
 *
 * Merges the parameters a path item and one of its operations declare, and
 * splits them into path and query parameters.
 */

import type { IdentifierTable } from '../utils/naming.js';
import { getTypeScriptType } from '../utils/type-mapping.js';
import type {
  ParameterDescriptor,
  ParameterLocation,
  SkippedParameter,
  SpecDocument,
} from '../types.js';
import { resolveRef } from './ref-resolver.js';
import { getArray, getDescription, getString, isRecord, type SpecRecord } from './spec-nodes.js';

export interface ClassifiedParameters {
  pathParams: ParameterDescriptor[];
  queryParams: ParameterDescriptor[];
  skipped: SkippedParameter[];
}

interface MergedDeclaration {
  name: string;
  location: ParameterLocation;
  node: SpecRecord;
}

const PATH_PLACEHOLDER = /\{([^{}]+)\}/g;

/**
 * Names of the `{placeholder}` tokens in a path template, in order
 */
export function getPathPlaceholders(path: string): string[] {
  return Array.from(path.matchAll(PATH_PLACEHOLDER), match => match[1]);
}

function isSupportedLocation(location: string): location is ParameterLocation {
  return location === 'path' || location === 'query';
}

/**
 * Merge and classify the parameters of one operation
 *
 * Declarations are keyed by (location, name). Operation-level declarations
 * replace path-level ones with the same key but keep the position where the
 * key first appeared. Identifiers are claimed from `table` in merged order.
 *
 * @param operationLabel - `METHOD /path`, used when reporting skipped declarations
 */
export function classifyParameters(
  pathItem: SpecRecord,
  operation: SpecRecord,
  path: string,
  document: SpecDocument,
  table: IdentifierTable,
  operationLabel: string
): ClassifiedParameters {
  const merged = new Map<string, MergedDeclaration>();
  const skipped: SkippedParameter[] = [];

  const declarations = [...getArray(pathItem, 'parameters'), ...getArray(operation, 'parameters')];

  for (const declaration of declarations) {
    const node = resolveRef(declaration, document);
    if (!isRecord(node)) {
      skipped.push({ operation: operationLabel, reason: 'parameter declaration is not an object' });
      continue;
    }

    const name = getString(node, 'name');
    const location = getString(node, 'in');

    if (!name || !location) {
      skipped.push({
        operation: operationLabel,
        name,
        location,
        reason: 'parameter declaration is missing its name or location',
      });
      continue;
    }

    if (!isSupportedLocation(location)) {
      skipped.push({
        operation: operationLabel,
        name,
        location,
        reason: `${location} parameters are not supported`,
      });
      continue;
    }

    const key = `${location}:${name}`;
    // Map.set on an existing key keeps its original insertion position
    merged.set(key, { name, location, node });
  }

  for (const placeholder of getPathPlaceholders(path)) {
    const key = `path:${placeholder}`;
    if (!merged.has(key)) {
      merged.set(key, { name: placeholder, location: 'path', node: {} });
    }
  }

  const pathParams: ParameterDescriptor[] = [];
  const queryParams: ParameterDescriptor[] = [];

  for (const { name, location, node } of merged.values()) {
    const type = getTypeScriptType(node.schema, document);

    if (location === 'path') {
      pathParams.push({
        name,
        identifier: table.claim(name),
        location,
        description: getDescription(node),
        required: true,
        type: type === 'unknown' ? 'string | number' : type,
      });
    } else {
      queryParams.push({
        name,
        identifier: table.claim(name),
        location,
        description: getDescription(node),
        required: node.required === true,
        type,
      });
    }
  }

  return { pathParams, queryParams, skipped };
}
