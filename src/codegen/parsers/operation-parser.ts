/**
 * Operation Parser
 *
 * Builds the typed descriptor of one (path, method) pair. Each operation gets
 * its own identifier table, seeded with the globals a generated method uses.
 */

import { CALLABLE_GLOBALS } from '../templates/function-template.js';
import { IdentifierTable } from '../utils/naming.js';
import type { OperationDescriptor, SkippedParameter, SpecDocument } from '../types.js';
import type { SpecOperation } from './openapi-parser.js';
import { classifyParameters } from './parameter-classifier.js';
import { extractRequestBody } from './request-body-extractor.js';
import { getString } from './spec-nodes.js';

export interface ParsedOperation {
  descriptor: OperationDescriptor;
  skipped: SkippedParameter[];
}

function collapse(text: string | undefined): string | undefined {
  const collapsed = text?.replace(/\s+/g, ' ').trim();
  return collapsed || undefined;
}

export function getOperationLabel(op: Pick<SpecOperation, 'method' | 'path'>): string {
  return `${op.method.toUpperCase()} ${op.path}`;
}

/**
 * Parse one operation into an OperationDescriptor
 *
 * @param functionName - Callable name, already unique within the document
 */
export function parseOperation(
  op: SpecOperation,
  document: SpecDocument,
  functionName: string
): ParsedOperation {
  const { method, path, operation, pathItem } = op;
  const label = getOperationLabel(op);
  const table = new IdentifierTable(CALLABLE_GLOBALS);

  const { pathParams, queryParams, skipped } = classifyParameters(
    pathItem,
    operation,
    path,
    document,
    table,
    label
  );
  const requestBody = extractRequestBody(operation, document, table);

  return {
    descriptor: {
      method,
      path,
      functionName,
      summary: collapse(getString(operation, 'summary')),
      description: collapse(getString(operation, 'description')),
      deprecated: operation.deprecated === true,
      pathParams,
      queryParams,
      requestBody,
    },
    skipped,
  };
}
