/**
 * Request-Body Extractor
 *
 * Flattens the schema of an operation's request body into a list of fields.
 * Only one content type is used per operation: the first one declared.
 */

import type { IdentifierTable } from '../utils/naming.js';
import { getTypeScriptType } from '../utils/type-mapping.js';
import type {
  BodyEncoding,
  BodyFieldDescriptor,
  RequestBodyDescriptor,
  SpecDocument,
} from '../types.js';
import { resolveRef } from './ref-resolver.js';
import {
  getArray,
  getDescription,
  getRecord,
  getString,
  isRecord,
  type SpecRecord,
} from './spec-nodes.js';

/**
 * Classify a media type by how a generated client encodes it
 *
 * @example
 * ```typescript
 * getBodyEncoding('application/json; charset=utf-8') // 'json'
 * getBodyEncoding('application/merge-patch+json') // 'json'
 * getBodyEncoding('multipart/form-data') // 'multipart'
 * getBodyEncoding('text/plain') // 'unsupported'
 * ```
 */
export function getBodyEncoding(contentType: string): BodyEncoding {
  const mediaType = contentType.split(';')[0].trim().toLowerCase();

  if (mediaType === 'application/json' || mediaType.endsWith('+json')) {
    return 'json';
  }
  if (mediaType.startsWith('multipart/')) {
    return 'multipart';
  }
  return 'unsupported';
}

function isBinarySchema(schema: unknown): boolean {
  return isRecord(schema) && getString(schema, 'format') === 'binary';
}

function isObjectSchema(schema: SpecRecord): boolean {
  const type = getString(schema, 'type');
  return type === 'object' || (type === undefined && isRecord(schema.properties));
}

function toBodyField(
  name: string,
  propertyNode: unknown,
  required: boolean,
  allowFiles: boolean,
  document: SpecDocument,
  table: IdentifierTable
): BodyFieldDescriptor | undefined {
  const property = resolveRef(propertyNode, document);
  if (!isRecord(property)) return undefined;

  const isArray = getString(property, 'type') === 'array';
  const isFileArray = isArray && isBinarySchema(resolveRef(property.items, document));
  const isFile = isFileArray || (!isArray && isBinarySchema(property));
  if (isFile && !allowFiles) return undefined;

  let type: string;
  if (isFileArray) {
    type = 'Blob[]';
  } else if (isFile) {
    type = 'Blob';
  } else {
    type = getTypeScriptType(property, document);
  }

  return {
    name,
    identifier: table.claim(name),
    description: getDescription(property),
    required,
    isFile,
    isFileArray,
    type,
  };
}

/**
 * Extract the request body of an operation
 *
 * Returns `undefined` when the operation declares no body. A body whose schema
 * is not an object yields a descriptor with no fields. File properties are only
 * kept for multipart bodies.
 */
export function extractRequestBody(
  operation: SpecRecord,
  document: SpecDocument,
  table: IdentifierTable
): RequestBodyDescriptor | undefined {
  const requestBody = resolveRef(operation.requestBody, document);
  if (!isRecord(requestBody)) return undefined;

  const content = getRecord(requestBody, 'content');
  const contentType = content ? Object.keys(content)[0] : undefined;
  if (!content || contentType === undefined) return undefined;

  const encoding = getBodyEncoding(contentType);
  const descriptor: RequestBodyDescriptor = {
    contentType,
    encoding,
    required: requestBody.required === true,
    fields: [],
  };

  const mediaType = resolveRef(content[contentType], document);
  const schema = isRecord(mediaType) ? resolveRef(mediaType.schema, document) : undefined;
  if (!isRecord(schema) || !isObjectSchema(schema)) return descriptor;

  const properties = getRecord(schema, 'properties') ?? {};
  const requiredNames = new Set(
    getArray(schema, 'required').filter((name): name is string => typeof name === 'string')
  );

  for (const [name, propertyNode] of Object.entries(properties)) {
    const field = toBodyField(
      name,
      propertyNode,
      requiredNames.has(name),
      encoding === 'multipart',
      document,
      table
    );
    if (field) {
      descriptor.fields.push(field);
    }
  }

  return descriptor;
}
