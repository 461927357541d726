/**
 * OpenAPI Specification Parser
 *
 * Loads an OpenAPI document from a file path or an already parsed object and
 * provides accessors for its operations and metadata. Nodes stay untyped here;
 * the operation parser narrows them.
 */

import { promises as fs } from 'fs';
import { parse as parseYaml } from 'yaml';
import { SpecLoadError } from '../errors.js';
import { HTTP_METHODS, type HttpMethod, type SpecDocument } from '../types.js';
import { getArray, getRecord, getString, isRecord, type SpecRecord } from './spec-nodes.js';

/**
 * One (path, method) pair of a document
 */
export interface SpecOperation {
  method: HttpMethod;
  path: string;
  operation: SpecRecord;
  pathItem: SpecRecord;
}

function isHttpMethod(key: string): key is HttpMethod {
  return HTTP_METHODS.some(method => method === key);
}

function parseContent(content: string, source: string): unknown {
  try {
    return parseYaml(content);
  } catch (error) {
    throw new SpecLoadError(`Failed to parse OpenAPI document ${source}`, source, error);
  }
}

/**
 * Parse an OpenAPI specification from a file path or object
 *
 * Files are read as YAML whatever their extension, which covers JSON too.
 *
 * @param spec - File path to an OpenAPI document, or the parsed document
 * @throws {SpecLoadError} When the file cannot be read or parsed, or its root is not a mapping
 */
export async function parseOpenApiSpec(spec: string | object): Promise<SpecDocument> {
  let specData: unknown = spec;
  let source: string | undefined;

  if (typeof spec === 'string') {
    source = spec;

    let content: string;
    try {
      content = await fs.readFile(spec, 'utf-8');
    } catch (error) {
      throw new SpecLoadError(`Failed to read OpenAPI document ${spec}`, spec, error);
    }

    specData = parseContent(content, spec);
  }

  if (!isRecord(specData)) {
    throw new SpecLoadError('Invalid OpenAPI specification: the document root must be a mapping', source);
  }

  return specData;
}

/**
 * Extract all operations from an OpenAPI document
 *
 * Paths keep document order, and so do the methods within a path. Keys of a
 * path item that are not one of the supported HTTP methods are ignored.
 */
export function extractOperations(document: SpecDocument): SpecOperation[] {
  const operations: SpecOperation[] = [];
  const paths = getRecord(document, 'paths');
  if (!paths) return operations;

  for (const [path, pathItem] of Object.entries(paths)) {
    if (!isRecord(pathItem)) continue;

    for (const [key, operation] of Object.entries(pathItem)) {
      if (isHttpMethod(key) && isRecord(operation)) {
        operations.push({ method: key, path, operation, pathItem });
      }
    }
  }

  return operations;
}

/**
 * Base URL of the first server entry, without a trailing slash
 *
 * @example
 * ```typescript
 * getBaseUrl({ servers: [{ url: 'https://api.example.com/v1/' }] }, 'http://localhost')
 * // 'https://api.example.com/v1'
 * ```
 */
export function getBaseUrl(document: SpecDocument, fallback: string): string {
  const [server] = getArray(document, 'servers');
  const url = isRecord(server) ? getString(server, 'url') : undefined;
  return (url || fallback).replace(/\/+$/, '');
}

/**
 * Title and version from the `info` section, for the generated file header
 */
export function getDocumentInfo(document: SpecDocument): { title?: string; version?: string } {
  const info = getRecord(document, 'info');
  if (!info) return {};

  const version = info.version;
  return {
    title: getString(info, 'title'),
    version: typeof version === 'number' ? String(version) : getString(info, 'version'),
  };
}
