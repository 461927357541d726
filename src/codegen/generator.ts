/**
 * Client Generator
 *
 * Drives generation for a whole document: every (path, method) pair becomes
 * one method of the generated client class.
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import { logInfo, logWarning } from '../logger.js';
import {
  resolveGeneratorOptions,
  type GenerateClientOptions,
  type ResolvedGeneratorOptions,
} from './config.js';
import { UnsupportedContentTypeError } from './errors.js';
import {
  extractOperations,
  getBaseUrl,
  getDocumentInfo,
  parseOpenApiSpec,
} from './parsers/openapi-parser.js';
import { getOperationLabel, parseOperation } from './parsers/operation-parser.js';
import { getString } from './parsers/spec-nodes.js';
import { RESERVED_MEMBER_NAMES, renderClient } from './templates/client-template.js';
import { synthesizeCallable, type CallableDescriptor } from './templates/function-template.js';
import type { SkippedParameter, SpecDocument } from './types.js';
import { IdentifierTable, toMethodName } from './utils/naming.js';

export type { GenerateClientOptions } from './config.js';

export interface GeneratedSource {
  source: string;
  operationCount: number;
  skippedParameters: SkippedParameter[];
}

export interface GenerateClientResult {
  outputFile: string;
  operationCount: number;
  skippedParameters: SkippedParameter[];
}

/**
 * Generate the client source for a parsed document
 *
 * Output depends only on the document and the options, so the same input
 * always produces the same text.
 *
 * @throws {ReferenceResolutionError} For external or dangling `$ref`s
 * @throws {CircularReferenceError} For `$ref` chains that loop
 * @throws {UnsupportedContentTypeError} With `strictContentTypes`, for bodies that are neither JSON nor multipart
 */
export function generateClientSource(
  document: SpecDocument,
  options: Omit<GenerateClientOptions, 'openApiSpec'> = {}
): GeneratedSource {
  const config = resolveGeneratorOptions(options);
  return buildSource(document, config);
}

function buildSource(document: SpecDocument, config: ResolvedGeneratorOptions): GeneratedSource {
  const functionNames = new IdentifierTable(RESERVED_MEMBER_NAMES, name => name);
  const callables: CallableDescriptor[] = [];
  const skippedParameters: SkippedParameter[] = [];

  for (const op of extractOperations(document)) {
    const functionName = functionNames.claim(
      toMethodName(op.method, op.path, getString(op.operation, 'operationId'))
    );
    const { descriptor, skipped } = parseOperation(op, document, functionName);
    skippedParameters.push(...skipped);

    if (descriptor.requestBody?.encoding === 'unsupported') {
      const label = getOperationLabel(op);
      if (config.strictContentTypes) {
        throw new UnsupportedContentTypeError(descriptor.requestBody.contentType, label);
      }
      logWarning(
        `${label}: request body content type "${descriptor.requestBody.contentType}" is not supported; it will be sent as JSON`
      );
    }

    callables.push(synthesizeCallable(descriptor));
  }

  const { title, version } = getDocumentInfo(document);
  const source = renderClient({
    clientName: config.clientName,
    baseUrl: getBaseUrl(document, config.fallbackBaseUrl),
    apiKeyEnvVar: config.apiKeyEnvVar,
    runtimeImport: config.runtimeImport,
    title,
    version,
    callables,
  });

  return { source, operationCount: callables.length, skippedParameters };
}

/**
 * Generate a client from an OpenAPI document and write it to disk
 *
 * @example
 * ```typescript
 * import { generateClient } from 'openapi-callgen/codegen';
 *
 * await generateClient({
 *   openApiSpec: './openapi.yaml',
 *   outputFile: './src/corpus-client.ts',
 *   clientName: 'CorpusClient',
 *   apiKeyEnvVar: 'CORPUS_API_KEY',
 * });
 * ```
 */
export async function generateClient(options: GenerateClientOptions): Promise<GenerateClientResult> {
  const { openApiSpec, ...rest } = options;
  const config = resolveGeneratorOptions(rest);

  const document = await parseOpenApiSpec(openApiSpec);
  const { source, operationCount, skippedParameters } = buildSource(document, config);

  for (const skipped of skippedParameters) {
    const subject = skipped.name ? ` "${skipped.name}"` : '';
    logWarning(`${skipped.operation}: skipped parameter${subject} (${skipped.reason})`);
  }

  await fs.mkdir(dirname(config.outputFile), { recursive: true });
  await fs.writeFile(config.outputFile, source, 'utf-8');

  logInfo(`Generated ${config.clientName} with ${operationCount} operation(s) in ${config.outputFile}`);

  return { outputFile: config.outputFile, operationCount, skippedParameters };
}
