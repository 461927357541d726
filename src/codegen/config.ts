/**
 * Generator configuration
 */

import { isReservedWord, isValidIdentifier } from './utils/naming.js';

export interface GenerateClientOptions {
  /** Path to an OpenAPI document (YAML or JSON), or the parsed document */
  openApiSpec: string | object;
  /** File the generated client is written to */
  outputFile?: string;
  /** Name of the generated client class */
  clientName?: string;
  /** Environment variable the generated client reads its API key from */
  apiKeyEnvVar?: string;
  /** Module specifier the generated file imports HttpClient and the errors from */
  runtimeImport?: string;
  /** Base URL used when the document declares no server */
  fallbackBaseUrl?: string;
  /**
   * Throw UnsupportedContentTypeError for request bodies that are neither JSON
   * nor multipart, instead of warning and sending them as JSON
   */
  strictContentTypes?: boolean;
}

export type ResolvedGeneratorOptions = Required<Omit<GenerateClientOptions, 'openApiSpec'>>;

export const DEFAULT_GENERATOR_OPTIONS: ResolvedGeneratorOptions = {
  outputFile: 'generated-client.ts',
  clientName: 'ApiClient',
  apiKeyEnvVar: 'API_KEY',
  runtimeImport: 'openapi-callgen',
  fallbackBaseUrl: 'http://localhost',
  strictContentTypes: false,
};

/**
 * Merge options over the defaults. Options explicitly set to `undefined` keep
 * the default.
 *
 * @throws {Error} When `clientName` is not a usable class name
 */
export function resolveGeneratorOptions(
  options: Omit<GenerateClientOptions, 'openApiSpec'> = {}
): ResolvedGeneratorOptions {
  const resolved: ResolvedGeneratorOptions = {
    outputFile: options.outputFile ?? DEFAULT_GENERATOR_OPTIONS.outputFile,
    clientName: options.clientName ?? DEFAULT_GENERATOR_OPTIONS.clientName,
    apiKeyEnvVar: options.apiKeyEnvVar ?? DEFAULT_GENERATOR_OPTIONS.apiKeyEnvVar,
    runtimeImport: options.runtimeImport ?? DEFAULT_GENERATOR_OPTIONS.runtimeImport,
    fallbackBaseUrl: options.fallbackBaseUrl ?? DEFAULT_GENERATOR_OPTIONS.fallbackBaseUrl,
    strictContentTypes: options.strictContentTypes ?? DEFAULT_GENERATOR_OPTIONS.strictContentTypes,
  };

  if (!isValidIdentifier(resolved.clientName) || isReservedWord(resolved.clientName)) {
    throw new Error(`Invalid client name "${resolved.clientName}": must be a valid class name`);
  }

  return resolved;
}
