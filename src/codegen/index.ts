/**
 * OpenAPI to API Client Code Generator
 *
 * Generates a TypeScript client class with one method per operation of an
 * OpenAPI 3 document. The generated class extends HttpClient.
 *
 * @example
 * ```typescript
 * import { generateClient } from 'openapi-callgen/codegen';
 *
 * await generateClient({
 *   openApiSpec: './openapi.yaml',
 *   outputFile: './src/api-client.ts',
 *   clientName: 'MyApiClient',
 * });
 * ```
 */

export { generateClient, generateClientSource } from './generator.js';
export type { GenerateClientResult, GeneratedSource } from './generator.js';
export { DEFAULT_GENERATOR_OPTIONS, resolveGeneratorOptions } from './config.js';
export type { GenerateClientOptions, ResolvedGeneratorOptions } from './config.js';
export {
  SpecError,
  SpecLoadError,
  ReferenceResolutionError,
  CircularReferenceError,
  UnsupportedContentTypeError,
} from './errors.js';
export { parseOpenApiSpec, extractOperations, getBaseUrl } from './parsers/openapi-parser.js';
export { resolveRef, resolvePointer } from './parsers/ref-resolver.js';
export { IdentifierTable, sanitizeParamName, toMethodName } from './utils/naming.js';
export type {
  BodyFieldDescriptor,
  OperationDescriptor,
  ParameterDescriptor,
  RequestBodyDescriptor,
  SkippedParameter,
  SpecDocument,
} from './types.js';
