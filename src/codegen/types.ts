/**
 * Typed descriptors the parsers build from raw document nodes. Templates only
 * ever see these, never the raw document.
 */

import type { OpenAPIV3 } from 'openapi-types';

/**
 * A parsed OpenAPI document. Nodes are untyped until a parser narrows them.
 */
export type SpecDocument = Readonly<Record<string, unknown>>;

/**
 * Methods a client callable is generated for (every OpenAPI method but `trace`)
 */
export type HttpMethod = Exclude<`${OpenAPIV3.HttpMethods}`, 'trace'>;

export const HTTP_METHODS: readonly HttpMethod[] = [
  'get',
  'post',
  'put',
  'patch',
  'delete',
  'head',
  'options',
];

export type ParameterLocation = 'path' | 'query';

export interface ParameterDescriptor {
  /** Name as declared in the document */
  name: string;
  /** Sanitized, operation-unique TypeScript identifier */
  identifier: string;
  location: ParameterLocation;
  description: string;
  /** Always true for path parameters */
  required: boolean;
  /** TypeScript type text for the signature */
  type: string;
}

export interface BodyFieldDescriptor {
  name: string;
  identifier: string;
  description: string;
  required: boolean;
  /** A binary-format property, or an array of them */
  isFile: boolean;
  isFileArray: boolean;
  type: string;
}

export type BodyEncoding = 'json' | 'multipart' | 'unsupported';

export interface RequestBodyDescriptor {
  contentType: string;
  encoding: BodyEncoding;
  required: boolean;
  /** Empty when the body schema is not a flat object */
  fields: BodyFieldDescriptor[];
}

/**
 * A declaration the parameter classifier left out
 */
export interface SkippedParameter {
  operation: string;
  name?: string;
  location?: string;
  reason: string;
}

export interface OperationDescriptor {
  method: HttpMethod;
  path: string;
  functionName: string;
  summary?: string;
  description?: string;
  deprecated: boolean;
  pathParams: ParameterDescriptor[];
  queryParams: ParameterDescriptor[];
  requestBody?: RequestBodyDescriptor;
}
