/**
 * Function Synthesizer
 *
 * Turns an OperationDescriptor into a CallableDescriptor (signature, docs and
 * body statements) and renders it as a client method.
 */

import type {
  BodyFieldDescriptor,
  OperationDescriptor,
  ParameterDescriptor,
} from '../types.js';
import {
  block,
  docComment,
  escapeTemplateText,
  toStringLiteral,
  type CodeLine,
} from './code-writer.js';

/**
 * Where a call-time value ends up in the request
 */
export type ArgumentLocation = 'path' | 'query' | 'body' | 'form' | 'file';

export interface SignatureParameter {
  identifier: string;
  /** Name as declared in the document */
  name: string;
  type: string;
  optional: boolean;
  location: ArgumentLocation;
  description: string;
}

export interface CallableDescriptor {
  name: string;
  docLines: string[];
  parameters: SignatureParameter[];
  statements: CodeLine[];
  /** True when a statement throws RequiredParameterError */
  checksRequired: boolean;
}

/**
 * Globals the statements of a generated method refer to. Parameters must not
 * shadow them.
 */
export const CALLABLE_GLOBALS: readonly string[] = [
  'String',
  'encodeURIComponent',
  'RequestType',
  'RequiredParameterError',
];

function fromParameter(param: ParameterDescriptor): SignatureParameter {
  return {
    identifier: param.identifier,
    name: param.name,
    type: param.type,
    optional: !param.required,
    location: param.location,
    description: param.description,
  };
}

function fromBodyField(field: BodyFieldDescriptor, multipart: boolean): SignatureParameter {
  let location: ArgumentLocation = 'body';
  if (multipart) {
    location = field.isFile ? 'file' : 'form';
  }

  return {
    identifier: field.identifier,
    name: field.name,
    type: field.type,
    optional: !field.required,
    location,
    description: field.description,
  };
}

/**
 * Required path, required body, required query, then optional query and
 * optional body parameters. Declared order is kept within each group.
 */
export function orderSignature(
  pathParams: SignatureParameter[],
  queryParams: SignatureParameter[],
  bodyFields: SignatureParameter[]
): SignatureParameter[] {
  const required = (params: SignatureParameter[]) => params.filter(p => !p.optional);
  const optional = (params: SignatureParameter[]) => params.filter(p => p.optional);

  return [
    ...required(pathParams),
    ...required(bodyFields),
    ...required(queryParams),
    ...optional(queryParams),
    ...optional(bodyFields),
  ];
}

function describeParameter(param: SignatureParameter): string {
  const tag = param.name === param.identifier ? param.location : `${param.location} "${param.name}"`;
  return `@param ${param.identifier} - (${tag})${param.description ? ` ${param.description}` : ''}`;
}

function buildDocLines(op: OperationDescriptor, parameters: SignatureParameter[]): string[] {
  const lines = [`${op.method.toUpperCase()} ${op.path}`];

  if (op.summary) {
    lines.push('', op.summary);
  }
  if (op.description && op.description !== op.summary) {
    lines.push('', op.description);
  }

  if (parameters.length > 0) {
    lines.push('');
    lines.push(...parameters.map(describeParameter));
  }

  if (op.requestBody?.encoding === 'unsupported') {
    lines.push(
      `@remarks Request body content type "${op.requestBody.contentType}" is not supported; the body is sent as JSON.`
    );
  }

  if (op.deprecated) {
    lines.push('@deprecated');
  }

  return lines;
}

function requiredCheck(param: SignatureParameter): CodeLine {
  return block(`if (${param.identifier} === undefined || ${param.identifier} === null) {`, [
    `throw new RequiredParameterError(${toStringLiteral(param.identifier)}, ${toStringLiteral(param.location)});`,
  ]);
}

/**
 * The endpoint path with each `{placeholder}` replaced by its call-time value
 */
function buildUrl(path: string, pathParams: ParameterDescriptor[]): string {
  const identifiers = new Map(
    pathParams.map((param): [string, string] => [param.name, param.identifier])
  );
  const parts: string[] = [];
  let literal = '';

  for (const segment of path.split(/(\{[^{}]+\})/)) {
    const identifier = /^\{[^{}]+\}$/.test(segment) ? identifiers.get(segment.slice(1, -1)) : undefined;
    if (identifier === undefined) {
      literal += segment;
    } else {
      // literal text is escaped as one run
      parts.push(escapeTemplateText(literal), `\${encodeURIComponent(String(${identifier}))}`);
      literal = '';
    }
  }

  if (parts.length === 0) return toStringLiteral(path);
  parts.push(escapeTemplateText(literal));
  return `\`${parts.join('')}\``;
}

function objectLiteral(declaration: string, entries: SignatureParameter[]): CodeLine {
  return block(
    `${declaration} = {`,
    entries.map(entry => `${toStringLiteral(entry.name)}: ${entry.identifier},`),
    '};'
  );
}

function fileStatements(field: SignatureParameter, isArray: boolean): CodeLine[] {
  const key = toStringLiteral(field.name);

  if (isArray) {
    const access = field.optional ? `${field.identifier}?.forEach` : `${field.identifier}.forEach`;
    return [
      block(
        `${access}(($file, $index) => {`,
        [`$files[\`${escapeTemplateText(field.name)}[\${$index}]\`] = $file;`],
        '});'
      ),
    ];
  }

  if (!field.optional) {
    return [`$files[${key}] = ${field.identifier};`];
  }

  return [
    block(`if (${field.identifier} !== undefined && ${field.identifier} !== null) {`, [
      `$files[${key}] = ${field.identifier};`,
    ]),
  ];
}

/**
 * Build the CallableDescriptor of one operation
 */
export function synthesizeCallable(op: OperationDescriptor): CallableDescriptor {
  const body = op.requestBody;
  const multipart = body?.encoding === 'multipart';
  const fields = body?.fields ?? [];

  const pathParams = op.pathParams.map(fromParameter);
  const queryParams = op.queryParams.map(fromParameter);
  const bodyParams = fields.map(field => fromBodyField(field, multipart));
  const parameters = orderSignature(pathParams, queryParams, bodyParams);

  const statements: CodeLine[] = [];
  const checks = parameters.filter(param => !param.optional).map(requiredCheck);
  statements.push(...checks);
  if (checks.length > 0) statements.push('');

  statements.push(`const $url = ${buildUrl(op.path, op.pathParams)};`);

  const bundles: string[] = [];

  if (queryParams.length > 0) {
    statements.push(objectLiteral('const $query', queryParams));
    bundles.push('query: $query');
  }

  if (multipart) {
    const fileParams = bodyParams.filter(param => param.location === 'file');
    const formParams = bodyParams.filter(param => param.location === 'form');

    if (fileParams.length > 0) {
      statements.push('const $files: Record<string, Blob> = {};');
      fields.forEach((field, index) => {
        if (field.isFile) {
          statements.push(...fileStatements(bodyParams[index], field.isFileArray));
        }
      });
      bundles.push('files: $files');
    }

    if (formParams.length > 0) {
      statements.push(objectLiteral('const $form', formParams));
      bundles.push('form: $form');
    }
  } else if (bodyParams.length > 0) {
    statements.push(objectLiteral('const $body', bodyParams));
    bundles.push('json: $body');
  }

  const requestType = `RequestType.${op.method.toUpperCase()}`;
  statements.push('');
  statements.push(
    bundles.length > 0
      ? `return this.executeRequest<T>(${requestType}, $url, { ${bundles.join(', ')} });`
      : `return this.executeRequest<T>(${requestType}, $url);`
  );

  return {
    name: op.functionName,
    docLines: buildDocLines(op, parameters),
    parameters,
    statements,
    checksRequired: checks.length > 0,
  };
}

/**
 * Render a callable as a class method
 */
export function renderCallable(callable: CallableDescriptor): CodeLine[] {
  const signature = callable.parameters
    .map(param => `${param.identifier}${param.optional ? '?' : ''}: ${param.type}`)
    .join(', ');

  return [
    ...docComment(callable.docLines),
    block(`async ${callable.name}<T = unknown>(${signature}): Promise<T> {`, callable.statements),
  ];
}
