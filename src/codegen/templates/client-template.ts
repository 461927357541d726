/**
 * Client Template
 *
 * Renders the generated client file: header, runtime imports, constants, the
 * client class with its constructor and the request-execution primitive that
 * every generated method dispatches to.
 */

import { block, docComment, renderSource, toStringLiteral, type CodeLine } from './code-writer.js';
import { renderCallable, type CallableDescriptor } from './function-template.js';

export interface ClientTemplateInput {
  clientName: string;
  baseUrl: string;
  apiKeyEnvVar: string;
  /** Module the generated file imports the runtime from */
  runtimeImport: string;
  title?: string;
  version?: string;
  callables: CallableDescriptor[];
}

/**
 * Members of the generated class and of HttpClient. Generated method names
 * must not shadow them.
 */
export const RESERVED_MEMBER_NAMES: readonly string[] = [
  'constructor',
  'executeRequest',
  'apiKey',
  'request',
  'send',
  'get',
  'post',
  'put',
  'patch',
  'delete',
  'head',
  'options',
  'beforeRequest',
  'processError',
  'errorHandler',
  'extractErrorMessage',
  'buildMultipartBody',
  'getRetryDelay',
  'client',
  'baseURL',
  'debug',
  'debugLevel',
  'name',
  'retryConfig',
  'errorMessagePath',
];

function renderHeader(input: ClientTemplateInput): string[] {
  const described = input.title
    ? `${input.title}${input.version ? ` (version ${input.version})` : ''}`
    : 'an OpenAPI document';

  return docComment([
    `${input.clientName}: client for ${described}`,
    '',
    'Generated by openapi-callgen. Changes are overwritten on the next run.',
  ]);
}

function renderImports(input: ClientTemplateInput): CodeLine[] {
  const names = ['HttpClient', 'MissingApiKeyError', 'RequestType'];
  if (input.callables.some(callable => callable.checksRequired)) {
    names.push('RequiredParameterError');
  }

  const source = toStringLiteral(input.runtimeImport);
  return [
    block('import {', names.map(name => `${name},`), `} from ${source};`),
    `import type { HttpClientOptions } from ${source};`,
  ];
}

function renderHelpers(input: ClientTemplateInput): CodeLine[] {
  return [
    `export const BASE_URL = ${toStringLiteral(input.baseUrl)};`,
    `export const API_KEY_ENV_VAR = ${toStringLiteral(input.apiKeyEnvVar)};`,
    '',
    block(`export interface ${input.clientName}Options extends Partial<HttpClientOptions> {`, [
      '/** Defaults to the value of the environment variable named by API_KEY_ENV_VAR */',
      'apiKey?: string;',
    ]),
    '',
    'type Bundle = Record<string, unknown>;',
    '',
    block('interface RequestBundles {', [
      'query?: Bundle;',
      'json?: Bundle;',
      'form?: Bundle;',
      'files?: Record<string, Blob>;',
    ]),
    '',
    '/** Drops undefined and null entries */',
    block('function compact(values: Bundle = {}): Bundle {', [
      block(
        'return Object.fromEntries(',
        ['Object.entries(values).filter(([, value]) => value !== undefined && value !== null)'],
        ');'
      ),
    ]),
  ];
}

function renderConstructor(input: ClientTemplateInput): CodeLine {
  return block(`constructor(options: ${input.clientName}Options = {}) {`, [
    'const { apiKey = process.env[API_KEY_ENV_VAR], ...httpOptions } = options;',
    block('if (!apiKey) {', ['throw new MissingApiKeyError(API_KEY_ENV_VAR);']),
    '',
    `super({ name: ${toStringLiteral(input.clientName)}, ...httpOptions, baseURL: httpOptions.baseURL ?? BASE_URL });`,
    'this.apiKey = apiKey;',
  ]);
}

function renderExecuteRequest(): CodeLine[] {
  return [
    ...docComment([
      'Sends one request with the API key attached. Absent query, body and form',
      'entries are dropped; form fields or files switch the body to multipart.',
    ]),
    block(
      'protected async executeRequest<T = unknown>(method: RequestType, path: string, bundles: RequestBundles = {}): Promise<T> {',
      [
        block(
          'const config = {',
          ['params: compact(bundles.query),', 'headers: { Authorization: `Bearer ${this.apiKey}` },'],
          '};'
        ),
        '',
        block('if (bundles.form !== undefined || bundles.files !== undefined) {', [
          block(
            'const form = Object.fromEntries(',
            ['Object.entries(compact(bundles.form)).map(([key, value]) => [key, String(value)])'],
            ');'
          ),
          'const data = Object.keys(form).length > 0 ? form : undefined;',
          block(
            'const response = await this.request<T>(method, path, data, {',
            ['...config,', 'files: bundles.files ?? {},'],
            '});'
          ),
          'return response.data;',
        ]),
        '',
        'const json = bundles.json === undefined ? undefined : compact(bundles.json);',
        'const response = await this.request<T>(method, path, json, config);',
        'return response.data;',
      ]
    ),
  ];
}

/**
 * Render the complete generated client source
 */
export function renderClient(input: ClientTemplateInput): string {
  const members: CodeLine[] = ['private readonly apiKey: string;', '', renderConstructor(input)];

  for (const callable of input.callables) {
    members.push('', ...renderCallable(callable));
  }

  members.push('', ...renderExecuteRequest());

  return renderSource([
    ...renderHeader(input),
    '',
    ...renderImports(input),
    '',
    ...renderHelpers(input),
    '',
    block(`export class ${input.clientName} extends HttpClient {`, members),
  ]);
}
