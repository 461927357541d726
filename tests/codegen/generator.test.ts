/**
 * Code Generator Tests
 *
 * Generates the client for a small fixture document and checks the rendered
 * source line by line.
 */

import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { generateClient, generateClientSource } from '../../src/codegen/generator';
import { SpecLoadError, UnsupportedContentTypeError } from '../../src/codegen/errors';
import { parseOpenApiSpec } from '../../src/codegen/parsers/openapi-parser';
import type { SpecDocument } from '../../src/codegen/types';
import { logInfo, logWarning } from '../../src/logger';

jest.mock('../../src/logger', () => ({
  logInfo: jest.fn(),
  logWarning: jest.fn(),
  logError: jest.fn(),
}));

const fixturePath = join(__dirname, 'fixtures', 'corpus-api.yaml');

/**
 * Asserts that `expected` appears as a contiguous run of lines in `source`
 */
function expectLines(source: string, expected: string[]): void {
  expect(source).toContain(expected.join('\n'));
}

describe('Code Generator', () => {
  let document: SpecDocument;

  beforeAll(async () => {
    document = await parseOpenApiSpec(fixturePath);
  });

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('generateClientSource', () => {
    const generate = () =>
      generateClientSource(document, {
        clientName: 'CorpusClient',
        apiKeyEnvVar: 'CORPUS_API_KEY',
      });

    it('renders the header, imports and constants', () => {
      const { source } = generate();

      expectLines(source, [
        '/**',
        ' * CorpusClient: client for Corpus API (version 1.2.0)',
        ' *',
        ' * Generated by openapi-callgen. Changes are overwritten on the next run.',
        ' */',
        '',
        'import {',
        '  HttpClient,',
        '  MissingApiKeyError,',
        '  RequestType,',
        '  RequiredParameterError,',
        "} from 'openapi-callgen';",
        "import type { HttpClientOptions } from 'openapi-callgen';",
        '',
        "export const BASE_URL = 'https://corpus.example.com/api';",
        "export const API_KEY_ENV_VAR = 'CORPUS_API_KEY';",
      ]);
      expect(source.startsWith('/**\n')).toBe(true);
      expect(source.endsWith('}\n')).toBe(true);
    });

    it('renders the constructor', () => {
      expectLines(generate().source, [
        'export class CorpusClient extends HttpClient {',
        '  private readonly apiKey: string;',
        '',
        '  constructor(options: CorpusClientOptions = {}) {',
        '    const { apiKey = process.env[API_KEY_ENV_VAR], ...httpOptions } = options;',
        '    if (!apiKey) {',
        '      throw new MissingApiKeyError(API_KEY_ENV_VAR);',
        '    }',
        '',
        "    super({ name: 'CorpusClient', ...httpOptions, baseURL: httpOptions.baseURL ?? BASE_URL });",
        '    this.apiKey = apiKey;',
        '  }',
      ]);
    });

    it('merges path-level parameters and drops header parameters', () => {
      expectLines(generate().source, [
        '  /**',
        '   * GET /corpora/{corpusId}',
        '   *',
        '   * Get corpus details',
        '   *',
        '   * @param corpusId - (path) Corpus identifier',
        '   * @param usesubcorp - (query) Subcorpus to use',
        '   */',
        '  async getCorpus<T = unknown>(corpusId: string, usesubcorp?: string): Promise<T> {',
        '    if (corpusId === undefined || corpusId === null) {',
        "      throw new RequiredParameterError('corpusId', 'path');",
        '    }',
        '',
        '    const $url = `/corpora/${encodeURIComponent(String(corpusId))}`;',
        '    const $query = {',
        "      'usesubcorp': usesubcorp,",
        '    };',
        '',
        '    return this.executeRequest<T>(RequestType.GET, $url, { query: $query });',
        '  }',
      ]);
    });

    it('orders required arguments before optional ones and renames unsafe names', () => {
      expectLines(generate().source, [
        '  /**',
        '   * POST /corpora/{corpusId}/search',
        '   *',
        '   * @param corpusId - (path) Corpus identifier',
        '   * @param query - (body) CQL query',
        '   * @param class_param - (query "class")',
        '   * @param concordance_query_char - (query "concordance_query[char]")',
        '   * @param limit - (body)',
        '   */',
        "  async searchCorpus<T = unknown>(corpusId: string, query: string, class_param: 'noun' | 'verb', concordance_query_char?: string, limit?: number): Promise<T> {",
        '    if (corpusId === undefined || corpusId === null) {',
        "      throw new RequiredParameterError('corpusId', 'path');",
        '    }',
        '    if (query === undefined || query === null) {',
        "      throw new RequiredParameterError('query', 'body');",
        '    }',
        '    if (class_param === undefined || class_param === null) {',
        "      throw new RequiredParameterError('class_param', 'query');",
        '    }',
        '',
        '    const $url = `/corpora/${encodeURIComponent(String(corpusId))}/search`;',
        '    const $query = {',
        "      'concordance_query[char]': concordance_query_char,",
        "      'class': class_param,",
        '    };',
        '    const $body = {',
        "      'query': query,",
        "      'limit': limit,",
        '    };',
        '',
        '    return this.executeRequest<T>(RequestType.POST, $url, { query: $query, json: $body });',
        '  }',
      ]);
    });

    it('splits multipart bodies into files and form fields', () => {
      expectLines(generate().source, [
        '  /**',
        '   * POST /documents',
        '   *',
        '   * Upload a document',
        '   *',
        '   * @param title - (form) Document title',
        '   * @param pages - (form)',
        '   * @param attachments - (file)',
        '   * @param cover - (file)',
        '   */',
        '  async uploadDocument<T = unknown>(title: string, pages?: number, attachments?: Blob[], cover?: Blob): Promise<T> {',
        '    if (title === undefined || title === null) {',
        "      throw new RequiredParameterError('title', 'form');",
        '    }',
        '',
        "    const $url = '/documents';",
        '    const $files: Record<string, Blob> = {};',
        '    attachments?.forEach(($file, $index) => {',
        '      $files[`attachments[${$index}]`] = $file;',
        '    });',
        '    if (cover !== undefined && cover !== null) {',
        "      $files['cover'] = cover;",
        '    }',
        '    const $form = {',
        "      'title': title,",
        "      'pages': pages,",
        '    };',
        '',
        '    return this.executeRequest<T>(RequestType.POST, $url, { files: $files, form: $form });',
        '  }',
      ]);
    });

    it('reports the operation count and skipped parameters', () => {
      const { operationCount, skippedParameters } = generate();

      expect(operationCount).toBe(3);
      expect(skippedParameters).toEqual([
        {
          operation: 'GET /corpora/{corpusId}',
          name: 'X-Request-Id',
          location: 'header',
          reason: 'header parameters are not supported',
        },
      ]);
    });

    it('produces identical output for identical input', () => {
      expect(generate().source).toBe(generate().source);
    });

    it('keeps method names clear of client members and of each other', () => {
      const { source } = generateClientSource({
        paths: {
          '/things': {
            get: { operationId: 'get' },
            post: { operationId: 'get' },
            delete: {},
          },
        },
      });

      expect(source).toContain('  async get_2<T = unknown>(): Promise<T> {');
      expect(source).toContain('  async get_3<T = unknown>(): Promise<T> {');
      expect(source).toContain('  async deleteThings<T = unknown>(): Promise<T> {');
    });

    it('renames parameters that would shadow globals used in method bodies', () => {
      const { source } = generateClientSource({
        paths: {
          '/items/{String}': {
            get: {
              parameters: [
                { name: 'RequestType', in: 'query', schema: { type: 'string' } },
                { name: 'encodeURIComponent', in: 'query', schema: { type: 'string' } },
              ],
            },
          },
        },
      });

      expectLines(source, [
        '  async getItemsString<T = unknown>(String_2: string | number, RequestType_2?: string, encodeURIComponent_2?: string): Promise<T> {',
        '    if (String_2 === undefined || String_2 === null) {',
        "      throw new RequiredParameterError('String_2', 'path');",
        '    }',
        '',
        '    const $url = `/items/${encodeURIComponent(String(String_2))}`;',
        '    const $query = {',
        "      'RequestType': RequestType_2,",
        "      'encodeURIComponent': encodeURIComponent_2,",
        '    };',
      ]);
    });

    it('falls back to the defaults for a minimal document', () => {
      const { source, operationCount } = generateClientSource({
        paths: { '/health': { get: {} } },
      });

      expect(operationCount).toBe(1);
      expectLines(source, [
        '/**',
        ' * ApiClient: client for an OpenAPI document',
        ' *',
        ' * Generated by openapi-callgen. Changes are overwritten on the next run.',
        ' */',
        '',
        'import {',
        '  HttpClient,',
        '  MissingApiKeyError,',
        '  RequestType,',
        "} from 'openapi-callgen';",
      ]);
      expect(source).toContain("export const BASE_URL = 'http://localhost';");
      expect(source).toContain("export const API_KEY_ENV_VAR = 'API_KEY';");
      expect(source).not.toContain('RequiredParameterError');
    });

    it('uses the configured runtime import and fallback base URL', () => {
      const { source } = generateClientSource(
        { paths: {} },
        { runtimeImport: '../runtime', fallbackBaseUrl: 'https://fallback.example.com/' }
      );

      expect(source).toContain("import type { HttpClientOptions } from '../runtime';");
      expect(source).toContain("export const BASE_URL = 'https://fallback.example.com';");
    });

    it('rejects client names that are not class names', () => {
      expect(() => generateClientSource({ paths: {} }, { clientName: 'class' })).toThrow(
        'Invalid client name "class": must be a valid class name'
      );
      expect(() => generateClientSource({ paths: {} }, { clientName: 'my-client' })).toThrow(
        'Invalid client name "my-client": must be a valid class name'
      );
    });

    describe('unsupported request body content types', () => {
      const notes: SpecDocument = {
        paths: {
          '/notes': {
            post: {
              operationId: 'createNote',
              requestBody: {
                content: {
                  'text/plain': { schema: { type: 'string' } },
                },
              },
            },
          },
        },
      };

      it('warns and documents the fallback by default', () => {
        const { source } = generateClientSource(notes);

        expect(logWarning).toHaveBeenCalledWith(
          'POST /notes: request body content type "text/plain" is not supported; it will be sent as JSON'
        );
        expect(source).toContain(
          '   * @remarks Request body content type "text/plain" is not supported; the body is sent as JSON.'
        );
      });

      it('throws in strict mode', () => {
        expect(() => generateClientSource(notes, { strictContentTypes: true })).toThrow(
          UnsupportedContentTypeError
        );
        expect(() => generateClientSource(notes, { strictContentTypes: true })).toThrow(
          'POST /notes: request body content type "text/plain" is not supported (only JSON and multipart bodies are)'
        );
      });
    });
  });

  describe('generateClient', () => {
    let outputDir: string;

    beforeEach(async () => {
      outputDir = await fs.mkdtemp(join(tmpdir(), 'openapi-callgen-'));
    });

    afterEach(async () => {
      await fs.rm(outputDir, { recursive: true, force: true });
    });

    it('writes the generated client to the output file', async () => {
      const outputFile = join(outputDir, 'nested', 'corpus-client.ts');

      const result = await generateClient({
        openApiSpec: fixturePath,
        outputFile,
        clientName: 'CorpusClient',
        apiKeyEnvVar: 'CORPUS_API_KEY',
      });

      const written = await fs.readFile(outputFile, 'utf-8');
      const { source } = generateClientSource(document, {
        clientName: 'CorpusClient',
        apiKeyEnvVar: 'CORPUS_API_KEY',
      });

      expect(written).toBe(source);
      expect(result.outputFile).toBe(outputFile);
      expect(result.operationCount).toBe(3);
      expect(result.skippedParameters).toHaveLength(1);
    });

    it('logs skipped parameters and a summary', async () => {
      const outputFile = join(outputDir, 'client.ts');

      await generateClient({ openApiSpec: fixturePath, outputFile });

      expect(logWarning).toHaveBeenCalledWith(
        'GET /corpora/{corpusId}: skipped parameter "X-Request-Id" (header parameters are not supported)'
      );
      expect(logInfo).toHaveBeenCalledWith(
        `Generated ApiClient with 3 operation(s) in ${outputFile}`
      );
    });

    it('accepts an already parsed document', async () => {
      const outputFile = join(outputDir, 'client.ts');

      const result = await generateClient({
        openApiSpec: { paths: { '/health': { get: {} } } },
        outputFile,
      });

      expect(result.operationCount).toBe(1);
      expect(await fs.readFile(outputFile, 'utf-8')).toContain(
        '  async getHealth<T = unknown>(): Promise<T> {'
      );
    });

    it('reads YAML and JSON documents whatever the file extension', async () => {
      const bare = join(outputDir, 'openapi');
      const text = join(outputDir, 'openapi.txt');
      const json = join(outputDir, 'openapi.json');
      await fs.writeFile(bare, 'openapi: 3.0.0\npaths:\n  /health:\n    get: {}\n', 'utf-8');
      await fs.writeFile(text, 'openapi: 3.0.0\npaths: {}\n', 'utf-8');
      await fs.writeFile(json, '{ "openapi": "3.0.0", "paths": { "/ping": { "get": {} } } }', 'utf-8');

      expect(await parseOpenApiSpec(bare)).toEqual({
        openapi: '3.0.0',
        paths: { '/health': { get: {} } },
      });
      expect(await parseOpenApiSpec(text)).toEqual({ openapi: '3.0.0', paths: {} });
      expect(await parseOpenApiSpec(json)).toEqual({
        openapi: '3.0.0',
        paths: { '/ping': { get: {} } },
      });
    });

    it('fails with SpecLoadError when the document cannot be loaded', async () => {
      const missing = join(outputDir, 'missing.yaml');
      const badJson = join(outputDir, 'broken.json');
      const listYaml = join(outputDir, 'list.yaml');
      await fs.writeFile(badJson, '{ "openapi": ', 'utf-8');
      await fs.writeFile(listYaml, '- a\n- b\n', 'utf-8');

      await expect(generateClient({ openApiSpec: missing })).rejects.toThrow(
        `Failed to read OpenAPI document ${missing}`
      );
      await expect(generateClient({ openApiSpec: badJson })).rejects.toThrow(
        `Failed to parse OpenAPI document ${badJson}`
      );
      await expect(generateClient({ openApiSpec: listYaml })).rejects.toThrow(
        'Invalid OpenAPI specification: the document root must be a mapping'
      );
      await expect(parseOpenApiSpec(missing)).rejects.toBeInstanceOf(SpecLoadError);
    });
  });
});
