import {
  extractRequestBody,
  getBodyEncoding,
} from '../../src/codegen/parsers/request-body-extractor';
import { IdentifierTable } from '../../src/codegen/utils/naming';

describe('request-body-extractor', () => {
  const document = {
    components: {
      schemas: {
        Upload: {
          type: 'object',
          required: ['title', 'attachments'],
          properties: {
            title: { type: 'string', description: 'Document  title\n(plain text)' },
            attachments: { type: 'array', items: { $ref: '#/components/schemas/Binary' } },
            cover: { type: 'string', format: 'binary' },
            tags: { type: 'array', items: { type: 'string' } },
          },
        },
        Binary: { type: 'string', format: 'binary' },
      },
      requestBodies: {
        UploadBody: {
          content: { 'multipart/form-data': { schema: { $ref: '#/components/schemas/Upload' } } },
        },
      },
    },
  };

  const extract = (operation: Record<string, unknown>, table = new IdentifierTable()) =>
    extractRequestBody(operation, document, table);

  test('returns undefined without a request body', () => {
    expect(extract({})).toBeUndefined();
    expect(extract({ requestBody: { content: {} } })).toBeUndefined();
  });

  test('flattens a multipart object schema', () => {
    const body = extract({ requestBody: { $ref: '#/components/requestBodies/UploadBody' } });

    expect(body).toEqual({
      contentType: 'multipart/form-data',
      encoding: 'multipart',
      required: false,
      fields: [
        {
          name: 'title',
          identifier: 'title',
          description: 'Document title (plain text)',
          required: true,
          isFile: false,
          isFileArray: false,
          type: 'string',
        },
        {
          name: 'attachments',
          identifier: 'attachments',
          description: '',
          required: true,
          isFile: true,
          isFileArray: true,
          type: 'Blob[]',
        },
        {
          name: 'cover',
          identifier: 'cover',
          description: '',
          required: false,
          isFile: true,
          isFileArray: false,
          type: 'Blob',
        },
        {
          name: 'tags',
          identifier: 'tags',
          description: '',
          required: false,
          isFile: false,
          isFileArray: false,
          type: 'string[]',
        },
      ],
    });
  });

  test('classifies an array of binary items as a file array even with its own format unset', () => {
    const body = extract({
      requestBody: {
        content: {
          'multipart/form-data': {
            schema: {
              type: 'object',
              properties: {
                scans: { type: 'array', items: { type: 'string', format: 'binary' } },
              },
            },
          },
        },
      },
    });

    expect(body?.fields[0]).toMatchObject({ isFile: true, isFileArray: true });
  });

  test('leaves file fields out of JSON bodies', () => {
    const body = extract({
      requestBody: {
        required: true,
        content: {
          'application/json': {
            schema: {
              type: 'object',
              properties: {
                name: { type: 'string' },
                avatar: { type: 'string', format: 'binary' },
                photos: { type: 'array', items: { type: 'string', format: 'binary' } },
                count: { type: 'integer' },
              },
            },
          },
        },
      },
    });

    expect(body?.encoding).toBe('json');
    expect(body?.required).toBe(true);
    expect(body?.fields.map(field => [field.name, field.isFile])).toEqual([
      ['name', false],
      ['count', false],
    ]);
  });

  test('uses only the first declared content type', () => {
    const body = extract({
      requestBody: {
        content: {
          'application/x-www-form-urlencoded': {
            schema: { type: 'object', properties: { a: { type: 'string' } } },
          },
          'application/json': {
            schema: { type: 'object', properties: { b: { type: 'string' } } },
          },
        },
      },
    });

    expect(body?.contentType).toBe('application/x-www-form-urlencoded');
    expect(body?.encoding).toBe('unsupported');
    expect(body?.fields.map(field => field.name)).toEqual(['a']);
  });

  test('yields no fields for a body schema that is not an object', () => {
    const body = extract({
      requestBody: {
        content: { 'application/json': { schema: { type: 'array', items: { type: 'string' } } } },
      },
    });

    expect(body).toEqual({
      contentType: 'application/json',
      encoding: 'json',
      required: false,
      fields: [],
    });
  });

  test('treats a schema with properties and no type as an object', () => {
    const body = extract({
      requestBody: {
        content: { 'application/json': { schema: { properties: { note: { type: 'string' } } } } },
      },
    });

    expect(body?.fields.map(field => field.name)).toEqual(['note']);
  });

  test('claims identifiers from the operation table', () => {
    const table = new IdentifierTable();
    table.claim('id');

    const body = extract(
      {
        requestBody: {
          content: {
            'application/json': {
              schema: { type: 'object', properties: { id: { type: 'string' }, 'new': {} } },
            },
          },
        },
      },
      table
    );

    expect(body?.fields.map(field => [field.identifier, field.type])).toEqual([
      ['id_2', 'string'],
      ['new_param', 'unknown'],
    ]);
  });

  describe('getBodyEncoding', () => {
    test.each([
      ['application/json', 'json'],
      ['application/json; charset=utf-8', 'json'],
      ['application/vnd.api+json', 'json'],
      ['multipart/form-data', 'multipart'],
      ['multipart/mixed', 'multipart'],
      ['application/x-www-form-urlencoded', 'unsupported'],
      ['text/plain', 'unsupported'],
    ])('%s is %s', (contentType, encoding) => {
      expect(getBodyEncoding(contentType)).toBe(encoding);
    });
  });
});
