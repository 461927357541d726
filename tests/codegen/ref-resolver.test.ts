import { resolvePointer, resolveRef } from '../../src/codegen/parsers/ref-resolver';
import {
  CircularReferenceError,
  ReferenceResolutionError,
} from '../../src/codegen/errors';

describe('ref-resolver', () => {
  const document = {
    components: {
      schemas: {
        Item: { type: 'object', properties: { id: { type: 'string' } } },
        Alias: { $ref: '#/components/schemas/Item' },
        'a/b': { type: 'string' },
        'c~d': { type: 'integer' },
        'with space': { type: 'boolean' },
        LoopA: { $ref: '#/components/schemas/LoopB' },
        LoopB: { $ref: '#/components/schemas/LoopA' },
        Self: { $ref: '#/components/schemas/Self' },
      },
    },
    servers: [{ url: 'https://one.example.com' }, { url: 'https://two.example.com' }],
  };

  describe('resolveRef', () => {
    test('returns nodes without $ref unchanged', () => {
      const node = { type: 'string' };
      expect(resolveRef(node, document)).toBe(node);
      expect(resolveRef(undefined, document)).toBeUndefined();
    });

    test('resolves a local reference', () => {
      expect(resolveRef({ $ref: '#/components/schemas/Item' }, document)).toBe(
        document.components.schemas.Item
      );
    });

    test('follows a reference to a reference', () => {
      expect(resolveRef({ $ref: '#/components/schemas/Alias' }, document)).toBe(
        document.components.schemas.Item
      );
    });

    test('fails fast on a reference cycle', () => {
      expect(() => resolveRef({ $ref: '#/components/schemas/LoopA' }, document)).toThrow(
        CircularReferenceError
      );
      expect(() => resolveRef({ $ref: '#/components/schemas/LoopA' }, document)).toThrow(
        'Circular $ref chain: #/components/schemas/LoopA -> #/components/schemas/LoopB -> #/components/schemas/LoopA'
      );
    });

    test('fails fast on a self reference', () => {
      expect(() => resolveRef({ $ref: '#/components/schemas/Self' }, document)).toThrow(
        CircularReferenceError
      );
    });
  });

  describe('resolvePointer', () => {
    test('decodes escaped pointer segments', () => {
      expect(resolvePointer('#/components/schemas/a~1b', document)).toEqual({ type: 'string' });
      expect(resolvePointer('#/components/schemas/c~0d', document)).toEqual({ type: 'integer' });
      expect(resolvePointer('#/components/schemas/with%20space', document)).toEqual({
        type: 'boolean',
      });
    });

    test('indexes into arrays', () => {
      expect(resolvePointer('#/servers/1/url', document)).toBe('https://two.example.com');
    });

    test('rejects references outside the document', () => {
      expect(() => resolvePointer('other.yaml#/components/schemas/Item', document)).toThrow(
        ReferenceResolutionError
      );
      expect(() => resolvePointer('https://example.com/schema.json', document)).toThrow(
        'Cannot resolve $ref "https://example.com/schema.json": only local "#/..." references are supported'
      );
    });

    test('names the missing segment', () => {
      expect(() => resolvePointer('#/components/schemas/Missing', document)).toThrow(
        'Cannot resolve $ref "#/components/schemas/Missing": segment "Missing" not found'
      );
      expect(() => resolvePointer('#/servers/5', document)).toThrow(ReferenceResolutionError);
    });

    test('does not resolve inherited properties', () => {
      expect(() => resolvePointer('#/components/toString', document)).toThrow(
        ReferenceResolutionError
      );
    });
  });
});
