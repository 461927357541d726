import {
  block,
  docComment,
  escapeDocText,
  escapeTemplateText,
  renderLines,
  renderSource,
  toStringLiteral,
} from '../../src/codegen/templates/code-writer';

const evaluateLiteral = (literal: string): unknown => new Function(`return ${literal};`)();

describe('code-writer', () => {
  describe('toStringLiteral', () => {
    test('escapes quotes, backslashes and newlines', () => {
      expect(toStringLiteral("it's\n")).toBe("'it\\'s\\n'");
      expect(toStringLiteral('a\\b\r')).toBe("'a\\\\b\\r'");
    });

    test('escapes line and paragraph separators', () => {
      const literal = toStringLiteral('a\u2028b\u2029c');

      expect(literal).toBe("'a\\u2028b\\u2029c'");
      expect(evaluateLiteral(literal)).toBe('a\u2028b\u2029c');
    });

    test('produces literals that evaluate back to the input', () => {
      const value = "C:\\path\\'quoted'\r\nnext";

      expect(evaluateLiteral(toStringLiteral(value))).toBe(value);
    });
  });

  test('escapeTemplateText escapes backticks and substitutions', () => {
    expect(escapeTemplateText('a`${b}\\')).toBe('a\\`\\${b}\\\\');
  });

  test('escapeDocText closes no comment early', () => {
    expect(escapeDocText('ends */ here')).toBe('ends *\\/ here');
  });

  test('docComment renders blank lines without trailing spaces', () => {
    expect(docComment(['Title', '', 'a */ b'])).toEqual([
      '/**',
      ' * Title',
      ' *',
      ' * a *\\/ b',
      ' */',
    ]);
  });

  test('renderLines indents nested blocks', () => {
    const lines = renderLines([
      block('if (a) {', ['one();', '', block('items.forEach(item => {', ['two(item);'], '});')]),
      'three();',
    ]);

    expect(lines).toEqual([
      'if (a) {',
      '  one();',
      '',
      '  items.forEach(item => {',
      '    two(item);',
      '  });',
      '}',
      'three();',
    ]);
  });

  test('renderSource ends with a single newline', () => {
    expect(renderSource(['a', block('b {', ['c'])])).toBe('a\nb {\n  c\n}\n');
  });
});
