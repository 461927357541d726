/**
 * Code Writer
 *
 * The one place generated source is laid out. Templates describe code as
 * lines and nested blocks; this module turns them into indented text.
 */

export interface CodeBlock {
  /** Opening line, e.g. `if (x) {` */
  open: string;
  body: CodeLine[];
  /** Closing line, e.g. `}` or `});` */
  close: string;
}

/**
 * A single line, or a block whose body is indented one level deeper.
 * An empty string renders as a blank line.
 */
export type CodeLine = string | CodeBlock;

export const INDENT = '  ';

export function block(open: string, body: CodeLine[], close = '}'): CodeBlock {
  return { open, body, close };
}

export function renderLines(lines: readonly CodeLine[], depth = 0): string[] {
  const prefix = INDENT.repeat(depth);
  const output: string[] = [];

  for (const line of lines) {
    if (typeof line === 'string') {
      output.push(line === '' ? '' : `${prefix}${line}`);
    } else {
      output.push(`${prefix}${line.open}`);
      output.push(...renderLines(line.body, depth + 1));
      output.push(`${prefix}${line.close}`);
    }
  }

  return output;
}

/**
 * Joins rendered lines into file content ending with a single newline
 */
export function renderSource(lines: readonly CodeLine[]): string {
  return `${renderLines(lines).join('\n')}\n`;
}

/**
 * Single-quoted TypeScript string literal
 *
 * @example
 * ```typescript
 * toStringLiteral("it's") // 'it\'s'
 * ```
 */
export function toStringLiteral(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
  return `'${escaped}'`;
}

/**
 * Escapes text for use inside a template literal
 */
export function escapeTemplateText(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/`/g, '\\`').replace(/\$\{/g, '\\${');
}

/**
 * Makes text safe inside a `/** ... *\/` comment
 */
export function escapeDocText(value: string): string {
  return value.replace(/\*\//g, '*\\/');
}

/**
 * Renders a JSDoc block from its content lines
 */
export function docComment(lines: readonly string[]): string[] {
  return ['/**', ...lines.map(line => (line ? ` * ${escapeDocText(line)}` : ' *')), ' */'];
}
