/**
 * Naming Utilities
 *
 * Turns names from an OpenAPI document (parameter names, property names,
 * operation ids and paths) into valid TypeScript identifiers.
 */

import reservedWords from './reserved-words.json';

const RESERVED_WORDS: ReadonlySet<string> = new Set(reservedWords);

/**
 * Check if a string is a valid TypeScript identifier
 */
export function isValidIdentifier(str: string): boolean {
  return /^[a-zA-Z_$][a-zA-Z0-9_$]*$/.test(str);
}

export function isReservedWord(str: string): boolean {
  return RESERVED_WORDS.has(str);
}

/**
 * Convert a declared parameter or property name to an identifier
 *
 * @example
 * ```typescript
 * sanitizeParamName('concordance_query[char]') // 'concordance_query_char'
 * sanitizeParamName('x-api-key') // 'x_api_key'
 * sanitizeParamName('2fa') // 'p_2fa'
 * sanitizeParamName('class') // 'class_param'
 * ```
 */
export function sanitizeParamName(name: string): string {
  let identifier = name.replace(/\[/g, '_').replace(/\]/g, '');

  identifier = identifier.replace(/[^0-9a-zA-Z_]/g, '_');

  if (/^[0-9]/.test(identifier)) {
    identifier = `p_${identifier}`;
  }

  if (!identifier) {
    identifier = 'param';
  }

  if (RESERVED_WORDS.has(identifier)) {
    identifier = `${identifier}_param`;
  }

  return identifier;
}

/**
 * Hands out unique identifiers within one scope. The first name that sanitizes
 * to a given base keeps it; later ones get `_2`, `_3`, ... appended.
 *
 * Names passed as `reserved` are never handed out.
 */
export class IdentifierTable {
  private readonly used = new Set<string>();

  constructor(
    reserved: Iterable<string> = [],
    private readonly sanitize: (name: string) => string = sanitizeParamName
  ) {
    for (const name of reserved) {
      this.used.add(name);
    }
  }

  claim(name: string): string {
    const base = this.sanitize(name);
    let candidate = base;
    let index = 2;

    while (this.used.has(candidate)) {
      candidate = `${base}_${index}`;
      index++;
    }

    this.used.add(candidate);
    return candidate;
  }

  has(identifier: string): boolean {
    return this.used.has(identifier);
  }
}

function splitWords(text: string): string[] {
  return text.split(/[^0-9a-zA-Z]+/).filter(word => word.length > 0);
}

function joinCamelCase(words: string[]): string {
  return words
    .map((word, index) =>
      index === 0
        ? word.charAt(0).toLowerCase() + word.slice(1)
        : word.charAt(0).toUpperCase() + word.slice(1)
    )
    .join('');
}

/**
 * Derive a client method name from an operation
 *
 * @example
 * ```typescript
 * toMethodName('get', '/corpora/{corpusId}') // 'getCorporaCorpusId'
 * toMethodName('post', '/items', 'create-item') // 'createItem'
 * toMethodName('get', '/') // 'getRoot'
 * ```
 */
export function toMethodName(method: string, path: string, operationId?: string): string {
  const idWords = operationId ? splitWords(operationId) : [];
  const pathWords = splitWords(path);
  const words =
    idWords.length > 0
      ? idWords
      : [method.toLowerCase(), ...(pathWords.length > 0 ? pathWords : ['root'])];

  const name = joinCamelCase(words);
  return /^[0-9]/.test(name) ? `op${name}` : name;
}
