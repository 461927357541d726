/**
 * Type guards and accessors for raw document nodes
 */

export type SpecRecord = Readonly<Record<string, unknown>>;

export function isRecord(node: unknown): node is SpecRecord {
  return typeof node === 'object' && node !== null && !Array.isArray(node);
}

/**
 * A node of the form `{ $ref: string }` (sibling keys are ignored)
 */
export function isReference(node: unknown): node is { readonly $ref: string } {
  return isRecord(node) && typeof node.$ref === 'string';
}

export function getRecord(node: SpecRecord, key: string): SpecRecord | undefined {
  const value = node[key];
  return isRecord(value) ? value : undefined;
}

export function getArray(node: SpecRecord, key: string): readonly unknown[] {
  const value = node[key];
  return Array.isArray(value) ? value : [];
}

export function getString(node: SpecRecord, key: string): string | undefined {
  const value = node[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Returns the description of a node collapsed onto one line
 */
export function getDescription(node: SpecRecord): string {
  return (getString(node, 'description') ?? '').replace(/\s+/g, ' ').trim();
}
