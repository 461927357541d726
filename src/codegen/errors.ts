/**
 * Errors raised while reading an OpenAPI document or generating code from it.
 * All of them abort generation.
 */
export abstract class SpecError extends Error {
  code: string;

  constructor(message: string, code: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * The document could not be read or parsed, or its root is not a mapping
 */
export class SpecLoadError extends SpecError {
  /** File path, when the document was read from disk */
  source?: string;

  constructor(message: string, source?: string, cause?: unknown) {
    super(message, 'SPEC_LOAD_ERROR', cause);
    this.source = source;
  }
}

/**
 * A `$ref` points outside the document or at a node that does not exist
 */
export class ReferenceResolutionError extends SpecError {
  ref: string;

  constructor(ref: string, reason: string) {
    super(`Cannot resolve $ref "${ref}": ${reason}`, 'REFERENCE_RESOLUTION_ERROR');
    this.ref = ref;
  }
}

/**
 * A chain of `$ref`s leads back to a pointer already on the chain
 */
export class CircularReferenceError extends SpecError {
  chain: string[];

  constructor(chain: string[]) {
    super(`Circular $ref chain: ${chain.join(' -> ')}`, 'CIRCULAR_REFERENCE_ERROR');
    this.chain = chain;
  }
}

/**
 * Raised instead of a warning when `strictContentTypes` is enabled and a
 * request body uses an encoding other than JSON or multipart
 */
export class UnsupportedContentTypeError extends SpecError {
  contentType: string;
  operation: string;

  constructor(contentType: string, operation: string) {
    super(
      `${operation}: request body content type "${contentType}" is not supported (only JSON and multipart bodies are)`,
      'UNSUPPORTED_CONTENT_TYPE'
    );
    this.contentType = contentType;
    this.operation = operation;
  }
}
