import type { XiorRequestConfig, XiorResponse } from 'xior';

/**
 * Enum for HTTP error categories
 */
export enum HttpErrorCategory {
  /** Authentication errors (401, 403) */
  AUTHENTICATION = 'AUTHENTICATION',
  /** Not found errors (404) */
  NOT_FOUND = 'NOT_FOUND',
  /** Rate limit errors (429) */
  RATE_LIMIT = 'RATE_LIMIT',
  /** Validation errors (400, 422) */
  VALIDATION = 'VALIDATION',
  /** Other client errors (4xx) */
  CLIENT_ERROR = 'CLIENT_ERROR',
  /** Server errors (5xx) */
  SERVER_ERROR = 'SERVER_ERROR',
}

/**
 * Base metadata structure for all transport errors
 */
export interface ErrorMetadata {
  /** Information about the request that triggered the error */
  request: {
    /** HTTP method (GET, POST, etc.) */
    method: string;
    /** Request URL path */
    url: string;
    /** Base URL of the API */
    baseURL: string;
    /** ISO timestamp when the error was recorded */
    timestamp: string;
  };
  /** Name of the HttpClient instance that made the request */
  clientName: string;
}

/**
 * Additional metadata for network and timeout errors
 */
export interface NetworkErrorMetadata extends ErrorMetadata {
  error: {
    /** Error code from the network layer (e.g., ECONNREFUSED, ETIMEDOUT) */
    code?: string;
    message: string;
    type: string;
  };
}

/**
 * Response object for HTTP errors
 */
export interface HttpErrorResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  data: unknown;
}

/**
 * Reads a property from an error-like value without assuming its shape
 */
export function readErrorProperty(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, key);
  return value;
}

function readErrorMessage(error: unknown): string {
  const message = readErrorProperty(error, 'message');
  return typeof message === 'string' ? message : '';
}

function readErrorCode(error: unknown): string | undefined {
  const code = readErrorProperty(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * Base class for all HTTP client errors
 */
export abstract class HttpClientError extends Error {
  /** Error code for programmatic handling */
  code: string;
  /** Whether this error type is retriable */
  isRetriable: boolean;
  /** Diagnostic metadata about the request and error */
  metadata: ErrorMetadata;

  constructor(
    message: string,
    code: string,
    metadata: ErrorMetadata,
    isRetriable: boolean,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.metadata = metadata;
    this.isRetriable = isRetriable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Network error - no response was received (DNS failure, refused connection, ...)
 */
export class NetworkError extends HttpClientError {
  constructor(
    message: string,
    metadata: NetworkErrorMetadata,
    cause?: unknown,
    isRetriable: boolean = true
  ) {
    super(message, 'NETWORK_ERROR', metadata, isRetriable, cause);
  }
}

/**
 * Timeout error - the request exceeded its timeout
 */
export class TimeoutError extends HttpClientError {
  constructor(
    message: string,
    metadata: NetworkErrorMetadata,
    cause?: unknown,
    isRetriable: boolean = true
  ) {
    super(message, 'TIMEOUT_ERROR', metadata, isRetriable, cause);
  }
}

/**
 * HTTP error - the server responded with a status outside the 2xx range
 */
export class HttpError extends HttpClientError {
  status: number;
  category: HttpErrorCategory;
  statusText: string;
  response: HttpErrorResponse;

  /**
   * @param isRetriable - determined from the status and category when omitted
   */
  constructor(
    message: string,
    status: number,
    category: HttpErrorCategory,
    statusText: string,
    response: HttpErrorResponse,
    metadata: ErrorMetadata,
    cause?: unknown,
    isRetriable?: boolean
  ) {
    const retriable =
      isRetriable !== undefined ? isRetriable : determineHttpErrorRetriability(status, category);

    super(message, 'HTTP_ERROR', metadata, retriable, cause);
    this.status = status;
    this.category = category;
    this.statusText = statusText;
    this.response = response;
  }
}

/**
 * Serialization error - request or response data could not be (de)serialized
 */
export class SerializationError extends HttpClientError {
  constructor(
    message: string,
    metadata: ErrorMetadata,
    cause?: unknown,
    isRetriable: boolean = false
  ) {
    super(message, 'SERIALIZATION_ERROR', metadata, isRetriable, cause);
  }
}

/**
 * Thrown by generated clients when a parameter the API marks as required is
 * missing at call time. Raised before any request is sent.
 */
export class RequiredParameterError extends Error {
  code = 'REQUIRED_PARAMETER';
  /** Name of the missing argument */
  parameter: string;
  /** Where the API expects it: path, query, body, form or file */
  location: string;

  constructor(parameter: string, location: string) {
    super(`Missing required ${location} parameter "${parameter}"`);
    this.name = 'RequiredParameterError';
    this.parameter = parameter;
    this.location = location;
  }
}

/**
 * Thrown by generated clients constructed without an API key
 */
export class MissingApiKeyError extends Error {
  code = 'MISSING_API_KEY';
  envVar: string;

  constructor(envVar: string) {
    super(`API key must be provided either directly or via the ${envVar} environment variable`);
    this.name = 'MissingApiKeyError';
    this.envVar = envVar;
  }
}

/**
 * Classifies an HTTP status code into a category
 */
export function classifyHttpError(status: number): HttpErrorCategory {
  if (status === 401 || status === 403) {
    return HttpErrorCategory.AUTHENTICATION;
  }

  if (status === 404) {
    return HttpErrorCategory.NOT_FOUND;
  }

  if (status === 429) {
    return HttpErrorCategory.RATE_LIMIT;
  }

  if (status === 400 || status === 422) {
    return HttpErrorCategory.VALIDATION;
  }

  if (status >= 500 && status < 600) {
    return HttpErrorCategory.SERVER_ERROR;
  }

  // remaining 4xx and unexpected codes
  return HttpErrorCategory.CLIENT_ERROR;
}

/**
 * Server errors, rate limits and 408 are retriable by default
 */
export function determineHttpErrorRetriability(
  status: number,
  category: HttpErrorCategory
): boolean {
  if (category === HttpErrorCategory.SERVER_ERROR) {
    return true;
  }

  if (category === HttpErrorCategory.RATE_LIMIT) {
    return true;
  }

  return status === 408;
}

/**
 * Checks if an error is a timeout based on its code, message or xior flags
 */
export function isTimeoutError(error: unknown): boolean {
  const code = readErrorCode(error);
  if (code === 'ETIMEDOUT' || code === 'ESOCKETTIMEDOUT') {
    return true;
  }

  const message = readErrorMessage(error).toLowerCase();
  if (
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('time out')
  ) {
    return true;
  }

  return readErrorProperty(error, 'isTimeout') === true;
}

/**
 * Checks if an error comes from encoding or decoding a payload
 */
export function isSerializationError(error: unknown): boolean {
  const message = readErrorMessage(error).toLowerCase();

  if (
    message.includes('json') ||
    message.includes('serialize') ||
    message.includes('unexpected token')
  ) {
    return true;
  }

  return readErrorProperty(error, 'name') === 'SyntaxError';
}

/**
 * Classifies the type of network error for metadata
 */
export function classifyNetworkErrorType(error: unknown): string {
  switch (readErrorCode(error)) {
    case 'ECONNREFUSED':
      return 'connection_refused';
    case 'ENOTFOUND':
      return 'dns_lookup_failed';
    case 'ECONNRESET':
      return 'connection_reset';
    case 'ECONNABORTED':
      return 'connection_aborted';
    case 'ENETUNREACH':
      return 'network_unreachable';
    case 'EHOSTUNREACH':
      return 'host_unreachable';
  }

  return isTimeoutError(error) ? 'request_timeout' : 'network_error';
}

export function buildErrorMetadata(config: XiorRequestConfig, clientName: string): ErrorMetadata {
  return {
    request: {
      method: (config.method || 'GET').toUpperCase(),
      url: config.url || '',
      baseURL: config.baseURL || '',
      timestamp: new Date().toISOString(),
    },
    clientName,
  };
}

export function buildNetworkErrorMetadata(
  config: XiorRequestConfig,
  clientName: string,
  error: unknown
): NetworkErrorMetadata {
  return {
    ...buildErrorMetadata(config, clientName),
    error: {
      code: readErrorCode(error),
      message: readErrorMessage(error) || 'Unknown error',
      type: classifyNetworkErrorType(error),
    },
  };
}

/**
 * Builds an HttpErrorResponse from a xior response, flattening its headers
 */
export function buildHttpErrorResponse(response: XiorResponse): HttpErrorResponse {
  const headers: Record<string, string> = {};
  response.headers?.forEach((value, key) => {
    headers[key] = value;
  });

  return {
    status: response.status,
    statusText: response.statusText || '',
    headers,
    data: response.data,
  };
}

/**
 * Error classification result for retry evaluation
 */
export interface ErrorClassification {
  type: 'network' | 'timeout' | 'http' | 'serialization' | 'unknown';
  isRetriable: boolean;
  status?: number;
  category?: HttpErrorCategory;
}

/**
 * Classifies an error for retry evaluation without building an error instance.
 * Used as the default `enableRetry` of the HttpClient retry plugin.
 */
export function classifyErrorForRetry(error: unknown): ErrorClassification {
  if (isTimeoutError(error)) {
    return { type: 'timeout', isRetriable: true };
  }

  if (isSerializationError(error)) {
    return { type: 'serialization', isRetriable: false };
  }

  const status = readErrorProperty(readErrorProperty(error, 'response'), 'status');
  if (typeof status === 'number') {
    const category = classifyHttpError(status);
    return {
      type: 'http',
      isRetriable: determineHttpErrorRetriability(status, category),
      status,
      category,
    };
  }

  if (readErrorProperty(error, 'request') !== undefined) {
    return { type: 'network', isRetriable: true };
  }

  return { type: 'unknown', isRetriable: false };
}
