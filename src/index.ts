export { HttpClient, RequestType } from './http-client.js';
export type {
  HttpClientRequestConfig,
  HttpClientOptions,
  HttpClientResponse,
  HttpClientRetryConfig,
  ErrorMessageExtractor,
} from './http-client.js';

export {
  HttpClientError,
  NetworkError,
  TimeoutError,
  HttpError,
  SerializationError,
  RequiredParameterError,
  MissingApiKeyError,
  HttpErrorCategory,
  classifyHttpError,
  isTimeoutError,
  isSerializationError,
  classifyNetworkErrorType,
  buildErrorMetadata,
  buildNetworkErrorMetadata,
  buildHttpErrorResponse,
  classifyErrorForRetry,
} from './errors.js';
export type { ErrorClassification, ErrorMetadata, NetworkErrorMetadata } from './errors.js';

export { isXiorError } from 'xior';
export type { XiorError, XiorRequestConfig, XiorResponse } from 'xior';
