import xior, { XiorError } from 'xior';
import type { XiorInstance, XiorRequestConfig, XiorResponse } from 'xior';
import errorRetryPlugin from 'xior/plugins/error-retry';
import { logData } from './logger.js';
import {
  HttpClientError,
  NetworkError,
  TimeoutError,
  HttpError,
  SerializationError,
  classifyHttpError,
  isTimeoutError,
  isSerializationError,
  buildErrorMetadata,
  buildNetworkErrorMetadata,
  buildHttpErrorResponse,
  classifyErrorForRetry,
  readErrorProperty,
} from './errors.js';

export enum RequestType {
  GET = 'GET',
  POST = 'POST',
  PUT = 'PUT',
  PATCH = 'PATCH',
  DELETE = 'DELETE',
  HEAD = 'HEAD',
  OPTIONS = 'OPTIONS',
}

type BackoffOptions = 'exponential' | 'linear' | 'none';

/**
 * Type for error message extraction from HTTP error responses
 * - String: dot notation path like "data.error.message"
 * - Function: custom extraction logic (errorResponse) => string | undefined
 */
export type ErrorMessageExtractor = string | ((errorResponse: XiorResponse) => string | undefined);

export interface HttpClientRetryConfig {
  /**
   * Number of times to retry failed requests. Retries are disabled at 0.
   */
  retries?: number;
  /**
   * The base delay factor in milliseconds
   */
  delayFactor?: number;
  /**
   * Backoff strategy: 'exponential', 'linear', or 'none'
   */
  backoff?: BackoffOptions;
  /**
   * Decides whether a failed request is retried. Defaults to
   * `classifyErrorForRetry(error).isRetriable`.
   */
  enableRetry?: (error: unknown) => boolean;
}

export interface HttpClientRequestConfig extends XiorRequestConfig {
  /**
   * Files to upload. When set, the request is sent as multipart/form-data:
   * every scalar entry of `data` becomes a text field, followed by the files.
   */
  files?: Record<string, Blob>;
  /**
   * Per-request error message path override
   */
  errorMessagePath?: ErrorMessageExtractor;
}

export interface HttpClientResponse<T> {
  request: XiorResponse<T>;
  data: T;
}

export interface HttpClientOptions {
  /**
   * Configuration for the underlying xior instance
   */
  xiorConfig?: Omit<XiorRequestConfig, 'baseURL'>;
  /**
   * Base URL for the API
   */
  baseURL: string;
  /**
   * Whether to log request and response details
   */
  debug?: boolean;
  /**
   * Debug level. 'normal' will log request data, 'verbose' the full request config
   */
  debugLevel?: 'normal' | 'verbose';
  /**
   * Name of the client. Used for logging and error metadata
   */
  name?: string;
  /**
   * Retry configuration. Retries are off unless `retries` is above 0.
   */
  retryConfig?: HttpClientRetryConfig;
  /**
   * Path or function to extract error message from response.
   * @default "data.message"
   */
  errorMessagePath?: ErrorMessageExtractor;
}

export class HttpClient {
  client: XiorInstance;
  baseURL: string;
  debug: boolean;
  debugLevel: 'normal' | 'verbose';
  name: string;
  retryConfig: Required<HttpClientRetryConfig>;
  errorMessagePath: ErrorMessageExtractor;

  constructor(config: HttpClientOptions) {
    this.baseURL = config.baseURL;
    this.debug = config.debug ?? false;
    this.debugLevel = config.debugLevel ?? 'normal';
    this.name = config.name || 'HttpClient';
    this.errorMessagePath = config.errorMessagePath || 'data.message';
    this.retryConfig = {
      retries: 0,
      delayFactor: 500,
      backoff: 'exponential',
      enableRetry: error => classifyErrorForRetry(error).isRetriable,
      ...config.retryConfig,
    };

    const client = xior.create({
      ...config.xiorConfig,
      baseURL: config.baseURL,
    });

    if (this.retryConfig.retries > 0) {
      client.plugins.use(
        errorRetryPlugin({
          retryTimes: this.retryConfig.retries,
          retryInterval: (count: number) => this.getRetryDelay(count),
          enableRetry: (_requestConfig: XiorRequestConfig, error: unknown) =>
            this.retryConfig.enableRetry(error),
          onRetry: (requestConfig: XiorRequestConfig, error: unknown, count: number) => {
            if (this.debug) {
              logData(`[${this.name}] Retry #${count} for ${requestConfig.url}`, {
                error: readErrorProperty(error, 'message'),
              });
            }
          },
        })
      );
    }

    this.client = client;
  }

  /**
   * Delay before the given retry attempt (1-based), following the configured backoff
   */
  getRetryDelay(retryCount: number): number {
    const { backoff, delayFactor } = this.retryConfig;

    if (backoff === 'exponential') {
      return delayFactor * Math.pow(2, retryCount - 1);
    }

    if (backoff === 'linear') {
      return delayFactor * retryCount;
    }

    return delayFactor;
  }

  /**
   * Extracts the error message from a failed response using a dot path or function
   */
  private extractErrorMessage(
    errorResponse: XiorResponse,
    extractor: ErrorMessageExtractor
  ): string | undefined {
    if (typeof extractor === 'function') {
      return extractor(errorResponse);
    }

    let current: unknown = errorResponse;
    for (const part of extractor.split('.')) {
      current = readErrorProperty(current, part);
      if (current === undefined || current === null) return undefined;
    }

    return typeof current === 'string' ? current : undefined;
  }

  /**
   * Builds the multipart payload: scalar fields of `fields` as text, then files
   */
  private buildMultipartBody(fields: unknown, files: Record<string, Blob>): FormData {
    const form = new FormData();

    if (typeof fields === 'object' && fields !== null) {
      for (const [key, value] of Object.entries(fields)) {
        if (value === undefined || value === null) continue;
        form.append(key, String(value));
      }
    }

    for (const [key, file] of Object.entries(files)) {
      form.append(key, file);
    }

    return form;
  }

  /**
   * Performs an HTTP request
   * @param requestType - The HTTP method to use
   * @param url - URL relative to the base URL
   * @param data - Request body; with `config.files` set, the text fields of a multipart body
   * @param config - xior request configuration plus `files` and `errorMessagePath`
   * @returns The xior response and its data
   * @throws {HttpClientError} translated from any transport or status failure
   */
  async request<T>(
    requestType: RequestType,
    url: string,
    data?: unknown,
    config: HttpClientRequestConfig = {}
  ): Promise<HttpClientResponse<T>> {
    const { files, errorMessagePath, ...xiorConfig } = config;
    const body = files === undefined ? data : this.buildMultipartBody(data, files);

    await this.beforeRequest(requestType, url, body, xiorConfig);

    let response: XiorResponse<T>;
    try {
      response = await this.send<T>(requestType, url, body, xiorConfig);
    } catch (err) {
      return this.errorHandler(err, requestType, url, errorMessagePath);
    }

    return { request: response, data: response.data };
  }

  private send<T>(
    requestType: RequestType,
    url: string,
    body: unknown,
    config: XiorRequestConfig
  ): Promise<XiorResponse<T>> {
    switch (requestType) {
      case RequestType.GET:
        return this.client.get<T>(url, config);
      case RequestType.POST:
        return this.client.post<T>(url, body, config);
      case RequestType.PUT:
        return this.client.put<T>(url, body, config);
      case RequestType.PATCH:
        return this.client.patch<T>(url, body, config);
      case RequestType.DELETE:
        return this.client.delete<T>(url, { ...config, data: body });
      case RequestType.HEAD:
        return this.client.head<T>(url, config);
      default:
        return this.client.options<T>(url, config);
    }
  }

  async get<T = unknown>(
    url: string,
    config: HttpClientRequestConfig = {}
  ): Promise<HttpClientResponse<T>> {
    return this.request<T>(RequestType.GET, url, undefined, config);
  }

  async post<T = unknown>(
    url: string,
    data: unknown,
    config: HttpClientRequestConfig = {}
  ): Promise<HttpClientResponse<T>> {
    return this.request<T>(RequestType.POST, url, data, config);
  }

  async put<T = unknown>(
    url: string,
    data: unknown,
    config: HttpClientRequestConfig = {}
  ): Promise<HttpClientResponse<T>> {
    return this.request<T>(RequestType.PUT, url, data, config);
  }

  async patch<T = unknown>(
    url: string,
    data: unknown,
    config: HttpClientRequestConfig = {}
  ): Promise<HttpClientResponse<T>> {
    return this.request<T>(RequestType.PATCH, url, data, config);
  }

  async delete<T = unknown>(
    url: string,
    config: HttpClientRequestConfig = {}
  ): Promise<HttpClientResponse<T>> {
    return this.request<T>(RequestType.DELETE, url, undefined, config);
  }

  async head<T = unknown>(
    url: string,
    config: HttpClientRequestConfig = {}
  ): Promise<HttpClientResponse<T>> {
    return this.request<T>(RequestType.HEAD, url, undefined, config);
  }

  async options<T = unknown>(
    url: string,
    config: HttpClientRequestConfig = {}
  ): Promise<HttpClientResponse<T>> {
    return this.request<T>(RequestType.OPTIONS, url, undefined, config);
  }

  /**
   * Override this method in your extending class to modify the request config
   * or perform actions before the request is sent. The default implementation
   * logs the request when `debug` is enabled.
   */
  protected async beforeRequest(
    requestType: RequestType,
    url: string,
    data: unknown,
    config: XiorRequestConfig
  ): Promise<void> {
    if (!this.debug) return;

    if (this.debugLevel === 'verbose') {
      logData(`[${this.name}] ${requestType} ${url}`, { data, config });
    } else {
      logData(`[${this.name}] ${requestType} ${url}`, { data });
    }
  }

  /**
   * Translates a xior failure into the HttpClientError taxonomy
   * @returns HttpError, NetworkError, TimeoutError or SerializationError
   */
  protected processError(
    error: unknown,
    reqType: RequestType,
    url: string,
    errorMessagePath: ErrorMessageExtractor = this.errorMessagePath
  ): HttpClientError {
    const requestConfig: XiorRequestConfig = {
      method: reqType,
      url,
      baseURL: this.baseURL,
    };
    const response = error instanceof XiorError ? error.response : undefined;

    if (response) {
      if (this.debug) {
        logData(
          `[${this.name}] ${reqType} ${url} : error.response`,
          this.debugLevel === 'verbose' ? response : response.data
        );
      }

      const statusText = response.statusText || '';
      const message = this.extractErrorMessage(response, errorMessagePath) || statusText;

      return new HttpError(
        message,
        response.status,
        classifyHttpError(response.status),
        statusText,
        buildHttpErrorResponse(response),
        buildErrorMetadata(requestConfig, this.name),
        error
      );
    }

    const rawMessage = readErrorProperty(error, 'message');
    const detail = typeof rawMessage === 'string' && rawMessage ? rawMessage : undefined;

    if (this.debug) {
      logData(`[${this.name}] ${reqType} ${url} : error`, detail ?? String(error));
    }

    if (isSerializationError(error)) {
      return new SerializationError(
        `[${this.name}] ${reqType} ${url} [serialization error] : ${detail ?? 'Serialization error'}`,
        buildErrorMetadata(requestConfig, this.name),
        error
      );
    }

    if (isTimeoutError(error)) {
      return new TimeoutError(
        `[${this.name}] ${reqType} ${url} [timeout] : ${detail ?? 'Request timeout'}`,
        buildNetworkErrorMetadata(requestConfig, this.name, error),
        error
      );
    }

    return new NetworkError(
      `[${this.name}] ${reqType} ${url} [network error] : ${detail ?? 'Network error'}`,
      buildNetworkErrorMetadata(requestConfig, this.name, error),
      error
    );
  }

  /**
   * Handles errors from the xior instance. Override for API-specific error
   * handling; the default throws the result of `processError`.
   */
  protected errorHandler(
    error: unknown,
    reqType: RequestType,
    url: string,
    errorMessagePath?: ErrorMessageExtractor
  ): never {
    throw this.processError(error, reqType, url, errorMessagePath);
  }
}
