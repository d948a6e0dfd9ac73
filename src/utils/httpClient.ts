import {
  HmrcApiError,
  HmrcAuthenticationError,
  HmrcResponseParsingError,
  HmrcSdkError,
  HmrcTransportError,
} from '../errors';
import { DEFAULT_TIMEOUT } from '../constants';
import { tryCatch } from '../tryCatch';
import { Logger, noopLogger } from './logger';
import { parseErrorResponse } from './jsonParser';

const AUTHORIZATION_ERROR_CODES = ['CLIENT_OR_AGENT_NOT_AUTHORISED', 'INVALID_SCOPE', 'INVALID_CREDENTIALS'];

export interface HttpOptions extends Omit<RequestInit, 'headers'> {
  timeout?: number;
  baseURL?: string;
  headers?: Record<string, string>;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  statusText: string;
  headers: Headers;
}

/**
 * Simple HTTP client wrapper around native fetch
 * Provides timeout handling, status checking, and response type parsing
 */
export class HttpClient {
  private baseURL: string;
  private defaultTimeout: number;
  private logger: Logger;

  constructor(config: { baseURL?: string; timeout?: number; logger?: Logger } = {}) {
    this.baseURL = this.normalizeBaseURL(config.baseURL);
    this.defaultTimeout = config.timeout || DEFAULT_TIMEOUT;
    this.logger = config.logger ?? noopLogger;
  }

  /**
   * Make HTTP request with timeout and error handling
   *
   * @throws {HmrcAuthenticationError} On 401, or 403 without an authorisation code
   * @throws {HmrcApiError} On any other error status
   * @throws {HmrcTransportError} If no response arrives in time or the network fails
   */
  async request(url: string, options: HttpOptions = {}): Promise<HttpResponse> {
    const { timeout = this.defaultTimeout, baseURL, ...fetchOptions } = options;
    const method = fetchOptions.method || 'GET';

    // Build full URL
    const fullUrl = this.buildFullUrl(url, baseURL);

    // Setup timeout
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    const { data, error } = await tryCatch(async () => {
      this.logger.debug(`[HTTP] ${method} ${fullUrl}`);

      const response = await fetch(fullUrl, {
        ...fetchOptions,
        signal: controller.signal,
      });

      this.logger.debug(`[HTTP] Response ${response.status} for ${fullUrl}`);

      // Handle HTTP errors
      if (!response.ok) {
        const errorText = await response.text().catch(() => '');
        this.handleHttpError(response.status, response.statusText, errorText);
      }

      return {
        data: await this.parseResponse(response),
        status: response.status,
        statusText: response.statusText,
        headers: response.headers,
      };
    });

    clearTimeout(timeoutId);

    if (error !== null) {
      // Re-throw our custom errors
      if (error instanceof HmrcSdkError) {
        throw error;
      }

      if (error.name === 'AbortError') {
        throw new HmrcTransportError(`Request timeout after ${timeout}ms: ${method} ${fullUrl}`, error);
      }

      throw new HmrcTransportError(`Network error: ${error.message || 'Unknown error'}`, error);
    }

    return data;
  }

  /**
   * GET request
   */
  async get(url: string, options: HttpOptions = {}): Promise<HttpResponse> {
    return this.request(url, { ...options, method: 'GET' });
  }

  /**
   * POST request. Strings are sent as they are; anything else as JSON.
   */
  async post(url: string, body?: unknown, options: HttpOptions = {}): Promise<HttpResponse> {
    const requestOptions: HttpOptions = { ...options, method: 'POST' };

    if (body !== undefined) {
      if (typeof body === 'string') {
        requestOptions.body = body;
      } else {
        requestOptions.body = JSON.stringify(body);
        requestOptions.headers = {
          'Content-Type': 'application/json',
          ...requestOptions.headers,
        };
      }
    }

    return this.request(url, requestOptions);
  }

  /**
   * Parse response based on content type
   */
  private async parseResponse(response: Response): Promise<unknown> {
    const contentType = response.headers.get('content-type') || '';
    const text = await response.text();

    // HMRC answers with application/json or application/vnd.hmrc.*+json
    if (contentType.includes('json')) {
      if (!text) {
        return null;
      }

      const { data, error } = tryCatch((): unknown => JSON.parse(text));
      if (error !== null) {
        throw new HmrcResponseParsingError(`Invalid JSON in response: ${error.message}`, text);
      }
      return data;
    }

    // Default to text
    return text;
  }

  /**
   * Handle HTTP error status codes
   */
  private handleHttpError(status: number, statusText: string, errorText: string): never {
    const envelope = parseErrorResponse(errorText);
    const message = `HTTP ${status}: ${statusText}${errorText ? ` - ${errorText}` : ''}`;

    // HMRC also answers 403 for business rule failures such as DUPLICATE_SUBMISSION
    const denied = status === 403 && (!envelope || AUTHORIZATION_ERROR_CODES.includes(envelope.code));
    if (status === 401 || denied) {
      throw new HmrcAuthenticationError(envelope?.message ?? message, status, envelope ?? undefined);
    }

    throw new HmrcApiError(message, status, errorText, envelope ?? undefined);
  }

  /**
   * Normalize base URLs and relative paths to avoid resolution issues
   */
  private buildFullUrl(url: string, requestBaseURL?: string): string {
    const absoluteUrlPattern = /^[a-zA-Z][a-zA-Z\d+\-.]*:/;

    if (absoluteUrlPattern.test(url)) {
      return url;
    }

    const base = this.normalizeBaseURL(requestBaseURL || this.baseURL);

    if (!base) {
      return url;
    }

    const relativeUrl = url.replace(/^\/+/, '');

    return new URL(relativeUrl, base).toString();
  }

  private normalizeBaseURL(baseURL?: string): string {
    if (!baseURL) {
      return '';
    }

    return baseURL.endsWith('/') ? baseURL : `${baseURL}/`;
  }
}
