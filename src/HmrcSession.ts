import { randomUUID } from 'crypto';
import {
  AuthMode,
  AuthorizationPrompt,
  HmrcSessionConfig,
  HttpMethod,
  SessionRequestOptions,
  StoredToken,
  VendorInfo,
} from './types';
import { HmrcApiError, HmrcAuthenticationError, HmrcTransportError } from './errors';
import {
  DEFAULT_TIMEOUT,
  REQUEST_CONTENT_TYPE,
  RESPONSE_CONTENT_TYPE,
  TOKEN_EXPIRY_BUFFER_MS,
  getBasePath,
} from './constants';
import { HmrcAuthenticator } from './HmrcAuthenticator';
import { MemoryTokenStorage, TokenStorage } from './tokenStorage';
import { buildQueryString } from './utils/formEncoder';
import { buildFraudPreventionHeaders, collectDeviceInfo, DeviceInfo } from './utils/fraudPrevention';
import { HttpClient, HttpResponse } from './utils/httpClient';
import { Logger, defaultLogger } from './utils/logger';
import { RetryOptions, withRetry } from './utils/retry';
import { tryCatch } from './tryCatch';

/**
 * Session with the HMRC API platform
 *
 * Owns the OAuth tokens and attaches them, together with the fraud
 * prevention headers, to every request. Expired user tokens are
 * refreshed before use, and a request rejected with 401 is retried once
 * after a refresh.
 *
 * A session is meant for one caller at a time; concurrent requests may
 * each trigger their own refresh.
 *
 * @example
 * ```typescript
 * import { HmrcSession, HmrcVatClient, FileTokenStorage, consolePrompt } from 'hmrc-ts-sdk';
 *
 * const session = new HmrcSession({
 *   clientId: 'your-client-id',
 *   clientSecret: 'your-client-secret',
 *   testMode: true,
 *   storage: new FileTokenStorage(),
 *   prompt: consolePrompt,
 * });
 *
 * const vat = new HmrcVatClient(session, '123456789');
 * await session.authorize();
 *
 * const { obligations } = await vat.obligations({ from: '2024-01-01', to: '2024-12-31' });
 * ```
 */
export class HmrcSession {
  public readonly testMode: boolean;
  public readonly baseUrl: string;

  private authenticator: HmrcAuthenticator;
  private httpClient: HttpClient;
  private storage: TokenStorage;
  private prompt?: AuthorizationPrompt;
  private retry: RetryOptions;
  private logger: Logger;
  private gdprConsent: boolean;
  private vendor: VendorInfo;
  private deviceInfo?: DeviceInfo;
  private scopes: string[];

  private token: StoredToken | null = null;
  private tokenLoaded = false;
  private applicationToken: StoredToken | null = null;

  /**
   * @param config Session configuration
   * @param authenticator Token endpoint client (default: built from `config`)
   */
  constructor(config: HmrcSessionConfig, authenticator?: HmrcAuthenticator) {
    this.logger = config.logger ?? defaultLogger();
    this.authenticator = authenticator ?? new HmrcAuthenticator({ ...config, logger: this.logger });

    this.testMode = config.testMode ?? false;
    this.baseUrl = config.baseUrl ?? getBasePath(this.testMode);

    this.httpClient = new HttpClient({
      baseURL: this.baseUrl,
      timeout: config.timeout ?? DEFAULT_TIMEOUT,
      logger: this.logger,
    });

    this.storage = config.storage ?? new MemoryTokenStorage();
    this.prompt = config.prompt;
    this.retry = config.retry ?? {};
    this.gdprConsent = config.gdprConsent === true || this.testMode;
    this.vendor = config.vendor ?? {};
    this.scopes = [...(config.scope ?? [])];
  }

  /**
   * Scopes requested when authorizing interactively
   */
  public get scope(): string[] {
    return [...this.scopes];
  }

  /**
   * The current user token, if one has been loaded or obtained
   */
  public get currentToken(): StoredToken | null {
    return this.token;
  }

  /**
   * Add scopes to request at the next interactive authorization
   */
  public extendScope(scope: string[]): void {
    for (const item of scope) {
      if (!this.scopes.includes(item)) {
        this.scopes.push(item);
      }
    }
  }

  /**
   * URL of the page where the user grants this application access
   */
  public getAuthorizationUrl(state?: string): string {
    return this.authenticator.getAuthorizationUrl({ scope: this.scopes, state });
  }

  /**
   * Make sure the session holds a usable user token
   *
   * A valid stored token is used as it is; an expired one is refreshed
   * silently. Without a stored token, or when the refresh token has been
   * rejected, the configured prompt is asked for an authorization code.
   *
   * @throws {HmrcAuthenticationError} If no token can be obtained
   * @throws {HmrcTransportError} If HMRC could not be reached
   */
  public async authorize(): Promise<StoredToken> {
    await this.loadToken();

    if (this.token && this.isTokenValid(this.token)) {
      return this.token;
    }

    if (this.token?.refresh_token) {
      const { data: refreshed, error } = await tryCatch(() => this.refresh());
      if (error === null) {
        return refreshed;
      }
      if (error instanceof HmrcTransportError || !this.prompt) {
        throw error;
      }
      this.logger.warn('Stored refresh token was rejected, authorizing interactively', { reason: error.message });
    }

    if (!this.prompt) {
      throw new HmrcAuthenticationError('No stored credentials and no authorization prompt configured');
    }

    const state = randomUUID();
    const code = await this.prompt({ url: this.getAuthorizationUrl(state), state });
    return this.exchangeCode(code);
  }

  /**
   * Exchange an authorization code obtained out of band and store the token
   */
  public async exchangeCode(code: string): Promise<StoredToken> {
    const token = await this.authenticator.exchangeCodeForToken(code);
    await this.saveToken(token);
    this.logger.info('Authorization code exchanged for access token', { scope: token.scope });
    return token;
  }

  /**
   * Forget the user token, in memory and in storage
   */
  public async logout(): Promise<void> {
    this.token = null;
    this.tokenLoaded = true;
    await this.storage.delete();
  }

  /**
   * Issue a request against the API host
   *
   * @param method HTTP verb
   * @param path Path relative to the API host
   * @param options Query, JSON body, extra headers and which token to send
   * @throws {HmrcAuthenticationError} If the request is still rejected after one refresh
   * @throws {HmrcApiError} If HMRC answers with another error status
   * @throws {HmrcTransportError} If HMRC could not be reached
   */
  public async request(method: HttpMethod, path: string, options: SessionRequestOptions = {}): Promise<HttpResponse> {
    const auth = options.auth ?? 'user';
    const query = options.query ? buildQueryString(options.query) : '';
    const url = query ? `${path}?${query}` : path;

    // Token endpoint failures surface as they are; only the API call is retried
    const authorization = await this.authorizationHeader(auth);

    const { data, error } = await tryCatch(() => this.send(method, url, authorization, options));
    if (error === null) {
      return data;
    }

    if (!(error instanceof HmrcAuthenticationError) || error.status !== 401 || auth === 'none') {
      throw error;
    }

    this.logger.info('Access token rejected, refreshing and retrying once', { method, path });

    if (auth === 'application') {
      this.applicationToken = null;
    } else if (this.token?.refresh_token) {
      await this.refresh();
    } else {
      throw error;
    }

    return this.send(method, url, await this.authorizationHeader(auth), options);
  }

  private async send(
    method: HttpMethod,
    url: string,
    authorization: string | null,
    options: SessionRequestOptions
  ): Promise<HttpResponse> {
    const headers: Record<string, string> = {
      Accept: RESPONSE_CONTENT_TYPE,
      ...this.fraudPreventionHeaders(),
      ...options.headers,
    };

    if (authorization) {
      headers.Authorization = authorization;
    }

    let body: string | undefined;
    if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers['Content-Type'] = REQUEST_CONTENT_TYPE;
    }

    return withRetry(() => this.httpClient.request(url, { method, headers, body }), {
      shouldRetry: isTransientError,
      onRetry: (error, attempt, delayMs) =>
        this.logger.warn('Transient failure, retrying', {
          method,
          url,
          attempt,
          delayMs,
          reason: error instanceof Error ? error.message : String(error),
        }),
      ...this.retry,
    });
  }

  private async authorizationHeader(auth: AuthMode): Promise<string | null> {
    if (auth === 'user') {
      return `Bearer ${await this.getValidAccessToken()}`;
    }
    if (auth === 'application') {
      return `Bearer ${await this.getApplicationAccessToken()}`;
    }
    return null;
  }

  private async getValidAccessToken(): Promise<string> {
    await this.loadToken();

    if (this.token && this.isTokenValid(this.token)) {
      return this.token.access_token;
    }

    const token = await this.authorize();
    return token.access_token;
  }

  private async getApplicationAccessToken(): Promise<string> {
    if (this.applicationToken && this.isTokenValid(this.applicationToken)) {
      return this.applicationToken.access_token;
    }

    this.applicationToken = await this.authenticator.fetchApplicationToken();
    return this.applicationToken.access_token;
  }

  /**
   * Check if a token is present and not about to expire
   */
  private isTokenValid(token: StoredToken): boolean {
    return Date.now() < token.expires_at - TOKEN_EXPIRY_BUFFER_MS;
  }

  /**
   * Refresh the user token using the stored refresh token
   */
  private async refresh(): Promise<StoredToken> {
    const current = this.token;
    if (!current?.refresh_token) {
      throw new HmrcAuthenticationError('No refresh token available');
    }

    const refreshed = await this.authenticator.refreshAccessToken(current.refresh_token);

    // HMRC may omit the refresh token and scope when they are unchanged
    const token: StoredToken = {
      ...refreshed,
      refresh_token: refreshed.refresh_token ?? current.refresh_token,
      scope: refreshed.scope ?? current.scope,
    };

    await this.saveToken(token);
    this.logger.info('Access token refreshed');
    return token;
  }

  private async loadToken(): Promise<void> {
    if (this.tokenLoaded) {
      return;
    }

    this.token = await this.storage.load();
    this.tokenLoaded = true;

    if (this.token?.scope) {
      this.extendScope(this.token.scope.split(' ').filter(Boolean));
    }
  }

  private async saveToken(token: StoredToken): Promise<void> {
    this.token = token;
    this.tokenLoaded = true;
    await this.storage.save(token);
  }

  private fraudPreventionHeaders(): Record<string, string> {
    if (this.gdprConsent && !this.deviceInfo) {
      this.deviceInfo = collectDeviceInfo();
    }
    return buildFraudPreventionHeaders(this.gdprConsent ? (this.deviceInfo ?? null) : null, this.vendor);
  }
}

/**
 * Failures worth another attempt: no response at all, or HMRC reporting
 * the service as temporarily unavailable
 */
export function isTransientError(error: unknown): boolean {
  return error instanceof HmrcTransportError || (error instanceof HmrcApiError && error.status === 503);
}
