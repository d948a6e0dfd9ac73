import { AuthUrlSettings, HmrcAuthConfig, StoredToken, TokenResponse } from './types';
import { HmrcAuthenticationError, HmrcTransportError, HmrcValidationError } from './errors';
import { OAUTH_AUTHORIZE_PATH, OAUTH_TOKEN_PATH, OOB_REDIRECT_URI, DEFAULT_TIMEOUT, getBasePath } from './constants';
import { TokenResponseSchema } from './schemas';
import { buildOAuthAuthorizationUrl, encodeOAuthTokenRequest, OAuthTokenRequest } from './utils/formEncoder';
import { HttpClient } from './utils/httpClient';
import { parseJsonResponse } from './utils/jsonParser';
import { defaultLogger } from './utils/logger';
import { tryCatch } from './tryCatch';

type ResolvedAuthConfig = Required<Omit<HmrcAuthConfig, 'clientSecret' | 'logger'>> &
  Pick<HmrcAuthConfig, 'clientSecret'>;

/**
 * Handles OAuth 2.0 authentication with the HMRC API platform
 */
export class HmrcAuthenticator {
  private config: ResolvedAuthConfig;
  private httpClient: HttpClient;

  constructor(config: HmrcAuthConfig) {
    this.validateConfig(config);

    const testMode = config.testMode ?? false;

    this.config = {
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      redirectUri: config.redirectUri ?? OOB_REDIRECT_URI,
      testMode,
      baseUrl: config.baseUrl ?? getBasePath(testMode),
      timeout: config.timeout ?? DEFAULT_TIMEOUT,
    };

    this.httpClient = new HttpClient({
      baseURL: this.config.baseUrl,
      timeout: this.config.timeout,
      logger: config.logger ?? defaultLogger(),
    });
  }

  public get clientId(): string {
    return this.config.clientId;
  }

  public get baseUrl(): string {
    return this.config.baseUrl;
  }

  public get testMode(): boolean {
    return this.config.testMode;
  }

  /**
   * Generate OAuth authorization URL for user authentication
   */
  public getAuthorizationUrl(settings?: AuthUrlSettings): string {
    return buildOAuthAuthorizationUrl(new URL(OAUTH_AUTHORIZE_PATH, this.config.baseUrl).toString(), {
      client_id: this.config.clientId,
      response_type: 'code',
      redirect_uri: this.config.redirectUri,
      scope: settings?.scope,
      state: settings?.state,
    });
  }

  /**
   * Exchange authorization code for access and refresh tokens
   *
   * @throws {HmrcValidationError} If the code is empty
   * @throws {HmrcAuthenticationError} If HMRC rejects the code
   */
  public async exchangeCodeForToken(code: string): Promise<StoredToken> {
    if (!code?.trim()) {
      throw new HmrcValidationError('Authorization code is required', 'code');
    }

    return this.requestToken(
      { grant_type: 'authorization_code', code: code.trim(), redirect_uri: this.config.redirectUri },
      'Failed to exchange authorization code for tokens'
    );
  }

  /**
   * Refresh access token using refresh token
   *
   * @throws {HmrcValidationError} If the refresh token is empty
   * @throws {HmrcAuthenticationError} If HMRC rejects the refresh token
   */
  public async refreshAccessToken(refreshToken: string): Promise<StoredToken> {
    if (!refreshToken?.trim()) {
      throw new HmrcValidationError('Refresh token is required', 'refreshToken');
    }

    return this.requestToken(
      { grant_type: 'refresh_token', refresh_token: refreshToken },
      'Failed to refresh access token'
    );
  }

  /**
   * Obtain an application token (client credentials grant) for
   * application-restricted endpoints
   *
   * @throws {HmrcAuthenticationError} If HMRC rejects the client credentials
   */
  public async fetchApplicationToken(scope?: string[]): Promise<StoredToken> {
    if (!this.config.clientSecret) {
      throw new HmrcAuthenticationError('Client secret is required for application-restricted endpoints');
    }

    return this.requestToken(
      { grant_type: 'client_credentials', scope: scope?.length ? scope.join(' ') : undefined },
      'Failed to obtain application token'
    );
  }

  private async requestToken(request: OAuthTokenRequest, context: string): Promise<StoredToken> {
    const formData = encodeOAuthTokenRequest(request, {
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
    });

    const { data, error } = await tryCatch(async () => {
      const response = await this.httpClient.post(OAUTH_TOKEN_PATH, formData, {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded', Accept: 'application/json' },
      });

      return parseJsonResponse(TokenResponseSchema, response.data, 'token');
    });

    if (error !== null) {
      // Network failures stay retryable; anything else is a rejection
      if (error instanceof HmrcTransportError) {
        throw error;
      }
      throw new HmrcAuthenticationError(`${context}: ${error.message}`, statusOf(error));
    }

    return toStoredToken(data);
  }

  private validateConfig(config: HmrcAuthConfig): void {
    if (!config) {
      throw new HmrcValidationError('Configuration is required');
    }

    if (!config.clientId?.trim()) {
      throw new HmrcValidationError('OAuth client ID is required', 'clientId');
    }
  }
}

/**
 * Stamp a token response with its absolute expiry time
 */
export function toStoredToken(response: TokenResponse, now: number = Date.now()): StoredToken {
  return {
    ...response,
    expires_at: now + response.expires_in * 1000,
  };
}

function statusOf(error: Error): number | undefined {
  return 'status' in error && typeof error.status === 'number' ? error.status : undefined;
}
