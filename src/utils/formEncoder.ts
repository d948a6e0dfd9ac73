import qs from 'qs';
import { tryCatch } from '../tryCatch';

/**
 * Form and query encoding utilities
 *
 * Provides consistent encoding for the OAuth token endpoint and the
 * query strings of the API endpoints.
 */

/**
 * Encode object as application/x-www-form-urlencoded string
 * @param data Object to encode
 * @returns Encoded form string
 */
export function encodeForm(data: Record<string, string | number | boolean>): string {
  return qs.stringify(data, { encode: true });
}

/**
 * Build query string from object, leaving out undefined and null values
 * @param obj Object to convert to query string
 * @returns Query string (without leading ?)
 */
export function buildQueryString(obj: Record<string, unknown>): string {
  return qs.stringify(obj, {
    encode: true,
    arrayFormat: 'repeat',
    skipNulls: true,
  });
}

export type OAuthTokenRequest =
  | { grant_type: 'authorization_code'; code: string; redirect_uri: string }
  | { grant_type: 'refresh_token'; refresh_token: string }
  | { grant_type: 'client_credentials'; scope?: string };

/**
 * Encode OAuth token request data
 *
 * HMRC expects the client credentials in the request body.
 */
export function encodeOAuthTokenRequest(
  request: OAuthTokenRequest,
  credentials: { client_id: string; client_secret?: string }
): string {
  const data: Record<string, string> = {
    client_id: credentials.client_id,
  };

  if (credentials.client_secret) {
    data.client_secret = credentials.client_secret;
  }

  for (const [key, value] of Object.entries(request)) {
    if (typeof value === 'string' && value) {
      data[key] = value;
    }
  }

  return encodeForm(data);
}

/**
 * Build OAuth authorization URL
 * @param baseUrl Authorization endpoint URL
 * @param params Authorization parameters
 * @returns Complete authorization URL
 */
export function buildOAuthAuthorizationUrl(
  baseUrl: string,
  params: {
    client_id: string;
    response_type: string;
    redirect_uri: string;
    scope?: string[];
    state?: string;
  }
): string {
  const queryParams = new URLSearchParams();

  queryParams.append('client_id', params.client_id);
  queryParams.append('response_type', params.response_type);
  queryParams.append('redirect_uri', params.redirect_uri);

  if (params.scope?.length) {
    queryParams.append('scope', params.scope.join(' '));
  }

  if (params.state) {
    queryParams.append('state', params.state);
  }

  return `${baseUrl}?${queryParams.toString()}`;
}

/**
 * Extract OAuth code from redirect URL
 * @param redirectUrl Full redirect URL containing code parameter
 * @returns Authorization code or null if not found
 */
export function extractOAuthCode(redirectUrl: string): string | null {
  const { data: code } = tryCatch(() => new URL(redirectUrl).searchParams.get('code'));
  return code ?? null;
}

/**
 * Extract OAuth error from redirect URL
 * @param redirectUrl Full redirect URL that might contain error
 * @returns Error information or null if no error
 */
export function extractOAuthError(redirectUrl: string): { error: string; error_description?: string } | null {
  const { data: params } = tryCatch(() => new URL(redirectUrl).searchParams);
  const error = params?.get('error');

  if (!error) {
    return null;
  }

  return { error, error_description: params?.get('error_description') ?? undefined };
}
