import { HmrcAuthenticator, toStoredToken } from '../src/HmrcAuthenticator';
import { HmrcAuthenticationError, HmrcTransportError, HmrcValidationError } from '../src/errors';
import { jsonResponse, mockTestData, recordedCall } from './testUtils';

const fetchMock = jest.fn();
global.fetch = fetchMock;

describe('HmrcAuthenticator', () => {
  let authenticator: HmrcAuthenticator;

  beforeEach(() => {
    fetchMock.mockReset();
    authenticator = new HmrcAuthenticator({
      clientId: mockTestData.clientId,
      clientSecret: mockTestData.clientSecret,
      testMode: true,
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('constructor', () => {
    test('should require a client ID', () => {
      expect(() => new HmrcAuthenticator({ clientId: '' })).toThrow(HmrcValidationError);
      expect(() => new HmrcAuthenticator({ clientId: '  ' })).toThrow('OAuth client ID is required');
    });

    test('should pick the host from the test mode flag', () => {
      expect(authenticator.baseUrl).toBe('https://test-api.service.hmrc.gov.uk');
      expect(new HmrcAuthenticator({ clientId: 'id' }).baseUrl).toBe('https://api.service.hmrc.gov.uk');
      expect(new HmrcAuthenticator({ clientId: 'id', baseUrl: 'http://localhost:9000' }).baseUrl).toBe(
        'http://localhost:9000'
      );
    });
  });

  describe('getAuthorizationUrl', () => {
    test('should build the out-of-band authorization URL', () => {
      const url = authenticator.getAuthorizationUrl({ scope: ['read:vat', 'write:vat'], state: 'xyz' });

      expect(url).toBe(
        'https://test-api.service.hmrc.gov.uk/oauth/authorize?client_id=test-client-id&response_type=code' +
          '&redirect_uri=urn%3Aietf%3Awg%3Aoauth%3A2.0%3Aoob&scope=read%3Avat+write%3Avat&state=xyz'
      );
    });

    test('should use a configured redirect URI', () => {
      const custom = new HmrcAuthenticator({
        clientId: 'id',
        redirectUri: 'http://localhost:8080/callback',
        testMode: true,
      });

      const url = new URL(custom.getAuthorizationUrl());

      expect(url.searchParams.get('redirect_uri')).toBe('http://localhost:8080/callback');
      expect(url.searchParams.has('scope')).toBe(false);
    });
  });

  describe('exchangeCodeForToken', () => {
    test('should post the code to the token endpoint', async () => {
      jest.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);
      fetchMock.mockResolvedValue(jsonResponse(mockTestData.tokenResponse));

      const token = await authenticator.exchangeCodeForToken(' auth-code-123 ');

      const call = recordedCall(fetchMock, 0);
      expect(call.url).toBe('https://test-api.service.hmrc.gov.uk/oauth/token');
      expect(call.method).toBe('POST');
      expect(call.headers).toEqual({
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      });
      expect(call.body).toBe(
        'client_id=test-client-id&client_secret=test-secret&grant_type=authorization_code' +
          '&code=auth-code-123&redirect_uri=urn%3Aietf%3Awg%3Aoauth%3A2.0%3Aoob'
      );
      expect(token).toEqual({ ...mockTestData.tokenResponse, expires_at: 1_700_000_000_000 + 14_400_000 });
    });

    test('should reject an empty code without calling HMRC', async () => {
      await expect(authenticator.exchangeCodeForToken('  ')).rejects.toThrow('Authorization code is required');
      expect(fetchMock).not.toHaveBeenCalled();
    });

    test('should wrap a rejected code', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ error: 'invalid_grant', error_description: 'code is invalid' }, 400, 'Bad Request')
      );

      const error = await authenticator.exchangeCodeForToken('bad-code').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HmrcAuthenticationError);
      expect(error).toMatchObject({
        status: 400,
        message:
          'Failed to exchange authorization code for tokens: HTTP 400: Bad Request - ' +
          '{"error":"invalid_grant","error_description":"code is invalid"}',
      });
    });

    test('should reject a token response without an access token', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ token_type: 'bearer', expires_in: 14400 }));

      await expect(authenticator.exchangeCodeForToken('auth-code-123')).rejects.toBeInstanceOf(
        HmrcAuthenticationError
      );
    });
  });

  describe('refreshAccessToken', () => {
    test('should post the refresh token', async () => {
      fetchMock.mockResolvedValue(jsonResponse(mockTestData.tokenResponse));

      const token = await authenticator.refreshAccessToken(mockTestData.refreshToken);

      expect(recordedCall(fetchMock, 0).body).toBe(
        'client_id=test-client-id&client_secret=test-secret&grant_type=refresh_token&refresh_token=test-refresh-token'
      );
      expect(token.access_token).toBe('new-access-token');
    });

    test('should let network failures through unchanged', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      await expect(authenticator.refreshAccessToken(mockTestData.refreshToken)).rejects.toBeInstanceOf(
        HmrcTransportError
      );
    });
  });

  describe('fetchApplicationToken', () => {
    test('should use the client credentials grant', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ access_token: 'app-token', expires_in: 14400, token_type: 'bearer' }));

      const token = await authenticator.fetchApplicationToken(['hello']);

      expect(recordedCall(fetchMock, 0).body).toBe(
        'client_id=test-client-id&client_secret=test-secret&grant_type=client_credentials&scope=hello'
      );
      expect(token.access_token).toBe('app-token');
    });

    test('should require a client secret', async () => {
      const publicClient = new HmrcAuthenticator({ clientId: 'id', testMode: true });

      await expect(publicClient.fetchApplicationToken()).rejects.toThrow(
        'Client secret is required for application-restricted endpoints'
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('toStoredToken', () => {
    test('should stamp the absolute expiry', () => {
      expect(toStoredToken({ access_token: 'a', expires_in: 60, token_type: 'bearer' }, 1000)).toEqual({
        access_token: 'a',
        expires_in: 60,
        token_type: 'bearer',
        expires_at: 61_000,
      });
    });
  });
});
