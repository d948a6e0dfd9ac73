/**
 * HMRC API hosts and endpoint paths
 */

export const BASE_PATH_PROD = 'https://api.service.hmrc.gov.uk';
export const BASE_PATH_TEST = 'https://test-api.service.hmrc.gov.uk';

export const OAUTH_AUTHORIZE_PATH = '/oauth/authorize';
export const OAUTH_TOKEN_PATH = '/oauth/token';

/** Out-of-band redirect: HMRC shows the code for the user to copy */
export const OOB_REDIRECT_URI = 'urn:ietf:wg:oauth:2.0:oob';

export const REQUEST_CONTENT_TYPE = 'application/json';
export const RESPONSE_CONTENT_TYPE = 'application/vnd.hmrc.1.0+json';

export const DEFAULT_TIMEOUT = 30000;

/** Tokens this close to expiry are treated as expired */
export const TOKEN_EXPIRY_BUFFER_MS = 30 * 1000;

export const DEFAULT_TOKEN_FILE = '.hmrc.token';

/** Longest date range the VAT endpoints accept, inclusive */
export const MAX_DATE_RANGE_DAYS = 366;

export const VAT_SCOPES = ['read:vat', 'write:vat'];
export const HELLO_SCOPES = ['hello'];

export const VAT_OBLIGATIONS_PATH = '/organisations/vat/{vrn}/obligations';
export const VAT_RETURNS_PATH = '/organisations/vat/{vrn}/returns';
export const VAT_RETURN_PATH = '/organisations/vat/{vrn}/returns/{periodKey}';
export const VAT_PAYMENTS_PATH = '/organisations/vat/{vrn}/payments';
export const VAT_LIABILITIES_PATH = '/organisations/vat/{vrn}/liabilities';

export const HELLO_WORLD_PATH = '/hello/world';
export const HELLO_APPLICATION_PATH = '/hello/application';
export const HELLO_USER_PATH = '/hello/user';

export const CREATE_TEST_INDIVIDUAL_PATH = '/create-test-user/individuals';
export const CREATE_TEST_ORGANISATION_PATH = '/create-test-user/organisations';

export const FRAUD_PREVENTION_VALIDATE_PATH = '/test/fraud-prevention-headers/validate';

/** Namespace for device identifiers derived from MAC addresses */
export const DEVICE_ID_NAMESPACE = 'c9da8da2-c7e0-4873-97fc-6d783e908751';

export const DEFAULT_VENDOR_PRODUCT_NAME = 'hmrc-ts-sdk';
export const DEFAULT_VENDOR_VERSION = '0.1.0';

export function getBasePath(testMode: boolean): string {
  return testMode ? BASE_PATH_TEST : BASE_PATH_PROD;
}

/**
 * Expand `{name}` placeholders, percent-encoding each value
 */
export function expandPath(template: string, params: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (_match, name: string) => {
    const value = params[name];
    if (value === undefined) {
      throw new Error(`Missing path parameter: ${name}`);
    }
    return encodeURIComponent(value);
  });
}
