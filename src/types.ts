import type { Logger } from './utils/logger';
import type { RetryOptions } from './utils/retry';
import type { TokenStorage } from './tokenStorage';

// ==========================================================================
// AUTHENTICATION
// ==========================================================================

/**
 * Configuration for HMRC OAuth 2.0 authentication
 */
export interface HmrcAuthConfig {
  /** OAuth 2.0 client ID issued in the HMRC Developer Hub */
  clientId: string;
  /** OAuth 2.0 client secret; sent with token requests when present */
  clientSecret?: string;
  /** Redirect URI registered for the application (default: out-of-band) */
  redirectUri?: string;
  /** Whether to use the sandbox host (default: false) */
  testMode?: boolean;
  /** Custom API host (overrides `testMode`) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  logger?: Logger;
}

/**
 * OAuth 2.0 token response from HMRC
 */
export interface TokenResponse {
  access_token: string;
  refresh_token?: string;
  expires_in: number;
  token_type: string;
  scope?: string;
}

/**
 * Token as held by a session and its storage.
 *
 * `expires_at` is a Unix epoch in milliseconds.
 */
export interface StoredToken extends TokenResponse {
  expires_at: number;
}

export interface AuthUrlSettings {
  scope?: string[];
  state?: string;
}

/**
 * What the user needs to complete an interactive authorization
 */
export interface AuthorizationPromptRequest {
  /** Page the user should open to sign in and grant access */
  url: string;
  /** Opaque value echoed back by HMRC */
  state: string;
}

/**
 * Show the authorization page to a human and resolve with the code
 * they obtained from it
 */
export type AuthorizationPrompt = (request: AuthorizationPromptRequest) => Promise<string>;

/**
 * Which token a request carries:
 * - `user`: user-restricted endpoints, token from the authorization code flow
 * - `application`: application-restricted endpoints, client credentials token
 * - `none`: open access endpoints
 */
export type AuthMode = 'user' | 'application' | 'none';

// ==========================================================================
// SESSION
// ==========================================================================

/**
 * Vendor identification sent in the fraud prevention headers
 */
export interface VendorInfo {
  productName?: string;
  version?: string;
  licenseIds?: string;
}

/**
 * Configuration for an HMRC API session
 *
 * @example
 * ```typescript
 * const config: HmrcSessionConfig = {
 *   clientId: 'your-client-id',
 *   clientSecret: 'your-client-secret',
 *   testMode: true,
 *   storage: new FileTokenStorage(),
 *   prompt: consolePrompt,
 * };
 * ```
 */
export interface HmrcSessionConfig extends HmrcAuthConfig {
  /** Scopes requested during interactive authorization */
  scope?: string[];
  /** Where tokens are loaded from and saved to (default: in memory) */
  storage?: TokenStorage;
  /** Interactive authorization capability; required when no token is stored */
  prompt?: AuthorizationPrompt;
  /** Retry policy for transient failures (default: no retries) */
  retry?: RetryOptions;
  /**
   * Report real device details in the fraud prevention headers.
   * Always on for the sandbox.
   */
  gdprConsent?: boolean;
  vendor?: VendorInfo;
}

export type QueryValue = string | number | boolean | undefined;

export interface SessionRequestOptions {
  query?: Record<string, QueryValue>;
  /** Serialized as JSON */
  body?: unknown;
  headers?: Record<string, string>;
  /** Default: `user` */
  auth?: AuthMode;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

// ==========================================================================
// ERRORS
// ==========================================================================

/**
 * HMRC error envelope. Top-level description plus optional
 * contributory errors of the same shape.
 */
export interface HmrcErrorResponse {
  code: string;
  message: string;
  path?: string;
  errors?: HmrcErrorResponse[];
}

// ==========================================================================
// VAT
// ==========================================================================

/**
 * Obligation status as sent on the wire
 */
export const ObligationStatus = {
  OPEN: 'O',
  FULFILLED: 'F',
} as const;

export type ObligationStatus = (typeof ObligationStatus)[keyof typeof ObligationStatus];

export const PaymentIndicator = {
  DIRECT_DEBIT: 'DD',
  DIRECT_CREDIT: 'BANK',
} as const;

export type PaymentIndicator = (typeof PaymentIndicator)[keyof typeof PaymentIndicator];

/** ISO `YYYY-MM-DD` string or a Date (its UTC calendar day is used) */
export type DateInput = string | Date;

export interface DateRange {
  from: DateInput;
  to: DateInput;
}

export interface ObligationsParams {
  from?: DateInput;
  to?: DateInput;
  /** When omitted HMRC returns both open and fulfilled obligations */
  status?: ObligationStatus;
}

/**
 * A required filing for one accounting period
 */
export interface VatObligation {
  periodKey: string;
  start: string;
  end: string;
  due: string;
  status: ObligationStatus;
  received?: string;
}

export interface VatObligations {
  obligations: VatObligation[];
}

/**
 * The nine boxes of a VAT return.
 *
 * Boxes 1 to 5 are pounds and pence; boxes 6 to 9 are whole pounds.
 */
export interface VatReturn {
  periodKey: string;
  vatDueSales: number;
  vatDueAcquisitions: number;
  totalVatDue: number;
  vatReclaimedCurrPeriod: number;
  netVatDue: number;
  totalValueSalesExVAT: number;
  totalValuePurchasesExVAT: number;
  totalValueGoodsSuppliedExVAT: number;
  totalAcquisitionsExVAT: number;
}

/**
 * A VAT return as submitted. HMRC only accepts finalised returns.
 */
export interface VatSubmission extends VatReturn {
  finalised: boolean;
}

export interface VatConfirmation {
  processingDate: string;
  paymentIndicator?: PaymentIndicator;
  formBundleNumber?: string;
  chargeRefNumber?: string;
}

export interface VatPayment {
  amount: number;
  received?: string;
}

export interface VatPayments {
  payments: VatPayment[];
}

export interface VatLiability {
  taxPeriod?: {
    from: string;
    to: string;
  };
  type: string;
  originalAmount: number;
  outstandingAmount?: number;
  due?: string;
}

export interface VatLiabilities {
  liabilities: VatLiability[];
}

/**
 * Per-call options for the VAT client
 */
export interface VatCallOptions {
  /** Sandbox only: value for the `Gov-Test-Scenario` header */
  testScenario?: string;
}

// ==========================================================================
// HELLO WORLD
// ==========================================================================

export interface HelloMessage {
  message: string;
}

// ==========================================================================
// TEST USERS
// ==========================================================================

/**
 * Services a sandbox test user can be enrolled in
 */
export const TEST_USER_SERVICES = [
  'corporation-tax',
  'customs-services',
  'lisa',
  'mtd-income-tax',
  'mtd-vat',
  'national-insurance',
  'paye-for-employers',
  'relief-at-source',
  'secure-electronic-transfer',
  'self-assessment',
  'submit-vat-returns',
] as const;

export type TestUserService = (typeof TEST_USER_SERVICES)[number];

export interface TestUserAddress {
  line1: string;
  line2: string;
  postcode: string;
}

export interface TestUserIndividualDetails {
  firstName: string;
  lastName: string;
  dateOfBirth: string;
  address: TestUserAddress;
}

export interface TestUserOrganisationDetails {
  name: string;
  address: TestUserAddress;
}

export interface TestUser {
  userId: string;
  password: string;
  userFullName: string;
  emailAddress: string;
  individualDetails?: TestUserIndividualDetails;
  organisationDetails?: TestUserOrganisationDetails;
  saUtr?: string;
  nino?: string;
  mtdItId?: string;
  empRef?: string;
  ctUtr?: string;
  vrn?: string;
  vatRegistrationDate?: string;
  groupIdentifier?: string;
}

// ==========================================================================
// FRAUD PREVENTION HEADERS
// ==========================================================================

export interface FraudPreventionIssue {
  code: string;
  message: string;
  headers: string[];
}

export interface FraudPreventionFeedback {
  specVersion: string;
  code: string;
  message: string;
  warnings?: FraudPreventionIssue[];
  errors?: FraudPreventionIssue[];
}
