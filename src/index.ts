/**
 * HMRC TypeScript SDK
 *
 * Typed access to the HMRC Making Tax Digital APIs: OAuth 2.0 sessions
 * with token storage and refresh, fraud prevention headers, and the VAT
 * obligations, returns, payments and liabilities endpoints.
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
 * const vatReturn = await vat.retrieve('18A1');
 * ```
 */

// Main exports
export { HmrcSession, isTransientError } from './HmrcSession';
export { HmrcAuthenticator, toStoredToken } from './HmrcAuthenticator';
export { HmrcVatClient, serializeSubmission } from './HmrcVatClient';
export { HmrcHelloClient } from './HmrcHelloClient';
export { HmrcTestUserClient } from './HmrcTestUserClient';
export { HmrcFraudPreventionClient } from './HmrcFraudPreventionClient';

// Token storage
export type { TokenStorage } from './tokenStorage';
export { MemoryTokenStorage, FileTokenStorage } from './tokenStorage';

// Interactive authorization
export { consolePrompt, createConsolePrompt } from './prompt';

// Configuration
export type { EnvConfigOptions } from './config';
export { loadConfigFromEnv } from './config';

// Types
export * from './types';

// Errors
export * from './errors';

// Utilities (for advanced users)
export * as DateUtils from './utils/dateUtils';
export * as FormUtils from './utils/formEncoder';
export * as ValidatorsUtils from './utils/validators';
export type { DeviceInfo } from './utils/fraudPrevention';
export { buildFraudPreventionHeaders, collectDeviceInfo } from './utils/fraudPrevention';
export type { Logger } from './utils/logger';
export { consoleLogger, noopLogger } from './utils/logger';
export type { RetryOptions } from './utils/retry';
export { withRetry } from './utils/retry';

// Constants (for advanced users)
export * as Constants from './constants';

// Default export for convenience
export { HmrcSession as default } from './HmrcSession';
