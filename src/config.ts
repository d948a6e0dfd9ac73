import dotenv from 'dotenv';
import { HmrcValidationError } from './errors';
import { FileTokenStorage } from './tokenStorage';
import { HmrcSessionConfig } from './types';

export interface EnvConfigOptions {
  /** dotenv file to read (default: `.env` in the working directory) */
  path?: string;
  /** Variables to read; values from the file do not override these (default: `process.env`) */
  env?: Record<string, string | undefined>;
}

/**
 * Build a session configuration from environment variables
 *
 * | Variable | Setting |
 * | --- | --- |
 * | `HMRC_CLIENT_ID` | `clientId` (required) |
 * | `HMRC_CLIENT_SECRET` | `clientSecret` |
 * | `HMRC_TEST` | `testMode` (`1`, `true` or `yes`) |
 * | `HMRC_BASE_URL` | `baseUrl` |
 * | `HMRC_REDIRECT_URI` | `redirectUri` |
 * | `HMRC_TOKEN_FILE` | `storage`, a {@link FileTokenStorage} at that path |
 * | `HMRC_GDPR_CONSENT` | `gdprConsent` |
 * | `HMRC_TIMEOUT` | `timeout` in milliseconds |
 *
 * @throws {HmrcValidationError} If the client ID is missing or a value is malformed
 */
export function loadConfigFromEnv(options: EnvConfigOptions = {}): HmrcSessionConfig {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(options.env ?? process.env)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }

  // Variables already set win over the file
  dotenv.config({ path: options.path, processEnv: env, override: false });

  const clientId = env.HMRC_CLIENT_ID?.trim();
  if (!clientId) {
    throw new HmrcValidationError('HMRC_CLIENT_ID is not set', 'HMRC_CLIENT_ID');
  }

  const config: HmrcSessionConfig = {
    clientId,
    clientSecret: env.HMRC_CLIENT_SECRET || undefined,
    testMode: parseFlag(env.HMRC_TEST),
    gdprConsent: parseFlag(env.HMRC_GDPR_CONSENT),
  };

  if (env.HMRC_BASE_URL) {
    config.baseUrl = env.HMRC_BASE_URL;
  }

  if (env.HMRC_REDIRECT_URI) {
    config.redirectUri = env.HMRC_REDIRECT_URI;
  }

  if (env.HMRC_TOKEN_FILE) {
    config.storage = new FileTokenStorage(env.HMRC_TOKEN_FILE);
  }

  if (env.HMRC_TIMEOUT) {
    const timeout = Number(env.HMRC_TIMEOUT);
    if (!Number.isInteger(timeout) || timeout <= 0) {
      throw new HmrcValidationError('HMRC_TIMEOUT must be a positive number of milliseconds', 'HMRC_TIMEOUT');
    }
    config.timeout = timeout;
  }

  return config;
}

function parseFlag(value: string | undefined): boolean {
  return ['1', 'true', 'yes'].includes((value ?? '').trim().toLowerCase());
}
