import type { HmrcErrorResponse } from './types';

/**
 * Base error for everything thrown by the SDK
 */
export class HmrcSdkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HmrcSdkError';
  }
}

/**
 * Credentials were rejected, expired without a way to refresh them,
 * or no way of obtaining them was configured
 */
export class HmrcAuthenticationError extends HmrcSdkError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly error?: HmrcErrorResponse
  ) {
    super(message);
    this.name = 'HmrcAuthenticationError';
  }
}

/**
 * Request arguments or payload failed local validation. Thrown before
 * anything is sent.
 */
export class HmrcValidationError extends HmrcSdkError {
  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = 'HmrcValidationError';
  }
}

/**
 * HMRC answered with an error status
 *
 * When the body is a recognisable HMRC error envelope its code and the
 * contributory errors are exposed; the message then reads
 * `top-level message: detail/detail`.
 */
export class HmrcApiError extends HmrcSdkError {
  public readonly code?: string;
  public readonly errors: HmrcErrorResponse[];

  constructor(
    message: string,
    public readonly status?: number,
    public readonly body?: string,
    public readonly error?: HmrcErrorResponse
  ) {
    super(error ? formatErrorResponse(error) : message);
    this.name = 'HmrcApiError';
    this.code = error?.code;
    this.errors = error?.errors ?? [];
  }
}

/**
 * The request never produced a response (network failure or timeout)
 */
export class HmrcTransportError extends HmrcSdkError {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'HmrcTransportError';
  }
}

/**
 * A successful response did not have the documented shape
 */
export class HmrcResponseParsingError extends HmrcSdkError {
  constructor(message: string, public readonly body?: unknown) {
    super(message);
    this.name = 'HmrcResponseParsingError';
  }
}

function formatErrorResponse(error: HmrcErrorResponse): string {
  if (!error.errors?.length) {
    return error.message;
  }
  return `${error.message}: ${error.errors.map((e) => e.message).join('/')}`;
}
