import { HmrcValidationError } from '../errors';
import { VatReturn, VatSubmission } from '../types';

const MONETARY_MAX = 9999999999999.99;
const NET_VAT_MAX = 99999999999.99;
const WHOLE_POUNDS_MAX = 9999999999999;

/** Boxes 1 to 4: pounds and pence, may be negative */
const MONETARY_BOXES = ['vatDueSales', 'vatDueAcquisitions', 'totalVatDue', 'vatReclaimedCurrPeriod'] as const;

/** Boxes 6 to 9: whole pounds, may be negative */
const WHOLE_POUND_BOXES = [
  'totalValueSalesExVAT',
  'totalValuePurchasesExVAT',
  'totalValueGoodsSuppliedExVAT',
  'totalAcquisitionsExVAT',
] as const;

type VatBox = Exclude<keyof VatReturn, 'periodKey'>;

/**
 * Validate a VAT registration number (nine digits)
 */
export function isValidVrn(vrn: string): boolean {
  return /^\d{9}$/.test(vrn);
}

/**
 * Validate an HMRC period key, e.g. `18A1` or `#001`
 */
export function isValidPeriodKey(periodKey: string): boolean {
  return /^[A-Z0-9#]{4}$/.test(periodKey);
}

/**
 * Check a value has at most two decimal places
 */
export function hasPencePrecisionOnly(value: number): boolean {
  return Math.abs(value * 100 - Math.round(value * 100)) < 1e-6;
}

/**
 * Validate a VAT return submission before it is sent
 *
 * @param submission Submission to check
 * @throws {HmrcValidationError} If a box is missing or out of range, the
 * period key is malformed, or the return is not finalised
 *
 * ```typescript
 * validateVatSubmission({ periodKey: '18A1', ..., finalised: true });
 * ```
 */
export function validateVatSubmission(submission: VatSubmission): void {
  if (!submission || typeof submission !== 'object') {
    throw new HmrcValidationError('VAT return is required');
  }

  if (typeof submission.periodKey !== 'string' || !isValidPeriodKey(submission.periodKey)) {
    throw new HmrcValidationError('Period key must be four characters of A-Z, 0-9 or #', 'periodKey');
  }

  for (const box of MONETARY_BOXES) {
    const value = requireNumber(submission, box);
    checkRange(box, value, -MONETARY_MAX, MONETARY_MAX);
    checkPence(box, value);
  }

  const netVatDue = requireNumber(submission, 'netVatDue');
  checkRange('netVatDue', netVatDue, 0, NET_VAT_MAX);
  checkPence('netVatDue', netVatDue);

  for (const box of WHOLE_POUND_BOXES) {
    const value = requireNumber(submission, box);
    checkRange(box, value, -WHOLE_POUNDS_MAX, WHOLE_POUNDS_MAX);
    if (!Number.isInteger(value)) {
      throw new HmrcValidationError(`${box} must be a whole number of pounds`, box);
    }
  }

  if (submission.finalised !== true) {
    throw new HmrcValidationError('VAT return must be finalised before submission', 'finalised');
  }
}

function requireNumber(submission: VatSubmission, box: VatBox): number {
  const value: unknown = submission[box];
  if (value === undefined || value === null) {
    throw new HmrcValidationError(`${box} is required`, box);
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new HmrcValidationError(`${box} must be a finite number`, box);
  }
  return value;
}

function checkRange(box: VatBox, value: number, min: number, max: number): void {
  if (value < min || value > max) {
    throw new HmrcValidationError(`${box} must be between ${min} and ${max}`, box);
  }
}

function checkPence(box: VatBox, value: number): void {
  if (!hasPencePrecisionOnly(value)) {
    throw new HmrcValidationError(`${box} must have at most two decimal places`, box);
  }
}
