import {
  hasPencePrecisionOnly,
  isValidPeriodKey,
  isValidVrn,
  validateVatSubmission,
} from '../src/utils/validators';
import { HmrcValidationError } from '../src/errors';
import { mockTestData, withoutField } from './testUtils';

describe('Validators Utils', () => {
  describe('isValidVrn', () => {
    test('should accept nine digits', () => {
      expect(isValidVrn('195036945')).toBe(true);
    });

    test('should reject other values', () => {
      expect(isValidVrn('19503694')).toBe(false);
      expect(isValidVrn('1950369450')).toBe(false);
      expect(isValidVrn('GB1950369')).toBe(false);
      expect(isValidVrn('')).toBe(false);
    });
  });

  describe('isValidPeriodKey', () => {
    test('should accept HMRC period keys', () => {
      expect(isValidPeriodKey('18A1')).toBe(true);
      expect(isValidPeriodKey('#001')).toBe(true);
      expect(isValidPeriodKey('A001')).toBe(true);
    });

    test('should reject malformed keys', () => {
      expect(isValidPeriodKey('18a1')).toBe(false);
      expect(isValidPeriodKey('18A12')).toBe(false);
      expect(isValidPeriodKey('18A')).toBe(false);
    });
  });

  describe('hasPencePrecisionOnly', () => {
    test('should allow up to two decimal places', () => {
      expect(hasPencePrecisionOnly(105.5)).toBe(true);
      expect(hasPencePrecisionOnly(-100.45)).toBe(true);
      expect(hasPencePrecisionOnly(0.1 + 0.2)).toBe(true);
      expect(hasPencePrecisionOnly(1.234)).toBe(false);
    });
  });

  describe('validateVatSubmission', () => {
    test('should accept a complete finalised return', () => {
      expect(() => validateVatSubmission(mockTestData.submission)).not.toThrow();
    });

    test('should require every box', () => {
      const incomplete = withoutField(mockTestData.submission, 'totalVatDue');

      expect(() => validateVatSubmission(incomplete)).toThrow('totalVatDue is required');
    });

    test('should report the offending field', () => {
      const { error } = capture(() => validateVatSubmission({ ...mockTestData.submission, vatDueSales: 1.234 }));

      expect(error).toBeInstanceOf(HmrcValidationError);
      expect(error?.message).toBe('vatDueSales must have at most two decimal places');
      expect(error?.field).toBe('vatDueSales');
    });

    test('should reject a negative net VAT due', () => {
      expect(() => validateVatSubmission({ ...mockTestData.submission, netVatDue: -1 })).toThrow(
        'netVatDue must be between 0 and 99999999999.99'
      );
    });

    test('should require whole pounds in boxes 6 to 9', () => {
      expect(() => validateVatSubmission({ ...mockTestData.submission, totalValueSalesExVAT: 300.5 })).toThrow(
        'totalValueSalesExVAT must be a whole number of pounds'
      );
    });

    test('should reject non-finite amounts', () => {
      expect(() => validateVatSubmission({ ...mockTestData.submission, vatDueAcquisitions: Number.NaN })).toThrow(
        'vatDueAcquisitions must be a finite number'
      );
    });

    test('should reject a malformed period key', () => {
      expect(() => validateVatSubmission({ ...mockTestData.submission, periodKey: '18a1' })).toThrow(
        'Period key must be four characters of A-Z, 0-9 or #'
      );
    });

    test('should require the return to be finalised', () => {
      expect(() => validateVatSubmission({ ...mockTestData.submission, finalised: false })).toThrow(
        'VAT return must be finalised before submission'
      );
    });
  });
});

function capture(fn: () => void): { error: HmrcValidationError | null } {
  try {
    fn();
  } catch (error) {
    if (error instanceof HmrcValidationError) {
      return { error };
    }
    throw error;
  }
  return { error: null };
}
