import { z } from 'zod';
import type {
  FraudPreventionFeedback,
  HelloMessage,
  HmrcErrorResponse,
  StoredToken,
  TestUser,
  TokenResponse,
  VatConfirmation,
  VatLiabilities,
  VatObligations,
  VatPayments,
  VatReturn,
} from './types';

// ── OAuth ──

const TokenFields = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().optional(),
  expires_in: z.number(),
  token_type: z.string(),
  scope: z.string().optional(),
});

export const TokenResponseSchema: z.ZodType<TokenResponse> = TokenFields;

export const StoredTokenSchema: z.ZodType<StoredToken> = TokenFields.extend({
  expires_at: z.number(),
});

// ── Errors ──

export const ErrorResponseSchema: z.ZodType<HmrcErrorResponse> = z.lazy(() =>
  z.object({
    code: z.string(),
    message: z.string(),
    path: z.string().optional(),
    errors: z.array(ErrorResponseSchema).optional(),
  })
);

// ── VAT ──

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

export const ObligationsResponseSchema: z.ZodType<VatObligations> = z.object({
  obligations: z.array(
    z.object({
      periodKey: z.string(),
      start: IsoDate,
      end: IsoDate,
      due: IsoDate,
      status: z.enum(['O', 'F']),
      received: IsoDate.optional(),
    })
  ),
});

export const VatReturnResponseSchema: z.ZodType<VatReturn> = z.object({
  periodKey: z.string(),
  vatDueSales: z.number(),
  vatDueAcquisitions: z.number(),
  totalVatDue: z.number(),
  vatReclaimedCurrPeriod: z.number(),
  netVatDue: z.number(),
  totalValueSalesExVAT: z.number(),
  totalValuePurchasesExVAT: z.number(),
  totalValueGoodsSuppliedExVAT: z.number(),
  totalAcquisitionsExVAT: z.number(),
});

export const ConfirmationResponseSchema: z.ZodType<VatConfirmation> = z.object({
  processingDate: z.string(),
  paymentIndicator: z.enum(['DD', 'BANK']).optional(),
  formBundleNumber: z.string().optional(),
  chargeRefNumber: z.string().optional(),
});

export const PaymentsResponseSchema: z.ZodType<VatPayments> = z.object({
  payments: z.array(
    z.object({
      amount: z.number(),
      received: IsoDate.optional(),
    })
  ),
});

export const LiabilitiesResponseSchema: z.ZodType<VatLiabilities> = z.object({
  liabilities: z.array(
    z.object({
      taxPeriod: z.object({ from: IsoDate, to: IsoDate }).optional(),
      type: z.string(),
      originalAmount: z.number(),
      outstandingAmount: z.number().optional(),
      due: IsoDate.optional(),
    })
  ),
});

// ── Hello World ──

export const HelloMessageSchema: z.ZodType<HelloMessage> = z.object({
  message: z.string(),
});

// ── Test users ──

const TestUserAddressSchema = z.object({
  line1: z.string(),
  line2: z.string(),
  postcode: z.string(),
});

export const TestUserSchema: z.ZodType<TestUser> = z.object({
  userId: z.string(),
  password: z.string(),
  userFullName: z.string(),
  emailAddress: z.string(),
  individualDetails: z
    .object({
      firstName: z.string(),
      lastName: z.string(),
      dateOfBirth: IsoDate,
      address: TestUserAddressSchema,
    })
    .optional(),
  organisationDetails: z
    .object({
      name: z.string(),
      address: TestUserAddressSchema,
    })
    .optional(),
  saUtr: z.string().optional(),
  nino: z.string().optional(),
  mtdItId: z.string().optional(),
  empRef: z.string().optional(),
  ctUtr: z.string().optional(),
  vrn: z.string().optional(),
  vatRegistrationDate: IsoDate.optional(),
  groupIdentifier: z.string().optional(),
});

// ── Fraud prevention ──

const FraudPreventionIssueSchema = z.object({
  code: z.string(),
  message: z.string(),
  headers: z.array(z.string()),
});

export const FraudPreventionFeedbackSchema: z.ZodType<FraudPreventionFeedback> = z.object({
  specVersion: z.string(),
  code: z.string(),
  message: z.string(),
  warnings: z.array(FraudPreventionIssueSchema).optional(),
  errors: z.array(FraudPreventionIssueSchema).optional(),
});
