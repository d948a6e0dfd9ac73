import {
  DateRange,
  ObligationStatus,
  ObligationsParams,
  VatCallOptions,
  VatConfirmation,
  VatLiabilities,
  VatObligations,
  VatPayments,
  VatReturn,
  VatSubmission,
} from './types';
import { HmrcValidationError } from './errors';
import {
  VAT_LIABILITIES_PATH,
  VAT_OBLIGATIONS_PATH,
  VAT_PAYMENTS_PATH,
  VAT_RETURNS_PATH,
  VAT_RETURN_PATH,
  VAT_SCOPES,
  expandPath,
} from './constants';
import {
  ConfirmationResponseSchema,
  LiabilitiesResponseSchema,
  ObligationsResponseSchema,
  PaymentsResponseSchema,
  VatReturnResponseSchema,
} from './schemas';
import { HmrcSession } from './HmrcSession';
import { formatDateRange } from './utils/dateUtils';
import { parseJsonResponse } from './utils/jsonParser';
import { isValidPeriodKey, isValidVrn, validateVatSubmission } from './utils/validators';

/**
 * Client for the VAT (MTD) API
 *
 * Every call is user-restricted and made on behalf of one VAT
 * registration number.
 *
 * @example
 * ```typescript
 * const vat = new HmrcVatClient(session, '123456789');
 *
 * const { obligations } = await vat.obligations({
 *   from: '2024-01-01',
 *   to: '2024-12-31',
 *   status: ObligationStatus.OPEN,
 * });
 *
 * const confirmation = await vat.submit({
 *   periodKey: obligations[0].periodKey,
 *   vatDueSales: 105.5,
 *   vatDueAcquisitions: -100.45,
 *   totalVatDue: 5.05,
 *   vatReclaimedCurrPeriod: 105.15,
 *   netVatDue: 100.1,
 *   totalValueSalesExVAT: 300,
 *   totalValuePurchasesExVAT: 300,
 *   totalValueGoodsSuppliedExVAT: 3000,
 *   totalAcquisitionsExVAT: 3000,
 *   finalised: true,
 * });
 * ```
 */
export class HmrcVatClient {
  public readonly vrn: string;
  private session: HmrcSession;

  /**
   * @param session Authorized (or authorizable) session
   * @param vrn Nine-digit VAT registration number
   * @throws {HmrcValidationError} If the VRN is malformed
   */
  constructor(session: HmrcSession, vrn: string) {
    if (!isValidVrn(vrn)) {
      throw new HmrcValidationError('VAT registration number must be nine digits', 'vrn');
    }

    this.session = session;
    this.vrn = vrn;
    this.session.extendScope(VAT_SCOPES);
  }

  // ==========================================================================
  // OBLIGATIONS
  // ==========================================================================

  /**
   * Retrieve VAT obligations
   *
   * Both ends of the date range are required unless filtering on open
   * obligations, which HMRC allows without dates.
   *
   * @throws {HmrcValidationError} If the dates or status are invalid
   */
  public async obligations(params: ObligationsParams = {}, options: VatCallOptions = {}): Promise<VatObligations> {
    const query = this.buildObligationsQuery(params);

    const response = await this.session.request('GET', this.path(VAT_OBLIGATIONS_PATH), {
      query,
      headers: this.scenarioHeaders(options),
    });

    return parseJsonResponse(ObligationsResponseSchema, response.data, 'obligations');
  }

  // ==========================================================================
  // RETURNS
  // ==========================================================================

  /**
   * Submit a VAT return for a period
   *
   * The return is validated locally first; nothing is sent if it is
   * incomplete or not finalised.
   *
   * @throws {HmrcValidationError} If the return is invalid
   * @throws {HmrcApiError} If HMRC refuses it, e.g. with `DUPLICATE_SUBMISSION`
   */
  public async submit(submission: VatSubmission, options: VatCallOptions = {}): Promise<VatConfirmation> {
    validateVatSubmission(submission);

    const response = await this.session.request('POST', this.path(VAT_RETURNS_PATH), {
      body: serializeSubmission(submission),
      headers: this.scenarioHeaders(options),
    });

    return parseJsonResponse(ConfirmationResponseSchema, response.data, 'submission confirmation');
  }

  /**
   * Retrieve a previously submitted VAT return
   *
   * @throws {HmrcValidationError} If the period key is malformed
   */
  public async retrieve(periodKey: string, options: VatCallOptions = {}): Promise<VatReturn> {
    if (typeof periodKey !== 'string' || !isValidPeriodKey(periodKey)) {
      throw new HmrcValidationError('Period key must be four characters of A-Z, 0-9 or #', 'periodKey');
    }

    const response = await this.session.request('GET', this.path(VAT_RETURN_PATH, { periodKey }), {
      headers: this.scenarioHeaders(options),
    });

    return parseJsonResponse(VatReturnResponseSchema, response.data, 'VAT return');
  }

  // ==========================================================================
  // PAYMENTS AND LIABILITIES
  // ==========================================================================

  /**
   * Retrieve payments received by HMRC in a date range
   */
  public async payments(range: DateRange, options: VatCallOptions = {}): Promise<VatPayments> {
    const response = await this.session.request('GET', this.path(VAT_PAYMENTS_PATH), {
      query: this.buildRangeQuery(range),
      headers: this.scenarioHeaders(options),
    });

    return parseJsonResponse(PaymentsResponseSchema, response.data, 'payments');
  }

  /**
   * Retrieve outstanding and settled liabilities in a date range
   */
  public async liabilities(range: DateRange, options: VatCallOptions = {}): Promise<VatLiabilities> {
    const response = await this.session.request('GET', this.path(VAT_LIABILITIES_PATH), {
      query: this.buildRangeQuery(range),
      headers: this.scenarioHeaders(options),
    });

    return parseJsonResponse(LiabilitiesResponseSchema, response.data, 'liabilities');
  }

  // ==========================================================================
  // PRIVATE METHODS
  // ==========================================================================

  private path(template: string, params: Record<string, string> = {}): string {
    return expandPath(template, { vrn: this.vrn, ...params });
  }

  private buildObligationsQuery(params: ObligationsParams): Record<string, string | undefined> {
    const statuses: string[] = Object.values(ObligationStatus);
    if (params.status !== undefined && !statuses.includes(params.status)) {
      throw new HmrcValidationError(`Obligation status must be one of: ${statuses.join(', ')}`, 'status');
    }

    if (params.from === undefined && params.to === undefined) {
      if (params.status !== ObligationStatus.OPEN) {
        throw new HmrcValidationError('A date range is required unless retrieving open obligations', 'from');
      }
      return { status: params.status };
    }

    if (params.from === undefined || params.to === undefined) {
      throw new HmrcValidationError('Both ends of the date range are required', params.from === undefined ? 'from' : 'to');
    }

    return { ...formatDateRange(params.from, params.to), status: params.status };
  }

  private buildRangeQuery(range: DateRange): Record<string, string> {
    if (!range || range.from === undefined || range.to === undefined) {
      throw new HmrcValidationError('A date range is required', 'from');
    }
    return formatDateRange(range.from, range.to);
  }

  private scenarioHeaders(options: VatCallOptions): Record<string, string> {
    if (!options.testScenario) {
      return {};
    }
    if (!this.session.testMode) {
      throw new HmrcValidationError('Test scenarios are only available in the sandbox', 'testScenario');
    }
    return { 'Gov-Test-Scenario': options.testScenario };
  }
}

/**
 * Body of a return submission, with fields in HMRC's documented order
 */
export function serializeSubmission(submission: VatSubmission): VatSubmission {
  return {
    periodKey: submission.periodKey,
    vatDueSales: submission.vatDueSales,
    vatDueAcquisitions: submission.vatDueAcquisitions,
    totalVatDue: submission.totalVatDue,
    vatReclaimedCurrPeriod: submission.vatReclaimedCurrPeriod,
    netVatDue: submission.netVatDue,
    totalValueSalesExVAT: submission.totalValueSalesExVAT,
    totalValuePurchasesExVAT: submission.totalValuePurchasesExVAT,
    totalValueGoodsSuppliedExVAT: submission.totalValueGoodsSuppliedExVAT,
    totalAcquisitionsExVAT: submission.totalAcquisitionsExVAT,
    finalised: submission.finalised,
  };
}
