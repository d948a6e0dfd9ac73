import { FraudPreventionFeedback } from './types';
import { FRAUD_PREVENTION_VALIDATE_PATH } from './constants';
import { FraudPreventionFeedbackSchema } from './schemas';
import { HmrcSession } from './HmrcSession';
import { parseJsonResponse } from './utils/jsonParser';

/**
 * Client for the Test Fraud Prevention Headers API
 *
 * Sends a request carrying the session's fraud prevention headers and
 * returns HMRC's assessment of them.
 */
export class HmrcFraudPreventionClient {
  constructor(private session: HmrcSession) {}

  public async validate(): Promise<FraudPreventionFeedback> {
    const response = await this.session.request('GET', FRAUD_PREVENTION_VALIDATE_PATH, { auth: 'application' });
    return parseJsonResponse(FraudPreventionFeedbackSchema, response.data, 'fraud prevention feedback');
  }
}
