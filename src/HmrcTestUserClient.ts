import { TEST_USER_SERVICES, TestUser, TestUserService } from './types';
import { HmrcValidationError } from './errors';
import { CREATE_TEST_INDIVIDUAL_PATH, CREATE_TEST_ORGANISATION_PATH } from './constants';
import { TestUserSchema } from './schemas';
import { HmrcSession } from './HmrcSession';
import { parseJsonResponse } from './utils/jsonParser';

/**
 * Client for the sandbox Create Test User API
 *
 * Test users sign in on the sandbox authorization pages to grant access
 * to their (fictitious) tax records.
 *
 * @example
 * ```typescript
 * const testUsers = new HmrcTestUserClient(sandboxSession);
 * const user = await testUsers.createOrganisation(['mtd-vat']);
 * console.log(user.userId, user.password, user.vrn);
 * ```
 */
export class HmrcTestUserClient {
  private session: HmrcSession;

  /**
   * @throws {HmrcValidationError} If the session is not a sandbox session
   */
  constructor(session: HmrcSession) {
    if (!session.testMode) {
      throw new HmrcValidationError('Test users can only be created in the sandbox');
    }
    this.session = session;
  }

  public async createIndividual(services: TestUserService[] = []): Promise<TestUser> {
    return this.create(CREATE_TEST_INDIVIDUAL_PATH, services, 'individual test user');
  }

  public async createOrganisation(services: TestUserService[] = []): Promise<TestUser> {
    return this.create(CREATE_TEST_ORGANISATION_PATH, services, 'organisation test user');
  }

  private async create(path: string, services: TestUserService[], context: string): Promise<TestUser> {
    const known: readonly string[] = TEST_USER_SERVICES;
    const unknown = services.filter((service) => !known.includes(service));
    if (unknown.length) {
      throw new HmrcValidationError(`Unknown test user service: ${unknown.join(', ')}`, 'serviceNames');
    }

    const response = await this.session.request('POST', path, {
      auth: 'application',
      body: { serviceNames: services },
    });

    return parseJsonResponse(TestUserSchema, response.data, context);
  }
}
