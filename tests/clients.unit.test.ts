import { HmrcHelloClient } from '../src/HmrcHelloClient';
import { HmrcTestUserClient } from '../src/HmrcTestUserClient';
import { HmrcFraudPreventionClient } from '../src/HmrcFraudPreventionClient';
import { HmrcSession } from '../src/HmrcSession';
import { MemoryTokenStorage } from '../src/tokenStorage';
import { HmrcValidationError } from '../src/errors';
import { TestUserService } from '../src/types';
import { jsonResponse, mockTestData, recordedCall, validToken } from './testUtils';

const fetchMock = jest.fn();
global.fetch = fetchMock;

const BASE_URL = 'https://test-api.service.hmrc.gov.uk';
const APPLICATION_TOKEN = { access_token: 'app-token', expires_in: 14400, token_type: 'bearer' };

function createSession(testMode = true): HmrcSession {
  return new HmrcSession({
    clientId: mockTestData.clientId,
    clientSecret: mockTestData.clientSecret,
    testMode,
    baseUrl: BASE_URL,
    storage: new MemoryTokenStorage(validToken()),
  });
}

describe('HmrcHelloClient', () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  test('should call hello world without credentials', async () => {
    const hello = new HmrcHelloClient(createSession());
    fetchMock.mockResolvedValue(jsonResponse({ message: 'Hello World' }));

    await expect(hello.world()).resolves.toEqual({ message: 'Hello World' });

    const call = recordedCall(fetchMock, 0);
    expect(call.url).toBe(`${BASE_URL}/hello/world`);
    expect(call.headers.Authorization).toBeUndefined();
  });

  test('should call hello application with an application token', async () => {
    const hello = new HmrcHelloClient(createSession());
    fetchMock
      .mockResolvedValueOnce(jsonResponse(APPLICATION_TOKEN))
      .mockResolvedValueOnce(jsonResponse({ message: 'Hello Application' }));

    await expect(hello.application()).resolves.toEqual({ message: 'Hello Application' });

    expect(recordedCall(fetchMock, 1).url).toBe(`${BASE_URL}/hello/application`);
    expect(recordedCall(fetchMock, 1).headers.Authorization).toBe('Bearer app-token');
  });

  test('should call hello user with the user token', async () => {
    const session = createSession();
    const hello = new HmrcHelloClient(session);
    expect(session.scope).toEqual(['hello']);
    fetchMock.mockResolvedValue(jsonResponse({ message: 'Hello User' }));

    await expect(hello.user()).resolves.toEqual({ message: 'Hello User' });

    expect(recordedCall(fetchMock, 0).headers.Authorization).toBe('Bearer test-access-token');
  });
});

describe('HmrcTestUserClient', () => {
  const organisation = {
    userId: '085603622877',
    password: 'test-password',
    userFullName: 'Ida Newton',
    emailAddress: 'ida.newton@example.com',
    organisationDetails: {
      name: 'Company ABF123',
      address: { line1: '1 Test Street', line2: 'Testtown', postcode: 'TS1 1PA' },
    },
    vrn: '666119668',
    vatRegistrationDate: '2001-11-02',
  };

  beforeEach(() => {
    fetchMock.mockReset();
  });

  test('should only work in the sandbox', () => {
    expect(() => new HmrcTestUserClient(createSession(false))).toThrow(
      'Test users can only be created in the sandbox'
    );
  });

  test('should create an organisation with the requested services', async () => {
    const testUsers = new HmrcTestUserClient(createSession());
    fetchMock
      .mockResolvedValueOnce(jsonResponse(APPLICATION_TOKEN))
      .mockResolvedValueOnce(jsonResponse(organisation, 201, 'Created'));

    const user = await testUsers.createOrganisation(['mtd-vat']);

    const call = recordedCall(fetchMock, 1);
    expect(call.method).toBe('POST');
    expect(call.url).toBe(`${BASE_URL}/create-test-user/organisations`);
    expect(call.body).toBe('{"serviceNames":["mtd-vat"]}');
    expect(call.headers.Authorization).toBe('Bearer app-token');
    expect(user.vrn).toBe('666119668');
  });

  test('should create an individual', async () => {
    const testUsers = new HmrcTestUserClient(createSession());
    const individual = {
      userId: '945350439195',
      password: 'test-password',
      userFullName: 'Adrian Adams',
      emailAddress: 'adrian.adams@example.com',
      individualDetails: {
        firstName: 'Adrian',
        lastName: 'Adams',
        dateOfBirth: '1974-12-25',
        address: { line1: '2 Test Road', line2: 'Testville', postcode: 'TS2 2PB' },
      },
      nino: 'PE938808A',
    };
    fetchMock
      .mockResolvedValueOnce(jsonResponse(APPLICATION_TOKEN))
      .mockResolvedValueOnce(jsonResponse(individual, 201, 'Created'));

    await expect(testUsers.createIndividual()).resolves.toEqual(individual);
    expect(recordedCall(fetchMock, 1).url).toBe(`${BASE_URL}/create-test-user/individuals`);
    expect(recordedCall(fetchMock, 1).body).toBe('{"serviceNames":[]}');
  });

  test('should reject unknown services without calling HMRC', async () => {
    const testUsers = new HmrcTestUserClient(createSession());
    const services: TestUserService[] = JSON.parse('["mtd-vat","not-a-service"]');

    const error = await testUsers.createOrganisation(services).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HmrcValidationError);
    expect(error).toMatchObject({ message: 'Unknown test user service: not-a-service' });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('HmrcFraudPreventionClient', () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  test('should return the header assessment', async () => {
    const feedback = {
      specVersion: '3.1',
      code: 'POTENTIALLY_INVALID_HEADERS',
      message: 'At least 1 header is potentially invalid',
      warnings: [
        {
          code: 'POTENTIALLY_INVALID_HEADER',
          message: 'Value is a placeholder',
          headers: ['gov-client-screens'],
        },
      ],
    };
    fetchMock
      .mockResolvedValueOnce(jsonResponse(APPLICATION_TOKEN))
      .mockResolvedValueOnce(jsonResponse(feedback));

    const result = await new HmrcFraudPreventionClient(createSession()).validate();

    const call = recordedCall(fetchMock, 1);
    expect(call.method).toBe('GET');
    expect(call.url).toBe(`${BASE_URL}/test/fraud-prevention-headers/validate`);
    expect(call.headers['Gov-Client-Connection-Method']).toBe('DESKTOP_APP_DIRECT');
    expect(result).toEqual(feedback);
  });
});
