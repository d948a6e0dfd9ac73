import { HelloMessage } from './types';
import { HELLO_APPLICATION_PATH, HELLO_SCOPES, HELLO_USER_PATH, HELLO_WORLD_PATH } from './constants';
import { HelloMessageSchema } from './schemas';
import { HmrcSession } from './HmrcSession';
import { parseJsonResponse } from './utils/jsonParser';

/**
 * Client for the Hello World API, one endpoint per access level.
 * Useful for checking credentials end to end.
 */
export class HmrcHelloClient {
  constructor(private session: HmrcSession) {
    this.session.extendScope(HELLO_SCOPES);
  }

  /** Open access */
  public async world(): Promise<HelloMessage> {
    const response = await this.session.request('GET', HELLO_WORLD_PATH, { auth: 'none' });
    return parseJsonResponse(HelloMessageSchema, response.data, 'hello world');
  }

  /** Application-restricted */
  public async application(): Promise<HelloMessage> {
    const response = await this.session.request('GET', HELLO_APPLICATION_PATH, { auth: 'application' });
    return parseJsonResponse(HelloMessageSchema, response.data, 'hello application');
  }

  /** User-restricted */
  public async user(): Promise<HelloMessage> {
    const response = await this.session.request('GET', HELLO_USER_PATH, { auth: 'user' });
    return parseJsonResponse(HelloMessageSchema, response.data, 'hello user');
  }
}
