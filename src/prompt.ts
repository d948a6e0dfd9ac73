import { createInterface } from 'readline/promises';
import { AuthorizationPrompt, AuthorizationPromptRequest } from './types';
import { HmrcAuthenticationError } from './errors';
import { extractOAuthCode, extractOAuthError } from './utils/formEncoder';

/**
 * Terminal prompt for the out-of-band authorization flow
 *
 * Prints the authorization URL and waits for the user to paste the code
 * shown by HMRC once access has been granted. A full redirect URL is
 * accepted too; its `code` parameter is used, and an `error` parameter
 * rejects the prompt with {@link HmrcAuthenticationError}.
 */
export function createConsolePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): AuthorizationPrompt {
  return async ({ url }: AuthorizationPromptRequest): Promise<string> => {
    const rl = createInterface({ input, output });
    try {
      output.write(`Open the following page in a browser to grant access:\n\n  ${url}\n\n`);
      const answer = (await rl.question('Please enter the code obtained via the browser: ')).trim();

      const refused = extractOAuthError(answer);
      if (refused) {
        const detail = refused.error_description ? ` (${refused.error_description})` : '';
        throw new HmrcAuthenticationError(`Authorization was refused: ${refused.error}${detail}`);
      }

      return extractOAuthCode(answer) ?? answer;
    } finally {
      rl.close();
    }
  };
}

export const consolePrompt: AuthorizationPrompt = (request) => createConsolePrompt()(request);
