import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { DEFAULT_TOKEN_FILE } from './constants';
import { HmrcSdkError } from './errors';
import { StoredTokenSchema } from './schemas';
import { StoredToken } from './types';
import { tryCatch } from './tryCatch';

/**
 * Token storage interface - implement this for your storage backend
 */
export interface TokenStorage {
  /** Get the stored token, or null when there is none */
  load(): Promise<StoredToken | null>;
  /** Store a token, replacing any previous one */
  save(token: StoredToken): Promise<void>;
  /** Forget the stored token */
  delete(): Promise<void>;
}

/**
 * Keeps the token for the lifetime of the process only
 */
export class MemoryTokenStorage implements TokenStorage {
  private token: StoredToken | null;

  constructor(token?: StoredToken) {
    this.token = token ?? null;
  }

  async load(): Promise<StoredToken | null> {
    return this.token;
  }

  async save(token: StoredToken): Promise<void> {
    this.token = token;
  }

  async delete(): Promise<void> {
    this.token = null;
  }
}

/**
 * Stores the token as JSON in a local file readable only by its owner
 *
 * @example
 * ```typescript
 * const storage = new FileTokenStorage(); // ~/.hmrc.token
 * const session = new HmrcSession({ clientId, storage, prompt });
 * ```
 */
export class FileTokenStorage implements TokenStorage {
  public readonly path: string;

  constructor(filePath?: string) {
    this.path = filePath ?? path.join(os.homedir(), DEFAULT_TOKEN_FILE);
  }

  async load(): Promise<StoredToken | null> {
    const { data: content, error } = await tryCatch(() => fs.readFile(this.path, 'utf8'));

    if (error !== null) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw new HmrcSdkError(`Could not read token file ${this.path}: ${error.message}`);
    }

    if (!content.trim()) {
      return null;
    }

    const { data: json, error: parseError } = tryCatch((): unknown => JSON.parse(content));
    if (parseError !== null) {
      throw new HmrcSdkError(`Token file ${this.path} is not valid JSON`);
    }

    // An emptied store is written as {}
    if (isEmptyObject(json)) {
      return null;
    }

    const result = StoredTokenSchema.safeParse(json);
    if (!result.success) {
      throw new HmrcSdkError(`Token file ${this.path} does not contain a token`);
    }

    return result.data;
  }

  async save(token: StoredToken): Promise<void> {
    await fs.writeFile(this.path, JSON.stringify(token), { encoding: 'utf8', mode: 0o600 });
  }

  async delete(): Promise<void> {
    await fs.writeFile(this.path, '{}', { encoding: 'utf8', mode: 0o600 });
  }
}

function isMissingFileError(error: Error): boolean {
  return 'code' in error && error.code === 'ENOENT';
}

function isEmptyObject(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && Object.keys(value).length === 0;
}
