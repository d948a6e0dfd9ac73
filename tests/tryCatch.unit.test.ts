import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import vm from 'vm';
import { tryCatch } from '../src/tryCatch';

describe('tryCatch', () => {
  test('should return the value of a synchronous function', () => {
    expect(tryCatch(() => 42)).toEqual({ data: 42, error: null });
  });

  test('should capture a synchronous throw', () => {
    const { data, error } = tryCatch((): number => {
      throw new Error('boom');
    });

    expect(data).toBeNull();
    expect(error?.message).toBe('boom');
  });

  test('should wrap values that are not errors', () => {
    const { error } = tryCatch((): number => {
      throw 'plain string';
    });

    expect(error).toBeInstanceOf(Error);
    expect(error?.message).toBe('plain string');
  });

  test('should await promises created by Node itself', async () => {
    const file = path.join(os.tmpdir(), `hmrc-missing-${process.pid}-${Date.now()}.json`);

    const { data, error } = await tryCatch(() => fs.readFile(file, 'utf8'));

    expect(data).toBeNull();
    expect(error).toBeInstanceOf(Error);
    expect(error).toMatchObject({ code: 'ENOENT' });
  });

  test('should await promises from another context', async () => {
    const foreign: Promise<string> = vm.runInNewContext('Promise.resolve("from elsewhere")');

    const result = await tryCatch(() => foreign);

    expect(result).toEqual({ data: 'from elsewhere', error: null });
  });

  test('should keep name and fields of errors from another context', async () => {
    const foreign: Promise<never> = vm.runInNewContext(
      'Promise.reject(Object.assign(new TypeError("bad input"), { code: "E_BAD" }))'
    );

    const { error } = await tryCatch(() => foreign);

    expect(error).toBeInstanceOf(Error);
    expect(error).toMatchObject({ name: 'TypeError', message: 'bad input', code: 'E_BAD' });
  });
});
