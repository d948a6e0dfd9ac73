import { withRetry } from '../src/utils/retry';

describe('withRetry', () => {
  test('should make a single attempt by default', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('boom'));

    await expect(withRetry(fn)).rejects.toThrow('boom');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('should return the first successful result', async () => {
    const fn = jest.fn().mockRejectedValueOnce(new Error('fail 1')).mockResolvedValueOnce('ok');

    const result = await withRetry(fn, { maxAttempts: 3, initialDelayMs: 1 });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  test('should throw the last error after exhausting attempts', async () => {
    const fn = jest
      .fn()
      .mockRejectedValueOnce(new Error('fail 1'))
      .mockRejectedValueOnce(new Error('fail 2'))
      .mockRejectedValueOnce(new Error('fail 3'));

    await expect(withRetry(fn, { maxAttempts: 3, initialDelayMs: 1 })).rejects.toThrow('fail 3');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  test('should stop when shouldRetry declines', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('permanent'));
    const shouldRetry = jest.fn().mockReturnValue(false);

    await expect(withRetry(fn, { maxAttempts: 3, initialDelayMs: 1, shouldRetry })).rejects.toThrow('permanent');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(shouldRetry).toHaveBeenCalledWith(expect.any(Error), 1);
  });

  test('should report each retry with a capped exponential delay', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('fail'));
    const onRetry = jest.fn();

    await expect(
      withRetry(fn, { maxAttempts: 4, initialDelayMs: 2, backoffMultiplier: 3, maxDelayMs: 10, onRetry })
    ).rejects.toThrow('fail');

    expect(onRetry.mock.calls.map(([, attempt, delay]) => [attempt, delay])).toEqual([
      [1, 2],
      [2, 6],
      [3, 10],
    ]);
  });

  test('should treat maxAttempts below one as a single attempt', async () => {
    const fn = jest.fn().mockResolvedValue('ok');

    await expect(withRetry(fn, { maxAttempts: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
