export type Result<T> = { data: T; error: null } | { data: null; error: Error };

/**
 * Run a function and capture its outcome as a `{ data, error }` pair.
 * Async functions yield a promise of the pair. Thrown non-Error values
 * are wrapped in an Error.
 */
export function tryCatch<T>(fn: () => Promise<T>): Promise<Result<T>>;
export function tryCatch<T>(fn: () => T): Result<T>;
export function tryCatch(fn: () => unknown): Result<unknown> | Promise<Result<unknown>> {
  let value: unknown;
  try {
    value = fn();
  } catch (error) {
    return { data: null, error: toError(error) };
  }

  // Promises made by another realm (e.g. Node internals under a vm) fail instanceof
  if (isPromiseLike(value)) {
    return Promise.resolve(value).then(
      (data: unknown): Result<unknown> => ({ data, error: null }),
      (error: unknown): Result<unknown> => ({ data: null, error: toError(error) })
    );
  }

  return { data: value, error: null };
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }

  // An Error from another realm: keep its name and fields such as `code`
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    const name = 'name' in error && typeof error.name === 'string' ? error.name : 'Error';
    return Object.assign(new Error(error.message), error, { name });
  }

  return new Error(String(error));
}
