export type Awaitable<T = void> = T | Promise<T>;

export function isPromiseLike<T>(value: T | PromiseLike<T>): value is PromiseLike<T> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
