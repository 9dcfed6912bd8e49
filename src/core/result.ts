export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

export const map = <T, U, E>(res: Result<T, E>, fn: (value: T) => U): Result<U, E> =>
  res.ok ? ok(fn(res.value)) : res;

export const mapError = <T, E, F>(res: Result<T, E>, fn: (error: E) => F): Result<T, F> =>
  res.ok ? res : err(fn(res.error));

export const andThen = <T, U, E>(
  res: Result<T, E>,
  fn: (value: T) => Result<U, E>,
): Result<U, E> => (res.ok ? fn(res.value) : res);

export const unwrapOr = <T, E>(res: Result<T, E>, fallback: T): T =>
  res.ok ? res.value : fallback;

// Stops at the first failure; later items are not visited.
export const collect = <T, U, E>(
  items: ReadonlyArray<T>,
  fn: (item: T, index: number) => Result<U, E>,
): Result<ReadonlyArray<U>, E> => {
  const values: U[] = [];
  for (let i = 0; i < items.length; i += 1) {
    const res = fn(items[i], i);
    if (!res.ok) return res;
    values.push(res.value);
  }
  return ok(values);
};
