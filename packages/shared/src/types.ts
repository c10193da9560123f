export type Option<T> =
  | { readonly some: true; readonly value: T }
  | { readonly some: false };

export type Result<T, E extends Error = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

const NONE: Option<never> = { some: false };

export const some = <T>(value: T): Option<T> => ({
  some: true,
  value,
});

export const none = <T = never>(): Option<T> =>
  NONE;

export const ok = <T>(
  value: T,
): Result<T, never> => ({ ok: true, value });

export const fail = <E extends Error>(
  error: E,
): Result<never, E> => ({ ok: false, error });

export const mapOption = <T, U>(
  option: Option<T>,
  fn: (value: T) => U,
): Option<U> =>
  option.some ? some(fn(option.value)) : none();
