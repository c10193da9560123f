/**
 * Throws `error`, wrapping a bare message in an `Error`. Typed `never` so it
 * can end an expression: `value ?? raise("missing value")`.
 */
export const raise = (error: Error | string): never => {
  throw typeof error === "string"
    ? new Error(error)
    : error;
};
