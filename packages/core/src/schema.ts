import type { LogFn } from "@selectable/shared/log";
import {
  type InferOutput,
  custom,
  integer,
  maxValue,
  minLength,
  minValue,
  number,
  object,
  optional,
  pipe,
  string,
} from "valibot";

/**
 * Accepts integers in `[0, length)`. For an empty sequence every index
 * fails.
 */
export const indexSchema = (length: number) =>
  pipe(
    number(),
    integer(),
    minValue(0),
    maxValue(length - 1),
  );

const logFnSchema = custom<LogFn>(
  (input) => typeof input === "function",
  "logFn must be a function",
);

export const initArgsSchema = object({
  logFn: optional(logFnSchema),
  logPath: optional(pipe(string(), minLength(1))),
});

export type InitArgs = InferOutput<
  typeof initArgsSchema
>;
