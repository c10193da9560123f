import { createFileLogFn } from "@selectable/shared/debug";
import {
  type Log,
  type LogFn,
  normalizeError,
} from "@selectable/shared/log";
import type { Result } from "@selectable/shared/types";
import { uniqueId } from "lodash-es";
import { parse } from "valibot";
import * as sequence from "./SelectableSequence.js";
import { dump } from "./dump.js";
import {
  type InitArgs,
  initArgsSchema,
} from "./schema.js";

const consoleLogFn = (log: Log) => {
  console.log(log);
};

const catchError =
  <Args extends unknown[], R>(
    name: string,
    fn: (...args: Args) => R,
    logFn: LogFn,
  ) =>
  (...args: Args): R => {
    const callId = uniqueId("call_");
    try {
      return fn(...args);
    } catch (e) {
      logFn({
        dt: Date.now(),
        pid: process.pid,
        level: "error",
        scope: name,
        message: `${callId} ${name} failed: ${normalizeError(e).message}`,
      });
      throw e;
    }
  };

const warnOnFailure =
  <Args extends unknown[], T, E extends Error>(
    name: string,
    fn: (...args: Args) => Result<T, E>,
    logFn: LogFn,
  ) =>
  (...args: Args): Result<T, E> => {
    const result = fn(...args);
    if (!result.ok) {
      logFn({
        dt: Date.now(),
        pid: process.pid,
        level: "warn",
        scope: name,
        message: result.error.message,
      });
    }
    return result;
  };

/**
 * Builds the selectable sequence API with every operation reporting to a
 * log sink: failures of `select` and `selectWhere` at `warn`, thrown errors
 * (including those of caller callbacks) at `error` before being rethrown.
 */
export const init = (args: InitArgs = {}) => {
  const { logFn: givenLogFn, logPath } = parse(
    initArgsSchema,
    args,
  );
  const fileLogFn =
    givenLogFn === undefined && logPath !== undefined
      ? createFileLogFn(logPath)
      : null;
  const logFn: LogFn =
    givenLogFn ?? fileLogFn ?? consoleLogFn;

  return {
    logFn,
    flush: async () => {
      await fileLogFn?.flush();
    },
    empty: catchError("empty", sequence.empty, logFn),
    singleton: catchError(
      "singleton",
      sequence.singleton,
      logFn,
    ),
    fromSequence: catchError(
      "fromSequence",
      sequence.fromSequence,
      logFn,
    ),
    selected: catchError(
      "selected",
      sequence.selected,
      logFn,
    ),
    selectedIndex: catchError(
      "selectedIndex",
      sequence.selectedIndex,
      logFn,
    ),
    length: catchError("length", sequence.length, logFn),
    equals: catchError("equals", sequence.equals, logFn),
    toSequence: catchError(
      "toSequence",
      sequence.toSequence,
      logFn,
    ),
    flatten: catchError(
      "flatten",
      sequence.flatten,
      logFn,
    ),
    map: catchError("map", sequence.map, logFn),
    indexedMap: catchError(
      "indexedMap",
      sequence.indexedMap,
      logFn,
    ),
    updateSelected: catchError(
      "updateSelected",
      sequence.updateSelected,
      logFn,
    ),
    select: catchError(
      "select",
      warnOnFailure("select", sequence.select, logFn),
      logFn,
    ),
    selectOrThrow: catchError(
      "selectOrThrow",
      sequence.selectOrThrow,
      logFn,
    ),
    selectWhere: catchError(
      "selectWhere",
      warnOnFailure(
        "selectWhere",
        sequence.selectWhere,
        logFn,
      ),
      logFn,
    ),
    unselect: catchError(
      "unselect",
      sequence.unselect,
      logFn,
    ),
    dump: catchError("dump", dump, logFn),
  };
};

export type Module = ReturnType<typeof init>;
export type { InitArgs };
