import fs from "node:fs/promises";
import {
  type Log,
  type LogFn,
  formatLog,
  normalizeError,
} from "./log.js";

export type FileLogFn = LogFn & {
  /**
   * Resolves once every line queued so far is on disk.
   * Rejects with the first write failure, if any.
   */
  flush: () => Promise<void>;
};

export const createFileLogFn = (
  path: string,
): FileLogFn => {
  let failure: Error | null = null;
  // to make sure that the log is written in order
  let lastMessagePromise: Promise<void> =
    Promise.resolve();

  const logFn = (log: Log) => {
    lastMessagePromise = lastMessagePromise
      .then(() =>
        fs.appendFile(path, `${formatLog(log)}\n`),
      )
      .catch((error: unknown) => {
        failure ??= normalizeError(error);
      });
  };

  const flush = async () => {
    await lastMessagePromise;
    if (failure) {
      throw failure;
    }
  };

  return Object.assign(logFn, { flush });
};
