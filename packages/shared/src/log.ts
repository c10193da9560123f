import { inspect } from "node:util";

export type Log = {
  dt: number;
  pid: number;
  level: string;
  scope: string;
  message: string;
};
export type LogFn = (log: Log) => void;

const formatDate = (date: Date) => {
  return date.toLocaleString("en-US", {
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  });
};

export const formatLog = (log: Log) =>
  `[${log.scope} ${formatDate(new Date(log.dt))}] ${log.level} ${log.message}`;

export const normalizeError = (
  error: unknown,
): Error =>
  error instanceof Error
    ? error
    : new Error(
        typeof error === "string"
          ? error
          : inspect(error, { depth: null }),
      );
