import type { ModelFormat } from "../model/types";
import { consoleStore, type LogEntry, type LogLevel } from "../store/consoleStore";
import { logConsoleEnabled, logDebugEnabled } from "./config";

export type LogScope = ModelFormat | "compare";

export type LogOptions = {
  scope?: LogScope;
  data?: unknown;
};

export type LogSink = (entry: LogEntry) => void;

export type ScopedLogger = Record<LogLevel, (message: string, data?: unknown) => void>;

let counter = 0;
const sinks: LogSink[] = [];

export function formatLogLine(entry: LogEntry) {
  const scope = entry.scope ? `[${entry.scope}] ` : "";
  return `[${entry.level}] ${scope}${entry.message}`;
}

function consoleSink(entry: LogEntry) {
  if (!logConsoleEnabled) return;
  if (entry.level === "debug" && !logDebugEnabled) return;
  // stderr only: stdout belongs to whoever renders the report.
  if (entry.data !== undefined) {
    console.error(formatLogLine(entry), entry.data);
  } else {
    console.error(formatLogLine(entry));
  }
}

addLogSink(consoleSink);
addLogSink((entry) => consoleStore.getState().push(entry));

/** Registers a sink for every later entry; the returned function removes it again. */
export function addLogSink(sink: LogSink) {
  sinks.push(sink);
  return () => {
    const index = sinks.indexOf(sink);
    if (index >= 0) sinks.splice(index, 1);
  };
}

export function log(level: LogLevel, message: string, options: LogOptions = {}) {
  const time = Date.now();
  const entry: LogEntry = { id: `${time}_${counter++}`, time, level, message, scope: options.scope, data: options.data };
  sinks.forEach((sink) => sink(entry));
}

export const logInfo = (message: string, options?: LogOptions) => log("info", message, options);

export const logWarn = (message: string, options?: LogOptions) => log("warn", message, options);

export const logError = (message: string, options?: LogOptions) => log("error", message, options);

export const logDebug = (message: string, options?: LogOptions) => log("debug", message, options);

/** Logger bound to one scope, for modules that only ever log under their own name. */
export function scopedLogger(scope: LogScope): ScopedLogger {
  return {
    info: (message, data) => log("info", message, { scope, data }),
    warn: (message, data) => log("warn", message, { scope, data }),
    error: (message, data) => log("error", message, { scope, data }),
    debug: (message, data) => log("debug", message, { scope, data }),
  };
}
