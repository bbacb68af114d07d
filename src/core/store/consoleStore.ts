import { createStore } from "zustand/vanilla";
import { logMaxEntries } from "../services/config";

export type LogLevel = "info" | "warn" | "error" | "debug";

export type LogEntry = {
  id: string;
  time: number;
  level: LogLevel;
  message: string;
  scope?: string;
  data?: unknown;
};

export type LogFilter = {
  levels?: readonly LogLevel[];
  scope?: string;
};

type ConsoleState = {
  /** Newest last; trimmed from the front past `maxEntries`. */
  entries: LogEntry[];
  maxEntries: number;
  /** Entries ever pushed per level, including trimmed ones. */
  counts: Record<LogLevel, number>;
  push: (entry: LogEntry) => void;
  clear: () => void;
  setMaxEntries: (max: number) => void;
};

const zeroCounts = (): Record<LogLevel, number> => ({ info: 0, warn: 0, error: 0, debug: 0 });

const keepLast = (entries: LogEntry[], max: number) => (entries.length > max ? entries.slice(entries.length - max) : entries);

export const consoleStore = createStore<ConsoleState>((set) => ({
  entries: [],
  maxEntries: logMaxEntries,
  counts: zeroCounts(),
  push: (entry) =>
    set((state) => ({
      entries: keepLast([...state.entries, entry], state.maxEntries),
      counts: { ...state.counts, [entry.level]: state.counts[entry.level] + 1 },
    })),
  clear: () => set({ entries: [], counts: zeroCounts() }),
  setMaxEntries: (max) =>
    set((state) => {
      const maxEntries = Math.max(1, Math.floor(max));
      return { maxEntries, entries: keepLast(state.entries, maxEntries) };
    }),
}));

/** Retained entries matching every given criterion. */
export function selectEntries(filter: LogFilter = {}): LogEntry[] {
  return consoleStore
    .getState()
    .entries.filter(
      (entry) =>
        (!filter.levels || filter.levels.includes(entry.level)) && (filter.scope === undefined || entry.scope === filter.scope)
    );
}
