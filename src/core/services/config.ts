const readFlag = (value: string | undefined, fallback: boolean) =>
  String(value ?? String(fallback)).trim().toLowerCase() === "true";

const readNumber = (value: string | undefined, fallback: number) => {
  if (value === undefined || value.trim() === "") return fallback;
  const n = Number(value);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
};

export const logConsoleEnabled = readFlag(process.env.ROBOT_DIFF_LOG_CONSOLE, true);
export const logDebugEnabled = readFlag(process.env.ROBOT_DIFF_LOG_DEBUG, false);
export const logMaxEntries = Math.max(1, Math.floor(readNumber(process.env.ROBOT_DIFF_LOG_MAX_ENTRIES, 400)));

// Defaults for CompareOptions; a caller-supplied value always wins.
export const defaultToleranceLinear = readNumber(process.env.ROBOT_DIFF_TOLERANCE_LINEAR, 1e-6);
export const defaultToleranceAngular = readNumber(process.env.ROBOT_DIFF_TOLERANCE_ANGULAR, 1e-6);
