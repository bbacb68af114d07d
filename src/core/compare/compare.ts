import { readFile } from "node:fs/promises";
import { alignModels } from "../align/alignment";
import { diffAligned } from "../diff/diffEngine";
import { detectFormat, getAdapter } from "../adapters/registry";
import type { ModelSource } from "../adapters/types";
import { loadUsdLayers } from "../adapters/usd/usdLayers";
import { ParseError, RobotDiffError } from "../model/errors";
import type { CanonicalModel, DiffReport, ModelFormat, ModelSummary } from "../model/types";
import { logWarn, scopedLogger } from "../services/logger";
import { type CompareOptions, type ResolvedOptions, resolveOptions } from "./options";

const logger = scopedLogger("compare");

export type CompareResult =
  | { status: "match"; report: DiffReport }
  | { status: "diff"; report: DiffReport }
  | { status: "error"; error: RobotDiffError };

const summarize = (model: CanonicalModel): ModelSummary => ({
  name: model.name,
  format: model.format,
  source: model.source,
  links: model.links.length,
  joints: model.joints.length,
});

/** Diff of two already parsed models. */
export function compareModels(a: CanonicalModel, b: CanonicalModel, options: ResolvedOptions): DiffReport {
  const alignment = alignModels(a, b, options.renames);
  return {
    modelA: summarize(a),
    modelB: summarize(b),
    entries: diffAligned(alignment, options),
    warnings: { a: a.warnings, b: b.warnings },
  };
}

function parseSide(side: "A" | "B", source: ModelSource, format: ModelFormat) {
  const model = getAdapter(format).parse(source);
  for (const warning of model.warnings) {
    logWarn(`Model ${side}: ${warning.reason}`, { scope: format, data: warning.location });
  }
  return model;
}

function toResult(report: DiffReport): CompareResult {
  return report.entries.length ? { status: "diff", report } : { status: "match", report };
}

function failed(error: unknown): CompareResult {
  // Only domain errors become a result; anything else is a bug and propagates.
  if (!(error instanceof RobotDiffError)) throw error;
  logger.error(`Comparison failed: ${error.message}`, { code: error.code });
  return { status: "error", error };
}

/** Compares two documents that are already in memory. */
export function compareSources(a: ModelSource, b: ModelSource, options: CompareOptions = {}): CompareResult {
  try {
    const formatA = detectFormat(a.path, options.formatA);
    const formatB = detectFormat(b.path, options.formatB);
    const resolved = resolveOptions(options, [formatA, formatB]);
    const modelA = parseSide("A", a, formatA);
    const modelB = parseSide("B", b, formatB);
    return toResult(compareModels(modelA, modelB, resolved));
  } catch (error) {
    return failed(error);
  }
}

async function readSource(file: string, format: ModelFormat): Promise<ModelSource> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError({ file, path: "/" }, `cannot read file: ${reason}`);
  }
  if (format !== "usd") return { path: file, text };
  return { path: file, text, layers: await loadUsdLayers(file, text) };
}

/** Reads, parses and compares two model files. */
export async function compare(pathA: string, pathB: string, options: CompareOptions = {}): Promise<CompareResult> {
  logger.info(`Compare: ${pathA} vs ${pathB}`);
  try {
    const formatA = detectFormat(pathA, options.formatA);
    const formatB = detectFormat(pathB, options.formatB);
    resolveOptions(options, [formatA, formatB]);
    const [a, b] = await Promise.all([readSource(pathA, formatA), readSource(pathB, formatB)]);
    const result = compareSources(a, b, { ...options, formatA, formatB });
    if (result.status !== "error") {
      logger.info(`Compare: ${result.report.entries.length} difference(s)`);
    }
    return result;
  } catch (error) {
    return failed(error);
  }
}

/** 0 when the models match, 1 when they differ, 2 when they could not be compared. */
export function exitCodeFor(result: CompareResult): 0 | 1 | 2 {
  switch (result.status) {
    case "match":
      return 0;
    case "diff":
      return 1;
    case "error":
      return 2;
  }
}
