import type { Renames } from "../align/alignment";
import type { DiffSettings, MeshReferenceMode, ToleranceMode } from "../diff/diffEngine";
import { getAdapter } from "../adapters/registry";
import { ComparisonScopeError } from "../model/errors";
import { FIELD_CATEGORIES, type FieldCategory, type ModelFormat } from "../model/types";
import { defaultToleranceAngular, defaultToleranceLinear } from "../services/config";

export type CompareOptions = {
  toleranceLinear?: number;
  /** Radians. */
  toleranceAngular?: number;
  toleranceMode?: ToleranceMode;
  includeVisual?: boolean;
  fields?: readonly string[];
  formatA?: string;
  formatB?: string;
  renames?: Renames;
  meshReference?: MeshReferenceMode;
};

export type ResolvedOptions = DiffSettings & { renames: Renames };

const DEFAULT_FIELDS: readonly FieldCategory[] = ["kinematics", "inertial", "collision"];

export const isFieldCategory = (value: string): value is FieldCategory =>
  FIELD_CATEGORIES.some((category) => category === value);

function tolerance(name: string, value: number | undefined, fallback: number) {
  const tol = value ?? fallback;
  if (!Number.isFinite(tol) || tol < 0) {
    throw new ComparisonScopeError(name, `tolerance must be a finite, non-negative number, got ${tol}`);
  }
  return tol;
}

function checkRenames(kind: string, map: Readonly<Record<string, string>> | undefined) {
  const targets = new Set<string>();
  for (const target of Object.values(map ?? {})) {
    if (targets.has(target)) {
      throw new ComparisonScopeError(`renames.${kind}`, `more than one ${kind.slice(0, -1)} is renamed to '${target}'`);
    }
    targets.add(target);
  }
}

/** Field categories in scope; every one must be something both formats can carry. */
export function resolveCategories(options: CompareOptions, formats: readonly ModelFormat[]): Set<FieldCategory> {
  const categories = new Set<FieldCategory>();
  if (options.fields) {
    if (!options.fields.length) throw new ComparisonScopeError("", "no field category selected");
    for (const field of options.fields) {
      if (!isFieldCategory(field)) {
        throw new ComparisonScopeError(field, `unknown field category; expected one of ${FIELD_CATEGORIES.join(", ")}`);
      }
      categories.add(field);
    }
  } else {
    DEFAULT_FIELDS.forEach((category) => categories.add(category));
  }
  if (options.includeVisual) categories.add("visual");

  for (const format of formats) {
    const adapter = getAdapter(format);
    for (const category of categories) {
      if (!adapter.categories.has(category)) {
        throw new ComparisonScopeError(category, `the ${format} adapter cannot populate this category`, format);
      }
    }
  }
  return categories;
}

export function resolveOptions(options: CompareOptions, formats: readonly ModelFormat[]): ResolvedOptions {
  checkRenames("links", options.renames?.links);
  checkRenames("joints", options.renames?.joints);
  return {
    toleranceLinear: tolerance("toleranceLinear", options.toleranceLinear, defaultToleranceLinear),
    toleranceAngular: tolerance("toleranceAngular", options.toleranceAngular, defaultToleranceAngular),
    toleranceMode: options.toleranceMode ?? "absolute",
    categories: resolveCategories(options, formats),
    meshReference: options.meshReference ?? "path",
    renames: options.renames ?? {},
  };
}
