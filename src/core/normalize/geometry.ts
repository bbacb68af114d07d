import type { Geometry, Quat, Vec3 } from "../model/types";
import { IDENTITY_QUAT, canonicalQuat } from "./orientation";

export type ShapeAxis = "X" | "Y" | "Z";

export const fullExtentsFromHalf = (half: Vec3): Vec3 => [2 * half[0], 2 * half[1], 2 * half[2]];

export const fullLengthFromHalf = (halfLength: number) => 2 * halfLength;

export const scaleVec = (v: Vec3, k: number): Vec3 => [v[0] * k, v[1] * k, v[2] * k];

export const multiplyVec = (a: Vec3, b: Vec3): Vec3 => [a[0] * b[0], a[1] * b[1], a[2] * b[2]];

const SQRT1_2 = Math.SQRT1_2;

/**
 * Rotation that carries the canonical shape axis (+Z) onto a format's declared
 * shape axis. Composed after the shape pose, it re-expresses an X- or Y-aligned
 * cylinder as a Z-aligned one.
 */
export function shapeAxisRotation(axis: ShapeAxis): Quat {
  if (axis === "X") return canonicalQuat(SQRT1_2, 0, SQRT1_2, 0) ?? IDENTITY_QUAT;
  if (axis === "Y") return canonicalQuat(SQRT1_2, -SQRT1_2, 0, 0) ?? IDENTITY_QUAT;
  return IDENTITY_QUAT;
}

const axisIndex = (axis: ShapeAxis) => (axis === "X" ? 0 : axis === "Y" ? 1 : 2);

/**
 * Folds a per-axis scale into primitive dimensions. Round cross-sections take
 * the larger of their two radial scales; meshes keep the scale as data.
 */
export function applyScale(geometry: Geometry, scale: Vec3, axis: ShapeAxis = "Z"): Geometry {
  switch (geometry.kind) {
    case "box":
      return { kind: "box", size: multiplyVec(geometry.size, scale) };
    case "sphere":
      return { kind: "sphere", radius: geometry.radius * Math.max(...scale) };
    case "cylinder":
    case "capsule": {
      const along = axisIndex(axis);
      const radial = scale.filter((_, i) => i !== along);
      return {
        kind: geometry.kind,
        radius: geometry.radius * Math.max(...radial),
        length: geometry.length * scale[along],
      };
    }
    case "mesh":
      return { kind: "mesh", reference: geometry.reference, scale: multiplyVec(geometry.scale, scale) };
  }
}

/** Converts every length of a geometry by `metersPerUnit`; mesh scale is unitless. */
export function convertGeometryUnits(geometry: Geometry, metersPerUnit: number): Geometry {
  if (metersPerUnit === 1) return geometry;
  switch (geometry.kind) {
    case "box":
      return { kind: "box", size: scaleVec(geometry.size, metersPerUnit) };
    case "sphere":
      return { kind: "sphere", radius: geometry.radius * metersPerUnit };
    case "cylinder":
    case "capsule":
      return { kind: geometry.kind, radius: geometry.radius * metersPerUnit, length: geometry.length * metersPerUnit };
    case "mesh":
      return geometry;
  }
}

/** Strips scheme and package prefixes and normalizes separators. */
export function normalizeMeshReference(raw: string): string {
  let ref = raw.trim().replace(/\\/g, "/");
  const scheme = ref.match(/^([a-z][a-z0-9+.-]*):\/\//i)?.[1]?.toLowerCase();
  if (scheme) {
    ref = ref.slice(scheme.length + 3);
    // package://<pkg>/path and model://<model>/path name a package root first.
    if (scheme === "package" || scheme === "model") ref = ref.split("/").slice(1).join("/");
  }
  const parts: string[] = [];
  for (const part of ref.split("/")) {
    if (!part || part === ".") continue;
    if (part === ".." && parts.length && parts[parts.length - 1] !== "..") parts.pop();
    else parts.push(part);
  }
  return parts.join("/");
}

export const meshBasename = (reference: string) => reference.slice(reference.lastIndexOf("/") + 1);

export const meshStem = (reference: string) => {
  const base = meshBasename(reference);
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(0, dot) : base;
};
