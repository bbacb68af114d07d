import type { Alignment } from "../align/alignment";
import type {
  DiffClassification,
  DiffEntry,
  DiffValue,
  EntityKind,
  FieldCategory,
  Geometry,
  Inertial,
  Joint,
  Link,
  Quat,
  Shape,
} from "../model/types";
import { meshBasename, meshStem } from "../normalize/geometry";
import { tensorComponents } from "../normalize/inertia";
import { angularDistance } from "../normalize/orientation";

export type ToleranceMode = "absolute" | "relative";

export type MeshReferenceMode = "path" | "basename" | "stem";

export type DiffSettings = {
  toleranceLinear: number;
  toleranceAngular: number;
  toleranceMode: ToleranceMode;
  categories: ReadonlySet<FieldCategory>;
  meshReference: MeshReferenceMode;
};

type Emit = (fieldPath: string, valueA: DiffValue, valueB: DiffValue, classification?: DiffClassification) => void;

const MESH_REFERENCE: Record<MeshReferenceMode, (reference: string) => string> = {
  path: (reference) => reference,
  basename: meshBasename,
  stem: meshStem,
};

/** Field-by-field comparison of two aligned models. */
class FieldComparer {
  constructor(private settings: DiffSettings) {}

  scalarDiffers(a: number, b: number) {
    const { toleranceLinear: tol, toleranceMode } = this.settings;
    const bound = toleranceMode === "relative" ? tol * Math.max(Math.abs(a), Math.abs(b)) : tol;
    // NaN never compares equal, so a non-finite value always shows up.
    return !(Math.abs(a - b) <= bound) && a !== b;
  }

  vectorDiffers(a: readonly number[], b: readonly number[]) {
    return a.length !== b.length || a.some((value, i) => this.scalarDiffers(value, b[i]));
  }

  orientationDiffers(a: Quat, b: Quat) {
    return !(angularDistance(a, b) <= this.settings.toleranceAngular);
  }

  scalar(emit: Emit, fieldPath: string, a: number, b: number) {
    if (this.scalarDiffers(a, b)) emit(fieldPath, a, b);
  }

  vector(emit: Emit, fieldPath: string, a: readonly number[], b: readonly number[]) {
    if (this.vectorDiffers(a, b)) emit(fieldPath, [...a], [...b]);
  }

  orientation(emit: Emit, fieldPath: string, a: Quat, b: Quat) {
    if (this.orientationDiffers(a, b)) emit(fieldPath, [...a], [...b]);
  }

  exact(emit: Emit, fieldPath: string, a: string, b: string) {
    if (a !== b) emit(fieldPath, a, b);
  }

  joint(emit: Emit, a: Joint, b: Joint) {
    this.exact(emit, "kind", a.kind, b.kind);
    this.vector(emit, "origin.position", a.origin.position, b.origin.position);
    this.orientation(emit, "origin.orientation", a.origin.orientation, b.origin.orientation);
    if (a.axis && b.axis) this.vector(emit, "axis", a.axis, b.axis);
    else if (a.axis) emit("axis", [...a.axis], null, "removed_from_b");
    else if (b.axis) emit("axis", null, [...b.axis], "added_in_b");
  }

  inertial(emit: Emit, a: Inertial | undefined, b: Inertial | undefined) {
    if (!a && !b) return;
    if (!a || !b) {
      emit("inertial", a ? a.mass : null, b ? b.mass : null, a ? "removed_from_b" : "added_in_b");
      return;
    }
    this.scalar(emit, "inertial.mass", a.mass, b.mass);
    this.vector(emit, "inertial.center_of_mass", a.centerOfMass, b.centerOfMass);
    this.vector(emit, "inertial.inertia_tensor", tensorComponents(a.inertiaTensor), tensorComponents(b.inertiaTensor));
  }

  geometry(emit: Emit, prefix: string, a: Geometry, b: Geometry) {
    if (a.kind !== b.kind) {
      emit(`${prefix}.kind`, a.kind, b.kind);
      return;
    }
    switch (a.kind) {
      case "box":
        if (b.kind === "box") this.vector(emit, `${prefix}.size`, a.size, b.size);
        return;
      case "sphere":
        if (b.kind === "sphere") this.scalar(emit, `${prefix}.radius`, a.radius, b.radius);
        return;
      case "cylinder":
      case "capsule":
        if (b.kind === "cylinder" || b.kind === "capsule") {
          this.scalar(emit, `${prefix}.radius`, a.radius, b.radius);
          this.scalar(emit, `${prefix}.length`, a.length, b.length);
        }
        return;
      case "mesh":
        if (b.kind === "mesh") {
          const view = MESH_REFERENCE[this.settings.meshReference];
          this.exact(emit, `${prefix}.reference`, view(a.reference), view(b.reference));
          this.vector(emit, `${prefix}.scale`, a.scale, b.scale);
        }
        return;
    }
  }

  shapes(emit: Emit, list: "collisions" | "visuals", a: readonly Shape[], b: readonly Shape[]) {
    const count = Math.max(a.length, b.length);
    for (let i = 0; i < count; i += 1) {
      const prefix = `${list}.${i}`;
      const shapeA = a[i];
      const shapeB = b[i];
      if (!shapeA || !shapeB) {
        const kindA = shapeA ? shapeA.geometry.kind : null;
        const kindB = shapeB ? shapeB.geometry.kind : null;
        emit(prefix, kindA, kindB, shapeA ? "removed_from_b" : "added_in_b");
        continue;
      }
      this.vector(emit, `${prefix}.pose.position`, shapeA.pose.position, shapeB.pose.position);
      this.orientation(emit, `${prefix}.pose.orientation`, shapeA.pose.orientation, shapeB.pose.orientation);
      this.geometry(emit, `${prefix}.geometry`, shapeA.geometry, shapeB.geometry);
    }
  }
}

const KIND_ORDER: Record<EntityKind, number> = { link: 0, joint: 1 };

/** Compares dot-separated paths segment by segment, numbers by value. */
export function compareFieldPaths(a: string, b: string): number {
  const sa = a.split(".");
  const sb = b.split(".");
  for (let i = 0; i < Math.min(sa.length, sb.length); i += 1) {
    if (sa[i] === sb[i]) continue;
    const na = /^\d+$/.test(sa[i]) ? Number(sa[i]) : NaN;
    const nb = /^\d+$/.test(sb[i]) ? Number(sb[i]) : NaN;
    if (!Number.isNaN(na) && !Number.isNaN(nb)) return na - nb;
    return sa[i] < sb[i] ? -1 : 1;
  }
  return sa.length - sb.length;
}

export function compareEntries(a: DiffEntry, b: DiffEntry): number {
  if (a.entityKind !== b.entityKind) return KIND_ORDER[a.entityKind] - KIND_ORDER[b.entityKind];
  if (a.entityId !== b.entityId) return a.entityId < b.entityId ? -1 : 1;
  return compareFieldPaths(a.fieldPath, b.fieldPath);
}

const categoryOf = (fieldPath: string): FieldCategory => {
  if (fieldPath.startsWith("inertial")) return "inertial";
  if (fieldPath.startsWith("collisions")) return "collision";
  if (fieldPath.startsWith("visuals")) return "visual";
  return "kinematics";
};

/**
 * Every difference between two aligned models inside the selected field
 * categories, in a fixed order: links before joints, then by entity id, then
 * by field path.
 */
export function diffAligned(alignment: Alignment, settings: DiffSettings): DiffEntry[] {
  const entries: DiffEntry[] = [];
  const { categories } = settings;
  const comparer = new FieldComparer(settings);

  const emitter =
    (entityKind: EntityKind, entityId: string): Emit =>
    (fieldPath, valueA, valueB, classification = "mismatch") => {
      const category = categoryOf(fieldPath);
      if (!categories.has(category)) return;
      entries.push({ entityKind, entityId, fieldPath, category, valueA, valueB, classification });
    };

  const presence = (entityKind: EntityKind, names: readonly string[], side: "a" | "b") => {
    for (const name of names) {
      emitter(entityKind, name)("", side === "a" ? name : null, side === "b" ? name : null, side === "a" ? "removed_from_b" : "added_in_b");
    }
  };
  const names = (items: readonly (Link | Joint)[]) => items.map((item) => item.name);

  presence("link", names(alignment.removedLinks), "a");
  presence("link", names(alignment.addedLinks), "b");
  presence("joint", names(alignment.removedJoints), "a");
  presence("joint", names(alignment.addedJoints), "b");

  for (const { id, a, b } of alignment.structural) {
    emitter("joint", id)("topology", `${a.parentLink}->${a.childLink}`, `${b.parentLink}->${b.childLink}`, "unmatched_structure");
  }
  for (const { id, a, b } of alignment.joints) {
    comparer.joint(emitter("joint", id), a, b);
  }
  for (const { id, a, b } of alignment.links) {
    const emit = emitter("link", id);
    comparer.inertial(emit, a.inertial, b.inertial);
    comparer.shapes(emit, "collisions", a.collisions, b.collisions);
    comparer.shapes(emit, "visuals", a.visuals, b.visuals);
  }

  return entries.sort(compareEntries);
}
