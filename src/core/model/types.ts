export type Vec3 = readonly [number, number, number];

/** Unit quaternion in `[w, x, y, z]` order, always with `w >= 0` once canonical. */
export type Quat = readonly [number, number, number, number];

export type Pose = {
  readonly position: Vec3;
  readonly orientation: Quat;
};

export type ModelFormat = "urdf" | "sdf" | "mjcf" | "usd";

export const MODEL_FORMATS: readonly ModelFormat[] = ["urdf", "sdf", "mjcf", "usd"];

/**
 * Where an entity came from. `path` is an element path for the XML formats
 * (`/robot/link[2]/collision[1]`) and a prim path for USD.
 */
export type SourceLocation = {
  readonly file: string;
  readonly path: string;
  readonly line?: number;
};

export type Geometry =
  | { readonly kind: "box"; readonly size: Vec3 }
  | { readonly kind: "sphere"; readonly radius: number }
  | { readonly kind: "cylinder"; readonly radius: number; readonly length: number }
  | { readonly kind: "capsule"; readonly radius: number; readonly length: number }
  | { readonly kind: "mesh"; readonly reference: string; readonly scale: Vec3 };

export type GeometryKind = Geometry["kind"];

export type Shape = {
  readonly name?: string;
  readonly pose: Pose;
  readonly geometry: Geometry;
  readonly location: SourceLocation;
};

export type InertiaTensor = {
  readonly ixx: number;
  readonly ixy: number;
  readonly ixz: number;
  readonly iyy: number;
  readonly iyz: number;
  readonly izz: number;
};

export type Inertial = {
  readonly mass: number;
  readonly centerOfMass: Vec3;
  /** Expressed in the link frame, about the center of mass. */
  readonly inertiaTensor: InertiaTensor;
};

export type Link = {
  readonly name: string;
  readonly inertial?: Inertial;
  readonly collisions: readonly Shape[];
  readonly visuals: readonly Shape[];
  readonly location: SourceLocation;
};

export type JointKind = "fixed" | "revolute" | "continuous" | "prismatic" | "planar" | "floating";

export const AXIS_JOINT_KINDS: ReadonlySet<JointKind> = new Set(["revolute", "continuous", "prismatic", "planar"]);

/** Ball joints map to `continuous` but turn about every axis; all formats give them this one. */
export const BALL_JOINT_AXIS: Vec3 = [0, 0, 1];

export type Joint = {
  readonly name: string;
  readonly kind: JointKind;
  readonly parentLink: string;
  readonly childLink: string;
  /** Child link frame relative to the parent link frame. */
  readonly origin: Pose;
  /** Unit vector in the child link frame; only for kinds in AXIS_JOINT_KINDS. */
  readonly axis?: Vec3;
  readonly location: SourceLocation;
};

export type CanonicalModel = {
  readonly name: string;
  readonly format: ModelFormat;
  readonly source: string;
  readonly rootLink: string;
  readonly links: readonly Link[];
  readonly joints: readonly Joint[];
  readonly warnings: readonly ModelWarning[];
};

/** Serializable view of an UnsupportedElementError attached to a model. */
export type ModelWarning = {
  readonly element: string;
  readonly reason: string;
  readonly location: SourceLocation;
};

export type FieldCategory = "kinematics" | "inertial" | "collision" | "visual";

export const FIELD_CATEGORIES: readonly FieldCategory[] = ["kinematics", "inertial", "collision", "visual"];

export type EntityKind = "link" | "joint";

export type DiffClassification = "mismatch" | "added_in_b" | "removed_from_b" | "unmatched_structure";

export type DiffValue = number | string | readonly number[] | null;

export type DiffEntry = {
  readonly entityKind: EntityKind;
  readonly entityId: string;
  readonly fieldPath: string;
  readonly category: FieldCategory;
  readonly valueA: DiffValue;
  readonly valueB: DiffValue;
  readonly classification: DiffClassification;
};

export type ModelSummary = {
  readonly name: string;
  readonly format: ModelFormat;
  readonly source: string;
  readonly links: number;
  readonly joints: number;
};

export type DiffReport = {
  readonly modelA: ModelSummary;
  readonly modelB: ModelSummary;
  readonly entries: readonly DiffEntry[];
  readonly warnings: {
    readonly a: readonly ModelWarning[];
    readonly b: readonly ModelWarning[];
  };
};
