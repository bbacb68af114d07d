import { ParseError, type UnsupportedElementError } from "./errors";
import {
  AXIS_JOINT_KINDS,
  type CanonicalModel,
  type Geometry,
  type Inertial,
  type Joint,
  type Link,
  type ModelFormat,
  type Shape,
  type SourceLocation,
} from "./types";

export type ModelDraft = {
  name: string;
  format: ModelFormat;
  source: string;
  location: SourceLocation;
  links: Link[];
  joints: Joint[];
  warnings: UnsupportedElementError[];
};

const isPositive = (n: number) => Number.isFinite(n) && n > 0;

function geometryProblem(geometry: Geometry): string | null {
  switch (geometry.kind) {
    case "box":
      return geometry.size.every(isPositive) ? null : `box size must be positive, got ${geometry.size.join(" ")}`;
    case "sphere":
      return isPositive(geometry.radius) ? null : `sphere radius must be positive, got ${geometry.radius}`;
    case "cylinder":
    case "capsule":
      if (!isPositive(geometry.radius)) return `${geometry.kind} radius must be positive, got ${geometry.radius}`;
      return isPositive(geometry.length) ? null : `${geometry.kind} length must be positive, got ${geometry.length}`;
    case "mesh":
      if (!geometry.reference) return "mesh reference is empty";
      return geometry.scale.every(isPositive) ? null : `mesh scale must be positive, got ${geometry.scale.join(" ")}`;
  }
}

export function checkGeometry(geometry: Geometry, location: SourceLocation) {
  const problem = geometryProblem(geometry);
  if (problem) throw new ParseError(location, problem);
}

function checkInertial(inertial: Inertial, location: SourceLocation) {
  if (!Number.isFinite(inertial.mass) || inertial.mass < 0) {
    throw new ParseError(location, `mass must be a non-negative number, got ${inertial.mass}`);
  }
  const values = [...inertial.centerOfMass, ...Object.values(inertial.inertiaTensor)];
  if (!values.every(Number.isFinite)) {
    throw new ParseError(location, "inertial contains a non-finite value");
  }
}

function checkShapes(shapes: readonly Shape[]) {
  for (const shape of shapes) {
    checkGeometry(shape.geometry, shape.location);
  }
}

function checkJoint(joint: Joint) {
  const needsAxis = AXIS_JOINT_KINDS.has(joint.kind);
  if (needsAxis && !joint.axis) {
    throw new ParseError(joint.location, `joint '${joint.name}' of kind ${joint.kind} has no axis`);
  }
  if (joint.axis) {
    const len = Math.hypot(...joint.axis);
    if (!Number.isFinite(len) || Math.abs(len - 1) > 1e-9) {
      throw new ParseError(joint.location, `joint '${joint.name}' axis is not a unit vector`);
    }
  }
}

/**
 * Resolves the single root and rejects anything that is not a tree: unknown
 * link references, a link with two parent joints, cycles, disconnected links.
 */
function resolveRoot(draft: ModelDraft, links: Map<string, Link>): string {
  const parentJoint = new Map<string, Joint>();
  const children = new Map<string, string[]>();
  for (const joint of draft.joints) {
    for (const end of [joint.parentLink, joint.childLink]) {
      if (!links.has(end)) {
        throw new ParseError(joint.location, `joint '${joint.name}' references unknown link '${end}'`);
      }
    }
    if (joint.parentLink === joint.childLink) {
      throw new ParseError(joint.location, `joint '${joint.name}' connects link '${joint.childLink}' to itself`);
    }
    const existing = parentJoint.get(joint.childLink);
    if (existing) {
      throw new ParseError(
        joint.location,
        `link '${joint.childLink}' has two parent joints ('${existing.name}' and '${joint.name}')`
      );
    }
    parentJoint.set(joint.childLink, joint);
    const list = children.get(joint.parentLink) ?? [];
    list.push(joint.childLink);
    children.set(joint.parentLink, list);
  }

  const roots = draft.links.filter((link) => !parentJoint.has(link.name));
  if (roots.length === 0) {
    throw new ParseError(draft.location, "kinematic graph has no root link (every link has a parent joint)");
  }
  if (roots.length > 1) {
    throw new ParseError(
      draft.location,
      `kinematic graph has ${roots.length} root links (${roots.map((link) => link.name).join(", ")}); expected one tree`
    );
  }

  const root = roots[0].name;
  const reached = new Set<string>([root]);
  const stack = [root];
  for (let name = stack.pop(); name !== undefined; name = stack.pop()) {
    for (const child of children.get(name) ?? []) {
      if (reached.has(child)) continue;
      reached.add(child);
      stack.push(child);
    }
  }
  const unreachable = draft.links.filter((link) => !reached.has(link.name));
  if (unreachable.length) {
    throw new ParseError(
      unreachable[0].location,
      `links not connected to root '${root}': ${unreachable.map((link) => link.name).join(", ")}`
    );
  }
  return root;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/** Validates a fully parsed draft and returns it as an immutable canonical model. */
export function finalizeModel(draft: ModelDraft): CanonicalModel {
  const links = new Map<string, Link>();
  for (const link of draft.links) {
    if (links.has(link.name)) throw new ParseError(link.location, `duplicate link name '${link.name}'`);
    links.set(link.name, link);
    if (link.inertial) checkInertial(link.inertial, link.location);
    checkShapes(link.collisions);
    checkShapes(link.visuals);
  }
  if (links.size === 0) throw new ParseError(draft.location, "model has no links");

  const jointNames = new Set<string>();
  for (const joint of draft.joints) {
    if (jointNames.has(joint.name)) throw new ParseError(joint.location, `duplicate joint name '${joint.name}'`);
    jointNames.add(joint.name);
    checkJoint(joint);
  }

  const rootLink = resolveRoot(draft, links);

  return deepFreeze<CanonicalModel>({
    name: draft.name,
    format: draft.format,
    source: draft.source,
    rootLink,
    links: [...draft.links],
    joints: [...draft.joints],
    warnings: draft.warnings.map((warning) => warning.toWarning()),
  });
}
