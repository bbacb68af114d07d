import * as THREE from "three";
import { ParseError, UnsupportedElementError } from "../../model/errors";
import { finalizeModel } from "../../model/finalize";
import {
  BALL_JOINT_AXIS,
  FIELD_CATEGORIES,
  type Geometry,
  type Inertial,
  type Joint,
  type JointKind,
  type Link,
  type Pose,
  type Quat,
  type Shape,
  type SourceLocation,
  type Vec3,
} from "../../model/types";
import { composePose, decomposeMatrix, invertPose, makePose } from "../../normalize/frames";
import { type ShapeAxis, applyScale, convertGeometryUnits, scaleVec, shapeAxisRotation } from "../../normalize/geometry";
import { inertialFromFrame, tensorFromDiagonal } from "../../normalize/inertia";
import {
  IDENTITY_QUAT,
  degToRad,
  multiplyQuat,
  quatFromAxisAngle,
  quatFromEuler,
  quatFromWxyz,
  quatToThree,
  rotateVector,
} from "../../normalize/orientation";
import { scopedLogger } from "../../services/logger";
import type { FormatAdapter, ModelSource } from "../types";
import { type UsdValue, isList } from "./usdaParser";
import { type UsdPrim, UsdStage } from "./usdStage";

const logger = scopedLogger("usd");

const SUPPORTED_GPRIMS = new Set(["Cube", "Sphere", "Cylinder", "Capsule", "Mesh"]);

const OTHER_GPRIMS = new Set([
  "Cone",
  "Plane",
  "Cylinder_1",
  "Capsule_1",
  "Points",
  "BasisCurves",
  "NurbsCurves",
  "NurbsPatch",
  "HermiteCurves",
  "TetMesh",
]);

const CONTAINER_TYPES = new Set(["Xform", "Scope"]);

const JOINT_TYPE_RE = /^Physics\w*Joint$/;

const AXIS_TOKENS: Record<ShapeAxis, Vec3> = { X: [1, 0, 0], Y: [0, 1, 0], Z: [0, 0, 1] };

const isAxisToken = (value: UsdValue): value is ShapeAxis => value === "X" || value === "Y" || value === "Z";

type Units = { metersPerUnit: number; kilogramsPerUnit: number };

/** Typed reads of composed attributes; a value of the wrong shape is a ParseError at its line. */
class UsdReader {
  readonly warnings: UnsupportedElementError[] = [];

  unsupported(location: SourceLocation, element: string, reason?: string) {
    this.warnings.push(new UnsupportedElementError(location, element, reason));
  }

  number(prim: UsdPrim, name: string, fallback: number): number {
    const attr = prim.attribute(name);
    if (!attr) return fallback;
    if (typeof attr.value !== "number") throw new ParseError(attr.location, `'${name}' is not a number`);
    return attr.value;
  }

  optionalNumber(prim: UsdPrim, name: string): number | undefined {
    return prim.attribute(name) ? this.number(prim, name, 0) : undefined;
  }

  numbers(prim: UsdPrim, name: string, count: number): number[] | undefined {
    const attr = prim.attribute(name);
    if (!attr) return undefined;
    const flat = flatten(attr.value);
    if (!flat || flat.length !== count) {
      throw new ParseError(attr.location, `'${name}' expects ${count} numbers`);
    }
    return flat;
  }

  vector(prim: UsdPrim, name: string, fallback: Vec3): Vec3 {
    const v = this.numbers(prim, name, 3);
    return v ? [v[0], v[1], v[2]] : fallback;
  }

  quat(prim: UsdPrim, name: string): Quat {
    const v = this.numbers(prim, name, 4);
    if (!v) return IDENTITY_QUAT;
    // Text layers write quaternions real part first.
    const q = quatFromWxyz(v);
    if (!q) throw new ParseError(prim.propertyLocation(name), `'${name}' is a zero quaternion`);
    return q;
  }

  token(prim: UsdPrim, name: string): string | undefined {
    const attr = prim.attribute(name);
    if (!attr) return undefined;
    if (typeof attr.value !== "string") throw new ParseError(attr.location, `'${name}' is not a token`);
    return attr.value;
  }

  tokens(prim: UsdPrim, name: string): string[] | undefined {
    const attr = prim.attribute(name);
    if (!attr) return undefined;
    const value = attr.value;
    if (!isList(value)) throw new ParseError(attr.location, `'${name}' is not a token array`);
    return value.map((item) => {
      if (typeof item !== "string") throw new ParseError(attr.location, `'${name}' is not a token array`);
      return item;
    });
  }
}

function flatten(value: UsdValue): number[] | null {
  if (typeof value === "number") return [value];
  if (!isList(value)) return null;
  const out: number[] = [];
  for (const item of value) {
    const part = flatten(item);
    if (!part) return null;
    out.push(...part);
  }
  return out;
}

const ROTATE_OP_RE = /^rotate([XYZ]|[XYZ]{3})$/;

function xformOpMatrix(reader: UsdReader, prim: UsdPrim, opName: string): THREE.Matrix4 {
  const type = opName.split(":")[1] ?? "";
  const location = prim.propertyLocation(opName);
  if (!prim.attribute(opName)) throw new ParseError(location, `xformOpOrder names '${opName}', which has no value`);
  switch (type) {
    case "translate": {
      const [x, y, z] = reader.vector(prim, opName, [0, 0, 0]);
      return new THREE.Matrix4().makeTranslation(x, y, z);
    }
    case "scale": {
      const [x, y, z] = reader.vector(prim, opName, [1, 1, 1]);
      return new THREE.Matrix4().makeScale(x, y, z);
    }
    case "orient": {
      return new THREE.Matrix4().makeRotationFromQuaternion(quatToThree(reader.quat(prim, opName)));
    }
    case "transform": {
      const values = reader.numbers(prim, opName, 16) ?? [];
      // Row-major with row vectors reads as column-major with column vectors.
      return new THREE.Matrix4().fromArray(values);
    }
  }
  const rotate = ROTATE_OP_RE.exec(type);
  if (rotate) {
    const axes = rotate[1];
    let q: Quat | null;
    if (isAxisToken(axes)) {
      q = quatFromAxisAngle(AXIS_TOKENS[axes], degToRad(reader.number(prim, opName, 0)));
    } else {
      // Components stay in x, y, z order whatever the op's axis order.
      const xyz = reader.vector(prim, opName, [0, 0, 0]);
      const angle = (letter: string) => degToRad(xyz["XYZ".indexOf(letter)]);
      q = quatFromEuler([angle(axes[0]), angle(axes[1]), angle(axes[2])], axes);
    }
    if (!q) throw new ParseError(location, `invalid rotation in '${opName}'`);
    return new THREE.Matrix4().makeRotationFromQuaternion(quatToThree(q));
  }
  throw new ParseError(location, `unknown xform op '${opName}'`);
}

/** Local transform of a prim from its `xformOpOrder`, first op outermost. */
function localMatrix(reader: UsdReader, prim: UsdPrim): THREE.Matrix4 {
  const matrix = new THREE.Matrix4();
  for (const entry of reader.tokens(prim, "xformOpOrder") ?? []) {
    if (entry === "!resetXformStack!") {
      reader.unsupported(prim.propertyLocation("xformOpOrder"), "!resetXformStack!", "resetXformStack is ignored.");
      continue;
    }
    const invert = entry.startsWith("!invert!");
    const op = xformOpMatrix(reader, prim, invert ? entry.slice("!invert!".length) : entry);
    matrix.multiply(invert ? op.invert() : op);
  }
  return matrix;
}

function readGprim(reader: UsdReader, prim: UsdPrim): { geometry: Geometry; axis: ShapeAxis } | null {
  const axisToken = (): ShapeAxis => {
    const value = reader.token(prim, "axis") ?? "Z";
    if (!isAxisToken(value)) throw new ParseError(prim.propertyLocation("axis"), `invalid axis '${value}'`);
    return value;
  };
  switch (prim.typeName) {
    case "Cube": {
      const size = reader.number(prim, "size", 2);
      return { geometry: { kind: "box", size: [size, size, size] }, axis: "Z" };
    }
    case "Sphere":
      return { geometry: { kind: "sphere", radius: reader.number(prim, "radius", 1) }, axis: "Z" };
    case "Cylinder":
      return {
        geometry: { kind: "cylinder", radius: reader.number(prim, "radius", 1), length: reader.number(prim, "height", 2) },
        axis: axisToken(),
      };
    case "Capsule":
      return {
        geometry: { kind: "capsule", radius: reader.number(prim, "radius", 0.5), length: reader.number(prim, "height", 1) },
        axis: axisToken(),
      };
    case "Mesh": {
      const parent = prim.parent?.name ?? "";
      return { geometry: { kind: "mesh", reference: `usd:${parent}/${prim.name}`, scale: [1, 1, 1] }, axis: "Z" };
    }
    default:
      reader.unsupported(prim.location, `${prim.typeName} prim`, `Geometry type '${prim.typeName}' is not modeled; ignored.`);
      return null;
  }
}

function toShape(reader: UsdReader, prim: UsdPrim, matrix: THREE.Matrix4, units: Units): Shape | null {
  const read = readGprim(reader, prim);
  if (!read) return null;
  const { pose, scale } = decomposeMatrix(matrix);
  const orientation = read.axis === "Z" ? pose.orientation : multiplyQuat(pose.orientation, shapeAxisRotation(read.axis));
  return {
    name: prim.name,
    pose: makePose(scaleVec(pose.position, units.metersPerUnit), orientation),
    geometry: convertGeometryUnits(applyScale(read.geometry, scale, read.axis), units.metersPerUnit),
    location: prim.location,
  };
}

type ShapeFilter = (prim: UsdPrim) => "collision" | "visual" | null;

function collectShapes(
  reader: UsdReader,
  container: UsdPrim,
  parentMatrix: THREE.Matrix4,
  isLink: (prim: UsdPrim) => boolean,
  classify: ShapeFilter,
  units: Units,
  out: ShapeSets
) {
  for (const child of container.children) {
    if (child.isAbstract || isLink(child)) continue;
    const type = child.typeName ?? "";
    const isGprim = SUPPORTED_GPRIMS.has(type) || OTHER_GPRIMS.has(type);
    if (!isGprim && type && !CONTAINER_TYPES.has(type)) continue;
    const matrix = parentMatrix.clone().multiply(localMatrix(reader, child));
    if (isGprim) {
      const target = classify(child);
      const shape = target ? toShape(reader, child, matrix, units) : null;
      if (shape && target === "collision") out.collisions.push(shape);
      if (shape && target === "visual") out.visuals.push(shape);
    }
    collectShapes(reader, child, matrix, isLink, classify, units, out);
  }
}

type ShapeSets = { collisions: Shape[]; visuals: Shape[] };

function readShapes(reader: UsdReader, link: UsdPrim, isLink: (prim: UsdPrim) => boolean, units: Units): ShapeSets {
  const out: ShapeSets = { collisions: [], visuals: [] };
  const collisionScope = link.children.find((child) => child.name === "collisions");
  const visualScope = link.children.find((child) => child.name === "visuals");
  const collisionOrVisual: ShapeFilter = (prim) => (prim.hasApi("PhysicsCollisionAPI") ? "collision" : "visual");

  if (!collisionScope && !visualScope) {
    collectShapes(reader, link, new THREE.Matrix4(), isLink, collisionOrVisual, units, out);
    return out;
  }
  // Scoped layout: only colliders count under `collisions`, every gprim under `visuals`.
  if (collisionScope) {
    const onlyColliders: ShapeFilter = (prim) => (prim.hasApi("PhysicsCollisionAPI") ? "collision" : null);
    collectShapes(reader, collisionScope, localMatrix(reader, collisionScope), isLink, onlyColliders, units, out);
  }
  if (visualScope) {
    collectShapes(reader, visualScope, localMatrix(reader, visualScope), isLink, () => "visual", units, out);
  }
  return out;
}

function readInertial(reader: UsdReader, link: UsdPrim, units: Units): Inertial | undefined {
  const mass = reader.optionalNumber(link, "physics:mass");
  if (mass === undefined) {
    if (link.hasApi("PhysicsMassAPI")) logger.debug(`Link '${link.name}' has no authored mass.`);
    return undefined;
  }
  const { metersPerUnit: m, kilogramsPerUnit: kg } = units;
  const com = scaleVec(reader.vector(link, "physics:centerOfMass", [0, 0, 0]), m);
  const diag = scaleVec(reader.vector(link, "physics:diagonalInertia", [0, 0, 0]), kg * m * m);
  const principal = reader.quat(link, "physics:principalAxes");
  return inertialFromFrame(mass * kg, makePose(com, principal), tensorFromDiagonal(diag));
}

function readLocalFrame(reader: UsdReader, joint: UsdPrim, index: 0 | 1, units: Units): Pose {
  const position = scaleVec(reader.vector(joint, `physics:localPos${index}`, [0, 0, 0]), units.metersPerUnit);
  return makePose(position, reader.quat(joint, `physics:localRot${index}`));
}

function jointKind(reader: UsdReader, joint: UsdPrim): JointKind {
  switch (joint.typeName) {
    case "PhysicsRevoluteJoint": {
      const lower = reader.optionalNumber(joint, "physics:lowerLimit");
      const upper = reader.optionalNumber(joint, "physics:upperLimit");
      const limited = lower !== undefined && upper !== undefined && Number.isFinite(lower) && Number.isFinite(upper);
      return limited ? "revolute" : "continuous";
    }
    case "PhysicsPrismaticJoint":
      return "prismatic";
    case "PhysicsFixedJoint":
      return "fixed";
    case "PhysicsSphericalJoint":
      return "continuous";
    default:
      reader.unsupported(joint.location, `${joint.typeName} prim`, `Joint type '${joint.typeName}' kept as fixed.`);
      return "fixed";
  }
}

function readJoint(reader: UsdReader, joint: UsdPrim, linkNames: Map<string, string>, units: Units): Joint | null {
  const body = (index: 0 | 1) => {
    const [target] = joint.relationship(`physics:body${index}`) ?? [];
    if (target === undefined) return null;
    const name = linkNames.get(target);
    if (!name) {
      throw new ParseError(joint.propertyLocation(`physics:body${index}`), `'${target}' is not a link of this robot`);
    }
    return name;
  };
  const parent = body(0);
  const child = body(1);
  if (!parent || !child) {
    logger.debug(`Joint '${joint.name}' is anchored to the world; not part of the link tree.`);
    return null;
  }

  const kind = jointKind(reader, joint);
  const frame0 = readLocalFrame(reader, joint, 0, units);
  const frame1 = readLocalFrame(reader, joint, 1, units);
  let axis: Vec3 | undefined;
  if (joint.typeName === "PhysicsSphericalJoint") {
    axis = BALL_JOINT_AXIS;
  } else if (kind !== "fixed") {
    const token = reader.token(joint, "physics:axis") ?? "X";
    if (!isAxisToken(token)) {
      throw new ParseError(joint.propertyLocation("physics:axis"), `invalid joint axis '${token}'`);
    }
    axis = rotateVector(frame1.orientation, AXIS_TOKENS[token]);
  }
  return {
    name: joint.name,
    kind,
    parentLink: parent,
    childLink: child,
    origin: composePose(frame0, invertPose(frame1)),
    axis,
    location: joint.location,
  };
}

function readUnits(stage: UsdStage): Units {
  const meters = stage.layerMetadata("metersPerUnit");
  const kilograms = stage.layerMetadata("kilogramsPerUnit");
  return {
    // Unauthored stage units fall back to centimeters and kilograms.
    metersPerUnit: typeof meters === "number" && meters > 0 ? meters : 0.01,
    kilogramsPerUnit: typeof kilograms === "number" && kilograms > 0 ? kilograms : 1,
  };
}

function findLinks(stage: UsdStage, robot: UsdPrim): UsdPrim[] {
  const targets = robot.relationship("isaac:physics:robotLinks");
  if (targets) {
    return targets.map((target) => {
      const prim = stage.prim(target);
      if (!prim) throw new ParseError(robot.propertyLocation("isaac:physics:robotLinks"), `link '${target}' not found`);
      return prim;
    });
  }
  const candidates = [robot, ...robot.descendants()].filter((prim) => !prim.isAbstract);
  const bodies = candidates.filter((prim) => prim.hasApi("PhysicsRigidBodyAPI"));
  return bodies.length ? bodies : candidates.filter((prim) => prim.hasApi("PhysicsMassAPI"));
}

function findJoints(stage: UsdStage, robot: UsdPrim): UsdPrim[] {
  const targets = robot.relationship("isaac:physics:robotJoints");
  if (targets) {
    return targets.map((target) => {
      const prim = stage.prim(target);
      if (!prim) {
        throw new ParseError(robot.propertyLocation("isaac:physics:robotJoints"), `joint '${target}' not found`);
      }
      return prim;
    });
  }
  return [...robot.descendants()].filter((prim) => !prim.isAbstract && JOINT_TYPE_RE.test(prim.typeName ?? ""));
}

export function parseUsdStage(stage: UsdStage) {
  const reader = new UsdReader();
  const robot = stage.defaultPrim;
  if (!robot) throw new ParseError({ file: stage.rootFile, path: "/" }, "stage has no default prim and no root prim");
  const units = readUnits(stage);

  const linkPrims = findLinks(stage, robot);
  const linkNames = new Map(linkPrims.map((prim) => [prim.path, prim.name]));
  const isLink = (prim: UsdPrim) => linkNames.has(prim.path);

  const links: Link[] = linkPrims.map((prim) => ({
    name: prim.name,
    inertial: readInertial(reader, prim, units),
    ...readShapes(reader, prim, isLink, units),
    location: prim.location,
  }));

  const joints: Joint[] = [];
  for (const prim of findJoints(stage, robot)) {
    const joint = readJoint(reader, prim, linkNames, units);
    if (joint) joints.push(joint);
  }

  return finalizeModel({
    name: robot.name,
    format: "usd",
    source: stage.rootFile,
    location: robot.location,
    links,
    joints,
    warnings: [...stage.warnings, ...reader.warnings],
  });
}

export function parseUsdString(text: string, file = "<usd>", layers?: ReadonlyMap<string, string>) {
  return parseUsdStage(new UsdStage(file, text, layers));
}

export const usdAdapter: FormatAdapter = {
  format: "usd",
  extensions: [".usda", ".usd"],
  categories: new Set(FIELD_CATEGORIES),
  parse: (source: ModelSource) => parseUsdString(source.text, source.path, source.layers),
};
