import {
  AXIS_JOINT_KINDS,
  FIELD_CATEGORIES,
  type Geometry,
  type Inertial,
  type Joint,
  type JointKind,
  type Link,
  type Pose,
  type Shape,
} from "../../model/types";
import { finalizeModel } from "../../model/finalize";
import { makePose } from "../../normalize/frames";
import { normalizeMeshReference } from "../../normalize/geometry";
import { inertialFromFrame } from "../../normalize/inertia";
import { quatFromRpy } from "../../normalize/orientation";
import { scopedLogger } from "../../services/logger";
import type { FormatAdapter, ModelSource } from "../types";
import { XmlReader, childElements, firstChild, parseXmlDocument } from "../xml";

const logger = scopedLogger("urdf");

const JOINT_KINDS = new Map<string, JointKind>([
  ["fixed", "fixed"],
  ["revolute", "revolute"],
  ["continuous", "continuous"],
  ["prismatic", "prismatic"],
  ["planar", "planar"],
  ["floating", "floating"],
]);

function readPose(reader: XmlReader, node: Element | null): Pose {
  if (!node) return makePose();
  const xyz = reader.vector(node, node.getAttribute("xyz"), "origin xyz", [0, 0, 0]);
  const rpy = reader.vector(node, node.getAttribute("rpy"), "origin rpy", [0, 0, 0]);
  return makePose(xyz, quatFromRpy(rpy));
}

function readInertial(reader: XmlReader, link: Element): Inertial | undefined {
  const inertial = firstChild(link, "inertial");
  if (!inertial) return undefined;
  const frame = readPose(reader, firstChild(inertial, "origin"));
  const massEl = reader.requireChild(inertial, "mass");
  const mass = reader.number(massEl, massEl.getAttribute("value"), "mass value");
  const inertiaEl = firstChild(inertial, "inertia");
  const component = (key: string) => reader.number(inertiaEl ?? inertial, inertiaEl?.getAttribute(key), key, 0);
  return inertialFromFrame(mass, frame, {
    ixx: component("ixx"),
    ixy: component("ixy"),
    ixz: component("ixz"),
    iyy: component("iyy"),
    iyz: component("iyz"),
    izz: component("izz"),
  });
}

function readGeom(reader: XmlReader, node: Element): Geometry | null {
  const [shape] = childElements(node);
  if (!shape) return reader.fail(node, "<geometry> has no shape element");
  switch (shape.localName) {
    case "box":
      return { kind: "box", size: reader.vector(shape, shape.getAttribute("size"), "box size") };
    case "sphere":
      return { kind: "sphere", radius: reader.number(shape, shape.getAttribute("radius"), "sphere radius") };
    case "cylinder":
    case "capsule": {
      const kind = shape.localName === "capsule" ? "capsule" : "cylinder";
      return {
        kind,
        radius: reader.number(shape, shape.getAttribute("radius"), `${kind} radius`),
        length: reader.number(shape, shape.getAttribute("length"), `${kind} length`),
      };
    }
    case "mesh":
      return {
        kind: "mesh",
        reference: normalizeMeshReference(reader.requireAttr(shape, "filename")),
        scale: reader.vector(shape, shape.getAttribute("scale"), "mesh scale", [1, 1, 1]),
      };
    default:
      reader.unsupported(shape, shape.localName, `Unsupported geometry <${shape.localName}> ignored.`);
      return null;
  }
}

function readShapes(reader: XmlReader, link: Element, tagName: "collision" | "visual"): Shape[] {
  const shapes: Shape[] = [];
  for (const node of childElements(link, tagName)) {
    const geometry = readGeom(reader, reader.requireChild(node, "geometry"));
    if (!geometry) continue;
    shapes.push({
      name: node.getAttribute("name") ?? undefined,
      pose: readPose(reader, firstChild(node, "origin")),
      geometry,
      location: reader.location(node),
    });
  }
  return shapes;
}

function readJointKind(reader: XmlReader, node: Element): JointKind {
  const type = reader.requireAttr(node, "type");
  const kind = JOINT_KINDS.get(type);
  if (kind) return kind;
  reader.unsupported(node, `joint type '${type}'`, `Unsupported joint type '${type}' kept as fixed.`);
  return "fixed";
}

function readJoint(reader: XmlReader, node: Element): Joint {
  const name = reader.requireAttr(node, "name");
  const kind = readJointKind(reader, node);
  const parent = reader.requireAttr(reader.requireChild(node, "parent"), "link");
  const child = reader.requireAttr(reader.requireChild(node, "child"), "link");
  const origin = readPose(reader, firstChild(node, "origin"));
  let axis: Joint["axis"];
  if (AXIS_JOINT_KINDS.has(kind)) {
    const axisEl = firstChild(node, "axis");
    const raw = reader.vector(axisEl ?? node, axisEl?.getAttribute("xyz"), "axis xyz", [1, 0, 0]);
    const len = Math.hypot(...raw);
    if (len === 0) return reader.fail(axisEl ?? node, `joint '${name}' has a zero-length axis`);
    axis = [raw[0] / len, raw[1] / len, raw[2] / len];
  }
  return { name, kind, parentLink: parent, childLink: child, origin, axis, location: reader.location(node) };
}

export function parseUrdfElement(reader: XmlReader, robotEl: Element, source: string) {
  const links: Link[] = childElements(robotEl, "link").map((link) => ({
    name: reader.requireAttr(link, "name"),
    inertial: readInertial(reader, link),
    collisions: readShapes(reader, link, "collision"),
    visuals: readShapes(reader, link, "visual"),
    location: reader.location(link),
  }));
  const joints = childElements(robotEl, "joint").map((jointEl) => readJoint(reader, jointEl));

  return finalizeModel({
    name: robotEl.getAttribute("name") || "urdf_robot",
    format: "urdf",
    source,
    location: reader.location(robotEl),
    links,
    joints,
    warnings: reader.warnings,
  });
}

export function parseUrdfString(urdf: string, file = "<urdf>") {
  const { doc, reader } = parseXmlDocument(urdf, file);
  const robotEl = doc.documentElement;
  if (robotEl.localName !== "robot") {
    return reader.fail(robotEl, `expected <robot> root, found <${robotEl.localName}>`);
  }
  if (robotEl.getAttribute("xmlns:xacro") || robotEl.getElementsByTagNameNS("*", "macro").length) {
    logger.warn("URDF contains xacro markup; only expanded URDF is compared.", file);
  }
  return parseUrdfElement(reader, robotEl, file);
}

export const urdfAdapter: FormatAdapter = {
  format: "urdf",
  extensions: [".urdf"],
  categories: new Set(FIELD_CATEGORIES),
  parse: (source: ModelSource) => parseUrdfString(source.text, source.path),
};
