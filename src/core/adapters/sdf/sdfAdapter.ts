import {
  AXIS_JOINT_KINDS,
  BALL_JOINT_AXIS,
  FIELD_CATEGORIES,
  type Geometry,
  type Inertial,
  type Joint,
  type JointKind,
  type Link,
  type Pose,
  type Shape,
  type Vec3,
} from "../../model/types";
import { finalizeModel } from "../../model/finalize";
import { IDENTITY_POSE, composePose, makePose, relativePose } from "../../normalize/frames";
import { normalizeMeshReference } from "../../normalize/geometry";
import { inertialFromFrame } from "../../normalize/inertia";
import { degToRad, quatFromRpy, quatFromXyzw, rotateVector } from "../../normalize/orientation";
import { scopedLogger } from "../../services/logger";
import type { FormatAdapter, ModelSource } from "../types";
import { XmlReader, childElements, childText, firstChild, parseXmlDocument } from "../xml";

const logger = scopedLogger("sdf");

const MODEL_FRAME = "__model__";

const JOINT_KINDS = new Map<string, JointKind>([
  ["fixed", "fixed"],
  ["revolute", "revolute"],
  ["continuous", "continuous"],
  ["prismatic", "prismatic"],
  // No rotational limits and no axis to compare: the closest canonical kind.
  ["ball", "continuous"],
]);

// Recognized but not representable; kept as fixed so the tree stays intact.
const UNSUPPORTED_JOINTS = new Set(["universal", "revolute2", "screw", "gearbox"]);

type PoseSpec = {
  pose: Pose;
  relativeTo: string | null;
};

type FrameNode = {
  element: Element;
  /** Frame the pose is expressed in when `relative_to` is absent. */
  defaultBase: string;
  spec: PoseSpec;
};

function readPoseSpec(reader: XmlReader, parent: Element): PoseSpec {
  const node = firstChild(parent, "pose");
  if (!node) return { pose: IDENTITY_POSE, relativeTo: null };
  const relativeTo = node.getAttribute("relative_to")?.trim() || null;
  const text = node.textContent?.trim() ?? "";
  if (!text) return { pose: IDENTITY_POSE, relativeTo };

  const format = node.getAttribute("rotation_format") ?? "euler_rpy";
  if (format === "quat_xyzw") {
    const values = reader.numbers(node, text, "pose", 7);
    const orientation = quatFromXyzw(values.slice(3));
    if (!orientation) return reader.fail(node, "pose quaternion has zero length");
    return { pose: makePose([values[0], values[1], values[2]], orientation), relativeTo };
  }
  if (format !== "euler_rpy") return reader.fail(node, `unknown rotation_format '${format}'`);

  const values = reader.numbers(node, text, "pose", 6);
  const toRad = node.getAttribute("degrees") === "true" ? degToRad : (v: number) => v;
  const rpy: Vec3 = [toRad(values[3]), toRad(values[4]), toRad(values[5])];
  return { pose: makePose([values[0], values[1], values[2]], quatFromRpy(rpy)), relativeTo };
}

/**
 * Pose graph of one model: links, joints and explicit frames, each placed
 * relative to another frame. Resolution walks to the model frame and rejects
 * cycles and unknown frame names.
 */
class SdfFrameGraph {
  private readonly nodes = new Map<string, FrameNode>();
  private readonly resolved = new Map<string, Pose>();
  private readonly visiting = new Set<string>();

  constructor(private readonly reader: XmlReader) {}

  add(name: string, element: Element, defaultBase: string) {
    if (name === MODEL_FRAME || name === "world") {
      this.reader.fail(element, `frame name '${name}' is reserved`);
    }
    if (this.nodes.has(name) && element.localName === "frame") {
      this.reader.fail(element, `frame name '${name}' is already used in this model`);
    }
    if (!this.nodes.has(name)) {
      this.nodes.set(name, { element, defaultBase, spec: readPoseSpec(this.reader, element) });
    }
  }

  /** Pose of a frame in the model frame. */
  resolve(name: string, from: Element): Pose {
    if (name === MODEL_FRAME || name === "world" || name === "") return IDENTITY_POSE;
    const cached = this.resolved.get(name);
    if (cached) return cached;
    const node = this.nodes.get(name);
    if (!node) return this.reader.fail(from, `reference to unknown frame '${name}'`);
    if (this.visiting.has(name)) {
      return this.reader.fail(node.element, `pose graph has a cycle through frame '${name}'`);
    }
    this.visiting.add(name);
    const base = this.resolve(node.spec.relativeTo ?? node.defaultBase, node.element);
    this.visiting.delete(name);
    const pose = composePose(base, node.spec.pose);
    this.resolved.set(name, pose);
    return pose;
  }

  /** Pose of a nested element (shape, inertial) in the frame of the link that owns it. */
  localPose(linkName: string, element: Element): Pose {
    const spec = readPoseSpec(this.reader, element);
    if (!spec.relativeTo || spec.relativeTo === linkName) return spec.pose;
    const inModel = composePose(this.resolve(spec.relativeTo, element), spec.pose);
    return relativePose(this.resolve(linkName, element), inModel);
  }
}

function readGeom(reader: XmlReader, node: Element): Geometry | null {
  const [shape] = childElements(node);
  if (!shape) return reader.fail(node, "<geometry> has no shape element");
  const num = (tag: string) => reader.number(shape, childText(shape, tag), `${shape.localName} ${tag}`);
  switch (shape.localName) {
    case "box":
      return { kind: "box", size: reader.vector(shape, childText(shape, "size"), "box size") };
    case "sphere":
      return { kind: "sphere", radius: num("radius") };
    case "cylinder":
      return { kind: "cylinder", radius: num("radius"), length: num("length") };
    case "capsule":
      return { kind: "capsule", radius: num("radius"), length: num("length") };
    case "mesh": {
      const uri = childText(shape, "uri");
      if (!uri) return reader.fail(shape, "<mesh> is missing <uri>");
      return {
        kind: "mesh",
        reference: normalizeMeshReference(uri),
        scale: reader.vector(shape, childText(shape, "scale"), "mesh scale", [1, 1, 1]),
      };
    }
    case "empty":
      return null;
    default:
      reader.unsupported(shape, shape.localName, `Unsupported geometry <${shape.localName}> ignored.`);
      return null;
  }
}

function readShapes(reader: XmlReader, graph: SdfFrameGraph, linkName: string, link: Element, tag: string) {
  const shapes: Shape[] = [];
  for (const node of childElements(link, tag)) {
    const geometry = readGeom(reader, reader.requireChild(node, "geometry"));
    if (!geometry) continue;
    shapes.push({
      name: node.getAttribute("name") ?? undefined,
      pose: graph.localPose(linkName, node),
      geometry,
      location: reader.location(node),
    });
  }
  return shapes;
}

function readInertial(reader: XmlReader, graph: SdfFrameGraph, linkName: string, link: Element): Inertial | undefined {
  const inertial = firstChild(link, "inertial");
  if (!inertial) return undefined;
  const frame = graph.localPose(linkName, inertial);
  const mass = reader.number(inertial, childText(inertial, "mass"), "mass", 1);
  const inertia = firstChild(inertial, "inertia");
  const component = (key: string, fallback: number) =>
    inertia ? reader.number(inertia, childText(inertia, key), key, fallback) : fallback;
  return inertialFromFrame(mass, frame, {
    ixx: component("ixx", 1),
    ixy: component("ixy", 0),
    ixz: component("ixz", 0),
    iyy: component("iyy", 1),
    iyz: component("iyz", 0),
    izz: component("izz", 1),
  });
}

function readJointKind(reader: XmlReader, node: Element): JointKind {
  const type = reader.requireAttr(node, "type");
  const kind = JOINT_KINDS.get(type);
  if (kind) return kind;
  const reason = UNSUPPORTED_JOINTS.has(type)
    ? `Joint type '${type}' has no canonical equivalent; kept as fixed.`
    : `Unknown joint type '${type}' kept as fixed.`;
  reader.unsupported(node, `joint type '${type}'`, reason);
  return "fixed";
}

function readAxis(reader: XmlReader, graph: SdfFrameGraph, node: Element, name: string, child: string): Vec3 {
  const axisEl = firstChild(node, "axis");
  const xyzEl = axisEl ? firstChild(axisEl, "xyz") : null;
  const raw = reader.vector(xyzEl ?? node, xyzEl?.textContent, "axis xyz", [0, 0, 1]);
  const len = Math.hypot(...raw);
  if (len === 0) return reader.fail(xyzEl ?? node, `joint '${name}' has a zero-length axis`);
  const unit: Vec3 = [raw[0] / len, raw[1] / len, raw[2] / len];

  let expressedIn = xyzEl?.getAttribute("expressed_in")?.trim() || name;
  if (axisEl && childText(axisEl, "use_parent_model_frame") === "true") expressedIn = MODEL_FRAME;
  if (expressedIn === child) return unit;
  const frame = relativePose(graph.resolve(child, node), graph.resolve(expressedIn, xyzEl ?? node));
  return rotateVector(frame.orientation, unit);
}

function findModel(reader: XmlReader, root: Element): Element {
  if (root.localName === "model") return root;
  if (root.localName !== "sdf") return reader.fail(root, `expected <sdf> root, found <${root.localName}>`);
  const model = firstChild(root, "model") ?? childElements(root, "world").map((w) => firstChild(w, "model"))[0];
  if (!model) return reader.fail(root, "no <model> found at the document root or in the first <world>");
  return model;
}

export function parseSdfModel(reader: XmlReader, model: Element, source: string) {
  for (const tag of ["model", "include"]) {
    for (const nested of childElements(model, tag)) {
      reader.unsupported(nested, tag, `Nested <${tag}> is not composed; its links are ignored.`);
    }
  }

  const graph = new SdfFrameGraph(reader);
  const linkEls = childElements(model, "link");
  const jointEls = childElements(model, "joint");
  for (const link of linkEls) graph.add(reader.requireAttr(link, "name"), link, MODEL_FRAME);
  for (const joint of jointEls) {
    const childEl = reader.requireChild(joint, "child");
    graph.add(reader.requireAttr(joint, "name"), joint, childEl.textContent?.trim() ?? "");
  }
  for (const frame of childElements(model, "frame")) {
    graph.add(reader.requireAttr(frame, "name"), frame, frame.getAttribute("attached_to")?.trim() || MODEL_FRAME);
  }

  const links: Link[] = linkEls.map((link) => {
    const name = reader.requireAttr(link, "name");
    return {
      name,
      inertial: readInertial(reader, graph, name, link),
      collisions: readShapes(reader, graph, name, link, "collision"),
      visuals: readShapes(reader, graph, name, link, "visual"),
      location: reader.location(link),
    };
  });

  const joints: Joint[] = [];
  for (const node of jointEls) {
    const name = reader.requireAttr(node, "name");
    const kind = readJointKind(reader, node);
    const parent = childText(node, "parent");
    const child = childText(node, "child");
    if (!parent) return reader.fail(node, `joint '${name}' has an empty <parent>`);
    if (!child) return reader.fail(node, `joint '${name}' has an empty <child>`);
    if (parent === "world") {
      logger.debug(`Joint '${name}' anchors the model to the world; not part of the link tree.`);
      continue;
    }
    const origin = relativePose(graph.resolve(parent, node), graph.resolve(child, node));
    joints.push({
      name,
      kind,
      parentLink: parent,
      childLink: child,
      origin,
      axis:
        node.getAttribute("type") === "ball"
          ? BALL_JOINT_AXIS
          : AXIS_JOINT_KINDS.has(kind)
            ? readAxis(reader, graph, node, name, child)
            : undefined,
      location: reader.location(node),
    });
  }

  return finalizeModel({
    name: model.getAttribute("name") || "sdf_model",
    format: "sdf",
    source,
    location: reader.location(model),
    links,
    joints,
    warnings: reader.warnings,
  });
}

export function parseSdfString(sdf: string, file = "<sdf>") {
  const { doc, reader } = parseXmlDocument(sdf, file);
  return parseSdfModel(reader, findModel(reader, doc.documentElement), file);
}

export const sdfAdapter: FormatAdapter = {
  format: "sdf",
  extensions: [".sdf", ".world"],
  categories: new Set(FIELD_CATEGORIES),
  parse: (source: ModelSource) => parseSdfString(source.text, source.path),
};
