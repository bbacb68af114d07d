import {
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
import { IDENTITY_POSE, composePose, makePose } from "../../normalize/frames";
import { fullExtentsFromHalf, fullLengthFromHalf, meshStem, normalizeMeshReference } from "../../normalize/geometry";
import {
  type MassPart,
  combineMassParts,
  inertialFromFrame,
  primitiveInertia,
  primitiveVolume,
  rotateTensor,
  tensorFromDiagonal,
} from "../../normalize/inertia";
import {
  IDENTITY_QUAT,
  degToRad,
  quatFromAxisAngle,
  quatFromEuler,
  quatFromFrameAxes,
  quatFromWxyz,
  quatFromZAxis,
} from "../../normalize/orientation";
import { scopedLogger } from "../../services/logger";
import type { FormatAdapter, ModelSource } from "../types";
import { XmlReader, childElements, parseXmlDocument } from "../xml";
import { MjcfDefaults } from "./mjcfDefaults";

const logger = scopedLogger("mjcf");

type CompilerSettings = {
  degrees: boolean;
  eulerseq: string;
  meshdir: string;
  inertiaFromGeom: "true" | "false" | "auto";
  autolimits: boolean;
};

type MeshAsset = { reference: string; scale: Vec3 };

type MjcfContext = {
  reader: XmlReader;
  defaults: MjcfDefaults;
  compiler: CompilerSettings;
  meshes: Map<string, MeshAsset>;
  links: Link[];
  joints: Joint[];
};

/** An element found inside a body, with the pose of any `<frame>` chain around it. */
type Placed = { el: Element; frame: Pose };

type BodyContent = {
  geoms: Placed[];
  bodies: Placed[];
  joints: Element[];
  inertial: Element | null;
};

const DEFAULT_DENSITY = 1000;

const UNSUPPORTED_GEOMS = new Set(["plane", "ellipsoid", "hfield", "sdf"]);

const UNCOMPOSED_ELEMENTS = ["include", "attach", "replicate"];

type AttrGetter = (name: string) => string | null;

function readCompiler(reader: XmlReader, root: Element): CompilerSettings {
  const settings: CompilerSettings = {
    degrees: true,
    eulerseq: "xyz",
    meshdir: "",
    inertiaFromGeom: "auto",
    autolimits: true,
  };
  for (const el of childElements(root, "compiler")) {
    const angle = el.getAttribute("angle");
    if (angle !== null) {
      if (angle !== "degree" && angle !== "radian") reader.fail(el, `unknown compiler angle '${angle}'`);
      settings.degrees = angle === "degree";
    }
    const seq = el.getAttribute("eulerseq");
    if (seq !== null) {
      if (!/^[xyzXYZ]{3}$/.test(seq)) reader.fail(el, `invalid eulerseq '${seq}'`);
      settings.eulerseq = seq;
    }
    const dir = el.getAttribute("meshdir") ?? el.getAttribute("assetdir");
    if (dir !== null) settings.meshdir = dir;
    const fromGeom = el.getAttribute("inertiafromgeom");
    if (fromGeom === "true" || fromGeom === "false" || fromGeom === "auto") settings.inertiaFromGeom = fromGeom;
    else if (fromGeom !== null) reader.fail(el, `invalid inertiafromgeom '${fromGeom}'`);
    const autolimits = el.getAttribute("autolimits");
    if (autolimits !== null) settings.autolimits = autolimits === "true";
  }
  return settings;
}

function readMeshes(ctx: MjcfContext, root: Element) {
  for (const asset of childElements(root, "asset")) {
    for (const mesh of childElements(asset, "mesh")) {
      const file = mesh.getAttribute("file");
      const name = mesh.getAttribute("name") ?? (file ? meshStem(normalizeMeshReference(file)) : null);
      if (!name) return ctx.reader.fail(mesh, "<mesh> needs a 'name' or a 'file'");
      // Inline vertex data has no reference to compare.
      if (!file) continue;
      const joined = ctx.compiler.meshdir ? `${ctx.compiler.meshdir}/${file}` : file;
      ctx.meshes.set(name, {
        reference: normalizeMeshReference(joined),
        scale: ctx.reader.vector(mesh, ctx.defaults.attr(mesh, "scale"), "mesh scale", [1, 1, 1]),
      });
    }
  }
}

function angle(ctx: MjcfContext, value: number) {
  return ctx.compiler.degrees ? degToRad(value) : value;
}

function readPose(ctx: MjcfContext, el: Element, get: AttrGetter = (name) => el.getAttribute(name)): Pose {
  const { reader } = ctx;
  const position = reader.vector(el, get("pos"), "pos", [0, 0, 0]);
  const present = ["quat", "axisangle", "euler", "xyaxes", "zaxis"].filter((name) => get(name) !== null);
  // The element's own orientation replaces whatever form its default class sets.
  const own = present.filter((name) => el.hasAttribute(name));
  const specs = own.length ? own : present;
  if (specs.length > 1) reader.fail(el, `orientation given more than once (${specs.join(", ")})`);
  const [spec] = specs;
  if (spec === undefined) return makePose(position, IDENTITY_QUAT);

  const raw = get(spec) ?? "";
  let orientation: Pose["orientation"] | null = null;
  switch (spec) {
    case "quat":
      orientation = quatFromWxyz(reader.numbers(el, raw, "quat", 4));
      break;
    case "axisangle": {
      const [x, y, z, a] = reader.numbers(el, raw, "axisangle", 4);
      orientation = quatFromAxisAngle([x, y, z], angle(ctx, a));
      break;
    }
    case "euler": {
      const [a, b, c] = reader.numbers(el, raw, "euler", 3).map((v) => angle(ctx, v));
      orientation = quatFromEuler([a, b, c], ctx.compiler.eulerseq);
      break;
    }
    case "xyaxes": {
      const v = reader.numbers(el, raw, "xyaxes", 6);
      orientation = quatFromFrameAxes([v[0], v[1], v[2]], [v[3], v[4], v[5]]);
      break;
    }
    case "zaxis":
      orientation = quatFromZAxis(reader.vector(el, raw, "zaxis"));
      break;
  }
  if (!orientation) return reader.fail(el, `degenerate ${spec} '${raw.trim()}'`);
  return makePose(position, orientation);
}

function collectContent(ctx: MjcfContext, container: Element, frame: Pose, out: BodyContent): BodyContent {
  for (const child of childElements(container)) {
    switch (child.localName) {
      case "geom":
        out.geoms.push({ el: child, frame });
        break;
      case "body":
        out.bodies.push({ el: child, frame });
        break;
      case "frame":
        collectContent(ctx, child, composePose(frame, readPose(ctx, child)), out);
        break;
      case "joint":
      case "freejoint":
        out.joints.push(child);
        break;
      case "inertial":
        out.inertial = child;
        break;
    }
  }
  return out;
}

const emptyContent = (): BodyContent => ({ geoms: [], bodies: [], joints: [], inertial: null });

type PlacedGeometry = { pose: Pose; geometry: Geometry };

function readFromTo(ctx: MjcfContext, el: Element, raw: string) {
  const v = ctx.reader.numbers(el, raw, "fromto", 6);
  const dir: Vec3 = [v[3] - v[0], v[4] - v[1], v[5] - v[2]];
  const length = Math.hypot(...dir);
  const orientation = quatFromZAxis(dir);
  if (!orientation) return ctx.reader.fail(el, "fromto endpoints coincide");
  const center: Vec3 = [(v[0] + v[3]) / 2, (v[1] + v[4]) / 2, (v[2] + v[5]) / 2];
  return { pose: makePose(center, orientation), length };
}

function readGeom(ctx: MjcfContext, el: Element): PlacedGeometry | null {
  const { reader, defaults } = ctx;
  const get: AttrGetter = (name) => defaults.attr(el, name);
  const type = get("type") ?? (get("mesh") !== null ? "mesh" : "sphere");
  const size = () => {
    const raw = get("size");
    if (raw === null) return reader.fail(el, `${type} geom is missing 'size'`);
    return reader.numbers(el, raw, `${type} size`);
  };
  const fromto = get("fromto");
  const span = fromto !== null && type !== "sphere" && type !== "mesh" ? readFromTo(ctx, el, fromto) : null;
  const pose = span?.pose ?? readPose(ctx, el, get);

  switch (type) {
    case "sphere":
      return { pose, geometry: { kind: "sphere", radius: size()[0] } };
    case "box": {
      const s = size();
      if (span) return { pose, geometry: { kind: "box", size: [2 * s[0], 2 * (s[1] ?? s[0]), span.length] } };
      if (s.length < 3) return reader.fail(el, "box size expects 3 half-extents");
      return { pose, geometry: { kind: "box", size: fullExtentsFromHalf([s[0], s[1], s[2]]) } };
    }
    case "cylinder":
    case "capsule": {
      const kind = type === "capsule" ? "capsule" : "cylinder";
      const s = size();
      if (!span && s.length < 2) return reader.fail(el, `${kind} size expects radius and half-length`);
      return { pose, geometry: { kind, radius: s[0], length: span ? span.length : fullLengthFromHalf(s[1]) } };
    }
    case "mesh": {
      const name = get("mesh");
      if (!name) return reader.fail(el, "mesh geom is missing 'mesh'");
      const asset = ctx.meshes.get(name);
      if (!asset) {
        reader.unsupported(el, `mesh '${name}'`, `Mesh asset '${name}' has no file reference; geom ignored.`);
        return null;
      }
      return { pose, geometry: { kind: "mesh", reference: asset.reference, scale: asset.scale } };
    }
    default:
      reader.unsupported(
        el,
        `geom type '${type}'`,
        UNSUPPORTED_GEOMS.has(type) ? `Geom type '${type}' is not modeled; ignored.` : `Unknown geom type '${type}' ignored.`
      );
      return null;
  }
}

function isVisualGeom(ctx: MjcfContext, el: Element) {
  const cls = ctx.defaults.classOf(el);
  if (ctx.defaults.inherits(cls, "visual")) return true;
  if (ctx.defaults.inherits(cls, "collision")) return false;
  const contype = Number(ctx.defaults.attr(el, "contype") ?? "1");
  const conaffinity = Number(ctx.defaults.attr(el, "conaffinity") ?? "1");
  return contype === 0 && conaffinity === 0;
}

function readInertial(ctx: MjcfContext, el: Element): Inertial {
  const { reader } = ctx;
  const mass = reader.number(el, el.getAttribute("mass"), "inertial mass");
  const frame = readPose(ctx, el);
  const diag = el.getAttribute("diaginertia");
  const full = el.getAttribute("fullinertia");
  if (diag !== null && full !== null) reader.fail(el, "both diaginertia and fullinertia are given");
  if (full !== null) {
    const [ixx, iyy, izz, ixy, ixz, iyz] = reader.numbers(el, full, "fullinertia", 6);
    return inertialFromFrame(mass, frame, { ixx, ixy, ixz, iyy, iyz, izz });
  }
  if (diag === null) return reader.fail(el, "<inertial> needs diaginertia or fullinertia");
  return inertialFromFrame(mass, frame, tensorFromDiagonal(reader.vector(el, diag, "diaginertia")));
}

function inertialFromGeoms(ctx: MjcfContext, geoms: readonly { el: Element; placed: PlacedGeometry }[]) {
  const parts: MassPart[] = [];
  for (const { el, placed } of geoms) {
    const volume = primitiveVolume(placed.geometry);
    if (volume === null) {
      ctx.reader.unsupported(el, "mesh inertia", "Inertia of a mesh geom cannot be derived; geom left out of the body mass.");
      continue;
    }
    const explicitMass = ctx.defaults.attr(el, "mass");
    const mass =
      explicitMass !== null
        ? ctx.reader.number(el, explicitMass, "geom mass")
        : ctx.reader.number(el, ctx.defaults.attr(el, "density"), "geom density", DEFAULT_DENSITY) * volume;
    const principal = primitiveInertia(placed.geometry, mass);
    if (!principal || mass <= 0) continue;
    parts.push({
      mass,
      centerOfMass: placed.pose.position,
      inertiaTensor: rotateTensor(tensorFromDiagonal(principal), placed.pose.orientation),
    });
  }
  return combineMassParts(parts) ?? undefined;
}

function jointKind(ctx: MjcfContext, el: Element, type: string): JointKind | null {
  switch (type) {
    case "hinge": {
      const limited = ctx.defaults.attr(el, "limited") ?? "auto";
      if (limited === "true") return "revolute";
      if (limited === "false") return "continuous";
      return ctx.compiler.autolimits && ctx.defaults.attr(el, "range") !== null ? "revolute" : "continuous";
    }
    case "slide":
      return "prismatic";
    case "ball":
      return "continuous";
    case "free":
      return "floating";
    default:
      return null;
  }
}

function readJoint(ctx: MjcfContext, joints: Element[], parent: string, child: string, body: Element, origin: Pose) {
  const { reader, defaults } = ctx;
  const [el, ...extra] = joints;
  for (const other of extra) {
    reader.unsupported(other, "joint", `Body '${child}' has more than one joint; only the first is compared.`);
  }
  const location = reader.location(el ?? body);
  if (!el) {
    ctx.joints.push({ name: `${child}_fixed`, kind: "fixed", parentLink: parent, childLink: child, origin, location });
    return;
  }
  if (el.localName === "freejoint") {
    const name = el.getAttribute("name") ?? `${child}_freejoint`;
    ctx.joints.push({ name, kind: "floating", parentLink: parent, childLink: child, origin, location });
    return;
  }

  const name = el.getAttribute("name") ?? `${child}_joint`;
  const type = defaults.attr(el, "type") ?? "hinge";
  let kind = jointKind(ctx, el, type);
  if (!kind) {
    reader.unsupported(el, `joint type '${type}'`, `Unknown joint type '${type}' kept as fixed.`);
    kind = "fixed";
  }
  const anchor = reader.vector(el, defaults.attr(el, "pos"), "joint pos", [0, 0, 0]);
  if (anchor.some((v) => v !== 0)) {
    reader.unsupported(el, "joint pos", `Joint '${name}' anchor offset is not represented; compared at the body origin.`);
  }

  let axis: Vec3 | undefined;
  if (type === "ball") {
    axis = BALL_JOINT_AXIS;
  } else if (kind !== "fixed" && kind !== "floating") {
    const raw = reader.vector(el, defaults.attr(el, "axis"), "joint axis", [0, 0, 1]);
    const len = Math.hypot(...raw);
    if (len === 0) reader.fail(el, `joint '${name}' has a zero-length axis`);
    axis = [raw[0] / len, raw[1] / len, raw[2] / len];
  }
  ctx.joints.push({ name, kind, parentLink: parent, childLink: child, origin, axis, location });
}

function readBody(ctx: MjcfContext, body: Element, parent: { name: string; origin: Pose } | null) {
  const { reader } = ctx;
  const name = body.getAttribute("name");
  if (!name) return reader.fail(body, "<body> has no name; every body must be named to be compared");
  const content = collectContent(ctx, body, IDENTITY_POSE, emptyContent());

  const collisions: Shape[] = [];
  const visuals: Shape[] = [];
  const placedGeoms: { el: Element; placed: PlacedGeometry }[] = [];
  for (const { el, frame } of content.geoms) {
    const read = readGeom(ctx, el);
    if (!read) continue;
    const placed = { pose: composePose(frame, read.pose), geometry: read.geometry };
    placedGeoms.push({ el, placed });
    const shape: Shape = { name: el.getAttribute("name") ?? undefined, ...placed, location: reader.location(el) };
    (isVisualGeom(ctx, el) ? visuals : collisions).push(shape);
  }

  let inertial = content.inertial ? readInertial(ctx, content.inertial) : undefined;
  const fromGeom = ctx.compiler.inertiaFromGeom;
  if (fromGeom === "true" || (fromGeom === "auto" && !content.inertial)) {
    inertial = inertialFromGeoms(ctx, placedGeoms);
  }

  ctx.links.push({ name, inertial, collisions, visuals, location: reader.location(body) });

  if (parent) {
    readJoint(ctx, content.joints, parent.name, name, body, parent.origin);
  } else {
    for (const el of content.joints) {
      const isFree = el.localName === "freejoint" || ctx.defaults.attr(el, "type") === "free";
      if (isFree) {
        logger.debug(`Free joint on root body '${name}' ignored.`);
      } else {
        reader.unsupported(el, "joint", `Joint on root body '${name}' attaches it to the world; ignored.`);
      }
    }
  }

  for (const { el, frame } of content.bodies) {
    readBody(ctx, el, { name, origin: composePose(frame, readPose(ctx, el)) });
  }
}

export function parseMjcfString(mjcf: string, file = "<mjcf>") {
  const { doc, reader } = parseXmlDocument(mjcf, file);
  const root = doc.documentElement;
  if (root.localName !== "mujoco") return reader.fail(root, `expected <mujoco> root, found <${root.localName}>`);

  for (const tag of UNCOMPOSED_ELEMENTS) {
    for (const el of Array.from(root.getElementsByTagName(tag))) {
      reader.unsupported(el, tag, `<${tag}> is not expanded; its content is not compared.`);
    }
  }

  const ctx: MjcfContext = {
    reader,
    defaults: new MjcfDefaults(reader, root),
    compiler: readCompiler(reader, root),
    meshes: new Map(),
    links: [],
    joints: [],
  };
  readMeshes(ctx, root);

  const worldbodies = childElements(root, "worldbody");
  if (!worldbodies.length) return reader.fail(root, "<mujoco> has no <worldbody>");
  const top = worldbodies.flatMap((wb) => collectContent(ctx, wb, IDENTITY_POSE, emptyContent()).bodies);
  if (top.length !== 1) {
    return reader.fail(worldbodies[0], `expected exactly one top-level robot body, found ${top.length}`);
  }
  readBody(ctx, top[0].el, null);

  return finalizeModel({
    name: root.getAttribute("model") || "mjcf_model",
    format: "mjcf",
    source: file,
    location: reader.location(root),
    links: ctx.links,
    joints: ctx.joints,
    warnings: reader.warnings,
  });
}

export const mjcfAdapter: FormatAdapter = {
  format: "mjcf",
  extensions: [".xml", ".mjcf"],
  categories: new Set(FIELD_CATEGORIES),
  parse: (source: ModelSource) => parseMjcfString(source.text, source.path),
};
