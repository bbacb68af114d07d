import { describe, expect, it } from "vitest";
import { parseUrdfString } from "../adapters/urdf/urdfAdapter";
import { alignModels } from "../align/alignment";
import { FIELD_CATEGORIES, type CanonicalModel, type FieldCategory } from "../model/types";
import { type DiffSettings, compareFieldPaths, diffAligned } from "./diffEngine";

type ArmOptions = {
  mass?: number;
  yaw?: number;
  jointType?: string;
  childLink?: string;
  baseShapes?: string;
  baseInertial?: boolean;
};

const BOX = `<collision><geometry><box size="0.2 0.4 0.1"/></geometry></collision>`;

const arm = (o: ArmOptions = {}) =>
  parseUrdfString(`
<robot name="arm">
  <link name="base">
    ${
      o.baseInertial === false
        ? ""
        : `<inertial><mass value="${o.mass ?? 2.5}"/><inertia ixx="0.1" ixy="0" ixz="0" iyy="0.2" iyz="0" izz="0.3"/></inertial>`
    }
    ${o.baseShapes ?? BOX}
  </link>
  <link name="upper"/>
  <link name="tool"/>
  <joint name="shoulder" type="${o.jointType ?? "revolute"}">
    <parent link="base"/><child link="${o.childLink ?? "upper"}"/>
    <origin xyz="0 0 0.1" rpy="0 0 ${o.yaw ?? 0}"/>
    <axis xyz="0 0 1"/>
  </joint>
  <joint name="wrist" type="fixed">
    <parent link="${o.childLink ?? "upper"}"/><child link="${o.childLink === "tool" ? "upper" : "tool"}"/>
  </joint>
</robot>`);

const settings = (overrides: Partial<DiffSettings> = {}): DiffSettings => ({
  toleranceLinear: 1e-6,
  toleranceAngular: 1e-6,
  toleranceMode: "absolute",
  categories: new Set<FieldCategory>(FIELD_CATEGORIES),
  meshReference: "path",
  ...overrides,
});

const diff = (a: CanonicalModel, b: CanonicalModel, overrides: Partial<DiffSettings> = {}) =>
  diffAligned(alignModels(a, b), settings(overrides));

describe("diffAligned", () => {
  it("finds nothing between identical models", () => {
    expect(diff(arm(), arm())).toEqual([]);
  });

  it("reports a single changed mass", () => {
    expect(diff(arm(), arm({ mass: 2.6 }))).toEqual([
      {
        entityKind: "link",
        entityId: "base",
        fieldPath: "inertial.mass",
        category: "inertial",
        valueA: 2.5,
        valueB: 2.6,
        classification: "mismatch",
      },
    ]);
  });

  it("never reports more as the tolerance grows", () => {
    const a = arm();
    const b = arm({ mass: 2.6, yaw: 0.05 });
    const sizes = [1e-9, 1e-3, 0.08, 0.2].map((tol) => diff(a, b, { toleranceLinear: tol, toleranceAngular: tol }).length);
    expect(sizes).toEqual([2, 2, 1, 0]);
  });

  it("scales the bound by magnitude in relative mode", () => {
    const a = arm({ mass: 100 });
    const b = arm({ mass: 100.5 });
    expect(diff(a, b, { toleranceLinear: 0.01 })).toHaveLength(1);
    expect(diff(a, b, { toleranceLinear: 0.01, toleranceMode: "relative" })).toEqual([]);
  });

  it("compares orientations by angular distance", () => {
    const [entry] = diff(arm(), arm({ yaw: 0.01 }));
    expect(entry.fieldPath).toBe("origin.orientation");
    expect(entry.entityKind).toBe("joint");
    expect(entry.category).toBe("kinematics");
    expect(entry.valueA).toEqual([1, 0, 0, 0]);
    expect(diff(arm(), arm({ yaw: 0.01 }), { toleranceAngular: 0.02 })).toEqual([]);
  });

  it("reports the axis of a joint that lost it", () => {
    const entries = diff(arm(), arm({ jointType: "fixed" }));
    expect(entries.map((e) => [e.fieldPath, e.classification, e.valueA, e.valueB])).toEqual([
      ["axis", "removed_from_b", [0, 0, 1], null],
      ["kind", "mismatch", "revolute", "fixed"],
    ]);
  });

  it("reports a one-sided inertial with its mass", () => {
    const [entry] = diff(arm(), arm({ baseInertial: false }));
    expect(entry).toMatchObject({ fieldPath: "inertial", valueA: 2.5, valueB: null, classification: "removed_from_b" });
  });

  it("compares shape lists by index", () => {
    const sphere = `<collision><geometry><sphere radius="0.1"/></geometry></collision>`;
    const entries = diff(arm(), arm({ baseShapes: `${BOX}${sphere}` }));
    expect(entries).toEqual([
      {
        entityKind: "link",
        entityId: "base",
        fieldPath: "collisions.1",
        category: "collision",
        valueA: null,
        valueB: "sphere",
        classification: "added_in_b",
      },
    ]);
    const [kind] = diff(arm(), arm({ baseShapes: sphere }));
    expect([kind.fieldPath, kind.valueA, kind.valueB]).toEqual(["collisions.0.geometry.kind", "box", "sphere"]);
  });

  it("compares mesh references through the selected view", () => {
    const mesh = (file: string) => `<visual><geometry><mesh filename="${file}"/></geometry></visual>`;
    const a = arm({ baseShapes: mesh("package://arm/meshes/base.stl") });
    const b = arm({ baseShapes: mesh("other/base.stl") });
    expect(diff(a, b).map((e) => [e.fieldPath, e.valueA, e.valueB])).toEqual([
      ["visuals.0.geometry.reference", "meshes/base.stl", "other/base.stl"],
    ]);
    expect(diff(a, b, { meshReference: "basename" })).toEqual([]);
  });

  it("drops entries outside the selected categories", () => {
    const a = arm();
    const b = arm({ mass: 3, yaw: 0.5 });
    expect(diff(a, b, { categories: new Set<FieldCategory>(["kinematics"]) }).map((e) => e.fieldPath)).toEqual([
      "origin.orientation",
    ]);
    expect(diff(a, b, { categories: new Set<FieldCategory>(["inertial"]) }).map((e) => e.fieldPath)).toEqual([
      "inertial.mass",
    ]);
  });

  it("reports a name-matched joint between other links as unmatched structure", () => {
    const entries = diff(arm(), arm({ childLink: "tool" }));
    expect(entries.map((e) => [e.entityId, e.fieldPath, e.valueA, e.valueB, e.classification])).toEqual([
      ["shoulder", "topology", "base->upper", "base->tool", "unmatched_structure"],
      ["wrist", "topology", "upper->tool", "tool->upper", "unmatched_structure"],
    ]);
  });

  it("orders links before joints and presence before fields", () => {
    const b = parseUrdfString(`
<robot name="arm">
  <link name="base"><collision><geometry><box size="0.2 0.4 0.1"/></geometry></collision></link>
  <link name="upper"/>
  <link name="extra"/>
  <joint name="shoulder" type="revolute">
    <parent link="base"/><child link="upper"/>
    <origin xyz="0 0 0.2" rpy="0 0 0"/>
    <axis xyz="0 0 1"/>
  </joint>
  <joint name="bolt" type="fixed"><parent link="upper"/><child link="extra"/></joint>
</robot>`);
    const entries = diff(arm(), b);
    expect(entries.map((e) => `${e.entityKind}:${e.entityId}:${e.fieldPath}:${e.classification}`)).toEqual([
      "link:base:inertial:removed_from_b",
      "link:extra::added_in_b",
      "link:tool::removed_from_b",
      "joint:bolt::added_in_b",
      "joint:shoulder:origin.position:mismatch",
      "joint:wrist::removed_from_b",
    ]);
  });
});

describe("compareFieldPaths", () => {
  it("compares numeric segments by value", () => {
    const paths = ["inertial.mass", "collisions.10.pose.position", "", "collisions.2.geometry.radius", "collisions.2"];
    expect([...paths].sort(compareFieldPaths)).toEqual([
      "",
      "collisions.2",
      "collisions.2.geometry.radius",
      "collisions.10.pose.position",
      "inertial.mass",
    ]);
  });
});
