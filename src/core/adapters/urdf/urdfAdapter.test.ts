import { describe, expect, it } from "vitest";
import { ParseError } from "../../model/errors";
import { angularDistance, quatFromRpy } from "../../normalize/orientation";
import { parseUrdfString } from "./urdfAdapter";

// ── fixtures ─────────────────────────────────────────────────────────────────

const ARM_URDF = `
<robot name="arm">
  <link name="base">
    <inertial>
      <origin xyz="0 0 0.05" rpy="0 0 0"/>
      <mass value="2.5"/>
      <inertia ixx="0.1" ixy="0" ixz="0" iyy="0.2" iyz="0" izz="0.3"/>
    </inertial>
    <collision name="base_box">
      <origin xyz="0 0 0.05" rpy="0 0 0"/>
      <geometry><box size="0.2 0.4 0.1"/></geometry>
    </collision>
    <visual>
      <geometry><mesh filename="package://arm_description/meshes/base.stl" scale="0.001 0.001 0.001"/></geometry>
      <material name="grey"><color rgba="0.5 0.5 0.5 1"/></material>
    </visual>
  </link>
  <link name="upper">
    <collision>
      <geometry><cylinder radius="0.03" length="0.4"/></geometry>
    </collision>
  </link>
  <joint name="shoulder" type="revolute">
    <parent link="base"/>
    <child link="upper"/>
    <origin xyz="0 0 0.1" rpy="0 0 1.5707963267948966"/>
    <axis xyz="0 0 2"/>
    <limit lower="-1" upper="1" effort="10" velocity="1"/>
  </joint>
</robot>
`;

const withBody = (body: string) => `<robot name="r">${body}</robot>`;

const parseError = (run: () => unknown) => {
  try {
    run();
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error("expected a ParseError");
};

// ── tests ────────────────────────────────────────────────────────────────────

describe("parseUrdfString", () => {
  it("reads links, inertials and shapes", () => {
    const model = parseUrdfString(ARM_URDF, "arm.urdf");
    expect(model.name).toBe("arm");
    expect(model.format).toBe("urdf");
    expect(model.rootLink).toBe("base");
    expect(model.links.map((link) => link.name)).toEqual(["base", "upper"]);

    const base = model.links[0];
    expect(base.inertial).toEqual({
      mass: 2.5,
      centerOfMass: [0, 0, 0.05],
      inertiaTensor: { ixx: 0.1, ixy: 0, ixz: 0, iyy: 0.2, iyz: 0, izz: 0.3 },
    });
    expect(base.collisions[0].name).toBe("base_box");
    expect(base.collisions[0].geometry).toEqual({ kind: "box", size: [0.2, 0.4, 0.1] });
    expect(base.collisions[0].location).toEqual({ file: "arm.urdf", path: "/robot/link[1]/collision", line: 9 });
    expect(base.visuals[0].geometry).toEqual({ kind: "mesh", reference: "meshes/base.stl", scale: [0.001, 0.001, 0.001] });
    expect(model.links[1].collisions[0].geometry).toEqual({ kind: "cylinder", radius: 0.03, length: 0.4 });
  });

  it("reads joints with a normalized axis in the child frame", () => {
    const [joint] = parseUrdfString(ARM_URDF).joints;
    expect(joint.kind).toBe("revolute");
    expect(joint.parentLink).toBe("base");
    expect(joint.childLink).toBe("upper");
    expect(joint.origin.position).toEqual([0, 0, 0.1]);
    expect(angularDistance(joint.origin.orientation, quatFromRpy([0, 0, Math.PI / 2]))).toBeLessThan(1e-12);
    expect(joint.axis).toEqual([0, 0, 1]);
  });

  it("defaults the axis to +X", () => {
    const model = parseUrdfString(
      withBody(`
        <link name="a"/><link name="b"/>
        <joint name="j" type="continuous"><parent link="a"/><child link="b"/></joint>`)
    );
    expect(model.joints[0].axis).toEqual([1, 0, 0]);
    expect(model.joints[0].origin).toEqual({ position: [0, 0, 0], orientation: [1, 0, 0, 0] });
  });

  it("returns a frozen model", () => {
    const model = parseUrdfString(ARM_URDF);
    expect(Object.isFrozen(model)).toBe(true);
    expect(Object.isFrozen(model.links[0].collisions[0].geometry)).toBe(true);
  });

  it("keeps parsing past an unsupported geometry and records one warning", () => {
    const model = parseUrdfString(
      withBody(`
        <link name="a">
          <collision><geometry><heightmap/></geometry></collision>
          <collision><geometry><sphere radius="0.1"/></geometry></collision>
        </link>`),
      "odd.urdf"
    );
    expect(model.links[0].collisions).toHaveLength(1);
    expect(model.links[0].collisions[0].geometry).toEqual({ kind: "sphere", radius: 0.1 });
    expect(model.warnings).toEqual([
      {
        element: "heightmap",
        reason: "Unsupported geometry <heightmap> ignored.",
        location: { file: "odd.urdf", path: "/robot/link/collision[1]/geometry/heightmap", line: 3 },
      },
    ]);
  });

  it("keeps an unknown joint type as fixed with a warning", () => {
    const model = parseUrdfString(
      withBody(`<link name="a"/><link name="b"/><joint name="j" type="spiral"><parent link="a"/><child link="b"/></joint>`)
    );
    expect(model.joints[0].kind).toBe("fixed");
    expect(model.joints[0].axis).toBeUndefined();
    expect(model.warnings.map((w) => w.element)).toEqual(["joint type 'spiral'"]);
  });

  it.each([
    ["a missing mass", `<link name="a"><inertial><inertia ixx="1"/></inertial></link>`, "is missing required <mass>"],
    ["a duplicate link", `<link name="a"/><link name="a"/>`, "duplicate link name 'a'"],
    ["a zero axis", `<link name="a"/><link name="b"/><joint name="j" type="revolute"><parent link="a"/><child link="b"/><axis xyz="0 0 0"/></joint>`, "zero-length axis"],
    ["two roots", `<link name="a"/><link name="b"/>`, "2 root links"],
    ["a negative radius", `<link name="a"><collision><geometry><sphere radius="-1"/></geometry></collision></link>`, "sphere radius must be positive"],
    ["an unknown link", `<link name="a"/><joint name="j" type="fixed"><parent link="a"/><child link="z"/></joint>`, "unknown link 'z'"],
  ])("rejects %s", (_label, body, reason) => {
    expect(() => parseUrdfString(withBody(body))).toThrow(reason);
    expect(() => parseUrdfString(withBody(body))).toThrow(ParseError);
  });

  it("locates a structural error on the line of the offending element", () => {
    const urdf = withBody(`
      <link name="a"/>
      <link name="b"/>
      <joint name="j" type="fixed">
        <parent link="a"/>
      </joint>`);
    expect(parseError(() => parseUrdfString(urdf, "a.urdf")).location).toEqual({ file: "a.urdf", path: "/robot/joint", line: 4 });
  });

  it("reports the line malformed XML breaks on", () => {
    const error = parseError(() => parseUrdfString(`<robot name="r">\n  <link name="a">\n</robot>`, "bad.urdf"));
    expect(error.location).toEqual({ file: "bad.urdf", path: "/", line: 3 });
    expect(error.message).toContain("malformed XML");
  });

  it("rejects malformed XML and a foreign root", () => {
    expect(() => parseUrdfString("<robot><link name='a'></robot>")).toThrow(/malformed XML/);
    expect(() => parseUrdfString("<sdf/>")).toThrow("expected <robot> root, found <sdf>");
  });
});
