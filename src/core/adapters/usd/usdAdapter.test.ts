import { describe, expect, it } from "vitest";
import { angularDistance, quatFromRpy, rotateVector } from "../../normalize/orientation";
import { parseUsdString } from "./usdAdapter";

const expectVecClose = (actual: readonly number[] | undefined, expected: readonly number[]) => {
  expect(actual).toHaveLength(expected.length);
  (actual ?? []).forEach((value, i) => expect(value).toBeCloseTo(expected[i], 9));
};

const ARM_USDA = `#usda 1.0
(
    defaultPrim = "arm"
    metersPerUnit = 1
    kilogramsPerUnit = 1
)

def Xform "arm"
{
    def Xform "base" (
        prepend apiSchemas = ["PhysicsRigidBodyAPI", "PhysicsMassAPI"]
    )
    {
        float physics:mass = 2.5
        point3f physics:centerOfMass = (0, 0, 0.05)
        float3 physics:diagonalInertia = (0.1, 0.2, 0.3)

        def Cube "base_box" (
            prepend apiSchemas = ["PhysicsCollisionAPI"]
        )
        {
            double size = 1
            double3 xformOp:translate = (0, 0, 0.05)
            float3 xformOp:scale = (0.2, 0.4, 0.1)
            uniform token[] xformOpOrder = ["xformOp:translate", "xformOp:scale"]
        }

        def Mesh "base_visual"
        {
        }
    }

    def Xform "upper" (
        prepend apiSchemas = ["PhysicsRigidBodyAPI"]
    )
    {
        def Cylinder "upper_cyl" (
            prepend apiSchemas = ["PhysicsCollisionAPI"]
        )
        {
            double radius = 0.03
            double height = 0.4
            uniform token axis = "Z"
        }
    }

    def PhysicsRevoluteJoint "shoulder"
    {
        rel physics:body0 = </arm/base>
        rel physics:body1 = </arm/upper>
        point3f physics:localPos0 = (0, 0, 0.1)
        quatf physics:localRot0 = (0.7071067811865476, 0, 0, 0.7071067811865476)
        point3f physics:localPos1 = (0, 0, 0)
        quatf physics:localRot1 = (1, 0, 0, 0)
        uniform token physics:axis = "Z"
        float physics:lowerLimit = -57.3
        float physics:upperLimit = 57.3
    }
}
`;

/** A one-link stage whose link holds `shapes`. */
const oneLink = (shapes: string, header = "metersPerUnit = 1") => `#usda 1.0
(
    ${header}
)
def Xform "bot" {
    def Xform "a" (prepend apiSchemas = ["PhysicsRigidBodyAPI"]) {
        ${shapes}
    }
}
`;

describe("parseUsdString", () => {
  it("finds rigid bodies as links and physics joints as joints", () => {
    const model = parseUsdString(ARM_USDA, "arm.usda");
    expect(model.name).toBe("arm");
    expect(model.format).toBe("usd");
    expect(model.links.map((l) => l.name)).toEqual(["base", "upper"]);
    expect(model.rootLink).toBe("base");
    expect(model.warnings).toEqual([]);

    const [joint] = model.joints;
    expect(joint.name).toBe("shoulder");
    expect(joint.kind).toBe("revolute");
    expectVecClose(joint.origin.position, [0, 0, 0.1]);
    expect(angularDistance(joint.origin.orientation, quatFromRpy([0, 0, Math.PI / 2]))).toBeLessThan(1e-9);
    expectVecClose(joint.axis, [0, 0, 1]);
  });

  it("reads mass properties and gprims in the link frame", () => {
    const [base, upper] = parseUsdString(ARM_USDA).links;
    expect(base.inertial?.mass).toBe(2.5);
    expectVecClose(base.inertial?.centerOfMass, [0, 0, 0.05]);
    expect(base.inertial?.inertiaTensor.iyy).toBeCloseTo(0.2, 9);

    const [box] = base.collisions;
    expect(box.name).toBe("base_box");
    expect(box.geometry.kind).toBe("box");
    expectVecClose(box.geometry.kind === "box" ? box.geometry.size : [], [0.2, 0.4, 0.1]);
    expectVecClose(box.pose.position, [0, 0, 0.05]);

    expect(base.visuals.map((s) => s.geometry)).toEqual([{ kind: "mesh", reference: "usd:base/base_visual", scale: [1, 1, 1] }]);
    expect(upper.inertial).toBeUndefined();
    expect(upper.collisions[0].geometry).toEqual({ kind: "cylinder", radius: 0.03, length: 0.4 });
  });

  it("falls back to centimeter stage units", () => {
    const model = parseUsdString(
      oneLink(
        `def Sphere "s" (prepend apiSchemas = ["PhysicsCollisionAPI"]) {
            double radius = 50
            double3 xformOp:translate = (0, 0, 100)
            uniform token[] xformOpOrder = ["xformOp:translate"]
        }`,
        'upAxis = "Z"'
      )
    );
    const [shape] = model.links[0].collisions;
    expect(shape.geometry).toEqual({ kind: "sphere", radius: 0.5 });
    expectVecClose(shape.pose.position, [0, 0, 1]);
  });

  it("turns X-axis capsules onto +Z and applies rotate ops", () => {
    const model = parseUsdString(
      oneLink(`
        def Capsule "c" (prepend apiSchemas = ["PhysicsCollisionAPI"]) {
            double radius = 0.1
            double height = 0.5
            uniform token axis = "X"
        }
        def Cube "k" (prepend apiSchemas = ["PhysicsCollisionAPI"]) {
            float3 xformOp:rotateXYZ = (0, 0, 90)
            uniform token[] xformOpOrder = ["xformOp:rotateXYZ"]
        }`)
    );
    const [capsule, cube] = model.links[0].collisions;
    expect(capsule.geometry).toEqual({ kind: "capsule", radius: 0.1, length: 0.5 });
    expectVecClose(rotateVector(capsule.pose.orientation, [0, 0, 1]), [1, 0, 0]);
    expect(angularDistance(cube.pose.orientation, quatFromRpy([0, 0, Math.PI / 2]))).toBeLessThan(1e-9);
  });

  it("splits scoped collisions from visuals", () => {
    const model = parseUsdString(
      oneLink(`
        def Scope "collisions" {
            def Sphere "hull" (prepend apiSchemas = ["PhysicsCollisionAPI"]) { double radius = 0.2 }
            def Sphere "not_a_collider" { double radius = 0.3 }
        }
        def Scope "visuals" {
            def Sphere "look" { double radius = 0.25 }
        }`)
    );
    const [link] = model.links;
    expect(link.collisions.map((s) => s.name)).toEqual(["hull"]);
    expect(link.visuals.map((s) => s.name)).toEqual(["look"]);
  });

  it("warns about gprims it does not model", () => {
    const model = parseUsdString(oneLink(`def Cone "tip" {}`));
    expect(model.links[0].visuals).toEqual([]);
    expect(model.warnings.map((w) => w.element)).toEqual(["Cone prim"]);
  });

  it("skips world joints and keeps unknown joint types as fixed", () => {
    const model = parseUsdString(`#usda 1.0
(
    metersPerUnit = 1
)
def Xform "bot" {
    def Xform "a" (prepend apiSchemas = ["PhysicsRigidBodyAPI"]) {}
    def Xform "b" (prepend apiSchemas = ["PhysicsRigidBodyAPI"]) {}
    def PhysicsFixedJoint "anchor" { rel physics:body1 = </bot/a> }
    def PhysicsDistanceJoint "tether" {
        rel physics:body0 = </bot/a>
        rel physics:body1 = </bot/b>
    }
}
`);
    expect(model.joints.map((j) => [j.name, j.kind])).toEqual([["tether", "fixed"]]);
    expect(model.warnings.map((w) => w.element)).toEqual(["PhysicsDistanceJoint prim"]);
  });

  it("rejects a joint body outside the robot", () => {
    const text = oneLink(`def "x" {}`).replace(
      "def Xform \"a\"",
      `def PhysicsRevoluteJoint "j" {
        rel physics:body0 = </bot/a>
        rel physics:body1 = </bot/a/x>
    }
    def Xform "a"`
    );
    expect(() => parseUsdString(text)).toThrow("'/bot/a/x' is not a link of this robot");
  });

  it("rejects mistyped attributes and an empty stage", () => {
    expect(() => parseUsdString(oneLink(`def Sphere "s" { double radius = "big" }`))).toThrow("'radius' is not a number");
    expect(() => parseUsdString("#usda 1.0\n")).toThrow("stage has no default prim and no root prim");
  });
});
