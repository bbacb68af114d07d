import { describe, expect, it } from "vitest";
import {
  applyScale,
  convertGeometryUnits,
  fullExtentsFromHalf,
  meshBasename,
  meshStem,
  normalizeMeshReference,
  shapeAxisRotation,
} from "./geometry";
import { rotateVector } from "./orientation";

describe("extent conventions", () => {
  it("doubles half extents", () => {
    expect(fullExtentsFromHalf([1, 2, 3])).toEqual([2, 4, 6]);
  });
});

describe("shapeAxisRotation", () => {
  it("carries +Z onto the declared axis", () => {
    const x = rotateVector(shapeAxisRotation("X"), [0, 0, 1]);
    const y = rotateVector(shapeAxisRotation("Y"), [0, 0, 1]);
    [1, 0, 0].forEach((v, i) => expect(x[i]).toBeCloseTo(v, 12));
    [0, 1, 0].forEach((v, i) => expect(y[i]).toBeCloseTo(v, 12));
    expect(shapeAxisRotation("Z")).toEqual([1, 0, 0, 0]);
  });
});

describe("applyScale", () => {
  it("scales box extents per axis", () => {
    expect(applyScale({ kind: "box", size: [1, 2, 3] }, [2, 1, 0.5])).toEqual({ kind: "box", size: [2, 2, 1.5] });
  });

  it("uses the shape axis for length and the larger radial scale for radius", () => {
    expect(applyScale({ kind: "cylinder", radius: 1, length: 2 }, [3, 2, 5], "X")).toEqual({
      kind: "cylinder",
      radius: 5,
      length: 6,
    });
  });

  it("keeps mesh scale as data", () => {
    expect(applyScale({ kind: "mesh", reference: "a.stl", scale: [1, 2, 1] }, [2, 2, 2])).toEqual({
      kind: "mesh",
      reference: "a.stl",
      scale: [2, 4, 2],
    });
  });
});

describe("convertGeometryUnits", () => {
  it("converts lengths but not mesh scale", () => {
    expect(convertGeometryUnits({ kind: "sphere", radius: 50 }, 0.01)).toEqual({ kind: "sphere", radius: 0.5 });
    const mesh = { kind: "mesh", reference: "m.obj", scale: [1, 1, 1] } as const;
    expect(convertGeometryUnits(mesh, 0.01)).toBe(mesh);
  });
});

describe("mesh references", () => {
  it("drops scheme and package prefixes and normalizes separators", () => {
    expect(normalizeMeshReference("package://my_robot/meshes/base.stl")).toBe("meshes/base.stl");
    expect(normalizeMeshReference("model://arm/meshes\\..\\meshes/./link.dae")).toBe("meshes/link.dae");
    expect(normalizeMeshReference("file:///opt/meshes/a.obj")).toBe("opt/meshes/a.obj");
    expect(normalizeMeshReference("meshes/a.obj")).toBe("meshes/a.obj");
  });

  it("derives basename and stem", () => {
    expect(meshBasename("meshes/base.link.stl")).toBe("base.link.stl");
    expect(meshStem("meshes/base.link.stl")).toBe("base.link");
    expect(meshStem(".hidden")).toBe(".hidden");
  });
});
