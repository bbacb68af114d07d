import { describe, expect, it } from "vitest";
import {
  angularDistance,
  canonicalQuat,
  multiplyQuat,
  quatFromAxisAngle,
  quatFromEuler,
  quatFromFrameAxes,
  quatFromRpy,
  quatFromXyzw,
  quatFromZAxis,
  rotateVector,
} from "./orientation";

const expectVecClose = (actual: readonly number[], expected: readonly number[], digits = 9) => {
  expect(actual).toHaveLength(expected.length);
  actual.forEach((value, i) => expect(value).toBeCloseTo(expected[i], digits));
};

describe("canonicalQuat", () => {
  it("normalizes and keeps a non-negative scalar part", () => {
    expect(canonicalQuat(2, 0, 0, 0)).toEqual([1, 0, 0, 0]);
    expectVecClose(canonicalQuat(-0.5, -0.5, 0.5, -0.5) ?? [], [0.5, 0.5, -0.5, 0.5]);
  });

  it("maps q and -q onto the same tuple", () => {
    const q = canonicalQuat(0.3, -0.4, 0.5, 0.7);
    const negated = canonicalQuat(-0.3, 0.4, -0.5, -0.7);
    expect(negated).toEqual(q);
  });

  it("breaks the w == 0 tie on the first non-zero component", () => {
    expect(canonicalQuat(0, 0, -1, 0)).toEqual([0, 0, 1, 0]);
    expect(canonicalQuat(0, -1, 0, 0)).toEqual(canonicalQuat(0, 1, 0, 0));
  });

  it("rejects zero and non-finite input", () => {
    expect(canonicalQuat(0, 0, 0, 0)).toBeNull();
    expect(canonicalQuat(NaN, 0, 0, 1)).toBeNull();
  });
});

describe("euler conversions", () => {
  it("reads roll-pitch-yaw as fixed X then Y then Z", () => {
    const q = quatFromRpy([0, 0, Math.PI / 2]);
    expectVecClose(rotateVector(q, [1, 0, 0]), [0, 1, 0]);
    const composed = quatFromRpy([Math.PI / 2, 0, Math.PI / 2]);
    // Roll first takes +Y to +Z; yaw leaves +Z alone.
    expectVecClose(rotateVector(composed, [0, 1, 0]), [0, 0, 1]);
  });

  it("matches rpy with the extrinsic XYZ sequence and intrinsic zyx", () => {
    const rpy: [number, number, number] = [0.1, -0.2, 0.3];
    const expected = quatFromRpy(rpy);
    expect(angularDistance(quatFromEuler(rpy, "XYZ") ?? [1, 0, 0, 0], expected)).toBeLessThan(1e-12);
    const intrinsic = quatFromEuler([0.3, -0.2, 0.1], "zyx") ?? [1, 0, 0, 0];
    expect(angularDistance(intrinsic, expected)).toBeLessThan(1e-12);
  });

  it("rejects a malformed sequence", () => {
    expect(quatFromEuler([0, 0, 0], "xyw")).toBeNull();
  });
});

describe("other constructors", () => {
  it("reads xyzw order", () => {
    expectVecClose(quatFromXyzw([0, 0, Math.SQRT1_2, Math.SQRT1_2]) ?? [], [Math.SQRT1_2, 0, 0, Math.SQRT1_2]);
  });

  it("builds from axis and angle and rejects a zero axis", () => {
    const q = quatFromAxisAngle([0, 0, 2], Math.PI);
    expectVecClose(q ?? [], [0, 0, 0, 1]);
    expect(quatFromAxisAngle([0, 0, 0], 1)).toBeNull();
  });

  it("orthonormalizes frame axes", () => {
    const q = quatFromFrameAxes([0, 1, 0], [-1, 0.2, 0]) ?? [1, 0, 0, 0];
    expectVecClose(rotateVector(q, [1, 0, 0]), [0, 1, 0]);
    expectVecClose(rotateVector(q, [0, 1, 0]), [-1, 0, 0]);
    expect(quatFromFrameAxes([1, 0, 0], [2, 0, 0])).toBeNull();
  });

  it("turns +Z onto a direction", () => {
    const q = quatFromZAxis([1, 0, 0]) ?? [1, 0, 0, 0];
    expectVecClose(rotateVector(q, [0, 0, 1]), [1, 0, 0]);
  });
});

describe("angularDistance", () => {
  it("is zero between a rotation and its double cover", () => {
    const q = canonicalQuat(0.2, 0.3, -0.1, 0.9) ?? [1, 0, 0, 0];
    const negated: [number, number, number, number] = [-q[0], -q[1], -q[2], -q[3]];
    expect(angularDistance(q, negated)).toBe(0);
  });

  it("measures the rotation between two orientations", () => {
    const a = quatFromRpy([0, 0, 0.25]);
    const b = quatFromRpy([0, 0, 0.75]);
    expect(angularDistance(a, b)).toBeCloseTo(0.5, 12);
    expect(angularDistance(a, multiplyQuat(a, quatFromRpy([0.001, 0, 0])))).toBeCloseTo(0.001, 12);
  });
});
