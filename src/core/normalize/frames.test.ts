import * as THREE from "three";
import { describe, expect, it } from "vitest";
import { composeChain, composePose, decomposeMatrix, invertPose, makePose, poseToMatrix, relativePose } from "./frames";
import { angularDistance, quatFromRpy } from "./orientation";

const expectVecClose = (actual: readonly number[], expected: readonly number[]) => {
  actual.forEach((value, i) => expect(value).toBeCloseTo(expected[i], 9));
};

describe("pose algebra", () => {
  const yaw90 = makePose([1, 0, 0], quatFromRpy([0, 0, Math.PI / 2]));

  it("expresses the inner pose in the frame the outer one places", () => {
    const pose = composePose(yaw90, makePose([1, 0, 0]));
    expectVecClose(pose.position, [1, 1, 0]);
  });

  it("folds a chain outermost first", () => {
    const chain = composeChain([yaw90, makePose([0, 2, 0]), makePose([0, 0, 3])]);
    expectVecClose(chain.position, [-1, 0, 3]);
  });

  it("inverts a pose", () => {
    const identity = composePose(yaw90, invertPose(yaw90));
    expectVecClose(identity.position, [0, 0, 0]);
    expect(angularDistance(identity.orientation, [1, 0, 0, 0])).toBeLessThan(1e-12);
  });

  it("gives one pose relative to another", () => {
    const target = makePose([1, 3, 0], quatFromRpy([0, 0, Math.PI]));
    const rel = relativePose(yaw90, target);
    expectVecClose(rel.position, [3, 0, 0]);
    expect(angularDistance(rel.orientation, quatFromRpy([0, 0, Math.PI / 2]))).toBeLessThan(1e-9);
  });
});

describe("decomposeMatrix", () => {
  it("splits translation, rotation and scale", () => {
    const pose = makePose([0.5, -1, 2], quatFromRpy([0.3, 0, 0]));
    const { pose: out, scale } = decomposeMatrix(poseToMatrix(pose, [2, 3, 4]));
    expectVecClose(out.position, [0.5, -1, 2]);
    expectVecClose(scale, [2, 3, 4]);
    expect(angularDistance(out.orientation, pose.orientation)).toBeLessThan(1e-9);
  });

  it("returns the identity for an identity matrix", () => {
    const { pose, scale } = decomposeMatrix(new THREE.Matrix4());
    expect(pose).toEqual({ position: [0, 0, 0], orientation: [1, 0, 0, 0] });
    expect(scale).toEqual([1, 1, 1]);
  });
});
