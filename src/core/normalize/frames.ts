import * as THREE from "three";
import type { Pose, Quat, Vec3 } from "../model/types";
import { IDENTITY_QUAT, quatFromThree, quatToThree } from "./orientation";

export const IDENTITY_POSE: Pose = { position: [0, 0, 0], orientation: IDENTITY_QUAT };

export const makePose = (position: Vec3 = [0, 0, 0], orientation: Quat = IDENTITY_QUAT): Pose => ({
  position,
  orientation,
});

const toVector = (v: Vec3) => new THREE.Vector3(v[0], v[1], v[2]);
const fromVector = (v: THREE.Vector3): Vec3 => [v.x + 0, v.y + 0, v.z + 0];

/** `outer ∘ inner`: `inner` is expressed in the frame that `outer` places. */
export function composePose(outer: Pose, inner: Pose): Pose {
  const q = quatToThree(outer.orientation);
  const position = toVector(inner.position).applyQuaternion(q).add(toVector(outer.position));
  const orientation = q.clone().multiply(quatToThree(inner.orientation));
  return { position: fromVector(position), orientation: quatFromThree(orientation) };
}

/** Folds a chain of nested local transforms, outermost first. */
export function composeChain(chain: readonly Pose[]): Pose {
  return chain.reduce<Pose>((acc, pose) => composePose(acc, pose), IDENTITY_POSE);
}

export function invertPose(pose: Pose): Pose {
  const inv = quatToThree(pose.orientation).invert();
  const position = toVector(pose.position).applyQuaternion(inv).negate();
  return { position: fromVector(position), orientation: quatFromThree(inv) };
}

/** Pose of `target` expressed in `reference`, both given in a common frame. */
export function relativePose(reference: Pose, target: Pose): Pose {
  return composePose(invertPose(reference), target);
}

export const poseToMatrix = (pose: Pose, scale: Vec3 = [1, 1, 1]) =>
  new THREE.Matrix4().compose(toVector(pose.position), quatToThree(pose.orientation), toVector(scale));

export type DecomposedTransform = {
  pose: Pose;
  scale: Vec3;
};

/**
 * Splits an affine transform into a rigid pose and a per-axis scale. Shear is
 * not representable and is dropped, as it is by every format this tool reads.
 */
export function decomposeMatrix(matrix: THREE.Matrix4): DecomposedTransform {
  const position = new THREE.Vector3();
  const quaternion = new THREE.Quaternion();
  const scale = new THREE.Vector3();
  matrix.decompose(position, quaternion, scale);
  return {
    pose: { position: fromVector(position), orientation: quatFromThree(quaternion) },
    scale: fromVector(scale),
  };
}
