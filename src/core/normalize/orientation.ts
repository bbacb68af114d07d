import * as THREE from "three";
import type { Quat, Vec3 } from "../model/types";

export const IDENTITY_QUAT: Quat = [1, 0, 0, 0];

const EPS = 1e-12;

/**
 * Normalizes and picks the representative with a non-negative scalar part.
 * For `w == 0` the first non-zero vector component is made positive so that
 * q and -q always land on the same tuple. Returns null for a zero quaternion.
 */
export function canonicalQuat(w: number, x: number, y: number, z: number): Quat | null {
  if (![w, x, y, z].every(Number.isFinite)) return null;
  const len = Math.hypot(w, x, y, z);
  if (len < EPS) return null;
  let sign = 1;
  if (w < 0) sign = -1;
  else if (w === 0) {
    const lead = [x, y, z].find((v) => v !== 0) ?? 0;
    if (lead < 0) sign = -1;
  }
  const k = sign / len;
  // Adding 0 turns -0 into 0 so equal rotations compare equal with Object.is too.
  return [w * k + 0, x * k + 0, y * k + 0, z * k + 0];
}

const canonicalOrIdentity = (w: number, x: number, y: number, z: number): Quat =>
  canonicalQuat(w, x, y, z) ?? IDENTITY_QUAT;

export const quatFromThree = (q: THREE.Quaternion): Quat => canonicalOrIdentity(q.w, q.x, q.y, q.z);

export const quatToThree = (q: Quat) => new THREE.Quaternion(q[1], q[2], q[3], q[0]);

export const quatFromWxyz = (values: readonly number[]): Quat | null =>
  canonicalQuat(values[0] ?? NaN, values[1] ?? NaN, values[2] ?? NaN, values[3] ?? NaN);

export const quatFromXyzw = (values: readonly number[]): Quat | null =>
  canonicalQuat(values[3] ?? NaN, values[0] ?? NaN, values[1] ?? NaN, values[2] ?? NaN);

/** Fixed-axis roll about X, then pitch about Y, then yaw about Z (URDF and SDF). */
export const quatFromRpy = (rpy: Vec3): Quat => {
  const euler = new THREE.Euler(rpy[0], rpy[1], rpy[2], "ZYX");
  return quatFromThree(new THREE.Quaternion().setFromEuler(euler));
};

const AXES: Record<string, THREE.Vector3> = {
  x: new THREE.Vector3(1, 0, 0),
  y: new THREE.Vector3(0, 1, 0),
  z: new THREE.Vector3(0, 0, 1),
};

/**
 * Euler angles over an arbitrary three-letter axis sequence. Lower-case letters
 * rotate about the moving (intrinsic) axes, upper-case about the fixed
 * (extrinsic) axes, and the two may be mixed.
 */
export function quatFromEuler(angles: Vec3, sequence: string): Quat | null {
  if (!/^[xyzXYZ]{3}$/.test(sequence)) return null;
  const q = new THREE.Quaternion();
  for (let i = 0; i < 3; i += 1) {
    const letter = sequence[i];
    const step = new THREE.Quaternion().setFromAxisAngle(AXES[letter.toLowerCase()], angles[i]);
    if (letter === letter.toLowerCase()) q.multiply(step);
    else q.premultiply(step);
  }
  return quatFromThree(q);
}

export function quatFromAxisAngle(axis: Vec3, angle: number): Quat | null {
  const v = new THREE.Vector3(axis[0], axis[1], axis[2]);
  if (v.length() < EPS || !Number.isFinite(angle)) return null;
  return quatFromThree(new THREE.Quaternion().setFromAxisAngle(v.normalize(), angle));
}

/** Row-major 3x3 rotation matrix. */
export function quatFromMatrix3(m: readonly number[]): Quat | null {
  if (m.length !== 9 || !m.every(Number.isFinite)) return null;
  const mat = new THREE.Matrix4().set(m[0], m[1], m[2], 0, m[3], m[4], m[5], 0, m[6], m[7], m[8], 0, 0, 0, 0, 1);
  return quatFromThree(new THREE.Quaternion().setFromRotationMatrix(mat));
}

/** Frame given by its X axis and an approximate Y axis (Gram-Schmidt on Y). */
export function quatFromFrameAxes(xAxis: Vec3, yAxis: Vec3): Quat | null {
  const x = new THREE.Vector3(...xAxis);
  if (x.length() < EPS) return null;
  x.normalize();
  const y = new THREE.Vector3(...yAxis);
  y.addScaledVector(x, -y.dot(x));
  if (y.length() < EPS) return null;
  y.normalize();
  const z = new THREE.Vector3().crossVectors(x, y);
  const mat = new THREE.Matrix4().makeBasis(x, y, z);
  return quatFromThree(new THREE.Quaternion().setFromRotationMatrix(mat));
}

/** Shortest rotation taking +Z onto the given direction. */
export function quatFromZAxis(zAxis: Vec3): Quat | null {
  const z = new THREE.Vector3(...zAxis);
  if (z.length() < EPS) return null;
  return quatFromThree(new THREE.Quaternion().setFromUnitVectors(AXES.z, z.normalize()));
}

export function multiplyQuat(a: Quat, b: Quat): Quat {
  return quatFromThree(quatToThree(a).multiply(quatToThree(b)));
}

export function invertQuat(q: Quat): Quat {
  return quatFromThree(quatToThree(q).invert());
}

export function rotateVector(q: Quat, v: Vec3): Vec3 {
  const out = new THREE.Vector3(v[0], v[1], v[2]).applyQuaternion(quatToThree(q));
  return [out.x, out.y, out.z];
}

/** Rotation angle (radians, in [0, pi]) taking one orientation onto the other. */
export function angularDistance(a: Quat, b: Quat): number {
  // conj(a) * b; atan2 keeps precision for tiny angles where acos(dot) does not.
  const [aw, ax, ay, az] = a;
  const [bw, bx, by, bz] = b;
  const w = aw * bw + ax * bx + ay * by + az * bz;
  const x = aw * bx - ax * bw - ay * bz + az * by;
  const y = aw * by + ax * bz - ay * bw - az * bx;
  const z = aw * bz - ax * by + ay * bx - az * bw;
  return 2 * Math.atan2(Math.hypot(x, y, z), Math.abs(w));
}

export const degToRad = (deg: number) => (deg * Math.PI) / 180;
