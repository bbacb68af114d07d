import type { Geometry, InertiaTensor, Inertial, Pose, Quat, Vec3 } from "../model/types";

export const ZERO_TENSOR: InertiaTensor = { ixx: 0, ixy: 0, ixz: 0, iyy: 0, iyz: 0, izz: 0 };

export const tensorFromDiagonal = (diag: Vec3): InertiaTensor => ({
  ixx: diag[0],
  ixy: 0,
  ixz: 0,
  iyy: diag[1],
  iyz: 0,
  izz: diag[2],
});

/** `[ixx, ixy, ixz, iyy, iyz, izz]`, the order diff entries report. */
export const tensorComponents = (t: InertiaTensor): number[] => [t.ixx, t.ixy, t.ixz, t.iyy, t.iyz, t.izz];

export const addTensor = (a: InertiaTensor, b: InertiaTensor): InertiaTensor => ({
  ixx: a.ixx + b.ixx,
  ixy: a.ixy + b.ixy,
  ixz: a.ixz + b.ixz,
  iyy: a.iyy + b.iyy,
  iyz: a.iyz + b.iyz,
  izz: a.izz + b.izz,
});

export const scaleTensor = (t: InertiaTensor, k: number): InertiaTensor => ({
  ixx: t.ixx * k,
  ixy: t.ixy * k,
  ixz: t.ixz * k,
  iyy: t.iyy * k,
  iyz: t.iyz * k,
  izz: t.izz * k,
});

const rotationMatrixFromQuat = (q: Quat) => {
  const [w, x, y, z] = q;
  const xx = x * x;
  const yy = y * y;
  const zz = z * z;
  const xy = x * y;
  const xz = x * z;
  const yz = y * z;
  const wx = w * x;
  const wy = w * y;
  const wz = w * z;

  return [
    1 - 2 * (yy + zz),
    2 * (xy - wz),
    2 * (xz + wy),
    2 * (xy + wz),
    1 - 2 * (xx + zz),
    2 * (yz - wx),
    2 * (xz - wy),
    2 * (yz + wx),
    1 - 2 * (xx + yy),
  ] as const;
};

const tensorToMatrix = (t: InertiaTensor) => [t.ixx, t.ixy, t.ixz, t.ixy, t.iyy, t.iyz, t.ixz, t.iyz, t.izz] as const;

const matrixToTensor = (m: readonly number[]): InertiaTensor => ({
  ixx: m[0],
  ixy: m[1],
  ixz: m[2],
  iyy: m[4],
  iyz: m[5],
  izz: m[8],
});

const transpose = (m: readonly number[]) => [m[0], m[3], m[6], m[1], m[4], m[7], m[2], m[5], m[8]] as const;

const mul = (a: readonly number[], b: readonly number[]) => [
  a[0] * b[0] + a[1] * b[3] + a[2] * b[6],
  a[0] * b[1] + a[1] * b[4] + a[2] * b[7],
  a[0] * b[2] + a[1] * b[5] + a[2] * b[8],
  a[3] * b[0] + a[4] * b[3] + a[5] * b[6],
  a[3] * b[1] + a[4] * b[4] + a[5] * b[7],
  a[3] * b[2] + a[4] * b[5] + a[5] * b[8],
  a[6] * b[0] + a[7] * b[3] + a[8] * b[6],
  a[6] * b[1] + a[7] * b[4] + a[8] * b[7],
  a[6] * b[2] + a[7] * b[5] + a[8] * b[8],
];

/** Re-expresses a tensor given in a frame rotated by `quat` into the outer frame: R I Rᵀ. */
export const rotateTensor = (tensor: InertiaTensor, quat: Quat): InertiaTensor => {
  if (quat[0] === 1) return tensor;
  const r = rotationMatrixFromQuat(quat);
  return matrixToTensor(mul(mul(r, tensorToMatrix(tensor)), transpose(r)));
};

/** Moves a tensor about the center of mass to a point `offset` away from it. */
export const applyParallelAxis = (tensor: InertiaTensor, mass: number, offset: Vec3): InertiaTensor => {
  if (mass <= 0) return tensor;
  const [dx, dy, dz] = offset;
  const d2 = dx * dx + dy * dy + dz * dz;
  return addTensor(tensor, {
    ixx: mass * (d2 - dx * dx),
    iyy: mass * (d2 - dy * dy),
    izz: mass * (d2 - dz * dz),
    ixy: -mass * dx * dy,
    ixz: -mass * dx * dz,
    iyz: -mass * dy * dz,
  });
};

export function primitiveVolume(geometry: Geometry): number | null {
  switch (geometry.kind) {
    case "box":
      return geometry.size[0] * geometry.size[1] * geometry.size[2];
    case "sphere":
      return (4 / 3) * Math.PI * geometry.radius ** 3;
    case "cylinder":
      return Math.PI * geometry.radius ** 2 * geometry.length;
    case "capsule":
      return Math.PI * geometry.radius ** 2 * geometry.length + (4 / 3) * Math.PI * geometry.radius ** 3;
    case "mesh":
      return null;
  }
}

/** Principal inertia of a solid primitive about its own center, shape axis along Z. */
export function primitiveInertia(geometry: Geometry, mass: number): Vec3 | null {
  switch (geometry.kind) {
    case "box": {
      const [sx, sy, sz] = geometry.size;
      return [(mass / 12) * (sy * sy + sz * sz), (mass / 12) * (sx * sx + sz * sz), (mass / 12) * (sx * sx + sy * sy)];
    }
    case "sphere": {
      const i = 0.4 * mass * geometry.radius ** 2;
      return [i, i, i];
    }
    case "cylinder": {
      const r2 = geometry.radius ** 2;
      const h2 = geometry.length ** 2;
      const iRadial = (mass / 12) * (3 * r2 + h2);
      return [iRadial, iRadial, 0.5 * mass * r2];
    }
    case "capsule": {
      // Split the mass between the cylinder and the two hemispherical caps by volume.
      const r = geometry.radius;
      const h = geometry.length;
      const cylVolume = Math.PI * r * r * h;
      const capVolume = (4 / 3) * Math.PI * r ** 3;
      const total = cylVolume + capVolume;
      const mCyl = (mass * cylVolume) / total;
      const mCaps = (mass * capVolume) / total;
      const iAxial = 0.5 * mCyl * r * r + 0.4 * mCaps * r * r;
      const iRadial =
        (mCyl / 12) * (3 * r * r + h * h) + mCaps * (0.4 * r * r + (h * h) / 4 + (3 * h * r) / 8);
      return [iRadial, iRadial, iAxial];
    }
    case "mesh":
      return null;
  }
}

/**
 * Canonical inertial from a format's inertial frame: the frame origin is the
 * center of mass and its rotation carries the tensor into the link frame.
 */
export const inertialFromFrame = (mass: number, frame: Pose, tensor: InertiaTensor): Inertial => ({
  mass,
  centerOfMass: frame.position,
  inertiaTensor: rotateTensor(tensor, frame.orientation),
});

export type MassPart = {
  mass: number;
  centerOfMass: Vec3;
  /** About the part's own center of mass, in the common frame. */
  inertiaTensor: InertiaTensor;
};

/** Lumps rigidly attached parts into one inertial; null when the total mass is zero. */
export function combineMassParts(parts: readonly MassPart[]): Inertial | null {
  const mass = parts.reduce((sum, part) => sum + part.mass, 0);
  if (!(mass > 0)) return null;
  const weighted = (i: number) => parts.reduce((sum, part) => sum + part.mass * part.centerOfMass[i], 0) / mass;
  const com: Vec3 = [weighted(0), weighted(1), weighted(2)];
  const inertiaTensor = parts.reduce<InertiaTensor>((acc, part) => {
    const offset: Vec3 = [
      part.centerOfMass[0] - com[0],
      part.centerOfMass[1] - com[1],
      part.centerOfMass[2] - com[2],
    ];
    return addTensor(acc, applyParallelAxis(part.inertiaTensor, part.mass, offset));
  }, ZERO_TENSOR);
  return { mass, centerOfMass: com, inertiaTensor };
}
