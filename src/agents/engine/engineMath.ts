import type { Vector3 } from '../../domain/simulationTypes';
import type { Rng } from './random';

const EPSILON = 1e-9;

export const ZERO: Readonly<Vector3> = Object.freeze({ x: 0, y: 0, z: 0 });

export const clamp = (value: number, min: number, max: number) =>
  Math.max(min, Math.min(max, value));

export const lerp = (a: number, b: number, t: number) => a + (b - a) * t;

export const vector = (x = 0, y = 0, z = 0): Vector3 => ({ x, y, z });

export const copyVector = (v: Readonly<Vector3>): Vector3 => ({ x: v.x, y: v.y, z: v.z });

export const add = (a: Readonly<Vector3>, b: Readonly<Vector3>): Vector3 => ({
  x: a.x + b.x,
  y: a.y + b.y,
  z: a.z + b.z
});

export const subtract = (a: Readonly<Vector3>, b: Readonly<Vector3>): Vector3 => ({
  x: a.x - b.x,
  y: a.y - b.y,
  z: a.z - b.z
});

export const scale = (v: Readonly<Vector3>, s: number): Vector3 => ({
  x: v.x * s,
  y: v.y * s,
  z: v.z * s
});

export const addScalar = (v: Readonly<Vector3>, s: number): Vector3 => ({
  x: v.x + s,
  y: v.y + s,
  z: v.z + s
});

export const dot = (a: Readonly<Vector3>, b: Readonly<Vector3>) => a.x * b.x + a.y * b.y + a.z * b.z;

export const length = (v: Readonly<Vector3>) => Math.hypot(v.x, v.y, v.z);

export const normalize = (v: Readonly<Vector3>): Vector3 => {
  const len = length(v);
  if (!Number.isFinite(len) || len <= EPSILON) {
    return vector();
  }
  return { x: v.x / len, y: v.y / len, z: v.z / len };
};

export const distanceTo = (from: Readonly<Vector3>, to: Readonly<Vector3>) => length(subtract(to, from));

export const directionTo = (from: Readonly<Vector3>, to: Readonly<Vector3>): Vector3 =>
  normalize(subtract(to, from));

/** Facing angle on the pitch plane, in radians. A stationary player faces 0. */
export const heading = (velocity: Readonly<Vector3>) => {
  if (Math.abs(velocity.x) <= EPSILON && Math.abs(velocity.y) <= EPSILON) {
    return 0;
  }
  return Math.atan2(velocity.y, velocity.x);
};

export const clampLength = (v: Readonly<Vector3>, maxLength: number): Vector3 => {
  const len = length(v);
  if (len <= maxLength) return copyVector(v);
  if (len <= EPSILON) return vector();
  return scale(v, maxLength / len);
};

/**
 * Rejection-samples a point inside the unit disc on the pitch plane.
 * Draws from the supplied generator only, so the same seed gives the same point.
 */
export const randomInUnitCircle = (rng: Rng): Vector3 => {
  for (;;) {
    const x = rng.nextFloat() * 2 - 1;
    const y = rng.nextFloat() * 2 - 1;
    if (x * x + y * y <= 1) {
      return { x, y, z: 0 };
    }
  }
};

export const isFiniteVector = (v: Readonly<Vector3>) =>
  Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
