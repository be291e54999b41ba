/**
 * 3D vector utilities
 */

export type Vector3 = [number, number, number];

export function zeroVector(): Vector3 {
  return [0, 0, 0];
}

/**
 * Element-wise sum of two vectors
 */
export function addVectors(v1: Vector3, v2: Vector3): Vector3 {
  return [v1[0] + v2[0], v1[1] + v2[1], v1[2] + v2[2]];
}

export function isVector3(value: unknown): value is Vector3 {
  return (
    Array.isArray(value) &&
    value.length === 3 &&
    value.every((component) => typeof component === 'number' && Number.isFinite(component))
  );
}

/**
 * True when the x or y component is non-zero
 */
export function isLateral(v: Vector3): boolean {
  return v[0] !== 0 || v[1] !== 0;
}

/**
 * Wrap a fractional coordinate into [0, 1)
 */
export function normalizeFractional(value: number): number {
  if (!Number.isFinite(value)) {
    return value;
  }
  let wrapped = value - Math.floor(value);
  if (Math.abs(wrapped) < 1e-10 || Math.abs(wrapped - 1) < 1e-10) {
    wrapped = 0;
  }
  return wrapped;
}
