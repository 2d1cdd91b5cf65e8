import {
  MOTOR_FIELDS,
  type Motor,
  type RotationBivector,
  type RotationPlane,
  type Vector4,
} from "@/types";

/**
 * Cartesian axes are dual to the Euclidean basis vectors:
 * x ↔ e4, y ↔ e3, z ↔ e2, w ↔ e1.
 */
const PLANE_BIVECTOR: Record<RotationPlane, RotationBivector> = {
  xy: "e34",
  xz: "e24",
  xw: "e14",
  yz: "e23",
  yw: "e13",
  zw: "e12",
  e12: "e12",
  e13: "e13",
  e14: "e14",
  e23: "e23",
  e24: "e24",
  e34: "e34",
};

const ZERO: Motor = {
  s: 0,
  e01: 0,
  e02: 0,
  e03: 0,
  e04: 0,
  e12: 0,
  e13: 0,
  e14: 0,
  e23: 0,
  e24: 0,
  e34: 0,
  e0123: 0,
  e0124: 0,
  e0134: 0,
  e0234: 0,
  e1234: 0,
};

function scale(m: Motor, k: number): Motor {
  return {
    s: m.s * k,
    e01: m.e01 * k,
    e02: m.e02 * k,
    e03: m.e03 * k,
    e04: m.e04 * k,
    e12: m.e12 * k,
    e13: m.e13 * k,
    e14: m.e14 * k,
    e23: m.e23 * k,
    e24: m.e24 * k,
    e34: m.e34 * k,
    e0123: m.e0123 * k,
    e0124: m.e0124 * k,
    e0134: m.e0134 * k,
    e0234: m.e0234 * k,
    e1234: m.e1234 * k,
  };
}

/**
 * Displacement a unit motor applies to a point, split into the rotational
 * part (linear in the coordinates) and the translational part (scaled by
 * the weight). The full sandwich product a·P·~a equals p + 2 * (rot + weight * trans)
 * once the unit condition s² + Σ(rotation bivectors)² + e1234² = 1 is folded in.
 */
function rotationalCorrection(m: Motor, x: number, y: number, z: number, w: number): Vector4 {
  const { s, e12, e13, e14, e23, e24, e34, e1234 } = m;
  return [
    -(e14 * e14 + e24 * e24 + e34 * e34 + e1234 * e1234) * x +
      (e12 * e1234 + e13 * e14 + e23 * e24 + e34 * s) * y +
      (e13 * e1234 - e12 * e14 + e23 * e34 - e24 * s) * z +
      (e23 * e1234 - e12 * e24 - e13 * e34 + e14 * s) * w,
    (e13 * e14 - e12 * e1234 + e23 * e24 - e34 * s) * x -
      (e13 * e13 + e23 * e23 + e34 * e34 + e1234 * e1234) * y +
      (e12 * e13 + e14 * e1234 + e23 * s + e24 * e34) * z +
      (e12 * e23 + e24 * e1234 - e13 * s - e14 * e34) * w,
    (e23 * e34 - e12 * e14 - e13 * e1234 + e24 * s) * x +
      (e12 * e13 - e14 * e1234 - e23 * s + e24 * e34) * y -
      (e12 * e12 + e23 * e23 + e24 * e24 + e1234 * e1234) * z +
      (e12 * s + e34 * e1234 + e13 * e23 + e14 * e24) * w,
    -(e12 * e24 + e23 * e1234 + e13 * e34 + e14 * s) * x +
      (e12 * e23 - e24 * e1234 + e13 * s - e14 * e34) * y +
      (e13 * e23 + e14 * e24 - e12 * s - e34 * e1234) * z -
      (e12 * e12 + e13 * e13 + e14 * e14 + e1234 * e1234) * w,
  ];
}

function translationalCorrection(m: Motor): Vector4 {
  const { s, e01, e02, e03, e04, e12, e13, e14, e23, e24, e34 } = m;
  const { e0123, e0124, e0134, e0234, e1234 } = m;
  return [
    e01 * e14 + e02 * e24 + e03 * e34 - e04 * s +
      e0123 * e1234 - e0124 * e12 - e0134 * e13 - e0234 * e23,
    e03 * s + e04 * e34 - e01 * e13 - e02 * e23 +
      e0123 * e12 + e0124 * e1234 - e0134 * e14 - e0234 * e24,
    e01 * e12 - e02 * s - e03 * e23 - e04 * e24 +
      e0123 * e13 + e0124 * e14 + e0134 * e1234 - e0234 * e34,
    e01 * s + e02 * e12 + e03 * e13 + e04 * e14 +
      e0123 * e23 + e0124 * e24 + e0134 * e34 + e0234 * e1234,
  ];
}

/**
 * MotorUtils - Pure functions over 4D motors
 * All functions are immutable and return new values
 */
export const MotorUtils = {
  /**
   * The motor that leaves everything in place
   */
  identity(): Motor {
    return { ...ZERO, s: 1 };
  },

  /**
   * Create a motor from a subset of fields (the rest are zero)
   */
  create(fields: Partial<Motor>): Motor {
    return { ...ZERO, ...fields };
  },

  /**
   * Build a motor from 16 numbers in canonical field order
   */
  fromArray(values: readonly number[]): Motor {
    if (values.length !== MOTOR_FIELDS.length) {
      throw new RangeError(
        `Motor requires ${MOTOR_FIELDS.length} components, got ${values.length}`
      );
    }
    const [s, e01, e02, e03, e04, e12, e13, e14, e23, e24, e34, e0123, e0124, e0134, e0234, e1234] =
      values;
    return { s, e01, e02, e03, e04, e12, e13, e14, e23, e24, e34, e0123, e0124, e0134, e0234, e1234 };
  },

  /**
   * Flatten a motor to 16 numbers in canonical field order
   */
  toArray(m: Motor): number[] {
    return MOTOR_FIELDS.map((field) => m[field]);
  },

  /**
   * Geometric product a·b.
   *
   * Applying the result is the same as applying b first and then a.
   * Signature: e0² = 0, e1² = e2² = e3² = e4² = 1, distinct basis vectors anticommute.
   */
  compose(a: Motor, b: Motor): Motor {
    return {
      s:
        a.s * b.s - a.e12 * b.e12 - a.e13 * b.e13 - a.e14 * b.e14 - a.e23 * b.e23 - a.e24 * b.e24 -
        a.e34 * b.e34 + a.e1234 * b.e1234,
      e01:
        a.s * b.e01 + a.e01 * b.s - a.e02 * b.e12 - a.e03 * b.e13 - a.e04 * b.e14 + a.e12 * b.e02 +
        a.e13 * b.e03 + a.e14 * b.e04 - a.e23 * b.e0123 - a.e24 * b.e0124 - a.e34 * b.e0134 -
        a.e0123 * b.e23 - a.e0124 * b.e24 - a.e0134 * b.e34 + a.e0234 * b.e1234 - a.e1234 * b.e0234,
      e02:
        a.s * b.e02 + a.e01 * b.e12 + a.e02 * b.s - a.e03 * b.e23 - a.e04 * b.e24 - a.e12 * b.e01 +
        a.e13 * b.e0123 + a.e14 * b.e0124 + a.e23 * b.e03 + a.e24 * b.e04 - a.e34 * b.e0234 +
        a.e0123 * b.e13 + a.e0124 * b.e14 - a.e0134 * b.e1234 - a.e0234 * b.e34 + a.e1234 * b.e0134,
      e03:
        a.s * b.e03 + a.e01 * b.e13 + a.e02 * b.e23 + a.e03 * b.s - a.e04 * b.e34 - a.e12 * b.e0123 -
        a.e13 * b.e01 + a.e14 * b.e0134 - a.e23 * b.e02 + a.e24 * b.e0234 + a.e34 * b.e04 -
        a.e0123 * b.e12 + a.e0124 * b.e1234 + a.e0134 * b.e14 + a.e0234 * b.e24 - a.e1234 * b.e0124,
      e04:
        a.s * b.e04 + a.e01 * b.e14 + a.e02 * b.e24 + a.e03 * b.e34 + a.e04 * b.s - a.e12 * b.e0124 -
        a.e13 * b.e0134 - a.e14 * b.e01 - a.e23 * b.e0234 - a.e24 * b.e02 - a.e34 * b.e03 -
        a.e0123 * b.e1234 - a.e0124 * b.e12 - a.e0134 * b.e13 - a.e0234 * b.e23 + a.e1234 * b.e0123,
      e12:
        a.s * b.e12 + a.e12 * b.s - a.e13 * b.e23 - a.e14 * b.e24 + a.e23 * b.e13 + a.e24 * b.e14 -
        a.e34 * b.e1234 - a.e1234 * b.e34,
      e13:
        a.s * b.e13 + a.e12 * b.e23 + a.e13 * b.s - a.e14 * b.e34 - a.e23 * b.e12 + a.e24 * b.e1234 +
        a.e34 * b.e14 + a.e1234 * b.e24,
      e14:
        a.s * b.e14 + a.e12 * b.e24 + a.e13 * b.e34 + a.e14 * b.s - a.e23 * b.e1234 - a.e24 * b.e12 -
        a.e34 * b.e13 - a.e1234 * b.e23,
      e23:
        a.s * b.e23 - a.e12 * b.e13 + a.e13 * b.e12 - a.e14 * b.e1234 + a.e23 * b.s - a.e24 * b.e34 +
        a.e34 * b.e24 - a.e1234 * b.e14,
      e24:
        a.s * b.e24 - a.e12 * b.e14 + a.e13 * b.e1234 + a.e14 * b.e12 + a.e23 * b.e34 + a.e24 * b.s -
        a.e34 * b.e23 + a.e1234 * b.e13,
      e34:
        a.s * b.e34 - a.e12 * b.e1234 - a.e13 * b.e14 + a.e14 * b.e13 - a.e23 * b.e24 + a.e24 * b.e23 +
        a.e34 * b.s - a.e1234 * b.e12,
      e0123:
        a.s * b.e0123 + a.e01 * b.e23 - a.e02 * b.e13 + a.e03 * b.e12 - a.e04 * b.e1234 +
        a.e12 * b.e03 - a.e13 * b.e02 + a.e14 * b.e0234 + a.e23 * b.e01 - a.e24 * b.e0134 +
        a.e34 * b.e0124 + a.e0123 * b.s - a.e0124 * b.e34 + a.e0134 * b.e24 - a.e0234 * b.e14 +
        a.e1234 * b.e04,
      e0124:
        a.s * b.e0124 + a.e01 * b.e24 - a.e02 * b.e14 + a.e03 * b.e1234 + a.e04 * b.e12 +
        a.e12 * b.e04 - a.e13 * b.e0234 - a.e14 * b.e02 + a.e23 * b.e0134 + a.e24 * b.e01 -
        a.e34 * b.e0123 + a.e0123 * b.e34 + a.e0124 * b.s - a.e0134 * b.e23 + a.e0234 * b.e13 -
        a.e1234 * b.e03,
      e0134:
        a.s * b.e0134 + a.e01 * b.e34 - a.e02 * b.e1234 - a.e03 * b.e14 + a.e04 * b.e13 +
        a.e12 * b.e0234 + a.e13 * b.e04 - a.e14 * b.e03 - a.e23 * b.e0124 + a.e24 * b.e0123 +
        a.e34 * b.e01 - a.e0123 * b.e24 + a.e0124 * b.e23 + a.e0134 * b.s - a.e0234 * b.e12 +
        a.e1234 * b.e02,
      e0234:
        a.s * b.e0234 + a.e01 * b.e1234 + a.e02 * b.e34 - a.e03 * b.e24 + a.e04 * b.e23 -
        a.e12 * b.e0134 + a.e13 * b.e0124 - a.e14 * b.e0123 + a.e23 * b.e04 - a.e24 * b.e03 +
        a.e34 * b.e02 + a.e0123 * b.e14 - a.e0124 * b.e13 + a.e0134 * b.e12 + a.e0234 * b.s -
        a.e1234 * b.e01,
      e1234:
        a.s * b.e1234 + a.e12 * b.e34 - a.e13 * b.e24 + a.e14 * b.e23 + a.e23 * b.e14 -
        a.e24 * b.e13 + a.e34 * b.e12 + a.e1234 * b.s,
    };
  },

  /**
   * Reverse: negates the grade-2 part. For a unit motor this is its inverse.
   */
  reverse(m: Motor): Motor {
    return {
      s: m.s,
      e01: -m.e01,
      e02: -m.e02,
      e03: -m.e03,
      e04: -m.e04,
      e12: -m.e12,
      e13: -m.e13,
      e14: -m.e14,
      e23: -m.e23,
      e24: -m.e24,
      e34: -m.e34,
      e0123: m.e0123,
      e0124: m.e0124,
      e0134: m.e0134,
      e0234: m.e0234,
      e1234: m.e1234,
    };
  },

  /**
   * Scalar part of ~m·m
   */
  magnitudeSquared(m: Motor): number {
    return MotorUtils.compose(MotorUtils.reverse(m), m).s;
  },

  magnitude(m: Motor): number {
    return Math.sqrt(MotorUtils.magnitudeSquared(m));
  },

  /**
   * Scale a motor to unit magnitude.
   * Throws for a zero (or non-finite) motor instead of producing NaN.
   */
  normalized(m: Motor): Motor {
    const magnitude = MotorUtils.magnitude(m);
    if (magnitude === 0 || !Number.isFinite(magnitude)) {
      throw new RangeError(`Cannot normalize a motor with magnitude ${magnitude}`);
    }
    return scale(m, 1 / magnitude);
  },

  /**
   * Pure translation by an offset
   */
  translation(offset: Vector4): Motor {
    const [x, y, z, w] = offset;
    return { ...ZERO, s: 1, e01: w / 2, e02: -z / 2, e03: y / 2, e04: -x / 2 };
  },

  /**
   * Pure rotation by `angle` radians in a coordinate plane.
   * Half-angle convention: the sandwich product rotates by the full angle.
   */
  rotation(plane: RotationPlane, angle: number): Motor {
    const half = angle / 2;
    return { ...ZERO, s: Math.cos(half), [PLANE_BIVECTOR[plane]]: Math.sin(half) };
  },

  /**
   * Apply a unit motor to homogeneous coordinates (x, y, z, w) of the given weight.
   * Returns the transformed (still weighted) coordinates; the weight itself is unchanged.
   */
  transformHomogeneous(m: Motor, coords: Vector4, weight: number): Vector4 {
    const [x, y, z, w] = coords;
    const [rx, ry, rz, rw] = rotationalCorrection(m, x, y, z, w);
    if (weight === 0) {
      return [x + 2 * rx, y + 2 * ry, z + 2 * rz, w + 2 * rw];
    }
    const [tx, ty, tz, tw] = translationalCorrection(m);
    return [
      x + 2 * (rx + weight * tx),
      y + 2 * (ry + weight * ty),
      z + 2 * (rz + weight * tz),
      w + 2 * (rw + weight * tw),
    ];
  },

  /**
   * Apply a unit motor to a point with implicit unit weight
   */
  transformPoint(m: Motor, p: Vector4): Vector4 {
    return MotorUtils.transformHomogeneous(m, p, 1);
  },

  /**
   * Apply only the rotational part of a motor to a direction.
   * Translation-bearing fields are never read.
   */
  transformDirection(m: Motor, n: Vector4): Vector4 {
    return MotorUtils.transformHomogeneous(m, n, 0);
  },

  /**
   * Field-wise comparison within an absolute tolerance
   */
  approxEquals(a: Motor, b: Motor, epsilon = 1e-9): boolean {
    return MOTOR_FIELDS.every((field) => Math.abs(a[field] - b[field]) <= epsilon);
  },
};
