import type { Motor, Point, Vector4 } from "@/types";
import { MotorUtils } from "./Motor";

/**
 * PointUtils - Pure functions over homogeneous 4D points
 *
 * A point stores its Cartesian coordinates multiplied by its weight (`e1234`).
 * Weight 0 is an ideal point: a direction with no position.
 */
export const PointUtils = {
  /**
   * The origin, with unit weight
   */
  identity(): Point {
    return { e0123: 0, e0124: 0, e0134: 0, e0234: 0, e1234: 1 };
  },

  fromCartesian(x: number, y: number, z: number, w: number): Point {
    return { e0123: x, e0124: y, e0134: z, e0234: w, e1234: 1 };
  },

  fromVector4(v: Vector4): Point {
    return PointUtils.fromCartesian(v[0], v[1], v[2], v[3]);
  },

  /**
   * Weighted coordinates, without dividing by the weight
   */
  coordinates(p: Point): Vector4 {
    return [p.e0123, p.e0124, p.e0134, p.e0234];
  },

  isIdeal(p: Point): boolean {
    return p.e1234 === 0;
  },

  /**
   * Cartesian coordinates (weighted coordinates divided by the weight).
   * Throws for an ideal point.
   */
  toCartesian(p: Point): Vector4 {
    if (PointUtils.isIdeal(p)) {
      throw new RangeError("Ideal point has no Cartesian coordinates");
    }
    const k = 1 / p.e1234;
    return [p.e0123 * k, p.e0124 * k, p.e0134 * k, p.e0234 * k];
  },

  /**
   * Rescale to unit weight
   */
  normalized(p: Point): Point {
    const [x, y, z, w] = PointUtils.toCartesian(p);
    return PointUtils.fromCartesian(x, y, z, w);
  },

  /**
   * Apply a unit motor to a point.
   *
   * Translation is scaled by the point's weight, so an ideal point only rotates.
   * The weight is carried over unchanged: for a unit motor the sandwich product
   * leaves it at weight * magnitude² = weight.
   */
  transform(p: Point, motor: Motor): Point {
    const [x, y, z, w] = MotorUtils.transformHomogeneous(
      motor,
      PointUtils.coordinates(p),
      p.e1234
    );
    return { e0123: x, e0124: y, e0134: z, e0234: w, e1234: p.e1234 };
  },
};
