import { MotorUtils } from "@/math/Motor";
import type { Motor, ProjectedPoint, Vector4, Viewport } from "@/types";
import { NEAR_PLANE } from "@/types";

/**
 * Projection - Render preparation for 4D scene geometry
 *
 * The camera motor maps camera space to world space, so its reverse takes
 * world coordinates into camera space. Camera space looks along +x with
 * y up and z to the right; w is the axis the viewer cannot see directly.
 */
export const Projection = {
  /**
   * World point → camera space
   */
  toCameraSpace(camera: Motor, p: Vector4): Vector4 {
    return MotorUtils.transformPoint(MotorUtils.reverse(camera), p);
  },

  /**
   * World direction → camera space (translation has no effect)
   */
  directionToCameraSpace(camera: Motor, n: Vector4): Vector4 {
    return MotorUtils.transformDirection(MotorUtils.reverse(camera), n);
  },

  /**
   * Focal length in pixels for a vertical field of view
   */
  focalLength(viewport: Viewport, verticalFov: number): number {
    return viewport.height / 2 / Math.tan(verticalFov / 2);
  },

  /**
   * Perspective projection of a camera-space point.
   * @returns null if the point is behind the near plane
   */
  project(p: Vector4, viewport: Viewport, verticalFov: number): ProjectedPoint | null {
    const [depth, up, right, w] = p;
    if (depth <= NEAR_PLANE) return null;

    const focal = Projection.focalLength(viewport, verticalFov);
    return {
      x: viewport.width / 2 + (right / depth) * focal,
      y: viewport.height / 2 - (up / depth) * focal,
      depth,
      depthW: w,
    };
  },
};
