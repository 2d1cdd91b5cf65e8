import type { Vector4, Wireframe } from "@/types";

/**
 * Axis-aligned hypercube: 16 vertices, 32 edges.
 *
 * Vertex i has bit k set when its coordinate on axis k is at the positive
 * side, so two vertices share an edge iff their indices differ in one bit.
 */
export function createTesseract(center: Vector4 = [0, 0, 0, 0], size = 1): Wireframe {
  const half = size / 2;
  const vertices: Vector4[] = [];
  for (let i = 0; i < 16; i++) {
    const offset = (axis: number) => ((i >> axis) & 1 ? half : -half);
    vertices.push([
      center[0] + offset(0),
      center[1] + offset(1),
      center[2] + offset(2),
      center[3] + offset(3),
    ]);
  }

  const edges: [number, number][] = [];
  for (let i = 0; i < 16; i++) {
    for (let axis = 0; axis < 4; axis++) {
      const j = i | (1 << axis);
      if (j !== i) edges.push([i, j]);
    }
  }

  return { vertices, edges };
}
