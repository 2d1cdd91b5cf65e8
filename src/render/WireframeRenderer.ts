/**
 * WireframeRenderer - Draws 4D wireframes as seen from the camera
 *
 * Each edge is coloured by the mean camera-space w of its endpoints:
 * nearColor below the view hyperplane, farColor above it.
 */

import type { CameraSnapshot, Viewport, Wireframe, WireframeConfig } from "@/types";
import { DEFAULT_WIREFRAME_CONFIG } from "@/types";
import { Projection } from "./Projection";

/**
 * Graphics interface for rendering (Phaser-compatible).
 */
export interface IGraphics {
  clear(): void;
  lineStyle(width: number, color: number, alpha?: number): void;
  lineBetween(x1: number, y1: number, x2: number, y2: number): void;
}

/**
 * Linear blend of two 0xRRGGBB colours, t clamped to [0, 1]
 */
export function mixColor(a: number, b: number, t: number): number {
  const k = Math.min(1, Math.max(0, t));
  const channel = (shift: number) => {
    const ca = (a >> shift) & 0xff;
    const cb = (b >> shift) & 0xff;
    return Math.round(ca + (cb - ca) * k) << shift;
  };
  return channel(16) | channel(8) | channel(0);
}

export class WireframeRenderer {
  private graphics: IGraphics;
  private config: WireframeConfig;

  constructor(graphics: IGraphics, config: Partial<WireframeConfig> = {}) {
    this.graphics = graphics;
    this.config = { ...DEFAULT_WIREFRAME_CONFIG, ...config };
  }

  /**
   * Clear and redraw every wireframe.
   * @returns number of edges drawn (edges with an endpoint behind the near plane are skipped)
   */
  render(wireframes: readonly Wireframe[], camera: CameraSnapshot, viewport: Viewport): number {
    this.graphics.clear();

    let drawn = 0;
    for (const wireframe of wireframes) {
      drawn += this.renderWireframe(wireframe, camera, viewport);
    }
    return drawn;
  }

  private renderWireframe(wireframe: Wireframe, camera: CameraSnapshot, viewport: Viewport): number {
    const projected = wireframe.vertices.map((v) =>
      Projection.project(
        Projection.toCameraSpace(camera.transform, v),
        viewport,
        camera.verticalFov
      )
    );

    let drawn = 0;
    for (const [i, j] of wireframe.edges) {
      const a = projected[i];
      const b = projected[j];
      if (!a || !b) continue;

      const meanW = (a.depthW + b.depthW) / 2;
      const t = (meanW / this.config.wRange + 1) / 2;
      this.graphics.lineStyle(
        this.config.lineWidth,
        mixColor(this.config.nearColor, this.config.farColor, t),
        this.config.alpha
      );
      this.graphics.lineBetween(a.x, a.y, b.x, b.y);
      drawn++;
    }
    return drawn;
  }

  dispose(): void {
    this.graphics.clear();
  }
}
