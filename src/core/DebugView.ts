import type Phaser from "phaser";
import type { Vector4 } from "@/types";

/** Text object the overlay writes to (a Phaser Text at runtime) */
export interface IDebugText {
  setText(text: string): unknown;
  setVisible(visible: boolean): unknown;
  setScrollFactor(factor: number): unknown;
  setDepth(depth: number): unknown;
  destroy(): void;
}

/**
 * The slice of a Phaser scene the overlay draws into
 */
export interface DebugViewHost {
  readonly add: {
    text(x: number, y: number, text: string, style: Phaser.Types.GameObjects.Text.TextStyle): IDebugText;
  };
  readonly game: { readonly loop: { readonly actualFps: number } };
}

/** Camera state shown for the current frame */
interface CameraReadout {
  position: Vector4;
  magnitudeSquared: number;
  edges: number;
}

/**
 * Camera readout overlay: frame rate, camera position, motor drift and the
 * number of wireframe edges drawn. Toggled with the backquote key.
 */
export class DebugView {
  private host: DebugViewHost;
  private textObject: IDebugText | null = null;
  private visible = true;
  private readout: CameraReadout | null = null;

  constructor(host: DebugViewHost) {
    this.host = host;
  }

  create(): void {
    this.textObject = this.host.add.text(10, 10, "", {
      fontFamily: "JetBrains Mono, monospace",
      fontSize: "14px",
      color: "#00ff88",
      backgroundColor: "rgba(0, 0, 0, 0.7)",
      padding: { x: 8, y: 6 },
    });
    this.textObject.setScrollFactor(0);
    this.textObject.setDepth(9999);
    this.textObject.setVisible(this.visible);
  }

  toggle(): void {
    this.visible = !this.visible;
    this.textObject?.setVisible(this.visible);
  }

  isVisible(): boolean {
    return this.visible;
  }

  /**
   * Record this frame's camera state; shown on the next `update`
   */
  setCameraInfo(position: Vector4, magnitudeSquared: number, edges: number): void {
    this.readout = { position: [...position], magnitudeSquared, edges };
  }

  /** Overlay text, one entry per line */
  lines(): string[] {
    const lines = [`fps: ${Math.round(this.host.game.loop.actualFps)}`];
    if (this.readout) {
      const { position, magnitudeSquared, edges } = this.readout;
      lines.push(`position: ${position.map((c) => c.toFixed(2)).join(", ")}`);
      lines.push(`|M|²: ${magnitudeSquared.toFixed(9)}`);
      lines.push(`edges: ${edges}`);
    }
    return lines;
  }

  update(): void {
    if (!this.visible || !this.textObject) return;
    this.textObject.setText(this.lines().join("\n"));
  }

  destroy(): void {
    this.textObject?.destroy();
    this.textObject = null;
    this.readout = null;
  }
}
