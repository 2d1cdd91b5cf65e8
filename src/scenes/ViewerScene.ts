import { CameraRig } from "@/camera";
import { DebugView, InputManager } from "@/core";
import { CameraDebugLogger } from "@/debug/CameraDebugLogger";
import { MotorUtils } from "@/math/Motor";
import { WireframeRenderer, createTesseract } from "@/render";
import type { Wireframe } from "@/types";
import Phaser from "phaser";

/**
 * Main scene: owns the camera rig and draws the 4D scene every frame
 *
 * Frame order: pointer/wheel motion → camera.cursor/scroll, key state →
 * camera.update(dt), then the combined camera motor drives the wireframe.
 */
export class ViewerScene extends Phaser.Scene {
  private inputManager!: InputManager;
  private debugView!: DebugView;
  private camera!: CameraRig;
  private wireframeRenderer!: WireframeRenderer;
  private wireframes: Wireframe[] = [];

  constructor() {
    super({ key: "ViewerScene" });
  }

  create(): void {
    this.cameras.main.setBackgroundColor(0x101018);

    this.camera = new CameraRig();
    this.inputManager = new InputManager(this.input);
    this.inputManager.onKeyChange((code, pressed) => {
      this.camera.keyboard(code, pressed);
    });

    this.debugView = new DebugView(this);
    this.debugView.create();

    this.inputManager.onKeyPress("Backquote", () => {
      this.debugView.toggle();
    });
    this.inputManager.onKeyPress("KeyL", () => {
      CameraDebugLogger.toggle();
    });
    this.inputManager.onKeyPress("KeyP", () => {
      CameraDebugLogger.dump();
    });
    this.inputManager.onKeyPress("KeyE", () => {
      CameraDebugLogger.exportToConsole();
    });
    this.inputManager.onKeyPress("KeyR", () => {
      this.camera.reset();
      console.log("Camera reset");
    });

    // Two hypercubes straight ahead, the second displaced along w
    // (same screen position until the view rotates into w)
    this.wireframes = [
      createTesseract([0, 0.5, -1.5, 0.5], 1),
      createTesseract([0, 0.5, -1.5, 3], 1),
    ];
    this.wireframeRenderer = new WireframeRenderer(this.add.graphics());

    this.add
      .text(
        this.cameras.main.centerX,
        this.cameras.main.height - 20,
        "Click to capture mouse • WASD move • Space/Shift up/down • Wheel rotates into W • R reset",
        {
          fontFamily: "JetBrains Mono, monospace",
          fontSize: "12px",
          color: "#888888",
        }
      )
      .setOrigin(0.5);

    this.events.once(Phaser.Scenes.Events.SHUTDOWN, () => {
      this.inputManager.destroy();
      this.debugView.destroy();
      this.wireframeRenderer.dispose();
    });
  }

  update(_time: number, delta: number): void {
    const deltaSeconds = delta / 1000;

    const motion = this.inputManager.getFrameMotion();
    this.camera.cursor(motion.look.x, motion.look.y);
    this.camera.scroll(motion.scroll.x, motion.scroll.y);
    this.camera.update(deltaSeconds);

    const snapshot = this.camera.snapshot();
    const position = this.camera.position();
    CameraDebugLogger.logFrame(snapshot, position, deltaSeconds);

    const edges = this.wireframeRenderer.render(this.wireframes, snapshot, {
      width: this.scale.width,
      height: this.scale.height,
    });

    this.debugView.setCameraInfo(position, MotorUtils.magnitudeSquared(snapshot.transform), edges);
    this.debugView.update();

    this.inputManager.clearFrameEvents();
  }
}
