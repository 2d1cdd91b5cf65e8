import { CameraDebugLogger } from "@/debug/CameraDebugLogger";
import { MotorUtils } from "@/math/Motor";
import type { CameraConfig, CameraSnapshot, Motor, Vector4 } from "@/types";
import { DEFAULT_CAMERA_CONFIG } from "@/types";
import { MovementSystem } from "./MovementSystem";

const ORIGIN: Vector4 = [0, 0, 0, 0];

/**
 * CameraRig - Owns the camera's motor and folds input into it every frame
 *
 * Two motors are kept apart so that looking up and down never tilts the
 * movement plane:
 * - `transform`: position, heading and 4D orientation (moved by keys, yaw, scroll)
 * - `verticalLook`: pitch only, applied last
 *
 * Products of unit motors drift away from unit magnitude; both motors are
 * renormalized on a fixed frame interval, and immediately once the drift
 * exceeds `driftTolerance`.
 */
export class CameraRig {
  private _transform: Motor;
  private _verticalLook: Motor = MotorUtils.identity();
  private framesSinceRenormalize = 0;
  private readonly config: CameraConfig;
  readonly movement: MovementSystem;

  constructor(config: Partial<CameraConfig> = {}) {
    this.config = { ...DEFAULT_CAMERA_CONFIG, ...config };
    this.movement = new MovementSystem(this.config.moveSpeed);
    this._transform = MotorUtils.translation(this.config.startOffset);
  }

  get transform(): Motor {
    return this._transform;
  }

  get verticalLook(): Motor {
    return this._verticalLook;
  }

  get verticalFov(): number {
    return this.config.verticalFov;
  }

  /**
   * Key press or release.
   * @returns false if the key does nothing to the camera
   */
  keyboard(code: string, pressed: boolean): boolean {
    return this.movement.setKey(code, pressed);
  }

  /**
   * Pointer motion in pixels: horizontal turns in the xz plane, vertical pitches in xy
   */
  cursor(dx: number, dy: number): void {
    this._verticalLook = MotorUtils.compose(
      this._verticalLook,
      MotorUtils.rotation("xy", -dy * this.config.lookSensitivity)
    );
    this._transform = MotorUtils.compose(
      this._transform,
      MotorUtils.rotation("xz", dx * this.config.lookSensitivity)
    );
  }

  /**
   * Wheel motion rotates the view into the fourth axis (xw plane)
   */
  scroll(_dx: number, dy: number): void {
    this._transform = MotorUtils.compose(
      this._transform,
      MotorUtils.rotation("xw", dy * this.config.scrollSensitivity)
    );
  }

  /**
   * Advance by `dt` seconds
   */
  update(dt: number): void {
    if (!Number.isFinite(dt) || dt < 0) {
      throw new RangeError(`Frame delta must be a finite non-negative number, got ${dt}`);
    }

    this._transform = MotorUtils.compose(this._transform, this.movement.transform(dt));
    this.framesSinceRenormalize++;

    const drift = Math.max(
      Math.abs(MotorUtils.magnitudeSquared(this._transform) - 1),
      Math.abs(MotorUtils.magnitudeSquared(this._verticalLook) - 1)
    );
    if (drift > this.config.driftTolerance) {
      this.renormalize("drift", drift);
    } else if (this.framesSinceRenormalize >= this.config.renormalizeEvery) {
      this.renormalize("interval", drift);
    }
  }

  /** Combined camera motor for the current frame */
  snapshot(): CameraSnapshot {
    return {
      transform: MotorUtils.compose(this._transform, this._verticalLook),
      verticalFov: this.config.verticalFov,
    };
  }

  /** Camera position in world space */
  position(): Vector4 {
    return MotorUtils.transformPoint(this._transform, ORIGIN);
  }

  /** Return to the starting pose with all keys released */
  reset(): void {
    this._transform = MotorUtils.translation(this.config.startOffset);
    this._verticalLook = MotorUtils.identity();
    this.framesSinceRenormalize = 0;
    this.movement.reset();
  }

  private renormalize(reason: "drift" | "interval", drift: number): void {
    this._transform = MotorUtils.normalized(this._transform);
    this._verticalLook = MotorUtils.normalized(this._verticalLook);
    this.framesSinceRenormalize = 0;
    CameraDebugLogger.logRenormalization(reason, drift);
  }
}
