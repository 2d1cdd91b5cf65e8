import { MotorUtils } from "@/math/Motor";
import type { Motor, MovementInput } from "@/types";

/** Mutable internal state for key axes */
interface MutableMovementInput {
  forward: number;
  backward: number;
  left: number;
  right: number;
  up: number;
  down: number;
}

/** Physical key codes (KeyboardEvent.code) bound to movement axes */
export const MOVEMENT_KEY_BINDINGS: Readonly<Record<string, keyof MovementInput>> = {
  KeyW: "forward",
  KeyS: "backward",
  KeyA: "left",
  KeyD: "right",
  Space: "up",
  ShiftLeft: "down",
};

function noInput(): MutableMovementInput {
  return { forward: 0, backward: 0, left: 0, right: 0, up: 0, down: 0 };
}

/**
 * MovementSystem - Turns held movement keys into a per-frame translation
 *
 * Camera-local axes: x forward, y up, z right. The fourth axis is reached
 * only by rotating into it (see CameraRig.scroll).
 */
export class MovementSystem {
  private state: MutableMovementInput = noInput();
  private readonly moveSpeed: number;

  constructor(moveSpeed: number) {
    this.moveSpeed = moveSpeed;
  }

  get input(): MovementInput {
    return { ...this.state };
  }

  /**
   * Record a key press or release.
   * @returns false if the key is not bound to a movement axis
   */
  setKey(code: string, pressed: boolean): boolean {
    // Own keys only: "constructor" and friends are not bindings
    if (!Object.hasOwn(MOVEMENT_KEY_BINDINGS, code)) return false;
    const axis = MOVEMENT_KEY_BINDINGS[code];
    this.state[axis] = pressed ? 1 : 0;
    return true;
  }

  /**
   * Local translation covered in `dt` seconds at the current key state
   */
  transform(dt: number): Motor {
    const { forward, backward, left, right, up, down } = this.state;
    return MotorUtils.translation([
      (forward - backward) * this.moveSpeed * dt,
      (up - down) * this.moveSpeed * dt,
      (right - left) * this.moveSpeed * dt,
      0,
    ]);
  }

  /** Release all keys */
  reset(): void {
    this.state = noInput();
  }
}
