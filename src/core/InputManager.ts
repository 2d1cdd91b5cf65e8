/** Browser wheel events report roughly this many pixels per notch */
const WHEEL_PIXELS_PER_LINE = 100;

/**
 * Event surface shared by Phaser's input and keyboard plugins
 */
export interface InputEvents {
  on(event: string, listener: (...args: never[]) => void): unknown;
  off(event: string): unknown;
}

/**
 * The slice of Phaser's input plugin (`scene.input`) the manager listens to
 */
export interface InputSource extends InputEvents {
  readonly mouse: { readonly locked: boolean; requestPointerLock(): void } | null;
  readonly keyboard: InputEvents | null;
}

/** Accumulated pointer and wheel motion since the last frame */
export interface FrameMotion {
  readonly look: { readonly x: number; readonly y: number };
  readonly scroll: { readonly x: number; readonly y: number };
}

/** Mutable internal state for input tracking */
interface MutableInputState {
  look: { x: number; y: number };
  scroll: { x: number; y: number };
  keys: Set<string>;
}

/**
 * Manages input handling for the viewer
 *
 * Pointer motion is only read while the pointer is locked (click the canvas
 * to lock it). Key transitions are forwarded to a single listener, plus
 * optional per-key callbacks for toggles.
 */
export class InputManager {
  private input: InputSource;
  private internalState: MutableInputState;
  private keyCallbacks: Map<string, () => void> = new Map();
  private keyListener: ((code: string, pressed: boolean) => void) | null = null;

  constructor(input: InputSource) {
    this.input = input;
    this.internalState = {
      look: { x: 0, y: 0 },
      scroll: { x: 0, y: 0 },
      keys: new Set(),
    };

    this.setupInputListeners();
  }

  private setupInputListeners(): void {
    this.input.on("pointerdown", () => {
      const mouse = this.input.mouse;
      if (mouse && !mouse.locked) mouse.requestPointerLock();
    });

    this.input.on("pointermove", (pointer: { movementX: number; movementY: number }) => {
      if (!this.input.mouse?.locked) return;
      this.internalState.look.x += pointer.movementX;
      this.internalState.look.y += pointer.movementY;
    });

    // DOM deltas grow as the wheel turns down/right; scrolling up is positive here
    this.input.on("wheel", (_pointer: unknown, _over: unknown, deltaX: number, deltaY: number) => {
      this.internalState.scroll.x -= deltaX / WHEEL_PIXELS_PER_LINE;
      this.internalState.scroll.y -= deltaY / WHEEL_PIXELS_PER_LINE;
    });

    this.input.keyboard?.on("keydown", (event: { code: string }) => {
      // Ignore auto-repeat
      if (this.internalState.keys.has(event.code)) return;
      this.internalState.keys.add(event.code);
      this.keyListener?.(event.code, true);
      const callback = this.keyCallbacks.get(event.code);
      if (callback) callback();
    });

    this.input.keyboard?.on("keyup", (event: { code: string }) => {
      this.internalState.keys.delete(event.code);
      this.keyListener?.(event.code, false);
    });
  }

  /** Receive every key press and release */
  onKeyChange(listener: (code: string, pressed: boolean) => void): void {
    this.keyListener = listener;
  }

  /** Register a callback for a specific key press */
  onKeyPress(keyCode: string, callback: () => void): void {
    this.keyCallbacks.set(keyCode, callback);
  }

  /** Pointer and wheel motion accumulated this frame */
  getFrameMotion(): FrameMotion {
    return {
      look: { ...this.internalState.look },
      scroll: { ...this.internalState.scroll },
    };
  }

  /**
   * Clear single-frame motion - call at end of each frame
   */
  clearFrameEvents(): void {
    this.internalState.look = { x: 0, y: 0 };
    this.internalState.scroll = { x: 0, y: 0 };
  }

  /** Clean up input listeners */
  destroy(): void {
    this.input.off("pointermove");
    this.input.off("pointerdown");
    this.input.off("wheel");
    this.input.keyboard?.off("keydown");
    this.input.keyboard?.off("keyup");
    this.keyCallbacks.clear();
    this.internalState.keys.clear();
    this.keyListener = null;
  }
}
