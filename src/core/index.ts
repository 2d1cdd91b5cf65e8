export { DebugView } from "./DebugView";
export { InputManager } from "./InputManager";
export type { FrameMotion } from "./InputManager";
