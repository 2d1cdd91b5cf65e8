export { CameraRig } from "./CameraRig";
export { MovementSystem, MOVEMENT_KEY_BINDINGS } from "./MovementSystem";
