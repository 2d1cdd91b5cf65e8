/**
 * Core type definitions for hypercam
 */

// =============================================================================
// MATH TYPES
// =============================================================================

/** 4D vector (immutable). Used as a point with implicit weight 1 or as a direction. */
export type Vector4 = readonly [number, number, number, number];

/**
 * Even-graded element of the projective algebra R(4,0,1).
 *
 * e0 squares to zero and carries translation; e1..e4 are Euclidean.
 * A unit motor represents a rigid motion of 4D space.
 */
export interface Motor {
  // grade 0
  readonly s: number;
  // grade 2, translation-bearing
  readonly e01: number;
  readonly e02: number;
  readonly e03: number;
  readonly e04: number;
  // grade 2, rotation
  readonly e12: number;
  readonly e13: number;
  readonly e14: number;
  readonly e23: number;
  readonly e24: number;
  readonly e34: number;
  // grade 4
  readonly e0123: number;
  readonly e0124: number;
  readonly e0134: number;
  readonly e0234: number;
  readonly e1234: number;
}

export type MotorField = keyof Motor;

/** Motor fields in canonical order (also the flat array layout) */
export const MOTOR_FIELDS: readonly MotorField[] = [
  "s",
  "e01",
  "e02",
  "e03",
  "e04",
  "e12",
  "e13",
  "e14",
  "e23",
  "e24",
  "e34",
  "e0123",
  "e0124",
  "e0134",
  "e0234",
  "e1234",
];

/**
 * Homogeneous point (grade 4). The first four fields carry the Cartesian
 * coordinates x, y, z, w scaled by the weight `e1234`.
 */
export interface Point {
  readonly e0123: number;
  readonly e0124: number;
  readonly e0134: number;
  readonly e0234: number;
  readonly e1234: number;
}

/** Rotation bivectors */
export type RotationBivector = "e12" | "e13" | "e14" | "e23" | "e24" | "e34";

/** Coordinate plane named by its Cartesian axes */
export type CartesianPlane = "xy" | "xz" | "xw" | "yz" | "yw" | "zw";

/** Plane of a primitive rotation, by axis pair or by bivector */
export type RotationPlane = CartesianPlane | RotationBivector;

// =============================================================================
// CAMERA TYPES
// =============================================================================

/** Key axes for camera movement, each in [0, 1] */
export interface MovementInput {
  readonly forward: number;
  readonly backward: number;
  readonly left: number;
  readonly right: number;
  readonly up: number;
  readonly down: number;
}

/** Configuration for the camera rig */
export interface CameraConfig {
  /** Units per second at full key press */
  readonly moveSpeed: number;
  /** Radians per pointer pixel */
  readonly lookSensitivity: number;
  /** Radians per wheel unit (rotation into the fourth axis) */
  readonly scrollSensitivity: number;
  /** Vertical field of view in radians */
  readonly verticalFov: number;
  /** Initial camera position */
  readonly startOffset: Vector4;
  /** Frames between forced renormalizations */
  readonly renormalizeEvery: number;
  /** Max |magnitude² - 1| tolerated before renormalizing immediately */
  readonly driftTolerance: number;
}

/** Per-frame camera state handed to a rendering backend */
export interface CameraSnapshot {
  readonly transform: Motor;
  readonly verticalFov: number;
}

// =============================================================================
// RENDER TYPES
// =============================================================================

/** Screen viewport in pixels */
export interface Viewport {
  readonly width: number;
  readonly height: number;
}

/** A camera-space point projected onto the screen */
export interface ProjectedPoint {
  readonly x: number;
  readonly y: number;
  /** Distance along the view axis */
  readonly depth: number;
  /** Camera-space w, not visible on screen */
  readonly depthW: number;
}

/** Vertex/edge list of a 4D wireframe */
export interface Wireframe {
  readonly vertices: readonly Vector4[];
  readonly edges: readonly (readonly [number, number])[];
}

/** Configuration for wireframe rendering */
export interface WireframeConfig {
  readonly lineWidth: number;
  readonly alpha: number;
  /** Colour for edges at negative camera-space w */
  readonly nearColor: number;
  /** Colour for edges at positive camera-space w */
  readonly farColor: number;
  /** |w| at which the colour is fully saturated */
  readonly wRange: number;
}

// =============================================================================
// UI TYPES
// =============================================================================

/** Game configuration options */
export interface GameOptions {
  readonly width: number;
  readonly height: number;
  readonly backgroundColor: number;
  readonly forceCanvas: boolean;
}

// =============================================================================
// DEFAULT CONFIGURATIONS
// =============================================================================

/** Default camera configuration */
export const DEFAULT_CAMERA_CONFIG: CameraConfig = {
  moveSpeed: 5,
  lookSensitivity: 0.001,
  scrollSensitivity: 0.01,
  verticalFov: Math.PI / 2, // 90°
  startOffset: [-4.5, 0.5, -1.5, 0.5],
  renormalizeEvery: 60,
  driftTolerance: 1e-6,
};

/** Default wireframe configuration */
export const DEFAULT_WIREFRAME_CONFIG: WireframeConfig = {
  lineWidth: 2,
  alpha: 1,
  nearColor: 0xff4466,
  farColor: 0x44aaff,
  wRange: 2,
};

/** Near clipping distance along the view axis */
export const NEAR_PLANE = 0.01;
