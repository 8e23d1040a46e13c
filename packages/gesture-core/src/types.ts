import type { ScrollMomentumOptions, VolumeMapperOptions } from "@palmctl/control-core";

export type Handedness = "Left" | "Right";

/** Orientation derived from the landmarks themselves, not the detector's label. */
export type HandOrientation = Handedness;

export interface Landmark {
  x: number;
  y: number;
  z?: number;
}

export interface TrackedHand {
  handedness?: Handedness;
  landmarks: Landmark[];
}

export interface HandFrame {
  hands: TrackedHand[];
  timestamp: number;
}

/** Extended flags ordered thumb, index, middle, ring, pinky. */
export type FingerState = readonly [boolean, boolean, boolean, boolean, boolean];

export interface FingerReading {
  fingers: FingerState;
  orientation: HandOrientation;
  /** Thumb tip to index tip. */
  pinchDistance: number;
  /** Index tip to middle tip. */
  fingerSpread: number;
}

export type GestureLabel = "FIST" | "SCROLL_UP" | "SCROLL_DOWN" | "VOLUME" | "UNKNOWN";

export type ControlMode = "IDLE" | "VOLUME" | "SCROLL";

export interface ModeTransition {
  mode: ControlMode;
  previous: ControlMode;
  committed: boolean;
}

export interface FingerStateOptions {
  distanceHistorySize?: number;
}

export interface GestureClassifierOptions {
  /** Thumb-index distance the Volume pose must exceed, rejecting a closed pinch. */
  volumeMinPinchDistance?: number;
  /**
   * Treat any pose with the pinky extended as a fist.
   * Default: false
   */
  exitOnPinky?: boolean;
}

export interface ModeControllerOptions {
  /** Consecutive observations of a candidate needed before it is committed. */
  commitThreshold?: number;
}

export interface GestureEngineOptions {
  fingers?: FingerStateOptions;
  classifier?: GestureClassifierOptions;
  mode?: ModeControllerOptions;
  volume?: VolumeMapperOptions;
  scroll?: ScrollMomentumOptions;
  gestureHistorySize?: number;
}

export interface GestureDebugState {
  mode: ControlMode;
  gesture: GestureLabel;
  pendingMode: ControlMode | null;
  stableTicks: number;
  /** Share of the gesture history agreeing with the current gesture. */
  stability: number;
  orientation?: HandOrientation;
  volumeLevel: number | null;
  volumePercent: number | null;
  scrollSpeed: number;
  scrollMomentum: number;
}
