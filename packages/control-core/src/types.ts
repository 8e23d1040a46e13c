export type ControlCommand =
  | { type: "SET_VOLUME"; level: number }
  | { type: "SCROLL"; delta: number };

export type Range = readonly [number, number];

/**
 * Side of the OS that actually changes the volume or scrolls.
 * Either method may be synchronous or return a promise-like.
 */
export interface ActionExecutor {
  setVolume(level: number): void | PromiseLike<void>;
  scroll(delta: number): void | PromiseLike<void>;
}

export type ControlError =
  | { type: "action-failed"; command: ControlCommand; error: unknown }
  | { type: "tick-failed"; error: unknown };

export interface VolumeMapperOptions {
  /** Hand distance (px) mapped to the bottom and top of the volume range. */
  distanceRange?: Range;
  /**
   * Volume range accepted by the platform.
   * Default: [0, 1]
   */
  volumeRange?: Range;
  /** Share of the instantaneous distance in the blend; the rest is the history mean. */
  instantWeight?: number;
}

export interface ScrollMomentumOptions {
  /** Index-to-middle fingertip distance (px) mapped onto speedRange. */
  distanceRange?: Range;
  speedRange?: Range;
  cooldownMs?: number;
  adaptiveWindowMs?: number;
  adaptiveGrowth?: number;
  adaptiveMaxSpeed?: number;
  momentumThreshold?: number;
  /**
   * Decay factor applied to momentum per coasting tick, picked by the last speed.
   * The slowest speed decays with the first value, the fastest with the second.
   */
  momentumDecayRange?: Range;
}

export interface ScrollInput {
  direction: 1 | -1;
  fingerSpread: number;
}
