import type { ControlMode, FingerState, GestureClassifierOptions, GestureLabel } from "./types";

const DEFAULTS: Required<GestureClassifierOptions> = {
  volumeMinPinchDistance: 20,
  exitOnPinky: false,
};

type Pattern = readonly [0 | 1, 0 | 1, 0 | 1, 0 | 1, 0 | 1];

const SCROLL_UP: Pattern = [0, 1, 0, 0, 0];
const SCROLL_DOWN: Pattern = [0, 1, 1, 0, 0];
const VOLUME: Pattern = [1, 1, 0, 0, 0];

function matches(fingers: FingerState, pattern: Pattern): boolean {
  return fingers.every((extended, i) => extended === (pattern[i] === 1));
}

/**
 * Labels one frame's pose. First match wins: fist, scroll, volume, then the
 * optional pinky exit; anything else is UNKNOWN.
 */
export function classifyGesture(
  fingers: FingerState,
  pinchDistance: number,
  opts?: GestureClassifierOptions
): GestureLabel {
  const options = { ...DEFAULTS, ...(opts ?? {}) };

  if (fingers.every((extended) => !extended)) return "FIST";
  if (matches(fingers, SCROLL_UP)) return "SCROLL_UP";
  if (matches(fingers, SCROLL_DOWN)) return "SCROLL_DOWN";
  if (matches(fingers, VOLUME) && pinchDistance > options.volumeMinPinchDistance) return "VOLUME";
  if (options.exitOnPinky && fingers[4]) return "FIST";
  return "UNKNOWN";
}

/** Mode a label asks for; null means the frame carries no opinion. */
export function targetModeFor(label: GestureLabel): ControlMode | null {
  switch (label) {
    case "FIST":
      return "IDLE";
    case "SCROLL_UP":
    case "SCROLL_DOWN":
      return "SCROLL";
    case "VOLUME":
      return "VOLUME";
    case "UNKNOWN":
      return null;
  }
}

export { DEFAULTS as defaultGestureClassifierOptions };
