import { BoundedHistory } from "./GestureHistory";
import { FINGER_TIPS, INDEX_MCP, INDEX_TIP, LANDMARK_COUNT, MIDDLE_TIP, PINKY_MCP, THUMB_IP, THUMB_TIP } from "./landmarks";
import type { FingerReading, FingerState, FingerStateOptions, HandOrientation, Landmark } from "./types";

const DEFAULTS: Required<FingerStateOptions> = {
  distanceHistorySize: 5,
};

// The thumb folds sideways, so which way counts as "out" depends on the hand.
const THUMB_EXTENDED: Record<HandOrientation, (tip: Landmark, ip: Landmark) => boolean> = {
  Right: (tip, ip) => tip.x < ip.x,
  Left: (tip, ip) => tip.x > ip.x,
};

export function detectOrientation(landmarks: Landmark[]): HandOrientation {
  return landmarks[PINKY_MCP].x > landmarks[INDEX_MCP].x ? "Right" : "Left";
}

export function distance2D(a: Landmark, b: Landmark): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

/** Every anatomical slot holds a point with finite coordinates. */
export function isCompleteHand(landmarks: Landmark[]): boolean {
  if (landmarks.length < LANDMARK_COUNT) return false;
  for (let i = 0; i < LANDMARK_COUNT; i++) {
    const lm = landmarks[i];
    if (lm == null || !Number.isFinite(lm.x) || !Number.isFinite(lm.y)) return false;
  }
  return true;
}

/**
 * Extended/folded flags for each digit, or null for a frame without a full
 * set of landmarks.
 */
export function readFingerStates(landmarks: Landmark[]): { fingers: FingerState; orientation: HandOrientation } | null {
  if (!isCompleteHand(landmarks)) return null;

  const orientation = detectOrientation(landmarks);
  const [index, middle, ring, pinky] = FINGER_TIPS.slice(1).map(
    (tip) => landmarks[tip].y < landmarks[tip - 2].y
  );
  const thumb = THUMB_EXTENDED[orientation](landmarks[THUMB_TIP], landmarks[THUMB_IP]);
  return { fingers: [thumb, index, middle, ring, pinky], orientation };
}

export class FingerStateClassifier {
  private readonly options: Required<FingerStateOptions>;
  private readonly distanceHistory: BoundedHistory<number>;

  constructor(opts?: FingerStateOptions) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
    this.distanceHistory = new BoundedHistory(this.options.distanceHistorySize);
  }

  /** Reads the hand and records its pinch distance. */
  classify(landmarks: Landmark[]): FingerReading | null {
    const states = readFingerStates(landmarks);
    if (!states) return null;

    const pinchDistance = distance2D(landmarks[THUMB_TIP], landmarks[INDEX_TIP]);
    const fingerSpread = distance2D(landmarks[INDEX_TIP], landmarks[MIDDLE_TIP]);
    this.distanceHistory.push(pinchDistance);
    return { ...states, pinchDistance, fingerSpread };
  }

  getDistanceHistory(): readonly number[] {
    return this.distanceHistory.values();
  }

  resetDistanceHistory(seed?: number): void {
    this.distanceHistory.clear();
    if (seed !== undefined) this.distanceHistory.push(seed);
  }
}

export { DEFAULTS as defaultFingerStateOptions };
