import type { Hand } from "@tensorflow-models/hand-pose-detection";
import type { Landmark, TrackedHand } from "@palmctl/gesture-core";

type Keypoint = Hand["keypoints"][number];

export interface FrameSize {
  width: number;
  height: number;
}

export const DEFAULT_FRAME_SIZE: FrameSize = { width: 640, height: 480 };

/**
 * Converts hand-pose-detection results into pixel-space hands for the gesture
 * engine. Normalised keypoints are scaled up to the frame; pixel keypoints are
 * clamped to it.
 */
export function mapDetectionsToTrackedHands(
  detections: Hand[],
  frame: FrameSize = DEFAULT_FRAME_SIZE
): TrackedHand[] {
  return detections.map((detection) => ({
    handedness: detection.handedness,
    landmarks: detection.keypoints.map((kp) => toPixelLandmark(kp, frame)),
  }));
}

function toPixelLandmark(kp: Keypoint, frame: FrameSize): Landmark {
  const isNormalized = kp.x >= 0 && kp.x <= 1 && kp.y >= 0 && kp.y <= 1;
  const x = isNormalized ? kp.x * frame.width : kp.x;
  const y = isNormalized ? kp.y * frame.height : kp.y;
  return { x: clampTo(x, frame.width), y: clampTo(y, frame.height), z: kp.z };
}

function clampTo(value: number, max: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(max, Math.max(0, value));
}
