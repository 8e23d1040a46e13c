import { describe, expect, it } from "vitest";
import { detectOrientation, FingerStateClassifier, readFingerStates } from "../src";
import { buildHand } from "./hands";

describe("readFingerStates", () => {
  it("reads a right hand", () => {
    const hand = buildHand({ orientation: "Right", fingers: [1, 1, 0, 0, 0] });
    expect(readFingerStates(hand.landmarks)).toEqual({
      fingers: [true, true, false, false, false],
      orientation: "Right",
    });
  });

  it("mirrors the thumb rule for a left hand", () => {
    const open = buildHand({ orientation: "Left", fingers: [1, 0, 0, 0, 1] });
    expect(readFingerStates(open.landmarks)?.fingers).toEqual([true, false, false, false, true]);

    // Where a right thumb would count as extended, a left one is folded.
    const crossed = buildHand({ orientation: "Left", fingers: [1, 0, 0, 0, 0], thumbTip: [240, 280] });
    expect(detectOrientation(crossed.landmarks)).toBe("Left");
    expect(readFingerStates(crossed.landmarks)?.fingers[0]).toBe(false);
  });

  it("returns null for a frame with fewer than 21 landmarks", () => {
    const hand = buildHand({ fingers: [1, 1, 1, 1, 1] });
    expect(readFingerStates(hand.landmarks.slice(0, 20))).toBeNull();
    expect(readFingerStates([])).toBeNull();
  });

  it("returns null when a landmark slot is empty or not a finite point", () => {
    const holed = [...buildHand({ fingers: [1, 1, 0, 0, 0] }).landmarks];
    delete holed[17];
    expect(holed).toHaveLength(21);
    expect(readFingerStates(holed)).toBeNull();

    const unplaced = buildHand({ fingers: [1, 1, 0, 0, 0] }).landmarks.map((lm, i) =>
      i === 8 ? { x: Number.NaN, y: 150 } : lm
    );
    expect(readFingerStates(unplaced)).toBeNull();
  });
});

describe("FingerStateClassifier", () => {
  it("measures pinch distance and finger spread", () => {
    const classifier = new FingerStateClassifier();
    const reading = classifier.classify(buildHand({ fingers: [1, 1, 0, 0, 0] }).landmarks);

    expect(reading?.pinchDistance).toBeCloseTo(Math.hypot(50, 130));
    expect(reading?.fingerSpread).toBeCloseTo(Math.hypot(30, 150));
    expect(classifier.getDistanceHistory()).toHaveLength(1);
  });

  it("keeps a bounded distance history", () => {
    const classifier = new FingerStateClassifier({ distanceHistorySize: 3 });
    for (const y of [150, 160, 170, 180, 190]) {
      classifier.classify(buildHand({ fingers: [1, 1, 0, 0, 0], thumbTip: [290, y + 100], indexTip: [290, y] }).landmarks);
    }
    expect(classifier.getDistanceHistory()).toEqual([100, 100, 100]);

    classifier.resetDistanceHistory(42);
    expect(classifier.getDistanceHistory()).toEqual([42]);
  });

  it("ignores short frames", () => {
    const classifier = new FingerStateClassifier();
    expect(classifier.classify(buildHand({ fingers: [0, 0, 0, 0, 0] }).landmarks.slice(0, 8))).toBeNull();
    expect(classifier.getDistanceHistory()).toEqual([]);
  });
});
