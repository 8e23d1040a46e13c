import { describe, expect, it } from "vitest";
import { ModeController } from "../src";
import type { GestureLabel } from "../src";

function feed(controller: ModeController, labels: GestureLabel[]) {
  return labels.map((label) => controller.observe(label));
}

describe("ModeController", () => {
  it("commits on the threshold-th consecutive observation, not before", () => {
    const controller = new ModeController({ commitThreshold: 5 });
    const transitions = feed(controller, Array<GestureLabel>(5).fill("SCROLL_UP"));

    expect(transitions.slice(0, 4).map((t) => t.mode)).toEqual(["IDLE", "IDLE", "IDLE", "IDLE"]);
    expect(transitions[4]).toEqual({ mode: "SCROLL", previous: "IDLE", committed: true });
  });

  it("does not report a commit while the candidate is already committed", () => {
    const controller = new ModeController({ commitThreshold: 2 });
    const transitions = feed(controller, ["FIST", "FIST", "FIST"]);
    expect(transitions.every((t) => !t.committed && t.mode === "IDLE")).toBe(true);
  });

  it("treats both scroll directions as the same candidate", () => {
    const controller = new ModeController({ commitThreshold: 5 });
    feed(controller, ["SCROLL_UP", "SCROLL_DOWN", "SCROLL_UP", "SCROLL_DOWN"]);
    expect(controller.getMode()).toBe("IDLE");
    expect(controller.getStableTicks()).toBe(4);
  });

  it("never commits while candidates keep changing", () => {
    const controller = new ModeController({ commitThreshold: 3 });
    const labels: GestureLabel[] = [];
    for (let run = 1; run < 3; run++) {
      for (const label of ["VOLUME", "SCROLL_UP", "FIST"] as const) {
        for (let i = 0; i < run; i++) labels.push(label);
      }
    }
    const transitions = feed(controller, labels);
    expect(transitions.every((t) => t.mode === "IDLE")).toBe(true);
  });

  it("ignores UNKNOWN without resetting the count", () => {
    const controller = new ModeController({ commitThreshold: 5 });
    feed(controller, ["VOLUME", "VOLUME", "VOLUME", "UNKNOWN", "UNKNOWN"]);
    expect(controller.getPendingMode()).toBe("VOLUME");
    expect(controller.getStableTicks()).toBe(3);

    expect(controller.observe("VOLUME").committed).toBe(false);
    expect(controller.observe("VOLUME")).toEqual({ mode: "VOLUME", previous: "IDLE", committed: true });
  });

  it("commits directly between volume and scroll", () => {
    const controller = new ModeController({ commitThreshold: 2 });
    feed(controller, ["VOLUME", "VOLUME"]);
    const transitions = feed(controller, ["SCROLL_DOWN", "SCROLL_DOWN"]);
    expect(transitions[1]).toEqual({ mode: "SCROLL", previous: "VOLUME", committed: true });
  });

  it("keeps the committed mode through a short interruption", () => {
    const controller = new ModeController({ commitThreshold: 3 });
    feed(controller, ["SCROLL_UP", "SCROLL_UP", "SCROLL_UP"]);
    feed(controller, ["FIST", "FIST", "SCROLL_UP", "VOLUME", "VOLUME"]);
    expect(controller.getMode()).toBe("SCROLL");
    expect(controller.getPendingMode()).toBe("VOLUME");
    expect(controller.getStableTicks()).toBe(2);
  });

  it("resets to idle", () => {
    const controller = new ModeController({ commitThreshold: 1 });
    controller.observe("VOLUME");
    controller.reset();
    expect(controller.getMode()).toBe("IDLE");
    expect(controller.getPendingMode()).toBeNull();
    expect(controller.getStableTicks()).toBe(0);
  });
});
