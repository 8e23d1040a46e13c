import { ScrollMomentumEngine, VolumeMapper } from "@palmctl/control-core";
import type { ControlCommand, ScrollInput } from "@palmctl/control-core";
import { FingerStateClassifier } from "./FingerStateClassifier";
import { classifyGesture, targetModeFor } from "./GestureClassifier";
import { GestureHistory } from "./GestureHistory";
import { ModeController } from "./ModeController";
import type {
  FingerReading,
  GestureDebugState,
  GestureEngineOptions,
  GestureLabel,
  HandFrame,
  HandOrientation,
} from "./types";

const DEFAULT_GESTURE_HISTORY_SIZE = 8;

/**
 * One tick of the pipeline: landmarks in, at most one control command out.
 * Only the first detected hand is read.
 */
export class GestureEngine {
  private readonly options: GestureEngineOptions;
  private readonly fingers: FingerStateClassifier;
  private readonly modes: ModeController;
  private readonly history: GestureHistory;
  private readonly volume: VolumeMapper;
  private readonly scroll: ScrollMomentumEngine;
  private gesture: GestureLabel = "UNKNOWN";
  private orientation?: HandOrientation;

  constructor(opts?: GestureEngineOptions) {
    this.options = opts ?? {};
    this.fingers = new FingerStateClassifier(this.options.fingers);
    this.modes = new ModeController(this.options.mode);
    this.history = new GestureHistory(this.options.gestureHistorySize ?? DEFAULT_GESTURE_HISTORY_SIZE);
    this.volume = new VolumeMapper(this.options.volume);
    this.scroll = new ScrollMomentumEngine(this.options.scroll);
  }

  update(frame: HandFrame): ControlCommand[] {
    const commands: ControlCommand[] = [];
    const hand = frame.hands[0];
    const reading = hand ? this.fingers.classify(hand.landmarks) : null;

    if (!reading) {
      // No hand or a short frame: not an observation, but coasting continues.
      this.gesture = "UNKNOWN";
      this.orientation = undefined;
      if (this.modes.getMode() === "SCROLL") {
        this.pushScroll(null, frame.timestamp, commands);
      }
      return commands;
    }

    const label = classifyGesture(reading.fingers, reading.pinchDistance, this.options.classifier);
    this.gesture = label;
    this.orientation = reading.orientation;
    this.history.push(label);

    const transition = this.modes.observe(label);
    if (transition.committed) {
      this.enterMode(reading.pinchDistance);
    }

    switch (transition.mode) {
      case "VOLUME": {
        // Poses asking for another mode would drag the pinch distance while they settle.
        const target = targetModeFor(label);
        if (target !== null && target !== "VOLUME") break;
        commands.push({
          type: "SET_VOLUME",
          level: this.volume.map(reading.pinchDistance, this.fingers.getDistanceHistory()),
        });
        break;
      }
      case "SCROLL":
        this.pushScroll(scrollInputFor(label, reading), frame.timestamp, commands);
        break;
      case "IDLE":
        break;
    }

    return commands;
  }

  getDebugState(): GestureDebugState {
    return {
      mode: this.modes.getMode(),
      gesture: this.gesture,
      pendingMode: this.modes.getPendingMode(),
      stableTicks: this.modes.getStableTicks(),
      stability: this.history.stability(this.gesture),
      orientation: this.orientation,
      volumeLevel: this.volume.getLevel(),
      volumePercent: this.volume.getPercent(),
      scrollSpeed: this.scroll.getLastSpeed(),
      scrollMomentum: this.scroll.getMomentum(),
    };
  }

  getGestureHistory(): readonly GestureLabel[] {
    return this.history.values();
  }

  getSmoothedDistance(): number | null {
    return this.volume.getSmoothedDistance();
  }

  reset(): void {
    this.modes.reset();
    this.history.clear();
    this.enterMode();
    this.gesture = "UNKNOWN";
    this.orientation = undefined;
  }

  private enterMode(seedDistance?: number): void {
    this.fingers.resetDistanceHistory(seedDistance);
    this.volume.reset();
    this.scroll.reset();
  }

  private pushScroll(input: ScrollInput | null, timestamp: number, commands: ControlCommand[]): void {
    const delta = this.scroll.update(input, timestamp);
    if (delta !== null) {
      commands.push({ type: "SCROLL", delta });
    }
  }
}

function scrollInputFor(label: GestureLabel, reading: FingerReading): ScrollInput | null {
  if (label === "SCROLL_UP") return { direction: 1, fingerSpread: reading.fingerSpread };
  if (label === "SCROLL_DOWN") return { direction: -1, fingerSpread: reading.fingerSpread };
  return null;
}
