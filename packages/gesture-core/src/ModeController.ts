import { targetModeFor } from "./GestureClassifier";
import type { ControlMode, GestureLabel, ModeControllerOptions, ModeTransition } from "./types";

const DEFAULTS: Required<ModeControllerOptions> = {
  commitThreshold: 5,
};

/**
 * Hysteresis over per-frame gesture labels. A candidate mode is committed
 * only after `commitThreshold` consecutive observations; any different
 * candidate restarts the count. UNKNOWN frames neither advance nor reset it.
 */
export class ModeController {
  private readonly options: Required<ModeControllerOptions>;
  private mode: ControlMode = "IDLE";
  private pending: ControlMode | null = null;
  private stableTicks = 0;

  constructor(opts?: ModeControllerOptions) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
  }

  observe(label: GestureLabel): ModeTransition {
    const previous = this.mode;
    const target = targetModeFor(label);
    if (target === null) {
      return { mode: this.mode, previous, committed: false };
    }

    if (target !== this.pending) {
      this.pending = target;
      this.stableTicks = 1;
    } else {
      this.stableTicks += 1;
    }

    if (this.stableTicks >= this.options.commitThreshold && target !== this.mode) {
      this.mode = target;
      return { mode: this.mode, previous, committed: true };
    }
    return { mode: this.mode, previous, committed: false };
  }

  getMode(): ControlMode {
    return this.mode;
  }

  getPendingMode(): ControlMode | null {
    return this.pending;
  }

  getStableTicks(): number {
    return this.stableTicks;
  }

  reset(): void {
    this.mode = "IDLE";
    this.pending = null;
    this.stableTicks = 0;
  }
}

export { DEFAULTS as defaultModeControllerOptions };
