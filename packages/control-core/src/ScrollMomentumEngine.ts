import { clamp, interpolate } from "./math";
import type { ScrollInput, ScrollMomentumOptions } from "./types";

const DEFAULTS: Required<ScrollMomentumOptions> = {
  distanceRange: [30, 200],
  speedRange: [1, 20],
  cooldownMs: 50,
  adaptiveWindowMs: 500,
  adaptiveGrowth: 1.01,
  adaptiveMaxSpeed: 1.5,
  momentumThreshold: 0.1,
  momentumDecayRange: [0.85, 0.95],
};

/**
 * Turns scroll gestures into click deltas and keeps coasting after the
 * gesture ends. All timing uses frame timestamps so dropped frames do not
 * stretch the cooldown or the adaptive window.
 */
export class ScrollMomentumEngine {
  private readonly options: Required<ScrollMomentumOptions>;
  private momentum = 0;
  private adaptiveSpeed = 1;
  private lastSpeed = 0;
  private lastActiveAt: number | null = null;
  private lastEmitAt: number | null = null;

  constructor(opts?: ScrollMomentumOptions) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
  }

  /**
   * Advances one tick. Returns the signed number of clicks to scroll, or null
   * when nothing should be emitted.
   */
  update(input: ScrollInput | null, timestamp: number): number | null {
    if (!input) {
      return this.coast();
    }

    this.updateAdaptiveSpeed(timestamp);
    const speed = this.speedFor(input.fingerSpread) * this.adaptiveSpeed;
    this.lastSpeed = speed;

    const cooling = this.lastEmitAt !== null && timestamp - this.lastEmitAt < this.options.cooldownMs;
    if (cooling) {
      return this.coast();
    }

    this.momentum = input.direction * speed;
    this.lastEmitAt = timestamp;
    const delta = Math.trunc(this.momentum);
    return delta === 0 ? null : delta;
  }

  reset(): void {
    this.momentum = 0;
    this.adaptiveSpeed = 1;
    this.lastSpeed = 0;
    this.lastActiveAt = null;
    this.lastEmitAt = null;
  }

  getMomentum(): number {
    return this.momentum;
  }

  getAdaptiveSpeed(): number {
    return this.adaptiveSpeed;
  }

  getLastSpeed(): number {
    return this.lastSpeed;
  }

  /** Decay factor for the current last speed; faster scrolling coasts longer. */
  decayFactor(): number {
    const [minSpeed, maxSpeed] = this.options.speedRange;
    const [fastDecay, slowDecay] = this.options.momentumDecayRange;
    const t = maxSpeed === minSpeed ? 1 : clamp((this.lastSpeed - minSpeed) / (maxSpeed - minSpeed), 0, 1);
    return fastDecay + (slowDecay - fastDecay) * t;
  }

  private speedFor(fingerSpread: number): number {
    return interpolate(fingerSpread, this.options.distanceRange, this.options.speedRange);
  }

  private updateAdaptiveSpeed(timestamp: number): void {
    const continuous = this.lastActiveAt !== null && timestamp - this.lastActiveAt < this.options.adaptiveWindowMs;
    this.adaptiveSpeed = continuous
      ? Math.min(this.adaptiveSpeed * this.options.adaptiveGrowth, this.options.adaptiveMaxSpeed)
      : 1;
    this.lastActiveAt = timestamp;
  }

  private coast(): number | null {
    if (Math.abs(this.momentum) <= this.options.momentumThreshold) {
      this.momentum = 0;
      return null;
    }
    const delta = Math.trunc(this.momentum);
    this.momentum *= this.decayFactor();
    return delta === 0 ? null : delta;
  }
}

export { DEFAULTS as defaultScrollMomentumOptions };
