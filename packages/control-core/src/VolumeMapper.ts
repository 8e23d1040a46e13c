import { interpolate, mean } from "./math";
import type { Range, VolumeMapperOptions } from "./types";

const DEFAULTS: Required<VolumeMapperOptions> = {
  distanceRange: [50, 200],
  volumeRange: [0, 1],
  instantWeight: 0.7,
};

/**
 * Blends the current distance with the mean of recent distances so a single
 * noisy frame cannot jump the volume.
 */
export function blendDistance(instant: number, history: readonly number[], instantWeight = DEFAULTS.instantWeight): number {
  if (!history.length) return instant;
  return instant * instantWeight + mean(history) * (1 - instantWeight);
}

export function mapDistanceToVolume(
  distance: number,
  distanceRange: Range = DEFAULTS.distanceRange,
  volumeRange: Range = DEFAULTS.volumeRange
): number {
  return interpolate(distance, distanceRange, volumeRange);
}

export class VolumeMapper {
  private readonly options: Required<VolumeMapperOptions>;
  private smoothedDistance: number | null = null;
  private level: number | null = null;

  constructor(opts?: VolumeMapperOptions) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
  }

  map(distance: number, history: readonly number[]): number {
    const smoothed = blendDistance(distance, history, this.options.instantWeight);
    this.smoothedDistance = smoothed;
    this.level = mapDistanceToVolume(smoothed, this.options.distanceRange, this.options.volumeRange);
    return this.level;
  }

  reset(): void {
    this.smoothedDistance = null;
    this.level = null;
  }

  getSmoothedDistance(): number | null {
    return this.smoothedDistance;
  }

  getLevel(): number | null {
    return this.level;
  }

  /** Current level as 0-100 of the configured volume range. */
  getPercent(): number | null {
    if (this.level === null) return null;
    return interpolate(this.level, this.options.volumeRange, [0, 100]);
  }
}

export { DEFAULTS as defaultVolumeMapperOptions };
