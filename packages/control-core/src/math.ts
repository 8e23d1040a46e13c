import type { Range } from "./types";

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Piecewise-linear map of `value` from `input` onto `output`, clamped at both ends.
 */
export function interpolate(value: number, input: Range, output: Range): number {
  const [inMin, inMax] = input;
  const [outMin, outMax] = output;
  if (inMax === inMin) return value < inMin ? outMin : outMax;
  const t = clamp((value - inMin) / (inMax - inMin), 0, 1);
  return outMin + (outMax - outMin) * t;
}

export function mean(values: readonly number[]): number {
  if (!values.length) return 0;
  return values.reduce((acc, v) => acc + v, 0) / values.length;
}
