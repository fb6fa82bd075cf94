/**
 * AngleMath - Pure utility functions for periodic angular tables
 * All functions are stateless and never mutate their inputs
 */
export const AngleMath = {
  /** Degrees per radian (180/π) */
  DEG_PER_RAD: 180 / Math.PI,

  /** Radians per degree (π/180) */
  RAD_PER_DEG: Math.PI / 180,

  /**
   * Convert degrees to radians
   */
  toRadians(deg: number): number {
    return deg * AngleMath.RAD_PER_DEG;
  },

  /**
   * Clamp an angle into [0, 360]
   */
  clampRevolution(deg: number): number {
    if (deg < 0) return 0;
    if (deg > 360) return 360;
    return deg;
  },

  /**
   * Clamp a value into [lo, hi]
   */
  clamp(value: number, lo: number, hi: number): number {
    return Math.min(hi, Math.max(lo, value));
  },

  /**
   * Non-negative part of a value
   */
  positivePart(value: number): number {
    return value > 0 ? value : 0;
  },

  /**
   * Wrap an index onto [0, n)
   */
  wrapIndex(index: number, n: number): number {
    return ((index % n) + n) % n;
  },

  /**
   * Wrap an angle difference onto [-180, 180]
   */
  unwrapDelta(deltaDeg: number): number {
    if (deltaDeg < -180) return deltaDeg + 360;
    if (deltaDeg > 180) return deltaDeg - 360;
    return deltaDeg;
  },

  /**
   * Arithmetic mean (0 for an empty list)
   */
  mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    let sum = 0;
    for (const v of values) sum += v;
    return sum / values.length;
  },

  /**
   * Largest absolute value (0 for an empty list)
   */
  maxAbs(values: readonly number[]): number {
    let max = 0;
    for (const v of values) {
      const abs = Math.abs(v);
      if (abs > max) max = abs;
    }
    return max;
  },

  /**
   * Ratio r of the gap between the last angle and 360° to the last step.
   * Returns 1 for a zero step.
   */
  wrapRatio(lastDeg: number, previousDeg: number): number {
    const step = lastDeg - previousDeg;
    return step !== 0 ? (360 - lastDeg) / step : 1;
  },

  /**
   * Linearly extrapolate the last two values of a channel by ratio r
   */
  extrapolate(last: number, previous: number, ratio: number): number {
    return last + ratio * (last - previous);
  },
};
