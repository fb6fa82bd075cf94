/**
 * ProfileShapes - Normalized ramp shape functions p(u) and p'(u)
 *
 * Every profile satisfies, for u ∈ [0, 1]:
 * - p(0) = 0, p(1) = 1
 * - p'(0) = p'(1) = 0
 * - p non-decreasing
 * - p(u) + p(1 - u) = 1, so the mean of p over [0, 1] is exactly 0.5
 *
 * Inputs outside [0, 1] are clamped.
 */

import type { RampProfile } from "@/types";
import { AngleMath } from "@/math/AngleMath";

/**
 * Ramp fraction p(u).
 */
export function rampFraction(uRaw: number, profile: RampProfile): number {
  const u = AngleMath.clamp(uRaw, 0, 1);
  switch (profile) {
    case "Cycloidal":
      return 0.5 * (1 - Math.cos(Math.PI * u));
    case "S5": {
      const u3 = u * u * u;
      const u4 = u3 * u;
      const u5 = u4 * u;
      return 10 * u3 - 15 * u4 + 6 * u5;
    }
    case "S7": {
      const u4 = u * u * u * u;
      const u5 = u4 * u;
      const u6 = u5 * u;
      const u7 = u6 * u;
      return 35 * u4 - 84 * u5 + 70 * u6 - 20 * u7;
    }
  }
}

/**
 * First derivative dp/du.
 */
export function rampSlope(uRaw: number, profile: RampProfile): number {
  const u = AngleMath.clamp(uRaw, 0, 1);
  switch (profile) {
    case "Cycloidal":
      return 0.5 * Math.PI * Math.sin(Math.PI * u);
    case "S5": {
      const u2 = u * u;
      const u3 = u2 * u;
      const u4 = u3 * u;
      return 30 * u2 - 60 * u3 + 30 * u4;
    }
    case "S7": {
      const u3 = u * u * u;
      const u4 = u3 * u;
      const u5 = u4 * u;
      const u6 = u5 * u;
      return 140 * u3 - 420 * u4 + 420 * u5 - 140 * u6;
    }
  }
}

/** Mean of p over [0, 1], shared by all profiles */
export const RAMP_MEAN_FRACTION = 0.5;
