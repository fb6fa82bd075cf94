/**
 * MotionDiagnostics - Peak kinematic quantities of a motion-law table
 */

import type { MotionLawSamples } from "@/types";
import { AngleMath } from "@/math/AngleMath";

export interface MotionDiagnostics {
  readonly displacementRangeMm: number;
  readonly velocityMaxAbsPerOmega: number;
  readonly accelMaxAbsPerOmega2: number;
  /** Peak |da/dθ| by circular centred difference, θ in radians */
  readonly jerkMaxAbsPerOmega3: number;
}

/** Outcome of the optional acceleration feasibility gate */
export type FeasibilityResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly message: string };

/**
 * da/dθ at sample k by circular centred difference, θ in radians.
 * Zero for tables of fewer than 3 samples.
 */
export function jerkAt(motion: MotionLawSamples, k: number): number {
  const s = motion.samples;
  const n = s.length;
  const stepRad = AngleMath.toRadians(motion.stepDeg);
  if (n < 3 || !(stepRad > 0)) return 0;
  const next = s[AngleMath.wrapIndex(k + 1, n)].aMmPerOmega2;
  const prev = s[AngleMath.wrapIndex(k - 1, n)].aMmPerOmega2;
  return (next - prev) / (2 * stepRad);
}

/**
 * Compute peak quantities. An empty table yields all zeros.
 */
export function computeMotionDiagnostics(motion: MotionLawSamples): MotionDiagnostics {
  const s = motion.samples;
  const n = s.length;
  if (n === 0) {
    return {
      displacementRangeMm: 0,
      velocityMaxAbsPerOmega: 0,
      accelMaxAbsPerOmega2: 0,
      jerkMaxAbsPerOmega3: 0,
    };
  }

  let xMin = Number.POSITIVE_INFINITY;
  let xMax = Number.NEGATIVE_INFINITY;
  for (const sample of s) {
    xMin = Math.min(xMin, sample.xMm);
    xMax = Math.max(xMax, sample.xMm);
  }

  let jerkMax = 0;
  for (let k = 0; k < n; k++) {
    jerkMax = Math.max(jerkMax, Math.abs(jerkAt(motion, k)));
  }

  return {
    displacementRangeMm: xMax - xMin,
    velocityMaxAbsPerOmega: AngleMath.maxAbs(s.map((x) => x.vMmPerOmega)),
    accelMaxAbsPerOmega2: AngleMath.maxAbs(s.map((x) => x.aMmPerOmega2)),
    jerkMaxAbsPerOmega3: jerkMax,
  };
}

/**
 * Compare peak acceleration against an optional user limit.
 */
export function checkAccelerationLimit(
  diagnostics: MotionDiagnostics,
  limitPerOmega2: number | undefined
): FeasibilityResult {
  if (limitPerOmega2 === undefined || diagnostics.accelMaxAbsPerOmega2 <= limitPerOmega2) {
    return { ok: true };
  }
  return {
    ok: false,
    message: `Acceleration limit exceeded: ${diagnostics.accelMaxAbsPerOmega2} > ${limitPerOmega2}`,
  };
}
