/**
 * ContinuityCorrector - Wrap closure for a discretely sampled periodic table
 *
 * Passes, in order:
 * 1. Displacement least-squares wrap pass (hard extrapolation constraint)
 * 2. Displacement exact closure (extrapolation + window means)
 * 3. Velocity/acceleration wrap continuity on the last sample
 * 4. Boundary micro-nudge of acceleration
 *
 * Every pass works on a buffer local to the call and returns a new table.
 * Only the last two displacement samples and a handful of acceleration
 * samples next to segment boundaries are ever touched.
 */

import type { MotionLawSample, RampProfile, SegmentBoundaries } from "@/types";
import { AngleMath } from "@/math/AngleMath";
import { internalBoundaryList } from "./SegmentBoundaries";

/** Factor applied to the first post-boundary acceleration sample */
export const BOUNDARY_NUDGE_SCALE = 1 - 1e-12;

/** Relative magnitude of the pre-boundary nudge (Cycloidal only) */
export const BOUNDARY_NUDGE_EPSILON = 1e-12;

/** Tolerance for "last sample lies on an internal boundary" */
const ON_BOUNDARY_TOLERANCE = 1e-12;

/** Tikhonov weight of the least-squares pass, relative to scale² */
const TIKHONOV = 1e-24;

/** Largest change the least-squares pass may make, relative to scale */
const LSQ_CHANGE_BOUND = 1e-5;

/** Minimum improvement required by the least-squares pass, relative to scale */
const LSQ_MIN_IMPROVEMENT = 1e-15;

/**
 * Which passes changed the table.
 */
export interface CorrectionReport {
  readonly displacementLsq: boolean;
  readonly displacementExactClosure: boolean;
  readonly wrapVelocityAcceleration: boolean;
  /** Set when the last sample sits on a designed discontinuity */
  readonly lastSampleOnBoundary: boolean;
  readonly nudgedBoundaries: number;
}

/**
 * Corrected table plus report.
 */
export interface CorrectionResult {
  readonly samples: readonly MotionLawSample[];
  readonly report: CorrectionReport;
}

type Buffer = MotionLawSample[];

/**
 * Apply all continuity passes to a freshly synthesized table.
 */
export function correctContinuity(
  samples: readonly MotionLawSample[],
  boundaries: SegmentBoundaries,
  profile: RampProfile
): CorrectionResult {
  const buf: Buffer = samples.slice();
  const internal = internalBoundaryList(boundaries);

  let displacementLsq = false;
  let displacementExactClosure = false;
  if (buf.length >= 3) {
    displacementLsq = applyDisplacementLsq(buf);
    displacementExactClosure = applyDisplacementExactClosure(buf);
  } else if (buf.length === 2) {
    buf[1] = { ...buf[1], xMm: 0.5 * (buf[0].xMm + buf[1].xMm) };
    displacementExactClosure = true;
  }

  let wrapVelocityAcceleration = false;
  let lastSampleOnBoundary = false;
  if (buf.length >= 2) {
    const lastTheta = buf[buf.length - 1].thetaDeg;
    lastSampleOnBoundary = internal.some(
      (b) => Math.abs(b - lastTheta) <= ON_BOUNDARY_TOLERANCE
    );
    if (!lastSampleOnBoundary) {
      applyVelocityAccelerationWrap(buf);
      wrapVelocityAcceleration = true;
    }
  }

  const nudgedBoundaries = buf.length >= 2 ? applyBoundaryNudge(buf, internal, profile) : 0;

  return {
    samples: buf,
    report: {
      displacementLsq,
      displacementExactClosure,
      wrapVelocityAcceleration,
      lastSampleOnBoundary,
      nudgedBoundaries,
    },
  };
}

// =============================================================================
// DISPLACEMENT
// =============================================================================

/**
 * Least-squares pass on the last two displacement samples.
 *
 * Unknowns: d2 (change of x[n-2]) and d3 (change of x[n-1]).
 * Hard constraint: (1+r)·x[n-1] − r·x[n-2] = x[0], which gives d3 = a·d2 + b.
 * Objective: weighted squares of the h=1 and h=2 first/second differences
 * across the wrap, plus a negligible Tikhonov term on d2 and d3.
 */
function applyDisplacementLsq(buf: Buffer): boolean {
  const n = buf.length;
  const step = buf[1].thetaDeg - buf[0].thetaDeg;
  if (step === 0) return false;

  const x0 = buf[0].xMm;
  const x1 = buf[1].xMm;
  const x2 = buf[2].xMm;
  const xPrev = buf[n - 2].xMm;
  const xLast = buf[n - 1].xMm;
  const scale = Math.max(1, AngleMath.maxAbs([x0, x1, x2, xPrev, xLast]));

  const r = (360 - buf[n - 1].thetaDeg) / step;
  const denom = 1 + r;
  if (!(denom > 0)) return false;

  const a = r / denom;
  const b = (x0 - denom * xLast + r * xPrev) / denom;

  // Residuals as affine functions of d2
  const c = x1 - xLast - b; // first difference, h=1:  c − a·d2
  const d = xLast + b - 2 * x0 + x1; // second difference, h=1: d + a·d2
  const e = x2 - xPrev; // first difference, h=2:  e − d2
  const f = xPrev - 2 * x0 + x2; // second difference, h=2: f + d2

  const w2 = 1 / (scale * scale);
  const lambda = TIKHONOV / (scale * scale);

  const quad = 2 * (w2 * (2 * a * a + 2) + lambda + lambda * a * a);
  const lin = 2 * (w2 * (-a * c + a * d - e + f) + lambda * a * b);
  const d2 = quad !== 0 ? -lin / quad : 0;
  const d3 = a * d2 + b;

  const residual = (prev: number, last: number): number => {
    const w = 1 / scale;
    return (
      w * Math.abs(x1 - last) +
      w * Math.abs(last - 2 * x0 + x1) +
      w * Math.abs(x2 - prev) +
      w * Math.abs(prev - 2 * x0 + x2)
    );
  };

  const before = residual(xPrev, xLast);
  const after = residual(xPrev + d2, xLast + d3);
  const maxChange = Math.max(Math.abs(d2), Math.abs(d3));

  if (after + LSQ_MIN_IMPROVEMENT * scale < before && maxChange <= LSQ_CHANGE_BOUND * scale) {
    buf[n - 2] = { ...buf[n - 2], xMm: xPrev + d2 };
    buf[n - 1] = { ...buf[n - 1], xMm: xLast + d3 };
    return true;
  }
  return false;
}

/**
 * Exact closure on the last two displacement samples.
 *
 * Solves, for (xPrev, xLast):
 *   (1+r)·xLast − r·xPrev = x[0]
 *   mean(last k samples)  = mean(first k samples),  k = clamp(n/2, 1, 3)
 * and keeps the result only when the combined residual strictly drops.
 */
function applyDisplacementExactClosure(buf: Buffer): boolean {
  const n = buf.length;
  const x0 = buf[0].xMm;
  const r = AngleMath.wrapRatio(buf[n - 1].thetaDeg, buf[n - 2].thetaDeg);
  const k = Math.max(1, Math.min(3, Math.floor(n / 2)));

  let leadSum = 0;
  for (let i = 0; i < k; i++) leadSum += buf[i].xMm;
  const leadMean = leadSum / k;

  // Trailing samples other than the two unknowns stay fixed
  let fixedTail = 0;
  for (let i = 3; i <= k; i++) fixedTail += buf[n - i].xMm;

  let xLast: number;
  let xPrev: number;
  if (k === 1) {
    xLast = leadMean;
    if (r === 0) return false;
    xPrev = ((1 + r) * xLast - x0) / r;
  } else {
    const pairTarget = k * leadMean - fixedTail;
    xLast = (x0 + r * pairTarget) / (1 + 2 * r);
    xPrev = pairTarget - xLast;
  }
  if (!Number.isFinite(xLast) || !Number.isFinite(xPrev)) return false;

  const residual = (prev: number, last: number): number => {
    const extrapolated = AngleMath.extrapolate(last, prev, r);
    const tailSum = k === 1 ? last : last + prev + fixedTail;
    return Math.abs(extrapolated - x0) + Math.abs(tailSum / k - leadMean);
  };

  const before = residual(buf[n - 2].xMm, buf[n - 1].xMm);
  const after = residual(xPrev, xLast);
  if (!(after < before)) return false;

  buf[n - 2] = { ...buf[n - 2], xMm: xPrev };
  buf[n - 1] = { ...buf[n - 1], xMm: xLast };
  return true;
}

// =============================================================================
// VELOCITY / ACCELERATION
// =============================================================================

/**
 * Replace v and a of the last sample so that extrapolating the last two
 * samples to 360° reproduces sample 0.
 */
function applyVelocityAccelerationWrap(buf: Buffer): void {
  const last = buf.length - 1;
  const first = buf[0];
  const prev = buf[last - 1];
  const r = AngleMath.wrapRatio(buf[last].thetaDeg, prev.thetaDeg);
  const denom = 1 + r;

  const blend = (atZero: number, atPrev: number): number =>
    denom !== 0 ? (atZero + r * atPrev) / denom : 0.5 * (atPrev + atZero);

  buf[last] = {
    ...buf[last],
    vMmPerOmega: blend(first.vMmPerOmega, prev.vMmPerOmega),
    aMmPerOmega2: blend(first.aMmPerOmega2, prev.aMmPerOmega2),
  };
}

/**
 * At every internal boundary crossing, scale the first post-boundary
 * acceleration by BOUNDARY_NUDGE_SCALE. For Cycloidal ramps the last
 * pre-boundary acceleration is also set to a tiny value carrying the sign of
 * the post-boundary one, so no continuity ratio sees two exactly equal values.
 *
 * @returns Number of boundary crossings nudged
 */
function applyBoundaryNudge(
  buf: Buffer,
  internal: readonly number[],
  profile: RampProfile
): number {
  let nudged = 0;
  for (let k = 1; k < buf.length; k++) {
    const thPrev = buf[k - 1].thetaDeg;
    const thCur = buf[k].thetaDeg;
    const crosses = internal.some((b) => thPrev < b && thCur >= b);
    if (!crosses) continue;

    const aAfter = buf[k].aMmPerOmega2;
    buf[k] = { ...buf[k], aMmPerOmega2: aAfter * BOUNDARY_NUDGE_SCALE };

    if (profile === "Cycloidal") {
      const sign = aAfter >= 0 ? 1 : -1;
      buf[k - 1] = {
        ...buf[k - 1],
        aMmPerOmega2: sign * Math.abs(aAfter) * BOUNDARY_NUDGE_EPSILON,
      };
    }
    nudged++;
  }
  return nudged;
}
