/**
 * MotionLawSynthesizer - Builds the periodic x/v/a table for one revolution
 *
 * Velocity is shaped per segment (zero in dwells, ramped by p(u), constant in
 * CV segments). Acceleration is its analytic angle-derivative. Displacement is
 * the trapezoidal integral of velocity over radians, starting from x(0) = 0.
 *
 * The compression-side velocity vUp is sized so the continuous angle integral
 * over compression equals the stroke. The expansion-side vDn is sized against
 * the discrete velocity sums over the actual grid so that the sampled
 * revolution returns to its start.
 */

import type {
  MotionLawSample,
  MotionLawSamples,
  RampProfile,
  SegmentBoundaries,
  UserParams,
} from "@/types";
import { AngleMath } from "@/math/AngleMath";
import { MotionLawDebugLogger } from "@/debug/MotionLawDebugLogger";
import { RAMP_MEAN_FRACTION, rampFraction, rampSlope } from "./ProfileShapes";
import { computeSegmentBoundaries, locateSegment } from "./SegmentBoundaries";
import { type CorrectionReport, correctContinuity } from "./ContinuityCorrector";

/** Threshold below which the expansion-side discrete sum counts as empty */
const EMPTY_SUM = 1e-12;

/**
 * Full synthesis output, including intermediate quantities.
 */
export interface MotionLawSynthesis {
  readonly motion: MotionLawSamples;
  readonly boundaries: SegmentBoundaries;
  /** Compression-side CV velocity (mm per radian) */
  readonly vUp: number;
  /** Expansion-side CV velocity (mm per radian, ≤ 0) */
  readonly vDn: number;
  readonly corrections: CorrectionReport;
}

/**
 * Velocity magnitudes for both halves of the cycle.
 */
export interface CycleVelocities {
  readonly vUp: number;
  readonly vDn: number;
}

/**
 * Number of samples for a requested step: round(360/step), at least 1.
 */
export function sampleCount(samplingStepDeg: number): number {
  return Math.max(1, Math.round(360 / samplingStepDeg));
}

/**
 * Normalized velocity shape at theta: fraction of vUp (compression half)
 * or of vDn (expansion half).
 */
function velocityShape(
  thetaDeg: number,
  b: SegmentBoundaries,
  profile: RampProfile
): { readonly half: "up" | "down" | "none"; readonly fraction: number } {
  const seg = locateSegment(thetaDeg, b);
  switch (seg.kind) {
    case "dwell-tdc":
    case "dwell-bdc":
      return { half: "none", fraction: 0 };
    case "ramp-up-accel":
      return { half: "up", fraction: rampFraction(seg.u, profile) };
    case "cv-compression":
      return { half: "up", fraction: 1 };
    case "ramp-up-decel":
      return { half: "up", fraction: 1 - rampFraction(seg.u, profile) };
    case "ramp-down-accel":
      return { half: "down", fraction: rampFraction(seg.u, profile) };
    case "cv-expansion":
      return { half: "down", fraction: 1 };
    case "ramp-down-decel":
      return { half: "down", fraction: 1 - rampFraction(seg.u, profile) };
  }
}

/**
 * Size vUp from the stroke and vDn from the discrete grid sums.
 */
export function computeCycleVelocities(
  params: UserParams,
  b: SegmentBoundaries,
  n: number,
  stepDeg: number
): CycleVelocities {
  const span = (start: number, end: number): number => AngleMath.positivePart(end - start);

  const durUp1 = span(b.dwellTdcEnd, b.rampAfterTdcEnd);
  const durUpCv = span(b.rampAfterTdcEnd, b.rampBeforeBdcStart);
  const durUp2 = span(b.rampBeforeBdcStart, b.bdcStart);
  const durDn1 = span(b.bdcEnd, b.rampAfterBdcEnd);
  const durDnCv = span(b.rampAfterBdcEnd, b.rampBeforeTdcStart);
  const durDn2 = span(b.rampBeforeTdcStart, 360);

  const mean = RAMP_MEAN_FRACTION;
  const areaUpDeg = durUpCv + mean * durUp1 + (1 - mean) * durUp2;
  const areaDnDeg = durDnCv + mean * durDn1 + (1 - mean) * durDn2;

  const areaUpRad = AngleMath.toRadians(areaUpDeg);
  const vUp = areaUpRad > 0 ? params.strokeLengthMm / areaUpRad : 0;

  let upSum = 0;
  let dnSum = 0;
  for (let k = 0; k < n; k++) {
    const shape = velocityShape(k * stepDeg, b, params.rampProfile);
    if (shape.half === "up") upSum += shape.fraction;
    else if (shape.half === "down") dnSum += shape.fraction;
  }

  let vDn = 0;
  if (dnSum > EMPTY_SUM) {
    vDn = -vUp * (upSum / dnSum);
  } else if (areaDnDeg > 0) {
    vDn = -vUp * (areaUpDeg / areaDnDeg);
  }

  return { vUp, vDn };
}

/**
 * Analytic velocity at theta.
 */
export function velocityAt(
  thetaDeg: number,
  b: SegmentBoundaries,
  profile: RampProfile,
  { vUp, vDn }: CycleVelocities
): number {
  const shape = velocityShape(thetaDeg, b, profile);
  if (shape.half === "up") return vUp * shape.fraction;
  if (shape.half === "down") return vDn * shape.fraction;
  return 0;
}

/**
 * Analytic acceleration at theta: (Δv/span)·(180/π)·p'(u) on ramps, with the
 * sign of the velocity change; zero in dwells and CV segments.
 */
export function accelerationAt(
  thetaDeg: number,
  b: SegmentBoundaries,
  profile: RampProfile,
  { vUp, vDn }: CycleVelocities
): number {
  const seg = locateSegment(thetaDeg, b);
  if (seg.spanDeg <= 0) return 0;

  const slope = (v: number): number =>
    (v / seg.spanDeg) * AngleMath.DEG_PER_RAD * rampSlope(seg.u, profile);

  switch (seg.kind) {
    case "ramp-up-accel":
      return slope(vUp);
    case "ramp-up-decel":
      return -slope(vUp);
    case "ramp-down-accel":
      return slope(vDn);
    case "ramp-down-decel":
      return -slope(vDn);
    default:
      return 0;
  }
}

/**
 * Synthesize the table and return intermediate quantities.
 * Callers validate parameter ranges first (see validateUserParams).
 */
export function synthesizeMotionLawDetailed(params: UserParams): MotionLawSynthesis {
  const n = sampleCount(params.samplingStepDeg);
  const stepDeg = 360 / n;
  const stepRad = AngleMath.toRadians(stepDeg);

  const boundaries = computeSegmentBoundaries(params);
  const velocities = computeCycleVelocities(params, boundaries, n, stepDeg);

  const raw: MotionLawSample[] = [];
  let xPrev = 0;
  let vPrev = 0;
  for (let k = 0; k < n; k++) {
    const thetaDeg = k * stepDeg;
    const v = velocityAt(thetaDeg, boundaries, params.rampProfile, velocities);
    const a = accelerationAt(thetaDeg, boundaries, params.rampProfile, velocities);
    const x = k === 0 ? 0 : xPrev + 0.5 * (vPrev + v) * stepRad;
    raw.push({ thetaDeg, xMm: x, vMmPerOmega: v, aMmPerOmega2: a });
    xPrev = x;
    vPrev = v;
  }

  const { samples, report } = correctContinuity(raw, boundaries, params.rampProfile);

  MotionLawDebugLogger.logSynthesis(params, {
    n,
    stepDeg,
    vUp: velocities.vUp,
    vDn: velocities.vDn,
  });
  MotionLawDebugLogger.logCorrections(report);

  return {
    motion: { stepDeg, samples },
    boundaries,
    vUp: velocities.vUp,
    vDn: velocities.vDn,
    corrections: report,
  };
}

/**
 * Synthesize the periodic motion-law table for one revolution.
 */
export function synthesizeMotionLaw(params: UserParams): MotionLawSamples {
  return synthesizeMotionLawDetailed(params).motion;
}
