/**
 * SegmentBoundaries - The eight-segment motion cycle
 *
 *   [dwell-TDC] → [accel ramp] → [CV compression] → [decel ramp into BDC]
 *   → [dwell-BDC] → [accel ramp] → [CV expansion] → [decel ramp into TDC] → 360°
 *
 * Dwell and ramp durations are fixed by the user; the remaining "free" angle is
 * split between the two constant-velocity segments by upFraction.
 */

import type { SegmentBoundaries, UserParams } from "@/types";
import { AngleMath } from "@/math/AngleMath";

/** Segment kinds, in cycle order */
export type SegmentKind =
  | "dwell-tdc"
  | "ramp-up-accel"
  | "cv-compression"
  | "ramp-up-decel"
  | "dwell-bdc"
  | "ramp-down-accel"
  | "cv-expansion"
  | "ramp-down-decel";

/**
 * Location of an angle within the cycle.
 */
export interface SegmentLocation {
  readonly kind: SegmentKind;
  /** Segment start angle */
  readonly startDeg: number;
  /** Segment span in degrees (may be 0 for a degenerate segment) */
  readonly spanDeg: number;
  /** Fractional progress within the segment, 0 for a degenerate span */
  readonly u: number;
}

/**
 * Angle budget split.
 */
export interface AngleBudget {
  /** Sum of all dwell and ramp durations */
  readonly fixedDeg: number;
  /** Angle left for the two CV segments (never negative) */
  readonly freeDeg: number;
  readonly upCvDeg: number;
  readonly dnCvDeg: number;
}

/**
 * Split the revolution into fixed (dwell/ramp) and free (CV) angle.
 * When the fixed durations exceed 360° the free budget floors at 0.
 */
export function computeAngleBudget(params: UserParams): AngleBudget {
  const fixedDeg =
    params.dwellTdcDeg +
    params.dwellBdcDeg +
    params.rampAfterTdcDeg +
    params.rampBeforeBdcDeg +
    params.rampAfterBdcDeg +
    params.rampBeforeTdcDeg;

  const freeDeg = AngleMath.positivePart(360 - fixedDeg);
  const upCvDeg = AngleMath.positivePart(freeDeg * params.upFraction);
  const dnCvDeg = AngleMath.positivePart(freeDeg - upCvDeg);

  return { fixedDeg, freeDeg, upCvDeg, dnCvDeg };
}

/**
 * Compute the boundary chain, each angle clamped into [0, 360].
 */
export function computeSegmentBoundaries(params: UserParams): SegmentBoundaries {
  const { upCvDeg, dnCvDeg } = computeAngleBudget(params);
  const clamp = AngleMath.clampRevolution;

  const dwellTdcEnd = clamp(params.dwellTdcDeg);
  const rampAfterTdcEnd = clamp(dwellTdcEnd + params.rampAfterTdcDeg);
  const rampBeforeBdcStart = clamp(rampAfterTdcEnd + upCvDeg);
  const bdcStart = clamp(rampBeforeBdcStart + params.rampBeforeBdcDeg);
  const bdcEnd = clamp(bdcStart + params.dwellBdcDeg);
  const rampAfterBdcEnd = clamp(bdcEnd + params.rampAfterBdcDeg);
  const rampBeforeTdcStart = clamp(rampAfterBdcEnd + dnCvDeg);

  return {
    dwellTdcEnd,
    rampAfterTdcEnd,
    rampBeforeBdcStart,
    bdcStart,
    bdcEnd,
    rampAfterBdcEnd,
    rampBeforeTdcStart,
  };
}

/**
 * Internal boundaries as an ordered list (360° excluded).
 */
export function internalBoundaryList(b: SegmentBoundaries): readonly number[] {
  return [
    b.dwellTdcEnd,
    b.rampAfterTdcEnd,
    b.rampBeforeBdcStart,
    b.bdcStart,
    b.bdcEnd,
    b.rampAfterBdcEnd,
    b.rampBeforeTdcStart,
  ];
}

/**
 * Fractional progress of delta within span, clamped to [0, 1].
 * A non-positive span yields 0.
 */
export function safeUnit(delta: number, span: number): number {
  if (span <= 0) return 0;
  return AngleMath.clamp(delta / span, 0, 1);
}

/**
 * Find the segment containing theta. Segments are half-open [start, end).
 */
export function locateSegment(
  thetaDeg: number,
  b: SegmentBoundaries
): SegmentLocation {
  const at = (kind: SegmentKind, start: number, end: number): SegmentLocation => {
    const spanDeg = end - start;
    return { kind, startDeg: start, spanDeg, u: safeUnit(thetaDeg - start, spanDeg) };
  };

  if (thetaDeg < b.dwellTdcEnd) return at("dwell-tdc", 0, b.dwellTdcEnd);
  if (thetaDeg < b.rampAfterTdcEnd) {
    return at("ramp-up-accel", b.dwellTdcEnd, b.rampAfterTdcEnd);
  }
  if (thetaDeg < b.rampBeforeBdcStart) {
    return at("cv-compression", b.rampAfterTdcEnd, b.rampBeforeBdcStart);
  }
  if (thetaDeg < b.bdcStart) {
    return at("ramp-up-decel", b.rampBeforeBdcStart, b.bdcStart);
  }
  if (thetaDeg < b.bdcEnd) return at("dwell-bdc", b.bdcStart, b.bdcEnd);
  if (thetaDeg < b.rampAfterBdcEnd) {
    return at("ramp-down-accel", b.bdcEnd, b.rampAfterBdcEnd);
  }
  if (thetaDeg < b.rampBeforeTdcStart) {
    return at("cv-expansion", b.rampAfterBdcEnd, b.rampBeforeTdcStart);
  }
  return at("ramp-down-decel", b.rampBeforeTdcStart, 360);
}
