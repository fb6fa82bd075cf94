/**
 * Test helpers for building parameter sets and motion tables.
 */

import type {
  MotionLawSample,
  MotionLawSamples,
  ReferenceCurve,
  SegmentBoundaries,
  UserParams,
} from "@/types";
import { createUserParams } from "@/config/motionConfig";

/**
 * No dwells, four 30° Cycloidal ramps, 20 mm stroke, 1° step.
 */
export function symmetricParams(overrides: Partial<UserParams> = {}): UserParams {
  return createUserParams({
    strokeLengthMm: 20,
    dwellTdcDeg: 0,
    dwellBdcDeg: 0,
    rampAfterTdcDeg: 30,
    rampBeforeBdcDeg: 30,
    rampAfterBdcDeg: 30,
    rampBeforeTdcDeg: 30,
    upFraction: 0.5,
    samplingStepDeg: 1,
    rampProfile: "Cycloidal",
    ...overrides,
  });
}

/**
 * Same as symmetricParams but with 80% of the free angle on compression.
 */
export function compressionBiasedParams(overrides: Partial<UserParams> = {}): UserParams {
  return symmetricParams({ upFraction: 0.8, ...overrides });
}

/**
 * Build a motion table from parallel channel arrays on a uniform grid.
 */
export function motionFrom(
  stepDeg: number,
  channels: {
    readonly x: readonly number[];
    readonly v?: readonly number[];
    readonly a?: readonly number[];
  }
): MotionLawSamples {
  const samples: MotionLawSample[] = channels.x.map((x, k) => ({
    thetaDeg: k * stepDeg,
    xMm: x,
    vMmPerOmega: channels.v?.[k] ?? 0,
    aMmPerOmega2: channels.a?.[k] ?? 0,
  }));
  return { stepDeg, samples };
}

/**
 * Boundaries every 45°, starting at 45°.
 */
export const EVERY_45_DEG: SegmentBoundaries = {
  dwellTdcEnd: 45,
  rampAfterTdcEnd: 90,
  rampBeforeBdcStart: 135,
  bdcStart: 180,
  bdcEnd: 225,
  rampAfterBdcEnd: 270,
  rampBeforeTdcStart: 315,
};

/**
 * Reference curve φ(θ) = θ on the grid of a motion table.
 */
export function uniformReference(motion: MotionLawSamples): ReferenceCurve {
  const angles = motion.samples.map((s) => s.thetaDeg);
  return { angleGridDeg: angles, phiDeg: angles };
}
