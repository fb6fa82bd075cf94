/**
 * TransmissionSynthesis - Ratio curve and pitch curves for a motion-law table
 *
 * This stage never throws. An unexpected failure yields the identity curve
 * (ratio 1 at every sample), empty pitch curves and a warning.
 */

import type { MotionLawSamples, TransmissionAndPitch, UserParams } from "@/types";
import { AngleMath } from "@/math/AngleMath";
import { MotionLawDebugLogger } from "@/debug/MotionLawDebugLogger";
import {
  type CalibrationOutcome,
  arcLengthResidualRms,
  estimateTransmissionRatio,
} from "./TransmissionRatioEstimator";
import { synthesizePitchCurves } from "./PitchCurveSynthesizer";
import { type ReferenceCurveProvider, resolveReferenceCurve } from "./ReferenceCurveProvider";

/**
 * Stage output plus how it was produced.
 */
export interface TransmissionSynthesis {
  readonly transmission: TransmissionAndPitch;
  readonly source: "geometry" | "reference" | "identity";
  readonly calibration: CalibrationOutcome;
  /** True when the identity fallback replaced the computed curves */
  readonly fallback: boolean;
}

const EMPTY_TRANSMISSION: TransmissionAndPitch = {
  iOfTheta: [],
  pitchPlanet: [],
  pitchRing: [],
  residualArcLenRms: 0,
};

/**
 * Identity ratio curve at every sample angle.
 */
export function identityTransmission(motion: MotionLawSamples): TransmissionAndPitch {
  return {
    iOfTheta: motion.samples.map((s) => [s.thetaDeg, 1] as const),
    pitchPlanet: [],
    pitchRing: [],
    residualArcLenRms: 0,
  };
}

export function computeTransmissionDetailed(
  motion: MotionLawSamples,
  params: UserParams,
  provider?: ReferenceCurveProvider
): TransmissionSynthesis {
  if (motion.samples.length === 0) {
    return {
      transmission: EMPTY_TRANSMISSION,
      source: "geometry",
      calibration: { kind: "skipped", reason: "empty motion table" },
      fallback: false,
    };
  }

  try {
    const lookup = resolveReferenceCurve(provider, params);
    const estimate = estimateTransmissionRatio(
      motion,
      params,
      lookup.kind === "found" ? lookup.curve : null
    );
    const calibration: CalibrationOutcome =
      lookup.kind === "unavailable"
        ? { kind: "skipped", reason: lookup.reason }
        : estimate.calibration;
    MotionLawDebugLogger.logCalibration(calibration);

    const residualArcLenRms = arcLengthResidualRms(estimate.ratios, motion.stepDeg);
    const pitch = synthesizePitchCurves(params);

    const iOfTheta = motion.samples.map(
      (s, k) => [s.thetaDeg, estimate.ratios[k]] as const
    );
    MotionLawDebugLogger.logTransmission({
      meanRatio: AngleMath.mean(estimate.ratios),
      minRatio: estimate.ratios.reduce((a, b) => Math.min(a, b), Infinity),
      maxRatio: estimate.ratios.reduce((a, b) => Math.max(a, b), -Infinity),
      residualArcLenRms,
      fallback: false,
    });

    return {
      transmission: { iOfTheta, ...pitch, residualArcLenRms },
      source: estimate.source,
      calibration,
      fallback: false,
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    MotionLawDebugLogger.warn(`Transmission stage failed, using identity ratio: ${message}`);
    return {
      transmission: identityTransmission(motion),
      source: "identity",
      calibration: { kind: "skipped", reason: `stage failed: ${message}` },
      fallback: true,
    };
  }
}

/**
 * Ratio curve, pitch curves and arc-length residual for a motion table.
 */
export function computeTransmissionAndPitch(
  motion: MotionLawSamples,
  params: UserParams,
  provider?: ReferenceCurveProvider
): TransmissionAndPitch {
  return computeTransmissionDetailed(motion, params, provider).transmission;
}
