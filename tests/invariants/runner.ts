/**
 * Invariant Test Runner
 *
 * Runs the full pipeline for one scene, profile and sampling step, and
 * collects everything the invariants inspect.
 */

import { createUserParams, validateUserParams } from "@/config/motionConfig";
import { synthesizeMotionLawDetailed } from "@/motion-law/MotionLawSynthesizer";
import { validateMotionLaw } from "@/motion-law/PreflightValidator";
import { estimateTransmissionRatio } from "@/transmission/TransmissionRatioEstimator";
import { computeTransmissionDetailed } from "@/transmission/TransmissionSynthesis";
import type { RampProfile, UserParams } from "@/types";
import { uniformReference } from "@test/helpers/paramHelpers";
import type { InvariantContext, Scene } from "./types";

/**
 * Sampling steps every scene is run with. 0.7 does not divide 360, so the
 * grid is rounded to 514 samples.
 */
export const SAMPLING_STEPS: readonly number[] = [0.25, 0.5, 0.7, 1, 2, 5];

/**
 * Parameters for one case.
 */
export function paramsFor(scene: Scene, profile: RampProfile, stepDeg: number): UserParams {
  return createUserParams({
    ...scene.params,
    rampProfile: profile,
    samplingStepDeg: stepDeg,
  });
}

/**
 * Compute the context for one case.
 * Throws when the scene's parameters are out of range.
 */
export function computeContext(
  scene: Scene,
  profile: RampProfile,
  stepDeg: number
): InvariantContext {
  const params = paramsFor(scene, profile, stepDeg);
  const errors = validateUserParams(params);
  if (errors.length > 0) {
    throw new Error(`Scene ${scene.name} has invalid parameters: ${errors.join("; ")}`);
  }

  const synthesis = synthesizeMotionLawDetailed(params);
  const motion = synthesis.motion;

  return {
    scene,
    profile,
    stepDeg,
    params,
    synthesis,
    preflight: validateMotionLaw(motion),
    transmission: computeTransmissionDetailed(motion, params),
    calibrated: estimateTransmissionRatio(motion, params, uniformReference(motion)),
  };
}

/**
 * Short key for a case, used in test names and reports.
 */
export function caseKey(profile: RampProfile, stepDeg: number): string {
  return `${profile}@${stepDeg}`;
}
