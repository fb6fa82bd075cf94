/**
 * Engine result types
 */

import type {
  MotionLawSample,
  MotionLawSamples,
  PreflightReport,
  TransmissionAndPitch,
  UserParams,
} from "@/types";
import type { FeasibilityResult, MotionDiagnostics } from "@/motion-law/MotionDiagnostics";
import type { CalibrationOutcome } from "@/transmission/TransmissionRatioEstimator";

/**
 * Everything computed for the current parameter set.
 */
export interface MotionLawResults {
  readonly params: UserParams;
  /** SHA-256 signature of params */
  readonly signature: string;
  readonly motion: MotionLawSamples;
  readonly transmission: TransmissionAndPitch;
  readonly ratioSource: "geometry" | "reference" | "identity";
  readonly calibration: CalibrationOutcome;
  readonly preflight: PreflightReport;
  readonly diagnostics: MotionDiagnostics;
  readonly feasibility: FeasibilityResult;
}

/**
 * An interpolated point of the motion law, with jerk.
 */
export interface MotionLawPoint extends MotionLawSample {
  /** da/dθ with θ in radians */
  readonly jMmPerOmega3: number;
}

/**
 * Callback invoked when results are recomputed.
 */
export type MotionLawResultsCallback = (results: MotionLawResults) => void;

/**
 * Unsubscribe function returned by event subscriptions.
 */
export type Unsubscribe = () => void;
