/**
 * IMotionLawEngine - Contract for the on-demand motion-law engine
 *
 * Callers set inputs, then read cached results. The engine invalidates and
 * recomputes as needed.
 */

import type {
  MotionLawSamples,
  PreflightReport,
  TransmissionAndPitch,
  UserParams,
} from "@/types";
import type { MotionDiagnostics } from "@/motion-law/MotionDiagnostics";
import type { ReferenceCurveProvider } from "@/transmission/ReferenceCurveProvider";
import type {
  MotionLawPoint,
  MotionLawResults,
  MotionLawResultsCallback,
  Unsubscribe,
} from "./types";

export interface IMotionLawEngine {
  // =========================================================================
  // INPUT SETTERS
  // =========================================================================

  /**
   * Set the user parameters.
   * Throws MotionLawParameterError when they are invalid.
   * Invalidates everything unless the parameter signature is unchanged.
   */
  setParams(params: UserParams): void;

  /**
   * Set (or clear) the calibration source.
   * Invalidates: transmission
   */
  setReferenceProvider(provider: ReferenceCurveProvider | undefined): void;

  getParams(): UserParams;

  // =========================================================================
  // CACHED GETTERS
  // =========================================================================

  getMotion(): MotionLawSamples;

  getTransmission(): TransmissionAndPitch;

  getPreflight(): PreflightReport;

  getDiagnostics(): MotionDiagnostics;

  /**
   * Get all results in one call.
   */
  getResults(): MotionLawResults;

  // =========================================================================
  // QUERIES
  // =========================================================================

  /**
   * Interpolate x, v, a and jerk at any angle; the table is periodic in 360°.
   * Jerk is interpolated between the per-sample centred differences of a.
   * Throws RangeError for a non-finite angle.
   */
  sampleAt(angleDeg: number): MotionLawPoint;

  // =========================================================================
  // EVENTS
  // =========================================================================

  /**
   * Subscribe to result changes.
   * Called after the inputs change or the cache is invalidated.
   */
  onResultsChanged(callback: MotionLawResultsCallback): Unsubscribe;

  // =========================================================================
  // LIFECYCLE
  // =========================================================================

  /**
   * Force recalculation of all cached values.
   */
  invalidateAll(): void;

  /**
   * Clean up resources.
   */
  dispose(): void;
}
