/**
 * Core type definitions for the cam motion-law engine
 */

// =============================================================================
// PARAMETER TYPES
// =============================================================================

/** Ramp shape used on every ramp segment */
export type RampProfile =
  | "Cycloidal" // 0.5·(1 − cos πu)
  | "S5" // quintic 10u³ − 15u⁴ + 6u⁵
  | "S7"; // septic 35u⁴ − 84u⁵ + 70u⁶ − 20u⁷

/** All ramp profiles, in order of increasing peak acceleration */
export const RAMP_PROFILES: readonly RampProfile[] = ["Cycloidal", "S5", "S7"];

/**
 * User parameters for one synthesis call.
 * Angles are degrees; lengths are millimetres.
 */
export interface UserParams {
  readonly strokeLengthMm: number;
  readonly dwellTdcDeg: number;
  readonly dwellBdcDeg: number;
  readonly rampAfterTdcDeg: number;
  readonly rampBeforeBdcDeg: number;
  readonly rampAfterBdcDeg: number;
  readonly rampBeforeTdcDeg: number;
  /** Compression-side share of the free constant-velocity angle (0-1) */
  readonly upFraction: number;
  /** Requested sampling step; the actual step is 360/round(360/step) */
  readonly samplingStepDeg: number;
  readonly rampProfile: RampProfile;

  // Geometry constants, used only by the ratio/pitch stage
  /** Slider axis angle γ */
  readonly sliderAxisDeg: number;
  /** Journal phase angle β */
  readonly journalPhaseBetaDeg: number;
  /** Journal radius R */
  readonly journalRadius: number;
  readonly camR0: number;
  readonly camKPerUnit: number;
  readonly centerDistanceBias: number;
  readonly centerDistanceScale: number;

  /** Optional feasibility gate on peak |a| (per ω²) */
  readonly accelLimitPerOmega2?: number;
}

/** Geometry subset consumed by the transmission ratio estimator */
export type RatioGeometry = Pick<
  UserParams,
  "sliderAxisDeg" | "journalPhaseBetaDeg" | "journalRadius"
>;

/** Geometry subset consumed by the pitch curve synthesizer */
export type PitchGeometry = Pick<
  UserParams,
  "camR0" | "camKPerUnit" | "centerDistanceBias" | "centerDistanceScale"
>;

// =============================================================================
// MOTION-LAW TYPES
// =============================================================================

/** One row of the motion-law table */
export interface MotionLawSample {
  readonly thetaDeg: number;
  readonly xMm: number;
  /** dx/dθ with θ in radians (velocity per unit angular rate) */
  readonly vMmPerOmega: number;
  /** d²x/dθ² with θ in radians */
  readonly aMmPerOmega2: number;
}

/**
 * One full periodic revolution.
 * The sample at 360° is implied equal to the sample at 0° and never stored.
 */
export interface MotionLawSamples {
  readonly stepDeg: number;
  readonly samples: readonly MotionLawSample[];
}

/**
 * Segment boundary angles of the eight-segment cycle, in order.
 * The final decel-into-TDC segment always ends at 360°.
 */
export interface SegmentBoundaries {
  readonly dwellTdcEnd: number;
  readonly rampAfterTdcEnd: number;
  readonly rampBeforeBdcStart: number;
  readonly bdcStart: number;
  readonly bdcEnd: number;
  readonly rampAfterBdcEnd: number;
  readonly rampBeforeTdcStart: number;
}

// =============================================================================
// TRANSMISSION TYPES
// =============================================================================

/** (thetaDeg, ratio) */
export type RatioPoint = readonly [thetaDeg: number, ratio: number];

/** (s, radius) with s ∈ [0, 1] */
export type PitchPoint = readonly [s: number, radius: number];

/** Ratio curve plus prototype pitch curves */
export interface TransmissionAndPitch {
  readonly iOfTheta: readonly RatioPoint[];
  readonly pitchPlanet: readonly PitchPoint[];
  readonly pitchRing: readonly PitchPoint[];
  readonly residualArcLenRms: number;
}

/** Externally supplied angular curve φ(θ) used for calibration */
export interface ReferenceCurve {
  readonly angleGridDeg: readonly number[];
  readonly phiDeg: readonly number[];
}

// =============================================================================
// VALIDATION TYPES
// =============================================================================

/** A single named preflight check */
export interface PreflightItem {
  readonly name: string;
  readonly passed: boolean;
  readonly detail: string;
}

/** Result of validating a motion-law table */
export interface PreflightReport {
  readonly items: readonly PreflightItem[];
  readonly passed: boolean;
}
