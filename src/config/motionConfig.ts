import type { RampProfile, UserParams } from "@/types";
import { RAMP_PROFILES } from "@/types";

/**
 * Default user parameters
 */
export const DEFAULT_USER_PARAMS: UserParams = {
  strokeLengthMm: 100,
  dwellTdcDeg: 20,
  dwellBdcDeg: 20,
  rampAfterTdcDeg: 10,
  rampBeforeBdcDeg: 10,
  rampAfterBdcDeg: 10,
  rampBeforeTdcDeg: 10,
  upFraction: 0.5,
  samplingStepDeg: 0.5,
  rampProfile: "S5",
  sliderAxisDeg: 0,
  journalPhaseBetaDeg: 0,
  journalRadius: 5,
  camR0: 40,
  camKPerUnit: 1,
  centerDistanceBias: 50,
  centerDistanceScale: 1,
};

/**
 * Largest accepted sampling step; keeps at least 3 samples per revolution.
 * At exactly 3 samples the displacement closure pins every x to x[0], so
 * only v and a carry information.
 */
export const MAX_SAMPLING_STEP_DEG = 120;

/**
 * Error thrown when user parameters fail validation.
 */
export class MotionLawParameterError extends Error {
  constructor(public readonly messages: readonly string[]) {
    super(`Invalid motion-law parameters:\n${messages.join("\n")}`);
    this.name = "MotionLawParameterError";
  }
}

/**
 * Creates user parameters from defaults and overrides
 */
export function createUserParams(options: Partial<UserParams> = {}): UserParams {
  return { ...DEFAULT_USER_PARAMS, ...options };
}

/**
 * Check parameter ranges.
 *
 * @returns One message per problem; empty when the parameters are usable
 */
export function validateUserParams(params: UserParams): string[] {
  const errors: string[] = [];

  const numeric: ReadonlyArray<readonly [keyof UserParams, number]> = [
    ["strokeLengthMm", params.strokeLengthMm],
    ["dwellTdcDeg", params.dwellTdcDeg],
    ["dwellBdcDeg", params.dwellBdcDeg],
    ["rampAfterTdcDeg", params.rampAfterTdcDeg],
    ["rampBeforeBdcDeg", params.rampBeforeBdcDeg],
    ["rampAfterBdcDeg", params.rampAfterBdcDeg],
    ["rampBeforeTdcDeg", params.rampBeforeTdcDeg],
    ["upFraction", params.upFraction],
    ["samplingStepDeg", params.samplingStepDeg],
    ["sliderAxisDeg", params.sliderAxisDeg],
    ["journalPhaseBetaDeg", params.journalPhaseBetaDeg],
    ["journalRadius", params.journalRadius],
    ["camR0", params.camR0],
    ["camKPerUnit", params.camKPerUnit],
    ["centerDistanceBias", params.centerDistanceBias],
    ["centerDistanceScale", params.centerDistanceScale],
  ];
  for (const [key, value] of numeric) {
    if (!Number.isFinite(value)) {
      errors.push(`${key} must be a finite number`);
    }
  }
  if (errors.length > 0) return errors;

  if (params.strokeLengthMm <= 0) {
    errors.push("strokeLengthMm must be > 0");
  }

  const durations: ReadonlyArray<readonly [string, number]> = [
    ["dwellTdcDeg", params.dwellTdcDeg],
    ["dwellBdcDeg", params.dwellBdcDeg],
    ["rampAfterTdcDeg", params.rampAfterTdcDeg],
    ["rampBeforeBdcDeg", params.rampBeforeBdcDeg],
    ["rampAfterBdcDeg", params.rampAfterBdcDeg],
    ["rampBeforeTdcDeg", params.rampBeforeTdcDeg],
  ];
  for (const [key, value] of durations) {
    if (value < 0 || value > 360) {
      errors.push(`${key} must be in [0, 360]`);
    }
  }

  if (params.upFraction < 0 || params.upFraction > 1) {
    errors.push("upFraction must be in [0, 1]");
  }
  if (params.samplingStepDeg <= 0 || params.samplingStepDeg > MAX_SAMPLING_STEP_DEG) {
    errors.push(`samplingStepDeg must be in (0, ${MAX_SAMPLING_STEP_DEG}]`);
  }
  if (params.journalRadius <= 0) {
    errors.push("journalRadius must be > 0");
  }
  if (!isRampProfile(params.rampProfile)) {
    errors.push(`rampProfile must be one of ${RAMP_PROFILES.join(", ")}`);
  }
  if (
    params.accelLimitPerOmega2 !== undefined &&
    !(Number.isFinite(params.accelLimitPerOmega2) && params.accelLimitPerOmega2 > 0)
  ) {
    errors.push("accelLimitPerOmega2 must be a positive number when given");
  }

  return errors;
}

/**
 * Throw MotionLawParameterError unless the parameters are valid.
 */
export function assertValidUserParams(params: UserParams): void {
  const errors = validateUserParams(params);
  if (errors.length > 0) {
    throw new MotionLawParameterError(errors);
  }
}

/**
 * Type guard for ramp profile names.
 */
export function isRampProfile(value: string): value is RampProfile {
  return RAMP_PROFILES.some((profile) => profile === value);
}
