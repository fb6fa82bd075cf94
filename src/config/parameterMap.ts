/**
 * parameterMap - Build UserParams from a string map
 *
 * Keys are snake_case as produced by the parameter-input form. Blank or
 * unparsable values fall back to the defaults.
 */

import type { RampProfile, UserParams } from "@/types";
import { DEFAULT_USER_PARAMS } from "./motionConfig";

type NumericKey = {
  [K in keyof UserParams]-?: UserParams[K] extends number | undefined ? K : never;
}[keyof UserParams];

/** Map key → numeric UserParams field */
export const PARAMETER_KEYS: Readonly<Record<string, NumericKey>> = {
  stroke_length_mm: "strokeLengthMm",
  dwell_tdc_deg: "dwellTdcDeg",
  dwell_bdc_deg: "dwellBdcDeg",
  ramp_after_tdc_deg: "rampAfterTdcDeg",
  ramp_before_bdc_deg: "rampBeforeBdcDeg",
  ramp_after_bdc_deg: "rampAfterBdcDeg",
  ramp_before_tdc_deg: "rampBeforeTdcDeg",
  up_fraction: "upFraction",
  sampling_step_deg: "samplingStepDeg",
  slider_axis_deg: "sliderAxisDeg",
  journal_phase_beta_deg: "journalPhaseBetaDeg",
  journal_radius: "journalRadius",
  cam_r0: "camR0",
  cam_k_per_unit: "camKPerUnit",
  center_distance_bias: "centerDistanceBias",
  center_distance_scale: "centerDistanceScale",
  accel_limit_per_omega2: "accelLimitPerOmega2",
};

const PROFILE_ALIASES: Readonly<Record<string, RampProfile>> = {
  cycloidal: "Cycloidal",
  s5: "S5",
  quintic: "S5",
  s7: "S7",
  septic: "S7",
};

/**
 * Parse a number, or undefined for blank/unparsable text.
 */
export function parseNumber(raw: string | undefined): number | undefined {
  const text = raw?.trim();
  if (!text) return undefined;
  const value = Number(text);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Parse a ramp profile name (case-insensitive, with aliases).
 */
export function parseRampProfile(raw: string | undefined): RampProfile | undefined {
  const text = raw?.trim().toLowerCase();
  if (!text) return undefined;
  return PROFILE_ALIASES[text];
}

/**
 * Build parameters from a string map.
 */
export function userParamsFromMap(
  map: Readonly<Record<string, string>>,
  defaults: UserParams = DEFAULT_USER_PARAMS
): UserParams {
  const overrides: Partial<Record<NumericKey, number>> = {};
  for (const [key, field] of Object.entries(PARAMETER_KEYS)) {
    const value = parseNumber(map[key]);
    if (value !== undefined) {
      overrides[field] = value;
    }
  }

  return {
    ...defaults,
    ...overrides,
    rampProfile: parseRampProfile(map["ramp_profile"]) ?? defaults.rampProfile,
  };
}

/**
 * Inverse of userParamsFromMap: the snake_case string map of a parameter set.
 * Undefined optional fields are omitted.
 */
export function userParamsToMap(params: UserParams): Record<string, string> {
  const map: Record<string, string> = {};
  for (const [key, field] of Object.entries(PARAMETER_KEYS)) {
    const value = params[field];
    if (value !== undefined) {
      map[key] = String(value);
    }
  }
  map["ramp_profile"] = params.rampProfile;
  return map;
}
