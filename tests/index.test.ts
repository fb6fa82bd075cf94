import { describe, expect, it } from "vitest";
import {
  MotionLawEngine,
  RAMP_PROFILES,
  computeTransmissionAndPitch,
  createUserParams,
  synthesizeMotionLaw,
  validateMotionLaw,
} from "@/index";

describe("public entry point", () => {
  it("should expose the full pipeline", () => {
    const params = createUserParams({ samplingStepDeg: 2, rampProfile: "S7" });
    const motion = synthesizeMotionLaw(params);
    const transmission = computeTransmissionAndPitch(motion, params);

    expect(motion.samples).toHaveLength(180);
    expect(validateMotionLaw(motion).passed).toBe(true);
    expect(transmission.iOfTheta).toHaveLength(180);
    expect(transmission.pitchPlanet).toHaveLength(101);
  });

  it("should expose the engine facade and the profile list", () => {
    expect(new MotionLawEngine().getMotion().samples).toHaveLength(720);
    expect(RAMP_PROFILES).toEqual(["Cycloidal", "S5", "S7"]);
  });
});
