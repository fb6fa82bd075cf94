import { createUserParams } from "@/config/motionConfig";
import {
  PITCH_CLEARANCE,
  PITCH_POINTS,
  synthesizePitchCurves,
} from "@/transmission/PitchCurveSynthesizer";
import { describe, expect, it } from "vitest";

describe("PitchCurveSynthesizer", () => {
  it("should sample s from 0 to 1 in 101 points", () => {
    const { pitchPlanet, pitchRing } = synthesizePitchCurves(createUserParams());
    expect(PITCH_POINTS).toBe(101);
    expect(pitchPlanet).toHaveLength(101);
    expect(pitchRing).toHaveLength(101);
    expect(pitchPlanet[0][0]).toBe(0);
    expect(pitchPlanet[50][0]).toBe(0.5);
    expect(pitchPlanet[100][0]).toBe(1);
  });

  it("should follow the linear laws when they keep the clearance", () => {
    const { pitchPlanet, pitchRing } = synthesizePitchCurves(createUserParams());
    expect(pitchPlanet[0]).toEqual([0, 40]);
    expect(pitchPlanet[100]).toEqual([1, 41]);
    expect(pitchRing[0]).toEqual([0, 50]);
    expect(pitchRing[100]).toEqual([1, 51]);
  });

  it("should push the ring out to keep the clearance", () => {
    const { pitchPlanet, pitchRing } = synthesizePitchCurves(
      createUserParams({ centerDistanceBias: 0, centerDistanceScale: 0 })
    );
    pitchRing.forEach(([s, ring], j) => {
      expect(s).toBe(pitchPlanet[j][0]);
      expect(ring).toBe(pitchPlanet[j][1] + PITCH_CLEARANCE);
    });
  });

  it("should floor the planet radius", () => {
    const { pitchPlanet, pitchRing } = synthesizePitchCurves(
      createUserParams({ camR0: -10, camKPerUnit: 0, centerDistanceBias: 0, centerDistanceScale: 0 })
    );
    expect(pitchPlanet[0][1]).toBe(1e-6);
    expect(pitchRing[0][1]).toBe(1e-6 + 0.5);
  });
});
