/**
 * Cam motion-law engine
 *
 * Periodic displacement/velocity/acceleration synthesis for cam mechanisms,
 * with transmission-ratio and pitch-curve derivation.
 */
export * from "./types";
export * from "./config";
export * from "./motion-law";
export * from "./transmission";
export * from "./engine";
export { AngleMath } from "./math/AngleMath";
export { MotionLawDebugLogger } from "./debug/MotionLawDebugLogger";
export type {
  MotionLawDebugLog,
  SynthesisDebugInfo,
  TransmissionDebugInfo,
} from "./debug/MotionLawDebugLogger";
