/**
 * Engine Layer Exports
 */
export * from "./types";
export * from "./IMotionLawEngine";
export * from "./MotionLawEngine";
