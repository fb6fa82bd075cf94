/**
 * Motion-law Layer Exports
 */
export * from "./ProfileShapes";
export * from "./SegmentBoundaries";
export * from "./ContinuityCorrector";
export * from "./MotionLawSynthesizer";
export * from "./PreflightValidator";
export * from "./MotionDiagnostics";
