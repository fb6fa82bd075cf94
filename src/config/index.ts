export * from "./motionConfig";
export * from "./parameterMap";
export * from "./parameterSignature";
