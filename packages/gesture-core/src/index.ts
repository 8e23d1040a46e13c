export * from "./types";
export * from "./landmarks";
export * from "./FingerStateClassifier";
export * from "./GestureClassifier";
export * from "./GestureHistory";
export * from "./ModeController";
export * from "./GestureEngine";
