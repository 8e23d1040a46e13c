export * from "./LatestFrameSlot";
export * from "./GestureControlLoop";
