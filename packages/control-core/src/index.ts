export * from "./types";
export * from "./math";
export * from "./VolumeMapper";
export * from "./ScrollMomentumEngine";
export * from "./ActionDispatcher";
