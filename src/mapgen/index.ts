// Barrel file for convenient imports
export * from "./constants";
export * from "./types";
export * from "./errors";
export * from "./logger";
export * from "./math";
export * from "./rng";
export * from "./params";
export * from "./context";
export * from "./topology";
export * from "./noise";
export * from "./elevation";
export * from "./climate";
export * from "./oceanDistance";
export * from "./orographic";
export * from "./rivers";
export * from "./biomes";
export * from "./orchestrator";
