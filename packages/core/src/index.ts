export * from "./settings";
export * from "./logger";
export * from "./types";
export * from "./errors";
export * from "./parsing";
export * from "./environment";
export * from "./line";
export * from "./figure";
export * from "./reading";
export * from "./divination";
export * from "./transition";
export * from "./interpreter";
