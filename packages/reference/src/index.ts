export * from "./schema";
export * from "./referenceLoader";
export * from "./store";
