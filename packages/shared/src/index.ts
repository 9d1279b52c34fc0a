export * from "./constants.js";
export * from "./types/index.js";
