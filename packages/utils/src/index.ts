export * from "./constants.js";
export * from "./errors.js";
export * from "./types/api.js";
export * from "./types/extract.js";
