export * from "./converter.js";
export * from "./extractors/converted.js";
export * from "./extractors/docx.js";
export * from "./extractors/pptx.js";
export * from "./registry.js";
export * from "./temp.js";
export * from "./types.js";
