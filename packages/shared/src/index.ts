export * from "./schema.js";
export * from "./credentials.js";
export * from "./dates.js";
