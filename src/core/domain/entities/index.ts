export * from "./mapped-result.js";
