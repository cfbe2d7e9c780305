export { createApp } from "./app.js";
export type { AppOptions } from "./app.js";
export * from "./lib/index.js";
export * from "./services/index.js";
export type * from "./types/index.js";
