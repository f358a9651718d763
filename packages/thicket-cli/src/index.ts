export * from "./config.js";
export * from "./commands.js";
export * from "./program.js";
