export * from "./cursor.js";
export * from "./state.js";
export * from "./correction.js";
