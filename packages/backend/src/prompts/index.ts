export * from "./chat.js";
export * from "./memory.js";
export * from "./simulation.js";
