export type * from "./store.js";
export type * from "./types/api.js";
export type * from "./types/graph.js";
export type * from "./types/memory.js";
export type * from "./types/simulation.js";
