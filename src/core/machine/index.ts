export * from "./errors.js";
export * from "./evaluator.js";
export * from "./simulate.js";
export * from "./designs.js";
export * from "./equivalence.js";
export * from "./loader.js";
