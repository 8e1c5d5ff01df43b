export * from "./types.js";
export * from "./dag.js";
export * from "./stateMachine.js";
export * from "./hashChain.js";
