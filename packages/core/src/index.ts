// @circlet/core - values, environments and errors shared by the evaluator

export * from "./values";
export * from "./environment";
export * from "./errors";
