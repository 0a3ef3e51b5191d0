export * from "./errors/ReqdeckError.js";
export * from "./format/Format.js";
export * from "./http/RequestTypes.js";
export * from "./library/LibraryTypes.js";
export * from "./paths/PathHelper.js";
export type { HistoryStore, VariableStore } from "./ports/StorePorts.js";
