export * from "./sqlite/connection.js";
export * from "./migrations/store/StoreMigrations.js";
export * from "./repositories/history/HistoryRepository.js";
export * from "./repositories/library/LibraryRepository.js";
export type { Database } from "sqlite";
