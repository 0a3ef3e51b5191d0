import type { ResponseRecord, VariableMap } from "../http/RequestTypes.js";

export interface VariableStore {
  load(): Promise<VariableMap>;
  setVariable(name: string, value: string): Promise<void>;
}

export interface HistoryStore {
  append(record: ResponseRecord): Promise<void>;
  loadAll(): Promise<ResponseRecord[]>;
  /** Entry at `index` in insertion order. */
  get(index: number): Promise<ResponseRecord | undefined>;
  count(): Promise<number>;
  clear(): Promise<void>;
}
