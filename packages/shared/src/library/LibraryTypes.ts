import type { ExecuteOptions, RequestDescriptor } from "../http/RequestTypes.js";

export const GLOBAL_SCOPE = "";

export interface StoredAlias {
  /** Collection name, or undefined for a global alias. */
  collection?: string;
  name: string;
  request: RequestDescriptor;
  createdAt: string;
  updatedAt: string;
}

export interface StoredTemplate {
  name: string;
  request: RequestDescriptor;
  options: ExecuteOptions;
  updatedAt: string;
}

export interface CollectionSummary {
  name: string;
  aliasCount: number;
}
