export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonValue[];
export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export type HeaderMap = Record<string, string>;
export type VariableMap = Record<string, string>;

export type DisplayFilter = "body" | "headers" | "status";
export const DISPLAY_FILTERS: readonly DisplayFilter[] = ["body", "headers", "status"];

/**
 * A request as stored in aliases, templates and chain files. `url` may also be a path to a
 * newline-delimited file of URLs; `auth` uses the `"<type> <value>"` form.
 */
export interface RequestDescriptor {
  method: string;
  url: string;
  headers?: HeaderMap;
  body?: JsonValue;
  auth?: string;
}

/** A descriptor after placeholder resolution, normalization and auth synthesis. */
export interface PreparedRequest {
  method: string;
  url: string;
  headers: HeaderMap;
  body?: JsonValue;
}

export interface ExecuteOptions {
  outputFile?: string;
  displayFilter?: DisplayFilter;
  authOverride?: string;
  assertion?: string;
  preview?: boolean;
  fillVariables?: boolean;
  skipHistory?: boolean;
  dryRun?: boolean;
  mock?: boolean;
  repeat?: number;
  intervalMs?: number;
  verbose?: boolean;
}

export interface ResponseRecord {
  method: string;
  url: string;
  headers: HeaderMap;
  requestBody?: JsonValue;
  outputFile?: string;
  displayFilter?: DisplayFilter;
  status: number;
  reason: string;
  elapsedMs: number;
  size: number;
  timestamp: string;
  body: string;
  responseHeaders: HeaderMap;
}

export const isJsonObject = (value: JsonValue | undefined): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * The single body normalization rule: `null` and an empty object mean "no body". Every other
 * value, including `[]`, `""`, `0` and `false`, is a body and is sent as-is.
 */
export const normalizeBody = (body: JsonValue | undefined): JsonValue | undefined => {
  if (body === undefined || body === null) return undefined;
  if (isJsonObject(body) && Object.keys(body).length === 0) return undefined;
  return body;
};

export const toJsonValue = (value: unknown): JsonValue | undefined => {
  if (value === null) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const converted = toJsonValue(item);
      items.push(converted === undefined ? null : converted);
    }
    return items;
  }
  if (typeof value === "object") {
    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      const converted = toJsonValue(entry);
      if (converted !== undefined) result[key] = converted;
    }
    return result;
  }
  return undefined;
};

export const toHeaderMap = (value: unknown): HeaderMap => {
  const headers: HeaderMap = {};
  if (!value || typeof value !== "object" || Array.isArray(value)) return headers;
  for (const [key, entry] of Object.entries(value)) {
    if (entry === undefined || entry === null) continue;
    headers[key] = typeof entry === "string" ? entry : String(entry);
  }
  return headers;
};

export const isDisplayFilter = (value: unknown): value is DisplayFilter =>
  typeof value === "string" && (DISPLAY_FILTERS as readonly string[]).includes(value);

const readBoolean = (value: unknown): boolean | undefined => (typeof value === "boolean" ? value : undefined);

const readString = (value: unknown): string | undefined =>
  typeof value === "string" && value.trim().length > 0 ? value : undefined;

const readCount = (value: unknown, minimum: number): number | undefined =>
  typeof value === "number" && Number.isInteger(value) && value >= minimum ? value : undefined;

/** Keeps only recognised, well-typed execute options from an untrusted object. */
export const sanitizeExecuteOptions = (value: unknown): ExecuteOptions => {
  if (!value || typeof value !== "object" || Array.isArray(value)) return {};
  const source = new Map<string, unknown>(Object.entries(value));
  const displayFilter = source.get("displayFilter");
  const options: ExecuteOptions = {
    outputFile: readString(source.get("outputFile")),
    displayFilter: isDisplayFilter(displayFilter) ? displayFilter : undefined,
    authOverride: readString(source.get("authOverride")),
    assertion: readString(source.get("assertion")),
    preview: readBoolean(source.get("preview")),
    fillVariables: readBoolean(source.get("fillVariables")),
    skipHistory: readBoolean(source.get("skipHistory")),
    dryRun: readBoolean(source.get("dryRun")),
    mock: readBoolean(source.get("mock")),
    repeat: readCount(source.get("repeat"), 1),
    intervalMs: readCount(source.get("intervalMs"), 0),
    verbose: readBoolean(source.get("verbose")),
  };
  const cleaned: ExecuteOptions = {};
  for (const [key, entry] of Object.entries(options)) {
    if (entry !== undefined) Object.assign(cleaned, { [key]: entry });
  }
  return cleaned;
};
