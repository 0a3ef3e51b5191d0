import {
  createInvalidInputError,
  isDisplayFilter,
  sanitizeExecuteOptions,
  toHeaderMap,
  toJsonValue,
  type ExecuteOptions,
  type RequestDescriptor,
} from "@reqdeck/shared";

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === "object" && !Array.isArray(value);

type DescriptorLike = Record<string, unknown> & { method: string; url: string };

export const looksLikeDescriptor = (value: unknown): value is DescriptorLike =>
  isRecord(value) && typeof value.method === "string" && typeof value.url === "string";

/**
 * Reads a request from imported or hand-written data. `data` is accepted as an alias of `body`
 * so older exports keep loading.
 */
export const parseRequestDescriptor = (value: unknown, label: string): RequestDescriptor => {
  if (!looksLikeDescriptor(value)) {
    throw createInvalidInputError(`${label} must be an object with string "method" and "url".`, { label });
  }
  const descriptor: RequestDescriptor = {
    method: value.method.toUpperCase(),
    url: value.url,
    headers: toHeaderMap(value.headers),
  };
  const body = toJsonValue(value.body !== undefined ? value.body : value.data);
  if (body !== undefined) descriptor.body = body;
  if (typeof value.auth === "string" && value.auth.trim()) descriptor.auth = value.auth.trim();
  return descriptor;
};

/**
 * Step-level options of a chain entry or template, in either camelCase or snake_case. Older
 * template exports keep them under `flags`.
 */
export const parseStepOptions = (entry: Record<string, unknown>): ExecuteOptions => {
  const value = isRecord(entry.flags) ? { ...entry.flags, ...entry } : entry;
  const options = sanitizeExecuteOptions(value.options);
  const outputFile = value.outputFile ?? value.output_file;
  if (typeof outputFile === "string" && outputFile.trim()) options.outputFile = outputFile;
  const only = value.only ?? value.displayFilter;
  if (isDisplayFilter(only)) options.displayFilter = only;
  const assertion = value.assertion ?? value.assert;
  if (typeof assertion === "string" && assertion.trim()) options.assertion = assertion;
  return options;
};

export const serializeDescriptor = (descriptor: RequestDescriptor): Record<string, unknown> => {
  const serialized: Record<string, unknown> = {
    method: descriptor.method,
    url: descriptor.url,
    headers: descriptor.headers ?? {},
  };
  if (descriptor.body !== undefined) serialized.body = descriptor.body;
  if (descriptor.auth) serialized.auth = descriptor.auth;
  return serialized;
};
