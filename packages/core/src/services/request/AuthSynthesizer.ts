import {
  createMalformedAuthError,
  createUnsupportedAuthTypeError,
  type HeaderMap,
} from "@reqdeck/shared";

export type AuthType = "bearer" | "basic";

export interface AuthDescriptor {
  type: string;
  value: string;
}

/** Splits `"<type> <value>"` at its first run of whitespace. */
export const parseAuthDescriptor = (descriptor: string): AuthDescriptor => {
  const trimmed = descriptor.trim();
  const match = /^(\S+)\s+([\s\S]*)$/.exec(trimmed);
  if (!match) return { type: trimmed, value: "" };
  return { type: match[1], value: match[2].trim() };
};

/**
 * Builds the `Authorization` header for a bearer token or `user:pass` basic credentials.
 * An empty type or value yields no header.
 */
export const synthesizeAuth = (type: string, value: string): HeaderMap => {
  if (!type || !value) return {};
  const normalized = type.toLowerCase();
  if (normalized === "bearer") {
    return { Authorization: `Bearer ${value}` };
  }
  if (normalized === "basic") {
    if (!value.includes(":")) {
      throw createMalformedAuthError(normalized);
    }
    return { Authorization: `Basic ${Buffer.from(value, "utf8").toString("base64")}` };
  }
  throw createUnsupportedAuthTypeError(type);
};

export const authHeadersFor = (descriptor: string | undefined): HeaderMap => {
  if (!descriptor || !descriptor.trim()) return {};
  const { type, value } = parseAuthDescriptor(descriptor);
  return synthesizeAuth(type, value);
};

/** Auth wins over a header of the same name. */
export const mergeAuthHeaders = (headers: HeaderMap, auth: HeaderMap): HeaderMap => ({ ...headers, ...auth });
