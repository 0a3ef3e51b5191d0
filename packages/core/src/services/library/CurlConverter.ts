import {
  createInvalidInputError,
  normalizeBody,
  toJsonValue,
  type HeaderMap,
  type JsonValue,
  type RequestDescriptor,
} from "@reqdeck/shared";
import { parseAuthDescriptor, synthesizeAuth } from "../request/AuthSynthesizer.js";

const METHOD_FLAGS = new Set(["-X", "--request"]);
const HEADER_FLAGS = new Set(["-H", "--header"]);
const DATA_FLAGS = new Set(["-d", "--data", "--data-raw", "--data-binary"]);
const USER_FLAGS = new Set(["-u", "--user"]);
const SAFE_WORD = /^[\w@%+=:,./-]+$/;

/** Splits a command line the way a POSIX shell would, without expansions. */
export const splitShellWords = (command: string): string[] => {
  const words: string[] = [];
  let current = "";
  let inWord = false;
  let quote: "'" | '"' | undefined;

  for (let index = 0; index < command.length; index += 1) {
    const char = command[index];
    if (quote === "'") {
      if (char === "'") quote = undefined;
      else current += char;
      continue;
    }
    if (quote === '"') {
      if (char === '"') {
        quote = undefined;
      } else if (char === "\\" && index + 1 < command.length && '"\\$`\n'.includes(command[index + 1])) {
        index += 1;
        if (command[index] !== "\n") current += command[index];
      } else {
        current += char;
      }
      continue;
    }
    if (char === "'" || char === '"') {
      quote = char;
      inWord = true;
    } else if (char === "\\") {
      index += 1;
      if (index < command.length && command[index] !== "\n") {
        current += command[index];
        inWord = true;
      }
    } else if (/\s/.test(char)) {
      if (inWord) words.push(current);
      current = "";
      inWord = false;
    } else {
      current += char;
      inWord = true;
    }
  }
  if (quote) {
    throw createInvalidInputError("Unterminated quote in cURL command.");
  }
  if (inWord) words.push(current);
  return words;
};

export const quoteShellWord = (word: string): string => {
  if (!word) return "''";
  if (SAFE_WORD.test(word)) return word;
  return `'${word.replace(/'/g, `'"'"'`)}'`;
};

const parseData = (raw: string): JsonValue => {
  try {
    return toJsonValue(JSON.parse(raw)) ?? raw;
  } catch {
    return raw;
  }
};

/**
 * Converts a `curl ...` command line into a request. Unknown flags are skipped; the last bare
 * word is the URL. Data without an explicit method makes the request a POST, as curl does.
 */
export const importCurl = (command: string): RequestDescriptor => {
  const tokens = splitShellWords(command.trim());
  if (tokens[0] !== "curl") {
    throw createInvalidInputError("Not a valid cURL command.");
  }
  let method: string | undefined;
  let url = "";
  const headers: HeaderMap = {};
  let data: string | undefined;
  let user: string | undefined;

  const valueAfter = (index: number, flag: string): string => {
    const value = tokens[index + 1];
    if (value === undefined) {
      throw createInvalidInputError(`Missing value for ${flag} in cURL command.`);
    }
    return value;
  };

  for (let index = 1; index < tokens.length; index += 1) {
    const token = tokens[index];
    if (METHOD_FLAGS.has(token)) {
      method = valueAfter(index, token).toUpperCase();
      index += 1;
    } else if (HEADER_FLAGS.has(token)) {
      const header = valueAfter(index, token);
      index += 1;
      const separator = header.indexOf(":");
      if (separator > 0) {
        headers[header.slice(0, separator).trim()] = header.slice(separator + 1).trim();
      }
    } else if (DATA_FLAGS.has(token)) {
      data = valueAfter(index, token);
      index += 1;
    } else if (USER_FLAGS.has(token)) {
      user = valueAfter(index, token);
      index += 1;
    } else if (!token.startsWith("-")) {
      url = token;
    }
  }
  if (!url) {
    throw createInvalidInputError("Could not parse URL from cURL command.");
  }

  const descriptor: RequestDescriptor = {
    method: method ?? (data !== undefined ? "POST" : "GET"),
    url,
    headers,
  };
  if (data !== undefined) descriptor.body = parseData(data);
  if (user) descriptor.auth = `basic ${user}`;
  return descriptor;
};

/** Renders a request as a shell-quoted `curl` command. Basic credentials become `-u`. */
export const exportCurl = (descriptor: RequestDescriptor): string => {
  const method = descriptor.method.toUpperCase();
  const words = ["curl"];
  if (method !== "GET") words.push("-X", method);
  let authHeaders: HeaderMap = {};
  if (descriptor.auth?.trim()) {
    const { type, value } = parseAuthDescriptor(descriptor.auth);
    if (type.toLowerCase() === "basic" && value) {
      words.push("-u", value);
    } else {
      authHeaders = synthesizeAuth(type, value);
    }
  }
  for (const [key, value] of Object.entries({ ...(descriptor.headers ?? {}), ...authHeaders })) {
    words.push("-H", `${key}: ${value}`);
  }
  const body = normalizeBody(descriptor.body);
  if (body !== undefined) {
    words.push("-d", typeof body === "string" ? body : JSON.stringify(body));
  }
  words.push(descriptor.url);
  return words.map(quoteShellWord).join(" ");
};
