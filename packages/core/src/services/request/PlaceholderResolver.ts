import {
  createMissingVariableError,
  type HeaderMap,
  type JsonObject,
  type JsonValue,
  type VariableMap,
} from "@reqdeck/shared";

const PLACEHOLDER_PATTERN = /\{\{(\w+)\}\}/g;

/** Supplies a value for a variable the map does not know. `field` names where it was found. */
export type UnknownVariableResolver = (name: string, field: string) => Promise<string>;

/**
 * Substitutes `{{name}}` tokens in strings and, recursively, in arrays and objects.
 *
 * Without a `resolveUnknown` capability the resolver is strict and an unknown name fails with
 * `missing_variable`. With one, the answer is substituted and stored in the shared map so later
 * occurrences reuse it.
 */
export class PlaceholderResolver {
  constructor(
    private readonly variables: VariableMap,
    private readonly resolveUnknown?: UnknownVariableResolver,
  ) {}

  get interactive(): boolean {
    return this.resolveUnknown !== undefined;
  }

  async resolveString(value: string, field: string): Promise<string> {
    let result = "";
    let cursor = 0;
    for (const match of value.matchAll(PLACEHOLDER_PATTERN)) {
      const start = match.index ?? 0;
      result += value.slice(cursor, start);
      result += await this.lookup(match[1], field);
      cursor = start + match[0].length;
    }
    return result + value.slice(cursor);
  }

  async resolveValue(value: JsonValue, field: string): Promise<JsonValue> {
    if (typeof value === "string") {
      return this.resolveString(value, field);
    }
    if (Array.isArray(value)) {
      const items: JsonValue[] = [];
      for (const [index, item] of value.entries()) {
        items.push(await this.resolveValue(item, `${field}[${index}]`));
      }
      return items;
    }
    if (value !== null && typeof value === "object") {
      const resolved: JsonObject = {};
      for (const [key, entry] of Object.entries(value)) {
        resolved[key] = await this.resolveValue(entry, `${field}.${key}`);
      }
      return resolved;
    }
    return value;
  }

  async resolveHeaders(headers: HeaderMap): Promise<HeaderMap> {
    const resolved: HeaderMap = {};
    for (const [key, value] of Object.entries(headers)) {
      resolved[key] = await this.resolveString(value, `headers.${key}`);
    }
    return resolved;
  }

  private async lookup(name: string, field: string): Promise<string> {
    if (Object.prototype.hasOwnProperty.call(this.variables, name)) {
      return this.variables[name];
    }
    if (!this.resolveUnknown) {
      throw createMissingVariableError(name, field);
    }
    const value = await this.resolveUnknown(name, field);
    this.variables[name] = value;
    return value;
  }
}
