import type { Database } from "sqlite";
import {
  GLOBAL_SCOPE,
  normalizeBody,
  sanitizeExecuteOptions,
  toHeaderMap,
  toJsonValue,
  type CollectionSummary,
  type ExecuteOptions,
  type JsonValue,
  type RequestDescriptor,
  type StoredAlias,
  type StoredTemplate,
  type VariableMap,
  type VariableStore,
} from "@reqdeck/shared";
import { Connection } from "../../sqlite/connection.js";
import { StoreMigrations } from "../../migrations/store/StoreMigrations.js";

export interface LibraryClearSummary {
  aliases: number;
  templates: number;
  variables: number;
}

interface RequestColumns {
  method: string;
  url: string;
  headers_json: string;
  body_json: string | null;
  auth: string | null;
}

interface AliasRow extends RequestColumns {
  collection: string;
  name: string;
  created_at: string;
  updated_at: string;
}

interface TemplateRow extends RequestColumns {
  name: string;
  options_json: string;
  updated_at: string;
}

const parseBody = (raw: string | null): JsonValue | undefined =>
  raw === null ? undefined : toJsonValue(JSON.parse(raw));

const mapRequest = (row: RequestColumns): RequestDescriptor => {
  const request: RequestDescriptor = {
    method: row.method,
    url: row.url,
    headers: toHeaderMap(JSON.parse(row.headers_json)),
  };
  const body = parseBody(row.body_json);
  if (body !== undefined) request.body = body;
  if (row.auth) request.auth = row.auth;
  return request;
};

const mapAliasRow = (row: AliasRow): StoredAlias => ({
  collection: row.collection === GLOBAL_SCOPE ? undefined : row.collection,
  name: row.name,
  request: mapRequest(row),
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

const mapTemplateRow = (row: TemplateRow): StoredTemplate => ({
  name: row.name,
  request: mapRequest(row),
  options: sanitizeExecuteOptions(JSON.parse(row.options_json)),
  updatedAt: row.updated_at,
});

const requestParams = (request: RequestDescriptor): [string, string, string, string | null, string | null] => {
  const body = normalizeBody(request.body);
  return [
    request.method.toUpperCase(),
    request.url,
    JSON.stringify(request.headers ?? {}),
    body === undefined ? null : JSON.stringify(body),
    request.auth?.trim() ? request.auth.trim() : null,
  ];
};

const ALIAS_COLUMNS = "collection, name, method, url, headers_json, body_json, auth, created_at, updated_at";
const TEMPLATE_COLUMNS = "name, method, url, headers_json, body_json, auth, options_json, updated_at";

/**
 * Saved variables, aliases (global or grouped into collections) and templates.
 */
export class LibraryRepository implements VariableStore {
  constructor(private db: Database, private connection?: Connection) {}

  static async create(dataDir?: string): Promise<LibraryRepository> {
    const connection = await Connection.openDefault(dataDir);
    await StoreMigrations.run(connection.db);
    return new LibraryRepository(connection.db, connection);
  }

  async close(): Promise<void> {
    if (this.connection) {
      await this.connection.close();
    }
  }

  async load(): Promise<VariableMap> {
    const rows = await this.db.all<{ name: string; value: string }[]>(
      "SELECT name, value FROM variables ORDER BY name ASC",
    );
    const variables: VariableMap = {};
    for (const row of rows) {
      variables[row.name] = row.value;
    }
    return variables;
  }

  async setVariable(name: string, value: string): Promise<void> {
    await this.db.run(
      `INSERT INTO variables (name, value, updated_at) VALUES (?, ?, ?)
       ON CONFLICT(name) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
      name,
      value,
      new Date().toISOString(),
    );
  }

  async removeVariable(name: string): Promise<boolean> {
    const result = await this.db.run("DELETE FROM variables WHERE name = ?", name);
    return (result.changes ?? 0) > 0;
  }

  async clearVariables(): Promise<number> {
    const result = await this.db.run("DELETE FROM variables");
    return result.changes ?? 0;
  }

  async saveAlias(name: string, request: RequestDescriptor, collection?: string): Promise<StoredAlias> {
    const now = new Date().toISOString();
    const scope = collection ?? GLOBAL_SCOPE;
    await this.db.run(
      `INSERT INTO aliases (${ALIAS_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(collection, name) DO UPDATE SET
         method = excluded.method,
         url = excluded.url,
         headers_json = excluded.headers_json,
         body_json = excluded.body_json,
         auth = excluded.auth,
         updated_at = excluded.updated_at`,
      scope,
      name,
      ...requestParams(request),
      now,
      now,
    );
    const saved = await this.getAlias(name, collection);
    if (!saved) {
      throw new Error(`Alias '${name}' was not persisted.`);
    }
    return saved;
  }

  async getAlias(name: string, collection?: string): Promise<StoredAlias | undefined> {
    const row = await this.db.get<AliasRow>(
      `SELECT ${ALIAS_COLUMNS} FROM aliases WHERE collection = ? AND name = ?`,
      collection ?? GLOBAL_SCOPE,
      name,
    );
    return row ? mapAliasRow(row) : undefined;
  }

  async listAliases(collection?: string): Promise<StoredAlias[]> {
    const rows = await this.db.all<AliasRow[]>(
      `SELECT ${ALIAS_COLUMNS} FROM aliases WHERE collection = ? ORDER BY created_at ASC, name ASC`,
      collection ?? GLOBAL_SCOPE,
    );
    return rows.map(mapAliasRow);
  }

  async listAllAliases(): Promise<StoredAlias[]> {
    const rows = await this.db.all<AliasRow[]>(
      `SELECT ${ALIAS_COLUMNS} FROM aliases ORDER BY collection ASC, created_at ASC, name ASC`,
    );
    return rows.map(mapAliasRow);
  }

  async listCollections(): Promise<CollectionSummary[]> {
    const rows = await this.db.all<{ collection: string; total: number }[]>(
      `SELECT collection, COUNT(*) AS total FROM aliases WHERE collection <> ? GROUP BY collection ORDER BY collection ASC`,
      GLOBAL_SCOPE,
    );
    return rows.map((row) => ({ name: row.collection, aliasCount: row.total }));
  }

  async deleteAlias(name: string, collection?: string): Promise<boolean> {
    const result = await this.db.run(
      "DELETE FROM aliases WHERE collection = ? AND name = ?",
      collection ?? GLOBAL_SCOPE,
      name,
    );
    return (result.changes ?? 0) > 0;
  }

  async deleteCollection(collection: string): Promise<number> {
    if (collection === GLOBAL_SCOPE) return 0;
    const result = await this.db.run("DELETE FROM aliases WHERE collection = ?", collection);
    return result.changes ?? 0;
  }

  async saveTemplate(name: string, request: RequestDescriptor, options: ExecuteOptions): Promise<StoredTemplate> {
    const now = new Date().toISOString();
    await this.db.run(
      `INSERT INTO templates (${TEMPLATE_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(name) DO UPDATE SET
         method = excluded.method,
         url = excluded.url,
         headers_json = excluded.headers_json,
         body_json = excluded.body_json,
         auth = excluded.auth,
         options_json = excluded.options_json,
         updated_at = excluded.updated_at`,
      name,
      ...requestParams(request),
      JSON.stringify(options),
      now,
    );
    const saved = await this.getTemplate(name);
    if (!saved) {
      throw new Error(`Template '${name}' was not persisted.`);
    }
    return saved;
  }

  async getTemplate(name: string): Promise<StoredTemplate | undefined> {
    const row = await this.db.get<TemplateRow>(`SELECT ${TEMPLATE_COLUMNS} FROM templates WHERE name = ?`, name);
    return row ? mapTemplateRow(row) : undefined;
  }

  async listTemplates(): Promise<StoredTemplate[]> {
    const rows = await this.db.all<TemplateRow[]>(`SELECT ${TEMPLATE_COLUMNS} FROM templates ORDER BY name ASC`);
    return rows.map(mapTemplateRow);
  }

  async deleteTemplate(name: string): Promise<boolean> {
    const result = await this.db.run("DELETE FROM templates WHERE name = ?", name);
    return (result.changes ?? 0) > 0;
  }

  /** Deletes every alias (global and in collections), template and variable in one transaction. */
  async clearAll(): Promise<LibraryClearSummary> {
    await this.db.exec("BEGIN");
    try {
      const aliases = await this.db.run("DELETE FROM aliases");
      const templates = await this.db.run("DELETE FROM templates");
      const variables = await this.db.run("DELETE FROM variables");
      await this.db.exec("COMMIT");
      return {
        aliases: aliases.changes ?? 0,
        templates: templates.changes ?? 0,
        variables: variables.changes ?? 0,
      };
    } catch (error) {
      await this.db.exec("ROLLBACK");
      throw error;
    }
  }
}
