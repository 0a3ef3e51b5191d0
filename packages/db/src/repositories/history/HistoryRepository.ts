import type { Database } from "sqlite";
import {
  createHistoryIoError,
  isDisplayFilter,
  toHeaderMap,
  toJsonValue,
  type HistoryStore,
  type JsonValue,
  type ResponseRecord,
} from "@reqdeck/shared";
import { Connection } from "../../sqlite/connection.js";
import { StoreMigrations } from "../../migrations/store/StoreMigrations.js";

interface HistoryRow {
  id: number;
  method: string;
  url: string;
  headers_json: string;
  request_body_json: string | null;
  output_file: string | null;
  display_filter: string | null;
  status: number;
  reason: string;
  elapsed_ms: number;
  size: number;
  timestamp: string;
  body: string;
  response_headers_json: string;
}

const HISTORY_COLUMNS =
  "id, method, url, headers_json, request_body_json, output_file, display_filter, status, reason, elapsed_ms, size, timestamp, body, response_headers_json";

const parseBody = (raw: string | null): JsonValue | undefined =>
  raw === null ? undefined : toJsonValue(JSON.parse(raw));

const mapHistoryRow = (row: HistoryRow): ResponseRecord => ({
  method: row.method,
  url: row.url,
  headers: toHeaderMap(JSON.parse(row.headers_json)),
  requestBody: parseBody(row.request_body_json),
  outputFile: row.output_file ?? undefined,
  displayFilter: isDisplayFilter(row.display_filter) ? row.display_filter : undefined,
  status: row.status,
  reason: row.reason,
  elapsedMs: row.elapsed_ms,
  size: row.size,
  timestamp: row.timestamp,
  body: row.body,
  responseHeaders: toHeaderMap(JSON.parse(row.response_headers_json)),
});

/**
 * Append-only log of response records. Entries are addressed by their position in insertion
 * order, which is what `history`, `replay` and `diff` show to the user.
 */
export class HistoryRepository implements HistoryStore {
  constructor(private db: Database, private connection?: Connection) {}

  static async create(dataDir?: string): Promise<HistoryRepository> {
    const connection = await Connection.openDefault(dataDir);
    await StoreMigrations.run(connection.db);
    return new HistoryRepository(connection.db, connection);
  }

  async close(): Promise<void> {
    if (this.connection) {
      await this.connection.close();
    }
  }

  async append(record: ResponseRecord): Promise<void> {
    try {
      await this.db.run(
        `INSERT INTO history (method, url, headers_json, request_body_json, output_file, display_filter, status, reason, elapsed_ms, size, timestamp, body, response_headers_json)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        record.method,
        record.url,
        JSON.stringify(record.headers),
        record.requestBody === undefined ? null : JSON.stringify(record.requestBody),
        record.outputFile ?? null,
        record.displayFilter ?? null,
        record.status,
        record.reason,
        record.elapsedMs,
        record.size,
        record.timestamp,
        record.body,
        JSON.stringify(record.responseHeaders),
      );
    } catch (error) {
      throw createHistoryIoError("append", error);
    }
  }

  async loadAll(): Promise<ResponseRecord[]> {
    try {
      const rows = await this.db.all<HistoryRow[]>(`SELECT ${HISTORY_COLUMNS} FROM history ORDER BY id ASC`);
      return rows.map(mapHistoryRow);
    } catch (error) {
      throw createHistoryIoError("read", error);
    }
  }

  async get(index: number): Promise<ResponseRecord | undefined> {
    if (!Number.isInteger(index) || index < 0) return undefined;
    try {
      const row = await this.db.get<HistoryRow>(
        `SELECT ${HISTORY_COLUMNS} FROM history ORDER BY id ASC LIMIT 1 OFFSET ?`,
        index,
      );
      return row ? mapHistoryRow(row) : undefined;
    } catch (error) {
      throw createHistoryIoError("read", error);
    }
  }

  async count(): Promise<number> {
    try {
      const row = await this.db.get<{ total: number }>("SELECT COUNT(*) AS total FROM history");
      return row?.total ?? 0;
    } catch (error) {
      throw createHistoryIoError("read", error);
    }
  }

  async clear(): Promise<void> {
    try {
      await this.db.run("DELETE FROM history");
    } catch (error) {
      throw createHistoryIoError("clear", error);
    }
  }
}
