import type { Database } from "sqlite";

export class Pragmas {
  static async apply(db: Database): Promise<void> {
    await db.exec("PRAGMA journal_mode = WAL;");
    await db.exec("PRAGMA busy_timeout = 5000;");
  }
}
