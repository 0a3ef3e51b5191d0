import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import {
  createInvalidInputError,
  createNotFoundError,
  type ExecuteOptions,
  type HistoryStore,
  type RequestDescriptor,
  type ResponseRecord,
} from "@reqdeck/shared";
import { HistoryRepository } from "@reqdeck/db";
import { unifiedDiff } from "./LineDiff.js";

export interface HistoryQuery {
  /** Case-insensitive match against url or method. */
  search?: string;
  /** Keep only the most recent N matches. */
  last?: number;
}

export interface HistoryEntry {
  /** Position in the full history, usable with replay and diff. */
  index: number;
  record: ResponseRecord;
}

export interface ReplayPlan {
  descriptor: RequestDescriptor;
  options: ExecuteOptions;
}

const INDEX_PATTERN = /^\d+$/;

export class HistoryService {
  constructor(private readonly store: HistoryStore, private readonly closeStore?: () => Promise<void>) {}

  static async create(dataDir?: string): Promise<HistoryService> {
    const repo = await HistoryRepository.create(dataDir);
    return new HistoryService(repo, () => repo.close());
  }

  async close(): Promise<void> {
    if (this.closeStore) {
      await this.closeStore();
    }
  }

  async list(query: HistoryQuery = {}): Promise<HistoryEntry[]> {
    const needle = query.search?.toLowerCase();
    let entries = (await this.store.loadAll())
      .map((record, index) => ({ index, record }))
      .filter(({ record }) =>
        needle ? record.url.toLowerCase().includes(needle) || record.method.toLowerCase().includes(needle) : true,
      );
    if (query.last !== undefined && query.last > 0) {
      entries = entries.slice(-query.last);
    }
    return entries;
  }

  async entry(index: number): Promise<ResponseRecord> {
    const record = await this.store.get(index);
    if (!record) {
      throw createNotFoundError(`History entry ${index}`, { index, available: await this.store.count() });
    }
    return record;
  }

  /** The request and output settings of a past entry, ready to send again. */
  async replay(index: number): Promise<ReplayPlan> {
    const record = await this.entry(index);
    const descriptor: RequestDescriptor = { method: record.method, url: record.url, headers: { ...record.headers } };
    if (record.requestBody !== undefined) descriptor.body = record.requestBody;
    const options: ExecuteOptions = {};
    if (record.outputFile) options.outputFile = record.outputFile;
    if (record.displayFilter) options.displayFilter = record.displayFilter;
    return { descriptor, options };
  }

  /**
   * Diffs the bodies of two history entries when both arguments are indexes, otherwise the
   * contents of two files.
   */
  async diff(first: string, second: string): Promise<string[]> {
    if (INDEX_PATTERN.test(first) && INDEX_PATTERN.test(second)) {
      const left = await this.entry(Number.parseInt(first, 10));
      const right = await this.entry(Number.parseInt(second, 10));
      return unifiedDiff(splitLines(left.body), splitLines(right.body), `history[${first}]`, `history[${second}]`);
    }
    if (!existsSync(first) || !existsSync(second)) {
      throw createInvalidInputError("Files not found or invalid arguments.", { first, second });
    }
    const [left, right] = await Promise.all([readFile(first, "utf8"), readFile(second, "utf8")]);
    return unifiedDiff(splitLines(left), splitLines(right), first, second);
  }

  async count(): Promise<number> {
    return this.store.count();
  }

  async clear(): Promise<void> {
    await this.store.clear();
  }
}

const splitLines = (text: string): string[] => {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
};
