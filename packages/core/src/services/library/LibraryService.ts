import { promises as fs } from "node:fs";
import path from "node:path";
import YAML from "yaml";
import {
  createInvalidInputError,
  createNotFoundError,
  type CollectionSummary,
  type ExecuteOptions,
  type RequestDescriptor,
  type StoredAlias,
  type StoredTemplate,
  type VariableMap,
} from "@reqdeck/shared";
import { LibraryRepository, type LibraryClearSummary } from "@reqdeck/db";
import {
  isRecord,
  looksLikeDescriptor,
  parseRequestDescriptor,
  parseStepOptions,
  serializeDescriptor,
} from "./DescriptorCodec.js";
import { importCurl } from "./CurlConverter.js";

export const EXPORT_TARGETS = ["all", "collections", "aliases", "variables", "templates"] as const;
export type ExportTarget = (typeof EXPORT_TARGETS)[number];

export const isExportTarget = (value: string): value is ExportTarget =>
  (EXPORT_TARGETS as readonly string[]).includes(value);

export interface ImportSummary {
  collections: number;
  aliases: number;
  variables: number;
  templates: number;
}

type Section = Exclude<ExportTarget, "all">;
const SECTIONS: readonly Section[] = ["collections", "aliases", "variables", "templates"];

const isYamlFile = (file: string): boolean => /\.ya?ml$/i.test(path.extname(file));

const aliasLabel = (name: string, collection?: string): string =>
  collection ? `Alias '${name}' in collection '${collection}'` : `Global alias '${name}'`;

const requireName = (value: string, label: string): string => {
  const trimmed = value.trim();
  if (!trimmed) {
    throw createInvalidInputError(`${label} must not be empty.`);
  }
  return trimmed;
};

/**
 * Aliases, collections, templates and variables, plus moving them in and out of JSON or YAML
 * files (picked by file extension).
 */
export class LibraryService {
  constructor(private readonly repo: LibraryRepository) {}

  static async create(dataDir?: string): Promise<LibraryService> {
    return new LibraryService(await LibraryRepository.create(dataDir));
  }

  async close(): Promise<void> {
    await this.repo.close();
  }

  async saveAlias(name: string, request: RequestDescriptor, collection?: string): Promise<StoredAlias> {
    return this.repo.saveAlias(requireName(name, "Alias"), request, collection?.trim() || undefined);
  }

  async importCurlAlias(command: string, name: string, collection?: string): Promise<StoredAlias> {
    return this.saveAlias(name, importCurl(command), collection);
  }

  async resolveAlias(name: string, collection?: string): Promise<RequestDescriptor> {
    const alias = await this.repo.getAlias(name, collection);
    if (!alias) {
      throw createNotFoundError(aliasLabel(name, collection), { alias: name, collection });
    }
    return alias.request;
  }

  async listAliases(collection?: string): Promise<StoredAlias[]> {
    return this.repo.listAliases(collection);
  }

  async listCollections(): Promise<CollectionSummary[]> {
    return this.repo.listCollections();
  }

  async deleteAlias(name: string, collection?: string): Promise<void> {
    if (!(await this.repo.deleteAlias(name, collection))) {
      throw createNotFoundError(aliasLabel(name, collection), { alias: name, collection });
    }
  }

  async deleteCollection(collection: string): Promise<number> {
    const removed = await this.repo.deleteCollection(collection);
    if (removed === 0) {
      throw createNotFoundError(`Collection '${collection}'`, { collection });
    }
    return removed;
  }

  async saveTemplate(name: string, request: RequestDescriptor, options: ExecuteOptions): Promise<StoredTemplate> {
    return this.repo.saveTemplate(requireName(name, "Template name"), request, options);
  }

  async getTemplate(name: string): Promise<StoredTemplate> {
    const template = await this.repo.getTemplate(name);
    if (!template) {
      throw createNotFoundError(`Template '${name}'`, { template: name });
    }
    return template;
  }

  async listTemplates(): Promise<StoredTemplate[]> {
    return this.repo.listTemplates();
  }

  async deleteTemplate(name: string): Promise<void> {
    if (!(await this.repo.deleteTemplate(name))) {
      throw createNotFoundError(`Template '${name}'`, { template: name });
    }
  }

  async setVariable(name: string, value: string): Promise<void> {
    await this.repo.setVariable(requireName(name, "Variable name"), value);
  }

  async listVariables(): Promise<VariableMap> {
    return this.repo.load();
  }

  async removeVariable(name: string): Promise<void> {
    if (!(await this.repo.removeVariable(name))) {
      throw createNotFoundError(`Variable '${name}'`, { variable: name });
    }
  }

  async clearVariables(): Promise<number> {
    return this.repo.clearVariables();
  }

  async clearAll(): Promise<LibraryClearSummary> {
    return this.repo.clearAll();
  }

  async exportData(target: ExportTarget): Promise<Record<string, unknown>> {
    if (target !== "all") {
      return this.exportSection(target);
    }
    const bundle: Record<string, unknown> = {};
    for (const section of SECTIONS) {
      bundle[section] = await this.exportSection(section);
    }
    return bundle;
  }

  async exportToFile(target: ExportTarget, file: string): Promise<void> {
    const data = await this.exportData(target);
    const content = isYamlFile(file) ? YAML.stringify(data) : `${JSON.stringify(data, null, 2)}\n`;
    await fs.writeFile(file, content, "utf8");
  }

  async importFromFile(file: string): Promise<ImportSummary> {
    let content: string;
    try {
      content = await fs.readFile(file, "utf8");
    } catch {
      throw createNotFoundError(`File '${file}'`, { file });
    }
    let data: unknown;
    try {
      data = isYamlFile(file) ? YAML.parse(content) : JSON.parse(content);
    } catch (error) {
      throw createInvalidInputError(`Could not parse ${file}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return this.importData(data);
  }

  /**
   * Accepts a full bundle (any of the section keys) or a single exported section, recognised by
   * shape. Imported entries overwrite saved entries of the same name.
   */
  async importData(data: unknown): Promise<ImportSummary> {
    const summary: ImportSummary = { collections: 0, aliases: 0, variables: 0, templates: 0 };
    if (!isRecord(data)) {
      throw createInvalidInputError("Import data must be an object.");
    }
    if (SECTIONS.some((section) => section in data)) {
      for (const section of SECTIONS) {
        if (data[section] !== undefined) {
          summary[section] = await this.importSection(section, data[section]);
        }
      }
      return summary;
    }
    const section = detectSection(data);
    summary[section] = await this.importSection(section, data);
    return summary;
  }

  private async exportSection(section: Section): Promise<Record<string, unknown>> {
    const result: Record<string, unknown> = {};
    switch (section) {
      case "variables":
        return { ...(await this.repo.load()) };
      case "aliases":
        for (const alias of await this.repo.listAliases()) {
          result[alias.name] = serializeDescriptor(alias.request);
        }
        return result;
      case "collections":
        for (const alias of await this.repo.listAllAliases()) {
          if (!alias.collection) continue;
          const existing = result[alias.collection];
          const group: Record<string, unknown> = isRecord(existing) ? existing : {};
          group[alias.name] = serializeDescriptor(alias.request);
          result[alias.collection] = group;
        }
        return result;
      case "templates":
        for (const template of await this.repo.listTemplates()) {
          result[template.name] = { ...serializeDescriptor(template.request), options: template.options };
        }
        return result;
    }
  }

  private async importSection(section: Section, value: unknown): Promise<number> {
    if (!isRecord(value)) {
      throw createInvalidInputError(`Section '${section}' must be an object.`);
    }
    let count = 0;
    switch (section) {
      case "variables":
        for (const [name, entry] of Object.entries(value)) {
          if (entry === null || typeof entry === "object") {
            throw createInvalidInputError(`Variable '${name}' must be a scalar value.`);
          }
          await this.repo.setVariable(name, String(entry));
          count += 1;
        }
        return count;
      case "aliases":
        for (const [name, entry] of Object.entries(value)) {
          await this.repo.saveAlias(name, parseRequestDescriptor(entry, `alias '${name}'`));
          count += 1;
        }
        return count;
      case "collections":
        for (const [collection, group] of Object.entries(value)) {
          if (!isRecord(group)) {
            throw createInvalidInputError(`Collection '${collection}' must be an object of aliases.`);
          }
          for (const [name, entry] of Object.entries(group)) {
            await this.repo.saveAlias(name, parseRequestDescriptor(entry, `alias '${collection}:${name}'`), collection);
            count += 1;
          }
        }
        return count;
      case "templates":
        for (const [name, entry] of Object.entries(value)) {
          const request = parseRequestDescriptor(entry, `template '${name}'`);
          const options = isRecord(entry) ? parseStepOptions(entry) : {};
          await this.repo.saveTemplate(name, request, options);
          count += 1;
        }
        return count;
    }
  }
}

const detectSection = (data: Record<string, unknown>): Section => {
  const values = Object.values(data);
  if (values.length > 0 && values.every(looksLikeDescriptor)) {
    return values.every((value) => isRecord(value) && ("options" in value || "flags" in value)) ? "templates" : "aliases";
  }
  if (values.length > 0 && values.every((value) => isRecord(value) && Object.values(value).every(looksLikeDescriptor))) {
    return "collections";
  }
  if (values.every((value) => value !== null && typeof value !== "object")) {
    return "variables";
  }
  throw createInvalidInputError("Unknown data format for import.");
};
