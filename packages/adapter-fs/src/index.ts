import path from "node:path";
import fs from "fs-extra";
import { globby } from "globby";
import { parse } from "yaml";
import type { z, ZodTypeAny } from "zod";
import {
  DEFAULT_SETTINGS,
  Tree,
  isValidUid,
  parseResultMapping,
  prefixOf,
  parseSettings,
  type DocumentRecord,
  type ItemRecord,
  type LinkRecord,
  type ResultMapping,
  type TraceSettings,
} from "@tracegraph/core";

import { DocumentFileSchema, ItemFileSchema, type ItemFile, type LinkEntry } from "./schema.js";

export { DocumentFileSchema, ItemFileSchema, type DocumentFile, type ItemFile, type LinkEntry } from "./schema.js";

export const DOCUMENT_FILE = ".tracegraph.yml";
export const SETTINGS_FILE = "tracegraph.config.yaml";

const IGNORED_DIRS = ["!**/node_modules/**", "!**/.git/**"];

export class RecordSourceError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`${filePath}: ${message}`);
    this.name = "RecordSourceError";
    this.filePath = filePath;
  }
}

export interface LoadTreeOptions {
  settings?: TraceSettings;
}

export async function loadTreeFromFs(rootDir: string, options: LoadTreeOptions = {}): Promise<Tree> {
  const settings = options.settings ?? (await loadSettingsFromFs(rootDir));
  const records = await loadDocumentRecordsFromFs(rootDir);
  return Tree.fromRecords(records, { settings });
}

export async function loadSettingsFromFs(rootDir: string): Promise<TraceSettings> {
  const settingsPath = path.join(rootDir, SETTINGS_FILE);
  if (!(await fs.pathExists(settingsPath))) {
    return DEFAULT_SETTINGS;
  }
  return parseSettings(await fs.readFile(settingsPath, "utf8"));
}

/** Documents come back sorted by directory path, items by file name. */
export async function loadDocumentRecordsFromFs(rootDir: string): Promise<DocumentRecord[]> {
  const documentFiles = await globby([`**/${DOCUMENT_FILE}`, ...IGNORED_DIRS], { cwd: rootDir, dot: true });
  const records: DocumentRecord[] = [];
  for (const relativePath of documentFiles.sort()) {
    records.push(await loadDocumentRecord(path.join(rootDir, relativePath)));
  }
  return records;
}

export async function loadDocumentRecord(documentFile: string): Promise<DocumentRecord> {
  const { settings } = await readYamlFile(documentFile, DocumentFileSchema);
  const directory = path.dirname(documentFile);
  const itemFiles = await globby(["*.yml", "*.yaml"], { cwd: directory });
  const items: ItemRecord[] = [];
  for (const fileName of itemFiles.sort()) {
    const id = path.basename(fileName, path.extname(fileName));
    const itemPath = path.join(directory, fileName);
    if (!isValidUid(id)) {
      console.warn(`[adapter-fs] Skipping ${itemPath}: file name is not an item id`);
      continue;
    }
    if (prefixOf(id) !== settings.prefix) {
      throw new RecordSourceError(itemPath, `item ${id} does not belong to document ${settings.prefix}`);
    }
    const file = await readYamlFile(itemPath, ItemFileSchema);
    items.push(toItemRecord(id, file));
  }
  return {
    prefix: settings.prefix,
    parent: settings.parent ?? null,
    name: settings.name,
    level: settings.level,
    digits: settings.digits,
    sep: settings.sep,
    items,
  };
}

export async function loadResultsFromFs(resultFile: string): Promise<ResultMapping> {
  if (!(await fs.pathExists(resultFile))) {
    console.warn(`[adapter-fs] No result file at ${resultFile}; matrix rows will carry no results`);
    return {};
  }
  const raw = await readYaml(resultFile);
  try {
    return parseResultMapping(raw);
  } catch (error) {
    throw new RecordSourceError(resultFile, `invalid result mapping: ${(error as Error).message}`);
  }
}

function toItemRecord(id: string, file: ItemFile): ItemRecord {
  return {
    id,
    text: file.text,
    links: normaliseLinks(file.links ?? []),
    stakeholder: asTrimmedString(file.stakeholder) ?? null,
    prio: file.prio ?? null,
    implemented: file.implemented ?? false,
    jira: file.jira ?? [],
    active: file.active,
    riskRating: file["risk-rating"] ?? null,
    residualRiskRating: file["residual-risk-rating"] ?? null,
  };
}

/** Links are stored as `- SRD001` or `- SRD001: <fingerprint>`. */
function normaliseLinks(entries: LinkEntry[]): LinkRecord[] {
  const links: LinkRecord[] = [];
  for (const entry of entries) {
    if (typeof entry === "string") {
      links.push({ id: entry.trim(), fingerprint: null });
      continue;
    }
    for (const [id, fingerprint] of Object.entries(entry)) {
      links.push({ id: id.trim(), fingerprint: asTrimmedString(fingerprint) ?? null });
    }
  }
  return links;
}

function asTrimmedString(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

async function readYaml(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf8");
  try {
    return parse(raw) ?? {};
  } catch (error) {
    throw new RecordSourceError(filePath, `invalid YAML: ${(error as Error).message}`);
  }
}

async function readYamlFile<S extends ZodTypeAny>(filePath: string, schema: S): Promise<z.output<S>> {
  const result = schema.safeParse(await readYaml(filePath));
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => `${issue.path.join(".") || "/"} ${issue.message}`)
      .join(", ");
    throw new RecordSourceError(filePath, message);
  }
  return result.data;
}
