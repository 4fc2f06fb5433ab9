/**
 * Template Catalog - the collection of known job templates
 *
 * The catalog is read from a flat mapping file kept in the template source
 * tree (or in Cloud Storage). The file is either an array of entries or an
 * object keyed by template name.
 */

import * as logger from "firebase-functions/logger";
import { ErrorKind, JobError, errorMessage } from "../../errors";
import { ObjectStore, readTextFile } from "../../../utils/storage";
import { describeSchemaErrors, isTemplateDefinition, toTemplateRecord } from "./schema";
import { CatalogIndex, RawTemplateDefinition, TemplateRecord } from "./types";

function collectEntries(parsed: unknown): Array<[string | undefined, unknown]> {
  if (Array.isArray(parsed)) {
    return parsed.map((entry): [string | undefined, unknown] => [undefined, entry]);
  }
  if (parsed && typeof parsed === "object") {
    return Object.entries(parsed);
  }
  throw new JobError(ErrorKind.MalformedInput, "Template mapping must be a JSON array or object");
}

/**
 * Builds a catalog from already parsed mapping-file content.
 * Entries that are not valid template definitions are skipped with a warning.
 */
export function buildCatalogIndex(parsed: unknown): CatalogIndex {
  const catalog: TemplateRecord[] = [];
  const seen = new Set<string>();

  for (const [key, entry] of collectEntries(parsed)) {
    const label = key ?? `entry ${catalog.length}`;

    if (!isTemplateDefinition(entry)) {
      logger.warn(`[Catalog] Skipping ${label}: ${describeSchemaErrors()}`);
      continue;
    }

    const definition: RawTemplateDefinition = key && !entry.name && !entry.template_name
      ? { ...entry, name: key }
      : entry;

    let record: TemplateRecord;
    try {
      record = toTemplateRecord(definition);
    } catch (error) {
      logger.warn(`[Catalog] Skipping ${label}: ${errorMessage(error)}`);
      continue;
    }

    if (!record.name) {
      logger.warn(`[Catalog] Skipping ${label}: template has no name`);
      continue;
    }
    if (seen.has(record.name)) {
      logger.warn(`[Catalog] Duplicate template name '${record.name}', keeping the first entry`);
      continue;
    }

    const overlap = record.params.required.filter((param) => record.params.optional.includes(param));
    if (overlap.length > 0) {
      logger.warn(
        `[Catalog] Template '${record.name}' declares parameters as both required and optional: ${overlap.join(", ")}`
      );
    }

    seen.add(record.name);
    catalog.push(record);
  }

  return catalog;
}

/**
 * Loads the catalog mapping file from a local path or a gs:// URI
 */
export async function loadCatalogIndex(location: string, store?: ObjectStore): Promise<CatalogIndex> {
  const raw = await readTextFile(location, store);

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new JobError(
      ErrorKind.MalformedInput,
      `Failed to parse template mapping ${location} as JSON: ${errorMessage(error)}`
    );
  }

  const catalog = buildCatalogIndex(parsed);
  logger.info(`[Catalog] Loaded ${catalog.length} template(s) from ${location}`);
  return catalog;
}

export function findTemplate(catalog: CatalogIndex, name: string): TemplateRecord | undefined {
  return catalog.find((record) => record.name === name);
}

export function getTemplateNames(catalog: CatalogIndex): string[] {
  return catalog.map((record) => record.name).sort();
}
