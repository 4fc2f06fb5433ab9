/**
 * Prompt Builder - instructions for selecting a template from the catalog
 *
 * The completion service receives the whole catalog as JSON plus the task
 * description, and must answer with exactly one catalog entry or the
 * no-match sentinel.
 */

import { toRawDefinition } from "./schema";
import { CatalogIndex, NO_MATCH } from "./types";

export function buildMatchInstruction(): string {
  return `# Template Selection

You select the single best pre-built job template for a data engineering task.

## Rules

1. Choose ONLY from the templates listed in the catalog you are given.
2. Return the chosen template EXACTLY as it appears in the catalog: the same
   JSON object with the same keys and values. Do not add, remove, rename or
   invent fields, parameters or paths.
3. If no template in the catalog fits the task, reply with exactly:
   ${NO_MATCH}
4. Reply with the JSON object or the sentinel only. No explanations, no
   markdown fences, no surrounding text.`;
}

export function buildMatchPrompt(taskDescription: string, catalog: CatalogIndex): string {
  const catalogJson = JSON.stringify(catalog.map(toRawDefinition), null, 2);

  return `## Task

${taskDescription.trim()}

## Catalog

${catalogJson}`;
}
