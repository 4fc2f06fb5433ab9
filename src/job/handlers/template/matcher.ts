/**
 * Template Matcher - picks the catalog entry that best fits a task description
 *
 * Matching is a pluggable capability. The production matcher delegates the
 * decision to a text-completion service; the substring matcher is
 * deterministic and needs no external service.
 */

import * as logger from "firebase-functions/logger";
import { CompletionService } from "../../../utils/completion";
import { findTemplate } from "./catalog";
import { buildMatchInstruction, buildMatchPrompt } from "./promptBuilder";
import { describeSchemaErrors, isTemplateDefinition } from "./schema";
import { CatalogIndex, MatchResult, NO_MATCH, TemplateRecord } from "./types";

export interface TemplateMatcher {
  match(taskDescription: string, catalog: CatalogIndex): Promise<MatchResult>;
}

function stripCodeFence(text: string): string {
  const fenced = text.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/);
  return fenced ? fenced[1] : text;
}

/**
 * Interprets a completion-service response.
 *
 * The response must be the sentinel or a single JSON object naming a catalog
 * template. The catalog's own record is returned, never the response object,
 * so fields the service adds or alters are discarded. Anything else is NO_MATCH.
 */
export function parseMatchResponse(responseText: string, catalog: CatalogIndex): MatchResult {
  const text = stripCodeFence(responseText.trim()).trim();

  if (!text || text === NO_MATCH) {
    return NO_MATCH;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    logger.warn("[Matcher] Completion response is not JSON, treating as no match");
    return NO_MATCH;
  }

  if (Array.isArray(parsed) || !isTemplateDefinition(parsed)) {
    logger.warn(
      `[Matcher] Completion response is not a template object: ${Array.isArray(parsed) ? "array" : describeSchemaErrors()}`
    );
    return NO_MATCH;
  }

  const name = parsed.name ?? parsed.template_name;
  if (!name) {
    logger.warn("[Matcher] Completion response does not name a template");
    return NO_MATCH;
  }

  const record = findTemplate(catalog, name);
  if (!record) {
    logger.warn(`[Matcher] Completion response names unknown template '${name}'`);
    return NO_MATCH;
  }

  return record;
}

export interface VertexTemplateMatcherOptions {
  verbose?: boolean;
}

/**
 * Matcher backed by a text-completion service (Vertex AI in production)
 */
export class VertexTemplateMatcher implements TemplateMatcher {
  private completion: CompletionService;
  private verbose: boolean;

  constructor(completion: CompletionService, options: VertexTemplateMatcherOptions = {}) {
    this.completion = completion;
    this.verbose = options.verbose ?? false;
  }

  async match(taskDescription: string, catalog: CatalogIndex): Promise<MatchResult> {
    if (catalog.length === 0) {
      logger.warn("[Matcher] Catalog is empty, nothing to match against");
      return NO_MATCH;
    }

    const prompt = buildMatchPrompt(taskDescription, catalog);
    if (this.verbose) {
      logger.debug("[Matcher] Prompt:", prompt);
    }

    const responseText = await this.completion.complete(buildMatchInstruction(), prompt);
    const result = parseMatchResponse(responseText, catalog);

    logger.info(`[Matcher] Resolved template: ${result === NO_MATCH ? NO_MATCH : result.name}`);
    return result;
  }
}

function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/).filter((token) => token.length > 2);
}

/**
 * Deterministic matcher.
 *
 * A template whose name appears in the task wins outright (longest name first).
 * Otherwise the template sharing the most words with the task wins; ties
 * keep catalog order. No shared word means no match.
 */
export class SubstringTemplateMatcher implements TemplateMatcher {
  async match(taskDescription: string, catalog: CatalogIndex): Promise<MatchResult> {
    const task = taskDescription.toLowerCase();

    const named = catalog
      .filter((record) => record.name && task.includes(record.name.toLowerCase()))
      .sort((a, b) => b.name.length - a.name.length);
    if (named.length > 0) {
      return named[0];
    }

    const taskTokens = new Set(tokenize(taskDescription));
    let best: TemplateRecord | undefined;
    let bestScore = 0;

    for (const record of catalog) {
      const recordTokens = new Set(tokenize(`${record.name} ${record.description}`));
      let score = 0;
      for (const token of recordTokens) {
        if (taskTokens.has(token)) {
          score++;
        }
      }
      if (score > bestScore) {
        best = record;
        bestScore = score;
      }
    }

    return best ?? NO_MATCH;
  }
}

/**
 * Resolves a task description to a catalog template.
 */
export function resolveTemplate(
  taskDescription: string,
  catalog: CatalogIndex,
  matcher: TemplateMatcher
): Promise<MatchResult> {
  return matcher.match(taskDescription, catalog);
}
