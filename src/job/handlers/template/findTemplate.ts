import * as logger from "firebase-functions/logger";
import { ErrorKind, JobError, errorKind, errorMessage } from "../../errors";
import { JobContext } from "../../jobContext";
import { CallerResponse, JobStatus } from "../../types";
import { HandlerInput, optionalBoolean, requireString } from "../input";
import { resolveTemplate } from "./matcher";
import { toRawDefinition } from "./schema";
import { CatalogIndex, MatchResult, NO_MATCH, TemplateRecord } from "./types";

/**
 * Brings the template source tree up to date, then reads the catalog.
 */
export async function loadFreshCatalog(context: JobContext, refresh = true): Promise<CatalogIndex> {
  if (refresh) {
    const repo = await context.repository.refresh();
    if (context.verbose) {
      logger.debug(`[Catalog] Template repository ${repo.action} at ${repo.path}`);
    }
  }

  try {
    return await context.loadCatalog();
  } catch (error) {
    if (error instanceof JobError) {
      throw error;
    }
    throw new JobError(ErrorKind.CatalogRefreshFailure, `Could not read template catalog: ${errorMessage(error)}`);
  }
}

/**
 * Resolves a task description to a catalog entry, throwing NO_MATCHING_TEMPLATE on no match.
 */
export async function findMatchingTemplate(
  taskDescription: string,
  catalog: CatalogIndex,
  context: JobContext
): Promise<TemplateRecord> {
  let match: MatchResult;
  try {
    match = await resolveTemplate(taskDescription, catalog, context.matcher);
  } catch (error) {
    throw new JobError(
      errorKind(error, ErrorKind.NoMatchingTemplate),
      `Template matching failed: ${errorMessage(error)}`
    );
  }

  if (match === NO_MATCH) {
    throw new JobError(ErrorKind.NoMatchingTemplate, "No template in the catalog matches the task description.");
  }
  return match;
}

export async function handleFindTemplate(input: HandlerInput, context: JobContext): Promise<CallerResponse> {
  const taskDescription = requireString(input, "taskDescription");
  const refresh = optionalBoolean(input, "refresh", true);

  try {
    const catalog = await loadFreshCatalog(context, refresh);
    const template = await findMatchingTemplate(taskDescription, catalog, context);

    return {
      status: JobStatus.Success,
      report: `Matched template '${template.name}'.`,
      template: toRawDefinition(template),
    };
  } catch (error) {
    logger.error("[Catalog] Template lookup failed:", error);
    return {
      status: JobStatus.Failed,
      kind: errorKind(error, ErrorKind.NoMatchingTemplate),
      report: errorMessage(error),
    };
  }
}
