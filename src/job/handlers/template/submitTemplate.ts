/**
 * Submits a templated job.
 *
 * The template comes from, in order of precedence: an explicit template
 * definition, a catalog name, or a task description resolved by the matcher.
 * With `templatePath` set the path is used as-is and parameters are not
 * validated; a definition may still be given to declare the template type.
 */

import * as logger from "firebase-functions/logger";
import { assembleJobSpecification } from "../../assembler";
import { ErrorKind, JobError, errorKind, errorMessage } from "../../errors";
import { submitJob } from "../../executor";
import { JobContext } from "../../jobContext";
import { CallerResponse, JobStatus, toCallerResponse } from "../../types";
import { HandlerInput, optionalString, requireString } from "../input";
import { findTemplate } from "./catalog";
import { findMatchingTemplate, loadFreshCatalog } from "./findTemplate";
import { parseParameterMapping, parseTemplateDefinition, toTemplateRecord } from "./schema";
import { TemplateRecord, TemplateType } from "./types";

async function resolveSubmissionTemplate(
  input: HandlerInput,
  overridePath: string | undefined,
  context: JobContext
): Promise<TemplateRecord | undefined> {
  if (input.templateDefinition !== undefined) {
    const definition = parseTemplateDefinition(input.templateDefinition);
    const record = toTemplateRecord(definition, !overridePath);
    if (record.type === TemplateType.LanguageVariant) {
      // Launcher scripts are run from the source tree
      await context.repository.refresh();
    }
    return record;
  }

  const templateName = optionalString(input, "templateName");
  if (templateName) {
    const catalog = await loadFreshCatalog(context);
    const record = findTemplate(catalog, templateName);
    if (!record) {
      throw new JobError(ErrorKind.NoMatchingTemplate, `Template '${templateName}' is not in the catalog.`);
    }
    return record;
  }

  const taskDescription = optionalString(input, "taskDescription");
  if (taskDescription && !overridePath) {
    const catalog = await loadFreshCatalog(context);
    return findMatchingTemplate(taskDescription, catalog, context);
  }

  return undefined;
}

export async function handleSubmitTemplate(input: HandlerInput, context: JobContext): Promise<CallerResponse> {
  try {
    const overridePath = optionalString(input, "templatePath");
    const parameters = parseParameterMapping(input.parameters ?? {});
    const template = await resolveSubmissionTemplate(input, overridePath, context);

    const spec = assembleJobSpecification({
      jobName: requireString(input, "jobName"),
      template,
      overridePath,
      parameters,
      environment: {
        projectId: requireString(input, "projectId"),
        region: requireString(input, "region"),
        stagingLocation: optionalString(input, "stagingLocation"),
        subnet: optionalString(input, "subnet"),
        jars: optionalString(input, "jars"),
      },
      label: context.config.jobSourceLabel,
      templateRoot: context.repository.directory,
    });

    const result = await submitJob(spec, { spawnFn: context.spawnFn, verbose: context.verbose });
    return toCallerResponse(result);
  } catch (error) {
    logger.error("[Submit] Job could not be submitted:", error);
    return {
      status: JobStatus.Failed,
      kind: errorKind(error, ErrorKind.MalformedInput),
      report: errorMessage(error),
    };
  }
}
