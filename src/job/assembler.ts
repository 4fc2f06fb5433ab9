/**
 * Job Specification Assembler
 *
 * Combines a resolved template (or an explicit override path), the user's
 * parameters and the execution environment into a JobSpecification.
 * Every failure is thrown as a JobError.
 */

import * as path from "path";
import { ErrorKind, JobError } from "./errors";
import { ExecutionEnvironment, JobSpecification, SubmissionStrategy } from "./types";
import { TemplateRecord, TemplateType, UserParameterMapping } from "./handlers/template/types";
import { validateParameters } from "./handlers/template/validator";
import { sanitizeJobName } from "../utils/sanitizeJobName";

/** Path segment that marks a flex template artifact */
export const FLEX_PATH_SEGMENT = "/flex/";

/**
 * Delimiters tried in order when encoding parameters. `~` is the platform convention.
 */
export const PARAMETER_DELIMITERS = ["~", "|", ";", "#", "@", "!", "*", "+"] as const;

export interface AssembleJobInput {
  jobName: string;
  /** Resolved catalog entry; ignored for path and validation when `overridePath` is set */
  template?: TemplateRecord;
  /** Explicit artifact path for templates outside the catalog */
  overridePath?: string;
  parameters: UserParameterMapping;
  environment: ExecutionEnvironment;
  label: string;
  /** Local template source tree; language-variant launchers run inside it */
  templateRoot?: string;
}

/**
 * Encodes parameters as `^<d>^k1=v1<d>k2=v2`, with a delimiter `<d>` that
 * appears in no key or value. Returns undefined for an empty mapping.
 */
export function encodeParameters(parameters: UserParameterMapping): string | undefined {
  const entries = Object.entries(parameters);
  if (entries.length === 0) {
    return undefined;
  }

  const delimiter = PARAMETER_DELIMITERS.find((candidate) =>
    entries.every(([key, value]) => !key.includes(candidate) && !value.includes(candidate))
  );
  if (!delimiter) {
    throw new JobError(
      ErrorKind.MalformedInput,
      `Cannot encode parameters: every delimiter (${PARAMETER_DELIMITERS.join(" ")}) occurs in a parameter name or value`
    );
  }

  const pairs = entries.map(([key, value]) => `${key}=${value}`);
  return `^${delimiter}^${pairs.join(delimiter)}`;
}

/**
 * FLEX when the path carries the flex segment or the template declares FLEX;
 * language-variant templates keep their own strategy; everything else is CLASSIC.
 */
export function determineStrategy(templatePath: string, type?: TemplateType): SubmissionStrategy {
  if (type === TemplateType.LanguageVariant) {
    return SubmissionStrategy.LanguageVariant;
  }
  if (templatePath.includes(FLEX_PATH_SEGMENT) || type === TemplateType.Flex) {
    return SubmissionStrategy.Flex;
  }
  return SubmissionStrategy.Classic;
}

function resolveTemplatePath(input: AssembleJobInput): string {
  const override = input.overridePath?.trim();
  if (override) {
    return override;
  }

  const template = input.template;
  if (!template) {
    throw new JobError(
      ErrorKind.MalformedInput,
      "Job could not be assembled: neither a template definition nor a template path was given."
    );
  }

  if (!template.executionPath) {
    throw new JobError(
      ErrorKind.MissingTemplatePath,
      `Job could not be submitted because template '${template.name}' has no artifact path.`
    );
  }

  const validation = validateParameters(template.params, input.parameters);
  if (!validation.valid) {
    throw new JobError(
      validation.kind,
      `Job could not be submitted due to a parameter validation error: ${validation.message}`
    );
  }
  return template.executionPath;
}

/**
 * Launcher scripts live under `<root>/<language>/`; without a language the
 * root itself is used.
 */
function languageDirectory(input: AssembleJobInput): string {
  if (!input.templateRoot) {
    throw new JobError(
      ErrorKind.MalformedInput,
      "Job could not be assembled: language-variant submissions need the template source tree."
    );
  }
  const language = input.template?.language;
  return language ? path.join(input.templateRoot, language.toLowerCase()) : input.templateRoot;
}

export function assembleJobSpecification(input: AssembleJobInput): JobSpecification {
  const templatePath = resolveTemplatePath(input);
  const strategy = determineStrategy(templatePath, input.template?.type);
  const { environment } = input;

  if (!environment.projectId || !environment.region) {
    throw new JobError(ErrorKind.MalformedInput, "Job could not be assembled: project and region are required.");
  }
  if (strategy !== SubmissionStrategy.Flex && !environment.stagingLocation) {
    throw new JobError(
      ErrorKind.MalformedInput,
      `Job could not be assembled: a staging location is required for ${strategy} submissions.`
    );
  }

  const spec: JobSpecification = {
    jobName: sanitizeJobName(input.jobName),
    environment,
    strategy,
    templatePath,
    parameters: { ...input.parameters },
    label: input.label,
  };

  if (input.template?.name) {
    spec.templateName = input.template.name;
  }
  if (strategy === SubmissionStrategy.LanguageVariant && !spec.templateName) {
    throw new JobError(
      ErrorKind.MalformedInput,
      "Job could not be assembled: language-variant submissions need the template name."
    );
  }
  if (strategy === SubmissionStrategy.LanguageVariant) {
    spec.workingDirectory = languageDirectory(input);
  } else {
    spec.encodedParameters = encodeParameters(spec.parameters);
  }

  return spec;
}
