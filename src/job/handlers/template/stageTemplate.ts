/**
 * Builds a template module from the template source tree and stages it to
 * Cloud Storage with Maven. The staged gs:// path is read from the build log.
 */

import * as fs from "fs/promises";
import * as path from "path";
import * as logger from "firebase-functions/logger";
import { ErrorKind, JobError, errorKind, errorMessage } from "../../errors";
import { FailedJobResult, JobStatus, ProcessCommand, failedResult } from "../../types";
import { SpawnFunction, defaultSpawn, formatCommand, runProcess } from "../../../utils/process";
import { TemplateRepository } from "./repository";

export const STAGED_PATH_PATTERNS = [
  /Flex Template was staged!\s+(gs:\/\/\S+)/,
  /Template staged successfully\. It is available at\s+(gs:\/\/\S+)/,
];

export interface StageTemplateRequest {
  projectId: string;
  bucketName: string;
  templateName: string;
  /** Module directory, relative to the root of the template source tree */
  templatePath: string;
}

export interface StageTemplateOptions {
  repository: TemplateRepository;
  label: string;
  spawnFn?: SpawnFunction;
  verbose?: boolean;
}

export interface StagedTemplateResult {
  status: JobStatus.Success;
  report: string;
  stagedPath: string;
}

export type StageResult = StagedTemplateResult | FailedJobResult;

export function extractStagedPath(output: string): string | undefined {
  for (const pattern of STAGED_PATH_PATTERNS) {
    const match = output.match(pattern);
    if (match) {
      return match[1];
    }
  }
  return undefined;
}

export function buildStageCommand(request: StageTemplateRequest, modulePath: string, label: string): ProcessCommand {
  return {
    command: "mvn",
    args: [
      "clean", "package", "-PtemplatesStage", "-DskipTests",
      `-DprojectId=${request.projectId}`,
      `-DbucketName=${request.bucketName}`,
      "-DstagePrefix=templates",
      `-DtemplateName=${request.templateName}`,
      `-Dlabels=${label}`,
      "-f", modulePath,
    ],
  };
}

async function resolveModulePath(root: string, templatePath: string): Promise<string> {
  const resolvedRoot = path.resolve(root);
  const modulePath = path.resolve(resolvedRoot, templatePath);
  if (modulePath !== resolvedRoot && !modulePath.startsWith(resolvedRoot + path.sep)) {
    throw new JobError(ErrorKind.MalformedInput, `Template path '${templatePath}' is outside the template source tree`);
  }

  try {
    const stat = await fs.stat(modulePath);
    if (!stat.isDirectory()) {
      throw new Error("not a directory");
    }
  } catch (error) {
    throw new JobError(
      ErrorKind.MalformedInput,
      `Template module directory not found: ${modulePath} (${errorMessage(error)})`
    );
  }
  return modulePath;
}

export async function stageTemplate(
  request: StageTemplateRequest,
  options: StageTemplateOptions
): Promise<StageResult> {
  try {
    const repo = await options.repository.refresh();
    const modulePath = await resolveModulePath(repo.path, request.templatePath);

    const command = buildStageCommand(request, modulePath, options.label);
    logger.info(`[Stage] Building template '${request.templateName}' from ${modulePath}`);
    if (options.verbose) {
      logger.debug("[Stage] Command:", formatCommand(command));
    }

    const { exitCode, output } = await runProcess(command, options.spawnFn ?? defaultSpawn);
    if (exitCode !== 0) {
      return failedResult(
        ErrorKind.SubprocessFailure,
        `The maven build command failed with exit code ${exitCode}.\n--- OUTPUT ---\n${output}`,
        output
      );
    }

    const stagedPath = extractStagedPath(output);
    if (!stagedPath) {
      return failedResult(
        ErrorKind.IdNotFound,
        "Build succeeded, but could not find the staged template GCS path in the build output.",
        output
      );
    }

    logger.info(`[Stage] Template '${request.templateName}' staged at ${stagedPath}`);
    return {
      status: JobStatus.Success,
      report: `Template '${request.templateName}' was built and staged.`,
      stagedPath,
    };
  } catch (error) {
    logger.error(`[Stage] Staging template '${request.templateName}' failed:`, error);
    return failedResult(errorKind(error, ErrorKind.SubprocessFailure), errorMessage(error));
  }
}
