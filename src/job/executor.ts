/**
 * Job Submission Executor
 *
 * Runs an assembled submission command and classifies the outcome from the
 * exit code and the captured output. Failures are returned, never thrown,
 * and nothing is retried.
 */

import * as logger from "firebase-functions/logger";
import { buildSubmitCommand } from "./command";
import { ErrorKind, errorKind, errorMessage } from "./errors";
import {
  JobDetails,
  JobResult,
  JobSpecification,
  JobStatus,
  SucceededJobResult,
  SubmissionStrategy,
  failedResult,
} from "./types";
import { SpawnFunction, defaultSpawn, formatCommand, runProcess } from "../utils/process";

/** Dataflow job ids: `2024-05-01_10_15_30-1234567890` */
export const DATAFLOW_JOB_ID_PATTERN = /\d{4}-\d{2}-\d{2}_\d{2}_\d{2}_\d{2}-\d+/;

/** Serverless batch ids as printed by the template launcher */
export const BATCH_JOB_ID_PATTERNS = [
  /Batch \[([^\]\s]+)\] submitted/,
  /batches\/([A-Za-z0-9-]+)/,
];

const DETAIL_PATTERNS: Array<[keyof JobDetails, RegExp]> = [
  ["id", /id: '([^']*)'/],
  ["clientRequestId", /clientRequestId: '([^']*)'/],
  ["createTime", /createTime: '([^']*)'/],
];

/**
 * Finds the job identifier in command output, using the pattern of the
 * platform the strategy submits to.
 */
export function extractJobId(output: string, strategy: SubmissionStrategy): string | undefined {
  if (strategy === SubmissionStrategy.LanguageVariant) {
    for (const pattern of BATCH_JOB_ID_PATTERNS) {
      const match = output.match(pattern);
      if (match) {
        return match[1];
      }
    }
    return undefined;
  }

  const match = output.match(DATAFLOW_JOB_ID_PATTERN);
  return match ? match[0] : undefined;
}

/**
 * Reads `key: '<value>'` metadata lines from command output.
 * Only the fields found are set; an empty object means nothing parsed.
 */
export function parseJobDetails(output: string): JobDetails {
  const details: JobDetails = {};
  for (const [key, pattern] of DETAIL_PATTERNS) {
    const match = output.match(pattern);
    if (match) {
      details[key] = match[1];
    }
  }
  return details;
}

export interface SubmitOptions {
  spawnFn?: SpawnFunction;
  verbose?: boolean;
}

export async function submitJob(spec: JobSpecification, options: SubmitOptions = {}): Promise<JobResult> {
  const command = buildSubmitCommand(spec);
  logger.info(`[Submit] Submitting ${spec.strategy} job '${spec.jobName}'`);
  if (options.verbose) {
    logger.debug("[Submit] Command:", formatCommand(command));
  }

  try {
    const { exitCode, output } = await runProcess(command, options.spawnFn ?? defaultSpawn);

    if (exitCode !== 0) {
      logger.error(`[Submit] Submission of '${spec.jobName}' exited with code ${exitCode}`);
      return failedResult(
        ErrorKind.SubprocessFailure,
        `Job submission failed with exit code ${exitCode}.\n--- OUTPUT ---\n${output}`,
        output
      );
    }

    const jobId = extractJobId(output, spec.strategy);
    if (!jobId) {
      logger.error(`[Submit] No job id found in output for '${spec.jobName}'`);
      return failedResult(
        ErrorKind.IdNotFound,
        `Job launched, but could not find Job ID in output. Full output:\n${output}`,
        output
      );
    }

    const parsed = parseJobDetails(output);
    const result: SucceededJobResult = {
      status: JobStatus.Success,
      jobId,
      report: `Job '${spec.jobName}' submitted successfully. Job ID: ${jobId}`,
      details: { name: spec.jobName, ...parsed, id: jobId },
    };
    if (Object.keys(parsed).length === 0) {
      result.rawOutput = output;
    }

    logger.info(`[Submit] Job '${spec.jobName}' submitted with id ${jobId}`);
    return result;
  } catch (error) {
    logger.error(`[Submit] Could not run submission for '${spec.jobName}':`, error);
    return failedResult(errorKind(error, ErrorKind.SubprocessFailure), errorMessage(error));
  }
}
