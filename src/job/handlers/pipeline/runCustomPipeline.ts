/**
 * Custom Job Builder
 *
 * Runs ad-hoc pipeline source that is not backed by a template: the source
 * is written to a transient file, launched with the interpreter, and watched
 * for a job id. BATCH runs wait for exit; STREAMING runs never exit on their
 * own, so the process is stopped as soon as the id shows up.
 *
 * The transient file is removed on every path out of buildAndRun.
 */

import * as crypto from "crypto";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import * as logger from "firebase-functions/logger";
import { archiveProgramSource } from "../../archive";
import { ErrorKind, JobError, errorKind, errorMessage } from "../../errors";
import { DATAFLOW_JOB_ID_PATTERN, parseJobDetails } from "../../executor";
import {
  JobDetails,
  JobResult,
  JobStatus,
  PipelineMode,
  ProcessCommand,
  SucceededJobResult,
  failedResult,
} from "../../types";
import { SpawnFunction, defaultSpawn, formatCommand, runProcess, watchProcess } from "../../../utils/process";
import { sanitizeJobName } from "../../../utils/sanitizeJobName";
import { ObjectStore, isGcsUri, joinObjectPath } from "../../../utils/storage";

export interface CustomPipelineRequest {
  programSource: string;
  runtimeArgs: Record<string, string>;
  mode: PipelineMode;
  projectId: string;
  region: string;
  /** gs:// location for staging, temp files and the archived source */
  storageLocation: string;
  jobName: string;
}

export interface CustomPipelineOptions {
  objectStore: ObjectStore;
  interpreter: string;
  label: string;
  /** Wait between SIGTERM and SIGKILL when stopping a streaming launch */
  killGraceMs: number;
  /** Directory for the transient source file, defaults to the OS temp dir */
  workDir?: string;
  spawnFn?: SpawnFunction;
  verbose?: boolean;
}

interface LaunchOutcome {
  output: string;
  exitCode: number | null;
  jobId?: string;
}

function requireInputs(request: CustomPipelineRequest): void {
  const missing = (["projectId", "region", "storageLocation", "programSource"] as const)
    .filter((field) => !request[field] || !request[field].trim());
  if (missing.length > 0) {
    throw new JobError(ErrorKind.MalformedInput, `Missing required input(s): ${missing.join(", ")}`);
  }
  if (!isGcsUri(request.storageLocation)) {
    throw new JobError(ErrorKind.MalformedInput, "storageLocation must start with 'gs://'.");
  }
  if (request.mode !== PipelineMode.Batch && request.mode !== PipelineMode.Streaming) {
    throw new JobError(
      ErrorKind.MalformedInput,
      `Unknown pipeline mode '${request.mode}'. Expected ${PipelineMode.Batch} or ${PipelineMode.Streaming}`
    );
  }
}

/**
 * Fixed bindings come first and cannot be overridden by runtime args.
 */
export function buildPipelineArgs(
  request: CustomPipelineRequest,
  jobName: string,
  label: string
): Array<[string, string]> {
  const fixed: Record<string, string> = {
    runner: "DataflowRunner",
    project: request.projectId,
    region: request.region,
    job_name: jobName,
    temp_location: joinObjectPath(request.storageLocation, "temp"),
    staging_location: joinObjectPath(request.storageLocation, "staging"),
    labels: JSON.stringify({ source: label }),
  };

  const args: Array<[string, string]> = Object.entries(fixed);
  for (const [key, value] of Object.entries(request.runtimeArgs)) {
    if (key in fixed) {
      logger.warn(`[CustomJob] Ignoring runtime arg '${key}', it is set by the builder`);
      continue;
    }
    args.push([key, value]);
  }

  if (request.mode === PipelineMode.Streaming && !("streaming" in request.runtimeArgs)) {
    args.push(["streaming", "true"]);
  }
  return args;
}

function flattenArgs(args: Array<[string, string]>): string[] {
  return args.flatMap(([key, value]) => [`--${key}`, value]);
}

async function launch(
  command: ProcessCommand,
  mode: PipelineMode,
  options: CustomPipelineOptions
): Promise<LaunchOutcome> {
  const spawnFn = options.spawnFn ?? defaultSpawn;

  if (mode === PipelineMode.Streaming) {
    const result = await watchProcess(command, {
      pattern: DATAFLOW_JOB_ID_PATTERN,
      graceMs: options.killGraceMs,
      spawnFn,
    });
    if (result.match) {
      logger.info(`[CustomJob] Found job id ${result.match[0]}, stopped the launcher`);
    }
    return { output: result.output, exitCode: result.exitCode, jobId: result.match?.[0] };
  }

  const result = await runProcess(command, spawnFn);
  if (result.exitCode !== 0) {
    return { output: result.output, exitCode: result.exitCode };
  }
  const match = result.output.match(DATAFLOW_JOB_ID_PATTERN);
  return { output: result.output, exitCode: result.exitCode, jobId: match?.[0] };
}

function formatReport(jobName: string, details: JobDetails): string[] {
  const lines = [`Successfully launched Dataflow job '${jobName}'.`, "Job Details:"];
  const entries = Object.entries(details).sort(([a], [b]) => a.localeCompare(b));
  for (const [key, value] of entries) {
    lines.push(`  ${key}: ${value}`);
  }
  return lines;
}

async function removeQuietly(file: string): Promise<void> {
  try {
    await fs.rm(file, { force: true });
  } catch (error) {
    logger.warn(`[CustomJob] Could not remove transient file ${file}:`, error);
  }
}

export async function buildAndRun(
  request: CustomPipelineRequest,
  options: CustomPipelineOptions
): Promise<JobResult> {
  const sourceFile = path.join(options.workDir ?? os.tmpdir(), `pipeline_${crypto.randomUUID()}.py`);

  try {
    requireInputs(request);
    const jobName = sanitizeJobName(request.jobName);

    const command: ProcessCommand = {
      command: options.interpreter,
      args: [sourceFile, ...flattenArgs(buildPipelineArgs(request, jobName, options.label))],
    };

    await fs.writeFile(sourceFile, request.programSource, "utf-8");
    logger.info(`[CustomJob] Launching ${request.mode} pipeline '${jobName}'`);
    if (options.verbose) {
      logger.debug("[CustomJob] Command:", formatCommand(command));
    }

    const outcome = await launch(command, request.mode, options);

    if (!outcome.jobId) {
      if (outcome.exitCode !== 0 && outcome.exitCode !== null) {
        return failedResult(
          ErrorKind.SubprocessFailure,
          `Failed to execute pipeline script.\n--- ERROR ---\n${outcome.output}`,
          outcome.output
        );
      }
      return failedResult(
        ErrorKind.IdNotFound,
        `Job launched, but could not find Job ID in output. Full output:\n${outcome.output}`,
        outcome.output
      );
    }

    const parsed = parseJobDetails(outcome.output);
    const details: JobDetails = { name: jobName, id: outcome.jobId };
    if (parsed.id) {
      if (parsed.clientRequestId) {
        details.clientRequestId = parsed.clientRequestId;
      }
      if (parsed.createTime) {
        details.createTime = parsed.createTime;
      }
    }

    const report = formatReport(jobName, details);
    const result: SucceededJobResult = {
      status: JobStatus.Success,
      jobId: outcome.jobId,
      report: "",
      details,
    };
    if (Object.keys(parsed).length === 0) {
      result.rawOutput = outcome.output;
    }

    try {
      result.archivePath = await archiveProgramSource(
        options.objectStore,
        request.storageLocation,
        jobName,
        request.programSource
      );
      report.push(`\nThe pipeline script was saved to ${result.archivePath}`);
    } catch (error) {
      logger.warn(`[CustomJob] Archiving the source of '${jobName}' failed:`, error);
      result.status = JobStatus.SuccessWithWarning;
      result.warning = ErrorKind.ArchivalFailure;
      report.push(`\nWARNING: Failed to save the script to GCS. Error: ${errorMessage(error)}`);
    }

    result.report = report.join("\n");
    return result;
  } catch (error) {
    logger.error("[CustomJob] Pipeline launch failed:", error);
    return failedResult(errorKind(error, ErrorKind.SubprocessFailure), errorMessage(error));
  } finally {
    await removeQuietly(sourceFile);
  }
}
