import { ErrorKind } from "./errors";

export enum JobStatus {
  Success = "success",
  SuccessWithWarning = "success_with_warning",
  Failed = "failed",
}

export enum SubmissionStrategy {
  Flex = "FLEX",
  Classic = "CLASSIC",
  LanguageVariant = "LANGUAGE_VARIANT",
}

export enum PipelineMode {
  Batch = "BATCH",
  Streaming = "STREAMING",
}

/**
 * Where a job runs and where it may stage files.
 */
export interface ExecutionEnvironment {
  projectId: string;
  region: string;
  /** Required for classic and language-variant submissions */
  stagingLocation?: string;
  subnet?: string;
  jars?: string;
}

/**
 * Ready-to-submit job, produced by the assembler and consumed once by the executor.
 */
export interface JobSpecification {
  /** Already sanitized */
  jobName: string;
  environment: ExecutionEnvironment;
  strategy: SubmissionStrategy;
  /** Template artifact path (gs:// URI, or launcher script for language variants) */
  templatePath: string;
  /** Catalog template name, when the spec came from a catalog entry */
  templateName?: string;
  parameters: Record<string, string>;
  /** Delimiter-declared parameter string; absent when there are no parameters */
  encodedParameters?: string;
  label: string;
  /** Directory the launcher runs in; set for language variants */
  workingDirectory?: string;
}

/**
 * Structured argument list for a process launch. Never a shell string.
 */
export interface ProcessCommand {
  command: string;
  args: string[];
  env?: Record<string, string>;
  cwd?: string;
}

export interface JobDetails {
  name?: string;
  id?: string;
  clientRequestId?: string;
  createTime?: string;
}

interface JobResultBase {
  report: string;
  details?: JobDetails;
  /** Full captured output when it could not be parsed, or on failure */
  rawOutput?: string;
  archivePath?: string;
}

export interface SucceededJobResult extends JobResultBase {
  status: JobStatus.Success | JobStatus.SuccessWithWarning;
  jobId: string;
  /** Non-fatal failure kind, set when status is success_with_warning */
  warning?: ErrorKind;
}

export interface FailedJobResult extends JobResultBase {
  status: JobStatus.Failed;
  kind: ErrorKind;
}

export type JobResult = SucceededJobResult | FailedJobResult;

/**
 * Caller-facing mapping. Every response carries a status and a readable report.
 */
export interface CallerResponse {
  status: JobStatus | "error";
  report: string;
  job_id?: string;
  kind?: ErrorKind;
  warning?: ErrorKind;
  details?: JobDetails;
  raw_output?: string;
  gcs_script_path?: string;
  [key: string]: unknown;
}

export function failedResult(kind: ErrorKind, report: string, rawOutput?: string): FailedJobResult {
  const result: FailedJobResult = { status: JobStatus.Failed, kind, report };
  if (rawOutput !== undefined) {
    result.rawOutput = rawOutput;
  }
  return result;
}

export function toCallerResponse(result: JobResult): CallerResponse {
  const response: CallerResponse = {
    status: result.status,
    report: result.report,
  };

  if (result.status === JobStatus.Failed) {
    response.kind = result.kind;
  } else {
    response.job_id = result.jobId;
    if (result.warning) {
      response.warning = result.warning;
    }
  }

  if (result.details) {
    response.details = result.details;
  }
  if (result.rawOutput !== undefined) {
    response.raw_output = result.rawOutput;
  }
  if (result.archivePath) {
    response.gcs_script_path = result.archivePath;
  }

  return response;
}
