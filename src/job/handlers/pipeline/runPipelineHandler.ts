import { ErrorKind, JobError } from "../../errors";
import { JobContext } from "../../jobContext";
import { CallerResponse, PipelineMode, toCallerResponse } from "../../types";
import { HandlerInput, requireString } from "../input";
import { parseParameterMapping } from "../template/schema";
import { buildAndRun } from "./runCustomPipeline";

function parseMode(value: string): PipelineMode {
  const normalized = value.trim().toUpperCase();
  if (normalized === PipelineMode.Batch) {
    return PipelineMode.Batch;
  }
  if (normalized === PipelineMode.Streaming) {
    return PipelineMode.Streaming;
  }
  throw new JobError(
    ErrorKind.MalformedInput,
    `Unknown pipeline mode '${value}'. Expected ${PipelineMode.Batch} or ${PipelineMode.Streaming}`
  );
}

export async function handleRunPipeline(input: HandlerInput, context: JobContext): Promise<CallerResponse> {
  const result = await buildAndRun(
    {
      programSource: requireString(input, "programSource"),
      runtimeArgs: parseParameterMapping(input.runtimeArgs ?? {}),
      mode: parseMode(requireString(input, "mode")),
      projectId: requireString(input, "projectId"),
      region: requireString(input, "region"),
      storageLocation: requireString(input, "storageLocation"),
      jobName: requireString(input, "jobName"),
    },
    {
      objectStore: context.objectStore,
      interpreter: context.config.pipelineInterpreter,
      label: context.config.jobSourceLabel,
      killGraceMs: context.config.streamingKillGraceMs,
      spawnFn: context.spawnFn,
      verbose: context.verbose,
    }
  );
  return toCallerResponse(result);
}
