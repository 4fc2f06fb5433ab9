import { JobContext } from "../../jobContext";
import { CallerResponse, JobStatus, toCallerResponse } from "../../types";
import { HandlerInput, requireString } from "../input";
import { stageTemplate } from "./stageTemplate";

export async function handleStageTemplate(input: HandlerInput, context: JobContext): Promise<CallerResponse> {
  const result = await stageTemplate(
    {
      projectId: requireString(input, "projectId"),
      bucketName: requireString(input, "bucketName"),
      templateName: requireString(input, "templateName"),
      templatePath: requireString(input, "templatePath"),
    },
    {
      repository: context.repository,
      label: context.config.jobSourceLabel,
      spawnFn: context.spawnFn,
      verbose: context.verbose,
    }
  );

  if (result.status === JobStatus.Failed) {
    return toCallerResponse(result);
  }
  return {
    status: result.status,
    report: result.report,
    staged_template_gcs_path: result.stagedPath,
  };
}
