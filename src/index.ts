import { Storage } from "@google-cloud/storage";
import { VertexAI } from "@google-cloud/vertexai";
import * as logger from "firebase-functions/logger";
import config, { IConfig } from "./config";
import { JobContext, createJobContext } from "./job/jobContext";
import { SubstringTemplateMatcher, TemplateMatcher, VertexTemplateMatcher } from "./job/handlers/template/matcher";
import { CommandGitClient, TemplateRepository } from "./job/handlers/template/repository";
import { VertexCompletionService } from "./utils/completion";
import { GcsObjectStore } from "./utils/storage";

function createMatcher(cfg: IConfig): TemplateMatcher {
  if (!cfg.projectId) {
    logger.warn("[Init] GOOGLE_CLOUD_PROJECT is not set, using the offline substring matcher");
    return new SubstringTemplateMatcher();
  }

  const vertexAI = new VertexAI({ project: cfg.projectId, location: cfg.location });
  const completion = new VertexCompletionService(vertexAI, {
    model: cfg.matcherModel,
    timeoutMs: cfg.matcherTimeoutMs,
    verbose: cfg.verbose,
  });
  return new VertexTemplateMatcher(completion, { verbose: cfg.verbose });
}

/**
 * Builds every external client once and wires them into a job context.
 */
export function createServiceContext(cfg: IConfig = config): JobContext {
  const repository = new TemplateRepository({
    url: cfg.templateRepoUrl,
    branch: cfg.templateRepoBranch,
    directory: cfg.templateRepoDir,
    git: new CommandGitClient(),
  });

  return createJobContext({
    config: cfg,
    repository,
    matcher: createMatcher(cfg),
    objectStore: new GcsObjectStore(new Storage({ projectId: cfg.projectId })),
  });
}

export type { IConfig } from "./config";
export { loadConfig } from "./config";
export { dispatch, validateRequestInput } from "./job/dispatch";
export type { DispatchRequest } from "./job/dispatch";
export { createJobContext } from "./job/jobContext";
export type { JobContext, JobContextDependencies } from "./job/jobContext";
export { ErrorKind, JobError } from "./job/errors";
export * from "./job/types";
export { assembleJobSpecification, encodeParameters, determineStrategy } from "./job/assembler";
export type { AssembleJobInput } from "./job/assembler";
export { buildSubmitCommand } from "./job/command";
export { submitJob, extractJobId, parseJobDetails } from "./job/executor";
export { buildAndRun } from "./job/handlers/pipeline/runCustomPipeline";
export type { CustomPipelineRequest, CustomPipelineOptions } from "./job/handlers/pipeline/runCustomPipeline";
export { stageTemplate } from "./job/handlers/template/stageTemplate";
export { validateParameters } from "./job/handlers/template/validator";
export { loadCatalogIndex, buildCatalogIndex, findTemplate } from "./job/handlers/template/catalog";
export { parseTemplateDefinition, parseParameterMapping } from "./job/handlers/template/schema";
export { VertexTemplateMatcher, SubstringTemplateMatcher, resolveTemplate } from "./job/handlers/template/matcher";
export type { TemplateMatcher } from "./job/handlers/template/matcher";
export { TemplateRepository, CommandGitClient } from "./job/handlers/template/repository";
export type { GitClient } from "./job/handlers/template/repository";
export * from "./job/handlers/template/types";
export { sanitizeJobName } from "./utils/sanitizeJobName";
export { GcsObjectStore } from "./utils/storage";
export type { ObjectStore } from "./utils/storage";
export { VertexCompletionService } from "./utils/completion";
export type { CompletionService } from "./utils/completion";
