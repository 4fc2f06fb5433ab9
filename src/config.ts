interface IConfig {
  projectId?: string;
  location: string;
  templateRepoUrl: string;
  templateRepoBranch: string;
  templateRepoDir: string;
  templateMappingPath: string;
  matcherModel: string;
  matcherTimeoutMs: number;
  jobSourceLabel: string;
  pipelineInterpreter: string;
  streamingKillGraceMs: number;
  verbose: boolean;
}

type Environment = Record<string, string | undefined>;

function parseIntOr(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Builds the configuration from an environment map.
 * Tests pass their own map; the process default uses `process.env`.
 */
export function loadConfig(env: Environment = process.env): IConfig {
  return {
    projectId: env.GOOGLE_CLOUD_PROJECT || undefined,
    location: env.GOOGLE_CLOUD_LOCATION ?? "us-central1",
    templateRepoUrl: env.TEMPLATE_REPO_URL ?? "https://github.com/GoogleCloudPlatform/DataflowTemplates",
    templateRepoBranch: env.TEMPLATE_REPO_BRANCH ?? "main",
    templateRepoDir: env.TEMPLATE_REPO_DIR ?? "./sources/git/templates",
    templateMappingPath: env.TEMPLATE_MAPPING_PATH ?? "./sources/template_mapping.json",
    matcherModel: env.MATCHER_MODEL ?? "gemini-2.5-pro",
    matcherTimeoutMs: parseIntOr(env.MATCHER_TIMEOUT_MS, 60000),
    jobSourceLabel: env.JOB_SOURCE_LABEL || "pipeline-dispatcher",
    pipelineInterpreter: env.PIPELINE_INTERPRETER || "python3",
    streamingKillGraceMs: parseIntOr(env.STREAMING_KILL_GRACE_MS, 10000),
    verbose: env.VERBOSE === "true",
  };
}

const config: IConfig = loadConfig();

export {IConfig};
export default config;
