import { JobSpecification, ProcessCommand, SubmissionStrategy } from "./types";

function flexCommand(spec: JobSpecification): ProcessCommand {
  const { environment } = spec;
  const args = [
    "dataflow", "flex-template", "run", spec.jobName,
    `--project=${environment.projectId}`,
    `--region=${environment.region}`,
    `--template-file-gcs-location=${spec.templatePath}`,
  ];
  if (spec.encodedParameters) {
    args.push(`--parameters=${spec.encodedParameters}`);
  }
  args.push(`--additional-user-labels=source=${spec.label}`);
  return { command: "gcloud", args };
}

function classicCommand(spec: JobSpecification): ProcessCommand {
  const { environment } = spec;
  const args = [
    "dataflow", "jobs", "run", spec.jobName,
    `--project=${environment.projectId}`,
    `--region=${environment.region}`,
    `--gcs-location=${spec.templatePath}`,
  ];
  if (spec.encodedParameters) {
    args.push(`--parameters=${spec.encodedParameters}`);
  }
  args.push(`--staging-location=${environment.stagingLocation ?? ""}`);
  args.push(`--additional-user-labels=source=${spec.label}`);
  return { command: "gcloud", args };
}

/**
 * Launcher script invocation: `<script> -- --template=<NAME> --k=v ...`,
 * run from the language directory with the environment carried in variables.
 */
function languageVariantCommand(spec: JobSpecification): ProcessCommand {
  const { environment } = spec;
  const env: Record<string, string> = {
    GCP_PROJECT: environment.projectId,
    REGION: environment.region,
    GCS_STAGING_LOCATION: environment.stagingLocation ?? "",
    JOB_TYPE: "SERVERLESS",
  };
  if (environment.subnet) {
    env.SUBNET = environment.subnet;
  }
  if (environment.jars) {
    env.JARS = environment.jars;
  }

  const args = ["--", `--template=${spec.templateName ?? ""}`];
  for (const [key, value] of Object.entries(spec.parameters)) {
    args.push(`--${key}=${value}`);
  }
  const command: ProcessCommand = { command: spec.templatePath, args, env };
  if (spec.workingDirectory) {
    command.cwd = spec.workingDirectory;
  }
  return command;
}

/**
 * Builds the submission command as an argument list; no shell is involved.
 */
export function buildSubmitCommand(spec: JobSpecification): ProcessCommand {
  switch (spec.strategy) {
    case SubmissionStrategy.Flex:
      return flexCommand(spec);
    case SubmissionStrategy.Classic:
      return classicCommand(spec);
    case SubmissionStrategy.LanguageVariant:
      return languageVariantCommand(spec);
  }
}
