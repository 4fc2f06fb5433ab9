/**
 * Error taxonomy shared by every stage of template resolution and job submission.
 */
export enum ErrorKind {
  InvalidParameter = "INVALID_PARAMETER",
  MissingRequiredParameter = "MISSING_REQUIRED_PARAMETER",
  MissingTemplatePath = "MISSING_TEMPLATE_PATH",
  NoMatchingTemplate = "NO_MATCHING_TEMPLATE",
  SubprocessFailure = "SUBPROCESS_FAILURE",
  IdNotFound = "ID_NOT_FOUND",
  ArchivalFailure = "ARCHIVAL_FAILURE",
  CatalogRefreshFailure = "CATALOG_REFRESH_FAILURE",
  MalformedInput = "MALFORMED_INPUT",
}

export class JobError extends Error {
  readonly kind: ErrorKind;
  /** Captured process output, when the failure came from a subprocess */
  readonly output?: string;

  constructor(kind: ErrorKind, message: string, output?: string) {
    super(message);
    this.name = "JobError";
    this.kind = kind;
    this.output = output;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Returns the kind carried by a JobError, or `fallback` for anything else.
 */
export function errorKind(error: unknown, fallback: ErrorKind): ErrorKind {
  return error instanceof JobError ? error.kind : fallback;
}
