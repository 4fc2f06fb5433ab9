/**
 * Template catalog types
 */

import { ErrorKind } from "../../errors";

export enum TemplateType {
  Flex = "FLEX",
  Classic = "CLASSIC",
  LanguageVariant = "LANGUAGE_VARIANT",
}

export type TemplateLanguage = "PYTHON" | "JAVA";

/**
 * Legal parameter names of a template. `required` and `optional` are expected
 * to be disjoint but the validator does not insist on it.
 */
export interface ParameterSchema {
  required: string[];
  optional: string[];
}

/**
 * One pre-built job definition. Read-only once loaded.
 */
export interface TemplateRecord {
  name: string;
  description: string;
  /** gs:// URI of the template artifact, or launcher script for language variants */
  executionPath?: string;
  type?: TemplateType;
  language?: TemplateLanguage;
  params: ParameterSchema;
}

export type CatalogIndex = ReadonlyArray<TemplateRecord>;

/** Parameter name to value, supplied fresh for each request */
export type UserParameterMapping = Record<string, string>;

export const NO_MATCH = "NO_MATCH" as const;

export type MatchResult = TemplateRecord | typeof NO_MATCH;

/**
 * Template entry as written in the catalog mapping file.
 */
export interface RawTemplateDefinition {
  name?: string;
  template_name?: string;
  description?: string;
  template_gcs_path?: string;
  gcs_path?: string;
  execution_path?: string;
  type?: string;
  language?: string;
  params?: {
    required?: string[];
    optional?: string[];
  };
}

export type ValidationResult =
  | { valid: true; message: string }
  | {
      valid: false;
      kind: ErrorKind.InvalidParameter;
      invalid: string[];
      legal: string[];
      message: string;
    }
  | {
      valid: false;
      kind: ErrorKind.MissingRequiredParameter;
      missing: string[];
      message: string;
    };

/**
 * Handle to the local working copy of the template source tree
 */
export interface RepoHandle {
  path: string;
  action: "cloned" | "pulled";
}
