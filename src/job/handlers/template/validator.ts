/**
 * Parameter Schema Validator
 *
 * Checks a user-supplied parameter mapping against a template's declared
 * parameters. Two checks, in order, stopping at the first failure:
 * 1. Every supplied name must be declared (required or optional)
 * 2. Every required name must be supplied
 */

import { ErrorKind } from "../../errors";
import { ParameterSchema, UserParameterMapping, ValidationResult } from "./types";

function formatNames(names: string[]): string {
  return `[${names.map((name) => `'${name}'`).join(", ")}]`;
}

export function validateParameters(
  schema: ParameterSchema,
  supplied: UserParameterMapping
): ValidationResult {
  const legal = [...schema.required, ...schema.optional];
  const legalSet = new Set(legal);
  const suppliedKeys = Object.keys(supplied);

  const invalid = suppliedKeys.filter((key) => !legalSet.has(key));
  if (invalid.length > 0) {
    return {
      valid: false,
      kind: ErrorKind.InvalidParameter,
      invalid,
      legal,
      message: `Invalid param(s) passed: ${formatNames(invalid)}. Valid params are: ${formatNames(legal)}`,
    };
  }

  const suppliedSet = new Set(suppliedKeys);
  const missing = [...new Set(schema.required)].filter((key) => !suppliedSet.has(key));
  if (missing.length > 0) {
    return {
      valid: false,
      kind: ErrorKind.MissingRequiredParameter,
      missing,
      message: `Missing required param(s): ${formatNames(missing)}`,
    };
  }

  return { valid: true, message: "Validation Passed" };
}
