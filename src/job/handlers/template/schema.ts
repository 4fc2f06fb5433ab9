/**
 * JSON Schema definitions and parsers for template definitions
 *
 * Catalog entries, caller-supplied template definitions and parameter
 * mappings all arrive as untrusted JSON. They are parsed strictly here;
 * anything that does not conform is rejected as MALFORMED_INPUT.
 */

import Ajv from "ajv";
import { ErrorKind, JobError, errorMessage } from "../../errors";
import {
  RawTemplateDefinition,
  TemplateLanguage,
  TemplateRecord,
  TemplateType,
  UserParameterMapping,
} from "./types";

const ajv = new Ajv({
  allErrors: true,
  strict: false,
});

const STRING_ARRAY = {
  type: "array",
  items: { type: "string" },
};

/**
 * JSON Schema for one template entry of the mapping file
 */
export const TEMPLATE_DEFINITION_SCHEMA = {
  type: "object",
  properties: {
    name: { type: "string" },
    template_name: { type: "string" },
    description: { type: "string" },
    template_gcs_path: { type: "string" },
    gcs_path: { type: "string" },
    execution_path: { type: "string" },
    type: { type: "string" },
    language: { type: "string" },
    params: {
      type: "object",
      properties: {
        required: STRING_ARRAY,
        optional: STRING_ARRAY,
      },
    },
  },
};

const validateDefinition = ajv.compile<RawTemplateDefinition>(TEMPLATE_DEFINITION_SCHEMA);

export function isTemplateDefinition(value: unknown): value is RawTemplateDefinition {
  return validateDefinition(value);
}

export function describeSchemaErrors(): string {
  if (!validateDefinition.errors) {
    return "validation failed";
  }
  return validateDefinition.errors
    .map((error) => `${error.instancePath || "/"} ${error.message ?? "validation failed"}`)
    .join("; ");
}

function parseJson(raw: string, label: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new JobError(ErrorKind.MalformedInput, `Failed to parse ${label} as JSON: ${errorMessage(error)}`);
  }
}

/**
 * Accepts a template definition as a JSON string or an already parsed value.
 * A list is unwrapped to its first element; an empty list or a non-object is rejected.
 */
export function parseTemplateDefinition(raw: unknown): RawTemplateDefinition {
  let definition = typeof raw === "string" ? parseJson(raw, "template definition") : raw;

  if (Array.isArray(definition)) {
    if (definition.length === 0) {
      throw new JobError(
        ErrorKind.MalformedInput,
        "Job could not be submitted because the template definition was an empty list."
      );
    }
    definition = definition[0];
  }

  if (!definition || typeof definition !== "object" || Array.isArray(definition)) {
    throw new JobError(
      ErrorKind.MalformedInput,
      "Job could not be submitted because the processed template definition is not a valid JSON object."
    );
  }

  if (!isTemplateDefinition(definition)) {
    throw new JobError(ErrorKind.MalformedInput, `Invalid template definition: ${describeSchemaErrors()}`);
  }

  return definition;
}

export function templatePathOf(definition: RawTemplateDefinition): string | undefined {
  return definition.template_gcs_path || definition.gcs_path || definition.execution_path || undefined;
}

function parseTemplateType(value: string | undefined): TemplateType | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toUpperCase();
  for (const type of Object.values(TemplateType)) {
    if (type === normalized) {
      return type;
    }
  }
  throw new JobError(
    ErrorKind.MalformedInput,
    `Unknown template type '${value}'. Expected one of: ${Object.values(TemplateType).join(", ")}`
  );
}

function parseLanguage(value: string | undefined): TemplateLanguage | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toUpperCase();
  if (normalized === "PYTHON" || normalized === "JAVA") {
    return normalized;
  }
  throw new JobError(ErrorKind.MalformedInput, `Unknown template language '${value}'. Expected PYTHON or JAVA`);
}

/**
 * Converts a parsed definition into a TemplateRecord.
 * By default the definition must declare `params`; without it there is nothing
 * to validate against. Definitions used only alongside an override path may omit it.
 */
export function toTemplateRecord(definition: RawTemplateDefinition, requireParams = true): TemplateRecord {
  if (!definition.params && requireParams) {
    throw new JobError(
      ErrorKind.MalformedInput,
      'Job could not be submitted because the template definition is missing the "params" key.'
    );
  }

  return {
    name: definition.name ?? definition.template_name ?? "",
    description: definition.description ?? "",
    executionPath: templatePathOf(definition),
    type: parseTemplateType(definition.type),
    language: parseLanguage(definition.language),
    params: {
      required: definition.params?.required ?? [],
      optional: definition.params?.optional ?? [],
    },
  };
}

/**
 * Serializes a record back to the mapping-file shape, as shown to the completion service.
 */
export function toRawDefinition(record: TemplateRecord): RawTemplateDefinition {
  const raw: RawTemplateDefinition = {
    name: record.name,
    description: record.description,
    params: {
      required: record.params.required,
      optional: record.params.optional,
    },
  };
  if (record.executionPath) {
    raw.template_gcs_path = record.executionPath;
  }
  if (record.type) {
    raw.type = record.type;
  }
  if (record.language) {
    raw.language = record.language;
  }
  return raw;
}

/**
 * Accepts a parameter mapping as a JSON string or object.
 * Values may be strings, numbers or booleans; they are passed on as strings.
 */
export function parseParameterMapping(raw: unknown): UserParameterMapping {
  const value = typeof raw === "string" ? parseJson(raw, "input parameters") : raw;

  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new JobError(ErrorKind.MalformedInput, "Input parameters must be a JSON object of name/value pairs");
  }

  // Null prototype so a `__proto__` key is kept as a parameter
  const mapping: UserParameterMapping = Object.create(null);
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") {
      mapping[key] = entry;
    } else if (typeof entry === "number" || typeof entry === "boolean") {
      mapping[key] = String(entry);
    } else {
      throw new JobError(
        ErrorKind.MalformedInput,
        `Input parameter '${key}' must be a string, number or boolean`
      );
    }
  }
  return mapping;
}
