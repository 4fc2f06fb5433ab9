import { ErrorKind, JobError } from "../errors";

/** Raw handler input, already checked against the handler's input schema */
export type HandlerInput = Record<string, unknown>;

export function requireString(input: HandlerInput, key: string): string {
  const value = input[key];
  if (typeof value !== "string" || !value.trim()) {
    throw new JobError(ErrorKind.MalformedInput, `Invalid input: ${key} is required`);
  }
  return value;
}

export function optionalString(input: HandlerInput, key: string): string | undefined {
  const value = input[key];
  if (value === undefined || value === null || value === "") {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new JobError(ErrorKind.MalformedInput, `Invalid input: ${key} must be a string`);
  }
  return value;
}

export function optionalBoolean(input: HandlerInput, key: string, fallback: boolean): boolean {
  const value = input[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "boolean") {
    throw new JobError(ErrorKind.MalformedInput, `Invalid input: ${key} must be a boolean`);
  }
  return value;
}
