/**
 * Dispatcher - routes a structured request to its registered handler
 *
 * The request names a service and a command. Input is checked against the
 * handler's JSON Schema before the handler runs. No error escapes: routing
 * and input problems come back as `error` responses, handler faults as
 * `failed` responses, both tagged with an error kind.
 */

import Ajv, { ValidateFunction } from "ajv";
import * as logger from "firebase-functions/logger";
import { ErrorKind, errorKind, errorMessage } from "./errors";
import { JobContext } from "./jobContext";
import { CallerResponse, JobStatus } from "./types";
import { InputSchema, getHandlerDefinition, getUnsupportedTaskError } from "./handlers/registry";
import { HandlerInput } from "./handlers/input";

const ajv = new Ajv({
  allErrors: true,
  verbose: true,
  strict: false,
});

const validators = new Map<string, ValidateFunction>();

export interface DispatchRequest {
  service: string;
  command: string;
  input?: HandlerInput;
}

function getValidator(key: string, schema: InputSchema): ValidateFunction {
  let validate = validators.get(key);
  if (!validate) {
    validate = ajv.compile(schema);
    validators.set(key, validate);
  }
  return validate;
}

/**
 * Checks input against the handler's schema.
 * @returns error messages, empty when the input is valid
 */
export function validateRequestInput(service: string, command: string, input: HandlerInput): string[] {
  const definition = getHandlerDefinition(service, command);
  if (!definition) {
    return [getUnsupportedTaskError(service, command)];
  }

  const validate = getValidator(`${service}/${command}`, definition.inputSchema);
  if (validate(input) || !validate.errors) {
    return [];
  }

  const prefix = `Input (${service}/${command})`;
  return validate.errors.map((error) => {
    const message = error.message || "validation failed";
    return error.instancePath ? `${prefix}: ${error.instancePath} ${message}` : `${prefix}: ${message}`;
  });
}

function errorResponse(report: string): CallerResponse {
  return {
    status: "error",
    kind: ErrorKind.MalformedInput,
    report,
  };
}

export async function dispatch(request: DispatchRequest, context: JobContext): Promise<CallerResponse> {
  const { service, command } = request;
  const input = request.input ?? {};

  const definition = getHandlerDefinition(service, command);
  if (!definition) {
    const message = getUnsupportedTaskError(service, command);
    logger.warn(`[Dispatch] ${message}`);
    return errorResponse(message);
  }

  const errors = validateRequestInput(service, command, input);
  if (errors.length > 0) {
    logger.warn(`[Dispatch] Rejected ${service}/${command} input:`, errors);
    return errorResponse(errors.join("; "));
  }

  logger.info(`[Dispatch] Running ${service}/${command}: ${definition.description}`);
  try {
    const response = await definition.handler(input, context);
    if (context.verbose) {
      logger.debug(`[Dispatch] ${service}/${command} response:`, response);
    }
    return response;
  } catch (error) {
    logger.error(`[Dispatch] ${service}/${command} failed:`, error);
    return {
      status: JobStatus.Failed,
      kind: errorKind(error, ErrorKind.MalformedInput),
      report: errorMessage(error),
    };
  }
}
