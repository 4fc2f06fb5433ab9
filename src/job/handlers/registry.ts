/**
 * Centralized Handler Registry
 *
 * Single source of truth for every handler the dispatcher can route to.
 *
 * When adding a new handler:
 * 1. Create the handler file in handlers/{service}/
 * 2. Import the handler function here
 * 3. Add an entry to HANDLER_REGISTRY with its description and input schema
 */

import { JobContext } from "../jobContext";
import { CallerResponse } from "../types";
import { HandlerInput } from "./input";

import { handleFindTemplate } from "./template/findTemplate";
import { handleSubmitTemplate } from "./template/submitTemplate";
import { handleStageTemplate } from "./template/stageTemplateHandler";
import { handleRunPipeline } from "./pipeline/runPipelineHandler";

/**
 * All handlers receive their validated input and the shared job context
 */
export type HandlerFunction = (input: HandlerInput, context: JobContext) => Promise<CallerResponse>;

type JsonType = "string" | "number" | "boolean" | "object" | "array";

/**
 * JSON Schema property definition
 */
export type SchemaProperty = {
  type?: JsonType | JsonType[];
  pattern?: string;
  description?: string;
  minLength?: number;
  enum?: string[];
  properties?: Record<string, SchemaProperty>;
  items?: SchemaProperty;
  required?: string[];
  additionalProperties?: boolean | SchemaProperty;
};

/**
 * JSON Schema definition for handler input validation
 */
export type InputSchema = {
  type: "object";
  properties: Record<string, SchemaProperty>;
  required: string[];
  additionalProperties?: boolean;
};

export interface HandlerDefinition {
  handler: HandlerFunction;
  description: string;
  inputSchema: InputSchema;
}

export type ServiceHandlers = Record<string, HandlerDefinition>;

export type HandlerRegistry = Record<string, ServiceHandlers>;

const NON_EMPTY_STRING: SchemaProperty = { type: "string", minLength: 1 };

const PARAMETER_VALUES: SchemaProperty = {
  type: ["object", "string"],
  description: "Parameter name/value pairs, as an object or a JSON string",
  additionalProperties: { type: ["string", "number", "boolean"] },
};

export const HANDLER_REGISTRY: HandlerRegistry = {
  // ==================== TEMPLATE HANDLERS ====================
  template: {
    find: {
      handler: handleFindTemplate,
      description: "Find the catalog template that best matches a task description",
      inputSchema: {
        type: "object",
        properties: {
          taskDescription: { ...NON_EMPTY_STRING, description: "What the job should do" },
          refresh: { type: "boolean", description: "Pull the template source tree first (default true)" },
        },
        required: ["taskDescription"],
        additionalProperties: false,
      },
    },
    submit: {
      handler: handleSubmitTemplate,
      description: "Validate parameters against a template and submit the job",
      inputSchema: {
        type: "object",
        properties: {
          jobName: NON_EMPTY_STRING,
          projectId: NON_EMPTY_STRING,
          region: NON_EMPTY_STRING,
          templateDefinition: {
            type: ["object", "array", "string"],
            description: "Template definition as returned by template/find",
          },
          templateName: NON_EMPTY_STRING,
          taskDescription: NON_EMPTY_STRING,
          templatePath: { type: "string", description: "Artifact path outside the catalog; skips validation" },
          parameters: PARAMETER_VALUES,
          stagingLocation: { type: "string", pattern: "^gs://" },
          subnet: { type: "string" },
          jars: { type: "string" },
        },
        required: ["jobName", "projectId", "region"],
        additionalProperties: false,
      },
    },
    stage: {
      handler: handleStageTemplate,
      description: "Build a template module from the template source tree and stage it to Cloud Storage",
      inputSchema: {
        type: "object",
        properties: {
          projectId: NON_EMPTY_STRING,
          bucketName: NON_EMPTY_STRING,
          templateName: NON_EMPTY_STRING,
          templatePath: { ...NON_EMPTY_STRING, description: "Module directory relative to the source tree root" },
        },
        required: ["projectId", "bucketName", "templateName", "templatePath"],
        additionalProperties: false,
      },
    },
  },

  // ==================== PIPELINE HANDLERS ====================
  pipeline: {
    run: {
      handler: handleRunPipeline,
      description: "Run custom pipeline source as a BATCH or STREAMING job and archive the source",
      inputSchema: {
        type: "object",
        properties: {
          programSource: NON_EMPTY_STRING,
          mode: { type: "string", enum: ["BATCH", "STREAMING", "batch", "streaming"] },
          projectId: NON_EMPTY_STRING,
          region: NON_EMPTY_STRING,
          storageLocation: { type: "string", pattern: "^gs://" },
          jobName: NON_EMPTY_STRING,
          runtimeArgs: PARAMETER_VALUES,
        },
        required: ["programSource", "mode", "projectId", "region", "storageLocation", "jobName"],
        additionalProperties: false,
      },
    },
  },
};

export function getHandlerDefinition(service: string, command: string): HandlerDefinition | undefined {
  if (!Object.hasOwn(HANDLER_REGISTRY, service)) {
    return undefined;
  }
  const serviceHandlers = HANDLER_REGISTRY[service];
  return Object.hasOwn(serviceHandlers, command) ? serviceHandlers[command] : undefined;
}

export function getAvailableServices(): string[] {
  return Object.keys(HANDLER_REGISTRY).sort();
}

export function getServiceCommands(service: string): string[] {
  if (!Object.hasOwn(HANDLER_REGISTRY, service)) {
    return [];
  }
  return Object.keys(HANDLER_REGISTRY[service]).sort();
}

/**
 * Gets a descriptive error message for an unsupported service/command.
 */
export function getUnsupportedTaskError(service: string, command: string): string {
  const availableServices = getAvailableServices();

  if (!Object.hasOwn(HANDLER_REGISTRY, service)) {
    return (
      `Unsupported service: ${service}. ` +
      `Available services: ${availableServices.join(", ")}`
    );
  }

  const availableCommands = getServiceCommands(service);
  return (
    `Unsupported command: ${service}/${command}. ` +
    `Available commands for ${service}: ${availableCommands.join(", ")}`
  );
}
