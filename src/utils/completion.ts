import {
  GenerateContentRequest,
  GenerateContentResult,
  ModelParams,
} from "@google-cloud/vertexai";
import * as logger from "firebase-functions/logger";

/**
 * Text-completion service: maps a prompt to a completion, nothing more.
 */
export interface CompletionService {
  complete(systemInstruction: string, prompt: string): Promise<string>;
}

/**
 * The part of the Vertex AI client the completion service uses.
 * A `VertexAI` instance satisfies it.
 */
export interface GenerativeModelProvider {
  getGenerativeModel(params: ModelParams): {
    generateContent(request: GenerateContentRequest): Promise<GenerateContentResult>;
  };
}

export interface VertexCompletionOptions {
  model: string;
  timeoutMs: number;
  temperature?: number;
  verbose?: boolean;
}

/**
 * Calls the model with timeout protection
 */
async function callWithTimeout<T>(call: Promise<T>, timeout: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`AI call timeout after ${timeout}ms`)), timeout);
  });

  try {
    return await Promise.race([call, expiry]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

export class VertexCompletionService implements CompletionService {
  private provider: GenerativeModelProvider;
  private options: VertexCompletionOptions;

  constructor(provider: GenerativeModelProvider, options: VertexCompletionOptions) {
    this.provider = provider;
    this.options = options;
  }

  async complete(systemInstruction: string, prompt: string): Promise<string> {
    const model = this.provider.getGenerativeModel({
      model: this.options.model,
      systemInstruction,
      generationConfig: {
        temperature: this.options.temperature ?? 0,
      },
    });

    const result = await callWithTimeout(
      model.generateContent({
        contents: [{
          role: "user",
          parts: [{ text: prompt }],
        }],
      }),
      this.options.timeoutMs
    );

    const response = result.response;
    const candidate = response.candidates?.[0];
    if (!candidate || !candidate.content || !candidate.content.parts) {
      throw new Error("No response generated from AI");
    }

    const responseText = candidate.content.parts
      .map((part) => part.text ?? "")
      .join("");

    if (this.options.verbose) {
      logger.debug("[Completion] AI Response:", responseText);
      if (response.usageMetadata) {
        logger.debug("[Completion] Token usage:", {
          promptTokens: response.usageMetadata.promptTokenCount,
          responseTokens: response.usageMetadata.candidatesTokenCount,
          totalTokens: response.usageMetadata.totalTokenCount,
        });
      }
    }

    return responseText;
  }
}
