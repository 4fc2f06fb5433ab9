import { expect } from "chai";
import { GenerateContentRequest, GenerateContentResult, ModelParams } from "@google-cloud/vertexai";
import { GenerativeModelProvider, VertexCompletionService } from "../../../src/utils/completion";

class FakeModelProvider implements GenerativeModelProvider {
  readonly modelParams: ModelParams[] = [];
  readonly requests: GenerateContentRequest[] = [];

  constructor(private readonly respond: () => Promise<GenerateContentResult>) {}

  getGenerativeModel(params: ModelParams) {
    this.modelParams.push(params);
    return {
      generateContent: (request: GenerateContentRequest) => {
        this.requests.push(request);
        return this.respond();
      },
    };
  }
}

function textResult(...texts: string[]): GenerateContentResult {
  return {
    response: {
      candidates: [{
        index: 0,
        content: { role: "model", parts: texts.map((text) => ({ text })) },
      }],
    },
  };
}

describe("VertexCompletionService", () => {
  it("sends the instruction and prompt and joins the response parts", async () => {
    const provider = new FakeModelProvider(async () => textResult('{"name": ', '"Word_Count"}'));
    const service = new VertexCompletionService(provider, { model: "test-model", timeoutMs: 1000 });

    const text = await service.complete("pick one", "the task");

    expect(text).to.equal('{"name": "Word_Count"}');
    expect(provider.modelParams[0].model).to.equal("test-model");
    expect(provider.modelParams[0].systemInstruction).to.equal("pick one");
    expect(provider.modelParams[0].generationConfig?.temperature).to.equal(0);
    expect(provider.requests[0].contents).to.deep.equal([{ role: "user", parts: [{ text: "the task" }] }]);
  });

  it("fails when the model returns no candidates", async () => {
    const provider = new FakeModelProvider(async () => ({ response: { candidates: [] } }));
    const service = new VertexCompletionService(provider, { model: "test-model", timeoutMs: 1000 });

    let message = "";
    try {
      await service.complete("pick one", "the task");
    } catch (error) {
      message = error instanceof Error ? error.message : String(error);
    }
    expect(message).to.equal("No response generated from AI");
  });

  it("times out a call that does not answer", async () => {
    const provider = new FakeModelProvider(() => new Promise<GenerateContentResult>(() => undefined));
    const service = new VertexCompletionService(provider, { model: "test-model", timeoutMs: 20 });

    let message = "";
    try {
      await service.complete("pick one", "the task");
    } catch (error) {
      message = error instanceof Error ? error.message : String(error);
    }
    expect(message).to.equal("AI call timeout after 20ms");
  });
});
