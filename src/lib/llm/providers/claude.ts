import Anthropic from "@anthropic-ai/sdk";
import { ProviderError, toProviderError } from "../errors";
import type { LLMCallOptions, LLMProvider, LLMRequest, LLMResponse } from "../types";

export class ClaudeProvider implements LLMProvider {
  public readonly name = "claude";
  private client: Anthropic;
  private model: string;

  constructor(apiKey: string, model: string) {
    if (!apiKey) {
      throw new ProviderError("claude", "Claude API error: missing API key", { transient: false });
    }
    // Retries belong to GenerationClient; the SDK must not add its own.
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
    this.model = model;
  }

  async call(request: LLMRequest, options: LLMCallOptions = {}): Promise<LLMResponse> {
    const start = Date.now();

    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: request.maxTokens ?? 1024,
      temperature: request.temperature ?? 0,
      system: request.systemPrompt,
      messages: [{ role: "user", content: request.userMessage }],
    };

    // Structured output via a forced tool call
    if (request.outputSchema) {
      params.tools = [
        {
          name: request.outputSchema.name,
          description: request.outputSchema.description,
          input_schema: request.outputSchema.schema,
        },
      ];
      params.tool_choice = { type: "tool", name: request.outputSchema.name };
    }

    try {
      const response = await this.client.messages.create(params, {
        timeout: options.timeoutMs,
        signal: options.signal,
      });

      const latencyMs = Date.now() - start;

      let content: string;
      if (request.outputSchema) {
        const toolBlock = response.content.find((b) => b.type === "tool_use");
        content = toolBlock && "input" in toolBlock ? JSON.stringify(toolBlock.input) : "";
      } else {
        const textBlock = response.content.find((b) => b.type === "text");
        content = textBlock && "text" in textBlock ? textBlock.text : "";
      }

      return {
        content,
        provider: this.name,
        model: response.model,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        latencyMs,
      };
    } catch (error) {
      throw toProviderError(this.name, error, "Claude");
    }
  }
}
