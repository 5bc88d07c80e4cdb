import OpenAI from "openai";
import { ProviderError, toProviderError } from "../errors";
import type { LLMCallOptions, LLMProvider, LLMRequest, LLMResponse } from "../types";

/**
 * Chat Completions provider. `baseURL` points it at any OpenAI-compatible
 * host (Groq, a local gateway) instead of api.openai.com.
 */
export class OpenAIProvider implements LLMProvider {
  public readonly name = "openai";
  private client: OpenAI;
  private model: string;

  constructor(apiKey: string, model: string, baseURL?: string) {
    if (!apiKey) {
      throw new ProviderError("openai", "OpenAI API error: missing API key", { transient: false });
    }
    this.client = new OpenAI({ apiKey, baseURL, maxRetries: 0 });
    this.model = model;
  }

  async call(request: LLMRequest, options: LLMCallOptions = {}): Promise<LLMResponse> {
    const start = Date.now();

    const body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: request.maxTokens ?? 1024,
      temperature: request.temperature ?? 0,
      messages: [
        { role: "system", content: request.systemPrompt },
        { role: "user", content: request.userMessage },
      ],
    };
    if (request.outputSchema) {
      body.response_format = { type: "json_object" };
    }

    try {
      const response = await this.client.chat.completions.create(body, {
        timeout: options.timeoutMs,
        signal: options.signal,
      });

      const latencyMs = Date.now() - start;

      return {
        content: response.choices[0]?.message?.content ?? "",
        provider: this.name,
        model: response.model,
        inputTokens: response.usage?.prompt_tokens ?? 0,
        outputTokens: response.usage?.completion_tokens ?? 0,
        latencyMs,
      };
    } catch (error) {
      throw toProviderError(this.name, error, "OpenAI");
    }
  }
}
