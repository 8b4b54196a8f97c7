import { z } from "zod";
import { LLMError, LLMErrorSubType } from "../errors/index.js";
import {
  BaseFullProvider,
  handleRateLimitResponse,
  parseJsonResponse,
  throwResponseError,
} from "./base.js";
import type {
  EmbeddingResult,
  CompletionResult,
  ModelConfig,
  FinishReason,
} from "./types.js";

// =============================================================================
// OpenAI API Response Schemas
// =============================================================================

const OpenAIEmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number(),
    })
  ),
  usage: z.object({
    total_tokens: z.number(),
  }),
  model: z.string(),
});

const OpenAIChatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
      finish_reason: z.string(),
    })
  ),
  usage: z.object({
    total_tokens: z.number(),
  }),
  model: z.string(),
});

export interface OpenAIProviderOptions {
  readonly embeddingModel?: string;
  readonly chatModel?: string;
  readonly timeout?: number;
  readonly baseUrl?: string;
}

// =============================================================================
// OpenAI Provider Implementation
// =============================================================================

/**
 * OpenAI provider for chunk embeddings and chat completions
 */
export class OpenAIProvider extends BaseFullProvider {
  readonly name = "openai" as const;

  private readonly embeddingModel: string;
  private readonly chatModel: string;

  constructor(apiKey: string, options: OpenAIProviderOptions = {}) {
    if (apiKey.trim().length === 0) {
      throw new LLMError(
        "OpenAI API key is required",
        LLMErrorSubType.INVALID_KEY,
        "openai"
      );
    }

    super({
      apiKey,
      baseUrl: options.baseUrl ?? "https://api.openai.com/v1",
      timeout: options.timeout ?? 60000,
    });
    this.embeddingModel = options.embeddingModel ?? "text-embedding-3-small";
    this.chatModel = options.chatModel ?? "gpt-4o-mini";
  }

  async embed(text: string): Promise<EmbeddingResult> {
    const results = await this.embedBatch([text]);
    const result = results[0];

    if (!result) {
      throw new LLMError(
        "OpenAI returned empty embedding result",
        LLMErrorSubType.EMBEDDING_FAILED,
        this.name
      );
    }

    return result;
  }

  /**
   * Embed many texts in one request
   * @returns Results re-ordered by the API's `index` field to match input order
   */
  async embedBatch(
    texts: readonly string[]
  ): Promise<readonly EmbeddingResult[]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.fetchWithTimeout(`${this.baseUrl}/embeddings`, {
      method: "POST",
      headers: this.buildAuthHeaders(),
      body: JSON.stringify({
        model: this.embeddingModel,
        input: texts,
      }),
    });

    handleRateLimitResponse(response, this.name);

    if (!response.ok) {
      return throwResponseError(
        response,
        this.name,
        LLMErrorSubType.EMBEDDING_FAILED
      );
    }

    const data = parseJsonResponse(
      await response.text(),
      OpenAIEmbeddingResponseSchema,
      this.name
    );

    if (data.data.length !== texts.length) {
      throw new LLMError(
        `OpenAI returned ${data.data.length} embeddings for ${texts.length} inputs`,
        LLMErrorSubType.EMBEDDING_FAILED,
        this.name
      );
    }

    const sortedData = [...data.data].sort((a, b) => a.index - b.index);
    const tokensPerEmbedding = Math.ceil(data.usage.total_tokens / texts.length);

    return sortedData.map((item) => ({
      values: item.embedding,
      tokenCount: tokensPerEmbedding,
      model: data.model,
    }));
  }

  async complete(
    prompt: string,
    config?: Partial<ModelConfig>
  ): Promise<CompletionResult> {
    const temperature = config?.temperature ?? 0.7;
    const maxTokens = config?.maxTokens ?? 4096;
    const model = config?.model ?? this.chatModel;

    const messages = config?.system
      ? [
          { role: "system", content: config.system },
          { role: "user", content: prompt },
        ]
      : [{ role: "user", content: prompt }];

    const response = await this.fetchWithTimeout(
      `${this.baseUrl}/chat/completions`,
      {
        method: "POST",
        headers: this.buildAuthHeaders(),
        body: JSON.stringify({
          model,
          messages,
          temperature,
          max_tokens: maxTokens,
        }),
      }
    );

    handleRateLimitResponse(response, this.name);

    if (!response.ok) {
      return throwResponseError(
        response,
        this.name,
        LLMErrorSubType.COMPLETION_FAILED
      );
    }

    const data = parseJsonResponse(
      await response.text(),
      OpenAIChatResponseSchema,
      this.name
    );
    const choice = data.choices[0];

    if (!choice) {
      throw new LLMError(
        "OpenAI returned empty choices array",
        LLMErrorSubType.COMPLETION_FAILED,
        this.name
      );
    }

    return {
      text: choice.message.content ?? "",
      tokenCount: data.usage.total_tokens,
      model: data.model,
      finishReason: this.mapFinishReason(choice.finish_reason),
    };
  }

  private mapFinishReason(reason: string): FinishReason {
    switch (reason) {
      case "stop":
        return "stop";
      case "length":
        return "length";
      case "content_filter":
        return "content_filter";
      case "tool_calls":
      case "function_call":
        return "tool_use";
      default:
        return "unknown";
    }
  }
}
