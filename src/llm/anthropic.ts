import { z } from "zod";
import { LLMError, LLMErrorSubType } from "../errors/index.js";
import {
  BaseCompletionProvider,
  handleRateLimitResponse,
  parseJsonResponse,
  throwResponseError,
} from "./base.js";
import type {
  CompletionResult,
  ModelConfig,
  FinishReason,
} from "./types.js";

/** Anthropic API version header value */
const ANTHROPIC_API_VERSION = "2023-06-01";

const DEFAULT_TIMEOUT_MS = 60000;

/** Small, fast model; categorization prompts are short */
export const DEFAULT_ANTHROPIC_MODEL = "claude-3-5-haiku-20241022";

// =============================================================================
// Anthropic API Response Schema
// =============================================================================

const AnthropicContentBlockSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
});

const AnthropicMessageResponseSchema = z.object({
  content: z.array(AnthropicContentBlockSchema),
  model: z.string(),
  stop_reason: z.string().nullable(),
  usage: z.object({
    input_tokens: z.number(),
    output_tokens: z.number(),
  }),
});
type AnthropicContentBlock = z.infer<typeof AnthropicContentBlockSchema>;

// =============================================================================
// Anthropic Provider Implementation
// =============================================================================

/**
 * Anthropic provider for Claude models
 * @remarks Completion-only; the Messages API has no embeddings endpoint
 */
export class AnthropicProvider extends BaseCompletionProvider {
  readonly name = "anthropic" as const;

  private readonly chatModel: string;

  constructor(
    apiKey: string,
    chatModel: string = DEFAULT_ANTHROPIC_MODEL,
    timeout: number = DEFAULT_TIMEOUT_MS
  ) {
    if (apiKey.trim().length === 0) {
      throw new LLMError(
        "Anthropic API key is required",
        LLMErrorSubType.INVALID_KEY,
        "anthropic"
      );
    }

    super({
      apiKey,
      baseUrl: "https://api.anthropic.com/v1",
      timeout,
    });
    this.chatModel = chatModel;
  }

  /** Anthropic authenticates with x-api-key instead of a Bearer token */
  protected override buildAuthHeaders(): Record<string, string> {
    return {
      "x-api-key": this.apiKey,
      "anthropic-version": ANTHROPIC_API_VERSION,
      "Content-Type": "application/json",
    };
  }

  private mapStopReason(stopReason: string | null): FinishReason {
    switch (stopReason) {
      case "end_turn":
      case "stop_sequence":
        return "stop";
      case "max_tokens":
        return "length";
      case "tool_use":
        return "tool_use";
      default:
        return "unknown";
    }
  }

  private extractTextContent(content: readonly AnthropicContentBlock[]): string {
    return content
      .map((block) => (block.type === "text" ? block.text ?? "" : ""))
      .join("");
  }

  async complete(
    prompt: string,
    config?: Partial<ModelConfig>
  ): Promise<CompletionResult> {
    const model = config?.model ?? this.chatModel;
    const maxTokens = config?.maxTokens ?? 4096;
    const temperature = config?.temperature ?? 0.7;

    const requestBody = {
      model,
      max_tokens: maxTokens,
      temperature,
      ...(config?.system ? { system: config.system } : {}),
      messages: [{ role: "user", content: prompt }],
    };

    const response = await this.fetchWithTimeout(`${this.baseUrl}/messages`, {
      method: "POST",
      headers: this.buildAuthHeaders(),
      body: JSON.stringify(requestBody),
    });

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
      AnthropicMessageResponseSchema,
      this.name
    );

    return {
      text: this.extractTextContent(data.content),
      tokenCount: data.usage.input_tokens + data.usage.output_tokens,
      model: data.model,
      finishReason: this.mapStopReason(data.stop_reason),
    };
  }
}
