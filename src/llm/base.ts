import { z } from "zod";
import { LLMError, LLMErrorSubType } from "../errors/index.js";
import type {
  LLMCompletionProvider,
  LLMEmbeddingProvider,
  LLMProviderType,
  EmbeddingResult,
  CompletionResult,
  ModelConfig,
} from "./types.js";

// =============================================================================
// Response Parsing
// =============================================================================

/**
 * Parse a response body and validate it against a schema
 * @throws LLMError (API_ERROR) when the body is not JSON or has the wrong shape
 */
export function parseJsonResponse<T>(
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  provider: string
): T {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new LLMError(
      `${provider} returned invalid JSON: ${text.slice(0, 200)}`,
      LLMErrorSubType.API_ERROR,
      provider,
      undefined,
      error instanceof Error ? error : undefined
    );
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    throw new LLMError(
      `${provider} returned unexpected response shape: ${result.error.issues[0]?.message ?? "unknown"}`,
      LLMErrorSubType.API_ERROR,
      provider
    );
  }
  return result.data;
}

/** Error body shape shared by the OpenAI and Anthropic APIs */
const ProviderErrorBodySchema = z.object({
  error: z.object({
    message: z.string(),
    type: z.string().optional(),
  }),
});

/**
 * Handle rate limit (429) response and extract retry-after header
 * @throws LLMError with RATE_LIMIT subtype if response status is 429
 */
export function handleRateLimitResponse(
  response: Response,
  providerName: string
): void {
  if (response.status === 429) {
    const retryAfterHeader = response.headers.get("retry-after");
    let retryAfterSeconds: number | null = null;

    if (retryAfterHeader) {
      const parsed = parseInt(retryAfterHeader, 10);
      if (!isNaN(parsed)) {
        retryAfterSeconds = parsed;
      }
    }

    throw new LLMError(
      `Rate limit exceeded. Retry after ${retryAfterSeconds ?? "unknown"} seconds`,
      LLMErrorSubType.RATE_LIMIT,
      providerName,
      { retryAfterSeconds }
    );
  }
}

/**
 * Turn a non-OK response into an LLMError.
 * 401/403 map to INVALID_KEY; everything else to the operation's failure subtype.
 */
export async function throwResponseError(
  response: Response,
  providerName: string,
  subType: LLMErrorSubType
): Promise<never> {
  const body = await response.text();
  let detail = `${response.status} ${response.statusText}`;

  try {
    const parsed = ProviderErrorBodySchema.safeParse(JSON.parse(body));
    if (parsed.success) {
      detail = parsed.data.error.type
        ? `${parsed.data.error.message} (${parsed.data.error.type})`
        : parsed.data.error.message;
    }
  } catch {
    // Non-JSON error body: keep the status line
    detail = `${response.status} ${response.statusText}`;
  }

  const isAuthFailure = response.status === 401 || response.status === 403;
  throw new LLMError(
    `${providerName} API error: ${detail}`,
    isAuthFailure ? LLMErrorSubType.INVALID_KEY : subType,
    providerName,
    { status: response.status }
  );
}

// =============================================================================
// Base Provider Configuration
// =============================================================================

export const BaseProviderConfigSchema = z.object({
  apiKey: z.string().min(1),
  baseUrl: z.string().url(),
  /** Request timeout in milliseconds (1s - 5min) */
  timeout: z.number().min(1000).max(300000).default(30000),
});
export type BaseProviderConfig = z.infer<typeof BaseProviderConfigSchema>;

// =============================================================================
// Abstract Base Providers
// =============================================================================

/**
 * Abstract base class for HTTP completion providers
 */
export abstract class BaseCompletionProvider implements LLMCompletionProvider {
  abstract readonly name: LLMProviderType;

  protected readonly apiKey: string;
  protected readonly baseUrl: string;
  protected readonly timeout: number;

  constructor(config: BaseProviderConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout;
  }

  /**
   * Fetch with abort-based timeout
   * @throws LLMError (TIMEOUT) when the request is aborted by the timer
   */
  protected async fetchWithTimeout(
    url: string,
    options: RequestInit
  ): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await fetch(url, {
        ...options,
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new LLMError(
          `${this.name} request timed out after ${this.timeout}ms`,
          LLMErrorSubType.TIMEOUT,
          this.name,
          { url },
          error instanceof Error ? error : undefined
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  protected buildAuthHeaders(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.apiKey}`,
      "Content-Type": "application/json",
    };
  }

  abstract complete(
    prompt: string,
    config?: Partial<ModelConfig>
  ): Promise<CompletionResult>;
}

/**
 * Abstract base class for providers with both completion and embeddings
 */
export abstract class BaseFullProvider
  extends BaseCompletionProvider
  implements LLMEmbeddingProvider
{
  abstract embed(text: string): Promise<EmbeddingResult>;
  abstract embedBatch(
    texts: readonly string[]
  ): Promise<readonly EmbeddingResult[]>;
}
