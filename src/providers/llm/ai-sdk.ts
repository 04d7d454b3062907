import { createAnthropic } from "@ai-sdk/anthropic";
import { createDeepSeek } from "@ai-sdk/deepseek";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAI } from "@ai-sdk/openai";
import { createXai } from "@ai-sdk/xai";
import { generateText } from "ai";
import { createError, ErrorCode } from "../../lib/errors";
import { createLogger, type Logger } from "../../lib/logger";
import type { CompletionParams, CompletionResult, LLMProvider } from "../types";

/**
 * Supported AI SDK providers and their environment variable mapping
 */
export const SUPPORTED_PROVIDERS = {
  openai: { envKey: "OPENAI_API_KEY", name: "OpenAI" },
  anthropic: { envKey: "ANTHROPIC_API_KEY", name: "Anthropic" },
  google: { envKey: "GOOGLE_GENERATIVE_AI_API_KEY", name: "Google" },
  xai: { envKey: "XAI_API_KEY", name: "xAI (Grok)" },
  deepseek: { envKey: "DEEPSEEK_API_KEY", name: "DeepSeek" },
} as const;

export type SupportedProvider = keyof typeof SUPPORTED_PROVIDERS;

export function isSupportedProvider(value: string): value is SupportedProvider {
  return value in SUPPORTED_PROVIDERS;
}

/**
 * Default model per provider, first entry wins when falling back
 */
export const PROVIDER_MODELS: Record<SupportedProvider, string[]> = {
  openai: ["gpt-4o-mini", "gpt-4o", "o1-mini"],
  anthropic: ["claude-3-5-haiku-latest", "claude-3-7-sonnet-latest"],
  google: ["gemini-2.0-flash", "gemini-2.5-flash", "gemini-2.5-pro"],
  xai: ["grok-3", "grok-4"],
  deepseek: ["deepseek-chat", "deepseek-reasoner"],
};

export interface AISDKConfig {
  /** Model identifier in format "provider/model" (e.g., "openai/gpt-4o", "google/gemini-2.0-flash") */
  model: string;
  apiKeys: Partial<Record<SupportedProvider, string>>;
  /** OpenAI-compatible base URL override, e.g. a routing gateway. */
  openaiBaseUrl?: string;
  logger?: Logger;
}

type ProviderFactory =
  | ReturnType<typeof createOpenAI>
  | ReturnType<typeof createAnthropic>
  | ReturnType<typeof createGoogleGenerativeAI>
  | ReturnType<typeof createXai>
  | ReturnType<typeof createDeepSeek>;

function isAuthFailure(error: unknown): boolean {
  const message = String(error).toLowerCase();
  return (
    message.includes("authentication fails") ||
    message.includes("invalid api key") ||
    message.includes("unauthorized") ||
    message.includes("http 401") ||
    message.includes("status 401")
  );
}

export function splitModelSpec(modelSpec: string): { provider: string; modelId: string } {
  const separator = modelSpec.includes(":") ? ":" : "/";
  const parts = modelSpec.split(separator);
  const provider = (parts[0] ?? "openai").toLowerCase();
  const modelId = parts.slice(1).join(separator) || modelSpec;
  return { provider, modelId };
}

/**
 * Completion provider over the Vercel AI SDK.
 *
 * Model format: "provider/model" (e.g., "openai/gpt-4o", "deepseek/deepseek-chat").
 * An authentication failure on the requested vendor retries once on the next
 * configured vendor.
 */
export class AISDKProvider implements LLMProvider {
  private providers: Partial<Record<SupportedProvider, ProviderFactory>>;
  private defaultModel: string;
  private logger: Logger;

  constructor(config: AISDKConfig) {
    this.providers = {};
    this.logger = config.logger ?? createLogger("llm");

    if (config.apiKeys.openai) {
      const rawBaseUrl = config.openaiBaseUrl?.trim().replace(/\/+$/, "");
      const openaiOptions: { apiKey: string; baseURL?: string } = { apiKey: config.apiKeys.openai };
      if (rawBaseUrl) {
        openaiOptions.baseURL = rawBaseUrl;
      }
      this.providers.openai = createOpenAI(openaiOptions);
    }
    if (config.apiKeys.anthropic) {
      this.providers.anthropic = createAnthropic({ apiKey: config.apiKeys.anthropic });
    }
    if (config.apiKeys.google) {
      this.providers.google = createGoogleGenerativeAI({ apiKey: config.apiKeys.google });
    }
    if (config.apiKeys.xai) {
      this.providers.xai = createXai({ apiKey: config.apiKeys.xai });
    }
    if (config.apiKeys.deepseek) {
      this.providers.deepseek = createDeepSeek({ apiKey: config.apiKeys.deepseek });
    }

    if (Object.keys(this.providers).length === 0) {
      throw createError(ErrorCode.INVALID_INPUT, "At least one provider API key is required");
    }

    this.defaultModel = config.model;
  }

  getAvailableProviders(): SupportedProvider[] {
    return (Object.keys(SUPPORTED_PROVIDERS) as SupportedProvider[]).filter((name) => !!this.providers[name]);
  }

  private async runAttempt(
    params: CompletionParams,
    selectedProvider: SupportedProvider,
    selectedModelId: string
  ): Promise<CompletionResult> {
    const provider = this.providers[selectedProvider];
    if (!provider) {
      const available = this.getAvailableProviders().join(", ");
      throw createError(ErrorCode.INVALID_INPUT, `Provider '${selectedProvider}' not configured. Available: ${available}`);
    }

    const result = await generateText({
      model: provider(selectedModelId),
      messages: params.messages.map((msg) => ({
        role: msg.role,
        content: msg.content,
      })),
      temperature: params.temperature ?? 0.2,
      maxOutputTokens: params.max_tokens ?? 1024,
      abortSignal: params.abortSignal,
    });

    return {
      content: result.text,
      usage: {
        prompt_tokens: result.usage?.inputTokens ?? 0,
        completion_tokens: result.usage?.outputTokens ?? 0,
        total_tokens: result.usage?.totalTokens ?? 0,
      },
      provider: selectedProvider,
      model: `${selectedProvider}/${selectedModelId}`,
    };
  }

  async complete(params: CompletionParams): Promise<CompletionResult> {
    const startedAt = Date.now();
    const { provider: requestedProvider, modelId: requestedModelId } = splitModelSpec(
      params.model ?? this.defaultModel
    );
    let vendor = requestedProvider;
    let modelId = requestedModelId;

    try {
      if (!isSupportedProvider(requestedProvider)) {
        throw createError(ErrorCode.INVALID_INPUT, `Unsupported provider '${requestedProvider}'`);
      }

      let completion: CompletionResult;
      try {
        completion = await this.runAttempt(params, requestedProvider, requestedModelId);
      } catch (error) {
        if (!isAuthFailure(error)) {
          throw error;
        }

        const fallbackProvider = this.getAvailableProviders().find((candidate) => candidate !== requestedProvider);
        if (!fallbackProvider) {
          throw error;
        }

        const fallbackModel = PROVIDER_MODELS[fallbackProvider][0] ?? requestedModelId;
        this.logger.warn("provider_fallback", {
          from_provider: requestedProvider,
          from_model: requestedModelId,
          to_provider: fallbackProvider,
          to_model: fallbackModel,
          reason: String(error),
        });

        vendor = fallbackProvider;
        modelId = fallbackModel;
        completion = await this.runAttempt(params, fallbackProvider, fallbackModel);
      }

      this.logger.info("completion", {
        engine: "ai-sdk",
        vendor,
        model: modelId,
        latency_ms: Date.now() - startedAt,
        usage_in: completion.usage.prompt_tokens,
        usage_out: completion.usage.completion_tokens,
        usage_total: completion.usage.total_tokens,
      });
      return completion;
    } catch (error) {
      this.logger.error("completion_failed", error, {
        engine: "ai-sdk",
        vendor,
        model: modelId,
        latency_ms: Date.now() - startedAt,
      });
      throw createError(ErrorCode.PROVIDER_ERROR, `AI SDK error: ${String(error)}`);
    }
  }
}

export function createAISDKProvider(config: AISDKConfig): AISDKProvider {
  return new AISDKProvider(config);
}
