import type { Env } from "../../env";
import { createLogger, normalizeLogLevel, type Logger } from "../../lib/logger";
import type { LLMProvider } from "../types";
import {
  createAISDKProvider,
  isSupportedProvider,
  PROVIDER_MODELS,
  SUPPORTED_PROVIDERS,
  type SupportedProvider,
} from "./ai-sdk";

const DEFAULT_MODEL = "openai/gpt-4o-mini";

function normalizeString(value: string | undefined): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parseModelProvider(model: string): SupportedProvider {
  const normalized = model.trim();
  for (const separator of ["/", ":"]) {
    if (!normalized.includes(separator)) continue;
    const [provider] = normalized.split(separator, 2);
    const key = provider?.toLowerCase();
    if (key && isSupportedProvider(key)) {
      return key;
    }
  }
  return "openai";
}

export function collectApiKeys(env: Env): Partial<Record<SupportedProvider, string>> {
  const keys: Partial<Record<SupportedProvider, string>> = {};
  for (const provider of Object.keys(SUPPORTED_PROVIDERS) as SupportedProvider[]) {
    const value = normalizeString(env[SUPPORTED_PROVIDERS[provider].envKey]);
    if (value) keys[provider] = value;
  }
  return keys;
}

/**
 * Resolve the requested model against the vendors that actually have keys.
 * A model without a vendor prefix is taken as an OpenAI model; an unconfigured
 * vendor falls back to the first configured one.
 */
export function resolveModel(
  requestedModel: string,
  apiKeys: Partial<Record<SupportedProvider, string>>
): { model: string; fallbackFrom?: string } | null {
  const availableProviders = (Object.keys(SUPPORTED_PROVIDERS) as SupportedProvider[]).filter(
    (provider) => !!apiKeys[provider]
  );
  const fallbackProvider = availableProviders[0];
  if (!fallbackProvider) return null;

  const normalizedRequested = requestedModel.trim();
  const requestedProvider = parseModelProvider(normalizedRequested);

  if (apiKeys[requestedProvider]) {
    if (normalizedRequested.includes("/") || normalizedRequested.includes(":")) {
      return { model: normalizedRequested.replace(":", "/") };
    }
    return { model: `${requestedProvider}/${normalizedRequested}` };
  }

  const fallbackModel = PROVIDER_MODELS[fallbackProvider][0] ?? normalizedRequested;
  return {
    model: `${fallbackProvider}/${fallbackModel}`,
    fallbackFrom: normalizedRequested,
  };
}

/**
 * Build the completion provider from environment configuration.
 *
 * LLM_PROVIDER accepts "ai-sdk" (the only engine); LLM_MODEL takes a
 * "provider/model" id. Returns null when no vendor key is configured, in
 * which case the debate and decision stages run on their local defaults.
 */
export function createLLMProvider(env: Env, logger?: Logger): LLMProvider | null {
  const log = logger ?? createLogger("llm", normalizeLogLevel(env.DESK_LOG_LEVEL));
  const providerType = normalizeString(env.LLM_PROVIDER)?.toLowerCase() ?? "ai-sdk";
  if (providerType !== "ai-sdk") {
    log.warn(`LLM_PROVIDER='${providerType}' is not supported; using 'ai-sdk'.`);
  }

  const apiKeys = collectApiKeys(env);
  const resolved = resolveModel(normalizeString(env.LLM_MODEL) ?? DEFAULT_MODEL, apiKeys);
  if (!resolved) {
    log.warn("No completion provider API key configured");
    return null;
  }
  if (resolved.fallbackFrom) {
    log.warn(
      `LLM model '${resolved.fallbackFrom}' is not configured; falling back to '${resolved.model}' based on available API keys.`
    );
  }

  const openaiBaseUrl = normalizeString(env.OPENAI_BASE_URL)?.replace(/\/+$/, "");
  return createAISDKProvider({ model: resolved.model, apiKeys, openaiBaseUrl, logger: log });
}

export function isLLMConfigured(env: Env): boolean {
  return Object.keys(collectApiKeys(env)).length > 0;
}
