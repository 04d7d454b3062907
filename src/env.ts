export const ENV_KEYS = [
  "LLM_PROVIDER",
  "LLM_MODEL",
  "OPENAI_API_KEY",
  "OPENAI_BASE_URL",
  "ANTHROPIC_API_KEY",
  "GOOGLE_GENERATIVE_AI_API_KEY",
  "XAI_API_KEY",
  "DEEPSEEK_API_KEY",

  "DESK_LOG_LEVEL",
  "DESK_LOT_SIZE",
  "DESK_LLM_TIMEOUT_MS",
  "DESK_LLM_MAX_RETRIES",
  "DESK_LLM_INITIAL_BACKOFF_MS",
  "DESK_LLM_MAX_BACKOFF_MS",
  "DESK_DEBATE_LLM_WEIGHT",
  "DESK_BASE_POSITION_PCT",
  "DESK_PROMOTE_SUB_LOT_BUYS",
  "DESK_POSITION_SIZING_SCORE",
] as const;

export type EnvKey = (typeof ENV_KEYS)[number];

export type Env = Partial<Record<EnvKey, string>>;

/**
 * Copy the desk's keys out of a process-style environment. Unknown keys are
 * dropped so that the rest of the code only ever sees declared settings.
 */
export function readEnv(source: Record<string, string | undefined> = process.env): Env {
  const env: Env = {};
  for (const key of ENV_KEYS) {
    const value = source[key];
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}
