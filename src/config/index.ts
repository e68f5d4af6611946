import dotenv from "dotenv";

dotenv.config();

type Env = Record<string, string | undefined>;

const resolveNumber = (raw: string | undefined, fallback: number) => {
  if (!raw?.trim()) {
    return fallback;
  }

  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
};

/**
 * Keys from GEMINI_API_KEYS (comma-separated) or the single GEMINI_API_KEY.
 */
export const resolveApiKeys = (env: Env): string[] => {
  const multi = env.GEMINI_API_KEYS;
  if (multi?.trim()) {
    return multi.split(",").map((k) => k.trim()).filter(Boolean);
  }
  const single = env.GEMINI_API_KEY;
  if (single?.trim()) {
    return [single.trim()];
  }
  return [];
};

export const buildConfig = (env: Env) => ({
  appName: env.APP_NAME?.trim() || "Job Tailor API",
  appVersion: env.APP_VERSION?.trim() || "1.0.0",
  port: resolveNumber(env.PORT, 3001),

  /** Keys rotated round-robin by the key pool */
  geminiApiKeys: resolveApiKeys(env),
  geminiModel: env.GEMINI_MODEL?.trim() || "gemini-2.0-flash",
  aiTemperature: resolveNumber(env.AI_TEMPERATURE, 0.7),
  aiMaxOutputTokens: resolveNumber(env.AI_MAX_OUTPUT_TOKENS, 2000),
  aiTimeoutMs: resolveNumber(env.AI_TIMEOUT_MS, 60_000),

  apiKeyCooldownMinutes: resolveNumber(env.API_KEY_COOLDOWN_MINUTES, 5),
  // 0 keeps generic errors from ever benching a key
  apiKeyFailureThreshold: resolveNumber(env.API_KEY_FAILURE_THRESHOLD, 0),

  jobBoardTimeoutMs: resolveNumber(env.JOB_BOARD_TIMEOUT_MS, 30_000),

  corsOrigin: env.CORS_ORIGIN ?? "*",
});

export type AppConfig = ReturnType<typeof buildConfig>;

export const config: AppConfig = buildConfig(process.env);
