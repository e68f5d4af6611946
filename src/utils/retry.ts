/**
 * Key rotation for calls to the AI API.
 * Each attempt acquires a key from the pool, runs the call and reports the
 * outcome back so rate-limited keys are benched before the next attempt.
 */

import { AIResponseValidationError } from "../services/aiService";
import { type KeyPool, maskKey } from "./keyPool";

export type FailureKind = "rate_limited" | "key_rejected" | "retryable" | "fatal";

const RATE_LIMIT_HINTS = ["rate limit", "rate_limit", "quota", "resource_exhausted", "429"];
const QUOTA_WORDS = ["rate", "quota", "limit"];
const KEY_WORDS = ["api key", "api_key"];

const errorStatus = (error: unknown): number | null => {
  if (!error || typeof error !== "object") return null;
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("code" in error && typeof error.code === "number") return error.code;
  return null;
};

const errorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (error && typeof error === "object" && "message" in error) {
    return String(error.message);
  }
  return String(error);
};

export const classifyFailure = (error: unknown): FailureKind => {
  if (error instanceof AIResponseValidationError) return "fatal";

  const status = errorStatus(error);
  const msg = errorMessage(error).toLowerCase();

  if (status === 429) return "rate_limited";
  if (status === 403 && QUOTA_WORDS.some((w) => msg.includes(w))) return "rate_limited";
  if (status === 401 || status === 403) return "key_rejected";
  if (status === 400 && KEY_WORDS.some((w) => msg.includes(w))) return "key_rejected";
  if (status !== null && status >= 400 && status < 500) return "fatal";
  if (RATE_LIMIT_HINTS.some((hint) => msg.includes(hint))) return "rate_limited";

  return "retryable";
};

const FAILURE_VERBS: Record<FailureKind, string> = {
  rate_limited: "rate-limited",
  key_rejected: "rejected",
  retryable: "failed",
  fatal: "failed",
};

export class KeyRotationExhaustedError extends Error {
  public readonly attempts: number;
  public readonly lastError: unknown;

  constructor(label: string, attempts: number, lastError: unknown) {
    super(
      `${label}: failed after ${attempts} attempt(s). Last error: ${errorMessage(lastError)}`,
    );
    this.name = "KeyRotationExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export interface RotationOpts {
  label?: string;
  maxAttempts?: number;
}

export interface RotationResult<T> {
  result: T;
  apiKey: string;
  attempt: number;
}

export const withKeyRotation = async <T>(
  pool: KeyPool,
  fn: (apiKey: string) => Promise<T>,
  opts: RotationOpts = {},
): Promise<RotationResult<T>> => {
  const { label = "API", maxAttempts = pool.size } = opts;
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const apiKey = pool.acquire();
    console.log(`[Retry] ${label} attempt ${attempt}/${maxAttempts} with key ${maskKey(apiKey)}`);

    try {
      const result = await fn(apiKey);
      pool.reportSuccess(apiKey);
      return { result, apiKey, attempt };
    } catch (error) {
      const kind = classifyFailure(error);
      // A rejected key is benched like a rate-limited one until it cools down.
      pool.reportFailure(apiKey, {
        rateLimited: kind === "rate_limited" || kind === "key_rejected",
      });

      if (kind === "fatal") {
        throw error;
      }

      lastError = error;
      console.warn(
        `[Retry] ${label} ${FAILURE_VERBS[kind]} ` +
        `with key ${maskKey(apiKey)}: ${errorMessage(error)}`,
      );
    }
  }

  throw new KeyRotationExhaustedError(label, maxAttempts, lastError);
};
