type CredentialState =
  | { kind: "available" }
  | { kind: "cooling_down"; until: number };

interface Credential {
  readonly value: string;
  state: CredentialState;
  consecutiveFailures: number;
  lastUsedAt: number | null;
}

export interface KeyPoolOptions {
  keys: string[];
  cooldownMs: number;
  /**
   * Consecutive non-rate-limit failures that also bench a key.
   * 0 disables it: only rate limits trigger a cooldown.
   */
  failureThreshold?: number;
  now?: () => number;
}

export interface KeyStatus {
  key: string;
  state: "available" | "cooling_down";
  consecutiveFailures: number;
  cooldownRemainingMs: number;
  lastUsedAt: number | null;
}

export interface KeyPoolSummary {
  totalKeys: number;
  availableKeys: number;
  coolingDownKeys: number;
  cooldownMs: number;
  failureThreshold: number;
  keys: KeyStatus[];
}

export interface FailureReport {
  rateLimited: boolean;
}

export class EmptyKeyPoolError extends Error {
  constructor(message = "No API keys configured. Set GEMINI_API_KEYS or GEMINI_API_KEY in .env") {
    super(message);
    this.name = "EmptyKeyPoolError";
  }
}

export class InvalidKeyPoolConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidKeyPoolConfigError";
  }
}

export class NoKeysAvailableError extends Error {
  /** Epoch ms at which the first key leaves cooldown */
  public readonly retryAt: number;
  public readonly retryAfterMs: number;

  constructor(retryAt: number, now: number) {
    const retryAfterMs = Math.max(0, retryAt - now);
    super(
      `All API keys are cooling down. Retry after ${Math.ceil(retryAfterMs / 1000)}s.`,
    );
    this.name = "NoKeysAvailableError";
    this.retryAt = retryAt;
    this.retryAfterMs = retryAfterMs;
  }
}

export const maskKey = (key: string): string =>
  key.length > 8 ? `${key.slice(0, 4)}...${key.slice(-4)}` : "****";

/**
 * Round-robin pool of API keys with lazy cooldown expiry.
 *
 * Every method is synchronous, so calls from concurrent requests are
 * serialised by the event loop. Callers hold no lease: two in-flight requests
 * may be handed the same key when it is the only one available.
 */
export class KeyPool {
  private readonly pool: Credential[];
  private readonly cooldownMs: number;
  private readonly failureThreshold: number;
  private readonly now: () => number;
  private cursor = 0;

  constructor(options: KeyPoolOptions) {
    const { cooldownMs, failureThreshold = 0, now = Date.now } = options;

    if (!Number.isFinite(cooldownMs) || cooldownMs <= 0) {
      throw new InvalidKeyPoolConfigError(
        `cooldownMs must be a positive number, got ${cooldownMs}`,
      );
    }
    if (!Number.isInteger(failureThreshold) || failureThreshold < 0) {
      throw new InvalidKeyPoolConfigError(
        `failureThreshold must be a non-negative integer, got ${failureThreshold}`,
      );
    }

    const unique = [...new Set(options.keys.map((k) => k.trim()).filter(Boolean))];
    if (unique.length === 0) {
      throw new EmptyKeyPoolError();
    }

    this.pool = unique.map((value): Credential => ({
      value,
      state: { kind: "available" },
      consecutiveFailures: 0,
      lastUsedAt: null,
    }));
    this.cooldownMs = cooldownMs;
    this.failureThreshold = failureThreshold;
    this.now = now;

    console.log(`[KeyPool] Initialized with ${this.pool.length} key(s)`);
  }

  get size(): number {
    return this.pool.length;
  }

  acquire(): string {
    const now = this.now();
    const len = this.pool.length;
    let earliest = Number.POSITIVE_INFINITY;

    for (let i = 0; i < len; i++) {
      const idx = (this.cursor + i) % len;
      const entry = this.pool[idx];

      if (entry.state.kind === "cooling_down" && entry.state.until <= now) {
        entry.state = { kind: "available" };
      }

      if (entry.state.kind === "available") {
        this.cursor = (idx + 1) % len;
        entry.lastUsedAt = now;
        return entry.value;
      }

      earliest = Math.min(earliest, entry.state.until);
    }

    console.warn(
      `[KeyPool] All ${len} key(s) cooling down, next available in ${Math.ceil((earliest - now) / 1000)}s`,
    );
    throw new NoKeysAvailableError(earliest, now);
  }

  reportSuccess(key: string): void {
    const entry = this.find(key);
    if (!entry) return;
    entry.consecutiveFailures = 0;
  }

  reportFailure(key: string, { rateLimited }: FailureReport): void {
    const entry = this.find(key);
    if (!entry) return;

    entry.consecutiveFailures += 1;

    if (rateLimited) {
      this.benchKey(entry, "rate-limited");
      return;
    }

    if (this.failureThreshold > 0 && entry.consecutiveFailures >= this.failureThreshold) {
      this.benchKey(entry, `${entry.consecutiveFailures} consecutive failures`);
    }
  }

  status(): KeyStatus[] {
    const now = this.now();

    return this.pool.map((entry): KeyStatus => {
      const remaining =
        entry.state.kind === "cooling_down" ? Math.max(0, entry.state.until - now) : 0;

      return {
        key: maskKey(entry.value),
        state: remaining > 0 ? "cooling_down" : "available",
        consecutiveFailures: entry.consecutiveFailures,
        cooldownRemainingMs: remaining,
        lastUsedAt: entry.lastUsedAt,
      };
    });
  }

  summary(): KeyPoolSummary {
    const keys = this.status();
    const coolingDownKeys = keys.filter((k) => k.state === "cooling_down").length;

    return {
      totalKeys: keys.length,
      availableKeys: keys.length - coolingDownKeys,
      coolingDownKeys,
      cooldownMs: this.cooldownMs,
      failureThreshold: this.failureThreshold,
      keys,
    };
  }

  private find(key: string): Credential | undefined {
    const entry = this.pool.find((k) => k.value === key);
    if (!entry) {
      console.warn(`[KeyPool] Ignoring report for unknown key ${maskKey(key)}`);
    }
    return entry;
  }

  private benchKey(entry: Credential, reason: string): void {
    entry.state = { kind: "cooling_down", until: this.now() + this.cooldownMs };
    console.warn(
      `[KeyPool] Key ${maskKey(entry.value)} ${reason}, cooldown ${(this.cooldownMs / 1000).toFixed(0)}s`,
    );
  }
}
