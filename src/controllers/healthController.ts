import { Router } from "express";
import type { KeyPool } from "../utils/keyPool";

export interface HealthControllerDeps {
  appName: string;
  keyPool: KeyPool;
}

export const createHealthController = ({ appName, keyPool }: HealthControllerDeps) => {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({ status: `${appName} is running` });
  });

  router.get("/health", (_req, res) => {
    res.json({ status: "healthy" });
  });

  router.get("/api-keys/status", (_req, res) => {
    const summary = keyPool.summary();

    res.json({
      total_keys: summary.totalKeys,
      available_keys: summary.availableKeys,
      cooling_down_keys: summary.coolingDownKeys,
      cooldown_minutes: summary.cooldownMs / 60_000,
      failure_threshold: summary.failureThreshold,
      has_available_keys: summary.availableKeys > 0,
      keys: summary.keys.map((k) => ({
        key: k.key,
        state: k.state,
        consecutive_failures: k.consecutiveFailures,
        cooldown_remaining_seconds: Math.ceil(k.cooldownRemainingMs / 1000),
        last_used_at: k.lastUsedAt === null ? null : new Date(k.lastUsedAt).toISOString(),
      })),
    });
  });

  return router;
};
