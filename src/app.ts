import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import { ZodError } from "zod";
import type { AppConfig } from "./config";
import { createCvController } from "./controllers/cvController";
import { createHealthController } from "./controllers/healthController";
import { createJobsController } from "./controllers/jobsController";
import type { JobScraper, TextGenerator } from "./models/types";
import { AIResponseValidationError } from "./services/aiService";
import { JobScrapeError } from "./services/jobService";
import { type KeyPool, NoKeysAvailableError } from "./utils/keyPool";
import { KeyRotationExhaustedError } from "./utils/retry";

export interface AppDeps {
  config: Pick<AppConfig, "appName" | "corsOrigin">;
  keyPool: KeyPool;
  generateText: TextGenerator;
  jobScraper: JobScraper;
}

export const createApp = ({ config, keyPool, generateText, jobScraper }: AppDeps) => {
  const app = express();

  app.use(
    cors({
      origin: config.corsOrigin === "*" ? true : config.corsOrigin,
    }),
  );

  app.use(express.json({ limit: "1mb" }));

  app.use(createHealthController({ appName: config.appName, keyPool }));
  app.use(createJobsController(jobScraper));
  app.use(createCvController({ keyPool, generateText }));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use(
    (
      err: unknown,
      _req: Request,
      res: Response,
      _next: NextFunction,
    ) => {
      if (err instanceof SyntaxError && "body" in err) {
        res.status(400).json({ error: "Invalid JSON body" });
        return;
      }

      if (err instanceof ZodError) {
        res.status(400).json({ error: "Validation error", issues: err.issues });
        return;
      }

      if (err instanceof NoKeysAvailableError) {
        const retryAfter = Math.ceil(err.retryAfterMs / 1000);
        res.setHeader("Retry-After", String(retryAfter));
        res.status(503).json({
          error: "All API keys are temporarily rate-limited. Please try again later.",
          retryAfter,
        });
        return;
      }

      if (err instanceof KeyRotationExhaustedError) {
        res.status(503).json({
          error: "AI service unavailable",
          message: err.message,
          attempts: err.attempts,
        });
        return;
      }

      if (err instanceof AIResponseValidationError) {
        res.status(502).json({ error: "AI response failed validation", message: err.message });
        return;
      }

      if (err instanceof JobScrapeError) {
        res.status(502).json({ error: "Job boards unavailable", details: err.errors });
        return;
      }

      console.error("[App] Unhandled error:", err);
      const message = err instanceof Error ? err.message : "Unknown error";
      res.status(500).json({ error: "Internal server error", message });
    },
  );

  return app;
};
