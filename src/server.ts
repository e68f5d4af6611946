import { createApp } from "./app";
import { config } from "./config";
import { generateText } from "./services/aiService";
import { HttpJobScraper } from "./services/jobService";
import { KeyPool } from "./utils/keyPool";

const start = () => {
  let keyPool: KeyPool;
  try {
    keyPool = new KeyPool({
      keys: config.geminiApiKeys,
      cooldownMs: config.apiKeyCooldownMinutes * 60_000,
      failureThreshold: config.apiKeyFailureThreshold,
    });
  } catch (error) {
    console.error("[Server] Refusing to start:", error instanceof Error ? error.message : error);
    process.exit(1);
  }

  const app = createApp({
    config,
    keyPool,
    generateText,
    jobScraper: new HttpJobScraper({ timeoutMs: config.jobBoardTimeoutMs }),
  });

  app.listen(config.port, () => {
    console.log(`[Server] ${config.appName} v${config.appVersion} listening on port ${config.port}`);
  });
};

start();
