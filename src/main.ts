import { loadConfig } from "./utils/config.js";
import { createLogger } from "./utils/logger.js";
import { createProvider } from "./core/llm/factory.js";
import { JobRunner } from "./core/job-runner.js";
import { KeyedLock } from "./core/keyed-lock.js";
import { SiteGenerator } from "./generation/generator.js";
import { GitHubRepositoryHost } from "./publishing/github.js";
import { HttpEvaluationNotifier } from "./publishing/notifier.js";
import { PublishService } from "./publishing/service.js";
import { PublishingWorkflow } from "./publishing/workflow.js";
import { IdempotencyStore } from "./store/idempotency-store.js";
import { RestApi } from "./interfaces/rest-api.js";

const logger = createLogger();

async function main() {
  logger.info("Starting pagewright...");

  // 1. Load configuration
  const config = loadConfig();
  logger.info(
    { owner: config.github.owner, provider: config.llm.provider, model: config.llm.model },
    "Configuration loaded"
  );

  // 2. External collaborators
  const provider = createProvider(config.llm);
  const host = new GitHubRepositoryHost(
    { token: config.github.token, owner: config.github.owner },
    logger
  );
  const notifier = new HttpEvaluationNotifier(config.notify.timeout_ms, logger);
  const store = new IdempotencyStore(config.storage.processed_path, logger);

  // 3. Pipeline
  const generator = new SiteGenerator(
    provider,
    {
      model: config.llm.model,
      maxTokens: config.llm.max_tokens,
      attachmentsDir: config.storage.attachments_dir,
    },
    logger
  );
  const workflow = new PublishingWorkflow(
    { host, generator, notifier, store },
    {
      attachmentsDir: config.storage.attachments_dir,
      branch: config.github.branch,
      pagesRetries: config.github.pages_retries,
      pagesRetryDelayMs: config.github.pages_retry_delay_ms,
      licenseHolder: config.github.owner,
    },
    logger
  );
  const jobs = new JobRunner(logger);
  const service = new PublishService(
    { store, workflow, notifier, jobs, locks: new KeyedLock() },
    logger
  );

  // 4. HTTP surface
  const restApi = new RestApi(logger, service, {
    secret: config.auth.secret,
    rateLimitPerMinute: config.server.rate_limit_per_minute,
  });
  await restApi.start(config.server.port, config.server.host);

  // 5. Graceful shutdown: stop accepting, then let running jobs finish
  const shutdown = async (signal: string) => {
    logger.info({ signal, pendingJobs: jobs.pending }, "Received shutdown signal");
    await restApi.stop();
    await jobs.drain();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  logger.info("pagewright is running");
}

main().catch((err) => {
  logger.fatal({ error: err }, "Fatal startup error");
  process.exit(1);
});
