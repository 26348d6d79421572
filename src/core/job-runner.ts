import type { Logger } from "../utils/logger.js";
import { createCorrelationId, getCurrentContext, withContext } from "./correlation.js";

/**
 * Runs fire-and-forget background jobs off the request path.
 * Failures are logged, never rethrown; in-flight jobs are tracked so
 * shutdown can wait for them.
 */
export class JobRunner {
  private inFlight = new Set<Promise<void>>();

  constructor(private logger: Logger) {}

  schedule(name: string, fn: () => Promise<unknown>): void {
    const correlationId =
      getCurrentContext()?.correlationId ?? createCorrelationId();
    const startedAt = Date.now();

    const job: Promise<void> = withContext(
      { correlationId, dedupKey: name },
      async () => {
        // Yield first so the caller's response is sent before work starts
        await new Promise<void>((resolve) => setImmediate(resolve));
        await fn();
      }
    )
      .then(
        () => {
          this.logger.info(
            { job: name, durationMs: Date.now() - startedAt },
            "Background job finished"
          );
        },
        (err: unknown) => {
          this.logger.error({ job: name, error: err }, "Background job failed");
        }
      )
      .finally(() => {
        this.inFlight.delete(job);
      });

    this.inFlight.add(job);
  }

  get pending(): number {
    return this.inFlight.size;
  }

  /** Resolve once every job scheduled so far has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }
}
