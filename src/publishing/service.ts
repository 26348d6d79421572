import type { Logger } from "../utils/logger.js";
import type { JobRunner } from "../core/job-runner.js";
import type { KeyedLock } from "../core/keyed-lock.js";
import { describeError } from "../core/step-result.js";
import type { IdempotencyStore } from "../store/idempotency-store.js";
import type { EvaluationNotifier } from "./notifier.js";
import { dedupKey, type PublishPayload, type PublishRequest } from "./types.js";
import type { PublishingWorkflow } from "./workflow.js";

export type SubmitResult = "accepted" | "duplicate";

export interface PublishServiceDeps {
  store: IdempotencyStore;
  workflow: Pick<PublishingWorkflow, "run">;
  notifier: EvaluationNotifier;
  jobs: JobRunner;
  locks: KeyedLock;
}

/**
 * Entry point for validated requests.
 *
 * A dedup key that is already recorded is a pure replay: the stored payload
 * is re-sent to the evaluator before responding. A new key is handed to a
 * background job that holds the per-key lock, so two deliveries of the same
 * request never publish concurrently; the later one re-checks the store once
 * it gets the lock and replays instead.
 */
export class PublishService {
  constructor(
    private deps: PublishServiceDeps,
    private logger: Logger
  ) {}

  async submit(request: PublishRequest): Promise<SubmitResult> {
    const key = dedupKey(request);
    const previous = await this.deps.store.lookup(key);

    if (previous) {
      this.logger.warn({ key }, "Duplicate request, re-notifying only");
      await this.replay(request, previous);
      return "duplicate";
    }

    if (this.deps.locks.isLocked(key)) {
      this.logger.info({ key }, "Request queued behind an in-flight run");
    }
    this.deps.jobs.schedule(key, () =>
      this.deps.locks.run(key, () => this.process(key, request))
    );
    this.logger.info({ key, round: request.round }, "Request accepted");
    return "accepted";
  }

  private async process(key: string, request: PublishRequest): Promise<void> {
    const previous = await this.deps.store.lookup(key);
    if (previous) {
      this.logger.info({ key }, "Request completed while queued, replaying");
      await this.replay(request, previous);
      return;
    }
    await this.deps.workflow.run(request);
  }

  private async replay(request: PublishRequest, payload: PublishPayload): Promise<void> {
    if (!request.evaluation_url) {
      this.logger.warn({ task: request.task }, "No evaluation_url to re-notify");
      return;
    }
    try {
      await this.deps.notifier.notify(request.evaluation_url, payload);
    } catch (err) {
      this.logger.warn(
        { url: request.evaluation_url, error: describeError(err) },
        "Re-notification failed"
      );
    }
  }
}
