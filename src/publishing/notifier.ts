import type { Logger } from "../utils/logger.js";
import type { PublishPayload } from "./types.js";

/** Delivers a publish payload to the evaluator. One attempt, no retries. */
export interface EvaluationNotifier {
  notify(url: string, payload: PublishPayload): Promise<number>;
}

export class NotificationError extends Error {
  constructor(
    message: string,
    readonly status: number | null
  ) {
    super(message);
    this.name = "NotificationError";
  }
}

export class HttpEvaluationNotifier implements EvaluationNotifier {
  constructor(
    private timeoutMs: number,
    private logger: Logger,
    private fetchImpl: typeof globalThis.fetch = globalThis.fetch
  ) {}

  async notify(url: string, payload: PublishPayload): Promise<number> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (!res.ok) {
        const text = await res.text().catch(() => "");
        throw new NotificationError(
          `Evaluator responded ${res.status}: ${text.slice(0, 200)}`,
          res.status
        );
      }

      this.logger.info(
        { url, status: res.status, task: payload.task, round: payload.round },
        "Evaluator notified"
      );
      return res.status;
    } catch (err) {
      if (err instanceof NotificationError) throw err;
      const reason =
        err instanceof Error && err.name === "AbortError"
          ? `timed out after ${this.timeoutMs}ms`
          : err instanceof Error
            ? err.message
            : String(err);
      throw new NotificationError(`Evaluator notification failed: ${reason}`, null);
    } finally {
      clearTimeout(timer);
    }
  }
}
