/**
 * Outcome of one workflow step. Steps never throw into the workflow;
 * they report how far they got and which value the next steps can use.
 */
export type StepStatus = "ok" | "degraded" | "failed";

export interface StepResult<T> {
  step: string;
  status: StepStatus;
  value: T;
  detail?: string;
}

export type StepSummary = Omit<StepResult<unknown>, "value">;

export function ok<T>(step: string, value: T, detail?: string): StepResult<T> {
  return { step, status: "ok", value, ...(detail ? { detail } : {}) };
}

export function degraded<T>(step: string, value: T, detail: string): StepResult<T> {
  return { step, status: "degraded", value, detail };
}

export function failed<T>(step: string, value: T, detail: string): StepResult<T> {
  return { step, status: "failed", value, detail };
}

/** Run `fn`; a thrown error becomes a failed result carrying `fallback`. */
export async function attemptStep<T>(
  step: string,
  fn: () => Promise<T>,
  fallback: T
): Promise<StepResult<T>> {
  try {
    return ok(step, await fn());
  } catch (err) {
    return failed(step, fallback, describeError(err));
  }
}

export function summarizeStep(result: StepResult<unknown>): StepSummary {
  return {
    step: result.step,
    status: result.status,
    ...(result.detail ? { detail: result.detail } : {}),
  };
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
