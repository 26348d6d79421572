/**
 * Request correlation context using AsyncLocalStorage.
 * Carries a correlationId (and the dedup key once known) from the HTTP
 * handler into the background job that serves the request.
 */
import { AsyncLocalStorage } from "node:async_hooks";
import { generateEventId } from "../utils/id.js";

export interface RequestContext {
  correlationId: string;
  dedupKey?: string;
}

export const requestContext = new AsyncLocalStorage<RequestContext>();

export function withContext<T>(
  ctx: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return requestContext.run(ctx, fn);
}

export function getCurrentContext(): RequestContext | undefined {
  return requestContext.getStore();
}

export function createCorrelationId(): string {
  return generateEventId();
}
