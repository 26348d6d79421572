import { randomBytes } from "node:crypto";

/**
 * Compact, time-sortable identifier: base36(timestamp) + "-" + 8 hex chars.
 * Used for correlation ids and for temp-file suffixes during atomic writes.
 */
export function generateEventId(): string {
  const timePart = Date.now().toString(36);
  const randomPart = randomBytes(4).toString("hex");
  return `${timePart}-${randomPart}`;
}
