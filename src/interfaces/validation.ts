import { timingSafeEqual } from "node:crypto";

/** True when `body.secret` equals the configured shared secret. */
export function hasValidSecret(body: unknown, expected: string): boolean {
  if (!expected || typeof body !== "object" || body === null) return false;
  if (!("secret" in body) || typeof body.secret !== "string") return false;

  const a = Buffer.from(body.secret);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}
