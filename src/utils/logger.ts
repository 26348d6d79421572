/**
 * Structured logging with credential redaction and correlation context.
 *
 * Redaction policy:
 * - The shared request secret and every token/API key are replaced with "[REDACTED]"
 * - Attachment bodies are never logged, only their names and sizes
 */
import pino from "pino";
import { getCurrentContext } from "../core/correlation.js";

export function createLogger(name?: string) {
  const logger = pino({
    name: name ?? "pagewright",
    level: process.env.LOG_LEVEL ?? "info",
    serializers: {
      // Pino only serializes Error objects for the `err` key by default.
      // Add `error` so logger.error({ error: someError }) shows message + stack.
      error: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        "secret",
        "token",
        "apiKey",
        "api_key",
        "content",
        "*.secret",
        "*.token",
        "*.apiKey",
        "*.api_key",
        "*.content",
      ],
      censor: "[REDACTED]",
    },
    mixin() {
      const ctx = getCurrentContext();
      if (ctx) {
        return {
          correlationId: ctx.correlationId,
          ...(ctx.dedupKey ? { dedupKey: ctx.dedupKey } : {}),
        };
      }
      return {};
    },
    transport:
      process.env.NODE_ENV !== "production"
        ? { target: "pino-pretty", options: { colorize: true } }
        : undefined,
  });

  return logger;
}

export type Logger = pino.Logger;
