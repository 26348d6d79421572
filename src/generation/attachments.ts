import { mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import type { Logger } from "../utils/logger.js";
import { escapeNewlines } from "../utils/text.js";
import { describeError } from "../core/step-result.js";
import type { AttachmentDescriptor } from "../publishing/types.js";

export interface DecodedAttachment {
  name: string;
  path: string;
  mime: string;
  size: number;
}

const DEFAULT_NAME = "attachment";
const DEFAULT_CONTENT_MIME = "text/plain";
const DEFAULT_DATA_URL_MIME = "application/octet-stream";
const PREVIEW_CHARS = 1000;
const CSV_PREVIEW_LINES = 3;
const PREVIEW_EXTENSIONS = [".md", ".txt", ".json", ".csv"];

const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

/** Decode standard base64, rejecting stray characters and bad padding. */
export function decodeBase64Strict(input: string): Buffer {
  const compact = input.replace(/\s+/g, "");
  if (compact.length % 4 !== 0 || !BASE64_BODY.test(compact)) {
    throw new Error("Invalid base64 payload");
  }
  return Buffer.from(compact, "base64");
}

/**
 * Resolve a descriptor to bytes. Returns null for descriptors that carry
 * neither inline content nor a data URL.
 */
function decodeDescriptor(
  descriptor: AttachmentDescriptor
): { data: Buffer; mime: string } | null {
  if (descriptor.content !== undefined) {
    const mime = descriptor.mime ?? DEFAULT_CONTENT_MIME;
    const data = mime.startsWith("text")
      ? Buffer.from(descriptor.content, "utf-8")
      : decodeBase64Strict(descriptor.content);
    return { data, mime };
  }

  const url = descriptor.url ?? "";
  if (!url.startsWith("data:")) return null;

  const comma = url.indexOf(",");
  if (comma === -1) {
    throw new Error("Data URL has no payload");
  }
  const header = url.slice("data:".length, comma);
  const mime = header.split(";")[0] || DEFAULT_DATA_URL_MIME;
  return { data: decodeBase64Strict(url.slice(comma + 1)), mime };
}

function safeName(name: string | undefined): string {
  const base = basename(name ?? "");
  return base === "" || base === "." || base === ".." ? DEFAULT_NAME : base;
}

/**
 * Write every decodable attachment into `dir` under its own name.
 * A descriptor that fails to decode is skipped with a warning; the rest
 * of the batch still goes through.
 */
export async function decodeAttachments(
  descriptors: readonly AttachmentDescriptor[],
  dir: string,
  logger: Logger
): Promise<DecodedAttachment[]> {
  const saved: DecodedAttachment[] = [];
  if (descriptors.length === 0) return saved;

  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    logger.warn(
      { dir, attachments: descriptors.map((d) => safeName(d.name)), error: describeError(err) },
      "Attachment directory unavailable, skipping all attachments"
    );
    return saved;
  }

  for (const descriptor of descriptors) {
    const name = safeName(descriptor.name);
    try {
      const decoded = decodeDescriptor(descriptor);
      if (!decoded) continue;

      const path = join(dir, name);
      await writeFile(path, decoded.data);
      saved.push({ name, path, mime: decoded.mime, size: decoded.data.length });
    } catch (err) {
      logger.warn(
        { attachment: name, error: describeError(err) },
        "Failed to decode attachment, skipping"
      );
    }
  }

  return saved;
}

function isPreviewable(attachment: DecodedAttachment): boolean {
  return (
    attachment.mime.startsWith("text") ||
    PREVIEW_EXTENSIONS.some((ext) => attachment.name.endsWith(ext))
  );
}

async function previewOf(attachment: DecodedAttachment): Promise<string> {
  const text = await readFile(attachment.path, "utf-8");
  if (attachment.name.endsWith(".csv")) {
    return text
      .split(/\r?\n/)
      .slice(0, CSV_PREVIEW_LINES)
      .map((line) => line.trim())
      .join("\\n");
  }
  return escapeNewlines(text.slice(0, PREVIEW_CHARS)).slice(0, PREVIEW_CHARS);
}

/** One prompt line per attachment: a text preview, or name, mime and size. */
export async function summarizeAttachments(
  attachments: readonly DecodedAttachment[]
): Promise<string> {
  const lines: string[] = [];

  for (const attachment of attachments) {
    const label = `- ${attachment.name} (${attachment.mime})`;
    try {
      if (isPreviewable(attachment)) {
        lines.push(`${label}: preview: ${await previewOf(attachment)}`);
      } else {
        lines.push(`${label}: ${attachment.size} bytes`);
      }
    } catch (err) {
      lines.push(`${label}: (could not read preview: ${describeError(err)})`);
    }
  }

  return lines.join("\n");
}
