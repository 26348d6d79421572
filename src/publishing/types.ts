import { z } from "zod";

export const AttachmentDescriptorSchema = z.object({
  name: z.string().optional(),
  mime: z.string().optional(),
  content: z.string().optional(),
  url: z.string().optional(),
});

export type AttachmentDescriptor = z.infer<typeof AttachmentDescriptorSchema>;

/** Checks arrive as plain strings or as structured objects (e.g. `{ js: "..." }`). */
const CheckSchema = z
  .union([z.string(), z.record(z.unknown())])
  .transform((check) =>
    typeof check === "string" ? check : JSON.stringify(check)
  );

export const PublishRequestSchema = z.object({
  secret: z.string(),
  email: z.string().min(1),
  task: z
    .string()
    .min(1)
    .max(100)
    .regex(/^[A-Za-z0-9._-]+$/, "task must be a valid repository name"),
  round: z.number().int().positive().default(1),
  nonce: z.string().min(1),
  brief: z.string(),
  attachments: z.array(AttachmentDescriptorSchema).default([]),
  checks: z.array(CheckSchema).default([]),
  evaluation_url: z.string().url().optional(),
});

export type PublishRequest = z.infer<typeof PublishRequestSchema>;

export const PublishPayloadSchema = z.object({
  email: z.string(),
  task: z.string(),
  round: z.number(),
  nonce: z.string(),
  repo_url: z.string(),
  commit_sha: z.string().nullable(),
  pages_url: z.string().nullable(),
});

/** What was published for one request; replayed verbatim on duplicates. */
export type PublishPayload = z.infer<typeof PublishPayloadSchema>;

export function dedupKey(
  request: Pick<PublishRequest, "email" | "task" | "round" | "nonce">
): string {
  return `${request.email}::${request.task}::round${request.round}::nonce${request.nonce}`;
}
