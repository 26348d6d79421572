import { readFile } from "node:fs/promises";
import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "../utils/logger.js";
import { toSingleLine } from "../utils/text.js";
import {
  attemptStep,
  degraded,
  describeError,
  failed,
  ok,
  summarizeStep,
  type StepResult,
  type StepSummary,
} from "../core/step-result.js";
import { decodeAttachments, type DecodedAttachment } from "../generation/attachments.js";
import type { SiteGenerator } from "../generation/generator.js";
import type { GeneratedFiles } from "../generation/response-parser.js";
import type { IdempotencyStore } from "../store/idempotency-store.js";
import {
  pagesUrl,
  upsertFile,
  type RepositoryHost,
  type RepositoryInfo,
} from "./github.js";
import { generateMitLicense } from "./license.js";
import type { EvaluationNotifier } from "./notifier.js";
import { dedupKey, type PublishPayload, type PublishRequest } from "./types.js";

const DESCRIPTION_LIMIT = 300;
const TEXT_ATTACHMENT_EXTENSIONS = [".md", ".csv", ".json", ".txt", ".html", ".css", ".js"];

export interface WorkflowOptions {
  attachmentsDir: string;
  branch: string;
  pagesRetries: number;
  pagesRetryDelayMs: number;
  licenseHolder: string;
  now?: () => Date;
}

export interface WorkflowDeps {
  host: RepositoryHost;
  generator: SiteGenerator;
  notifier: EvaluationNotifier;
  store: IdempotencyStore;
}

export interface WorkflowOutcome {
  payload: PublishPayload;
  steps: StepSummary[];
}

export class RepositoryUnavailableError extends Error {
  constructor(task: string, cause: unknown) {
    super(`Could not resolve repository ${task}: ${describeError(cause)}`);
    this.name = "RepositoryUnavailableError";
  }
}

export function repositoryDescription(brief: string): string {
  const summary = toSingleLine(brief).slice(0, DESCRIPTION_LIMIT);
  return `${summary} (see README for full brief)`;
}

function isTextAttachment(attachment: DecodedAttachment): boolean {
  return (
    attachment.mime.startsWith("text") ||
    TEXT_ATTACHMENT_EXTENSIONS.some((ext) => attachment.name.endsWith(ext))
  );
}

/**
 * Turns one validated request into a published repository:
 *
 *  1. decode attachments        7. commit LICENSE
 *  2. find or create the repo   8. enable Pages (round 1 only)
 *  3. previous README (round 2+) 9. read the latest commit SHA
 *  4. generate files            10. notify the evaluator
 *  5. commit attachments        11. record the payload for dedup
 *  6. commit generated files
 *
 * Only step 2 is fatal. Every other step reports a StepResult and the
 * workflow carries on with a degraded value (null SHA, null Pages URL,
 * no previous README).
 */
export class PublishingWorkflow {
  private now: () => Date;

  constructor(
    private deps: WorkflowDeps,
    private options: WorkflowOptions,
    private logger: Logger
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async run(request: PublishRequest): Promise<WorkflowOutcome> {
    const log = this.logger.child({ task: request.task, round: request.round });
    const steps: StepResult<unknown>[] = [];
    log.info("Starting publishing workflow");

    const decoded = await decodeAttachments(
      request.attachments,
      this.options.attachmentsDir,
      log
    );
    steps.push(
      decoded.length === request.attachments.length
        ? ok("decode-attachments", decoded.length)
        : degraded(
            "decode-attachments",
            decoded.length,
            `${decoded.length} of ${request.attachments.length} attachments decoded`
          )
    );
    log.info(
      { attachments: decoded.map((a) => ({ name: a.name, mime: a.mime, size: a.size })) },
      "Attachments saved"
    );

    const repo = await this.ensureRepository(request, log);

    const previousReadme = await this.previousReadme(repo.name, request.round);
    steps.push(previousReadme);

    const generation = await this.deps.generator.generate({
      brief: request.brief,
      round: request.round,
      decoded,
      checks: request.checks,
      previousReadme: previousReadme.value,
    });
    steps.push(
      generation.source === "model"
        ? ok("generate", Object.keys(generation.files), generation.format)
        : degraded("generate", Object.keys(generation.files), "completion failed, fallback files used")
    );

    steps.push(await this.commitAttachments(repo.name, generation.attachments, log));
    steps.push(await this.commitGeneratedFiles(repo.name, generation.files, log));
    steps.push(
      await attemptStep(
        "commit-license",
        async () => {
          const license = generateMitLicense(
            this.options.licenseHolder,
            this.now().getUTCFullYear()
          );
          await upsertFile(this.deps.host, repo.name, "LICENSE", license, "Add MIT license");
          return true;
        },
        false
      )
    );

    const pages = await this.publishPages(repo.name, request.round, log);
    steps.push(pages);

    const commit = await attemptStep(
      "latest-commit",
      async () => (await this.deps.host.listCommits(repo.name, 1))[0] ?? null,
      null
    );
    steps.push(commit);

    const payload: PublishPayload = {
      email: request.email,
      task: request.task,
      round: request.round,
      nonce: request.nonce,
      repo_url: repo.htmlUrl,
      commit_sha: commit.value,
      pages_url: pages.value,
    };

    steps.push(await this.notify(request.evaluation_url, payload));

    await this.deps.store.record(dedupKey(request), payload);
    steps.push(ok("record", true));

    const summaries = steps.map(summarizeStep);
    const problems = summaries.filter((s) => s.status !== "ok");
    if (problems.length > 0) {
      log.warn({ steps: problems }, "Publishing finished with degraded steps");
    }
    log.info(
      { repoUrl: payload.repo_url, commitSha: payload.commit_sha, pagesUrl: payload.pages_url },
      "Publishing workflow finished"
    );

    return { payload, steps: summaries };
  }

  private async ensureRepository(
    request: PublishRequest,
    log: Logger
  ): Promise<RepositoryInfo> {
    try {
      const existing = await this.deps.host.getRepository(request.task);
      if (existing) {
        log.info({ repo: existing.fullName }, "Repository already exists");
        return existing;
      }
      return await this.deps.host.createRepository({
        name: request.task,
        description: repositoryDescription(request.brief),
        private: false,
        autoInit: false,
      });
    } catch (err) {
      throw new RepositoryUnavailableError(request.task, err);
    }
  }

  private async previousReadme(
    repo: string,
    round: number
  ): Promise<StepResult<string | null>> {
    if (round < 2) return ok("previous-readme", null, "round 1");

    const result = await attemptStep(
      "previous-readme",
      async () => {
        const file = await this.deps.host.getFile(repo, "README.md");
        return file ? file.content.toString("utf-8") : null;
      },
      null
    );
    if (result.status === "ok" && result.value === null) {
      return degraded("previous-readme", null, "README.md not found");
    }
    // A failed fetch only costs context
    return result.status === "failed"
      ? degraded("previous-readme", null, result.detail ?? "fetch failed")
      : result;
  }

  private async commitAttachments(
    repo: string,
    attachments: readonly DecodedAttachment[],
    log: Logger
  ): Promise<StepResult<string[]>> {
    const committed: string[] = [];
    const errors: string[] = [];

    for (const attachment of attachments) {
      try {
        const bytes = await readFile(attachment.path);
        if (isTextAttachment(attachment)) {
          await upsertFile(
            this.deps.host,
            repo,
            attachment.name,
            bytes.toString("utf-8"),
            `Add attachment ${attachment.name}`
          );
        } else {
          await upsertFile(
            this.deps.host,
            repo,
            attachment.name,
            bytes,
            `Add binary ${attachment.name}`
          );
          await upsertFile(
            this.deps.host,
            repo,
            `attachments/${attachment.name}.b64`,
            bytes.toString("base64"),
            `Backup ${attachment.name}.b64`
          );
        }
        committed.push(attachment.name);
      } catch (err) {
        log.warn(
          { attachment: attachment.name, error: describeError(err) },
          "Attachment commit failed"
        );
        errors.push(`${attachment.name}: ${describeError(err)}`);
      }
    }

    return errors.length === 0
      ? ok("commit-attachments", committed)
      : degraded("commit-attachments", committed, errors.join("; "));
  }

  private async commitGeneratedFiles(
    repo: string,
    files: GeneratedFiles,
    log: Logger
  ): Promise<StepResult<string[]>> {
    const committed: string[] = [];
    const errors: string[] = [];

    for (const [name, content] of Object.entries(files)) {
      try {
        await upsertFile(this.deps.host, repo, name, content, `Add/Update ${name}`);
        committed.push(name);
      } catch (err) {
        log.warn({ file: name, error: describeError(err) }, "Generated file commit failed");
        errors.push(`${name}: ${describeError(err)}`);
      }
    }

    if (committed.length === 0) {
      return failed("commit-files", committed, errors.join("; "));
    }
    return errors.length === 0
      ? ok("commit-files", committed)
      : degraded("commit-files", committed, errors.join("; "));
  }

  /**
   * Round 1 turns Pages on, retrying a fixed number of times; 422 means it
   * is already on. Later rounds assume it is on and only build the URL.
   */
  private async publishPages(
    repo: string,
    round: number,
    log: Logger
  ): Promise<StepResult<string | null>> {
    const url = pagesUrl(this.deps.host.owner, repo);
    if (round >= 2) return ok("enable-pages", url, "already enabled in round 1");

    const { pagesRetries, pagesRetryDelayMs, branch } = this.options;
    let lastDetail = "no attempt made";

    for (let attempt = 1; attempt <= pagesRetries; attempt++) {
      try {
        const status = await this.deps.host.enablePages(repo, branch);
        if (status === 201 || status === 202) {
          log.info({ attempt }, "Pages enabled");
          return ok("enable-pages", url);
        }
        if (status === 422) {
          log.info("Pages already enabled");
          return ok("enable-pages", url, "already enabled");
        }
        lastDetail = `HTTP ${status}`;
      } catch (err) {
        lastDetail = describeError(err);
      }

      log.warn({ attempt, detail: lastDetail }, "Pages enablement attempt failed");
      if (attempt < pagesRetries) await sleep(pagesRetryDelayMs);
    }

    log.error({ attempts: pagesRetries }, "Failed to enable Pages after retries");
    return failed("enable-pages", null, lastDetail);
  }

  private async notify(
    url: string | undefined,
    payload: PublishPayload
  ): Promise<StepResult<boolean>> {
    if (!url) return degraded("notify", false, "no evaluation_url in request");
    const result = await attemptStep(
      "notify",
      async () => {
        await this.deps.notifier.notify(url, payload);
        return true;
      },
      false
    );
    if (result.status === "failed") {
      this.logger.warn({ url, detail: result.detail }, "Evaluator notification failed");
    }
    return result;
  }
}
