import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { JobRunner } from "../../src/core/job-runner.js";
import { KeyedLock } from "../../src/core/keyed-lock.js";
import { SiteGenerator } from "../../src/generation/generator.js";
import { RestApi } from "../../src/interfaces/rest-api.js";
import { PublishService } from "../../src/publishing/service.js";
import { dedupKey } from "../../src/publishing/types.js";
import { PublishingWorkflow } from "../../src/publishing/workflow.js";
import { IdempotencyStore } from "../../src/store/idempotency-store.js";
import {
  InMemoryRepositoryHost,
  RecordingNotifier,
  createMockLogger,
  createMockProvider,
} from "../helpers/mocks.js";
import {
  TEST_EVALUATION_URL,
  TEST_SECRET,
  createTextResponse,
  delimitedOutput,
} from "../helpers/fixtures.js";

describe("POST /api-endpoint", () => {
  let dir: string;
  let api: RestApi;
  let jobs: JobRunner;
  let host: InMemoryRepositoryHost;
  let notifier: RecordingNotifier;
  let store: IdempotencyStore;
  let provider: ReturnType<typeof createMockProvider>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pagewright-api-"));
    const logger = createMockLogger();
    host = new InMemoryRepositoryHost();
    notifier = new RecordingNotifier();
    store = new IdempotencyStore(join(dir, "processed_requests.json"), logger);
    provider = createMockProvider({
      responses: [
        createTextResponse(
          delimitedOutput({
            "index.html": "<h1>Hi</h1>",
            "README.md": "# Hello",
            "ashravan.txt": "A short story",
            "dilemma.json": '{"options":["a","b"]}',
          })
        ),
      ],
    });
    const attachmentsDir = join(dir, "attachments");
    const generator = new SiteGenerator(
      provider,
      { model: "test-model", maxTokens: 1000, attachmentsDir },
      logger
    );
    const workflow = new PublishingWorkflow(
      { host, generator, notifier, store },
      {
        attachmentsDir,
        branch: "main",
        pagesRetries: 3,
        pagesRetryDelayMs: 0,
        licenseHolder: "test-owner",
      },
      logger
    );
    jobs = new JobRunner(logger);
    const service = new PublishService(
      { store, workflow, notifier, jobs, locks: new KeyedLock() },
      logger
    );
    api = new RestApi(logger, service, { secret: TEST_SECRET });
  });

  afterEach(async () => {
    await jobs.drain();
    await api.stop();
    await rm(dir, { recursive: true, force: true });
  });

  const body = {
    secret: TEST_SECRET,
    email: "a@b.c",
    task: "hello-app",
    round: 1,
    nonce: "n1",
    brief: "Make a hello page",
  };

  it("accepts a new request, then answers the same request as a duplicate", async () => {
    const first = await api.inject({ method: "POST", url: "/api-endpoint", payload: body });
    expect(first.statusCode).toBe(200);
    expect(first.json()).toEqual({ status: "accepted", note: "processing round 1 started" });

    await jobs.drain();

    const second = await api.inject({ method: "POST", url: "/api-endpoint", payload: body });
    expect(second.statusCode).toBe(200);
    expect(second.json()).toEqual({ status: "ok", note: "duplicate handled & re-notified" });

    expect(provider.chatMock).toHaveBeenCalledTimes(1);
    expect(await store.lookup(dedupKey({ ...body }))).toEqual({
      email: "a@b.c",
      task: "hello-app",
      round: 1,
      nonce: "n1",
      repo_url: "https://github.com/test-owner/hello-app",
      commit_sha: "commit-5",
      pages_url: "https://test-owner.github.io/hello-app/",
    });
  });

  it("publishes every file the brief asks for and notifies the evaluator", async () => {
    const response = await api.inject({
      method: "POST",
      url: "/api-endpoint",
      payload: {
        ...body,
        brief: "Write ashravan.txt and dilemma.json",
        evaluation_url: TEST_EVALUATION_URL,
      },
    });
    expect(response.statusCode).toBe(200);

    await jobs.drain();

    expect(host.fileText("hello-app", "ashravan.txt")).toBe("A short story");
    expect(host.fileText("hello-app", "dilemma.json")).toBe('{"options":["a","b"]}');
    const prompt: string = provider.chatMock.mock.calls[0]![0].messages[0].content;
    expect(prompt).toContain(
      "The brief mentions or implies these files:\n- ashravan.txt\n- dilemma.json"
    );
    expect(notifier.sent).toHaveLength(1);
    expect(notifier.sent[0]?.url).toBe(TEST_EVALUATION_URL);
    expect(notifier.sent[0]?.payload.commit_sha).toBe("commit-5");
  });

  it("re-notifies the evaluator on a duplicate", async () => {
    const payload = { ...body, evaluation_url: TEST_EVALUATION_URL };
    await api.inject({ method: "POST", url: "/api-endpoint", payload });
    await jobs.drain();

    await api.inject({ method: "POST", url: "/api-endpoint", payload });

    expect(notifier.sent).toHaveLength(2);
    expect(notifier.sent[1]?.payload).toEqual(notifier.sent[0]?.payload);
  });

  it("answers a wrong secret with an error body before validating it", async () => {
    const response = await api.inject({
      method: "POST",
      url: "/api-endpoint",
      payload: { secret: "wrong-secret" },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ error: "Invalid secret" });
    expect(jobs.pending).toBe(0);
  });

  it("rejects a malformed body with 400", async () => {
    const response = await api.inject({
      method: "POST",
      url: "/api-endpoint",
      payload: { ...body, round: "one", nonce: undefined },
    });

    expect(response.statusCode).toBe(400);
    const json = response.json();
    expect(json.error).toBe("Invalid payload");
    expect(Object.keys(json.details.fieldErrors).sort()).toEqual(["nonce", "round"]);
    expect(jobs.pending).toBe(0);
  });
});

describe("health and debug routes", () => {
  let api: RestApi;

  beforeEach(() => {
    api = new RestApi(
      createMockLogger(),
      { submit: async () => "accepted" as const },
      { secret: TEST_SECRET }
    );
  });

  afterEach(async () => {
    await api.stop();
  });

  it("answers the root health check", async () => {
    const response = await api.inject({ method: "GET", url: "/" });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ msg: "OK" });
  });

  it("answers the endpoint probe", async () => {
    const response = await api.inject({ method: "GET", url: "/api-endpoint" });
    expect(response.json()).toEqual({ status: "ok" });
  });

  it("lists the registered routes", async () => {
    const response = await api.inject({ method: "GET", url: "/debug-routes" });
    expect(response.json()).toEqual(["/", "/api-endpoint", "/debug-routes"]);
  });
});
