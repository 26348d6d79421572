import { readFileSync, existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";

const ServerConfigSchema = z.object({
  port: z.number().int().default(8000),
  host: z.string().default("0.0.0.0"),
  rate_limit_per_minute: z.number().int().positive().default(60),
});

const AuthConfigSchema = z.object({
  secret: z.string().min(1),
});

const GitHubConfigSchema = z.object({
  token: z.string().min(1),
  owner: z.string().min(1),
  branch: z.string().default("main"),
  pages_retries: z.number().int().positive().default(3),
  pages_retry_delay_ms: z.number().int().nonnegative().default(2000),
});

const LLMConfigSchema = z.object({
  provider: z.enum(["openai_compat", "anthropic"]).default("openai_compat"),
  api_key: z.string().min(1),
  base_url: z.string().optional(),
  model: z.string().default("gpt-4o"),
  max_tokens: z.number().int().positive().default(8192),
  default_headers: z.record(z.string()).optional(),
});

const StorageConfigSchema = z.object({
  attachments_dir: z.string().default(join(tmpdir(), "pagewright-attachments")),
  processed_path: z.string().default(join(tmpdir(), "processed_requests.json")),
});

const NotifyConfigSchema = z.object({
  timeout_ms: z.number().int().positive().default(15_000),
});

const AppConfigSchema = z.object({
  server: ServerConfigSchema.default({}),
  auth: AuthConfigSchema,
  github: GitHubConfigSchema,
  llm: LLMConfigSchema,
  storage: StorageConfigSchema.default({}),
  notify: NotifyConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;

/**
 * Load configuration from YAML file with environment variable overrides.
 * Env vars take precedence over YAML values for sensitive fields.
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const path = configPath ?? env.CONFIG_PATH ?? "./config/config.yaml";

  let rawConfig: Record<string, unknown> = {};

  if (existsSync(path)) {
    const parsed: unknown = yaml.load(readFileSync(path, "utf-8"));
    if (isRecord(parsed)) rawConfig = parsed;
  }

  applyEnvOverrides(rawConfig, env);

  return AppConfigSchema.parse(rawConfig);
}

function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): void {
  const server = ensureObject(config, "server");
  const auth = ensureObject(config, "auth");
  const github = ensureObject(config, "github");
  const llm = ensureObject(config, "llm");
  const storage = ensureObject(config, "storage");

  if (env.PORT) server.port = parseInt(env.PORT, 10);
  if (env.HOST) server.host = env.HOST;
  if (env.RATE_LIMIT_PER_MINUTE) {
    server.rate_limit_per_minute = parseInt(env.RATE_LIMIT_PER_MINUTE, 10);
  }

  if (env.SECRET) auth.secret = env.SECRET;

  if (env.GITHUB_TOKEN) github.token = env.GITHUB_TOKEN;
  const owner = env.GITHUB_USERNAME ?? env.USERCODE;
  if (owner) github.owner = owner;
  if (env.GITHUB_BRANCH) github.branch = env.GITHUB_BRANCH;

  if (env.LLM_PROVIDER) llm.provider = env.LLM_PROVIDER;
  if (env.LLM_BASE_URL) llm.base_url = env.LLM_BASE_URL;
  if (env.LLM_MODEL) llm.model = env.LLM_MODEL;

  const apiKey =
    env.LLM_API_KEY ??
    (llm.provider === "anthropic" ? env.ANTHROPIC_API_KEY : env.OPENAI_API_KEY);
  if (apiKey) llm.api_key = apiKey;

  if (env.ATTACHMENTS_DIR) storage.attachments_dir = env.ATTACHMENTS_DIR;
  if (env.PROCESSED_PATH) storage.processed_path = env.PROCESSED_PATH;
}

function ensureObject(
  parent: Record<string, unknown>,
  key: string
): Record<string, unknown> {
  const existing = parent[key];
  if (isRecord(existing)) return existing;
  const created: Record<string, unknown> = {};
  parent[key] = created;
  return created;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
