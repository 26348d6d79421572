import { Octokit } from "@octokit/core";
import type { Logger } from "../utils/logger.js";

export interface RepositoryInfo {
  name: string;
  fullName: string;
  htmlUrl: string;
}

/** A file as stored on the host, with the SHA required to update it. */
export interface RemoteFile {
  content: Buffer;
  sha: string;
}

export interface CreateRepositoryParams {
  name: string;
  description: string;
  private: boolean;
  autoInit: boolean;
}

export type FileContent = string | Buffer;

/**
 * The remote store the workflow publishes into. Lookups return null for
 * "not found"; every other failure throws a RepositoryHostError.
 */
export interface RepositoryHost {
  readonly owner: string;
  getRepository(name: string): Promise<RepositoryInfo | null>;
  createRepository(params: CreateRepositoryParams): Promise<RepositoryInfo>;
  getFile(repo: string, path: string): Promise<RemoteFile | null>;
  createFile(repo: string, path: string, message: string, content: FileContent): Promise<void>;
  updateFile(
    repo: string,
    path: string,
    message: string,
    content: FileContent,
    sha: string
  ): Promise<void>;
  /** Commit SHAs, newest first. */
  listCommits(repo: string, limit?: number): Promise<string[]>;
  /** Request static-site hosting for `branch`; resolves with the HTTP status. */
  enablePages(repo: string, branch: string): Promise<number>;
}

export class RepositoryHostError extends Error {
  constructor(
    message: string,
    readonly status: number | null
  ) {
    super(message);
    this.name = "RepositoryHostError";
  }
}

export function statusOf(err: unknown): number | null {
  if (
    typeof err === "object" &&
    err !== null &&
    "status" in err &&
    typeof err.status === "number"
  ) {
    return err.status;
  }
  return null;
}

export function pagesUrl(owner: string, repo: string): string {
  return `https://${owner}.github.io/${repo}/`;
}

/** Create `path`, or update it in place when it already exists. */
export async function upsertFile(
  host: RepositoryHost,
  repo: string,
  path: string,
  content: FileContent,
  message: string
): Promise<"created" | "updated"> {
  const existing = await host.getFile(repo, path);
  if (existing) {
    await host.updateFile(repo, path, message, content, existing.sha);
    return "updated";
  }
  await host.createFile(repo, path, message, content);
  return "created";
}

export interface GitHubHostOptions {
  token: string;
  owner: string;
  userAgent?: string;
  /** Swapped out in tests. */
  fetch?: typeof globalThis.fetch;
}

/** RepositoryHost backed by the GitHub REST API. */
export class GitHubRepositoryHost implements RepositoryHost {
  readonly owner: string;
  private octokit: Octokit;

  constructor(
    options: GitHubHostOptions,
    private logger: Logger
  ) {
    this.owner = options.owner;
    this.octokit = new Octokit({
      auth: options.token,
      userAgent: options.userAgent ?? "pagewright",
      ...(options.fetch ? { request: { fetch: options.fetch } } : {}),
    });
  }

  async getRepository(name: string): Promise<RepositoryInfo | null> {
    try {
      const { data } = await this.octokit.request("GET /repos/{owner}/{repo}", {
        owner: this.owner,
        repo: name,
      });
      return { name: data.name, fullName: data.full_name, htmlUrl: data.html_url };
    } catch (err) {
      if (statusOf(err) === 404) return null;
      throw this.wrap(err, `get repository ${name}`);
    }
  }

  async createRepository(params: CreateRepositoryParams): Promise<RepositoryInfo> {
    try {
      const { data } = await this.octokit.request("POST /user/repos", {
        name: params.name,
        description: params.description,
        private: params.private,
        auto_init: params.autoInit,
      });
      this.logger.info({ repo: data.full_name }, "Created repository");
      return { name: data.name, fullName: data.full_name, htmlUrl: data.html_url };
    } catch (err) {
      throw this.wrap(err, `create repository ${params.name}`);
    }
  }

  async getFile(repo: string, path: string): Promise<RemoteFile | null> {
    try {
      const { data } = await this.octokit.request(
        "GET /repos/{owner}/{repo}/contents/{path}",
        { owner: this.owner, repo, path }
      );
      if (Array.isArray(data) || data.type !== "file") {
        throw new RepositoryHostError(`${repo}/${path} is not a file`, null);
      }
      return { content: Buffer.from(data.content, "base64"), sha: data.sha };
    } catch (err) {
      if (err instanceof RepositoryHostError) throw err;
      if (statusOf(err) === 404) return null;
      throw this.wrap(err, `get ${repo}/${path}`);
    }
  }

  async createFile(
    repo: string,
    path: string,
    message: string,
    content: FileContent
  ): Promise<void> {
    await this.putFile(repo, path, message, content);
    this.logger.info({ repo, path }, "Created file");
  }

  async updateFile(
    repo: string,
    path: string,
    message: string,
    content: FileContent,
    sha: string
  ): Promise<void> {
    await this.putFile(repo, path, message, content, sha);
    this.logger.info({ repo, path }, "Updated file");
  }

  async listCommits(repo: string, limit = 1): Promise<string[]> {
    try {
      const { data } = await this.octokit.request(
        "GET /repos/{owner}/{repo}/commits",
        { owner: this.owner, repo, per_page: limit }
      );
      return data.map((commit) => commit.sha);
    } catch (err) {
      throw this.wrap(err, `list commits of ${repo}`);
    }
  }

  async enablePages(repo: string, branch: string): Promise<number> {
    try {
      const response = await this.octokit.request(
        "POST /repos/{owner}/{repo}/pages",
        { owner: this.owner, repo, source: { branch, path: "/" } }
      );
      const status: number = response.status;
      return status;
    } catch (err) {
      // HTTP errors are answers here (422 means already enabled); only
      // transport failures without a status propagate
      const status = statusOf(err);
      if (status !== null) return status;
      throw this.wrap(err, `enable pages for ${repo}`);
    }
  }

  private async putFile(
    repo: string,
    path: string,
    message: string,
    content: FileContent,
    sha?: string
  ): Promise<void> {
    const encoded =
      typeof content === "string"
        ? Buffer.from(content, "utf-8").toString("base64")
        : content.toString("base64");
    try {
      await this.octokit.request("PUT /repos/{owner}/{repo}/contents/{path}", {
        owner: this.owner,
        repo,
        path,
        message,
        content: encoded,
        ...(sha ? { sha } : {}),
      });
    } catch (err) {
      throw this.wrap(err, `write ${repo}/${path}`);
    }
  }

  private wrap(err: unknown, action: string): RepositoryHostError {
    const detail = err instanceof Error ? err.message : String(err);
    return new RepositoryHostError(`GitHub ${action} failed: ${detail}`, statusOf(err));
  }
}
