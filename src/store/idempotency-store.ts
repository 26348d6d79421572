import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Logger } from "../utils/logger.js";
import { generateEventId } from "../utils/id.js";
import { PublishPayloadSchema, type PublishPayload } from "../publishing/types.js";

type StoreData = Record<string, unknown>;

/**
 * Dedup key → last published payload, kept as one JSON object in one file.
 *
 * Every lookup reads the whole file; every record rewrites it. Writes go
 * through a single in-process queue and land by temp-file + rename, so
 * concurrent records in this process never lose each other's keys and a
 * reader never sees a half-written file. Separate processes sharing the
 * file are not coordinated: the last one to rename wins.
 */
export class IdempotencyStore {
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    private filePath: string,
    private logger: Logger
  ) {}

  async lookup(key: string): Promise<PublishPayload | null> {
    const data = await this.load();
    if (!(key in data)) return null;

    const parsed = PublishPayloadSchema.safeParse(data[key]);
    if (!parsed.success) {
      this.logger.warn({ key }, "Ignoring malformed idempotency entry");
      return null;
    }
    return parsed.data;
  }

  record(key: string, payload: PublishPayload): Promise<void> {
    const write = this.writeQueue.then(() => this.write(key, payload));
    this.writeQueue = write.catch(() => undefined);
    return write;
  }

  private async write(key: string, payload: PublishPayload): Promise<void> {
    const data = await this.load();
    data[key] = payload;

    await mkdir(dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${generateEventId()}.tmp`;
    await writeFile(tempPath, JSON.stringify(data, null, 2), "utf-8");
    await rename(tempPath, this.filePath);
  }

  private async load(): Promise<StoreData> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return {};
      throw err;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
        return Object.fromEntries(Object.entries(parsed));
      }
      this.logger.warn({ path: this.filePath }, "Idempotency store is not a JSON object, treating as empty");
    } catch {
      this.logger.warn({ path: this.filePath }, "Idempotency store is corrupt, treating as empty");
    }
    return {};
  }
}

function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}
