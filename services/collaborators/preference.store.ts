import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { Logger } from "pino";
import type { QueryFn } from "../../database/index.js";
import type { PreferenceStore, StoreResult } from "../planner/types.js";
import { runFetchPreferences, runInsertPreference } from "../queries/preference.query.js";
import { errorMessage } from "./errors.js";

const MemoryFileSchema = z.record(z.string(), z.array(z.string()));
type MemoryFile = z.infer<typeof MemoryFileSchema>;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

// ─── File store ─────────────────────────────────────────────────────────────

/**
 * JSON file of key → labels. A missing file reads as empty. Writes go through a
 * temp file and rename; calls are serialized within the process.
 */
export class FilePreferenceStore implements PreferenceStore {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly path: string,
    private readonly logger: Logger
  ) {}

  private async read(): Promise<MemoryFile> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return {};
      throw err;
    }
    return MemoryFileSchema.parse(JSON.parse(text));
  }

  private async write(data: MemoryFile): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.tmp`;
    await writeFile(tmp, JSON.stringify(data, null, 2), "utf8");
    await rename(tmp, this.path);
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const next = this.queue.then(task, task);
    this.queue = next.catch(() => undefined);
    return next;
  }

  async fetch(key: string): Promise<string[]> {
    const data = await this.serialize(() => this.read());
    const labels = data[key] ?? [];
    this.logger.debug({ key, count: labels.length }, "preferences fetched");
    return [...labels];
  }

  async store(key: string, value: string): Promise<StoreResult> {
    try {
      return await this.serialize(async () => {
        const data = await this.read();
        const labels = data[key] ?? [];
        if (labels.includes(value)) return { status: "already_exists" } as const;
        await this.write({ ...data, [key]: [...labels, value] });
        this.logger.info({ key, value }, "preference stored");
        return { status: "stored" } as const;
      });
    } catch (err) {
      this.logger.error({ key, err: errorMessage(err) }, "preference store failed");
      return { status: "error", message: errorMessage(err) };
    }
  }
}

// ─── Postgres store ─────────────────────────────────────────────────────────

/** Preference store on the `preferences` table. `run` defaults to the shared pool in production wiring. */
export class PostgresPreferenceStore implements PreferenceStore {
  constructor(
    private readonly run: QueryFn,
    private readonly logger: Logger
  ) {}

  async fetch(key: string): Promise<string[]> {
    return runFetchPreferences(this.run, key);
  }

  async store(key: string, value: string): Promise<StoreResult> {
    try {
      const inserted = await runInsertPreference(this.run, key, value);
      if (inserted) this.logger.info({ key, value }, "preference stored");
      return { status: inserted ? "stored" : "already_exists" };
    } catch (err) {
      this.logger.error({ key, err: errorMessage(err) }, "preference store failed");
      return { status: "error", message: errorMessage(err) };
    }
  }
}
