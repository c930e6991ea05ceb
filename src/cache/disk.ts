import { randomUUID } from "node:crypto";
import { mkdir, readFile, readdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

export const storedCacheEntrySchema = z.object({
  namespace: z.string(),
  params: z.record(z.string(), z.unknown()),
  data: z.unknown().refine((value) => value !== undefined, { message: "data is missing" }),
  cachedAt: z.string().datetime(),
  ttlSeconds: z.number().nonnegative(),
});

export type StoredCacheEntry = z.infer<typeof storedCacheEntrySchema>;

export type DiskReadResult =
  | { status: "hit"; entry: StoredCacheEntry }
  | { status: "miss" }
  | { status: "corrupt"; reason: string };

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Durable cache tier: one JSON file per key, named by the key itself.
 * Files are written to a temp name and renamed into place, so readers never
 * see a partial entry and concurrent writers of one key leave one whole file.
 */
export class DiskCacheTier {
  constructor(readonly directory: string) {}

  pathFor(key: string): string {
    return path.join(this.directory, `${key}.json`);
  }

  async read(key: string): Promise<DiskReadResult> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(key), "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return { status: "miss" };
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return { status: "corrupt", reason: "invalid JSON" };
    }

    const entry = storedCacheEntrySchema.safeParse(parsed);
    if (!entry.success) {
      return { status: "corrupt", reason: entry.error.issues[0]?.message ?? "invalid entry" };
    }
    return { status: "hit", entry: entry.data };
  }

  async write(key: string, entry: StoredCacheEntry): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const target = this.pathFor(key);
    const temp = `${target}.${process.pid}.${randomUUID()}.tmp`;
    await writeFile(temp, JSON.stringify(entry), "utf-8");
    await rename(temp, target);
  }

  async remove(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }

  async clear(): Promise<void> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (isMissingFile(error)) return;
      throw error;
    }
    await Promise.all(
      names
        .filter((name) => name.endsWith(".json"))
        .map((name) => rm(path.join(this.directory, name), { force: true })),
    );
  }
}
