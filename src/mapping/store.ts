/**
 * store.ts — Per-document mapping storage
 *
 * The dashboard's symbol/formula mapping is an opaque text blob; this store only
 * keeps it next to the document it belongs to. One JSON file per document:
 *
 *   ~/.ca-bridge/mappings/
 *   └── <sha1 of the document's full path>.json   # { document, content, updatedAt }
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync, rmSync } from "node:fs";
import { resolve } from "node:path";
import { homedir } from "node:os";
import { createHash } from "node:crypto";
import { z } from "zod";

export const DEFAULT_MAPPING_DIR = resolve(homedir(), ".ca-bridge", "mappings");

// ─── Types ───────────────────────────────────────────────

const StoredMappingSchema = z.object({
  document: z.string(),
  content: z.string(),
  updatedAt: z.string(),
});

export type StoredMapping = z.infer<typeof StoredMappingSchema>;

// ─── MappingStore ────────────────────────────────────────

export class MappingStore {
  constructor(private readonly dir: string = DEFAULT_MAPPING_DIR) {}

  /** File holding the mapping of `document` (its full path) */
  pathFor(document: string): string {
    const key = createHash("sha1").update(document, "utf8").digest("hex");
    return resolve(this.dir, `${key}.json`);
  }

  /** Stored mapping, or null when none exists or the file is unreadable. */
  read(document: string): StoredMapping | null {
    const file = this.pathFor(document);
    if (!existsSync(file)) return null;

    try {
      const parsed = StoredMappingSchema.safeParse(JSON.parse(readFileSync(file, "utf-8")));
      // A hash collision or a hand-edited file must not leak another document's mapping.
      if (!parsed.success || parsed.data.document !== document) return null;
      return parsed.data;
    } catch {
      return null;
    }
  }

  write(document: string, content: string, now: Date = new Date()): StoredMapping {
    mkdirSync(this.dir, { recursive: true });
    const entry: StoredMapping = { document, content, updatedAt: now.toISOString() };
    writeFileSync(this.pathFor(document), JSON.stringify(entry, null, 2));
    return entry;
  }

  /** Returns false when there was nothing to remove. */
  remove(document: string): boolean {
    const file = this.pathFor(document);
    if (!existsSync(file)) return false;
    rmSync(file);
    return true;
  }
}
