/**
 * Immutable archival sink.
 *
 * Attestations and lineage updates may be mirrored into an append-only
 * archive for audit retention. A document is written once under a name
 * derived from its kind, time and id; an existing name is never
 * overwritten.
 */

import { createHash } from "node:crypto";
import { mkdir, readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { canonicalize } from "json-canonicalize";
import { IntegrityError } from "@compliance-ledger/types";
import type { ArchiveReceipt } from "@compliance-ledger/types";

export interface ArchivalSink {
  archive(kind: string, id: string, document: unknown, at?: Date): Promise<ArchiveReceipt>;

  /** Location of the latest entry archived under (kind, id), or null */
  locate(kind: string, id: string): Promise<string | null>;
}

/**
 * 2026-03-04T05:06:07.890Z → 20260304T050607Z
 */
export function compactTimestamp(at: Date): string {
  return at.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
}

function safeId(id: string): string {
  return id.replace(/[^A-Za-z0-9._-]/g, "_");
}

export function archiveName(kind: string, id: string, at: Date): string {
  return `${kind}_${compactTimestamp(at)}_${safeId(id)}.json`;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Names archived under (kind, id), oldest first */
function matching(names: Iterable<string>, kind: string, id: string): string[] {
  const pattern = new RegExp(`^${escapeRegExp(kind)}_\\d{8}T\\d{6}Z_${escapeRegExp(safeId(id))}\\.json$`);
  return [...names].filter((name) => pattern.test(name)).sort();
}

function contentHash(document: unknown): string {
  return createHash("sha256").update(canonicalize(document)).digest("hex");
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}

// =============================================================================
// File sink
// =============================================================================

export class FileArchivalSink implements ArchivalSink {
  constructor(private readonly dir: string) {}

  async archive(kind: string, id: string, document: unknown, at: Date = new Date()): Promise<ArchiveReceipt> {
    await mkdir(this.dir, { recursive: true });
    const name = archiveName(kind, id, at);
    const location = join(this.dir, name);

    try {
      await writeFile(location, JSON.stringify(document, null, 2) + "\n", { flag: "wx" });
    } catch (err) {
      if (isAlreadyExists(err)) {
        throw new IntegrityError(`Archive entry already exists: ${name}`, { location });
      }
      throw err;
    }

    return {
      kind,
      snapshot_id: name,
      location,
      archived_at: at.toISOString(),
      content_hash: contentHash(document),
    };
  }

  async locate(kind: string, id: string): Promise<string | null> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      throw err;
    }
    const latest = matching(names, kind, id).at(-1);
    return latest === undefined ? null : join(this.dir, latest);
  }
}

// =============================================================================
// In-memory sink
// =============================================================================

export class InMemoryArchivalSink implements ArchivalSink {
  private readonly entries = new Map<string, string>();

  async archive(kind: string, id: string, document: unknown, at: Date = new Date()): Promise<ArchiveReceipt> {
    const name = archiveName(kind, id, at);
    if (this.entries.has(name)) {
      throw new IntegrityError(`Archive entry already exists: ${name}`, { location: name });
    }
    this.entries.set(name, JSON.stringify(document));

    return {
      kind,
      snapshot_id: name,
      location: `memory://${name}`,
      archived_at: at.toISOString(),
      content_hash: contentHash(document),
    };
  }

  async locate(kind: string, id: string): Promise<string | null> {
    const latest = matching(this.entries.keys(), kind, id).at(-1);
    return latest === undefined ? null : `memory://${latest}`;
  }

  names(): readonly string[] {
    return [...this.entries.keys()];
  }

  read(name: string): unknown {
    const text = this.entries.get(name);
    return text === undefined ? undefined : JSON.parse(text);
  }
}
