/**
 * Attribution context.
 *
 * An optional external revision identifier recorded on each entry.
 * Providers return null when they have nothing; that is never an error.
 */

import { existsSync, readFileSync, statSync } from "node:fs";
import { isAbsolute, join, resolve } from "node:path";

export interface AttributionProvider {
  revision(): Promise<string | null>;
}

export class NullAttributionProvider implements AttributionProvider {
  async revision(): Promise<string | null> {
    return null;
  }
}

export class StaticAttributionProvider implements AttributionProvider {
  constructor(private readonly ref: string | null) {}

  async revision(): Promise<string | null> {
    return this.ref;
  }
}

const OBJECT_ID = /^[0-9a-f]{40}([0-9a-f]{24})?$/;

/**
 * Reads the checked-out revision from a git working tree's metadata
 * files: HEAD, then the named ref file or packed-refs. Spawns nothing.
 */
export class GitAttributionProvider implements AttributionProvider {
  constructor(private readonly workTree: string) {}

  async revision(): Promise<string | null> {
    const gitDir = this.gitDir();
    if (gitDir === null) return null;

    const head = this.readText(join(gitDir, "HEAD"));
    if (head === null) return null;
    if (OBJECT_ID.test(head)) return head;

    const match = /^ref: (.+)$/.exec(head);
    if (match === null) return null;
    const ref = match[1]!;

    const loose = this.readText(join(gitDir, ref));
    if (loose !== null && OBJECT_ID.test(loose)) return loose;

    const packed = this.readText(join(gitDir, "packed-refs"));
    if (packed === null) return null;
    for (const line of packed.split("\n")) {
      const [id, name] = line.split(" ");
      if (name === ref && id !== undefined && OBJECT_ID.test(id)) return id;
    }
    return null;
  }

  /** ".git" directory, or the directory a ".git" file points at */
  private gitDir(): string | null {
    const dotGit = join(this.workTree, ".git");
    if (!existsSync(dotGit)) return null;
    if (statSync(dotGit).isDirectory()) return dotGit;

    const pointer = this.readText(dotGit);
    const match = pointer === null ? null : /^gitdir: (.+)$/.exec(pointer);
    if (match === null) return null;
    const target = match[1]!;
    return isAbsolute(target) ? target : resolve(this.workTree, target);
  }

  private readText(path: string): string | null {
    if (!existsSync(path) || !statSync(path).isFile()) return null;
    return readFileSync(path, "utf8").trim();
  }
}
