/**
 * Atomic JSON persistence: write a uniquely named temp file beside the
 * target, fsync it, then rename over the target. Readers see either the
 * old document or the new one, never a partial write.
 */

import { randomBytes } from "node:crypto";
import {
  closeSync,
  fsyncSync,
  mkdirSync,
  openSync,
  renameSync,
  rmSync,
  writeSync,
} from "node:fs";
import { basename, dirname, join } from "node:path";

export function serializeJson(document: unknown): string {
  return JSON.stringify(document, null, 2) + "\n";
}

export function atomicWriteJson(filePath: string, document: unknown): void {
  const dir = dirname(filePath);
  mkdirSync(dir, { recursive: true });
  const tmp = join(dir, `.${basename(filePath)}.${randomBytes(6).toString("hex")}.tmp`);

  try {
    const fd = openSync(tmp, "wx");
    try {
      writeSync(fd, serializeJson(document));
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tmp, filePath);
  } catch (err) {
    rmSync(tmp, { force: true });
    throw err;
  }
}
